#!/usr/bin/env node
import "dotenv/config";
import blessed from "blessed";
import { initPaperIndex, type PaperIndex } from "./rag/paper-index.js";
import { collectSources, formatHit, formatSourcesForUI } from "./rag/context-builder.js";

// ── State ───────────────────────────────────────────────────────────────────
const apiKey = process.env["OPENROUTER_API_KEY"];
if (!apiKey) {
  console.error("Error: OPENROUTER_API_KEY environment variable is required.");
  console.error("  export OPENROUTER_API_KEY=your-key");
  process.exit(1);
}

let searching = false;
let paperIndex: PaperIndex | null = null;

// ── UI Setup ────────────────────────────────────────────────────────────────
const screen = blessed.screen({
  smartCSR: true,
  title: "paper-sift",
});

const resultsBox = blessed.log({
  parent: screen,
  top: 0,
  left: 0,
  width: "100%",
  height: "100%-3",
  scrollable: true,
  alwaysScroll: true,
  scrollbar: {
    ch: "│",
    style: { bg: "blue" },
  },
  border: { type: "line" },
  style: {
    border: { fg: "blue" },
  },
  label: " paper-sift ",
  tags: true,
  mouse: true,
});

const inputBox = blessed.textbox({
  parent: screen,
  bottom: 0,
  left: 0,
  width: "100%",
  height: 3,
  border: { type: "line" },
  style: {
    border: { fg: "green" },
    focus: { border: { fg: "yellow" } },
  },
  label: " query > ",
  inputOnFocus: false,
  mouse: true,
});

screen.key(["C-c"], () => process.exit(0));
inputBox.key(["C-c"], () => process.exit(0));

// Use setTimeout to break the blur→focus→render→blur cycle
inputBox.on("blur", () => {
  if (!searching) setTimeout(() => promptInput(), 0);
});

resultsBox.log("Indexing papers, then type a query below. Ctrl+C to quit.");
resultsBox.log("");
screen.render();

function promptInput(): void {
  inputBox.readInput(() => {/* handled by submit event */});
}

// Literal braces would otherwise be parsed as blessed tags
function escapeTags(text: string): string {
  return text.replace(/[{}]/g, (ch) => (ch === "{" ? "{open}" : "{close}"));
}

// ── Search ──────────────────────────────────────────────────────────────────
async function search(query: string): Promise<void> {
  if (!paperIndex) {
    resultsBox.log("{yellow-fg}index is still being built{/}");
    return;
  }

  const hits = await paperIndex.query(query);
  if (hits.length === 0) {
    resultsBox.log("{grey-fg}  no matching segments{/}");
    return;
  }

  hits.forEach((hit, i) => {
    resultsBox.log(escapeTags(formatHit(hit, i + 1)));
  });
  resultsBox.log(`{grey-fg}  \u{2713} ${escapeTags(formatSourcesForUI(collectSources(hits)))}{/}`);
}

// ── Input Handler ───────────────────────────────────────────────────────────
inputBox.on("submit", (value: string) => {
  const text = value.trim();
  inputBox.clearValue();
  screen.render();

  if (!text || searching) {
    promptInput();
    return;
  }

  resultsBox.log(`{green-fg}query >{/} ${escapeTags(text)}`);
  searching = true;
  inputBox.style.border.fg = "grey";
  screen.render();

  search(text)
    .catch((err: unknown) => {
      const msg = err instanceof Error ? err.message : String(err);
      resultsBox.log(`{red-fg}error:{/} ${escapeTags(msg)}`);
    })
    .finally(() => {
      searching = false;
      resultsBox.log("");
      inputBox.style.border.fg = "green";
      screen.render();
      promptInput();
    });
});

inputBox.key(["escape"], () => {
  inputBox.cancel();
});

// ── Index Initialization (non-blocking) ────────────────────────────────────
initPaperIndex({
  apiKey,
  exportPath: process.env["RECORDS_EXPORT_PATH"],
  log: (msg) => {
    resultsBox.log(`{grey-fg}${escapeTags(msg)}{/}`);
    screen.render();
  },
})
  .then((index) => {
    paperIndex = index;
    resultsBox.log("");
    screen.render();
  })
  .catch((err: unknown) => {
    const msg = err instanceof Error ? err.message : String(err);
    resultsBox.log(`{red-fg}indexing failed: ${escapeTags(msg)}{/}`);
    screen.render();
  });

screen.render();
promptInput();
