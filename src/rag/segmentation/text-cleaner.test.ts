import { describe, it, expect } from "vitest";
import { cleanPage, findRepeatedLines, removeRepeatedLines } from "./text-cleaner.js";

describe("findRepeatedLines", () => {
  it("picks the most frequent first and last lines", () => {
    const pages = ["H\nBody1\nF", "H\nBody2\nF", "H\nBody3\nOther"];
    expect(findRepeatedLines(pages)).toEqual({ header: "H", footer: "F" });
  });

  it("ignores empty pages and trims edge lines", () => {
    expect(findRepeatedLines(["", "  A  \nx\n"])).toEqual({ header: "A", footer: "x" });
  });

  it("breaks ties in favour of the first page", () => {
    expect(findRepeatedLines(["A\nx", "B\ny", "A\ny", "B\nx"])).toEqual({
      header: "A",
      footer: "x",
    });
  });

  it("finds nothing when no edge line recurs across pages", () => {
    expect(findRepeatedLines(["A\nx", "B\ny"])).toEqual({ header: null, footer: null });
  });

  it("returns nulls when there are no pages", () => {
    expect(findRepeatedLines([])).toEqual({ header: null, footer: null });
  });
});

describe("cleanPage", () => {
  const pages = ["H\nBody1\nF", "H\nBody2\nF", "H\nBody3\nOther"];

  it("removes the header and footer shared across pages", () => {
    expect(cleanPage(pages[0] ?? "", pages)).toBe("Body1");
    expect(cleanPage(pages[1] ?? "", pages)).toBe("Body2");
  });

  it("keeps a last line that is not the common footer", () => {
    expect(cleanPage(pages[2] ?? "", pages)).toBe("Body3\nOther");
  });

  it("keeps edge lines that appear on only one page", () => {
    const distinct = [
      "Title\nBody one.\nUnique ending one.",
      "Other start\nBody two.\nUnique ending two.",
    ];
    expect(cleanPage(distinct[0] ?? "", distinct)).toBe("Title\nBody one.\nUnique ending one.");
  });

  it("never empties a one-line page", () => {
    expect(cleanPage("Only line", ["Only line"])).toBe("Only line");
  });

  it("strips the edges of a single multi-line page", () => {
    expect(cleanPage("Title\nBody\nEnd", ["Title\nBody\nEnd"])).toBe("Body");
  });
});

describe("removeRepeatedLines", () => {
  it("keeps the last remaining line even when it matches the footer", () => {
    expect(removeRepeatedLines("H\nF", { header: "H", footer: "F" })).toBe("F");
  });

  it("leaves text alone when nothing repeats", () => {
    expect(removeRepeatedLines("a\nb\nc", { header: null, footer: null })).toBe("a\nb\nc");
  });
});
