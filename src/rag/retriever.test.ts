import { describe, it, expect, vi } from "vitest";
import { collectSources, formatHit, formatSourcesForUI, sourceLabel } from "./context-builder.js";
import { retrieve, type Searchable } from "./retriever.js";
import { segmentMetadata } from "./test-helpers/fakes.js";
import type { QueryHit } from "./types.js";

function hit(text: string, phraseNumber: number, score: number): QueryHit {
  return { id: `id-${phraseNumber}`, text, metadata: segmentMetadata(phraseNumber), score };
}

describe("retrieve", () => {
  it("asks for topK hits and drops those under the threshold", async () => {
    const query = vi.fn<Searchable["query"]>().mockResolvedValue([
      hit("close", 3, 0.9),
      hit("borderline", 1, 0.5),
      hit("far", 2, 0.1),
    ]);

    const hits = await retrieve("widgets", { query }, { topK: 3, scoreThreshold: 0.5 });

    expect(query).toHaveBeenCalledWith("widgets", 3);
    expect(hits.map((h) => h.text)).toEqual(["close", "borderline"]);
  });
});

describe("context formatting", () => {
  it("labels a source by its citation, or builds one from the other fields", () => {
    expect(sourceLabel(segmentMetadata(1))).toBe(
      "Tester, T., & Sample, S. (2024). Widget Dynamics. Journal of Tests, 1(1), 1-10.",
    );
    expect(
      sourceLabel({ title: null, authors: [], year: null, citation: null, phraseNumber: 1 }),
    ).toBe("Unknown author (n.d.). Untitled");
    expect(
      sourceLabel({ title: "Gears", authors: ["Roe, R.", "Poe, P."], year: "2020", citation: null, phraseNumber: 1 }),
    ).toBe("Roe, R., Poe, P. (2020). Gears");
  });

  it("formats a ranked hit", () => {
    const untitled = { title: null, authors: ["Roe, R."], year: "2020", citation: null, phraseNumber: 4 };
    expect(formatHit({ id: "x", text: "Gears turn.", metadata: untitled, score: 0.87654 }, 2)).toBe(
      "[2] Gears turn.\n    Roe, R. (2020). Untitled · #4 · score 0.877",
    );
  });

  it("groups phrase numbers by source in first-seen order", () => {
    const other = { title: "Gears", authors: [], year: null, citation: null, phraseNumber: 9 };
    const hits = [
      hit("a", 5, 0.9),
      { id: "g", text: "g", metadata: other, score: 0.8 },
      hit("b", 2, 0.7),
      hit("c", 5, 0.6),
    ];

    const sources = collectSources(hits);

    expect(sources).toEqual([
      { label: "Tester, T., & Sample, S. (2024). Widget Dynamics. Journal of Tests, 1(1), 1-10.", phrases: [2, 5] },
      { label: "Unknown author (n.d.). Gears", phrases: [9] },
    ]);
    expect(formatSourcesForUI(sources)).toBe(
      "Tester, T., & Sample, S. (2024). Widget Dynamics. Journal of Tests, 1(1), 1-10. #2, #5 | Unknown author (n.d.). Gears #9",
    );
  });
});
