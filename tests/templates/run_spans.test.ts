import { describe, it, expect } from "vitest";
import { mapRunSpans, overlappingSpans } from "../../src/templates/run_spans.js";
import { p, paragraphFromXml, r } from "../helpers/wordml.js";

function inner(markup: string): string {
  return markup.slice("<w:p>".length, -"</w:p>".length);
}

describe("mapRunSpans", () => {
  it("records half-open offsets per run, including empty runs", () => {
    const para = paragraphFromXml(inner(p(r("ab"), r(""), r("c"))));
    const { fullText, spans } = mapRunSpans(para);
    expect(fullText).toBe("abc");
    expect(spans.map(({ index, start, end }) => ({ index, start, end }))).toEqual([
      { index: 0, start: 0, end: 2 },
      { index: 1, start: 2, end: 2 },
      { index: 2, start: 2, end: 3 },
    ]);
  });

  it("returns empty text and no spans for a paragraph without runs", () => {
    expect(mapRunSpans(paragraphFromXml(""))).toEqual({ fullText: "", spans: [] });
  });
});

describe("overlappingSpans", () => {
  const { spans } = mapRunSpans(paragraphFromXml(inner(p(r("Batch: {{"), r("BATCH_1"), r("}}"), r(" ok")))));

  it("selects every run a token touches", () => {
    expect(overlappingSpans(spans, 7, 18).map((s) => s.index)).toEqual([0, 1, 2]);
  });

  it("excludes runs that only border the interval", () => {
    expect(overlappingSpans(spans, 9, 16).map((s) => s.index)).toEqual([1]);
  });
});
