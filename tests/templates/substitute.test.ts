import { describe, it, expect } from "vitest";
import { serializeXml } from "../../src/document/ooxml.js";
import { replacePlaceholdersInContainer } from "../../src/templates/substitute.js";
import { findPlaceholders } from "../../src/templates/placeholders.js";
import { paragraphFromXml, r } from "../helpers/wordml.js";

function fill(runs: string[], values: Record<string, string>) {
  const paragraph = paragraphFromXml(runs.join(""));
  const report = replacePlaceholdersInContainer(paragraph, new Map(Object.entries(values)));
  return { paragraph, report, texts: paragraph.runs.map((run) => run.text) };
}

describe("replacePlaceholdersInContainer", () => {
  it("merges a token split across three runs into the first one", () => {
    const { paragraph, report, texts } = fill([r("Batch: {{"), r("BATCH_1"), r("}}")], { BATCH_1: "L-204" });
    expect(paragraph.text).toBe("Batch: L-204");
    expect(texts).toEqual(["Batch: L-204", "", ""]);
    expect(report).toEqual({ replaced: ["BATCH_1"], unresolved: [], styleFailures: [] });
  });

  it("keeps the text after the token in its last run", () => {
    const { texts } = fill([r("Moisture: {{M"), r("1}} %")], { M1: "2.5" });
    expect(texts).toEqual(["Moisture: 2.5 %", ""]);
  });

  it("substitutes several tokens in one run", () => {
    const { paragraph, report } = fill([r("{{M1}} / {{PH1}}")], { M1: "2.5", PH1: "7.0" });
    expect(paragraph.text).toBe("2.5 / 7.0");
    expect(report.replaced).toEqual(["M1", "PH1"]);
  });

  it("composes tokens that share a run boundary", () => {
    const { paragraph, texts } = fill([r("{{M1}} / {{"), r("PH1}}"), r(" end")], { M1: "2.5", PH1: "7.0" });
    expect(texts).toEqual(["2.5 / 7.0", "", " end"]);
    expect(paragraph.text).toBe("2.5 / 7.0 end");
  });

  it("accepts whitespace inside the braces", () => {
    expect(fill([r("{{ M1 }}")], { M1: "2.5" }).paragraph.text).toBe("2.5");
  });

  it("inserts values literally", () => {
    expect(fill([r("{{B1V1}}")], { B1V1: "<12 & >3 {{x}}" }).paragraph.text).toBe("<12 & >3 {{x}}");
  });

  it("leaves a paragraph with only unknown keys byte-for-byte unchanged", () => {
    const paragraph = paragraphFromXml(r("Lot {{UNKNOWN}}") + r(" and {{ALSO") + r("_UNKNOWN}}"));
    const before = serializeXml(paragraph.element.ownerDocument);
    const report = replacePlaceholdersInContainer(paragraph, new Map([["M1", "2.5"]]));
    expect(serializeXml(paragraph.element.ownerDocument)).toBe(before);
    expect(report).toEqual({ replaced: [], unresolved: ["UNKNOWN", "ALSO_UNKNOWN"], styleFailures: [] });
  });

  it("leaves unknown tokens verbatim next to substituted ones", () => {
    const { paragraph, report } = fill([r("{{M1}} and {{X}}")], { M1: "2.5" });
    expect(paragraph.text).toBe("2.5 and {{X}}");
    expect(report.unresolved).toEqual(["X"]);
  });

  it("is case-sensitive", () => {
    expect(fill([r("{{batch_1}}")], { BATCH_1: "L-204" }).paragraph.text).toBe("{{batch_1}}");
  });

  it("does nothing for a paragraph without tokens", () => {
    const { texts, report } = fill([r("Plain"), r(" text")], { M1: "2.5" });
    expect(texts).toEqual(["Plain", " text"]);
    expect(report).toEqual({ replaced: [], unresolved: [], styleFailures: [] });
  });

  it("does nothing for a paragraph without runs", () => {
    const paragraph = paragraphFromXml("");
    expect(replacePlaceholdersInContainer(paragraph, new Map([["M1", "2.5"]]))).toEqual({
      replaced: [],
      unresolved: [],
      styleFailures: [],
    });
  });

  it("gives the merged run the style of the run where the token starts", () => {
    const { paragraph } = fill(
      [
        r("{{BAT", '<w:rFonts w:ascii="Arial" w:hAnsi="Arial"/><w:b/><w:color w:val="C00000"/><w:sz w:val="22"/>'),
        r("CH_1}}", "<w:i/>"),
      ],
      { BATCH_1: "L-204" },
    );
    const [merged, cleared] = paragraph.runs;
    expect(merged.text).toBe("L-204");
    expect(merged.readAttribute("name")).toEqual({ ok: true, value: "Arial" });
    expect(merged.readAttribute("bold")).toEqual({ ok: true, value: true });
    expect(merged.readAttribute("italic")).toEqual({ ok: true, value: null });
    expect(merged.readAttribute("color")).toEqual({ ok: true, value: "C00000" });
    expect(merged.readAttribute("size")).toEqual({ ok: true, value: 11 });
    expect(cleared.text).toBe("");
    expect(cleared.readAttribute("italic")).toEqual({ ok: true, value: true });
  });

  it("reports a style attribute it cannot copy and still substitutes", () => {
    const { paragraph, report } = fill(
      [r("{{M1}}", '<w:b/><w:sz w:val="abc"/>'), r(" / "), r("{{PH1}}")],
      { M1: "2.5", PH1: "7.0" },
    );
    expect(paragraph.text).toBe("2.5 / 7.0");
    expect(report.styleFailures).toEqual([{ key: "M1", attribute: "size", reason: 'w:sz has invalid value "abc"' }]);
    expect(paragraph.runs[0].readAttribute("bold")).toEqual({ ok: true, value: true });
  });

  it("leaves no mapped token behind", () => {
    const values = { BATCH_1: "L-1", M1: "2.5", PH1: "7.0", DD: "x" };
    const { paragraph } = fill(
      [r("{{BATCH"), r("_1}}: {{M1}}"), r("{{"), r(" PH1 }} {{D"), r("D}}{{Q}}")],
      values,
    );
    const left = findPlaceholders(paragraph.text).map((m) => m.key);
    expect(left).toEqual(["Q"]);
    expect(paragraph.text).toBe("L-1: 2.57.0 x{{Q}}");
  });
});
