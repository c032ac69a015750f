import { describe, it, expect } from "vitest";
import { DocxDocument } from "../../src/document/docx_document.js";
import { fillPlaceholders } from "../../src/templates/fill.js";
import { firstChild, getW } from "../../src/document/ooxml.js";
import { buildDocx, containerTexts, p, r, sectPr, tbl } from "../helpers/wordml.js";

function templateDocx(): Buffer {
  return buildDocx({
    body:
      p(r("Batch: {{"), r("BATCH_1"), r("}}")) +
      p(r("((BATCH_1}}")) +
      tbl([[p(r("{{M1}} / {{PH1}}")), p(r("{{UNKNOWN}}"))]]) +
      sectPr([
        { kind: "header", type: "default", id: "rIdH1" },
        { kind: "footer", type: "default", id: "rIdF1" },
      ]),
    parts: [
      { id: "rIdH1", kind: "header", fileName: "header1.xml", content: p(r("Date: {{DD/MM/YYYY}}")) },
      { id: "rIdF1", kind: "footer", fileName: "footer1.xml", content: p(r("Issued "), r("{{DD-MM-YYYY}}")) },
    ],
  });
}

const VALUES = {
  BATCH_1: "L-204",
  M1: 2.5,
  PH1: "7.0",
  "DD/MM/YYYY": "02/03/2026",
  "DD-MM-YYYY": "02-03-2026",
};

describe("fillPlaceholders", () => {
  it("repairs delimiters, then fills body, table, header and footer paragraphs", () => {
    const doc = DocxDocument.load(templateDocx());
    fillPlaceholders(doc, VALUES);

    expect(containerTexts(doc.toBuffer())).toEqual([
      "body: Batch: L-204",
      "body: L-204",
      "table: 2.5 / 7.0",
      "table: {{UNKNOWN}}",
      "header: Date: 02/03/2026",
      "footer: Issued 02-03-2026",
    ]);
  });

  it("summarizes what it did", () => {
    const report = fillPlaceholders(DocxDocument.load(templateDocx()), VALUES);
    expect(report).toEqual({
      normalizedRuns: 1,
      containers: { body: 2, table: 2, header: 1, footer: 1 },
      replacements: 6,
      replacedKeys: ["BATCH_1", "DD-MM-YYYY", "DD/MM/YYYY", "M1", "PH1"],
      unresolvedKeys: ["UNKNOWN"],
      styleFailures: [],
    });
  });

  it("handles a document with no headers or footers", () => {
    const doc = DocxDocument.load(buildDocx({ body: p(r("{{M1}}")) }));
    const report = fillPlaceholders(doc, { M1: "2.5" });
    expect(report.containers).toEqual({ body: 1, table: 0, header: 0, footer: 0 });
    expect(doc.paragraphs[0].text).toBe("2.5");
  });

  it("substitutes the corrupted-delimiter form", () => {
    const doc = DocxDocument.load(buildDocx({ body: p(r("((BATCH_1}}")) }));
    fillPlaceholders(doc, new Map([["BATCH_1", "X1"]]));
    expect(doc.paragraphs[0].text).toBe("X1");
  });

  it("keeps a page break in a run whose placeholder is filled", () => {
    const body = p('<w:r><w:br w:type="page"/><w:t>{{M1}}</w:t></w:r>');
    const doc = DocxDocument.load(buildDocx({ body }));
    fillPlaceholders(doc, { M1: "2.5" });

    const reloaded = DocxDocument.load(doc.toBuffer());
    const run = reloaded.paragraphs[0].runs[0];
    const br = firstChild(run.element, "br");
    expect(br === null ? null : getW(br, "type")).toBe("page");
    expect(run.text).toBe("\f2.5");
  });

  it("keeps a page break in a run whose delimiters are repaired", () => {
    const body = p('<w:r><w:t>((X))</w:t><w:br w:type="page"/></w:r>');
    const doc = DocxDocument.load(buildDocx({ body }));
    fillPlaceholders(doc, {});

    const run = DocxDocument.load(doc.toBuffer()).paragraphs[0].runs[0];
    const br = firstChild(run.element, "br");
    expect(br === null ? null : getW(br, "type")).toBe("page");
    expect(run.text).toBe("{{X}}\f");
  });
});
