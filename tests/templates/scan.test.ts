import { describe, it, expect } from "vitest";
import { DocxDocument } from "../../src/document/docx_document.js";
import { knownKeys } from "../../src/coa/fields.js";
import { scanDocxPlaceholders } from "../../src/templates/scan.js";
import { validateTemplatePlaceholders } from "../../src/templates/validate.js";
import { buildDocx, p, r, sectPr, tbl } from "../helpers/wordml.js";

function templateDocx(): Buffer {
  return buildDocx({
    body:
      p(r("{{BAT"), r("CH_1}}")) +
      p(r("((M1))")) +
      tbl([[p(r("{{ M1 }}"))]]) +
      sectPr([{ kind: "header", type: "default", id: "rIdH1" }]),
    parts: [{ id: "rIdH1", kind: "header", fileName: "header1.xml", content: p(r("{{DD/MM/YYYY}}")) }],
  });
}

describe("scanDocxPlaceholders", () => {
  it("returns sorted unique keys from every region, including split and corrupted tokens", () => {
    expect(scanDocxPlaceholders(templateDocx())).toEqual(["BATCH_1", "DD/MM/YYYY", "M1"]);
  });

  it("does not modify an open document", () => {
    const doc = DocxDocument.load(templateDocx());
    scanDocxPlaceholders(doc);
    expect(doc.paragraphs[1].text).toBe("((M1))");
  });
});

describe("validateTemplatePlaceholders", () => {
  it("accepts a template that shows every field", () => {
    expect(validateTemplatePlaceholders(knownKeys("FAR"), "FAR")).toEqual({
      valid: true,
      missingKeys: [],
      extraPlaceholders: [],
      warnings: [],
    });
  });

  it("accepts either date spelling for both date keys", () => {
    const result = validateTemplatePlaceholders(["DD-MM-YYYY"], "MOD");
    expect(result.missingKeys).not.toContain("DD/MM/YYYY");
    expect(result.missingKeys).toHaveLength(20);
    expect(result.warnings).toEqual([]);
  });

  it("flags placeholders no field fills", () => {
    const result = validateTemplatePlaceholders(["DD/MM/YYYY", "BATCH_1", "M1", "FOO"], "MOD");
    expect(result.valid).toBe(false);
    expect(result.extraPlaceholders).toEqual(["FOO"]);
    expect(result.warnings).toEqual(["Placeholder {{FOO}} is not filled for MOD and will stay in the output"]);
    expect(result.missingKeys.slice(0, 3)).toEqual(["B1V1", "B1V2", "PH1"]);
    expect(result.missingKeys).toHaveLength(18);
  });

  it("treats FAR-only keys as extras on a MOD template", () => {
    expect(validateTemplatePlaceholders(["DD/MM/YYYY", "MESH1"], "MOD").extraPlaceholders).toEqual(["MESH1"]);
  });

  it("warns when the template has no date", () => {
    const result = validateTemplatePlaceholders([], "MOD");
    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual(["Template has no date placeholder ({{DD/MM/YYYY}} or {{DD-MM-YYYY}})"]);
  });
});
