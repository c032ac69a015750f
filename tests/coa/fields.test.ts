import { describe, it, expect } from "vitest";
import { buildReplacements, describeFields, knownKeys, outputFileName } from "../../src/coa/fields.js";
import { CoaFormSchema } from "../../src/coa/form.js";

describe("describeFields", () => {
  it("lists the date keys and five fields per MOD batch", () => {
    const fields = describeFields("MOD");
    expect(fields).toHaveLength(22);
    expect(fields.slice(0, 7).map((f) => f.key)).toEqual([
      "DD/MM/YYYY",
      "DD-MM-YYYY",
      "BATCH_1",
      "M1",
      "B1V1",
      "B1V2",
      "PH1",
    ]);
  });

  it("adds mesh, bulk density and Fann readings for FAR", () => {
    const fields = describeFields("FAR");
    expect(fields).toHaveLength(38);
    expect(fields.filter((f) => f.batch === 4).map((f) => f.key)).toEqual([
      "BATCH_4", "M4", "B4V1", "B4V2", "PH4", "MESH4", "BD4", "F4", "FV4",
    ]);
  });

  it("labels viscosity by the product's time stages", () => {
    expect(describeFields("MOD").find((f) => f.key === "B1V1")?.label).toBe("B1V1 (30min viscosity)");
    expect(describeFields("FAR").find((f) => f.key === "B2V2")).toEqual({
      key: "B2V2",
      label: "B2V2 (24h viscosity)",
      batch: 2,
      field: "viscosity2",
    });
  });
});

describe("buildReplacements", () => {
  const form = CoaFormSchema.parse({
    coaType: "MOD",
    batches: [{ label: "L-204", moisture: 2.5, ph: "7.0" }],
  });

  it("fills both date spellings", () => {
    const values = buildReplacements(form, "02/03/2026");
    expect(values["DD/MM/YYYY"]).toBe("02/03/2026");
    expect(values["DD-MM-YYYY"]).toBe("02-03-2026");
  });

  it("passes values through as entered and blanks the rest", () => {
    const values = buildReplacements(form, "02/03/2026");
    expect(values.BATCH_1).toBe("L-204");
    expect(values.M1).toBe("2.5");
    expect(values.PH1).toBe("7.0");
    expect(values.B1V1).toBe("");
    expect(values.BATCH_4).toBe("");
  });

  it("only maps the COA type's keys", () => {
    const values = buildReplacements(form, "02/03/2026");
    expect(Object.keys(values).sort()).toEqual(knownKeys("MOD").sort());
    expect(values.MESH1).toBeUndefined();
  });
});

describe("outputFileName", () => {
  it("names the file after the first batch label", () => {
    const form = CoaFormSchema.parse({ coaType: "MOD", batches: [{ label: "L-204" }] });
    expect(outputFileName(form)).toBe("COA_MOD_L-204.docx");
  });

  it("replaces characters that are illegal in file names", () => {
    const form = CoaFormSchema.parse({ coaType: "FAR", batches: [{ label: "A/B:1" }] });
    expect(outputFileName(form)).toBe("COA_FAR_A-B-1.docx");
  });

  it("falls back to batch1 without a label", () => {
    expect(outputFileName(CoaFormSchema.parse({ coaType: "FAR" }))).toBe("COA_FAR_batch1.docx");
    expect(outputFileName(CoaFormSchema.parse({ coaType: "MOD", batches: [{ label: "  " }] }))).toBe(
      "COA_MOD_batch1.docx",
    );
  });
});

describe("CoaFormSchema", () => {
  it("rejects more than four batches", () => {
    const batches = Array.from({ length: 5 }, (_, i) => ({ label: `L${i}` }));
    expect(CoaFormSchema.safeParse({ coaType: "MOD", batches }).success).toBe(false);
  });

  it("rejects an unknown COA type", () => {
    expect(CoaFormSchema.safeParse({ coaType: "XYZ" }).success).toBe(false);
  });

  it("turns numbers into text", () => {
    const form = CoaFormSchema.parse({ coaType: "FAR", batches: [{ bulkDensity: 0.75 }] });
    expect(form.batches[0].bulkDensity).toBe("0.75");
    expect(form.batches[0].label).toBe("");
  });
});
