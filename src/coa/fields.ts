/**
 * COA field catalogue: which placeholder keys a certificate of each type
 * fills, and how form input becomes the flat replacement mapping.
 *
 * Keys per batch i (1–4):
 *   BATCH_i  label           Mi    moisture
 *   BiV1     viscosity #1    BiV2  viscosity #2
 *   PHi      pH
 *   FAR adds MESHi, BDi, Fi, FVi.
 * Plus the date under both `DD/MM/YYYY` and `DD-MM-YYYY`.
 */

import { MAX_BATCHES, type BatchField, type BatchValues, type CoaForm, type CoaType } from "./form.js";

export const DATE_KEY = "DD/MM/YYYY";
export const DATE_KEY_DASHED = "DD-MM-YYYY";

export interface BatchFieldDefinition {
  field: BatchField;
  key: (batch: number) => string;
  label: Record<CoaType, string>;
  coaTypes: readonly CoaType[];
}

const BOTH: readonly CoaType[] = ["MOD", "FAR"];
const FAR_ONLY: readonly CoaType[] = ["FAR"];

function sameLabel(label: string): Record<CoaType, string> {
  return { MOD: label, FAR: label };
}

const BATCH_FIELDS: readonly BatchFieldDefinition[] = [
  { field: "label", key: (i) => `BATCH_${i}`, label: sameLabel("Label"), coaTypes: BOTH },
  { field: "moisture", key: (i) => `M${i}`, label: sameLabel("Moisture"), coaTypes: BOTH },
  {
    field: "viscosity1",
    key: (i) => `B${i}V1`,
    label: { MOD: "30min viscosity", FAR: "2h viscosity" },
    coaTypes: BOTH,
  },
  {
    field: "viscosity2",
    key: (i) => `B${i}V2`,
    label: { MOD: "60min viscosity", FAR: "24h viscosity" },
    coaTypes: BOTH,
  },
  { field: "ph", key: (i) => `PH${i}`, label: sameLabel("pH"), coaTypes: BOTH },
  { field: "mesh", key: (i) => `MESH${i}`, label: sameLabel("200 mesh %"), coaTypes: FAR_ONLY },
  { field: "bulkDensity", key: (i) => `BD${i}`, label: sameLabel("Bulk Density"), coaTypes: FAR_ONLY },
  { field: "fann3", key: (i) => `F${i}`, label: sameLabel("Fann 3'"), coaTypes: FAR_ONLY },
  { field: "fann30", key: (i) => `FV${i}`, label: sameLabel("Fann 30'"), coaTypes: FAR_ONLY },
];

export interface FieldDescriptor {
  key: string;
  label: string;
  /** 1-based batch number; null for document-level fields. */
  batch: number | null;
  field: BatchField | "date";
}

/** Per-batch fields of a COA type, in form order. */
export function batchFieldsFor(coaType: CoaType): BatchFieldDefinition[] {
  return BATCH_FIELDS.filter((f) => f.coaTypes.includes(coaType));
}

/** Every placeholder a COA of this type fills, in form order. */
export function describeFields(coaType: CoaType): FieldDescriptor[] {
  const out: FieldDescriptor[] = [
    { key: DATE_KEY, label: "Date (DD/MM/YYYY)", batch: null, field: "date" },
    { key: DATE_KEY_DASHED, label: "Date (DD-MM-YYYY)", batch: null, field: "date" },
  ];
  for (let batch = 1; batch <= MAX_BATCHES; batch++) {
    for (const def of batchFieldsFor(coaType)) {
      out.push({
        key: def.key(batch),
        label: `${def.key(batch)} (${def.label[coaType]})`,
        batch,
        field: def.field,
      });
    }
  }
  return out;
}

export function knownKeys(coaType: CoaType): string[] {
  return describeFields(coaType).map((f) => f.key);
}

/**
 * Build the replacement mapping for one certificate. Batches beyond those
 * supplied, and fields left out, map to "".
 */
export function buildReplacements(form: CoaForm, date: string): Record<string, string> {
  const replacements: Record<string, string> = {
    [DATE_KEY]: date,
    [DATE_KEY_DASHED]: date.replaceAll("/", "-"),
  };

  for (let batch = 1; batch <= MAX_BATCHES; batch++) {
    const values: Partial<BatchValues> = form.batches[batch - 1] ?? {};
    for (const def of batchFieldsFor(form.coaType)) {
      replacements[def.key(batch)] = values[def.field] ?? "";
    }
  }
  return replacements;
}

const ILLEGAL_FILENAME_CHARS = /[\\/:*?"<>|]/g;

/** `COA_<type>_<batch 1 label>.docx`, falling back to "batch1". */
export function outputFileName(form: CoaForm): string {
  const label = form.batches[0]?.label.trim() || "batch1";
  return `COA_${form.coaType}_${label.replace(ILLEGAL_FILENAME_CHARS, "-")}.docx`;
}
