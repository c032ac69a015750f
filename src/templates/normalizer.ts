/**
 * Delimiter repair: `((KEY}}` typed or pasted in place of `{{KEY}}`.
 *
 * Works inside single runs only: it never reads across runs and never
 * touches run properties.
 */

import type { DocxDocument } from "../document/docx_document.js";

export function hasBrokenDelimiters(text: string): boolean {
  return text.includes("((") || text.includes("))");
}

export function repairDelimiters(text: string): string {
  return text.replaceAll("((", "{{").replaceAll("))", "}}");
}

/**
 * Rewrite `((` → `{{` and `))` → `}}` in every run of every body, table,
 * header and footer paragraph. Runs without those pairs are not written.
 * Returns the number of runs repaired.
 */
export function normalizeBrokenPlaceholders(doc: DocxDocument): number {
  let repaired = 0;
  for (const { paragraph } of doc.textContainers()) {
    for (const run of paragraph.runs) {
      const text = run.text;
      if (!hasBrokenDelimiters(text)) continue;
      run.text = repairDelimiters(text);
      repaired++;
    }
  }
  return repaired;
}
