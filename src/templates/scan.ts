/**
 * Placeholder Scanner: lists the `{{KEY}}` tokens a template carries.
 *
 * Word frequently splits user text across several runs (`{{BAT` in one,
 * `CH_1}}` in the next), so tokens are matched against each paragraph's
 * joined run text. Run text is read through the same `((` / `))` repair the
 * renderer applies, without writing anything back.
 */

import { DocxDocument } from "../document/docx_document.js";
import { repairDelimiters } from "./normalizer.js";
import { findPlaceholders } from "./placeholders.js";

/** Sorted, unique placeholder keys found anywhere in the template. */
export function scanDocxPlaceholders(source: Buffer | DocxDocument): string[] {
  const doc = source instanceof DocxDocument ? source : DocxDocument.load(source);
  const found = new Set<string>();

  for (const { paragraph } of doc.textContainers()) {
    const text = paragraph.runs.map((run) => repairDelimiters(run.text)).join("");
    for (const match of findPlaceholders(text)) found.add(match.key);
  }

  return [...found].sort();
}
