/**
 * Template Renderer: fills a DOCX template's `{{KEY}}` placeholders and
 * returns the output bytes.
 *
 * The template is opened fresh for every call and discarded afterwards;
 * styling, tables, section breaks and headers/footers come from the
 * template itself. Only run text (and, for merged runs, their font
 * attributes) is rewritten.
 */

import { DocxDocument } from "../document/docx_document.js";
import { sha256Bytes } from "../shared/hash.js";
import { fillPlaceholders, type FillReport } from "./fill.js";
import type { ReplacementInput } from "./placeholders.js";

export interface RenderResult {
  docxBuffer: Buffer;
  /** SHA-256 of the template bytes, for reproducibility. */
  templateHash: string;
  report: FillReport;
}

/**
 * Render a template with a flat replacement mapping.
 * Throws TemplateCorruptError when the template cannot be opened.
 */
export function renderTemplate(templateBytes: Buffer, replacements: ReplacementInput): RenderResult {
  const doc = DocxDocument.load(templateBytes);
  const report = fillPlaceholders(doc, replacements);
  return {
    docxBuffer: doc.toBuffer(),
    templateHash: sha256Bytes(templateBytes),
    report,
  };
}
