/**
 * HTML preview of a generated certificate, via mammoth.
 *
 * The preview is a convenience: callers treat a failure here as a warning
 * and still hand out the DOCX.
 */

import mammoth from "mammoth";

export interface PreviewResult {
  html: string;
  /** Conversion notes from mammoth (unsupported styles, images, ...). */
  messages: string[];
}

export async function renderPreviewHtml(docxBuffer: Buffer): Promise<PreviewResult> {
  const result = await mammoth.convertToHtml({ buffer: docxBuffer });
  return {
    html: `<div style="padding:12px">${result.value}</div>`,
    messages: result.messages.map((m) => `${m.type}: ${m.message}`),
  };
}
