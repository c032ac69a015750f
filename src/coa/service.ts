/**
 * COA Generation Service: form input in, certificate out.
 *
 *   form ──► replacement mapping ──► template fill ──► DOCX bytes
 *                                                   └─► HTML preview
 *
 * Shared by the HTTP API and the CLI. Every call loads its own copy of the
 * template; nothing is cached between requests.
 */

import { renderPreviewHtml } from "../exports/preview.js";
import { errorMessage } from "../shared/errors.js";
import type { FillReport } from "../templates/fill.js";
import { renderTemplate, type RenderResult } from "../templates/renderer.js";
import { formatCoaDate } from "./date.js";
import { buildReplacements, outputFileName } from "./fields.js";
import { CoaFormSchema, ReplacementValuesSchema, type CoaForm, type CoaType } from "./form.js";

/** Where template bytes come from: the registry, or a file named on the CLI. */
export interface TemplateSource {
  read(coaType: CoaType): Buffer;
}

export interface CoaGeneratorOptions {
  timeZone: string;
  previewEnabled: boolean;
  /** Clock for the default date. */
  now?: () => Date;
}

export interface GeneratedCoa {
  form: CoaForm;
  fileName: string;
  date: string;
  replacements: Record<string, string>;
  docxBuffer: Buffer;
  templateHash: string;
  report: FillReport;
  warnings: string[];
}

export interface CoaPreview extends GeneratedCoa {
  /** null when preview is disabled or failed (see warnings). */
  html: string | null;
}

export class CoaGenerator {
  constructor(
    private readonly templates: TemplateSource,
    private readonly options: CoaGeneratorOptions,
  ) {}

  /** Today's date as the form's default, DD/MM/YYYY in the configured zone. */
  defaultDate(): string {
    const now = this.options.now ? this.options.now() : new Date();
    return formatCoaDate(now, this.options.timeZone);
  }

  /**
   * Validate the form shape, fill the COA type's template, and return the
   * DOCX. Throws ZodError, TemplateNotFoundError or TemplateCorruptError.
   */
  generate(input: unknown): GeneratedCoa {
    const form = CoaFormSchema.parse(input);
    const date = form.date?.trim() || this.defaultDate();
    const replacements = buildReplacements(form, date);
    const rendered = renderTemplate(this.templates.read(form.coaType), replacements);

    return {
      form,
      fileName: outputFileName(form),
      date,
      replacements,
      docxBuffer: rendered.docxBuffer,
      templateHash: rendered.templateHash,
      report: rendered.report,
      warnings: describeReport(rendered.report),
    };
  }

  /** generate() plus an HTML rendering of the result. */
  async preview(input: unknown): Promise<CoaPreview> {
    const generated = this.generate(input);
    if (!this.options.previewEnabled) return { ...generated, html: null };

    try {
      const preview = await renderPreviewHtml(generated.docxBuffer);
      return { ...generated, html: preview.html };
    } catch (err) {
      return {
        ...generated,
        html: null,
        warnings: [...generated.warnings, `Preview failed: ${errorMessage(err)}. The DOCX is still available.`],
      };
    }
  }

  /** Fill an uploaded template with a caller-supplied flat mapping. */
  renderUploaded(templateBytes: Buffer, values: unknown): RenderResult {
    return renderTemplate(templateBytes, ReplacementValuesSchema.parse(values));
  }
}

export function describeReport(report: FillReport): string[] {
  const warnings: string[] = [];
  if (report.unresolvedKeys.length > 0) {
    warnings.push(`Placeholders left unfilled: ${report.unresolvedKeys.join(", ")}`);
  }
  for (const failure of report.styleFailures) {
    warnings.push(`Style of {{${failure.key}}} not copied (${failure.attribute}): ${failure.reason}`);
  }
  return warnings;
}
