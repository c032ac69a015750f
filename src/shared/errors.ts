/**
 * Domain errors surfaced to callers (API routes map them to status codes,
 * CLIs print them and exit non-zero).
 */

/** The supplied bytes cannot be opened as a Word document. */
export class TemplateCorruptError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "TemplateCorruptError";
  }
}

/** No template file is available for the requested COA type. */
export class TemplateNotFoundError extends Error {
  readonly templatePath: string;

  constructor(coaType: string, templatePath: string) {
    super(`Template for COA type "${coaType}" not found at ${templatePath}`);
    this.name = "TemplateNotFoundError";
    this.templatePath = templatePath;
  }
}

/** A stored run property holds a value Word's schema does not allow. */
export class StyleAttributeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StyleAttributeError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
