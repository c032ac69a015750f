/**
 * Template System Types
 *
 * One DOCX template per COA type, stored in the configured templates
 * directory.
 */

import type { CoaType } from "../coa/form.js";

export interface TemplateManifest {
  coaType: CoaType;
  name: string;
  /** File name inside the templates directory. */
  fileName: string;
}

export interface ResolvedTemplate {
  manifest: TemplateManifest;
  /** Absolute path to the template DOCX. */
  docxPath: string;
  available: boolean;
}

export interface TemplateValidationResult {
  valid: boolean;
  /** Keys the COA type fills that the template never mentions. */
  missingKeys: string[];
  /** Template placeholders no COA field fills; they stay verbatim in output. */
  extraPlaceholders: string[];
  warnings: string[];
}
