/**
 * Template Validation: compare a template's placeholders with the keys a
 * COA type fills.
 *
 * Checks:
 * 1. Placeholders no field fills (they would survive into the certificate)
 * 2. Fields the template never shows
 * 3. At least one date placeholder is present
 */

import { DATE_KEY, DATE_KEY_DASHED, knownKeys } from "../coa/fields.js";
import type { CoaType } from "../coa/form.js";
import type { TemplateValidationResult } from "./types.js";

export function validateTemplatePlaceholders(
  placeholders: readonly string[],
  coaType: CoaType,
): TemplateValidationResult {
  const present = new Set(placeholders);
  const known = knownKeys(coaType);
  const knownSet = new Set(known);
  const warnings: string[] = [];

  const hasDate = present.has(DATE_KEY) || present.has(DATE_KEY_DASHED);
  if (!hasDate) {
    warnings.push(`Template has no date placeholder ({{${DATE_KEY}}} or {{${DATE_KEY_DASHED}}})`);
  }

  // The two date spellings are alternatives; either one satisfies the other.
  const missingKeys = known.filter((key) => {
    if (present.has(key)) return false;
    if ((key === DATE_KEY || key === DATE_KEY_DASHED) && hasDate) return false;
    return true;
  });

  const extraPlaceholders = placeholders.filter((key) => !knownSet.has(key));
  for (const key of extraPlaceholders) {
    warnings.push(`Placeholder {{${key}}} is not filled for ${coaType} and will stay in the output`);
  }

  return {
    valid: extraPlaceholders.length === 0,
    missingKeys,
    extraPlaceholders: [...extraPlaceholders],
    warnings,
  };
}
