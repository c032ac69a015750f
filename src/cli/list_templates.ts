#!/usr/bin/env tsx
/**
 * CLI: coa:templates
 *
 * Usage: npm run coa:templates
 *
 * Lists the template for each COA type and checks its placeholders against
 * the keys the COA form fills.
 */

import "dotenv/config";
import { loadConfig } from "../shared/config.js";
import { errorMessage } from "../shared/errors.js";
import { TemplateRegistry } from "../templates/registry.js";
import { scanDocxPlaceholders } from "../templates/scan.js";
import { validateTemplatePlaceholders } from "../templates/validate.js";

function main() {
  const registry = new TemplateRegistry(loadConfig().templatesDir);
  let failed = false;

  for (const t of registry.list()) {
    console.log(`  ${t.manifest.coaType}`);
    console.log(`    Name:  ${t.manifest.name}`);
    console.log(`    DOCX:  ${t.docxPath}`);

    if (!t.available) {
      console.log("    ✗ Template file not found");
      console.log();
      failed = true;
      continue;
    }

    try {
      const placeholders = scanDocxPlaceholders(registry.read(t.manifest.coaType));
      const result = validateTemplatePlaceholders(placeholders, t.manifest.coaType);
      console.log(`    Placeholders: ${placeholders.length}`);
      console.log(result.valid ? "    ✓ All placeholders are filled" : "    ✗ Unfilled placeholders present");
      if (result.missingKeys.length > 0) {
        console.log(`    Fields not shown: ${result.missingKeys.join(", ")}`);
      }
      for (const w of result.warnings) console.log(`    - ${w}`);
      if (!result.valid) failed = true;
    } catch (err) {
      console.log(`    ✗ ${errorMessage(err)}`);
      failed = true;
    }
    console.log();
  }

  if (failed) process.exit(1);
}

main();
