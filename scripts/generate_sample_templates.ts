/**
 * Generate the sample MOD and FAR COA templates.
 *
 * Writes MOD_COA.docx and FAR_COA.docx into the templates directory
 * (COA_TEMPLATES_DIR, default templates/). Existing files are kept unless
 * --force is passed.
 */

import "dotenv/config";
import { existsSync, mkdirSync, writeFileSync } from "fs";
import path from "path";
import { COA_TYPES } from "../src/coa/form.js";
import { loadConfig } from "../src/shared/config.js";
import { errorMessage } from "../src/shared/errors.js";
import { BUILTIN_MANIFESTS } from "../src/templates/registry.js";
import { buildSampleTemplate } from "../src/templates/sample_template.js";

async function main() {
  const force = process.argv.includes("--force");
  const templatesDir = loadConfig().templatesDir;
  mkdirSync(templatesDir, { recursive: true });

  for (const coaType of COA_TYPES) {
    const docxPath = path.join(templatesDir, BUILTIN_MANIFESTS[coaType].fileName);
    if (existsSync(docxPath) && !force) {
      console.log(`  - Skipped existing ${docxPath} (use --force to overwrite)`);
      continue;
    }
    writeFileSync(docxPath, await buildSampleTemplate(coaType));
    console.log(`  ✓ Written ${coaType} template: ${docxPath}`);
  }
}

main().catch((err) => {
  console.error(`  ✗ ${errorMessage(err)}`);
  process.exit(1);
});
