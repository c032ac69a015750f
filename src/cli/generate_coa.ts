#!/usr/bin/env tsx
/**
 * CLI: coa:generate
 *
 * Usage: npm run coa:generate -- --type <MOD|FAR> --values <form.json>
 *          [--date DD/MM/YYYY] [--template <file.docx>] [--out <dir>] [--preview]
 *
 * form.json holds the COA form: { "batches": [{ "label": "...", "moisture": "...", ... }] }.
 * Writes COA_<type>_<label>.docx (and .html with --preview) into --out (default: out/).
 */

import "dotenv/config";
import { mkdirSync, readFileSync, writeFileSync } from "fs";
import path from "path";
import { CoaGenerator, type TemplateSource } from "../coa/service.js";
import { ROOT, loadConfig } from "../shared/config.js";
import { errorMessage } from "../shared/errors.js";
import { TemplateRegistry } from "../templates/registry.js";

interface CliArgs {
  type: string;
  values: string;
  date: string;
  template: string;
  out: string;
  preview: boolean;
}

function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { type: "", values: "", date: "", template: "", out: "", preview: false };
  for (let i = 0; i < argv.length; i++) {
    const next = argv[i + 1];
    switch (argv[i]) {
      case "--type":
        if (next !== undefined) { args.type = next; i++; }
        break;
      case "--values":
        if (next !== undefined) { args.values = next; i++; }
        break;
      case "--date":
        if (next !== undefined) { args.date = next; i++; }
        break;
      case "--template":
        if (next !== undefined) { args.template = next; i++; }
        break;
      case "--out":
        if (next !== undefined) { args.out = next; i++; }
        break;
      case "--preview":
        args.preview = true;
        break;
    }
  }
  return args;
}

function readForm(args: CliArgs): Record<string, unknown> {
  const raw: unknown = args.values ? JSON.parse(readFileSync(args.values, "utf-8")) : {};
  const form: Record<string, unknown> =
    raw !== null && typeof raw === "object" && !Array.isArray(raw) ? { ...raw } : {};
  if (args.type) form.coaType = args.type.toUpperCase();
  if (args.date) form.date = args.date;
  return form;
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  if (!args.type && !args.values) {
    console.error(
      "Usage: npm run coa:generate -- --type <MOD|FAR> --values <form.json> [--date DD/MM/YYYY] [--template <file.docx>] [--out <dir>] [--preview]",
    );
    process.exit(1);
  }

  const config = loadConfig();
  const templates: TemplateSource = args.template
    ? { read: () => readFileSync(args.template) }
    : new TemplateRegistry(config.templatesDir);
  const generator = new CoaGenerator(templates, {
    timeZone: config.timeZone,
    previewEnabled: args.preview,
  });

  const coa = await generator.preview(readForm(args));

  const outDir = path.resolve(args.out || path.join(ROOT, "out"));
  mkdirSync(outDir, { recursive: true });
  const docxPath = path.join(outDir, coa.fileName);
  writeFileSync(docxPath, coa.docxBuffer);

  console.log(`  COA type:     ${coa.form.coaType}`);
  console.log(`  Date:         ${coa.date}`);
  console.log(`  Replacements: ${coa.report.replacements}`);
  if (coa.report.normalizedRuns > 0) {
    console.log(`  Repaired ((/)) delimiters in ${coa.report.normalizedRuns} run(s)`);
  }
  console.log(`  ✓ ${docxPath}`);

  if (coa.html !== null) {
    const htmlPath = docxPath.replace(/\.docx$/, ".html");
    writeFileSync(htmlPath, coa.html);
    console.log(`  ✓ ${htmlPath}`);
  }

  for (const w of coa.warnings) {
    console.log(`  ! ${w}`);
  }
}

main().catch((err) => {
  console.error(`  ✗ ${errorMessage(err)}`);
  process.exit(1);
});
