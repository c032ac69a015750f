/**
 * Template Registry: resolves a COA type to its DOCX template and reads
 * the template bytes.
 *
 * Layout: <templatesDir>/MOD_COA.docx, <templatesDir>/FAR_COA.docx.
 * Bytes are read on every call; a template replaced on disk is picked up
 * by the next generation without a restart.
 */

import { existsSync, readFileSync } from "fs";
import path from "path";
import { COA_TYPES, type CoaType } from "../coa/form.js";
import { TemplateNotFoundError } from "../shared/errors.js";
import type { TemplateSource } from "../coa/service.js";
import type { ResolvedTemplate, TemplateManifest } from "./types.js";

export const BUILTIN_MANIFESTS: Record<CoaType, TemplateManifest> = {
  MOD: { coaType: "MOD", name: "MOD Certificate of Analysis", fileName: "MOD_COA.docx" },
  FAR: { coaType: "FAR", name: "FAR Certificate of Analysis", fileName: "FAR_COA.docx" },
};

export class TemplateRegistry implements TemplateSource {
  constructor(private readonly templatesDir: string) {}

  resolve(coaType: CoaType): ResolvedTemplate {
    const manifest = BUILTIN_MANIFESTS[coaType];
    const docxPath = path.join(this.templatesDir, manifest.fileName);
    return { manifest, docxPath, available: existsSync(docxPath) };
  }

  /** Read the template bytes. Throws TemplateNotFoundError when the file is absent. */
  read(coaType: CoaType): Buffer {
    const resolved = this.resolve(coaType);
    if (!resolved.available) {
      throw new TemplateNotFoundError(coaType, resolved.docxPath);
    }
    return readFileSync(resolved.docxPath);
  }

  list(): ResolvedTemplate[] {
    return COA_TYPES.map((t) => this.resolve(t));
  }
}
