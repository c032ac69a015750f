/**
 * COA API Routes
 *
 * Express Router over the generation service:
 *   GET  /v1/templates
 *   GET  /v1/coa/:coaType/fields
 *   GET  /v1/coa/:coaType/placeholders
 *   POST /v1/coa/generate          → DOCX attachment
 *   POST /v1/coa/preview           → JSON with HTML preview
 *   POST /v1/templates/render      → DOCX attachment of an uploaded template
 */

import { Router, type Response } from "express";
import multer from "multer";
import { ZodError } from "zod";

import { describeFields } from "../coa/fields.js";
import { isCoaType } from "../coa/form.js";
import type { CoaGenerator } from "../coa/service.js";
import { TemplateCorruptError, TemplateNotFoundError, errorMessage } from "../shared/errors.js";
import type { TemplateRegistry } from "../templates/registry.js";
import { scanDocxPlaceholders } from "../templates/scan.js";
import { validateTemplatePlaceholders } from "../templates/validate.js";

const DOCX_MIME = "application/vnd.openxmlformats-officedocument.wordprocessingml.document";
const MAX_UPLOAD_BYTES = 20 * 1024 * 1024;

export interface CoaRouterDeps {
  generator: CoaGenerator;
  registry: TemplateRegistry;
}

export function createCoaRouter({ generator, registry }: CoaRouterDeps): Router {
  const router = Router();
  const upload = multer({ storage: multer.memoryStorage(), limits: { fileSize: MAX_UPLOAD_BYTES } });

  // ── GET /v1/templates ─────────────────────────────────────────────
  router.get("/v1/templates", (_req, res) => {
    res.json(
      registry.list().map((t) => ({
        coaType: t.manifest.coaType,
        name: t.manifest.name,
        fileName: t.manifest.fileName,
        available: t.available,
      })),
    );
  });

  // ── GET /v1/coa/:coaType/fields ───────────────────────────────────
  router.get("/v1/coa/:coaType/fields", (req, res) => {
    const { coaType } = req.params;
    if (!isCoaType(coaType)) return res.status(404).json({ error: `Unknown COA type: ${coaType}` });
    res.json({ coaType, defaultDate: generator.defaultDate(), fields: describeFields(coaType) });
  });

  // ── GET /v1/coa/:coaType/placeholders ─────────────────────────────
  router.get("/v1/coa/:coaType/placeholders", (req, res) => {
    const { coaType } = req.params;
    if (!isCoaType(coaType)) return res.status(404).json({ error: `Unknown COA type: ${coaType}` });
    try {
      const placeholders = scanDocxPlaceholders(registry.read(coaType));
      res.json({ coaType, placeholders, validation: validateTemplatePlaceholders(placeholders, coaType) });
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── POST /v1/coa/generate ─────────────────────────────────────────
  router.post("/v1/coa/generate", (req, res) => {
    try {
      const coa = generator.generate(req.body);
      sendDocx(res, coa.docxBuffer, coa.fileName, coa.templateHash);
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── POST /v1/coa/preview ──────────────────────────────────────────
  router.post("/v1/coa/preview", async (req, res) => {
    try {
      const coa = await generator.preview(req.body);
      res.json({
        fileName: coa.fileName,
        date: coa.date,
        html: coa.html,
        warnings: coa.warnings,
        templateHash: coa.templateHash,
        report: coa.report,
      });
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── POST /v1/templates/render ─────────────────────────────────────
  router.post("/v1/templates/render", upload.single("template"), (req, res) => {
    try {
      const file = req.file;
      if (!file) return res.status(400).json({ error: "No template uploaded (field: template)" });

      const rawValues: unknown = req.body?.values;
      const values: unknown = typeof rawValues === "string" ? JSON.parse(rawValues) : rawValues ?? {};
      const rendered = generator.renderUploaded(file.buffer, values);
      sendDocx(res, rendered.docxBuffer, `filled_${file.originalname}`, rendered.templateHash);
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}

function sendDocx(res: Response, buffer: Buffer, fileName: string, templateHash: string): void {
  // attachment() adds an RFC 5987 filename* for names outside Latin-1.
  res
    .status(200)
    .attachment(fileName)
    .set({
      "Content-Type": DOCX_MIME,
      "X-Template-SHA256": templateHash,
    })
    .send(buffer);
}

export function sendError(res: Response, err: unknown): void {
  if (err instanceof ZodError) {
    res.status(400).json({ error: "Invalid input", issues: err.issues });
  } else if (err instanceof multer.MulterError) {
    res.status(err.code === "LIMIT_FILE_SIZE" ? 413 : 400).json({ error: err.message });
  } else if (err instanceof SyntaxError) {
    res.status(400).json({ error: `Malformed JSON: ${err.message}` });
  } else if (err instanceof TemplateNotFoundError) {
    res.status(404).json({ error: err.message });
  } else if (err instanceof TemplateCorruptError) {
    res.status(422).json({ error: `Failed to open template as docx: ${err.message}` });
  } else {
    console.error("  ✗ Request failed:", err);
    res.status(500).json({ error: errorMessage(err) });
  }
}
