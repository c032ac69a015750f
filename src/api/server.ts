import "dotenv/config";
import express, { type NextFunction, type Request, type Response } from "express";
import path from "path";
import { fileURLToPath } from "url";

import { CoaGenerator } from "../coa/service.js";
import { loadConfig, type AppConfig } from "../shared/config.js";
import { TemplateRegistry } from "../templates/registry.js";
import { createCoaRouter, sendError } from "./routes.js";

export function createApp(config: AppConfig): express.Express {
  const registry = new TemplateRegistry(config.templatesDir);
  const generator = new CoaGenerator(registry, {
    timeZone: config.timeZone,
    previewEnabled: config.previewEnabled,
  });

  const app = express();
  app.use(express.json({ limit: "1mb" }));

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.use(createCoaRouter({ generator, registry }));

  // Body-parser and upload errors (malformed JSON, oversized files).
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    sendError(res, err);
  });
  return app;
}

// ── Entry point ──────────────────────────────────────────────────────
if (
  process.argv[1] &&
  path.resolve(process.argv[1]) === path.resolve(fileURLToPath(import.meta.url))
) {
  const config = loadConfig();
  createApp(config).listen(config.port, () => {
    console.log(`  COA API listening on :${config.port}`);
    console.log(`  Templates: ${config.templatesDir}`);
  });
}
