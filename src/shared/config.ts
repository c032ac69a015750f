/**
 * Application Configuration
 *
 * Read from the environment (a `.env` file is loaded by the entry points
 * through `dotenv/config`):
 * - PORT:               HTTP port for the API server (default 3000).
 * - COA_TEMPLATES_DIR:  Directory holding MOD_COA.docx / FAR_COA.docx
 *                       (default: <repo>/templates).
 * - COA_TIMEZONE:       IANA zone for the default certificate date
 *                       (default Asia/Kolkata).
 * - COA_PREVIEW:        "off" disables HTML preview rendering.
 */

import path from "path";
import { fileURLToPath } from "url";
import { z } from "zod";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
export const ROOT = path.resolve(__dirname, "..", "..");

export interface AppConfig {
  port: number;
  templatesDir: string;
  timeZone: string;
  previewEnabled: boolean;
}

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  COA_TEMPLATES_DIR: z.string().min(1).optional(),
  COA_TIMEZONE: z.string().min(1).default("Asia/Kolkata").refine(isTimeZone, "Unknown IANA time zone"),
  COA_PREVIEW: z.string().optional(),
});

/**
 * Parse configuration from environment variables.
 * Throws a ZodError naming the offending variable when a value is malformed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.parse(env);
  const preview = (parsed.COA_PREVIEW ?? "on").toLowerCase();
  return {
    port: parsed.PORT,
    templatesDir: path.resolve(ROOT, parsed.COA_TEMPLATES_DIR ?? "templates"),
    timeZone: parsed.COA_TIMEZONE,
    previewEnabled: preview !== "off" && preview !== "false" && preview !== "0",
  };
}

function isTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-GB", { timeZone });
    return true;
  } catch {
    return false;
  }
}
