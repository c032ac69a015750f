import { createHash } from "crypto";

/** SHA-256 hash of raw bytes (Buffer). */
export function sha256Bytes(data: Buffer | Uint8Array): string {
  return createHash("sha256").update(data).digest("hex");
}
