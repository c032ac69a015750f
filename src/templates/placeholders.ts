/**
 * Placeholder tokens: `{{KEY}}` with optional inner whitespace.
 *
 * Keys are letters, digits, `_`, `-` and `/` (so `{{DD/MM/YYYY}}` is a
 * key). Lookup is case-sensitive.
 */

export const PLACEHOLDER_PATTERN = /\{\{\s*([A-Za-z0-9_\-/]+)\s*\}\}/g;

export interface PlaceholderMatch {
  key: string;
  /** Offset of the opening `{{`. */
  start: number;
  /** Offset just past the closing `}}`. */
  end: number;
}

/** All tokens in `text`, left to right. */
export function findPlaceholders(text: string): PlaceholderMatch[] {
  const re = new RegExp(PLACEHOLDER_PATTERN.source, "g");
  const found: PlaceholderMatch[] = [];
  let m: RegExpExecArray | null;
  while ((m = re.exec(text)) !== null) {
    found.push({ key: m[1], start: m.index, end: m.index + m[0].length });
  }
  return found;
}

// ── Replacement mapping ─────────────────────────────────────────────

export type ReplacementValue = string | number | boolean;

export type ReplacementInput =
  | ReadonlyMap<string, ReplacementValue>
  | Readonly<Record<string, ReplacementValue>>;

/**
 * Normalize a caller's mapping to own-key → plain string. Values go through
 * String(), with no locale formatting or escaping.
 */
export function toReplacementMap(input: ReplacementInput): Map<string, string> {
  const entries: Array<[string, ReplacementValue]> = isMap(input)
    ? [...input.entries()]
    : Object.entries(input);
  return new Map(entries.map(([key, value]) => [key, String(value)]));
}

function isMap(input: ReplacementInput): input is ReadonlyMap<string, ReplacementValue> {
  return input instanceof Map;
}
