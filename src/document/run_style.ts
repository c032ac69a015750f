/**
 * Run font attributes (`w:rPr`): typed readers, writers, and the
 * attribute-by-attribute style copy used after a placeholder merge.
 *
 * Readers throw StyleAttributeError when the stored value is outside the
 * WordprocessingML schema (e.g. `<w:sz w:val="abc"/>`); the run wrapper
 * turns that into a failed AttributeResult for that attribute only.
 */

import { StyleAttributeError } from "../shared/errors.js";
import {
  UNDERLINE_STYLES,
  type RunStyleValues,
  type StyleAttribute,
  type StyledRun,
  type Underline,
  type UnderlineStyle,
} from "./types.js";
import { childElements, createW, firstChild, getW, removeW, setW } from "./ooxml.js";

// ── Element order inside w:rPr (CT_RPr sequence) ────────────────────

const RPR_ORDER = [
  "rStyle", "rFonts", "b", "bCs", "i", "iCs", "caps", "smallCaps", "strike",
  "dstrike", "outline", "shadow", "emboss", "imprint", "noProof", "snapToGrid",
  "vanish", "webHidden", "color", "spacing", "w", "kern", "position", "sz",
  "szCs", "highlight", "u", "effect", "bdr", "shd", "fitText", "vertAlign",
  "rtl", "cs", "em", "lang", "eastAsianLayout", "specVanish", "oMath",
];

function rank(localName: string): number {
  const i = RPR_ORDER.indexOf(localName);
  return i === -1 ? RPR_ORDER.length : i;
}

export function getOrAddRPr(run: Element): Element {
  const existing = firstChild(run, "rPr");
  if (existing) return existing;
  const rPr = createW(run, "rPr");
  run.insertBefore(rPr, run.firstChild);
  return rPr;
}

function getOrAddProperty(rPr: Element, localName: string): Element {
  const existing = firstChild(rPr, localName);
  if (existing) return existing;
  const el = createW(rPr, localName);
  const successor = childElements(rPr).find((c) => rank(c.localName) > rank(localName));
  rPr.insertBefore(el, successor ?? null);
  return el;
}

function removeProperty(run: Element, localName: string): void {
  const rPr = firstChild(run, "rPr");
  if (!rPr) return;
  for (const el of childElements(rPr, localName)) rPr.removeChild(el);
}

// ── Readers ─────────────────────────────────────────────────────────

function readToggle(rPr: Element | null, localName: string): boolean | null {
  const el = rPr ? firstChild(rPr, localName) : null;
  if (!el) return null;
  const val = getW(el, "val");
  if (val === null) return true;
  switch (val.toLowerCase()) {
    case "1":
    case "true":
    case "on":
      return true;
    case "0":
    case "false":
    case "off":
      return false;
    default:
      throw new StyleAttributeError(`w:${localName} has invalid value "${val}"`);
  }
}

function readName(rPr: Element | null): string | null {
  const el = rPr ? firstChild(rPr, "rFonts") : null;
  return el ? getW(el, "ascii") : null;
}

function readSize(rPr: Element | null): number | null {
  const el = rPr ? firstChild(rPr, "sz") : null;
  if (!el) return null;
  const val = getW(el, "val");
  if (val === null || !/^\d+$/.test(val)) {
    throw new StyleAttributeError(`w:sz has invalid value "${val ?? ""}"`);
  }
  return Number(val) / 2;
}

function isUnderlineStyle(val: string): val is UnderlineStyle {
  return (UNDERLINE_STYLES as readonly string[]).includes(val);
}

function readUnderline(rPr: Element | null): Underline | null {
  const el = rPr ? firstChild(rPr, "u") : null;
  if (!el) return null;
  const val = getW(el, "val");
  if (val === null) return null;
  if (!isUnderlineStyle(val)) {
    throw new StyleAttributeError(`w:u has invalid value "${val}"`);
  }
  if (val === "single") return true;
  if (val === "none") return false;
  return val;
}

const HEX_COLOR = /^[0-9A-Fa-f]{6}$/;

function readColor(rPr: Element | null): string | null {
  const el = rPr ? firstChild(rPr, "color") : null;
  if (!el) return null;
  const val = getW(el, "val");
  if (val === null || val === "auto") return null;
  if (!HEX_COLOR.test(val)) {
    throw new StyleAttributeError(`w:color has invalid value "${val}"`);
  }
  return val.toUpperCase();
}

type StyleReaders = {
  [K in StyleAttribute]: (rPr: Element | null) => RunStyleValues[K];
};

export const STYLE_READERS: StyleReaders = {
  name: readName,
  size: readSize,
  bold: (rPr) => readToggle(rPr, "b"),
  italic: (rPr) => readToggle(rPr, "i"),
  underline: readUnderline,
  color: readColor,
};

// ── Writers ─────────────────────────────────────────────────────────

function writeToggle(run: Element, localName: string, value: boolean | null): void {
  if (value === null) {
    removeProperty(run, localName);
    return;
  }
  const el = getOrAddProperty(getOrAddRPr(run), localName);
  if (value) removeW(el, "val");
  else setW(el, "val", "0");
}

function writeName(run: Element, value: string | null): void {
  if (value === null) {
    const rPr = firstChild(run, "rPr");
    const rFonts = rPr ? firstChild(rPr, "rFonts") : null;
    if (rFonts) {
      removeW(rFonts, "ascii");
      removeW(rFonts, "hAnsi");
    }
    return;
  }
  const rFonts = getOrAddProperty(getOrAddRPr(run), "rFonts");
  setW(rFonts, "ascii", value);
  setW(rFonts, "hAnsi", value);
}

function writeSize(run: Element, value: number | null): void {
  if (value === null) {
    removeProperty(run, "sz");
    return;
  }
  const halfPoints = Math.round(value * 2);
  if (!Number.isFinite(halfPoints) || halfPoints <= 0) {
    throw new StyleAttributeError(`Font size ${value} is not a positive point size`);
  }
  setW(getOrAddProperty(getOrAddRPr(run), "sz"), "val", String(halfPoints));
}

function writeUnderline(run: Element, value: Underline | null): void {
  if (value === null) {
    removeProperty(run, "u");
    return;
  }
  const val = value === true ? "single" : value === false ? "none" : value;
  if (!isUnderlineStyle(val)) {
    throw new StyleAttributeError(`Unsupported underline style "${val}"`);
  }
  setW(getOrAddProperty(getOrAddRPr(run), "u"), "val", val);
}

function writeColor(run: Element, value: string | null): void {
  if (value === null) {
    removeProperty(run, "color");
    return;
  }
  if (!HEX_COLOR.test(value)) {
    throw new StyleAttributeError(`Color "${value}" is not a six-digit hex RGB value`);
  }
  const el = getOrAddProperty(getOrAddRPr(run), "color");
  setW(el, "val", value.toUpperCase());
  removeW(el, "themeColor");
  removeW(el, "themeTint");
  removeW(el, "themeShade");
}

type StyleWriters = {
  [K in StyleAttribute]: (run: Element, value: RunStyleValues[K]) => void;
};

export const STYLE_WRITERS: StyleWriters = {
  name: writeName,
  size: writeSize,
  bold: (run, value) => writeToggle(run, "b", value),
  italic: (run, value) => writeToggle(run, "i", value),
  underline: writeUnderline,
  color: writeColor,
};

// ── Style copy ──────────────────────────────────────────────────────

export interface StyleCopyOutcome {
  attribute: StyleAttribute;
  status: "copied" | "unset" | "failed";
  reason?: string;
}

/** Name, size and color are only carried over when the source sets them. */
const COPY_ONLY_WHEN_SET: ReadonlySet<StyleAttribute> = new Set(["name", "size", "color"]);

function copyAttribute<K extends StyleAttribute>(
  source: StyledRun,
  target: StyledRun,
  attribute: K,
): StyleCopyOutcome {
  const read = source.readAttribute(attribute);
  if (!read.ok) return { attribute, status: "failed", reason: read.reason };
  if (read.value === null && COPY_ONLY_WHEN_SET.has(attribute)) {
    return { attribute, status: "unset" };
  }
  const written = target.writeAttribute(attribute, read.value);
  if (!written.ok) return { attribute, status: "failed", reason: written.reason };
  return { attribute, status: "copied" };
}

/**
 * Copy font attributes from `source` onto `target`, one attribute at a time.
 * A failing attribute is reported and the remaining ones are still copied.
 */
export function copyRunStyle(
  source: StyledRun,
  target: StyledRun,
  attributes: readonly StyleAttribute[],
): StyleCopyOutcome[] {
  return attributes.map((attribute) => copyAttribute(source, target, attribute));
}
