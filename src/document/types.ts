/**
 * Document model contracts consumed by the placeholder engine.
 */

export const UNDERLINE_STYLES = [
  "single", "words", "double", "thick", "dotted", "dottedHeavy",
  "dash", "dashedHeavy", "dashLong", "dashLongHeavy", "dotDash",
  "dashDotHeavy", "dotDotDash", "dashDotDotHeavy", "wave", "wavyHeavy",
  "wavyDouble", "none",
] as const;

export type UnderlineStyle = (typeof UNDERLINE_STYLES)[number];

/** `true` is a single underline, `false` an explicit "none". */
export type Underline = boolean | Exclude<UnderlineStyle, "single" | "none">;

/** Six upper-case hex digits, e.g. "1F3864". */
export type RgbColor = string;

/**
 * Font attributes of a run. `null` means the attribute is not set on the
 * run and is inherited from the paragraph or document style.
 */
export interface RunStyleValues {
  name: string | null;
  /** Points. */
  size: number | null;
  bold: boolean | null;
  italic: boolean | null;
  underline: Underline | null;
  color: RgbColor | null;
}

export type StyleAttribute = keyof RunStyleValues;

export const STYLE_ATTRIBUTES: readonly StyleAttribute[] = [
  "name", "size", "bold", "italic", "underline", "color",
];

export type AttributeResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: string };

export interface StyledRun {
  text: string;
  readAttribute<K extends StyleAttribute>(attribute: K): AttributeResult<RunStyleValues[K]>;
  writeAttribute<K extends StyleAttribute>(
    attribute: K,
    value: RunStyleValues[K],
  ): AttributeResult<RunStyleValues[K]>;
}

/** One paragraph-equivalent line of text made of ordered runs. */
export interface TextContainer {
  readonly runs: readonly StyledRun[];
}
