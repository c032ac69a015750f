import { StyleAttributeError } from "../shared/errors.js";
import type { AttributeResult, RunStyleValues, StyleAttribute, StyledRun } from "./types.js";
import { STYLE_READERS, STYLE_WRITERS } from "./run_style.js";
import { XML_NS, childElements, createW, firstChild, getW, setW } from "./ooxml.js";

/** Run children that contribute to the run's visible text. */
const TEXT_BEARING = new Set(["t", "tab", "br", "cr", "noBreakHyphen"]);

/**
 * Characters standing in for run content other than `w:t`:
 *   w:tab `\t`, w:br `\n` (page break `\f`, column break `\v`),
 *   w:cr `\r`, w:noBreakHyphen U+2011.
 */
const SPECIAL_CHARS = new Set(["\t", "\n", "\f", "\v", "\r", "\u2011"]);

function specialChar(el: Element): string | null {
  switch (el.localName) {
    case "tab":
      return "\t";
    case "cr":
      return "\r";
    case "noBreakHyphen":
      return "\u2011";
    case "br": {
      const type = getW(el, "type");
      if (type === "page") return "\f";
      if (type === "column") return "\v";
      return "\n";
    }
    default:
      return null;
  }
}

/**
 * A `w:r` element. Text and font attributes are read from and written to
 * the underlying XML, so every wrapper over the same element sees the same
 * state.
 */
export class Run implements StyledRun {
  constructor(readonly element: Element) {}

  get text(): string {
    let text = "";
    for (const child of childElements(this.element)) {
      if (child.localName === "t") {
        text += child.textContent ?? "";
      } else {
        text += specialChar(child) ?? "";
      }
    }
    return text;
  }

  /**
   * Replace the run's text content; run properties and non-text content
   * stay in place. Each stand-in character reuses the run's next original
   * element of that kind (keeping its attributes) and creates one only when
   * none is left.
   */
  set text(value: string) {
    const textChildren = childElements(this.element).filter((c) => TEXT_BEARING.has(c.localName));
    const removed = new Set<Node>(textChildren);

    const originals = new Map<string, Element[]>();
    for (const child of textChildren) {
      const ch = specialChar(child);
      if (ch === null) continue;
      const list = originals.get(ch) ?? [];
      list.push(child);
      originals.set(ch, list);
    }

    // New text goes where the old text started, ahead of any later content.
    let before: Node | null = textChildren[0]?.nextSibling ?? null;
    while (before && removed.has(before)) before = before.nextSibling;

    for (const child of textChildren) this.element.removeChild(child);

    for (const node of this.buildTextNodes(value, originals)) {
      this.element.insertBefore(node, before);
    }
  }

  get properties(): Element | null {
    return firstChild(this.element, "rPr");
  }

  readAttribute<K extends StyleAttribute>(attribute: K): AttributeResult<RunStyleValues[K]> {
    try {
      return { ok: true, value: STYLE_READERS[attribute](this.properties) };
    } catch (err) {
      if (err instanceof StyleAttributeError) return { ok: false, reason: err.message };
      throw err;
    }
  }

  writeAttribute<K extends StyleAttribute>(
    attribute: K,
    value: RunStyleValues[K],
  ): AttributeResult<RunStyleValues[K]> {
    try {
      STYLE_WRITERS[attribute](this.element, value);
      return { ok: true, value };
    } catch (err) {
      if (err instanceof StyleAttributeError) return { ok: false, reason: err.message };
      throw err;
    }
  }

  private buildTextNodes(value: string, originals: Map<string, Element[]>): Element[] {
    const nodes: Element[] = [];
    let pending = "";

    const flush = () => {
      if (!pending) return;
      const t = createW(this.element, "t");
      if (/^\s|\s$/.test(pending)) t.setAttributeNS(XML_NS, "xml:space", "preserve");
      t.appendChild(this.element.ownerDocument.createTextNode(pending));
      nodes.push(t);
      pending = "";
    };

    for (const ch of value) {
      if (SPECIAL_CHARS.has(ch)) {
        flush();
        nodes.push(originals.get(ch)?.shift() ?? this.createSpecial(ch));
      } else {
        pending += ch;
      }
    }
    flush();
    return nodes;
  }

  private createSpecial(ch: string): Element {
    switch (ch) {
      case "\t":
        return createW(this.element, "tab");
      case "\r":
        return createW(this.element, "cr");
      case "\u2011":
        return createW(this.element, "noBreakHyphen");
      case "\f":
      case "\v": {
        const br = createW(this.element, "br");
        setW(br, "type", ch === "\f" ? "page" : "column");
        return br;
      }
      default:
        return createW(this.element, "br");
    }
  }
}
