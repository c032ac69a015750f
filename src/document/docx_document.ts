/**
 * DOCX package: opens template bytes into a mutable block tree and writes
 * the tree back out.
 *
 * Parts are parsed once and kept in memory; every change made through the
 * Paragraph/Run wrappers lands in those DOM trees and is serialized by
 * toBuffer(). Nothing is shared between instances.
 */

import path from "path";
import PizZip from "pizzip";
import { TemplateCorruptError } from "../shared/errors.js";
import { BlockContainer, type Paragraph, type Table, paragraphsOf } from "./blocks.js";
import { PKG_REL_NS, R_NS, W_NS, childElements, firstChild, getW, parseXmlPart, serializeXml } from "./ooxml.js";

const DEFAULT_MAIN_PART = "word/document.xml";

export type HeaderFooterKind = "default" | "first" | "even";

export interface HeaderFooter {
  kind: HeaderFooterKind;
  partName: string;
  block: BlockContainer;
}

export interface Section {
  index: number;
  headers: HeaderFooter[];
  footers: HeaderFooter[];
}

/** Which region of the document a paragraph was found in. */
export type ContainerRegion = "body" | "table" | "header" | "footer";

export interface LocatedParagraph {
  region: ContainerRegion;
  paragraph: Paragraph;
}

interface Relationship {
  id: string;
  type: string;
  target: string;
  external: boolean;
}

const HEADER_FOOTER_KINDS: readonly HeaderFooterKind[] = ["default", "first", "even"];

export class DocxDocument {
  private readonly parts = new Map<string, Document>();
  private readonly body: BlockContainer;

  private constructor(
    private readonly zip: PizZip,
    private readonly mainPart: string,
  ) {
    const root = this.part(mainPart).documentElement;
    if (root.localName !== "document" || root.namespaceURI !== W_NS) {
      throw new TemplateCorruptError(`${mainPart} is not a WordprocessingML document`);
    }
    const body = firstChild(root, "body");
    if (!body) throw new TemplateCorruptError(`${mainPart} has no w:body`);
    this.body = new BlockContainer(body);
  }

  /**
   * Open a .docx from raw bytes. Throws TemplateCorruptError when the bytes
   * are not a zip package, lack a main document part, or hold broken XML.
   */
  static load(bytes: Buffer | Uint8Array): DocxDocument {
    let zip: PizZip;
    try {
      zip = new PizZip(bytes);
    } catch (err) {
      throw new TemplateCorruptError("Template is not a valid DOCX (zip) package", { cause: err });
    }

    const mainPart = findMainPart(zip);
    if (!zip.file(mainPart)) {
      throw new TemplateCorruptError(`Template has no main document part (${mainPart})`);
    }
    return new DocxDocument(zip, mainPart);
  }

  // ── Block tree ─────────────────────────────────────────────

  get paragraphs(): Paragraph[] {
    return this.body.paragraphs;
  }

  get tables(): Table[] {
    return this.body.tables;
  }

  /**
   * Sections in document order. A section with no reference of a given kind
   * inherits the previous section's part of that kind, as Word does.
   */
  get sections(): Section[] {
    const rels = this.relationships(this.mainPart);
    const sections: Section[] = [];
    let prevHeaders = new Map<HeaderFooterKind, HeaderFooter>();
    let prevFooters = new Map<HeaderFooterKind, HeaderFooter>();

    for (const [index, sectPr] of this.sectionProperties().entries()) {
      const headers = this.resolveReferences(sectPr, "headerReference", rels, prevHeaders);
      const footers = this.resolveReferences(sectPr, "footerReference", rels, prevFooters);
      sections.push({ index, headers: [...headers.values()], footers: [...footers.values()] });
      prevHeaders = headers;
      prevFooters = footers;
    }
    return sections;
  }

  /**
   * Every text container in processing order: body paragraphs, table cell
   * paragraphs, then each section's header and footer paragraphs. A part
   * shared by several sections is visited once.
   */
  *textContainers(): Generator<LocatedParagraph> {
    for (const paragraph of this.body.paragraphs) yield { region: "body", paragraph };
    for (const table of this.body.tables) {
      for (const row of table.rows) {
        for (const cell of row) {
          for (const paragraph of paragraphsOf(cell)) yield { region: "table", paragraph };
        }
      }
    }

    const seen = new Set<string>();
    for (const section of this.sections) {
      for (const [region, parts] of [["header", section.headers], ["footer", section.footers]] as const) {
        for (const part of parts) {
          if (seen.has(part.partName)) continue;
          seen.add(part.partName);
          for (const paragraph of paragraphsOf(part.block)) yield { region, paragraph };
        }
      }
    }
  }

  // ── Serialization ──────────────────────────────────────────

  toBuffer(): Buffer {
    for (const [name, doc] of this.parts) {
      this.zip.file(name, serializeXml(doc));
    }
    const out = this.zip.generate({
      type: "nodebuffer",
      compression: "DEFLATE",
      compressionOptions: { level: 9 },
    });
    return Buffer.from(out);
  }

  // ── Internals ──────────────────────────────────────────────

  private part(name: string): Document {
    const cached = this.parts.get(name);
    if (cached) return cached;
    const file = this.zip.file(name);
    if (!file) throw new TemplateCorruptError(`Missing package part ${name}`);
    const doc = parseXmlPart(name, file.asText());
    this.parts.set(name, doc);
    return doc;
  }

  private relationships(partName: string): Map<string, Relationship> {
    return readRelationships(this.zip, partName);
  }

  private sectionProperties(): Element[] {
    const found: Element[] = [];
    for (const child of childElements(this.body.element)) {
      if (child.namespaceURI !== W_NS) continue;
      if (child.localName === "p") {
        const pPr = firstChild(child, "pPr");
        const sectPr = pPr ? firstChild(pPr, "sectPr") : null;
        if (sectPr) found.push(sectPr);
      } else if (child.localName === "sectPr") {
        found.push(child);
      }
    }
    return found;
  }

  private resolveReferences(
    sectPr: Element,
    referenceName: "headerReference" | "footerReference",
    rels: Map<string, Relationship>,
    inherited: Map<HeaderFooterKind, HeaderFooter>,
  ): Map<HeaderFooterKind, HeaderFooter> {
    const resolved = new Map<HeaderFooterKind, HeaderFooter>();
    const own = new Map<HeaderFooterKind, string>();

    for (const ref of childElements(sectPr, referenceName)) {
      const kind = parseKind(getW(ref, "type"));
      const relId = ref.getAttributeNS(R_NS, "id");
      const rel = relId ? rels.get(relId) : undefined;
      if (!kind || !rel || rel.external) continue;
      own.set(kind, resolveTarget(this.mainPart, rel.target));
    }

    for (const kind of HEADER_FOOTER_KINDS) {
      const partName = own.get(kind);
      if (partName === undefined) {
        const prev = inherited.get(kind);
        if (prev) resolved.set(kind, prev);
        continue;
      }
      if (!this.zip.file(partName)) continue;
      resolved.set(kind, { kind, partName, block: new BlockContainer(this.part(partName).documentElement) });
    }
    return resolved;
  }
}

// ── Package helpers ─────────────────────────────────────────────────

function parseKind(value: string | null): HeaderFooterKind | null {
  if (value === null) return "default";
  return HEADER_FOOTER_KINDS.find((k) => k === value) ?? null;
}

function relsPartFor(partName: string): string {
  if (partName === "") return "_rels/.rels";
  return path.posix.join(path.posix.dirname(partName), "_rels", `${path.posix.basename(partName)}.rels`);
}

function resolveTarget(sourcePart: string, target: string): string {
  if (target.startsWith("/")) return target.slice(1);
  return path.posix.normalize(path.posix.join(path.posix.dirname(sourcePart), target));
}

function readRelationships(zip: PizZip, sourcePart: string): Map<string, Relationship> {
  const rels = new Map<string, Relationship>();
  const relsName = relsPartFor(sourcePart);
  const file = zip.file(relsName);
  if (!file) return rels;

  const root = parseXmlPart(relsName, file.asText()).documentElement;
  for (const el of childElements(root, "Relationship", PKG_REL_NS)) {
    const id = el.getAttribute("Id");
    const target = el.getAttribute("Target");
    if (!id || !target) continue;
    rels.set(id, {
      id,
      type: el.getAttribute("Type") ?? "",
      target,
      external: el.getAttribute("TargetMode") === "External",
    });
  }
  return rels;
}

function findMainPart(zip: PizZip): string {
  for (const rel of readRelationships(zip, "").values()) {
    if (rel.type.endsWith("/officeDocument") && !rel.external) {
      return resolveTarget("", rel.target);
    }
  }
  return DEFAULT_MAIN_PART;
}
