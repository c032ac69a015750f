/**
 * WordprocessingML helpers shared by the document model.
 */

import { DOMParser, XMLSerializer } from "@xmldom/xmldom";
import { TemplateCorruptError } from "../shared/errors.js";

export const W_NS = "http://schemas.openxmlformats.org/wordprocessingml/2006/main";
export const R_NS = "http://schemas.openxmlformats.org/officeDocument/2006/relationships";
export const PKG_REL_NS = "http://schemas.openxmlformats.org/package/2006/relationships";
export const XML_NS = "http://www.w3.org/XML/1998/namespace";

const ELEMENT_NODE = 1;

export function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

/** Direct child elements, optionally restricted to one `w:` local name. */
export function childElements(parent: Element, localName?: string, ns: string = W_NS): Element[] {
  const out: Element[] = [];
  const nodes = parent.childNodes;
  for (let i = 0; i < nodes.length; i++) {
    const node = nodes[i];
    if (!isElement(node)) continue;
    if (localName === undefined || (node.localName === localName && node.namespaceURI === ns)) {
      out.push(node);
    }
  }
  return out;
}

export function firstChild(parent: Element, localName: string, ns: string = W_NS): Element | null {
  return childElements(parent, localName, ns)[0] ?? null;
}

export function createW(owner: Element, localName: string): Element {
  const doc = owner.ownerDocument;
  return doc.createElementNS(W_NS, `w:${localName}`);
}

export function getW(el: Element, name: string): string | null {
  return el.hasAttributeNS(W_NS, name) ? el.getAttributeNS(W_NS, name) : null;
}

export function setW(el: Element, name: string, value: string): void {
  el.setAttributeNS(W_NS, `w:${name}`, value);
}

export function removeW(el: Element, name: string): void {
  if (el.hasAttributeNS(W_NS, name)) el.removeAttributeNS(W_NS, name);
}

/**
 * Parse one XML part. Any parser error or warning-free but empty result
 * means the package is not a usable template.
 */
export function parseXmlPart(partName: string, xml: string): Document {
  const errors: string[] = [];
  const parser = new DOMParser({
    errorHandler: {
      warning: () => undefined,
      error: (msg: string) => errors.push(msg),
      fatalError: (msg: string) => errors.push(msg),
    },
  });

  let doc: Document;
  try {
    doc = parser.parseFromString(xml, "text/xml");
  } catch (err) {
    throw new TemplateCorruptError(`Failed to parse ${partName}`, { cause: err });
  }

  if (errors.length > 0 || !doc.documentElement) {
    const detail = errors[0] ?? "no root element";
    throw new TemplateCorruptError(`Failed to parse ${partName}: ${detail}`);
  }
  return doc;
}

export function serializeXml(doc: Document): string {
  return new XMLSerializer().serializeToString(doc);
}
