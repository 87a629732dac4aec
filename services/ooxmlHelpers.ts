// services/ooxmlHelpers.ts
import { DOMParser } from '@xmldom/xmldom';

// ============================================================
// NAMESPACES
// ============================================================

export const NS = {
  w: 'http://schemas.openxmlformats.org/wordprocessingml/2006/main',
  m: 'http://schemas.openxmlformats.org/officeDocument/2006/math',
  o: 'urn:schemas-microsoft-com:office:office',
  v: 'urn:schemas-microsoft-com:vml',
  a: 'http://schemas.openxmlformats.org/drawingml/2006/main',
  r: 'http://schemas.openxmlformats.org/officeDocument/2006/relationships',
  mc: 'http://schemas.openxmlformats.org/markup-compatibility/2006',
  pkgRels: 'http://schemas.openxmlformats.org/package/2006/relationships'
} as const;

const ELEMENT_NODE = 1;

// ============================================================
// DOM HELPERS
// ============================================================

export function parseXml(xml: string): Document {
  return new DOMParser().parseFromString(xml, 'text/xml');
}

export function isElement(node: Node | null | undefined): node is Element {
  return !!node && node.nodeType === ELEMENT_NODE;
}

export function isNamed(node: Node | null | undefined, ns: string, localName: string): node is Element {
  return isElement(node) && node.namespaceURI === ns && node.localName === localName;
}

/** Direct element children, optionally filtered by namespace + local name. */
export function childElements(node: Node, ns?: string, localName?: string): Element[] {
  const out: Element[] = [];
  const list = node.childNodes;
  for (let i = 0; i < list.length; i++) {
    const child = list[i];
    if (!isElement(child)) continue;
    if (ns && localName && !isNamed(child, ns, localName)) continue;
    out.push(child);
  }
  return out;
}

export function firstChild(node: Node, ns: string, localName: string): Element | null {
  return childElements(node, ns, localName)[0] ?? null;
}

/** Descendant elements in document order. */
export function descendants(node: Element | Document, ns: string, localName: string): Element[] {
  const list = node.getElementsByTagNameNS(ns, localName);
  const out: Element[] = [];
  for (let i = 0; i < list.length; i++) out.push(list[i]);
  return out;
}

export function hasAncestor(node: Node, stop: Node, ns: string, localName: string): boolean {
  let current = node.parentNode;
  while (current && current !== stop) {
    if (isNamed(current, ns, localName)) return true;
    current = current.parentNode;
  }
  return false;
}

export function attr(element: Element, ns: string, localName: string): string | null {
  const value = element.getAttributeNS(ns, localName);
  return value ? value : null;
}

/** Concatenated m:t text under an Office Math node. */
export function mathText(node: Element): string {
  return descendants(node, NS.m, 't')
    .map((t) => t.textContent || '')
    .join('');
}

export function escapeXml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}
