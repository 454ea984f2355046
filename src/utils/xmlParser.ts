import { DOMParser, XMLSerializer } from "@xmldom/xmldom";

export const NS = {
  a: 'http://schemas.openxmlformats.org/drawingml/2006/main',
  p: 'http://schemas.openxmlformats.org/presentationml/2006/main',
  r: 'http://schemas.openxmlformats.org/officeDocument/2006/relationships',
  c: 'http://schemas.openxmlformats.org/drawingml/2006/chart',
  dgm: 'http://schemas.openxmlformats.org/drawingml/2006/diagram',
  dsp: 'http://schemas.microsoft.com/office/drawing/2008/diagram',
  rel: 'http://schemas.openxmlformats.org/package/2006/relationships',
  ct: 'http://schemas.openxmlformats.org/package/2006/content-types',
} as const;

const ELEMENT_NODE = 1;

export function parseXMLContent(content: string, partName = 'part'): Document {
  const errors: string[] = [];
  const parser = new DOMParser({
    errorHandler: {
      warning: () => undefined,
      error: (msg: string) => errors.push(msg),
      fatalError: (msg: string) => errors.push(msg),
    },
  });
  const xmlDoc = parser.parseFromString(content, 'application/xml');
  if (!xmlDoc || !xmlDoc.documentElement || errors.length > 0) {
    throw new Error(`Could not parse XML content of ${partName}${errors.length ? `: ${errors[0]}` : ''}`);
  }
  return xmlDoc;
}

export function serializeXML(doc: Document): string {
  return new XMLSerializer().serializeToString(doc);
}

export function isElement(node: Node | null): node is Element {
  return node !== null && node.nodeType === ELEMENT_NODE;
}

function matches(el: Element, ns: string, localName: string): boolean {
  return el.namespaceURI === ns && (localName === '*' || el.localName === localName);
}

export function childElements(parent: Node, ns?: string, localName?: string): Element[] {
  const out: Element[] = [];
  for (let n = parent.firstChild; n; n = n.nextSibling) {
    if (!isElement(n)) continue;
    if (ns && localName && !matches(n, ns, localName)) continue;
    out.push(n);
  }
  return out;
}

export function firstChild(parent: Node | null, ns: string, localName: string): Element | null {
  if (!parent) return null;
  for (let n = parent.firstChild; n; n = n.nextSibling) {
    if (isElement(n) && matches(n, ns, localName)) return n;
  }
  return null;
}

/** Follows a path of direct children, e.g. `childPath(sp, [[NS.p, 'nvSpPr'], [NS.p, 'cNvPr']])`. */
export function childPath(parent: Node | null, path: Array<[string, string]>): Element | null {
  let current: Node | null = parent;
  for (const [ns, localName] of path) {
    current = firstChild(current, ns, localName);
    if (!current) return null;
  }
  return isElement(current) ? current : null;
}

export function descendants(root: Node, ns: string, localName: string): Element[] {
  const out: Element[] = [];
  const stack: Node[] = [];
  for (let n = root.lastChild; n; n = n.previousSibling) stack.push(n);
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node || !isElement(node)) continue;
    if (matches(node, ns, localName)) out.push(node);
    for (let n = node.lastChild; n; n = n.previousSibling) stack.push(n);
  }
  return out;
}

export function firstDescendant(root: Node | null, ns: string, localName: string): Element | null {
  if (!root) return null;
  return descendants(root, ns, localName)[0] ?? null;
}

export function intAttr(el: Element | null, name: string): number | null {
  if (!el || !el.hasAttribute(name)) return null;
  const value = parseInt(el.getAttribute(name) ?? '', 10);
  return Number.isFinite(value) ? value : null;
}

export function strAttr(el: Element | null, name: string): string | null {
  if (!el || !el.hasAttribute(name)) return null;
  return el.getAttribute(name);
}

export function boolAttr(el: Element | null, name: string): boolean | null {
  const value = strAttr(el, name);
  if (value === null) return null;
  return value === '1' || value === 'true' || value === 'on';
}

export function relId(el: Element | null, name = 'id'): string | null {
  if (!el) return null;
  const value = el.getAttributeNS(NS.r, name);
  return value ? value : null;
}

export function textOf(el: Element | null): string {
  return el?.textContent ?? '';
}

export function createChild(parent: Element, ns: string, qualifiedName: string, before: Node | null = null): Element {
  const doc = parent.ownerDocument;
  const el = doc.createElementNS(ns, qualifiedName);
  parent.insertBefore(el, before);
  return el;
}

export function removeElement(el: Element) {
  el.parentNode?.removeChild(el);
}
