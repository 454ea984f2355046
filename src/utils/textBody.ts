import type { Paragraph, TextRun } from "../types.ts";
import type { LinkResolver } from "./formatting.ts";
import { readParagraphFormatting, readRun } from "./formatting.ts";
import { NS, childElements, createChild, firstChild, isElement, removeElement, textOf } from "./xmlParser.ts";

export function paragraphsOf(txBody: Element): Element[] {
  return childElements(txBody, NS.a, 'p');
}

export function runsOf(p: Element): Element[] {
  return childElements(p, NS.a, 'r');
}

export function paragraphText(runs: Array<{ text: string }>): string {
  return runs.map((run) => run.text).join('');
}

/** Run texts of a body, paragraphs joined by newlines. */
export function bodyText(txBody: Element | null): string {
  if (!txBody) return '';
  return paragraphsOf(txBody)
    .map((p) => runsOf(p).map((r) => textOf(firstChild(r, NS.a, 't'))).join(''))
    .join('\n');
}

export function readParagraphs(txBody: Element | null, resolveLink?: LinkResolver): Paragraph[] {
  if (!txBody) return [];
  return paragraphsOf(txBody).map((p) => {
    const runs: TextRun[] = runsOf(p).map((r) => readRun(r, resolveLink));
    return { formatting: readParagraphFormatting(p), runs, text: paragraphText(runs) };
  });
}

export function setRunText(r: Element, text: string) {
  const t = firstChild(r, NS.a, 't') ?? createChild(r, NS.a, 'a:t');
  t.textContent = text;
}

export interface MinimalRunFormat {
  bold: boolean | null;
  italic: boolean | null;
  fontSizePt: number | null;
}

/** Appends a run carrying only bold, italic and size; colour and font are left to inheritance. */
export function addRun(p: Element, text: string, format: MinimalRunFormat | null): Element {
  const endParaRPr = firstChild(p, NS.a, 'endParaRPr');
  const r = createChild(p, NS.a, 'a:r', endParaRPr);
  const rPr = createChild(r, NS.a, 'a:rPr');
  if (format) applyMinimalFormat(rPr, format);
  rPr.setAttribute('dirty', '0');
  setRunText(r, text);
  return r;
}

function applyMinimalFormat(rPr: Element, format: MinimalRunFormat) {
  if (format.fontSizePt !== null && Number.isFinite(format.fontSizePt)) {
    rPr.setAttribute('sz', String(Math.round(format.fontSizePt * 100)));
  }
  if (format.bold !== null) rPr.setAttribute('b', format.bold ? '1' : '0');
  if (format.italic !== null) rPr.setAttribute('i', format.italic ? '1' : '0');
}

export function addParagraph(txBody: Element): Element {
  return createChild(txBody, NS.a, 'a:p');
}

export function getOrAddParagraphProperties(p: Element): Element {
  const existing = firstChild(p, NS.a, 'pPr');
  if (existing) return existing;
  return createChild(p, NS.a, 'a:pPr', p.firstChild);
}

export function setParagraphRtl(p: Element) {
  const pPr = getOrAddParagraphProperties(p);
  pPr.setAttribute('rtl', '1');
  pPr.setAttribute('algn', 'r');
}

const AUTOFIT_ELEMENTS = ['noAutofit', 'normAutofit', 'spAutoFit'];

/** Turns on shrink-on-overflow: square wrap plus `a:normAutofit` in its schema position. */
export function enableAutoFit(txBody: Element): boolean {
  const bodyPr = firstChild(txBody, NS.a, 'bodyPr') ?? createChild(txBody, NS.a, 'a:bodyPr', txBody.firstChild);
  bodyPr.setAttribute('wrap', 'square');
  for (const el of childElements(bodyPr)) {
    if (el.namespaceURI === NS.a && AUTOFIT_ELEMENTS.includes(el.localName)) removeElement(el);
  }
  const warp = firstChild(bodyPr, NS.a, 'prstTxWarp');
  createChild(bodyPr, NS.a, 'a:normAutofit', warp ? warp.nextSibling : bodyPr.firstChild);
  return true;
}

/**
 * Replaces the whole text of a body with `text`, one paragraph per line. The
 * first paragraph and its first run are kept so their properties survive.
 * A body that already holds `text` is left as it is.
 */
export function replaceBodyText(txBody: Element, text: string): Element[] {
  if (bodyText(txBody) === text) return paragraphsOf(txBody);
  const paragraphs = paragraphsOf(txBody);
  const first = paragraphs[0] ?? addParagraph(txBody);
  paragraphs.slice(1).forEach(removeElement);

  const lines = text.split('\n');
  const runs = runsOf(first);
  if (runs.length === 0) {
    addRun(first, lines[0], null);
  } else {
    setRunText(runs[0], lines[0]);
    runs.slice(1).forEach(removeElement);
  }

  const written = [first];
  let anchor: Element = first;
  for (const line of lines.slice(1)) {
    const p = first.cloneNode(true);
    if (!isElement(p)) continue;
    const [r] = runsOf(p);
    if (r) setRunText(r, line);
    txBody.insertBefore(p, anchor.nextSibling);
    written.push(p);
    anchor = p;
  }
  return written;
}
