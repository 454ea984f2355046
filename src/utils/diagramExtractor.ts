import type { DiagramNode } from "../types.ts";
import { bodyText, replaceBodyText } from "./textBody.ts";
import { NS, childElements, childPath, descendants, firstChild, intAttr, strAttr } from "./xmlParser.ts";

const CONTENT_POINT_TYPES = new Set(['node', 'asst']);

function points(doc: Document): Element[] {
  const list = childPath(doc, [[NS.dgm, 'dataModel'], [NS.dgm, 'ptLst']]);
  return list ? childElements(list, NS.dgm, 'pt') : [];
}

function connections(doc: Document): Element[] {
  const list = childPath(doc, [[NS.dgm, 'dataModel'], [NS.dgm, 'cxnLst']]);
  return list ? childElements(list, NS.dgm, 'cxn') : [];
}

function pointType(pt: Element): string {
  return strAttr(pt, 'type') ?? 'node';
}

function declaredLevel(pt: Element): number | null {
  const vars = childPath(pt, [[NS.dgm, 'prSet'], [NS.dgm, 'presLayoutVars']]);
  if (!vars) return null;
  const hint = childElements(vars).find((el) => /depth|level/i.test(el.localName));
  return hint ? intAttr(hint, 'val') : null;
}

/**
 * Content nodes of a diagram data part. Parents come from `parOf`
 * connections (source is the parent of destination); levels count from the
 * top content nodes at 0 unless the point declares one.
 */
export function readDiagramNodes(doc: Document, partName: string): DiagramNode[] {
  const content = points(doc).filter((pt) => CONTENT_POINT_TYPES.has(pointType(pt)));
  const ids = new Set(content.map((pt) => strAttr(pt, 'modelId') ?? ''));

  const parentOf = new Map<string, string>();
  for (const cxn of connections(doc)) {
    if ((strAttr(cxn, 'type') ?? 'parOf') !== 'parOf') continue;
    const src = strAttr(cxn, 'srcId');
    const dest = strAttr(cxn, 'destId');
    if (src && dest && ids.has(src) && ids.has(dest)) parentOf.set(dest, src);
  }

  const nodes: DiagramNode[] = content.map((pt) => {
    const nodeId = strAttr(pt, 'modelId') ?? '';
    return {
      nodeId,
      parentId: parentOf.get(nodeId) ?? null,
      level: declaredLevel(pt),
      text: bodyText(firstChild(pt, NS.dgm, 't')),
      partName,
    };
  });

  const children = new Map<string, DiagramNode[]>();
  for (const node of nodes) {
    if (node.parentId === null) continue;
    const list = children.get(node.parentId) ?? [];
    list.push(node);
    children.set(node.parentId, list);
  }

  const queue: Array<{ node: DiagramNode; level: number }> = nodes
    .filter((node) => node.parentId === null)
    .map((node) => ({ node, level: 0 }));
  const seen = new Set<string>();
  while (queue.length > 0) {
    const entry = queue.shift();
    if (!entry || seen.has(entry.node.nodeId)) continue;
    seen.add(entry.node.nodeId);
    if (entry.node.level === null) entry.node.level = entry.level;
    for (const child of children.get(entry.node.nodeId) ?? []) {
      queue.push({ node: child, level: entry.level + 1 });
    }
  }
  return nodes;
}

export function writeDiagramNodeText(doc: Document, nodeId: string, text: string): boolean {
  const pt = points(doc).find((el) => strAttr(el, 'modelId') === nodeId);
  const body = firstChild(pt ?? null, NS.dgm, 't');
  if (!body) return false;
  replaceBodyText(body, text);
  return true;
}

/** Presentation points laid out for a content node; their ids key the cached drawing shapes. */
export function presentationPointIds(doc: Document, nodeId: string): string[] {
  return points(doc)
    .filter((pt) => pointType(pt) === 'pres')
    .filter((pt) => strAttr(firstChild(pt, NS.dgm, 'prSet'), 'presAssocID') === nodeId)
    .map((pt) => strAttr(pt, 'modelId') ?? '')
    .filter(Boolean);
}

export function writeDrawingText(drawing: Document, modelIds: string[], text: string): number {
  const wanted = new Set(modelIds);
  let written = 0;
  for (const sp of descendants(drawing, NS.dsp, 'sp')) {
    if (!wanted.has(strAttr(sp, 'modelId') ?? '')) continue;
    const body = firstChild(sp, NS.dsp, 'txBody');
    if (!body) continue;
    replaceBodyText(body, text);
    written++;
  }
  return written;
}
