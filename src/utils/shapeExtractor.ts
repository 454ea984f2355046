import type { ElementType, PlaceholderInfo } from "../types.ts";
import { NS, boolAttr, childElements, childPath, firstChild, intAttr, strAttr } from "./xmlParser.ts";

export const GRAPHIC_URIS = {
  table: 'http://schemas.openxmlformats.org/drawingml/2006/table',
  chart: 'http://schemas.openxmlformats.org/drawingml/2006/chart',
  diagram: 'http://schemas.openxmlformats.org/drawingml/2006/diagram',
} as const;

const SHAPE_ELEMENTS = ['sp', 'grpSp', 'graphicFrame', 'pic', 'cxnSp', 'contentPart'];

export interface ShapeVisit {
  shape: Element;
  isGrouped: boolean;
  groupId: number | null;
}

export type ShapeKind = 'text' | 'table' | 'chart' | 'diagram' | 'picture' | 'group' | 'other';

export interface ShapeClass {
  elementType: ElementType;
  kind: ShapeKind;
}

function isShapeElement(el: Element): boolean {
  return SHAPE_ELEMENTS.includes(el.localName);
}

export function topLevelShapes(spTree: Element): Element[] {
  return childElements(spTree).filter(isShapeElement);
}

export function nonVisualProperties(shape: Element): Element | null {
  const nv = childElements(shape).find((el) => el.namespaceURI === NS.p && el.localName.startsWith('nv'));
  return firstChild(nv ?? null, NS.p, 'cNvPr');
}

export function shapeId(shape: Element): number | null {
  return intAttr(nonVisualProperties(shape), 'id');
}

export function shapeName(shape: Element): string {
  return strAttr(nonVisualProperties(shape), 'name') ?? '';
}

export function placeholderOf(shape: Element): PlaceholderInfo | null {
  const nv = childElements(shape).find((el) => el.namespaceURI === NS.p && el.localName.startsWith('nv'));
  const ph = childPath(nv ?? null, [[NS.p, 'nvPr'], [NS.p, 'ph']]);
  if (!ph) return null;
  return { type: strAttr(ph, 'type') ?? 'obj', idx: intAttr(ph, 'idx') };
}

/**
 * Flattens the shape tree in document order. Groups are expanded with an
 * explicit stack; members carry the id of their innermost group.
 */
export function walkShapes(spTree: Element): ShapeVisit[] {
  const visits: ShapeVisit[] = [];
  const stack: ShapeVisit[] = topLevelShapes(spTree)
    .reverse()
    .map((shape) => ({ shape, isGrouped: false, groupId: null }));

  while (stack.length > 0) {
    const visit = stack.pop();
    if (!visit) break;
    if (visit.shape.localName === 'grpSp') {
      const groupId = shapeId(visit.shape);
      const members = topLevelShapes(visit.shape).reverse();
      for (const member of members) {
        stack.push({ shape: member, isGrouped: true, groupId });
      }
      continue;
    }
    visits.push(visit);
  }
  return visits;
}

export function findShapeById(spTree: Element, id: number): Element | null {
  const stack = topLevelShapes(spTree);
  while (stack.length > 0) {
    const shape = stack.pop();
    if (!shape) break;
    if (shapeId(shape) === id) return shape;
    if (shape.localName === 'grpSp') stack.push(...topLevelShapes(shape));
  }
  return null;
}

export function graphicData(shape: Element): Element | null {
  return childPath(shape, [[NS.a, 'graphic'], [NS.a, 'graphicData']]);
}

export function textBodyOf(shape: Element): Element | null {
  return firstChild(shape, NS.p, 'txBody');
}

export function classifyShape(shape: Element): ShapeClass {
  switch (shape.localName) {
    case 'sp': {
      const txBox = boolAttr(childPath(shape, [[NS.p, 'nvSpPr'], [NS.p, 'cNvSpPr']]), 'txBox');
      const elementType = txBox || placeholderOf(shape) ? 'TextBox' : 'AutoShape';
      return { elementType, kind: 'text' };
    }
    case 'graphicFrame': {
      const uri = strAttr(graphicData(shape), 'uri');
      if (uri === GRAPHIC_URIS.table) return { elementType: 'Table', kind: 'table' };
      if (uri === GRAPHIC_URIS.chart) return { elementType: 'Chart', kind: 'chart' };
      if (uri === GRAPHIC_URIS.diagram) return { elementType: 'Other', kind: 'diagram' };
      return { elementType: 'Other', kind: 'other' };
    }
    case 'pic':
      return { elementType: 'Picture', kind: 'picture' };
    case 'grpSp':
      return { elementType: 'Other', kind: 'group' };
    default:
      return { elementType: 'Other', kind: 'other' };
  }
}
