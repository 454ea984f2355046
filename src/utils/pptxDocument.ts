import { posix } from "node:path";
import type JSZip from "jszip";
import { DocumentIOError, errorMessage } from "./errors.ts";
import type { Logger } from "./logger.ts";
import { silentLogger } from "./logger.ts";
import {
  NS,
  childElements,
  childPath,
  firstChild,
  intAttr,
  parseXMLContent,
  relId,
} from "./xmlParser.ts";
import type { PptxBytes } from "./zipHandler.ts";
import { loadZip, readXmlParts, sortSlideFiles, writeZip } from "./zipHandler.ts";

const OFFICE_RELS = 'http://schemas.openxmlformats.org/officeDocument/2006/relationships';

export const REL_TYPES = {
  officeDocument: `${OFFICE_RELS}/officeDocument`,
  slide: `${OFFICE_RELS}/slide`,
  slideLayout: `${OFFICE_RELS}/slideLayout`,
  slideMaster: `${OFFICE_RELS}/slideMaster`,
  notesSlide: `${OFFICE_RELS}/notesSlide`,
  notesMaster: `${OFFICE_RELS}/notesMaster`,
  chart: `${OFFICE_RELS}/chart`,
  diagramData: `${OFFICE_RELS}/diagramData`,
  diagramDrawing: 'http://schemas.microsoft.com/office/2007/relationships/diagramDrawing',
  hyperlink: `${OFFICE_RELS}/hyperlink`,
} as const;

// Default slide size (10in x 7.5in) when presentation.xml carries no p:sldSz.
const DEFAULT_SLIDE_WIDTH = 9144000;
const DEFAULT_SLIDE_HEIGHT = 6858000;

export interface Relationship {
  id: string;
  type: string;
  target: string;
  external: boolean;
}

export interface SlideHandle {
  index: number;
  slideNumber: number;
  partName: string;
  doc: Document;
}

export function relsPartName(partName: string): string {
  const dir = posix.dirname(partName);
  const base = posix.basename(partName);
  return dir === '.' ? `_rels/${base}.rels` : `${dir}/_rels/${base}.rels`;
}

export function resolveTarget(sourcePart: string, target: string): string {
  if (target.startsWith('/')) return target.slice(1);
  const dir = posix.dirname(sourcePart);
  return posix.normalize(posix.join(dir === '.' ? '' : dir, target));
}

/** Relative target from one part to another, as written into a .rels file. */
export function relativeTarget(sourcePart: string, targetPart: string): string {
  return posix.relative(posix.dirname(sourcePart), targetPart);
}

/**
 * Live, mutable view over a PPTX container. Every XML part is parsed once on
 * open; writers mutate the DOM and mark the part dirty, `save()` writes dirty
 * and added parts back into the original zip.
 */
export class PptxDocument {
  readonly slides: SlideHandle[];
  readonly slideWidth: number;
  readonly slideHeight: number;
  private dirty = new Set<string>();

  private constructor(
    readonly name: string,
    private zipContent: JSZip,
    private parts: Map<string, Document>,
    private logger: Logger
  ) {
    const size = childPath(this.presentationDoc(), [[NS.p, 'presentation'], [NS.p, 'sldSz']]);
    this.slideWidth = intAttr(size, 'cx') ?? DEFAULT_SLIDE_WIDTH;
    this.slideHeight = intAttr(size, 'cy') ?? DEFAULT_SLIDE_HEIGHT;
    this.slides = this.resolveSlides();
  }

  static async open(data: PptxBytes, name: string, logger: Logger = silentLogger): Promise<PptxDocument> {
    try {
      const zipContent = await loadZip(data);
      const parts = await readXmlParts(zipContent, logger);
      if (!parts.has('ppt/presentation.xml')) {
        throw new Error('ppt/presentation.xml is missing');
      }
      const document = new PptxDocument(name, zipContent, parts, logger);
      logger.info(`Opened ${name}: ${document.slides.length} slides`);
      return document;
    } catch (error) {
      throw new DocumentIOError(`Failed to open ${name}: ${errorMessage(error)}`, name);
    }
  }

  hasPart(partName: string): boolean {
    return this.parts.has(partName) || partName in this.zipContent.files;
  }

  getPart(partName: string): Document | null {
    return this.parts.get(partName) ?? null;
  }

  partNames(pattern: RegExp): string[] {
    return [...this.parts.keys()].filter((name) => pattern.test(name));
  }

  markDirty(partName: string) {
    if (this.parts.has(partName)) this.dirty.add(partName);
  }

  addPart(partName: string, xml: string, contentType: string): Document {
    const doc = parseXMLContent(xml, partName);
    this.parts.set(partName, doc);
    this.dirty.add(partName);

    const types = this.getPart('[Content_Types].xml');
    if (types?.documentElement) {
      const override = types.createElementNS(NS.ct, 'Override');
      override.setAttribute('PartName', `/${partName}`);
      override.setAttribute('ContentType', contentType);
      types.documentElement.appendChild(override);
      this.markDirty('[Content_Types].xml');
    }
    return doc;
  }

  relationships(partName: string): Relationship[] {
    const rels = this.getPart(relsPartName(partName));
    if (!rels?.documentElement) return [];
    return childElements(rels.documentElement, NS.rel, 'Relationship').map((el) => {
      const external = el.getAttribute('TargetMode') === 'External';
      const target = el.getAttribute('Target') ?? '';
      return {
        id: el.getAttribute('Id') ?? '',
        type: el.getAttribute('Type') ?? '',
        target: external ? target : resolveTarget(partName, target),
        external,
      };
    });
  }

  relationshipsOfType(partName: string, type: string): Relationship[] {
    return this.relationships(partName).filter((rel) => rel.type === type);
  }

  relationshipTarget(partName: string, id: string): Relationship | null {
    return this.relationships(partName).find((rel) => rel.id === id) ?? null;
  }

  addRelationship(partName: string, type: string, targetPart: string): string {
    const relsName = relsPartName(partName);
    let rels = this.getPart(relsName);
    if (!rels) {
      rels = parseXMLContent(
        `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n<Relationships xmlns="${NS.rel}"/>`,
        relsName
      );
      this.parts.set(relsName, rels);
    }
    const root = rels.documentElement;
    if (!root) throw new Error(`Relationships part ${relsName} has no root`);

    const used = new Set(childElements(root, NS.rel, 'Relationship').map((el) => el.getAttribute('Id')));
    let n = used.size + 1;
    while (used.has(`rId${n}`)) n++;
    const id = `rId${n}`;

    const rel = rels.createElementNS(NS.rel, 'Relationship');
    rel.setAttribute('Id', id);
    rel.setAttribute('Type', type);
    rel.setAttribute('Target', relativeTarget(partName, targetPart));
    root.appendChild(rel);
    this.dirty.add(relsName);
    return id;
  }

  /** Slide master parts in presentation order. */
  masterParts(): string[] {
    const list = childPath(this.presentationDoc(), [[NS.p, 'presentation'], [NS.p, 'sldMasterIdLst']]);
    const targets: string[] = [];
    if (!list) return targets;
    for (const entry of childElements(list, NS.p, 'sldMasterId')) {
      const id = relId(entry);
      const rel = id ? this.relationshipTarget('ppt/presentation.xml', id) : null;
      if (rel && this.parts.has(rel.target)) targets.push(rel.target);
    }
    return targets;
  }

  async save(): Promise<Buffer> {
    try {
      const changed: Array<[string, Document]> = [];
      for (const name of this.dirty) {
        const doc = this.parts.get(name);
        if (doc) changed.push([name, doc]);
      }
      this.logger.info(`Saving ${this.name} (${changed.length} changed parts)`);
      const buffer = await writeZip(this.zipContent, changed);
      this.dirty.clear();
      return buffer;
    } catch (error) {
      throw new DocumentIOError(`Failed to save ${this.name}: ${errorMessage(error)}`, this.name);
    }
  }

  private presentationDoc(): Document {
    const doc = this.parts.get('ppt/presentation.xml');
    if (!doc) throw new Error('ppt/presentation.xml is missing');
    return doc;
  }

  private resolveSlides(): SlideHandle[] {
    const list = childPath(this.presentationDoc(), [[NS.p, 'presentation'], [NS.p, 'sldIdLst']]);
    let partNames: string[] = [];
    if (list) {
      for (const entry of childElements(list, NS.p, 'sldId')) {
        const id = relId(entry);
        const rel = id ? this.relationshipTarget('ppt/presentation.xml', id) : null;
        if (rel && this.parts.has(rel.target)) partNames.push(rel.target);
      }
    }
    if (partNames.length === 0) {
      partNames = sortSlideFiles([...this.parts.keys()]);
    }

    const slides: SlideHandle[] = [];
    partNames.forEach((partName, index) => {
      const doc = this.parts.get(partName);
      if (doc) slides.push({ index, slideNumber: index + 1, partName, doc });
    });
    return slides;
  }
}

export function shapeTree(slide: SlideHandle): Element | null {
  return childPath(slide.doc, [[NS.p, 'sld'], [NS.p, 'cSld'], [NS.p, 'spTree']]);
}

export function commonSlideData(doc: Document): Element | null {
  const root = doc.documentElement;
  return root ? firstChild(root, NS.p, 'cSld') : null;
}
