import type {
  BackgroundInfo,
  DiagramNode,
  SlideElement,
  LayoutInfo,
  LayoutSummary,
  MasterSummary,
  Paragraph,
  Presentation,
  Slide,
  SlideLink,
  SpeakerNotes,
  TableCell,
} from "./types.ts";
import { readChart } from "./utils/chartParts.ts";
import { readDiagramNodes } from "./utils/diagramExtractor.ts";
import { errorMessage } from "./utils/errors.ts";
import {
  tryRead,
  readColor,
  readDimensions,
  readFill,
  readLine,
  readShadow,
  readTextFrame,
  shapeProperties,
  shapeTransform,
  supportsFormat,
} from "./utils/formatting.ts";
import type { LinkResolver } from "./utils/formatting.ts";
import type { Logger } from "./utils/logger.ts";
import { silentLogger } from "./utils/logger.ts";
import { extractNotes } from "./utils/notesExtractor.ts";
import type { PptxDocument, SlideHandle } from "./utils/pptxDocument.ts";
import { REL_TYPES, commonSlideData, shapeTree } from "./utils/pptxDocument.ts";
import type { ShapeVisit } from "./utils/shapeExtractor.ts";
import {
  classifyShape,
  graphicData,
  placeholderOf,
  shapeId,
  shapeName,
  textBodyOf,
  walkShapes,
} from "./utils/shapeExtractor.ts";
import { readParagraphs } from "./utils/textBody.ts";
import { NS, childElements, childPath, firstChild, relId, strAttr } from "./utils/xmlParser.ts";

export function joinParagraphs(paragraphs: Paragraph[]): string {
  return paragraphs.map((p) => p.text).join('\n');
}

function readBackground(doc: Document): BackgroundInfo {
  const bg = firstChild(commonSlideData(doc), NS.p, 'bg');
  if (!bg) return { followsMaster: true, fill: null };
  const bgPr = firstChild(bg, NS.p, 'bgPr');
  if (bgPr) return { followsMaster: false, fill: tryRead(() => readFill(bgPr)) };
  const bgRef = firstChild(bg, NS.p, 'bgRef');
  return {
    followsMaster: false,
    fill: bgRef ? { type: 'solid', color: tryRead(() => readColor(bgRef)), gradientStops: [], pattern: null } : null,
  };
}

function collectLinks(element: SlideElement): SlideLink[] {
  const paragraphs: Paragraph[] =
    element.elementType === 'TextBox' || element.elementType === 'AutoShape'
      ? element.paragraphs
      : element.elementType === 'Table'
        ? element.table.cells.flatMap((cell) => cell.paragraphs)
        : [];
  return paragraphs.flatMap((p) =>
    p.runs
      .filter((run) => run.hyperlink !== null)
      .map((run) => ({ shapeId: element.shapeId, text: run.text, url: run.hyperlink ?? '' }))
  );
}

export class Extractor {
  private logger: Logger;

  constructor(logger: Logger = silentLogger) {
    this.logger = logger;
  }

  extract(document: PptxDocument): Presentation {
    this.logger.info(`Starting extraction of ${document.name}`);
    const masters = this.extractMasters(document);
    const diagramsBySlide = this.assignDiagrams(document);

    const slides = document.slides.map((slide) => {
      this.logger.dim(`Extracting slide ${slide.slideNumber}/${document.slides.length}`);
      return this.extractSlide(document, slide, masters, diagramsBySlide.get(slide.index) ?? []);
    });

    this.logger.info(`Extracted ${slides.length} slides from ${document.name}`);
    return {
      name: document.name,
      totalSlides: slides.length,
      slideWidth: document.slideWidth,
      slideHeight: document.slideHeight,
      masters,
      slides,
      targetLanguage: null,
      targetLanguageTag: null,
      isRightToLeft: false,
    };
  }

  extractSlide(
    document: PptxDocument,
    slide: SlideHandle,
    masters: MasterSummary[] = [],
    diagramNodes: DiagramNode[] = []
  ): Slide {
    const resolveLink: LinkResolver = (id) => document.relationshipTarget(slide.partName, id)?.target ?? null;
    const elements: SlideElement[] = [];
    const tree = shapeTree(slide);

    const seenIds = new Set<number>();
    for (const visit of tree ? walkShapes(tree) : []) {
      const id = shapeId(visit.shape);
      if (id !== null) {
        if (seenIds.has(id)) {
          this.logger.warn(
            `Slide ${slide.slideNumber}: shape id ${id} is used more than once; translations will go to the first shape with that id`
          );
        }
        seenIds.add(id);
      }
      try {
        elements.push(this.extractElement(document, slide, visit, resolveLink));
      } catch (error) {
        this.logger.warn(
          `Skipping shape "${shapeName(visit.shape)}" on slide ${slide.slideNumber}: ${errorMessage(error)}`
        );
      }
    }

    let speakerNotes: SpeakerNotes | null = null;
    try {
      speakerNotes = extractNotes(document, slide);
    } catch (error) {
      this.logger.warn(`Could not read notes of slide ${slide.slideNumber}: ${errorMessage(error)}`);
    }

    return {
      slideNumber: slide.slideNumber,
      layoutInfo: this.layoutInfo(document, slide, masters),
      background: readBackground(slide.doc),
      elements,
      links: elements.flatMap(collectLinks),
      speakerNotes,
      diagramNodes,
    };
  }

  private extractElement(
    document: PptxDocument,
    slide: SlideHandle,
    visit: ShapeVisit,
    resolveLink: LinkResolver
  ): SlideElement {
    const { shape } = visit;
    const id = shapeId(shape);
    if (id === null) throw new Error('shape has no id');

    const spPr = shapeProperties(shape);
    const base = {
      shapeId: id,
      shapeName: shapeName(shape),
      isGrouped: visit.isGrouped,
      groupId: visit.groupId,
      placeholder: placeholderOf(shape),
      fill: supportsFormat(shape, 'fill') ? tryRead(() => readFill(spPr)) : null,
      line: supportsFormat(shape, 'line') ? tryRead(() => readLine(spPr)) : null,
      shadow: supportsFormat(shape, 'shadow') ? tryRead(() => readShadow(spPr)) : null,
      dimensions: supportsFormat(shape, 'dimensions') ? tryRead(() => readDimensions(shapeTransform(shape))) : null,
    };

    const { elementType, kind } = classifyShape(shape);
    switch (kind) {
      case 'text': {
        const txBody = textBodyOf(shape);
        const paragraphs = readParagraphs(txBody, resolveLink);
        return {
          ...base,
          elementType: elementType === 'TextBox' ? 'TextBox' : 'AutoShape',
          textFrame: tryRead(() => readTextFrame(firstChild(txBody, NS.a, 'bodyPr'))),
          paragraphs,
          fullText: joinParagraphs(paragraphs),
        };
      }
      case 'table': {
        const tbl = firstChild(graphicData(shape), NS.a, 'tbl');
        if (!tbl) throw new Error('table frame has no a:tbl');
        const grid = firstChild(tbl, NS.a, 'tblGrid');
        const rows = childElements(tbl, NS.a, 'tr');
        const cells: TableCell[] = rows.flatMap((tr, row) =>
          childElements(tr, NS.a, 'tc').map((tc, column) => {
            const paragraphs = readParagraphs(firstChild(tc, NS.a, 'txBody'), resolveLink);
            return { row, column, text: joinParagraphs(paragraphs), paragraphs };
          })
        );
        return {
          ...base,
          elementType: 'Table',
          table: {
            rows: rows.length,
            columns: grid ? childElements(grid, NS.a, 'gridCol').length : 0,
            cells,
          },
        };
      }
      case 'chart': {
        const chartRef = firstChild(graphicData(shape), NS.c, 'chart');
        const rId = relId(chartRef);
        const rel = rId ? document.relationshipTarget(slide.partName, rId) : null;
        const doc = rel ? document.getPart(rel.target) : null;
        if (!rel || !doc) throw new Error('chart part could not be resolved');
        return { ...base, elementType: 'Chart', chart: readChart(doc, rel.target) };
      }
      case 'picture': {
        const cNvPr = childPath(shape, [[NS.p, 'nvPicPr'], [NS.p, 'cNvPr']]);
        return {
          ...base,
          elementType: 'Picture',
          image: { description: strAttr(cNvPr, 'descr'), altText: strAttr(cNvPr, 'title') },
        };
      }
      default:
        return { ...base, elementType: 'Other', shapeKind: kind === 'other' ? shape.localName : kind };
    }
  }

  private layoutInfo(document: PptxDocument, slide: SlideHandle, masters: MasterSummary[]): LayoutInfo {
    const [rel] = document.relationshipsOfType(slide.partName, REL_TYPES.slideLayout);
    if (!rel) return { name: null, partName: null, masterIndex: null, layoutIndex: null };

    for (const master of masters) {
      const layout = master.layouts.find((l) => l.partName === rel.target);
      if (layout) {
        return { name: layout.name, partName: rel.target, masterIndex: master.masterIndex, layoutIndex: layout.layoutIndex };
      }
    }
    const doc = document.getPart(rel.target);
    return {
      name: doc ? strAttr(commonSlideData(doc), 'name') : null,
      partName: rel.target,
      masterIndex: null,
      layoutIndex: null,
    };
  }

  private extractMasters(document: PptxDocument): MasterSummary[] {
    return document.masterParts().map((partName, masterIndex) => {
      const doc = document.getPart(partName);
      const list = doc ? childPath(doc, [[NS.p, 'sldMaster'], [NS.p, 'sldLayoutIdLst']]) : null;
      const layouts: LayoutSummary[] = [];

      for (const entry of list ? childElements(list, NS.p, 'sldLayoutId') : []) {
        const id = relId(entry);
        const rel = id ? document.relationshipTarget(partName, id) : null;
        const layoutDoc = rel ? document.getPart(rel.target) : null;
        if (!rel || !layoutDoc) continue;
        layouts.push({
          layoutIndex: layouts.length,
          name: strAttr(commonSlideData(layoutDoc), 'name'),
          partName: rel.target,
          placeholders: this.layoutPlaceholders(layoutDoc),
        });
      }

      return {
        masterIndex,
        name: doc ? strAttr(commonSlideData(doc), 'name') : null,
        partName,
        background: doc ? readBackground(doc) : { followsMaster: true, fill: null },
        layouts,
      };
    });
  }

  private layoutPlaceholders(doc: Document): LayoutSummary['placeholders'] {
    const tree = firstChild(commonSlideData(doc), NS.p, 'spTree');
    if (!tree) return [];
    return walkShapes(tree).flatMap(({ shape }) => {
      const placeholder = placeholderOf(shape);
      if (!placeholder) return [];
      return [{
        name: shapeName(shape),
        type: placeholder.type,
        idx: placeholder.idx,
        dimensions: tryRead(() => readDimensions(shapeTransform(shape))),
      }];
    });
  }

  /** Diagram nodes by slide index; data parts no slide references go to the first slide. */
  private assignDiagrams(document: PptxDocument): Map<number, DiagramNode[]> {
    const bySlide = new Map<number, DiagramNode[]>();
    const dataParts = document.partNames(/^ppt\/diagrams\/data[0-9]+\.xml$/).sort();
    if (dataParts.length === 0 || document.slides.length === 0) return bySlide;

    const owner = new Map<string, number>();
    for (const slide of document.slides) {
      for (const rel of document.relationshipsOfType(slide.partName, REL_TYPES.diagramData)) {
        if (!owner.has(rel.target)) owner.set(rel.target, slide.index);
      }
    }

    for (const partName of dataParts) {
      const doc = document.getPart(partName);
      if (!doc) continue;
      try {
        const nodes = readDiagramNodes(doc, partName);
        const index = owner.get(partName) ?? 0;
        bySlide.set(index, [...(bySlide.get(index) ?? []), ...nodes]);
      } catch (error) {
        this.logger.warn(`Could not read diagram ${partName}: ${errorMessage(error)}`);
      }
    }
    return bySlide;
  }
}

export function extract(document: PptxDocument, logger?: Logger): Presentation {
  return new Extractor(logger).extract(document);
}
