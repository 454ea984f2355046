import type {
  ChartElement,
  DiagramNode,
  Paragraph,
  Presentation,
  Slide,
  SlideElement,
  TableElement,
  TextRun,
} from "./types.ts";
import {
  axisTitleElement,
  chartRoot,
  chartTitleElement,
  dataLabelElements,
  seriesElements,
  writeHolderText,
} from "./utils/chartParts.ts";
import { presentationPointIds, writeDiagramNodeText, writeDrawingText } from "./utils/diagramExtractor.ts";
import { errorMessage } from "./utils/errors.ts";
import { shapeTransform } from "./utils/formatting.ts";
import type { Logger } from "./utils/logger.ts";
import { silentLogger } from "./utils/logger.ts";
import { ensureNotesBody } from "./utils/notesExtractor.ts";
import type { PptxDocument, SlideHandle } from "./utils/pptxDocument.ts";
import { REL_TYPES, shapeTree } from "./utils/pptxDocument.ts";
import { findShapeById, graphicData, textBodyOf, topLevelShapes } from "./utils/shapeExtractor.ts";
import {
  addParagraph,
  addRun,
  enableAutoFit,
  paragraphsOf,
  runsOf,
  setParagraphRtl,
  setRunText,
} from "./utils/textBody.ts";
import { NS, childElements, createChild, firstChild, intAttr, relId, removeElement } from "./utils/xmlParser.ts";

export type ElementState = 'unvisited' | 'located' | 'updated' | 'skipped' | 'failed';

export interface ElementOutcome {
  slideNumber: number;
  shapeId: number;
  state: ElementState;
  reason?: string;
}

export interface ReconcileStats {
  slidesProcessed: number;
  elementsUpdated: number;
  /** Translated elements whose shapeId was not found on the live slide. */
  elementsNotFound: number;
  elementsSkipped: number;
  elementsFailed: number;
  textRunsUpdated: number;
  runCountMismatches: number;
  paragraphsAdded: number;
  paragraphsRemoved: number;
  tablesUpdated: number;
  chartsUpdated: number;
  notesUpdated: number;
  diagramNodesUpdated: number;
  rtlParagraphsSet: number;
  autoFitEnabled: number;
  shapesMirrored: number;
  writeFailures: number;
  outcomes: ElementOutcome[];
}

export interface ReconcilerOptions {
  logger?: Logger;
  /** Turn on shrink-on-overflow for every rewritten text body. Defaults to true. */
  autoFit?: boolean;
}

export function emptyStats(): ReconcileStats {
  return {
    slidesProcessed: 0,
    elementsUpdated: 0,
    elementsNotFound: 0,
    elementsSkipped: 0,
    elementsFailed: 0,
    textRunsUpdated: 0,
    runCountMismatches: 0,
    paragraphsAdded: 0,
    paragraphsRemoved: 0,
    tablesUpdated: 0,
    chartsUpdated: 0,
    notesUpdated: 0,
    diagramNodesUpdated: 0,
    rtlParagraphsSet: 0,
    autoFitEnabled: 0,
    shapesMirrored: 0,
    writeFailures: 0,
    outcomes: [],
  };
}

/**
 * Writes a translated presentation tree back into the live document it was
 * extracted from. Shapes are joined strictly by shapeId; slides by index.
 */
export class Reconciler {
  private logger: Logger;
  private autoFit: boolean;
  private stats: ReconcileStats = emptyStats();
  private rtl = false;

  constructor(options: ReconcilerOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.autoFit = options.autoFit ?? true;
  }

  reconcile(document: PptxDocument, presentation: Presentation): ReconcileStats {
    this.stats = emptyStats();
    this.rtl = presentation.isRightToLeft;

    const live = document.slides.length;
    const translated = presentation.slides.length;
    if (live !== translated) {
      this.logger.warn(
        `Slide count mismatch: document has ${live}, translation has ${translated}; processing ${Math.min(live, translated)}`
      );
    }
    if (this.rtl) this.logger.info('RTL mode: mirroring layout and setting paragraph direction');

    const count = Math.min(live, translated);
    for (let i = 0; i < count; i++) {
      const handle = document.slides[i];
      this.logger.dim(`Reconciling slide ${handle.slideNumber}/${count}`);
      try {
        this.reconcileSlide(document, handle, presentation.slides[i]);
      } catch (error) {
        this.stats.writeFailures++;
        this.logger.error(`Slide ${handle.slideNumber} could not be reconciled: ${errorMessage(error)}`);
      }
      this.stats.slidesProcessed++;
    }

    this.logger.info(
      `Reconciled ${this.stats.slidesProcessed} slides: ${this.stats.elementsUpdated} elements, ` +
        `${this.stats.textRunsUpdated} runs, ${this.stats.elementsNotFound} not found`
    );
    return this.stats;
  }

  private reconcileSlide(document: PptxDocument, handle: SlideHandle, slide: Slide) {
    const tree = shapeTree(handle);
    if (!tree) throw new Error('slide has no shape tree');

    if (this.rtl) this.mirrorShapes(tree, document.slideWidth);

    for (const element of slide.elements) {
      this.reconcileElement(document, handle, tree, element);
    }

    if (slide.speakerNotes) {
      try {
        const { partName, body } = ensureNotesBody(document, handle);
        this.reconcileTextBody(body, slide.speakerNotes.paragraphs);
        document.markDirty(partName);
        this.stats.notesUpdated++;
      } catch (error) {
        this.stats.writeFailures++;
        this.logger.warn(`Notes of slide ${handle.slideNumber} not written: ${errorMessage(error)}`);
      }
    }

    if (slide.diagramNodes.length > 0) this.reconcileDiagrams(document, handle, slide.diagramNodes);
    document.markDirty(handle.partName);
  }

  /** newLeft = slideWidth - (left + width), top-level shapes only. */
  private mirrorShapes(tree: Element, slideWidth: number) {
    for (const shape of topLevelShapes(tree)) {
      try {
        const off = firstChild(shapeTransform(shape), NS.a, 'off');
        const ext = firstChild(shapeTransform(shape), NS.a, 'ext');
        const left = intAttr(off, 'x');
        const width = intAttr(ext, 'cx');
        if (!off || left === null || width === null) continue;
        off.setAttribute('x', String(slideWidth - (left + width)));
        this.stats.shapesMirrored++;
      } catch (error) {
        this.logger.warn(`Could not mirror shape: ${errorMessage(error)}`);
      }
    }
  }

  private reconcileElement(document: PptxDocument, handle: SlideHandle, tree: Element, element: SlideElement) {
    const outcome: ElementOutcome = { slideNumber: handle.slideNumber, shapeId: element.shapeId, state: 'unvisited' };
    this.stats.outcomes.push(outcome);

    const shape = findShapeById(tree, element.shapeId);
    if (!shape) {
      outcome.state = 'skipped';
      outcome.reason = 'shape not found';
      this.stats.elementsNotFound++;
      this.logger.dim(`Slide ${handle.slideNumber}: no shape with id ${element.shapeId}`);
      return;
    }
    outcome.state = 'located';

    try {
      let written: boolean;
      switch (element.elementType) {
        case 'TextBox':
        case 'AutoShape':
          written = this.reconcileTextShape(shape, element.paragraphs);
          break;
        case 'Table':
          written = this.reconcileTable(shape, element);
          break;
        case 'Chart':
          written = this.reconcileChart(document, handle, shape, element);
          break;
        default:
          written = false;
      }
      outcome.state = written ? 'updated' : 'skipped';
      if (written) this.stats.elementsUpdated++;
      else this.stats.elementsSkipped++;
    } catch (error) {
      outcome.state = 'failed';
      outcome.reason = errorMessage(error);
      this.stats.elementsFailed++;
      this.stats.writeFailures++;
      this.logger.warn(`Slide ${handle.slideNumber}, shape ${element.shapeId}: ${outcome.reason}`);
    }
  }

  private reconcileTextShape(shape: Element, paragraphs: Paragraph[]): boolean {
    let txBody = textBodyOf(shape);
    if (!txBody) {
      if (paragraphs.every((p) => p.runs.every((r) => r.text === ''))) return false;
      txBody = createChild(shape, NS.p, 'p:txBody');
      createChild(txBody, NS.a, 'a:bodyPr');
      createChild(txBody, NS.a, 'a:lstStyle');
    }
    this.reconcileTextBody(txBody, paragraphs);
    return true;
  }

  /** Paragraph-level procedure shared by shapes, table cells and notes. */
  reconcileTextBody(txBody: Element, paragraphs: Paragraph[]) {
    const existing = paragraphsOf(txBody);

    paragraphs.forEach((translated, i) => {
      let p = existing[i];
      if (!p) {
        p = addParagraph(txBody);
        this.stats.paragraphsAdded++;
      }
      this.reconcileRuns(p, translated.runs);
      if (this.rtl) {
        setParagraphRtl(p);
        this.stats.rtlParagraphsSet++;
      }
    });

    if (paragraphs.length === 0 && existing.length > 0) {
      this.reconcileRuns(existing[0], []);
    }
    const extra = existing.slice(Math.max(paragraphs.length, 1));
    extra.forEach(removeElement);
    this.stats.paragraphsRemoved += extra.length;

    if (this.autoFit) {
      try {
        enableAutoFit(txBody);
        this.stats.autoFitEnabled++;
      } catch (error) {
        this.stats.writeFailures++;
        this.logger.warn(`Could not enable auto-fit: ${errorMessage(error)}`);
      }
    }
  }

  /**
   * N == M: texts are written in place and every run keeps its formatting.
   * N != M: the first run is kept and rewritten, the rest are dropped, and each
   * further translated run is appended with only bold, italic and size.
   */
  private reconcileRuns(p: Element, translated: TextRun[]) {
    const runs = runsOf(p);

    if (runs.length === translated.length) {
      runs.forEach((r, i) => {
        setRunText(r, translated[i].text);
        this.stats.textRunsUpdated++;
      });
      return;
    }

    this.stats.runCountMismatches++;
    runs.slice(1).forEach(removeElement);
    const [first, ...rest] = translated;
    if (runs[0]) {
      setRunText(runs[0], first?.text ?? '');
    } else if (first) {
      addRun(p, first.text, first);
    }
    if (first) this.stats.textRunsUpdated++;

    for (const run of rest) {
      addRun(p, run.text, run);
      this.stats.textRunsUpdated++;
    }
  }

  private reconcileTable(shape: Element, element: TableElement): boolean {
    const tbl = firstChild(graphicData(shape), NS.a, 'tbl');
    if (!tbl) throw new Error('shape has no table');
    const rows = childElements(tbl, NS.a, 'tr');

    for (const cell of element.table.cells) {
      const tr = rows[cell.row];
      const tc = tr ? childElements(tr, NS.a, 'tc')[cell.column] : undefined;
      if (!tc) {
        this.stats.writeFailures++;
        this.logger.warn(`Table ${element.shapeId}: no cell at (${cell.row}, ${cell.column})`);
        continue;
      }
      const txBody = firstChild(tc, NS.a, 'txBody') ?? createChild(tc, NS.a, 'a:txBody', tc.firstChild);
      this.reconcileTextBody(txBody, cell.paragraphs);
    }
    this.stats.tablesUpdated++;
    return true;
  }

  private reconcileChart(document: PptxDocument, handle: SlideHandle, shape: Element, element: ChartElement): boolean {
    const rId = relId(firstChild(graphicData(shape), NS.c, 'chart'));
    const rel = rId ? document.relationshipTarget(handle.partName, rId) : null;
    const doc = rel ? document.getPart(rel.target) : null;
    const chart = doc ? chartRoot(doc) : null;
    if (!rel || !chart) throw new Error('chart part could not be resolved');

    const { title, seriesNames, axisTitles, dataLabels } = element.chart;
    const write = (label: string, action: () => void) => {
      try {
        action();
      } catch (error) {
        this.stats.writeFailures++;
        this.logger.warn(`Chart ${element.shapeId}: ${label} not written: ${errorMessage(error)}`);
      }
    };

    const titleEl = chartTitleElement(chart);
    if (title !== null && titleEl) {
      write('title', () => this.finishRichText(writeHolderText(titleEl, title)));
    }

    const series = seriesElements(chart);
    seriesNames.forEach((name, i) => {
      const tx = firstChild(series[i] ?? null, NS.c, 'tx');
      if (tx) write(`series ${i + 1} name`, () => writeHolderText(tx, name));
    });

    for (const axis of ['category', 'value', 'series'] as const) {
      const text = axisTitles[axis];
      const axisTitle = axisTitleElement(chart, axis);
      if (text !== null && axisTitle) {
        write(`${axis} axis title`, () => this.finishRichText(writeHolderText(axisTitle, text)));
      }
    }

    const labels = dataLabelElements(chart);
    for (const label of dataLabels) {
      const live = labels.find((l) => l.seriesIndex === label.seriesIndex && l.pointIndex === label.pointIndex);
      if (live) write('data label', () => writeHolderText(live.label, label.text));
    }

    document.markDirty(rel.target);
    this.stats.chartsUpdated++;
    return true;
  }

  private finishRichText(rich: Element | null) {
    if (!rich) return;
    if (this.rtl) {
      for (const p of paragraphsOf(rich)) {
        setParagraphRtl(p);
        this.stats.rtlParagraphsSet++;
      }
    }
    if (this.autoFit) {
      enableAutoFit(rich);
      this.stats.autoFitEnabled++;
    }
  }

  private reconcileDiagrams(document: PptxDocument, handle: SlideHandle, nodes: DiagramNode[]) {
    const ownData = new Set(document.relationshipsOfType(handle.partName, REL_TYPES.diagramData).map((r) => r.target));
    const drawings = document
      .relationshipsOfType(handle.partName, REL_TYPES.diagramDrawing)
      .map((r) => ({ partName: r.target, doc: document.getPart(r.target) }));

    for (const node of nodes) {
      const data = document.getPart(node.partName);
      if (!data) {
        this.stats.writeFailures++;
        this.logger.warn(`Diagram part ${node.partName} not found`);
        continue;
      }
      try {
        if (!writeDiagramNodeText(data, node.nodeId, node.text)) {
          this.logger.dim(`Diagram node ${node.nodeId} not found in ${node.partName}`);
          continue;
        }
        document.markDirty(node.partName);
        this.stats.diagramNodesUpdated++;

        if (!ownData.has(node.partName)) continue;
        const ids = presentationPointIds(data, node.nodeId);
        for (const drawing of drawings) {
          if (drawing.doc && writeDrawingText(drawing.doc, ids, node.text) > 0) {
            document.markDirty(drawing.partName);
          }
        }
      } catch (error) {
        this.stats.writeFailures++;
        this.logger.warn(`Diagram node ${node.nodeId}: ${errorMessage(error)}`);
      }
    }
  }
}

export function reconcile(document: PptxDocument, presentation: Presentation, options?: ReconcilerOptions): ReconcileStats {
  return new Reconciler(options).reconcile(document, presentation);
}
