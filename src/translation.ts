import type { SlideElement, Paragraph, Slide, TextRun } from "./types.ts";
import { joinParagraphs } from "./extractor.ts";
import { paragraphText } from "./utils/textBody.ts";
import { isBlank, isNonTranslatable, preserveWhitespace } from "./utils/text.ts";

/**
 * Text substitution contract: `translateBatch` returns exactly one string per
 * input, in order. Blank inputs come back unchanged.
 */
export interface TextTranslator {
  translateBatch(texts: string[]): Promise<string[]>;
}

export type LeafKind =
  | 'run'
  | 'tableCell'
  | 'chartTitle'
  | 'seriesName'
  | 'axisTitle'
  | 'dataLabel'
  | 'notes'
  | 'diagramNode';

export interface TextLeaf {
  kind: LeafKind;
  location: string;
  element: SlideElement | null;
  paragraph: Paragraph | null;
  run: TextRun | null;
  get(): string;
  set(value: string): void;
}

function runLeaves(kind: LeafKind, element: SlideElement | null, paragraphs: Paragraph[], prefix: string): TextLeaf[] {
  return paragraphs.flatMap((paragraph, pi) =>
    paragraph.runs.map((run, ri) => ({
      kind,
      location: `${prefix}paragraph ${pi + 1}, run ${ri + 1}`,
      element,
      paragraph,
      run,
      get: () => run.text,
      set: (value: string) => {
        run.text = value;
      },
    }))
  );
}

function textFieldLeaf(kind: LeafKind, location: string, element: SlideElement | null, holder: { text: string }): TextLeaf {
  return {
    kind,
    location,
    element,
    paragraph: null,
    run: null,
    get: () => holder.text,
    set: (value: string) => {
      holder.text = value;
    },
  };
}

function elementLeaves(element: SlideElement): TextLeaf[] {
  switch (element.elementType) {
    case 'TextBox':
    case 'AutoShape':
      return runLeaves('run', element, element.paragraphs, '');
    case 'Table':
      return element.table.cells.flatMap((cell) =>
        runLeaves('tableCell', element, cell.paragraphs, `cell (${cell.row + 1}, ${cell.column + 1}), `)
      );
    case 'Chart': {
      const { chart } = element;
      const leaves: TextLeaf[] = [];
      if (chart.title !== null) {
        leaves.push({
          kind: 'chartTitle',
          location: 'chart title',
          element,
          paragraph: null,
          run: null,
          get: () => chart.title ?? '',
          set: (value) => {
            chart.title = value;
          },
        });
      }
      chart.seriesNames.forEach((_, i) => {
        leaves.push({
          kind: 'seriesName',
          location: `series ${i + 1} name`,
          element,
          paragraph: null,
          run: null,
          get: () => chart.seriesNames[i],
          set: (value) => {
            chart.seriesNames[i] = value;
          },
        });
      });
      for (const axis of ['category', 'value', 'series'] as const) {
        if (chart.axisTitles[axis] === null) continue;
        leaves.push({
          kind: 'axisTitle',
          location: `${axis} axis title`,
          element,
          paragraph: null,
          run: null,
          get: () => chart.axisTitles[axis] ?? '',
          set: (value) => {
            chart.axisTitles[axis] = value;
          },
        });
      }
      chart.dataLabels.forEach((label) => {
        leaves.push(
          textFieldLeaf('dataLabel', `data label ${label.seriesIndex + 1}.${label.pointIndex + 1}`, element, label)
        );
      });
      return leaves;
    }
    default:
      return [];
  }
}

/** Every translatable leaf of a slide, in a fixed order shared by all attempts. */
export function collectLeaves(slide: Slide): TextLeaf[] {
  const leaves = slide.elements.flatMap(elementLeaves);
  if (slide.speakerNotes) {
    leaves.push(...runLeaves('notes', null, slide.speakerNotes.paragraphs, 'notes '));
  }
  for (const node of slide.diagramNodes) {
    leaves.push(textFieldLeaf('diagramNode', `diagram node ${node.nodeId}`, null, node));
  }
  return leaves;
}

function refreshParagraphs(paragraphs: Paragraph[]) {
  for (const paragraph of paragraphs) {
    paragraph.text = paragraphText(paragraph.runs);
  }
}

/** Recomputes every derived text field after leaf substitution. */
export function refreshDerivedText(slide: Slide) {
  for (const element of slide.elements) {
    if (element.elementType === 'TextBox' || element.elementType === 'AutoShape') {
      refreshParagraphs(element.paragraphs);
      element.fullText = joinParagraphs(element.paragraphs);
    } else if (element.elementType === 'Table') {
      for (const cell of element.table.cells) {
        refreshParagraphs(cell.paragraphs);
        cell.text = joinParagraphs(cell.paragraphs);
      }
    }
  }
  if (slide.speakerNotes) {
    refreshParagraphs(slide.speakerNotes.paragraphs);
    slide.speakerNotes.text = joinParagraphs(slide.speakerNotes.paragraphs);
  }
}

export function cloneSlide(slide: Slide): Slide {
  return structuredClone(slide);
}

/** One translation attempt over a copy of the slide; the source is never mutated. */
export async function translateSlide(slide: Slide, translator: TextTranslator): Promise<Slide> {
  const copy = cloneSlide(slide);
  const leaves = collectLeaves(copy);
  if (leaves.length === 0) return copy;

  const texts = leaves.map((leaf) => leaf.get());
  const translated = await translator.translateBatch(texts);
  if (translated.length !== texts.length) {
    throw new Error(`Translator returned ${translated.length} texts for ${texts.length} inputs`);
  }

  leaves.forEach((leaf, i) => {
    const original = texts[i];
    leaf.set(isBlank(original) ? original : preserveWhitespace(original, translated[i]));
  });
  refreshDerivedText(copy);
  return copy;
}

export interface UntranslatedOptions {
  /** Skip leaves made only of digits and punctuation. Off by default: every unchanged leaf counts. */
  ignoreNonTranslatable?: boolean;
}

export function countUntranslated(source: Slide, translated: Slide, options: UntranslatedOptions = {}): number {
  const ignore = options.ignoreNonTranslatable ?? false;
  const before = collectLeaves(source);
  const after = collectLeaves(translated);
  let count = 0;
  before.forEach((leaf, i) => {
    const original = leaf.get();
    if (isBlank(original)) return;
    if (ignore && isNonTranslatable(original)) return;
    if (after[i]?.get() === original) count++;
  });
  return count;
}
