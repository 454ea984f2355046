import * as XLSX from "xlsx";
import type { ColorSpec, Presentation, SlideElement } from "../types.ts";
import type { LeafKind, TextLeaf } from "../translation.ts";
import { collectLeaves } from "../translation.ts";
import { isBlank, sanitizeCellText } from "./text.ts";

const EMU_PER_INCH = 914400;

export const RECORD_COLUMNS = [
  'Record ID',
  'Slide Number',
  'Element Type',
  'Element Name',
  'Location',
  'Original Text',
  'Translated Text',
  'Char Count Original',
  'Char Count Translated',
  'Length Change %',
  'Font Name',
  'Font Size',
  'Bold',
  'Italic',
  'Underline',
  'Font Color',
  'Text Alignment',
  'Is Bulleted',
  'Bullet Type',
  'Placeholder Type',
  'Shape Width',
  'Shape Height',
  'Background Color',
  'Has Shadow',
  'Text Direction',
  'Notes',
] as const;

type RecordValue = string | number;
export type TranslationRecordRow = Record<(typeof RECORD_COLUMNS)[number], RecordValue>;

const KIND_LABELS: Record<LeafKind, string> = {
  run: 'Text',
  tableCell: 'Table Cell',
  chartTitle: 'Chart Title',
  seriesName: 'Chart Series',
  axisTitle: 'Chart Axis Title',
  dataLabel: 'Chart Data Label',
  notes: 'Speaker Notes',
  diagramNode: 'Diagram Node',
};

function inches(emu: number): string {
  return `${(emu / EMU_PER_INCH).toFixed(2)} in`;
}

function colorLabel(color: ColorSpec | null): string {
  if (!color) return '';
  return color.rgb ? `#${color.rgb}` : color.themeColor ?? '';
}

function yesNo(value: boolean | null): string {
  if (value === null) return '';
  return value ? 'Yes' : 'No';
}

function elementTypeLabel(element: SlideElement | null, kind: LeafKind): string {
  if (!element) return KIND_LABELS[kind];
  const base = kind === 'run' ? element.elementType : KIND_LABELS[kind];
  return element.placeholder ? `${base} (Placeholder)` : base;
}

export function lengthChange(original: string, translated: string): number {
  if (original.length === 0) return 0;
  return Math.round(((translated.length - original.length) / original.length) * 1000) / 10;
}

function buildRow(id: number, slideNumber: number, source: TextLeaf, target: TextLeaf): TranslationRecordRow {
  const original = sanitizeCellText(source.get());
  const translated = sanitizeCellText(target.get());
  const { element, run, paragraph } = source;
  const dims = element?.dimensions ?? null;
  const position = dims ? `Top: ${inches(dims.top)}, Left: ${inches(dims.left)}; ` : '';
  const bullet = paragraph?.formatting.bullet ?? null;
  const notes = original === translated ? 'Unchanged' : '';

  return {
    'Record ID': id,
    'Slide Number': slideNumber,
    'Element Type': elementTypeLabel(element, source.kind),
    'Element Name': element ? element.shapeName : '',
    'Location': `${position}${source.location}`,
    'Original Text': original,
    'Translated Text': translated,
    'Char Count Original': original.length,
    'Char Count Translated': translated.length,
    'Length Change %': lengthChange(original, translated),
    'Font Name': run?.fontName ?? '',
    'Font Size': run?.fontSizePt ?? '',
    'Bold': yesNo(run?.bold ?? null),
    'Italic': yesNo(run?.italic ?? null),
    'Underline': run?.underline && run.underline !== 'none' ? 'Yes' : run ? 'No' : '',
    'Font Color': colorLabel(run?.color ?? null),
    'Text Alignment': paragraph?.formatting.alignment ?? '',
    'Is Bulleted': paragraph ? yesNo(bullet !== null && bullet.type !== 'none') : '',
    'Bullet Type': bullet?.type ?? '',
    'Placeholder Type': element?.placeholder?.type ?? '',
    'Shape Width': dims ? inches(dims.width) : '',
    'Shape Height': dims ? inches(dims.height) : '',
    'Background Color': colorLabel(element?.fill?.color ?? null),
    'Has Shadow': element ? yesNo(element.shadow !== null) : '',
    'Text Direction': paragraph?.formatting.textDirection ?? '',
    'Notes': notes,
  };
}

/** One row per non-blank translated leaf, pairing source and translation by leaf order. */
export function buildTranslationRecords(original: Presentation, translated: Presentation): TranslationRecordRow[] {
  const rows: TranslationRecordRow[] = [];
  const count = Math.min(original.slides.length, translated.slides.length);

  for (let i = 0; i < count; i++) {
    const sourceLeaves = collectLeaves(original.slides[i]);
    const targetLeaves = collectLeaves(translated.slides[i]);
    sourceLeaves.forEach((leaf, j) => {
      const target = targetLeaves[j];
      if (!target || isBlank(leaf.get())) return;
      rows.push(buildRow(rows.length + 1, original.slides[i].slideNumber, leaf, target));
    });
  }
  return rows;
}

export function summaryRows(original: Presentation, translated: Presentation, rows: TranslationRecordRow[]): RecordValue[][] {
  const countType = (label: string) => rows.filter((row) => String(row['Element Type']).startsWith(label)).length;
  return [
    ['Translation Record Summary', ''],
    ['', ''],
    ['Generation Date:', new Date().toISOString()],
    ['Source:', original.name],
    ['Target Language:', translated.targetLanguage ?? ''],
    ['Language Code:', translated.targetLanguageTag ?? ''],
    ['RTL Mode:', translated.isRightToLeft ? 'Yes' : 'No'],
    ['Total Slides:', original.totalSlides],
    ['', ''],
    ['Statistics:', ''],
    ['  Total Records:', rows.length],
    ['  Unchanged:', rows.filter((row) => row['Notes'] === 'Unchanged').length],
    ['  Table Cells:', countType('Table Cell')],
    ['  Chart Elements:', countType('Chart')],
    ['  Diagram Nodes:', countType('Diagram Node')],
    ['  Speaker Notes:', countType('Speaker Notes')],
  ];
}

export function buildRecordWorkbook(original: Presentation, translated: Presentation): XLSX.WorkBook {
  const rows = buildTranslationRecords(original, translated);
  const workbook = XLSX.utils.book_new();

  const records = XLSX.utils.json_to_sheet(rows, { header: [...RECORD_COLUMNS] });
  records['!cols'] = RECORD_COLUMNS.map((name) => ({
    wch: name === 'Original Text' || name === 'Translated Text' ? 50 : Math.max(10, name.length + 2),
  }));
  XLSX.utils.book_append_sheet(workbook, records, 'Translation Record');

  const summary = XLSX.utils.aoa_to_sheet(summaryRows(original, translated, rows));
  summary['!cols'] = [{ wch: 25 }, { wch: 40 }];
  XLSX.utils.book_append_sheet(workbook, summary, 'Summary');
  return workbook;
}

export function workbookToBuffer(workbook: XLSX.WorkBook): Buffer {
  const out: unknown = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
  if (!Buffer.isBuffer(out)) throw new Error('xlsx did not produce a buffer');
  return out;
}
