import * as XLSX from "xlsx";
import { describe, expect, it } from "vitest";
import { presentationOf, slideOf, textElement, textParagraph, textRun } from "../testing/slides.ts";
import { translateSlide } from "../translation.ts";
import {
  RECORD_COLUMNS,
  buildRecordWorkbook,
  buildTranslationRecords,
  lengthChange,
  summaryRows,
  workbookToBuffer,
} from "./translationRecord.ts";

const DICTIONARY: Record<string, string> = { Hello: 'Bonjour' };

async function fixture() {
  const title = textElement(2, [[textRun('Hello', { fontName: 'Arial', fontSizePt: 18, bold: true })], ['']], {
    placeholder: { type: 'title', idx: null },
    dimensions: { left: 914400, top: 457200, width: 1828800, height: 914400, rotation: null },
  });
  const slide = slideOf(1, [title], { speakerNotes: { text: 'Note', paragraphs: [textParagraph(['Note'])] } });
  const original = presentationOf([slide]);
  const translatedSlide = await translateSlide(slide, {
    translateBatch: async (texts) => texts.map((text) => DICTIONARY[text] ?? text),
  });
  const translated = presentationOf([translatedSlide], {
    targetLanguage: 'French',
    targetLanguageTag: 'FR',
  });
  return { original, translated };
}

describe('lengthChange', () => {
  it('is a percentage rounded to one decimal', () => {
    expect(lengthChange('abc', 'abcd')).toBe(33.3);
    expect(lengthChange('abc', '')).toBe(-100);
    expect(lengthChange('', 'x')).toBe(0);
  });
});

describe('buildTranslationRecords', () => {
  it('writes one row per non-blank leaf', async () => {
    const { original, translated } = await fixture();

    const rows = buildTranslationRecords(original, translated);

    expect(rows).toHaveLength(2);
    expect(rows[0]).toEqual({
      'Record ID': 1,
      'Slide Number': 1,
      'Element Type': 'TextBox (Placeholder)',
      'Element Name': 'Shape 2',
      'Location': 'Top: 0.50 in, Left: 1.00 in; paragraph 1, run 1',
      'Original Text': 'Hello',
      'Translated Text': 'Bonjour',
      'Char Count Original': 5,
      'Char Count Translated': 7,
      'Length Change %': 40,
      'Font Name': 'Arial',
      'Font Size': 18,
      'Bold': 'Yes',
      'Italic': '',
      'Underline': 'No',
      'Font Color': '',
      'Text Alignment': '',
      'Is Bulleted': 'No',
      'Bullet Type': '',
      'Placeholder Type': 'title',
      'Shape Width': '2.00 in',
      'Shape Height': '1.00 in',
      'Background Color': '',
      'Has Shadow': 'No',
      'Text Direction': '',
      'Notes': '',
    });
    expect(rows[1]).toMatchObject({
      'Record ID': 2,
      'Element Type': 'Speaker Notes',
      'Element Name': '',
      'Location': 'notes paragraph 1, run 1',
      'Translated Text': 'Note',
      'Has Shadow': '',
      'Notes': 'Unchanged',
    });
  });

  it('strips control characters spreadsheets reject', () => {
    const slide = slideOf(1, [textElement(2, [['A\u0001B']])]);
    const rows = buildTranslationRecords(presentationOf([slide]), presentationOf([slide]));

    expect(rows[0]['Original Text']).toBe('AB');
  });
});

describe('summaryRows', () => {
  it('counts records by kind', async () => {
    const { original, translated } = await fixture();
    const summary = summaryRows(original, translated, buildTranslationRecords(original, translated));
    const value = (label: string) => summary.find(([key]) => key === label)?.[1];

    expect(value('Target Language:')).toBe('French');
    expect(value('Language Code:')).toBe('FR');
    expect(value('RTL Mode:')).toBe('No');
    expect(value('  Total Records:')).toBe(2);
    expect(value('  Unchanged:')).toBe(1);
    expect(value('  Speaker Notes:')).toBe(1);
    expect(value('  Table Cells:')).toBe(0);
  });
});

describe('buildRecordWorkbook', () => {
  it('serializes both sheets to an xlsx buffer', async () => {
    const { original, translated } = await fixture();

    const buffer = workbookToBuffer(buildRecordWorkbook(original, translated));
    const workbook = XLSX.read(buffer, { type: 'buffer' });

    expect(workbook.SheetNames).toEqual(['Translation Record', 'Summary']);
    const [header, first] = XLSX.utils.sheet_to_json<string[]>(workbook.Sheets['Translation Record'], { header: 1 });
    expect(header).toEqual([...RECORD_COLUMNS]);
    expect(first[RECORD_COLUMNS.indexOf('Translated Text')]).toBe('Bonjour');
  });
});
