import { describe, expect, it } from "vitest";
import { collectLeaves, countUntranslated, translateSlide } from "./translation.ts";
import type { TextTranslator } from "./translation.ts";
import { slideOf, tableElement, textElement, textParagraph } from "./testing/slides.ts";
import type { Slide } from "./types.ts";

const upper: TextTranslator = { translateBatch: async (texts) => texts.map((t) => t.toUpperCase()) };

function mixedSlide(): Slide {
  return slideOf(1, [textElement(2, [['Title']]), tableElement(3, [['Cell']])], {
    speakerNotes: { text: 'Note', paragraphs: [textParagraph(['Note'])] },
    diagramNodes: [{ nodeId: 'n1', parentId: null, level: 0, text: 'Node', partName: 'ppt/diagrams/data1.xml' }],
  });
}

describe('collectLeaves', () => {
  it('orders shapes, then notes, then diagram nodes', () => {
    const leaves = collectLeaves(mixedSlide());

    expect(leaves.map((leaf) => [leaf.kind, leaf.get()])).toEqual([
      ['run', 'Title'],
      ['tableCell', 'Cell'],
      ['notes', 'Note'],
      ['diagramNode', 'Node'],
    ]);
    expect(leaves[1].location).toBe('cell (1, 1), paragraph 1, run 1');
  });
});

describe('translateSlide', () => {
  it('keeps the leading and trailing whitespace of each run', async () => {
    const slide = slideOf(1, [textElement(2, [[' Hello ']])]);
    const translator: TextTranslator = { translateBatch: async () => ['Bonjour'] };

    const result = await translateSlide(slide, translator);

    expect(collectLeaves(result)[0].get()).toBe(' Bonjour ');
  });

  it('leaves the source slide untouched and refreshes derived text', async () => {
    const slide = mixedSlide();

    const result = await translateSlide(slide, upper);

    expect(collectLeaves(slide).map((leaf) => leaf.get())).toEqual(['Title', 'Cell', 'Note', 'Node']);
    const [title, table] = result.elements;
    if (title.elementType !== 'TextBox' || table.elementType !== 'Table') throw new Error('unexpected elements');
    expect(title.fullText).toBe('TITLE');
    expect(title.paragraphs[0].text).toBe('TITLE');
    expect(table.table.cells[0].text).toBe('CELL');
    expect(result.speakerNotes?.text).toBe('NOTE');
    expect(result.diagramNodes[0].text).toBe('NODE');
  });

  it('rejects a translator that returns the wrong number of texts', async () => {
    const translator: TextTranslator = { translateBatch: async () => [] };

    await expect(translateSlide(mixedSlide(), translator)).rejects.toThrow('Translator returned 0 texts for 4 inputs');
  });
});

describe('countUntranslated', () => {
  it('counts an unchanged number unless asked to ignore it', async () => {
    const slide = slideOf(1, [textElement(2, [['2024', 'Sales']])]);
    const translated = await translateSlide(slide, upper);

    expect(countUntranslated(slide, translated)).toBe(1);
    expect(countUntranslated(slide, translated, { ignoreNonTranslatable: true })).toBe(0);
  });
});
