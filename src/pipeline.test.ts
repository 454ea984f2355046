import { access, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import * as XLSX from "xlsx";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadConfig, resolveLanguage } from "./config.ts";
import { extract } from "./extractor.ts";
import {
  createTranslator,
  extractFile,
  reassembleFile,
  runFullPipeline,
  translateFile,
  translatePresentation,
} from "./pipeline.ts";
import { buildPptx } from "./testing/pptxBuilder.ts";
import { SAMPLE_DECK } from "./testing/sampleDeck.ts";
import { presentationOf, slideOf, textElement } from "./testing/slides.ts";
import type { TextTranslator } from "./translation.ts";
import { DeepLTranslator } from "./translators/deepl.ts";
import type { Presentation } from "./types.ts";
import { PipelineAbortedError, UsageError } from "./utils/errors.ts";
import { PptxDocument } from "./utils/pptxDocument.ts";

const config = loadConfig({});
const FRENCH = resolveLanguage(config, 'French');
const ARABIC = resolveLanguage(config, 'Arabic');

const upper: TextTranslator = { translateBatch: async (texts) => texts.map((t) => t.toUpperCase()) };

function titleOf(presentation: Presentation, slideIndex = 0): string {
  const [first] = presentation.slides[slideIndex].elements;
  return first.elementType === 'TextBox' || first.elementType === 'AutoShape' ? first.fullText : '';
}

async function reopen(path: string): Promise<Presentation> {
  return extract(await PptxDocument.open(await readFile(path), path));
}

describe('createTranslator', () => {
  it('needs an API key', () => {
    expect(() => createTranslator(config, FRENCH, 'EN')).toThrow(UsageError);
  });

  it('builds a DeepL backend from the configuration', () => {
    const withKey = loadConfig({ DEEPL_API_KEY: 'test-secret' });
    expect(createTranslator(withKey, FRENCH, 'EN')).toBeInstanceOf(DeepLTranslator);
  });
});

describe('translatePresentation', () => {
  it('keeps slide order when slides finish out of order', async () => {
    const finished: string[] = [];
    const translator: TextTranslator = {
      translateBatch: async (texts) => {
        if (texts.includes('slow')) await new Promise((resolve) => setTimeout(resolve, 20));
        finished.push(texts[0]);
        return texts.map((t) => t.toUpperCase());
      },
    };
    const source = presentationOf([slideOf(1, [textElement(2, [['slow']])]), slideOf(2, [textElement(2, [['fast']])])]);

    const { presentation, reports } = await translatePresentation(source, translator, { target: FRENCH, concurrency: 2 });

    expect(finished).toEqual(['fast', 'slow']);
    expect(presentation.slides.map((_, i) => titleOf(presentation, i))).toEqual(['SLOW', 'FAST']);
    expect(reports.map((r) => r.slideNumber)).toEqual([1, 2]);
    expect(presentation).toMatchObject({ targetLanguage: 'French', targetLanguageTag: 'FR', isRightToLeft: false });
    expect(titleOf(source)).toBe('slow');
  });

  it('refuses to start once aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      translatePresentation(presentationOf([slideOf(1, [])]), upper, { target: FRENCH, signal: controller.signal })
    ).rejects.toThrow(PipelineAbortedError);
  });

  it('stops between slides when aborted mid-run', async () => {
    const controller = new AbortController();
    let calls = 0;
    const translator: TextTranslator = {
      translateBatch: async (texts) => {
        calls++;
        controller.abort();
        return texts.map((t) => t.toUpperCase());
      },
    };
    const source = presentationOf([slideOf(1, [textElement(2, [['one']])]), slideOf(2, [textElement(2, [['two']])])]);

    await expect(
      translatePresentation(source, translator, { target: FRENCH, signal: controller.signal })
    ).rejects.toThrow(PipelineAbortedError);
    expect(calls).toBe(1);
  });
});

describe('file pipeline', () => {
  let dir: string;
  let deckPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'pipeline-'));
    deckPath = join(dir, 'deck.pptx');
    await writeFile(deckPath, await buildPptx(SAMPLE_DECK));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('runs extract, translate and reassemble as separate steps', async () => {
    const extracted = await extractFile(deckPath, null);
    expect(extracted.outputPath).toBe(join(dir, 'deck.json'));

    const translated = await translateFile(extracted.outputPath, null, upper, { target: FRENCH, maxAttempts: 1 });
    expect(translated.outputPath).toBe(join(dir, 'deck_fr.json'));
    expect(translated.reports).toHaveLength(2);

    const { stats, outputPath } = await reassembleFile(deckPath, translated.outputPath, null);
    expect(outputPath).toBe(join(dir, 'deck_fr.pptx'));
    expect(stats.elementsNotFound).toBe(0);

    const result = await reopen(outputPath);
    expect(titleOf(result)).toBe('QUARTERLY RESULTS');
    expect(result.slides[0].speakerNotes?.text).toBe('SPEAKER NOTE');
    expect(result.slides[1].diagramNodes.map((n) => n.text)).toEqual(['PLAN', 'BUILD', 'SHIP']);
  });

  it('runs the whole pipeline and writes the optional artifacts', async () => {
    const workDir = join(dir, 'work');
    const reportPath = join(dir, 'record.xlsx');

    const result = await runFullPipeline(deckPath, upper, { target: ARABIC, maxAttempts: 1, workDir, reportPath });

    expect(result.outputPath).toBe(join(dir, 'deck_ar.pptx'));
    expect(result.stats.shapesMirrored).toBeGreaterThan(0);
    await expect(access(join(workDir, 'deck.json'))).resolves.toBeUndefined();
    await expect(access(join(workDir, 'deck_ar.json'))).resolves.toBeUndefined();

    const record = XLSX.read(await readFile(reportPath), { type: 'buffer' });
    expect(record.SheetNames).toEqual(['Translation Record', 'Summary']);

    const output = await reopen(result.outputPath);
    expect(titleOf(output)).toBe('QUARTERLY RESULTS');
  });

  it('rejects a file that is not a deck', async () => {
    await expect(extractFile(join(dir, 'missing.pptx'), null)).rejects.toThrow(/File not found/);
  });
});
