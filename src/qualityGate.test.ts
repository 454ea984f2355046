import { describe, expect, it, vi } from "vitest";
import { translateSlideWithRetry } from "./qualityGate.ts";
import type { TextTranslator } from "./translation.ts";
import { slideOf, textElement } from "./testing/slides.ts";
import type { Slide } from "./types.ts";

function runTexts(slide: Slide): string[] {
  return slide.elements.flatMap((el) =>
    el.elementType === 'TextBox' || el.elementType === 'AutoShape' ? el.paragraphs.flatMap((p) => p.runs.map((r) => r.text)) : []
  );
}

/** Translator whose n-th call upper-cases only the first `counts[n]` texts. */
function scriptedTranslator(counts: number[]) {
  let call = 0;
  const translateBatch = vi.fn(async (texts: string[]) => {
    const n = counts[call++] ?? 0;
    return texts.map((text, i) => (i < n ? text.toUpperCase() : text));
  });
  const translator: TextTranslator = { translateBatch };
  return { translator, translateBatch };
}

const threeWords = () => slideOf(1, [textElement(2, [['alpha', 'beta', 'gamma']])]);

describe('translateSlideWithRetry', () => {
  it('counts leaves left identical to their source', async () => {
    const slide = slideOf(1, [textElement(2, [['one', 'two', 'three', 'four', 'five']])]);
    const translator: TextTranslator = {
      translateBatch: async (texts) => texts.map((t) => (t === 'three' ? t : t.toUpperCase())),
    };

    const result = await translateSlideWithRetry(slide, translator, { maxAttempts: 1 });

    expect(result.untranslatedCount).toBe(1);
    expect(result.attempts).toBe(1);
    expect(result.translated).toBe(true);
  });

  it('counts an unchanged number and keeps retrying', async () => {
    const slide = slideOf(1, [textElement(2, [['one', 'two', '2024', 'four', 'five']])]);
    const translateBatch = vi.fn(async (texts: string[]) => texts.map((t) => (t === '2024' ? t : t.toUpperCase())));
    const sleep = vi.fn(async () => undefined);

    const result = await translateSlideWithRetry(slide, { translateBatch }, { maxAttempts: 3, sleep });

    expect(result.untranslatedCount).toBe(1);
    expect(result.attempts).toBe(3);
    expect(translateBatch).toHaveBeenCalledTimes(3);
    expect(runTexts(result.slide)).toEqual(['ONE', 'TWO', '2024', 'FOUR', 'FIVE']);
  });

  it('does not count empty or whitespace-only runs', async () => {
    const slide = slideOf(1, [textElement(2, [['', 'Hello', '  ']])]);
    const translator: TextTranslator = {
      translateBatch: async (texts) => texts.map((t) => (t === 'Hello' ? 'Bonjour' : t)),
    };

    const result = await translateSlideWithRetry(slide, translator, { maxAttempts: 1 });

    expect(result.untranslatedCount).toBe(0);
    expect(runTexts(result.slide)).toEqual(['', 'Bonjour', '  ']);
  });

  it('keeps the attempt with the fewest untranslated leaves', async () => {
    // untranslated per attempt: 3, 1, 2
    const { translator, translateBatch } = scriptedTranslator([0, 2, 1]);
    const sleep = vi.fn(async () => undefined);

    const result = await translateSlideWithRetry(threeWords(), translator, { maxAttempts: 3, retryDelayMs: 5, sleep });

    expect(result.untranslatedCount).toBe(1);
    expect(result.attempts).toBe(3);
    expect(runTexts(result.slide)).toEqual(['ALPHA', 'BETA', 'gamma']);
    expect(translateBatch).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[5], [5]]);
  });

  it('keeps the earliest attempt on a tie', async () => {
    const slide = slideOf(1, [textElement(2, [['alpha', 'beta']])]);
    let call = 0;
    const translator: TextTranslator = {
      translateBatch: async (texts) => {
        call++;
        return call === 1 ? [texts[0].toUpperCase(), texts[1]] : [texts[0], texts[1].toUpperCase()];
      },
    };

    const result = await translateSlideWithRetry(slide, translator, { maxAttempts: 2, sleep: async () => undefined });

    expect(result.untranslatedCount).toBe(1);
    expect(runTexts(result.slide)).toEqual(['ALPHA', 'beta']);
  });

  it('stops at the first attempt that translates everything', async () => {
    const { translator, translateBatch } = scriptedTranslator([3, 3, 3]);
    const sleep = vi.fn(async () => undefined);

    const result = await translateSlideWithRetry(threeWords(), translator, { maxAttempts: 3, sleep });

    expect(result.attempts).toBe(1);
    expect(result.untranslatedCount).toBe(0);
    expect(translateBatch).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('returns the source slide when every attempt fails', async () => {
    const slide = threeWords();
    const translator: TextTranslator = {
      translateBatch: async () => {
        throw new Error('backend down');
      },
    };

    const result = await translateSlideWithRetry(slide, translator, { maxAttempts: 2, sleep: async () => undefined });

    expect(result.translated).toBe(false);
    expect(result.attempts).toBe(2);
    expect(result.untranslatedCount).toBe(3);
    expect(result.slide).toEqual(slide);
    expect(result.slide).not.toBe(slide);
  });

  it('treats a wrong number of translations as a failed attempt', async () => {
    const translator: TextTranslator = { translateBatch: async () => ['only one'] };

    const result = await translateSlideWithRetry(threeWords(), translator, { maxAttempts: 1 });

    expect(result.translated).toBe(false);
    expect(runTexts(result.slide)).toEqual(['alpha', 'beta', 'gamma']);
  });
});
