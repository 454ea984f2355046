import type { Slide } from "./types.ts";
import type { TextTranslator } from "./translation.ts";
import { cloneSlide, countUntranslated, translateSlide } from "./translation.ts";
import { errorMessage } from "./utils/errors.ts";
import type { Logger } from "./utils/logger.ts";
import { silentLogger } from "./utils/logger.ts";

export interface RetryOptions {
  maxAttempts?: number;
  /** Fixed pause between attempts. */
  retryDelayMs?: number;
  ignoreNonTranslatable?: boolean;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

export interface SlideTranslationResult {
  slide: Slide;
  untranslatedCount: number;
  attempts: number;
  /** False when every attempt threw and the source slide was returned. */
  translated: boolean;
}

export const DEFAULT_MAX_ATTEMPTS = 3;

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Translates a slide up to `maxAttempts` times and keeps the attempt with the
 * fewest untranslated leaves; the earliest attempt wins a tie. Stops as soon
 * as an attempt leaves nothing untranslated.
 */
export async function translateSlideWithRetry(
  slide: Slide,
  translator: TextTranslator,
  options: RetryOptions = {}
): Promise<SlideTranslationResult> {
  const maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
  const retryDelayMs = options.retryDelayMs ?? 1000;
  const logger = options.logger ?? silentLogger;
  const wait = options.sleep ?? sleep;

  let best: { slide: Slide; untranslatedCount: number } | null = null;
  let attempts = 0;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    attempts = attempt;
    try {
      const candidate = await translateSlide(slide, translator);
      const untranslatedCount = countUntranslated(slide, candidate, {
        ignoreNonTranslatable: options.ignoreNonTranslatable,
      });
      logger.dim(`Slide ${slide.slideNumber} attempt ${attempt}: ${untranslatedCount} untranslated`);

      if (!best || untranslatedCount < best.untranslatedCount) {
        best = { slide: candidate, untranslatedCount };
      }
      if (untranslatedCount === 0) break;
    } catch (error) {
      logger.warn(`Slide ${slide.slideNumber} attempt ${attempt} failed: ${errorMessage(error)}`);
    }

    if (attempt < maxAttempts) await wait(retryDelayMs);
  }

  if (!best) {
    logger.error(`Slide ${slide.slideNumber}: all ${maxAttempts} attempts failed, keeping source text`);
    const source = cloneSlide(slide);
    const untranslatedCount = countUntranslated(slide, source, { ignoreNonTranslatable: options.ignoreNonTranslatable });
    return { slide: source, untranslatedCount, attempts, translated: false };
  }
  if (best.untranslatedCount > 0) {
    logger.warn(`Slide ${slide.slideNumber}: ${best.untranslatedCount} texts left untranslated`);
  }
  return { ...best, attempts, translated: true };
}
