import { basename, extname, join } from "node:path";
import type { AppConfig, LanguageInfo } from "./config.ts";
import { glossaryFor } from "./config.ts";
import { extract } from "./extractor.ts";
import { DEFAULT_MAX_ATTEMPTS, translateSlideWithRetry } from "./qualityGate.ts";
import type { ReconcileStats } from "./reconciler.ts";
import { reconcile } from "./reconciler.ts";
import type { TextTranslator } from "./translation.ts";
import { DeepLTranslator } from "./translators/deepl.ts";
import type { Presentation, Slide } from "./types.ts";
import { PipelineAbortedError, UsageError } from "./utils/errors.ts";
import {
  derivedPath,
  readPptxFile,
  readPresentationJson,
  writeOutputFile,
  writePresentationJson,
} from "./utils/fileOperations.ts";
import { validatePptxFile } from "./utils/fileValidation.ts";
import type { Logger } from "./utils/logger.ts";
import { silentLogger } from "./utils/logger.ts";
import { PptxDocument } from "./utils/pptxDocument.ts";
import { buildRecordWorkbook, workbookToBuffer } from "./utils/translationRecord.ts";

export interface SlideReport {
  slideNumber: number;
  attempts: number;
  untranslatedCount: number;
  translated: boolean;
}

export interface TranslateOptions {
  target: LanguageInfo;
  maxAttempts?: number;
  retryDelayMs?: number;
  concurrency?: number;
  ignoreNonTranslatable?: boolean;
  signal?: AbortSignal;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

export interface TranslatedPresentation {
  presentation: Presentation;
  reports: SlideReport[];
}

export function createTranslator(
  config: AppConfig,
  target: LanguageInfo,
  sourceCode: string | null,
  logger: Logger = silentLogger
): DeepLTranslator {
  const { apiKey, ...translator } = config.translator;
  if (!apiKey) {
    throw new UsageError('DEEPL_API_KEY is not set');
  }
  return new DeepLTranslator({
    ...translator,
    apiKey,
    targetLang: target.code,
    sourceLang: sourceCode,
    glossaryId: glossaryFor(config, target.code),
    logger: logger.child('deepl'),
  });
}

function throwIfAborted(signal: AbortSignal | undefined) {
  if (signal?.aborted) throw new PipelineAbortedError();
}

/**
 * Translates every slide through the quality gate. Slides run on a small
 * worker pool; results keep slide order whatever order they finish in.
 */
export async function translatePresentation(
  presentation: Presentation,
  translator: TextTranslator,
  options: TranslateOptions
): Promise<TranslatedPresentation> {
  const logger = options.logger ?? silentLogger;
  const { signal, target } = options;
  const slides = presentation.slides;
  const results: Array<{ slide: Slide; report: SlideReport } | undefined> = new Array(slides.length);

  throwIfAborted(signal);
  logger.info(`Translating ${slides.length} slides to ${target.name} (${target.code})`);

  let cursor = 0;
  const concurrency = Math.max(1, options.concurrency ?? 1);
  const workers = Array.from({ length: Math.min(concurrency, slides.length) }, async () => {
    while (true) {
      if (signal?.aborted) break;
      const i = cursor++;
      if (i >= slides.length) break;
      const slide = slides[i];
      logger.log(`Slide ${slide.slideNumber}/${slides.length}: translating…`, 'dim');
      const result = await translateSlideWithRetry(slide, translator, {
        maxAttempts: options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS,
        retryDelayMs: options.retryDelayMs,
        ignoreNonTranslatable: options.ignoreNonTranslatable,
        logger,
        sleep: options.sleep,
      });
      results[i] = {
        slide: result.slide,
        report: {
          slideNumber: slide.slideNumber,
          attempts: result.attempts,
          untranslatedCount: result.untranslatedCount,
          translated: result.translated,
        },
      };
    }
  });

  await Promise.all(workers);
  throwIfAborted(signal);

  const done = results.filter((r): r is { slide: Slide; report: SlideReport } => r !== undefined);
  const untranslated = done.reduce((sum, r) => sum + r.report.untranslatedCount, 0);
  logger.info(`Translation finished: ${done.length} slides, ${untranslated} texts left untranslated`);

  return {
    presentation: {
      ...presentation,
      slides: done.map((r) => r.slide),
      targetLanguage: target.name,
      targetLanguageTag: target.code,
      isRightToLeft: target.rightToLeft,
    },
    reports: done.map((r) => r.report),
  };
}

export async function openPptx(path: string, logger: Logger = silentLogger): Promise<PptxDocument> {
  await validatePptxFile(path);
  const bytes = await readPptxFile(path);
  return PptxDocument.open(bytes, basename(path), logger);
}

export async function extractFile(inputPath: string, outputPath: string | null, logger: Logger = silentLogger) {
  const document = await openPptx(inputPath, logger);
  const presentation = extract(document, logger.child('extract'));
  const out = outputPath ?? derivedPath(inputPath, '', '.json');
  await writePresentationJson(out, presentation);
  logger.info(`Wrote ${out}`);
  return { presentation, outputPath: out };
}

export async function translateFile(
  inputPath: string,
  outputPath: string | null,
  translator: TextTranslator,
  options: TranslateOptions
) {
  const logger = options.logger ?? silentLogger;
  const source = await readPresentationJson(inputPath);
  const result = await translatePresentation(source, translator, options);
  const out = outputPath ?? derivedPath(inputPath, `_${options.target.code.toLowerCase()}`, '.json');
  await writePresentationJson(out, result.presentation);
  logger.info(`Wrote ${out}`);
  return { ...result, outputPath: out };
}

export async function reassembleFile(
  templatePath: string,
  jsonPath: string,
  outputPath: string | null,
  logger: Logger = silentLogger
): Promise<{ stats: ReconcileStats; outputPath: string }> {
  const presentation = await readPresentationJson(jsonPath);
  const document = await openPptx(templatePath, logger);
  const stats = reconcile(document, presentation, { logger: logger.child('reconcile') });
  const suffix = presentation.targetLanguageTag ? `_${presentation.targetLanguageTag.toLowerCase()}` : '_translated';
  const out = outputPath ?? derivedPath(templatePath, suffix, '.pptx');
  await writeOutputFile(out, await document.save());
  logger.info(`Wrote ${out}`);
  return { stats, outputPath: out };
}

export async function writeRecord(original: Presentation, translated: Presentation, outputPath: string) {
  await writeOutputFile(outputPath, workbookToBuffer(buildRecordWorkbook(original, translated)));
}

export interface FullPipelineOptions extends TranslateOptions {
  outputPath?: string | null;
  /** Directory for the intermediate JSON files; none are written when absent. */
  workDir?: string | null;
  reportPath?: string | null;
}

/** extract → translate → reconcile on one open document. */
export async function runFullPipeline(inputPath: string, translator: TextTranslator, options: FullPipelineOptions) {
  const logger = options.logger ?? silentLogger;
  const document = await openPptx(inputPath, logger);
  const original = extract(document, logger.child('extract'));

  const { presentation, reports } = await translatePresentation(original, translator, options);

  if (options.workDir) {
    const stem = basename(inputPath, extname(inputPath));
    await writePresentationJson(join(options.workDir, `${stem}.json`), original);
    await writePresentationJson(join(options.workDir, `${stem}_${options.target.code.toLowerCase()}.json`), presentation);
  }

  throwIfAborted(options.signal);
  const stats = reconcile(document, presentation, { logger: logger.child('reconcile') });
  const out = options.outputPath ?? derivedPath(inputPath, `_${options.target.code.toLowerCase()}`, '.pptx');
  await writeOutputFile(out, await document.save());
  logger.info(`Wrote ${out}`);

  if (options.reportPath) {
    await writeRecord(original, presentation, options.reportPath);
    logger.info(`Wrote ${options.reportPath}`);
  }

  return { original, presentation, reports, stats, outputPath: out };
}
