export type * from "./types.ts";

export { loadConfig, resolveLanguage, glossaryFor, parseGlossaries } from "./config.ts";
export type { AppConfig, Formality, LanguageInfo, TranslatorConfig } from "./config.ts";

export { Extractor, extract } from "./extractor.ts";
export { Reconciler, reconcile, emptyStats } from "./reconciler.ts";
export type { ElementOutcome, ElementState, ReconcileStats, ReconcilerOptions } from "./reconciler.ts";

export { collectLeaves, countUntranslated, translateSlide } from "./translation.ts";
export type { TextLeaf, TextTranslator } from "./translation.ts";
export { translateSlideWithRetry, DEFAULT_MAX_ATTEMPTS } from "./qualityGate.ts";
export type { RetryOptions, SlideTranslationResult } from "./qualityGate.ts";
export { DeepLTranslator } from "./translators/deepl.ts";
export type { DeepLOptions, TranslationStats } from "./translators/deepl.ts";

export {
  createTranslator,
  extractFile,
  openPptx,
  reassembleFile,
  runFullPipeline,
  translateFile,
  translatePresentation,
  writeRecord,
} from "./pipeline.ts";
export type { FullPipelineOptions, SlideReport, TranslateOptions } from "./pipeline.ts";

export { PptxDocument } from "./utils/pptxDocument.ts";
export { Logger, silentLogger } from "./utils/logger.ts";
export { DocumentIOError, PipelineAbortedError, TranslationApiError, UsageError } from "./utils/errors.ts";
export { buildRecordWorkbook, buildTranslationRecords } from "./utils/translationRecord.ts";
export { generateMarkdown } from "./utils/markdownGenerator.ts";
export { isPresentation, readPresentationJson, writePresentationJson } from "./utils/fileOperations.ts";
export { presentationSchema } from "./utils/presentationSchema.ts";
export { runCli } from "./cli.ts";
