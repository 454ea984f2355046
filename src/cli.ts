import type { AppConfig, LanguageInfo } from "./config.ts";
import { loadConfig, resolveLanguage } from "./config.ts";
import {
  createTranslator,
  extractFile,
  reassembleFile,
  runFullPipeline,
  translateFile,
  writeRecord,
} from "./pipeline.ts";
import type { SlideReport } from "./pipeline.ts";
import type { ReconcileStats } from "./reconciler.ts";
import type { TextTranslator } from "./translation.ts";
import { UsageError, errorMessage } from "./utils/errors.ts";
import { derivedPath, readPresentationJson, writeOutputFile } from "./utils/fileOperations.ts";
import { Logger } from "./utils/logger.ts";
import { generateMarkdown } from "./utils/markdownGenerator.ts";

export const HELP = `
slide-localizer: translate PowerPoint decks without losing their layout

Commands:
  extract <pptx> [-o json]                         Dump the deck to JSON
  translate <json> -l <lang> [-s <lang>] [-o json] Translate an extracted deck
  reassemble <pptx> <json> [-o pptx]               Write a translated JSON back into the deck
  full-pipeline <pptx> -l <lang> [-s <lang>] [-o pptx] [--report xlsx]
                                                   Extract, translate and reassemble in one go
  report <original.json> <translated.json> [-o xlsx]
                                                   Spreadsheet of every translated text
  summary <json> [-o md]                           Markdown overview of an extracted deck

Options:
  -l, --lang      Target language (name or code, e.g. French or FR)
  -s, --source    Source language code (default: SOURCE_LANGUAGE or EN)
  -o, --output    Output path
  --work-dir      Keep the intermediate JSON files of full-pipeline here
  --report        Translation record path (full-pipeline)
  --help          Show this message

Environment:
  DEEPL_API_KEY, DEEPL_ENDPOINT, DEEPL_FORMALITY, DEEPL_GLOSSARIES,
  TRANSLATION_MAX_ATTEMPTS, TRANSLATION_RETRY_DELAY_MS, TRANSLATION_CONCURRENCY

Examples:
  slide-localizer full-pipeline deck.pptx -l Arabic --report deck_ar.xlsx
  slide-localizer extract deck.pptx -o work/deck.json
`;

export interface ParsedArgs {
  command: string | null;
  positionals: string[];
  lang: string | null;
  source: string | null;
  output: string | null;
  report: string | null;
  workDir: string | null;
  help: boolean;
}

const VALUE_FLAGS: Record<string, 'lang' | 'source' | 'output' | 'report' | 'workDir'> = {
  '-l': 'lang',
  '--lang': 'lang',
  '-s': 'source',
  '--source': 'source',
  '-o': 'output',
  '--output': 'output',
  '--report': 'report',
  '--work-dir': 'workDir',
};

export function parseArgs(argv: string[]): ParsedArgs {
  const parsed: ParsedArgs = {
    command: null,
    positionals: [],
    lang: null,
    source: null,
    output: null,
    report: null,
    workDir: null,
    help: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--help' || arg === '-h') {
      parsed.help = true;
      continue;
    }
    const key = VALUE_FLAGS[arg];
    if (key) {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith('-')) {
        throw new UsageError(`${arg} needs a value`);
      }
      parsed[key] = value;
      i++;
      continue;
    }
    if (arg.startsWith('-')) {
      throw new UsageError(`Unknown option ${arg}`);
    }
    if (parsed.command === null) parsed.command = arg;
    else parsed.positionals.push(arg);
  }
  return parsed;
}

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  /** Replaces the DeepL backend, e.g. with an in-process fake. */
  createTranslator?: (config: AppConfig, target: LanguageInfo, sourceCode: string, logger: Logger) => TextTranslator;
  signal?: AbortSignal;
}

function requirePositionals(args: ParsedArgs, count: number, usage: string): string[] {
  if (args.positionals.length < count) throw new UsageError(`Usage: slide-localizer ${usage}`);
  return args.positionals;
}

function requireLang(args: ParsedArgs, config: AppConfig): LanguageInfo {
  if (!args.lang) throw new UsageError('Missing target language (-l <lang>)');
  return resolveLanguage(config, args.lang);
}

function formatStats(stats: ReconcileStats): string {
  return [
    `Reconciled ${stats.slidesProcessed} slides`,
    `  elements updated: ${stats.elementsUpdated}, not found: ${stats.elementsNotFound}, failed: ${stats.elementsFailed}`,
    `  runs updated: ${stats.textRunsUpdated} (${stats.runCountMismatches} run count mismatches)`,
    `  paragraphs added/removed: ${stats.paragraphsAdded}/${stats.paragraphsRemoved}`,
    `  tables: ${stats.tablesUpdated}, charts: ${stats.chartsUpdated}, notes: ${stats.notesUpdated}, diagram nodes: ${stats.diagramNodesUpdated}`,
    `  rtl paragraphs: ${stats.rtlParagraphsSet}, shapes mirrored: ${stats.shapesMirrored}, autofit: ${stats.autoFitEnabled}`,
  ].join('\n');
}

function formatReports(reports: SlideReport[]): string {
  return reports
    .map((r) => `  slide ${r.slideNumber}: ${r.attempts} attempt(s), ${r.untranslatedCount} untranslated${r.translated ? '' : ' (kept source)'}`)
    .join('\n');
}

async function dispatch(args: ParsedArgs, deps: CliDeps, logger: Logger) {
  const config = loadConfig(deps.env ?? process.env);
  const makeTranslator = deps.createTranslator ?? createTranslator;
  const source = (args.source ?? config.sourceLanguage).toUpperCase();
  const translateOptions = (target: LanguageInfo) => ({
    target,
    maxAttempts: config.retry.maxAttempts,
    retryDelayMs: config.retry.retryDelayMs,
    concurrency: config.retry.concurrency,
    signal: deps.signal,
    logger,
  });

  switch (args.command) {
    case 'extract': {
      const [input] = requirePositionals(args, 1, 'extract <pptx> [-o json]');
      const { presentation } = await extractFile(input, args.output, logger);
      logger.info(`Extracted ${presentation.totalSlides} slides`);
      break;
    }

    case 'translate': {
      const [input] = requirePositionals(args, 1, 'translate <json> -l <lang> [-s <lang>] [-o json]');
      const target = requireLang(args, config);
      const translator = makeTranslator(config, target, source, logger);
      const { reports } = await translateFile(input, args.output, translator, translateOptions(target));
      logger.info(`Slide results:\n${formatReports(reports)}`);
      break;
    }

    case 'reassemble': {
      const [template, json] = requirePositionals(args, 2, 'reassemble <pptx> <json> [-o pptx]');
      const { stats } = await reassembleFile(template, json, args.output, logger);
      logger.info(formatStats(stats));
      break;
    }

    case 'full-pipeline': {
      const [input] = requirePositionals(args, 1, 'full-pipeline <pptx> -l <lang> [-s <lang>] [-o pptx] [--report xlsx]');
      const target = requireLang(args, config);
      const translator = makeTranslator(config, target, source, logger);
      const { reports, stats } = await runFullPipeline(input, translator, {
        ...translateOptions(target),
        outputPath: args.output,
        workDir: args.workDir,
        reportPath: args.report,
      });
      logger.info(`Slide results:\n${formatReports(reports)}`);
      logger.info(formatStats(stats));
      break;
    }

    case 'report': {
      const [originalPath, translatedPath] = requirePositionals(args, 2, 'report <original.json> <translated.json> [-o xlsx]');
      const original = await readPresentationJson(originalPath);
      const translated = await readPresentationJson(translatedPath);
      const out = args.output ?? derivedPath(translatedPath, '_record', '.xlsx');
      await writeRecord(original, translated, out);
      logger.info(`Wrote ${out}`);
      break;
    }

    case 'summary': {
      const [input] = requirePositionals(args, 1, 'summary <json> [-o md]');
      const presentation = await readPresentationJson(input);
      const out = args.output ?? derivedPath(input, '', '.md');
      await writeOutputFile(out, generateMarkdown(presentation));
      logger.info(`Wrote ${out}`);
      break;
    }

    default:
      throw new UsageError(`Unknown command '${args.command ?? ''}'. Run with --help for usage.`);
  }
}

/** Runs one command and resolves to the process exit code. */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const logger = deps.logger ?? new Logger();

  let args: ParsedArgs;
  try {
    args = parseArgs(argv);
  } catch (error) {
    logger.error(errorMessage(error));
    return 1;
  }

  if (args.help || args.command === null) {
    logger.info(HELP);
    return args.help ? 0 : 1;
  }

  try {
    await dispatch(args, deps, logger);
    return 0;
  } catch (error) {
    logger.error(`${args.command} failed: ${errorMessage(error)}`);
    return 1;
  }
}

/** Entry point of the bin script: wires SIGINT to cancellation between slides. */
export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const controller = new AbortController();
  const onSigint = () => {
    console.error('Interrupted, stopping after the current slide…');
    controller.abort();
  };
  process.once('SIGINT', onSigint);
  try {
    return await runCli(argv, { signal: controller.signal });
  } finally {
    process.off('SIGINT', onSigint);
  }
}
