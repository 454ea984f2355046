import { access, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { HELP, parseArgs, runCli } from "./cli.ts";
import type { AppConfig, LanguageInfo } from "./config.ts";
import { buildPptx } from "./testing/pptxBuilder.ts";
import { SAMPLE_DECK } from "./testing/sampleDeck.ts";
import type { TextTranslator } from "./translation.ts";
import { Logger } from "./utils/logger.ts";

function capture() {
  const lines: string[] = [];
  const errors: string[] = [];
  const logger = new Logger({
    log: (line) => lines.push(line),
    warn: (line) => lines.push(line),
    error: (line) => errors.push(line),
  });
  return { logger, lines, errors };
}

const upper: TextTranslator = { translateBatch: async (texts) => texts.map((t) => t.toUpperCase()) };

describe('parseArgs', () => {
  it('splits the command, positionals and value flags', () => {
    expect(parseArgs(['reassemble', 'deck.pptx', 'deck_fr.json', '-o', 'out.pptx'])).toEqual({
      command: 'reassemble',
      positionals: ['deck.pptx', 'deck_fr.json'],
      lang: null,
      source: null,
      output: 'out.pptx',
      report: null,
      workDir: null,
      help: false,
    });
    expect(parseArgs(['full-pipeline', 'deck.pptx', '--lang', 'Arabic', '-s', 'en', '--work-dir', 'tmp'])).toMatchObject({
      lang: 'Arabic',
      source: 'en',
      workDir: 'tmp',
    });
  });

  it('rejects unknown options and missing values', () => {
    expect(() => parseArgs(['extract', '--verbose'])).toThrow('Unknown option --verbose');
    expect(() => parseArgs(['extract', 'deck.pptx', '-o'])).toThrow('-o needs a value');
    expect(() => parseArgs(['translate', '-l', '--help'])).toThrow('-l needs a value');
  });
});

describe('runCli', () => {
  it('prints help and succeeds', async () => {
    const { logger, lines } = capture();

    expect(await runCli(['--help'], { logger, env: {} })).toBe(0);
    expect(lines[0].endsWith(HELP)).toBe(true);
  });

  it('fails without a command', async () => {
    const { logger } = capture();
    expect(await runCli([], { logger, env: {} })).toBe(1);
  });

  it('fails on an unknown command', async () => {
    const { logger, errors } = capture();

    expect(await runCli(['bogus'], { logger, env: {} })).toBe(1);
    expect(errors[0]).toMatch(/ bogus failed: Unknown command 'bogus'\. Run with --help for usage\.$/);
  });

  it('fails on a bad flag', async () => {
    const { logger, errors } = capture();

    expect(await runCli(['extract', '-o'], { logger, env: {} })).toBe(1);
    expect(errors[0]).toMatch(/ -o needs a value$/);
  });

  it('needs a target language to translate', async () => {
    const { logger, errors } = capture();

    expect(await runCli(['translate', 'deck.json'], { logger, env: {} })).toBe(1);
    expect(errors[0]).toMatch(/ translate failed: Missing target language \(-l <lang>\)$/);
  });

  it('needs an API key unless a translator is supplied', async () => {
    const { logger, errors } = capture();

    expect(await runCli(['translate', 'deck.json', '-l', 'French'], { logger, env: {} })).toBe(1);
    expect(errors[0]).toMatch(/ translate failed: DEEPL_API_KEY is not set$/);
  });

  describe('with a deck on disk', () => {
    let dir: string;
    let deckPath: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'cli-'));
      deckPath = join(dir, 'deck.pptx');
      await writeFile(deckPath, await buildPptx(SAMPLE_DECK));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('extracts to JSON', async () => {
      const { logger, lines } = capture();

      expect(await runCli(['extract', deckPath], { logger, env: {} })).toBe(0);
      const json: unknown = JSON.parse(await readFile(join(dir, 'deck.json'), 'utf-8'));
      expect(json).toMatchObject({ name: 'deck.pptx', totalSlides: 2 });
      expect(lines.some((line) => line.endsWith(' Extracted 2 slides'))).toBe(true);
    });

    it('runs the full pipeline with the given translator and source language', async () => {
      const { logger } = capture();
      const createTranslator = vi.fn(
        (_config: AppConfig, _target: LanguageInfo, _source: string, _logger: Logger): TextTranslator => upper
      );
      const output = join(dir, 'out.pptx');
      const report = join(dir, 'out.xlsx');

      const code = await runCli(['full-pipeline', deckPath, '-l', 'ar', '-s', 'en', '-o', output, '--report', report], {
        logger,
        env: { TRANSLATION_MAX_ATTEMPTS: '1' },
        createTranslator,
      });

      expect(code).toBe(0);
      expect(createTranslator).toHaveBeenCalledTimes(1);
      const [, target, source] = createTranslator.mock.calls[0];
      expect(target).toEqual({ name: 'Arabic', code: 'AR', rightToLeft: true });
      expect(source).toBe('EN');
      await expect(access(output)).resolves.toBeUndefined();
      await expect(access(report)).resolves.toBeUndefined();
    });

    it('summarizes an extracted deck as markdown', async () => {
      const { logger } = capture();
      await runCli(['extract', deckPath], { logger, env: {} });

      expect(await runCli(['summary', join(dir, 'deck.json')], { logger, env: {} })).toBe(0);
      const markdown = await readFile(join(dir, 'deck.md'), 'utf-8');
      expect(markdown.startsWith('# Presentation Content\n\nSource: deck.pptx\n')).toBe(true);
    });
  });
});
