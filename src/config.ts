import languageTable from "./languages.json";
import { UsageError } from "./utils/errors.ts";

export interface LanguageInfo {
  name: string;
  code: string;
  rightToLeft: boolean;
}

export const FORMALITIES = ['default', 'more', 'less', 'prefer_more', 'prefer_less'] as const;
export type Formality = (typeof FORMALITIES)[number];

export interface TranslatorConfig {
  apiKey: string | null;
  endpoint: string;
  formality: Formality;
  modelType: string | null;
  timeoutMs: number;
  batchSize: number;
  requestAttempts: number;
  requestBaseDelayMs: number;
  rateLimitDelayMs: number;
}

export interface AppConfig {
  readonly translator: Readonly<TranslatorConfig>;
  readonly languages: readonly LanguageInfo[];
  /** Glossary id by target language code. */
  readonly glossaries: Readonly<Record<string, string>>;
  readonly sourceLanguage: string;
  readonly retry: Readonly<{
    maxAttempts: number;
    retryDelayMs: number;
    concurrency: number;
  }>;
}

export const DEFAULT_ENDPOINT = 'https://api.deepl.com/v2/translate';

function readInt(env: NodeJS.ProcessEnv, name: string, fallback: number, min = 0): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new UsageError(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function readFormality(raw: string | undefined): Formality {
  if (!raw) return 'prefer_more';
  const match = FORMALITIES.find((f) => f === raw);
  if (!match) throw new UsageError(`DEEPL_FORMALITY must be one of ${FORMALITIES.join(', ')}`);
  return match;
}

/** Parses `NL=<id>,SV=<id>` into a code-to-id map. */
export function parseGlossaries(raw: string | undefined): Record<string, string> {
  const out: Record<string, string> = {};
  if (!raw) return out;
  for (const entry of raw.split(/[,\n]/)) {
    const idx = entry.indexOf('=');
    if (idx <= 0) continue;
    const code = entry.slice(0, idx).trim().toUpperCase();
    const id = entry.slice(idx + 1).trim();
    if (code && id) out[code] = id;
  }
  return out;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const rtl = new Set(languageTable.rightToLeft);
  const languages = languageTable.languages.map((lang) =>
    Object.freeze({ name: lang.name, code: lang.code, rightToLeft: rtl.has(lang.name) })
  );

  return Object.freeze({
    translator: Object.freeze({
      apiKey: env.DEEPL_API_KEY?.trim() || null,
      endpoint: env.DEEPL_ENDPOINT?.trim() || DEFAULT_ENDPOINT,
      formality: readFormality(env.DEEPL_FORMALITY?.trim()),
      modelType: env.DEEPL_MODEL_TYPE?.trim() || 'prefer_quality_optimized',
      timeoutMs: readInt(env, 'TRANSLATION_TIMEOUT_MS', 60000, 1),
      batchSize: readInt(env, 'TRANSLATION_BATCH_SIZE', 50, 1),
      requestAttempts: readInt(env, 'TRANSLATION_REQUEST_ATTEMPTS', 3, 1),
      requestBaseDelayMs: readInt(env, 'TRANSLATION_BACKOFF_MS', 2000),
      rateLimitDelayMs: readInt(env, 'TRANSLATION_RATE_LIMIT_BACKOFF_MS', 10000),
    }),
    languages: Object.freeze(languages),
    glossaries: Object.freeze(parseGlossaries(env.DEEPL_GLOSSARIES)),
    sourceLanguage: env.SOURCE_LANGUAGE?.trim().toUpperCase() || 'EN',
    retry: Object.freeze({
      maxAttempts: readInt(env, 'TRANSLATION_MAX_ATTEMPTS', 3, 1),
      retryDelayMs: readInt(env, 'TRANSLATION_RETRY_DELAY_MS', 1000),
      concurrency: readInt(env, 'TRANSLATION_CONCURRENCY', 1, 1),
    }),
  });
}

/** Looks a language up by DeepL code or English name, case-insensitively. */
export function resolveLanguage(config: AppConfig, input: string): LanguageInfo {
  const wanted = input.trim().toLowerCase();
  const found = config.languages.find(
    (lang) => lang.code.toLowerCase() === wanted || lang.name.toLowerCase() === wanted
  );
  if (!found) {
    throw new UsageError(
      `Language '${input}' not supported. Supported: ${config.languages.map((l) => l.name).join(', ')}`
    );
  }
  return found;
}

export function glossaryFor(config: AppConfig, code: string): string | null {
  return config.glossaries[code.toUpperCase()] ?? null;
}
