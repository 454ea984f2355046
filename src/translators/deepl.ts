import type { Formality, TranslatorConfig } from "../config.ts";
import type { TextTranslator } from "../translation.ts";
import { TranslationApiError, errorMessage } from "../utils/errors.ts";
import type { Logger } from "../utils/logger.ts";
import { silentLogger } from "../utils/logger.ts";
import { isBlank } from "../utils/text.ts";

export interface DeepLOptions extends Partial<Omit<TranslatorConfig, 'apiKey'>> {
  apiKey: string;
  targetLang: string;
  sourceLang?: string | null;
  formality?: Formality;
  glossaryId?: string | null;
  logger?: Logger;
  fetch?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
}

export interface TranslationStats {
  apiCalls: number;
  textsTranslated: number;
  characters: number;
  batchFallbacks: number;
  failedTexts: number;
  glossaryDisabled: boolean;
}

interface DeepLPayload {
  text: string[];
  target_lang: string;
  source_lang?: string;
  formality?: Formality;
  model_type?: string;
  glossary_id?: string;
}

function parseTranslations(json: unknown): string[] | null {
  if (typeof json !== 'object' || json === null || !('translations' in json)) return null;
  const { translations } = json;
  if (!Array.isArray(translations)) return null;
  const out: string[] = [];
  for (const item of translations) {
    if (typeof item !== 'object' || item === null || !('text' in item) || typeof item.text !== 'string') {
      return null;
    }
    out.push(item.text);
  }
  return out;
}

function apiMessage(json: unknown, fallback: string): string {
  if (typeof json === 'object' && json !== null && 'message' in json && typeof json.message === 'string') {
    return json.message;
  }
  return fallback;
}

/** A 4xx other than 429: the same request will fail again. */
function isClientError(error: unknown): boolean {
  if (!(error instanceof TranslationApiError) || error.status === undefined) return false;
  return error.status >= 400 && error.status < 500 && error.status !== 429;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * DeepL-compatible HTTP backend. Batches go out whole with bounded retries;
 * a batch that keeps failing is translated item by item, and an item that
 * keeps failing comes back as its source text.
 */
export class DeepLTranslator implements TextTranslator {
  readonly stats: TranslationStats = {
    apiCalls: 0,
    textsTranslated: 0,
    characters: 0,
    batchFallbacks: 0,
    failedTexts: 0,
    glossaryDisabled: false,
  };

  private options: Required<Omit<DeepLOptions, 'sourceLang' | 'glossaryId' | 'modelType'>> & {
    sourceLang: string | null;
    glossaryId: string | null;
    modelType: string | null;
  };

  constructor(options: DeepLOptions) {
    if (!options.apiKey) {
      throw new TranslationApiError('DEEPL_API_KEY is not set');
    }
    this.options = {
      endpoint: 'https://api.deepl.com/v2/translate',
      formality: 'prefer_more',
      timeoutMs: 60000,
      batchSize: 50,
      requestAttempts: 3,
      requestBaseDelayMs: 2000,
      rateLimitDelayMs: 10000,
      logger: silentLogger,
      fetch: globalThis.fetch,
      sleep: defaultSleep,
      ...options,
      sourceLang: options.sourceLang ?? null,
      glossaryId: options.glossaryId ?? null,
      modelType: options.modelType ?? null,
    };
  }

  async translateBatch(texts: string[]): Promise<string[]> {
    const result = texts.slice();
    const pending = texts.map((text, index) => ({ text, index })).filter((item) => !isBlank(item.text));
    if (pending.length === 0) return result;

    const { batchSize, logger } = this.options;
    for (let start = 0; start < pending.length; start += batchSize) {
      const chunk = pending.slice(start, start + batchSize);
      logger.dim(`DeepL: batch ${Math.floor(start / batchSize) + 1}/${Math.ceil(pending.length / batchSize)} (${chunk.length} texts)`);
      const translated = await this.translateChunk(chunk.map((item) => item.text));
      chunk.forEach((item, i) => {
        result[item.index] = translated[i];
      });
    }
    return result;
  }

  private async translateChunk(texts: string[]): Promise<string[]> {
    const { requestAttempts, requestBaseDelayMs, logger, sleep } = this.options;
    let lastError: unknown = null;

    for (let attempt = 0; attempt < requestAttempts; attempt++) {
      try {
        return await this.request(texts);
      } catch (error) {
        lastError = error;
        logger.warn(`DeepL batch attempt ${attempt + 1}/${requestAttempts} failed: ${errorMessage(error)}`);
        if (isClientError(error)) break;
        if (attempt < requestAttempts - 1) await sleep(requestBaseDelayMs * 2 ** attempt);
      }
    }

    this.stats.batchFallbacks++;
    logger.warn(`DeepL batch failed (${errorMessage(lastError)}), translating ${texts.length} texts one by one`);
    const out: string[] = [];
    for (const text of texts) {
      out.push(await this.translateSingle(text));
    }
    return out;
  }

  private async translateSingle(text: string): Promise<string> {
    const { requestAttempts, requestBaseDelayMs, rateLimitDelayMs, logger, sleep } = this.options;

    for (let attempt = 0; attempt < requestAttempts; attempt++) {
      try {
        const [translated] = await this.request([text]);
        return translated;
      } catch (error) {
        const status = error instanceof TranslationApiError ? error.status : undefined;
        const retryable = status === undefined || status === 429 || status >= 500;
        if (!retryable || attempt === requestAttempts - 1) {
          logger.error(`DeepL could not translate "${text.slice(0, 40)}": ${errorMessage(error)}`);
          break;
        }
        await sleep(status === 429 ? rateLimitDelayMs * 2 ** attempt : requestBaseDelayMs * 2 ** (attempt + 1));
      }
    }

    this.stats.failedTexts++;
    return text;
  }

  private async request(texts: string[], withGlossary = true): Promise<string[]> {
    const { apiKey, endpoint, targetLang, sourceLang, formality, modelType, glossaryId, timeoutMs, logger } =
      this.options;
    const useGlossary = withGlossary && glossaryId !== null && !this.stats.glossaryDisabled;

    const payload: DeepLPayload = { text: texts, target_lang: targetLang, formality };
    if (sourceLang) payload.source_lang = sourceLang;
    if (modelType) payload.model_type = modelType;
    if (useGlossary && glossaryId) payload.glossary_id = glossaryId;

    this.stats.apiCalls++;
    let res: Response;
    try {
      res = await this.options.fetch(endpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `DeepL-Auth-Key ${apiKey}`,
        },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (error) {
      throw new TranslationApiError(`DeepL request failed: ${errorMessage(error)}`, undefined, error);
    }

    const json: unknown = await res.json().catch(() => null);
    if (!res.ok) {
      const message = apiMessage(json, `DeepL responded ${res.status}`);
      if (res.status === 400 && useGlossary && /glossary/i.test(message)) {
        this.stats.glossaryDisabled = true;
        logger.warn(`Glossary ${glossaryId} rejected (${message}); continuing without it`);
        return this.request(texts, false);
      }
      throw new TranslationApiError(message, res.status, json);
    }

    const translations = parseTranslations(json);
    if (!translations) {
      throw new TranslationApiError('DeepL response has no translations', res.status, json);
    }
    if (translations.length !== texts.length) {
      throw new TranslationApiError(
        `DeepL returned ${translations.length} translations for ${texts.length} texts`,
        res.status,
        json
      );
    }

    this.stats.textsTranslated += texts.length;
    this.stats.characters += texts.reduce((sum, t) => sum + t.length, 0);
    return translations;
  }
}
