import { describe, expect, it, vi } from "vitest";
import { DeepLTranslator } from "./deepl.ts";
import type { DeepLOptions } from "./deepl.ts";
import { TranslationApiError } from "../utils/errors.ts";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requestBody(init?: RequestInit): Record<string, unknown> {
  const body: unknown = JSON.parse(String(init?.body));
  if (!isRecord(body)) throw new Error('request has no JSON body');
  return body;
}

function requestTexts(init?: RequestInit): string[] {
  const { text } = requestBody(init);
  if (!Array.isArray(text)) throw new Error('request has no text');
  return text.map(String);
}

function reply(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function upperReply(init?: RequestInit): Response {
  return reply(200, { translations: requestTexts(init).map((text) => ({ text: text.toUpperCase() })) });
}

function setup(handler: (init?: RequestInit) => Response, overrides: Partial<DeepLOptions> = {}) {
  const fetchMock = vi.fn(async (_input: string | URL | Request, init?: RequestInit) => handler(init));
  const sleep = vi.fn(async (_ms: number) => undefined);
  const translator = new DeepLTranslator({
    apiKey: 'test-secret',
    targetLang: 'FR',
    fetch: fetchMock,
    sleep,
    ...overrides,
  });
  return { translator, fetchMock, sleep };
}

describe('DeepLTranslator', () => {
  it('sends only non-blank texts and keeps blanks in place', async () => {
    const { translator, fetchMock } = setup(upperReply);

    const out = await translator.translateBatch(['', 'Hello', '  ']);

    expect(out).toEqual(['', 'HELLO', '  ']);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(requestTexts(fetchMock.mock.calls[0][1])).toEqual(['Hello']);
  });

  it('makes no request when every text is blank', async () => {
    const { translator, fetchMock } = setup(upperReply);

    expect(await translator.translateBatch(['', ' '])).toEqual(['', ' ']);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('posts the request fields and the auth header', async () => {
    const { translator, fetchMock } = setup(upperReply, { sourceLang: 'EN', modelType: 'prefer_quality_optimized' });

    await translator.translateBatch(['Hello']);

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://api.deepl.com/v2/translate');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({
      'Content-Type': 'application/json',
      Authorization: 'DeepL-Auth-Key test-secret',
    });
    expect(requestBody(init)).toEqual({
      text: ['Hello'],
      target_lang: 'FR',
      source_lang: 'EN',
      formality: 'prefer_more',
      model_type: 'prefer_quality_optimized',
    });
    expect(translator.stats).toMatchObject({ apiCalls: 1, textsTranslated: 1, characters: 5 });
  });

  it('splits work into batches', async () => {
    const { translator, fetchMock } = setup(upperReply, { batchSize: 2 });

    const out = await translator.translateBatch(['a', 'b', 'c', 'd', 'e']);

    expect(out).toEqual(['A', 'B', 'C', 'D', 'E']);
    expect(fetchMock.mock.calls.map(([, init]) => requestTexts(init))).toEqual([['a', 'b'], ['c', 'd'], ['e']]);
  });

  it('drops a rejected glossary and retries without it', async () => {
    const { translator, fetchMock } = setup(
      (init) =>
        'glossary_id' in requestBody(init) ? reply(400, { message: 'Glossary not found' }) : upperReply(init),
      { glossaryId: 'test-glossary' }
    );

    expect(await translator.translateBatch(['Hello'])).toEqual(['HELLO']);
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(requestBody(fetchMock.mock.calls[0][1]).glossary_id).toBe('test-glossary');
    expect(translator.stats.glossaryDisabled).toBe(true);

    await translator.translateBatch(['Again']);
    expect('glossary_id' in requestBody(fetchMock.mock.calls[2][1])).toBe(false);
  });

  it('falls back to single texts when a batch keeps coming back short', async () => {
    const { translator, fetchMock, sleep } = setup((init) =>
      reply(200, { translations: [{ text: requestTexts(init)[0].toUpperCase() }] })
    );

    const out = await translator.translateBatch(['a', 'b']);

    expect(out).toEqual(['A', 'B']);
    expect(fetchMock).toHaveBeenCalledTimes(5);
    expect(sleep.mock.calls).toEqual([[2000], [4000]]);
    expect(translator.stats.batchFallbacks).toBe(1);
    expect(translator.stats.failedTexts).toBe(0);
  });

  it('returns the source text when rate limiting never clears', async () => {
    const { translator, fetchMock, sleep } = setup(() => reply(429, { message: 'Too many requests' }));

    const out = await translator.translateBatch(['Hello']);

    expect(out).toEqual(['Hello']);
    expect(fetchMock).toHaveBeenCalledTimes(6);
    expect(sleep.mock.calls).toEqual([[2000], [4000], [10000], [20000]]);
    expect(translator.stats.failedTexts).toBe(1);
  });

  it('does not retry a single text on a client error', async () => {
    const { translator, fetchMock, sleep } = setup(() => reply(403, { message: 'Forbidden' }));

    expect(await translator.translateBatch(['Hello'])).toEqual(['Hello']);
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('goes straight to single texts when a batch gets a client error', async () => {
    const { translator, fetchMock, sleep } = setup((init) =>
      requestTexts(init).length > 1 ? reply(413, { message: 'Request entity too large' }) : upperReply(init)
    );

    const out = await translator.translateBatch(['a', 'b', 'c']);

    expect(out).toEqual(['A', 'B', 'C']);
    expect(fetchMock.mock.calls.map(([, init]) => requestTexts(init))).toEqual([['a', 'b', 'c'], ['a'], ['b'], ['c']]);
    expect(sleep).not.toHaveBeenCalled();
    expect(translator.stats.batchFallbacks).toBe(1);
  });

  it('requires an API key', () => {
    expect(() => new DeepLTranslator({ apiKey: '', targetLang: 'FR' })).toThrow(TranslationApiError);
  });
});
