import { afterEach, describe, it, expect, vi } from 'vitest';
import { SourceUnavailableError } from '../src/leyning/errors';
import {
  DEFAULT_RETRY,
  HebcalLeyningSource,
  backoffDelay,
  parseReadingSet,
  type RetryPolicy,
} from '../src/leyning/source';
import type { Logger } from '../shared/logger';

const NO_WAIT: RetryPolicy = { attempts: 3, multiplierMs: 0, minDelayMs: 0, maxDelayMs: 0 };

const item = {
  name: { en: 'Shemini' },
  date: '2024-04-06',
  hdate: '27 Nisan 5784',
  fullkriyah: { '1': { k: 'Leviticus', b: '9:1', e: '9:16', v: 16 } },
};

function jsonResponse(body: unknown): Response {
  return new Response(JSON.stringify(body), { status: 200, headers: { 'content-type': 'application/json' } });
}

function recordingLogger(verbose = false) {
  return { verbose, info: vi.fn(), debug: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('backoffDelay', () => {
  it('doubles per attempt inside the clamp', () => {
    expect([1, 2, 3, 4].map((attempt) => backoffDelay(attempt, DEFAULT_RETRY))).toEqual([4000, 4000, 8000, 10000]);
  });
});

describe('parseReadingSet', () => {
  it('keeps valid items and drops the rest', () => {
    const logger = recordingLogger(true);
    const set = parseReadingSet({ items: [item, { name: 'Tazria' }] }, logger);
    expect(set.items.map((i) => i.name.en)).toEqual(['Shemini']);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith(expect.stringMatching(/^Skipping malformed leyning item #1: /));
  });

  it('keeps quiet about dropped items unless verbose', () => {
    const logger = recordingLogger();
    parseReadingSet({ items: [{ date: '2024-04-06' }] }, logger);
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('rejects a payload without an items list', () => {
    expect(() => parseReadingSet({ error: 'bad range' })).toThrow(SourceUnavailableError);
  });
});

describe('HebcalLeyningSource', () => {
  it('asks for JSON over the requested range', () => {
    const source = new HebcalLeyningSource({ baseUrl: 'https://example.test/leyning?i=on' });
    expect(source.buildUrl('2024-03-10', '2024-03-24')).toBe(
      'https://example.test/leyning?i=on&cfg=json&start=2024-03-10&end=2024-03-24',
    );
  });

  it('returns the parsed reading set', async () => {
    const fetchImpl = vi.fn<Parameters<typeof fetch>, ReturnType<typeof fetch>>(async () => jsonResponse({ items: [item] }));
    const source = new HebcalLeyningSource({ baseUrl: 'https://example.test/leyning', fetchImpl, retry: NO_WAIT });

    const set = await source.fetch('2024-04-01', '2024-04-07');
    expect(set.items).toHaveLength(1);
    expect(fetchImpl).toHaveBeenCalledWith(
      'https://example.test/leyning?cfg=json&start=2024-04-01&end=2024-04-07',
      { headers: { accept: 'application/json' } },
    );
  });

  it('retries transient failures', async () => {
    const fetchImpl = vi
      .fn<Parameters<typeof fetch>, ReturnType<typeof fetch>>()
      .mockRejectedValueOnce(new Error('network down'))
      .mockRejectedValueOnce(new Error('network down'))
      .mockImplementation(async () => jsonResponse({ items: [item] }));
    const logger = recordingLogger();
    const source = new HebcalLeyningSource({ baseUrl: 'https://example.test/leyning', fetchImpl, logger, retry: NO_WAIT });

    const set = await source.fetch('2024-04-01', '2024-04-07');
    expect(set.items).toHaveLength(1);
    expect(fetchImpl).toHaveBeenCalledTimes(3);
    expect(logger.warn).toHaveBeenNthCalledWith(1, 'Leyning fetch attempt 1 failed (network down); retrying in 0ms');
  });

  it('gives up after the last attempt', async () => {
    const fetchImpl = vi.fn<Parameters<typeof fetch>, ReturnType<typeof fetch>>(
      async () => new Response('busy', { status: 503, statusText: 'Service Unavailable' }),
    );
    const source = new HebcalLeyningSource({ baseUrl: 'https://example.test/leyning', fetchImpl, retry: NO_WAIT });

    const err = await source.fetch('2024-04-01', '2024-04-07').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(SourceUnavailableError);
    expect(err).toMatchObject({
      attempts: 3,
      message: 'Unable to fetch leyning data after 3 attempts: Hebcal responded 503 Service Unavailable',
    });
    expect(fetchImpl).toHaveBeenCalledTimes(3);
  });

  it('does not retry a response it cannot use', async () => {
    const fetchImpl = vi.fn<Parameters<typeof fetch>, ReturnType<typeof fetch>>(async () => jsonResponse({ nope: true }));
    const source = new HebcalLeyningSource({ baseUrl: 'https://example.test/leyning', fetchImpl, retry: NO_WAIT });

    await expect(source.fetch('2024-04-01', '2024-04-07')).rejects.toThrow('Leyning response did not contain an items list');
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it('falls back to the global fetch', async () => {
    const globalFetch = vi.fn(async () => jsonResponse({ items: [] }));
    vi.stubGlobal('fetch', globalFetch);
    const source = new HebcalLeyningSource({ baseUrl: 'https://example.test/leyning', retry: NO_WAIT });

    await expect(source.fetch('2024-04-01', '2024-04-07')).resolves.toEqual({ items: [] });
    expect(globalFetch).toHaveBeenCalledTimes(1);
  });
});
