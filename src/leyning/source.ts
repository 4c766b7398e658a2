import { setTimeout as wait } from 'node:timers/promises';
import { z } from 'zod';
import { SourceUnavailableError, errorMessage } from './errors';
import { LeyningItemSchema, type LeyningItem, type ReadingSet } from './types';
import { silentLogger, type Logger } from '../../shared/logger';

export interface LeyningSource {
  fetch(startDate: string, endDate: string): Promise<ReadingSet>;
}

export interface RetryPolicy {
  attempts: number;
  multiplierMs: number;
  minDelayMs: number;
  maxDelayMs: number;
}

/** 3 tries, waits of 2^n seconds clamped to 4–10s between them. */
export const DEFAULT_RETRY: RetryPolicy = {
  attempts: 3,
  multiplierMs: 1000,
  minDelayMs: 4000,
  maxDelayMs: 10000,
};

export function backoffDelay(attempt: number, policy: RetryPolicy): number {
  const raw = policy.multiplierMs * 2 ** attempt;
  return Math.min(policy.maxDelayMs, Math.max(policy.minDelayMs, raw));
}

const ReadingSetEnvelopeSchema = z.object({ items: z.array(z.unknown()) }).passthrough();

/**
 * Keeps every item that carries a name, date and Hebrew date; anything else is
 * reported and dropped so the rest of the range still renders.
 */
export function parseReadingSet(payload: unknown, logger: Logger = silentLogger): ReadingSet {
  const envelope = ReadingSetEnvelopeSchema.safeParse(payload);
  if (!envelope.success) {
    throw new SourceUnavailableError('Leyning response did not contain an items list', 1, envelope.error);
  }
  const items: LeyningItem[] = [];
  envelope.data.items.forEach((raw, index) => {
    const parsed = LeyningItemSchema.safeParse(raw);
    if (parsed.success) {
      items.push(parsed.data);
    } else if (logger.verbose) {
      logger.warn(`Skipping malformed leyning item #${index}: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
  });
  return { items };
}

export interface HebcalSourceOptions {
  baseUrl: string;
  retry?: RetryPolicy;
  logger?: Logger;
  fetchImpl?: typeof fetch;
}

export class HebcalLeyningSource implements LeyningSource {
  private readonly baseUrl: string;
  private readonly retry: RetryPolicy;
  private readonly logger: Logger;
  private readonly fetchImpl?: typeof fetch;

  constructor(opts: HebcalSourceOptions) {
    this.baseUrl = opts.baseUrl;
    this.retry = opts.retry ?? DEFAULT_RETRY;
    this.logger = opts.logger ?? silentLogger;
    this.fetchImpl = opts.fetchImpl;
  }

  buildUrl(startDate: string, endDate: string): string {
    const url = new URL(this.baseUrl);
    url.searchParams.set('cfg', 'json');
    url.searchParams.set('start', startDate);
    url.searchParams.set('end', endDate);
    return url.toString();
  }

  private async request(url: string): Promise<unknown> {
    const doFetch = this.fetchImpl ?? fetch;
    const res = await doFetch(url, { headers: { accept: 'application/json' } });
    if (!res.ok) throw new Error(`Hebcal responded ${res.status} ${res.statusText}`);
    return res.json();
  }

  async fetch(startDate: string, endDate: string): Promise<ReadingSet> {
    const url = this.buildUrl(startDate, endDate);
    this.logger.debug(`Fetching data from ${url}`);

    let lastError: unknown;
    for (let attempt = 1; attempt <= this.retry.attempts; attempt++) {
      try {
        const payload = await this.request(url);
        return parseReadingSet(payload, this.logger);
      } catch (err) {
        if (err instanceof SourceUnavailableError) throw err;
        lastError = err;
        if (attempt === this.retry.attempts) break;
        const delay = backoffDelay(attempt, this.retry);
        this.logger.warn(`Leyning fetch attempt ${attempt} failed (${errorMessage(err)}); retrying in ${delay}ms`);
        await wait(delay);
      }
    }

    throw new SourceUnavailableError(
      `Unable to fetch leyning data after ${this.retry.attempts} attempts: ${errorMessage(lastError)}`,
      this.retry.attempts,
      lastError,
    );
  }
}
