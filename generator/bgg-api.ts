/**
 * BGG XML API Client
 * Handles every BoardGameGeek request with rate limiting and retries.
 *
 * BGG answers expensive queries (collections especially) with HTTP 202 while
 * it builds the result in the background, and throttles bursts with 429.
 * Both are treated as "pending" and polled with exponential backoff.
 *
 * Note: Uses native fetch available in Node.js 18+
 */

import type * as cheerio from 'cheerio';
import { ZodError } from 'zod';
import type { BggEndpoint } from '../src/types/bgg.js';
import { BGG_API_BASE } from '../src/types/bgg.js';
import { GeneratorError, TransportError, describeError } from './errors.js';
import type { PipelineStage, TransportErrorKind } from './errors.js';
import { RateLimiter, defaultSleep } from './rate-limiter.js';
import type { SleepFn } from './rate-limiter.js';
import { XmlShapeError, loadXml } from './bgg-xml.js';
import { logger } from './safe-logger.js';

const USER_AGENT = 'boardgame-graph/1.0';
const MAX_RESPONSE_BYTES = 20 * 1024 * 1024; // 20 MB; large collections with stats are big

export interface BggClientOptions {
  baseUrl?: string;
  apiToken?: string;
  /** Minimum gap between two dispatched requests */
  rateLimitDelayMs: number;
  /** Total tries per request, first one included */
  maxAttempts: number;
  /** Retry n waits `backoffBaseMs * 2^(n-1)` */
  backoffBaseMs: number;
  requestTimeoutMs: number;
  /** Responses larger than this (UTF-8 bytes) count as a failed attempt */
  maxResponseBytes?: number;
  fetchFn?: typeof globalThis.fetch;
  sleep?: SleepFn;
  now?: () => number;
}

/** Parses an XML document into the caller's record type. */
export type DocumentParser<T> = ($: cheerio.CheerioAPI) => T;

export type RequestParams = Record<string, string>;

// ---------------------------------------------------------------------------
// Retry state machine
// ---------------------------------------------------------------------------

type FailureKind = Exclude<TransportErrorKind, 'malformed-response' | 'rate-limit-exceeded'>;

/** Outcome of one HTTP attempt */
type AttemptOutcome =
  | { kind: 'success'; body: string }
  | { kind: 'pending'; status: number }
  | { kind: 'failed'; reason: FailureKind; status?: number; cause?: unknown };

type RetryableOutcome = Exclude<AttemptOutcome, { kind: 'success' }>;

/** Where a request stands between attempts */
export type RequestState<T> =
  | { state: 'pending' }
  | { state: 'retry'; attempt: number; delayMs: number; outcome: RetryableOutcome }
  | { state: 'success'; attempt: number; record: T }
  | { state: 'exhausted'; attempt: number; error: TransportError };

function describeOutcome(outcome: RetryableOutcome): string {
  if (outcome.kind === 'pending') {
    return outcome.status === 202 ? 'BGG is processing the request' : `BGG throttled the request (HTTP ${outcome.status})`;
  }
  if (outcome.status !== undefined) return `HTTP ${outcome.status}`;
  return `${outcome.reason} (${describeError(outcome.cause)})`;
}

export class BggApiClient {
  private readonly baseUrl: string;
  private readonly apiToken?: string;
  private readonly maxAttempts: number;
  private readonly backoffBaseMs: number;
  private readonly requestTimeoutMs: number;
  private readonly maxResponseBytes: number;
  private readonly fetchFn: typeof globalThis.fetch;
  private readonly sleep: SleepFn;
  private readonly rateLimiter: RateLimiter;

  constructor(options: BggClientOptions) {
    this.baseUrl = (options.baseUrl ?? BGG_API_BASE).replace(/\/+$/, '');
    this.apiToken = options.apiToken;
    this.maxAttempts = Math.max(1, options.maxAttempts);
    this.backoffBaseMs = options.backoffBaseMs;
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.maxResponseBytes = options.maxResponseBytes ?? MAX_RESPONSE_BYTES;
    this.fetchFn = options.fetchFn ?? globalThis.fetch;
    this.sleep = options.sleep ?? defaultSleep;
    this.rateLimiter = new RateLimiter({
      minDelayMs: options.rateLimitDelayMs,
      sleep: this.sleep,
      now: options.now,
    });
  }

  buildUrl(endpoint: BggEndpoint, params: RequestParams): string {
    const query = new URLSearchParams(params).toString();
    return `${this.baseUrl}/${endpoint}${query ? `?${query}` : ''}`;
  }

  /** Wait before retry number `attempt` (1-based) */
  backoffDelay(attempt: number): number {
    return this.backoffBaseMs * 2 ** (attempt - 1);
  }

  /**
   * Fetch an endpoint and parse the body.
   * @param stage - pipeline stage the request belongs to, carried on errors
   */
  async request<T>(
    endpoint: BggEndpoint,
    params: RequestParams,
    parse: DocumentParser<T>,
    stage: PipelineStage,
  ): Promise<T> {
    const url = this.buildUrl(endpoint, params);
    let state: RequestState<T> = { state: 'pending' };

    while (state.state === 'pending' || state.state === 'retry') {
      const attempt: number = state.state === 'retry' ? state.attempt + 1 : 1;
      if (state.state === 'retry') {
        logger.info(`[BGG] ${endpoint}: ${describeOutcome(state.outcome)}, retrying in ${(state.delayMs / 1000).toFixed(1)}s (attempt ${attempt}/${this.maxAttempts})`);
        await this.sleep(state.delayMs);
      }

      const outcome = await this.rateLimiter.execute(() => this.attempt(url));
      state = this.nextState(outcome, attempt, url, parse, stage);
    }

    if (state.state === 'exhausted') {
      logger.warn(`[BGG] Giving up on ${url}: ${state.error.message}`);
      throw state.error;
    }
    if (state.attempt > 1) {
      logger.debug(`[BGG] ${endpoint} succeeded on attempt ${state.attempt}`);
    }
    return state.record;
  }

  private nextState<T>(
    outcome: AttemptOutcome,
    attempt: number,
    url: string,
    parse: DocumentParser<T>,
    stage: PipelineStage,
  ): RequestState<T> {
    if (outcome.kind === 'success') {
      return { state: 'success', attempt, record: this.parseBody(outcome.body, url, parse, stage, attempt) };
    }

    if (outcome.kind === 'failed' && outcome.reason === 'rejected') {
      return {
        state: 'exhausted',
        attempt,
        error: new TransportError(stage, 'rejected', `BGG rejected ${url} with HTTP ${outcome.status}`, {
          attempts: attempt,
          status: outcome.status,
        }),
      };
    }

    if (attempt >= this.maxAttempts) {
      const kind: TransportErrorKind = outcome.kind === 'pending' ? 'rate-limit-exceeded' : outcome.reason;
      return {
        state: 'exhausted',
        attempt,
        error: new TransportError(
          stage,
          kind,
          `Request to ${url} failed after ${attempt} attempts: ${describeOutcome(outcome)}`,
          { attempts: attempt, status: outcome.status, cause: outcome.kind === 'failed' ? outcome.cause : undefined },
        ),
      };
    }

    return { state: 'retry', attempt, delayMs: this.backoffDelay(attempt), outcome };
  }

  /** One HTTP round trip with a timeout. Never throws. */
  private async attempt(url: string): Promise<AttemptOutcome> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.requestTimeoutMs);

    try {
      const headers: Record<string, string> = {
        'User-Agent': USER_AGENT,
        'Accept': 'application/xml,text/xml;q=0.9,*/*;q=0.8',
      };
      if (this.apiToken) headers['Authorization'] = `Bearer ${this.apiToken}`;

      const res = await this.fetchFn(url, { headers, signal: controller.signal });

      // Unread bodies hold the connection open
      if (res.status === 202 || res.status === 429) {
        await res.body?.cancel();
        return { kind: 'pending', status: res.status };
      }
      if (res.status >= 500) {
        await res.body?.cancel();
        return { kind: 'failed', reason: 'connection-failed', status: res.status };
      }
      if (!res.ok) {
        await res.body?.cancel();
        return { kind: 'failed', reason: 'rejected', status: res.status };
      }

      const body = await res.text();
      if (Buffer.byteLength(body, 'utf-8') > this.maxResponseBytes) {
        return { kind: 'failed', reason: 'connection-failed', cause: new Error(`Response exceeded ${this.maxResponseBytes} bytes limit`) };
      }
      return { kind: 'success', body };
    } catch (error) {
      if (controller.signal.aborted) {
        return { kind: 'failed', reason: 'timeout', cause: error };
      }
      return { kind: 'failed', reason: 'connection-failed', cause: error };
    } finally {
      clearTimeout(timer);
    }
  }

  private parseBody<T>(body: string, url: string, parse: DocumentParser<T>, stage: PipelineStage, attempt: number): T {
    try {
      return parse(loadXml(body));
    } catch (error) {
      if (error instanceof GeneratorError) throw error;
      if (error instanceof XmlShapeError || error instanceof ZodError) {
        throw new TransportError(stage, 'malformed-response', `Malformed response from ${url}: ${describeMalformed(error)}`, {
          attempts: attempt,
          cause: error,
        });
      }
      throw error;
    }
  }
}

function describeMalformed(error: XmlShapeError | ZodError): string {
  if (error instanceof ZodError) {
    return error.issues.map((issue) => `${issue.path.join('.') || 'record'}: ${issue.message}`).join('; ');
  }
  return error.message;
}
