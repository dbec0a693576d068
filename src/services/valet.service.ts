import type { RatesQuery, RatesResult, SeriesId } from '../types/index.js';
import { LOOKBACK_DAYS, VALET_API_BASE, VALET_TIMEOUT_MS, seriesFor } from '../config/constants.js';
import {
  ParseError,
  ProtocolError,
  RateLimitError,
  TransportError,
} from '../errors.js';
import { valetResponseSchema, describeIssues } from '../schemas/valet.schema.js';
import { assertOrderedRange, subtractDays } from '../utils/dates.js';
import type { ServiceLogger } from '../utils/logger.js';
import { selectObservations } from './selector.service.js';
import type RateLimiterService from './rateLimiter.service.js';
import type { RatesCache } from './redis.service.js';

export interface ValetServiceOptions {
  baseUrl?: string;
  lookbackDays?: number;
  timeoutMs?: number;
  cache?: RatesCache;
  rateLimiter?: RateLimiterService;
}

/**
 * Client for the Bank of Canada Valet observations endpoint.
 *
 * One call per query, no retries: every failure is classified into the error
 * taxonomy of `errors.ts` and propagated.
 */
class ValetService {
  private logger: ServiceLogger;
  private readonly baseUrl: string;
  private readonly lookbackDays: number;
  private readonly timeoutMs: number;
  private readonly cache?: RatesCache;
  private readonly rateLimiter?: RateLimiterService;

  constructor(logger: ServiceLogger, options: ValetServiceOptions = {}) {
    this.logger = logger;
    this.baseUrl = (options.baseUrl ?? VALET_API_BASE).replace(/\/+$/, '');
    this.lookbackDays = options.lookbackDays ?? LOOKBACK_DAYS;
    this.timeoutMs = options.timeoutMs ?? VALET_TIMEOUT_MS;
    this.cache = options.cache;
    this.rateLimiter = options.rateLimiter;
  }

  buildRequestUrl(query: RatesQuery): string {
    const series = seriesFor(query.reverse);
    const params = new URLSearchParams({
      // Reach back far enough to find the preceding business day
      start_date: subtractDays(query.startDate, this.lookbackDays),
    });
    if (query.endDate !== undefined) {
      params.set('end_date', query.endDate);
    }
    return `${this.baseUrl}/observations/${series}/json?${params.toString()}`;
  }

  async fetchObservations(query: RatesQuery): Promise<RatesResult> {
    assertOrderedRange(query.startDate, query.endDate);

    const series = seriesFor(query.reverse);
    const cacheKey = this.cache?.getCacheKey(series, query.startDate, query.endDate);
    if (this.cache && cacheKey) {
      const cached = await this.cache.getRates(cacheKey);
      if (cached) return cached;
    }

    this.checkRateLimit();

    const url = this.buildRequestUrl(query);
    const body = await this.request(url);
    const observations = this.parseObservations(series, body, url);
    this.logger.debug(`Received ${observations.length} observations for ${series}`);

    const result: RatesResult = {
      series,
      startDate: query.startDate,
      endDate: query.endDate,
      observations: selectObservations(observations, query.startDate, query.endDate),
      valetRequestUrl: url,
    };

    if (this.cache && cacheKey && isSettled(result)) {
      await this.cache.setRates(cacheKey, result);
    }
    return result;
  }

  private checkRateLimit(): void {
    if (!this.rateLimiter) return;

    if (this.rateLimiter.isBlocked()) {
      throw new RateLimitError(
        'Temporarily blocked from calling Valet due to rate limiting',
        this.rateLimiter.getBlockedUntil()
      );
    }
    if (!this.rateLimiter.recordRequest()) {
      throw new RateLimitError('Local rate limit exceeded for Valet calls', this.rateLimiter.getBlockedUntil());
    }
  }

  private async request(url: string): Promise<unknown> {
    this.logger.info(`Fetching from Valet: ${url}`);

    let response: Response;
    let rawText: string;
    try {
      response = await fetch(url, {
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      // The timeout signal still applies while the body streams in
      rawText = await response.text();
    } catch (err) {
      this.logger.error({ err }, 'Valet request failed');
      throw new TransportError(`failure while accessing Valet: ${describeCause(err)}`, {
        requestUrl: url,
        cause: err,
      });
    }

    if (!response.ok) {
      this.logger.error(`Valet API error ${response.status}: ${rawText}`);
      throw new ProtocolError(response.status, prettyPrint(rawText), url);
    }

    try {
      return JSON.parse(rawText);
    } catch (err) {
      throw new ParseError(`Valet returned a non-JSON body (${rawText.length} bytes)`, {
        requestUrl: url,
        cause: err,
      });
    }
  }

  private parseObservations(series: SeriesId, body: unknown, url: string) {
    const parsed = valetResponseSchema(series).safeParse(body);
    if (!parsed.success) {
      throw new ParseError(`failed to parse exchange data: ${describeIssues(parsed.error)}`, {
        requestUrl: url,
        cause: parsed.error,
      });
    }
    return parsed.data.observations;
  }
}

/**
 * A result is only worth caching when its last row is the requested right
 * edge itself. Otherwise that day may simply not be published yet.
 */
export function isSettled(result: RatesResult): boolean {
  const last = result.observations[result.observations.length - 1];
  return last !== undefined && last.date >= (result.endDate ?? result.startDate);
}

function describeCause(err: unknown): string {
  if (err instanceof Error) {
    return err.name === 'TimeoutError' ? 'request timed out' : err.message;
  }
  return String(err);
}

/** Pretty-prints a JSON body; anything else is returned as received. */
function prettyPrint(rawText: string): string {
  try {
    return JSON.stringify(JSON.parse(rawText), null, 2);
  } catch {
    return rawText;
  }
}

export default ValetService;
