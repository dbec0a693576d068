import { Redis } from 'ioredis';
import { z } from 'zod';
import { CACHE_TTL_SECONDS } from '../config/constants.js';
import type { CivilDate, RatesResult, SeriesId } from '../types/index.js';
import type { ServiceLogger } from '../utils/logger.js';
import { CivilDateSchema, DecimalValueSchema } from '../schemas/valet.schema.js';

export const CACHE_KEY_PREFIX = 'boc:';

const CachedRatesSchema = z.object({
  series: z.enum(['FXUSDCAD', 'FXCADUSD']),
  startDate: CivilDateSchema,
  endDate: CivilDateSchema.optional(),
  valetRequestUrl: z.string(),
  observations: z.array(z.object({ date: CivilDateSchema, rate: DecimalValueSchema }))
});

type CachedRates = z.input<typeof CachedRatesSchema>;

/** Read/write surface the Valet client needs from a cache. */
export interface RatesCache {
  getCacheKey(series: SeriesId, startDate: CivilDate, endDate?: CivilDate): string;
  getRates(key: string): Promise<RatesResult | null>;
  setRates(key: string, result: RatesResult): Promise<void>;
}

/** The ioredis commands the cache uses. An ioredis `Redis` instance satisfies it. */
export interface RedisClient {
  get(key: string): Promise<string | null>;
  setex(key: string, seconds: number, value: string): Promise<unknown>;
  ping(): Promise<unknown>;
  keys(pattern: string): Promise<string[]>;
  quit(): Promise<unknown>;
}

class RedisService implements RatesCache {
  private client: RedisClient | null;
  private logger: ServiceLogger;
  private enabled: boolean;

  /**
   * @param redis connection URL, or an already connected client.
   *   Without either the service runs disabled.
   */
  constructor(logger: ServiceLogger, redis: string | RedisClient | undefined = process.env.REDIS_URL) {
    this.logger = logger;
    // Only enable Redis if REDIS_URL is explicitly set in environment
    this.enabled = !!redis;

    if (!redis) {
      this.logger.info('Redis disabled (REDIS_URL not set) - running without cache');
      this.client = null;
      return;
    }

    if (typeof redis !== 'string') {
      this.client = redis;
      return;
    }

    const client = new Redis(redis, {
      retryStrategy(times) {
        if (times > 3) return null; // Stop retrying after 3 attempts
        return Math.min(times * 50, 2000);
      },
      maxRetriesPerRequest: 3,
      lazyConnect: true
    });

    client.on('connect', () => {
      this.logger.info('Redis connected');
    });

    client.on('error', (err: Error) => {
      this.logger.warn({ err }, 'Redis connection error - continuing without cache');
    });

    // Try to connect but don't fail if it doesn't work
    client.connect().catch((err: unknown) => {
      this.logger.warn({ err }, 'Redis unavailable - continuing without cache');
      this.enabled = false;
    });
    this.client = client;
  }

  getCacheKey(series: SeriesId, startDate: CivilDate, endDate?: CivilDate): string {
    return `${CACHE_KEY_PREFIX}observations:${series}:${startDate}:${endDate || 'latest'}`;
  }

  async getRates(key: string): Promise<RatesResult | null> {
    if (!this.enabled || !this.client) return null;

    try {
      const cached = await this.client.get(key);
      if (!cached) return null;

      this.logger.info(`Cache HIT: ${key}`);
      return { ...CachedRatesSchema.parse(JSON.parse(cached)), cached: true };
    } catch (err) {
      this.logger.warn({ err }, 'Redis GET error');
      return null;
    }
  }

  async setRates(key: string, result: RatesResult): Promise<void> {
    if (!this.enabled || !this.client) return;

    const payload: CachedRates = {
      series: result.series,
      startDate: result.startDate,
      endDate: result.endDate,
      valetRequestUrl: result.valetRequestUrl,
      observations: result.observations.map((obs) => ({ date: obs.date, rate: obs.rate.toString() }))
    };

    try {
      await this.client.setex(key, CACHE_TTL_SECONDS, JSON.stringify(payload));
      this.logger.info(`Cache SET: ${key} (TTL: ${CACHE_TTL_SECONDS}s)`);
    } catch (err) {
      this.logger.warn({ err }, 'Redis SET error');
    }
  }

  async ping(): Promise<void> {
    if (!this.enabled || !this.client) return;
    await this.client.ping();
  }

  async keys(pattern: string): Promise<string[]> {
    if (!this.enabled || !this.client) return [];
    return await this.client.keys(pattern);
  }

  async quit(): Promise<void> {
    if (!this.client) return;
    await this.client.quit();
  }

  isEnabled(): boolean {
    return this.enabled;
  }
}

export default RedisService;
