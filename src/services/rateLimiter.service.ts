import { VALET_MAX_REQ_PER_MIN, VALET_BLOCK_DURATION_MS } from '../config/constants.js';
import type { ServiceLogger } from '../utils/logger.js';

export interface RateLimiterOptions {
  maxPerMinute?: number;
  blockDurationMs?: number;
  now?: () => number;
}

class RateLimiterService {
  private requestCount: number = 0;
  private windowStart: number;
  private blockedUntil: number = 0;
  private readonly maxPerMinute: number;
  private readonly blockDurationMs: number;
  private readonly now: () => number;
  private logger: ServiceLogger;

  constructor(logger: ServiceLogger, options: RateLimiterOptions = {}) {
    this.logger = logger;
    this.maxPerMinute = options.maxPerMinute ?? VALET_MAX_REQ_PER_MIN;
    this.blockDurationMs = options.blockDurationMs ?? VALET_BLOCK_DURATION_MS;
    this.now = options.now ?? Date.now;
    this.windowStart = this.now();
  }

  isBlocked(): boolean {
    return this.now() < this.blockedUntil;
  }

  getBlockedUntil(): number {
    return this.blockedUntil;
  }

  recordRequest(): boolean {
    const now = this.now();

    // Reset window if elapsed
    if (now - this.windowStart > 60_000) {
      this.windowStart = now;
      this.requestCount = 0;
    }

    this.requestCount++;

    if (this.requestCount > this.maxPerMinute) {
      this.blockedUntil = now + this.blockDurationMs;
      this.logger.warn(
        `Valet request rate exceeded (${this.maxPerMinute}/min). ` +
        `Blocking until ${new Date(this.blockedUntil).toISOString()}`
      );
      return false;
    }

    return true;
  }
}

export default RateLimiterService;
