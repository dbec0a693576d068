import type { SeriesId } from '../types/index.js';

// Configuration constants
export const VALET_API_BASE = process.env.VALET_API_BASE || 'https://www.bankofcanada.ca/valet';

// Calendar days fetched before the start date so that a published observation
// exists at or before it across weekends and holiday clusters.
export const LOOKBACK_DAYS = parseInt(process.env.BOC_LOOKBACK_DAYS || '10', 10);

export const VALET_TIMEOUT_MS = parseInt(process.env.BOC_TIMEOUT_MS || String(10 * 1000), 10);

export const CACHE_TTL_SECONDS = Math.floor(
  parseInt(process.env.CACHE_TTL_MS || String(60 * 60 * 1000), 10) / 1000
);

export const VALET_MAX_REQ_PER_MIN = parseInt(process.env.VALET_MAX_REQ_PER_MIN || '30', 10);
export const VALET_BLOCK_DURATION_MS = parseInt(
  process.env.VALET_BLOCK_DURATION_MS || String(10 * 60 * 1000),
  10
);

export const LOG_LEVEL = process.env.LOG_LEVEL || 'info';

// Valet publishes both FX series with four decimals.
export const RATE_DECIMAL_PLACES = 4;

export const SOURCE_NAME = 'Bank of Canada (Valet)';

export const SERIES: Record<SeriesId, { base: string; quote: string }> = {
  FXUSDCAD: { base: 'USD', quote: 'CAD' },
  FXCADUSD: { base: 'CAD', quote: 'USD' },
};

export function seriesFor(reverse: boolean): SeriesId {
  return reverse ? 'FXCADUSD' : 'FXUSDCAD';
}
