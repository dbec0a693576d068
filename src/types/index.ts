import type { Decimal } from 'decimal.js';

// Type definitions

/** Calendar date in `YYYY-MM-DD` form. Lexical order is chronological order. */
export type CivilDate = string;

export type SeriesId = 'FXUSDCAD' | 'FXCADUSD';

export interface Observation {
  readonly date: CivilDate;
  /** Value of one unit of the base currency in the quote currency. */
  readonly rate: Decimal;
}

export interface RatesQuery {
  startDate: CivilDate;
  /** Present in range mode, absent in single-date mode. */
  endDate?: CivilDate;
  reverse: boolean;
}

export interface RatesResult {
  series: SeriesId;
  startDate: CivilDate;
  endDate?: CivilDate;
  observations: Observation[];
  valetRequestUrl: string;
  cached?: boolean;
}

export interface SerializedObservation {
  date: CivilDate;
  rate: string;
}

export interface RatesResponse {
  status: 'success';
  series: SeriesId;
  base: string;
  quote: string;
  start: CivilDate;
  end: CivilDate | null;
  observations: SerializedObservation[];
  source: string;
  queriedAt: string;
  valetRequestUrl: string;
  cached: boolean;
}

export interface ErrorResponse {
  status: 'error';
  message: string;
  blocked?: boolean;
  upstreamStatus?: number;
  upstreamPayload?: string;
  valetRequestUrl?: string;
  requestedStart?: string;
  requestedEnd?: string;
}

export interface RatesQuerystring {
  start?: string;
  end?: string;
  reverse?: string;
}
