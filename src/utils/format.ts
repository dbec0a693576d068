import { Decimal } from 'decimal.js';
import type { Observation, SerializedObservation } from '../types/index.js';
import { RATE_DECIMAL_PLACES } from '../config/constants.js';

export function formatRate(rate: Decimal): string {
  return rate.toFixed(RATE_DECIMAL_PLACES, Decimal.ROUND_HALF_UP);
}

export function formatObservation(observation: Observation): string {
  return `${observation.date}: ${formatRate(observation.rate)}`;
}

export function serializeObservation(observation: Observation): SerializedObservation {
  return { date: observation.date, rate: formatRate(observation.rate) };
}
