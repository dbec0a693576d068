import type { CivilDate, Observation } from '../types/index.js';
import { SelectionError } from '../errors.js';
import { assertOrderedRange } from '../utils/dates.js';

/** Orders observations by date alone; the rate takes no part in ordering. */
export function compareObservations(a: Observation, b: Observation): number {
  if (a.date < b.date) return -1;
  if (a.date > b.date) return 1;
  return 0;
}

/**
 * Index of the latest observation dated on or before `startDate`, or -1.
 * `sorted` must be ascending by date.
 */
export function findRangeStart(sorted: readonly Observation[], startDate: CivilDate): number {
  let rangeStart = -1;
  for (let i = 0; i < sorted.length; i++) {
    if (sorted[i].date > startDate) break;
    rangeStart = i;
  }
  return rangeStart;
}

/**
 * Picks the observations answering a query.
 *
 * The anchor is the latest observation on or before `startDate`, so a date
 * without a publication resolves to the preceding business day. Without an
 * `endDate` only the anchor is returned; with one, the anchor and everything
 * after it. The right edge is not trimmed: the input is expected to have been
 * fetched up to `endDate` already.
 */
export function selectObservations(
  observations: readonly Observation[],
  startDate: CivilDate,
  endDate?: CivilDate
): Observation[] {
  assertOrderedRange(startDate, endDate);

  if (observations.length === 0) {
    throw new SelectionError('no observations available');
  }

  const sorted = [...observations].sort(compareObservations);
  const rangeStart = findRangeStart(sorted, startDate);
  if (rangeStart < 0) {
    throw new SelectionError(
      `no observation at or before ${startDate} (earliest available is ${sorted[0].date})`
    );
  }

  return endDate === undefined ? [sorted[rangeStart]] : sorted.slice(rangeStart);
}
