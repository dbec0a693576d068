/**
 * Civil date helpers. Dates travel as `YYYY-MM-DD` strings; date-fns is used
 * only for validation and calendar arithmetic.
 */

import { format, isValid, parseISO, subDays } from 'date-fns';
import type { CivilDate } from '../types/index.js';
import { InputError } from '../errors.js';

const CIVIL_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export function isCivilDate(text: string): boolean {
  return CIVIL_DATE_PATTERN.test(text) && isValid(parseISO(text));
}

export function parseCivilDate(text: string, label = 'date'): CivilDate {
  const trimmed = text.trim();
  if (!isCivilDate(trimmed)) {
    throw new InputError(`invalid ${label} "${text}" (expected YYYY-MM-DD)`);
  }
  return trimmed;
}

export function subtractDays(date: CivilDate, days: number): CivilDate {
  return format(subDays(parseISO(date), days), 'yyyy-MM-dd');
}

export function assertOrderedRange(startDate: CivilDate, endDate?: CivilDate): void {
  if (endDate !== undefined && endDate < startDate) {
    throw new InputError(`end date ${endDate} is before start date ${startDate}`);
  }
}
