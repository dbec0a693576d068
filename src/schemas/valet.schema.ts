/**
 * Zod schemas for Bank of Canada Valet responses and for rate queries.
 *
 * Example response:
 * https://www.bankofcanada.ca/valet/observations/FXUSDCAD/json?start_date=2025-01-05&end_date=2025-01-17
 *
 *   { "terms": {...}, "seriesDetail": {...},
 *     "observations": [ { "d": "2025-01-06", "FXUSDCAD": { "v": "1.4389" } }, ... ] }
 */

import { Decimal } from 'decimal.js';
import { z } from 'zod';
import type { Observation, SeriesId } from '../types/index.js';
import { isCivilDate } from '../utils/dates.js';

export const CivilDateSchema = z
  .string()
  .trim()
  .refine(isCivilDate, { message: 'expected a calendar date as YYYY-MM-DD' });

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

// Rates come as strings; a bare number is read back through its string form.
export const DecimalValueSchema = z
  .union([z.string().trim(), z.number().finite()])
  .transform((value) => String(value))
  .refine((value) => DECIMAL_PATTERN.test(value), (value) => ({ message: `not a decimal number: "${value}"` }))
  .transform((value) => new Decimal(value));

const FxValueSchema = z.object({ v: DecimalValueSchema });

export function valetObservationSchema(series: SeriesId) {
  return z
    .object({ d: CivilDateSchema })
    .catchall(z.unknown())
    .transform((raw, ctx): Observation => {
      const fx = FxValueSchema.safeParse(raw[series]);
      if (!fx.success) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [series],
          message: fx.error.issues.map((issue) => issue.message).join('; '),
        });
        return z.NEVER;
      }
      return { date: raw.d, rate: fx.data.v };
    });
}

export function valetResponseSchema(series: SeriesId) {
  return z.object({ observations: z.array(valetObservationSchema(series)) });
}

const BooleanFlagSchema = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

export const ratesQuerySchema = z.object({
  start: CivilDateSchema,
  end: CivilDateSchema.optional(),
  reverse: BooleanFlagSchema.default('false'),
});

export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
