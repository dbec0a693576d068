#!/usr/bin/env node
/**
 * Command-line entry point.
 *
 * Usage: boc-fx-rates <start-date> [end-date] [--reverse]
 *
 * Prints the USD to CAD rate published by the Bank of Canada for a single
 * date or a range, one `date: rate` line per observation. A date without a
 * publication resolves to the preceding business day.
 */

import { realpathSync } from 'fs';
import { pathToFileURL } from 'url';
import type { CivilDate, RatesQuery, RatesResult } from './types/index.js';
import { InputError, ProtocolError } from './errors.js';
import { assertOrderedRange, parseCivilDate } from './utils/dates.js';
import { formatObservation } from './utils/format.js';
import { createCliLogger } from './utils/logger.js';
import ValetService from './services/valet.service.js';

export const USAGE = `Usage: boc-fx-rates <start-date> [end-date] [options]

Get the USD to CAD exchange rate from the Bank of Canada for a single date, or a range.
Returns the preceding business day when a date has no published rate.

Arguments:
  start-date     A single date, or start date of the range (YYYY-MM-DD)
  end-date       End date of the range (YYYY-MM-DD)

Options:
  -r, --reverse  Provide the exchange rate from CAD to USD
  -h, --help     Show this message`;

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export interface CliOptions {
  help: boolean;
  query?: RatesQuery;
}

export interface CliDeps {
  service?: Pick<ValetService, 'fetchObservations'>;
  stdout?: { write(chunk: string): unknown };
  stderr?: { write(chunk: string): unknown };
}

/** Parses the arguments after the script name. */
export function parseCliArgs(args: readonly string[]): CliOptions {
  const positionals: string[] = [];
  let reverse = false;

  for (const arg of args) {
    if (arg === '-h' || arg === '--help') return { help: true };
    if (arg === '-r' || arg === '--reverse') {
      reverse = true;
      continue;
    }
    if (arg.startsWith('-')) {
      throw new InputError(`unknown option ${arg}`);
    }
    positionals.push(arg);
  }

  if (positionals.length === 0) {
    throw new InputError('missing start date');
  }
  if (positionals.length > 2) {
    throw new InputError(`unexpected argument ${positionals[2]}`);
  }

  const startDate: CivilDate = parseCivilDate(positionals[0], 'start date');
  const endDate = positionals[1] === undefined ? undefined : parseCivilDate(positionals[1], 'end date');
  assertOrderedRange(startDate, endDate);

  return { help: false, query: { startDate, endDate, reverse } };
}

export function renderResult(result: RatesResult): string {
  return result.observations.map((obs) => `${formatObservation(obs)}\n`).join('');
}

function describeError(err: unknown): string {
  if (err instanceof ProtocolError) return `${err.message}\n${err.payload}`;
  if (err instanceof Error) return err.message;
  return String(err);
}

export async function runCli(args: readonly string[], deps: CliDeps = {}): Promise<number> {
  const stdout = deps.stdout ?? process.stdout;
  const stderr = deps.stderr ?? process.stderr;

  let options: CliOptions;
  try {
    options = parseCliArgs(args);
  } catch (err) {
    stderr.write(`error: ${describeError(err)}\n\n${USAGE}\n`);
    return EXIT_USAGE;
  }

  if (options.help || !options.query) {
    stdout.write(`${USAGE}\n`);
    return EXIT_OK;
  }

  const service = deps.service ?? new ValetService(createCliLogger());
  try {
    const result = await service.fetchObservations(options.query);
    stdout.write(renderResult(result));
    return EXIT_OK;
  } catch (err) {
    stderr.write(`error: ${describeError(err)}\n`);
    return err instanceof InputError ? EXIT_USAGE : EXIT_FAILURE;
  }
}

const isMain =
  process.argv[1] !== undefined && import.meta.url === pathToFileURL(realpathSync(process.argv[1])).href;

if (isMain) {
  runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      process.stderr.write(`fatal: ${describeError(err)}\n`);
      process.exitCode = EXIT_FAILURE;
    }
  );
}
