import { InvalidArgumentError, UnsupportedOperationError } from '../errors.js';
import type { DateInput, FilterValue } from './types.js';

export const VALID_TIMESPAN_UNITS = [
  'min',
  'h',
  'hours',
  'd',
  'days',
  'w',
  'weeks',
  'm',
  'months',
] as const;

export type TimespanUnit = (typeof VALID_TIMESPAN_UNITS)[number];

const MIN_TIMESPAN_MINUTES = 60;

const timespanUnits: readonly string[] = VALID_TIMESPAN_UNITS;

function isTimespanUnit(unit: string): unit is TimespanUnit {
  return timespanUnits.includes(unit);
}

export function validateTone(tone: FilterValue): void {
  if (typeof tone !== 'string') {
    throw new UnsupportedOperationError('Multiple tone values are not supported yet');
  }
  if (!tone.includes('<') && !tone.includes('>')) {
    throw new InvalidArgumentError(`Tone must contain either greater than or less than, got "${tone}"`);
  }
  if (tone.includes('=')) {
    throw new InvalidArgumentError(`Tone cannot contain '=', got "${tone}"`);
  }
}

/**
 * Checks a `{magnitude}{unit}` timespan such as `60min` or `3weeks`.
 * The unit is the trailing run of letters; everything before it must be
 * decimal digits.
 */
export function validateTimespan(timespan: string): void {
  const unit = /[A-Za-z]*$/.exec(timespan)?.[0] ?? '';
  const magnitude = timespan.slice(0, timespan.length - unit.length);

  if (!isTimespanUnit(unit)) {
    throw new InvalidArgumentError(
      `Timespan "${timespan}": "${unit}" is not a supported unit. Supported units are ${VALID_TIMESPAN_UNITS.join(', ')}`,
    );
  }
  if (!/^\d+$/.test(magnitude)) {
    throw new InvalidArgumentError(`Timespan "${timespan}": "${magnitude}" is not a whole number`);
  }
  if (unit === 'min' && Number(magnitude) < MIN_TIMESPAN_MINUTES) {
    throw new InvalidArgumentError(
      `Timespan "${timespan}": Period must be at least ${MIN_TIMESPAN_MINUTES} minutes`,
    );
  }
}

function pad(n: number, width = 2): string {
  return String(n).padStart(width, '0');
}

/**
 * Renders a date range bound in the API's `YYYYMMDDHHMMSS` form.
 * Strings carry no time of day, so they map to midnight.
 */
export function formatDate(date: DateInput): string {
  if (typeof date === 'string') {
    if (!/^\d{4}-\d{2}-\d{2}$/.test(date)) {
      throw new InvalidArgumentError(`Date must be in YYYY-MM-DD format, got "${date}"`);
    }
    return `${date.replace(/-/g, '')}000000`;
  }
  if (Number.isNaN(date.getTime())) {
    throw new InvalidArgumentError('Date is invalid');
  }
  return [
    pad(date.getUTCFullYear(), 4),
    pad(date.getUTCMonth() + 1),
    pad(date.getUTCDate()),
    pad(date.getUTCHours()),
    pad(date.getUTCMinutes()),
    pad(date.getUTCSeconds()),
  ].join('');
}
