import { InvalidArgumentError } from '../errors.js';
import { compileFilters, MAX_RECORDS } from './compiler.js';
import { isPresent } from './types.js';
import type { FilterSpec } from './types.js';
import { validateTimespan, validateTone } from './validation.js';

const LIST_FIELDS = [
  'keyword',
  'domain',
  'domainExact',
  'country',
  'language',
  'theme',
  'tone',
  'toneAbsolute',
] as const satisfies readonly (keyof FilterSpec)[];

/** Copies the spec, list values included, so callers cannot change it afterwards. */
function freezeSpec(spec: FilterSpec): Readonly<FilterSpec> {
  const copy: FilterSpec = { ...spec };
  for (const field of LIST_FIELDS) {
    const value = copy[field];
    if (value !== undefined && typeof value !== 'string') {
      copy[field] = Object.freeze([...value]);
    }
  }
  return Object.freeze(copy);
}

/**
 * Validated, immutable set of Doc API filters.
 *
 * @example
 * const f = new Filters({
 *   keyword: 'climate change',
 *   startDate: '2020-05-10',
 *   endDate: '2020-05-11',
 *   tone: '>5',
 * });
 * f.queryString
 * // '"climate change" tone>5 &startdatetime=20200510000000&enddatetime=20200511000000&maxrecords=250'
 */
export class Filters {
  readonly spec: Readonly<FilterSpec>;
  readonly numRecords: number;
  /** Serialized clause fragments in the order they are sent. */
  readonly queryParams: readonly string[];

  constructor(spec: FilterSpec) {
    const hasStart = isPresent(spec.startDate);
    const hasEnd = isPresent(spec.endDate);
    const hasTimespan = isPresent(spec.timespan);

    if (!hasStart && !hasEnd && !hasTimespan) {
      throw new InvalidArgumentError('Must provide either startDate and endDate, or timespan');
    }
    if (hasStart && hasEnd && hasTimespan) {
      throw new InvalidArgumentError('Can only provide either startDate and endDate, or timespan');
    }
    if (hasStart !== hasEnd) {
      throw new InvalidArgumentError('startDate and endDate must be provided together');
    }

    this.numRecords = spec.numRecords ?? MAX_RECORDS;
    if (!Number.isInteger(this.numRecords) || this.numRecords < 1 || this.numRecords > MAX_RECORDS) {
      throw new InvalidArgumentError(
        `numRecords must be a whole number from 1 to ${MAX_RECORDS}, not ${this.numRecords}`,
      );
    }

    if (isPresent(spec.tone)) validateTone(spec.tone);
    if (isPresent(spec.toneAbsolute)) validateTone(spec.toneAbsolute);
    if (isPresent(spec.timespan)) validateTimespan(spec.timespan);

    this.spec = freezeSpec(spec);
    this.queryParams = Object.freeze(compileFilters(this.spec));
    Object.freeze(this);
  }

  /** The literal `query` parameter value sent to the API. */
  get queryString(): string {
    return this.queryParams.join('');
  }
}
