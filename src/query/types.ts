/** A filter given as one value, or as a list whose entries are OR-ed. */
export type FilterValue = string | readonly string[];

export type FilterTerm =
  | { kind: 'single';   value: string }
  | { kind: 'multiple'; values: readonly string[] };

/** A date range bound: `YYYY-MM-DD`, or a Date rendered in UTC. */
export type DateInput = string | Date;

export type BooleanMethod = 'AND' | 'OR';

export interface FilterSpec {
  /** Start of the date range. Requires `endDate`; excludes `timespan`. */
  startDate?: DateInput;
  endDate?: DateInput;
  /** Window relative to the time of the request, e.g. `1d`, `90min`, `2weeks`. */
  timespan?: string;
  /** Records to return in article list mode, 1 to 250. Defaults to 250. */
  numRecords?: number;
  /** Exact phrase to match in the article text. */
  keyword?: FilterValue;
  /** Loose domain match: `cnn.com` also matches `edition.cnn.com`. */
  domain?: FilterValue;
  domainExact?: FilterValue;
  /** FIPS two-letter country code of the publishing outlet. */
  country?: FilterValue;
  language?: FilterValue;
  /** GKG theme, e.g. `ENV_CLIMATECHANGE`. */
  theme?: FilterValue;
  /** Clause built with `near()` or `multiNear()`. */
  near?: string;
  /** Clause built with `repeat()` or `multiRepeat()`. */
  repeat?: string;
  /** Average tone comparison such as `>5` or `<-2`. */
  tone?: FilterValue;
  /** Absolute tone comparison, ignoring polarity. */
  toneAbsolute?: FilterValue;
}

/**
 * Normalizes a FilterValue into its tagged form. Empty strings and empty
 * lists carry no filter and yield null.
 */
export function toFilterTerm(value: FilterValue | undefined): FilterTerm | null {
  if (value === undefined) return null;
  if (typeof value === 'string') {
    return value === '' ? null : { kind: 'single', value };
  }
  return value.length === 0 ? null : { kind: 'multiple', values: [...value] };
}

/** Empty strings count as absent, as they carry no filter. */
export function isPresent<T>(value: T | undefined): value is T {
  return value !== undefined && value !== '';
}
