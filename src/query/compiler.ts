import { UnsupportedOperationError } from '../errors.js';
import { formatDate } from './validation.js';
import { isPresent, toFilterTerm } from './types.js';
import type { FilterSpec, FilterTerm } from './types.js';

export const MAX_RECORDS = 250;

/**
 * API parameter name for each list-capable filter, in serialization order.
 */
const FILTER_PARAMS = [
  ['domain', 'domain'],
  ['domainExact', 'domainis'],
  ['country', 'sourcecountry'],
  ['language', 'sourcelang'],
  ['theme', 'theme'],
] as const satisfies readonly (readonly [keyof FilterSpec, string])[];

const TONE_PARAMS = [
  ['tone', 'tone'],
  ['toneAbsolute', 'toneabs'],
] as const satisfies readonly (readonly [keyof FilterSpec, string])[];

/**
 * Keywords take no parameter name. A single keyword is always quoted as an
 * exact phrase; inside an OR list only multi-word entries are quoted.
 */
function compileKeyword(term: FilterTerm): string {
  if (term.kind === 'single') {
    return `"${term.value}" `;
  }
  const parts = term.values.map((v) => (v.includes(' ') ? `"${v}"` : v));
  return `(${parts.join(' OR ')}) `;
}

function compileFilter(name: string, term: FilterTerm): string {
  if (term.kind === 'single') {
    return `${name}:${term.value} `;
  }
  const parts = term.values.map((v) => `${name}:${v}`);
  return `(${parts.join(' OR ')}) `;
}

/** Tone comparisons attach directly to the parameter name (`tone>5`). */
function compileTone(name: string, term: FilterTerm): string {
  if (term.kind === 'multiple') {
    throw new UnsupportedOperationError('Multiple tone values are not supported yet');
  }
  return `${name}${term.value} `;
}

/**
 * Compiles a FilterSpec into its ordered query fragments. Boolean clauses
 * end with a single space; `&`-prefixed parameters carry none. Does not
 * validate: use `new Filters(spec)` for that.
 */
export function compileFilters(spec: FilterSpec): string[] {
  const fragments: string[] = [];

  const keyword = toFilterTerm(spec.keyword);
  if (keyword !== null) fragments.push(compileKeyword(keyword));

  for (const [field, name] of FILTER_PARAMS) {
    const term = toFilterTerm(spec[field]);
    if (term !== null) fragments.push(compileFilter(name, term));
  }

  for (const [field, name] of TONE_PARAMS) {
    const term = toFilterTerm(spec[field]);
    if (term !== null) fragments.push(compileTone(name, term));
  }

  if (spec.near) fragments.push(spec.near);
  if (spec.repeat) fragments.push(spec.repeat);

  if (isPresent(spec.startDate) && isPresent(spec.endDate)) {
    fragments.push(`&startdatetime=${formatDate(spec.startDate)}`);
    fragments.push(`&enddatetime=${formatDate(spec.endDate)}`);
  } else if (isPresent(spec.timespan)) {
    fragments.push(`&timespan=${spec.timespan}`);
  }

  fragments.push(`&maxrecords=${spec.numRecords ?? MAX_RECORDS}`);
  return fragments;
}
