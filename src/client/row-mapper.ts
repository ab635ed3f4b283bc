import { ParseError } from '../errors.js';
import { ARTICLE_COLUMNS, articleListResponseSchema, timelineResponseSchema } from './schema.js';
import type { ArticleTable, TimelineMode, TimelineRow, TimelineTable } from './types.js';

export const ALL_ARTICLES_COLUMN = 'All Articles';

// Timeline dates come as e.g. 20200513T000000Z
const COMPACT_DATE = /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})Z$/;

export function parseDocApiDate(value: string): Date {
  const match = COMPACT_DATE.exec(value);
  const date = match
    ? new Date(Date.UTC(
        Number(match[1]),
        Number(match[2]) - 1,
        Number(match[3]),
        Number(match[4]),
        Number(match[5]),
        Number(match[6]),
      ))
    : new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new ParseError(`Unrecognized date in Doc API response: "${value}"`);
  }
  return date;
}

export function mapArticles(body: unknown): ArticleTable {
  const parsed = articleListResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new ParseError(`Unexpected article list response: ${parsed.error.message}`, parsed.error);
  }
  return { columns: ARTICLE_COLUMNS, rows: parsed.data.articles };
}

/**
 * Pivots the per-series timeline into rows keyed by the first series'
 * dates. Every series must have one point per date.
 */
export function mapTimeline(mode: TimelineMode, body: unknown): TimelineTable {
  const parsed = timelineResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new ParseError(`Unexpected timeline response: ${parsed.error.message}`, parsed.error);
  }

  const { timeline } = parsed.data;
  const first = timeline[0];
  if (first === undefined) {
    return { columns: ['datetime'], rows: [] };
  }

  const columns = ['datetime', ...timeline.map((s) => s.series)];
  const includeTotals = mode === 'timelinevolraw';
  if (includeTotals) columns.push(ALL_ARTICLES_COLUMN);

  for (const series of timeline) {
    if (series.data.length !== first.data.length) {
      throw new ParseError(
        `Series "${series.series}" has ${series.data.length} points, expected ${first.data.length}`,
      );
    }
  }

  const rows: TimelineRow[] = first.data.map((point, i) => {
    const values: Record<string, number> = {};
    for (const series of timeline) {
      const value = series.data[i]?.value;
      if (value !== undefined) values[series.series] = value;
    }
    if (includeTotals) {
      if (point.norm === undefined) {
        throw new ParseError(`Missing norm for ${point.date} in ${mode} response`);
      }
      values[ALL_ARTICLES_COLUMN] = point.norm;
    }
    return { datetime: parseDocApiDate(point.date), values };
  });

  return { columns, rows };
}
