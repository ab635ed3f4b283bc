import type { Filters } from '../query/filters.js';
import type { ARTICLE_COLUMNS, ArticleRecord } from './schema.js';

export const TIMELINE_MODES = [
  'timelinevol',
  'timelinevolraw',
  'timelinelang',
  'timelinesourcecountry',
  'timelinetone',
] as const;

export type TimelineMode = (typeof TIMELINE_MODES)[number];

const timelineModes: readonly string[] = TIMELINE_MODES;

export function isTimelineMode(mode: string): mode is TimelineMode {
  return timelineModes.includes(mode);
}

export type SearchMode = 'artlist' | TimelineMode;

export type ArticleColumn = (typeof ARTICLE_COLUMNS)[number];

export interface ArticleTable {
  columns: readonly ArticleColumn[];
  rows: ArticleRecord[];
}

export interface TimelineRow {
  datetime: Date;
  /** Keyed by column name: one entry per series, plus `All Articles` for timelinevolraw. */
  values: Record<string, number>;
}

export interface TimelineTable {
  /** `datetime` first, then the value columns in response order. */
  columns: string[];
  rows: TimelineRow[];
}

export interface DocClient {
  articleSearch(filters: Filters): Promise<ArticleTable>;
  /** Rejects with InvalidArgumentError unless `mode` is one of TIMELINE_MODES. */
  timelineSearch(mode: string, filters: Filters): Promise<TimelineTable>;
}
