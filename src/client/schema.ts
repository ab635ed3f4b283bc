import { z } from 'zod';

/** Columns of an article list, in the order the API documents them. */
export const ARTICLE_COLUMNS = [
  'url',
  'url_mobile',
  'title',
  'seendate',
  'socialimage',
  'domain',
  'language',
  'sourcecountry',
] as const;

// The API leaves url_mobile and socialimage out, or empty, for many articles
export const articleSchema = z.object({
  url: z.string(),
  url_mobile: z.string().default(''),
  title: z.string().default(''),
  seendate: z.string(),
  socialimage: z.string().default(''),
  domain: z.string().default(''),
  language: z.string().default(''),
  sourcecountry: z.string().default(''),
});

// `{}` is what the API returns when nothing matches
export const articleListResponseSchema = z.object({
  articles: z.array(articleSchema).default([]),
});

export const timelinePointSchema = z.object({
  date: z.string(),
  value: z.number(),
  norm: z.number().optional(),
});

export const timelineSeriesSchema = z.object({
  series: z.string(),
  data: z.array(timelinePointSchema),
});

export const timelineResponseSchema = z.object({
  timeline: z.array(timelineSeriesSchema).default([]),
});

export type ArticleRecord = z.infer<typeof articleSchema>;
export type TimelinePoint = z.infer<typeof timelinePointSchema>;
export type TimelineSeries = z.infer<typeof timelineSeriesSchema>;
