import { z } from 'zod';
import { Filters } from '../../../src/index.js';

const listParam = z.union([z.string(), z.array(z.string())]).optional();

/**
 * Query parameters shared by the article and timeline routes. Repeating a
 * list parameter (`?theme=A&theme=B`) ORs the values.
 */
export const searchQuerySchema = z.object({
  keyword: listParam,
  domain: listParam,
  domainExact: listParam,
  country: listParam,
  language: listParam,
  theme: listParam,
  near: z.string().optional(),
  repeat: z.string().optional(),
  tone: listParam,
  toneAbsolute: listParam,
  startDate: z.string().optional(),
  endDate: z.string().optional(),
  timespan: z.string().optional(),
  numRecords: z.coerce.number().int().optional(),
});

/**
 * Validates raw query parameters and builds Filters from them. Throws a
 * ZodError for malformed parameters and the library's errors for invalid
 * filter combinations.
 */
export function parseSearchQuery(query: unknown): Filters {
  return new Filters(searchQuerySchema.parse(query));
}
