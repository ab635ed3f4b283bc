export { Filters } from './query/filters.js';
export { compileFilters, MAX_RECORDS } from './query/compiler.js';
export { near, multiNear, repeat, multiRepeat } from './query/builders.js';
export type { NearSpec, RepeatSpec } from './query/builders.js';
export {
  validateTone,
  validateTimespan,
  formatDate,
  VALID_TIMESPAN_UNITS,
} from './query/validation.js';
export type { TimespanUnit } from './query/validation.js';
export type {
  FilterSpec,
  FilterValue,
  FilterTerm,
  DateInput,
  BooleanMethod,
} from './query/types.js';
export { GdeltDocClient, DOC_API_URL } from './client/doc-client.js';
export type { DocClientConfig } from './client/doc-client.js';
export { TIMELINE_MODES, isTimelineMode } from './client/types.js';
export type {
  TimelineMode,
  SearchMode,
  ArticleColumn,
  ArticleTable,
  TimelineRow,
  TimelineTable,
  DocClient,
} from './client/types.js';
export { ARTICLE_COLUMNS } from './client/schema.js';
export type { ArticleRecord, TimelinePoint, TimelineSeries } from './client/schema.js';
export { mapArticles, mapTimeline, parseDocApiDate, ALL_ARTICLES_COLUMN } from './client/row-mapper.js';
export { raiseForStatus, HttpResponseCodes } from './client/response-errors.js';
export { loadJson, DEFAULT_MAX_JSON_REPAIRS } from './client/json.js';
export {
  InvalidArgumentError,
  UnsupportedOperationError,
  ParseError,
  HttpError,
  BadRequestError,
  NotFoundError,
  RateLimitError,
  ClientRequestError,
  ServerError,
} from './errors.js';
