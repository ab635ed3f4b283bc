import { InvalidArgumentError } from '../errors.js';
import type { Filters } from '../query/filters.js';
import { DEFAULT_MAX_JSON_REPAIRS, loadJson } from './json.js';
import { raiseForStatus } from './response-errors.js';
import { mapArticles, mapTimeline } from './row-mapper.js';
import { isTimelineMode, TIMELINE_MODES } from './types.js';
import type { ArticleTable, DocClient, SearchMode, TimelineTable } from './types.js';

export const DOC_API_URL = 'https://api.gdeltproject.org/api/v2/doc/doc';

export interface DocClientConfig {
  baseUrl?: string;
  /** Transport; defaults to the global fetch. */
  fetch?: typeof fetch;
  headers?: Record<string, string>;
  /** Repairs allowed per response body, see loadJson. */
  maxJsonRepairs?: number;
  onRequest?: (mode: SearchMode, url: string) => void;
  onError?: (mode: SearchMode, error: unknown) => void;
}

interface ResolvedConfig {
  baseUrl: string;
  fetch: typeof fetch;
  headers: Record<string, string>;
  maxJsonRepairs: number;
  onRequest: (mode: SearchMode, url: string) => void;
  onError: (mode: SearchMode, error: unknown) => void;
}

/**
 * Client for the GDELT 2.0 Doc API.
 *
 * @example
 * const client = new GdeltDocClient();
 * const filters = new Filters({ keyword: 'climate change', timespan: '1d' });
 * const articles = await client.articleSearch(filters);
 * const volume = await client.timelineSearch('timelinevol', filters);
 */
export class GdeltDocClient implements DocClient {
  private readonly resolved: ResolvedConfig;

  constructor(config: DocClientConfig = {}) {
    this.resolved = {
      baseUrl: config.baseUrl ?? DOC_API_URL,
      // Looked up per call, not captured at construction
      fetch: config.fetch ?? ((input, init) => fetch(input, init)),
      headers: config.headers ?? {},
      maxJsonRepairs: config.maxJsonRepairs ?? DEFAULT_MAX_JSON_REPAIRS,
      onRequest: config.onRequest ?? (() => undefined),
      onError: config.onError ?? (() => undefined),
    };
  }

  async articleSearch(filters: Filters): Promise<ArticleTable> {
    const body = await this.query('artlist', filters.queryString);
    return this.observe('artlist', () => mapArticles(body));
  }

  async timelineSearch(mode: string, filters: Filters): Promise<TimelineTable> {
    if (!isTimelineMode(mode)) {
      throw new InvalidArgumentError(
        `Mode ${mode} not in supported API modes: ${TIMELINE_MODES.join(', ')}`,
      );
    }
    const body = await this.query(mode, filters.queryString);
    return this.observe(mode, () => mapTimeline(mode, body));
  }

  /**
   * The query string goes into the URL as-is: its `&startdatetime=`,
   * `&maxrecords=` etc. fragments are separate request parameters.
   */
  buildUrl(mode: SearchMode, queryString: string): string {
    return `${this.resolved.baseUrl}?query=${queryString}&mode=${mode}&format=json`;
  }

  private async query(mode: SearchMode, queryString: string): Promise<unknown> {
    const url = this.buildUrl(mode, queryString);
    this.resolved.onRequest(mode, url);
    try {
      const response = await this.resolved.fetch(url, { headers: this.resolved.headers });
      raiseForStatus(response);
      const body = new Uint8Array(await response.arrayBuffer());
      return loadJson(body, this.resolved.maxJsonRepairs);
    } catch (err) {
      this.resolved.onError(mode, err);
      throw err;
    }
  }

  private observe<T>(mode: SearchMode, map: () => T): T {
    try {
      return map();
    } catch (err) {
      this.resolved.onError(mode, err);
      throw err;
    }
  }
}
