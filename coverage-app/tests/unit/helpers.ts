import { vi } from 'vitest';
import { GdeltDocClient } from '../../../src/index.js';
import { buildServer } from '../../src/api/server.js';

/** Fetch stand-in answering every Doc API request with the same body and status. */
export function fakeFetch(body: string, status = 200) {
  return vi.fn<typeof fetch>(async () => new Response(body, { status }));
}

export function buildTestServer(fetchFn: typeof fetch) {
  return buildServer({ client: new GdeltDocClient({ fetch: fetchFn }), logLevel: 'silent' });
}

/** Decoded `query` parameter of the nth Doc API request a fake fetch received. */
export function sentQuery(fetchFn: ReturnType<typeof fakeFetch>, call = 0): string | null {
  const input = fetchFn.mock.calls[call]?.[0];
  return typeof input === 'string' ? new URL(input).searchParams.get('query') : null;
}
