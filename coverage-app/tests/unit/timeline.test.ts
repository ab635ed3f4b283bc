import { describe, it, expect } from 'vitest';
import { buildTestServer, fakeFetch } from './helpers.js';

const TIMELINE = JSON.stringify({
  timeline: [
    {
      series: 'Article Count',
      data: [
        { date: '20240715T080000Z', value: 14, norm: 5120 },
        { date: '20240715T081500Z', value: 9, norm: 4987 },
      ],
    },
  ],
});

describe('GET /api/v1/timeline/:mode', () => {
  it('returns the timeline with ISO datetimes', async () => {
    const fetchFn = fakeFetch(TIMELINE);
    const app = buildTestServer(fetchFn);
    const res = await app.inject({ method: 'GET', url: '/api/v1/timeline/timelinevolraw?keyword=heatwave&timespan=1d' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      columns: ['datetime', 'Article Count', 'All Articles'],
      rows: [
        { datetime: '2024-07-15T08:00:00.000Z', values: { 'Article Count': 14, 'All Articles': 5120 } },
        { datetime: '2024-07-15T08:15:00.000Z', values: { 'Article Count': 9, 'All Articles': 4987 } },
      ],
    });
    const sent = fetchFn.mock.calls[0]?.[0];
    expect(typeof sent === 'string' ? new URL(sent).searchParams.get('mode') : null).toBe('timelinevolraw');
    await app.close();
  });

  it('unknown mode → 400 without calling the Doc API', async () => {
    const fetchFn = fakeFetch(TIMELINE);
    const app = buildTestServer(fetchFn);
    const res = await app.inject({ method: 'GET', url: '/api/v1/timeline/artlist?timespan=1d' });

    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe('InvalidArgumentError');
    expect(fetchFn).not.toHaveBeenCalled();
    await app.close();
  });
});
