import { describe, it, expect } from 'vitest';
import { mapArticles, mapTimeline, parseDocApiDate, ALL_ARTICLES_COLUMN } from '../../src/client/row-mapper.js';
import { ARTICLE_COLUMNS } from '../../src/client/schema.js';
import { ParseError } from '../../src/errors.js';

const ARTICLE = {
  url: 'https://example.com/news/flood',
  url_mobile: 'https://m.example.com/news/flood',
  title: 'River levels rise',
  seendate: '20240601T061500Z',
  socialimage: 'https://example.com/flood.jpg',
  domain: 'example.com',
  language: 'English',
  sourcecountry: 'United Kingdom',
};

function series(name: string, points: Array<[string, number, number?]>) {
  return {
    series: name,
    data: points.map(([date, value, norm]) => (norm === undefined ? { date, value } : { date, value, norm })),
  };
}

describe('parseDocApiDate', () => {
  it('parses the compact UTC form', () => {
    expect(parseDocApiDate('20240601T061500Z')).toEqual(new Date(Date.UTC(2024, 5, 1, 6, 15, 0)));
  });

  it('accepts ISO strings', () => {
    expect(parseDocApiDate('2024-06-01T00:00:00Z')).toEqual(new Date(Date.UTC(2024, 5, 1)));
  });

  it('unparseable → ParseError', () => {
    expect(() => parseDocApiDate('yesterday')).toThrow(ParseError);
  });
});

describe('mapArticles', () => {
  it('maps articles to rows with the documented columns', () => {
    const table = mapArticles({ articles: [ARTICLE] });
    expect(table.columns).toEqual([
      'url',
      'url_mobile',
      'title',
      'seendate',
      'socialimage',
      'domain',
      'language',
      'sourcecountry',
    ]);
    expect(table.rows).toEqual([ARTICLE]);
  });

  it('drops fields outside the documented columns', () => {
    const table = mapArticles({ articles: [{ ...ARTICLE, tone: 3.2 }] });
    expect(Object.keys(table.rows[0]!)).toEqual([...ARTICLE_COLUMNS]);
  });

  it('fills missing optional fields with empty strings', () => {
    const table = mapArticles({ articles: [{ url: ARTICLE.url, seendate: ARTICLE.seendate }] });
    expect(table.rows[0]).toEqual({
      url: ARTICLE.url,
      url_mobile: '',
      title: '',
      seendate: ARTICLE.seendate,
      socialimage: '',
      domain: '',
      language: '',
      sourcecountry: '',
    });
  });

  it('an empty object (no matches) yields no rows', () => {
    expect(mapArticles({}).rows).toEqual([]);
  });

  it('wrong shape → ParseError', () => {
    expect(() => mapArticles({ articles: 'none' })).toThrow(ParseError);
    expect(() => mapArticles(null)).toThrow(ParseError);
  });
});

describe('mapTimeline', () => {
  it('timelinevol has a datetime column and one column per series', () => {
    const table = mapTimeline('timelinevol', {
      timeline: [series('Volume Intensity', [['20240601T000000Z', 0.5], ['20240601T001500Z', 0.75]])],
    });
    expect(table.columns).toEqual(['datetime', 'Volume Intensity']);
    expect(table.rows).toEqual([
      { datetime: new Date(Date.UTC(2024, 5, 1, 0, 0)), values: { 'Volume Intensity': 0.5 } },
      { datetime: new Date(Date.UTC(2024, 5, 1, 0, 15)), values: { 'Volume Intensity': 0.75 } },
    ]);
  });

  it('timelinevolraw adds All Articles from norm', () => {
    const table = mapTimeline('timelinevolraw', {
      timeline: [series('Article Count', [['20240601T000000Z', 12, 4000], ['20240601T001500Z', 7, 3900]])],
    });
    expect(table.columns).toEqual(['datetime', 'Article Count', ALL_ARTICLES_COLUMN]);
    expect(table.columns).toHaveLength(3);
    expect(table.rows.map((r) => r.values)).toEqual([
      { 'Article Count': 12, 'All Articles': 4000 },
      { 'Article Count': 7, 'All Articles': 3900 },
    ]);
  });

  it('timelinevolraw without norm → ParseError', () => {
    expect(() =>
      mapTimeline('timelinevolraw', {
        timeline: [series('Article Count', [['20240601T000000Z', 12]])],
      }),
    ).toThrow(ParseError);
  });

  it('norm is ignored outside timelinevolraw', () => {
    const table = mapTimeline('timelinevol', {
      timeline: [series('Volume Intensity', [['20240601T000000Z', 0.5, 4000]])],
    });
    expect(table.columns).toEqual(['datetime', 'Volume Intensity']);
  });

  it('timelinelang has one column per language series, in response order', () => {
    const table = mapTimeline('timelinelang', {
      timeline: [
        series('English', [['20240601T000000Z', 10], ['20240602T000000Z', 11]]),
        series('French', [['20240601T000000Z', 3], ['20240602T000000Z', 4]]),
      ],
    });
    expect(table.columns).toEqual(['datetime', 'English', 'French']);
    expect(table.rows[1]).toEqual({
      datetime: new Date(Date.UTC(2024, 5, 2)),
      values: { English: 11, French: 4 },
    });
  });

  it('series of differing lengths → ParseError', () => {
    expect(() =>
      mapTimeline('timelinelang', {
        timeline: [
          series('English', [['20240601T000000Z', 10], ['20240602T000000Z', 11]]),
          series('French', [['20240601T000000Z', 3]]),
        ],
      }),
    ).toThrow(ParseError);
  });

  it('an empty timeline yields only the datetime column', () => {
    expect(mapTimeline('timelinetone', { timeline: [] })).toEqual({ columns: ['datetime'], rows: [] });
    expect(mapTimeline('timelinetone', {})).toEqual({ columns: ['datetime'], rows: [] });
  });

  it('non-numeric values → ParseError', () => {
    expect(() =>
      mapTimeline('timelinetone', {
        timeline: [{ series: 'Average Tone', data: [{ date: '20240601T000000Z', value: 'high' }] }],
      }),
    ).toThrow(ParseError);
  });
});
