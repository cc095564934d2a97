import { describe, it, expect, vi, afterEach } from 'vitest';
import type { Passage } from '@kbchat/shared-types';
import { rerank, rerankDetailed, rerankGroups } from '../src/rerank/index.js';

const PAST = 'Event on 03/01/2020';
const FUTURE = 'Event on 03/01/2099';
const UNDATED = 'General information';

function passage(origin: string, text: string, relevanceScore = 0.5): Passage {
  return { origin, text, relevanceScore };
}

const DATE_QUERY = 'When is the next event?';
const PLAIN_QUERY = 'Who is on the staff?';
const NOW = new Date('2024-06-01T12:00:00Z');

// Mixed fixture: upstream order interleaves website and archive, all three date labels.
const w1 = passage('district.example.org/w1', PAST, 0.95);
const a1 = passage('district.example.org/a1.pdf', FUTURE, 0.9);
const w2 = passage('district.example.org/w2', UNDATED, 0.85);
const w3 = passage('district.example.org/w3', FUTURE, 0.8);
const a2 = passage('district.example.org/a2.pdf', PAST, 0.75);
const w4 = passage('district.example.org/w4', PAST, 0.7);
const a3 = passage('district.example.org/a3.pdf', UNDATED, 0.65);
const w5 = passage('district.example.org/w5', FUTURE, 0.6);
const MIXED: Passage[] = [w1, a1, w2, w3, a2, w4, a3, w5];

describe('rerank — worked scenarios', () => {
  it('puts website content before archive regardless of score', () => {
    const staff = passage('site.org/staff', 'Staff directory', 0.1);
    const minutes = passage('site.org/board_minutes.pdf', 'Board minutes', 0.9);
    expect(rerank([minutes, staff], PLAIN_QUERY, NOW)).toEqual([staff, minutes]);
  });

  it('puts upcoming meetings first for date questions', () => {
    const past = passage('site.org/news/1', 'meeting on 01/05/2020');
    const future = passage('site.org/news/2', 'meeting on 12/15/2099');
    const result = rerank([past, future], 'When is the next meeting?', new Date('2024-01-01T00:00:00Z'));
    expect(result).toEqual([future, past]);
  });

  it('applies only the date sort when every passage is archive', () => {
    const x = passage('x.pdf', PAST);
    const y = passage('y.pdf', FUTURE);
    const z = passage('z.pdf', UNDATED);
    expect(rerank([x, y, z], DATE_QUERY, NOW)).toEqual([y, z, x]);
    expect(rerank([x, y, z], PLAIN_QUERY, NOW)).toEqual([x, y, z]);
  });

  it('returns an empty list for empty input', () => {
    expect(rerank([], DATE_QUERY, NOW)).toEqual([]);
  });
});

describe('rerank — ordering policy', () => {
  it('sorts each partition by date relevance for date questions', () => {
    expect(rerank(MIXED, DATE_QUERY, NOW)).toEqual([w3, w5, w2, w1, w4, a1, a3, a2]);
  });

  it('keeps upstream order within partitions for other questions', () => {
    expect(rerank(MIXED, PLAIN_QUERY, NOW)).toEqual([w1, w2, w3, w4, w5, a1, a2, a3]);
  });

  it('returns the caller objects without copying or mutating them', () => {
    const snapshot = structuredClone(MIXED);
    const result = rerank(MIXED, DATE_QUERY, NOW);
    expect(result[0]).toBe(w3);
    expect(MIXED).toEqual(snapshot);
  });

  it('accepts a precomputed Query', () => {
    const forced = { text: 'Staff list', isDateSensitive: true };
    expect(rerank([w1, w3], forced, NOW)).toEqual([w3, w1]);
  });
});

describe('rerank — properties', () => {
  const result = rerankDetailed(MIXED, DATE_QUERY, NOW);
  const labels = result.passages;

  it('is a permutation of the input', () => {
    const output = labels.map((r) => r.passage);
    expect(output).toHaveLength(MIXED.length);
    expect(new Set(output).size).toBe(MIXED.length);
    for (const p of MIXED) expect(output).toContain(p);
  });

  it('places every website passage before every archive passage', () => {
    const lastWebsite = labels.map((r) => r.sourceType).lastIndexOf('website');
    const firstArchive = labels.map((r) => r.sourceType).indexOf('archive');
    expect(lastWebsite).toBeLessThan(firstArchive);
  });

  it('never places a past-only passage before an upcoming one within a partition', () => {
    for (const type of ['website', 'archive'] as const) {
      const group = labels.filter((r) => r.sourceType === type).map((r) => r.dateRelevance);
      const lastFuture = group.lastIndexOf('has-future-dates');
      const firstPast = group.indexOf('only-past-dates');
      if (lastFuture >= 0 && firstPast >= 0) expect(lastFuture).toBeLessThan(firstPast);
    }
  });

  it('is deterministic', () => {
    expect(rerank(MIXED, DATE_QUERY, NOW)).toEqual(rerank(MIXED, DATE_QUERY, NOW));
  });

  it('reports labels and partition counts', () => {
    expect(result.query).toEqual({ text: DATE_QUERY, isDateSensitive: true });
    expect(result.websiteCount).toBe(5);
    expect(result.archiveCount).toBe(3);
    expect(labels[0]).toEqual({ passage: w3, sourceType: 'website', dateRelevance: 'has-future-dates' });
    expect(labels[7]).toEqual({ passage: a2, sourceType: 'archive', dateRelevance: 'only-past-dates' });
  });
});

describe('rerank — options', () => {
  it('uses configured archive extensions', () => {
    const pdf = passage('report.pdf', UNDATED);
    const doc = passage('report.docx', UNDATED);
    expect(rerank([doc, pdf], PLAIN_QUERY, NOW, { archiveExtensions: ['.docx'] })).toEqual([pdf, doc]);
  });

  it('uses configured extra date keywords', () => {
    const past = passage('site.org/a', PAST);
    const future = passage('site.org/b', FUTURE);
    expect(rerank([past, future], 'bake sale', NOW)).toEqual([past, future]);
    expect(rerank([past, future], 'bake sale', NOW, { extraDateKeywords: ['bake sale'] })).toEqual([future, past]);
  });

  it('resolves "today" in the configured time zone', () => {
    const earlier = passage('site.org/a', 'Board meeting 05/01/2024');
    const lastNight = passage('site.org/b', 'Board meeting 05/31/2024');
    const instant = new Date('2024-06-01T03:00:00Z');
    const query = 'When is the board meeting?';
    expect(rerank([earlier, lastNight], query, instant)).toEqual([earlier, lastNight]);
    expect(rerank([earlier, lastNight], query, instant, { timeZone: 'America/Los_Angeles' })).toEqual([
      lastNight,
      earlier,
    ]);
  });
});

describe('rerank — invalid time zone or reference instant', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('falls back to UTC for an unknown time zone instead of throwing', () => {
    vi.spyOn(process.stderr, 'write').mockReturnValue(true);
    const past = passage('site.org/a', PAST);
    const future = passage('site.org/b', FUTURE);

    expect(rerank([past, future], DATE_QUERY, NOW, { timeZone: 'Mars/Base' })).toEqual([future, past]);
    expect(process.stderr.write).toHaveBeenCalledTimes(1);
    expect(process.stderr.write).toHaveBeenCalledWith(
      'WARN: time zone "Mars/Base" is not a valid IANA zone — using UTC\n',
    );
  });

  it('labels every passage no-dates for an Invalid Date instead of throwing', () => {
    vi.spyOn(process.stderr, 'write').mockReturnValue(true);
    const result = rerankDetailed(MIXED, DATE_QUERY, new Date('nope'));

    expect(result.passages.map((r) => r.passage)).toEqual([w1, w2, w3, w4, w5, a1, a2, a3]);
    expect(result.passages.every((r) => r.dateRelevance === 'no-dates')).toBe(true);
  });

  it('warns once per call across groups', () => {
    vi.spyOn(process.stderr, 'write').mockReturnValue(true);
    rerankGroups([[w1], [w3]], DATE_QUERY, NOW, { timeZone: 'Mars/Base' });

    expect(process.stderr.write).toHaveBeenCalledTimes(1);
  });
});

describe('rerankGroups', () => {
  it('reranks each group on its own and keeps group order', () => {
    const pdf = passage('district.example.org/plan.pdf', FUTURE);
    const web = passage('district.example.org/plan', PAST);
    const schoolPast = passage('lakeview.example.org/news', PAST);
    const schoolFuture = passage('lakeview.example.org/events', FUTURE);

    expect(rerankGroups([[pdf, web], [schoolPast, schoolFuture]], DATE_QUERY, NOW)).toEqual([
      [web, pdf],
      [schoolFuture, schoolPast],
    ]);
  });
});
