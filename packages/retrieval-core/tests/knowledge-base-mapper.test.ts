import { describe, it, expect } from 'vitest';
import { toPassage, toPassages } from '../src/knowledge-base/index.js';

const RECORD = {
  content: { text: 'Board of Education regular meeting agenda' },
  location: { s3Location: { uri: 's3://kb-bucket/board/agenda.pdf' } },
  metadata: {
    source: 'https://district.example.org/board/agenda.pdf',
    domain: 'district.example.org',
    meeting_date: '2024-05-01',
    page: 3,
  },
  score: 0.82,
};

describe('toPassage', () => {
  it('maps a full retrieval record', () => {
    expect(toPassage(RECORD)).toEqual({
      text: 'Board of Education regular meeting agenda',
      origin: 'https://district.example.org/board/agenda.pdf',
      relevanceScore: 0.82,
      secondaryLocator: 's3://kb-bucket/board/agenda.pdf',
      metadata: {
        source: 'https://district.example.org/board/agenda.pdf',
        domain: 'district.example.org',
        meetingDate: '2024-05-01',
      },
    });
  });

  it('defaults a missing source and score', () => {
    expect(toPassage({ content: { text: 'Bell schedule' } })).toEqual({
      text: 'Bell schedule',
      origin: '',
      relevanceScore: 0,
    });
  });

  it('returns null when the record has no text', () => {
    expect(toPassage({ content: {} })).toBeNull();
    expect(toPassage(null)).toBeNull();
    expect(toPassage('not a record')).toBeNull();
  });
});

describe('toPassages', () => {
  it('maps results in upstream order and skips records without text', () => {
    const passages = toPassages({
      retrievalResults: [
        { content: { text: 'first' }, metadata: { source: 'https://a.example.org' } },
        { content: { type: 'IMAGE' } },
        { content: { text: 'second' }, metadata: { source: 'https://b.example.org' } },
      ],
    });
    expect(passages.map((p) => p.text)).toEqual(['first', 'second']);
  });

  it('returns an empty list when retrievalResults is missing or malformed', () => {
    expect(toPassages({})).toEqual([]);
    expect(toPassages({ retrievalResults: 'oops' })).toEqual([]);
    expect(toPassages(undefined)).toEqual([]);
  });
});
