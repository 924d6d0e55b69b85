import { describe, it, expect } from 'vitest';
import { formatDate, parseDate, parseRequest, parseResponse, slugify } from '../utils';

describe('slugify', () => {
  it('strips accents and punctuation and hyphenates separators', () => {
    expect(slugify('Crème Brûlée: A Recipe')).toBe('creme-brulee-a-recipe');
    expect(slugify('  Hello, World. 2024/05 ')).toBe('hello-world-2024-05');
  });

  it('keeps underscores', () => {
    expect(slugify('under_score')).toBe('under_score');
  });
});

describe('formatDate', () => {
  it('renders UTC seconds without milliseconds', () => {
    expect(formatDate(new Date('2024-01-02T03:04:05.678Z'))).toBe('2024-01-02T03:04:05Z');
  });
});

describe('parseDate', () => {
  it('reads date-only and zone-less timestamps as UTC', () => {
    expect(parseDate('2024-01-02')).toEqual(new Date('2024-01-02T00:00:00Z'));
    expect(parseDate('2024-01-02 03:04:05')).toEqual(new Date('2024-01-02T03:04:05Z'));
  });

  it('honours explicit offsets', () => {
    expect(parseDate('2024-01-02T03:04:05-05:00')).toEqual(new Date('2024-01-02T08:04:05Z'));
  });

  it('returns undefined for anything else', () => {
    expect(parseDate('yesterday')).toBeUndefined();
    expect(parseDate('2024-13-45')).toBeUndefined();
  });
});

describe('parseResponse', () => {
  it('converts null strings and timestamps recursively without mutating the input', () => {
    const input = { a: 'null', b: ['Null', '2024-01-02'], c: { d: 1, e: 'text' } };

    expect(parseResponse(input)).toEqual({
      a: null,
      b: [null, new Date('2024-01-02T00:00:00Z')],
      c: { d: 1, e: 'text' },
    });
    expect(input.a).toBe('null');
  });
});

describe('parseRequest', () => {
  it('formats every date in a payload', () => {
    expect(
      parseRequest({
        when: new Date('2024-01-02T03:04:05.000Z'),
        list: [new Date('2024-02-03T00:00:00.000Z')],
        n: 1,
      })
    ).toEqual({ when: '2024-01-02T03:04:05Z', list: ['2024-02-03T00:00:00Z'], n: 1 });
  });
});
