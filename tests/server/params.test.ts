import { describe, it, expect } from 'vitest';
import { sourcesWithoutErrors } from '../../src/server/app.js';
import { DEFAULT_LIMIT, QueryParamError, parseFlag, parseLimit } from '../../src/server/params.js';

describe('parseLimit', () => {
  it('defaults when absent or blank', () => {
    expect(parseLimit(undefined)).toBe(DEFAULT_LIMIT);
    expect(parseLimit('')).toBe(DEFAULT_LIMIT);
  });

  it('accepts integers from 1 to 100', () => {
    expect(parseLimit('1')).toBe(1);
    expect(parseLimit('100')).toBe(100);
    expect(parseLimit(['7', '8'])).toBe(7);
  });

  it('rejects values outside the range', () => {
    expect(() => parseLimit('0')).toThrow(QueryParamError);
    expect(() => parseLimit('101')).toThrow('limit must be an integer between 1 and 100');
    expect(() => parseLimit('2.5')).toThrow(QueryParamError);
    expect(() => parseLimit('ten')).toThrow(QueryParamError);
  });
});

describe('parseFlag', () => {
  it('reads true and false spellings', () => {
    expect(parseFlag(undefined)).toBe(false);
    expect(parseFlag('true')).toBe(true);
    expect(parseFlag('1')).toBe(true);
    expect(parseFlag('FALSE')).toBe(false);
    expect(parseFlag('0')).toBe(false);
  });

  it('rejects anything else', () => {
    expect(() => parseFlag('maybe')).toThrow('details must be true or false');
  });
});

describe('sourcesWithoutErrors', () => {
  it('lists only sources that did not fail', () => {
    expect(
      sourcesWithoutErrors(
        ['titanplacementgroup', 'npnow'],
        [
          { error: 'HTTP 500 for https://titan.test', error_type: 'FetchError', source: 'titanplacementgroup' },
          { title: 'Nurse Practitioner', url: 'https://npnow.test/jobs/1', source: 'npnow' },
        ],
      ),
    ).toEqual(['npnow']);
  });
});
