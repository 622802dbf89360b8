import { describe, expect, it } from 'vitest';

import { normalizeQuery } from '../src/normalizer/url/normalizeQuery.js';

describe('normalizeQuery', () => {
  const cases: Array<[string, string]> = [
    ['', ''],
    ['param1=val1&param2=val2', 'param1=val1&param2=val2'],
    ['Ç=Ç', '%C3%87=%C3%87'],
    ['%C3%87=%C3%87', '%C3%87=%C3%87'],
    ['q=C%CC%A7', 'q=%C3%87'],
  ];

  it.each(cases)('normalizes %j', (input, expected) => {
    expect(normalizeQuery(input)).toBe(expected);
  });

  it('sorts whole tokens as strings', () => {
    expect(normalizeQuery('b=2&a=1&a=0&c')).toBe('a=0&a=1&b=2&c');
  });

  it('keeps the original order when sorting is disabled', () => {
    expect(normalizeQuery('b=1&a=2', { sortParameters: false })).toBe('b=1&a=2');
  });

  it('drops empty tokens', () => {
    expect(normalizeQuery('&&a=1&&b')).toBe('a=1&b');
  });

  it('keeps = literal inside values but not keys', () => {
    expect(normalizeQuery('k=a=b')).toBe('k=a=b');
    expect(normalizeQuery('k%3Dx=1')).toBe('k%3Dx=1');
  });

  it('escapes & and # that were encoded', () => {
    expect(normalizeQuery('q=a%26b%23c')).toBe('q=a%26b%23c');
  });

  it('reads a literal + as a space', () => {
    expect(normalizeQuery('q=a+b')).toBe('q=a%20b');
    expect(normalizeQuery('q=a+b')).toBe(normalizeQuery('q=a%20b'));
  });

  it('keeps an encoded + distinct from a literal one', () => {
    expect(normalizeQuery('q=1%2B1')).toBe('q=1%2B1');
    expect(normalizeQuery('q=1+1')).not.toBe(normalizeQuery('q=1%2B1'));
    expect(normalizeQuery('a+b=1')).toBe('a%20b=1');
  });

  it('drops tracking keys before ignored keys are redacted', () => {
    expect(
      normalizeQuery('utm_source&utm%5Fsource=x&a=1', {
        ignoredParameters: ['utm_source'],
        redactIgnored: true,
        stripTracking: true,
      }),
    ).toBe('a=1');
  });

  it('keeps tracking keys unless asked to strip them', () => {
    expect(normalizeQuery('utm_source=x&a=1')).toBe('a=1&utm_source=x');
  });

  it('removes ignored parameters', () => {
    expect(normalizeQuery('token=abc&page=2&token', { ignoredParameters: ['token'] })).toBe('page=2');
  });

  it('redacts ignored parameters', () => {
    expect(
      normalizeQuery('token=abc&page=2&token', { ignoredParameters: ['token'], redactIgnored: true }),
    ).toBe('page=2&token=REDACTED&token=REDACTED');
  });

  it('matches ignored names against the decoded key', () => {
    expect(normalizeQuery('t%6Fken=abc&page=2', { ignoredParameters: ['token'] })).toBe('page=2');
  });

  it('matches ignored names case-sensitively', () => {
    expect(normalizeQuery('Token=abc', { ignoredParameters: ['token'] })).toBe('Token=abc');
  });
});
