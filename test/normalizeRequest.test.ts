import { describe, expect, it } from 'vitest';

import { normalizeBody, serializeCanonical } from '../src/normalizer/request/normalizeBody.js';
import { findHeader, normalizeHeaders } from '../src/normalizer/request/normalizeHeaders.js';
import { normalizeRequest } from '../src/normalizer/request/normalizeRequest.js';
import { createRequestKey } from '../src/normalizer/request/requestKey.js';

const JSON_HEADERS = { 'Content-Type': 'application/json; charset=utf-8' };
const FORM_HEADERS = { 'content-type': 'application/x-www-form-urlencoded' };

describe('normalizeHeaders', () => {
  it('returns an empty map for missing headers', () => {
    expect(normalizeHeaders(undefined)).toEqual({});
    expect(normalizeHeaders(null)).toEqual({});
  });

  it('sorts headers by name', () => {
    const headers = normalizeHeaders({ 'X-B': '1', Accept: 'text/html', 'X-A': '2' });
    expect(Object.keys(headers)).toEqual(['accept', 'x-a', 'x-b']);
  });

  it('sorts comma-separated values as a lowercase set', () => {
    expect(normalizeHeaders({ Accept: 'Text/HTML, application/json,, ' })).toEqual({
      accept: 'application/json, text/html',
    });
  });

  it('leaves single values as given', () => {
    expect(normalizeHeaders({ 'User-Agent': 'Agent/1.0' })).toEqual({ 'user-agent': 'Agent/1.0' });
  });

  it('treats names that differ only in case as one header', () => {
    expect(normalizeHeaders({ Accept: 'text/html' })).toEqual(normalizeHeaders({ accept: 'text/html' }));
    expect(normalizeHeaders({ Accept: 'text/html', accept: 'Application/JSON' })).toEqual({
      accept: 'application/json, text/html',
    });
  });

  it('removes ignored headers regardless of case', () => {
    expect(normalizeHeaders({ Authorization: 'Bearer test-token', Accept: '*/*' }, { ignoredParameters: ['authorization'] })).toEqual({
      accept: '*/*',
    });
  });

  it('redacts ignored headers', () => {
    expect(
      normalizeHeaders({ Authorization: 'Bearer test-token' }, { ignoredParameters: ['Authorization'], redactIgnored: true }),
    ).toEqual({ authorization: 'REDACTED' });
  });
});

describe('findHeader', () => {
  it('looks names up case-insensitively', () => {
    expect(findHeader({ 'Content-Type': 'text/plain' }, 'content-type')).toBe('text/plain');
    expect(findHeader({}, 'content-type')).toBeUndefined();
  });
});

describe('normalizeBody', () => {
  it('returns no bytes for an empty body', () => {
    expect(normalizeBody(undefined).length).toBe(0);
    expect(normalizeBody('', JSON_HEADERS).length).toBe(0);
  });

  it('sorts JSON keys and array items', () => {
    const body = normalizeBody('{"b": [3, "x", 1, null, true], "a": {"z": 1, "y": 2}}', JSON_HEADERS);
    expect(body.toString('utf8')).toBe('{"a":{"y":2,"z":1},"b":[null,true,1,3,"x"]}');
  });

  it('removes ignored keys at every depth', () => {
    const body = normalizeBody('{"token": "a", "data": {"token": "b", "id": 7}}', JSON_HEADERS, {
      ignoredParameters: ['token'],
    });
    expect(body.toString('utf8')).toBe('{"data":{"id":7}}');
  });

  it('redacts ignored keys and string items', () => {
    const body = normalizeBody('{"token": "a", "list": ["token", "keep"]}', JSON_HEADERS, {
      ignoredParameters: ['token'],
      redactIgnored: true,
    });
    expect(body.toString('utf8')).toBe('{"list":["REDACTED","keep"],"token":"REDACTED"}');
  });

  it('keeps integers beyond double precision exact', () => {
    const first = normalizeBody('{"id": 12345678901234567890}', JSON_HEADERS);
    const second = normalizeBody('{"id": 12345678901234567891}', JSON_HEADERS);

    expect(first.toString('utf8')).toBe('{"id":12345678901234567890}');
    expect(second.toString('utf8')).toBe('{"id":12345678901234567891}');
  });

  it('orders large and fractional numbers by value', () => {
    const body = normalizeBody('[10000000000000000001, 10000000000000000000, 2.50, 1e2]', JSON_HEADERS);
    expect(body.toString('utf8')).toBe('[2.5,100,10000000000000000000,10000000000000000001]');
  });

  it('passes malformed JSON through unchanged', () => {
    expect(normalizeBody('{"a": ', JSON_HEADERS).toString('utf8')).toBe('{"a": ');
  });

  it('normalizes form bodies like a query string', () => {
    const body = normalizeBody('b=2&token=x&a=%7e', FORM_HEADERS, { ignoredParameters: ['token'] });
    expect(body.toString('utf8')).toBe('a=~&b=2');
  });

  it('passes other content types through', () => {
    expect(normalizeBody('b=2&a=1', { 'Content-Type': 'text/plain' }).toString('utf8')).toBe('b=2&a=1');
    expect(normalizeBody('b=2&a=1').toString('utf8')).toBe('b=2&a=1');
  });

  it('accepts byte bodies', () => {
    const bytes = new TextEncoder().encode('{"b":1,"a":2}');
    expect(normalizeBody(bytes, JSON_HEADERS).toString('utf8')).toBe('{"a":2,"b":1}');
  });

  it('encodes output in the configured charset', () => {
    const body = normalizeBody('{"k": "é"}', JSON_HEADERS, { charset: 'latin1' });
    expect([...body]).toEqual([...Buffer.from('{"k":"é"}', 'latin1')]);
  });
});

describe('serializeCanonical', () => {
  const policy = { ignoredParameters: new Set<string>(), redactIgnored: false };

  it('orders integer-like keys by code unit', () => {
    expect(serializeCanonical({ b: 1, 10: 2, 9: 3 }, policy)).toBe('{"10":2,"9":3,"b":1}');
  });

  it('orders nested containers by their serialized text', () => {
    expect(serializeCanonical([{ b: 1 }, [2], { a: 1 }, [1]], policy)).toBe('[[1],[2],{"a":1},{"b":1}]');
  });
});

describe('normalizeRequest', () => {
  const config = { ignoredParameters: ['token'] };

  it('normalizes URL, headers and body under one policy', () => {
    const request = normalizeRequest(
      'HTTP://Example.com:80/a/../b?token=1&x=2',
      { Token: 'abc', 'Content-Type': 'application/json' },
      '{"token": 1, "y": 2}',
      config,
    );

    expect(request.url).toBe('http://example.com/b?x=2');
    expect(request.headers).toEqual({ 'content-type': 'application/json' });
    expect(request.body.toString('utf8')).toBe('{"y":2}');
  });

  it('makes requests that differ only in ignored values equal', () => {
    const first = normalizeRequest('https://example.com/?token=A', null, null, config);
    const second = normalizeRequest('https://example.com/?token=B', null, null, config);
    const bare = normalizeRequest('https://example.com/', null, null, config);

    expect(first).toEqual(second);
    expect(first.url).toBe(bare.url);
  });

  it('keeps a placeholder when redacting', () => {
    const redact = { ...config, redactIgnored: true };
    const first = normalizeRequest('https://example.com/?token=A', null, null, redact);
    const bare = normalizeRequest('https://example.com/', null, null, redact);

    expect(first.url).toBe('https://example.com/?token=REDACTED');
    expect(first.url).not.toBe(bare.url);
  });
});

describe('createRequestKey', () => {
  it('returns a hex SHA-256 digest', () => {
    expect(createRequestKey({ url: 'https://example.com/' })).toMatch(/^[0-9a-f]{64}$/);
  });

  it('is stable across equivalent requests', () => {
    const first = createRequestKey({
      method: 'get',
      url: 'HTTPS://EXAMPLE.COM:443/?b=2&a=1',
      headers: { Accept: 'b, a' },
    });
    const second = createRequestKey({
      url: 'https://example.com/?a=1&b=2',
      headers: { Accept: 'A,B' },
    });

    expect(first).toBe(second);
  });

  it('distinguishes methods and bodies', () => {
    const base = { url: 'https://example.com/', headers: { 'Content-Type': 'text/plain' } };

    expect(createRequestKey({ ...base, method: 'POST' })).not.toBe(createRequestKey(base));
    expect(createRequestKey({ ...base, body: 'a' })).not.toBe(createRequestKey({ ...base, body: 'b' }));
  });
});
