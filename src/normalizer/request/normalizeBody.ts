import { isLosslessNumber, parse, type LosslessNumber } from 'lossless-json';

import { getLogger } from '../../logger.js';
import { REDACTED } from '../../policy.js';
import type { HeaderMap, NormalizationConfig, RequestBody } from '../../types.js';
import { decodeBytes, encodeText, toBuffer } from '../../util/charset.js';
import { compareCodeUnits } from '../../util/compare.js';
import { createIgnoreMatcher, filterParameters, type IgnorePolicy } from '../filterParameters.js';
import { normalizeQuery } from '../url/normalizeQuery.js';
import { findHeader } from './normalizeHeaders.js';

export type BodyOptions = Pick<
  NormalizationConfig,
  'charset' | 'ignoredParameters' | 'redactIgnored' | 'sortParameters'
>;

const INTEGER = /^-?\d+$/;

interface SortableItem {
  rank: number;
  value: unknown;
  text: string;
}

/**
 * Normalizes a request body according to its `Content-Type`: JSON is
 * filtered, sorted and re-serialized, form data goes through the query
 * normalizer, anything else is passed through. Always returns bytes in the
 * configured charset; a body that fails to parse comes back unchanged.
 */
export function normalizeBody(
  body: RequestBody | null | undefined,
  headers?: HeaderMap | null,
  options: BodyOptions = {},
): Buffer {
  const charset = options.charset ?? 'utf-8';
  if (!body || body.length === 0) {
    return Buffer.alloc(0);
  }

  switch (mediaTypeOf(findHeader(headers, 'Content-Type'))) {
    case 'application/json':
      return normalizeJsonBody(body, options);
    case 'application/x-www-form-urlencoded':
      return encodeText(normalizeQuery(asText(body, charset), options), charset);
    default:
      return asBytes(body, charset);
  }
}

/** Canonical JSON text for a body, or the original bytes when it is not JSON. */
export function normalizeJsonBody(body: RequestBody, options: BodyOptions = {}): Buffer {
  const charset = options.charset ?? 'utf-8';
  const policy: IgnorePolicy = {
    ignoredParameters: new Set(options.ignoredParameters ?? []),
    redactIgnored: options.redactIgnored ?? false,
  };

  let parsed: unknown;
  try {
    parsed = parse(asText(body, charset));
  } catch (error) {
    getLogger('body').debug({ err: error }, 'body is not valid JSON; passing it through');
    return asBytes(body, charset);
  }

  return encodeText(serializeCanonical(parsed, policy), charset);
}

/**
 * Serializes JSON with object keys in code-unit order and array elements
 * sorted by value, dropping or redacting ignored keys at every depth.
 * Written out by hand: JSON.stringify would list integer-like keys first.
 * Integers keep their exact digits; other numbers take their shortest form.
 */
export function serializeCanonical(value: unknown, policy: IgnorePolicy): string {
  if (isLosslessNumber(value)) {
    return canonicalNumber(value.value);
  }

  if (Array.isArray(value)) {
    const items = filterListItems(value, policy).map((item) => toSortable(item, policy));
    items.sort(compareItems);
    return `[${items.map((item) => item.text).join(',')}]`;
  }

  if (isJsonObject(value)) {
    const entries = Object.entries(value).sort(([a], [b]) => compareCodeUnits(a, b));
    const members = filterParameters(entries, policy).map(
      ([key, member]) => `${JSON.stringify(key)}:${serializeCanonical(member, policy)}`,
    );
    return `{${members.join(',')}}`;
  }

  return JSON.stringify(value);
}

function filterListItems(items: unknown[], policy: IgnorePolicy): unknown[] {
  if (policy.ignoredParameters.size === 0) {
    return items;
  }

  const isIgnored = createIgnoreMatcher(policy.ignoredParameters);
  return items.flatMap((item) => {
    if (typeof item !== 'string' || !isIgnored(item)) {
      return [item];
    }
    return policy.redactIgnored ? [REDACTED] : [];
  });
}

function toSortable(value: unknown, policy: IgnorePolicy): SortableItem {
  return { rank: rankOf(value), value, text: serializeCanonical(value, policy) };
}

// null < boolean < number < string < array < object
function rankOf(value: unknown): number {
  if (value === null) {
    return 0;
  }
  if (typeof value === 'boolean') {
    return 1;
  }
  if (typeof value === 'number' || isLosslessNumber(value)) {
    return 2;
  }
  if (typeof value === 'string') {
    return 3;
  }
  return Array.isArray(value) ? 4 : 5;
}

function compareItems(a: SortableItem, b: SortableItem): number {
  if (a.rank !== b.rank) {
    return a.rank - b.rank;
  }
  if (typeof a.value === 'number' && typeof b.value === 'number') {
    return a.value - b.value;
  }
  if (isLosslessNumber(a.value) && isLosslessNumber(b.value)) {
    return compareNumbers(a.value, b.value) || compareCodeUnits(a.text, b.text);
  }
  if (typeof a.value === 'string' && typeof b.value === 'string') {
    return compareCodeUnits(a.value, b.value);
  }
  return compareCodeUnits(a.text, b.text);
}

function canonicalNumber(text: string): string {
  if (INTEGER.test(text)) {
    return text;
  }

  const numeric = Number(text);
  return Number.isFinite(numeric) ? String(numeric) : text;
}

function compareNumbers(a: LosslessNumber, b: LosslessNumber): number {
  if (INTEGER.test(a.value) && INTEGER.test(b.value)) {
    const difference = BigInt(a.value) - BigInt(b.value);
    return difference === 0n ? 0 : difference < 0n ? -1 : 1;
  }

  return Number(a.value) - Number(b.value);
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !isLosslessNumber(value);
}

function mediaTypeOf(contentType: string | undefined): string | undefined {
  return contentType?.split(';')[0]?.trim().toLowerCase();
}

function asText(body: RequestBody, charset: string): string {
  return typeof body === 'string' ? body : decodeBytes(body, charset);
}

function asBytes(body: RequestBody, charset: string): Buffer {
  return typeof body === 'string' ? encodeText(body, charset) : Buffer.from(toBuffer(body));
}
