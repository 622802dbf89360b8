import { filterParameters } from '../filterParameters.js';
import type { NormalizationConfig } from '../../types.js';
import { QUERY_KEY_SAFE, QUERY_VALUE_SAFE, percentDecode, requote } from './requote.js';

export interface QueryOptions
  extends Pick<NormalizationConfig, 'charset' | 'ignoredParameters' | 'redactIgnored' | 'sortParameters'> {
  /** Drop `utm_source` parameters, matched on the decoded key, before ignored keys are filtered. */
  stripTracking?: boolean;
}

const TRACKING_KEY = 'utm_source';

/**
 * Requotes every `key=value` (or bare `key`) token of a query string, filters
 * ignored keys and, unless disabled, sorts the tokens as plain strings.
 * A literal `+` reads as a space, as in form encoding, so `a+b` and `a%20b`
 * agree while `a%2Bb` stays distinct. Also used for
 * `application/x-www-form-urlencoded` bodies.
 */
export function normalizeQuery(query: string, options: QueryOptions = {}): string {
  const { charset = 'utf-8', redactIgnored = false, sortParameters = true, stripTracking = false } = options;
  const ignoredParameters = new Set(options.ignoredParameters ?? []);
  const matchKey = (key: string): string => percentDecode(key, charset).normalize('NFC');

  let parameters = query
    .split('&')
    .filter((token) => token.length > 0)
    .map((token) => splitToken(token, charset));

  if (stripTracking) {
    parameters = parameters.filter(([key]) => matchKey(key) !== TRACKING_KEY);
  }

  const filtered = filterParameters(parameters, { ignoredParameters, redactIgnored }, { matchKey });

  const tokens = filtered.map(([key, value]) => (value === undefined ? key : `${key}=${value}`));
  if (sortParameters) {
    tokens.sort();
  }

  return tokens.join('&');
}

function splitToken(token: string, charset: string): [string, string | undefined] {
  const separator = token.indexOf('=');
  if (separator === -1) {
    return [requoteFormText(token, QUERY_KEY_SAFE, charset), undefined];
  }

  return [
    requoteFormText(token.slice(0, separator), QUERY_KEY_SAFE, charset),
    requoteFormText(token.slice(separator + 1), QUERY_VALUE_SAFE, charset),
  ];
}

function requoteFormText(text: string, safe: string, charset: string): string {
  return requote(text.replaceAll('+', '%20'), safe, charset);
}
