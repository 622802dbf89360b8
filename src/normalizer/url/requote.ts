import { decodeBytes, encodeText } from '../../util/charset.js';

export const PATH_SAFE = "~:/[]@!$'()*+,;=";
export const QUERY_KEY_SAFE = "~:/[]@!$'()*,;";
export const QUERY_VALUE_SAFE = `${QUERY_KEY_SAFE}=`;
export const FRAGMENT_SAFE = '~';

const UNRESERVED_ONLY = /^[A-Za-z0-9_.~-]*$/;
const safeSetCache = new Map<string, ReadonlySet<number>>();

/**
 * Canonicalizes the percent-encoding of one URL component: decode, compose to
 * NFC, encode to `charset` and escape every byte that is neither unreserved
 * nor listed in `safe`, always with uppercase hex digits.
 */
export function requote(value: string, safe = '/', charset = 'utf-8'): string {
  if (UNRESERVED_ONLY.test(value)) {
    return value;
  }

  const text = percentDecode(value, charset).normalize('NFC');
  return percentEncode(encodeText(text, charset), safeBytes(safe));
}

/**
 * Gathers ASCII text and `%XX` escapes into bytes and decodes each run with
 * `charset`. Malformed escapes stay literal; non-ASCII characters pass through.
 */
export function percentDecode(value: string, charset = 'utf-8'): string {
  if (!value.includes('%')) {
    return value;
  }

  let output = '';
  let pending: number[] = [];

  const flush = (): void => {
    if (pending.length > 0) {
      output += decodeBytes(Uint8Array.from(pending), charset);
      pending = [];
    }
  };

  for (let index = 0; index < value.length; index += 1) {
    const code = value.charCodeAt(index);

    if (code === 0x25 && isHexDigit(value.charCodeAt(index + 1)) && isHexDigit(value.charCodeAt(index + 2))) {
      pending.push(Number.parseInt(value.slice(index + 1, index + 3), 16));
      index += 2;
    } else if (code < 0x80) {
      pending.push(code);
    } else {
      flush();
      output += value.charAt(index);
    }
  }

  flush();
  return output;
}

function percentEncode(bytes: Uint8Array, safe: ReadonlySet<number>): string {
  let output = '';

  for (const byte of bytes) {
    if (isUnreserved(byte) || safe.has(byte)) {
      output += String.fromCharCode(byte);
    } else {
      output += `%${byte.toString(16).toUpperCase().padStart(2, '0')}`;
    }
  }

  return output;
}

function safeBytes(safe: string): ReadonlySet<number> {
  let bytes = safeSetCache.get(safe);
  if (!bytes) {
    bytes = new Set([...safe].map((char) => char.charCodeAt(0)).filter((code) => code < 0x80));
    safeSetCache.set(safe, bytes);
  }

  return bytes;
}

function isUnreserved(byte: number): boolean {
  return (
    (byte >= 0x30 && byte <= 0x39) ||
    (byte >= 0x41 && byte <= 0x5a) ||
    (byte >= 0x61 && byte <= 0x7a) ||
    byte === 0x2d ||
    byte === 0x2e ||
    byte === 0x5f ||
    byte === 0x7e
  );
}

function isHexDigit(code: number): boolean {
  return (
    (code >= 0x30 && code <= 0x39) ||
    (code >= 0x41 && code <= 0x46) ||
    (code >= 0x61 && code <= 0x66)
  );
}
