import type { UrlParts } from '../../types.js';

// Schemes whose URLs carry a network location; `scheme:` + path gets a `//` for these.
const NETLOC_SCHEMES: ReadonlySet<string> = new Set([
  '',
  'file',
  'ftp',
  'git',
  'git+ssh',
  'gopher',
  'http',
  'https',
  'imap',
  'mms',
  'nfs',
  'nntp',
  'prospero',
  'rsync',
  'rtsp',
  'rtsps',
  'rtspu',
  'sftp',
  'shttp',
  'snews',
  'svn',
  'svn+ssh',
  'telnet',
  'wais',
  'ws',
  'wss',
]);

const SCHEME_PATTERN = /^[A-Za-z][A-Za-z0-9+.-]*$/;
const STRIPPED_CHARS = /[\t\r\n]/g;

/** Splits a raw URL into its seven components. Never throws; missing parts are empty strings. */
export function decomposeUrl(raw: string): UrlParts {
  let rest = raw.trim().replace(STRIPPED_CHARS, '');
  let scheme = '';
  let authority = '';
  let query = '';
  let fragment = '';

  const colon = rest.indexOf(':');
  if (colon > 0 && SCHEME_PATTERN.test(rest.slice(0, colon))) {
    scheme = rest.slice(0, colon);
    rest = rest.slice(colon + 1);
  }

  if (rest.startsWith('//')) {
    const end = findAuthorityEnd(rest);
    authority = rest.slice(2, end);
    rest = rest.slice(end);
  }

  const hash = rest.indexOf('#');
  if (hash !== -1) {
    fragment = rest.slice(hash + 1);
    rest = rest.slice(0, hash);
  }

  const question = rest.indexOf('?');
  if (question !== -1) {
    query = rest.slice(question + 1);
    rest = rest.slice(0, question);
  }

  return { scheme, ...splitAuthority(authority), path: rest, query, fragment };
}

/**
 * Splits `userinfo@host:port`: userinfo runs up to and including the first `@`,
 * host up to the next `:`, and the port is whatever follows it.
 */
export function splitAuthority(authority: string): Pick<UrlParts, 'userinfo' | 'host' | 'port'> {
  const at = authority.indexOf('@');
  const userinfo = at === -1 ? '' : authority.slice(0, at + 1);
  const hostPort = authority.slice(at + 1);

  const colon = hostPort.indexOf(':');
  if (colon === -1) {
    return { userinfo, host: hostPort, port: '' };
  }

  return { userinfo, host: hostPort.slice(0, colon), port: hostPort.slice(colon + 1) };
}

/** Inverse of decomposeUrl for any parts it can produce. */
export function reconstructUrl(parts: UrlParts): string {
  let authority = parts.userinfo + parts.host;
  if (parts.port) {
    authority += `:${parts.port}`;
  }

  let url = parts.path;
  if (authority || (parts.scheme && NETLOC_SCHEMES.has(parts.scheme.toLowerCase()) && !url.startsWith('//'))) {
    if (url && !url.startsWith('/')) {
      url = `/${url}`;
    }
    url = `//${authority}${url}`;
  } else if (url.startsWith('//')) {
    url = `//${url}`;
  }

  if (parts.scheme) {
    url = `${parts.scheme}:${url}`;
  }
  if (parts.query) {
    url += `?${parts.query}`;
  }
  if (parts.fragment) {
    url += `#${parts.fragment}`;
  }

  return url;
}

function findAuthorityEnd(value: string): number {
  for (let index = 2; index < value.length; index += 1) {
    const char = value.charAt(index);
    if (char === '/' || char === '?' || char === '#') {
      return index;
    }
  }

  return value.length;
}
