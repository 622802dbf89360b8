import { schemeForPort } from './defaultPorts.js';

export interface ProvideSchemeOptions {
  /** Pick the scheme whose default port the URL names explicitly, e.g. `:21` → `ftp`. */
  inferFromPort?: boolean;
}

const EXPLICIT_PORT = /^(?:\/\/)?[^/?#]*:(\d+)(?:[/?#]|$)/;

/**
 * Supplies a scheme to scheme-less input the way a browser address bar
 * does. A heuristic, not a parser: anything with a `:` in its first seven
 * characters is assumed to carry a scheme already.
 */
export function provideScheme(
  url: string,
  defaultScheme = 'https',
  options: ProvideSchemeOptions = {},
): string {
  const hasScheme = url.slice(0, 7).includes(':');
  const isProtocolRelative = url.startsWith('//');
  const isFilePath = url === '-' || (url.startsWith('/') && !isProtocolRelative);

  if (!url || hasScheme || isFilePath) {
    return url;
  }

  const scheme = (options.inferFromPort ? inferScheme(url) : undefined) ?? defaultScheme;
  return isProtocolRelative ? `${scheme}:${url}` : `${scheme}://${url}`;
}

function inferScheme(url: string): string | undefined {
  const port = EXPLICIT_PORT.exec(url)?.[1];
  return port === undefined ? undefined : schemeForPort(port.replace(/^0+(?=\d)/, ''));
}
