import { defaultPortFor } from './defaultPorts.js';

const DIGITS = /^\d+$/;

/** Drops leading zeros and elides the scheme's default port. Non-numeric ports are left alone. */
export function normalizePort(port: string, scheme: string): string {
  if (!DIGITS.test(port)) {
    return port;
  }

  const canonical = port.replace(/^0+(?=\d)/, '');
  return defaultPortFor(scheme) === canonical ? '' : canonical;
}
