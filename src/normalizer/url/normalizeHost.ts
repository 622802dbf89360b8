import tr46 from 'tr46';

import { getLogger } from '../../logger.js';

const TRAILING_DOTS = /\.+$/;
const URL_DELIMITERS = /[/?#@:\\]/;

/**
 * Lowercases the host and strips trailing dots. Domain-shaped hosts (any
 * containing a `.`) are converted to their ASCII form with UTS-46
 * transitional processing. Numeric labels are left as written; a host
 * IDNA rejects is returned lowercased.
 */
export function normalizeHost(host: string): string {
  const lowered = host.toLowerCase().replace(TRAILING_DOTS, '');
  if (!lowered.includes('.')) {
    return lowered;
  }

  const ascii = tr46.toASCII(lowered, { transitionalProcessing: true });

  // UTS-46 maps some full-width forms onto URL delimiters; such a host stays as given.
  if (!ascii || URL_DELIMITERS.test(ascii)) {
    getLogger('host').debug({ host }, 'IDNA conversion rejected host; keeping it lowercased');
    return lowered;
  }

  return ascii.replace(TRAILING_DOTS, '');
}
