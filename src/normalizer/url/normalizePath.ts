import { PATH_SAFE, requote } from './requote.js';

// Schemes with hierarchical paths; other schemes' paths are opaque and left as given.
const HIERARCHICAL_SCHEMES: ReadonlySet<string> = new Set(['', 'http', 'https', 'ftp', 'file']);

/**
 * Canonicalizes percent-encoding and resolves `.` and `..` segments in a
 * single left-to-right pass. A `..` never pops the leading empty segment, so
 * an absolute path stays absolute. Segments that merely contain dots
 * (`..foo`, `v1.2`) are ordinary names.
 */
export function normalizePath(path: string, scheme: string, charset = 'utf-8'): string {
  if (!HIERARCHICAL_SCHEMES.has(scheme)) {
    return path;
  }

  const segments = requote(path, PATH_SAFE, charset).split('/');
  const output: string[] = [];

  for (const segment of segments) {
    if (segment === '') {
      // collapses `//` while keeping the leading slash
      if (output.length === 0) {
        output.push(segment);
      }
    } else if (segment === '..') {
      if (output.length > 1) {
        output.pop();
      }
    } else if (segment !== '.') {
      output.push(segment);
    }
  }

  const last = segments[segments.length - 1];
  if (last === '' || last === '.' || last === '..') {
    output.push('');
  }

  const resolved = output.join('/');
  return !resolved && scheme ? '/' : resolved;
}
