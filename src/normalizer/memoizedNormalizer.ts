import { createConfigurationError } from '../errors.js';
import { resolvePolicy } from '../policy.js';
import type { NormalizationConfig, NormalizationPolicy } from '../types.js';
import { normalizeWithPolicy } from './url/normalizeUrl.js';

const DEFAULT_MAX_ENTRIES = 1_000;

export interface MemoizeOptions {
  maxEntries?: number;
}

/**
 * Least-recently-used cache in front of normalizeUrl() for one policy.
 * Normalization is deterministic, so a hit returns exactly what a fresh
 * call would.
 */
export class MemoizedNormalizer {
  private readonly entries = new Map<string, string>();
  private readonly policy: NormalizationPolicy;
  private readonly maxEntries: number;

  constructor(config: NormalizationConfig = {}, options: MemoizeOptions = {}) {
    this.policy = resolvePolicy(config);
    this.maxEntries = coerceMaxEntries(options.maxEntries ?? DEFAULT_MAX_ENTRIES);
  }

  normalize(url: string): string {
    const cached = this.entries.get(url);
    if (cached !== undefined) {
      // re-insert to mark as most recently used
      this.entries.delete(url);
      this.entries.set(url, cached);
      return cached;
    }

    const normalized = normalizeWithPolicy(url, this.policy);
    this.entries.set(url, normalized);

    if (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) {
        this.entries.delete(oldest.value);
      }
    }

    return normalized;
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}

export function createMemoizedNormalizer(
  config: NormalizationConfig = {},
  options: MemoizeOptions = {},
): MemoizedNormalizer {
  return new MemoizedNormalizer(config, options);
}

function coerceMaxEntries(value: number): number {
  if (!Number.isFinite(value) || value < 1) {
    throw createConfigurationError('maxEntries must be a positive integer.', { value });
  }

  return Math.trunc(value);
}
