export type ErrorKind = 'config' | 'input' | 'internal';

export interface NormalizerErrorProps {
  message: string;
  kind: ErrorKind;
  details?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * Raised only at the edges: policy resolution and CLI argument parsing.
 * The normalizers themselves never throw on malformed input.
 */
export class NormalizerError extends Error {
  readonly kind: ErrorKind;
  readonly details?: Record<string, unknown>;

  constructor({ message, kind, details, cause }: NormalizerErrorProps) {
    super(message, cause ? { cause } : undefined);
    this.name = `${capitalize(kind)}Error`;
    this.kind = kind;
    this.details = details;
  }
}

export function isNormalizerError(value: unknown): value is NormalizerError {
  return value instanceof NormalizerError;
}

export function ensureNormalizerError(error: unknown, fallbackKind: ErrorKind = 'internal'): NormalizerError {
  if (isNormalizerError(error)) {
    return error;
  }

  return new NormalizerError({
    message: error instanceof Error ? error.message : String(error),
    kind: fallbackKind,
    cause: error instanceof Error ? error : undefined,
  });
}

export function createConfigurationError(
  message: string,
  details: Record<string, unknown> = {},
  options: { cause?: unknown } = {},
): NormalizerError {
  return new NormalizerError({ message, kind: 'config', details, cause: options.cause });
}

/** Malformed caller-supplied input at an outer surface such as the CLI. */
export function createInputError(message: string, details: Record<string, unknown> = {}): NormalizerError {
  return new NormalizerError({ message, kind: 'input', details });
}

function capitalize(value: string): string {
  if (!value) {
    return value;
  }
  return value.charAt(0).toUpperCase() + value.slice(1);
}
