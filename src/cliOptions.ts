import { createConfigurationError, createInputError } from './errors.js';
import { isLogLevel, type LogLevel } from './logger.js';
import type { HeaderMap, NormalizationConfig, OutputFormat } from './types.js';

export interface CliSettings {
  config: NormalizationConfig;
  format: OutputFormat;
  logLevel: LogLevel;
}

/** Maps commander's parsed option bag onto a normalization config. */
export function buildSettings(rawOptions: Record<string, unknown>): CliSettings {
  const config: NormalizationConfig = {};

  if (rawOptions.charset !== undefined) {
    config.charset = String(rawOptions.charset);
  }

  if (rawOptions.defaultScheme !== undefined) {
    config.defaultScheme = String(rawOptions.defaultScheme);
  }

  if (Array.isArray(rawOptions.ignore)) {
    config.ignoredParameters = rawOptions.ignore.map((name) => String(name));
  }

  if (rawOptions.redact === true) {
    config.redactIgnored = true;
  }

  if (rawOptions.sort === false) {
    config.sortParameters = false;
  }

  if (rawOptions.inferScheme === true) {
    config.inferSchemeFromPort = true;
  }

  return {
    config,
    format: parseFormat(rawOptions.format),
    logLevel: parseLogLevel(rawOptions.logLevel),
  };
}

/** Parses repeated `-H "Name: value"` options; a later duplicate name wins. */
export function parseHeaderOptions(values: readonly string[]): HeaderMap {
  const entries = values.map((raw): [string, string] => {
    const separator = raw.indexOf(':');
    const name = separator === -1 ? '' : raw.slice(0, separator).trim();
    if (!name) {
      throw createInputError(`Malformed header: ${raw}`, { header: raw });
    }

    return [name, raw.slice(separator + 1).trim()];
  });

  return Object.fromEntries(entries);
}

export function collectValues(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function parseFormat(value: unknown): OutputFormat {
  if (value === undefined) {
    return 'text';
  }

  const format = String(value).toLowerCase();
  if (!isOutputFormat(format)) {
    throw createConfigurationError(`Unsupported format: ${format}`, { value: format });
  }

  return format;
}

function parseLogLevel(value: unknown): LogLevel {
  if (value === undefined) {
    return 'silent';
  }

  const level = String(value).toLowerCase();
  if (!isLogLevel(level)) {
    throw createConfigurationError(`Unsupported log level: ${level}`, { value: level });
  }

  return level;
}

function isOutputFormat(value: string): value is OutputFormat {
  return value === 'text' || value === 'json';
}
