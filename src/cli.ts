#!/usr/bin/env node
import { createRequire } from 'node:module';
import { Command } from 'commander';

import { buildSettings, collectValues, parseHeaderOptions } from './cliOptions.js';
import { configureLogger } from './logger.js';
import { normalizeRequest } from './normalizer/request/normalizeRequest.js';
import { normalizeUrl } from './normalizer/url/normalizeUrl.js';
import { resolvePolicy } from './policy.js';
import { reportNormalizerError } from './util/errorHandler.js';
import { writeRequest, writeUrl } from './util/output.js';

const require = createRequire(import.meta.url);
const pkg: unknown = require('../package.json');

const program = new Command();

program
  .name('request-canon')
  .description('Normalize URLs and HTTP requests into a canonical form.')
  .version(readVersion(pkg));

withPolicyOptions(
  program
    .command('url')
    .description('Print the canonical form of each URL, one per line.')
    .argument('<urls...>', 'URLs to normalize.'),
).action((urls: string[], options: Record<string, unknown>) => {
  try {
    const { config, format, logLevel } = buildSettings(options);
    configureLogger({ level: logLevel });

    const normalized = urls.map((url) => normalizeUrl(url, config));
    if (format === 'json') {
      process.stdout.write(`${JSON.stringify(normalized, null, 2)}\n`);
    } else {
      normalized.forEach(writeUrl);
    }
  } catch (error) {
    reportCliError(error, 'url');
  }
});

withPolicyOptions(
  program
    .command('request')
    .description('Print the canonical URL, headers and body of a request.')
    .argument('<url>', 'Request URL.')
    .option('-H, --header <header>', 'Request header as "Name: value" (repeatable).', collectValues, [])
    .option('-d, --data <body>', 'Request body.'),
).action((url: string, options: Record<string, unknown>) => {
  try {
    const { config, format, logLevel } = buildSettings(options);
    configureLogger({ level: logLevel });

    const headers = parseHeaderOptions(Array.isArray(options.header) ? options.header.map(String) : []);
    const body = options.data === undefined ? undefined : String(options.data);
    const normalized = normalizeRequest(url, headers, body, config);
    writeRequest(normalized, format, resolvePolicy(config).charset);
  } catch (error) {
    reportCliError(error, 'request');
  }
});

await program.parseAsync(process.argv);

function withPolicyOptions(command: Command): Command {
  return command
    .option('--charset <name>', 'Charset for percent-encoding and bodies. (default: utf-8)')
    .option('--default-scheme <scheme>', 'Scheme given to scheme-less input. (default: https)')
    .option('--ignore <names...>', 'Query parameters, headers and JSON keys to filter out.')
    .option('--redact', 'Replace ignored values with REDACTED instead of dropping them.')
    .option('--no-sort', 'Keep query parameters in their original order.')
    .option('--infer-scheme', 'Infer the scheme of scheme-less input from an explicit default port.')
    .option('--format <format>', 'Output format to emit (text or json). Defaults to text.')
    .option('--log-level <level>', 'Set log verbosity (pino levels: trace|debug|info|warn|error|fatal).');
}

function readVersion(value: unknown): string {
  if (typeof value === 'object' && value !== null && 'version' in value && typeof value.version === 'string') {
    return value.version;
  }

  return '0.0.0';
}

function reportCliError(error: unknown, command: string): void {
  reportNormalizerError(error, { command }, 'config');
  process.exitCode = 1;
}
