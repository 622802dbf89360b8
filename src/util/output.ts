import type { NormalizedRequest, OutputFormat } from '../types.js';
import { decodeBytes } from './charset.js';

export function writeUrl(url: string): void {
  process.stdout.write(`${url}\n`);
}

export function writeRequest(request: NormalizedRequest, format: OutputFormat, charset: string): void {
  process.stdout.write(renderRequest(request, format, charset));
}

export function renderRequest(request: NormalizedRequest, format: OutputFormat, charset: string): string {
  const body = decodeBytes(request.body, charset);

  if (format === 'json') {
    return `${JSON.stringify({ url: request.url, headers: request.headers, body }, null, 2)}\n`;
  }

  const lines = [`URL: ${request.url}`];
  for (const [name, value] of Object.entries(request.headers)) {
    lines.push(`  ${name}: ${value}`);
  }
  if (body) {
    lines.push('', body);
  }

  return `${lines.join('\n')}\n`;
}
