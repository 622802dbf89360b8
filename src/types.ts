/** The seven components a URL is split into. Fields are empty strings when absent. */
export interface UrlParts {
  readonly scheme: string;
  /** Credentials including the trailing `@`, e.g. `user:pass@`. */
  readonly userinfo: string;
  readonly host: string;
  /** Digits after the host's `:` (anything after it for malformed input). */
  readonly port: string;
  readonly path: string;
  /** Raw `key=value&...` text without the leading `?`. */
  readonly query: string;
  readonly fragment: string;
}

export interface NormalizationPolicy {
  readonly charset: string;
  readonly defaultScheme: string;
  readonly ignoredParameters: ReadonlySet<string>;
  readonly redactIgnored: boolean;
  readonly sortParameters: boolean;
  readonly inferSchemeFromPort: boolean;
}

export interface NormalizationConfig {
  charset?: string;
  defaultScheme?: string;
  ignoredParameters?: Iterable<string>;
  redactIgnored?: boolean;
  sortParameters?: boolean;
  inferSchemeFromPort?: boolean;
}

export type HeaderMap = Record<string, string>;

export type RequestBody = string | Uint8Array;

export interface NormalizedRequest {
  url: string;
  headers: HeaderMap;
  body: Buffer;
}

export interface RequestDescriptor {
  method?: string;
  url: string;
  headers?: HeaderMap | null;
  body?: RequestBody | null;
}

export type OutputFormat = 'text' | 'json';
