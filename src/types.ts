// src/types.ts
import type { Logger } from 'pino';

/** A parsed TOML table; values are strings, numbers, booleans, dates, arrays or nested tables. */
export interface ConfigTable {
  [key: string]: unknown;
}

export interface CredentialFileOptions {
  /** Directory `Config.toml` is resolved against (default: `process.cwd()`) */
  cwd?: string;
  logger?: Logger;
}

export interface CredentialJSON {
  endpoint: string;
  host: string;
  applicationKey: string;
  applicationSecret: string;
  consumerKey: string;
  sourcePath?: string;
}

// Internal — not exported from index.ts
export interface CredentialInit {
  endpoint: string;
  applicationKey: string;
  applicationSecret: string;
  consumerKey: string;
  source?: {
    path: string;
    config: ConfigTable;
  };
}
