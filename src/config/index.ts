// src/config/index.ts
import { readFileSync } from 'node:fs';
import { parse, TomlError } from 'smol-toml';
import { IoError, ParseError } from '../errors.js';
import type { ConfigTable } from '../types.js';

export const DEFAULT_CONFIG_PATH = 'Config.toml';

const utf8 = new TextDecoder('utf-8', { fatal: true });

export { parseDefaultEndpoint, parseCredentialSection } from './schema.js';
export type { CredentialSection } from './schema.js';

/**
 * Reads and parses a TOML configuration file in one synchronous pass.
 * Throws {@link IoError} when the file cannot be read or is not valid UTF-8, and
 * {@link ParseError} when its content is not valid TOML.
 */
export function readConfigFile(path: string): ConfigTable {
  let content: string;
  try {
    content = utf8.decode(readFileSync(path));
  } catch (err) {
    throw new IoError(path, err);
  }
  return parseConfig(path, content);
}

export function parseConfig(path: string, content: string): ConfigTable {
  try {
    return parse(content);
  } catch (err) {
    if (err instanceof TomlError) {
      throw new ParseError(path, err.message, { line: err.line, column: err.column });
    }
    throw new ParseError(path, err instanceof Error ? err.message : String(err));
  }
}

export function isTable(value: unknown): value is ConfigTable {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/** Walks `a.b.c` through nested tables; `undefined` as soon as a segment is missing. */
export function lookup(table: ConfigTable, dottedPath: string): unknown {
  let current: unknown = table;
  for (const key of dottedPath.split('.')) {
    if (!isTable(current) || !Object.prototype.hasOwnProperty.call(current, key)) return undefined;
    current = current[key];
  }
  return current;
}

export function deepFreeze<T extends ConfigTable>(table: T): Readonly<T> {
  Object.values(table).forEach(freezeValue);
  return Object.freeze(table);
}

function freezeValue(value: unknown): void {
  if (isTable(value)) {
    deepFreeze(value);
  } else if (Array.isArray(value)) {
    value.forEach(freezeValue);
    Object.freeze(value);
  }
}
