// src/index.ts
export { Credential } from './credential.js';
export { resolveHost, isKnownEndpoint, ENDPOINT_HOSTS, DEFAULT_HOST } from './endpoints/index.js';
export type { Endpoint } from './endpoints/index.js';
export { DEFAULT_CONFIG_PATH, readConfigFile, lookup } from './config/index.js';
export type { ConfigTable, CredentialFileOptions, CredentialJSON } from './types.js';
export { CredentialError, IoError, ParseError, MissingFieldError } from './errors.js';
export type { SourcePosition } from './errors.js';
export { createLogger, getLogger, configureLogger, resetLogger } from './logging/logger.js';
export type { LogLevel, LoggerConfig } from './logging/logger.js';
