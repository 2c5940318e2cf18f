// src/credential.ts
import { resolve } from 'node:path';
import { resolveHost } from './endpoints/index.js';
import {
  DEFAULT_CONFIG_PATH,
  readConfigFile,
  parseDefaultEndpoint,
  parseCredentialSection,
  isTable,
  lookup as lookupPath,
  deepFreeze,
} from './config/index.js';
import { MissingFieldError } from './errors.js';
import { getLogger } from './logging/logger.js';
import type { ConfigTable, CredentialFileOptions, CredentialInit, CredentialJSON } from './types.js';

const MASK = '***';

/**
 * OVH API application credentials: application key and secret, plus the
 * consumer key granting access to a user's API. Built once and never mutated.
 */
export class Credential {
  readonly endpoint: string;
  readonly host: string;
  readonly applicationKey: string;
  readonly applicationSecret: string;
  readonly consumerKey: string;
  /** File the values were read from; `undefined` when built from parameters. */
  readonly sourcePath: string | undefined;
  /** Parsed section of the endpoint; `undefined` when built from parameters. */
  readonly rawConfig: Readonly<ConfigTable> | undefined;

  private constructor(init: CredentialInit) {
    this.endpoint = init.endpoint;
    this.host = resolveHost(init.endpoint);
    this.applicationKey = init.applicationKey;
    this.applicationSecret = init.applicationSecret;
    this.consumerKey = init.consumerKey;
    this.sourcePath = init.source?.path;
    this.rawConfig = init.source ? deepFreeze(init.source.config) : undefined;
    Object.freeze(this);
  }

  /** Loads `Config.toml` from the working directory (or `options.cwd`). */
  static fromDefaultFile(options: CredentialFileOptions = {}): Credential {
    const path = resolve(options.cwd ?? process.cwd(), DEFAULT_CONFIG_PATH);
    return Credential.fromFile(path, options);
  }

  /**
   * Loads credentials from a TOML file whose `[default] endpoint` names the
   * section holding `application_key`, `application_secret` and `consumer_key`.
   *
   * @throws {IoError} the file cannot be read
   * @throws {ParseError} the file is not valid TOML
   * @throws {MissingFieldError} a required key is absent or not a string
   */
  static fromFile(path: string, options: CredentialFileOptions = {}): Credential {
    const log = options.logger ?? getLogger('credential');
    try {
      const credential = Credential.load(path);
      log.debug({ path, endpoint: credential.endpoint, host: credential.host }, 'Loaded credentials');
      return credential;
    } catch (err) {
      log.debug({ path, err }, 'Failed to load credentials');
      throw err;
    }
  }

  /** No consumer key yet: the application still has to request one. */
  static fromApplication(endpoint: string, applicationKey: string, applicationSecret: string): Credential {
    return new Credential({ endpoint, applicationKey, applicationSecret, consumerKey: '' });
  }

  static fromCredential(
    endpoint: string,
    applicationKey: string,
    applicationSecret: string,
    consumerKey: string,
  ): Credential {
    return new Credential({ endpoint, applicationKey, applicationSecret, consumerKey });
  }

  private static load(path: string): Credential {
    const config = readConfigFile(path);
    const endpoint = parseDefaultEndpoint(config);
    // The section is named after the endpoint id, not the resolved host.
    const section = Object.prototype.hasOwnProperty.call(config, endpoint) ? config[endpoint] : undefined;
    if (!isTable(section)) throw new MissingFieldError(endpoint);
    const fields = parseCredentialSection(endpoint, section);
    return new Credential({
      endpoint,
      applicationKey: fields.application_key,
      applicationSecret: fields.application_secret,
      consumerKey: fields.consumer_key,
      source: { path, config: section },
    });
  }

  get isFromFile(): boolean {
    return this.sourcePath !== undefined;
  }

  /** Value at a dotted path inside the endpoint section, if this credential came from a file. */
  lookup(dottedPath: string): unknown {
    return this.rawConfig ? lookupPath(this.rawConfig, dottedPath) : undefined;
  }

  toJSON(): CredentialJSON {
    return {
      endpoint: this.endpoint,
      host: this.host,
      applicationKey: this.applicationKey,
      applicationSecret: mask(this.applicationSecret),
      consumerKey: mask(this.consumerKey),
      ...(this.sourcePath !== undefined ? { sourcePath: this.sourcePath } : {}),
    };
  }
}

function mask(secret: string): string {
  return secret === '' ? '' : MASK;
}
