// src/config/schema.ts
import { z } from 'zod';
import { MissingFieldError } from '../errors.js';
import type { ConfigTable } from '../types.js';

const defaultSectionSchema = z.object({
  default: z.object({
    endpoint: z.string(),
  }),
});

/**
 * Credential fields expected under the section named after the endpoint.
 * Empty strings are accepted; only presence and type are checked.
 */
const credentialSectionSchema = z.object({
  application_key: z.string(),
  application_secret: z.string(),
  consumer_key: z.string(),
});

export type CredentialSection = z.infer<typeof credentialSectionSchema>;

export function parseDefaultEndpoint(config: ConfigTable): string {
  const result = defaultSectionSchema.safeParse(config);
  if (!result.success) throw new MissingFieldError('default.endpoint');
  return result.data.default.endpoint;
}

export function parseCredentialSection(endpoint: string, section: unknown): CredentialSection {
  const result = credentialSectionSchema.safeParse(section);
  if (result.success) return result.data;
  // Issues follow the schema's key order, so the first one names the first missing field.
  const field = result.error.issues[0]?.path[0];
  throw new MissingFieldError(field === undefined ? endpoint : `${endpoint}.${String(field)}`);
}
