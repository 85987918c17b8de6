/**
 * Credential File Schema
 *
 * Shape of the TOML credential document read by `useConfigFile()`:
 *
 * ```toml
 * [auth]
 * api_client_id = "..."
 * api_client_secret = "..."
 * oauth_client_id = "..."
 * oauth_client_secret = "..."
 * ```
 *
 * The section name is matched case-insensitively (`[auth]`, `[Auth]`, `[AUTH]`),
 * an exact `auth` taking precedence. Unknown sections and keys are ignored.
 * A value of the wrong type fails validation, which the resolver treats the
 * same as malformed TOML.
 */

import { z } from 'zod';

export const AuthSectionSchema = z
  .object({
    oauth_client_id: z.string().optional().describe('Client ID of the nested OAuth layer'),
    oauth_client_secret: z.string().optional().describe('Client secret of the nested OAuth layer'),
    api_client_id: z.string().optional().describe('API client identifier (access key)'),
    api_client_secret: z.string().optional().describe('API client secret (secret key)'),
  })
  .passthrough();

const AUTH_SECTION = 'auth';

function findSection(document: Record<string, unknown>, name: string): unknown {
  if (name in document) {
    return document[name];
  }
  const key = Object.keys(document).find((candidate) => candidate.toLowerCase() === name);
  return key === undefined ? undefined : document[key];
}

/**
 * Parses a whole TOML document down to its auth section (undefined if absent).
 */
export const CredentialFileSchema = z
  .record(z.unknown())
  .transform((document) => findSection(document, AUTH_SECTION))
  .pipe(AuthSectionSchema.optional());

export type AuthSection = z.infer<typeof AuthSectionSchema>;
export type CredentialFile = z.output<typeof CredentialFileSchema>;
