/**
 * Credential Configuration Options
 *
 * A credential is assembled from an ordered list of options. Each option
 * receives the credential accumulated so far and returns the next one; later
 * options win for any field they set. Callers control precedence by
 * ordering:
 *
 * ```typescript
 * const credential = await resolveCredential([
 *   useConfigFile(flags.config),   // lowest precedence
 *   useEnvironment(),
 *   access(flags.clientId),        // highest precedence
 *   secret(flags.clientSecret),
 * ]);
 * ```
 *
 * `useConfigFile()` treats the two failure kinds differently: a file the
 * caller asked for but that cannot be read rejects the whole resolution,
 * while a file that reads fine but does not parse is ignored with a warning.
 */

import { parse as parseToml } from 'smol-toml';
import { CredentialFileSchema, type AuthSection } from '../config/schemas/credentials.js';
import type { IEnvironment } from '../config/sources/IEnvironment.js';
import type { IFileReader } from '../config/sources/IFileReader.js';
import { ProcessEnvironment } from '../config/sources/providers/ProcessEnvironment.js';
import { FsFileReader } from '../config/sources/providers/FsFileReader.js';
import { SdkErrors } from '../utils/errors.js';

export interface Credential {
  /** API client identifier */
  access: string;

  /** API client secret */
  secret: string;

  /** base64("oauthClientId:oauthClientSecret"), sent as Basic auth to the token endpoint */
  digest: string;
}

export type ConfigurationOption = (credential: Credential) => Credential | Promise<Credential>;

export const DEFAULT_ENV_PREFIX = 'PRIVX';

export function emptyCredential(): Credential {
  return { access: '', secret: '', digest: '' };
}

export function encodeDigest(oauthAccess: string, oauthSecret: string): string {
  return Buffer.from(`${oauthAccess}:${oauthSecret}`, 'utf-8').toString('base64');
}

/**
 * Sets the access key when a value is given; no-op for undefined.
 */
export function access(value?: string): ConfigurationOption {
  return (credential) => (value === undefined ? credential : { ...credential, access: value });
}

/**
 * Sets the secret key when a value is given; no-op for undefined.
 */
export function secret(value?: string): ConfigurationOption {
  return (credential) => (value === undefined ? credential : { ...credential, secret: value });
}

/**
 * Derives the digest from the OAuth client pair. Both halves are required;
 * with either missing the prior digest is left as it was.
 */
export function digest(oauthAccess?: string, oauthSecret?: string): ConfigurationOption {
  return (credential) => {
    if (oauthAccess === undefined || oauthSecret === undefined) {
      return credential;
    }
    return { ...credential, digest: encodeDigest(oauthAccess, oauthSecret) };
  };
}

/**
 * Reads credentials from the `[auth]` section of a TOML file.
 *
 * @param path - File to read; undefined makes the option a no-op
 * @param reader - File source (default: the filesystem)
 * @throws PrivXError CONFIG_IO_ERROR when the file cannot be read
 */
export function useConfigFile(path?: string, reader: IFileReader = new FsFileReader()): ConfigurationOption {
  return async (credential) => {
    if (path === undefined) {
      return credential;
    }

    let data: Uint8Array;
    try {
      data = await reader.read(path);
    } catch (error) {
      throw SdkErrors.CONFIG_IO_ERROR(path, error);
    }

    const auth = parseAuthSection(path, new TextDecoder('utf-8').decode(data));
    if (!auth) {
      return credential;
    }

    let next = credential;
    if (auth.api_client_id) {
      next = { ...next, access: auth.api_client_id };
    }
    if (auth.api_client_secret) {
      next = { ...next, secret: auth.api_client_secret };
    }
    if (auth.oauth_client_id && auth.oauth_client_secret) {
      next = await digest(auth.oauth_client_id, auth.oauth_client_secret)(next);
    }
    return next;
  };
}

/**
 * Reads credentials from `${prefix}_API_CLIENT_ID`, `${prefix}_API_CLIENT_SECRET`,
 * `${prefix}_API_OAUTH_CLIENT_ID` and `${prefix}_API_OAUTH_CLIENT_SECRET`.
 * Unset variables are skipped.
 */
export function useEnvironment(
  env: IEnvironment = new ProcessEnvironment(),
  prefix: string = DEFAULT_ENV_PREFIX
): ConfigurationOption {
  return async (credential) => {
    let next = await access(env.lookup(`${prefix}_API_CLIENT_ID`))(credential);
    next = await secret(env.lookup(`${prefix}_API_CLIENT_SECRET`))(next);
    return digest(
      env.lookup(`${prefix}_API_OAUTH_CLIENT_ID`),
      env.lookup(`${prefix}_API_OAUTH_CLIENT_SECRET`)
    )(next);
  };
}

function parseAuthSection(path: string, text: string): AuthSection | undefined {
  let document: unknown;
  try {
    document = parseToml(text);
  } catch (error) {
    console.warn(
      `[Credentials] Ignoring malformed configuration file ${path}: ${error instanceof Error ? error.message : 'parse error'}`
    );
    return undefined;
  }

  const result = CredentialFileSchema.safeParse(document);
  if (!result.success) {
    console.warn(`[Credentials] Ignoring configuration file ${path}: ${result.error.issues[0]?.message}`);
    return undefined;
  }

  return result.data ?? {};
}
