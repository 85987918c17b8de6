/**
 * Password Grant Authorizer
 *
 * Exchanges a resolved Credential for bearer tokens at the PrivX token
 * endpoint (`/auth/api/v1/oauth/token`) using the OAuth 2.0 resource owner
 * password grant. The API client pair is sent as username/password and the
 * OAuth client pair, pre-encoded as the credential digest, as Basic auth.
 *
 * Tokens are cached until shortly before they expire; concurrent callers
 * share a single in-flight grant.
 */

import { z } from 'zod';
import { ConnectorConfigSchema, type ConnectorConfig, type ConnectorConfigInput } from '../config/schemas/connector.js';
import type { TokenProvider } from '../restapi/connector.js';
import { SdkErrors } from '../utils/errors.js';
import type { Credential } from './options.js';

export const TOKEN_PATH = '/auth/api/v1/oauth/token';

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
  expires_in: z.number().nonnegative().optional(),
});

export interface PasswordGrantAuthorizerOptions extends ConnectorConfigInput {
  /** Seconds before expiry at which a cached token is considered stale (default: 30) */
  expirySkewSeconds?: number;
}

interface CachedToken {
  value: string;
  expiresAt: number;
}

export class PasswordGrantAuthorizer implements TokenProvider {
  private readonly credential: Readonly<Credential>;
  private readonly config: ConnectorConfig;
  private readonly expirySkewMs: number;
  private token?: CachedToken;
  private pending?: Promise<string>;

  /**
   * @throws PrivXError CONFIGURATION_ERROR if a credential field is empty
   */
  constructor(credential: Readonly<Credential>, options: PasswordGrantAuthorizerOptions) {
    const missing = (['access', 'secret', 'digest'] as const).filter((field) => !credential[field]);
    if (missing.length > 0) {
      throw SdkErrors.CONFIGURATION_ERROR(`missing credential field(s): ${missing.join(', ')}`);
    }

    this.credential = credential;
    this.config = ConnectorConfigSchema.parse(options);
    this.expirySkewMs = (options.expirySkewSeconds ?? 30) * 1000;
  }

  async accessToken(): Promise<string> {
    if (this.token && Date.now() < this.token.expiresAt) {
      return this.token.value;
    }

    if (!this.pending) {
      this.pending = this.grant().finally(() => {
        this.pending = undefined;
      });
    }
    return this.pending;
  }

  /**
   * Drops the cached token so the next call performs a fresh grant.
   */
  invalidate(): void {
    this.token = undefined;
  }

  private async grant(): Promise<string> {
    const url = `${this.config.baseUrl}${TOKEN_PATH}`;
    const body = new URLSearchParams({
      grant_type: 'password',
      username: this.credential.access,
      password: this.credential.secret,
    });

    console.log(`[OAuth] Requesting access token from ${url}`);

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeout);

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          Accept: 'application/json',
          Authorization: `Basic ${this.credential.digest}`,
        },
        body: body.toString(),
        signal: controller.signal,
      });
    } catch (error) {
      if (controller.signal.aborted) {
        throw SdkErrors.TIMEOUT('POST', TOKEN_PATH, this.config.timeout);
      }
      throw SdkErrors.TRANSPORT_ERROR('POST', TOKEN_PATH, error);
    } finally {
      clearTimeout(timeoutId);
    }

    const payload: unknown = await response.json().catch(() => undefined);

    if (!response.ok) {
      throw SdkErrors.AUTHENTICATION_FAILED(describeTokenError(payload, response), response.status);
    }

    const parsed = TokenResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw SdkErrors.AUTHENTICATION_FAILED('token endpoint returned no access_token', 502);
    }

    const { access_token: value, expires_in: expiresIn } = parsed.data;
    // Without a lifetime the token is used once and not cached
    this.token =
      expiresIn === undefined
        ? undefined
        : { value, expiresAt: Date.now() + expiresIn * 1000 - this.expirySkewMs };

    console.log('[OAuth] Access token granted');
    return value;
  }
}

function describeTokenError(payload: unknown, response: Response): string {
  const parsed = z
    .object({ error: z.string().optional(), error_description: z.string().optional() })
    .safeParse(payload);
  if (parsed.success) {
    const reason = parsed.data.error_description ?? parsed.data.error;
    if (reason) {
      return reason;
    }
  }
  return `${response.status} ${response.statusText}`;
}
