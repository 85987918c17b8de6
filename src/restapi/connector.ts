/**
 * REST Connector
 *
 * Generic JSON verbs used by the API clients. Paths are resource paths
 * relative to the configured base URL (e.g. `/role-store/api/v1/roles`);
 * build them with `resourcePath()` so identifiers are percent-escaped.
 *
 * `get` and `post` resolve to undefined when the response body is empty.
 *
 * No retry is attempted. Errors surface as PrivXError:
 * - 401 → UNAUTHORIZED, 403 → FORBIDDEN, 404 → NOT_FOUND, other non-2xx → HTTP_ERROR
 * - network failure → TRANSPORT_ERROR, timeout → TIMEOUT
 * - 2xx body that is not JSON → INVALID_RESPONSE
 */

import {
  ConnectorConfigSchema,
  type ConnectorConfig,
  type ConnectorConfigInput,
} from '../config/schemas/connector.js';
import type { HttpMethod } from '../types/index.js';
import { SdkErrors, type PrivXError } from '../utils/errors.js';

export interface RestConnector {
  get<T>(path: string): Promise<T | undefined>;
  post<T>(path: string, body: unknown): Promise<T | undefined>;
  put(path: string, body: unknown): Promise<void>;
  delete(path: string): Promise<void>;
}

/**
 * Supplies bearer tokens for outgoing requests.
 */
export interface TokenProvider {
  accessToken(): Promise<string>;
}

/**
 * Joins path segments, percent-escaping each identifier.
 *
 * @example
 * resourcePath('/role-store/api/v1/users', userId, 'roles')
 * // => '/role-store/api/v1/users/a%2Fb/roles' for userId 'a/b'
 */
export function resourcePath(base: string, ...segments: string[]): string {
  return [base, ...segments.map((segment) => encodeURIComponent(segment))].join('/');
}

export class HttpConnector implements RestConnector {
  private readonly config: ConnectorConfig;
  private readonly tokens?: TokenProvider;

  /**
   * @param config - Connection settings, validated with ConnectorConfigSchema
   * @param tokens - Bearer token source; requests are unauthenticated without one
   */
  constructor(config: ConnectorConfigInput, tokens?: TokenProvider) {
    this.config = ConnectorConfigSchema.parse(config);
    this.tokens = tokens;
  }

  async get<T>(path: string): Promise<T | undefined> {
    const response = await this.send('GET', path);
    return this.readJson<T>('GET', path, response);
  }

  async post<T>(path: string, body: unknown): Promise<T | undefined> {
    const response = await this.send('POST', path, body);
    return this.readJson<T>('POST', path, response);
  }

  async put(path: string, body: unknown): Promise<void> {
    await this.send('PUT', path, body);
  }

  async delete(path: string): Promise<void> {
    await this.send('DELETE', path);
  }

  getBaseUrl(): string {
    return this.config.baseUrl;
  }

  private async send(method: HttpMethod, path: string, body?: unknown): Promise<Response> {
    const headers: Record<string, string> = {
      Accept: 'application/json',
      ...this.config.defaultHeaders,
    };

    if (this.tokens) {
      headers.Authorization = `Bearer ${await this.tokens.accessToken()}`;
    }

    const init: RequestInit = { method, headers };
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json';
      init.body = JSON.stringify(body);
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeout);
    init.signal = controller.signal;

    let response: Response;
    try {
      response = await fetch(`${this.config.baseUrl}${path}`, init);
    } catch (error) {
      if (controller.signal.aborted) {
        throw SdkErrors.TIMEOUT(method, path, this.config.timeout);
      }
      throw SdkErrors.TRANSPORT_ERROR(method, path, error);
    } finally {
      clearTimeout(timeoutId);
    }

    if (!response.ok) {
      const error = await this.toError(method, path, response);
      console.error(`[HttpConnector] ${method} ${path} failed: ${response.status}`);
      throw error;
    }

    return response;
  }

  private async readJson<T>(method: HttpMethod, path: string, response: Response): Promise<T | undefined> {
    const text = await response.text();
    if (text === '') {
      return undefined;
    }

    try {
      return JSON.parse(text) as T;
    } catch (error) {
      console.error(`[HttpConnector] ${method} ${path} returned a body that is not JSON`);
      throw SdkErrors.INVALID_RESPONSE(
        method,
        path,
        error instanceof Error ? error.message : 'malformed JSON',
        error
      );
    }
  }

  private async toError(method: string, path: string, response: Response): Promise<PrivXError> {
    let message = response.statusText;
    try {
      const text = await response.text();
      if (text) {
        message = text;
      }
    } catch (error) {
      console.warn(
        `[HttpConnector] Could not read error body of ${method} ${path}: ${error instanceof Error ? error.message : 'unknown error'}`
      );
    }

    switch (response.status) {
      case 401:
        return SdkErrors.UNAUTHORIZED(method, path, message);
      case 403:
        return SdkErrors.FORBIDDEN(method, path, message);
      case 404:
        return SdkErrors.NOT_FOUND(method, path, message);
      default:
        return SdkErrors.HTTP_ERROR(method, path, response.status, message);
    }
  }
}
