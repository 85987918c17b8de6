// Shared types for the PrivX SDK

export interface SdkErrorShape {
  code: string;
  message: string;
  statusCode: number;
  details?: Record<string, unknown>;
}

/**
 * List envelope returned by the role-store collection endpoints.
 */
export interface ListResult<T> {
  count: number;
  items?: T[];
}

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';
