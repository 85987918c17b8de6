/**
 * HTTP Connector Configuration Schema
 */

import { z } from 'zod';

export const DEFAULT_TIMEOUT_MS = 30000;

export const ConnectorConfigSchema = z.object({
  baseUrl: z
    .string()
    .url()
    .transform((url) => url.replace(/\/+$/, ''))
    .describe('Base URL of the PrivX deployment, e.g. https://privx.example.com'),
  timeout: z
    .number()
    .int()
    .positive()
    .default(DEFAULT_TIMEOUT_MS)
    .describe('Per-request timeout in milliseconds'),
  defaultHeaders: z.record(z.string()).optional().describe('Headers sent with every request'),
});

/** Configuration as callers write it (timeout optional) */
export type ConnectorConfigInput = z.input<typeof ConnectorConfigSchema>;

/** Configuration after validation and defaults */
export type ConnectorConfig = z.output<typeof ConnectorConfigSchema>;
