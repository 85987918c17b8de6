// Main export file - re-exports all public APIs

// Credential resolution and authorization
export * from './oauth/index.js';

// Role store client and reconciliation
export * from './rolestore/index.js';

// HTTP connector
export * from './restapi/index.js';

// Audit trail
export * from './core/index.js';

// Configuration schemas and sources
export * from './config/index.js';

// Client factory
export { createRoleStoreClient, type RoleStoreClientOptions } from './sdk.js';

// Utility exports
export * from './utils/errors.js';
export type { ListResult, HttpMethod, SdkErrorShape } from './types/index.js';
