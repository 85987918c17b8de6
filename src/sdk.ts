/**
 * Client factory
 *
 * Wires credential resolution, the password-grant authorizer, the HTTP
 * connector and the role-store client together.
 *
 * @example
 * ```typescript
 * const store = await createRoleStoreClient({
 *   baseUrl: 'https://privx.example.com',
 *   credentials: [useConfigFile(process.env.PRIVX_CONFIG), useEnvironment()],
 * });
 * ```
 */

import type { ConnectorConfigInput } from './config/schemas/connector.js';
import type { AuditService } from './core/audit-service.js';
import { PasswordGrantAuthorizer } from './oauth/authorizer.js';
import type { ConfigurationOption } from './oauth/options.js';
import { resolveCredential } from './oauth/resolver.js';
import { HttpConnector } from './restapi/connector.js';
import { RoleStore } from './rolestore/client.js';

export interface RoleStoreClientOptions extends ConnectorConfigInput {
  /** Applied in order; later options take precedence */
  credentials: readonly ConfigurationOption[];
  auditService?: AuditService;
}

export async function createRoleStoreClient(options: RoleStoreClientOptions): Promise<RoleStore> {
  const { credentials, auditService, ...connection } = options;

  const credential = await resolveCredential(credentials);
  const authorizer = new PasswordGrantAuthorizer(credential, connection);
  const connector = new HttpConnector(connection, authorizer);

  return new RoleStore(connector, { auditService });
}
