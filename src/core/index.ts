export type { RoleChange, RoleChangeEntry, RoleChangeResult } from './types.js';
export {
  AuditService,
  ConsoleAuditStorage,
  describeRoleChange,
  type AuditServiceConfig,
  type AuditStorage,
} from './audit-service.js';
