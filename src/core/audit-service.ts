/**
 * Audit Service - write-only trail of role changes with a Null Object default
 *
 * The reconciler reports every grant and revocation here. Nothing is recorded
 * unless the service is enabled; enabled without a storage, entries are
 * written to the console.
 */

import type { RoleChangeEntry } from './types.js';

export interface AuditServiceConfig {
  /** Whether audit logging is enabled (default: false) */
  enabled?: boolean;

  /** Where entries go (default: ConsoleAuditStorage) */
  storage?: AuditStorage;
}

/**
 * Sink for audit entries. Querying belongs to whatever persistence backs it.
 */
export interface AuditStorage {
  log(entry: RoleChangeEntry): Promise<void> | void;
}

/**
 * One-line description of a role change, e.g.
 * `grant role role-ops to user alice: granted`.
 */
export function describeRoleChange(entry: RoleChangeEntry): string {
  const preposition = entry.change === 'grant' ? 'to' : 'from';
  const line = `${entry.change} role ${entry.roleId} ${preposition} user ${entry.userId}: ${entry.result}`;
  return entry.error === undefined ? line : `${line} (${entry.error})`;
}

export class ConsoleAuditStorage implements AuditStorage {
  log(entry: RoleChangeEntry): void {
    console.log(`[Audit] ${entry.timestamp.toISOString()} ${describeRoleChange(entry)}`);
  }
}

/**
 * Usage:
 * ```typescript
 * // Disabled by default
 * const audit = new AuditService();
 * await audit.log(entry); // No-op
 *
 * const audit = new AuditService({ enabled: true, storage: myStorage });
 * const store = new RoleStore(connector, { auditService: audit });
 * ```
 */
export class AuditService {
  private readonly enabled: boolean;
  private readonly storage: AuditStorage;

  constructor(config: AuditServiceConfig = {}) {
    this.enabled = config.enabled ?? false;
    this.storage = config.storage ?? new ConsoleAuditStorage();
  }

  /**
   * Hands the entry to the storage. Rejects if the storage does.
   */
  async log(entry: RoleChangeEntry): Promise<void> {
    if (!this.enabled) {
      return;
    }

    await this.storage.log(entry);
  }
}
