/**
 * Role Reconciler
 *
 * Converges a user's role set towards a desired membership with one read,
 * one decision and at most one write. When the desired state already holds
 * no write is issued.
 *
 * Membership is keyed by role id only. `explicit` is not part of the key:
 * removal drops a role however it was granted, and a role added here is
 * always recorded as an explicit grant.
 *
 * Concurrency: there is no version token between the read and the write.
 * Two reconcilers working on the same user can both read the same set and
 * the later write wins, losing the other's change. Callers needing stronger
 * guarantees must serialize updates per user.
 *
 * Each call is reported to the audit service once the outcome is known. An
 * audit failure is logged and never changes the outcome or the error the
 * caller sees.
 */

import { AuditService } from '../core/audit-service.js';
import type { RoleChange, RoleChangeEntry } from '../core/types.js';
import type { Role } from './types.js';

/**
 * Directory operations reconciliation depends on.
 */
export interface RoleDirectory {
  userRoles(userId: string): Promise<Role[]>;
  role(roleId: string): Promise<Role>;
  replaceUserRoles(userId: string, roles: Role[]): Promise<void>;
}

export type ReconcileOutcome = 'granted' | 'revoked' | 'unchanged';

export class RoleReconciler {
  private readonly directory: RoleDirectory;
  private readonly auditService: AuditService;

  constructor(directory: RoleDirectory, auditService: AuditService = new AuditService()) {
    this.directory = directory;
    this.auditService = auditService;
  }

  /**
   * Grants `roleId` to the user as an explicit role. Resolves 'unchanged'
   * without further calls if the user already holds it.
   *
   * The role is looked up before writing; a failed lookup aborts with
   * nothing written.
   */
  async addUserRole(userId: string, roleId: string): Promise<ReconcileOutcome> {
    return this.reconcile('grant', userId, roleId, async () => {
      const roles = await this.directory.userRoles(userId);
      if (roles.some((role) => role.id === roleId)) {
        return 'unchanged';
      }

      await this.directory.role(roleId);

      await this.directory.replaceUserRoles(userId, [...roles, { id: roleId, explicit: true }]);
      console.log(`[RoleStore] Granted role ${roleId} to user ${userId}`);
      return 'granted';
    });
  }

  /**
   * Removes `roleId` from the user. Resolves 'unchanged' with no write if the
   * user does not hold it.
   */
  async removeUserRole(userId: string, roleId: string): Promise<ReconcileOutcome> {
    return this.reconcile('revoke', userId, roleId, async () => {
      const roles = await this.directory.userRoles(userId);
      const remaining = roles.filter((role) => role.id !== roleId);
      if (remaining.length === roles.length) {
        return 'unchanged';
      }

      await this.directory.replaceUserRoles(userId, remaining);
      console.log(`[RoleStore] Revoked role ${roleId} from user ${userId}`);
      return 'revoked';
    });
  }

  private async reconcile(
    change: RoleChange,
    userId: string,
    roleId: string,
    apply: () => Promise<ReconcileOutcome>
  ): Promise<ReconcileOutcome> {
    let outcome: ReconcileOutcome;
    try {
      outcome = await apply();
    } catch (error) {
      await this.audit({
        timestamp: new Date(),
        change,
        userId,
        roleId,
        result: 'failed',
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }

    await this.audit({ timestamp: new Date(), change, userId, roleId, result: outcome });
    return outcome;
  }

  private async audit(entry: RoleChangeEntry): Promise<void> {
    try {
      await this.auditService.log(entry);
    } catch (error) {
      console.warn(
        `[RoleStore] Could not record ${entry.change} of role ${entry.roleId} for user ${entry.userId}: ${error instanceof Error ? error.message : 'unknown error'}`
      );
    }
  }
}
