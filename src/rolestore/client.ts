/**
 * Role Store Client
 *
 * Thin wrappers around the `/role-store/api/v1` endpoints, plus the
 * idempotent membership operations built on them (see RoleReconciler).
 *
 * @example
 * ```typescript
 * const store = new RoleStore(connector);
 * await store.addUserRole(userId, roleId);    // no write if already granted
 * await store.removeUserRole(userId, roleId); // no write if not granted
 * ```
 */

import type { AuditService } from '../core/audit-service.js';
import { resourcePath, type RestConnector } from '../restapi/connector.js';
import type { ListResult } from '../types/index.js';
import { SdkErrors } from '../utils/errors.js';
import { RoleReconciler, type ReconcileOutcome, type RoleDirectory } from './reconciler.js';
import type { CreatedResponse, Role, RoleRef, Source, User } from './types.js';

export const ROLE_STORE_API = '/role-store/api/v1';

const SOURCES = `${ROLE_STORE_API}/sources`;
const USERS = `${ROLE_STORE_API}/users`;
const ROLES = `${ROLE_STORE_API}/roles`;

export interface RoleStoreOptions {
  /** Records grants and revocations made through addUserRole/removeUserRole */
  auditService?: AuditService;
}

export class RoleStore implements RoleDirectory {
  private readonly api: RestConnector;
  private readonly reconciler: RoleReconciler;

  constructor(api: RestConnector, options: RoleStoreOptions = {}) {
    this.api = api;
    this.reconciler = new RoleReconciler(this, options.auditService);
  }

  // ==========================================================================
  // Sources
  // ==========================================================================

  async sources(): Promise<Source[]> {
    const result = await this.api.get<ListResult<Source>>(SOURCES);
    return itemsOf(result);
  }

  async source(id: string): Promise<Source> {
    return this.fetchOne<Source>(resourcePath(SOURCES, id));
  }

  /**
   * @returns ID of the created source, or '' if the directory replied without a body
   */
  async createSource(source: Partial<Source>): Promise<string> {
    const created = await this.api.post<CreatedResponse>(SOURCES, source);
    return created?.id ?? '';
  }

  async deleteSource(id: string): Promise<void> {
    await this.api.delete(resourcePath(SOURCES, id));
  }

  // ==========================================================================
  // Users
  // ==========================================================================

  /**
   * Searches users matching the keywords within a source.
   */
  async searchUsers(keywords: string, source: string): Promise<User[]> {
    const result = await this.api.post<ListResult<User>>(`${USERS}/search`, { keywords, source });
    return itemsOf(result);
  }

  async user(id: string): Promise<User> {
    return this.fetchOne<User>(resourcePath(USERS, id));
  }

  async userRoles(userId: string): Promise<Role[]> {
    const result = await this.api.get<ListResult<Role>>(resourcePath(USERS, userId, 'roles'));
    return itemsOf(result);
  }

  /**
   * Overwrites the user's role list as a whole. Prefer addUserRole and
   * removeUserRole, which skip the write when nothing changes.
   */
  async replaceUserRoles(userId: string, roles: Role[]): Promise<void> {
    await this.api.put(resourcePath(USERS, userId, 'roles'), roles);
  }

  async addUserRole(userId: string, roleId: string): Promise<ReconcileOutcome> {
    return this.reconciler.addUserRole(userId, roleId);
  }

  async removeUserRole(userId: string, roleId: string): Promise<ReconcileOutcome> {
    return this.reconciler.removeUserRole(userId, roleId);
  }

  // ==========================================================================
  // Roles
  // ==========================================================================

  async roles(): Promise<Role[]> {
    const result = await this.api.get<ListResult<Role>>(ROLES);
    return itemsOf(result);
  }

  async role(id: string): Promise<Role> {
    return this.fetchOne<Role>(resourcePath(ROLES, id));
  }

  async roleMembers(id: string): Promise<User[]> {
    const result = await this.api.get<ListResult<User>>(resourcePath(ROLES, id, 'members'));
    return itemsOf(result);
  }

  /**
   * @returns ID of the created role, or '' if the directory replied without a body
   */
  async createRole(role: Partial<Role>): Promise<string> {
    const created = await this.api.post<CreatedResponse>(ROLES, role);
    return created?.id ?? '';
  }

  /**
   * Resolves role names to references. Results come back in the directory's
   * order, which need not follow `names`; match on `name` if order matters.
   */
  async resolveRoles(names: readonly string[]): Promise<RoleRef[]> {
    if (names.length === 0) {
      return [];
    }
    const result = await this.api.post<ListResult<RoleRef>>(`${ROLES}/resolve`, names);
    return itemsOf(result);
  }

  private async fetchOne<T>(path: string): Promise<T> {
    const entity = await this.api.get<T>(path);
    if (entity === undefined) {
      throw SdkErrors.INVALID_RESPONSE('GET', path, 'empty body');
    }
    return entity;
  }
}

function itemsOf<T>(result: ListResult<T> | undefined): T[] {
  return result?.items ?? [];
}
