export type RoleChange = 'grant' | 'revoke';

/**
 * What a role change did. 'unchanged' means the directory already held the
 * desired membership and nothing was written.
 */
export type RoleChangeResult = 'granted' | 'revoked' | 'unchanged' | 'failed';

/**
 * One audited grant or revocation of a role.
 */
export interface RoleChangeEntry {
  timestamp: Date;
  change: RoleChange;
  userId: string;
  roleId: string;
  result: RoleChangeResult;

  /** Error message when result is 'failed' */
  error?: string;
}
