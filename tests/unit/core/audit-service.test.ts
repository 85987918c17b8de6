/**
 * AuditService Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { AuditService, ConsoleAuditStorage, describeRoleChange } from '../../../src/core/audit-service.js';
import { InMemoryAuditStorage, createMockRoleChangeEntry } from '../../../src/testing/index.js';

describe('AuditService', () => {
  describe('Null Object Pattern', () => {
    it('should work without configuration (disabled by default)', async () => {
      const audit = new AuditService();

      await expect(audit.log(createMockRoleChangeEntry())).resolves.toBeUndefined();
    });

    it('should not log when disabled', async () => {
      const storage = new InMemoryAuditStorage();
      const audit = new AuditService({ enabled: false, storage });

      await audit.log(createMockRoleChangeEntry());

      expect(storage.entries).toHaveLength(0);
    });
  });

  describe('Enabled Audit Logging', () => {
    it('should forward entries to the storage in order', async () => {
      const storage = new InMemoryAuditStorage();
      const audit = new AuditService({ enabled: true, storage });
      const grant = createMockRoleChangeEntry();
      const revoke = createMockRoleChangeEntry({ change: 'revoke', result: 'unchanged' });

      await audit.log(grant);
      await audit.log(revoke);

      expect(storage.entries).toEqual([grant, revoke]);
    });

    it('should reject when the storage rejects', async () => {
      const audit = new AuditService({
        enabled: true,
        storage: { log: vi.fn().mockRejectedValue(new Error('audit sink down')) },
      });

      await expect(audit.log(createMockRoleChangeEntry())).rejects.toThrow('audit sink down');
    });
  });

  describe('ConsoleAuditStorage', () => {
    let logSpy: MockInstance<typeof console.log>;

    beforeEach(() => {
      logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    });

    afterEach(() => {
      logSpy.mockRestore();
    });

    it('should be the default storage once enabled', async () => {
      await new AuditService({ enabled: true }).log(createMockRoleChangeEntry());

      expect(logSpy).toHaveBeenCalledWith(
        '[Audit] 2024-01-01T00:00:00.000Z grant role role-1 to user user-1: granted'
      );
    });

    it('should write one line per entry', () => {
      new ConsoleAuditStorage().log(createMockRoleChangeEntry({ change: 'revoke', result: 'revoked' }));

      expect(logSpy).toHaveBeenCalledTimes(1);
      expect(logSpy).toHaveBeenCalledWith(
        '[Audit] 2024-01-01T00:00:00.000Z revoke role role-1 from user user-1: revoked'
      );
    });
  });

  describe('describeRoleChange', () => {
    it('should append the error of a failed change', () => {
      const entry = createMockRoleChangeEntry({
        roleId: 'role-z',
        result: 'failed',
        error: 'GET /roles/role-z: role not found',
      });

      expect(describeRoleChange(entry)).toBe(
        'grant role role-z to user user-1: failed (GET /roles/role-z: role not found)'
      );
    });
  });
});
