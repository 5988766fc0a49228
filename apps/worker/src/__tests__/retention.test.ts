import { describe, it, expect, vi } from 'vitest';
import { runRetentionJob, type RetentionDeps } from '../jobs/retention';

describe('runRetentionJob', () => {
  it('sweeps tokens and audit events with their own retention windows', async () => {
    const tx = { id: 'tx' };
    const refreshTokenRepo = { deleteExpired: vi.fn(async () => 4) };
    const auditRepo = { deleteOlderThan: vi.fn(async () => 2) };

    const result = await runRetentionJob(
      { refreshTokenRetentionDays: 30, auditLogRetentionDays: 2555 },
      { refreshTokenRepo, auditRepo, withTransaction: (fn) => fn(tx) },
    );

    expect(result).toEqual({ deletedTokens: 4, deletedAuditEvents: 2 });
    expect(refreshTokenRepo.deleteExpired).toHaveBeenCalledWith(tx, 30);
    expect(auditRepo.deleteOlderThan).toHaveBeenCalledWith(tx, 2555);
  });

  it('runs each sweep in its own transaction', async () => {
    const tx = { id: 'tx' };
    const runner = vi.fn();
    const deps: RetentionDeps = {
      refreshTokenRepo: { deleteExpired: vi.fn(async () => 0) },
      auditRepo: { deleteOlderThan: vi.fn(async () => 0) },
      withTransaction: (fn) => {
        runner();
        return fn(tx);
      },
    };

    await runRetentionJob({ refreshTokenRetentionDays: 1, auditLogRetentionDays: 1 }, deps);

    expect(runner).toHaveBeenCalledTimes(2);
  });

  it('propagates a failed sweep', async () => {
    const deps: RetentionDeps = {
      refreshTokenRepo: { deleteExpired: vi.fn(async () => Promise.reject(new Error('db down'))) },
      auditRepo: { deleteOlderThan: vi.fn(async () => 0) },
      withTransaction: (fn) => fn({}),
    };

    await expect(
      runRetentionJob({ refreshTokenRetentionDays: 1, auditLogRetentionDays: 1 }, deps),
    ).rejects.toThrow('db down');
    expect(deps.auditRepo.deleteOlderThan).not.toHaveBeenCalled();
  });
});
