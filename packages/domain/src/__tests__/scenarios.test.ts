import { describe, it, expect, beforeEach, vi } from 'vitest';
import { PERMISSION_LEVELS, type PermissionLevel } from '../account';
import { permissionRank } from '../permissions';
import { AccessError } from '../permission-resolver';
import { type User } from '../user';
import { createHarness, type Harness } from './support/harness';

describe('account permissions, token rotation and audit working together', () => {
  let h: Harness;
  let owner: User;
  let editor: User;
  let viewer: User;
  let accountId: string;

  beforeEach(async () => {
    h = createHarness();
    owner = await h.store.seedUser({ email: 'o@example.com', username: 'owner' });
    editor = await h.store.seedUser({ email: 'e@example.com', username: 'editor' });
    viewer = await h.store.seedUser({ email: 'v@example.com', username: 'viewer' });
    const account = await h.accounts.createAccount(owner.id, { name: 'Joint', currency: 'EUR' });
    accountId = account.id;
    await h.sharing.share(owner.id, accountId, { userId: editor.id, level: 'editor' });
    await h.sharing.share(owner.id, accountId, { userId: viewer.id, level: 'viewer' });
  });

  it('require succeeds exactly up to the resolved level', async () => {
    for (const user of [owner, editor, viewer]) {
      const level = await h.resolver.resolve({}, user.id, accountId);
      expect(level).not.toBeNull();
      const actual: PermissionLevel = level ?? 'viewer';

      for (const required of PERMISSION_LEVELS) {
        const outcome = h.resolver.require({}, user.id, accountId, required);
        if (permissionRank(required) <= permissionRank(actual)) {
          await expect(outcome).resolves.toBe(actual);
        } else {
          await expect(outcome).rejects.toMatchObject({ reason: 'INSUFFICIENT_LEVEL', required, actual });
        }
      }
    }
  });

  it('has exactly one owner and never stores an owner grant', async () => {
    await expect(
      h.sharing.share(owner.id, accountId, { userId: editor.id, level: 'owner' }),
    ).rejects.toMatchObject({ kind: 'VALIDATION' });
    const grant = (await h.sharing.listShares(owner.id, accountId))[0];
    expect(grant).toBeDefined();
    await expect(
      h.sharing.updateShare(owner.id, accountId, grant?.id ?? '', 'owner'),
    ).rejects.toMatchObject({ kind: 'VALIDATION' });

    const levels = await Promise.all(
      [owner, editor, viewer].map((u) => h.resolver.resolve({}, u.id, accountId)),
    );
    expect(levels.filter((l) => l === 'owner')).toHaveLength(1);
    expect([...h.store.state.grants.values()].some((g) => g.level === 'owner')).toBe(false);
  });

  it('a refresh secret rotates once and its replay revokes the whole family', async () => {
    const { tokens } = await h.auth.login({ email: 'o@example.com', password: 'password123' });
    const rotated = await h.auth.refresh(tokens.refreshToken);

    await expect(h.auth.refresh(tokens.refreshToken)).rejects.toMatchObject({ kind: 'TOKEN_COMPROMISED' });
    await expect(h.auth.refresh(rotated.refreshToken)).rejects.toMatchObject({ kind: 'TOKEN_COMPROMISED' });

    const family = [...h.store.state.tokens.values()].filter((t) => t.userId === owner.id);
    expect(family.every((t) => t.revokedAt !== null)).toBe(true);
  });

  it('no token issued before a password change can be rotated afterwards', async () => {
    const first = await h.auth.login({ email: 'o@example.com', password: 'password123' });
    const second = await h.auth.login({ email: 'o@example.com', password: 'password123' });

    await h.auth.changePassword(owner.id, { currentPassword: 'password123', newPassword: 'better-password' });

    for (const secret of [first.tokens.refreshToken, second.tokens.refreshToken]) {
      const err = await h.auth.refresh(secret).catch((e: unknown) => e);
      expect(err).toMatchObject({ kind: expect.stringMatching(/^(INVALID_TOKEN|TOKEN_COMPROMISED)$/) });
    }
  });

  it('rolls back the audit row together with the change it describes', async () => {
    const accountsBefore = h.store.state.accounts.size;
    const auditBefore = h.store.auditEvents().length;

    await expect(
      h.store.withTransaction(async (tx) => {
        await h.store.accountRepo.create(tx, { id: 'acc-x', ownerId: owner.id, name: 'Temp', currency: 'EUR', notes: null });
        await h.audit.record(tx, { userId: owner.id, action: 'CREATE', entityType: 'account', entityId: 'acc-x' });
        throw new Error('aborted before commit');
      }),
    ).rejects.toThrow('aborted before commit');

    expect(h.store.state.accounts.size).toBe(accountsBefore);
    expect(h.store.auditEvents()).toHaveLength(auditBefore);
  });

  it('rolls back the change when its audit write fails', async () => {
    const third = await h.store.seedUser({ email: 't@example.com', username: 'third' });
    vi.spyOn(h.store.auditRepo, 'insert').mockRejectedValueOnce(new Error('audit table unavailable'));

    await expect(
      h.sharing.share(owner.id, accountId, { userId: third.id, level: 'viewer' }),
    ).rejects.toThrow('audit table unavailable');

    expect(await h.resolver.resolve({}, third.id, accountId)).toBeNull();
  });

  it('shows every grant to the owner and only their own to others', async () => {
    const asOwner = await h.sharing.listShares(owner.id, accountId);
    expect(asOwner.map((g) => g.userId).sort()).toEqual([editor.id, viewer.id].sort());

    for (const user of [editor, viewer]) {
      const visible = await h.sharing.listShares(user.id, accountId);
      expect(visible.map((g) => g.userId)).toEqual([user.id]);
    }
  });

  it('register, login, refresh: new secrets differ and the old one is spent', async () => {
    await h.auth.register({ email: 'alice@example.com', username: 'alice', password: 'alice-password' });
    const login = await h.auth.login({ email: 'alice@example.com', password: 'alice-password' });

    const refreshed = await h.auth.refresh(login.tokens.refreshToken);

    expect(refreshed.accessToken).not.toBe(login.tokens.accessToken);
    expect(refreshed.refreshToken).not.toBe(login.tokens.refreshToken);
    await expect(
      h.store.withTransaction((tx) => h.ledger.rotate(tx, login.tokens.refreshToken)),
    ).rejects.toMatchObject({ kind: 'COMPROMISED' });
  });

  it('an editor trying to share is told the level is insufficient, not that the account is missing', async () => {
    const third = await h.store.seedUser({ email: 't@example.com', username: 'third' });

    const err = await h.sharing
      .share(editor.id, accountId, { userId: third.id, level: 'viewer' })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(AccessError);
    expect(err).toMatchObject({ reason: 'INSUFFICIENT_LEVEL' });
  });

  it('replaying a revoked secret twice is reported as compromise both times', async () => {
    const { tokens } = await h.auth.login({ email: 'e@example.com', password: 'password123' });
    await h.auth.refresh(tokens.refreshToken);

    await expect(h.auth.refresh(tokens.refreshToken)).rejects.toMatchObject({ kind: 'TOKEN_COMPROMISED' });
    await expect(h.auth.refresh(tokens.refreshToken)).rejects.toMatchObject({ kind: 'TOKEN_COMPROMISED' });
  });

  it('three wrong passwords leave three anonymous failures and no success', async () => {
    for (let i = 0; i < 3; i++) {
      await expect(
        h.auth.login({ email: 'v@example.com', password: `wrong-${i}` }),
      ).rejects.toMatchObject({ kind: 'INVALID_CREDENTIALS' });
    }

    const logins = h.store.auditEvents().filter((e) => e.action === 'LOGIN' || e.action === 'LOGIN_FAILED');
    expect(logins).toHaveLength(3);
    for (const event of logins) {
      expect(event).toMatchObject({ action: 'LOGIN_FAILED', userId: null, status: 'FAILURE' });
    }
  });

  it('a deleted user can neither log in nor refresh an earlier session', async () => {
    const { tokens } = await h.auth.login({ email: 'v@example.com', password: 'password123' });

    await h.users.deleteUser(viewer.id, viewer.id);

    await expect(h.auth.login({ email: 'v@example.com', password: 'password123' })).rejects.toMatchObject({
      kind: 'INVALID_CREDENTIALS',
    });
    await expect(h.auth.refresh(tokens.refreshToken)).rejects.toMatchObject({ kind: 'TOKEN_COMPROMISED' });
    expect(h.store.auditEvents().filter((e) => e.action === 'LOGIN' && e.userId === viewer.id)).toHaveLength(1);
  });
});
