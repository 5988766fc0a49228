import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { AccessError, AuditError, SharingError, type Account, type AuditEvent, type PermissionGrant } from '@emerald/domain';
import {
  createStubs,
  createTestApp,
  bearer,
  ACCOUNT_ID,
  OTHER_USER_ID,
  SHARE_ID,
  USER_ID,
  type Stubs,
} from './support';

type App = Awaited<ReturnType<typeof createTestApp>>;

const timestamp = new Date('2026-02-01T12:00:00.000Z');

const account: Account = {
  id: ACCOUNT_ID,
  ownerId: USER_ID,
  name: 'Household',
  currency: 'EUR',
  notes: null,
  createdAt: timestamp,
  updatedAt: timestamp,
  deletedAt: null,
};

const grant: PermissionGrant = {
  id: SHARE_ID,
  accountId: ACCOUNT_ID,
  userId: OTHER_USER_ID,
  level: 'viewer',
  createdAt: timestamp,
  updatedAt: timestamp,
  deletedAt: null,
};

describe('account routes', () => {
  let stubs: Stubs;
  let app: App;

  beforeEach(async () => {
    stubs = createStubs();
    app = await createTestApp(stubs);
  });

  afterEach(async () => {
    await app.close();
  });

  it('creates an account owned by the caller', async () => {
    stubs.accountService.createAccount.mockResolvedValue(account);

    const res = await app.inject({
      method: 'POST',
      url: '/accounts',
      headers: await bearer(),
      payload: { name: 'Household', currency: 'eur' },
    });

    expect(res.statusCode).toBe(201);
    expect(res.json()).toEqual({
      id: ACCOUNT_ID,
      ownerId: USER_ID,
      name: 'Household',
      currency: 'EUR',
      notes: null,
      permissionLevel: 'owner',
      createdAt: '2026-02-01T12:00:00.000Z',
      updatedAt: '2026-02-01T12:00:00.000Z',
    });
    expect(stubs.accountService.createAccount).toHaveBeenCalledWith(
      USER_ID,
      { name: 'Household', currency: 'EUR' },
      expect.objectContaining({ clientIp: '127.0.0.1' }),
    );
  });

  it('lists accessible accounts with the caller level', async () => {
    stubs.accountService.listAccounts.mockResolvedValue([{ account, level: 'viewer' }]);

    const res = await app.inject({ method: 'GET', url: '/accounts', headers: await bearer() });

    expect(res.statusCode).toBe(200);
    expect(res.json()[0].permissionLevel).toBe('viewer');
  });

  it('hides accounts the caller cannot see behind 404', async () => {
    stubs.accountService.getAccount.mockRejectedValue(new AccessError('NOT_FOUND', 'Account not found'));

    const res = await app.inject({ method: 'GET', url: `/accounts/${ACCOUNT_ID}`, headers: await bearer() });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ code: 'NOT_FOUND', message: 'Account not found' });
  });

  it('answers 403 when the level is too low', async () => {
    stubs.accountService.updateAccount.mockRejectedValue(
      new AccessError('INSUFFICIENT_LEVEL', 'Requires editor access, you have viewer', 'editor', 'viewer'),
    );

    const res = await app.inject({
      method: 'PATCH',
      url: `/accounts/${ACCOUNT_ID}`,
      headers: await bearer(),
      payload: { name: 'Renamed' },
    });

    expect(res.statusCode).toBe(403);
    expect(res.json()).toEqual({
      code: 'FORBIDDEN',
      message: 'Requires editor access, you have viewer',
      requiredLevel: 'editor',
    });
  });

  it('reports an editor level on updates by a non-owner', async () => {
    stubs.accountService.updateAccount.mockResolvedValue({ ...account, ownerId: OTHER_USER_ID, name: 'Renamed' });

    const res = await app.inject({
      method: 'PATCH',
      url: `/accounts/${ACCOUNT_ID}`,
      headers: await bearer(),
      payload: { name: 'Renamed' },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json().permissionLevel).toBe('editor');
  });

  it('rejects an empty patch', async () => {
    const res = await app.inject({
      method: 'PATCH',
      url: `/accounts/${ACCOUNT_ID}`,
      headers: await bearer(),
      payload: {},
    });

    expect(res.statusCode).toBe(422);
    expect(res.json().message).toBe('Invalid account data');
  });

  it('rejects a malformed account id', async () => {
    const res = await app.inject({ method: 'GET', url: '/accounts/not-a-uuid', headers: await bearer() });

    expect(res.statusCode).toBe(422);
    expect(res.json().message).toBe('Invalid account id');
    expect(stubs.accountService.getAccount).not.toHaveBeenCalled();
  });

  it('deletes an account', async () => {
    stubs.accountService.deleteAccount.mockResolvedValue(undefined);

    const res = await app.inject({ method: 'DELETE', url: `/accounts/${ACCOUNT_ID}`, headers: await bearer() });

    expect(res.statusCode).toBe(204);
    expect(stubs.accountService.deleteAccount).toHaveBeenCalledWith(USER_ID, ACCOUNT_ID, expect.any(Object));
  });

  it('hides internal failures', async () => {
    stubs.accountService.listAccounts.mockRejectedValue(new Error('connection reset'));

    const res = await app.inject({ method: 'GET', url: '/accounts', headers: await bearer() });

    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({ code: 'INTERNAL', message: 'Internal server error' });
  });

  it('answers malformed JSON with 400', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/accounts',
      headers: { ...(await bearer()), 'content-type': 'application/json' },
      payload: '{"name":',
    });

    expect(res.statusCode).toBe(400);
    expect(res.json().code).toBe('BAD_REQUEST');
  });
});

describe('share routes', () => {
  let stubs: Stubs;
  let app: App;

  beforeEach(async () => {
    stubs = createStubs();
    app = await createTestApp(stubs);
  });

  afterEach(async () => {
    await app.close();
  });

  it('shares an account', async () => {
    stubs.sharingService.share.mockResolvedValue(grant);

    const res = await app.inject({
      method: 'POST',
      url: `/accounts/${ACCOUNT_ID}/shares`,
      headers: await bearer(),
      payload: { userId: OTHER_USER_ID, level: 'viewer' },
    });

    expect(res.statusCode).toBe(201);
    expect(res.json()).toEqual({
      id: SHARE_ID,
      accountId: ACCOUNT_ID,
      userId: OTHER_USER_ID,
      level: 'viewer',
      createdAt: '2026-02-01T12:00:00.000Z',
      updatedAt: '2026-02-01T12:00:00.000Z',
    });
    expect(stubs.sharingService.share).toHaveBeenCalledWith(
      USER_ID,
      ACCOUNT_ID,
      { userId: OTHER_USER_ID, level: 'viewer' },
      expect.any(Object),
    );
  });

  it('refuses to grant owner access at the boundary', async () => {
    const res = await app.inject({
      method: 'POST',
      url: `/accounts/${ACCOUNT_ID}/shares`,
      headers: await bearer(),
      payload: { userId: OTHER_USER_ID, level: 'owner' },
    });

    expect(res.statusCode).toBe(422);
    expect(res.json().issues).toEqual([{ path: 'level', message: "Permission level must be 'editor' or 'viewer'" }]);
    expect(stubs.sharingService.share).not.toHaveBeenCalled();
  });

  it('maps a duplicate share to 409', async () => {
    stubs.sharingService.share.mockRejectedValue(new SharingError('CONFLICT', 'Account is already shared with this user'));

    const res = await app.inject({
      method: 'POST',
      url: `/accounts/${ACCOUNT_ID}/shares`,
      headers: await bearer(),
      payload: { userId: OTHER_USER_ID, level: 'editor' },
    });

    expect(res.statusCode).toBe(409);
    expect(res.json()).toEqual({ code: 'CONFLICT', message: 'Account is already shared with this user' });
  });

  it('updates a share level', async () => {
    stubs.sharingService.updateShare.mockResolvedValue({ ...grant, level: 'editor' });

    const res = await app.inject({
      method: 'PUT',
      url: `/accounts/${ACCOUNT_ID}/shares/${SHARE_ID}`,
      headers: await bearer(),
      payload: { level: 'editor' },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json().level).toBe('editor');
    expect(stubs.sharingService.updateShare).toHaveBeenCalledWith(
      USER_ID,
      ACCOUNT_ID,
      SHARE_ID,
      'editor',
      expect.any(Object),
    );
  });

  it('revokes a share', async () => {
    stubs.sharingService.revokeShare.mockResolvedValue(undefined);

    const res = await app.inject({
      method: 'DELETE',
      url: `/accounts/${ACCOUNT_ID}/shares/${SHARE_ID}`,
      headers: await bearer(),
    });

    expect(res.statusCode).toBe(204);
  });

  it('maps a missing share to 404', async () => {
    stubs.sharingService.revokeShare.mockRejectedValue(new SharingError('NOT_FOUND', 'Share not found'));

    const res = await app.inject({
      method: 'DELETE',
      url: `/accounts/${ACCOUNT_ID}/shares/${SHARE_ID}`,
      headers: await bearer(),
    });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ code: 'NOT_FOUND', message: 'Share not found' });
  });
});

describe('audit log routes', () => {
  let stubs: Stubs;
  let app: App;

  const event: AuditEvent = {
    id: 'evt-1',
    userId: USER_ID,
    action: 'LOGIN',
    entityType: 'user',
    entityId: USER_ID,
    oldValues: null,
    newValues: null,
    description: 'User logged in',
    clientIp: '127.0.0.1',
    userAgent: 'test-agent',
    correlationId: 'req-1',
    status: 'SUCCESS',
    errorMessage: null,
    extraMetadata: null,
    createdAt: timestamp,
  };

  beforeEach(async () => {
    stubs = createStubs();
    app = await createTestApp(stubs);
  });

  afterEach(async () => {
    await app.close();
  });

  it('pages through the caller own events', async () => {
    stubs.auditService.listForUser.mockResolvedValue({ items: [event], total: 1 });

    const res = await app.inject({
      method: 'GET',
      url: '/audit-logs/me?action=LOGIN&limit=5',
      headers: await bearer(),
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      items: [{ ...event, createdAt: '2026-02-01T12:00:00.000Z' }],
      total: 1,
      offset: 0,
      limit: 5,
    });
    expect(stubs.auditService.listForUser).toHaveBeenCalledWith(USER_ID, { action: 'LOGIN' }, { offset: 0, limit: 5 });
  });

  it('rejects an inverted date range', async () => {
    const res = await app.inject({
      method: 'GET',
      url: '/audit-logs/me?dateFrom=2026-03-01&dateTo=2026-02-01',
      headers: await bearer(),
    });

    expect(res.statusCode).toBe(422);
    expect(res.json().issues).toEqual([{ path: 'dateFrom', message: 'dateFrom must not be after dateTo' }]);
  });

  it('rejects a page size above the maximum', async () => {
    const res = await app.inject({ method: 'GET', url: '/audit-logs/me?limit=101', headers: await bearer() });
    expect(res.statusCode).toBe(422);
  });

  it('keeps the full log for administrators', async () => {
    stubs.auditService.listAll.mockRejectedValue(new AuditError('FORBIDDEN', 'Administrator access required'));

    const res = await app.inject({ method: 'GET', url: '/audit-logs', headers: await bearer() });

    expect(res.statusCode).toBe(403);
    expect(res.json()).toEqual({ code: 'FORBIDDEN', message: 'Administrator access required' });
  });
});

describe('general API rate limit', () => {
  it('throttles a user after the configured number of requests', async () => {
    const stubs = createStubs();
    stubs.accountService.listAccounts.mockResolvedValue([]);
    const app = await createTestApp(stubs, { rateLimitEnabled: true, apiRateLimit: { limit: 1, windowSeconds: 60 } });
    const headers = await bearer();

    const first = await app.inject({ method: 'GET', url: '/accounts', headers });
    const second = await app.inject({ method: 'GET', url: '/accounts', headers });

    expect(first.statusCode).toBe(200);
    expect(second.statusCode).toBe(429);
    expect(second.headers['retry-after']).toBe('60');
    expect(second.json()).toEqual({
      code: 'RATE_LIMITED',
      message: 'Too many requests, please try again later',
      retryAfterSeconds: 60,
    });
    await app.close();
  });

  it('runs after authentication so anonymous calls are rejected first', async () => {
    const stubs = createStubs();
    const app = await createTestApp(stubs, { rateLimitEnabled: true, apiRateLimit: { limit: 1, windowSeconds: 60 } });

    const res = await app.inject({ method: 'GET', url: '/accounts' });

    expect(res.statusCode).toBe(401);
    await app.close();
  });
});
