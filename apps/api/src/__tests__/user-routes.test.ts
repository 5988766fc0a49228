import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { UserError } from '@emerald/domain';
import { createStubs, createTestApp, bearer, publicUser, OTHER_USER_ID, USER_ID, type Stubs } from './support';

type App = Awaited<ReturnType<typeof createTestApp>>;

describe('user routes', () => {
  let stubs: Stubs;
  let app: App;

  beforeEach(async () => {
    stubs = createStubs();
    app = await createTestApp(stubs);
  });

  afterEach(async () => {
    await app.close();
  });

  it('returns the caller profile', async () => {
    stubs.userService.getProfile.mockResolvedValue(publicUser);

    const res = await app.inject({ method: 'GET', url: '/users/me', headers: await bearer() });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual(publicUser);
    expect(stubs.userService.getProfile).toHaveBeenCalledWith(USER_ID, USER_ID);
  });

  it('updates the caller profile with normalised input', async () => {
    stubs.userService.updateProfile.mockResolvedValue({ ...publicUser, email: 'new@example.com' });

    const res = await app.inject({
      method: 'PATCH',
      url: '/users/me',
      headers: { ...(await bearer()), 'x-request-id': 'req-9', 'user-agent': 'test-agent' },
      payload: { email: ' New@Example.com ', fullName: null },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json().email).toBe('new@example.com');
    expect(stubs.userService.updateProfile).toHaveBeenCalledWith(
      USER_ID,
      USER_ID,
      { email: 'new@example.com', fullName: null },
      { clientIp: '127.0.0.1', userAgent: 'test-agent', correlationId: 'req-9' },
    );
  });

  it('rejects an empty profile update', async () => {
    const res = await app.inject({ method: 'PATCH', url: '/users/me', headers: await bearer(), payload: {} });

    expect(res.statusCode).toBe(422);
    expect(res.json()).toMatchObject({ code: 'VALIDATION', message: 'Invalid profile data' });
    expect(stubs.userService.updateProfile).not.toHaveBeenCalled();
  });

  it('maps a taken email to 409', async () => {
    stubs.userService.updateProfile.mockRejectedValue(new UserError('CONFLICT', 'Email is already registered'));

    const res = await app.inject({
      method: 'PATCH',
      url: '/users/me',
      headers: await bearer(),
      payload: { email: 'bob@example.com' },
    });

    expect(res.statusCode).toBe(409);
    expect(res.json()).toEqual({ code: 'CONFLICT', message: 'Email is already registered' });
  });

  it('deletes the caller account', async () => {
    stubs.userService.deleteUser.mockResolvedValue({ revokedSessions: 2 });

    const res = await app.inject({ method: 'DELETE', url: '/users/me', headers: await bearer() });

    expect(res.statusCode).toBe(204);
    expect(stubs.userService.deleteUser).toHaveBeenCalledWith(USER_ID, USER_ID, expect.any(Object));
  });

  it('passes another user id through and maps a refusal to 403', async () => {
    stubs.userService.deleteUser.mockRejectedValue(
      new UserError('FORBIDDEN', 'Administrator privileges required to manage other users'),
    );

    const res = await app.inject({ method: 'DELETE', url: `/users/${OTHER_USER_ID}`, headers: await bearer() });

    expect(res.statusCode).toBe(403);
    expect(res.json()).toEqual({
      code: 'FORBIDDEN',
      message: 'Administrator privileges required to manage other users',
    });
    expect(stubs.userService.deleteUser).toHaveBeenCalledWith(USER_ID, OTHER_USER_ID, expect.any(Object));
  });

  it('requires authentication', async () => {
    const res = await app.inject({ method: 'DELETE', url: '/users/me' });
    expect(res.statusCode).toBe(401);
    expect(stubs.userService.deleteUser).not.toHaveBeenCalled();
  });
});
