import { vi } from 'vitest';
import { InMemoryRateLimiter, JoseTokenService } from '@emerald/shared';
import { type PublicUser, type RateLimitRule } from '@emerald/domain';
import { buildServer } from '../server';

export const USER_ID = '3f2b8c1e-4d5a-4b6c-8d7e-9f0a1b2c3d4e';
export const OTHER_USER_ID = '7a1c2e3f-5b6d-4e8f-9a0b-1c2d3e4f5a6b';
export const ACCOUNT_ID = '0e9d8c7b-6a5f-4e3d-8c2b-1a0f9e8d7c6b';
export const SHARE_ID = '5d4c3b2a-1f0e-4d9c-8b7a-6f5e4d3c2b1a';

export const publicUser: PublicUser = {
  id: USER_ID,
  email: 'alice@example.com',
  username: 'alice',
  fullName: 'Alice Example',
  isAdmin: false,
};

export const tokenService = new JoseTokenService({
  activeKid: 'test-key',
  keys: [{ kid: 'test-key', secret: 'test-secret-test-secret-test-secret' }],
  accessTokenTtlMinutes: 15,
});

export function createStubs() {
  return {
    authService: {
      register: vi.fn(),
      login: vi.fn(),
      refresh: vi.fn(),
      logout: vi.fn(),
      changePassword: vi.fn(),
      getMe: vi.fn(),
      listSessions: vi.fn(),
    },
    accountService: {
      createAccount: vi.fn(),
      getAccount: vi.fn(),
      listAccounts: vi.fn(),
      updateAccount: vi.fn(),
      deleteAccount: vi.fn(),
    },
    sharingService: {
      share: vi.fn(),
      updateShare: vi.fn(),
      revokeShare: vi.fn(),
      listShares: vi.fn(),
    },
    auditService: {
      listForUser: vi.fn(),
      listAll: vi.fn(),
    },
    userService: {
      getProfile: vi.fn(),
      updateProfile: vi.fn(),
      deleteUser: vi.fn(),
    },
  };
}

export type Stubs = ReturnType<typeof createStubs>;

export async function createTestApp(
  stubs: Stubs,
  opts: { apiRateLimit?: RateLimitRule; rateLimitEnabled?: boolean } = {},
) {
  return buildServer(
    { ...stubs, tokenService, rateLimiter: new InMemoryRateLimiter() },
    {
      trustProxy: false,
      rateLimitEnabled: opts.rateLimitEnabled ?? false,
      apiRateLimit: opts.apiRateLimit ?? { limit: 100, windowSeconds: 60 },
    },
  );
}

export async function bearer(userId: string = USER_ID): Promise<{ authorization: string }> {
  const { token } = await tokenService.signAccessToken({ userId, email: 'alice@example.com', isAdmin: false });
  return { authorization: `Bearer ${token}` };
}
