export type PermissionLevel = 'owner' | 'editor' | 'viewer';

export const PERMISSION_LEVELS: readonly PermissionLevel[] = ['owner', 'editor', 'viewer'];

export interface Account {
  id: string;
  ownerId: string;
  name: string;
  currency: string;
  notes: string | null;
  createdAt: Date;
  updatedAt: Date;
  deletedAt: Date | null;
}

/**
 * An explicit share of an account. Ownership is never stored here: the owner's
 * access comes from `Account.ownerId`, and the table rejects `level = 'owner'`.
 */
export interface PermissionGrant {
  id: string;
  accountId: string;
  userId: string;
  level: PermissionLevel;
  createdAt: Date;
  updatedAt: Date;
  deletedAt: Date | null;
}

export interface AccessibleAccount {
  account: Account;
  level: PermissionLevel;
}
