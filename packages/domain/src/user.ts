export interface User {
  id: string;
  email: string;
  username: string;
  passwordHash: string;
  fullName: string | null;
  isAdmin: boolean;
  lastLoginAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
  deletedAt: Date | null;
}

export interface RefreshTokenRecord {
  id: string;
  userId: string;
  tokenHash: string;
  familyId: string;
  expiresAt: Date;
  revokedAt: Date | null;
  createdAt: Date;
}

export interface PublicUser {
  id: string;
  email: string;
  username: string;
  fullName: string | null;
  isAdmin: boolean;
}

export function toPublicUser(user: User): PublicUser {
  return {
    id: user.id,
    email: user.email,
    username: user.username,
    fullName: user.fullName,
    isAdmin: user.isAdmin,
  };
}
