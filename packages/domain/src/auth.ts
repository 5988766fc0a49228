import { type User } from './user';

export function isAccountDeleted(user: User): boolean {
  return user.deletedAt !== null;
}

export function isTokenExpired(expiresAt: Date, now: Date = new Date()): boolean {
  return expiresAt.getTime() <= now.getTime();
}

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}
