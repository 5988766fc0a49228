import { type PermissionLevel } from './account';

const LEVEL_RANK: Record<PermissionLevel, number> = {
  owner: 3,
  editor: 2,
  viewer: 1,
};

export function permissionRank(level: PermissionLevel): number {
  return LEVEL_RANK[level];
}

export function hasLevel(actual: PermissionLevel, required: PermissionLevel): boolean {
  return LEVEL_RANK[actual] >= LEVEL_RANK[required];
}

export function canRead(level: PermissionLevel | null): boolean {
  return level !== null && hasLevel(level, 'viewer');
}

export function canWrite(level: PermissionLevel | null): boolean {
  return level !== null && hasLevel(level, 'editor');
}

/** Explicit grants may only carry the levels below owner. */
export function isGrantableLevel(level: PermissionLevel): boolean {
  return level !== 'owner';
}
