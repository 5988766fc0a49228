import { DatabaseError } from 'pg';
import { UniqueViolationError } from '@emerald/domain';

const UNIQUE_VIOLATION = '23505';

/** Rethrows a unique-index collision as the domain's error; everything else passes through. */
export function translateUniqueViolation(err: unknown): never {
  if (err instanceof DatabaseError && err.code === UNIQUE_VIOLATION) {
    throw new UniqueViolationError(err.constraint ?? 'unknown');
  }
  throw err;
}
