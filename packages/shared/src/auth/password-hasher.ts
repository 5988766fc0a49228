import { hash, verify } from '@node-rs/argon2';
import { type PasswordHasher } from '@emerald/domain';

export interface Argon2Options {
  timeCost: number;
  memoryCost: number;
  parallelism: number;
}

export const DEFAULT_ARGON2_OPTIONS: Argon2Options = {
  timeCost: 2,
  memoryCost: 65536,
  parallelism: 4,
};

/** Argon2id (the library default) hashing; the encoded hash carries its own parameters, so verification ignores these options. */
export class Argon2PasswordHasher implements PasswordHasher {
  private readonly options: Argon2Options;

  constructor(options: Partial<Argon2Options> = {}) {
    this.options = { ...DEFAULT_ARGON2_OPTIONS, ...options };
  }

  async hash(password: string): Promise<string> {
    return hash(password, {
      timeCost: this.options.timeCost,
      memoryCost: this.options.memoryCost,
      parallelism: this.options.parallelism,
      outputLen: 32,
    });
  }

  async verify(password: string, passwordHash: string): Promise<boolean> {
    if (!passwordHash.startsWith('$argon2')) return false;
    try {
      return await verify(passwordHash, password);
    } catch {
      return false;
    }
  }
}
