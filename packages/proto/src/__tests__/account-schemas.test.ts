import { describe, it, expect } from 'vitest';
import { CreateAccountRequestSchema, UpdateAccountRequestSchema, CurrencySchema } from '../api/account';
import { CreateShareRequestSchema, UpdateShareRequestSchema } from '../api/share';

describe('CurrencySchema', () => {
  it('upper-cases ISO codes', () => {
    expect(CurrencySchema.parse('eur')).toBe('EUR');
  });

  it('rejects anything but three letters', () => {
    expect(CurrencySchema.safeParse('EURO').success).toBe(false);
    expect(CurrencySchema.safeParse('E1R').success).toBe(false);
  });
});

describe('CreateAccountRequestSchema', () => {
  it('trims the name', () => {
    const result = CreateAccountRequestSchema.parse({ name: '  Checking ', currency: 'usd' });
    expect(result).toEqual({ name: 'Checking', currency: 'USD' });
  });

  it('rejects an empty name', () => {
    expect(CreateAccountRequestSchema.safeParse({ name: '   ', currency: 'USD' }).success).toBe(false);
  });
});

describe('UpdateAccountRequestSchema', () => {
  it('requires at least one field', () => {
    expect(UpdateAccountRequestSchema.safeParse({}).success).toBe(false);
  });

  it('allows clearing notes', () => {
    expect(UpdateAccountRequestSchema.parse({ notes: null })).toEqual({ notes: null });
  });
});

describe('share schemas', () => {
  const userId = '7f1c4a2e-3b5d-4e6f-8a9b-0c1d2e3f4a5b';

  it('accepts editor and viewer', () => {
    expect(CreateShareRequestSchema.parse({ userId, level: 'editor' }).level).toBe('editor');
    expect(UpdateShareRequestSchema.parse({ level: 'viewer' }).level).toBe('viewer');
  });

  it('never accepts owner', () => {
    const result = CreateShareRequestSchema.safeParse({ userId, level: 'owner' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe("Permission level must be 'editor' or 'viewer'");
    }
  });

  it('requires a uuid user id', () => {
    expect(CreateShareRequestSchema.safeParse({ userId: 'bob', level: 'viewer' }).success).toBe(false);
  });
});
