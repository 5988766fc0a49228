import { describe, it, expect } from 'vitest';
import { AuditQuerySchema } from '../api/audit';

describe('AuditQuerySchema', () => {
  it('applies pagination defaults', () => {
    expect(AuditQuerySchema.parse({})).toEqual({ offset: 0, limit: 20 });
  });

  it('coerces query-string values', () => {
    const result = AuditQuerySchema.parse({
      action: 'LOGIN_FAILED',
      status: 'FAILURE',
      dateFrom: '2026-01-01T00:00:00Z',
      dateTo: '2026-01-31T00:00:00Z',
      offset: '40',
      limit: '10',
    });
    expect(result).toEqual({
      action: 'LOGIN_FAILED',
      status: 'FAILURE',
      dateFrom: new Date('2026-01-01T00:00:00Z'),
      dateTo: new Date('2026-01-31T00:00:00Z'),
      offset: 40,
      limit: 10,
    });
  });

  it('rejects unknown actions', () => {
    expect(AuditQuerySchema.safeParse({ action: 'HACK' }).success).toBe(false);
  });

  it('caps the page size at 100', () => {
    expect(AuditQuerySchema.safeParse({ limit: '101' }).success).toBe(false);
  });

  it('rejects an inverted date range', () => {
    const result = AuditQuerySchema.safeParse({ dateFrom: '2026-02-01', dateTo: '2026-01-01' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe('dateFrom must not be after dateTo');
    }
  });
});
