import { describe, test, expect } from 'vitest';
import { TokenExpiry } from './token-expiry.js';

describe('TokenExpiry', () => {
  describe('detect', () => {
    test('owned expires_at in UTC', () => {
      const expiry = TokenExpiry.detect({ expires_at: '2025-10-22T23:53:05Z' });
      expect(expiry.format).toBe('expires_at');
      expect(expiry.format !== 'none' && expiry.at.toISOString()).toBe('2025-10-22T23:53:05.000Z');
    });

    test('rclone expiry with fractional seconds and an offset', () => {
      const expiry = TokenExpiry.detect({ expiry: '2025-10-31T01:22:03.598349702+10:00' });
      expect(expiry.format).toBe('expiry');
      expect(expiry.format !== 'none' && expiry.at.toISOString()).toBe('2025-10-30T15:22:03.000Z');
    });

    test('negative offset', () => {
      const expiry = TokenExpiry.detect({ expiry: '2025-01-01T00:00:00-05:30' });
      expect(expiry.format !== 'none' && expiry.at.toISOString()).toBe('2025-01-01T05:30:00.000Z');
    });

    test('zero time means no expiry', () => {
      expect(TokenExpiry.detect({ expiry: '0001-01-01T00:00:00Z' })).toEqual({ format: 'none', raw: '0001-01-01T00:00:00Z' });
    });

    test('no field means no expiry', () => {
      expect(TokenExpiry.detect({})).toEqual({ format: 'none' });
    });

    test('expires_at wins over expiry', () => {
      expect(TokenExpiry.detect({ expires_at: '2025-01-01T00:00:00Z', expiry: '2026-01-01T00:00:00Z' }).format).toBe('expires_at');
    });
  });

  describe('isExpired', () => {
    const expiry = TokenExpiry.detect({ expires_at: '2025-06-01T12:00:00Z' });

    test('before and at the instant', () => {
      expect(TokenExpiry.isExpired(expiry, new Date('2025-06-01T11:59:59Z'))).toBe(false);
      expect(TokenExpiry.isExpired(expiry, new Date('2025-06-01T12:00:00Z'))).toBe(true);
    });

    test('unknown without an expiry', () => {
      expect(TokenExpiry.isExpired({ format: 'none' }, new Date())).toBeUndefined();
    });
  });

  test('formatOwned drops milliseconds', () => {
    expect(TokenExpiry.formatOwned(new Date('2025-06-01T12:00:00.123Z'))).toBe('2025-06-01T12:00:00Z');
  });

  describe('describe', () => {
    const expiry = TokenExpiry.detect({ expires_at: '2025-06-01T12:00:00Z' });

    test('future', () => {
      expect(TokenExpiry.describe(expiry, new Date('2025-06-01T11:18:00Z'))).toBe('expires in 42m');
    });

    test('past', () => {
      expect(TokenExpiry.describe(expiry, new Date('2025-06-01T14:05:00Z'))).toBe('expired 2h 5m ago');
    });

    test('none', () => {
      expect(TokenExpiry.describe({ format: 'none' }, new Date())).toBe('no expiry recorded');
    });
  });
});
