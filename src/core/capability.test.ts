import { describe, test, expect } from 'vitest';
import { Capability } from './capability.js';

describe('Capability', () => {
  describe('fromScope', () => {
    test('write scope means full', () => {
      expect(Capability.fromScope('Files.Read Files.ReadWrite.All offline_access')).toBe('full');
    });

    test('manage scope alone does not grant write', () => {
      expect(Capability.fromScope('Sites.Manage.All offline_access')).toBe('unknown');
      expect(Capability.fromScope('Files.Read Sites.Manage.All')).toBe('read-only');
      expect(Capability.fromScope('Files.ReadWrite.All Sites.Manage.All')).toBe('full');
    });

    test('read scopes only means read-only', () => {
      expect(Capability.fromScope('Files.Read Sites.Read.All offline_access')).toBe('read-only');
    });

    test('resource-qualified scope names are recognised', () => {
      expect(Capability.fromScope('https://graph.microsoft.com/Files.ReadWrite')).toBe('full');
    });

    test('unrelated or empty scope is unknown', () => {
      expect(Capability.fromScope('User.Read offline_access')).toBe('unknown');
      expect(Capability.fromScope('')).toBe('unknown');
      expect(Capability.fromScope(undefined)).toBe('unknown');
    });
  });

  describe('satisfies', () => {
    test('orders insufficient < unknown < read-only < full', () => {
      expect(Capability.satisfies('full', 'read-only')).toBe(true);
      expect(Capability.satisfies('read-only', 'read-only')).toBe(true);
      expect(Capability.satisfies('read-only', 'full')).toBe(false);
      expect(Capability.satisfies('unknown', 'read-only')).toBe(false);
    });
  });
});
