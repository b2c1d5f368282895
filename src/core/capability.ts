import { StaticTypeCompanion } from './companion.js';

export type Capability = 'full' | 'read-only' | 'unknown' | 'insufficient';

const WRITE_SCOPES = new Set(['files.readwrite', 'files.readwrite.all']);
const READ_SCOPES = new Set(['files.read', 'files.read.all', 'sites.read.all']);

const RANK: Record<Capability, number> = {
  insufficient: 0,
  unknown: 1,
  'read-only': 2,
  full: 3,
};

/** "https://graph.microsoft.com/Files.Read" and "Files.Read" name the same scope */
function scopeName(entry: string): string {
  return entry.slice(entry.lastIndexOf('/') + 1).toLowerCase();
}

export const Capability = StaticTypeCompanion({
  /**
   * Derive the capability a token grants from its space-separated scope string.
   * Only a Files.ReadWrite scope allows ACL edits; Sites.Manage.All on its own does not.
   */
  fromScope(scope: string | undefined): Capability {
    if (!scope) return 'unknown';
    const names = scope.split(/\s+/).filter(Boolean).map(scopeName);
    if (names.some((n) => WRITE_SCOPES.has(n))) return 'full';
    if (names.some((n) => READ_SCOPES.has(n))) return 'read-only';
    return 'unknown';
  },

  satisfies(actual: Capability, required: Capability): boolean {
    return RANK[actual] >= RANK[required];
  },
});
