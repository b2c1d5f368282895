import { describe, test, expect } from 'vitest';
import {
  formatSharedWith,
  permissionRows,
  renderFilterHits,
  renderPermissionList,
  renderRevocationPlan,
  renderTokenStatus,
  renderUserAccess,
} from './output.js';
import type { TokenSourceStatus } from '../core/credential-store.js';
import type { FilteredHit } from '../types/drive.js';
import type { Permission } from '../types/permissions.js';

const RULE = '='.repeat(80);

const link: Permission = { id: 'l1', roles: ['read'], principals: [], link: { type: 'view', scope: 'anonymous' } };
const bob: Permission = { id: 'p1', roles: ['write'], principals: [{ displayName: 'Bob', email: 'Bob@x.com' }] };
const owner: Permission = { id: 'o', roles: ['owner'], principals: [{ displayName: 'Owner', email: 'owner@x.com' }] };

describe('formatSharedWith', () => {
  test('lists up to three users', () => {
    expect(formatSharedWith(['a', 'b'])).toBe('a, b');
    expect(formatSharedWith(['a', 'b', 'c', 'd', 'e'])).toBe('a, b, c and 2 more');
  });

  test('puts the searched user first', () => {
    expect(formatSharedWith(['a', 'b', 'c', 'Bob@x.com'], 'bob@x.com')).toBe('Bob@x.com, a, b and 1 more');
  });
});

describe('renderFilterHits', () => {
  const hit: FilteredHit = {
    kind: 'hit',
    node: { id: 'r', name: 'Reports', path: 'Finance/Reports', isFolder: true, depth: 1 },
    symbol: '🔗',
    shareType: 'Link sharing',
    hasLinkSharing: true,
    hasDirectSharing: true,
    permissionCount: 3,
    sharedUsers: ['a@x.com', 'c@x.com', 'd@x.com', 'bob@x.com'],
  };

  test('renders level counts and each hit', () => {
    const text = renderFilterHits({
      hits: [hit],
      perLevel: new Map([
        [1, 2],
        [0, 1],
      ]),
      visited: 3,
      targetUser: 'bob@x.com',
    });

    expect(text.split('\n')).toEqual([
      '📊 Item count by level:',
      '   Level 0: 1 item(s)',
      '   Level 1: 2 item(s)',
      '',
      '✅ Scan complete. Found 1 item(s) shared with the user.',
      '   Checked 3 item(s).',
      '',
      RULE,
      '📁 Found 1 item(s) shared with the user:',
      RULE,
      '🔗 Finance/Reports',
      '   └─ Link sharing (3 permission(s))',
      '   └─ Shared with: bob@x.com, a@x.com, c@x.com and 1 more',
      '   └─ Has both link sharing and direct permissions',
      '',
    ]);
  });

  test('says so when nothing is shared', () => {
    const text = renderFilterHits({ hits: [], perLevel: new Map([[0, 1]]), visited: 1 });
    expect(text.split('\n').slice(-3)).toEqual(['   Checked 1 item(s).', '', 'ℹ️  No shared items found']);
  });
});

describe('renderUserAccess', () => {
  test('with and without a match', () => {
    expect(renderUserAccess('Finance', 'bob@x.com', [bob])).toBe('✅ User bob@x.com has access to: Finance\n   └─ Roles: write');
    expect(renderUserAccess('Finance', 'bob@x.com', [])).toBe('ℹ️  User bob@x.com does not have explicit access to: Finance');
  });
});

describe('permission listing', () => {
  test('rows skip owners and keep link-only permissions', () => {
    expect(permissionRows([owner, link, bob])).toEqual([
      { id: 'l1', roles: 'read', user: '', email: '', linkType: 'view', linkScope: 'anonymous', expires: '', inherited: false },
      { id: 'p1', roles: 'write', user: 'bob@x.com', email: 'Bob@x.com', linkType: '', linkScope: '', expires: '', inherited: false },
    ]);
  });

  test('renders each permission with its id', () => {
    const inherited: Permission = { ...bob, id: 'p2', inheritedFrom: { path: '/Finance' } };

    expect(renderPermissionList('Finance/Reports', [link, inherited]).split('\n')).toEqual([
      'Permissions for "Finance/Reports":',
      '',
      '   • view link (anonymous) (read)',
      '      id: l1',
      '   • bob@x.com (write) [inherited]',
      '      id: p2',
      '      email: Bob@x.com',
    ]);
  });
});

test('renderRevocationPlan', () => {
  const plan = renderRevocationPlan([{ itemId: 'r', path: 'Finance/Reports', permission: bob }], 'bob@x.com');
  expect(plan).toBe('Found 1 item(s) with permissions for bob@x.com:\n  - Finance/Reports');
});

test('renderTokenStatus', () => {
  const at = new Date('2025-06-01T13:00:00Z');
  const statuses: TokenSourceStatus[] = [
    {
      source: 'owned',
      location: '/home/test/token.json',
      state: 'ok',
      capability: 'full',
      expiry: { format: 'expires_at', raw: '2025-06-01T13:00:00Z', at },
      expired: false,
      hasRefreshToken: true,
    },
    { source: 'foreign', location: '/home/test/rclone.conf', state: 'missing', detail: 'no OneDrive remote' },
  ];

  expect(renderTokenStatus(statuses, new Date('2025-06-01T12:00:00Z')).split('\n')).toEqual([
    'Owned token: /home/test/token.json',
    '   capability: full',
    '   expiry: expires in 1h 0m',
    '   refresh token: yes',
    '',
    'rclone token: /home/test/rclone.conf',
    '   state: missing (no OneDrive remote)',
  ]);
});
