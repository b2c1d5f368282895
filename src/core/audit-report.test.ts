import { describe, test, expect } from 'vitest';
import { buildAuditReport, renderAuditReport } from './audit-report.js';
import type { CollectedNode } from '../types/drive.js';
import type { Permission, Role } from '../types/permissions.js';

function grant(id: string, role: Role, ...emails: string[]): Permission {
  return { id, roles: [role], principals: emails.map((email) => ({ displayName: email, email })) };
}

function entry(path: string, permissions: Permission[], depth: number, isFolder = true): CollectedNode {
  return {
    kind: 'collected',
    node: { id: path, name: path.split('/').pop() ?? path, path, isFolder, depth },
    permissions,
    isRoot: depth === 0,
  };
}

const owner: Permission = { id: 'own', roles: ['owner'], principals: [{ displayName: 'Owner', email: 'owner@x.com' }] };

describe('buildAuditReport', () => {
  test('a subfolder without a root user is restricted', () => {
    const collected = [
      entry('Finance', [owner, grant('a', 'write', 'alice@x.com'), grant('b', 'read', 'bob@x.com')], 0),
      entry('Finance/X', [grant('c', 'write', 'alice@x.com')], 1),
    ];

    const report = buildAuditReport('Finance', collected, 2);

    expect(report).toEqual({
      rootPath: 'Finance',
      maxDepth: 2,
      rootUsers: [
        { identity: 'alice@x.com', role: 'write' },
        { identity: 'bob@x.com', role: 'read' },
      ],
      additionalUsers: [],
      specialFolders: [
        {
          path: 'Finance/X',
          classification: 'restricted',
          label: 'RESTRICTED',
          users: [{ identity: 'alice@x.com', role: 'write' }],
          lostAccess: ['bob@x.com'],
        },
      ],
      totalUsers: 2,
      subfolderCount: 1,
    });

    const lines = renderAuditReport(report).split('\n');
    expect(lines).toContain('=== ACL for "Finance" (recursive scan, max depth: 2) ===');
    expect(lines).toContain(`   • ${'alice@x.com'.padEnd(50)} (write)`);
    expect(lines).toContain('   📁 Finance/X (RESTRICTED)');
    expect(lines).toContain('      ⚠️  Access removed: bob@x.com');
    expect(lines).toContain('Summary: 2 unique user(s) across 1 root folder + 1 subfolder(s)');
  });

  test('a user added below the root is listed with their folders', () => {
    const collected = [
      entry('Finance', [grant('a', 'write', 'alice@x.com')], 0),
      entry('Finance/X', [grant('b', 'write', 'alice@x.com'), grant('c', 'read', 'carol@x.com')], 1),
    ];

    const report = buildAuditReport('Finance', collected, 3);
    const text = renderAuditReport(report);

    expect(report.additionalUsers).toEqual([{ identity: 'carol@x.com', grants: [{ path: 'Finance/X', role: 'read' }] }]);
    expect(report.specialFolders.map((f) => f.label)).toEqual(['EXTENDED']);
    expect(text).toContain('📋 Additional Users in Subfolders:\n   carol@x.com\n      └─ Finance/X (read)\n');
    expect(text.split('\n')).toContain('   📁 Finance/X (EXTENDED)');
    expect(text.split('\n')).not.toContain('      ⚠️  Access removed: ');
  });

  test('files below the root are left out of the audit', () => {
    const collected = [
      entry('Docs', [grant('a', 'read', 'alice@x.com')], 0),
      entry('Docs/A', [grant('a', 'read', 'alice@x.com')], 1),
      entry('Docs/notes.txt', [grant('b', 'read', 'bob@x.com')], 1, false),
    ];

    const report = buildAuditReport('Docs', collected, 1);

    expect(report.subfolderCount).toBe(1);
    expect(report.totalUsers).toBe(1);
    expect(report.additionalUsers).toEqual([]);
    expect(report.specialFolders).toEqual([]);
    expect(renderAuditReport(report).split('\n')).toContain(
      'Summary: 1 unique user(s) across 1 root folder + 1 subfolder(s)',
    );
  });

  test('a single-item report has no subfolder sections', () => {
    const report = buildAuditReport('Finance', [entry('Finance', [owner], 0)], 0);
    const lines = renderAuditReport(report).split('\n');

    expect(lines).toEqual([
      '',
      '='.repeat(80),
      '=== ACL for "Finance" ===',
      '='.repeat(80),
      '',
      '📊 Root Folder Permissions:',
      '   (No non-owner permissions found)',
      '',
      '-'.repeat(80),
      'Summary: 0 user(s) with access',
      '-'.repeat(80),
    ]);
  });

  test('users only present in subfolders count toward the total', () => {
    const collected = [
      entry('Docs', [grant('a', 'read', 'alice@x.com')], 0),
      entry('Docs/A', [grant('b', 'read', 'bob@x.com')], 1),
      entry('Docs/B', [grant('c', 'read', 'bob@x.com', 'carol@x.com')], 1),
    ];

    const report = buildAuditReport('Docs', collected, 1);

    expect(report.totalUsers).toBe(3);
    expect(report.subfolderCount).toBe(2);
    expect(report.specialFolders.map((f) => [f.path, f.label])).toEqual([
      ['Docs/A', 'DIFFERENT'],
      ['Docs/B', 'DIFFERENT'],
    ]);

    const text = renderAuditReport(report);
    expect(text).toContain(
      [
        '⚠️  Special Folders (Non-Inherited Permissions):',
        '   📁 Docs/A (DIFFERENT)',
        `      • ${'bob@x.com'.padEnd(46)} (read)`,
        '',
        '   📁 Docs/B (DIFFERENT)',
        `      • ${'bob@x.com'.padEnd(46)} (read)`,
        `      • ${'carol@x.com'.padEnd(46)} (read)`,
        '',
      ].join('\n'),
    );
    expect(text).not.toContain('Access removed');
  });
});
