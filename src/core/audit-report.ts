/**
 * Audit report: root permissions, users that gain access below the root, and
 * folders whose access list is not the root's. Files below the root are not
 * part of the audit.
 */
import { Fmt } from './fmt.js';
import {
  buildUserFolderMap,
  detectSpecialFolders,
  extractUsers,
  type FolderGrant,
} from './permission-classifier.js';
import type { CollectedNode } from '../types/drive.js';
import type { Classification, Role, SpecialFolderLabel } from '../types/permissions.js';

export interface UserRole {
  identity: string;
  role: Role;
}

export interface AdditionalUser {
  identity: string;
  grants: FolderGrant[];
}

export interface SpecialFolderEntry {
  path: string;
  classification: Exclude<Classification, 'inherited'>;
  label: SpecialFolderLabel;
  users: UserRole[];
  lostAccess: string[];
}

export interface AuditReport {
  rootPath: string;
  maxDepth: number;
  rootUsers: UserRole[];
  /** Empty when maxDepth is 0 */
  additionalUsers: AdditionalUser[];
  /** Empty when maxDepth is 0 */
  specialFolders: SpecialFolderEntry[];
  totalUsers: number;
  subfolderCount: number;
}

const byIdentity = (a: { identity: string }, b: { identity: string }): number =>
  a.identity < b.identity ? -1 : a.identity > b.identity ? 1 : 0;

function sortedUsers(users: ReadonlyMap<string, Role>): UserRole[] {
  return [...users].map(([identity, role]) => ({ identity, role })).sort(byIdentity);
}

export function buildAuditReport(rootPath: string, collected: readonly CollectedNode[], maxDepth: number): AuditReport {
  const root = collected.find((entry) => entry.isRoot);
  const rootUsers = extractUsers(root?.permissions ?? []);
  const descendants = collected.filter((entry) => !entry.isRoot && entry.node.isFolder);

  const everyone = new Set(rootUsers.keys());
  for (const entry of descendants) {
    for (const identity of extractUsers(entry.permissions).keys()) everyone.add(identity);
  }

  const recursive = maxDepth > 0;
  const additionalUsers = recursive
    ? [...buildUserFolderMap(rootUsers, descendants)].map(([identity, grants]) => ({ identity, grants })).sort(byIdentity)
    : [];
  const specialFolders = recursive
    ? detectSpecialFolders(descendants, rootUsers).map((folder) => ({
        path: folder.node.path || folder.node.id,
        classification: folder.classification,
        label: folder.label,
        users: sortedUsers(folder.users),
        lostAccess: folder.lostAccess,
      }))
    : [];

  return {
    rootPath,
    maxDepth,
    rootUsers: sortedUsers(rootUsers),
    additionalUsers,
    specialFolders,
    totalUsers: everyone.size,
    subfolderCount: descendants.length,
  };
}

const RULE = '='.repeat(80);
const THIN_RULE = '-'.repeat(80);

export function renderAuditReport(report: AuditReport, fmt: Fmt = Fmt.noop): string {
  const recursive = report.maxDepth > 0;
  const lines: string[] = [];

  const title = recursive
    ? `=== ACL for "${report.rootPath}" (recursive scan, max depth: ${report.maxDepth}) ===`
    : `=== ACL for "${report.rootPath}" ===`;
  lines.push('', RULE, fmt.bold(title), RULE, '');

  lines.push(fmt.bold('📊 Root Folder Permissions:'));
  if (report.rootUsers.length === 0) {
    lines.push(fmt.dim('   (No non-owner permissions found)'));
  } else {
    for (const user of report.rootUsers) {
      lines.push(`   • ${user.identity.padEnd(50)} (${user.role})`);
    }
  }
  lines.push('');

  if (recursive) {
    if (report.additionalUsers.length > 0) {
      lines.push(fmt.bold('📋 Additional Users in Subfolders:'));
      for (const user of report.additionalUsers) {
        lines.push(`   ${fmt.cyan(user.identity)}`);
        for (const grant of user.grants) {
          lines.push(`      └─ ${grant.path} (${grant.role})`);
        }
        lines.push('');
      }
    }

    if (report.specialFolders.length > 0) {
      lines.push(fmt.bold('⚠️  Special Folders (Non-Inherited Permissions):'));
      for (const folder of report.specialFolders) {
        lines.push(`   📁 ${folder.path} (${fmt.yellow(folder.label)})`);
        if (folder.users.length === 0) {
          lines.push(fmt.dim('      (No users with direct permissions)'));
        }
        for (const user of folder.users) {
          lines.push(`      • ${user.identity.padEnd(46)} (${user.role})`);
        }
        if (folder.lostAccess.length > 0) {
          lines.push(fmt.red(`      ⚠️  Access removed: ${folder.lostAccess.join(', ')}`));
        }
        lines.push('');
      }
    }
  }

  const summary = recursive
    ? `Summary: ${report.totalUsers} unique user(s) across 1 root folder + ${report.subfolderCount} subfolder(s)`
    : `Summary: ${report.totalUsers} user(s) with access`;
  lines.push(THIN_RULE, summary, THIN_RULE);

  return lines.join('\n');
}
