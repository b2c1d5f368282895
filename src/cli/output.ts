import { Fmt } from '../core/fmt.js';
import { principalIdentity, isInheritedPermission, isOwnerPermission } from '../core/permission-classifier.js';
import { TokenExpiry } from '../core/token-expiry.js';
import type { TokenSourceStatus } from '../core/credential-store.js';
import type { RevocationEntry } from '../core/mutations.js';
import type { FilteredHit } from '../types/drive.js';
import type { Permission } from '../types/permissions.js';

export type OutputFormat = 'text' | 'json';

const RULE = '='.repeat(80);

export function renderJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

/** Map keys sorted ascending, for "Level N" lines and JSON output. */
export function levelCounts(perLevel: ReadonlyMap<number, number>): Array<{ level: number; count: number }> {
  return [...perLevel].sort(([a], [b]) => a - b).map(([level, count]) => ({ level, count }));
}

/**
 * "a, b, c and 2 more". The searched user, when among them, is listed first.
 */
export function formatSharedWith(users: readonly string[], searchUser?: string): string {
  const ordered = [...users];
  if (searchUser) {
    const index = ordered.findIndex((u) => u.toLowerCase() === searchUser.toLowerCase());
    if (index > 0) ordered.unshift(...ordered.splice(index, 1));
  }
  const shown = ordered.slice(0, 3).join(', ');
  return ordered.length > 3 ? `${shown} and ${ordered.length - 3} more` : shown;
}

export interface FilterScanView {
  hits: readonly FilteredHit[];
  perLevel: ReadonlyMap<number, number>;
  visited: number;
  targetUser?: string;
}

export function renderFilterHits(view: FilterScanView, fmt: Fmt = Fmt.noop): string {
  const lines: string[] = [];
  const noun = view.targetUser ? 'item(s) shared with the user' : 'shared item(s)';

  lines.push(fmt.bold('📊 Item count by level:'));
  for (const { level, count } of levelCounts(view.perLevel)) {
    lines.push(`   Level ${level}: ${count} item(s)`);
  }
  lines.push('');
  lines.push(`✅ Scan complete. Found ${view.hits.length} ${noun}.`);
  lines.push(`   Checked ${view.visited} item(s).`);

  if (view.hits.length === 0) {
    lines.push('');
    lines.push(view.targetUser ? `ℹ️  No items are shared explicitly with ${view.targetUser}` : 'ℹ️  No shared items found');
    return lines.join('\n');
  }

  lines.push('', RULE, fmt.bold(`📁 Found ${view.hits.length} ${noun}:`), RULE);
  for (const hit of view.hits) {
    lines.push(`${hit.symbol} ${hit.node.path}`);
    lines.push(`   └─ ${hit.shareType} (${hit.permissionCount} permission(s))`);
    if (hit.sharedUsers.length > 0) {
      lines.push(`   └─ Shared with: ${formatSharedWith(hit.sharedUsers, view.targetUser)}`);
    }
    if (hit.hasLinkSharing && hit.hasDirectSharing) {
      lines.push('   └─ Has both link sharing and direct permissions');
    }
    lines.push('');
  }
  return lines.join('\n');
}

/** Single-item answer to "does this user have explicit access here". */
export function renderUserAccess(path: string, email: string, matches: readonly Permission[], fmt: Fmt = Fmt.noop): string {
  if (matches.length === 0) {
    return `ℹ️  User ${email} does not have explicit access to: ${path}`;
  }
  const lines = [fmt.green(`✅ User ${email} has access to: ${path}`)];
  for (const permission of matches) {
    lines.push(`   └─ Roles: ${permission.roles.join(', ')}`);
  }
  return lines.join('\n');
}

export interface PermissionRow {
  id: string;
  roles: string;
  user: string;
  email: string;
  linkType: string;
  linkScope: string;
  expires: string;
  inherited: boolean;
}

export function permissionRows(permissions: readonly Permission[]): PermissionRow[] {
  return permissions
    .filter((p) => !isOwnerPermission(p))
    .flatMap((p) => {
      const principals = p.principals.length > 0 ? p.principals : [undefined];
      return principals.map((principal) => ({
        id: p.id,
        roles: p.roles.join(', '),
        user: principal ? principalIdentity(principal) : '',
        email: principal?.email ?? '',
        linkType: p.link?.type ?? '',
        linkScope: p.link?.scope ?? '',
        expires: p.expiresAt ?? '',
        inherited: isInheritedPermission(p),
      }));
    });
}

export function renderPermissionList(path: string, permissions: readonly Permission[], fmt: Fmt = Fmt.noop): string {
  const rows = permissionRows(permissions);
  const lines = [fmt.bold(`Permissions for "${path}":`), ''];
  if (rows.length === 0) {
    lines.push(fmt.dim('   (No non-owner permissions found)'));
    return lines.join('\n');
  }
  for (const row of rows) {
    const who = row.user || (row.linkType ? `${row.linkType} link (${row.linkScope || 'unknown scope'})` : '(no principal)');
    const inherited = row.inherited ? fmt.dim(' [inherited]') : '';
    lines.push(`   • ${who} (${row.roles})${inherited}`);
    lines.push(fmt.dim(`      id: ${row.id}`));
    if (row.email && row.email !== row.user) lines.push(`      email: ${row.email}`);
    if (row.expires) lines.push(`      expires: ${row.expires}`);
  }
  return lines.join('\n');
}

export function renderTokenStatus(statuses: readonly TokenSourceStatus[], now: Date, fmt: Fmt = Fmt.noop): string {
  const lines: string[] = [];
  for (const status of statuses) {
    const title = status.source === 'owned' ? 'Owned token' : 'rclone token';
    lines.push(fmt.bold(`${title}: ${status.location}`));
    if (status.state !== 'ok') {
      lines.push(`   state: ${status.state}${status.detail ? ` (${status.detail})` : ''}`);
      lines.push('');
      continue;
    }
    lines.push(`   capability: ${status.capability ?? 'unknown'}`);
    if (status.expiry) lines.push(`   expiry: ${TokenExpiry.describe(status.expiry, now)}`);
    lines.push(`   refresh token: ${status.hasRefreshToken ? 'yes' : 'no'}`);
    lines.push('');
  }
  return lines.join('\n').trimEnd();
}

export function renderRevocationPlan(entries: readonly RevocationEntry[], email: string): string {
  const lines = [`Found ${entries.length} item(s) with permissions for ${email}:`];
  for (const entry of entries) lines.push(`  - ${entry.path}`);
  return lines.join('\n');
}

export function renderSuccess(message: string): string {
  return `✅ ${message}`;
}

export function renderError(message: string): string {
  return `❌ ${message}`;
}

export function renderInfo(message: string): string {
  return `ℹ️  ${message}`;
}
