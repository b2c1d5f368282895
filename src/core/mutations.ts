/**
 * Mutations: invite, remove, strip and revoke, on a full-capability credential only.
 *
 * Remote failures of a single mutation come back as a failed MutationResult
 * with the message for its status; they are never retried.
 */
import type { Log } from './log.js';
import { explicitPermissionsFor, isInheritedPermission, isOwnerPermission } from './permission-classifier.js';
import { filterScan, type ScanOptions } from './scanner.js';
import type { ResolvedCredential } from './credential-store.js';
import { resolveItemPath, type DriveApi } from '../connectors/onedrive/graph-client.js';
import { AclError } from '../errors/acl-error.js';
import { ErrInsufficientCapability, HasStatus, Remote } from '../errors/errors.js';
import type { ScanNode } from '../types/drive.js';
import type { Permission } from '../types/permissions.js';

export type MutationResult = { ok: true; message: string } | { ok: false; message: string; status?: number };

export interface StripResult {
  removedCount: number;
  failedCount: number;
  message: string;
}

export interface RevocationEntry {
  itemId: string;
  path: string;
  permission: Permission;
}

export interface RevocationPlan {
  email: string;
  entries: RevocationEntry[];
}

export interface RevocationSummary {
  removed: number;
  failed: number;
}

type StatusMessages = Partial<Record<number, string>> & { fallback: string };

const REMOVE_MESSAGES: StatusMessages = {
  403: 'Insufficient permissions to remove this permission',
  404: 'Permission not found (may already be removed)',
  401: 'Token expired or invalid',
  fallback: 'Failed to remove permission',
};

const INVITE_MESSAGES: StatusMessages = {
  403: 'Insufficient permissions to invite users',
  404: 'Item not found',
  401: 'Token expired or invalid',
  fallback: 'Failed to invite user',
};

/** Remote failures become a failed result; anything else propagates. */
function failure(err: unknown, messages: StatusMessages): MutationResult {
  if (!Remote.is(err)) throw err;
  if (AclError.has(err, HasStatus)) {
    const status = err.data.status;
    return { ok: false, status, message: messages[status] ?? `${messages.fallback}: HTTP ${status}` };
  }
  return { ok: false, message: `${messages.fallback}: ${err.message}` };
}

export class Mutations {
  constructor(
    private readonly api: DriveApi,
    credential: Pick<ResolvedCredential, 'capability' | 'source'>,
    private readonly log?: Log,
  ) {
    if (credential.capability !== 'full') {
      throw ErrInsufficientCapability.create({ required: 'full', actual: credential.capability, source: credential.source });
    }
  }

  async invite(itemId: string, email: string, role: 'read' | 'write'): Promise<MutationResult> {
    try {
      await this.api.invite(itemId, email, role);
      return { ok: true, message: `Successfully invited ${email} with ${role} permission` };
    } catch (err) {
      return failure(err, INVITE_MESSAGES);
    }
  }

  /**
   * Remove one permission. Given the permission itself, owner and inherited
   * grants are refused without a remote call.
   */
  async removePermission(itemId: string, target: Permission | string): Promise<MutationResult> {
    if (typeof target !== 'string') {
      if (isOwnerPermission(target)) {
        return { ok: false, message: 'Owner permissions cannot be removed' };
      }
      if (isInheritedPermission(target)) {
        const from = target.inheritedFrom?.path ?? 'a parent item';
        return { ok: false, message: `Permission is inherited from ${from} and cannot be removed here` };
      }
    }
    const permissionId = typeof target === 'string' ? target : target.id;
    try {
      await this.api.deletePermission(itemId, permissionId);
      return { ok: true, message: 'Permission removed successfully' };
    } catch (err) {
      return failure(err, REMOVE_MESSAGES);
    }
  }

  /** Remove every explicit permission on the item, counting individual failures. */
  async stripExplicit(itemId: string): Promise<StripResult> {
    const permissions = await this.api.listPermissions(itemId);
    let removedCount = 0;
    let failedCount = 0;
    for (const permission of permissions) {
      if (isOwnerPermission(permission) || isInheritedPermission(permission)) continue;
      const result = await this.removePermission(itemId, permission);
      if (result.ok) {
        removedCount++;
      } else {
        failedCount++;
        this.log?.warn(`Could not remove permission ${permission.id}: ${result.message}`);
      }
    }
    const message =
      failedCount > 0
        ? `Removed ${removedCount} permission(s), ${failedCount} failed`
        : `Removed ${removedCount} explicit permission(s)`;
    return { removedCount, failedCount, message };
  }

  /**
   * Find every explicit grant to `email` at or below `start`. Below the start
   * node this is a filter scan, so grants under an explicit match are not
   * looked for (they are inherited).
   */
  async planRevocation(start: ScanNode, email: string, opts: Omit<ScanOptions, 'log'>): Promise<RevocationPlan> {
    const entries: RevocationEntry[] = [];

    if (opts.maxDepth === 0) {
      const permissions = await this.api.listPermissions(start.id);
      const matches = explicitPermissionsFor(permissions, email);
      if (matches.length > 0) {
        const path = start.path || (await resolveItemPath(this.api, start.id));
        for (const permission of matches) entries.push({ itemId: start.id, path, permission });
      }
      return { email, entries };
    }

    const state = await filterScan(this.api, start, { ...opts, targetUser: email, match: 'exact', log: this.log });
    for (const hit of state.results) {
      let permissions: Permission[];
      try {
        permissions = await this.api.listPermissions(hit.node.id);
      } catch (err) {
        if (!Remote.is(err)) throw err;
        this.log?.warn(`Skipping ${hit.node.path}: ${err.message}`);
        continue;
      }
      for (const permission of explicitPermissionsFor(permissions, email)) {
        entries.push({ itemId: hit.node.id, path: hit.node.path, permission });
      }
    }
    return { email, entries };
  }

  async applyRevocation(
    plan: RevocationPlan,
    onResult?: (entry: RevocationEntry, result: MutationResult) => void,
  ): Promise<RevocationSummary> {
    let removed = 0;
    let failed = 0;
    for (const entry of plan.entries) {
      const result = await this.removePermission(entry.itemId, entry.permission);
      if (result.ok) removed++;
      else failed++;
      onResult?.(entry, result);
    }
    return { removed, failed };
  }
}
