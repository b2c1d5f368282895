/**
 * Permission classification: who holds which role on an item, and how an
 * item's access list relates to the scan root's.
 */
import type { CollectedNode } from '../types/drive.js';
import type {
  Classification,
  Permission,
  PermissionAnalysis,
  Principal,
  Role,
  SpecialFolderLabel,
  UserAccessRecord,
  UserMatch,
} from '../types/permissions.js';

export function isOwnerPermission(permission: Permission): boolean {
  return permission.roles.includes('owner');
}

export function isInheritedPermission(permission: Permission): boolean {
  return permission.inheritedFrom !== undefined;
}

/** Neither owner nor inherited: the grants that can be removed on this item */
export function isExplicitPermission(permission: Permission): boolean {
  return !isOwnerPermission(permission) && !isInheritedPermission(permission);
}

/** Lower-cased email, or the display name when there is no email */
export function principalIdentity(principal: Principal): string {
  return principal.email ? principal.email.toLowerCase() : principal.displayName;
}

function effectiveRole(permission: Permission): Role {
  if (permission.roles.includes('write')) return 'write';
  return permission.roles[0] ?? 'read';
}

/**
 * Map every principal of every non-owner permission to its role.
 * A later permission for the same principal overwrites an earlier one.
 */
export function extractUsers(permissions: readonly Permission[]): Map<string, Role> {
  const users = new Map<string, Role>();
  for (const permission of permissions) {
    if (isOwnerPermission(permission)) continue;
    const role = effectiveRole(permission);
    for (const principal of permission.principals) {
      const identity = principalIdentity(principal);
      if (identity) users.set(identity, role);
    }
  }
  return users;
}

/**
 * How `child`'s access relates to `parent`'s. Subset and superset are
 * decided before falling through to `different`.
 */
export function classify(child: UserAccessRecord, parent: UserAccessRecord): Classification {
  if (child.size === 0 && parent.size === 0) return 'inherited';
  if (child.size === 0) return 'restricted';

  let onlyInChild = 0;
  for (const identity of child.keys()) {
    if (!parent.has(identity)) onlyInChild++;
  }
  let onlyInParent = 0;
  for (const identity of parent.keys()) {
    if (!child.has(identity)) onlyInParent++;
  }

  if (onlyInChild === 0 && onlyInParent === 0) return 'inherited';
  if (onlyInChild === 0) return 'restricted';
  if (onlyInParent === 0) return 'extended';
  return 'different';
}

export function classificationLabel(classification: Classification): SpecialFolderLabel {
  switch (classification) {
    case 'restricted':
      return 'RESTRICTED';
    case 'extended':
      return 'EXTENDED';
    case 'different':
      return 'DIFFERENT';
    default:
      return 'CUSTOM';
  }
}

export interface FolderGrant {
  path: string;
  role: Role;
}

/**
 * For each user that is absent from the root, the descendants where they
 * hold a role, in scan order.
 */
export function buildUserFolderMap(
  rootUsers: UserAccessRecord,
  collected: readonly CollectedNode[],
): Map<string, FolderGrant[]> {
  const map = new Map<string, FolderGrant[]>();
  for (const entry of collected) {
    if (entry.isRoot) continue;
    for (const [identity, role] of extractUsers(entry.permissions)) {
      if (rootUsers.has(identity)) continue;
      const grants = map.get(identity) ?? [];
      grants.push({ path: entry.node.path, role });
      map.set(identity, grants);
    }
  }
  return map;
}

export interface SpecialFolder {
  node: CollectedNode['node'];
  classification: Exclude<Classification, 'inherited'>;
  label: SpecialFolderLabel;
  users: Map<string, Role>;
  /** Root users missing here; only for restricted folders, sorted */
  lostAccess: string[];
}

/** Descendants whose access list is not the root's. */
export function detectSpecialFolders(
  collected: readonly CollectedNode[],
  rootUsers: UserAccessRecord,
): SpecialFolder[] {
  const special: SpecialFolder[] = [];
  for (const entry of collected) {
    if (entry.isRoot) continue;
    const users = extractUsers(entry.permissions);
    const classification = classify(users, rootUsers);
    if (classification === 'inherited') continue;

    const lostAccess =
      classification === 'restricted' ? [...rootUsers.keys()].filter((identity) => !users.has(identity)).sort() : [];

    special.push({
      node: entry.node,
      classification,
      label: classificationLabel(classification),
      users,
      lostAccess,
    });
  }
  return special;
}

/**
 * Sharing summary of one item's access list. `permissionCount` counts every
 * entry returned, owners included; `sharedUsers` holds identities.
 */
export function analyzePermissions(permissions: readonly Permission[]): PermissionAnalysis {
  let hasLinkSharing = false;
  let hasDirectSharing = false;
  const sharedUsers: string[] = [];

  for (const permission of permissions) {
    if (isOwnerPermission(permission)) continue;
    if (permission.link?.type) hasLinkSharing = true;
    if (permission.principals.length > 0) {
      hasDirectSharing = true;
      for (const principal of permission.principals) {
        const identity = principalIdentity(principal);
        if (identity && !sharedUsers.includes(identity)) sharedUsers.push(identity);
      }
    }
  }

  return { hasLinkSharing, hasDirectSharing, permissionCount: permissions.length, sharedUsers };
}

export function emailMatches(email: string | undefined, target: string, match: UserMatch = 'substring'): boolean {
  if (!email) return false;
  const candidate = email.toLowerCase();
  const wanted = target.toLowerCase();
  return match === 'exact' ? candidate === wanted : candidate.includes(wanted);
}

/** Whether an explicit grant on this item names the target user. */
export function hasExplicitUserPermission(
  permissions: readonly Permission[],
  target: string,
  match: UserMatch = 'substring',
): boolean {
  return permissions.some(
    (permission) =>
      isExplicitPermission(permission) &&
      permission.principals.some((principal) => emailMatches(principal.email, target, match)),
  );
}

/** Explicit permissions naming `email`; exact (case-insensitive) unless asked otherwise. */
export function explicitPermissionsFor(
  permissions: readonly Permission[],
  email: string,
  match: UserMatch = 'exact',
): Permission[] {
  return permissions.filter(
    (permission) =>
      isExplicitPermission(permission) &&
      permission.principals.some((principal) => emailMatches(principal.email, email, match)),
  );
}
