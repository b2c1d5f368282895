export type Role = 'read' | 'write' | 'owner' | (string & {});

export interface Principal {
  displayName: string;
  email?: string;
}

export interface SharingLink {
  type: string;
  scope?: string;
  webUrl?: string;
}

/**
 * A single entry of an item's access list, decoded from the Graph response.
 * `inheritedFrom` is set when the grant lives on an ancestor.
 */
export interface Permission {
  id: string;
  roles: readonly Role[];
  principals: readonly Principal[];
  link?: SharingLink;
  inheritedFrom?: { id?: string; path?: string };
  expiresAt?: string;
}

/** identity (lower-cased email, or display name) -> role */
export type UserAccessRecord = ReadonlyMap<string, Role>;

export type Classification = 'inherited' | 'restricted' | 'extended' | 'different';

export type SpecialFolderLabel = 'RESTRICTED' | 'EXTENDED' | 'DIFFERENT' | 'CUSTOM';

export interface PermissionAnalysis {
  hasLinkSharing: boolean;
  hasDirectSharing: boolean;
  permissionCount: number;
  sharedUsers: string[];
}

export type UserMatch = 'substring' | 'exact';
