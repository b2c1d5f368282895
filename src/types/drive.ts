import type { Permission, PermissionAnalysis } from './permissions.js';

export interface DriveItem {
  id: string;
  name: string;
  isFolder: boolean;
  isFile: boolean;
  parentId?: string;
  /** Graph's parentReference.path, e.g. "/drive/root:/Finance" */
  parentPath?: string;
}

/** A node of one traversal. `path` may stay empty until it is needed for display. */
export interface ScanNode {
  id: string;
  name: string;
  path: string;
  isFolder: boolean;
  depth: number;
  parentId?: string;
}

export type ItemType = 'folders' | 'files' | 'both';

export interface CollectedNode {
  kind: 'collected';
  node: ScanNode;
  permissions: Permission[];
  isRoot: boolean;
}

export type ShareSymbol = '🔗' | '👥';

export interface FilteredHit extends PermissionAnalysis {
  kind: 'hit';
  node: ScanNode;
  symbol: ShareSymbol;
  shareType: 'Link sharing' | 'Direct permissions';
}

export type ScanResult = CollectedNode | FilteredHit;
