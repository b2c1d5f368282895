/**
 * StubbedDriveApi: in-memory DriveApi for tests.
 *
 * Nodes are kept flat with child id lists, so self-referential or duplicate
 * children can be modelled. `fromTree` builds the common nested case.
 */
import { ErrRemoteForbidden, ErrRemoteNotFound } from '../../errors/errors.js';
import type { DriveItem } from '../../types/drive.js';
import type { Permission, Role } from '../../types/permissions.js';
import type { DriveApi } from './graph-client.js';

export interface StubNode {
  id: string;
  name: string;
  /** Default: folder */
  file?: boolean;
  parentId?: string;
  permissions?: Permission[];
  children?: string[];
  /** listPermissions answers 403 */
  failPermissions?: boolean;
  /** listChildren answers 403 */
  failChildren?: boolean;
}

export interface StubTreeNode extends Omit<StubNode, 'children' | 'parentId'> {
  children?: StubTreeNode[];
}

export type StubCall =
  | { op: 'getItemByPath'; path: string }
  | { op: 'getItem' | 'listChildren' | 'listPermissions'; itemId: string }
  | { op: 'invite'; itemId: string; email: string; role: Role }
  | { op: 'deletePermission'; itemId: string; permissionId: string };

export class StubbedDriveApi implements DriveApi {
  readonly calls: StubCall[] = [];
  private readonly nodes = new Map<string, StubNode>();
  private nextPermissionId = 1;

  constructor(nodes: StubNode[], private readonly rootId: string = nodes[0]?.id ?? 'root') {
    for (const node of nodes) {
      this.nodes.set(node.id, { ...node, permissions: [...(node.permissions ?? [])] });
    }
  }

  static fromTree(root: StubTreeNode): StubbedDriveApi {
    const flat: StubNode[] = [];
    const walk = (node: StubTreeNode, parentId: string | undefined): void => {
      const { children, ...rest } = node;
      flat.push({ ...rest, parentId, children: (children ?? []).map((c) => c.id) });
      for (const child of children ?? []) walk(child, node.id);
    };
    walk(root, undefined);
    return new StubbedDriveApi(flat, root.id);
  }

  /** Ids whose permissions were requested, in order */
  permissionLookups(): string[] {
    return this.calls.flatMap((c) => (c.op === 'listPermissions' ? [c.itemId] : []));
  }

  permissionsOf(itemId: string): Permission[] {
    return [...(this.require(itemId).permissions ?? [])];
  }

  async getItemByPath(path: string): Promise<DriveItem> {
    this.calls.push({ op: 'getItemByPath', path });
    let current = this.require(this.rootId);
    for (const segment of path.split('/').filter(Boolean)) {
      const next = (current.children ?? [])
        .map((id) => this.nodes.get(id))
        .find((child) => child?.name === segment);
      if (!next) throw ErrRemoteNotFound.create({ status: 404, resource: `item "${path}"` });
      current = next;
    }
    return this.toItem(current);
  }

  async getItem(itemId: string): Promise<DriveItem> {
    this.calls.push({ op: 'getItem', itemId });
    return this.toItem(this.require(itemId));
  }

  async listChildren(itemId: string): Promise<DriveItem[]> {
    this.calls.push({ op: 'listChildren', itemId });
    const node = this.require(itemId);
    if (node.failChildren) throw ErrRemoteForbidden.create({ status: 403, resource: `children of ${itemId}` });
    return (node.children ?? []).flatMap((id) => {
      const child = this.nodes.get(id);
      return child ? [this.toItem(child)] : [];
    });
  }

  async listPermissions(itemId: string): Promise<Permission[]> {
    this.calls.push({ op: 'listPermissions', itemId });
    const node = this.require(itemId);
    if (node.failPermissions) throw ErrRemoteForbidden.create({ status: 403, resource: `permissions of ${itemId}` });
    return [...(node.permissions ?? [])];
  }

  async invite(itemId: string, email: string, role: Role): Promise<Permission[]> {
    this.calls.push({ op: 'invite', itemId, email, role });
    const node = this.require(itemId);
    const permission: Permission = {
      id: `stub-perm-${this.nextPermissionId++}`,
      roles: [role],
      principals: [{ displayName: email, email }],
    };
    node.permissions = [...(node.permissions ?? []), permission];
    return [permission];
  }

  async deletePermission(itemId: string, permissionId: string): Promise<void> {
    this.calls.push({ op: 'deletePermission', itemId, permissionId });
    const node = this.require(itemId);
    const before = node.permissions ?? [];
    const after = before.filter((p) => p.id !== permissionId);
    if (after.length === before.length) {
      throw ErrRemoteNotFound.create({ status: 404, resource: `permission ${permissionId}` });
    }
    node.permissions = after;
  }

  private require(itemId: string): StubNode {
    const node = this.nodes.get(itemId);
    if (!node) throw ErrRemoteNotFound.create({ status: 404, resource: `item ${itemId}` });
    return node;
  }

  private toItem(node: StubNode): DriveItem {
    return {
      id: node.id,
      name: node.name,
      isFolder: !node.file,
      isFile: Boolean(node.file),
      parentId: node.parentId,
      parentPath: node.parentId === this.rootId ? '/drive/root:' : undefined,
    };
  }
}
