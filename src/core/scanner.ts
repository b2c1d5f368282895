/**
 * Hierarchical scanner: sequential depth-first traversal of a drive subtree.
 *
 * Per node: skip if too deep or already visited -> mark visited -> fetch
 * permissions -> strategy decides descend/prune -> fetch children -> visit
 * the eligible ones. What happens with a node's permissions is up to the
 * injected ScanStrategy; the traversal state is an explicit ScanState.
 */
import { StaticTypeCompanion } from './companion.js';
import type { Log } from './log.js';
import { analyzePermissions, hasExplicitUserPermission } from './permission-classifier.js';
import { resolveItemPath, type DriveApi } from '../connectors/onedrive/graph-client.js';
import { AclError } from '../errors/acl-error.js';
import { Remote } from '../errors/errors.js';
import type { CollectedNode, DriveItem, FilteredHit, ItemType, ScanNode, ScanResult } from '../types/drive.js';
import type { Permission, UserMatch } from '../types/permissions.js';

// ============================================================================
// State
// ============================================================================

export interface ScanState<R extends ScanResult> {
  readonly visited: Set<string>;
  readonly results: R[];
  /** depth -> nodes visited at that depth */
  readonly perLevel: Map<number, number>;
}

export const ScanState = StaticTypeCompanion({
  create<R extends ScanResult>(): ScanState<R> {
    return { visited: new Set(), results: [], perLevel: new Map() };
  },
});

// ============================================================================
// Strategy
// ============================================================================

export type VisitDecision = 'descend' | 'prune';

export interface ScanStrategy<R extends ScanResult> {
  visit(node: ScanNode, permissions: Permission[], results: R[]): Promise<VisitDecision>;
}

/** Keep every node with its full permission list. */
export class CollectAllStrategy implements ScanStrategy<CollectedNode> {
  async visit(node: ScanNode, permissions: Permission[], results: CollectedNode[]): Promise<VisitDecision> {
    results.push({ kind: 'collected', node, permissions, isRoot: node.depth === 0 });
    return 'descend';
  }
}

export interface FilterOptions {
  /** Used to resolve display paths of hits found without one */
  api: DriveApi;
  /** Only report nodes with an explicit grant for this user, and prune below them */
  targetUser?: string;
  match?: UserMatch;
  log?: Log;
}

/** Report shared nodes, or with a target user, nodes that grant that user access explicitly. */
export class FilterStrategy implements ScanStrategy<FilteredHit> {
  constructor(private readonly opts: FilterOptions) {}

  async visit(node: ScanNode, permissions: Permission[], results: FilteredHit[]): Promise<VisitDecision> {
    const analysis = analyzePermissions(permissions);
    const target = this.opts.targetUser;
    const explicitMatch = target ? hasExplicitUserPermission(permissions, target, this.opts.match) : false;
    const include = target ? explicitMatch : analysis.hasLinkSharing || analysis.hasDirectSharing;

    if (include) {
      const path = node.path || (await resolveItemPath(this.opts.api, node.id));
      const symbol = analysis.hasLinkSharing ? '🔗' : '👥';
      results.push({
        kind: 'hit',
        node: { ...node, path },
        symbol,
        shareType: analysis.hasLinkSharing ? 'Link sharing' : 'Direct permissions',
        ...analysis,
      });
      this.opts.log?.debug(`Found ${target ? 'explicit permission' : 'shared'}: ${symbol} ${path}`);
    }

    if (explicitMatch) {
      this.opts.log?.debug(`Pruning below ${node.path || node.id}: descendants inherit the grant`);
      return 'prune';
    }
    return 'descend';
  }
}

// ============================================================================
// Traversal
// ============================================================================

export interface ScanOptions {
  /** Inclusive; 0 scans only the start node */
  maxDepth: number;
  itemType: ItemType;
  /** Called every 10 visited nodes with the visited count */
  onProgress?: (visited: number) => void;
  log?: Log;
}

export const PROGRESS_INTERVAL = 10;

export function startNode(item: DriveItem, path: string): ScanNode {
  return { id: item.id, name: item.name, path, isFolder: item.isFolder, depth: 0, parentId: item.parentId };
}

function childPath(parentPath: string, name: string): string {
  if (!parentPath) return '';
  return parentPath === '/' ? name : `${parentPath}/${name}`;
}

function isEligible(child: DriveItem, itemType: ItemType): boolean {
  switch (itemType) {
    case 'folders':
      return child.isFolder;
    case 'files':
      return child.isFile;
    case 'both':
      return true;
  }
}

/**
 * Remote failures are local to the node they hit, a 401 included: the client
 * has already refreshed and retried it once. Anything else ends the scan.
 */
function isNodeLocal(err: unknown): boolean {
  return Remote.is(err);
}

export async function scanTree<R extends ScanResult>(
  api: DriveApi,
  start: ScanNode,
  strategy: ScanStrategy<R>,
  opts: ScanOptions,
  state: ScanState<R> = ScanState.create<R>(),
): Promise<ScanState<R>> {
  const { log } = opts;

  const visit = async (node: ScanNode): Promise<void> => {
    if (node.depth > opts.maxDepth || state.visited.has(node.id)) return;
    state.visited.add(node.id);
    state.perLevel.set(node.depth, (state.perLevel.get(node.depth) ?? 0) + 1);
    if (state.visited.size % PROGRESS_INTERVAL === 0) opts.onProgress?.(state.visited.size);

    let permissions: Permission[] | undefined;
    try {
      permissions = await api.listPermissions(node.id);
    } catch (err) {
      // Nothing to report without the start node's permissions
      if (node.depth === 0 || !isNodeLocal(err)) throw err;
      log?.debug(`Skipping permissions of ${node.path || node.id}: ${AclError.wrap(err).message}`);
    }

    if (permissions && (await strategy.visit(node, permissions, state.results)) === 'prune') return;
    if (!node.isFolder || node.depth >= opts.maxDepth) return;

    let children: DriveItem[];
    try {
      children = await api.listChildren(node.id);
    } catch (err) {
      if (!isNodeLocal(err)) throw err;
      log?.debug(`Skipping children of ${node.path || node.id}: ${AclError.wrap(err).message}`);
      return;
    }

    for (const child of children) {
      if (!isEligible(child, opts.itemType)) continue;
      await visit({
        id: child.id,
        name: child.name,
        path: childPath(node.path, child.name),
        isFolder: child.isFolder,
        depth: node.depth + 1,
        parentId: node.id,
      });
    }
  };

  await visit(start);
  return state;
}

export async function collectAll(api: DriveApi, start: ScanNode, opts: ScanOptions): Promise<ScanState<CollectedNode>> {
  return scanTree(api, start, new CollectAllStrategy(), opts);
}

export async function filterScan(
  api: DriveApi,
  start: ScanNode,
  opts: ScanOptions & Omit<FilterOptions, 'api' | 'log'>,
): Promise<ScanState<FilteredHit>> {
  return scanTree(api, start, new FilterStrategy({ api, targetUser: opts.targetUser, match: opts.match, log: opts.log }), opts);
}
