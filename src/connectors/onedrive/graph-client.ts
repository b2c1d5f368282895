import type { z } from 'zod';
import { fetchWithTimeout, type HttpReply } from '../../core/http.js';
import type { Log } from '../../core/log.js';
import type { ResolvedCredential } from '../../core/credential-store.js';
import {
  ErrMalformedResponse,
  ErrRateLimited,
  ErrRemoteForbidden,
  ErrRemoteHttp,
  ErrRemoteNotFound,
  ErrRemoteUnauthorized,
  ErrTransport,
  Remote,
} from '../../errors/errors.js';
import type { DriveItem } from '../../types/drive.js';
import type { Permission, Role } from '../../types/permissions.js';
import {
  ChildListSchema,
  GraphErrorSchema,
  GraphItemSchema,
  PermissionListSchema,
  toDriveItem,
  toPermission,
} from './schema.js';

// ============================================================================
// DriveApi
// ============================================================================

/** The slice of the drive API the audit engine and mutations use. */
export interface DriveApi {
  /** "" or "/" is the drive root */
  getItemByPath(path: string): Promise<DriveItem>;
  getItem(itemId: string): Promise<DriveItem>;
  /** All children, following pagination */
  listChildren(itemId: string): Promise<DriveItem[]>;
  listPermissions(itemId: string): Promise<Permission[]>;
  invite(itemId: string, email: string, role: Role): Promise<Permission[]>;
  deletePermission(itemId: string, permissionId: string): Promise<void>;
}

export interface GraphClientOptions {
  baseUrl: string;
  timeoutMs: number;
  credential: ResolvedCredential;
  log: Log;
}

type Method = 'GET' | 'POST' | 'DELETE';

interface GraphResponse {
  status: number;
  body: unknown;
}

const SUCCESS_STATUSES = new Set([200, 201, 204]);

/** Socket errors seen when the server closes the connection right after a 204 */
const CLOSED_CONNECTION_CODES = new Set(['ECONNRESET', 'EPIPE', 'UND_ERR_SOCKET', 'UND_ERR_CLOSED']);

export function encodeDrivePath(path: string): string {
  return path
    .split('/')
    .filter((segment) => segment.length > 0)
    .map(encodeURIComponent)
    .join('/');
}

/** 401 bodies whose error code says the token itself is expired or invalid */
export function isTokenExpiredError(body: unknown): boolean {
  const parsed = GraphErrorSchema.safeParse(body);
  if (!parsed.success) return false;
  const code = parsed.data.error.code ?? '';
  return code === 'InvalidAuthenticationToken' || code.toLowerCase().includes('expired');
}

function errorDetail(body: unknown): string {
  const parsed = GraphErrorSchema.safeParse(body);
  if (!parsed.success) return 'no error details';
  const { code, message } = parsed.data.error;
  return [code, message].filter(Boolean).join(': ') || 'no error details';
}

// ============================================================================
// GraphDriveClient
// ============================================================================

export class GraphDriveClient implements DriveApi {
  constructor(private readonly opts: GraphClientOptions) {}

  async getItemByPath(path: string): Promise<DriveItem> {
    const encoded = encodeDrivePath(path);
    const endpoint = encoded ? `/me/drive/root:/${encoded}` : '/me/drive/root';
    const { body } = await this.request('GET', endpoint, `item "${path || '/'}"`);
    return toDriveItem(this.decode(GraphItemSchema, body, endpoint));
  }

  async getItem(itemId: string): Promise<DriveItem> {
    const endpoint = `/me/drive/items/${itemId}`;
    const { body } = await this.request('GET', endpoint, `item ${itemId}`);
    return toDriveItem(this.decode(GraphItemSchema, body, endpoint));
  }

  async listChildren(itemId: string): Promise<DriveItem[]> {
    const items: DriveItem[] = [];
    let next: string | undefined = `/me/drive/items/${itemId}/children`;
    while (next) {
      const { body } = await this.request('GET', next, `children of ${itemId}`);
      const page: z.infer<typeof ChildListSchema> = this.decode(ChildListSchema, body, next);
      items.push(...page.value.map(toDriveItem));
      next = page['@odata.nextLink'];
    }
    return items;
  }

  async listPermissions(itemId: string): Promise<Permission[]> {
    const endpoint = `/me/drive/items/${itemId}/permissions`;
    const { body } = await this.request('GET', endpoint, `permissions of ${itemId}`);
    return this.decode(PermissionListSchema, body, endpoint).value.map(toPermission);
  }

  async invite(itemId: string, email: string, role: Role): Promise<Permission[]> {
    const endpoint = `/me/drive/items/${itemId}/invite`;
    const { body } = await this.request('POST', endpoint, `invite on ${itemId}`, {
      requireSignIn: true,
      roles: [role],
      recipients: [{ email }],
      message: `You have been granted ${role} access to this item.`,
    });
    if (body === undefined) return [];
    return this.decode(PermissionListSchema, body, endpoint).value.map(toPermission);
  }

  async deletePermission(itemId: string, permissionId: string): Promise<void> {
    await this.request('DELETE', `/me/drive/items/${itemId}/permissions/${permissionId}`, `permission ${permissionId}`);
  }

  // --------------------------------------------------------------------------
  // Internal
  // --------------------------------------------------------------------------

  /**
   * Issue one request under the status contract. An expired-token 401 on a GET
   * refreshes the credential and retries once; writes are never retried.
   */
  private async request(
    method: Method,
    endpoint: string,
    resource: string,
    payload?: unknown,
    retried = false,
  ): Promise<GraphResponse> {
    const { log, credential, timeoutMs } = this.opts;
    const url = endpoint.startsWith('https://') || endpoint.startsWith('http://') ? endpoint : `${this.opts.baseUrl}${endpoint}`;
    const token = await credential.get();

    const headers: Record<string, string> = { Authorization: `Bearer ${token}` };
    if (payload !== undefined) headers['Content-Type'] = 'application/json';

    log.debug(`${method} ${url}`);
    let response: HttpReply;
    try {
      response = await fetchWithTimeout(
        resource,
        url,
        { method, headers, body: payload === undefined ? undefined : JSON.stringify(payload) },
        timeoutMs,
      );
    } catch (err) {
      const code = ErrTransport.is(err) ? err.data.causeCode : undefined;
      if (method === 'DELETE' && code && CLOSED_CONNECTION_CODES.has(code)) {
        log.debug(`Connection closed after DELETE ${url} (${code}); treating as 204`);
        return { status: 204, body: undefined };
      }
      throw err;
    }

    const { status, body } = response;
    log.debug(`${method} ${url} -> ${status}`);

    if (SUCCESS_STATUSES.has(status)) {
      return { status, body };
    }

    if (status === 401) {
      const tokenExpired = isTokenExpiredError(body);
      if (tokenExpired && method === 'GET' && !retried) {
        log.debug('Access token rejected as expired; refreshing and retrying once');
        try {
          await credential.refresh();
        } catch (err) {
          throw ErrRemoteUnauthorized.create({ status, tokenExpired, resource }, undefined, err);
        }
        return this.request(method, endpoint, resource, payload, true);
      }
      throw ErrRemoteUnauthorized.create({ status, tokenExpired, resource });
    }
    if (status === 403) throw ErrRemoteForbidden.create({ status, resource });
    if (status === 404) throw ErrRemoteNotFound.create({ status, resource });
    if (status === 429) {
      throw ErrRateLimited.create({ status, resource, retryAfter: response.headers.get('retry-after') ?? undefined });
    }
    throw ErrRemoteHttp.create({ status, resource, detail: errorDetail(body) });
  }

  private decode<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown, endpoint: string): T {
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      const detail = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
      throw ErrMalformedResponse.create({ resource: endpoint, detail });
    }
    return parsed.data;
  }
}

/**
 * Display path of an item, built by walking its parent chain up to the drive
 * root. "Unknown" when the chain cannot be read.
 */
export async function resolveItemPath(api: DriveApi, itemId: string): Promise<string> {
  const parts: string[] = [];
  const seen = new Set<string>();
  let current: string | undefined = itemId;
  try {
    while (current && !seen.has(current)) {
      seen.add(current);
      const item = await api.getItem(current);
      parts.unshift(item.name);
      if (item.parentPath === '/drive/root:') break;
      current = item.parentId;
    }
  } catch (err) {
    if (Remote.is(err)) return 'Unknown';
    throw err;
  }
  if (parts.length > 0 && parts[0].toLowerCase() === 'root') parts.shift();
  return parts.length > 0 ? parts.join('/') : '/';
}
