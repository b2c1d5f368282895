import type { Capability } from '../core/capability.js';
import { ConfigManager, type AclInspectorConfig } from '../core/config-manager.js';
import { CredentialStore, type ResolvedCredential } from '../core/credential-store.js';
import { Fmt } from '../core/fmt.js';
import { ForeignTokenSource } from '../core/foreign-token-source.js';
import { Log } from '../core/log.js';
import { OAuthClient } from '../core/oauth-client.js';
import { OwnedTokenFile } from '../core/owned-token-file.js';
import { startNode } from '../core/scanner.js';
import { GraphDriveClient, type DriveApi } from '../connectors/onedrive/graph-client.js';
import type { ScanNode } from '../types/drive.js';
import type { OutputFormat } from './output.js';
import { useColor } from './use-color.js';

export interface CommonArgs {
  remote?: string;
  config?: string;
  debug: boolean;
  output?: OutputFormat;
}

/** Everything a command handler needs, built once from the common options. */
export interface CliContext {
  config: AclInspectorConfig;
  configPath: string;
  log: Log;
  fmt: Fmt;
  format: OutputFormat;
  remote?: string;
  oauth: OAuthClient;
  credentials: CredentialStore;
}

export function createContext(args: CommonArgs): CliContext {
  const manager = ConfigManager.locate(args.config);
  const config = manager.readConfig();
  const log = Log.console({ debug: args.debug || config.debug });
  log.debug(`Config: ${manager.getConfigPath()}${manager.exists() ? '' : ' (not found, using defaults)'}`);
  const format = args.output ?? 'text';
  const oauth = new OAuthClient(config.oauth, config.graph.timeoutMs, log);
  const credentials = new CredentialStore({
    owned: new OwnedTokenFile(config.tokens.ownedTokenPath),
    foreign: new ForeignTokenSource(config.tokens.foreignConfigPath),
    refresher: oauth,
    log,
    defaultRemote: config.tokens.defaultRemote,
  });
  return {
    config,
    configPath: manager.getConfigPath(),
    log,
    fmt: Fmt.from(format === 'text' && useColor()),
    format,
    remote: args.remote,
    oauth,
    credentials,
  };
}

export interface DriveSession {
  api: DriveApi;
  credential: ResolvedCredential;
}

export async function connectDrive(ctx: CliContext, required: Capability): Promise<DriveSession> {
  const credential = await ctx.credentials.acquire({ remote: ctx.remote, required });
  ctx.log.debug(`Using ${credential.source} token (${credential.location}), capability ${credential.capability}`);
  const api = new GraphDriveClient({
    baseUrl: ctx.config.graph.baseUrl,
    timeoutMs: ctx.config.graph.timeoutMs,
    credential,
    log: ctx.log,
  });
  return { api, credential };
}

/** "/Finance/Reports/" -> "Finance/Reports"; the root is "/". */
export function normalizeDrivePath(raw: string): string {
  return raw.split('/').filter(Boolean).join('/') || '/';
}

export async function resolveStart(api: DriveApi, rawPath: string): Promise<ScanNode> {
  const path = normalizeDrivePath(rawPath);
  const item = await api.getItemByPath(path === '/' ? '' : path);
  return startNode(item, path);
}
