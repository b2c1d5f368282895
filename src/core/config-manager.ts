import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import YAML from 'yaml';
import { z } from 'zod';
import { ErrInvalidConfig } from '../errors/errors.js';

export const GRAPH_BASE_URL = 'https://graph.microsoft.com/v1.0';
export const OAUTH_AUTHORIZE_URL = 'https://login.microsoftonline.com/common/oauth2/v2.0/authorize';
export const OAUTH_TOKEN_URL = 'https://login.microsoftonline.com/common/oauth2/v2.0/token';
export const OAUTH_REDIRECT_URI = 'http://localhost:53682/';
export const OAUTH_SCOPE = 'Files.Read Files.ReadWrite Files.ReadWrite.All Sites.Manage.All offline_access';

export interface GraphSettings {
  baseUrl: string;
  timeoutMs: number;
}

export interface OAuthSettings {
  clientId: string;
  clientSecret: string;
  authUrl: string;
  tokenUrl: string;
  redirectUri: string;
  scope: string;
}

export interface TokenSettings {
  /** File this tool writes its own tokens to */
  ownedTokenPath: string;
  /** rclone configuration; read, never written */
  foreignConfigPath: string;
  /** Remote used when --remote is not given; auto-detected when absent */
  defaultRemote?: string;
}

export interface AclInspectorConfig {
  graph: GraphSettings;
  oauth: OAuthSettings;
  tokens: TokenSettings;
  debug: boolean;
}

const ConfigFileSchema = z
  .object({
    graph: z
      .object({
        baseUrl: z.string().url().optional(),
        timeoutMs: z.number().int().positive().optional(),
      })
      .strict()
      .optional(),
    oauth: z
      .object({
        clientId: z.string().optional(),
        clientSecret: z.string().optional(),
        authUrl: z.string().url().optional(),
        tokenUrl: z.string().url().optional(),
        redirectUri: z.string().url().optional(),
        scope: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
    tokens: z
      .object({
        ownedTokenPath: z.string().min(1).optional(),
        foreignConfigPath: z.string().min(1).optional(),
        defaultRemote: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
    debug: z.boolean().optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export interface ConfigEnvironment {
  env: NodeJS.ProcessEnv;
  homeDir: string;
  platform: NodeJS.Platform;
}

const processEnvironment = (): ConfigEnvironment => ({
  env: process.env,
  homeDir: os.homedir(),
  platform: process.platform,
});

export class ConfigManager {
  private readonly configPath: string;
  private readonly environment: ConfigEnvironment;

  constructor(configPath: string, environment: ConfigEnvironment = processEnvironment()) {
    this.environment = environment;
    this.configPath = path.resolve(expandHome(configPath, environment.homeDir));
  }

  /**
   * Locate the config file: explicit path, then $ACL_INSPECTOR_CONFIG,
   * then $XDG_CONFIG_HOME/acl-inspector/config.yaml (~/.config when unset).
   */
  static locate(explicit?: string, environment: ConfigEnvironment = processEnvironment()): ConfigManager {
    if (explicit) return new ConfigManager(explicit, environment);
    const fromEnv = environment.env.ACL_INSPECTOR_CONFIG;
    if (fromEnv) return new ConfigManager(fromEnv, environment);
    const base = environment.env.XDG_CONFIG_HOME || path.join(environment.homeDir, '.config');
    return new ConfigManager(path.join(base, 'acl-inspector', 'config.yaml'), environment);
  }

  getConfigPath(): string {
    return this.configPath;
  }

  getConfigDir(): string {
    return path.dirname(this.configPath);
  }

  exists(): boolean {
    return fs.existsSync(this.configPath);
  }

  /**
   * Read the config file without defaults applied. A missing file reads as empty.
   */
  readConfigFile(): ConfigFile {
    if (!this.exists()) {
      return {};
    }
    const content = fs.readFileSync(this.configPath, 'utf-8');
    let raw: unknown;
    try {
      raw = YAML.parse(content);
    } catch (err) {
      throw ErrInvalidConfig.create(
        { path: this.configPath, detail: err instanceof Error ? err.message : String(err) },
        undefined,
        err,
      );
    }
    // An empty document parses to null
    const parsed = ConfigFileSchema.safeParse(raw ?? {});
    if (!parsed.success) {
      const detail = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
      throw ErrInvalidConfig.create({ path: this.configPath, detail });
    }
    return parsed.data;
  }

  /**
   * Effective configuration: file values over defaults, environment over both.
   */
  readConfig(): AclInspectorConfig {
    const file = this.readConfigFile();
    const { env } = this.environment;
    const configDir = this.getConfigDir();

    const ownedTokenPath = env.ACL_INSPECTOR_TOKEN_FILE ?? file.tokens?.ownedTokenPath ?? path.join(configDir, 'token.json');
    const foreignConfigPath = env.RCLONE_CONFIG ?? file.tokens?.foreignConfigPath ?? this.defaultRcloneConfigPath();

    return {
      graph: {
        baseUrl: file.graph?.baseUrl ?? GRAPH_BASE_URL,
        timeoutMs: file.graph?.timeoutMs ?? 30_000,
      },
      oauth: {
        clientId: env.ACL_INSPECTOR_CLIENT_ID ?? file.oauth?.clientId ?? '',
        clientSecret: env.ACL_INSPECTOR_CLIENT_SECRET ?? file.oauth?.clientSecret ?? '',
        authUrl: file.oauth?.authUrl ?? OAUTH_AUTHORIZE_URL,
        tokenUrl: file.oauth?.tokenUrl ?? OAUTH_TOKEN_URL,
        redirectUri: file.oauth?.redirectUri ?? OAUTH_REDIRECT_URI,
        scope: file.oauth?.scope ?? OAUTH_SCOPE,
      },
      tokens: {
        ownedTokenPath: this.resolvePath(ownedTokenPath),
        foreignConfigPath: this.resolvePath(foreignConfigPath),
        defaultRemote: file.tokens?.defaultRemote,
      },
      debug: isTruthy(env.ACL_INSPECTOR_DEBUG) || (file.debug ?? false),
    };
  }

  private defaultRcloneConfigPath(): string {
    const { env, homeDir, platform } = this.environment;
    if (platform === 'win32' && env.APPDATA) {
      return path.join(env.APPDATA, 'rclone', 'rclone.conf');
    }
    return path.join(homeDir, '.config', 'rclone', 'rclone.conf');
  }

  /** Relative paths are taken relative to the config file's directory */
  private resolvePath(p: string): string {
    return path.resolve(this.getConfigDir(), expandHome(p, this.environment.homeDir));
  }
}

function expandHome(p: string, homeDir: string): string {
  if (p === '~') return homeDir;
  if (p.startsWith('~/')) return path.join(homeDir, p.slice(2));
  return p;
}

function isTruthy(value: string | undefined): boolean {
  return value !== undefined && ['1', 'true', 'yes'].includes(value.toLowerCase());
}
