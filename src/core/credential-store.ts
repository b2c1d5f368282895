/**
 * CredentialStore: resolves an access token from the two token sources.
 *
 * Owned tokens (this tool's token file) are refreshed and written back.
 * Foreign tokens (rclone's config) are refreshed in memory only, and always
 * count as read-only. Failures are thrown as credential-domain AclErrors.
 */

import { Capability } from './capability.js';
import type { ForeignTokenSource } from './foreign-token-source.js';
import type { Log } from './log.js';
import type { OAuthClientIdentity, OAuthTokenResponse } from './oauth-client.js';
import type { OwnedTokenFile } from './owned-token-file.js';
import { TokenExpiry } from './token-expiry.js';
import { AclError } from '../errors/acl-error.js';
import {
  ErrCredentialExpired,
  ErrCredentialMissing,
  ErrInsufficientCapability,
  ErrRefreshFailed,
} from '../errors/errors.js';
import type { Token, TokenSource } from '../types/token.js';

// ============================================================================
// Interfaces
// ============================================================================

/** Anything that can trade a refresh token for a new access token */
export interface TokenRefresher {
  refresh(refreshToken: string, identity?: Partial<OAuthClientIdentity>): Promise<OAuthTokenResponse>;
}

/** A usable token, plus the means to refresh it under its source's rules */
export interface ResolvedCredential {
  readonly source: TokenSource;
  /** Token file path, or the rclone remote name */
  readonly location: string;
  readonly capability: Capability;
  readonly scope: string;
  readonly expiry: TokenExpiry;
  /** Whether acquisition had to refresh the token */
  readonly refreshedOnAcquire: boolean;
  get(): Promise<string>;
  refresh(): Promise<string>;
}

export interface AcquireOptions {
  /** rclone remote; falls back to the configured default, then auto-detection */
  remote?: string;
  required: Capability;
  /** Default true */
  preferOwned?: boolean;
}

export interface CredentialStoreDeps {
  owned: OwnedTokenFile;
  foreign: ForeignTokenSource;
  refresher: TokenRefresher;
  log: Log;
  defaultRemote?: string;
  now?: () => Date;
}

export interface TokenSourceStatus {
  source: TokenSource;
  location: string;
  state: 'ok' | 'missing' | 'corrupt';
  detail?: string;
  capability?: Capability;
  expiry?: TokenExpiry;
  expired?: boolean;
  hasRefreshToken?: boolean;
}

// ============================================================================
// ResolvedToken (internal)
// ============================================================================

class ResolvedToken implements ResolvedCredential {
  constructor(
    readonly source: TokenSource,
    readonly location: string,
    readonly capability: Capability,
    private token: Token,
    private readonly doRefresh: (current: Token) => Promise<Token>,
    readonly refreshedOnAcquire: boolean,
  ) {}

  get scope(): string {
    return this.token.scope;
  }

  get expiry(): TokenExpiry {
    return this.token.expiry;
  }

  async get(): Promise<string> {
    return this.token.accessToken;
  }

  async refresh(): Promise<string> {
    this.token = await this.doRefresh(this.token);
    return this.token.accessToken;
  }
}

// ============================================================================
// CredentialStore
// ============================================================================

export class CredentialStore {
  private readonly now: () => Date;

  constructor(private readonly deps: CredentialStoreDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async acquire(opts: AcquireOptions): Promise<ResolvedCredential> {
    const remote = opts.remote ?? this.deps.defaultRemote;

    if (opts.preferOwned ?? true) {
      const owned = await this.tryOwned();
      if (owned) {
        if (!Capability.satisfies(owned.capability, opts.required)) {
          throw ErrInsufficientCapability.create({ required: opts.required, actual: owned.capability, source: 'owned' });
        }
        return owned;
      }
    }

    // rclone tokens are never full-capability, so don't touch the file or the network
    if (!Capability.satisfies('read-only', opts.required)) {
      throw ErrInsufficientCapability.create({ required: opts.required, actual: 'read-only', source: 'foreign' });
    }

    return this.acquireForeign(remote);
  }

  /** Persist a token obtained by the login flow as the owned token. */
  storeOwned(response: OAuthTokenResponse): Token {
    return this.deps.owned.write(response, this.now());
  }

  /** Describe both sources without refreshing anything. */
  status(remote?: string): TokenSourceStatus[] {
    const now = this.now();
    const owned = this.deps.owned.read();
    const ownedStatus: TokenSourceStatus =
      owned.kind === 'ok'
        ? {
            source: 'owned',
            location: this.deps.owned.filePath,
            state: 'ok',
            capability: Capability.fromScope(owned.token.scope),
            expiry: owned.token.expiry,
            expired: TokenExpiry.isExpired(owned.token.expiry, now),
            hasRefreshToken: Boolean(owned.token.refreshToken),
          }
        : {
            source: 'owned',
            location: this.deps.owned.filePath,
            state: owned.kind,
            detail: owned.kind === 'corrupt' ? owned.detail : undefined,
          };

    const foreign = this.deps.foreign.read(remote ?? this.deps.defaultRemote);
    const foreignStatus: TokenSourceStatus =
      foreign.kind === 'ok'
        ? {
            source: 'foreign',
            location: `${foreign.remote} (${this.deps.foreign.configPath})`,
            state: 'ok',
            capability: 'read-only',
            expiry: foreign.token.expiry,
            expired: TokenExpiry.isExpired(foreign.token.expiry, now),
            hasRefreshToken: Boolean(foreign.token.refreshToken),
          }
        : {
            source: 'foreign',
            location: this.deps.foreign.configPath,
            state: 'missing',
            detail: foreign.reason,
          };

    return [ownedStatus, foreignStatus];
  }

  // --------------------------------------------------------------------------
  // Owned source
  // --------------------------------------------------------------------------

  private async tryOwned(): Promise<ResolvedToken | undefined> {
    const { owned, log } = this.deps;
    const read = owned.read();
    if (read.kind === 'missing') {
      log.debug(`No owned token at ${owned.filePath}`);
      return undefined;
    }
    if (read.kind === 'corrupt') {
      log.warn(`Ignoring unreadable token file ${owned.filePath}: ${read.detail}`);
      return undefined;
    }

    let token = read.token;
    let refreshed = false;
    if (TokenExpiry.isExpired(token.expiry, this.now())) {
      const refreshToken = token.refreshToken;
      if (!refreshToken) {
        log.debug('Owned token expired and has no refresh token');
        return undefined;
      }
      try {
        token = await this.refreshOwned(token, refreshToken);
        refreshed = true;
        log.debug(`Refreshed owned token, saved to ${owned.filePath}`);
      } catch (err) {
        log.warn(`Could not refresh owned token: ${AclError.wrap(err).message}`);
        return undefined;
      }
    }

    return new ResolvedToken(
      'owned',
      owned.filePath,
      Capability.fromScope(token.scope),
      token,
      (current) => {
        if (!current.refreshToken) {
          return Promise.reject(ErrRefreshFailed.create({ detail: 'owned token has no refresh token' }));
        }
        return this.refreshOwned(current, current.refreshToken);
      },
      refreshed,
    );
  }

  private async refreshOwned(current: Token, refreshToken: string): Promise<Token> {
    const response = await this.deps.refresher.refresh(refreshToken);
    return this.deps.owned.write(response, this.now(), current);
  }

  // --------------------------------------------------------------------------
  // Foreign source
  // --------------------------------------------------------------------------

  private async acquireForeign(remote: string | undefined): Promise<ResolvedToken> {
    const { foreign, log } = this.deps;
    const read = foreign.read(remote);
    if (read.kind === 'missing') {
      throw ErrCredentialMissing.create({ remote: read.remote ?? remote ?? 'OneDrive', reason: read.reason });
    }

    const identity: Partial<OAuthClientIdentity> = { clientId: read.clientId, clientSecret: read.clientSecret };
    const remedy = `rclone config reconnect ${read.remote}:`;
    let token = read.token;

    if (TokenExpiry.isExpired(token.expiry, this.now())) {
      const refreshToken = token.refreshToken;
      if (!refreshToken) {
        throw ErrCredentialExpired.create({ remote: read.remote, remedy });
      }
      try {
        token = await this.refreshInMemory(token, refreshToken, identity);
      } catch (err) {
        throw ErrCredentialExpired.create({ remote: read.remote, remedy }, undefined, err);
      }
      log.debug(`Refreshed expired rclone token for ${read.remote} (not saved)`);
    } else if (token.refreshToken) {
      // rclone's access token is not accepted by Graph as-is; trade it once
      try {
        token = await this.refreshInMemory(token, token.refreshToken, identity);
        log.debug(`Refreshed rclone token for ${read.remote} (not saved)`);
      } catch (err) {
        log.warn(`Could not refresh rclone token, using it as-is: ${AclError.wrap(err).message}`);
      }
    }

    return new ResolvedToken(
      'foreign',
      read.remote,
      'read-only',
      token,
      (current) => {
        if (!current.refreshToken) {
          return Promise.reject(ErrRefreshFailed.create({ detail: 'rclone token has no refresh token' }));
        }
        return this.refreshInMemory(current, current.refreshToken, identity);
      },
      token !== read.token,
    );
  }

  private async refreshInMemory(
    current: Token,
    refreshToken: string,
    identity: Partial<OAuthClientIdentity>,
  ): Promise<Token> {
    const response = await this.deps.refresher.refresh(refreshToken, identity);
    const at = new Date(this.now().getTime() + response.expires_in * 1000);
    return {
      accessToken: response.access_token,
      refreshToken: response.refresh_token ?? current.refreshToken,
      tokenType: response.token_type,
      scope: response.scope ?? current.scope,
      expiry: { format: 'expiry', raw: TokenExpiry.formatOwned(at), at },
    };
  }
}
