/**
 * OwnedTokenFile: the token file this tool creates and may rewrite.
 *
 * JSON: {access_token, token_type, expires_at, scope, expires_in, refresh_token?}.
 * Always written owner-read/write only.
 */
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import type { OAuthTokenResponse } from './oauth-client.js';
import { TokenExpiry } from './token-expiry.js';
import type { Token } from '../types/token.js';

const OwnedTokenSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().default('Bearer'),
  expires_at: z.string().optional(),
  scope: z.string().default(''),
  expires_in: z.number().optional(),
  refresh_token: z.string().optional(),
});

export interface OwnedTokenPayload {
  access_token: string;
  token_type: string;
  expires_at: string;
  scope: string;
  expires_in: number;
  refresh_token?: string;
}

export type OwnedTokenRead =
  | { kind: 'ok'; token: Token }
  | { kind: 'missing' }
  | { kind: 'corrupt'; detail: string };

const FILE_MODE = 0o600;

export class OwnedTokenFile {
  constructor(readonly filePath: string) {}

  exists(): boolean {
    return fs.existsSync(this.filePath);
  }

  read(): OwnedTokenRead {
    if (!this.exists()) {
      return { kind: 'missing' };
    }
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
    } catch (err) {
      return { kind: 'corrupt', detail: err instanceof Error ? err.message : String(err) };
    }
    const parsed = OwnedTokenSchema.safeParse(raw);
    if (!parsed.success) {
      const [issue] = parsed.error.issues;
      return { kind: 'corrupt', detail: issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : parsed.error.message };
    }
    const data = parsed.data;
    return {
      kind: 'ok',
      token: {
        accessToken: data.access_token,
        refreshToken: data.refresh_token,
        tokenType: data.token_type,
        scope: data.scope,
        expiry: TokenExpiry.detect(data),
      },
    };
  }

  /**
   * Persist a token endpoint response. `scope` and `refresh_token` carry over
   * from `previous` when the response omits them.
   */
  write(response: OAuthTokenResponse, now: Date, previous?: Token): Token {
    const expiresAt = new Date(now.getTime() + response.expires_in * 1000);
    const payload: OwnedTokenPayload = {
      access_token: response.access_token,
      token_type: response.token_type,
      expires_at: TokenExpiry.formatOwned(expiresAt),
      scope: response.scope ?? previous?.scope ?? '',
      expires_in: response.expires_in,
    };
    const refreshToken = response.refresh_token ?? previous?.refreshToken;
    if (refreshToken) payload.refresh_token = refreshToken;

    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    fs.writeFileSync(this.filePath, JSON.stringify(payload, null, 2) + '\n', { mode: FILE_MODE });
    // mode only applies when the file is created
    fs.chmodSync(this.filePath, FILE_MODE);

    return {
      accessToken: payload.access_token,
      refreshToken: payload.refresh_token,
      tokenType: payload.token_type,
      scope: payload.scope,
      expiry: TokenExpiry.detect(payload),
    };
  }
}
