/**
 * Token endpoint client: refresh-token grant and authorization-code exchange.
 */
import { z } from 'zod';
import type { OAuthSettings } from './config-manager.js';
import { fetchWithTimeout, type HttpReply } from './http.js';
import type { Log } from './log.js';
import { AclError } from '../errors/acl-error.js';
import { ErrLoginFailed, ErrRefreshFailed } from '../errors/errors.js';

export const OAuthTokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().default('Bearer'),
  expires_in: z.coerce.number().int().positive().default(3600),
  scope: z.string().optional(),
  refresh_token: z.string().optional(),
});

export type OAuthTokenResponse = z.infer<typeof OAuthTokenResponseSchema>;

const OAuthErrorSchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
});

export interface OAuthClientIdentity {
  clientId: string;
  clientSecret: string;
}

export class OAuthClient {
  constructor(
    private readonly settings: OAuthSettings,
    private readonly timeoutMs: number,
    private readonly log: Log,
  ) {}

  /**
   * Exchange a refresh token for a new access token.
   * `identity` overrides the configured app, for tokens minted by another client.
   */
  async refresh(refreshToken: string, identity?: Partial<OAuthClientIdentity>): Promise<OAuthTokenResponse> {
    const clientId = identity?.clientId || this.settings.clientId;
    const clientSecret = identity?.clientSecret || this.settings.clientSecret;
    if (!clientId) {
      throw ErrRefreshFailed.create({ detail: 'no OAuth client id configured (set ACL_INSPECTOR_CLIENT_ID)' });
    }
    const form = new URLSearchParams({
      grant_type: 'refresh_token',
      refresh_token: refreshToken,
      client_id: clientId,
      scope: this.settings.scope,
    });
    if (clientSecret) form.set('client_secret', clientSecret);

    this.log.debug(`Refreshing token via ${this.settings.tokenUrl}`);
    return this.post(form, (detail, cause) => ErrRefreshFailed.create({ detail }, undefined, cause));
  }

  /** Exchange an authorization code received on the redirect URI. */
  async exchangeCode(code: string): Promise<OAuthTokenResponse> {
    const form = new URLSearchParams({
      grant_type: 'authorization_code',
      code,
      client_id: this.settings.clientId,
      redirect_uri: this.settings.redirectUri,
      scope: this.settings.scope,
    });
    if (this.settings.clientSecret) form.set('client_secret', this.settings.clientSecret);

    return this.post(form, (detail, cause) =>
      ErrLoginFailed.create({ detail: `code exchange failed: ${detail}` }, undefined, cause),
    );
  }

  /** URL the user opens to grant consent. */
  authorizationUrl(state: string): string {
    const url = new URL(this.settings.authUrl);
    url.searchParams.set('client_id', this.settings.clientId);
    url.searchParams.set('response_type', 'code');
    url.searchParams.set('redirect_uri', this.settings.redirectUri);
    url.searchParams.set('response_mode', 'query');
    url.searchParams.set('scope', this.settings.scope);
    url.searchParams.set('state', state);
    url.searchParams.set('prompt', 'select_account');
    return url.toString();
  }

  private async post(
    form: URLSearchParams,
    fail: (detail: string, cause?: unknown) => AclError,
  ): Promise<OAuthTokenResponse> {
    let response: HttpReply;
    try {
      response = await fetchWithTimeout(
        'token endpoint',
        this.settings.tokenUrl,
        {
          method: 'POST',
          headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
          body: form.toString(),
        },
        this.timeoutMs,
      );
    } catch (err) {
      throw fail(AclError.wrap(err).message, err);
    }
    const { body } = response;

    if (!response.ok) {
      const parsedError = OAuthErrorSchema.safeParse(body);
      const reason = parsedError.success
        ? `${parsedError.data.error}${parsedError.data.error_description ? `: ${parsedError.data.error_description.split('\n')[0]}` : ''}`
        : 'no error details';
      throw fail(`HTTP ${response.status} (${reason})`);
    }

    const parsed = OAuthTokenResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw fail('token endpoint response has no access_token');
    }
    return parsed.data;
  }
}
