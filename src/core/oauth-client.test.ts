import { describe, test, expect, vi, afterEach } from 'vitest';
import type { OAuthSettings } from './config-manager.js';
import { Log } from './log.js';
import { OAuthClient } from './oauth-client.js';
import { ErrRefreshFailed } from '../errors/errors.js';

const settings: OAuthSettings = {
  clientId: 'test-client',
  clientSecret: '',
  authUrl: 'https://login.test/authorize',
  tokenUrl: 'https://login.test/token',
  redirectUri: 'http://localhost:53682/',
  scope: 'Files.Read offline_access',
};

const json = (status: number, body: unknown) => new Response(JSON.stringify(body), { status });

const sentForm = (init: RequestInit | undefined) => new URLSearchParams(String(init?.body));

afterEach(() => {
  vi.restoreAllMocks();
});

describe('OAuthClient', () => {
  describe('refresh', () => {
    test('posts a refresh_token grant', async () => {
      const fetchMock = vi
        .spyOn(globalThis, 'fetch')
        .mockResolvedValue(json(200, { access_token: 'new-access', expires_in: 3599, scope: 'Files.Read' }));
      const client = new OAuthClient(settings, 1000, Log.silent);

      const response = await client.refresh('test-refresh');

      expect(response).toEqual({ access_token: 'new-access', token_type: 'Bearer', expires_in: 3599, scope: 'Files.Read' });
      expect(fetchMock.mock.calls[0][0]).toBe('https://login.test/token');
      const form = sentForm(fetchMock.mock.calls[0][1]);
      expect(form.get('grant_type')).toBe('refresh_token');
      expect(form.get('refresh_token')).toBe('test-refresh');
      expect(form.get('client_id')).toBe('test-client');
      expect(form.has('client_secret')).toBe(false);
    });

    test('the token owner identity overrides the configured app', async () => {
      const fetchMock = vi.spyOn(globalThis, 'fetch').mockResolvedValue(json(200, { access_token: 'a' }));
      await new OAuthClient(settings, 1000, Log.silent).refresh('r', { clientId: 'other-client', clientSecret: 'test-secret' });
      const form = sentForm(fetchMock.mock.calls[0][1]);
      expect(form.get('client_id')).toBe('other-client');
      expect(form.get('client_secret')).toBe('test-secret');
    });

    test('no client id fails without a request', async () => {
      const fetchMock = vi.spyOn(globalThis, 'fetch');
      const client = new OAuthClient({ ...settings, clientId: '' }, 1000, Log.silent);
      await expect(client.refresh('r')).rejects.toSatisfy((err: unknown) => ErrRefreshFailed.is(err));
      expect(fetchMock).not.toHaveBeenCalled();
    });

    test('error responses name the OAuth error', async () => {
      vi.spyOn(globalThis, 'fetch').mockResolvedValue(
        json(400, { error: 'invalid_grant', error_description: 'AADSTS70008: expired\nTrace ID: 1' }),
      );
      await expect(new OAuthClient(settings, 1000, Log.silent).refresh('r')).rejects.toThrow(
        'Token refresh failed: HTTP 400 (invalid_grant: AADSTS70008: expired)',
      );
    });

    test('a response without access_token fails', async () => {
      vi.spyOn(globalThis, 'fetch').mockResolvedValue(json(200, { token_type: 'Bearer' }));
      await expect(new OAuthClient(settings, 1000, Log.silent).refresh('r')).rejects.toThrow(
        'Token refresh failed: token endpoint response has no access_token',
      );
    });
  });

  describe('exchangeCode', () => {
    test('posts an authorization_code grant with the redirect URI', async () => {
      const fetchMock = vi.spyOn(globalThis, 'fetch').mockResolvedValue(json(200, { access_token: 'a', refresh_token: 'r' }));
      const response = await new OAuthClient(settings, 1000, Log.silent).exchangeCode('the-code');
      expect(response.refresh_token).toBe('r');
      const form = sentForm(fetchMock.mock.calls[0][1]);
      expect(form.get('grant_type')).toBe('authorization_code');
      expect(form.get('code')).toBe('the-code');
      expect(form.get('redirect_uri')).toBe('http://localhost:53682/');
    });

    test('failures are login failures', async () => {
      vi.spyOn(globalThis, 'fetch').mockResolvedValue(json(400, { error: 'invalid_request' }));
      await expect(new OAuthClient(settings, 1000, Log.silent).exchangeCode('c')).rejects.toThrow(
        'Authorization failed: code exchange failed: HTTP 400 (invalid_request)',
      );
    });
  });

  test('authorizationUrl', () => {
    const url = new URL(new OAuthClient(settings, 1000, Log.silent).authorizationUrl('state-1'));
    expect(url.origin + url.pathname).toBe('https://login.test/authorize');
    expect(url.searchParams.get('client_id')).toBe('test-client');
    expect(url.searchParams.get('response_type')).toBe('code');
    expect(url.searchParams.get('state')).toBe('state-1');
    expect(url.searchParams.get('scope')).toBe('Files.Read offline_access');
  });
});
