import { execFile } from 'child_process';
import { randomBytes } from 'crypto';
import * as http from 'http';
import type { OAuthSettings } from '../../core/config-manager.js';
import type { Log } from '../../core/log.js';
import type { OAuthClient, OAuthTokenResponse } from '../../core/oauth-client.js';
import { ErrLoginFailed } from '../../errors/errors.js';

export const LOGIN_TIMEOUT_MS = 5 * 60 * 1000;

export interface CallbackResponse {
  status: number;
  body: string;
}

const page = (title: string, detail: string): string => `<!DOCTYPE html>
<html>
<head><title>acl-inspector - ${title}</title></head>
<body style="font-family: system-ui; padding: 40px; text-align: center;">
  <h1>${title}</h1>
  <p>${detail}</p>
</body>
</html>`;

const escapeHtml = (text: string): string =>
  text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');

/**
 * One pending authorization: settles exactly once, on the first callback that
 * carries a code or an error, or on timeout.
 */
export class AuthorizationSession {
  readonly code: Promise<string>;
  private settled = false;
  private resolveCode: (code: string) => void = () => {};
  private rejectCode: (err: Error) => void = () => {};

  constructor(
    private readonly callbackPath: string,
    readonly state: string = randomBytes(16).toString('hex'),
  ) {
    this.code = new Promise<string>((resolve, reject) => {
      this.resolveCode = resolve;
      this.rejectCode = reject;
    });
  }

  /** Answer one request to the redirect listener. */
  handleCallback(requestUrl: string): CallbackResponse {
    const url = new URL(requestUrl, 'http://localhost');
    if (url.pathname !== this.callbackPath) {
      return { status: 404, body: 'Not found' };
    }
    if (this.settled) {
      return { status: 400, body: page('Authorization already completed', 'You can close this window.') };
    }

    const error = url.searchParams.get('error');
    if (error) {
      const description = url.searchParams.get('error_description');
      const detail = description ? `${error}: ${description}` : error;
      this.fail(ErrLoginFailed.create({ detail }));
      return { status: 400, body: page('Authorization failed', escapeHtml(detail)) };
    }

    if (url.searchParams.get('state') !== this.state) {
      this.fail(ErrLoginFailed.create({ detail: 'state mismatch in authorization callback' }));
      return { status: 400, body: page('Authorization failed', 'State mismatch.') };
    }

    const code = url.searchParams.get('code');
    if (!code) {
      this.fail(ErrLoginFailed.create({ detail: 'no authorization code received' }));
      return { status: 400, body: page('Authorization failed', 'No authorization code received.') };
    }

    this.settled = true;
    this.resolveCode(code);
    return {
      status: 200,
      body: page('Authorization complete', 'You can close this window and return to the terminal.'),
    };
  }

  fail(err: Error): void {
    if (this.settled) return;
    this.settled = true;
    this.rejectCode(err);
  }
}

export function openBrowser(url: string, log: Log, platform: NodeJS.Platform = process.platform): void {
  const [command, args]: [string, string[]] =
    platform === 'darwin'
      ? ['open', [url]]
      : platform === 'win32'
        ? ['cmd', ['/c', 'start', '""', url]]
        : ['xdg-open', [url]];
  execFile(command, args, (err) => {
    if (err) log.debug(`Could not open a browser: ${err.message}`);
  });
}

export interface LoginOptions {
  settings: OAuthSettings;
  client: OAuthClient;
  log: Log;
  /** Default true */
  launchBrowser?: boolean;
  timeoutMs?: number;
}

/**
 * Interactive authorization-code flow: listen on the redirect URI, send the
 * user to the consent page, and exchange the code that comes back.
 */
export async function authorize(opts: LoginOptions): Promise<OAuthTokenResponse> {
  const { settings, client, log } = opts;
  if (!settings.clientId) {
    throw ErrLoginFailed.create({ detail: 'no OAuth client id configured (set ACL_INSPECTOR_CLIENT_ID or oauth.clientId)' });
  }

  const redirect = new URL(settings.redirectUri);
  const session = new AuthorizationSession(redirect.pathname || '/');
  const authUrl = client.authorizationUrl(session.state);

  const server = http.createServer((req, res) => {
    const reply = session.handleCallback(req.url ?? '/');
    res.writeHead(reply.status, { 'Content-Type': 'text/html; charset=utf-8' });
    res.end(reply.body);
  });
  server.on('error', (err) => session.fail(ErrLoginFailed.create({ detail: `cannot listen on ${settings.redirectUri}: ${err.message}` })));

  const timer = setTimeout(() => {
    session.fail(ErrLoginFailed.create({ detail: `no response received within ${Math.round((opts.timeoutMs ?? LOGIN_TIMEOUT_MS) / 60000)} minutes` }));
  }, opts.timeoutMs ?? LOGIN_TIMEOUT_MS);

  server.listen(Number(redirect.port || 80), redirect.hostname, () => {
    log.info('Opening browser for Microsoft sign-in...');
    log.info(`If the browser doesn't open, visit this URL:\n${authUrl}\n`);
    if (opts.launchBrowser ?? true) openBrowser(authUrl, log);
  });

  try {
    const code = await session.code;
    log.debug('Authorization code received; exchanging it for tokens');
    return await client.exchangeCode(code);
  } finally {
    clearTimeout(timer);
    server.close();
  }
}
