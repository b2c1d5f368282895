import { object } from '@optique/core/constructs';
import { constant, option } from '@optique/core/primitives';
import { message } from '@optique/core/message';
import { authorize } from '../../connectors/onedrive/auth.js';
import { Capability } from '../../core/capability.js';
import { TokenExpiry } from '../../core/token-expiry.js';
import { createContext, type CommonArgs } from '../context.js';
import { renderJson, renderSuccess } from '../output.js';
import { commonOptions } from '../parsers.js';

export const loginCommand = object({
  cmd: constant('login' as const),
  noBrowser: option('--no-browser', { description: message`Print the sign-in URL instead of opening a browser` }),
  ...commonOptions,
});

export async function handleLogin(opts: CommonArgs & { noBrowser: boolean }) {
  const ctx = createContext(opts);
  const response = await authorize({
    settings: ctx.config.oauth,
    client: ctx.oauth,
    log: ctx.log,
    launchBrowser: !opts.noBrowser,
  });
  const token = ctx.credentials.storeOwned(response);
  const capability = Capability.fromScope(token.scope);

  if (ctx.format === 'json') {
    console.log(renderJson({ tokenFile: ctx.config.tokens.ownedTokenPath, capability, scope: token.scope }));
    return;
  }
  console.log(renderSuccess(`Token saved to ${ctx.config.tokens.ownedTokenPath}`));
  console.log(`   capability: ${capability}`);
  console.log(`   expiry: ${TokenExpiry.describe(token.expiry, new Date())}`);
}
