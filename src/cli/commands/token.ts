import { object } from '@optique/core/constructs';
import { constant } from '@optique/core/primitives';
import { createContext, type CommonArgs } from '../context.js';
import { renderJson, renderTokenStatus } from '../output.js';
import { commonOptions } from '../parsers.js';

export const tokenCommand = object({
  cmd: constant('token' as const),
  ...commonOptions,
});

export async function handleToken(opts: CommonArgs) {
  const ctx = createContext(opts);
  const statuses = ctx.credentials.status(ctx.remote);
  if (ctx.format === 'json') {
    console.log(renderJson({ configPath: ctx.configPath, tokens: statuses }));
    return;
  }
  console.log(ctx.fmt.dim(`Config: ${ctx.configPath}`));
  console.log('');
  console.log(renderTokenStatus(statuses, new Date(), ctx.fmt));
}
