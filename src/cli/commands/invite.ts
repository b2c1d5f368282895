import { object } from '@optique/core/constructs';
import { constant, option } from '@optique/core/primitives';
import { message } from '@optique/core/message';
import { Mutations } from '../../core/mutations.js';
import { connectDrive, createContext, resolveStart, type CommonArgs } from '../context.js';
import { renderError, renderInfo, renderJson, renderSuccess } from '../output.js';
import { commonOptions, pathArg, requireEmail, userOption } from '../parsers.js';

export const inviteCommand = object({
  cmd: constant('invite' as const),
  path: pathArg,
  user: userOption,
  readOnly: option('--read-only', { description: message`Grant read instead of write access` }),
  ...commonOptions,
});

export async function handleInvite(opts: CommonArgs & { path: string; user: string; readOnly: boolean }) {
  const ctx = createContext(opts);
  const user = requireEmail(opts.user);
  const role = opts.readOnly ? 'read' : 'write';
  const { api, credential } = await connectDrive(ctx, 'full');
  const mutations = new Mutations(api, credential, ctx.log);
  const start = await resolveStart(api, opts.path);

  ctx.log.info(`📧 Inviting ${user} to ${start.path} (${opts.readOnly ? 'read-only' : 'read/write'})`);
  const result = await mutations.invite(start.id, user, role);

  if (ctx.format === 'json') {
    console.log(renderJson({ path: start.path, user, role, ...result }));
  } else if (result.ok) {
    console.log(renderSuccess(result.message));
    console.log(renderInfo('Note: This permission is inherited by all children of this folder'));
  }
  if (!result.ok) {
    if (ctx.format === 'text') console.error(renderError(result.message));
    process.exitCode = 1;
  }
}
