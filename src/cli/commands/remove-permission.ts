import { object } from '@optique/core/constructs';
import { constant, option } from '@optique/core/primitives';
import { message } from '@optique/core/message';
import { string } from '@optique/core/valueparser';
import { Mutations } from '../../core/mutations.js';
import { connectDrive, createContext, resolveStart, type CommonArgs } from '../context.js';
import { renderError, renderJson, renderSuccess } from '../output.js';
import { commonOptions, pathArg } from '../parsers.js';

export const removePermissionCommand = object({
  cmd: constant('remove-permission' as const),
  path: pathArg,
  id: option('--id', string({ metavar: 'PERMISSION_ID' }), { description: message`Permission id, as listed by "permissions"` }),
  ...commonOptions,
});

export async function handleRemovePermission(opts: CommonArgs & { path: string; id: string }) {
  const ctx = createContext(opts);
  const { api, credential } = await connectDrive(ctx, 'full');
  const mutations = new Mutations(api, credential, ctx.log);
  const start = await resolveStart(api, opts.path);

  // Look the permission up so owner and inherited grants are refused locally
  const permission = (await api.listPermissions(start.id)).find((p) => p.id === opts.id);
  const result = await mutations.removePermission(start.id, permission ?? opts.id);

  if (ctx.format === 'json') {
    console.log(renderJson({ path: start.path, permissionId: opts.id, ...result }));
  } else if (result.ok) {
    console.log(renderSuccess(result.message));
  }
  if (!result.ok) {
    if (ctx.format === 'text') console.error(renderError(result.message));
    process.exitCode = 1;
  }
}
