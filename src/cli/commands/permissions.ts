import { object } from '@optique/core/constructs';
import { constant } from '@optique/core/primitives';
import { connectDrive, createContext, resolveStart, type CommonArgs } from '../context.js';
import { permissionRows, renderJson, renderPermissionList } from '../output.js';
import { commonOptions, pathArg } from '../parsers.js';

export const permissionsCommand = object({
  cmd: constant('permissions' as const),
  path: pathArg,
  ...commonOptions,
});

export async function handlePermissions(opts: CommonArgs & { path: string }) {
  const ctx = createContext(opts);
  const { api } = await connectDrive(ctx, 'read-only');
  const start = await resolveStart(api, opts.path);
  const permissions = await api.listPermissions(start.id);

  if (ctx.format === 'json') {
    console.log(renderJson({ path: start.path, id: start.id, permissions: permissionRows(permissions) }));
    return;
  }
  console.log(renderPermissionList(start.path, permissions, ctx.fmt));
}
