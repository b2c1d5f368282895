import { object } from '@optique/core/constructs';
import { constant, option } from '@optique/core/primitives';
import { message } from '@optique/core/message';
import { explicitPermissionsFor } from '../../core/permission-classifier.js';
import { filterScan } from '../../core/scanner.js';
import type { ItemType } from '../../types/drive.js';
import { connectDrive, createContext, resolveStart, type CommonArgs } from '../context.js';
import { levelCounts, renderFilterHits, renderJson, renderUserAccess } from '../output.js';
import { commonOptions, effectiveDepth, itemTypeOptions, pathArg, scanOptions, userOption, type ScanArgs } from '../parsers.js';

export const accessCommand = object({
  cmd: constant('access' as const),
  path: pathArg,
  user: userOption,
  exact: option('--exact', { description: message`Match the email exactly instead of as a substring` }),
  ...scanOptions,
  ...itemTypeOptions,
  ...commonOptions,
});

export async function handleAccess(opts: CommonArgs & ScanArgs & { path: string; user: string; exact: boolean; type?: ItemType }) {
  const ctx = createContext(opts);
  const match = opts.exact ? 'exact' : 'substring';
  const maxDepth = effectiveDepth(opts);
  const { api } = await connectDrive(ctx, 'read-only');
  const start = await resolveStart(api, opts.path);

  if (maxDepth === 0) {
    const matches = explicitPermissionsFor(await api.listPermissions(start.id), opts.user, match);
    if (ctx.format === 'json') {
      console.log(renderJson({
        path: start.path,
        user: opts.user,
        hasAccess: matches.length > 0,
        roles: matches.flatMap((p) => p.roles),
      }));
      return;
    }
    console.log(renderUserAccess(start.path, opts.user, matches, ctx.fmt));
    return;
  }

  ctx.log.info(`🔍 Searching for items shared with ${opts.user} under ${start.path} (max depth ${maxDepth})`);
  const state = await filterScan(api, start, {
    maxDepth,
    itemType: opts.type ?? 'folders',
    targetUser: opts.user,
    match,
    log: ctx.log,
    onProgress: (visited) => ctx.log.info(`→ Scanned ${visited} items...`),
  });

  if (ctx.format === 'json') {
    console.log(renderJson({ user: opts.user, visited: state.visited.size, levels: levelCounts(state.perLevel), hits: state.results }));
    return;
  }
  console.log(renderFilterHits({ hits: state.results, perLevel: state.perLevel, visited: state.visited.size, targetUser: opts.user }, ctx.fmt));
}
