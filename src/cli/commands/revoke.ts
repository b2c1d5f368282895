import { object } from '@optique/core/constructs';
import { constant, option } from '@optique/core/primitives';
import { message } from '@optique/core/message';
import { printError } from '@optique/run';
import { Mutations } from '../../core/mutations.js';
import type { ItemType } from '../../types/drive.js';
import { connectDrive, createContext, resolveStart, type CommonArgs } from '../context.js';
import { renderError, renderInfo, renderJson, renderRevocationPlan, renderSuccess } from '../output.js';
import { commonOptions, effectiveDepth, itemTypeOptions, pathArg, requireEmail, scanOptions, type ScanArgs, userOption } from '../parsers.js';
import { confirm } from '../prompt.js';

export const revokeCommand = object({
  cmd: constant('revoke' as const),
  path: pathArg,
  user: userOption,
  dryRun: option('--dry-run', { description: message`List what would be removed and stop` }),
  yes: option('-y', '--yes', { description: message`Do not ask for confirmation` }),
  ...scanOptions,
  ...itemTypeOptions,
  ...commonOptions,
});

export async function handleRevoke(
  opts: CommonArgs & ScanArgs & { path: string; user: string; dryRun: boolean; yes: boolean; type?: ItemType },
) {
  const ctx = createContext(opts);
  const user = requireEmail(opts.user);
  const maxDepth = effectiveDepth(opts);
  const { api, credential } = await connectDrive(ctx, 'full');
  const mutations = new Mutations(api, credential, ctx.log);
  const start = await resolveStart(api, opts.path);

  ctx.log.info(`🗑️  Removing permissions of ${user} from ${start.path}` + (maxDepth > 0 ? ` (max depth ${maxDepth})` : ''));
  if (opts.dryRun) ctx.log.info('⚠️  DRY RUN MODE - No changes will be made');

  const plan = await mutations.planRevocation(start, user, {
    maxDepth,
    itemType: opts.type ?? 'folders',
    onProgress: (visited) => ctx.log.info(`→ Scanned ${visited} items...`),
  });

  const json = ctx.format === 'json';
  const entries = plan.entries.map((e) => ({ path: e.path, itemId: e.itemId, permissionId: e.permission.id }));

  if (plan.entries.length === 0) {
    console.log(json ? renderJson({ user, entries, removed: 0, failed: 0 }) : renderInfo(`No items found with permissions for ${user}`));
    return;
  }
  if (!json) console.log(renderRevocationPlan(plan.entries, user));

  if (opts.dryRun) {
    console.log(json ? renderJson({ user, dryRun: true, entries }) : `\n⚠️  DRY RUN: Would remove ${plan.entries.length} permission(s)`);
    return;
  }

  if (!opts.yes) {
    ctx.log.info(`\n⚠️  This will remove ${user}'s access from ${plan.entries.length} item(s).`);
    if (!(await confirm('Continue? [y/N]: '))) {
      printError(message`Cancelled by user`, { exitCode: 1 });
    }
  }

  const results: Array<{ path: string; ok: boolean; message: string }> = [];
  const summary = await mutations.applyRevocation(plan, (entry, result) => {
    results.push({ path: entry.path, ok: result.ok, message: result.message });
    if (!json) console.log(result.ok ? `  ✅ ${entry.path}` : `  ❌ ${entry.path} - ${result.message}`);
  });

  if (json) {
    console.log(renderJson({ user, results, ...summary }));
  } else {
    console.log('\n=== Summary ===');
    console.log(renderSuccess(`Successfully removed: ${summary.removed}`));
    if (summary.failed > 0) console.log(renderError(`Errors: ${summary.failed}`));
  }
  if (summary.failed > 0) process.exitCode = 1;
}
