import { object } from '@optique/core/constructs';
import { constant } from '@optique/core/primitives';
import { filterScan } from '../../core/scanner.js';
import type { ItemType } from '../../types/drive.js';
import { connectDrive, createContext, resolveStart, type CommonArgs } from '../context.js';
import { levelCounts, renderFilterHits, renderJson } from '../output.js';
import { commonOptions, effectiveDepth, itemTypeOptions, pathArg, scanOptions, type ScanArgs } from '../parsers.js';

export const sharedCommand = object({
  cmd: constant('shared' as const),
  path: pathArg,
  ...scanOptions,
  ...itemTypeOptions,
  ...commonOptions,
});

export async function handleShared(opts: CommonArgs & ScanArgs & { path: string; type?: ItemType }) {
  const ctx = createContext(opts);
  const { api } = await connectDrive(ctx, 'read-only');
  const start = await resolveStart(api, opts.path);
  const state = await filterScan(api, start, {
    maxDepth: effectiveDepth(opts),
    itemType: opts.type ?? 'folders',
    log: ctx.log,
    onProgress: (visited) => ctx.log.info(`→ Scanned ${visited} items...`),
  });

  if (ctx.format === 'json') {
    console.log(renderJson({ visited: state.visited.size, levels: levelCounts(state.perLevel), hits: state.results }));
    return;
  }
  console.log(renderFilterHits({ hits: state.results, perLevel: state.perLevel, visited: state.visited.size }, ctx.fmt));
}
