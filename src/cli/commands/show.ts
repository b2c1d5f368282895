import { object } from '@optique/core/constructs';
import { constant } from '@optique/core/primitives';
import { buildAuditReport, renderAuditReport } from '../../core/audit-report.js';
import { collectAll } from '../../core/scanner.js';
import { connectDrive, createContext, resolveStart, type CommonArgs } from '../context.js';
import { renderJson } from '../output.js';
import { commonOptions, DEFAULT_RECURSIVE_DEPTH, effectiveDepth, pathArg, scanOptions, type ScanArgs } from '../parsers.js';

export const showCommand = object({
  cmd: constant('show' as const),
  path: pathArg,
  ...scanOptions,
  ...commonOptions,
});

export async function handleShow(opts: CommonArgs & ScanArgs & { path: string }) {
  const ctx = createContext(opts);
  const maxDepth = effectiveDepth(opts);
  if (opts.recursive && opts.maxDepth === undefined) {
    ctx.log.info(`ℹ️  Using default max-depth: ${DEFAULT_RECURSIVE_DEPTH} (use --max-depth N to change)`);
  }

  const { api } = await connectDrive(ctx, 'read-only');
  const start = await resolveStart(api, opts.path);
  const state = await collectAll(api, start, {
    maxDepth,
    itemType: 'folders',
    log: ctx.log,
    onProgress: (visited) => ctx.log.info(`→ Scanned ${visited} items...`),
  });

  const report = buildAuditReport(start.path, state.results, maxDepth);
  console.log(ctx.format === 'json' ? renderJson(report) : renderAuditReport(report, ctx.fmt));
}
