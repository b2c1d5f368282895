import { object } from '@optique/core/constructs';
import { constant, option } from '@optique/core/primitives';
import { message } from '@optique/core/message';
import { printError } from '@optique/run';
import { Mutations } from '../../core/mutations.js';
import { connectDrive, createContext, resolveStart, type CommonArgs } from '../context.js';
import { renderError, renderJson, renderSuccess } from '../output.js';
import { commonOptions, pathArg } from '../parsers.js';
import { confirm } from '../prompt.js';

export const stripCommand = object({
  cmd: constant('strip' as const),
  path: pathArg,
  yes: option('-y', '--yes', { description: message`Do not ask for confirmation` }),
  ...commonOptions,
});

export async function handleStrip(opts: CommonArgs & { path: string; yes: boolean }) {
  const ctx = createContext(opts);
  const { api, credential } = await connectDrive(ctx, 'full');
  const mutations = new Mutations(api, credential, ctx.log);
  const start = await resolveStart(api, opts.path);

  if (!opts.yes && !(await confirm(`⚠️  Remove every explicit permission on ${start.path}? [y/N]: `))) {
    printError(message`Cancelled by user`, { exitCode: 1 });
  }

  const result = await mutations.stripExplicit(start.id);
  if (ctx.format === 'json') {
    console.log(renderJson({ path: start.path, ...result }));
  } else {
    console.log(result.failedCount > 0 ? renderError(result.message) : renderSuccess(result.message));
  }
  if (result.failedCount > 0) process.exitCode = 1;
}
