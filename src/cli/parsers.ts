import { optional } from '@optique/core/modifiers';
import { argument, option } from '@optique/core/primitives';
import { choice, integer, string } from '@optique/core/valueparser';
import { message } from '@optique/core/message';
import { ErrInvalidArgument } from '../errors/errors.js';

/** Depth used by -r when --max-depth is not given */
export const DEFAULT_RECURSIVE_DEPTH = 3;

// Output format choice
export const outputFormat = choice(['text', 'json'] as const);

export const itemTypeChoice = choice(['folders', 'files', 'both'] as const);

// Options every command takes
export const commonOptions = {
  remote: optional(option('--remote', string({ metavar: 'NAME' }), { description: message`rclone remote to read the token from` })),
  config: optional(option('--config', string({ metavar: 'FILE' }), { description: message`Configuration file` })),
  debug: option('--debug', { description: message`Print debug diagnostics to stderr` }),
  output: optional(option('-o', '--output', outputFormat, { description: message`Output format (text, json)` })),
};

export const pathArg = argument(string({ metavar: 'PATH' }), {
  description: message`Drive path, e.g. Finance/Reports ("/" for the drive root)`,
});

/** Trimmed address; mutations take one account, never a search term */
export function requireEmail(value: string): string {
  const email = value.trim();
  if (!/^[^@\s]+@[^@\s]+$/.test(email)) {
    throw ErrInvalidArgument.create({ detail: `Not an email address: "${value}"` });
  }
  return email;
}

export const userOption = option('--user', string({ metavar: 'EMAIL' }), { description: message`User email` });

// Options of the commands that walk a subtree
export const scanOptions = {
  recursive: option('-r', '--recursive', { description: message`Scan below the item (default depth ${String(DEFAULT_RECURSIVE_DEPTH)})` }),
  maxDepth: optional(option('--max-depth', integer({ min: 0, metavar: 'N' }), { description: message`Maximum depth below the item (0 = the item only)` })),
};

// Searches can include files; the audit report is over folders only
export const itemTypeOptions = {
  type: optional(option('--type', itemTypeChoice, { description: message`Items to visit (folders, files, both)` })),
};

export interface ScanArgs {
  recursive: boolean;
  maxDepth?: number;
}

export function effectiveDepth(args: ScanArgs): number {
  if (args.maxDepth !== undefined) return args.maxDepth;
  return args.recursive ? DEFAULT_RECURSIVE_DEPTH : 0;
}
