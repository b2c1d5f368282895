/**
 * Log: leveled diagnostics on stderr.
 *
 * stdout carries command output only; everything written here goes to stderr
 * so that `-o json` stays machine-readable. Debug lines appear only when enabled.
 */
import { StaticTypeCompanion } from './companion.js';

export interface Log {
  readonly debugEnabled: boolean;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
}

class ConsoleLog implements Log {
  constructor(readonly debugEnabled: boolean) {}

  debug(message: string): void {
    if (this.debugEnabled) console.error(`[debug] ${message}`);
  }

  info(message: string): void {
    console.error(message);
  }

  warn(message: string): void {
    console.error(`⚠️  ${message}`);
  }
}

const silentLog: Log = {
  debugEnabled: false,
  debug() {},
  info() {},
  warn() {},
};

export const Log = StaticTypeCompanion({
  console(opts: { debug: boolean }): Log {
    return new ConsoleLog(opts.debug);
  },
  silent: silentLog,
});
