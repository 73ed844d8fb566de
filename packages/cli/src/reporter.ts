/**
 * Terminal output for commands.
 *
 * Services talk to a Reporter instead of console so tests can record what
 * a command said. Warnings, errors and verbose lines also go to the debug log.
 */

import chalk from 'chalk';
import { logDebug, logError, logWarn } from './logger';

export interface Reporter {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Shown only with --verbose */
  verbose(message: string): void;
  /** Unprefixed output line (tables, gcloud output, blank lines) */
  line(text?: string): void;
  /** Check result line such as "✓ AVAILABLE my-bucket" */
  mark(status: MarkStatus, label: string, text: string): void;
}

export type MarkStatus = 'ok' | 'warn' | 'fail';

export const MARK_ICONS: Record<MarkStatus, string> = {
  ok: '✓',
  warn: '⚠',
  fail: '✗',
};

export interface ConsoleReporterOptions {
  verbose?: boolean;
  /** Suppress info lines; results and errors are still printed */
  quiet?: boolean;
}

export function createConsoleReporter(options: ConsoleReporterOptions = {}): Reporter {
  return {
    info(message) {
      if (!options.quiet) console.log(`${chalk.blue('[INFO]')} ${message}`);
    },
    success(message) {
      console.log(`${chalk.green('[SUCCESS]')} ${message}`);
    },
    warn(message) {
      logWarn(message);
      console.log(`${chalk.yellow('[WARNING]')} ${message}`);
    },
    error(message) {
      logError(message);
      console.error(`${chalk.red('[ERROR]')} ${message}`);
    },
    verbose(message) {
      logDebug(message);
      if (options.verbose) console.log(`${chalk.cyan('[VERBOSE]')} ${message}`);
    },
    line(text = '') {
      console.log(text);
    },
    mark(status, label, text) {
      const color = status === 'ok' ? chalk.green : status === 'warn' ? chalk.yellow : chalk.red;
      console.log(`${color(`${MARK_ICONS[status]} ${label}`)} ${text}`);
    },
  };
}
