/**
 * gcpkit logs
 *
 * View the debug log written by every command.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import * as fs from 'fs';
import { getLogPath } from '../logger';
import { runAction } from './shared';

interface LogsFlags {
  lines: string;
  path?: boolean;
  clear?: boolean;
}

const DEFAULT_LINES = 50;

/**
 * Colour a log line by its level tag
 */
export function colorLogLine(line: string): string {
  if (line.includes('[ERROR]') || line.includes('[STDERR]')) return chalk.red(line);
  if (line.includes('[WARN]')) return chalk.yellow(line);
  if (line.includes('[INFO]')) return chalk.cyan(line);
  if (line.includes('[CMD]')) return chalk.magenta(line);
  if (line.includes('[DEBUG]') || line.includes('[STDOUT]')) return chalk.gray(line);
  if (line.startsWith('=')) return chalk.blue(line);
  return line;
}

/**
 * Last `count` lines of the log, without the empty line after the final newline
 */
export function tailLines(content: string, count: number): string[] {
  const lines = content.split('\n');
  if (lines[lines.length - 1] === '') lines.pop();
  return lines.slice(Math.max(0, lines.length - count));
}

export const logsCommand = new Command('logs')
  .description('View the gcpkit debug log')
  .option('-n, --lines <count>', 'Number of lines to show', String(DEFAULT_LINES))
  .option('--path', 'Show log file path only')
  .option('--clear', 'Clear the debug log')
  .action(
    runAction('logs', async (flags: LogsFlags) => {
      const logPath = getLogPath();

      if (flags.path) {
        console.log(logPath);
        return;
      }

      if (flags.clear) {
        if (fs.existsSync(logPath)) {
          fs.unlinkSync(logPath);
          console.log(chalk.green(`\n  Cleared debug log: ${logPath}\n`));
        } else {
          console.log(chalk.gray(`\n  No log file exists at: ${logPath}\n`));
        }
        return;
      }

      if (!fs.existsSync(logPath)) {
        console.log(chalk.gray(`\n  No debug log found at: ${logPath}\n`));
        return;
      }

      const content = fs.readFileSync(logPath, 'utf-8');
      const lineCount = parseInt(flags.lines, 10) || DEFAULT_LINES;
      const lines = tailLines(content, lineCount);

      console.log(chalk.bold(`\n  Debug Log (last ${lineCount} lines)`));
      console.log(chalk.gray(`  ${logPath}\n`));
      console.log(chalk.gray('─'.repeat(80)));
      for (const line of lines) {
        console.log(colorLogLine(line));
      }
      console.log(chalk.gray('─'.repeat(80)));
      console.log(chalk.gray(`  Use --lines <n> to see more, or --clear to reset.\n`));
    })
  );
