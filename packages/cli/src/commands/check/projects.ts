/**
 * gcpkit check projects
 *
 * Check a word list of project IDs for validity and availability.
 */

import { Command } from 'commander';
import { ValidationError } from '../../errors';
import { DEFAULT_DELAY_MS, DEFAULT_WORDLIST, checkProjectIds } from '../../services/project-check.service';
import { readNameList } from '../../services/wordlist';
import { createContext, ensureReady, runAction } from '../shared';

interface CheckProjectsFlags {
  delay: string;
  verbose?: boolean;
}

export function parseDelaySeconds(value: string): number {
  const seconds = Number(value);
  if (value.trim() === '' || !Number.isFinite(seconds) || seconds < 0) {
    throw new ValidationError(`Invalid delay: ${value}`, 'Use a number of seconds, e.g. --delay 0.5');
  }
  return Math.round(seconds * 1000);
}

export const projectsCommand = new Command('projects')
  .description('Check project IDs from a word list for availability')
  .argument('[wordlist]', 'File with one project ID per line', DEFAULT_WORDLIST)
  .option('-d, --delay <seconds>', 'Pause between lookups', String(DEFAULT_DELAY_MS / 1000))
  .option('-v, --verbose', 'Show more detail')
  .action(
    runAction('check projects', async (wordlist: string, flags: CheckProjectsFlags) => {
      const delayMs = parseDelaySeconds(flags.delay);
      const ctx = createContext(flags);

      const names = await readNameList(wordlist, 1);
      ctx.reporter.info(`Loaded ${names.length} project name(s) from '${wordlist}'`);
      if (names.length === 0) {
        ctx.reporter.warn('No project names to check.');
        return 0;
      }

      await ensureReady(ctx);
      await checkProjectIds(ctx, names, { delayMs });
      return 0;
    })
  );
