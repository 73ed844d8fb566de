/**
 * Project ID availability checks over a word list
 */

import { lookupProject, type GcloudRunner } from '../gcp';
import { normalizeProjectId, projectIdProblem } from '../naming/project-ids';
import type { Reporter } from '../reporter';

export const DEFAULT_WORDLIST = 'project-names.txt';
export const DEFAULT_DELAY_MS = 200;

export type ProjectIdStatus = 'invalid' | 'available' | 'taken' | 'error';

export interface ProjectIdCheck {
  name: string;
  status: ProjectIdStatus;
  detail?: string;
}

export interface ProjectCheckSummary {
  results: ProjectIdCheck[];
  available: string[];
  taken: string[];
}

export interface ProjectCheckOptions {
  /** Pause between lookups */
  delayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

const RULE = '='.repeat(50);

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export async function checkProjectIds(
  ctx: { gcloud: GcloudRunner; reporter: Reporter },
  names: string[],
  options: ProjectCheckOptions = {}
): Promise<ProjectCheckSummary> {
  const { reporter, gcloud } = ctx;
  const delayMs = options.delayMs ?? DEFAULT_DELAY_MS;
  const sleep = options.sleep ?? defaultSleep;
  const summary: ProjectCheckSummary = { results: [], available: [], taken: [] };

  if (names.length === 0) {
    reporter.warn('No project names to check.');
    return summary;
  }

  reporter.info(`Checking ${names.length} project ID(s)...`);
  reporter.line();

  for (const [index, rawName] of names.entries()) {
    const progress = `[${index + 1}/${names.length}]`;
    const name = normalizeProjectId(rawName);

    const problem = projectIdProblem(name);
    if (problem) {
      summary.results.push({ name, status: 'invalid', detail: problem });
      reporter.mark('fail', `${progress} INVALID`, `${rawName} (${problem})`);
      continue;
    }

    const lookup = await lookupProject(gcloud, name);
    if (lookup.status === 'error') {
      summary.results.push({ name, status: 'error', detail: lookup.detail });
      reporter.mark('warn', `${progress} ERROR`, `${name} (${lookup.detail})`);
    } else if (lookup.status === 'taken') {
      summary.results.push({ name, status: 'taken' });
      summary.taken.push(name);
      reporter.mark('fail', `${progress} TAKEN`, name);
    } else {
      summary.results.push({ name, status: 'available' });
      summary.available.push(name);
      reporter.mark('ok', `${progress} AVAILABLE`, name);
    }

    if (delayMs > 0 && index < names.length - 1) {
      await sleep(delayMs);
    }
  }

  reporter.line();
  reporter.line(RULE);
  reporter.line('SUMMARY');
  reporter.line(RULE);
  reporter.line(`Total checked : ${names.length}`);
  reporter.line(`Available     : ${summary.available.length}`);
  reporter.line(`Taken         : ${summary.taken.length}`);

  reporter.line();
  if (summary.available.length > 0) {
    reporter.line('AVAILABLE PROJECT IDs:');
    for (const id of summary.available) {
      reporter.line(`   • ${id}`);
    }
  } else {
    reporter.line('No available project IDs found.');
  }

  return summary;
}
