/**
 * What every service operation runs against
 */

import { OperationCancelled } from '../errors';
import type { GcloudRunner } from '../gcp/gcloud';
import type { Confirm } from '../prompts';
import type { Reporter } from '../reporter';

export interface OperationContext {
  gcloud: GcloudRunner;
  reporter: Reporter;
  confirm: Confirm;
  /** Report what would happen without mutating anything */
  dryRun: boolean;
  /** Skip confirmation prompts */
  force: boolean;
}

/**
 * Ask before a destructive step unless --force was given.
 * Throws OperationCancelled when the user declines.
 */
export async function confirmDestructive(
  ctx: OperationContext,
  warning: string,
  details: string[] = []
): Promise<void> {
  if (ctx.force) return;

  ctx.reporter.warn(warning);
  for (const detail of details) {
    ctx.reporter.line(detail);
  }

  const confirmed = await ctx.confirm('Are you sure you want to continue?');
  if (!confirmed) {
    throw new OperationCancelled();
  }
}
