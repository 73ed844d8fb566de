/**
 * gcloud process runner
 *
 * All GCP access goes through a GcloudRunner. The default runner spawns the
 * gcloud binary without a shell; tests pass a scripted fake.
 */

import { execFile } from 'child_process';
import { logCommand, logExit, logOutput } from '../logger';
import { GcloudError } from '../errors';

export interface GcloudResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface GcloudRunner {
  run(args: string[]): Promise<GcloudResult>;
}

/** Exit code used when the gcloud binary cannot be spawned */
export const MISSING_BINARY_EXIT_CODE = 127;

const MAX_BUFFER = 64 * 1024 * 1024;

export function createGcloudRunner(binary = 'gcloud'): GcloudRunner {
  return {
    run(args: string[]): Promise<GcloudResult> {
      const command = `${binary} ${args.join(' ')}`;
      logCommand(command);

      return new Promise((resolve) => {
        execFile(binary, args, { maxBuffer: MAX_BUFFER }, (error, stdout, stderr) => {
          const result: GcloudResult = {
            exitCode: exitCodeOf(error),
            stdout: String(stdout),
            stderr: String(stderr),
          };

          logExit(command, result.exitCode);
          logOutput('stdout', result.stdout);
          logOutput('stderr', result.stderr);
          resolve(result);
        });
      });
    },
  };
}

function exitCodeOf(error: Error | null): number {
  if (!error) return 0;

  const code: unknown = 'code' in error ? error.code : undefined;
  if (typeof code === 'number') return code;
  if (code === 'ENOENT') return MISSING_BINARY_EXIT_CODE;
  return 1;
}

/**
 * Run gcloud and return stdout, throwing GcloudError on a non-zero exit
 */
export async function runOrThrow(
  runner: GcloudRunner,
  args: string[],
  context: string,
  hint?: string
): Promise<string> {
  const result = await runner.run(args);
  if (result.exitCode !== 0) {
    throw new GcloudError(context, args, result, hint);
  }
  return result.stdout;
}

/**
 * Run gcloud and report only whether it exited cleanly
 */
export async function succeeds(runner: GcloudRunner, args: string[]): Promise<boolean> {
  const result = await runner.run(args);
  return result.exitCode === 0;
}

/**
 * Split gcloud value/list output into non-empty trimmed lines
 */
export function outputLines(stdout: string): string[] {
  return stdout
    .split('\n')
    .map((line) => line.trim())
    .filter(Boolean);
}
