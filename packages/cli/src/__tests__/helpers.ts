/**
 * In-process stand-ins for gcloud, the terminal and the confirmation prompt
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { tmpdir } from 'os';
import type { GcloudResult, GcloudRunner } from '../gcp';
import { MARK_ICONS, type MarkStatus, type Reporter } from '../reporter';
import type { OperationContext } from '../services/context';

type Response = Partial<GcloudResult> | ((args: string[]) => Partial<GcloudResult>);
type Matcher = string | ((args: string[]) => boolean);

interface Rule {
  matcher: Matcher;
  response: Response;
}

/**
 * Scripted gcloud. A rule matches when the joined command line starts with
 * its prefix; the most recently added matching rule wins. Unmatched calls
 * succeed with empty output.
 */
export class FakeGcloud implements GcloudRunner {
  readonly calls: string[][] = [];
  private readonly rules: Rule[] = [];

  on(matcher: Matcher, response: Response): this {
    this.rules.push({ matcher, response });
    return this;
  }

  /** Make `<prefix>` exit 1 with the given stderr */
  fail(matcher: Matcher, stderr = 'ERROR: failed'): this {
    return this.on(matcher, { exitCode: 1, stderr });
  }

  async run(args: string[]): Promise<GcloudResult> {
    this.calls.push(args);
    const line = args.join(' ');

    for (let i = this.rules.length - 1; i >= 0; i--) {
      const { matcher, response } = this.rules[i];
      const matches = typeof matcher === 'string' ? line.startsWith(matcher) : matcher(args);
      if (matches) {
        const partial = typeof response === 'function' ? response(args) : response;
        return { exitCode: 0, stdout: '', stderr: '', ...partial };
      }
    }
    return { exitCode: 0, stdout: '', stderr: '' };
  }

  /** Every call as a command line */
  commands(): string[] {
    return this.calls.map((args) => args.join(' '));
  }

  commandsMatching(prefix: string): string[] {
    return this.commands().filter((line) => line.startsWith(prefix));
  }
}

/**
 * gcloud that is installed and logged in as `account`
 */
export function readyGcloud(account = 'dev@example.com'): FakeGcloud {
  return new FakeGcloud()
    .on('--version', { stdout: 'Google Cloud SDK 999.0.0\n' })
    .on('auth list', { stdout: `${account}\n` });
}

export interface RecordedLine {
  kind: 'info' | 'success' | 'warn' | 'error' | 'verbose' | 'line' | 'mark';
  text: string;
}

export class RecordingReporter implements Reporter {
  readonly entries: RecordedLine[] = [];

  info(message: string): void {
    this.entries.push({ kind: 'info', text: message });
  }
  success(message: string): void {
    this.entries.push({ kind: 'success', text: message });
  }
  warn(message: string): void {
    this.entries.push({ kind: 'warn', text: message });
  }
  error(message: string): void {
    this.entries.push({ kind: 'error', text: message });
  }
  verbose(message: string): void {
    this.entries.push({ kind: 'verbose', text: message });
  }
  line(text = ''): void {
    this.entries.push({ kind: 'line', text });
  }
  mark(status: MarkStatus, label: string, text: string): void {
    this.entries.push({ kind: 'mark', text: `${MARK_ICONS[status]} ${label} ${text}` });
  }

  texts(kind: RecordedLine['kind']): string[] {
    return this.entries.filter((entry) => entry.kind === kind).map((entry) => entry.text);
  }
}

export interface TestContext extends OperationContext {
  gcloud: FakeGcloud;
  reporter: RecordingReporter;
  prompts: string[];
}

export function testContext(
  gcloud: FakeGcloud = new FakeGcloud(),
  options: { dryRun?: boolean; force?: boolean; answer?: boolean } = {}
): TestContext {
  const prompts: string[] = [];
  return {
    gcloud,
    reporter: new RecordingReporter(),
    prompts,
    confirm: async (message) => {
      prompts.push(message);
      return options.answer ?? true;
    },
    dryRun: options.dryRun ?? false,
    force: options.force ?? false,
  };
}

export async function createTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(tmpdir(), 'gcpkit-test-'));
}

export async function cleanupTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}
