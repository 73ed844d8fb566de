import { describe, it, expect } from 'vitest';
import { checkProjectIds } from '../services/project-check.service';
import { FakeGcloud, testContext } from './helpers';

function projects(): FakeGcloud {
  return new FakeGcloud()
    .on('projects describe mars-base-prod', { stdout: 'mars-base-prod\n' })
    .fail(
      'projects describe lunar-base',
      'ERROR: (gcloud.projects.describe) [dev@example.com] does not have permission to access projects instance [lunar-base] (or it may not exist)'
    )
    .fail('projects describe venus-lab', 'ERROR: (gcloud.projects.describe) NOT_FOUND: project not found')
    .fail(
      'projects describe pluto-outpost',
      'ERROR: (gcloud.projects.describe) There was a problem refreshing your current auth tokens'
    );
}

describe('checkProjectIds', () => {
  it('reports progress, skips invalid IDs and lists the available ones', async () => {
    const ctx = testContext(projects());
    const sleeps: number[] = [];

    const summary = await checkProjectIds(
      ctx,
      ['Lunar-Base', 'short', 'mars-base-prod', 'venus-lab', 'pluto-outpost'],
      { sleep: async (ms) => void sleeps.push(ms) }
    );

    expect(ctx.reporter.texts('mark')).toEqual([
      '✓ [1/5] AVAILABLE lunar-base',
      '✗ [2/5] INVALID short (must be 6-30 characters (got 5))',
      '✗ [3/5] TAKEN mars-base-prod',
      '✓ [4/5] AVAILABLE venus-lab',
      '⚠ [5/5] ERROR pluto-outpost (ERROR: (gcloud.projects.describe) There was a problem refreshing your current auth tokens)',
    ]);
    expect(ctx.gcloud.commandsMatching('projects describe short')).toEqual([]);
    expect(summary.available).toEqual(['lunar-base', 'venus-lab']);
    expect(summary.taken).toEqual(['mars-base-prod']);
    expect(summary.results.map((r) => r.status)).toEqual(['available', 'invalid', 'taken', 'available', 'error']);
    expect(sleeps).toEqual([200, 200, 200]);

    const lines = ctx.reporter.texts('line');
    expect(lines).toContain('Total checked : 5');
    expect(lines).toContain('Available     : 2');
    expect(lines).toContain('Taken         : 1');
    expect(lines.slice(-2)).toEqual(['   • lunar-base', '   • venus-lab']);
  });

  it('honours a custom delay', async () => {
    const ctx = testContext(projects());
    const sleeps: number[] = [];

    await checkProjectIds(ctx, ['lunar-base', 'venus-lab'], {
      delayMs: 50,
      sleep: async (ms) => void sleeps.push(ms),
    });

    expect(sleeps).toEqual([50]);
  });

  it('says so when nothing is available', async () => {
    const ctx = testContext(projects());

    const summary = await checkProjectIds(ctx, ['mars-base-prod'], { delayMs: 0 });

    expect(summary.available).toEqual([]);
    expect(ctx.reporter.texts('line')).toContain('No available project IDs found.');
  });

  it('does nothing for an empty list', async () => {
    const ctx = testContext(projects());

    const summary = await checkProjectIds(ctx, []);

    expect(summary.results).toEqual([]);
    expect(ctx.reporter.texts('warn')).toEqual(['No project names to check.']);
    expect(ctx.gcloud.calls).toEqual([]);
  });
});
