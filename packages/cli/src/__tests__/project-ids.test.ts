import { describe, it, expect } from 'vitest';
import {
  isValidProjectId,
  normalizeProjectId,
  projectIdProblem,
  withTimestampSuffix,
} from '../naming/project-ids';

describe('project IDs', () => {
  it('accepts lowercase IDs starting with a letter', () => {
    expect(projectIdProblem('lunar-base')).toBeNull();
    expect(isValidProjectId('mars-base-prod-2')).toBe(true);
  });

  it('reports the first rule an ID breaks', () => {
    expect(projectIdProblem('short')).toBe('must be 6-30 characters (got 5)');
    expect(projectIdProblem('a'.repeat(31))).toBe('must be 6-30 characters (got 31)');
    expect(projectIdProblem('1lunar-base')).toBe('must start with a lowercase letter');
    expect(projectIdProblem('lunar_base')).toBe('may only contain lowercase letters, digits and hyphens');
    expect(projectIdProblem('lunar-base-')).toBe('must end with a letter or digit');
  });

  it('normalizes case and whitespace', () => {
    expect(normalizeProjectId('  Lunar-Base ')).toBe('lunar-base');
  });

  it('appends a timestamp suffix', () => {
    expect(withTimestampSuffix('sandbox', 1700000000)).toBe('sandbox-1700000000');
  });
});
