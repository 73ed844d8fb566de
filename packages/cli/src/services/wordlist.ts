/**
 * Name lists read from text files: one name per line, blank lines and
 * "#" comments ignored.
 */

import * as fs from 'fs/promises';
import { PrerequisiteError } from '../errors';

export function parseNameList(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}

/**
 * Read a name list, failing with the given exit code if the file is missing
 */
export async function readNameList(filePath: string, missingExitCode: number): Promise<string[]> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    const code: unknown = error instanceof Error && 'code' in error ? error.code : undefined;
    if (code === 'ENOENT') {
      throw new PrerequisiteError(`File not found: ${filePath}`, { exitCode: missingExitCode });
    }
    throw error;
  }
  return parseNameList(content);
}
