import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import {
  DEFAULTS,
  findConfigFile,
  loadConfig,
  parseStorageClass,
  resolveProjectId,
  resolveSiteSettings,
} from '../config';
import { ValidationError } from '../errors';
import { cleanupTempDir, createTempDir } from './helpers';

async function writeConfig(dir: string, content: unknown, filename = 'gcpkit.config.json'): Promise<string> {
  const configPath = path.join(dir, filename);
  await fs.mkdir(path.dirname(configPath), { recursive: true });
  await fs.writeFile(configPath, typeof content === 'string' ? content : JSON.stringify(content, null, 2));
  return configPath;
}

describe('config file', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
  });

  it('returns no overrides when there is no config file', () => {
    expect(findConfigFile(tempDir)).toBeNull();
    expect(loadConfig(tempDir)).toEqual({});
  });

  it('loads gcpkit.config.json', async () => {
    await writeConfig(tempDir, { project: 'lunar-base', location: 'europe-west1', storageClass: 'nearline' });

    expect(loadConfig(tempDir)).toEqual({
      project: 'lunar-base',
      location: 'europe-west1',
      storageClass: 'nearline',
    });
  });

  it('falls back to .gcpkit/config.json', async () => {
    const configPath = await writeConfig(tempDir, { indexPage: 'home.html' }, path.join('.gcpkit', 'config.json'));

    expect(findConfigFile(tempDir)).toBe(configPath);
    expect(loadConfig(tempDir)).toEqual({ indexPage: 'home.html' });
  });

  it('rejects invalid JSON', async () => {
    await writeConfig(tempDir, '{ "project": ');
    expect(() => loadConfig(tempDir)).toThrow(ValidationError);
    expect(() => loadConfig(tempDir)).toThrow(/Invalid JSON in config file/);
  });

  it('rejects unknown storage classes and unknown keys', async () => {
    await writeConfig(tempDir, { storageClass: 'hot' });
    expect(() => loadConfig(tempDir)).toThrow(/storageClass: Invalid enum value/);

    await writeConfig(tempDir, { bucket: 'my-site' });
    expect(() => loadConfig(tempDir)).toThrow(/\(root\): Unrecognized key/);
  });

  it('rejects malformed billing account IDs', async () => {
    await writeConfig(tempDir, { billingAccount: '12345' });
    expect(() => loadConfig(tempDir)).toThrow(/billingAccount: expected XXXXXX-XXXXXX-XXXXXX/);
  });
});

describe('resolveProjectId', () => {
  it('prefers the flag, then the environment, then the file', () => {
    const config = { project: 'from-file' };

    expect(resolveProjectId('from-flag', config, { GCPKIT_PROJECT: 'from-env' })).toBe('from-flag');
    expect(resolveProjectId(undefined, config, { GCPKIT_PROJECT: 'from-env' })).toBe('from-env');
    expect(resolveProjectId(undefined, config, { CLOUDSDK_CORE_PROJECT: 'from-sdk' })).toBe('from-sdk');
    expect(resolveProjectId(undefined, config, {})).toBe('from-file');
    expect(resolveProjectId(undefined, {}, {})).toBeUndefined();
  });
});

describe('resolveSiteSettings', () => {
  it('uses built-in defaults', () => {
    expect(resolveSiteSettings({}, {})).toEqual({ ...DEFAULTS });
  });

  it('lets flags override the config file', () => {
    const settings = resolveSiteSettings(
      { storageClass: 'COLDLINE', error: 'oops.html' },
      { location: 'asia', storageClass: 'archive', errorPage: 'missing.html' }
    );

    expect(settings).toEqual({
      location: 'asia',
      storageClass: 'coldline',
      indexPage: 'index.html',
      errorPage: 'oops.html',
    });
  });

  it('rejects an unknown storage class flag', () => {
    expect(() => parseStorageClass('hot')).toThrow('Invalid storage class: hot');
  });
});
