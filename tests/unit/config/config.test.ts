/**
 * Unit Tests - Engine Configuration
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import os from 'os';
import path from 'path';
import fs from 'fs-extra';
import { ConfigValidationError } from '../../../src/core/errors';
import { CONFIG_FILE_NAME, DEFAULT_CONFIG, loadConfig, resolveConfig } from '../../../src/utils/config';

async function issuesOf(promise: Promise<unknown>): Promise<string[]> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      return error.issues;
    }
    throw error;
  }
  throw new Error('expected a ConfigValidationError');
}

describe('resolveConfig', () => {
  it('fills every default', () => {
    expect(resolveConfig()).toEqual({
      maxRetryAttempts: 3,
      glassMaxRetryAttempts: 3,
      retryDelayMs: 500,
      maxCrashReports: 50,
      recentReportLimit: 50,
      domainKeywords: ['settings', 'glass'],
      thresholds: { critical: 0.5, emergency: 0.3, degraded: 0.1 },
      logLevel: 'warn'
    });
  });

  it('merges partial thresholds over the defaults', () => {
    expect(resolveConfig({ thresholds: { critical: 0.4 } }).thresholds).toEqual({
      critical: 0.4,
      emergency: 0.3,
      degraded: 0.1
    });
  });

  it('names the offending field', () => {
    let issues: string[] = [];
    try {
      resolveConfig({ retryDelayMs: -1 });
    } catch (error) {
      if (error instanceof ConfigValidationError) {
        issues = error.issues;
      }
    }

    expect(issues).toEqual(['retryDelayMs: Number must be greater than or equal to 0']);
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'resilient-ui-config-'));
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('returns the defaults when no config file exists', async () => {
    await expect(loadConfig(undefined, dir)).resolves.toBe(DEFAULT_CONFIG);
  });

  it('reads the config file from the working directory', async () => {
    await fs.writeJson(path.join(dir, CONFIG_FILE_NAME), { maxRetryAttempts: 5, logLevel: 'silent' });

    const config = await loadConfig(undefined, dir);

    expect(config.maxRetryAttempts).toBe(5);
    expect(config.logLevel).toBe('silent');
    expect(config.retryDelayMs).toBe(500);
  });

  it('resolves an explicit path against the working directory', async () => {
    await fs.writeJson(path.join(dir, 'custom.json'), { maxCrashReports: 10 });

    expect((await loadConfig('custom.json', dir)).maxCrashReports).toBe(10);
  });

  it('rejects an explicit path that does not exist', async () => {
    expect(await issuesOf(loadConfig('absent.json', dir))).toEqual(['file does not exist']);
  });

  it('rejects malformed JSON', async () => {
    await fs.writeFile(path.join(dir, CONFIG_FILE_NAME), '{ maxRetryAttempts: ');

    const issues = await issuesOf(loadConfig(undefined, dir));

    expect(issues).toHaveLength(1);
    expect(issues[0].startsWith('not valid JSON (')).toBe(true);
  });

  it('rejects values outside the schema', async () => {
    await fs.writeJson(path.join(dir, CONFIG_FILE_NAME), { logLevel: 'loud' });

    const issues = await issuesOf(loadConfig(undefined, dir));

    expect(issues).toHaveLength(1);
    expect(issues[0].startsWith('logLevel: ')).toBe(true);
  });
});
