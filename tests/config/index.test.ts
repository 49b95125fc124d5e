/**
 * @fileoverview Unit tests for configuration parsing.
 * @module tests/config/index.test
 */
import { homedir } from 'node:os';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { parseConfig } from '../../src/config/index.js';
import { SyncError, SyncErrorCode } from '../../src/types-global/errors.js';

const originalEnv = { ...process.env };

const CONFIG_KEYS = [
  'LOG_LEVEL',
  'LOGS_DIR',
  'NODE_ENV',
  'GIT_AUTOPUSH_REMOTE',
  'GIT_AUTOPUSH_BRANCH',
  'GIT_AUTOPUSH_DEFAULT_MESSAGE',
  'GIT_AUTOPUSH_FORCE_ON_FAILURE',
  'GIT_COMMAND_TIMEOUT_MS',
];

describe('config parsing', () => {
  beforeEach(() => {
    process.env = { ...originalEnv };
    for (const key of CONFIG_KEYS) {
      delete process.env[key];
    }
  });

  afterEach(() => {
    process.env = { ...originalEnv };
  });

  it('applies defaults when nothing is set', () => {
    const parsed = parseConfig();

    expect(parsed.pkg.name).toBe('git-autopush');
    expect(parsed.logLevel).toBe('warn');
    expect(parsed.logsPath).toBeUndefined();
    expect(parsed.environment).toBe('production');
    expect(parsed.sync).toEqual({
      remote: 'origin',
      branch: 'main',
      defaultMessage: 'Auto commit',
      forceOnFailure: true,
    });
    expect(parsed.git.commandTimeoutMs).toBeUndefined();
  });

  it('normalizes aliases and reads overrides', () => {
    process.env.LOG_LEVEL = 'Warning';
    process.env.NODE_ENV = 'dev';
    process.env.GIT_AUTOPUSH_REMOTE = 'upstream';
    process.env.GIT_AUTOPUSH_BRANCH = 'trunk';
    process.env.GIT_AUTOPUSH_DEFAULT_MESSAGE = 'wip';
    process.env.GIT_COMMAND_TIMEOUT_MS = '45000';

    const parsed = parseConfig();

    expect(parsed.logLevel).toBe('warn');
    expect(parsed.environment).toBe('development');
    expect(parsed.sync.remote).toBe('upstream');
    expect(parsed.sync.branch).toBe('trunk');
    expect(parsed.sync.defaultMessage).toBe('wip');
    expect(parsed.git.commandTimeoutMs).toBe(45000);
  });

  it('treats empty strings as unset', () => {
    process.env.GIT_AUTOPUSH_REMOTE = '';
    process.env.GIT_AUTOPUSH_BRANCH = '   ';
    process.env.GIT_COMMAND_TIMEOUT_MS = '';

    const parsed = parseConfig();

    expect(parsed.sync.remote).toBe('origin');
    expect(parsed.sync.branch).toBe('main');
    expect(parsed.git.commandTimeoutMs).toBeUndefined();
  });

  it.each([
    ['false', false],
    ['0', false],
    ['off', false],
    ['true', true],
    ['YES', true],
  ])('parses GIT_AUTOPUSH_FORCE_ON_FAILURE=%s as %s', (raw, expected) => {
    process.env.GIT_AUTOPUSH_FORCE_ON_FAILURE = raw;
    expect(parseConfig().sync.forceOnFailure).toBe(expected);
  });

  it('expands a tilde in LOGS_DIR', () => {
    process.env.LOGS_DIR = '~/autopush-logs';
    expect(parseConfig().logsPath).toBe(`${homedir()}/autopush-logs`);
  });

  it('throws a configuration error when validation fails', () => {
    process.env.LOG_LEVEL = 'loud';
    process.env.GIT_COMMAND_TIMEOUT_MS = '-5';

    let thrown: unknown;
    try {
      parseConfig();
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(SyncError);
    if (!(thrown instanceof SyncError)) return;
    expect(thrown.code).toBe(SyncErrorCode.ConfigurationError);
    expect(thrown.message).toBe('Invalid application configuration.');
    expect(thrown.data?.validationErrors).toHaveProperty('logLevel');
    expect(thrown.data?.validationErrors).toHaveProperty('git');
    expect(thrown.data?.validationErrors).not.toHaveProperty('sync');
  });
});
