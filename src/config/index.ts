/**
 * @fileoverview Loads, validates, and exports application configuration.
 * Values are sourced from environment variables (and a `.env` file when
 * present) and validated with Zod, so the rest of the code can rely on a
 * fully-typed, defaulted configuration object.
 *
 * @module src/config/index
 */
import { readFileSync } from 'node:fs';
import { homedir } from 'node:os';

import dotenv from 'dotenv';
import { z } from 'zod';

import { SyncError, SyncErrorCode } from '../types-global/errors.js';

dotenv.config();

const PackageManifestSchema = z.object({
  name: z.string(),
  version: z.string(),
  description: z.string().optional(),
});

const readPackageManifest = (): z.infer<typeof PackageManifestSchema> => {
  const raw: unknown = JSON.parse(
    readFileSync(new URL('../../package.json', import.meta.url), 'utf-8'),
  );
  return PackageManifestSchema.parse(raw);
};

// --- Helper Functions ---
const emptyStringAsUndefined = (val: unknown) => {
  if (typeof val === 'string' && val.trim() === '') {
    return undefined;
  }
  return val;
};

/**
 * Expands tilde (~) in paths to the user's home directory.
 * Returns undefined for empty/undefined inputs.
 *
 * @example
 * expandTildePath('~/logs') // '/Users/username/logs'
 * expandTildePath('/absolute/path') // '/absolute/path' (unchanged)
 * expandTildePath('') // undefined
 */
const expandTildePath = (path: unknown): string | undefined => {
  if (typeof path !== 'string' || path.trim() === '') {
    return undefined;
  }

  const trimmed = path.trim();

  if (trimmed.startsWith('~/')) {
    return `${homedir()}${trimmed.slice(1)}`;
  }

  if (trimmed === '~') {
    return homedir();
  }

  return trimmed;
};

/**
 * `z.coerce.boolean()` treats every non-empty string as true, which turns
 * `"false"` into `true`. Env flags are parsed by value instead.
 */
const booleanFromEnv = (val: unknown) => {
  const str = emptyStringAsUndefined(val);
  if (typeof str === 'string') {
    const lower = str.trim().toLowerCase();
    if (['true', '1', 'yes', 'on'].includes(lower)) return true;
    if (['false', '0', 'no', 'off'].includes(lower)) return false;
  }
  return str;
};

// --- Schema Definition ---
const ConfigSchema = z.object({
  pkg: PackageManifestSchema,
  logLevel: z
    .preprocess(
      (val) => {
        const str = emptyStringAsUndefined(val);
        if (typeof str === 'string') {
          const lower = str.toLowerCase();
          const aliasMap: Record<string, string> = {
            warning: 'warn',
            err: 'error',
            information: 'info',
          };
          return aliasMap[lower] ?? lower;
        }
        return str;
      },
      z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']),
    )
    .default('warn'),
  logsPath: z.preprocess(expandTildePath, z.string().optional()),
  environment: z
    .preprocess(
      (val) => {
        const str = emptyStringAsUndefined(val);
        if (typeof str === 'string') {
          const lower = str.toLowerCase();
          const aliasMap: Record<string, string> = {
            dev: 'development',
            prod: 'production',
            test: 'testing',
          };
          return aliasMap[lower] ?? lower;
        }
        return str;
      },
      z.enum(['development', 'production', 'testing']),
    )
    .default('production'),
  sync: z.object({
    remote: z.preprocess(
      emptyStringAsUndefined,
      z.string().min(1).default('origin'),
    ),
    branch: z.preprocess(
      emptyStringAsUndefined,
      z.string().min(1).default('main'),
    ),
    defaultMessage: z.preprocess(
      emptyStringAsUndefined,
      z.string().default('Auto commit'),
    ),
    forceOnFailure: z.preprocess(booleanFromEnv, z.boolean().default(true)),
  }),
  git: z.object({
    commandTimeoutMs: z.preprocess(
      emptyStringAsUndefined,
      z.coerce.number().int().positive().optional(),
    ),
  }),
});

// --- Parsing Logic ---
const parseConfig = () => {
  const env = process.env;

  const rawConfig = {
    pkg: readPackageManifest(),
    logLevel: env.LOG_LEVEL,
    logsPath: env.LOGS_DIR,
    environment: env.NODE_ENV,
    sync: {
      remote: env.GIT_AUTOPUSH_REMOTE,
      branch: env.GIT_AUTOPUSH_BRANCH,
      defaultMessage: env.GIT_AUTOPUSH_DEFAULT_MESSAGE,
      forceOnFailure: env.GIT_AUTOPUSH_FORCE_ON_FAILURE,
    },
    git: {
      commandTimeoutMs: env.GIT_COMMAND_TIMEOUT_MS,
    },
  };

  const parsedConfig = ConfigSchema.safeParse(rawConfig);

  if (!parsedConfig.success) {
    throw new SyncError(
      SyncErrorCode.ConfigurationError,
      'Invalid application configuration.',
      {
        validationErrors: parsedConfig.error.flatten().fieldErrors,
      },
    );
  }

  return parsedConfig.data;
};

/**
 * Export the parser and schema, plus a static AppConfig type.
 */
export type AppConfig = z.infer<typeof ConfigSchema>;

export { ConfigSchema, parseConfig };
