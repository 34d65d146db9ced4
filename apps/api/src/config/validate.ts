import { resolve } from 'node:path';
import { z } from 'zod';
import { SNAPSHOT_KEY_PREFIX, SNAPSHOT_RETENTION_WEEKS, UPSTREAM_REPOSITORY } from '@svn-buddy-updater/shared';
import type { ReleaseSyncConfig } from '../services/releaseSync/types';

// ---------------------------------------------------------------------------
// Zod schema
// ---------------------------------------------------------------------------

const portSchema = z
  .string()
  .default('3001')
  .transform((val) => parseInt(val, 10))
  .pipe(z.number().int().min(1).max(65535));

function positiveInt(fallback: string) {
  return z
    .string()
    .default(fallback)
    .transform((val) => parseInt(val, 10))
    .pipe(z.number().int().positive());
}

const pathSchema = (fallback: string) => z.string().min(1).default(fallback).transform((val) => resolve(val));

const optionalUrl = z
  .string()
  .optional()
  .transform((val) => (val && val.trim() !== '' ? val.trim() : undefined))
  .pipe(z.string().url().optional());

const envSchema = z.object({
  // -- Required --------------------------------------------------------------
  DATABASE_URL: z
    .string({ required_error: 'DATABASE_URL is required' })
    .min(1, 'DATABASE_URL must not be empty')
    .refine((url) => url.startsWith('postgresql://') || url.startsWith('postgres://'), {
      message: 'DATABASE_URL must be a valid postgres:// or postgresql:// URL',
    }),

  S3_BUCKET: z
    .string({ required_error: 'S3_BUCKET is required' })
    .min(1, 'S3_BUCKET must not be empty'),

  // -- Optional with defaults ------------------------------------------------
  API_PORT: portSchema,
  REDIS_URL: z.string().default('redis://localhost:6379'),
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),

  GITHUB_OWNER: z.string().min(1).default(UPSTREAM_REPOSITORY.owner),
  GITHUB_REPO: z.string().min(1).default(UPSTREAM_REPOSITORY.repo),
  GITHUB_TOKEN: z.string().optional(),
  GITHUB_TIMEOUT_MS: positiveInt('20000'),

  S3_REGION: z.string().min(1).default('us-east-1'),
  S3_ENDPOINT: optionalUrl,
  S3_ACCESS_KEY: z.string().optional(),
  S3_SECRET_KEY: z.string().optional(),
  S3_PUBLIC_URL: optionalUrl,
  S3_TIMEOUT_MS: positiveInt('60000'),

  REPOSITORY_PATH: pathSchema('var/repository'),
  SNAPSHOTS_PATH: pathSchema('var/snapshots'),
  SNAPSHOT_BRANCH: z.string().min(1).default('master'),
  // Empty skips the install step
  SNAPSHOT_PREPARE_COMMAND: z
    .string()
    .default('composer install --no-dev --no-interaction')
    .transform((val) => val.trim().split(/\s+/).filter(Boolean)),
  SNAPSHOT_BUILD_COMMAND: z
    .string()
    .default('bin/svn-buddy dev:phar-create')
    .transform((val) => val.trim().split(/\s+/).filter(Boolean))
    .pipe(z.array(z.string()).min(1, 'SNAPSHOT_BUILD_COMMAND must not be empty')),

  COMMAND_TIMEOUT_MS: positiveInt('120000'),
  BUILD_TIMEOUT_MS: positiveInt('900000'),
  DB_STATEMENT_TIMEOUT_MS: positiveInt('30000'),

  STABLE_SYNC_INTERVAL_MINUTES: positiveInt('60'),
  SNAPSHOT_SYNC_INTERVAL_MINUTES: positiveInt('360'),
});

// Inferred config type from the schema
export type AppConfig = z.infer<typeof envSchema>;

// ---------------------------------------------------------------------------
// Singleton
// ---------------------------------------------------------------------------

let _config: AppConfig | null = null;

/**
 * Returns the validated config singleton.
 * Throws if called before `validateConfig()`.
 */
export function getConfig(): AppConfig {
  if (!_config) {
    throw new Error('getConfig() called before validateConfig(). Call validateConfig() at startup.');
  }
  return _config;
}

// ---------------------------------------------------------------------------
// Warnings (non-fatal)
// ---------------------------------------------------------------------------

interface ConfigWarning {
  key: string;
  message: string;
}

function collectWarnings(env: NodeJS.ProcessEnv): ConfigWarning[] {
  const warnings: ConfigWarning[] = [];

  if (!env.GITHUB_TOKEN) {
    warnings.push({
      key: 'GITHUB_TOKEN',
      message: 'GITHUB_TOKEN is not set. Unauthenticated GitHub requests are limited to 60 per hour.',
    });
  }

  if (Boolean(env.S3_ACCESS_KEY) !== Boolean(env.S3_SECRET_KEY)) {
    warnings.push({
      key: 'S3_ACCESS_KEY',
      message: 'Only one of S3_ACCESS_KEY / S3_SECRET_KEY is set; falling back to the default AWS credential chain.',
    });
  }

  return warnings;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Validates environment variables on startup and stores the result as a singleton.
 * Throws with a formatted error listing every problem if validation fails.
 */
export function validateConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  for (const w of collectWarnings(env)) {
    console.warn(`[config] WARNING: ${w.key}: ${w.message}`);
  }

  const result = envSchema.safeParse(env);

  if (!result.success) {
    const issues = result.error.issues;
    const lines = issues.map(
      (issue) => `  - ${issue.path.join('.')}: ${issue.message}`
    );

    const message = [
      '',
      '╔══════════════════════════════════════════════════════════════╗',
      '║               CONFIGURATION VALIDATION FAILED              ║',
      '╠══════════════════════════════════════════════════════════════╣',
      '║ svn-buddy-updater cannot start due to invalid config.      ║',
      '║ Fix the issues below and restart.                          ║',
      '╚══════════════════════════════════════════════════════════════╝',
      '',
      `Found ${issues.length} configuration error(s):`,
      '',
      ...lines,
      '',
      'Hint: Copy .env.example to .env and update the values.',
      '',
    ].join('\n');

    throw new Error(message);
  }

  _config = result.data;
  return _config;
}

export function buildReleaseSyncConfig(config: AppConfig): ReleaseSyncConfig {
  return {
    upstream: { owner: config.GITHUB_OWNER, repo: config.GITHUB_REPO },
    snapshotBranch: config.SNAPSHOT_BRANCH,
    snapshotsDir: config.SNAPSHOTS_PATH,
    snapshotKeyPrefix: SNAPSHOT_KEY_PREFIX,
    retentionWeeks: SNAPSHOT_RETENTION_WEEKS,
  };
}
