/**
 * Environment-driven configuration
 */

import { z } from 'zod';
import { ConfigError } from './errors';
import { LOG_LEVELS, LogLevel } from './logger';

const httpUrl = z
  .string()
  .trim()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), 'must start with http:// or https://')
  .transform((value) => value.replace(/\/+$/, ''));

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const booleanFlag = (fallback: boolean) =>
  z
    .string()
    .default(fallback ? 'true' : 'false')
    .transform((value) => value.toLowerCase())
    .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no']))
    .transform((value) => value === 'true' || value === '1' || value === 'yes');

const envSchema = z.object({
  PLANE_BASE_URL: httpUrl,
  PLANE_API_TOKEN: z.string().min(1),
  PLANE_WORKSPACE_SLUG: z.string().min(1).default('default'),
  CALDAV_URL: httpUrl,
  CALDAV_USERNAME: z.string().min(1),
  CALDAV_PASSWORD: z.string().min(1),
  CALDAV_AUTH_TYPE: z
    .string()
    .default('basic')
    .transform((value) => value.toLowerCase())
    .pipe(z.enum(['basic', 'digest'])),
  PLANE_WEBHOOK_SECRET: z.string().min(32, 'must be at least 32 characters long').optional(),
  SYNC_INTERVAL_SECONDS: positiveInt(300),
  SYNC_ON_STARTUP: booleanFlag(true),
  CACHE_TTL_SECONDS: positiveInt(3600),
  RETRY_MAX_ATTEMPTS: positiveInt(3),
  RETRY_BASE_DELAY_MS: positiveInt(1000),
  RETRY_MAX_DELAY_MS: positiveInt(10000),
  REQUEST_TIMEOUT_SECONDS: positiveInt(30),
  CALDAV_CONNECT_TIMEOUT_SECONDS: positiveInt(10),
  ABSENCE_GRACE_RUNS: z.coerce.number().int().min(0).default(0),
  LOG_LEVEL: z
    .string()
    .default('info')
    .transform((value) => value.toLowerCase())
    .pipe(z.enum(LOG_LEVELS)),
});

export interface AppConfig {
  plane: {
    baseUrl: string;
    apiToken: string;
    workspaceSlug: string;
    webhookSecret?: string;
  };
  caldav: {
    url: string;
    username: string;
    password: string;
    authType: 'basic' | 'digest';
  };
  sync: {
    intervalMs: number;
    runOnStartup: boolean;
    cacheTtlMs: number;
    absenceGraceRuns: number;
  };
  retry: {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
  };
  timeouts: {
    requestMs: number;
    connectMs: number;
  };
  logLevel: LogLevel;
}

/**
 * Validate the environment and build the typed configuration
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Empty strings count as unset so that `FOO=` in a .env file falls back to the default
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      cleaned[key] = value;
    }
  }

  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }

  const e = parsed.data;
  if (e.RETRY_BASE_DELAY_MS > e.RETRY_MAX_DELAY_MS) {
    throw new ConfigError(['RETRY_BASE_DELAY_MS: must not exceed RETRY_MAX_DELAY_MS']);
  }

  return Object.freeze({
    plane: {
      baseUrl: e.PLANE_BASE_URL,
      apiToken: e.PLANE_API_TOKEN,
      workspaceSlug: e.PLANE_WORKSPACE_SLUG,
      webhookSecret: e.PLANE_WEBHOOK_SECRET,
    },
    caldav: {
      url: e.CALDAV_URL,
      username: e.CALDAV_USERNAME,
      password: e.CALDAV_PASSWORD,
      authType: e.CALDAV_AUTH_TYPE,
    },
    sync: {
      intervalMs: e.SYNC_INTERVAL_SECONDS * 1000,
      runOnStartup: e.SYNC_ON_STARTUP,
      cacheTtlMs: e.CACHE_TTL_SECONDS * 1000,
      absenceGraceRuns: e.ABSENCE_GRACE_RUNS,
    },
    retry: {
      maxAttempts: e.RETRY_MAX_ATTEMPTS,
      baseDelayMs: e.RETRY_BASE_DELAY_MS,
      maxDelayMs: e.RETRY_MAX_DELAY_MS,
    },
    timeouts: {
      requestMs: e.REQUEST_TIMEOUT_SECONDS * 1000,
      connectMs: e.CALDAV_CONNECT_TIMEOUT_SECONDS * 1000,
    },
    logLevel: e.LOG_LEVEL,
  });
}

/**
 * Configuration as printable lines, secrets masked
 */
export function describeConfig(config: AppConfig): string[] {
  return [
    `Plane URL:          ${config.plane.baseUrl}`,
    `Plane workspace:    ${config.plane.workspaceSlug}`,
    `Plane API token:    ***`,
    `Webhook secret:     ${config.plane.webhookSecret ? '***' : '(not set, signatures not verified)'}`,
    `CalDAV URL:         ${config.caldav.url}`,
    `CalDAV user:        ${config.caldav.username}`,
    `CalDAV password:    ***`,
    `CalDAV auth:        ${config.caldav.authType}`,
    `Sync interval:      ${config.sync.intervalMs / 1000}s`,
    `Sync on startup:    ${config.sync.runOnStartup ? 'yes' : 'no'}`,
    `Calendar cache TTL: ${config.sync.cacheTtlMs / 1000}s`,
    `Absence grace runs: ${config.sync.absenceGraceRuns}`,
    `Retry:              ${config.retry.maxAttempts} attempts, ${config.retry.baseDelayMs}-${config.retry.maxDelayMs}ms`,
    `Timeouts:           request ${config.timeouts.requestMs / 1000}s, connect ${config.timeouts.connectMs / 1000}s`,
    `Log level:          ${config.logLevel}`,
  ];
}
