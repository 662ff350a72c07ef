/**
 * Environment Configuration
 * Read once at start-up and validated; nothing in the core reads process.env
 */

import { z } from 'zod';

import type { AchievementRuleTable, QueryConfig } from '../types/index.js';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  SUPABASE_URL: z.string().url(),
  SUPABASE_ANON_KEY: z.string().min(1),
  SUPABASE_SERVICE_KEY: z.string().min(1),
  STORAGE_BUCKET: z.string().min(1).default('images'),
  ALLOWED_ORIGINS: z.string().default('http://localhost:3000'),
  EXPLORER_BADGE_NAME: z.string().min(1).default('Explorer'),
  VERIFIED_LOCALE_BADGE_NAME: z.string().min(1).default('Verified Locale'),
  DEFAULT_PAGE_SIZE: z.coerce.number().int().positive().default(10),
  MAX_PAGE_SIZE: z.coerce.number().int().positive().default(100),
  DEFAULT_SORT_BY: z.string().min(1).default('createdAt'),
});

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface AppConfig {
  nodeEnv: 'development' | 'test' | 'production';
  port: number;
  logLevel: LogLevel;
  supabase: {
    url: string;
    anonKey: string;
    serviceKey: string;
  };
  storageBucket: string;
  allowedOrigins: string[];
  achievements: AchievementRuleTable;
  query: QueryConfig;
}

const DEFAULT_LOG_LEVELS: Readonly<Record<AppConfig['nodeEnv'], LogLevel>> = {
  development: 'debug',
  test: 'warn',
  production: 'info',
};

export function defaultLogLevel(nodeEnv: AppConfig['nodeEnv']): LogLevel {
  return DEFAULT_LOG_LEVELS[nodeEnv];
}

/**
 * Parse configuration from an environment map.
 * Throws with every invalid variable named.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`
    );
    throw new Error(`Invalid environment configuration: ${problems.join('; ')}`);
  }

  const env = parsed.data;
  if (env.DEFAULT_PAGE_SIZE > env.MAX_PAGE_SIZE) {
    throw new Error(
      'Invalid environment configuration: DEFAULT_PAGE_SIZE cannot exceed MAX_PAGE_SIZE'
    );
  }

  return {
    nodeEnv: env.NODE_ENV,
    port: env.PORT,
    logLevel: env.LOG_LEVEL ?? defaultLogLevel(env.NODE_ENV),
    supabase: {
      url: env.SUPABASE_URL,
      anonKey: env.SUPABASE_ANON_KEY,
      serviceKey: env.SUPABASE_SERVICE_KEY,
    },
    storageBucket: env.STORAGE_BUCKET,
    allowedOrigins: env.ALLOWED_ORIGINS.split(',')
      .map((origin) => origin.trim())
      .filter((origin) => origin !== ''),
    achievements: {
      PROFILE_CREATED: env.EXPLORER_BADGE_NAME,
      IDENTITY_VERIFIED: env.VERIFIED_LOCALE_BADGE_NAME,
    },
    query: {
      defaultPerPage: env.DEFAULT_PAGE_SIZE,
      maxPerPage: env.MAX_PAGE_SIZE,
      defaultSortBy: env.DEFAULT_SORT_BY,
      defaultSortOrder: 'desc',
    },
  };
}
