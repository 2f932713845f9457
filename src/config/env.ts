/**
 * Process configuration
 *
 * Reads environment variables into a validated, typed config object.
 *
 * @module config/env
 */

import { z } from 'zod';
import { DEFAULT_URLS } from './urls';

export const DEFAULT_USER_AGENT = 'PlayerStatsResolver/1.0';

const baseUrl = z
  .string()
  .url()
  .transform((value) => value.replace(/\/+$/, ''));

const envSchema = z.object({
  ENVIRONMENT: z.enum(['development', 'production', 'test']).default('production'),
  PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  ALLOWED_ORIGINS: z.string().default(''),
  BLIZZARD_BASE_URL: baseUrl.default(DEFAULT_URLS.blizzardBase),
  MO_BASE_URL: baseUrl.default(DEFAULT_URLS.moBase),
  USER_AGENT: z.string().min(1).default(DEFAULT_USER_AGENT),
  PARSE_WORKERS: z.coerce.number().int().min(1).max(32).default(2),
  SINGLE_FLIGHT: z
    .enum(['true', 'false'])
    .default('false')
    .transform((value) => value === 'true'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
});

export type Environment = z.infer<typeof envSchema>['ENVIRONMENT'];

export interface AppConfig {
  environment: Environment;
  port: number;
  allowedOrigins: string[];
  urls: {
    blizzardBase: string;
    moBase: string;
  };
  userAgent: string;
  parseWorkers: number;
  singleFlight: boolean;
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
}

/**
 * Thrown when one or more environment variables fail validation
 */
export class ConfigError extends Error {
  issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Parse configuration from an environment map (usually `process.env`)
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: Record<string, string | undefined>): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const vars = parsed.data;
  return {
    environment: vars.ENVIRONMENT,
    port: vars.PORT,
    allowedOrigins: vars.ALLOWED_ORIGINS.split(',')
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0),
    urls: {
      blizzardBase: vars.BLIZZARD_BASE_URL,
      moBase: vars.MO_BASE_URL,
    },
    userAgent: vars.USER_AGENT,
    parseWorkers: vars.PARSE_WORKERS,
    singleFlight: vars.SINGLE_FLIGHT,
    logLevel: vars.LOG_LEVEL,
  };
}
