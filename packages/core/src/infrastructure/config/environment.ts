import { hostname } from 'node:os';
import { z } from 'zod';
import type { SystemProperties } from '../../domain/model/JobReport.js';
import type { JobParameters, JobParametersInput } from '../../domain/model/JobParameters.js';
import { createJobParameters } from '../../domain/model/JobParameters.js';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** Settings read from `PIPEBATCH_*` environment variables. */
export interface Environment {
  readonly logLevel: LogLevel;
  readonly batchSize?: number;
  readonly errorThreshold?: number | 'unlimited';
  readonly monitoring?: boolean;
}

const booleanString = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const LogLevelSchema = z.object({
  PIPEBATCH_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

const EnvironmentSchema = LogLevelSchema.extend({
  PIPEBATCH_BATCH_SIZE: z.coerce.number().int().min(1).optional(),
  PIPEBATCH_ERROR_THRESHOLD: z.union([z.literal('unlimited'), z.coerce.number().int().min(0)]).optional(),
  PIPEBATCH_MONITORING: booleanString.optional(),
});

export class InvalidEnvironmentError extends Error {
  constructor(readonly issues: readonly string[]) {
    super(`Invalid environment: ${issues.join('; ')}`);
    this.name = 'InvalidEnvironmentError';
  }
}

function toIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
}

/** Read `PIPEBATCH_LOG_LEVEL` alone; the other variables are not looked at. */
export function loadLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const result = LogLevelSchema.safeParse(env);
  if (!result.success) {
    throw new InvalidEnvironmentError(toIssues(result.error));
  }
  return result.data.PIPEBATCH_LOG_LEVEL;
}

/**
 * Validate the `PIPEBATCH_*` variables of `env`.
 *
 * - `PIPEBATCH_LOG_LEVEL`: pino level, default `info`
 * - `PIPEBATCH_BATCH_SIZE`: positive integer
 * - `PIPEBATCH_ERROR_THRESHOLD`: non-negative integer or `unlimited`
 * - `PIPEBATCH_MONITORING`: `true`/`false`/`1`/`0`
 */
export function loadEnvironment(env: NodeJS.ProcessEnv = process.env): Environment {
  const result = EnvironmentSchema.safeParse(env);
  if (!result.success) {
    throw new InvalidEnvironmentError(toIssues(result.error));
  }

  const data = result.data;
  return {
    logLevel: data.PIPEBATCH_LOG_LEVEL,
    batchSize: data.PIPEBATCH_BATCH_SIZE,
    errorThreshold: data.PIPEBATCH_ERROR_THRESHOLD,
    monitoring: data.PIPEBATCH_MONITORING,
  };
}

/** Build job parameters from the environment. Explicit `overrides` win over environment values. */
export function jobParametersFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides: JobParametersInput = {},
): JobParameters {
  const environment = loadEnvironment(env);
  return createJobParameters({
    name: overrides.name,
    batchSize: overrides.batchSize ?? environment.batchSize,
    errorThreshold: overrides.errorThreshold ?? environment.errorThreshold,
    monitoring: overrides.monitoring ?? environment.monitoring,
  });
}

/** Snapshot of the running process, attached to every job report. */
export function captureSystemProperties(): SystemProperties {
  return Object.freeze({
    nodeVersion: process.version,
    platform: process.platform,
    arch: process.arch,
    pid: process.pid,
    hostname: hostname(),
    cwd: process.cwd(),
  });
}

