import { z } from 'zod';

export const DEFAULT_JOB_NAME = 'job';
export const DEFAULT_BATCH_SIZE = 100;
/** An unlimited error threshold: processing failures never end the run. */
export const UNLIMITED_ERROR_THRESHOLD = Number.POSITIVE_INFINITY;

/** Immutable settings of a job run. */
export interface JobParameters {
  readonly name: string;
  /** Maximum number of records per batch. */
  readonly batchSize: number;
  /**
   * Number of record processing failures tolerated. The run fails when the
   * error count becomes strictly greater than this value.
   */
  readonly errorThreshold: number;
  /** Push report snapshots to the job monitor on every status change and processed record. */
  readonly monitoring: boolean;
}

/** Input accepted by `createJobParameters`. `errorThreshold` also takes `'unlimited'`. */
export interface JobParametersInput {
  readonly name?: string;
  readonly batchSize?: number;
  readonly errorThreshold?: number | 'unlimited';
  readonly monitoring?: boolean;
}

export const JobParametersSchema = z.object({
  name: z.string().trim().min(1, 'Job name must not be empty').default(DEFAULT_JOB_NAME),
  batchSize: z.number().int().min(1, 'Batch size must be at least 1').default(DEFAULT_BATCH_SIZE),
  errorThreshold: z
    .union([
      z.number().int().min(0, 'Error threshold must not be negative'),
      z.literal(UNLIMITED_ERROR_THRESHOLD),
      z.literal('unlimited'),
    ])
    .default(UNLIMITED_ERROR_THRESHOLD)
    .transform((value) => (value === 'unlimited' ? UNLIMITED_ERROR_THRESHOLD : value)),
  monitoring: z.boolean().default(false),
});

export class InvalidJobParametersError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid job parameters: ${issues.join('; ')}`);
    this.name = 'InvalidJobParametersError';
    this.issues = issues;
  }
}

/** Validate and freeze job parameters, applying defaults for missing values. */
export function createJobParameters(input: JobParametersInput = {}): JobParameters {
  const result = JobParametersSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidJobParametersError(
      result.error.issues.map((issue) => `${issue.path.join('.') || 'parameters'}: ${issue.message}`),
    );
  }
  return Object.freeze({ ...result.data });
}

/** `'N/A'` for an unlimited threshold, the number otherwise. */
export function formatErrorThreshold(errorThreshold: number): string {
  return errorThreshold === UNLIMITED_ERROR_THRESHOLD ? 'N/A' : String(errorThreshold);
}
