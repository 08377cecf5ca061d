/**
 * Finite state machine for a job run.
 *
 * Valid transitions:
 * - `STARTING` → `STARTED` | `FAILED`
 * - `STARTED` → `STOPPING` | `FAILED`
 * - `STOPPING` → `COMPLETED` | `ABORTED` | `FAILED`
 * - `COMPLETED`, `ABORTED`, `FAILED` → (terminal)
 */
export const JobStatus = {
  STARTING: 'STARTING',
  STARTED: 'STARTED',
  STOPPING: 'STOPPING',
  COMPLETED: 'COMPLETED',
  FAILED: 'FAILED',
  ABORTED: 'ABORTED',
} as const;

export type JobStatus = (typeof JobStatus)[keyof typeof JobStatus];

const VALID_TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  [JobStatus.STARTING]: [JobStatus.STARTED, JobStatus.FAILED],
  [JobStatus.STARTED]: [JobStatus.STOPPING, JobStatus.FAILED],
  [JobStatus.STOPPING]: [JobStatus.COMPLETED, JobStatus.ABORTED, JobStatus.FAILED],
  [JobStatus.COMPLETED]: [],
  [JobStatus.FAILED]: [],
  [JobStatus.ABORTED]: [],
};

/** Check whether a state transition is valid according to the job lifecycle FSM. */
export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

/** `true` for `COMPLETED`, `FAILED` and `ABORTED`. */
export function isTerminalStatus(status: JobStatus): boolean {
  return VALID_TRANSITIONS[status].length === 0;
}
