/**
 * Finite state machine for the job lifecycle.
 *
 * Valid transitions:
 * - `PENDING` → `RUNNING` | `CANCELLED`
 * - `RUNNING` → `COMPLETED` | `FAILED` | `CANCELLED`
 * - `COMPLETED`, `FAILED`, `CANCELLED` → (terminal)
 */
export const JobStatus = {
  PENDING: 'PENDING',
  RUNNING: 'RUNNING',
  COMPLETED: 'COMPLETED',
  FAILED: 'FAILED',
  CANCELLED: 'CANCELLED',
} as const;

export type JobStatus = (typeof JobStatus)[keyof typeof JobStatus];

const VALID_TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  [JobStatus.PENDING]: [JobStatus.RUNNING, JobStatus.CANCELLED],
  [JobStatus.RUNNING]: [JobStatus.COMPLETED, JobStatus.FAILED, JobStatus.CANCELLED],
  [JobStatus.COMPLETED]: [],
  [JobStatus.FAILED]: [],
  [JobStatus.CANCELLED]: [],
};

/** Check whether a state transition is valid according to the job lifecycle FSM. */
export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

/** `true` for statuses a job never leaves. */
export function isTerminalStatus(status: JobStatus): boolean {
  return VALID_TRANSITIONS[status].length === 0;
}
