/**
 * Possible statuses for a batch.
 *
 * A batch waiting for a retry is `PENDING` with `lastError` set and an
 * `availableAt` in the future. `FAILED` is terminal.
 */
export const BatchStatus = {
  PENDING: 'PENDING',
  CLAIMED: 'CLAIMED',
  COMPLETED: 'COMPLETED',
  FAILED: 'FAILED',
} as const;

export type BatchStatus = (typeof BatchStatus)[keyof typeof BatchStatus];
