/**
 * Job Status
 *
 * - pending: accepted, not started yet.
 * - running: a sync pass is in progress.
 * - completed / failed: terminal.
 */
export type JobStatus = 'pending' | 'running' | 'completed' | 'failed';

export const JOB_STATUS = {
    PENDING: 'pending' as JobStatus,
    RUNNING: 'running' as JobStatus,
    COMPLETED: 'completed' as JobStatus,
    FAILED: 'failed' as JobStatus
} as const;
