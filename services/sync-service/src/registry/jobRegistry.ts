import { v4 as uuidv4 } from 'uuid';
import { JOB_STATUS, JobStatus } from '@indexsync/constants';
import { JobConflictError, JobNotFoundError } from '@indexsync/search-index';
import { SyncResult } from '../sync/types';

export interface JobRecord {
    jobId: string;
    sourceId: string;
    index: string;
    status: JobStatus;
    createdAt: string;
    startedAt?: string;
    endedAt?: string;
    result?: SyncResult;
    error?: string;
}

const isActive = (job: JobRecord): boolean =>
    job.status === JOB_STATUS.PENDING || job.status === JOB_STATUS.RUNNING;

/**
 * In-memory job records. A source has at most one pending or running job.
 */
export class JobRegistry {
    private readonly jobs = new Map<string, JobRecord>();

    constructor(private readonly now: () => Date = () => new Date()) { }

    create(sourceId: string, index: string): JobRecord {
        const active = this.activeFor(sourceId);
        if (active) throw new JobConflictError(sourceId, active.jobId);

        const job: JobRecord = {
            jobId: uuidv4(),
            sourceId,
            index,
            status: JOB_STATUS.PENDING,
            createdAt: this.now().toISOString()
        };
        this.jobs.set(job.jobId, job);
        return { ...job };
    }

    markRunning(jobId: string): JobRecord {
        return this.patch(jobId, { status: JOB_STATUS.RUNNING, startedAt: this.now().toISOString() });
    }

    complete(jobId: string, result: SyncResult): JobRecord {
        return this.patch(jobId, { status: JOB_STATUS.COMPLETED, result, endedAt: this.now().toISOString() });
    }

    fail(jobId: string, error: string): JobRecord {
        return this.patch(jobId, { status: JOB_STATUS.FAILED, error, endedAt: this.now().toISOString() });
    }

    get(jobId: string): JobRecord {
        const job = this.jobs.get(jobId);
        if (!job) throw new JobNotFoundError(jobId);
        return { ...job };
    }

    list(): JobRecord[] {
        return [...this.jobs.values()].map(job => ({ ...job }));
    }

    activeFor(sourceId: string): JobRecord | undefined {
        for (const job of this.jobs.values()) {
            if (job.sourceId === sourceId && isActive(job)) return { ...job };
        }
        return undefined;
    }

    private patch(jobId: string, changes: Partial<JobRecord>): JobRecord {
        const job = this.jobs.get(jobId);
        if (!job) throw new JobNotFoundError(jobId);

        const updated = { ...job, ...changes };
        this.jobs.set(jobId, updated);
        return { ...updated };
    }
}
