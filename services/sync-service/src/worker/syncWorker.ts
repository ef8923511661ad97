import { IndexClient } from '@indexsync/search-index';
import { componentLogger } from '@indexsync/service-template';
import { parseSyncSettings, SyncSettings } from '../config';
import { ConnectorSet, fetchSource, SourceSpec } from '../connectors';
import { JobRecord, JobRegistry } from '../registry/jobRegistry';
import { RegisteredSource } from '../registry/sourceRegistry';
import { syncIndex } from '../sync';
import { SyncResult } from '../sync/types';

export interface SyncWorkerContext {
    client: IndexClient;
    connectors: ConnectorSet;
    jobs: JobRegistry;
    settings: SyncSettings;
}

export interface SyncTarget {
    index: string;
    source: SourceSpec;
    // Drop and recreate the index before syncing
    recreate?: boolean;
}

export interface TriggeredJob {
    job: JobRecord;
    // Resolves with the final record; never rejects
    completion: Promise<JobRecord>;
}

const log = componentLogger('sync-worker');

/**
 * Prepares the target index and runs one sync pass into it.
 * Settings are checked before the index is touched, so a bad chunk size never
 * leaves a recreated index empty.
 */
export const runSync = async (
    client: IndexClient,
    connectors: ConnectorSet,
    settings: SyncSettings,
    target: SyncTarget
): Promise<SyncResult> => {
    const checked = parseSyncSettings(settings);
    await client.prepareIndex(target.index, { deleteFirst: target.recreate ?? false });
    return syncIndex(client, target.index, fetchSource(connectors, target.source), checked);
};

const processJob = async (context: SyncWorkerContext, jobId: string, source: RegisteredSource): Promise<JobRecord> => {
    context.jobs.markRunning(jobId);
    log.info(`Starting sync job ${jobId} for source ${source.name} (${source.type})`, { index: source.index });

    try {
        const result = await runSync(context.client, context.connectors, context.settings, {
            index: source.index,
            source
        });
        log.info(`Job ${jobId} completed`, { ...result });
        return context.jobs.complete(jobId, result);
    } catch (err) {
        log.error(`Job ${jobId} failed`, { error: err });
        return context.jobs.fail(jobId, err instanceof Error ? err.message : String(err));
    }
};

/**
 * Records a pending job for `source` and runs it in the background.
 * Throws JobConflictError when the source already has an active job.
 */
export const triggerSyncJob = (context: SyncWorkerContext, source: RegisteredSource): TriggeredJob => {
    const job = context.jobs.create(source.id, source.index);

    const completion = processJob(context, job.jobId, source).catch((err: unknown) => {
        log.error(`Job ${job.jobId} failed unhandled`, { error: err });
        return context.jobs.get(job.jobId);
    });

    return { job, completion };
};
