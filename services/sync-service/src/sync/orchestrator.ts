import { SYNC_DEFAULTS } from '@indexsync/constants';
import { IndexClient } from '@indexsync/search-index';
import { componentLogger } from '@indexsync/service-template';
import { Bulker } from './bulker';
import { Fetcher } from './fetcher';
import { BoundedQueue } from './queue';
import { buildSnapshot } from './snapshot';
import { ChannelMessage, SourceItem, SyncOptions, SyncResult } from './types';

const log = componentLogger('orchestrator');

/**
 * Runs one sync pass of `generator` into `index`.
 *
 * Either a complete result is returned, or the first error raised by the
 * fetcher, the downloads or a bulk request is thrown.
 */
export const syncIndex = async (
    client: IndexClient,
    index: string,
    generator: AsyncIterable<SourceItem>,
    options: SyncOptions = {}
): Promise<SyncResult> => {
    const startedAt = Date.now();
    const snapshot = await buildSnapshot(client, index);

    const channel = new BoundedQueue<ChannelMessage>(options.queueSize ?? SYNC_DEFAULTS.QUEUE_SIZE);
    const fetcher = new Fetcher(channel, index, snapshot, options);
    const bulker = new Bulker(client, channel, { chunkSize: options.chunkSize });

    const abortOnFailure = (error: unknown): never => {
        channel.abort(error);
        throw error;
    };

    const [fetched, bulked] = await Promise.all([
        fetcher.run(generator).catch(abortOnFailure),
        bulker.run().catch(abortOnFailure)
    ]);

    const result: SyncResult = {
        bulkOperationCounts: bulked.operationCounts,
        documentsCreated: fetched.created,
        documentsUpdated: fetched.updated,
        documentsSkipped: fetched.skipped,
        documentsDeleted: fetched.deleted,
        attachmentsExtracted: fetched.attachmentsExtracted,
        bulkTimeMs: bulked.bulkTimeMs
    };

    log.info(`Sync of ${index} done`, { ...result, batches: bulked.batches, duration_ms: Date.now() - startedAt });

    return result;
};
