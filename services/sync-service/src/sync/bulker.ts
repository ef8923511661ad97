import { SYNC_DEFAULTS } from '@indexsync/constants';
import { BulkWireEntry, IndexClient } from '@indexsync/search-index';
import { componentLogger } from '@indexsync/service-template';
import { BoundedQueue, yieldToEventLoop } from './queue';
import { BulkStats, ChannelMessage, Operation, OperationCounts, StreamName } from './types';

export interface BulkerOptions {
    // Operations per batch; a batch holds at most 2 x chunkSize wire entries
    chunkSize?: number;
}

const log = componentLogger('bulker');

/**
 * Creates are sent as upserts too: an attachment update for the same id may
 * land first when batches complete out of order.
 */
export const toWireEntries = (operation: Operation): BulkWireEntry[] => {
    const target = { _index: operation.index, _id: operation.id };
    if (operation.type === 'delete') {
        return [{ delete: target }];
    }
    return [{ update: target }, { doc: operation.body, doc_as_upsert: true }];
};

/**
 * Drains the operation channel into bulk requests.
 *
 * Batches are dispatched without waiting for the previous one to finish.
 * Counts are taken when an operation is read, so they do not depend on the
 * order in which dispatches complete. A failed dispatch aborts the channel
 * and the run.
 */
export class Bulker {
    private readonly chunkSize: number;

    constructor(
        private readonly client: IndexClient,
        private readonly channel: BoundedQueue<ChannelMessage>,
        options: BulkerOptions = {}
    ) {
        this.chunkSize = options.chunkSize ?? SYNC_DEFAULTS.CHUNK_SIZE;

        if (!Number.isInteger(this.chunkSize) || this.chunkSize < 1) {
            throw new RangeError(`Chunk size must be a positive integer, got ${this.chunkSize}`);
        }
    }

    async run(): Promise<BulkStats> {
        const maxEntries = this.chunkSize * 2;
        const operationCounts: OperationCounts = {};
        const ended = new Set<StreamName>();
        const inFlight: Promise<void>[] = [];
        const outcome: { failure?: { error: unknown } } = {};
        let batch: BulkWireEntry[] = [];
        let bulkTimeMs = 0;
        let batches = 0;

        const dispatch = (entries: BulkWireEntry[]): void => {
            batches += 1;
            const startedAt = Date.now();

            const pending = this.client.bulk(entries).then(
                () => {
                    log.info('Bulk request done', { entries: entries.length, operations: { ...operationCounts } });
                },
                (error: unknown) => {
                    log.error('Bulk request failed', { entries: entries.length, error });
                    if (!outcome.failure) {
                        outcome.failure = { error };
                    }
                    this.channel.abort(error);
                }
            ).finally(() => {
                bulkTimeMs += Date.now() - startedAt;
            });

            inFlight.push(pending);
        };

        while (ended.size < 2) {
            const message = await this.channel.get();

            if (message.kind === 'end') {
                ended.add(message.stream);
                continue;
            }

            const { operation } = message;
            operationCounts[operation.type] = (operationCounts[operation.type] ?? 0) + 1;

            const entries = toWireEntries(operation);
            if (batch.length + entries.length > maxEntries) {
                dispatch(batch);
                batch = [];
            }
            batch.push(...entries);
            if (batch.length >= maxEntries) {
                dispatch(batch);
                batch = [];
            }

            await yieldToEventLoop();
        }

        if (batch.length > 0) {
            dispatch(batch);
        }

        await Promise.all(inFlight);

        if (outcome.failure) {
            throw outcome.failure.error;
        }

        return { operationCounts, bulkTimeMs, batches };
    }
}
