import { Client } from '@elastic/elasticsearch';
import { componentLogger } from '@indexsync/service-template';
import { SNAPSHOT_FIELDS, SYNC_DEFAULTS } from '@indexsync/constants';
import {
    BulkSummary,
    BulkWireEntry,
    DocumentBody,
    IndexClient,
    PrepareIndexOptions,
    SnapshotEntry
} from './types';

interface StoredStamp {
    id?: unknown;
    timestamp?: unknown;
}

const log = componentLogger('index-client');

const normalizeId = (value: unknown): string | undefined => {
    if (typeof value === 'string' && value.length > 0) return value;
    if (typeof value === 'number' && Number.isFinite(value)) return String(value);
    return undefined;
};

export class EsIndexClient implements IndexClient {

    constructor(
        private readonly client: Client,
        private readonly scanPageSize: number = SYNC_DEFAULTS.SCAN_PAGE_SIZE
    ) { }

    async bulk(entries: BulkWireEntry[]): Promise<BulkSummary> {
        const response = await this.client.bulk({ operations: entries });

        // Items are not inspected one by one; a failed item is reported, not retried.
        if (response.errors) {
            log.warn('Bulk request reported item errors', { items: response.items.length });
        }

        return { took: response.took, errors: response.errors, items: response.items.length };
    }

    async *scanTimestamps(index: string): AsyncIterable<SnapshotEntry> {
        log.debug(`Scanning existing index ${index}`);

        const exists = await this.client.indices.exists({ index, expand_wildcards: 'hidden' });
        if (!exists) {
            log.debug(`Index ${index} does not exist, nothing to scan`);
            return;
        }

        const documents = this.client.helpers.scrollDocuments<StoredStamp>({
            index,
            _source: [...SNAPSHOT_FIELDS],
            size: this.scanPageSize,
            query: { match_all: {} }
        });

        for await (const source of documents) {
            const id = normalizeId(source.id);
            if (id === undefined) continue;

            yield typeof source.timestamp === 'string'
                ? { id, timestamp: source.timestamp }
                : { id };
        }
    }

    async prepareIndex(index: string, options: PrepareIndexOptions = {}): Promise<void> {
        log.debug(`Checking index ${index}`);

        const exists = await this.client.indices.exists({ index, expand_wildcards: 'hidden' });
        if (exists) {
            if (!options.deleteFirst) return;
            log.info(`Deleting index ${index} before sync`);
            await this.client.indices.delete({ index, expand_wildcards: 'hidden' });
        }

        log.info(`Creating index ${index}`);
        await this.client.indices.create({ index, mappings: options.mappings });

        if (!options.docs || options.docs.length === 0) return;

        const entries = options.docs.flatMap((doc: DocumentBody, position: number): BulkWireEntry[] => [
            { update: { _index: index, _id: String(position + 1) } },
            { doc, doc_as_upsert: true }
        ]);
        await this.bulk(entries);
    }
}
