import type { estypes } from '@elastic/elasticsearch';

export type DocumentBody = Record<string, unknown>;

export interface BulkTarget {
    _index: string;
    _id: string;
}

/**
 * One line of a bulk request. Upserts take an action line followed by a
 * body line; deletes are a single action line.
 */
export type BulkWireEntry =
    | { update: BulkTarget }
    | { delete: BulkTarget }
    | { doc: DocumentBody; doc_as_upsert: true };

export interface BulkSummary {
    took: number;
    errors: boolean;
    items: number;
}

export interface SnapshotEntry {
    id: string;
    timestamp?: string;
}

export interface PrepareIndexOptions {
    mappings?: estypes.MappingTypeMapping;
    deleteFirst?: boolean;
    // Seeded with ids "1".."n"
    docs?: DocumentBody[];
}

/**
 * The slice of the document store the sync pipeline talks to.
 * Transient failures are retried by the implementation, never by callers.
 */
export interface IndexClient {
    bulk(entries: BulkWireEntry[]): Promise<BulkSummary>;

    /**
     * Yields `{ id, timestamp }` for every stored document.
     * Yields nothing when the index does not exist.
     */
    scanTimestamps(index: string): AsyncIterable<SnapshotEntry>;

    /**
     * Creates the index if it is missing.
     */
    prepareIndex(index: string, options?: PrepareIndexOptions): Promise<void>;
}
