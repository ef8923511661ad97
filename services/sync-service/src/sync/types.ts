import { DocumentBody } from '@indexsync/search-index';
import { OperationType } from '@indexsync/constants';

/**
 * A document as produced by a connector. The id comes from `_id` or `id`;
 * `timestamp` is an opaque token compared by exact equality.
 */
export interface SourceDocument extends Readonly<Record<string, unknown>> {
    readonly _id?: string | number;
    readonly id?: string | number;
    readonly timestamp?: string;
}

export interface AttachmentFields extends DocumentBody {
    id: string;
}

export interface DownloadOptions {
    // false: release whatever the download holds, fetch nothing
    commit: boolean;
    timestamp?: string;
}

export type LazyDownload = (options: DownloadOptions) => Promise<AttachmentFields | undefined>;

export interface SourceItem {
    document: SourceDocument;
    download?: LazyDownload;
}

export type Operation =
    | { type: 'create'; index: string; id: string; body: DocumentBody }
    | { type: 'update'; index: string; id: string; body: DocumentBody }
    | { type: 'delete'; index: string; id: string };

export type StreamName = 'documents' | 'downloads';

/**
 * What travels on the channel between the fetcher and the bulker.
 * The channel is closed once both streams have sent their end message.
 */
export type ChannelMessage =
    | { kind: 'operation'; operation: Operation }
    | { kind: 'end'; stream: StreamName };

export interface Snapshot {
    readonly ids: ReadonlySet<string>;
    readonly timestamps: ReadonlyMap<string, string>;
}

export type OperationCounts = Partial<Record<OperationType, number>>;

export interface BulkStats {
    operationCounts: OperationCounts;
    bulkTimeMs: number;
    batches: number;
}

export interface DocumentStats {
    created: number;
    updated: number;
    skipped: number;
    deleted: number;
}

export interface DownloadStats {
    extracted: number;
    discarded: number;
}

export interface FetcherStats extends DocumentStats {
    attachmentsExtracted: number;
}

export interface SyncResult {
    bulkOperationCounts: OperationCounts;
    documentsCreated: number;
    documentsUpdated: number;
    documentsSkipped: number;
    documentsDeleted: number;
    attachmentsExtracted: number;
    bulkTimeMs: number;
}

export interface SyncOptions {
    chunkSize?: number;
    queueSize?: number;
    downloadQueueSize?: number;
    downloadConcurrency?: number;
    // ISO-8601 timestamp given to documents that carry none
    clock?: () => string;
}
