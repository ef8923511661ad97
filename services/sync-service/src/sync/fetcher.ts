import { DocumentBody, MalformedDocumentError } from '@indexsync/search-index';
import { componentLogger } from '@indexsync/service-template';
import { DownloadManager, DownloadManagerOptions } from './downloadManager';
import { BoundedQueue, yieldToEventLoop } from './queue';
import { ChannelMessage, DocumentStats, FetcherStats, Snapshot, SourceDocument, SourceItem } from './types';

export interface FetcherOptions extends DownloadManagerOptions {
    clock?: () => string;
}

const log = componentLogger('fetcher');

const isoNow = (): string => new Date().toISOString();

export const deriveId = (document: SourceDocument): string => {
    for (const candidate of [document._id, document.id]) {
        if (typeof candidate === 'string' && candidate.length > 0) return candidate;
        if (typeof candidate === 'number' && Number.isFinite(candidate)) return String(candidate);
    }
    throw new MalformedDocumentError(
        `Source document has no usable _id or id (fields: ${Object.keys(document).join(', ') || 'none'})`
    );
};

/**
 * The indexed body: every source field except `_id`, plus `id` and `timestamp`.
 * The source document is left as it was.
 */
export const buildBody = (document: SourceDocument, id: string, timestamp: string): DocumentBody => {
    const fields = Object.entries(document).filter(([key]) => key !== '_id');
    return { ...Object.fromEntries(fields), id, timestamp };
};

/**
 * Classifies source documents against the snapshot and feeds the bulker.
 *
 * Deletes for ids that disappeared from the source are only sent once the
 * generator is exhausted.
 */
export class Fetcher {
    private readonly downloads: DownloadManager;
    private readonly clock: () => string;

    constructor(
        private readonly channel: BoundedQueue<ChannelMessage>,
        private readonly index: string,
        private readonly snapshot: Snapshot,
        options: FetcherOptions = {}
    ) {
        this.downloads = new DownloadManager(channel, index, options);
        this.clock = options.clock ?? isoNow;
    }

    async run(generator: AsyncIterable<SourceItem>): Promise<FetcherStats> {
        // Either side failing unblocks the other through the download queue
        const fail = (error: unknown): never => {
            this.downloads.abort(error);
            throw error;
        };

        const [documents, downloads] = await Promise.all([
            this.readDocuments(generator).catch(fail),
            this.downloads.run().catch(fail)
        ]);

        return { ...documents, attachmentsExtracted: downloads.extracted };
    }

    private async readDocuments(generator: AsyncIterable<SourceItem>): Promise<DocumentStats> {
        log.info('Starting doc lookups');

        const stats: DocumentStats = { created: 0, updated: 0, skipped: 0, deleted: 0 };
        const seen = new Set<string>();

        for await (const { document, download } of generator) {
            const id = deriveId(document);

            if (seen.has(id)) {
                log.warn(`Ignoring repeated document ${id}`);
                if (download) await download({ commit: false });
                continue;
            }
            seen.add(id);
            log.debug(`Looking at ${id}`);

            // Sources without timestamps are always written
            if (document.timestamp !== undefined && this.snapshot.timestamps.get(id) === document.timestamp) {
                log.debug(`Skipping ${id}`);
                stats.skipped += 1;
                if (download) await download({ commit: false });
                await yieldToEventLoop();
                continue;
            }

            const timestamp = document.timestamp ?? this.clock();

            if (download) {
                await this.downloads.schedule(() => download({ commit: true, timestamp }));
            }

            const body = buildBody(document, id, timestamp);
            if (this.snapshot.ids.has(id)) {
                stats.updated += 1;
                await this.channel.put({ kind: 'operation', operation: { type: 'update', index: this.index, id, body } });
            } else {
                stats.created += 1;
                await this.channel.put({ kind: 'operation', operation: { type: 'create', index: this.index, id, body } });
            }

            await yieldToEventLoop();
        }

        for (const id of this.snapshot.ids) {
            if (seen.has(id)) continue;
            stats.deleted += 1;
            await this.channel.put({ kind: 'operation', operation: { type: 'delete', index: this.index, id } });
        }

        await this.downloads.finish();
        await this.channel.put({ kind: 'end', stream: 'documents' });

        log.info('Doc lookups done', { ...stats });
        return stats;
    }
}
