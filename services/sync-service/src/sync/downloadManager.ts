import { SYNC_DEFAULTS } from '@indexsync/constants';
import { componentLogger } from '@indexsync/service-template';
import { BoundedQueue, yieldToEventLoop } from './queue';
import { AttachmentFields, ChannelMessage, DownloadStats } from './types';

export type DownloadTask = () => Promise<AttachmentFields | undefined>;

type DownloadMessage =
    | { kind: 'task'; task: DownloadTask }
    | { kind: 'end' };

type Settled =
    | { ok: true; value: AttachmentFields | undefined }
    | { ok: false; error: unknown };

export interface DownloadManagerOptions {
    downloadQueueSize?: number;
    downloadConcurrency?: number;
}

const log = componentLogger('downloads');

// Settling up front keeps a rejection from going unobserved while it waits its turn.
const start = (task: DownloadTask): Promise<Settled> =>
    Promise.resolve()
        .then(task)
        .then<Settled, Settled>(
            value => ({ ok: true, value }),
            (error: unknown) => ({ ok: false, error })
        );

/**
 * Runs scheduled attachment downloads and turns their results into upserts.
 *
 * At most `downloadConcurrency` downloads run at once. Results are consumed in
 * the order the downloads were scheduled, whatever order they finish in.
 */
export class DownloadManager {
    private readonly queue: BoundedQueue<DownloadMessage>;
    private readonly concurrency: number;

    constructor(
        private readonly channel: BoundedQueue<ChannelMessage>,
        private readonly index: string,
        options: DownloadManagerOptions = {}
    ) {
        this.queue = new BoundedQueue(options.downloadQueueSize ?? SYNC_DEFAULTS.DOWNLOAD_QUEUE_SIZE);
        this.concurrency = options.downloadConcurrency ?? SYNC_DEFAULTS.DOWNLOAD_CONCURRENCY;

        if (!Number.isInteger(this.concurrency) || this.concurrency < 1) {
            throw new RangeError(`Download concurrency must be a positive integer, got ${this.concurrency}`);
        }
    }

    /**
     * Waits while the scheduling queue is full.
     */
    schedule(task: DownloadTask): Promise<void> {
        return this.queue.put({ kind: 'task', task });
    }

    finish(): Promise<void> {
        return this.queue.put({ kind: 'end' });
    }

    abort(reason: unknown): void {
        this.queue.abort(reason);
    }

    async run(): Promise<DownloadStats> {
        log.info('Starting downloads');

        const inFlight: Promise<Settled>[] = [];
        const stats: DownloadStats = { extracted: 0, discarded: 0 };

        const drainOldest = async (): Promise<void> => {
            const [oldest] = inFlight.splice(0, 1);
            const settled = await oldest;
            if (!settled.ok) throw settled.error;

            const fields = settled.value;
            if (fields === undefined) {
                stats.discarded += 1;
                return;
            }

            stats.extracted += 1;
            await this.channel.put({
                kind: 'operation',
                operation: { type: 'update', index: this.index, id: fields.id, body: fields }
            });

            if (stats.extracted % 10 === 0) {
                log.info(`Downloaded ${stats.extracted} files.`);
            }
        };

        for (; ;) {
            const message = await this.queue.get();
            if (message.kind === 'end') break;

            inFlight.push(start(message.task));
            if (inFlight.length >= this.concurrency) {
                await drainOldest();
            }
            await yieldToEventLoop();
        }

        while (inFlight.length > 0) {
            await drainOldest();
        }

        await this.channel.put({ kind: 'end', stream: 'downloads' });
        log.info(`Downloads done ${stats.extracted} files.`);

        return stats;
    }
}
