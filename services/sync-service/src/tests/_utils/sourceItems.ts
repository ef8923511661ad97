import { AttachmentFields, ChannelMessage, DownloadOptions, LazyDownload, SourceItem } from '../../sync/types';
import { BoundedQueue } from '../../sync/queue';

export const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

export async function* fromItems(items: SourceItem[]): AsyncIterable<SourceItem> {
    for (const item of items) {
        yield item;
    }
}

/**
 * A download that records how it was invoked and, when committed, resolves
 * to `fields` after `delayMs`.
 */
export const recordingDownload = (fields: AttachmentFields | undefined, delayMs = 0) => {
    const calls: DownloadOptions[] = [];
    const download: LazyDownload = async (options) => {
        calls.push(options);
        if (!options.commit) return undefined;
        if (delayMs > 0) await sleep(delayMs);
        return fields;
    };
    return { download, calls };
};

export const drain = async <T>(queue: BoundedQueue<T>): Promise<T[]> => {
    const out: T[] = [];
    while (queue.size > 0) {
        out.push(await queue.get());
    }
    return out;
};

export const operationsOf = (messages: ChannelMessage[]) =>
    messages.flatMap(message => (message.kind === 'operation' ? [message.operation] : []));

export const waitFor = async (condition: () => boolean, ticks = 200): Promise<void> => {
    for (let tick = 0; tick < ticks; tick++) {
        if (condition()) return;
        await new Promise<void>(resolve => setImmediate(resolve));
    }
    throw new Error('condition not met');
};
