import { IndexClient } from '@indexsync/search-index';
import { componentLogger } from '@indexsync/service-template';
import { Snapshot } from './types';

const log = componentLogger('snapshot');

/**
 * Reads the id and timestamp of every document currently in `index`.
 * An absent index gives an empty snapshot.
 */
export const buildSnapshot = async (client: IndexClient, index: string): Promise<Snapshot> => {
    const startedAt = Date.now();
    const ids = new Set<string>();
    const timestamps = new Map<string, string>();

    for await (const entry of client.scanTimestamps(index)) {
        ids.add(entry.id);
        if (entry.timestamp !== undefined) {
            timestamps.set(entry.id, entry.timestamp);
        }
    }

    log.info(`Found ${ids.size} docs in ${index}`, { duration_ms: Date.now() - startedAt });

    return { ids, timestamps };
};
