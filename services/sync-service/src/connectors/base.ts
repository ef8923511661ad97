import crypto from 'crypto';
import { SourceItem } from '../sync/types';

export interface Connector<TConfig> {
    /**
     * Yields every document currently at the source. Attachments are not
     * fetched here; each item carries a lazy download instead.
     */
    fetch(config: TConfig): AsyncIterable<SourceItem>;

    testConnection(config: TConfig): Promise<boolean>;
}

/**
 * Deterministic UUID-formatted id for a source URI.
 */
export const documentIdFor = (sourceUri: string): string => {
    const hash = crypto.createHash('md5').update(sourceUri).digest('hex');
    return [
        hash.substring(0, 8),
        hash.substring(8, 12),
        hash.substring(12, 16),
        hash.substring(16, 20),
        hash.substring(20, 32)
    ].join('-');
};
