/**
 * Sync Defaults
 *
 * Sizes used by the sync pipeline when the configuration leaves them out.
 * A bulk request carries at most 2 x CHUNK_SIZE wire entries.
 */
export const SYNC_DEFAULTS = {
    CHUNK_SIZE: 500,
    QUEUE_SIZE: 1024,
    DOWNLOAD_QUEUE_SIZE: 1024,
    DOWNLOAD_CONCURRENCY: 8,
    SCAN_PAGE_SIZE: 1000,
    PAGE_SIZE: 100
} as const;

// Document fields the snapshot scan reads back from the index.
export const SNAPSHOT_FIELDS = ['id', 'timestamp'] as const;
