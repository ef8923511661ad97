/**
 * Operation Types
 *
 * Kinds of writes the fetcher hands to the bulker. Creates and updates are
 * both sent as upserts; the distinction is kept for reporting.
 */
export type OperationType = 'create' | 'update' | 'delete';
