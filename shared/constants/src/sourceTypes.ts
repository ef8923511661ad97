// Kinds of source a connector exists for.
export type SourceType = 'filesystem' | 's3' | 'http';

export const SOURCE_TYPES: readonly SourceType[] = ['filesystem', 's3', 'http'];
