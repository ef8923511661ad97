export { syncIndex } from './orchestrator';
export { buildSnapshot } from './snapshot';
export { Fetcher, deriveId, buildBody } from './fetcher';
export { DownloadManager } from './downloadManager';
export { Bulker, toWireEntries } from './bulker';
export { BoundedQueue } from './queue';
export * from './types';
