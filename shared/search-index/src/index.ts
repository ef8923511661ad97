export { createEsClient } from './client';
export type { EsConnectionConfig } from './client';
export { EsIndexClient } from './esIndexClient';
export { EsIndex } from './esIndex';
export type { StoredDocument, GetAllDocsOptions, UpdateOptions } from './esIndex';
export * from './errors';
export * from './types';
