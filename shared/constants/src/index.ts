export * from './syncDefaults';
export * from './operationTypes';
export * from './jobStatus';
export * from './sourceTypes';
