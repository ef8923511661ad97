import { SourceType } from '@indexsync/constants';
import { SourceItem } from '../sync/types';
import { Connector } from './base';
import { FilesystemConfig, FilesystemConnector } from './filesystem';
import { HttpConfig, HttpConnector } from './http';
import { S3Config, S3Connector } from './s3';

export interface SourceConfigs {
    filesystem: FilesystemConfig;
    s3: S3Config;
    http: HttpConfig;
}

/**
 * A source type together with a configuration of the matching shape.
 */
export type SourceSpec = {
    [K in SourceType]: { type: K; config: SourceConfigs[K] }
}[SourceType];

export type ConnectorSet = {
    [K in SourceType]: Connector<SourceConfigs[K]>
};

export const createConnectors = (): ConnectorSet => ({
    filesystem: new FilesystemConnector(),
    s3: new S3Connector(),
    http: new HttpConnector()
});

export const fetchSource = (connectors: ConnectorSet, source: SourceSpec): AsyncIterable<SourceItem> => {
    switch (source.type) {
        case 'filesystem':
            return connectors.filesystem.fetch(source.config);
        case 's3':
            return connectors.s3.fetch(source.config);
        case 'http':
            return connectors.http.fetch(source.config);
    }
};

export const testSource = (connectors: ConnectorSet, source: SourceSpec): Promise<boolean> => {
    switch (source.type) {
        case 'filesystem':
            return connectors.filesystem.testConnection(source.config);
        case 's3':
            return connectors.s3.testConnection(source.config);
        case 'http':
            return connectors.http.testConnection(source.config);
    }
};

export { documentIdFor } from './base';
export type { Connector } from './base';
export { contentTypeFor, extractAttachment, isTextual } from './extractors/attachment';
export { FilesystemConnector, HttpConnector, S3Connector };
export type { FilesystemConfig, HttpConfig, S3Config };
