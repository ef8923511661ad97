import { ConfigValidationError } from '@indexsync/search-index';
import { loadConfig, parseNewSource, parseSourceSpec, parseSyncSettings } from './config';

describe('loadConfig', () => {
    test('fills defaults for an empty environment', () => {
        expect(loadConfig({})).toEqual({
            port: 3000,
            elasticsearch: {
                node: 'http://localhost:9200',
                maxRetries: 3,
                requestTimeoutMs: 30000
            },
            sync: {
                chunkSize: 500,
                queueSize: 1024,
                downloadQueueSize: 1024,
                downloadConcurrency: 8
            }
        });
    });

    test('coerces numeric variables', () => {
        const config = loadConfig({
            PORT: '8080',
            ELASTICSEARCH_URL: 'https://search.internal:9243',
            ELASTICSEARCH_API_KEY: 'test-secret',
            SYNC_CHUNK_SIZE: '50',
            SYNC_DOWNLOAD_CONCURRENCY: '2'
        });

        expect(config.port).toBe(8080);
        expect(config.elasticsearch).toMatchObject({ node: 'https://search.internal:9243', apiKey: 'test-secret' });
        expect(config.sync).toMatchObject({ chunkSize: 50, downloadConcurrency: 2 });
    });

    test('rejects invalid values with details', () => {
        expect(() => loadConfig({ SYNC_CHUNK_SIZE: '0', ELASTICSEARCH_URL: 'not a url' })).toThrow(ConfigValidationError);

        try {
            loadConfig({ SYNC_CHUNK_SIZE: 'many' });
            throw new Error('expected loadConfig to fail');
        } catch (err) {
            expect(err).toBeInstanceOf(ConfigValidationError);
            expect((err as ConfigValidationError).details).toEqual(['/sync/chunkSize must be integer']);
        }
    });
});

describe('parseSyncSettings', () => {
    test('fills missing values with defaults', () => {
        expect(parseSyncSettings({ chunkSize: 20 })).toEqual({
            chunkSize: 20,
            queueSize: 1024,
            downloadQueueSize: 1024,
            downloadConcurrency: 8
        });
    });

    test('rejects a chunk size below one', () => {
        try {
            parseSyncSettings({ chunkSize: 0 });
            throw new Error('expected parseSyncSettings to fail');
        } catch (err) {
            expect(err).toBeInstanceOf(ConfigValidationError);
            expect((err as ConfigValidationError).details).toEqual(['/chunkSize must be >= 1']);
        }
    });
});

describe('parseSourceSpec', () => {
    test('accepts a config matching its type', () => {
        expect(parseSourceSpec('s3', { bucket: 'docs', region: 'eu-west-1' }))
            .toEqual({ type: 's3', config: { bucket: 'docs', region: 'eu-west-1' } });
    });

    test('rejects a config of the wrong shape', () => {
        expect(() => parseSourceSpec('filesystem', { bucket: 'docs' })).toThrow(ConfigValidationError);
        expect(() => parseSourceSpec('http', { url: 'no scheme' })).toThrow(/Invalid http source configuration/);
    });
});

describe('parseNewSource', () => {
    test('validates the request and its config', () => {
        expect(parseNewSource({ name: 'Docs', type: 'http', index: 'docs-v1', config: { url: 'http://source.test/items' } }))
            .toEqual({ name: 'Docs', index: 'docs-v1', type: 'http', config: { url: 'http://source.test/items' } });
    });

    test('rejects unknown types and bad index names', () => {
        expect(() => parseNewSource({ name: 'x', type: 'ftp', index: 'docs', config: {} })).toThrow(ConfigValidationError);
        expect(() => parseNewSource({ name: 'x', type: 'filesystem', index: 'Docs', config: { path: '/tmp' } }))
            .toThrow(ConfigValidationError);
    });
});
