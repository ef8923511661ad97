import Ajv, { ErrorObject, JSONSchemaType } from 'ajv';
import addFormats from 'ajv-formats';
import dotenv from 'dotenv';
import { SOURCE_TYPES, SourceType, SYNC_DEFAULTS } from '@indexsync/constants';
import { ConfigValidationError, EsConnectionConfig } from '@indexsync/search-index';
import { FilesystemConfig, HttpConfig, S3Config, SourceSpec } from './connectors';

export interface SyncSettings {
    chunkSize: number;
    queueSize: number;
    downloadQueueSize: number;
    downloadConcurrency: number;
}

export interface ServiceConfig {
    port: number;
    elasticsearch: EsConnectionConfig;
    sync: SyncSettings;
}

export interface NewSourceRequest {
    name: string;
    type: SourceType;
    index: string;
    config: unknown;
}

const ajv = new Ajv({ allErrors: true, coerceTypes: true, useDefaults: true });
addFormats(ajv);

const positiveInteger = (fallback: number) => ({ type: 'integer', minimum: 1, default: fallback } as const);

const syncSettingsSchema: JSONSchemaType<SyncSettings> = {
    type: 'object',
    properties: {
        chunkSize: positiveInteger(SYNC_DEFAULTS.CHUNK_SIZE),
        queueSize: positiveInteger(SYNC_DEFAULTS.QUEUE_SIZE),
        downloadQueueSize: positiveInteger(SYNC_DEFAULTS.DOWNLOAD_QUEUE_SIZE),
        downloadConcurrency: positiveInteger(SYNC_DEFAULTS.DOWNLOAD_CONCURRENCY)
    },
    required: ['chunkSize', 'queueSize', 'downloadQueueSize', 'downloadConcurrency'],
    additionalProperties: false
};

const validateSyncSettings = ajv.compile(syncSettingsSchema);

const serviceConfigSchema: JSONSchemaType<ServiceConfig> = {
    type: 'object',
    properties: {
        port: { type: 'integer', minimum: 1, maximum: 65535, default: 3000 },
        elasticsearch: {
            type: 'object',
            properties: {
                node: { type: 'string', format: 'uri', default: 'http://localhost:9200' },
                apiKey: { type: 'string', nullable: true },
                username: { type: 'string', nullable: true },
                password: { type: 'string', nullable: true },
                maxRetries: { type: 'integer', minimum: 0, default: 3 },
                requestTimeoutMs: positiveInteger(30000)
            },
            required: ['node', 'maxRetries', 'requestTimeoutMs'],
            additionalProperties: false
        },
        sync: syncSettingsSchema
    },
    required: ['port', 'elasticsearch', 'sync'],
    additionalProperties: false
};

const validateServiceConfig = ajv.compile(serviceConfigSchema);

const validateNewSource = ajv.compile<NewSourceRequest>({
    type: 'object',
    properties: {
        name: { type: 'string', minLength: 1 },
        type: { type: 'string', enum: [...SOURCE_TYPES] },
        // Elasticsearch index names: lowercase, no leading '-', '_' or '+'
        index: { type: 'string', pattern: '^[a-z0-9][a-z0-9._-]*$', maxLength: 255 },
        config: {}
    },
    required: ['name', 'type', 'index', 'config'],
    additionalProperties: false
});

const validateFilesystem = ajv.compile<FilesystemConfig>({
    type: 'object',
    properties: {
        path: { type: 'string', minLength: 1 }
    },
    required: ['path'],
    additionalProperties: false
});

const validateS3 = ajv.compile<S3Config>({
    type: 'object',
    properties: {
        bucket: { type: 'string', minLength: 1 },
        region: { type: 'string', minLength: 1 },
        prefix: { type: 'string' },
        accessKeyId: { type: 'string' },
        secretAccessKey: { type: 'string' },
        endpoint: { type: 'string', format: 'uri' }
    },
    required: ['bucket', 'region'],
    additionalProperties: false
});

const validateHttp = ajv.compile<HttpConfig>({
    type: 'object',
    properties: {
        url: { type: 'string', format: 'uri' },
        headers: { type: 'object', additionalProperties: { type: 'string' } },
        timeoutMs: { type: 'integer', minimum: 1 }
    },
    required: ['url'],
    additionalProperties: false
});

const errorDetails = (errors: ErrorObject[] | null | undefined): string[] =>
    (errors ?? []).map(error => `${error.instancePath || '/'} ${error.message ?? 'is invalid'}`);

/**
 * Maps environment variables to a validated ServiceConfig. Unset values take
 * their defaults; numeric values are coerced.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): ServiceConfig => {
    const raw: unknown = {
        port: env.PORT,
        elasticsearch: {
            node: env.ELASTICSEARCH_URL,
            apiKey: env.ELASTICSEARCH_API_KEY,
            username: env.ELASTICSEARCH_USERNAME,
            password: env.ELASTICSEARCH_PASSWORD,
            maxRetries: env.ELASTICSEARCH_MAX_RETRIES,
            requestTimeoutMs: env.ELASTICSEARCH_REQUEST_TIMEOUT_MS
        },
        sync: {
            chunkSize: env.SYNC_CHUNK_SIZE,
            queueSize: env.SYNC_QUEUE_SIZE,
            downloadQueueSize: env.SYNC_DOWNLOAD_QUEUE_SIZE,
            downloadConcurrency: env.SYNC_DOWNLOAD_CONCURRENCY
        }
    };

    if (!validateServiceConfig(raw)) {
        throw new ConfigValidationError('Invalid service configuration', errorDetails(validateServiceConfig.errors));
    }
    return raw;
};

/**
 * Checks pipeline sizes coming from outside the environment, such as CLI
 * overrides. The input is left untouched.
 */
export const parseSyncSettings = (input: unknown): SyncSettings => {
    const candidate: unknown = typeof input === 'object' && input !== null ? { ...input } : input;
    if (!validateSyncSettings(candidate)) {
        throw new ConfigValidationError('Invalid sync settings', errorDetails(validateSyncSettings.errors));
    }
    return candidate;
};

/**
 * Loads `.env` into the process environment first.
 */
export const loadEnvConfig = (): ServiceConfig => {
    dotenv.config();
    return loadConfig(process.env);
};

export const parseSourceSpec = (type: SourceType, config: unknown): SourceSpec => {
    const invalid = (errors: ErrorObject[] | null | undefined) =>
        new ConfigValidationError(`Invalid ${type} source configuration`, errorDetails(errors));

    switch (type) {
        case 'filesystem':
            if (validateFilesystem(config)) return { type, config };
            throw invalid(validateFilesystem.errors);
        case 's3':
            if (validateS3(config)) return { type, config };
            throw invalid(validateS3.errors);
        case 'http':
            if (validateHttp(config)) return { type, config };
            throw invalid(validateHttp.errors);
    }
};

export const parseNewSource = (body: unknown): SourceSpec & { name: string; index: string } => {
    if (!validateNewSource(body)) {
        throw new ConfigValidationError('Invalid source', errorDetails(validateNewSource.errors));
    }
    return { name: body.name, index: body.index, ...parseSourceSpec(body.type, body.config) };
};
