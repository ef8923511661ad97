import { GetObjectCommand, ListObjectsV2Command, S3Client } from '@aws-sdk/client-s3';
import { componentLogger } from '@indexsync/service-template';
import { SourceItem } from '../sync/types';
import { Connector, documentIdFor } from './base';
import { contentTypeFor, extractAttachment } from './extractors/attachment';

export interface S3Config {
    bucket: string;
    region: string;
    prefix?: string;
    accessKeyId?: string;
    secretAccessKey?: string;
    endpoint?: string; // MinIO/LocalStack
}

export type S3ClientFactory = (config: S3Config) => S3Client;

const log = componentLogger('connector:s3');

export const createS3Client: S3ClientFactory = config => new S3Client({
    region: config.region,
    credentials: (config.accessKeyId && config.secretAccessKey) ? {
        accessKeyId: config.accessKeyId,
        secretAccessKey: config.secretAccessKey
    } : undefined,
    endpoint: config.endpoint,
    forcePathStyle: config.endpoint !== undefined
});

/**
 * One document per object under `bucket/prefix`, stamped with LastModified.
 * Objects are listed page by page; bodies are only fetched by the download.
 */
export class S3Connector implements Connector<S3Config> {

    constructor(private readonly clientFactory: S3ClientFactory = createS3Client) { }

    async testConnection(config: S3Config): Promise<boolean> {
        try {
            await this.clientFactory(config).send(new ListObjectsV2Command({
                Bucket: config.bucket,
                Prefix: config.prefix,
                MaxKeys: 1
            }));
            return true;
        } catch (err) {
            log.warn(`Cannot list s3://${config.bucket}`, { error: err });
            return false;
        }
    }

    async *fetch(config: S3Config): AsyncIterable<SourceItem> {
        const client = this.clientFactory(config);
        let continuationToken: string | undefined;
        let pages = 0;

        do {
            const response = await client.send(new ListObjectsV2Command({
                Bucket: config.bucket,
                Prefix: config.prefix,
                ContinuationToken: continuationToken
            }));
            pages += 1;

            for (const object of response.Contents ?? []) {
                const key = object.Key;
                if (!key || key.endsWith('/')) continue;

                const uri = `s3://${config.bucket}/${key}`;
                const id = documentIdFor(uri);

                yield {
                    document: {
                        _id: id,
                        title: key.split('/').pop() || key,
                        key,
                        bucket: config.bucket,
                        uri,
                        size: object.Size,
                        etag: object.ETag?.replace(/"/g, ''),
                        ...(object.LastModified ? { timestamp: object.LastModified.toISOString() } : {})
                    },
                    download: async ({ commit, timestamp }) => {
                        if (!commit) return undefined;

                        const data = await client.send(new GetObjectCommand({ Bucket: config.bucket, Key: key }));
                        const bytes = await data.Body?.transformToByteArray();
                        if (bytes === undefined) return undefined;

                        const contentType = data.ContentType ?? contentTypeFor(key);
                        return extractAttachment(id, Buffer.from(bytes), contentType, timestamp);
                    }
                };
            }

            continuationToken = response.NextContinuationToken;
        } while (continuationToken);

        log.debug(`Listed s3://${config.bucket}/${config.prefix ?? ''}`, { pages });
    }
}
