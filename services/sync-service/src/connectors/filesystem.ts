import fs from 'fs/promises';
import path from 'path';
import { componentLogger } from '@indexsync/service-template';
import { SourceItem } from '../sync/types';
import { Connector, documentIdFor } from './base';
import { contentTypeFor, extractAttachment } from './extractors/attachment';

export interface FilesystemConfig {
    path: string;
}

const log = componentLogger('connector:filesystem');

const isIgnored = (name: string): boolean => name === 'node_modules' || name.startsWith('.');

async function* walk(dir: string): AsyncIterable<string> {
    const dirents = await fs.readdir(dir, { withFileTypes: true });
    dirents.sort((a, b) => a.name.localeCompare(b.name));

    for (const dirent of dirents) {
        if (isIgnored(dirent.name)) continue;

        const resolved = path.resolve(dir, dirent.name);
        if (dirent.isDirectory()) {
            yield* walk(resolved);
        } else if (dirent.isFile()) {
            yield resolved;
        }
    }
}

/**
 * One document per file under `path`, stamped with the file's mtime.
 */
export class FilesystemConnector implements Connector<FilesystemConfig> {

    async testConnection(config: FilesystemConfig): Promise<boolean> {
        try {
            await fs.access(config.path);
            return true;
        } catch (err) {
            log.warn(`Cannot access ${config.path}`, { error: err });
            return false;
        }
    }

    async *fetch(config: FilesystemConfig): AsyncIterable<SourceItem> {
        const root = path.resolve(config.path);

        for await (const filePath of walk(root)) {
            const stats = await fs.stat(filePath);
            const uri = `file://${filePath}`;
            const id = documentIdFor(uri);
            const contentType = contentTypeFor(filePath);

            yield {
                document: {
                    _id: id,
                    title: path.basename(filePath),
                    path: path.relative(root, filePath),
                    uri,
                    size: stats.size,
                    content_type: contentType,
                    timestamp: stats.mtime.toISOString()
                },
                download: async ({ commit, timestamp }) => {
                    if (!commit) return undefined;
                    const content = await fs.readFile(filePath);
                    return extractAttachment(id, content, contentType, timestamp);
                }
            };
        }
    }
}
