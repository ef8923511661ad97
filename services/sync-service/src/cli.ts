#!/usr/bin/env node

import chalk from 'chalk';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { SOURCE_TYPES, SourceType } from '@indexsync/constants';
import { createEsClient, EsIndexClient } from '@indexsync/search-index';
import { loadEnvConfig, parseSourceSpec, parseSyncSettings, SyncSettings } from './config';
import { createConnectors, SourceSpec, testSource } from './connectors';
import { SyncResult } from './sync/types';
import { runSync } from './worker/syncWorker';

export interface CliArgs {
    source: SourceType;
    index: string;
    path?: string;
    bucket?: string;
    prefix?: string;
    region?: string;
    url?: string;
    recreate: boolean;
    chunkSize?: number;
}

export const parseArgs = async (argv: string[]): Promise<CliArgs> => {
    const args = await yargs(argv)
        .scriptName('indexsync-sync')
        .option('source', { alias: 's', choices: SOURCE_TYPES, demandOption: true, description: 'Kind of source to read' })
        .option('index', { alias: 'i', type: 'string', demandOption: true, description: 'Target index' })
        .option('path', { type: 'string', description: 'Directory to sync (filesystem)' })
        .option('bucket', { type: 'string', description: 'Bucket to sync (s3)' })
        .option('prefix', { type: 'string', description: 'Key prefix (s3)' })
        .option('region', { type: 'string', description: 'Bucket region (s3)' })
        .option('url', { type: 'string', description: 'First page of the items API (http)' })
        .option('recreate', { type: 'boolean', default: false, description: 'Drop and recreate the index first' })
        .option('chunk-size', { type: 'number', description: 'Operations per bulk request' })
        .strict()
        .help()
        .parse();

    return {
        source: args.source,
        index: args.index,
        path: args.path,
        bucket: args.bucket,
        prefix: args.prefix,
        region: args.region,
        url: args.url,
        recreate: args.recreate,
        chunkSize: args.chunkSize
    };
};

export const sourceFromArgs = (args: CliArgs): SourceSpec => {
    switch (args.source) {
        case 'filesystem':
            return parseSourceSpec('filesystem', { path: args.path });
        case 's3':
            return parseSourceSpec('s3', { bucket: args.bucket, region: args.region, prefix: args.prefix });
        case 'http':
            return parseSourceSpec('http', { url: args.url });
    }
};

/**
 * Applies `--chunk-size` over the configured settings. Throws
 * ConfigValidationError for a value that is not a positive integer.
 */
export const syncSettingsFrom = (base: SyncSettings, args: CliArgs): SyncSettings =>
    parseSyncSettings(args.chunkSize === undefined ? base : { ...base, chunkSize: args.chunkSize });

export const formatSummary = (index: string, result: SyncResult): string[] => {
    const counts = Object.entries(result.bulkOperationCounts)
        .map(([type, count]) => `${type}=${count}`)
        .join(' ') || 'none';

    return [
        chalk.green(`Sync of ${index} complete`),
        `  created:     ${result.documentsCreated}`,
        `  updated:     ${result.documentsUpdated}`,
        `  skipped:     ${result.documentsSkipped}`,
        `  deleted:     ${result.documentsDeleted}`,
        `  attachments: ${result.attachmentsExtracted}`,
        chalk.gray(`  bulk operations: ${counts} (${result.bulkTimeMs} ms)`)
    ];
};

export const main = async (argv: string[]): Promise<number> => {
    const args = await parseArgs(argv);
    const config = loadEnvConfig();
    const settings = syncSettingsFrom(config.sync, args);
    const esClient = createEsClient(config.elasticsearch);

    console.log(chalk.blue(`Syncing ${args.source} source into ${args.index}...`));

    try {
        const source = sourceFromArgs(args);
        const connectors = createConnectors();

        if (!(await testSource(connectors, source))) {
            console.error(chalk.red(`Cannot reach ${args.source} source`));
            return 1;
        }

        const result = await runSync(new EsIndexClient(esClient), connectors, settings, {
            index: args.index,
            source,
            recreate: args.recreate
        });
        formatSummary(args.index, result).forEach(line => console.log(line));
        return 0;
    } catch (err) {
        console.error(chalk.red(`Sync failed: ${err instanceof Error ? err.message : String(err)}`));
        return 1;
    } finally {
        await esClient.close();
    }
};

if (require.main === module) {
    main(hideBin(process.argv)).then(
        code => {
            process.exitCode = code;
        },
        (err: unknown) => {
            console.error(chalk.red(err instanceof Error ? err.message : String(err)));
            process.exitCode = 1;
        }
    );
}
