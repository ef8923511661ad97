import { Client, errors, estypes } from '@elastic/elasticsearch';
import { componentLogger } from '@indexsync/service-template';
import { SYNC_DEFAULTS } from '@indexsync/constants';
import { DocumentNotFoundError } from './errors';
import { DocumentBody } from './types';

export interface StoredDocument<T> {
    id: string;
    source: T;
    seqNo?: number;
    primaryTerm?: number;
}

export interface GetAllDocsOptions {
    query?: estypes.QueryDslQueryContainer;
    sort?: estypes.Sort;
    pageSize?: number;
}

export interface UpdateOptions {
    ifSeqNo?: number;
    ifPrimaryTerm?: number;
}

const log = componentLogger('es-index');

const statusOf = (err: unknown): number | undefined =>
    err instanceof errors.ResponseError ? err.statusCode : undefined;

const totalOf = (total: estypes.SearchTotalHits | number | undefined): number => {
    if (typeof total === 'number') return total;
    return total?.value ?? 0;
};

/**
 * Point reads and writes against a single index.
 *
 * Reads refresh the index first so that documents written by a bulk request
 * moments ago are visible. Serverless projects reject explicit refreshes,
 * so pass `refreshBeforeRead: false` there.
 */
export class EsIndex<TDocument extends DocumentBody = DocumentBody> {

    constructor(
        private readonly client: Client,
        readonly indexName: string,
        private readonly refreshBeforeRead = true
    ) { }

    async fetchById(id: string): Promise<StoredDocument<TDocument>> {
        await this.refresh();

        try {
            const response = await this.client.get<TDocument>({ index: this.indexName, id });
            if (!response.found || response._source === undefined) {
                throw new DocumentNotFoundError(this.indexName, id);
            }
            return {
                id: response._id,
                source: response._source,
                seqNo: response._seq_no,
                primaryTerm: response._primary_term
            };
        } catch (err) {
            if (statusOf(err) === 404) {
                throw new DocumentNotFoundError(this.indexName, id, { cause: err });
            }
            if (!(err instanceof DocumentNotFoundError)) {
                log.error(`The server failed to return ${this.indexName}/${id}`, { status: statusOf(err), error: err });
            }
            throw err;
        }
    }

    async indexDocument(doc: TDocument): Promise<string> {
        const response = await this.client.index({ index: this.indexName, document: doc });
        return response._id;
    }

    async update(id: string, doc: Partial<TDocument>, options: UpdateOptions = {}): Promise<string> {
        const response = await this.client.update({
            index: this.indexName,
            id,
            doc,
            if_seq_no: options.ifSeqNo,
            if_primary_term: options.ifPrimaryTerm
        });
        return response.result;
    }

    /** Applies a painless script to the stored document. */
    async updateByScript(id: string, script: estypes.Script): Promise<string> {
        const response = await this.client.update({ index: this.indexName, id, script });
        return response.result;
    }

    async clean(): Promise<number> {
        const response = await this.client.deleteByQuery({
            index: this.indexName,
            query: { match_all: {} },
            ignore_unavailable: true,
            conflicts: 'proceed'
        });
        return response.deleted ?? 0;
    }

    async *getAllDocs(options: GetAllDocsOptions = {}): AsyncIterable<StoredDocument<TDocument>> {
        await this.refresh();

        const query = options.query ?? { match_all: {} };
        const pageSize = options.pageSize ?? SYNC_DEFAULTS.PAGE_SIZE;
        let offset = 0;

        for (; ;) {
            const response = await this.client.search<TDocument>({
                index: this.indexName,
                query,
                sort: options.sort,
                from: offset,
                size: pageSize,
                expand_wildcards: 'hidden',
                seq_no_primary_term: true
            });

            const hits = response.hits.hits;
            for (const hit of hits) {
                if (hit._id === undefined || hit._source === undefined) continue;
                yield {
                    id: hit._id,
                    source: hit._source,
                    seqNo: hit._seq_no,
                    primaryTerm: hit._primary_term
                };
            }

            offset += hits.length;
            if (hits.length === 0 || offset >= totalOf(response.hits.total)) break;
        }
    }

    private async refresh(): Promise<void> {
        if (!this.refreshBeforeRead) return;
        await this.client.indices.refresh({ index: this.indexName });
    }
}
