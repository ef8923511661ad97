import axios from 'axios';
import Ajv from 'ajv';
import CircuitBreaker from 'opossum';
import { MalformedDocumentError } from '@indexsync/search-index';
import { componentLogger } from '@indexsync/service-template';
import { deriveId } from '../sync/fetcher';
import { SourceDocument, SourceItem } from '../sync/types';
import { Connector } from './base';
import { extractAttachment } from './extractors/attachment';

export interface HttpConfig {
    url: string;
    headers?: Record<string, string>;
    timeoutMs?: number;
}

interface HttpItem extends SourceDocument {
    readonly attachment_url?: string;
}

interface HttpPage {
    items: HttpItem[];
    next?: string | null;
}

interface FetchedAttachment {
    content: Buffer;
    contentType: string;
}

const DEFAULT_TIMEOUT_MS = 10000;

const log = componentLogger('connector:http');

const ajv = new Ajv({ allErrors: true, allowUnionTypes: true });

const validatePage = ajv.compile<HttpPage>({
    type: 'object',
    properties: {
        items: {
            type: 'array',
            items: {
                type: 'object',
                properties: {
                    _id: { type: ['string', 'number'] },
                    id: { type: ['string', 'number'] },
                    timestamp: { type: 'string' },
                    attachment_url: { type: 'string' }
                }
            }
        },
        next: { type: ['string', 'null'] }
    },
    required: ['items']
});

const fetchAttachment = async (url: string, timeoutMs: number): Promise<FetchedAttachment> => {
    const response = await axios.get<ArrayBuffer>(url, { responseType: 'arraybuffer', timeout: timeoutMs });
    const contentType = response.headers['content-type'];
    return {
        content: Buffer.from(response.data),
        contentType: typeof contentType === 'string' ? contentType : 'application/octet-stream'
    };
};

type AttachmentBreaker = CircuitBreaker<[string, number], FetchedAttachment>;

/**
 * Pages through a JSON API answering `{ items, next }`. Items that carry an
 * `attachment_url` get a download fetching it through a circuit breaker.
 *
 * Each attachment origin has its own breaker. Breakers never time a call out
 * themselves; the source's `timeoutMs` on the request does.
 */
export class HttpConnector implements Connector<HttpConfig> {
    private readonly breakers = new Map<string, AttachmentBreaker>();

    constructor(private readonly breakerOptions: CircuitBreaker.Options = {}) { }

    async testConnection(config: HttpConfig): Promise<boolean> {
        try {
            await axios.get(config.url, { headers: config.headers, timeout: config.timeoutMs ?? DEFAULT_TIMEOUT_MS });
            return true;
        } catch (err) {
            log.warn(`Cannot reach ${config.url}`, { error: err });
            return false;
        }
    }

    async *fetch(config: HttpConfig): AsyncIterable<SourceItem> {
        const timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
        let pageUrl: string | undefined = config.url;

        while (pageUrl !== undefined) {
            const response = await axios.get<unknown>(pageUrl, { headers: config.headers, timeout: timeoutMs });
            const page: unknown = response.data;

            if (!validatePage(page)) {
                throw new MalformedDocumentError(`Unexpected page from ${pageUrl}: ${ajv.errorsText(validatePage.errors)}`);
            }

            for (const item of page.items) {
                yield this.toSourceItem(item, pageUrl, timeoutMs);
            }

            pageUrl = page.next ? new URL(page.next, pageUrl).toString() : undefined;
        }
    }

    shutdown(): void {
        for (const breaker of this.breakers.values()) breaker.shutdown();
        this.breakers.clear();
    }

    private breakerFor(url: string): AttachmentBreaker {
        const origin = new URL(url).origin;
        const existing = this.breakers.get(origin);
        if (existing) return existing;

        const breaker: AttachmentBreaker = new CircuitBreaker(fetchAttachment, {
            errorThresholdPercentage: 50,
            resetTimeout: 5000,
            ...this.breakerOptions,
            timeout: false
        });
        breaker.on('open', () => log.warn(`Attachment downloads circuit opened for ${origin}`));
        breaker.on('close', () => log.info(`Attachment downloads circuit closed for ${origin}`));

        this.breakers.set(origin, breaker);
        return breaker;
    }

    private toSourceItem(item: HttpItem, pageUrl: string, timeoutMs: number): SourceItem {
        const { attachment_url: attachmentUrl, ...document } = item;
        if (attachmentUrl === undefined) {
            return { document };
        }

        const url = new URL(attachmentUrl, pageUrl).toString();
        return {
            document,
            download: async ({ commit, timestamp }) => {
                if (!commit) return undefined;
                const { content, contentType } = await this.breakerFor(url).fire(url, timeoutMs);
                return extractAttachment(deriveId(document), content, contentType, timestamp);
            }
        };
    }
}
