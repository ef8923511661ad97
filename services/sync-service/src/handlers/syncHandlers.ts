import { Request, Response } from 'express';
import { ConfigValidationError, DocumentBody, ErrorCode, IndexSyncError, StoredDocument } from '@indexsync/search-index';
import { logger } from '@indexsync/service-template';
import { parseNewSource } from '../config';
import { SourceRegistry } from '../registry/sourceRegistry';
import { SyncWorkerContext, triggerSyncJob } from '../worker/syncWorker';

export interface DocumentReader {
    fetchById(id: string): Promise<StoredDocument<DocumentBody>>;
}

export interface SyncHandlerContext extends SyncWorkerContext {
    sources: SourceRegistry;
    documents: (index: string) => DocumentReader;
}

const STATUS_BY_CODE: Record<ErrorCode, number> = {
    DOCUMENT_NOT_FOUND: 404,
    SOURCE_NOT_FOUND: 404,
    JOB_NOT_FOUND: 404,
    JOB_CONFLICT: 409,
    CONFIG_INVALID: 400,
    MALFORMED_DOCUMENT: 422
};

const sendError = (res: Response, err: unknown) => {
    if (err instanceof ConfigValidationError) {
        return res.status(STATUS_BY_CODE[err.code]).json({ error: err.message, code: err.code, details: err.details });
    }
    if (err instanceof IndexSyncError) {
        return res.status(STATUS_BY_CODE[err.code]).json({ error: err.message, code: err.code });
    }

    logger.error('Request failed unexpectedly', { error: err });
    return res.status(500).json({ error: err instanceof Error ? err.message : 'Internal error' });
};

export const createSyncHandlers = (context: SyncHandlerContext) => ({

    createSource: async (req: Request, res: Response) => {
        try {
            const source = context.sources.register(parseNewSource(req.body));
            logger.info(`Registered source ${source.id}`, { type: source.type, index: source.index });
            res.status(201).json(source);
        } catch (err) {
            sendError(res, err);
        }
    },

    listSources: async (req: Request, res: Response) => {
        res.json(context.sources.list());
    },

    triggerSync: async (req: Request, res: Response) => {
        try {
            const source = context.sources.get(req.params.sourceId);
            const { job } = triggerSyncJob(context, source);
            res.status(202).json({ status: 'started', jobId: job.jobId });
        } catch (err) {
            sendError(res, err);
        }
    },

    listJobs: async (req: Request, res: Response) => {
        const sourceId = typeof req.query.sourceId === 'string' ? req.query.sourceId : undefined;
        const jobs = context.jobs.list();
        res.json(sourceId === undefined ? jobs : jobs.filter(job => job.sourceId === sourceId));
    },

    getJob: async (req: Request, res: Response) => {
        try {
            res.json(context.jobs.get(req.params.jobId));
        } catch (err) {
            sendError(res, err);
        }
    },

    getDocument: async (req: Request, res: Response) => {
        try {
            const document = await context.documents(req.params.index).fetchById(req.params.id);
            res.json(document);
        } catch (err) {
            sendError(res, err);
        }
    }
});

export type SyncHandlers = ReturnType<typeof createSyncHandlers>;
