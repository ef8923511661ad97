import { Router } from 'express';
import { SyncHandlers } from './handlers/syncHandlers';

export const createRouter = (handlers: SyncHandlers): Router => {
    const router = Router();

    // Sources
    router.post('/sources', handlers.createSource);
    router.get('/sources', handlers.listSources);

    // Sync
    router.post('/sync/:sourceId', handlers.triggerSync);

    // Jobs
    router.get('/jobs', handlers.listJobs);
    router.get('/jobs/:jobId', handlers.getJob);

    // Documents
    router.get('/indices/:index/documents/:id', handlers.getDocument);

    return router;
};
