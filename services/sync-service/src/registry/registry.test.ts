import { JobConflictError, JobNotFoundError, SourceNotFoundError } from '@indexsync/search-index';
import { JobRegistry } from './jobRegistry';
import { SourceRegistry } from './sourceRegistry';

describe('SourceRegistry', () => {
    test('registers and lists sources', () => {
        const registry = new SourceRegistry();
        const source = registry.register({ name: 'docs', index: 'docs', type: 'filesystem', config: { path: '/srv/docs' } });

        expect(source.id).toMatch(/^[0-9a-f-]{36}$/);
        expect(registry.get(source.id)).toEqual(source);
        expect(registry.list()).toEqual([source]);
    });

    test('unknown ids are not found', () => {
        expect(() => new SourceRegistry().get('nope')).toThrow(SourceNotFoundError);
    });
});

describe('JobRegistry', () => {
    const at = new Date('2024-06-01T10:00:00.000Z');
    let registry: JobRegistry;

    beforeEach(() => {
        registry = new JobRegistry(() => at);
    });

    test('walks a job through its lifecycle', () => {
        const job = registry.create('source-1', 'docs');
        expect(job).toMatchObject({ sourceId: 'source-1', index: 'docs', status: 'pending', createdAt: at.toISOString() });

        registry.markRunning(job.jobId);
        const result = {
            bulkOperationCounts: { create: 1 },
            documentsCreated: 1,
            documentsUpdated: 0,
            documentsSkipped: 0,
            documentsDeleted: 0,
            attachmentsExtracted: 0,
            bulkTimeMs: 3
        };
        registry.complete(job.jobId, result);

        expect(registry.get(job.jobId)).toEqual({
            ...job,
            status: 'completed',
            startedAt: at.toISOString(),
            endedAt: at.toISOString(),
            result
        });
    });

    test('refuses a second active job for the same source', () => {
        const first = registry.create('source-1', 'docs');

        expect(() => registry.create('source-1', 'docs')).toThrow(JobConflictError);
        expect(registry.create('source-2', 'other').status).toBe('pending');

        registry.fail(first.jobId, 'boom');
        expect(registry.create('source-1', 'docs').status).toBe('pending');
        expect(registry.get(first.jobId)).toMatchObject({ status: 'failed', error: 'boom' });
    });

    test('returned records are copies', () => {
        const job = registry.create('source-1', 'docs');
        job.status = 'completed';

        expect(registry.get(job.jobId).status).toBe('pending');
    });

    test('unknown jobs are not found', () => {
        expect(() => registry.get('nope')).toThrow(JobNotFoundError);
        expect(() => registry.markRunning('nope')).toThrow(JobNotFoundError);
    });
});
