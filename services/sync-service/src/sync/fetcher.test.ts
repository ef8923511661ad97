import { MalformedDocumentError } from '@indexsync/search-index';
import { drain, fromItems, operationsOf, recordingDownload } from '../tests/_utils/sourceItems';
import { buildBody, deriveId, Fetcher } from './fetcher';
import { BoundedQueue } from './queue';
import { ChannelMessage, Snapshot, SourceItem } from './types';

const CLOCK = '2024-05-01T00:00:00.000Z';

const snapshotOf = (stamps: Record<string, string | undefined>): Snapshot => ({
    ids: new Set(Object.keys(stamps)),
    timestamps: new Map(
        Object.entries(stamps).flatMap(([id, ts]): [string, string][] => (ts === undefined ? [] : [[id, ts]]))
    )
});

describe('Fetcher', () => {
    let channel: BoundedQueue<ChannelMessage>;

    const runFetcher = async (snapshot: Snapshot, items: SourceItem[]) => {
        const fetcher = new Fetcher(channel, 'docs', snapshot, { clock: () => CLOCK });
        const stats = await fetcher.run(fromItems(items));
        return { stats, messages: await drain(channel) };
    };

    beforeEach(() => {
        channel = new BoundedQueue<ChannelMessage>(100);
    });

    it('skips an unchanged document and creates a new one', async () => {
        const { stats, messages } = await runFetcher(snapshotOf({ A: 'T1' }), [
            { document: { _id: 'A', timestamp: 'T1' } },
            { document: { _id: 'B', timestamp: 'T2', title: 'Bee' } }
        ]);

        expect(operationsOf(messages)).toEqual([
            { type: 'create', index: 'docs', id: 'B', body: { id: 'B', timestamp: 'T2', title: 'Bee' } }
        ]);
        expect(stats).toEqual({ created: 1, updated: 0, skipped: 1, deleted: 0, attachmentsExtracted: 0 });
    });

    it('updates a changed document and deletes one that was not seen again', async () => {
        const { stats, messages } = await runFetcher(snapshotOf({ A: 'T1', B: 'T2' }), [
            { document: { _id: 'A', timestamp: 'T1-changed' } }
        ]);

        expect(operationsOf(messages)).toEqual([
            { type: 'update', index: 'docs', id: 'A', body: { id: 'A', timestamp: 'T1-changed' } },
            { type: 'delete', index: 'docs', id: 'B' }
        ]);
        expect(stats).toMatchObject({ updated: 1, deleted: 1, created: 0 });
    });

    it('always writes a document without timestamp and stamps it with the clock', async () => {
        const { messages } = await runFetcher(snapshotOf({ A: undefined }), [
            { document: { id: 'A', title: 'no stamp' } }
        ]);

        expect(operationsOf(messages)).toEqual([
            { type: 'update', index: 'docs', id: 'A', body: { id: 'A', title: 'no stamp', timestamp: CLOCK } }
        ]);
    });

    it('sends deletes only after the last source document', async () => {
        const { messages } = await runFetcher(snapshotOf({ X: 'T', Y: 'T', A: 'old' }), [
            { document: { _id: 'A', timestamp: 'new' } },
            { document: { _id: 'B', timestamp: 'new' } }
        ]);

        expect(operationsOf(messages).map(op => `${op.type}:${op.id}`)).toEqual([
            'update:A', 'create:B', 'delete:X', 'delete:Y'
        ]);
    });

    it('releases the download of a skipped document without committing it', async () => {
        const skipped = recordingDownload({ id: 'A', text: 'never fetched' });
        const written = recordingDownload({ id: 'B', text: 'fetched' });

        const { stats, messages } = await runFetcher(snapshotOf({ A: 'T1' }), [
            { document: { _id: 'A', timestamp: 'T1' }, download: skipped.download },
            { document: { _id: 'B', timestamp: 'T2' }, download: written.download }
        ]);

        expect(skipped.calls).toEqual([{ commit: false }]);
        expect(written.calls).toEqual([{ commit: true, timestamp: 'T2' }]);
        expect(stats.attachmentsExtracted).toBe(1);
        expect(operationsOf(messages)).toContainEqual(
            { type: 'update', index: 'docs', id: 'B', body: { id: 'B', text: 'fetched' } }
        );
    });

    it('passes the assigned timestamp to the download', async () => {
        const attachment = recordingDownload(undefined);

        await runFetcher(snapshotOf({}), [{ document: { _id: 'A' }, download: attachment.download }]);

        expect(attachment.calls).toEqual([{ commit: true, timestamp: CLOCK }]);
    });

    it('closes both streams', async () => {
        const { messages } = await runFetcher(snapshotOf({}), []);

        expect(messages).toHaveLength(2);
        expect(messages).toContainEqual({ kind: 'end', stream: 'documents' });
        expect(messages).toContainEqual({ kind: 'end', stream: 'downloads' });
    });

    it('classifies a repeated id only once', async () => {
        const { stats, messages } = await runFetcher(snapshotOf({}), [
            { document: { _id: 'A', timestamp: 'T1' } },
            { document: { _id: 'A', timestamp: 'T2' } }
        ]);

        expect(operationsOf(messages)).toHaveLength(1);
        expect(stats.created).toBe(1);
    });

    it('fails on a document without id', async () => {
        const fetcher = new Fetcher(channel, 'docs', snapshotOf({}));

        await expect(fetcher.run(fromItems([{ document: { title: 'anonymous' } }])))
            .rejects.toBeInstanceOf(MalformedDocumentError);
    });

    it('does not modify the source document', async () => {
        const document = { _id: 'A', tags: ['x'] };

        await runFetcher(snapshotOf({}), [{ document }]);

        expect(document).toEqual({ _id: 'A', tags: ['x'] });
    });
});

describe('deriveId', () => {
    it('prefers _id, then id, and accepts numbers', () => {
        expect(deriveId({ _id: 'primary', id: 'secondary' })).toBe('primary');
        expect(deriveId({ id: 'secondary' })).toBe('secondary');
        expect(deriveId({ _id: 42 })).toBe('42');
        expect(deriveId({ _id: '', id: 'fallback' })).toBe('fallback');
    });

    it('names the fields it found when no id is usable', () => {
        expect(() => deriveId({ title: 't', body: 'b' }))
            .toThrow('Source document has no usable _id or id (fields: title, body)');
    });
});

describe('buildBody', () => {
    it('drops _id and sets id and timestamp', () => {
        expect(buildBody({ _id: 'A', title: 'T', timestamp: 'old' }, 'A', 'new'))
            .toEqual({ title: 'T', timestamp: 'new', id: 'A' });
    });
});
