import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { SourceItem } from '../sync/types';
import { documentIdFor } from './base';
import { FilesystemConnector } from './filesystem';

const collect = async (items: AsyncIterable<SourceItem>): Promise<SourceItem[]> => {
    const out: SourceItem[] = [];
    for await (const item of items) out.push(item);
    return out;
};

describe('FilesystemConnector', () => {
    const connector = new FilesystemConnector();
    let root: string;

    beforeEach(async () => {
        root = await fs.mkdtemp(path.join(os.tmpdir(), 'indexsync-fs-'));
        await fs.mkdir(path.join(root, 'nested'));
        await fs.mkdir(path.join(root, 'node_modules'));
        await fs.writeFile(path.join(root, 'b.txt'), 'bravo');
        await fs.writeFile(path.join(root, 'nested', 'a.bin'), Buffer.from([1, 2, 3]));
        await fs.writeFile(path.join(root, '.hidden'), 'skip me');
        await fs.writeFile(path.join(root, 'node_modules', 'dep.js'), 'skip me');
        await fs.utimes(path.join(root, 'b.txt'), new Date('2024-01-02T03:04:05.000Z'), new Date('2024-01-02T03:04:05.000Z'));
    });

    afterEach(async () => {
        await fs.rm(root, { recursive: true, force: true });
    });

    test('yields one document per visible file, in name order', async () => {
        const items = await collect(connector.fetch({ path: root }));

        expect(items.map(item => item.document.path)).toEqual(['b.txt', path.join('nested', 'a.bin')]);
    });

    test('stamps documents with the file mtime and a uri-derived id', async () => {
        const [item] = await collect(connector.fetch({ path: root }));
        const filePath = path.join(root, 'b.txt');

        expect(item.document).toEqual({
            _id: documentIdFor(`file://${filePath}`),
            title: 'b.txt',
            path: 'b.txt',
            uri: `file://${filePath}`,
            size: 5,
            content_type: 'text/plain',
            timestamp: '2024-01-02T03:04:05.000Z'
        });
    });

    test('downloads read and extract the file', async () => {
        const [text, binary] = await collect(connector.fetch({ path: root }));

        await expect(text.download?.({ commit: true, timestamp: 'T1' })).resolves.toEqual({
            id: text.document._id,
            content_type: 'text/plain',
            size: 5,
            timestamp: 'T1',
            text: 'bravo'
        });
        await expect(binary.download?.({ commit: true })).resolves.toEqual({
            id: binary.document._id,
            content_type: 'application/octet-stream',
            size: 3,
            _attachment: 'AQID'
        });
    });

    test('an uncommitted download reads nothing', async () => {
        const [item] = await collect(connector.fetch({ path: root }));
        await fs.rm(path.join(root, 'b.txt'));

        await expect(item.download?.({ commit: false })).resolves.toBeUndefined();
    });

    test('a missing root fails the fetch', async () => {
        await expect(collect(connector.fetch({ path: path.join(root, 'missing') }))).rejects.toThrow(/ENOENT/);
    });

    test('testConnection reports whether the root is reachable', async () => {
        await expect(connector.testConnection({ path: root })).resolves.toBe(true);
        await expect(connector.testConnection({ path: path.join(root, 'missing') })).resolves.toBe(false);
    });
});
