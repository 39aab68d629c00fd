import fs from 'fs';
import os from 'os';
import path from 'path';
import nock from 'nock';
import { LocalArtifactStore } from '../../../src/infrastructure/storage/LocalArtifactStore';

describe('LocalArtifactStore', () => {
    let dir: string;
    let store: LocalArtifactStore;

    beforeAll(() => {
        nock.disableNetConnect();
    });

    afterAll(() => {
        nock.enableNetConnect();
    });

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'artifacts-'));
        store = new LocalArtifactStore(path.join(dir, 'videos'));
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    afterEach(() => {
        nock.cleanAll();
        fs.rmSync(dir, { recursive: true, force: true });
        jest.restoreAllMocks();
    });

    it('should download a remote video into the output directory', async () => {
        nock('https://cdn.test').get('/task-1.mp4').reply(200, 'video-bytes');

        const localPath = await store.save({ jobId: 'task-1', uri: 'https://cdn.test/task-1.mp4' });

        expect(localPath).toBe(path.join(dir, 'videos', 'task-1.mp4'));
        expect(fs.readFileSync(localPath, 'utf-8')).toBe('video-bytes');
    });

    it('should decode data URIs', async () => {
        const uri = `data:video/mp4;base64,${Buffer.from('inline').toString('base64')}`;

        const localPath = await store.save({ jobId: 'task-2', uri });

        expect(fs.readFileSync(localPath, 'utf-8')).toBe('inline');
    });

    it('should reuse an existing copy without downloading again', async () => {
        const target = store.pathFor('task-3');
        fs.mkdirSync(path.dirname(target), { recursive: true });
        fs.writeFileSync(target, 'cached');

        const localPath = await store.save({ jobId: 'task-3', uri: 'https://cdn.test/never-fetched.mp4' });

        expect(localPath).toBe(target);
        expect(fs.readFileSync(localPath, 'utf-8')).toBe('cached');
    });

    it('should leave no partial file when the download fails', async () => {
        nock('https://cdn.test').get('/gone.mp4').reply(404);

        await expect(store.save({ jobId: 'task-4', uri: 'https://cdn.test/gone.mp4' })).rejects.toThrow(
            'Failed to store video for job task-4: Request failed with status code 404'
        );
        expect(fs.readdirSync(path.join(dir, 'videos'))).toEqual([]);
    });

    it('should reject references it cannot read', async () => {
        await expect(store.save({ jobId: 'task-5', uri: 'ftp://cdn.test/v.mp4' })).rejects.toThrow(
            'Failed to store video for job task-5: Unsupported artifact reference: ftp://cdn.test/v.mp4'
        );
    });

    it('should not copy local files named by the service', async () => {
        const secret = path.join(dir, 'secret.txt');
        fs.writeFileSync(secret, 'private');

        await expect(store.save({ jobId: 'task-6', uri: secret })).rejects.toThrow(
            `Failed to store video for job task-6: Unsupported artifact reference: ${secret}`
        );
        expect(fs.readdirSync(path.join(dir, 'videos'))).toEqual([]);
    });

    it('should keep safe IDs as file names', () => {
        expect(store.pathFor('task-1')).toBe(path.join(dir, 'videos', 'task-1.mp4'));
    });

    it('should make remote IDs safe as file names without collisions', () => {
        const colon = path.basename(store.pathFor('owner/model:abc'));
        const slash = path.basename(store.pathFor('owner/model/abc'));

        expect(colon).toMatch(/^owner_model_abc\.[0-9a-f]{8}\.mp4$/);
        expect(slash).toMatch(/^owner_model_abc\.[0-9a-f]{8}\.mp4$/);
        expect(colon).not.toBe(slash);
        expect(path.basename(store.pathFor('owner_model_abc'))).toBe('owner_model_abc.mp4');
    });

    it('should build public URLs under the videos prefix', () => {
        expect(store.publicUrlFor(path.join(dir, 'videos', 'task-1.mp4'))).toBe('/videos/task-1.mp4');
        expect(new LocalArtifactStore(dir, '/media/').publicUrlFor('/x/a b.mp4')).toBe('/media/a%20b.mp4');
    });
});
