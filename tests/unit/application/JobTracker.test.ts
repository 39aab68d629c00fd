import fs from 'fs';
import os from 'os';
import path from 'path';
import { JobTracker, reviveJob } from '../../../src/application/JobTracker';
import { StyleResolver } from '../../../src/application/StyleResolver';
import { RemoteStatusUpdate } from '../../../src/domain/entities/GenerationJob';
import { createStyleTemplate } from '../../../src/domain/entities/StyleTemplate';
import {
    GenerationFailedError,
    JobNotFoundError,
    NotReadyError,
    ServiceUnavailableError,
    UnknownStyleError,
    ValidationError,
} from '../../../src/domain/errors';
import { IVideoGenerationClient, VideoGenerationRequest } from '../../../src/domain/ports/IVideoGenerationClient';
import { IShotWriter, ShotWritingRequest } from '../../../src/domain/ports/IShotWriter';
import { Shot } from '../../../src/domain/entities/Shot';

class FakeClient implements IVideoGenerationClient {
    submit = jest.fn<Promise<string>, [VideoGenerationRequest]>();
    getStatus = jest.fn<Promise<RemoteStatusUpdate>, [string]>();
}

describe('JobTracker', () => {
    const styles = new StyleResolver([
        createStyleTemplate('cinematic', 'Cinematic', ['cinematic lighting', 'film look']),
    ]);
    const params = { fps: 24, dimension: '1280x720', category: 'nature' };
    const images = ['nature/lake.jpg', 'nature/forest.jpg', 'nature/peak.jpg'];

    let client: FakeClient;
    let tracker: JobTracker;
    let clock: number;

    const now = (): Date => new Date(clock);

    beforeEach(() => {
        clock = Date.parse('2026-03-01T12:00:00Z');
        client = new FakeClient();
        client.submit.mockResolvedValue('task-1');
        tracker = new JobTracker({ client, styleResolver: styles, now });
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        jest.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    describe('submit', () => {
        it('should forward shots and style fragments and record a submitted job', async () => {
            const jobId = await tracker.submit(images, 'cinematic', params);

            expect(jobId).toBe('task-1');
            expect(client.submit).toHaveBeenCalledTimes(1);
            const request = client.submit.mock.calls[0][0];
            expect(request.images).toEqual(images);
            expect(request.style).toBe('cinematic');
            expect(request.fragments).toEqual(['cinematic lighting', 'film look']);
            expect(request.shots).toHaveLength(3);
            expect(request.shots[0].text).toBe(
                'Slow aerial rise revealing the nature scene, opening shot, cinematic lighting, film look'
            );

            const job = tracker.getJob('task-1');
            expect(job?.status).toBe('submitted');
            expect(job?.images).toEqual(images);
            expect(job?.createdAt).toEqual(new Date('2026-03-01T12:00:00Z'));
        });

        it('should reject an empty selection without contacting the service', async () => {
            await expect(tracker.submit([], 'cinematic', params)).rejects.toThrow(ValidationError);

            expect(client.submit).not.toHaveBeenCalled();
            expect(tracker.listJobs()).toEqual([]);
        });

        it('should reject more than eight images', async () => {
            const nine = Array.from({ length: 9 }, (_, i) => `nature/${i}.jpg`);

            await expect(tracker.submit(nine, 'cinematic', params)).rejects.toThrow(
                'Between 1 and 8 images are required, got 9'
            );
            expect(client.submit).not.toHaveBeenCalled();
        });

        it('should reject an unknown style', async () => {
            await expect(tracker.submit(images, 'psychedelic', params)).rejects.toThrow(UnknownStyleError);

            expect(client.submit).not.toHaveBeenCalled();
        });

        it('should wrap transport failures and record nothing', async () => {
            client.submit.mockRejectedValueOnce(new Error('socket hang up'));

            const result = tracker.submit(images, 'cinematic', params);

            await expect(result).rejects.toThrow(ServiceUnavailableError);
            await expect(result).rejects.toThrow('Failed to submit generation job: socket hang up');
            expect(tracker.listJobs()).toEqual([]);
        });

        it('should pass service errors through unchanged', async () => {
            const refused = new ServiceUnavailableError('Video API refused to create task: quota exceeded');
            client.submit.mockRejectedValueOnce(refused);

            await expect(tracker.submit(images, 'cinematic', params)).rejects.toBe(refused);
        });

        it('should send shots written from the images when a writer is configured', async () => {
            const written: Shot[] = images.map((image, imageIndex) => ({ imageIndex, image, text: `Shot ${imageIndex}` }));
            const shotWriter: IShotWriter = {
                writeShots: jest.fn<Promise<Shot[]>, [ShotWritingRequest]>().mockResolvedValue(written),
            };
            const withWriter = new JobTracker({ client, styleResolver: styles, shotWriter, now });

            await withWriter.submit(images, 'cinematic', params);

            expect(shotWriter.writeShots).toHaveBeenCalledWith({
                images,
                style: styles.resolve('cinematic'),
                category: 'nature',
            });
            expect(client.submit.mock.calls[0][0].shots).toEqual(written);
            expect(withWriter.getJob('task-1')?.shots).toEqual(written);
        });

        it('should fall back to template shots when the writer fails', async () => {
            const shotWriter: IShotWriter = {
                writeShots: jest.fn<Promise<Shot[]>, [ShotWritingRequest]>()
                    .mockRejectedValue(new Error('Failed to parse shot descriptions: nope')),
            };
            const withWriter = new JobTracker({ client, styleResolver: styles, shotWriter, now });

            await withWriter.submit(images, 'cinematic', params);

            expect(client.submit.mock.calls[0][0].shots[0].text).toBe(
                'Slow aerial rise revealing the nature scene, opening shot, cinematic lighting, film look'
            );
            expect(console.warn).toHaveBeenCalledWith(
                '[JobTracker] Shot writer failed, using template shots: Failed to parse shot descriptions: nope'
            );
        });

        it('should keep a finished job when the service reissues its ID', async () => {
            client.submit.mockResolvedValue('J1');
            client.getStatus.mockResolvedValueOnce({ status: 'succeeded', resultRef: 'https://cdn.test/J1.mp4' });
            await tracker.submit(images, 'cinematic', params);
            await tracker.poll('J1');

            const result = tracker.submit(['nature/peak.jpg'], 'cinematic', params);

            await expect(result).rejects.toThrow(ServiceUnavailableError);
            await expect(result).rejects.toThrow('Video service returned job ID J1, which is already tracked');
            const job = tracker.getJob('J1');
            expect(job?.status).toBe('succeeded');
            expect(job?.images).toEqual(images);
            expect(tracker.listJobs()).toHaveLength(1);
        });
    });

    it('should track a job from submission to a cached result', async () => {
        client.submit.mockResolvedValueOnce('J1');
        client.getStatus
            .mockResolvedValueOnce({ status: 'running' })
            .mockResolvedValueOnce({ status: 'succeeded', resultRef: 'videos/J1.mp4' });

        const jobId = await tracker.submit(images, 'cinematic', params);
        expect(jobId).toBe('J1');
        expect(await tracker.poll('J1')).toBe('running');
        expect(await tracker.poll('J1')).toBe('succeeded');
        expect(tracker.getResult('J1').uri).toBe('videos/J1.mp4');
        expect(await tracker.poll('J1')).toBe('succeeded');
        expect(client.getStatus).toHaveBeenCalledTimes(2);
    });

    describe('poll', () => {
        beforeEach(async () => {
            await tracker.submit(images, 'cinematic', params);
        });

        it('should move a job forward through pending and running to succeeded', async () => {
            client.getStatus
                .mockResolvedValueOnce({ status: 'pending' })
                .mockResolvedValueOnce({ status: 'running' })
                .mockResolvedValueOnce({ status: 'succeeded', resultRef: 'https://cdn.test/task-1.mp4' });

            expect(await tracker.poll('task-1')).toBe('pending');
            expect(await tracker.poll('task-1')).toBe('running');
            expect(await tracker.poll('task-1')).toBe('succeeded');

            expect(tracker.getResult('task-1')).toEqual({
                jobId: 'task-1',
                uri: 'https://cdn.test/task-1.mp4',
                localPath: undefined,
            });
        });

        it('should not contact the service once a job is terminal', async () => {
            client.getStatus.mockResolvedValueOnce({ status: 'failed', errorReason: 'Content policy violation' });
            await tracker.poll('task-1');

            expect(await tracker.poll('task-1')).toBe('failed');
            expect(await tracker.poll('task-1')).toBe('failed');
            expect(client.getStatus).toHaveBeenCalledTimes(1);
        });

        it('should ignore a stale status and refresh lastCheckedAt', async () => {
            client.getStatus
                .mockResolvedValueOnce({ status: 'running' })
                .mockResolvedValueOnce({ status: 'pending' });

            await tracker.poll('task-1');
            clock += 5000;
            const status = await tracker.poll('task-1');

            expect(status).toBe('running');
            expect(tracker.getJob('task-1')?.lastCheckedAt).toEqual(new Date('2026-03-01T12:00:05Z'));
        });

        it('should share one remote request between concurrent polls', async () => {
            let release: (update: RemoteStatusUpdate) => void = () => undefined;
            client.getStatus.mockReturnValueOnce(new Promise((resolve) => {
                release = resolve;
            }));

            const first = tracker.poll('task-1');
            const second = tracker.poll('task-1');
            release({ status: 'running' });

            await expect(Promise.all([first, second])).resolves.toEqual(['running', 'running']);
            expect(client.getStatus).toHaveBeenCalledTimes(1);
        });

        it('should keep the status and allow a retry after a transport failure', async () => {
            client.getStatus
                .mockRejectedValueOnce(new Error('ETIMEDOUT'))
                .mockResolvedValueOnce({ status: 'running' });

            await expect(tracker.poll('task-1')).rejects.toThrow(
                'Failed to check status of job task-1: ETIMEDOUT'
            );
            expect(tracker.getJob('task-1')?.status).toBe('submitted');

            expect(await tracker.poll('task-1')).toBe('running');
            expect(client.getStatus).toHaveBeenCalledTimes(2);
        });

        it('should fail for an unknown job', async () => {
            await expect(tracker.poll('nope')).rejects.toThrow(JobNotFoundError);
            expect(client.getStatus).not.toHaveBeenCalled();
        });
    });

    describe('getResult', () => {
        beforeEach(async () => {
            await tracker.submit(images, 'cinematic', params);
        });

        it('should report a job that is still running as not ready', async () => {
            client.getStatus.mockResolvedValueOnce({ status: 'running' });
            await tracker.poll('task-1');

            expect(() => tracker.getResult('task-1')).toThrow(NotReadyError);
            expect(() => tracker.getResult('task-1')).toThrow('Job task-1 is not ready (status: running)');
        });

        it('should report the failure reason of a failed job', async () => {
            client.getStatus.mockResolvedValueOnce({ status: 'failed', errorReason: 'Content policy violation' });
            await tracker.poll('task-1');

            expect(() => tracker.getResult('task-1')).toThrow(GenerationFailedError);
            expect(() => tracker.getResult('task-1')).toThrow('Job task-1 failed: Content policy violation');
        });

        it('should fail for an unknown job', () => {
            expect(() => tracker.getResult('nope')).toThrow('Job not found: nope');
        });
    });

    describe('attachLocalCopy', () => {
        beforeEach(async () => {
            await tracker.submit(images, 'cinematic', params);
        });

        it('should record the cached path of a succeeded job', async () => {
            client.getStatus.mockResolvedValueOnce({ status: 'succeeded', resultRef: 'https://cdn.test/v.mp4' });
            await tracker.poll('task-1');

            tracker.attachLocalCopy('task-1', '/tmp/videos/task-1.mp4');

            expect(tracker.getResult('task-1').localPath).toBe('/tmp/videos/task-1.mp4');
        });

        it('should refuse jobs that have not succeeded', () => {
            expect(() => tracker.attachLocalCopy('task-1', '/tmp/x.mp4')).toThrow(NotReadyError);
        });
    });

    describe('abandon', () => {
        beforeEach(async () => {
            await tracker.submit(images, 'cinematic', params);
        });

        it('should drop the job from the active set but keep it listed', () => {
            tracker.abandon('task-1');

            expect(tracker.activeJobs()).toEqual([]);
            expect(tracker.listJobs()).toHaveLength(1);
            expect(tracker.getJob('task-1')?.abandoned).toBe(true);
        });

        it('should be idempotent', () => {
            tracker.abandon('task-1');
            const again = tracker.abandon('task-1');

            expect(again.abandoned).toBe(true);
            expect(again.status).toBe('submitted');
        });

        it('should still allow an explicit poll', async () => {
            client.getStatus.mockResolvedValueOnce({ status: 'running' });
            tracker.abandon('task-1');

            expect(await tracker.poll('task-1')).toBe('running');
        });
    });

    describe('listing and removal', () => {
        it('should list jobs in submission order', async () => {
            client.submit.mockResolvedValueOnce('task-b').mockResolvedValueOnce('task-a');
            await tracker.submit(images, 'cinematic', params);
            clock += 1000;
            await tracker.submit(images, 'cinematic', params);

            expect(tracker.listJobs().map((job) => job.id)).toEqual(['task-b', 'task-a']);
        });

        it('should hand out copies', async () => {
            await tracker.submit(images, 'cinematic', params);

            const copy = tracker.getJob('task-1');
            copy?.images.push('nature/extra.jpg');

            expect(tracker.getJob('task-1')?.images).toEqual(images);
        });

        it('should remove and clear jobs', async () => {
            await tracker.submit(images, 'cinematic', params);

            expect(tracker.remove('task-1')).toBe(true);
            expect(tracker.remove('task-1')).toBe(false);

            await tracker.submit(images, 'cinematic', params);
            tracker.clear();
            expect(tracker.listJobs()).toEqual([]);
        });
    });

    describe('persistence', () => {
        let dir: string;
        let file: string;

        beforeEach(() => {
            dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tracker-'));
            file = path.join(dir, 'nested', 'jobs.json');
        });

        afterEach(() => {
            fs.rmSync(dir, { recursive: true, force: true });
        });

        it('should restore jobs written by a previous instance', async () => {
            const first = new JobTracker({ client, styleResolver: styles, persistencePath: file, now });
            await first.submit(images, 'cinematic', params);
            client.getStatus.mockResolvedValueOnce({ status: 'succeeded', resultRef: 'https://cdn.test/v.mp4' });
            await first.poll('task-1');

            const second = new JobTracker({ client, styleResolver: styles, persistencePath: file, now });
            const job = second.getJob('task-1');

            expect(job?.status).toBe('succeeded');
            expect(job?.resultRef).toBe('https://cdn.test/v.mp4');
            expect(job?.params).toEqual(params);
            expect(job?.shots).toHaveLength(3);
            expect(job?.createdAt).toEqual(new Date('2026-03-01T12:00:00Z'));
        });

        it('should start empty when the file is corrupt', () => {
            fs.mkdirSync(path.dirname(file), { recursive: true });
            fs.writeFileSync(file, 'not json');

            const restored = new JobTracker({ client, styleResolver: styles, persistencePath: file });

            expect(restored.listJobs()).toEqual([]);
        });
    });

    describe('reviveJob', () => {
        it('should reject records without the required fields', () => {
            expect(reviveJob(null)).toBeNull();
            expect(reviveJob({ id: 'x', status: 'bogus', images: [], style: 's', createdAt: '2026-01-01T00:00:00Z' }))
                .toBeNull();
            expect(reviveJob({ id: 'x', status: 'running', images: 'a.jpg', style: 's', createdAt: '2026-01-01T00:00:00Z' }))
                .toBeNull();
        });

        it('should fill defaults for optional fields', () => {
            const job = reviveJob({
                id: 'x',
                status: 'running',
                images: ['a/1.jpg'],
                style: 'noir',
                createdAt: '2026-01-01T00:00:00.000Z',
            });

            expect(job).toEqual({
                id: 'x',
                images: ['a/1.jpg'],
                style: 'noir',
                params: { fps: 24, dimension: '1280x720' },
                shots: [],
                status: 'running',
                abandoned: false,
                createdAt: new Date('2026-01-01T00:00:00.000Z'),
                lastCheckedAt: new Date('2026-01-01T00:00:00.000Z'),
            });
        });
    });
});
