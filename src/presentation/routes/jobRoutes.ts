import { Router, Request, Response } from 'express';
import { ImageCatalog } from '../../application/ImageCatalog';
import { JobPoller } from '../../application/JobPoller';
import { JobTracker } from '../../application/JobTracker';
import { GenerationJob, GenerationParams, isInProgress } from '../../domain/entities/GenerationJob';
import { VideoArtifactRef } from '../../domain/entities/VideoArtifact';
import { JobNotFoundError } from '../../domain/errors';
import { IArtifactStore } from '../../domain/ports/IArtifactStore';
import { asyncHandler, BadRequestError } from '../middleware/errorHandler';

export interface JobRouteDependencies {
    tracker: JobTracker;
    poller: JobPoller;
    catalog: ImageCatalog;
    artifactStore?: IArtifactStore;
    /** fps and dimension applied to every submission */
    defaultParams: Pick<GenerationParams, 'fps' | 'dimension'>;
}

/**
 * Creates job routes with dependency injection.
 */
export function createJobRoutes(deps: JobRouteDependencies): Router {
    const { tracker, poller, catalog, artifactStore, defaultParams } = deps;
    const router = Router();

    const videoUrlFor = (job: Pick<GenerationJob, 'resultRef' | 'localPath'>): string | undefined => {
        if (job.localPath && artifactStore) {
            return artifactStore.publicUrlFor(job.localPath);
        }
        return job.resultRef;
    };

    const summarize = (job: GenerationJob): Record<string, unknown> => {
        const summary: Record<string, unknown> = {
            jobId: job.id,
            status: job.status,
            inProgress: isInProgress(job.status),
            abandoned: job.abandoned,
            style: job.style,
            category: job.params.category,
            images: job.images,
            createdAt: job.createdAt.toISOString(),
            lastCheckedAt: job.lastCheckedAt.toISOString(),
        };
        if (job.status === 'succeeded') {
            summary.resultRef = job.resultRef;
            summary.videoUrl = videoUrlFor(job);
        }
        if (job.status === 'failed') {
            summary.error = job.failureReason;
        }
        return summary;
    };

    /**
     * POST /jobs
     *
     * Submits a generation job. Returns once the remote service has acknowledged it.
     */
    router.post(
        '/jobs',
        asyncHandler(async (req: Request, res: Response) => {
            const { images, style, category, seed } = req.body ?? {};

            if (!Array.isArray(images) || !images.every((image: unknown) => typeof image === 'string')) {
                throw new BadRequestError('images must be an array of image paths');
            }
            const unknownImage = images.find((image: string) => !catalog.has(image));
            if (unknownImage !== undefined) {
                throw new BadRequestError(`Unknown image: ${unknownImage}`);
            }
            if (!style || typeof style !== 'string') {
                throw new BadRequestError('style is required and must be a string');
            }
            if (category !== undefined && typeof category !== 'string') {
                throw new BadRequestError('category must be a string');
            }
            if (seed !== undefined && (typeof seed !== 'number' || !Number.isInteger(seed) || seed < 0)) {
                throw new BadRequestError('seed must be a non-negative integer');
            }

            const params: GenerationParams = { ...defaultParams };
            if (category !== undefined) params.category = category;
            if (seed !== undefined) params.seed = seed;

            const jobId = await tracker.submit(images, style, params);

            res.status(202).json({
                jobId,
                status: 'submitted',
                message: `Video generation started (${images.length} shots)`,
            });
        })
    );

    /**
     * GET /jobs
     *
     * Lists all tracked jobs, oldest first.
     */
    router.get(
        '/jobs',
        asyncHandler(async (_req: Request, res: Response) => {
            const jobs = tracker.listJobs().map(summarize);
            res.json({
                total: jobs.length,
                jobs,
            });
        })
    );

    /**
     * GET /jobs/:jobId
     */
    router.get(
        '/jobs/:jobId',
        asyncHandler(async (req: Request, res: Response) => {
            const { jobId } = req.params;
            const job = tracker.getJob(jobId);
            if (!job) {
                throw new JobNotFoundError(jobId);
            }
            res.json(summarize(job));
        })
    );

    /**
     * POST /jobs/:jobId/poll
     *
     * Checks the remote status right away instead of waiting for the next tick.
     */
    router.post(
        '/jobs/:jobId/poll',
        asyncHandler(async (req: Request, res: Response) => {
            const { jobId } = req.params;
            const status = await tracker.poll(jobId);
            res.json({ jobId, status, inProgress: isInProgress(status) });
        })
    );

    /**
     * GET /jobs/:jobId/result
     *
     * 409 while the job is still running, 422 when it failed.
     */
    router.get(
        '/jobs/:jobId/result',
        asyncHandler(async (req: Request, res: Response) => {
            const { jobId } = req.params;
            let artifact: VideoArtifactRef = tracker.getResult(jobId);

            if (!artifact.localPath && artifactStore) {
                try {
                    const localPath = await artifactStore.save(artifact);
                    tracker.attachLocalCopy(jobId, localPath);
                    artifact = { ...artifact, localPath };
                } catch (error) {
                    const message = error instanceof Error ? error.message : String(error);
                    console.warn(`[JobRoutes] Serving remote video for ${jobId}: ${message}`);
                }
            }

            res.json({
                jobId,
                uri: artifact.uri,
                videoUrl: videoUrlFor({ resultRef: artifact.uri, localPath: artifact.localPath }),
            });
        })
    );

    /**
     * DELETE /jobs/:jobId
     *
     * Stops polling the job. The remote job keeps running.
     */
    router.delete(
        '/jobs/:jobId',
        asyncHandler(async (req: Request, res: Response) => {
            poller.untrack(req.params.jobId);
            res.status(204).end();
        })
    );

    /**
     * DELETE /jobs
     *
     * Clears the job table.
     */
    router.delete(
        '/jobs',
        asyncHandler(async (_req: Request, res: Response) => {
            tracker.clear();
            res.status(204).end();
        })
    );

    return router;
}
