import fs from 'fs';
import path from 'path';
import {
    GenerationJob,
    GenerationParams,
    JobStatus,
    MAX_IMAGES_PER_JOB,
    MIN_IMAGES_PER_JOB,
    RemoteStatusUpdate,
    applyStatusUpdate,
    createGenerationJob,
    isJobTerminal,
} from '../domain/entities/GenerationJob';
import { Shot } from '../domain/entities/Shot';
import { StyleTemplate } from '../domain/entities/StyleTemplate';
import { VideoArtifactRef } from '../domain/entities/VideoArtifact';
import {
    GenerationError,
    GenerationFailedError,
    JobNotFoundError,
    NotReadyError,
    ServiceUnavailableError,
    ValidationError,
} from '../domain/errors';
import { IShotWriter } from '../domain/ports/IShotWriter';
import { IVideoGenerationClient } from '../domain/ports/IVideoGenerationClient';
import { ShotPlanner } from '../domain/services/ShotPlanner';
import { StyleResolver } from './StyleResolver';

export interface JobTrackerDependencies {
    client: IVideoGenerationClient;
    styleResolver: StyleResolver;
    /** Writes shots from the images themselves; template shots are used when absent or failing */
    shotWriter?: IShotWriter;
    shotPlanner?: ShotPlanner;
    /** JSON file the job table is mirrored to; in-memory only when omitted */
    persistencePath?: string;
    now?: () => Date;
}

/**
 * Owns the local view of every submitted job and mediates all polling.
 * Status only moves forward; terminal jobs are never queried again.
 */
export class JobTracker {
    private readonly jobs: Map<string, GenerationJob> = new Map();
    private readonly inFlight: Map<string, Promise<JobStatus>> = new Map();
    private readonly client: IVideoGenerationClient;
    private readonly styleResolver: StyleResolver;
    private readonly shotWriter?: IShotWriter;
    private readonly shotPlanner: ShotPlanner;
    private readonly persistencePath?: string;
    private readonly now: () => Date;

    constructor(deps: JobTrackerDependencies) {
        this.client = deps.client;
        this.styleResolver = deps.styleResolver;
        this.shotWriter = deps.shotWriter;
        this.shotPlanner = deps.shotPlanner ?? new ShotPlanner();
        this.persistencePath = deps.persistencePath;
        this.now = deps.now ?? (() => new Date());

        if (this.persistencePath) {
            this.loadFromDisk(this.persistencePath);
        }
    }

    /**
     * Validates the request, forwards it to the remote service and records a 'submitted' job.
     * Nothing is recorded when validation or the remote call fails.
     */
    async submit(images: string[], style: string, params: GenerationParams): Promise<string> {
        if (images.length < MIN_IMAGES_PER_JOB || images.length > MAX_IMAGES_PER_JOB) {
            throw new ValidationError(
                `Between ${MIN_IMAGES_PER_JOB} and ${MAX_IMAGES_PER_JOB} images are required, got ${images.length}`
            );
        }
        const template = this.styleResolver.resolve(style);
        const shots = await this.planShots(images, template, params.category);

        let jobId: string;
        try {
            jobId = await this.client.submit({
                images: [...images],
                shots,
                style: template.name,
                fragments: template.fragments,
                params,
            });
        } catch (error) {
            throw toServiceError(error, 'submit generation job');
        }

        if (this.jobs.has(jobId)) {
            throw new ServiceUnavailableError(`Video service returned job ID ${jobId}, which is already tracked`);
        }

        const job = createGenerationJob(jobId, images, template.name, params, shots, this.now());
        this.jobs.set(jobId, job);
        this.saveToDisk();

        console.log(`[JobTracker] Submitted job ${jobId} (${images.length} images, style: ${template.name})`);
        return jobId;
    }

    /**
     * Refreshes a job's status from the remote service.
     * Concurrent calls for the same job share one remote request.
     */
    async poll(jobId: string): Promise<JobStatus> {
        const job = this.requireJob(jobId);
        if (isJobTerminal(job)) {
            return job.status;
        }

        const pending = this.inFlight.get(jobId);
        if (pending) {
            return pending;
        }

        const request = this.refresh(jobId).finally(() => {
            this.inFlight.delete(jobId);
        });
        this.inFlight.set(jobId, request);
        return request;
    }

    /**
     * Returns the artifact reference of a succeeded job.
     */
    getResult(jobId: string): VideoArtifactRef {
        const job = this.requireJob(jobId);

        if (job.status === 'failed') {
            throw new GenerationFailedError(jobId, job.failureReason || 'Unknown failure');
        }
        if (job.status !== 'succeeded' || !job.resultRef) {
            throw new NotReadyError(jobId, job.status);
        }

        return {
            jobId,
            uri: job.resultRef,
            localPath: job.localPath,
        };
    }

    /**
     * Records where the artifact of a succeeded job was cached.
     */
    attachLocalCopy(jobId: string, localPath: string): GenerationJob {
        const job = this.requireJob(jobId);
        if (job.status !== 'succeeded') {
            throw new NotReadyError(jobId, job.status);
        }
        return this.store({ ...job, localPath });
    }

    /**
     * Stops tracking a job locally. The remote job is left alone.
     */
    abandon(jobId: string): GenerationJob {
        const job = this.requireJob(jobId);
        if (job.abandoned) {
            return cloneJob(job);
        }
        console.log(`[JobTracker] Job ${jobId} abandoned at status ${job.status}`);
        return this.store({ ...job, abandoned: true });
    }

    getJob(jobId: string): GenerationJob | null {
        const job = this.jobs.get(jobId);
        return job ? cloneJob(job) : null;
    }

    /**
     * All jobs in submission order.
     */
    listJobs(): GenerationJob[] {
        return Array.from(this.jobs.values())
            .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
            .map(cloneJob);
    }

    /**
     * Jobs that still need polling: not terminal and not abandoned.
     */
    activeJobs(): GenerationJob[] {
        return this.listJobs().filter((job) => !job.abandoned && !isJobTerminal(job));
    }

    remove(jobId: string): boolean {
        const removed = this.jobs.delete(jobId);
        if (removed) {
            this.saveToDisk();
        }
        return removed;
    }

    clear(): void {
        this.jobs.clear();
        this.saveToDisk();
    }

    private async planShots(images: string[], style: StyleTemplate, category?: string): Promise<Shot[]> {
        if (this.shotWriter) {
            try {
                return await this.shotWriter.writeShots({ images: [...images], style, category });
            } catch (error) {
                const message = error instanceof Error ? error.message : String(error);
                console.warn(`[JobTracker] Shot writer failed, using template shots: ${message}`);
            }
        }
        return this.shotPlanner.plan(images, style, category);
    }

    private async refresh(jobId: string): Promise<JobStatus> {
        let update: RemoteStatusUpdate;
        try {
            update = await this.client.getStatus(jobId);
        } catch (error) {
            throw toServiceError(error, `check status of job ${jobId}`);
        }

        // The job may have been removed while the request was in flight
        const current = this.requireJob(jobId);
        const next = applyStatusUpdate(current, update, this.now());

        if (next.status !== current.status) {
            console.log(`[JobTracker] Job ${jobId}: ${current.status} -> ${next.status}`);
        } else if (update.status !== current.status) {
            console.warn(`[JobTracker] Ignoring stale status '${update.status}' for job ${jobId} (recorded: ${current.status})`);
        }

        this.store(next);
        return next.status;
    }

    private requireJob(jobId: string): GenerationJob {
        const job = this.jobs.get(jobId);
        if (!job) {
            throw new JobNotFoundError(jobId);
        }
        return job;
    }

    private store(job: GenerationJob): GenerationJob {
        this.jobs.set(job.id, job);
        this.saveToDisk();
        return cloneJob(job);
    }

    private loadFromDisk(filePath: string): void {
        try {
            if (!fs.existsSync(filePath)) {
                return;
            }
            const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
            if (typeof parsed !== 'object' || parsed === null) {
                console.warn(`[JobTracker] Ignoring malformed job file ${filePath}`);
                return;
            }
            for (const value of Object.values(parsed)) {
                const job = reviveJob(value);
                if (job) {
                    this.jobs.set(job.id, job);
                }
            }
            console.log(`[JobTracker] Loaded ${this.jobs.size} jobs from disk`);
        } catch (error) {
            console.error('[JobTracker] Failed to load jobs from disk:', error);
        }
    }

    private saveToDisk(): void {
        if (!this.persistencePath) {
            return;
        }
        try {
            fs.mkdirSync(path.dirname(this.persistencePath), { recursive: true });
            const data = Object.fromEntries(this.jobs);
            fs.writeFileSync(this.persistencePath, JSON.stringify(data, null, 2));
        } catch (error) {
            console.error('[JobTracker] Failed to save jobs to disk:', error);
        }
    }
}

function toServiceError(error: unknown, action: string): GenerationError {
    if (error instanceof GenerationError) {
        return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new ServiceUnavailableError(`Failed to ${action}: ${message}`);
}

function cloneJob(job: GenerationJob): GenerationJob {
    return {
        ...job,
        images: [...job.images],
        params: { ...job.params },
        shots: job.shots.map((shot) => ({ ...shot })),
    };
}

const STATUSES: readonly JobStatus[] = ['submitted', 'pending', 'running', 'succeeded', 'failed'];

function isJobStatus(value: unknown): value is JobStatus {
    return STATUSES.some((status) => status === value);
}

function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isShot(value: unknown): value is Shot {
    return typeof value === 'object' && value !== null
        && 'imageIndex' in value && typeof value.imageIndex === 'number'
        && 'image' in value && typeof value.image === 'string'
        && 'text' in value && typeof value.text === 'string';
}

function optionalString(value: unknown): string | undefined {
    return typeof value === 'string' ? value : undefined;
}

/**
 * Rebuilds a job from its JSON form. Returns null for records that do not look like jobs.
 */
export function reviveJob(value: unknown): GenerationJob | null {
    if (typeof value !== 'object' || value === null) {
        return null;
    }
    if (!('id' in value) || typeof value.id !== 'string'
        || !('status' in value) || !isJobStatus(value.status)
        || !('images' in value) || !isStringArray(value.images)
        || !('style' in value) || typeof value.style !== 'string'
        || !('createdAt' in value) || typeof value.createdAt !== 'string') {
        return null;
    }

    const createdAt = new Date(value.createdAt);
    const lastCheckedAt = 'lastCheckedAt' in value && typeof value.lastCheckedAt === 'string'
        ? new Date(value.lastCheckedAt)
        : createdAt;

    const params: GenerationParams = { fps: 24, dimension: '1280x720' };
    if ('params' in value && typeof value.params === 'object' && value.params !== null) {
        const raw = value.params;
        if ('fps' in raw && typeof raw.fps === 'number') params.fps = raw.fps;
        if ('dimension' in raw && typeof raw.dimension === 'string') params.dimension = raw.dimension;
        if ('seed' in raw && typeof raw.seed === 'number') params.seed = raw.seed;
        if ('category' in raw && typeof raw.category === 'string') params.category = raw.category;
    }

    const shots = 'shots' in value && Array.isArray(value.shots) ? value.shots.filter(isShot) : [];

    const job: GenerationJob = {
        id: value.id,
        images: value.images,
        style: value.style,
        params,
        shots,
        status: value.status,
        abandoned: 'abandoned' in value && value.abandoned === true,
        createdAt,
        lastCheckedAt,
    };
    const resultRef = 'resultRef' in value ? optionalString(value.resultRef) : undefined;
    if (resultRef) job.resultRef = resultRef;
    const localPath = 'localPath' in value ? optionalString(value.localPath) : undefined;
    if (localPath) job.localPath = localPath;
    const failureReason = 'failureReason' in value ? optionalString(value.failureReason) : undefined;
    if (failureReason) job.failureReason = failureReason;

    return job;
}
