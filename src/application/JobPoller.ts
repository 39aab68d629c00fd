import { JobStatus } from '../domain/entities/GenerationJob';
import { JobNotFoundError, ServiceUnavailableError } from '../domain/errors';
import { IArtifactStore } from '../domain/ports/IArtifactStore';
import { JobTracker } from './JobTracker';

export const DEFAULT_POLL_INTERVAL_MS = 5000;

export interface PollOutcome {
    jobId: string;
    status: JobStatus;
    /** Whether the status moved during this tick */
    changed: boolean;
}

/**
 * Cancellation handle returned by JobPoller.start().
 */
export interface PollerHandle {
    stop(): void;
}

export interface JobPollerOptions {
    intervalMs?: number;
    /** Receives the artifact of every job that succeeds */
    artifactStore?: IArtifactStore;
}

/**
 * Timer-driven poll loop over the tracker's active jobs.
 *
 * Each tick polls every active job once, in order. The next tick is scheduled only
 * after the current one finishes, so a slow tick delays the loop instead of overlapping it.
 * Jobs leave the loop when they reach a terminal state or are untracked.
 */
export class JobPoller {
    private readonly tracker: JobTracker;
    private readonly intervalMs: number;
    private readonly artifactStore?: IArtifactStore;
    private timer: NodeJS.Timeout | null = null;
    private running = false;
    /** Bumped on every start and stop so a tick from an earlier run never reschedules */
    private generation = 0;
    private currentTick: Promise<PollOutcome[]> | null = null;

    constructor(tracker: JobTracker, options: JobPollerOptions = {}) {
        const intervalMs = options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
        if (!(intervalMs > 0)) {
            throw new Error(`Poll interval must be positive, got ${intervalMs}`);
        }
        this.tracker = tracker;
        this.intervalMs = intervalMs;
        this.artifactStore = options.artifactStore;
    }

    start(): PollerHandle {
        if (!this.running) {
            this.running = true;
            this.generation += 1;
            console.log(`[JobPoller] Polling active jobs every ${this.intervalMs / 1000}s`);
            this.scheduleNext();
        }
        return { stop: () => this.stop() };
    }

    stop(): void {
        if (!this.running) {
            return;
        }
        this.running = false;
        this.generation += 1;
        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = null;
        }
        console.log('[JobPoller] Stopped');
    }

    isRunning(): boolean {
        return this.running;
    }

    /**
     * Removes a job from the scheduled set without contacting the remote service.
     */
    untrack(jobId: string): void {
        this.tracker.abandon(jobId);
    }

    /**
     * Runs one pass over the active jobs. A call made while a pass is running joins it.
     */
    tick(): Promise<PollOutcome[]> {
        if (!this.currentTick) {
            this.currentTick = this.pollActiveJobs().finally(() => {
                this.currentTick = null;
            });
        }
        return this.currentTick;
    }

    private scheduleNext(): void {
        const generation = this.generation;
        this.timer = setTimeout(() => {
            this.timer = null;
            this.tick()
                .catch((error) => console.error('[JobPoller] Tick failed:', error))
                .finally(() => {
                    if (this.running && this.generation === generation) {
                        this.scheduleNext();
                    }
                });
        }, this.intervalMs);
    }

    private async pollActiveJobs(): Promise<PollOutcome[]> {
        const outcomes: PollOutcome[] = [];

        for (const job of this.tracker.activeJobs()) {
            try {
                const status = await this.tracker.poll(job.id);
                outcomes.push({ jobId: job.id, status, changed: status !== job.status });

                if (status === 'succeeded') {
                    await this.collectResult(job.id);
                } else if (status === 'failed') {
                    const failed = this.tracker.getJob(job.id);
                    console.warn(`[JobPoller] Job ${job.id} failed: ${failed?.failureReason ?? 'Unknown failure'}`);
                }
            } catch (error) {
                if (error instanceof ServiceUnavailableError) {
                    console.warn(`[JobPoller] ${error.message}. Retrying on next tick.`);
                } else if (error instanceof JobNotFoundError) {
                    console.warn(`[JobPoller] Job ${job.id} was removed while polling`);
                } else {
                    console.error(`[JobPoller] Unexpected error polling job ${job.id}:`, error);
                }
            }
        }

        return outcomes;
    }

    private async collectResult(jobId: string): Promise<void> {
        const artifact = this.tracker.getResult(jobId);
        console.log(`[JobPoller] Job ${jobId} succeeded: ${artifact.uri}`);

        if (!this.artifactStore || artifact.localPath) {
            return;
        }
        try {
            const localPath = await this.artifactStore.save(artifact);
            this.tracker.attachLocalCopy(jobId, localPath);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            console.error(`[JobPoller] Could not cache video for job ${jobId}: ${message}`);
        }
    }
}
