import { Shot } from './Shot';

/**
 * Possible statuses for a GenerationJob.
 * - 'submitted': acknowledged by the remote service, not yet checked
 * - 'pending' / 'running': in progress (some providers only report one of them)
 * - 'succeeded' / 'failed': terminal
 */
export type JobStatus = 'submitted' | 'pending' | 'running' | 'succeeded' | 'failed';

export const MIN_IMAGES_PER_JOB = 1;
export const MAX_IMAGES_PER_JOB = 8;

const STATUS_RANK: Record<JobStatus, number> = {
    submitted: 0,
    pending: 1,
    running: 2,
    succeeded: 3,
    failed: 3,
};

/**
 * Parameters forwarded to the video model.
 */
export interface GenerationParams {
    /** Frames per second of the rendered video */
    fps: number;
    /** Output size, e.g. "1280x720" */
    dimension: string;
    /** Optional seed for reproducible output */
    seed?: number;
    /** Preset image category the images were picked from */
    category?: string;
}

/**
 * GenerationJob is the local record of one remote video generation request.
 */
export interface GenerationJob {
    /** Identifier issued by the remote service */
    id: string;
    /** Ordered image references (1-8) */
    images: string[];
    /** Style name the prompt was built from */
    style: string;
    params: GenerationParams;
    /** Shot descriptions sent with the request, one per image */
    shots: Shot[];
    status: JobStatus;
    /** Remote artifact reference, set once the job succeeded */
    resultRef?: string;
    /** Local cached copy of the artifact */
    localPath?: string;
    /** Failure reason reported by the remote service */
    failureReason?: string;
    /** Set when the user stopped tracking the job locally */
    abandoned: boolean;

    /** Timestamps */
    createdAt: Date;
    lastCheckedAt: Date;
}

/**
 * Creates a new GenerationJob in the 'submitted' state.
 */
export function createGenerationJob(
    id: string,
    images: string[],
    style: string,
    params: GenerationParams,
    shots: Shot[],
    now: Date = new Date()
): GenerationJob {
    if (!id.trim()) {
        throw new Error('GenerationJob id cannot be empty');
    }
    return {
        id,
        images: [...images],
        style,
        params: { ...params },
        shots: shots.map((shot) => ({ ...shot })),
        status: 'submitted',
        abandoned: false,
        createdAt: now,
        lastCheckedAt: now,
    };
}

/**
 * Checks if a status is terminal.
 */
export function isTerminalStatus(status: JobStatus): boolean {
    return status === 'succeeded' || status === 'failed';
}

/**
 * Checks if a job has reached a terminal state.
 */
export function isJobTerminal(job: GenerationJob): boolean {
    return isTerminalStatus(job.status);
}

/**
 * Pending and running both count as "in progress" for display purposes.
 */
export function isInProgress(status: JobStatus): boolean {
    return status === 'pending' || status === 'running';
}

/**
 * Whether moving from `current` to `next` is a forward step.
 * Equal ranks are not: a terminal job never switches to the other terminal state.
 */
export function isForwardTransition(current: JobStatus, next: JobStatus): boolean {
    if (isTerminalStatus(current)) {
        return false;
    }
    return STATUS_RANK[next] > STATUS_RANK[current];
}

/**
 * Status report from the remote service.
 */
export type RemoteStatusUpdate =
    | { status: 'pending' | 'running' }
    | { status: 'succeeded'; resultRef: string }
    | { status: 'failed'; errorReason?: string };

/**
 * Applies a status report using the forward-only rule.
 * Stale reports only refresh lastCheckedAt.
 */
export function applyStatusUpdate(
    job: GenerationJob,
    update: RemoteStatusUpdate,
    now: Date = new Date()
): GenerationJob {
    if (!isForwardTransition(job.status, update.status)) {
        return { ...job, lastCheckedAt: now };
    }

    const next: GenerationJob = {
        ...job,
        status: update.status,
        lastCheckedAt: now,
    };

    if (update.status === 'succeeded') {
        next.resultRef = update.resultRef;
    } else if (update.status === 'failed') {
        next.failureReason = update.errorReason || 'Unknown failure';
    }

    return next;
}
