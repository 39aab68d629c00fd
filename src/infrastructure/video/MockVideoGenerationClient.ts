import { v4 as uuidv4 } from 'uuid';
import { RemoteStatusUpdate } from '../../domain/entities/GenerationJob';
import { ServiceUnavailableError } from '../../domain/errors';
import { IVideoGenerationClient, VideoGenerationRequest } from '../../domain/ports/IVideoGenerationClient';

export const MOCK_VIDEO_URL = 'https://res.cloudinary.com/demo/video/upload/w_1280,h_720,c_fill/dog.mp4';

export interface MockVideoGenerationOptions {
    /** Status queries spent in 'pending' before switching to 'running' */
    pendingChecks?: number;
    /** Status queries spent in 'running' before finishing */
    runningChecks?: number;
    /** When set, jobs finish as failed with this reason */
    failWith?: string;
    videoUrl?: string;
}

interface MockTask {
    checks: number;
}

/**
 * In-process stand-in for a remote generation service, for development and tests.
 * Each status query advances a task by one step.
 */
export class MockVideoGenerationClient implements IVideoGenerationClient {
    private readonly tasks: Map<string, MockTask> = new Map();
    private readonly pendingChecks: number;
    private readonly runningChecks: number;
    private readonly failWith?: string;
    private readonly videoUrl: string;

    constructor(options: MockVideoGenerationOptions = {}) {
        this.pendingChecks = options.pendingChecks ?? 1;
        this.runningChecks = options.runningChecks ?? 1;
        this.failWith = options.failWith;
        this.videoUrl = options.videoUrl ?? MOCK_VIDEO_URL;
    }

    async submit(request: VideoGenerationRequest): Promise<string> {
        const id = `mock_${uuidv4().substring(0, 8)}`;
        this.tasks.set(id, { checks: 0 });
        console.log(`[MockVideo] Accepted ${request.shots.length} shots in style "${request.style}" as ${id}`);
        return id;
    }

    async getStatus(jobId: string): Promise<RemoteStatusUpdate> {
        const task = this.tasks.get(jobId);
        if (!task) {
            throw new ServiceUnavailableError(`Mock service has no task ${jobId}`);
        }
        task.checks += 1;

        if (task.checks <= this.pendingChecks) {
            return { status: 'pending' };
        }
        if (task.checks <= this.pendingChecks + this.runningChecks) {
            return { status: 'running' };
        }
        if (this.failWith) {
            return { status: 'failed', errorReason: this.failWith };
        }
        return { status: 'succeeded', resultRef: this.videoUrl };
    }
}
