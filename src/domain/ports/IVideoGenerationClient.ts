import { GenerationParams, RemoteStatusUpdate } from '../entities/GenerationJob';
import { Shot } from '../entities/Shot';

/**
 * Payload for one multi-shot video generation request.
 */
export interface VideoGenerationRequest {
    /** Ordered image references (catalog-relative paths) */
    images: string[];
    /** One shot description per image */
    shots: Shot[];
    /** Resolved style name */
    style: string;
    /** Prompt fragments of the resolved style */
    fragments: readonly string[];
    params: GenerationParams;
}

/**
 * IVideoGenerationClient - Port for remote asynchronous video generation services.
 * Implementations: HttpVideoGenerationClient, ReplicateVideoGenerationClient, MockVideoGenerationClient
 *
 * Transport and authentication failures are reported as ServiceUnavailableError.
 */
export interface IVideoGenerationClient {
    /**
     * Starts a generation job.
     * @returns The job identifier issued by the remote service
     */
    submit(request: VideoGenerationRequest): Promise<string>;

    /**
     * Queries the current status of a job.
     */
    getStatus(jobId: string): Promise<RemoteStatusUpdate>;
}
