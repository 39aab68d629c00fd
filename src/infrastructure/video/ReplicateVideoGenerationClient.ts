import Replicate from 'replicate';
import { RemoteStatusUpdate } from '../../domain/entities/GenerationJob';
import { ServiceUnavailableError } from '../../domain/errors';
import { IVideoGenerationClient, VideoGenerationRequest } from '../../domain/ports/IVideoGenerationClient';
import { RemoteImageResolver } from '../images/ImageSource';

/**
 * The subset of a Replicate prediction this client reads.
 */
export interface PredictionRecord {
    id: string;
    status: string;
    output?: unknown;
    error?: unknown;
}

/**
 * The subset of `replicate.predictions` this client calls.
 */
export interface PredictionsApi {
    create(options: { model?: string; version?: string; input: object }): Promise<PredictionRecord>;
    get(id: string): Promise<PredictionRecord>;
}

/**
 * Replicate predictions as a remote generation service.
 * `starting` maps to pending, `processing` to running, `canceled` to failed.
 */
export class ReplicateVideoGenerationClient implements IVideoGenerationClient {
    private readonly predictions: PredictionsApi;
    private readonly model: string;
    private readonly images: RemoteImageResolver;

    constructor(
        apiToken: string,
        images: RemoteImageResolver,
        model: string = 'minimax/video-01-director',
        predictions?: PredictionsApi
    ) {
        if (!apiToken && !predictions) {
            throw new Error('REPLICATE_API_TOKEN is not configured');
        }
        this.predictions = predictions ?? new Replicate({ auth: apiToken }).predictions;
        this.model = model;
        this.images = images;
    }

    async submit(request: VideoGenerationRequest): Promise<string> {
        const firstImage = request.images[0];
        const input: Record<string, unknown> = {
            prompt: request.shots.map((shot) => shot.text).join(' '),
            first_frame_image: await this.images.toRemoteInput(firstImage),
            fps: request.params.fps,
        };
        if (request.params.seed !== undefined) {
            input.seed = request.params.seed;
        }

        console.log(`[Replicate] Creating prediction on ${this.model} (${request.shots.length} shots)`);

        try {
            // "owner/name:version" pins a version, "owner/name" runs the latest
            const [modelName, version] = this.model.split(':');
            const prediction = version
                ? await this.predictions.create({ version, input })
                : await this.predictions.create({ model: modelName, input });

            if (!prediction.id) {
                throw new ServiceUnavailableError('Replicate did not return a prediction ID');
            }
            return prediction.id;
        } catch (error) {
            throw toServiceError(error, 'create prediction');
        }
    }

    async getStatus(jobId: string): Promise<RemoteStatusUpdate> {
        let prediction: PredictionRecord;
        try {
            prediction = await this.predictions.get(jobId);
        } catch (error) {
            throw toServiceError(error, `fetch prediction ${jobId}`);
        }

        switch (prediction.status) {
            case 'starting':
                return { status: 'pending' };
            case 'processing':
                return { status: 'running' };
            case 'succeeded': {
                const videoUrl = pickVideoUrl(prediction.output);
                if (!videoUrl) {
                    throw new ServiceUnavailableError(`Prediction ${jobId} succeeded without a video URL`);
                }
                return { status: 'succeeded', resultRef: videoUrl };
            }
            case 'failed':
                return { status: 'failed', errorReason: describeError(prediction.error) };
            case 'canceled':
                return { status: 'failed', errorReason: 'Prediction was canceled' };
            default:
                throw new ServiceUnavailableError(`Unrecognised prediction status '${prediction.status}' for ${jobId}`);
        }
    }
}

/**
 * Replicate outputs vary: a URL string or an array of URLs.
 */
export function pickVideoUrl(output: unknown): string | null {
    if (typeof output === 'string') {
        return output;
    }
    if (Array.isArray(output)) {
        const first: unknown = output[0];
        return typeof first === 'string' ? first : null;
    }
    return null;
}

function describeError(error: unknown): string | undefined {
    if (typeof error === 'string' && error.trim()) {
        return error;
    }
    return undefined;
}

function toServiceError(error: unknown, action: string): ServiceUnavailableError {
    if (error instanceof ServiceUnavailableError) {
        return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new ServiceUnavailableError(`Replicate failed to ${action}: ${message}`);
}
