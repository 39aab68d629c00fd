import axios from 'axios';
import { RemoteStatusUpdate } from '../../domain/entities/GenerationJob';
import { ServiceUnavailableError } from '../../domain/errors';
import { IVideoGenerationClient, VideoGenerationRequest } from '../../domain/ports/IVideoGenerationClient';
import { RemoteImageResolver } from '../images/ImageSource';

interface TaskEnvelope<T> {
    code?: number;
    msg?: string;
    message?: string;
    data?: T;
}

interface CreateTaskData {
    taskId?: string;
}

interface TaskRecord {
    taskId?: string;
    state?: string;
    status?: string;
    resultJson?: string;
    videoUrl?: string;
    video_url?: string;
    failMsg?: string;
    error?: string;
}

const PENDING_STATES = ['waiting', 'queuing', 'queued', 'pending', 'starting', 'submitted'];
const RUNNING_STATES = ['generating', 'processing', 'running', 'in_progress', 'inprogress'];
const SUCCESS_STATES = ['success', 'succeeded', 'completed'];
const FAILURE_STATES = ['fail', 'failed', 'error', 'canceled', 'cancelled'];

/**
 * Client for an asynchronous task API (create task, then query its record).
 *
 * POST {baseUrl}/jobs/createTask          -> { code: 200, data: { taskId } }
 * GET  {baseUrl}/jobs/recordInfo?taskId=  -> { code: 200, data: { state, resultJson, failMsg } }
 */
export class HttpVideoGenerationClient implements IVideoGenerationClient {
    private readonly apiKey: string;
    private readonly baseUrl: string;
    private readonly model: string;
    private readonly images: RemoteImageResolver;
    private readonly timeoutMs: number;

    constructor(
        apiKey: string,
        images: RemoteImageResolver,
        baseUrl: string,
        model: string = 'multi-shot-video',
        timeoutMs: number = 30000
    ) {
        if (!apiKey) {
            throw new Error('Video API key is required');
        }
        if (!baseUrl) {
            throw new Error('Video API base URL is required');
        }
        this.apiKey = apiKey;
        this.images = images;
        this.baseUrl = baseUrl.endsWith('/') ? baseUrl.slice(0, -1) : baseUrl;
        this.model = model;
        this.timeoutMs = timeoutMs;
    }

    async submit(request: VideoGenerationRequest): Promise<string> {
        const shots = await Promise.all(
            request.shots.map(async (shot) => ({
                text: shot.text,
                image_url: await this.images.toRemoteInput(shot.image),
            }))
        );

        const body = {
            model: this.model,
            input: {
                task_type: 'MULTI_SHOT_MANUAL',
                shots,
                style: request.style,
                fps: request.params.fps,
                dimension: request.params.dimension,
                ...(request.params.seed !== undefined ? { seed: request.params.seed } : {}),
            },
        };

        try {
            const response = await axios.post<TaskEnvelope<CreateTaskData>>(
                `${this.baseUrl}/jobs/createTask`,
                body,
                {
                    headers: this.headers(),
                    timeout: this.timeoutMs,
                }
            );

            const envelope = response.data;
            this.assertAccepted(envelope, 'create task');

            const taskId = envelope.data?.taskId;
            if (!taskId) {
                console.error('[HttpVideo] Response body:', JSON.stringify(envelope));
                throw new ServiceUnavailableError('Video API did not return a task ID');
            }

            console.log(`[HttpVideo] Task created: ${taskId} (${shots.length} shots)`);
            return taskId;
        } catch (error) {
            throw this.toServiceError(error, 'create video task');
        }
    }

    async getStatus(jobId: string): Promise<RemoteStatusUpdate> {
        try {
            const response = await axios.get<TaskEnvelope<TaskRecord>>(`${this.baseUrl}/jobs/recordInfo`, {
                params: { taskId: jobId },
                headers: this.headers(),
                timeout: this.timeoutMs,
            });

            const envelope = response.data;
            this.assertAccepted(envelope, 'query task');

            const record = envelope.data ?? {};
            return this.toStatusUpdate(jobId, record);
        } catch (error) {
            throw this.toServiceError(error, `query task ${jobId}`);
        }
    }

    private toStatusUpdate(jobId: string, record: TaskRecord): RemoteStatusUpdate {
        const state = (record.state || record.status || '').toLowerCase();

        if (PENDING_STATES.includes(state)) {
            return { status: 'pending' };
        }
        if (RUNNING_STATES.includes(state)) {
            return { status: 'running' };
        }
        if (SUCCESS_STATES.includes(state)) {
            const videoUrl = record.videoUrl || record.video_url || this.parseResultUrl(record.resultJson);
            if (!videoUrl) {
                throw new ServiceUnavailableError(`Task ${jobId} completed but no video URL found in response`);
            }
            return { status: 'succeeded', resultRef: videoUrl };
        }
        if (FAILURE_STATES.includes(state)) {
            return { status: 'failed', errorReason: record.failMsg || record.error || undefined };
        }

        throw new ServiceUnavailableError(`Unrecognised state '${state || '(empty)'}' for task ${jobId}`);
    }

    private parseResultUrl(resultJson?: string): string | undefined {
        if (!resultJson) {
            return undefined;
        }
        try {
            const parsed: unknown = JSON.parse(resultJson);
            if (typeof parsed === 'object' && parsed !== null && 'resultUrls' in parsed && Array.isArray(parsed.resultUrls)) {
                const first: unknown = parsed.resultUrls[0];
                return typeof first === 'string' ? first : undefined;
            }
        } catch (e) {
            console.warn('[HttpVideo] Failed to parse resultJson:', e);
        }
        return undefined;
    }

    private assertAccepted<T>(envelope: TaskEnvelope<T>, action: string): void {
        if (envelope.code !== undefined && envelope.code !== 200) {
            const message = envelope.msg || envelope.message || `code ${envelope.code}`;
            throw new ServiceUnavailableError(`Video API refused to ${action}: ${message}`);
        }
    }

    private headers(): Record<string, string> {
        return {
            'Authorization': `Bearer ${this.apiKey}`,
            'Content-Type': 'application/json',
        };
    }

    private toServiceError(error: unknown, action: string): ServiceUnavailableError {
        if (error instanceof ServiceUnavailableError) {
            return error;
        }
        if (axios.isAxiosError(error)) {
            const status = error.response?.status;
            const data: unknown = error.response?.data;
            let detail = error.message;
            if (typeof data === 'object' && data !== null) {
                if ('msg' in data && typeof data.msg === 'string') {
                    detail = data.msg;
                } else if ('message' in data && typeof data.message === 'string') {
                    detail = data.message;
                }
            }
            return new ServiceUnavailableError(
                `Failed to ${action}${status ? ` (${status})` : ''}: ${detail}`
            );
        }
        const message = error instanceof Error ? error.message : String(error);
        return new ServiceUnavailableError(`Failed to ${action}: ${message}`);
    }
}
