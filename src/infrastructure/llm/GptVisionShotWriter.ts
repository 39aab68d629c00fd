import axios from 'axios';
import { Shot } from '../../domain/entities/Shot';
import { IShotWriter, ShotWritingRequest } from '../../domain/ports/IShotWriter';
import { MAX_SHOT_TEXT_LENGTH } from '../../domain/services/ShotPlanner';
import { RemoteImageResolver } from '../images/ImageSource';

interface ChatCompletionResponse {
    choices?: Array<{ message?: { content?: string | null } }>;
}

/**
 * Writes shot descriptions with a GPT vision model.
 * Every selected image is attached to a single chat request and the model answers with JSON.
 */
export class GptVisionShotWriter implements IShotWriter {
    private readonly apiKey: string;
    private readonly images: RemoteImageResolver;
    private readonly model: string;
    private readonly baseUrl: string;
    private readonly timeoutMs: number;

    constructor(
        apiKey: string,
        images: RemoteImageResolver,
        model: string = 'gpt-4o',
        baseUrl: string = 'https://api.openai.com',
        timeoutMs: number = 60000
    ) {
        if (!apiKey) {
            throw new Error('OpenAI API key is required');
        }
        this.apiKey = apiKey;
        this.images = images;
        this.model = model;
        this.baseUrl = baseUrl.endsWith('/') ? baseUrl.slice(0, -1) : baseUrl;
        this.timeoutMs = timeoutMs;
    }

    async writeShots(request: ShotWritingRequest): Promise<Shot[]> {
        const imageParts = await Promise.all(
            request.images.map(async (image) => ({
                type: 'image_url',
                image_url: { url: await this.images.toRemoteInput(image) },
            }))
        );

        let content: string;
        try {
            const response = await axios.post<ChatCompletionResponse>(
                `${this.baseUrl}/v1/chat/completions`,
                {
                    model: this.model,
                    messages: [
                        {
                            role: 'user',
                            content: [{ type: 'text', text: this.buildPrompt(request) }, ...imageParts],
                        },
                    ],
                    max_tokens: 1000,
                    response_format: { type: 'json_object' },
                },
                {
                    headers: {
                        Authorization: `Bearer ${this.apiKey}`,
                        'Content-Type': 'application/json',
                    },
                    timeout: this.timeoutMs,
                }
            );
            content = response.data.choices?.[0]?.message?.content ?? '';
        } catch (error) {
            throw new Error(`Vision API error: ${describeError(error)}`);
        }

        const shots = parseShots(content, request.images);
        console.log(`[ShotWriter] Wrote ${shots.length} shot descriptions`);
        return shots;
    }

    private buildPrompt(request: ShotWritingRequest): string {
        const count = request.images.length;
        const subject = request.category ? `${request.category} images` : 'images';
        const style = `${request.style.label} (${request.style.fragments.join(', ')})`;

        return [
            'You write shot descriptions for a multi-shot AI video model.',
            `Analyze the ${count} ${subject} attached in order and write one shot per image in this style: ${style}.`,
            'Each shot description should:',
            '1. Describe the visual elements and composition of its image',
            '2. Carry the style through lighting, color and atmosphere',
            '3. Name a camera movement (aerial rise, tracking, pan, push-in)',
            '4. Flow naturally from the previous shot',
            `Keep each description between 50 and 80 words and under ${MAX_SHOT_TEXT_LENGTH} characters.`,
            'Return JSON with this structure:',
            `{ "shots": [{ "image_index": number (0 to ${count - 1}), "text": string }] }`,
        ].join('\n');
    }
}

/**
 * Reads the model's reply into one shot per image, ordered by image.
 * Throws when the reply is not JSON or does not cover every image exactly once.
 */
export function parseShots(content: string, images: string[]): Shot[] {
    let parsed: unknown;
    try {
        parsed = JSON.parse(content.replace(/```json\n?|\n?```/g, '').trim());
    } catch {
        throw new Error(`Failed to parse shot descriptions: ${content.substring(0, 200)}`);
    }

    const items: unknown = typeof parsed === 'object' && parsed !== null && 'shots' in parsed
        ? parsed.shots
        : parsed;
    if (!Array.isArray(items)) {
        throw new Error('Shot descriptions must be a JSON array');
    }

    const texts = new Map<number, string>();
    for (const item of items) {
        if (typeof item !== 'object' || item === null
            || !('image_index' in item) || typeof item.image_index !== 'number'
            || !('text' in item) || typeof item.text !== 'string') {
            throw new Error('Each shot needs a numeric image_index and a text');
        }
        const index = item.image_index;
        const text = item.text.trim();
        if (!Number.isInteger(index) || index < 0 || index >= images.length) {
            throw new Error(`Shot refers to image ${index}, but only ${images.length} were sent`);
        }
        if (!text) {
            throw new Error(`Shot for image ${index} has no text`);
        }
        if (texts.has(index)) {
            throw new Error(`Image ${index} has more than one shot`);
        }
        texts.set(index, text);
    }

    return images.map((image, index) => {
        const text = texts.get(index);
        if (text === undefined) {
            throw new Error(`No shot written for image ${index}`);
        }
        return { imageIndex: index, image, text: text.substring(0, MAX_SHOT_TEXT_LENGTH) };
    });
}

function describeError(error: unknown): string {
    if (axios.isAxiosError(error)) {
        const data: unknown = error.response?.data;
        if (typeof data === 'object' && data !== null && 'error' in data
            && typeof data.error === 'object' && data.error !== null
            && 'message' in data.error && typeof data.error.message === 'string') {
            return data.error.message;
        }
        return error.message;
    }
    return error instanceof Error ? error.message : String(error);
}
