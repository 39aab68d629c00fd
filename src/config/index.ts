import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

export type VideoProvider = 'http' | 'replicate' | 'mock';

const VIDEO_PROVIDERS: readonly VideoProvider[] = ['http', 'replicate', 'mock'];

/**
 * Application configuration loaded from environment variables.
 */
export interface Config {
    // Server
    port: number;
    environment: string;
    /** Base URL remote providers can fetch preset images from (optional) */
    publicBaseUrl?: string;

    // Remote generation service
    videoProvider: VideoProvider;
    videoApiKey: string;
    videoApiBaseUrl: string;
    videoModel: string;
    videoRequestTimeoutMs: number;

    // Replicate
    replicateApiToken: string;
    replicateModel: string;

    // Shot descriptions (template shots when no key is set)
    openaiApiKey: string;
    openaiModel: string;

    // Video parameters
    videoFps: number;
    videoDimension: string;

    // Local files
    imagesDir: string;
    stylesPath: string;
    outputDir: string;

    // Polling
    pollIntervalMs: number;
}

function getEnvVar(key: string, defaultValue?: string): string {
    let value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }

    // Trim whitespace and remove wrapping quotes
    value = value.trim();
    if (value.startsWith('"') && value.endsWith('"')) {
        value = value.substring(1, value.length - 1);
    } else if (value.startsWith("'") && value.endsWith("'")) {
        value = value.substring(1, value.length - 1);
    }

    return value;
}

function getEnvVarNumber(key: string, defaultValue?: number): number {
    const value = getEnvVar(key, defaultValue?.toString());
    const parsed = parseFloat(value);
    if (isNaN(parsed)) {
        throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
    }
    return parsed;
}

function getVideoProvider(): VideoProvider {
    const value = getEnvVar('VIDEO_PROVIDER', 'mock').toLowerCase();
    const provider = VIDEO_PROVIDERS.find((candidate) => candidate === value);
    if (!provider) {
        throw new Error(`VIDEO_PROVIDER must be one of ${VIDEO_PROVIDERS.join(', ')}, got: ${value}`);
    }
    return provider;
}

/**
 * Loads configuration from environment variables.
 */
export function loadConfig(): Config {
    const publicBaseUrl = getEnvVar('PUBLIC_BASE_URL', '');

    return {
        // Server
        port: getEnvVarNumber('PORT', 7860),
        environment: getEnvVar('NODE_ENV', 'development'),
        publicBaseUrl: publicBaseUrl || undefined,

        // Remote generation service
        videoProvider: getVideoProvider(),
        videoApiKey: getEnvVar('VIDEO_API_KEY', ''),
        videoApiBaseUrl: getEnvVar('VIDEO_API_BASE_URL', ''),
        videoModel: getEnvVar('VIDEO_MODEL', 'multi-shot-video'),
        videoRequestTimeoutMs: getEnvVarNumber('VIDEO_REQUEST_TIMEOUT_MS', 30000),

        // Replicate
        replicateApiToken: getEnvVar('REPLICATE_API_TOKEN', ''),
        replicateModel: getEnvVar('REPLICATE_MODEL', 'minimax/video-01-director'),

        // Shot descriptions
        openaiApiKey: getEnvVar('OPENAI_API_KEY', ''),
        openaiModel: getEnvVar('OPENAI_MODEL', 'gpt-4o'),

        // Video parameters
        videoFps: getEnvVarNumber('VIDEO_FPS', 24),
        videoDimension: getEnvVar('VIDEO_DIMENSION', '1280x720'),

        // Local files
        imagesDir: getEnvVar('IMAGES_DIR', './images'),
        stylesPath: getEnvVar('STYLES_PATH', './config/styles.json'),
        outputDir: getEnvVar('OUTPUT_DIR', './generated_videos'),

        // Polling
        pollIntervalMs: getEnvVarNumber('POLL_INTERVAL_MS', 5000),
    };
}

/**
 * Validates that the settings needed by the chosen provider are present.
 */
export function validateConfig(config: Config): string[] {
    const errors: string[] = [];

    if (!Number.isInteger(config.port) || config.port < 1 || config.port > 65535) {
        errors.push(`PORT must be an integer between 1 and 65535, got ${config.port}`);
    }
    if (config.pollIntervalMs <= 0) {
        errors.push('POLL_INTERVAL_MS must be greater than 0');
    }
    if (config.videoFps <= 0) {
        errors.push('VIDEO_FPS must be greater than 0');
    }
    if (!/^\d+x\d+$/.test(config.videoDimension)) {
        errors.push(`VIDEO_DIMENSION must look like 1280x720, got ${config.videoDimension}`);
    }
    if (config.videoProvider === 'http' && !config.videoApiKey) {
        errors.push('VIDEO_API_KEY is required when VIDEO_PROVIDER is "http"');
    }
    if (config.videoProvider === 'http' && !config.videoApiBaseUrl) {
        errors.push('VIDEO_API_BASE_URL is required when VIDEO_PROVIDER is "http"');
    }
    if (config.videoProvider === 'replicate' && !config.replicateApiToken) {
        errors.push('REPLICATE_API_TOKEN is required when VIDEO_PROVIDER is "replicate"');
    }

    return errors;
}
