/**
 * Base class for errors raised by the generation workflow.
 */
export class GenerationError extends Error {
    constructor(
        public readonly code: string,
        message: string
    ) {
        super(message);
        this.name = 'GenerationError';
    }
}

/**
 * Bad input shape (image count, unknown style). Raised before any remote call.
 */
export class ValidationError extends GenerationError {
    constructor(message: string, code: string = 'VALIDATION_ERROR') {
        super(code, message);
        this.name = 'ValidationError';
    }
}

export class UnknownStyleError extends ValidationError {
    constructor(public readonly styleName: string) {
        super(`Unknown style: ${styleName}`, 'UNKNOWN_STYLE');
        this.name = 'UnknownStyleError';
    }
}

/**
 * The remote service could not be reached or rejected our credentials.
 * Retriable; local job state is left untouched.
 */
export class ServiceUnavailableError extends GenerationError {
    constructor(message: string = 'Video generation service unavailable') {
        super('SERVICE_UNAVAILABLE', message);
        this.name = 'ServiceUnavailableError';
    }
}

/**
 * The job id is not known locally.
 */
export class JobNotFoundError extends GenerationError {
    constructor(public readonly jobId: string) {
        super('NOT_FOUND', `Job not found: ${jobId}`);
        this.name = 'JobNotFoundError';
    }
}

/**
 * The result was requested before the job succeeded.
 */
export class NotReadyError extends GenerationError {
    constructor(public readonly jobId: string, status: string) {
        super('NOT_READY', `Job ${jobId} is not ready (status: ${status})`);
        this.name = 'NotReadyError';
    }
}

/**
 * The remote service reported that generation failed. Terminal.
 */
export class GenerationFailedError extends GenerationError {
    constructor(
        public readonly jobId: string,
        public readonly reason: string
    ) {
        super('GENERATION_FAILED', `Job ${jobId} failed: ${reason}`);
        this.name = 'GenerationFailedError';
    }
}
