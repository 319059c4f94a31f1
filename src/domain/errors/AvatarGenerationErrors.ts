/**
 * Error taxonomy for avatar video generation.
 *
 * Provider errors (`ProviderUnavailableError`, `ProviderRejectedError`) are
 * raised by provider clients and classified by the job poller. Only
 * `InvalidInputError`, `UpstreamError` and `JobTimeoutError` leave the
 * generation service.
 */

export abstract class AvatarGenerationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'AvatarGenerationError';
    }
}

/**
 * The caller sent a request that cannot be submitted.
 */
export class InvalidInputError extends AvatarGenerationError {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidInputError';
    }
}

/**
 * The provider could not be reached, or answered with a rate limit or server error.
 */
export class ProviderUnavailableError extends AvatarGenerationError {
    constructor(
        message: string,
        public readonly statusCode?: number
    ) {
        super(message);
        this.name = 'ProviderUnavailableError';
    }
}

/**
 * The provider answered with a client error (4xx other than 429).
 */
export class ProviderRejectedError extends AvatarGenerationError {
    constructor(
        message: string,
        public readonly statusCode: number
    ) {
        super(message);
        this.name = 'ProviderRejectedError';
    }
}

/**
 * The job failed on the provider side, or its artifact could not be stored.
 */
export class UpstreamError extends AvatarGenerationError {
    constructor(
        message: string,
        public readonly jobId?: string
    ) {
        super(message);
        this.name = 'UpstreamError';
    }
}

/**
 * The job did not reach a terminal state within its budget.
 */
export class JobTimeoutError extends AvatarGenerationError {
    constructor(
        public readonly jobId: string,
        public readonly timeoutSeconds: number
    ) {
        super(`Avatar job ${jobId} did not finish within ${timeoutSeconds}s`);
        this.name = 'JobTimeoutError';
    }
}

export class StorageError extends AvatarGenerationError {
    constructor(message: string) {
        super(message);
        this.name = 'StorageError';
    }
}
