import { IAvatarSynthesisClient } from '../domain/ports/IAvatarSynthesisClient';
import { IStorageRelay } from '../domain/ports/IStorageRelay';
import { SynthesisRequest } from '../domain/entities/SynthesisRequest';
import { AvatarJob } from '../domain/entities/AvatarJob';
import {
    InvalidInputError,
    JobTimeoutError,
    StorageError,
    UpstreamError,
} from '../domain/errors/AvatarGenerationErrors';
import { AvatarJobPoller, PollingTimer, systemTimer } from './AvatarJobPoller';

export interface AvatarGenerationDependencies {
    synthesisClient: IAvatarSynthesisClient;
    storageRelay: IStorageRelay;
    /** Clock and sleep for the poll loop; real time when omitted */
    timer?: PollingTimer;
}

export interface AvatarGenerationOptions {
    jobTimeoutSeconds: number;
    pollIntervalSeconds: number;
}

export interface AvatarGenerationResult {
    /** Provider job id, usable as a correlation token */
    jobId: string;
    /** URL of the stored video */
    artifactUrl: string;
}

/**
 * Entry point for avatar video generation: one submit, a bounded number of
 * polls, then a relay of the finished video to storage. Each call runs its
 * own poller, so concurrent calls share nothing but the injected clients.
 */
export class AvatarGenerationService {
    private readonly timer: PollingTimer;

    constructor(
        private readonly deps: AvatarGenerationDependencies,
        private readonly options: AvatarGenerationOptions
    ) {
        this.timer = deps.timer ?? systemTimer;
    }

    /**
     * @throws InvalidInputError when the request is not well formed
     * @throws UpstreamError when the provider fails the job or storage fails
     * @throws JobTimeoutError when the job is still running once the budget is spent
     */
    async generate(request: SynthesisRequest): Promise<AvatarGenerationResult> {
        this.validate(request);

        const poller = new AvatarJobPoller(
            this.deps.synthesisClient,
            {
                timeoutMs: this.options.jobTimeoutSeconds * 1000,
                pollIntervalMs: this.options.pollIntervalSeconds * 1000,
            },
            this.timer
        );
        const job = await poller.run(request);

        switch (job.state) {
            case 'succeeded':
                return this.relay(job);
            case 'timed_out':
                throw new JobTimeoutError(job.jobId ?? 'unknown', this.options.jobTimeoutSeconds);
            default:
                throw new UpstreamError(job.errorDetail ?? `Avatar job ended in state '${job.state}'`, job.jobId);
        }
    }

    private validate(request: SynthesisRequest): void {
        if (typeof request.text !== 'string' || request.text.trim().length === 0) {
            throw new InvalidInputError("Missing 'text' field");
        }

        const identifiers: Array<[string, unknown]> = [
            ['voice', request.voice],
            ['avatarCharacter', request.avatarCharacter],
            ['avatarStyle', request.avatarStyle],
        ];
        for (const [field, value] of identifiers) {
            if (typeof value !== 'string' || value.trim().length === 0) {
                throw new InvalidInputError(`'${field}' must be a non-empty string`);
            }
        }
    }

    private async relay(job: AvatarJob): Promise<AvatarGenerationResult> {
        if (!job.jobId || !job.artifactUrl) {
            throw new UpstreamError('Avatar job succeeded without a result URL', job.jobId);
        }

        try {
            const artifactUrl = await this.deps.storageRelay.upload(job.artifactUrl, { publicId: job.jobId });
            return { jobId: job.jobId, artifactUrl };
        } catch (error) {
            if (error instanceof StorageError) {
                throw new UpstreamError(error.message, job.jobId);
            }
            throw error;
        }
    }
}
