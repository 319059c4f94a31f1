import { SynthesisRequest } from '../entities/SynthesisRequest';
import { PollOutcome } from '../entities/AvatarJob';

export interface PollRequestOptions {
    /** Upper bound for this request, in milliseconds */
    timeoutMs?: number;
}

/**
 * IAvatarSynthesisClient - Port for batch talking-avatar synthesis providers.
 * Implementations issue one request per call and hold no per-job state, so a
 * single instance serves any number of concurrent jobs.
 * Implementations: AzureAvatarSynthesisClient
 */
export interface IAvatarSynthesisClient {
    /**
     * Creates a synthesis job.
     * @returns The provider job id
     * @throws ProviderUnavailableError on transport failure, rate limit or server error
     * @throws ProviderRejectedError when the provider refuses the request
     */
    submit(request: SynthesisRequest): Promise<string>;

    /**
     * Reads the current status of a job.
     * A request still in flight after `timeoutMs` fails as unavailable.
     * @throws ProviderUnavailableError on transport failure, rate limit or server error
     * @throws ProviderRejectedError when the provider refuses the query
     */
    poll(jobId: string, options?: PollRequestOptions): Promise<PollOutcome>;
}
