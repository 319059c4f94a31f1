import { IAvatarSynthesisClient } from '../domain/ports/IAvatarSynthesisClient';
import { SynthesisRequest } from '../domain/entities/SynthesisRequest';
import {
    AvatarJob,
    applyPollOutcome,
    createAvatarJob,
    failJob,
    isJobTerminal,
    markJobSubmitted,
    recordPollAttempt,
    recordTransientError,
    timeOutJob,
} from '../domain/entities/AvatarJob';
import {
    ProviderRejectedError,
    ProviderUnavailableError,
} from '../domain/errors/AvatarGenerationErrors';

/**
 * Clock and sleep used by the poll loop.
 */
export interface PollingTimer {
    /** Current time in epoch milliseconds */
    now(): number;
    sleep(ms: number): Promise<void>;
}

export const systemTimer: PollingTimer = {
    now: () => Date.now(),
    sleep: (ms: number) => new Promise(resolve => setTimeout(resolve, ms)),
};

export interface JobPollingOptions {
    /** Wall-clock budget from submission to a terminal state */
    timeoutMs: number;
    /** Fixed delay between status queries */
    pollIntervalMs: number;
}

/** Log every Nth non-terminal status to keep long jobs readable */
const STATUS_LOG_EVERY = 6;

/**
 * Runs one avatar synthesis job from submission to a terminal state.
 *
 * The budget is checked before every poll: once it is used up the job is
 * marked timed out and the provider is not queried again. Each status request
 * and each sleep is capped by the time left in the budget. Transport failures
 * while polling are counted and retried on the next tick.
 */
export class AvatarJobPoller {
    private job: AvatarJob = createAvatarJob();
    private started = false;

    constructor(
        private readonly client: IAvatarSynthesisClient,
        private readonly options: JobPollingOptions,
        private readonly timer: PollingTimer = systemTimer
    ) {
        if (!(options.timeoutMs > 0)) {
            throw new Error('timeoutMs must be positive');
        }
        if (!(options.pollIntervalMs > 0)) {
            throw new Error('pollIntervalMs must be positive');
        }
    }

    /**
     * Snapshot of the job as it currently stands.
     */
    get current(): AvatarJob {
        return { ...this.job };
    }

    async run(request: SynthesisRequest): Promise<AvatarJob> {
        if (this.started) {
            throw new Error('AvatarJobPoller runs a single job; create a new poller per request');
        }
        this.started = true;

        const jobId = await this.submit(request);
        if (jobId === null) {
            return this.current;
        }

        const submittedAt = this.timer.now();
        const deadline = submittedAt + this.options.timeoutMs;
        this.job = markJobSubmitted(this.job, jobId, submittedAt);
        console.log(`[AvatarJob] ${jobId} submitted. Polling every ${this.options.pollIntervalMs / 1000}s for up to ${this.options.timeoutMs / 1000}s...`);

        while (!isJobTerminal(this.job)) {
            const now = this.timer.now();
            if (now >= deadline) {
                this.job = timeOutJob(this.job, now);
                console.warn(`[AvatarJob] ${jobId} timed out after ${this.job.pollCount} polls (${this.job.transientErrorCount} transient errors)`);
                break;
            }

            await this.pollOnce(jobId, deadline - now);

            const remaining = deadline - this.timer.now();
            if (!isJobTerminal(this.job) && remaining > 0) {
                await this.timer.sleep(Math.min(this.options.pollIntervalMs, remaining));
            }
        }

        if (this.job.state === 'succeeded') {
            console.log(`[AvatarJob] ${jobId} succeeded after ${this.job.pollCount} polls: ${this.job.artifactUrl}`);
        } else if (this.job.state === 'failed') {
            console.error(`[AvatarJob] ${jobId} failed: ${this.job.errorDetail}`);
        }

        return this.current;
    }

    /**
     * @returns The provider job id, or null when submission failed and the job is already terminal
     */
    private async submit(request: SynthesisRequest): Promise<string | null> {
        try {
            return await this.client.submit(request);
        } catch (error) {
            if (!(error instanceof ProviderUnavailableError || error instanceof ProviderRejectedError)) {
                throw error;
            }
            const kind = error instanceof ProviderUnavailableError ? 'provider_unavailable' : 'provider_rejected';
            this.job = failJob(this.job, error.message, kind, this.timer.now());
            console.error(`[AvatarJob] Submission failed: ${error.message}`);
            return null;
        }
    }

    private async pollOnce(jobId: string, timeoutMs: number): Promise<void> {
        this.job = recordPollAttempt(this.job);
        const attempt = this.job.pollCount;

        try {
            const outcome = await this.client.poll(jobId, { timeoutMs });
            this.job = applyPollOutcome(this.job, outcome, this.timer.now());

            if (!isJobTerminal(this.job) && attempt % STATUS_LOG_EVERY === 0) {
                console.log(`[AvatarJob] ${jobId} status: ${outcome.providerStatus ?? outcome.state} (poll ${attempt})`);
            }
        } catch (error) {
            if (error instanceof ProviderUnavailableError) {
                this.job = recordTransientError(this.job);
                console.warn(`[AvatarJob] Poll ${attempt} for ${jobId} failed, will retry: ${error.message}`);
                return;
            }
            if (error instanceof ProviderRejectedError) {
                this.job = failJob(this.job, error.message, 'provider_rejected', this.timer.now());
                return;
            }
            throw error;
        }
    }
}
