/**
 * Lifecycle states of one avatar synthesis job.
 *
 * idle → submitted → running → succeeded | failed | timed_out
 */
export type AvatarJobState =
    | 'idle'
    | 'submitted'
    | 'running'
    | 'succeeded'
    | 'failed'
    | 'timed_out';

/**
 * States a provider status query can report. `timed_out` is decided locally.
 */
export type ProviderJobState = 'submitted' | 'running' | 'succeeded' | 'failed';

export type AvatarJobFailureKind =
    | 'provider_unavailable'
    | 'provider_rejected'
    | 'job_failed'
    | 'missing_artifact';

/**
 * Result of a single status query.
 */
export interface PollOutcome {
    state: ProviderJobState;
    /** Present when the provider reports success */
    artifactUrl?: string;
    /** Present when the provider reports failure */
    errorDetail?: string;
    /** Raw status string as returned by the provider */
    providerStatus?: string;
}

/**
 * One in-flight or finished job. Owned by a single poller, never persisted.
 */
export interface AvatarJob {
    /** Provider-side id; absent while idle or when submission failed */
    jobId?: string;
    state: AvatarJobState;
    /** Epoch ms at which submission succeeded */
    submittedAt?: number;
    /** Epoch ms at which the job reached a terminal state */
    completedAt?: number;
    /** Status queries issued, including ones that failed in transport */
    pollCount: number;
    transientErrorCount: number;
    artifactUrl?: string;
    errorDetail?: string;
    failureKind?: AvatarJobFailureKind;
}

const TRANSITIONS: Record<AvatarJobState, readonly AvatarJobState[]> = {
    idle: ['submitted', 'failed'],
    submitted: ['running', 'succeeded', 'failed', 'timed_out'],
    running: ['running', 'succeeded', 'failed', 'timed_out'],
    succeeded: [],
    failed: [],
    timed_out: [],
};

export function isTerminalState(state: AvatarJobState): boolean {
    return TRANSITIONS[state].length === 0;
}

export function isJobTerminal(job: AvatarJob): boolean {
    return isTerminalState(job.state);
}

function assertTransition(job: AvatarJob, next: AvatarJobState): void {
    if (!TRANSITIONS[job.state].includes(next)) {
        throw new Error(`Invalid avatar job transition: ${job.state} -> ${next}`);
    }
}

export function createAvatarJob(): AvatarJob {
    return {
        state: 'idle',
        pollCount: 0,
        transientErrorCount: 0,
    };
}

export function markJobSubmitted(job: AvatarJob, jobId: string, at: number): AvatarJob {
    if (!jobId.trim()) {
        throw new Error('AvatarJob id cannot be empty');
    }
    assertTransition(job, 'submitted');
    return {
        ...job,
        jobId,
        state: 'submitted',
        submittedAt: at,
    };
}

/**
 * Applies a poll outcome. Any non-terminal outcome moves the job to `running`;
 * a success without an artifact URL is treated as a failure.
 */
export function applyPollOutcome(job: AvatarJob, outcome: PollOutcome, at: number): AvatarJob {
    switch (outcome.state) {
        case 'succeeded':
            if (!outcome.artifactUrl) {
                return failJob(job, 'Avatar job succeeded but no result URL was returned', 'missing_artifact', at);
            }
            assertTransition(job, 'succeeded');
            return {
                ...job,
                state: 'succeeded',
                artifactUrl: outcome.artifactUrl,
                completedAt: at,
            };
        case 'failed':
            return failJob(job, outcome.errorDetail || 'Unknown provider error', 'job_failed', at);
        default:
            assertTransition(job, 'running');
            return { ...job, state: 'running' };
    }
}

export function failJob(
    job: AvatarJob,
    errorDetail: string,
    failureKind: AvatarJobFailureKind,
    at: number
): AvatarJob {
    assertTransition(job, 'failed');
    return {
        ...job,
        state: 'failed',
        errorDetail,
        failureKind,
        completedAt: at,
    };
}

export function timeOutJob(job: AvatarJob, at: number): AvatarJob {
    assertTransition(job, 'timed_out');
    return {
        ...job,
        state: 'timed_out',
        completedAt: at,
    };
}

export function recordPollAttempt(job: AvatarJob): AvatarJob {
    return { ...job, pollCount: job.pollCount + 1 };
}

export function recordTransientError(job: AvatarJob): AvatarJob {
    return { ...job, transientErrorCount: job.transientErrorCount + 1 };
}
