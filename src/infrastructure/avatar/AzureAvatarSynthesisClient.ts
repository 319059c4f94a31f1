import axios from 'axios';
import { v4 as uuidv4 } from 'uuid';
import { IAvatarSynthesisClient, PollRequestOptions } from '../../domain/ports/IAvatarSynthesisClient';
import { SynthesisRequest } from '../../domain/entities/SynthesisRequest';
import { PollOutcome, ProviderJobState } from '../../domain/entities/AvatarJob';
import {
    ProviderRejectedError,
    ProviderUnavailableError,
} from '../../domain/errors/AvatarGenerationErrors';

/**
 * Response body of the batch avatar synthesis endpoint (fields we read).
 */
interface AzureBatchSynthesisResponse {
    id?: string;
    status?: string;
    outputs?: {
        result?: string;
        summary?: string;
    };
    properties?: {
        error?: {
            code?: string;
            message?: string;
        };
    };
}

/**
 * Provider status vocabulary. Lookups are case-insensitive; unknown values map to 'running'.
 */
const AZURE_STATUS_MAP: ReadonlyMap<string, ProviderJobState> = new Map([
    ['notstarted', 'submitted'],
    ['running', 'running'],
    ['succeeded', 'succeeded'],
    ['failed', 'failed'],
]);

export function mapAzureStatus(status: string | undefined): ProviderJobState {
    const mapped = status ? AZURE_STATUS_MAP.get(status.toLowerCase()) : undefined;
    if (!mapped) {
        console.warn(`[Azure] Unrecognized job status '${status ?? ''}', treating as running`);
        return 'running';
    }
    return mapped;
}

/**
 * Azure Speech batch avatar synthesis client.
 *
 * Job ids are generated locally and the job is created with a PUT to
 * `/avatar/batchsyntheses/{id}`; the same URL is read back for status.
 */
export class AzureAvatarSynthesisClient implements IAvatarSynthesisClient {
    private readonly speechKey: string;
    private readonly endpoint: string;
    private readonly apiVersion: string;
    private readonly requestTimeoutMs: number;

    constructor(
        speechKey: string,
        endpoint: string,
        apiVersion: string = '2024-08-01',
        requestTimeoutMs: number = 30000
    ) {
        if (!speechKey) {
            throw new Error('Azure speech key is required');
        }
        if (!endpoint) {
            throw new Error('Azure avatar endpoint is required');
        }
        this.speechKey = speechKey;
        this.endpoint = endpoint.replace(/\/+$/, '');
        this.apiVersion = apiVersion;
        this.requestTimeoutMs = requestTimeoutMs;
    }

    async submit(request: SynthesisRequest): Promise<string> {
        const jobId = uuidv4();

        try {
            await axios.put(this.jobUrl(jobId), this.buildPayload(request), {
                headers: {
                    'Ocp-Apim-Subscription-Key': this.speechKey,
                    'Content-Type': 'application/json',
                },
                timeout: this.requestTimeoutMs,
            });
        } catch (error) {
            throw this.classifyError(error, 'Avatar job creation');
        }

        console.log(`[Azure] Job ${jobId} created (${request.avatarCharacter}/${request.avatarStyle}, ${request.voice})`);
        return jobId;
    }

    async poll(jobId: string, options: PollRequestOptions = {}): Promise<PollOutcome> {
        let data: AzureBatchSynthesisResponse;
        try {
            const response = await axios.get<AzureBatchSynthesisResponse>(this.jobUrl(jobId), {
                headers: { 'Ocp-Apim-Subscription-Key': this.speechKey },
                timeout: Math.min(this.requestTimeoutMs, options.timeoutMs ?? this.requestTimeoutMs),
            });
            data = response.data ?? {};
        } catch (error) {
            throw this.classifyError(error, `Avatar job ${jobId} status check`);
        }

        const state = mapAzureStatus(data.status);
        const outcome: PollOutcome = { state, providerStatus: data.status };

        if (state === 'succeeded' && data.outputs?.result) {
            outcome.artifactUrl = data.outputs.result;
        }
        if (state === 'failed') {
            outcome.errorDetail = this.describeFailure(data);
        }

        return outcome;
    }

    private jobUrl(jobId: string): string {
        return `${this.endpoint}/avatar/batchsyntheses/${encodeURIComponent(jobId)}?api-version=${this.apiVersion}`;
    }

    private buildPayload(request: SynthesisRequest) {
        return {
            inputKind: 'PlainText',
            synthesisConfig: { voice: request.voice },
            customVoices: {},
            inputs: [{ content: request.text }],
            avatarConfig: {
                talkingAvatarCharacter: request.avatarCharacter,
                talkingAvatarStyle: request.avatarStyle,
                customized: false,
                videoFormat: 'mp4',
                videoCodec: 'h264',
                subtitleType: 'soft_embedded',
                useBuiltInVoice: false,
                ...(request.backgroundImageUrl
                    ? { backgroundImage: request.backgroundImageUrl }
                    : { backgroundColor: '#FFFFFFFF' }),
            },
        };
    }

    private describeFailure(data: AzureBatchSynthesisResponse): string {
        const error = data.properties?.error;
        if (error?.message) {
            return error.code ? `${error.code}: ${error.message}` : error.message;
        }
        return `Avatar job failed: ${JSON.stringify(data)}`;
    }

    /**
     * Rate limits, server errors and requests that got no response are
     * transient; any other HTTP error is a rejection.
     */
    private classifyError(error: unknown, action: string): Error {
        if (!axios.isAxiosError(error)) {
            return error instanceof Error ? error : new Error(String(error));
        }

        const status = error.response?.status;
        if (status !== undefined && status >= 400 && status < 500 && status !== 429) {
            const body = error.response?.data;
            const text = typeof body === 'string' ? body : JSON.stringify(body ?? '');
            return new ProviderRejectedError(`${action} rejected [${status}]: ${text}`, status);
        }

        const reason = status !== undefined ? `HTTP ${status}` : error.message;
        return new ProviderUnavailableError(`${action} failed: ${reason}`, status);
    }
}
