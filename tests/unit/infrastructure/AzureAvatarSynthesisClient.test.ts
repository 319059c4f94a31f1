import nock from 'nock';
import {
    AzureAvatarSynthesisClient,
    mapAzureStatus,
} from '../../../src/infrastructure/avatar/AzureAvatarSynthesisClient';
import { createSynthesisRequest } from '../../../src/domain/entities/SynthesisRequest';
import {
    ProviderRejectedError,
    ProviderUnavailableError,
} from '../../../src/domain/errors/AvatarGenerationErrors';

const ENDPOINT = 'https://avatar.test';
const SPEECH_KEY = 'test-speech-key';
const JOB_PATH = /\/avatar\/batchsyntheses\/[0-9a-f-]{36}/;
const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe('AzureAvatarSynthesisClient', () => {
    const client = new AzureAvatarSynthesisClient(SPEECH_KEY, `${ENDPOINT}/`);
    const request = createSynthesisRequest({
        text: 'สวัสดี',
        voice: 'th-TH-NiwatNeural',
        avatarCharacter: 'harry',
        avatarStyle: 'casual',
    });

    const azure = () => nock(ENDPOINT, { reqheaders: { 'Ocp-Apim-Subscription-Key': SPEECH_KEY } });

    beforeAll(() => {
        nock.disableNetConnect();
    });

    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => { });
        jest.spyOn(console, 'warn').mockImplementation(() => { });
    });

    afterEach(() => {
        nock.cleanAll();
        jest.restoreAllMocks();
    });

    afterAll(() => {
        nock.enableNetConnect();
    });

    describe('constructor', () => {
        it('should require a speech key', () => {
            expect(() => new AzureAvatarSynthesisClient('', ENDPOINT)).toThrow('Azure speech key is required');
        });

        it('should require an endpoint', () => {
            expect(() => new AzureAvatarSynthesisClient(SPEECH_KEY, '')).toThrow('Azure avatar endpoint is required');
        });
    });

    describe('submit', () => {
        it('should create the job with a generated id and the batch payload', async () => {
            let body: unknown;
            const scope = azure()
                .put(JOB_PATH, (b) => { body = b; return true; })
                .query({ 'api-version': '2024-08-01' })
                .reply(201, { status: 'NotStarted' });

            const jobId = await client.submit(request);

            expect(jobId).toMatch(UUID);
            expect(body).toEqual({
                inputKind: 'PlainText',
                synthesisConfig: { voice: 'th-TH-NiwatNeural' },
                customVoices: {},
                inputs: [{ content: 'สวัสดี' }],
                avatarConfig: {
                    talkingAvatarCharacter: 'harry',
                    talkingAvatarStyle: 'casual',
                    customized: false,
                    videoFormat: 'mp4',
                    videoCodec: 'h264',
                    subtitleType: 'soft_embedded',
                    useBuiltInVoice: false,
                    backgroundColor: '#FFFFFFFF',
                },
            });
            expect(scope.isDone()).toBe(true);
        });

        it('should use the background image instead of the white background', async () => {
            let body: { avatarConfig?: Record<string, unknown> } = {};
            azure()
                .put(JOB_PATH, (b) => { body = b; return true; })
                .query(true)
                .reply(201, {});

            await client.submit(createSynthesisRequest({ ...request, backgroundImageUrl: 'https://images.test/office.jpg' }));

            expect(body.avatarConfig?.backgroundImage).toBe('https://images.test/office.jpg');
            expect(body.avatarConfig).not.toHaveProperty('backgroundColor');
        });

        it('should generate a different id for every job', async () => {
            azure().put(JOB_PATH).query(true).times(2).reply(201, {});

            const first = await client.submit(request);
            const second = await client.submit(request);

            expect(first).not.toBe(second);
        });

        it('should classify a 400 as a rejection', async () => {
            azure()
                .put(JOB_PATH)
                .query(true)
                .reply(400, { error: { code: 'InvalidArgument', message: 'bad voice' } });

            const error = await client.submit(request).catch((e: unknown) => e);

            expect(error).toBeInstanceOf(ProviderRejectedError);
            expect(error).toHaveProperty('statusCode', 400);
            expect(error).toHaveProperty(
                'message',
                'Avatar job creation rejected [400]: {"error":{"code":"InvalidArgument","message":"bad voice"}}'
            );
        });

        it.each([429, 500, 503])('should classify HTTP %i as unavailable', async (status) => {
            azure().put(JOB_PATH).query(true).reply(status, {});

            const error = await client.submit(request).catch((e: unknown) => e);

            expect(error).toBeInstanceOf(ProviderUnavailableError);
            expect(error).toHaveProperty('statusCode', status);
            expect(error).toHaveProperty('message', `Avatar job creation failed: HTTP ${status}`);
        });

        it('should classify a transport failure as unavailable', async () => {
            azure().put(JOB_PATH).query(true).replyWithError('connect ECONNREFUSED');

            const error = await client.submit(request).catch((e: unknown) => e);

            expect(error).toBeInstanceOf(ProviderUnavailableError);
            expect(error).toHaveProperty('message', 'Avatar job creation failed: connect ECONNREFUSED');
        });
    });

    describe('poll', () => {
        const statusPath = '/avatar/batchsyntheses/job-1';

        it('should return the artifact URL on success', async () => {
            azure()
                .get(statusPath)
                .query({ 'api-version': '2024-08-01' })
                .reply(200, { id: 'job-1', status: 'Succeeded', outputs: { result: 'https://provider/x.mp4' } });

            await expect(client.poll('job-1')).resolves.toEqual({
                state: 'succeeded',
                providerStatus: 'Succeeded',
                artifactUrl: 'https://provider/x.mp4',
            });
        });

        it('should report success without an artifact when outputs are missing', async () => {
            azure().get(statusPath).query(true).reply(200, { id: 'job-1', status: 'Succeeded' });

            await expect(client.poll('job-1')).resolves.toEqual({
                state: 'succeeded',
                providerStatus: 'Succeeded',
            });
        });

        it.each([
            ['NotStarted', 'submitted'],
            ['Running', 'running'],
        ])('should map %s to %s', async (status, state) => {
            azure().get(statusPath).query(true).reply(200, { id: 'job-1', status });

            await expect(client.poll('job-1')).resolves.toEqual({ state, providerStatus: status });
        });

        it('should format the provider error on failure', async () => {
            azure()
                .get(statusPath)
                .query(true)
                .reply(200, {
                    id: 'job-1',
                    status: 'Failed',
                    properties: { error: { code: 'InvalidText', message: 'Text too long' } },
                });

            const outcome = await client.poll('job-1');

            expect(outcome.state).toBe('failed');
            expect(outcome.errorDetail).toBe('InvalidText: Text too long');
        });

        it('should fall back to the response body when the failure has no error object', async () => {
            azure().get(statusPath).query(true).reply(200, { id: 'job-1', status: 'Failed' });

            const outcome = await client.poll('job-1');

            expect(outcome.errorDetail).toBe('Avatar job failed: {"id":"job-1","status":"Failed"}');
        });

        it('should keep polling on an unrecognized status', async () => {
            azure().get(statusPath).query(true).reply(200, { id: 'job-1', status: 'Paused' });

            const outcome = await client.poll('job-1');

            expect(outcome.state).toBe('running');
            expect(console.warn).toHaveBeenCalledWith("[Azure] Unrecognized job status 'Paused', treating as running");
        });

        it('should classify a transport failure as unavailable', async () => {
            azure().get(statusPath).query(true).replyWithError('socket hang up');

            const error = await client.poll('job-1').catch((e: unknown) => e);

            expect(error).toBeInstanceOf(ProviderUnavailableError);
            expect(error).toHaveProperty('message', 'Avatar job job-1 status check failed: socket hang up');
        });

        it('should cap the request at the remaining budget', async () => {
            azure().get(statusPath).query(true).delayConnection(500).reply(200, { id: 'job-1', status: 'Running' });

            const error = await client.poll('job-1', { timeoutMs: 50 }).catch((e: unknown) => e);

            expect(error).toBeInstanceOf(ProviderUnavailableError);
        });

        it('should classify a 404 as a rejection', async () => {
            azure().get(statusPath).query(true).reply(404, 'Not Found');

            const error = await client.poll('job-1').catch((e: unknown) => e);

            expect(error).toBeInstanceOf(ProviderRejectedError);
            expect(error).toHaveProperty('statusCode', 404);
            expect(error).toHaveProperty('message', 'Avatar job job-1 status check rejected [404]: Not Found');
        });
    });

    describe('mapAzureStatus', () => {
        it('should ignore case', () => {
            expect(mapAzureStatus('SUCCEEDED')).toBe('succeeded');
            expect(mapAzureStatus('failed')).toBe('failed');
            expect(mapAzureStatus('notStarted')).toBe('submitted');
        });

        it('should treat a missing status as running', () => {
            expect(mapAzureStatus(undefined)).toBe('running');
        });
    });
});
