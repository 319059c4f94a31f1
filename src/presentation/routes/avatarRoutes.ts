import { Router, Request, Response, RequestHandler } from 'express';
import { AvatarGenerationService } from '../../application/AvatarGenerationService';
import { createSynthesisRequest } from '../../domain/entities/SynthesisRequest';
import {
    DEFAULT_CHARACTER,
    DEFAULT_STYLE,
    DEFAULT_VOICE,
    validateAvatarParameters,
} from '../../domain/services/AvatarCatalog';
import { asyncHandler, BadRequestError } from '../middleware/errorHandler';

type RequestBody = Record<string, unknown>;

function readBody(req: Request): RequestBody {
    const body: unknown = req.body;
    if (typeof body === 'object' && body !== null && !Array.isArray(body)) {
        return { ...body };
    }
    return {};
}

function readString(body: RequestBody, field: string, defaultValue: string): string;
function readString(body: RequestBody, field: string): string | undefined;
function readString(body: RequestBody, field: string, defaultValue?: string): string | undefined {
    const value = body[field];
    if (value === undefined || value === null) {
        return defaultValue;
    }
    if (typeof value !== 'string') {
        throw new BadRequestError(`'${field}' must be a string`);
    }
    return value;
}

/**
 * Creates avatar generation routes with dependency injection.
 */
export function createAvatarRoutes(
    generationService: AvatarGenerationService,
    apiKeyAuth: RequestHandler
): Router {
    const router = Router();

    /**
     * POST /generate-avatar
     *
     * Generates a talking-avatar video and waits for it to finish.
     * Responds with the stored video URL and the provider job id.
     */
    router.post(
        '/generate-avatar',
        apiKeyAuth,
        asyncHandler(async (req: Request, res: Response) => {
            const body = readBody(req);

            const text = (readString(body, 'text') ?? '').trim();
            if (!text) {
                throw new BadRequestError("Missing 'text' field");
            }

            const voice = readString(body, 'voice', DEFAULT_VOICE);
            const avatarCharacter = readString(body, 'talkingAvatarCharacter', DEFAULT_CHARACTER);
            const avatarStyle = readString(body, 'talkingAvatarStyle', DEFAULT_STYLE);
            const background = readString(body, 'background');

            const invalid = validateAvatarParameters({ voice, avatarCharacter, avatarStyle });
            if (invalid) {
                throw new BadRequestError(invalid);
            }

            if (background) {
                try {
                    new URL(background);
                } catch {
                    throw new BadRequestError('background must be a valid URL');
                }
            }

            const result = await generationService.generate(createSynthesisRequest({
                text,
                voice,
                avatarCharacter,
                avatarStyle,
                backgroundImageUrl: background,
            }));

            res.json({
                success: true,
                video_url: result.artifactUrl,
                job_id: result.jobId,
            });
        })
    );

    return router;
}
