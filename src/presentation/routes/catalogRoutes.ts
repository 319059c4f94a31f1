import { Router, Request, Response } from 'express';
import { AVATAR_STYLES, VOICES } from '../../domain/services/AvatarCatalog';

/**
 * Read-only catalog of the characters, styles and voices callers may request.
 */
export function createCatalogRoutes(): Router {
    const router = Router();

    router.get('/models', (_req: Request, res: Response) => {
        res.json({ avatars: AVATAR_STYLES });
    });

    router.get('/voices', (_req: Request, res: Response) => {
        res.json({ voices: VOICES });
    });

    return router;
}
