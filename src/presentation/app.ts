import express, { Application, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import { Config } from '../config';
import { AvatarGenerationService } from '../application/AvatarGenerationService';
import { AzureAvatarSynthesisClient } from '../infrastructure/avatar/AzureAvatarSynthesisClient';
import { CloudinaryStorageRelay } from '../infrastructure/storage/CloudinaryStorageRelay';
import { createApiKeyAuth } from './middleware/apiKeyAuth';
import { createAvatarRoutes } from './routes/avatarRoutes';
import { createCatalogRoutes } from './routes/catalogRoutes';
import { errorHandler, NotFoundError } from './middleware/errorHandler';

/**
 * Creates and configures the Express application.
 * A prebuilt generation service may be passed in place of the configured one.
 */
export function createApp(config: Config, generationService?: AvatarGenerationService): Application {
    const app = express();

    // Middleware
    app.use(cors());
    app.use(express.json());

    // Health check
    app.get('/health', (_req: Request, res: Response) => {
        res.json({
            status: 'ok',
            timestamp: new Date().toISOString(),
            version: '1.0.0',
        });
    });

    const service = generationService ?? createGenerationService(config);

    // Routes
    app.use(createCatalogRoutes());
    app.use(createAvatarRoutes(service, createApiKeyAuth(config.apiKey)));

    app.use((req: Request, _res: Response, next: NextFunction) => {
        next(new NotFoundError(`No route for ${req.method} ${req.path}`));
    });

    // Error handler (must be last)
    app.use(errorHandler);

    return app;
}

/**
 * Wires the Azure provider client and Cloudinary relay into the generation service.
 */
export function createGenerationService(config: Config): AvatarGenerationService {
    const synthesisClient = new AzureAvatarSynthesisClient(
        config.azureSpeechKey,
        config.azureAvatarEndpoint,
        config.azureAvatarApiVersion,
        config.providerRequestTimeoutMs
    );
    const storageRelay = new CloudinaryStorageRelay(
        config.cloudinaryCloudName,
        config.cloudinaryApiKey,
        config.cloudinaryApiSecret,
        config.cloudinaryFolder
    );
    console.log(`✅ Avatar synthesis: Azure (${config.azureAvatarEndpoint}) → Cloudinary (${config.cloudinaryFolder})`);

    return new AvatarGenerationService(
        { synthesisClient, storageRelay },
        {
            jobTimeoutSeconds: config.jobTimeoutSeconds,
            pollIntervalSeconds: config.pollIntervalSeconds,
        }
    );
}
