import { v2 as cloudinary } from 'cloudinary';
import { IStorageRelay, StorageRelayOptions } from '../../domain/ports/IStorageRelay';
import { StorageError } from '../../domain/errors/AvatarGenerationErrors';

/**
 * Copies generated avatar videos into Cloudinary as authenticated (signed
 * delivery only) video resources.
 */
export class CloudinaryStorageRelay implements IStorageRelay {
    private readonly folder: string;

    constructor(
        cloudName: string,
        apiKey: string,
        apiSecret: string,
        folder: string = 'avatar_videos'
    ) {
        if (!cloudName || !apiKey || !apiSecret) {
            throw new Error('Cloudinary credentials are required (cloudName, apiKey, apiSecret)');
        }

        cloudinary.config({
            cloud_name: cloudName,
            api_key: apiKey,
            api_secret: apiSecret,
            secure: true,
        });
        this.folder = folder;
    }

    /**
     * Cloudinary fetches the remote video itself, so nothing is downloaded locally.
     */
    async upload(sourceUrl: string, options: StorageRelayOptions = {}): Promise<string> {
        console.log(`[Storage] Uploading ${sourceUrl} to Cloudinary folder '${this.folder}'`);

        let secureUrl: string | undefined;
        try {
            const result = await cloudinary.uploader.upload(sourceUrl, {
                folder: this.folder,
                public_id: options.publicId,
                resource_type: 'video',
                type: 'authenticated',
                overwrite: true,
            });
            secureUrl = result.secure_url;
        } catch (error) {
            throw new StorageError(`Cloudinary upload failed: ${describeUploadError(error)}`);
        }

        if (!secureUrl) {
            throw new StorageError('Cloudinary upload returned no secure URL');
        }
        return secureUrl;
    }
}

/**
 * The SDK rejects with either an Error or a plain `{ message, http_code }` object.
 */
function describeUploadError(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
        return error.message;
    }
    return 'Unknown error';
}
