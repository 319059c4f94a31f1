import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

/**
 * Application configuration loaded from environment variables.
 */
export interface Config {
    // Server
    port: number;
    environment: string;

    // Key callers must present (X-API-Key header or `key` body field)
    apiKey: string;

    // Azure Speech batch avatar synthesis
    azureSpeechKey: string;
    azureAvatarEndpoint: string;
    azureAvatarApiVersion: string;
    providerRequestTimeoutMs: number;

    // Job polling
    jobTimeoutSeconds: number;
    pollIntervalSeconds: number;

    // Cloudinary (video storage)
    cloudinaryCloudName: string;
    cloudinaryApiKey: string;
    cloudinaryApiSecret: string;
    cloudinaryFolder: string;
}

function getEnvVar(key: string, defaultValue?: string): string {
    let value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }

    // Trim whitespace and remove wrapping quotes
    value = value.trim();
    if (value.startsWith('"') && value.endsWith('"')) {
        value = value.substring(1, value.length - 1);
    } else if (value.startsWith("'") && value.endsWith("'")) {
        value = value.substring(1, value.length - 1);
    }

    return value;
}

function getEnvVarNumber(key: string, defaultValue?: number): number {
    const value = getEnvVar(key, defaultValue?.toString());
    const parsed = parseFloat(value);
    if (isNaN(parsed)) {
        throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
    }
    return parsed;
}

/**
 * Loads configuration from environment variables.
 */
export function loadConfig(): Config {
    return {
        // Server
        port: getEnvVarNumber('PORT', 3300),
        environment: getEnvVar('NODE_ENV', 'development'),

        apiKey: getEnvVar('API_KEY'),

        // Azure
        azureSpeechKey: getEnvVar('AZURE_SPEECH_KEY'),
        azureAvatarEndpoint: getEnvVar('AZURE_AVATAR_ENDPOINT').replace(/\/+$/, ''),
        azureAvatarApiVersion: getEnvVar('AZURE_AVATAR_API_VERSION', '2024-08-01'),
        providerRequestTimeoutMs: getEnvVarNumber('PROVIDER_REQUEST_TIMEOUT_MS', 30000),

        // Polling
        jobTimeoutSeconds: getEnvVarNumber('AVATAR_JOB_TIMEOUT_SECONDS', 600),
        pollIntervalSeconds: getEnvVarNumber('AVATAR_POLL_INTERVAL_SECONDS', 5),

        // Cloudinary
        cloudinaryCloudName: getEnvVar('CLOUDINARY_CLOUD_NAME'),
        cloudinaryApiKey: getEnvVar('CLOUDINARY_API_KEY'),
        cloudinaryApiSecret: getEnvVar('CLOUDINARY_API_SECRET'),
        cloudinaryFolder: getEnvVar('CLOUDINARY_FOLDER', 'avatar_videos'),
    };
}

/**
 * Validates credentials and polling limits.
 */
export function validateConfig(config: Config): string[] {
    const errors: string[] = [];

    if (!config.apiKey) {
        errors.push('API_KEY is required to authenticate callers');
    }
    if (!config.azureSpeechKey) {
        errors.push('AZURE_SPEECH_KEY is required for avatar synthesis');
    }
    if (!config.azureAvatarEndpoint) {
        errors.push('AZURE_AVATAR_ENDPOINT is required for avatar synthesis');
    }
    if (!config.cloudinaryCloudName || !config.cloudinaryApiKey || !config.cloudinaryApiSecret) {
        errors.push('Cloudinary credentials are required to store generated videos');
    }
    if (config.jobTimeoutSeconds <= 0) {
        errors.push('AVATAR_JOB_TIMEOUT_SECONDS must be greater than 0');
    }
    if (config.pollIntervalSeconds <= 0) {
        errors.push('AVATAR_POLL_INTERVAL_SECONDS must be greater than 0');
    } else if (config.pollIntervalSeconds > config.jobTimeoutSeconds) {
        errors.push('AVATAR_POLL_INTERVAL_SECONDS cannot exceed AVATAR_JOB_TIMEOUT_SECONDS');
    }
    if (config.providerRequestTimeoutMs <= 0) {
        errors.push('PROVIDER_REQUEST_TIMEOUT_MS must be greater than 0');
    }

    return errors;
}

// Singleton config instance (lazy loaded)
let cachedConfig: Config | null = null;

export function getConfig(): Config {
    if (!cachedConfig) {
        cachedConfig = loadConfig();
    }
    return cachedConfig;
}

export function resetConfig(): void {
    cachedConfig = null;
}
