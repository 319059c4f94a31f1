/**
 * Talking-avatar characters with their supported styles, and the neural
 * voices offered to callers.
 */

export const AVATAR_STYLES: Readonly<Record<string, readonly string[]>> = {
    harry: ['business', 'casual', 'youthful'],
    jeff: ['business', 'formal'],
    lisa: ['casual-sitting', 'graceful-sitting', 'graceful-standing', 'technical-sitting', 'technical-standing'],
    lori: ['casual', 'graceful', 'formal'],
    max: ['business', 'casual', 'formal'],
    meg: ['formal', 'casual', 'business'],
};

export const VOICES: Readonly<Record<'female' | 'male', readonly string[]>> = {
    female: ['th-TH-PremwadeeNeural', 'th-TH-AcharaNeural'],
    male: ['th-TH-NiwatNeural'],
};

export const ALL_VOICES: readonly string[] = [...VOICES.female, ...VOICES.male];

export const DEFAULT_VOICE = 'th-TH-NiwatNeural';
export const DEFAULT_CHARACTER = 'harry';
export const DEFAULT_STYLE = 'casual';

export interface AvatarParameters {
    voice: string;
    avatarCharacter: string;
    avatarStyle: string;
}

/**
 * Checks voice, character and style against the catalog.
 * @returns A message describing the first invalid value, or null when all are valid
 */
export function validateAvatarParameters(params: AvatarParameters): string | null {
    if (!ALL_VOICES.includes(params.voice)) {
        return `Invalid voice '${params.voice}'. See GET /voices for options.`;
    }

    if (!Object.prototype.hasOwnProperty.call(AVATAR_STYLES, params.avatarCharacter)) {
        return `Invalid character '${params.avatarCharacter}'. See GET /models for options.`;
    }

    const styles = AVATAR_STYLES[params.avatarCharacter];
    if (!styles.includes(params.avatarStyle)) {
        return `Invalid style '${params.avatarStyle}' for character '${params.avatarCharacter}'. Valid: ${styles.join(', ')}`;
    }

    return null;
}
