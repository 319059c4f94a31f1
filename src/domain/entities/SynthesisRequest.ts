/**
 * Input for one talking-avatar synthesis job.
 */
export interface SynthesisRequest {
    /** Plain text the avatar speaks */
    readonly text: string;
    /** Neural voice name, e.g. 'th-TH-NiwatNeural' */
    readonly voice: string;
    /** Talking avatar character, e.g. 'harry' */
    readonly avatarCharacter: string;
    /** Style of the chosen character, e.g. 'casual' */
    readonly avatarStyle: string;
    /** Optional background image; a solid white background is used otherwise */
    readonly backgroundImageUrl?: string;
}

/**
 * Builds a frozen SynthesisRequest. Optional fields that are absent stay absent.
 */
export function createSynthesisRequest(input: SynthesisRequest): SynthesisRequest {
    const request: SynthesisRequest = {
        text: input.text,
        voice: input.voice,
        avatarCharacter: input.avatarCharacter,
        avatarStyle: input.avatarStyle,
        ...(input.backgroundImageUrl ? { backgroundImageUrl: input.backgroundImageUrl } : {}),
    };
    return Object.freeze(request);
}
