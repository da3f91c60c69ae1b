import type { Effect, PlatformKey, PlatformProfile } from './types';

export const PLATFORM_KEYS: readonly PlatformKey[] = ['tiktok', 'youtube_shorts', 'instagram_reels'];

function profile(
    key: PlatformKey,
    outputDir: string,
    effects: Effect[],
    minDurationSec = 70,
    maxDurationSec = 90
): PlatformProfile {
    return {
        key,
        aspectRatio: '9:16',
        width: 1080,
        height: 1920,
        minDurationSec,
        maxDurationSec,
        captionStyle: key,
        effects: new Set(effects),
        outputDir,
    };
}

export const PLATFORMS: Readonly<Record<PlatformKey, PlatformProfile>> = {
    tiktok: profile('tiktok', 'tiktok', ['zoom', 'text_animations', 'transitions', 'filters']),
    youtube_shorts: profile('youtube_shorts', 'youtube', ['zoom', 'text_animations', 'transitions']),
    instagram_reels: profile('instagram_reels', 'instagram', ['zoom', 'text_animations', 'transitions', 'filters']),
};

export function isPlatformKey(v: string): v is PlatformKey {
    return PLATFORM_KEYS.some((k) => k === v);
}

export function getPlatform(key: string): PlatformProfile {
    if (!isPlatformKey(key)) {
        throw new Error(`Unknown platform "${key}". Expected one of: ${PLATFORM_KEYS.join(', ')}`);
    }
    return PLATFORMS[key];
}

export interface CaptionStyle {
    fontName: string;
    fontSize: number;
    /** ASS colour literals, &HAABBGGRR */
    primaryColour: string;
    outlineColour: string;
    borderStyle: number;
    alignment: number;
    marginV: number;
    hookColour: string;
    ctaColour: string;
}

export const CAPTION_STYLES: Readonly<Record<PlatformKey, CaptionStyle>> = {
    tiktok: {
        fontName: 'Arial',
        fontSize: 32,
        primaryColour: '&H00FFFFFF',
        outlineColour: '&H00000000',
        borderStyle: 3,
        alignment: 2,
        marginV: 50,
        hookColour: '&H0000FFFF',
        ctaColour: '&H0000FF00',
    },
    youtube_shorts: {
        fontName: 'Arial',
        fontSize: 28,
        primaryColour: '&H00FFFFFF',
        outlineColour: '&H00000000',
        borderStyle: 3,
        alignment: 2,
        marginV: 40,
        hookColour: '&H0000FFFF',
        ctaColour: '&H0000FF00',
    },
    instagram_reels: {
        fontName: 'Arial',
        fontSize: 30,
        primaryColour: '&H00FFFFFF',
        outlineColour: '&H00000000',
        borderStyle: 3,
        alignment: 2,
        marginV: 45,
        hookColour: '&H0000FFFF',
        ctaColour: '&H0000FF00',
    },
};

export const HOOK_PROMPTS: Readonly<Record<PlatformKey, readonly string[]>> = {
    tiktok: ['🎯 Wait for it...', '🔥 You need to hear this', '👀 Nobody talks about this'],
    youtube_shorts: ['🎯 Watch until the end', '💡 This changes everything', '👀 Most people miss this'],
    instagram_reels: ['✨ Save this for later', '🎯 Stop scrolling', '💡 Here is the secret'],
};

// The CTA audio stage speaks these through spokenPrompt(), which drops the emoji.
export const CTA_PROMPTS: Readonly<Record<PlatformKey, readonly string[]>> = {
    tiktok: [
        'Follow for more content like this! 🔥',
        'Follow me for exclusive content! 💯',
        'Follow and turn on notifications! 🚀',
        'Like and follow for more! ⭐',
    ],
    youtube_shorts: [
        'Subscribe and hit the bell! 🔔',
        'Like and subscribe for more! 👍',
        'Join the community! 💎',
        'Subscribe so you never miss one! 🎯',
    ],
    instagram_reels: [
        'Follow for more content! ✨',
        'Follow and turn on notifications! 🔥',
        'Double tap and follow! 💫',
        'Follow me for exclusive content! 🌟',
    ],
};

/** Prompt text without the trailing emoji, for speech synthesis. */
export function spokenPrompt(prompt: string): string {
    return prompt.replace(/[^\p{L}\p{N}\s.,!?'’-]/gu, '').replace(/\s+/g, ' ').trim();
}
