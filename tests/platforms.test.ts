import { describe, it, expect } from 'vitest';
import { toVideoId, isSafeVideoId } from '../src/pipeline/ids';
import { CTA_PROMPTS, HOOK_PROMPTS, PLATFORM_KEYS, PLATFORMS, getPlatform, isPlatformKey } from '../src/pipeline/platforms';

describe('platform profiles', () => {
  it('are all vertical 1080x1920 with the same duration bounds', () => {
    for (const key of PLATFORM_KEYS) {
      const p = PLATFORMS[key];
      expect([p.aspectRatio, p.width, p.height, p.minDurationSec, p.maxDurationSec]).toEqual(['9:16', 1080, 1920, 70, 90]);
      expect(HOOK_PROMPTS[key].length).toBeGreaterThan(0);
      expect(CTA_PROMPTS[key].length).toBeGreaterThan(0);
    }
  });

  it('leave colour filters off YouTube Shorts', () => {
    expect(getPlatform('youtube_shorts').effects.has('filters')).toBe(false);
    expect(getPlatform('tiktok').effects.has('filters')).toBe(true);
  });

  it('reject unknown keys', () => {
    expect(isPlatformKey('vine')).toBe(false);
    expect(() => getPlatform('vine')).toThrow('Unknown platform "vine". Expected one of: tiktok, youtube_shorts, instagram_reels');
  });
});

describe('video ids', () => {
  it('extracts ids from common URL shapes', () => {
    expect(toVideoId('https://www.youtube.com/watch?v=abcDEF123&t=4')).toBe('abcDEF123');
    expect(toVideoId('https://youtu.be/abcDEF123')).toBe('abcDEF123');
    expect(toVideoId('https://youtube.com/shorts/abcDEF123?feature=share')).toBe('abcDEF123');
    expect(toVideoId('  raw_id1 ')).toBe('raw_id1');
  });

  it('only accepts ids that are safe as path segments', () => {
    expect(isSafeVideoId('abc-DEF_1')).toBe(true);
    expect(isSafeVideoId('abc')).toBe(false);
    expect(isSafeVideoId('../etc/passwd')).toBe(false);
  });
});
