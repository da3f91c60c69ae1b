import path from 'path';
import { ENV } from './env';
import { MissingInputError, fail, ok, type Result } from './errors';
import type { BackgroundAcquirer } from './collaborators';
import type { ShortsRepository } from './repository';
import type { BackgroundClip } from './types';
import { debug, errorMessage, info, warn } from './log';

/** Nominal length credited to a clip whose duration was never probed. */
export const UNKNOWN_CLIP_SEC = 30;

export interface Allocation {
  theme: string;
  clips: BackgroundClip[];
  paths: string[];
  totalDurationSec: number;
  /** The pool ran out before the need was met; concatenation repeats the list. */
  loop: boolean;
}

export interface AllocatorOptions {
  defaultTheme?: string;
  batchSize?: number;
  backgroundsRoot?: string;
}

export function clipPath(root: string, clip: Pick<BackgroundClip, 'theme' | 'filename'>): string {
  return path.join(root, clip.theme, clip.filename);
}

export function nominalDuration(clip: Pick<BackgroundClip, 'durationSec'>): number {
  const d = clip.durationSec;
  return d !== null && Number.isFinite(d) && d > 0 ? d : UNKNOWN_CLIP_SEC;
}

export class BackgroundClipAllocator {
  private readonly defaultTheme: string;
  private readonly batchSize: number;
  private readonly root: string;

  constructor(
    private readonly repo: ShortsRepository,
    private readonly acquirer: BackgroundAcquirer,
    opts: AllocatorOptions = {}
  ) {
    this.defaultTheme = opts.defaultTheme ?? ENV.defaultTheme;
    this.batchSize = opts.batchSize ?? ENV.backgroundBatchSize;
    this.root = opts.backgroundsRoot ?? ENV.backgroundsRoot;
  }

  /**
   * Claim background clips for a theme until their summed length covers
   * durationNeededSec. An empty pool triggers acquisition, then the default
   * theme; when that is empty as well the build has no visuals and fails.
   */
  async allocate(
    theme: string,
    durationNeededSec: number,
    opts: { videoId: string }
  ): Promise<Result<Allocation, MissingInputError>> {
    const attempts = theme === this.defaultTheme ? [theme] : [theme, this.defaultTheme];
    for (const t of attempts) {
      if (t !== theme) warn('allocator.fallback', { from: theme, to: t, videoId: opts.videoId });

      let clips = await this.claimUntil(t, durationNeededSec, opts.videoId);
      if (!clips.length) {
        const added = await this.acquire(t);
        if (added > 0) clips = await this.claimUntil(t, durationNeededSec, opts.videoId);
      }
      if (clips.length) {
        const totalDurationSec = clips.reduce((s, c) => s + nominalDuration(c), 0);
        const allocation: Allocation = {
          theme: t,
          clips,
          paths: clips.map((c) => clipPath(this.root, c)),
          totalDurationSec,
          loop: totalDurationSec < durationNeededSec,
        };
        info('allocator.done', {
          videoId: opts.videoId,
          theme: t,
          clips: clips.map((c) => c.id),
          totalDurationSec,
          durationNeededSec,
          loop: allocation.loop,
        });
        return ok(allocation);
      }
    }
    return fail(
      new MissingInputError(`No background clip available for theme "${theme}"`, {
        theme,
        defaultTheme: this.defaultTheme,
        videoId: opts.videoId,
      })
    );
  }

  private async claimUntil(theme: string, durationNeededSec: number, videoId: string): Promise<BackgroundClip[]> {
    const clips: BackgroundClip[] = [];
    let covered = 0;
    while (covered < durationNeededSec) {
      const clip = await this.repo.claimBackground(theme, videoId, clips.map((c) => c.id));
      if (!clip) break;
      debug('allocator.claim', { theme, id: clip.id, usageCount: clip.usageCount });
      clips.push(clip);
      covered += nominalDuration(clip);
    }
    return clips;
  }

  /** Returns how many clips were added to the pool; failures count as none. */
  private async acquire(theme: string): Promise<number> {
    try {
      const fresh = await this.acquirer.acquire(theme, this.batchSize);
      const added = await this.repo.registerBackgrounds(fresh);
      info('allocator.acquire', { theme, requested: this.batchSize, added: added.length });
      return added.length;
    } catch (e) {
      warn('allocator.acquire.fail', { theme, error: errorMessage(e) });
      return 0;
    }
  }
}
