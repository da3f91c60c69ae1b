import { PersistenceFailure, fail, ok, type Result } from './errors';
import type { MediaStats, ShortsRepository } from './repository';
import type { ShortBuild, ShortRecord } from './types';
import { error, errorMessage, info } from './log';

export class ShortBuildRecorder {
  constructor(private readonly repo: ShortsRepository) {}

  /**
   * Store the finished short and a zeroed analytics row for it. A failure here
   * leaves a valid file on disk that the store does not know about, so it is
   * logged under its own event with the orphaned path.
   */
  async record(build: ShortBuild, media: MediaStats): Promise<Result<ShortRecord, PersistenceFailure>> {
    try {
      const saved = await this.repo.recordBuild(build, media);
      info('record.saved', { id: saved.id, videoId: build.videoId, platform: build.platform, outputPath: build.outputPath });
      return ok(saved);
    } catch (e) {
      const failure = new PersistenceFailure(`Could not record short for ${build.videoId}`, build.outputPath, {
        videoId: build.videoId,
        platform: build.platform,
        cause: errorMessage(e),
      });
      error('record.persist.fail', {
        videoId: build.videoId,
        platform: build.platform,
        orphanedPath: build.outputPath,
        error: errorMessage(e),
      });
      return fail(failure);
    }
  }
}
