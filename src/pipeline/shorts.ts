import path from 'path';
import { ENV, type RebuildPolicy } from './env';
import { ShortsError } from './errors';
import { MediaAssemblyPipeline, type AssemblyOutput } from './assemble';
import { BackgroundClipAllocator } from './backgrounds';
import {
  ArtifactNarrationProvider,
  ArtifactTranscriptProvider,
  CommandNarrationSynthesizer,
  DirectoryBackgroundAcquirer,
  type NarrationAudioProvider,
  type TranscriptProvider,
} from './collaborators';
import { normalizeMoment, type NormalizedWindow } from './normalize';
import { getPlatform } from './platforms';
import { ShortBuildRecorder } from './record';
import { PgShortsRepository, type ShortsRepository } from './repository';
import { ViralScorer } from './score';
import { ExecaToolRunner, MediaToolkit } from './toolkit';
import type { PlatformKey, PlatformProfile, ShortRecord, Transcript, ViralMoment } from './types';
import { closeLogFile, error, errorMessage, info, setLogFile, startStep, warn, withLogContext } from './log';

export interface ShortsDeps {
  repo: ShortsRepository;
  transcripts: TranscriptProvider;
  narration: NarrationAudioProvider;
  toolkit: MediaToolkit;
  scorer: ViralScorer;
  allocator: BackgroundClipAllocator;
  pipeline: MediaAssemblyPipeline;
  recorder: ShortBuildRecorder;
}

export interface BuildOptions {
  policy?: RebuildPolicy;
  topK?: number;
  minScore?: number;
  defaultTheme?: string;
  /** Mirror log lines into <shortsRoot>/logs/<videoId>/run-<ms>.log */
  runLog?: boolean;
  shortsRoot?: string;
  now?: () => Date;
}

export type SkipReason = 'already-built' | 'no-viral-moment';

export type BuildOutcome =
  | {
      status: 'built';
      videoId: string;
      platform: PlatformKey;
      moment: ViralMoment;
      window: NormalizedWindow;
      output: AssemblyOutput;
      record: ShortRecord;
    }
  | { status: 'skipped'; videoId: string; platform: PlatformKey; reason: SkipReason; existing?: ShortRecord }
  | { status: 'failed'; videoId: string; platform: PlatformKey; error: Error };

export function createDefaultDeps(): ShortsDeps {
  const runner = new ExecaToolRunner();
  const toolkit = new MediaToolkit(runner);
  const repo = new PgShortsRepository();
  const acquirer = new DirectoryBackgroundAcquirer(
    toolkit,
    async (theme) => new Set((await repo.listBackgrounds(theme)).map((c) => c.filename))
  );
  const synthesizer = ENV.ttsBin ? new CommandNarrationSynthesizer(runner) : null;
  return {
    repo,
    transcripts: new ArtifactTranscriptProvider(),
    narration: new ArtifactNarrationProvider(),
    toolkit,
    scorer: new ViralScorer(),
    allocator: new BackgroundClipAllocator(repo, acquirer),
    pipeline: new MediaAssemblyPipeline(toolkit, synthesizer),
    recorder: new ShortBuildRecorder(repo),
  };
}

/**
 * Caption text for the normalized window: the transcript segments it overlaps,
 * or the moment's own text when the transcript carries no timing.
 */
export function windowText(transcript: Transcript, window: NormalizedWindow, fallback: string): string {
  const text = transcript.segments
    .filter((s) => s.endSec > window.startSec && s.startSec < window.endSec)
    .map((s) => s.text.trim())
    .filter(Boolean)
    .join(' ');
  return text || fallback;
}

/** Every log line emitted while the build runs carries its videoId and platform. */
export async function buildShort(
  deps: ShortsDeps,
  videoId: string,
  platformKey: PlatformKey,
  opts: BuildOptions = {}
): Promise<BuildOutcome> {
  const platform = getPlatform(platformKey);
  return withLogContext({ videoId, platform: platform.key }, () => runBuild(deps, videoId, platform, opts));
}

async function runBuild(
  deps: ShortsDeps,
  videoId: string,
  platform: PlatformProfile,
  opts: BuildOptions
): Promise<BuildOutcome> {
  const policy = opts.policy ?? ENV.rebuildPolicy;
  const now = opts.now ?? (() => new Date());

  if (policy === 'skip') {
    const existing = await deps.repo.findShort(videoId, platform.key);
    if (existing) {
      info('build.skip', { reason: 'already-built', outputPath: existing.outputPath });
      return { status: 'skipped', videoId, platform: platform.key, reason: 'already-built', existing };
    }
  }

  if (opts.runLog) {
    const root = opts.shortsRoot ?? ENV.shortsRoot;
    setLogFile(path.join(root, 'logs', videoId, `run-${now().getTime()}.log`));
  }
  const timer = startStep('build', { policy });
  try {
    const transcript = await deps.transcripts.load(videoId);
    if (!transcript.ok) throw transcript.error;

    const moments = deps.scorer.findViralMoments(transcript.value, {
      topK: opts.topK ?? ENV.viralTopK,
      minScore: opts.minScore ?? ENV.viralMinScore,
    });
    if (!moments.length) {
      info('build.no-moment', { message: 'no viral moment found' });
      timer.end({ status: 'skipped' });
      return { status: 'skipped', videoId, platform: platform.key, reason: 'no-viral-moment' };
    }
    const moment = moments[0];
    info('build.moment', { title: moment.title, score: moment.score, startSec: moment.startSec, endSec: moment.endSec });

    const narration = await deps.narration.locate(videoId);
    if (!narration.ok) throw narration.error;
    const narrationDurationSec = await deps.toolkit.probeDuration(narration.value, 'acquire-narration');
    const window = normalizeMoment(moment, narrationDurationSec, platform);
    info('build.window', { ...window, extension: window.extension ?? undefined });

    const video = await deps.repo.getVideo(videoId);
    const theme = video?.theme || opts.defaultTheme || ENV.defaultTheme;
    const allocation = await deps.allocator.allocate(theme, window.durationSec, { videoId });
    if (!allocation.ok) throw allocation.error;

    const assembled = await deps.pipeline.run({
      videoId,
      platform,
      narrationPath: narration.value,
      window,
      backgrounds: allocation.value,
      narrationText: windowText(transcript.value, window, moment.text),
    });
    if (!assembled.ok) throw assembled.error;

    const output = assembled.value;
    const recorded = await deps.recorder.record(
      {
        videoId,
        platform: platform.key,
        outputPath: output.outputPath,
        thumbnailPath: output.thumbnailPath,
        moment,
        createdAt: now().toISOString(),
      },
      { durationSec: output.durationSec, fileSizeBytes: output.fileSizeBytes }
    );
    if (!recorded.ok) throw recorded.error;

    timer.end({ status: 'built', outputPath: output.outputPath });
    return { status: 'built', videoId, platform: platform.key, moment, window, output, record: recorded.value };
  } catch (e) {
    if (e instanceof ShortsError) {
      error('build.fail', { code: e.code, error: e.toString() });
      return { status: 'failed', videoId, platform: platform.key, error: e };
    }
    throw e;
  } finally {
    if (opts.runLog) closeLogFile();
  }
}

export function describeOutcome(o: BuildOutcome): string {
  switch (o.status) {
    case 'built':
      return `built ${o.output.outputPath} (${o.output.durationSec.toFixed(1)}s, score ${o.moment.score.toFixed(2)})`;
    case 'skipped':
      return o.reason === 'already-built' ? 'skipped: already built' : 'skipped: no viral moment found';
    case 'failed':
      return `failed: ${o.error instanceof ShortsError ? o.error.toString() : errorMessage(o.error)}`;
  }
}

export interface BatchSummary {
  platform: PlatformKey;
  total: number;
  built: number;
  skipped: number;
  failed: number;
  outcomes: BuildOutcome[];
}

/**
 * Build shorts for up to `limit` candidate videos, one after another. One
 * video failing, even unexpectedly, never stops the batch.
 */
export async function batchBuild(
  deps: ShortsDeps,
  platformKey: PlatformKey,
  limit: number,
  opts: BuildOptions & { onOutcome?: (o: BuildOutcome, index: number, total: number) => void } = {}
): Promise<BatchSummary> {
  const platform = getPlatform(platformKey);
  const policy = opts.policy ?? ENV.rebuildPolicy;
  const ids = await deps.repo.listBuildCandidates(platform.key, limit, policy);
  const summary: BatchSummary = { platform: platform.key, total: ids.length, built: 0, skipped: 0, failed: 0, outcomes: [] };
  const timer = startStep('batch', { platform: platform.key, total: ids.length, policy });

  for (const [i, videoId] of ids.entries()) {
    let outcome: BuildOutcome;
    try {
      outcome = await buildShort(deps, videoId, platform.key, { ...opts, policy });
    } catch (e) {
      error('batch.item.error', { videoId, platform: platform.key, error: errorMessage(e) });
      outcome = {
        status: 'failed',
        videoId,
        platform: platform.key,
        error: e instanceof Error ? e : new Error(String(e)),
      };
    }
    summary[outcome.status]++;
    summary.outcomes.push(outcome);
    opts.onOutcome?.(outcome, i, ids.length);
    timer.eta(i + 1, ids.length);
  }

  if (!ids.length) warn('batch.empty', { platform: platform.key, policy });
  timer.end({ built: summary.built, skipped: summary.skipped, failed: summary.failed });
  return summary;
}
