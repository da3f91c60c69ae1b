import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { afterEach, describe, it, expect, vi } from 'vitest';
import { MediaAssemblyPipeline } from '../src/pipeline/assemble';
import { BackgroundClipAllocator } from '../src/pipeline/backgrounds';
import { ArtifactNarrationProvider, ArtifactTranscriptProvider, type TranscriptProvider } from '../src/pipeline/collaborators';
import { MissingInputError, PersistenceFailure } from '../src/pipeline/errors';
import { setLogLevel } from '../src/pipeline/log';
import { ShortBuildRecorder } from '../src/pipeline/record';
import { ViralScorer } from '../src/pipeline/score';
import { batchBuild, buildShort, describeOutcome, windowText, type BuildOutcome, type ShortsDeps } from '../src/pipeline/shorts';
import { FakeToolRunner, fakeToolkit, touch } from './support/fake-tools';
import { MemoryShortsRepository } from './support/memory-repository';

const NOW = new Date(2026, 0, 2, 3, 4, 5);
const roots: string[] = [];

afterEach(async () => {
  setLogLevel('error');
  vi.restoreAllMocks();
  await Promise.all(roots.splice(0).map((r) => fs.remove(r)));
});

const SEGMENTS = [
  { startSec: 0, endSec: 40, text: 'Why is the secret to money so simple?' },
  { startSec: 40, endSec: 80, text: 'Most people never learn this one thing.' },
];

async function writeVideo(artifacts: string, videoId: string) {
  await fs.outputJson(path.join(artifacts, videoId, 'transcript.json'), { videoId, segments: SEGMENTS });
  await touch(path.join(artifacts, videoId, 'narration.wav'));
}

async function setup() {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), 'shorts-'));
  roots.push(root);
  const artifacts = path.join(root, 'artifacts');
  const shortsRoot = path.join(root, 'shorts');
  const backgroundsRoot = path.join(root, 'backgrounds');
  await writeVideo(artifacts, 'vid123');
  await touch(path.join(backgroundsRoot, 'motivation', 'a.mp4'));

  const repo = new MemoryShortsRepository();
  repo.addClip({ filename: 'a.mp4', theme: 'motivation', durationSec: 90 });
  const runner = new FakeToolRunner();
  // narration is 300s long; the assembled short matches the 80s window
  runner.probe = (file) => (file.includes(`${path.sep}platforms${path.sep}`) ? 80 : 300);
  const toolkit = fakeToolkit(runner);

  const deps: ShortsDeps = {
    repo,
    transcripts: new ArtifactTranscriptProvider(artifacts),
    narration: new ArtifactNarrationProvider(artifacts),
    toolkit,
    scorer: new ViralScorer(),
    allocator: new BackgroundClipAllocator(
      repo,
      { acquire: async () => [] },
      { defaultTheme: 'motivation', batchSize: 3, backgroundsRoot }
    ),
    pipeline: new MediaAssemblyPipeline(toolkit, null, {
      shortsRoot,
      captionFormat: 'ass',
      ctaAudio: false,
      thumbnailOffsetSec: 5,
      promptOffset: 0,
      now: () => NOW,
    }),
    recorder: new ShortBuildRecorder(repo),
  };
  return { root, artifacts, shortsRoot, repo, runner, deps };
}

const opts = { policy: 'skip' as const, topK: 3, minScore: 0, defaultTheme: 'motivation', now: () => NOW };

describe('buildShort', () => {
  it('builds, records and seeds analytics for the best moment', async () => {
    const { shortsRoot, repo, deps } = await setup();
    const out = await buildShort(deps, 'vid123', 'tiktok', opts);

    expect(out.status).toBe('built');
    if (out.status !== 'built') return;
    expect(out.moment.startSec).toBe(0);
    expect(out.moment.endSec).toBe(80);
    expect(out.window).toMatchObject({ startSec: 0, durationSec: 80, extension: null });
    expect(out.output.outputPath).toBe(path.join(shortsRoot, 'platforms', 'tiktok', 'short_vid123_20260102_030405.mp4'));
    expect(out.record).toMatchObject({ id: 1, videoId: 'vid123', platform: 'tiktok', createdAt: NOW.toISOString() });
    expect(repo.analytics.get('vid123|tiktok')).toMatchObject({ durationSec: 80, views: 0, status: 'created' });
    expect(repo.usage).toEqual([{ fondId: 1, videoId: 'vid123' }]);
    expect(await fs.pathExists(out.output.outputPath)).toBe(true);
  });

  it('skips a video that already has a short under the skip policy', async () => {
    const { runner, deps } = await setup();
    await buildShort(deps, 'vid123', 'tiktok', opts);
    const before = runner.calls.length;

    const again = await buildShort(deps, 'vid123', 'tiktok', opts);
    expect(again).toMatchObject({ status: 'skipped', reason: 'already-built' });
    expect(runner.calls.length).toBe(before);
  });

  it('rebuilds and overwrites the record under the replace policy', async () => {
    const { repo, deps } = await setup();
    await buildShort(deps, 'vid123', 'tiktok', opts);
    await repo.updatePerformance('vid123', 'tiktok', { views: 99 });

    const again = await buildShort(deps, 'vid123', 'tiktok', { ...opts, policy: 'replace' });
    expect(again.status).toBe('built');
    expect(again.status === 'built' && again.record.id).toBe(1);
    expect(repo.shorts.size).toBe(1);
    expect(repo.analytics.get('vid123|tiktok')?.views).toBe(0);
  });

  it('builds a separate short per platform', async () => {
    const { repo, deps } = await setup();
    await buildShort(deps, 'vid123', 'tiktok', opts);
    const yt = await buildShort(deps, 'vid123', 'youtube_shorts', opts);
    expect(yt.status).toBe('built');
    expect([...repo.shorts.keys()].sort()).toEqual(['vid123|tiktok', 'vid123|youtube_shorts']);
  });

  it('fails with MissingInputError when the transcript is absent', async () => {
    const { deps } = await setup();
    const out = await buildShort(deps, 'nothing1', 'tiktok', opts);
    expect(out.status).toBe('failed');
    if (out.status !== 'failed') return;
    expect(out.error).toBeInstanceOf(MissingInputError);
    expect(describeOutcome(out)).toBe('failed: MissingInputError: No transcript for nothing1 (code: missing_input)');
  });

  it('fails with MissingInputError when the narration audio is absent', async () => {
    const { artifacts, runner, deps } = await setup();
    await fs.remove(path.join(artifacts, 'vid123', 'narration.wav'));
    const out = await buildShort(deps, 'vid123', 'tiktok', opts);
    expect(out.status).toBe('failed');
    if (out.status !== 'failed') return;
    expect(out.error).toBeInstanceOf(MissingInputError);
    expect(describeOutcome(out)).toBe('failed: MissingInputError: No narration audio for vid123 (code: missing_input)');
    expect(runner.calls).toEqual([]);
  });

  it('normalizes against the measured narration and times captions to the trimmed track', async () => {
    const { artifacts, runner, deps } = await setup();
    runner.probe = (file) => {
      if (file.endsWith('narration.m4a')) return 60;
      return file.includes(`${path.sep}platforms${path.sep}`) ? 80 : 300;
    };
    const out = await buildShort(deps, 'vid123', 'tiktok', opts);
    if (out.status !== 'built') throw new Error(`expected a build, got ${describeOutcome(out)}`);

    expect(runner.calls[0]).toMatchObject({ tool: 'ffprobe', label: 'acquire-narration' });
    expect(runner.calls[0].args[runner.calls[0].args.length - 1]).toBe(path.join(artifacts, 'vid123', 'narration.wav'));
    expect(out.window.sourceDurationSec).toBe(300);
    const cta = out.output.cues.filter((c) => c.role === 'cta');
    expect(cta[0].startSec).toBe(30);
    expect(cta[cta.length - 1].endSec).toBe(60);
  });

  it('tags every log line of the build with the video and platform', async () => {
    const { deps } = await setup();
    const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    setLogLevel('info');
    await buildShort(deps, 'vid123', 'tiktok', opts);

    const entries: unknown[] = spy.mock.calls.map((c) => JSON.parse(String(c[0])));
    expect(entries.length).toBeGreaterThan(0);
    for (const entry of entries) {
      expect(entry).toMatchObject({ videoId: 'vid123', platform: 'tiktok' });
    }
    expect(entries).toContainEqual(expect.objectContaining({ msg: 'start:stage.trim', stage: 'trim' }));
  });

  it('reports no viral moment instead of failing', async () => {
    const { runner, deps } = await setup();
    const out = await buildShort(deps, 'vid123', 'tiktok', { ...opts, minScore: 1.1 });
    expect(out).toMatchObject({ status: 'skipped', reason: 'no-viral-moment' });
    expect(describeOutcome(out)).toBe('skipped: no viral moment found');
    expect(runner.calls).toEqual([]);
  });

  it('falls back to the default theme when the video theme has no clips', async () => {
    const { repo, deps } = await setup();
    await repo.ensureVideo({ id: 'vid123', theme: 'space' });
    const out = await buildShort(deps, 'vid123', 'tiktok', opts);
    expect(out.status).toBe('built');
    expect(repo.usage).toEqual([{ fondId: 1, videoId: 'vid123' }]);
  });

  it('returns PersistenceFailure and leaves the orphaned file when recording fails', async () => {
    const { repo, deps } = await setup();
    repo.recordError = new Error('connection reset');
    const out = await buildShort(deps, 'vid123', 'tiktok', opts);
    expect(out.status).toBe('failed');
    if (out.status !== 'failed') return;
    expect(out.error).toBeInstanceOf(PersistenceFailure);
    const orphan = out.error instanceof PersistenceFailure ? out.error.outputPath : '';
    expect(await fs.pathExists(orphan)).toBe(true);
  });

  it('mirrors the build log into a per-run file', async () => {
    const { shortsRoot, deps } = await setup();
    await buildShort(deps, 'vid123', 'tiktok', { ...opts, runLog: true, shortsRoot });
    expect(await fs.pathExists(path.join(shortsRoot, 'logs', 'vid123', `run-${NOW.getTime()}.log`))).toBe(true);
  });
});

describe('batchBuild', () => {
  it('builds what it can and counts the rest', async () => {
    const { repo, deps } = await setup();
    await repo.ensureVideo({ id: 'vid123' });
    await repo.ensureVideo({ id: 'vid999' });
    const seen: string[] = [];

    const summary = await batchBuild(deps, 'tiktok', 10, { ...opts, onOutcome: (o) => seen.push(`${o.videoId}:${o.status}`) });
    expect(summary).toMatchObject({ total: 2, built: 1, skipped: 0, failed: 1 });
    expect(seen).toEqual(['vid123:built', 'vid999:failed']);
  });

  it('skips a video with an empty transcript and moves on', async () => {
    const { artifacts, repo, deps } = await setup();
    await fs.outputJson(path.join(artifacts, 'empty01', 'transcript.json'), { text: '', segments: [] });
    await repo.ensureVideo({ id: 'empty01' });
    await repo.ensureVideo({ id: 'vid123' });

    const summary = await batchBuild(deps, 'tiktok', 10, opts);
    expect(summary.outcomes.map((o) => `${o.videoId}:${o.status}`)).toEqual(['empty01:skipped', 'vid123:built']);
    expect(summary).toMatchObject({ built: 1, skipped: 1, failed: 0 });
  });

  it('only picks videos without a short under the skip policy', async () => {
    const { repo, deps } = await setup();
    await repo.ensureVideo({ id: 'vid123' });
    await buildShort(deps, 'vid123', 'tiktok', opts);
    const summary = await batchBuild(deps, 'tiktok', 10, opts);
    expect(summary.total).toBe(0);
  });

  it('keeps going after an unexpected error', async () => {
    const { repo, deps } = await setup();
    await repo.ensureVideo({ id: 'aaa111' });
    await repo.ensureVideo({ id: 'vid123' });
    const real = deps.transcripts;
    const flaky: TranscriptProvider = {
      load: (id) => (id === 'aaa111' ? Promise.reject(new Error('bug')) : real.load(id)),
    };

    const summary = await batchBuild({ ...deps, transcripts: flaky }, 'tiktok', 10, opts);
    expect(summary.outcomes.map((o) => o.status)).toEqual(['failed', 'built']);
    const first = summary.outcomes[0];
    expect(first.status === 'failed' && first.error.message).toBe('bug');
  });
});

describe('windowText', () => {
  const transcript = { videoId: 'v', text: 'all', segments: SEGMENTS };

  it('collects the segments overlapping the window', () => {
    const w = { startSec: 50, durationSec: 20, endSec: 70, sourceDurationSec: 300, extension: null };
    expect(windowText(transcript, w, 'fallback')).toBe('Most people never learn this one thing.');
  });

  it('falls back when no segment overlaps', () => {
    const w = { startSec: 100, durationSec: 70, endSec: 170, sourceDurationSec: 300, extension: null };
    expect(windowText(transcript, w, 'fallback')).toBe('fallback');
  });
});

describe('describeOutcome', () => {
  it('summarizes skips', () => {
    const o: BuildOutcome = { status: 'skipped', videoId: 'v', platform: 'tiktok', reason: 'already-built' };
    expect(describeOutcome(o)).toBe('skipped: already built');
  });
});
