import fs from 'fs-extra';
import path from 'path';
import { ENV } from './env';
import { ExternalToolFailure, MissingInputError, fail, ok, type Result } from './errors';
import { stderrTail, type MediaToolkit, type ToolRunner } from './toolkit';
import type { NewBackgroundClip, Segment, Transcript } from './types';
import { debug, errorMessage, info, warn } from './log';

export interface TranscriptProvider {
  load(videoId: string): Promise<Result<Transcript, MissingInputError>>;
}

/**
 * Synthesized narration for a video. The transcript timings index into this
 * track, so the selected window is cut from it and muxed under the backgrounds.
 */
export interface NarrationAudioProvider {
  locate(videoId: string): Promise<Result<string, MissingInputError>>;
}

export interface SynthesisOptions {
  engine: string;
  voice: string;
}

export interface NarrationSynthesizer {
  /** Writes speech for text into outputPath. Options are per call; the synthesizer keeps no engine state. */
  synthesize(text: string, outputPath: string, opts: SynthesisOptions): Promise<void>;
}

export interface BackgroundAcquirer {
  acquire(theme: string, count: number): Promise<NewBackgroundClip[]>;
}

function toSegment(v: unknown): Segment | null {
  if (typeof v !== 'object' || v === null) return null;
  const o: Record<string, unknown> = { ...v };
  const startSec = Number(o.startSec ?? o.start);
  const endSec = Number(o.endSec ?? o.end);
  if (!Number.isFinite(startSec) || !Number.isFinite(endSec) || typeof o.text !== 'string') return null;
  return typeof o.speaker === 'string'
    ? { startSec, endSec, text: o.text, speaker: o.speaker }
    : { startSec, endSec, text: o.text };
}

/**
 * Accepts transcript.json as written by the transcription stage
 * ({ videoId, segments: [{ startSec, endSec, text }] }) and the bare
 * { text, segments: [{ start, end, text }] } shape.
 */
export function parseTranscript(videoId: string, raw: unknown): Transcript {
  const o: Record<string, unknown> = typeof raw === 'object' && raw !== null ? { ...raw } : {};
  const segments = (Array.isArray(o.segments) ? o.segments : [])
    .map(toSegment)
    .filter((s): s is Segment => s !== null);
  const text = typeof o.text === 'string' && o.text.trim() ? o.text : segments.map((s) => s.text.trim()).join(' ');
  const durationSec = Number(o.durationSec ?? o.duration);
  return {
    videoId,
    text,
    segments,
    ...(Number.isFinite(durationSec) && durationSec > 0 ? { durationSec } : {}),
  };
}

export class ArtifactTranscriptProvider implements TranscriptProvider {
  constructor(private readonly artifactsRoot = ENV.artifactsRoot) {}

  async load(videoId: string): Promise<Result<Transcript, MissingInputError>> {
    const file = path.join(this.artifactsRoot, videoId, 'transcript.json');
    if (!(await fs.pathExists(file))) {
      return fail(new MissingInputError(`No transcript for ${videoId}`, { videoId, path: file }));
    }
    let raw: unknown;
    try {
      raw = await fs.readJson(file);
    } catch (e) {
      return fail(new MissingInputError(`Unreadable transcript for ${videoId}`, { videoId, path: file, error: errorMessage(e) }));
    }
    return ok(parseTranscript(videoId, raw));
  }
}

const NARRATION_CANDIDATES = ['narration.wav', 'narration.mp3', 'narration.m4a', 'tts.wav', 'tts.mp3'];

/** Looks for <artifactsRoot>/<videoId>/narration.* as left by the speech synthesis stage. */
export class ArtifactNarrationProvider implements NarrationAudioProvider {
  constructor(
    private readonly artifactsRoot = ENV.artifactsRoot,
    private readonly candidates: readonly string[] = NARRATION_CANDIDATES
  ) {}

  async locate(videoId: string): Promise<Result<string, MissingInputError>> {
    const dir = path.join(this.artifactsRoot, videoId);
    for (const name of this.candidates) {
      const p = path.join(dir, name);
      if (await fs.pathExists(p)) {
        const stat = await fs.stat(p);
        if (stat.size > 0) return ok(p);
        warn('narration.empty', { videoId, path: p });
      }
    }
    return fail(
      new MissingInputError(`No narration audio for ${videoId}`, { videoId, dir, tried: [...this.candidates] })
    );
  }
}

/**
 * Speech synthesis through an external CLI:
 *   <bin> --engine E --voice V --text T --output O
 */
export class CommandNarrationSynthesizer implements NarrationSynthesizer {
  constructor(
    private readonly runner: ToolRunner,
    private readonly bin = ENV.ttsBin,
    private readonly timeoutSec = ENV.toolTimeouts.mux
  ) {}

  async synthesize(text: string, outputPath: string, opts: SynthesisOptions): Promise<void> {
    if (!this.bin) {
      throw new MissingInputError('No speech synthesis command configured (TTS_BIN)');
    }
    const res = await this.runner.run({
      tool: this.bin,
      args: ['--engine', opts.engine, '--voice', opts.voice, '--text', text, '--output', outputPath],
      timeoutMs: this.timeoutSec * 1000,
      label: 'cta-audio',
    });
    if (res.timedOut || res.exitCode !== 0 || !(await fs.pathExists(outputPath))) {
      throw new ExternalToolFailure(`${this.bin} produced no speech for "${text}"`, {
        tool: this.bin,
        stage: 'cta-audio',
        exitCode: res.exitCode,
        timedOut: res.timedOut,
        stderr: stderrTail(res.stderr),
      });
    }
    debug('tts.done', { engine: opts.engine, voice: opts.voice, outputPath, ms: res.durationMs });
  }
}

/**
 * Stand-in for the remote stock-footage service: picks up *.mp4 files dropped
 * into <backgroundsRoot>/<theme>/ that the pool does not know yet.
 */
export class DirectoryBackgroundAcquirer implements BackgroundAcquirer {
  constructor(
    private readonly toolkit: MediaToolkit,
    private readonly known: (theme: string) => Promise<Set<string>>,
    private readonly backgroundsRoot = ENV.backgroundsRoot
  ) {}

  async acquire(theme: string, count: number): Promise<NewBackgroundClip[]> {
    const dir = path.join(this.backgroundsRoot, theme);
    if (!(await fs.pathExists(dir))) return [];
    const known = await this.known(theme);
    const files = (await fs.readdir(dir))
      .filter((f) => f.toLowerCase().endsWith('.mp4') && !known.has(f))
      .sort()
      .slice(0, Math.max(0, count));
    const out: NewBackgroundClip[] = [];
    for (const filename of files) {
      const file = path.join(dir, filename);
      const stat = await fs.stat(file);
      let durationSec: number | null = null;
      try {
        durationSec = await this.toolkit.probeDuration(file, 'acquire-background');
      } catch (e) {
        warn('background.probe.fail', { file, error: errorMessage(e) });
      }
      out.push({ filename, theme, source: 'local', url: null, durationSec, fileSizeBytes: stat.size });
    }
    info('background.acquire', { theme, requested: count, found: out.length });
    return out;
  }
}
