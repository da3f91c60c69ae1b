import fs from 'fs-extra';
import path from 'path';
import { ENV, type CaptionFormat } from './env';
import { ConstraintViolation, MissingInputError, ShortsError, fail, ok, type Result } from './errors';
import type { Allocation } from './backgrounds';
import type { NarrationSynthesizer } from './collaborators';
import type { NormalizedWindow } from './normalize';
import { CAPTION_STYLES, spokenPrompt } from './platforms';
import { composeTimeline, forceStyle, renderAss, renderSrt } from './timeline';
import { concatListBody, effectFilters, type MediaToolkit } from './toolkit';
import type { CaptionCue, PlatformProfile } from './types';
import { debug, errorMessage, info, startStep, warn, withLogContext } from './log';

export const STAGES = [
    'acquire-source',
    'extend',
    'trim',
    'concat-background',
    'mux-narration',
    'cta-audio',
    'burn-captions',
    'apply-effects',
    'finalize',
] as const;
export type Stage = (typeof STAGES)[number];

/** Finalized output may differ from the planned duration by this much. */
const DURATION_TOLERANCE_SEC = 1;

/**
 * Files created during one build. Everything still registered when
 * cleanup() runs is deleted; release() keeps a file past cleanup.
 */
export class TempArtifacts {
    private readonly files = new Set<string>();

    constructor(readonly dir: string) {}

    async init() {
        await fs.ensureDir(this.dir);
    }

    /** Registers and returns a path inside the build's temp directory. */
    file(name: string): string {
        const p = path.join(this.dir, name);
        this.files.add(p);
        return p;
    }

    register(p: string): string {
        this.files.add(p);
        return p;
    }

    release(p: string) {
        this.files.delete(p);
    }

    get pending(): string[] {
        return [...this.files];
    }

    /** Never throws; failures are logged and counted. */
    async cleanup(): Promise<{ removed: number; failed: number }> {
        let removed = 0;
        let failed = 0;
        for (const p of [...this.files, this.dir]) {
            try {
                await fs.remove(p);
                removed++;
            } catch (e) {
                failed++;
                warn('cleanup.fail', { path: p, error: errorMessage(e) });
            }
        }
        this.files.clear();
        debug('cleanup.done', { dir: this.dir, removed, failed });
        return { removed, failed };
    }
}

export interface AssemblyInput {
    videoId: string;
    platform: PlatformProfile;
    /** Narration audio covering the whole source timeline; the window is cut from it */
    narrationPath: string;
    window: NormalizedWindow;
    backgrounds: Pick<Allocation, 'paths' | 'loop'>;
    /** Caption text for the selected moment */
    narrationText: string;
}

export interface AssemblyOutput {
    outputPath: string;
    thumbnailPath: string | null;
    captionPath: string;
    durationSec: number;
    fileSizeBytes: number;
    cues: CaptionCue[];
}

export interface PipelineOptions {
    shortsRoot: string;
    captionFormat: CaptionFormat;
    ctaAudio: boolean;
    ctaEngine: string;
    voice: string;
    thumbnailOffsetSec: number;
    promptOffset: number;
    now: () => Date;
}

export function stamp(d: Date): string {
    const p = (n: number) => String(n).padStart(2, '0');
    return `${d.getFullYear()}${p(d.getMonth() + 1)}${p(d.getDate())}_${p(d.getHours())}${p(d.getMinutes())}${p(d.getSeconds())}`;
}

/**
 * Drives the media toolkit from narration audio and background footage to a
 * finished vertical short. Captions are timed against the measured length of
 * the trimmed narration, not the planned window.
 *
 * Stages run strictly in order and the first failing stage aborts the build.
 * Intermediate files live in a per-build temp directory which is removed on
 * every exit path; the caption file and final output are only kept once the
 * output has been validated.
 */
export class MediaAssemblyPipeline {
    private readonly opts: PipelineOptions;

    constructor(
        private readonly toolkit: MediaToolkit,
        private readonly synthesizer: NarrationSynthesizer | null = null,
        opts: Partial<PipelineOptions> = {}
    ) {
        this.opts = {
            shortsRoot: opts.shortsRoot ?? ENV.shortsRoot,
            captionFormat: opts.captionFormat ?? ENV.captionFormat,
            ctaAudio: opts.ctaAudio ?? ENV.ctaAudio,
            ctaEngine: opts.ctaEngine ?? ENV.ctaTtsEngine,
            voice: opts.voice ?? ENV.ttsVoice,
            thumbnailOffsetSec: opts.thumbnailOffsetSec ?? ENV.thumbnailOffsetSec,
            promptOffset: opts.promptOffset ?? Math.floor(Math.random() * 4),
            now: opts.now ?? (() => new Date()),
        };
    }

    async run(input: AssemblyInput): Promise<Result<AssemblyOutput, ShortsError>> {
        const { videoId, platform, window } = input;
        const tag = `${videoId}_${stamp(this.opts.now())}`;
        const temps = new TempArtifacts(path.join(this.opts.shortsRoot, 'temp', `${platform.key}_${tag}`));
        const timer = startStep('assemble', { videoId, platform: platform.key, durationSec: window.durationSec });
        try {
            await temps.init();

            await this.stage('acquire-source', async () => {
                const exists = await fs.pathExists(input.narrationPath);
                if (!exists || (await fs.stat(input.narrationPath)).size === 0) {
                    throw new MissingInputError(`Narration audio missing or empty: ${input.narrationPath}`, {
                        videoId,
                        path: input.narrationPath,
                    });
                }
            });

            let source = input.narrationPath;
            const extension = window.extension;
            if (extension) {
                const extended = temps.file('extended.m4a');
                await this.stage('extend', () =>
                    this.toolkit.loopToDuration(source, extended, extension.targetDurationSec)
                );
                source = extended;
            }

            const narration = temps.file('narration.m4a');
            const narrationDurationSec = await this.stage('trim', async () => {
                await this.toolkit.trim(source, narration, window.startSec, window.durationSec);
                return this.toolkit.probeDuration(narration, 'trim');
            });
            debug('narration.measured', { narrationDurationSec, plannedSec: window.durationSec });

            const cues = composeTimeline({
                narrationText: input.narrationText,
                platform: platform.key,
                totalDurationSec: Math.min(narrationDurationSec, window.durationSec),
                maxDurationSec: platform.maxDurationSec,
                promptOffset: this.opts.promptOffset,
            });

            const background = temps.file('background.mp4');
            await this.stage('concat-background', async () => {
                const missing: string[] = [];
                for (const p of input.backgrounds.paths) {
                    if (!(await fs.pathExists(p))) missing.push(p);
                }
                if (!input.backgrounds.paths.length || missing.length) {
                    throw new MissingInputError('Background clip files are missing on disk', { videoId, missing });
                }
                const list = temps.file('backgrounds.txt');
                await fs.writeFile(list, concatListBody(input.backgrounds.paths.map((p) => path.resolve(p))));
                await this.toolkit.concatVideos(list, background, {
                    width: platform.width,
                    height: platform.height,
                    durationSec: window.durationSec,
                    loop: input.backgrounds.loop,
                });
            });

            let current = temps.file('muxed.mp4');
            await this.stage('mux-narration', () =>
                this.toolkit.muxAudio(background, narration, current, window.durationSec)
            );

            const ctaCues = cues.filter((c) => c.role === 'cta');
            if (this.opts.ctaAudio && !this.synthesizer) {
                warn('cta.audio.skip', { videoId, reason: 'no speech synthesizer configured' });
            }
            const synthesizer = this.opts.ctaAudio ? this.synthesizer : null;
            if (synthesizer && ctaCues.length) {
                const withCta = temps.file('with_cta.mp4');
                const from = current;
                await this.stage('cta-audio', async () => {
                    const parts: string[] = [];
                    for (const [i, cue] of ctaCues.entries()) {
                        const out = temps.file(`cta_${i}.wav`);
                        await synthesizer.synthesize(spokenPrompt(cue.text), out, {
                            engine: this.opts.ctaEngine,
                            voice: this.opts.voice,
                        });
                        parts.push(path.resolve(out));
                    }
                    const list = temps.file('cta.txt');
                    await fs.writeFile(list, concatListBody(parts));
                    const ctaTrack = temps.file('cta.m4a');
                    await this.toolkit.concatAudio(list, ctaTrack);
                    await this.toolkit.overlayAudio(from, ctaTrack, withCta, ctaCues[0].startSec);
                });
                current = withCta;
            }

            const captionPath = temps.register(
                path.join(this.opts.shortsRoot, 'subtitles', `short_${tag}.${this.opts.captionFormat}`)
            );
            const captioned = temps.file('captioned.mp4');
            const beforeCaptions = current;
            await this.stage('burn-captions', async () => {
                const style = CAPTION_STYLES[platform.key];
                await fs.ensureDir(path.dirname(captionPath));
                if (this.opts.captionFormat === 'ass') {
                    await fs.writeFile(
                        captionPath,
                        renderAss(cues, style, {
                            animate: platform.effects.has('text_animations'),
                            width: platform.width,
                            height: platform.height,
                        })
                    );
                    await this.toolkit.burnCaptions(beforeCaptions, captionPath, captioned, { format: 'ass' });
                } else {
                    await fs.writeFile(captionPath, renderSrt(cues));
                    await this.toolkit.burnCaptions(beforeCaptions, captionPath, captioned, {
                        format: 'srt',
                        forceStyle: forceStyle(style),
                    });
                }
            });
            current = captioned;

            const filters = effectFilters(platform.effects, window.durationSec, platform.width, platform.height);
            if (filters.length) {
                const effected = temps.file('effects.mp4');
                const beforeEffects = current;
                await this.stage('apply-effects', () => this.toolkit.applyEffects(beforeEffects, effected, filters));
                current = effected;
            }

            const finalInput = current;
            const output = await this.stage('finalize', () =>
                this.finalize(finalInput, { tag, platform, window, temps })
            );
            temps.release(captionPath);

            timer.end({ outputPath: output.outputPath });
            return ok({ ...output, captionPath, cues });
        } catch (e) {
            if (e instanceof ShortsError) {
                info('assemble.abort', { videoId, platform: platform.key, error: e.toString() });
                return fail(e);
            }
            throw e;
        } finally {
            await temps.cleanup();
        }
    }

    private stage<T>(name: Stage, fn: () => Promise<T>): Promise<T> {
        return withLogContext({ stage: name }, async () => {
            const timer = startStep(`stage.${name}`);
            try {
                const out = await fn();
                timer.end();
                return out;
            } catch (e) {
                warn('stage.fail', { error: e instanceof ShortsError ? e.toString() : errorMessage(e) });
                throw e;
            }
        });
    }

    private async finalize(
        input: string,
        ctx: { tag: string; platform: PlatformProfile; window: NormalizedWindow; temps: TempArtifacts }
    ): Promise<Omit<AssemblyOutput, 'captionPath' | 'cues'>> {
        const outDir = path.join(this.opts.shortsRoot, 'platforms', ctx.platform.outputDir);
        await fs.ensureDir(outDir);
        // Registered until validated, so a rejected output is removed with the temp files.
        const outputPath = ctx.temps.register(path.join(outDir, `short_${ctx.tag}.mp4`));
        await fs.move(input, outputPath, { overwrite: true });

        const durationSec = await this.toolkit.probeDuration(outputPath, 'finalize');
        const { size } = await fs.stat(outputPath);
        if (size === 0 || Math.abs(durationSec - ctx.window.durationSec) > DURATION_TOLERANCE_SEC) {
            throw new ConstraintViolation('Final output failed validation', {
                outputPath,
                durationSec,
                expectedDurationSec: ctx.window.durationSec,
                size,
            });
        }
        ctx.temps.release(outputPath);

        const thumbDir = path.join(this.opts.shortsRoot, 'thumbnails');
        const thumbnailPath = path.join(thumbDir, `thumb_${ctx.tag}_${ctx.platform.key}.jpg`);
        let thumbnail: string | null = null;
        try {
            await fs.ensureDir(thumbDir);
            await this.toolkit.extractFrame(
                outputPath,
                thumbnailPath,
                Math.min(this.opts.thumbnailOffsetSec, durationSec / 2)
            );
            thumbnail = thumbnailPath;
        } catch (e) {
            warn('thumbnail.fail', { error: e instanceof ShortsError ? e.toString() : errorMessage(e) });
            // A failed extraction can leave a truncated jpg behind.
            try {
                await fs.remove(thumbnailPath);
            } catch (removeErr) {
                warn('thumbnail.cleanup.fail', { path: thumbnailPath, error: errorMessage(removeErr) });
            }
        }
        return { outputPath, thumbnailPath: thumbnail, durationSec, fileSizeBytes: size };
    }
}
