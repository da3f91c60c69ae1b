import { execa } from 'execa';
import { performance } from 'perf_hooks';
import { ENV, type ToolTimeouts } from './env';
import { ExternalToolFailure } from './errors';
import type { Effect } from './types';
import { debug } from './log';

export interface ToolCommand {
    tool: string;
    args: string[];
    timeoutMs: number;
    /** Pipeline stage the call belongs to, carried into failures and logs */
    label: string;
}

export interface ToolResult {
    /** null when the process never exited on its own (spawn error, timeout, signal) */
    exitCode: number | null;
    stdout: string;
    stderr: string;
    timedOut: boolean;
    durationMs: number;
}

export interface ToolRunner {
    run(cmd: ToolCommand): Promise<ToolResult>;
}

export class ExecaToolRunner implements ToolRunner {
    async run(cmd: ToolCommand): Promise<ToolResult> {
        const start = performance.now();
        debug('tool.exec', { label: cmd.label, tool: cmd.tool, args: cmd.args.join(' ') });
        const res = await execa(cmd.tool, cmd.args, { timeout: cmd.timeoutMs, reject: false });
        return {
            exitCode: res.exitCode ?? null,
            stdout: res.stdout,
            stderr: res.failed && !res.stderr && res.exitCode === undefined ? `${cmd.tool}: could not be started` : res.stderr,
            timedOut: res.timedOut,
            durationMs: Math.round(performance.now() - start),
        };
    }
}

const STDERR_TAIL = 2000;

export function stderrTail(stderr: string): string {
    return stderr.length > STDERR_TAIL ? stderr.slice(-STDERR_TAIL) : stderr;
}

/** Escape a path for use inside an ffmpeg filter argument (ass=..., subtitles=...). */
export function escapeFilterPath(input: string): string {
    return input
        .replace(/\\/g, '\\\\')
        .replace(/:/g, '\\:')
        .replace(/,/g, '\\,')
        .replace(/'/g, "\\'")
        .replace(/ /g, '\\ ');
}

/** Body of an ffmpeg concat-demuxer list file. */
export function concatListBody(paths: string[]): string {
    return paths.map((p) => `file '${p.replace(/'/g, "'\\''")}'`).join('\n') + '\n';
}

export function secs(n: number): string {
    return n.toFixed(3);
}

/**
 * Duration-preserving video filters for a platform's effect set.
 * text_animations is rendered by the caption track, not here.
 */
export function effectFilters(effects: ReadonlySet<Effect>, durationSec: number, width: number, height: number): string[] {
    const out: string[] = [];
    if (effects.has('zoom')) {
        const zw = Math.round((width * 1.08) / 2) * 2;
        const zh = Math.round((height * 1.08) / 2) * 2;
        out.push(`scale=${zw}:${zh}`, `crop=${width}:${height}`);
    }
    if (effects.has('filters')) {
        out.push('eq=contrast=1.08:saturation=1.15');
    }
    if (effects.has('transitions') && durationSec > 1) {
        out.push('fade=t=in:st=0:d=0.5', `fade=t=out:st=${secs(durationSec - 0.5)}:d=0.5`);
    }
    return out;
}

export interface ToolkitOptions {
    ffmpegBin: string;
    ffprobeBin: string;
    timeouts: ToolTimeouts;
}

export interface FrameSize {
    width: number;
    height: number;
}

/**
 * Typed wrappers over ffmpeg/ffprobe. Every call goes through the ToolRunner
 * with the stage's timeout; a non-zero exit or a timeout throws
 * ExternalToolFailure with the tail of stderr attached.
 */
export class MediaToolkit {
    private readonly opts: ToolkitOptions;

    constructor(
        private readonly runner: ToolRunner = new ExecaToolRunner(),
        opts: Partial<ToolkitOptions> = {}
    ) {
        this.opts = {
            ffmpegBin: opts.ffmpegBin ?? ENV.ffmpegBin,
            ffprobeBin: opts.ffprobeBin ?? ENV.ffprobeBin,
            timeouts: opts.timeouts ?? ENV.toolTimeouts,
        };
    }

    private async exec(label: string, tool: string, args: string[], timeoutSec: number): Promise<ToolResult> {
        const res = await this.runner.run({ tool, args, timeoutMs: Math.round(timeoutSec * 1000), label });
        if (res.timedOut || res.exitCode !== 0) {
            const why = res.timedOut ? `timed out after ${timeoutSec}s` : `exited with ${res.exitCode ?? 'no code'}`;
            throw new ExternalToolFailure(`${tool} ${why} during ${label}`, {
                tool,
                stage: label,
                exitCode: res.exitCode,
                timedOut: res.timedOut,
                stderr: stderrTail(res.stderr),
            });
        }
        return res;
    }

    private ffmpeg(label: string, args: string[], timeoutSec: number) {
        return this.exec(label, this.opts.ffmpegBin, ['-y', '-hide_banner', '-loglevel', 'error', ...args], timeoutSec);
    }

    async probeDuration(file: string, label = 'probe'): Promise<number> {
        const res = await this.exec(
            label,
            this.opts.ffprobeBin,
            ['-v', 'error', '-show_entries', 'format=duration', '-of', 'default=noprint_wrappers=1:nokey=1', file],
            this.opts.timeouts.probe
        );
        const parsed = parseFloat(res.stdout.trim());
        if (!Number.isFinite(parsed)) {
            throw new ExternalToolFailure(`${this.opts.ffprobeBin} returned no duration for ${file}`, {
                tool: this.opts.ffprobeBin,
                stage: label,
                exitCode: res.exitCode,
                timedOut: false,
                stderr: stderrTail(`stdout: ${res.stdout}\n${res.stderr}`),
            });
        }
        return Math.max(0, parsed);
    }

    /** Repeat the narration end to end and cut it at durationSec. Audio only. */
    async loopToDuration(input: string, output: string, durationSec: number, label = 'extend') {
        await this.ffmpeg(
            label,
            ['-stream_loop', '-1', '-i', input, '-t', secs(durationSec), '-vn', '-c:a', 'aac', output],
            this.opts.timeouts.trim
        );
    }

    /** Cut [startSec, startSec + durationSec] out of the narration. Audio only. */
    async trim(input: string, output: string, startSec: number, durationSec: number, label = 'trim') {
        await this.ffmpeg(
            label,
            ['-ss', secs(startSec), '-i', input, '-t', secs(durationSec), '-vn', '-c:a', 'aac', output],
            this.opts.timeouts.trim
        );
    }

    /**
     * Concatenate the clips named in a concat list, filling the frame and
     * dropping their audio. With loop the list repeats until durationSec.
     */
    async concatVideos(
        listFile: string,
        output: string,
        opts: FrameSize & { durationSec: number; loop: boolean },
        label = 'concat-background'
    ) {
        const { width, height } = opts;
        await this.ffmpeg(
            label,
            [
                ...(opts.loop ? ['-stream_loop', '-1'] : []),
                '-f', 'concat', '-safe', '0', '-i', listFile,
                '-vf', `scale=${width}:${height}:force_original_aspect_ratio=increase,crop=${width}:${height},setsar=1`,
                '-an', '-r', '30', '-c:v', 'libx264',
                '-t', secs(opts.durationSec),
                output,
            ],
            this.opts.timeouts.concat
        );
    }

    /** Video from the first input, audio from the second. */
    async muxAudio(video: string, audio: string, output: string, durationSec: number, label = 'mux-narration') {
        await this.ffmpeg(
            label,
            ['-i', video, '-i', audio, '-map', '0:v:0', '-map', '1:a:0', '-c:v', 'copy', '-c:a', 'aac', '-t', secs(durationSec), output],
            this.opts.timeouts.mux
        );
    }

    async concatAudio(listFile: string, output: string, label = 'cta-audio') {
        await this.ffmpeg(label, ['-f', 'concat', '-safe', '0', '-i', listFile, '-c:a', 'aac', output], this.opts.timeouts.concat);
    }

    /** Mix an audio track into a video's soundtrack starting at atSec; video is copied. */
    async overlayAudio(video: string, overlay: string, output: string, atSec: number, label = 'cta-audio') {
        const delayMs = Math.round(atSec * 1000);
        await this.ffmpeg(
            label,
            [
                '-i', video, '-i', overlay,
                '-filter_complex', `[1:a]adelay=${delayMs}|${delayMs}[d];[0:a][d]amix=inputs=2:duration=first:dropout_transition=0[a]`,
                '-map', '0:v:0', '-map', '[a]', '-c:v', 'copy', '-c:a', 'aac',
                output,
            ],
            this.opts.timeouts.mux
        );
    }

    async burnCaptions(
        input: string,
        captionFile: string,
        output: string,
        opts: { format: 'ass' | 'srt'; forceStyle?: string },
        label = 'burn-captions'
    ) {
        const file = escapeFilterPath(captionFile);
        const vf =
            opts.format === 'ass'
                ? `ass=${file}`
                : `subtitles=${file}${opts.forceStyle ? `:force_style='${opts.forceStyle}'` : ''}`;
        await this.ffmpeg(label, ['-i', input, '-vf', vf, '-c:v', 'libx264', '-c:a', 'copy', output], this.opts.timeouts.burn);
    }

    async applyEffects(input: string, output: string, filters: string[], label = 'apply-effects') {
        await this.ffmpeg(
            label,
            ['-i', input, '-vf', filters.join(','), '-c:v', 'libx264', '-c:a', 'copy', output],
            this.opts.timeouts.effects
        );
    }

    async extractFrame(input: string, output: string, atSec: number, label = 'thumbnail') {
        await this.ffmpeg(label, ['-ss', secs(atSec), '-i', input, '-frames:v', '1', '-q:v', '2', output], this.opts.timeouts.frame);
    }
}
