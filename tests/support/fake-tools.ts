import fs from 'fs-extra';
import path from 'path';
import type { NarrationSynthesizer, SynthesisOptions } from '../../src/pipeline/collaborators';
import { MediaToolkit, type ToolCommand, type ToolResult, type ToolRunner } from '../../src/pipeline/toolkit';

export const TIMEOUTS = { probe: 30, concat: 120, trim: 120, mux: 120, burn: 300, effects: 300, frame: 30 };

/**
 * Stands in for ffmpeg/ffprobe: ffprobe answers with probe(file), every other
 * tool writes a small file at its last argument.
 */
export class FakeToolRunner implements ToolRunner {
  calls: ToolCommand[] = [];
  probe: (file: string) => number = () => 70;
  failOn: (cmd: ToolCommand) => Partial<ToolResult> | null = () => null;

  get labels(): string[] {
    return this.calls.map((c) => c.label);
  }

  async run(cmd: ToolCommand): Promise<ToolResult> {
    this.calls.push(cmd);
    const failure = this.failOn(cmd);
    if (failure) {
      return { exitCode: 1, stdout: '', stderr: 'fake failure', timedOut: false, durationMs: 1, ...failure };
    }
    const last = cmd.args[cmd.args.length - 1];
    if (cmd.tool === 'ffprobe') {
      return { exitCode: 0, stdout: `${this.probe(last)}\n`, stderr: '', timedOut: false, durationMs: 1 };
    }
    await fs.ensureDir(path.dirname(last));
    await fs.writeFile(last, `fake output of ${cmd.label}`);
    return { exitCode: 0, stdout: '', stderr: '', timedOut: false, durationMs: 1 };
  }
}

export function fakeToolkit(runner: ToolRunner): MediaToolkit {
  return new MediaToolkit(runner, { ffmpegBin: 'ffmpeg', ffprobeBin: 'ffprobe', timeouts: TIMEOUTS });
}

export class FakeSynthesizer implements NarrationSynthesizer {
  calls: { text: string; outputPath: string; opts: SynthesisOptions }[] = [];

  async synthesize(text: string, outputPath: string, opts: SynthesisOptions): Promise<void> {
    this.calls.push({ text, outputPath, opts });
    await fs.ensureDir(path.dirname(outputPath));
    await fs.writeFile(outputPath, 'speech');
  }
}

export async function touch(file: string, body = 'media') {
  await fs.ensureDir(path.dirname(file));
  await fs.writeFile(file, body);
}
