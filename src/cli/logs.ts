import fs from 'fs';
import path from 'path';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { ENV } from '../pipeline/env';
import { levelOrder, parseLogLevel } from '../pipeline/log';

function tailFile(file: string) {
  let size = fs.statSync(file).size;
  setInterval(() => {
    try {
      const stat = fs.statSync(file);
      if (stat.size > size) {
        const stream = fs.createReadStream(file, { start: size, end: stat.size - 1 });
        stream.on('data', (buf) => process.stdout.write(buf));
        size = stat.size;
      }
    } catch (e) {
      console.error('Cannot read', file, e instanceof Error ? e.message : e);
    }
  }, 1500);
}

/** Latest run-<ms>.log for a video, or null. */
function latestRunLog(dir: string): string | null {
  if (!fs.existsSync(dir)) return null;
  const candidates = fs
    .readdirSync(dir)
    .filter((f) => /^run-\d+\.log$/.test(f))
    .sort((a, b) => Number(b.slice(4, -4)) - Number(a.slice(4, -4)));
  return candidates.length ? path.join(dir, candidates[0]) : null;
}

function entryLevel(line: string): string | null {
  try {
    const obj: unknown = JSON.parse(line);
    if (typeof obj === 'object' && obj !== null && 'level' in obj && typeof obj.level === 'string') return obj.level;
    return null;
  } catch {
    // not a JSON line
    return null;
  }
}

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option('video', { type: 'string', describe: 'Video ID whose latest build log to show' })
    .option('file', { type: 'string', describe: 'Explicit log file path' })
    .option('level', { type: 'string', choices: ['debug', 'info', 'warn', 'error'], default: 'debug' })
    .option('follow', { type: 'boolean', default: false, describe: 'Stream appended lines' })
    .check((a) => (a.video || a.file ? true : 'Provide --video or --file'))
    .parse();

  let file = argv.file;
  if (!file && argv.video) {
    const found = latestRunLog(path.resolve(ENV.shortsRoot, 'logs', argv.video));
    if (!found) {
      console.error('No run-*.log found for video', argv.video);
      process.exit(1);
    }
    file = found;
  }
  if (!file || !fs.existsSync(file)) {
    console.error('Log file does not exist:', file);
    process.exit(1);
  }
  const minOrder = levelOrder(parseLogLevel(argv.level) ?? 'debug');

  const printLine = (raw: string) => {
    const line = raw.trim();
    if (!line) return;
    const level = parseLogLevel(entryLevel(line) ?? undefined);
    // raw lines pass through unfiltered
    if (!level || levelOrder(level) >= minOrder) process.stdout.write(line + '\n');
  };

  fs.readFileSync(file, 'utf8').split(/\r?\n/).forEach(printLine);
  if (argv.follow) {
    tailFile(file);
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
