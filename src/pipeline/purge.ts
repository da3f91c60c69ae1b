import fs from 'fs-extra';
import path from 'path';
import { errorMessage, info, warn } from './log';

export interface PurgeResult {
  scanned: number;
  removed: string[];
  failed: number;
}

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Delete entries directly under tempDir whose modification time is older
 * than `days`. Per-build temp directories count as one entry each.
 */
export async function purgeTemp(tempDir: string, days: number, opts: { now?: Date; dryRun?: boolean } = {}): Promise<PurgeResult> {
  if (!Number.isFinite(days) || days < 0) throw new Error(`days must be a non-negative number, got ${days}`);
  const result: PurgeResult = { scanned: 0, removed: [], failed: 0 };
  if (!(await fs.pathExists(tempDir))) return result;

  const cutoff = (opts.now ?? new Date()).getTime() - days * DAY_MS;
  for (const name of (await fs.readdir(tempDir)).sort()) {
    const p = path.join(tempDir, name);
    result.scanned++;
    const stat = await fs.stat(p);
    if (stat.mtime.getTime() >= cutoff) continue;
    if (opts.dryRun) {
      result.removed.push(p);
      continue;
    }
    try {
      await fs.remove(p);
      result.removed.push(p);
    } catch (e) {
      result.failed++;
      warn('purge.fail', { path: p, error: errorMessage(e) });
    }
  }
  info('purge.done', { tempDir, days, scanned: result.scanned, removed: result.removed.length, failed: result.failed, dryRun: !!opts.dryRun });
  return result;
}
