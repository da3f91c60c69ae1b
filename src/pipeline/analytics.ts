import type { PerformanceUpdate, PlatformStats, RankedShort, ShortsRepository } from './repository';
import type { EngagementMetrics, PlatformKey } from './types';
import { info, warn } from './log';

/** Weighted engagement used to rank published shorts. */
export function engagementScore(m: EngagementMetrics): number {
  return m.views + m.likes * 2 + m.shares * 5 + m.comments * 3;
}

export function validateMetrics(update: PerformanceUpdate): string[] {
  const problems: string[] = [];
  for (const key of ['views', 'likes', 'shares', 'comments'] as const) {
    const v = update[key];
    if (v !== undefined && (!Number.isInteger(v) || v < 0)) problems.push(`${key} must be a non-negative integer`);
  }
  return problems;
}

export async function updatePerformance(
  repo: ShortsRepository,
  videoId: string,
  platform: PlatformKey,
  update: PerformanceUpdate
): Promise<boolean> {
  const problems = validateMetrics(update);
  if (problems.length) throw new Error(`Invalid metrics: ${problems.join('; ')}`);
  const found = await repo.updatePerformance(videoId, platform, update);
  if (found) info('analytics.update', { videoId, platform, ...update });
  else warn('analytics.update.miss', { videoId, platform });
  return found;
}

export interface AnalyticsReport {
  days: number;
  generatedAt: string;
  platforms: PlatformStats[];
  top: RankedShort[];
}

export async function buildReport(repo: ShortsRepository, days = 30, topN = 5, now = new Date()): Promise<AnalyticsReport> {
  const [platforms, top] = await Promise.all([repo.platformStats(days), repo.topShorts(topN)]);
  return { days, generatedAt: now.toISOString(), platforms, top };
}

export function renderReport(r: AnalyticsReport): string {
  const lines = [`Shorts report, last ${r.days} days (generated ${r.generatedAt})`, ''];
  if (!r.platforms.length) {
    lines.push('No shorts in this period.');
  } else {
    lines.push('Platform           Shorts  AvgDur   Views  Likes  Shares  Comments  AvgViews');
    for (const p of r.platforms) {
      lines.push(
        [
          p.platform.padEnd(17),
          String(p.shorts).padStart(7),
          `${p.avgDurationSec.toFixed(1)}s`.padStart(7),
          String(p.totalViews).padStart(7),
          String(p.totalLikes).padStart(6),
          String(p.totalShares).padStart(7),
          String(p.totalComments).padStart(9),
          p.avgViews.toFixed(1).padStart(9),
        ].join(' ')
      );
    }
  }
  if (r.top.length) {
    lines.push('', 'Top shorts by engagement:');
    r.top.forEach((s, i) => {
      lines.push(`${i + 1}. ${s.videoId} [${s.platform}] score ${s.engagementScore} (${s.views} views) ${s.shortPath}`);
    });
  }
  return lines.join('\n') + '\n';
}
