import type { QueryResultRow } from 'pg';
import type { RebuildPolicy } from './env';
import { isPlatformKey } from './platforms';
import type {
  BackgroundClip,
  EngagementMetrics,
  NewBackgroundClip,
  PlatformKey,
  ShortBuild,
  ShortRecord,
  UsageEvent,
  VideoRow,
} from './types';
import { type PgRunner, type Queryable, withPg, withTransaction } from './run_db';

export interface ThemeStats {
  theme: string;
  clips: number;
  totalUsage: number;
  avgUsage: number;
}

export interface MediaStats {
  durationSec: number;
  fileSizeBytes: number;
}

export interface PlatformStats {
  platform: PlatformKey;
  shorts: number;
  avgDurationSec: number;
  totalViews: number;
  totalLikes: number;
  totalShares: number;
  totalComments: number;
  avgViews: number;
}

export interface RankedShort extends UsageEvent {
  engagementScore: number;
}

export interface PerformanceUpdate extends Partial<EngagementMetrics> {
  status?: UsageEvent['status'];
}

export interface NewVideo {
  id: string;
  url?: string | null;
  title?: string | null;
  theme?: string | null;
}

/**
 * Everything business logic reads or writes in the store. Each method is one
 * statement or one transaction.
 */
export interface ShortsRepository {
  /**
   * Pick the least-used clip of a theme (ties: most recently downloaded, then
   * highest id), bump its usage and log the use, atomically. Null when every
   * clip of the theme is excluded or the theme has none.
   */
  claimBackground(theme: string, videoId: string, excludeIds: number[]): Promise<BackgroundClip | null>;
  /** Inserts clips not yet in the pool; returns the ones added. */
  registerBackgrounds(clips: NewBackgroundClip[]): Promise<BackgroundClip[]>;
  listBackgrounds(theme?: string): Promise<BackgroundClip[]>;
  backgroundStats(): Promise<ThemeStats[]>;

  ensureVideo(video: NewVideo): Promise<void>;
  getVideo(id: string): Promise<VideoRow | null>;
  listBuildCandidates(platform: PlatformKey, limit: number, policy: RebuildPolicy): Promise<string[]>;

  findShort(videoId: string, platform: PlatformKey): Promise<ShortRecord | null>;
  /** Upserts the short and resets its analytics seed in one transaction. */
  recordBuild(build: ShortBuild, media: MediaStats): Promise<ShortRecord>;
  listShorts(platform?: PlatformKey): Promise<ShortRecord[]>;

  updatePerformance(videoId: string, platform: PlatformKey, update: PerformanceUpdate): Promise<boolean>;
  platformStats(days: number): Promise<PlatformStats[]>;
  topShorts(limit: number): Promise<RankedShort[]>;
}

// pg returns BIGINT and NUMERIC as strings, timestamps as Date
function num(v: unknown): number {
  const n = Number(v);
  return Number.isFinite(n) ? n : 0;
}

function numOrNull(v: unknown): number | null {
  if (v === null || v === undefined) return null;
  const n = Number(v);
  return Number.isFinite(n) ? n : null;
}

function str(v: unknown): string {
  return v === null || v === undefined ? '' : String(v);
}

function strOrNull(v: unknown): string | null {
  return v === null || v === undefined ? null : String(v);
}

function iso(v: unknown): string {
  if (v instanceof Date) return v.toISOString();
  return str(v);
}

function isoOrNull(v: unknown): string | null {
  return v === null || v === undefined ? null : iso(v);
}

function platformOf(v: unknown): PlatformKey {
  const s = str(v);
  if (!isPlatformKey(s)) throw new Error(`Unknown platform in store: "${s}"`);
  return s;
}

export function toBackgroundClip(r: QueryResultRow): BackgroundClip {
  return {
    id: num(r.id),
    filename: str(r.filename),
    theme: str(r.theme),
    source: str(r.source),
    url: strOrNull(r.url),
    durationSec: numOrNull(r.duration),
    fileSizeBytes: numOrNull(r.file_size),
    downloadedAt: iso(r.download_date),
    usageCount: num(r.usage_count),
    lastUsed: isoOrNull(r.last_used),
  };
}

export function toShortRecord(r: QueryResultRow): ShortRecord {
  return {
    id: num(r.id),
    videoId: str(r.video_id),
    platform: platformOf(r.platform),
    outputPath: str(r.short_path),
    thumbnailPath: strOrNull(r.thumbnail_path),
    moment: {
      title: str(r.title),
      startSec: num(r.start_time),
      endSec: num(r.end_time),
      text: str(r.text),
      score: num(r.score),
      justification: str(r.justification),
    },
    createdAt: iso(r.created_at),
  };
}

function toUsageEvent(r: QueryResultRow): UsageEvent {
  return {
    videoId: str(r.video_id),
    platform: platformOf(r.platform),
    shortPath: str(r.short_path),
    durationSec: num(r.duration),
    fileSizeBytes: num(r.file_size),
    views: num(r.views),
    likes: num(r.likes),
    shares: num(r.shares),
    comments: num(r.comments),
    status: r.status === 'published' ? 'published' : 'created',
    createdAt: iso(r.created_at),
    lastUpdated: isoOrNull(r.last_updated),
  };
}

const CLAIM_SQL = `
WITH picked AS (
  SELECT id FROM fonds
  WHERE theme = $1 AND NOT (id = ANY($3::int[]))
  ORDER BY usage_count ASC, download_date DESC, id DESC
  LIMIT 1
  FOR UPDATE SKIP LOCKED
), bumped AS (
  UPDATE fonds f SET usage_count = f.usage_count + 1, last_used = now()
  FROM picked WHERE f.id = picked.id
  RETURNING f.*
), logged AS (
  INSERT INTO fond_usage (fond_id, video_id) SELECT id, $2 FROM bumped
)
SELECT * FROM bumped`;

export const ENGAGEMENT_SQL = 'views + likes * 2 + shares * 5 + comments * 3';

export class PgShortsRepository implements ShortsRepository {
  constructor(private readonly run: PgRunner = withPg) {}

  async claimBackground(theme: string, videoId: string, excludeIds: number[]): Promise<BackgroundClip | null> {
    return this.run(async (c) => {
      const res = await c.query(CLAIM_SQL, [theme, videoId, excludeIds]);
      return res.rows.length ? toBackgroundClip(res.rows[0]) : null;
    });
  }

  async registerBackgrounds(clips: NewBackgroundClip[]): Promise<BackgroundClip[]> {
    if (!clips.length) return [];
    return this.run((c) =>
      withTransaction(c, async (tx) => {
        const added: BackgroundClip[] = [];
        for (const clip of clips) {
          const res = await tx.query(
            `INSERT INTO fonds (filename, theme, source, url, duration, file_size)
             VALUES ($1,$2,$3,$4,$5,$6)
             ON CONFLICT (theme, filename) DO NOTHING
             RETURNING *`,
            [clip.filename, clip.theme, clip.source, clip.url, clip.durationSec, clip.fileSizeBytes]
          );
          added.push(...res.rows.map(toBackgroundClip));
        }
        return added;
      })
    );
  }

  async listBackgrounds(theme?: string): Promise<BackgroundClip[]> {
    return this.run(async (c) => {
      const res = theme
        ? await c.query('SELECT * FROM fonds WHERE theme = $1 ORDER BY usage_count ASC, download_date DESC, id DESC', [theme])
        : await c.query('SELECT * FROM fonds ORDER BY theme, usage_count ASC, download_date DESC, id DESC');
      return res.rows.map(toBackgroundClip);
    });
  }

  async backgroundStats(): Promise<ThemeStats[]> {
    return this.run(async (c) => {
      const res = await c.query(
        `SELECT theme, COUNT(*) AS clips, COALESCE(SUM(usage_count),0) AS total_usage, COALESCE(AVG(usage_count),0) AS avg_usage
         FROM fonds GROUP BY theme ORDER BY theme`
      );
      return res.rows.map((r) => ({
        theme: str(r.theme),
        clips: num(r.clips),
        totalUsage: num(r.total_usage),
        avgUsage: num(r.avg_usage),
      }));
    });
  }

  async ensureVideo(video: NewVideo): Promise<void> {
    await this.run((c) =>
      c.query(
        `INSERT INTO videos (id, url, title, theme) VALUES ($1,$2,$3,$4)
         ON CONFLICT (id) DO UPDATE SET
           url = COALESCE(EXCLUDED.url, videos.url),
           title = COALESCE(EXCLUDED.title, videos.title),
           theme = COALESCE(EXCLUDED.theme, videos.theme)`,
        [video.id, video.url ?? null, video.title ?? null, video.theme ?? null]
      )
    );
  }

  async getVideo(id: string): Promise<VideoRow | null> {
    return this.run(async (c) => {
      const res = await c.query('SELECT * FROM videos WHERE id = $1', [id]);
      if (!res.rows.length) return null;
      const r = res.rows[0];
      return {
        id: str(r.id),
        url: strOrNull(r.url),
        title: strOrNull(r.title),
        theme: strOrNull(r.theme),
        createdAt: iso(r.created_at),
      };
    });
  }

  async listBuildCandidates(platform: PlatformKey, limit: number, policy: RebuildPolicy): Promise<string[]> {
    return this.run(async (c) => {
      const res = await c.query(
        `SELECT v.id FROM videos v
         WHERE $3 = 'replace'
            OR NOT EXISTS (SELECT 1 FROM shorts s WHERE s.video_id = v.id AND s.platform = $1)
         ORDER BY v.created_at DESC, v.id
         LIMIT $2`,
        [platform, limit, policy]
      );
      return res.rows.map((r) => str(r.id));
    });
  }

  async findShort(videoId: string, platform: PlatformKey): Promise<ShortRecord | null> {
    return this.run(async (c) => {
      const res = await c.query('SELECT * FROM shorts WHERE video_id = $1 AND platform = $2', [videoId, platform]);
      return res.rows.length ? toShortRecord(res.rows[0]) : null;
    });
  }

  async recordBuild(build: ShortBuild, media: MediaStats): Promise<ShortRecord> {
    const m = build.moment;
    return this.run((c) =>
      withTransaction(c, async (tx) => {
        const res = await tx.query(
          `INSERT INTO shorts (video_id, platform, short_path, thumbnail_path, title, start_time, end_time, score, text, justification, created_at)
           VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10,$11)
           ON CONFLICT (video_id, platform) DO UPDATE SET
             short_path = EXCLUDED.short_path,
             thumbnail_path = EXCLUDED.thumbnail_path,
             title = EXCLUDED.title,
             start_time = EXCLUDED.start_time,
             end_time = EXCLUDED.end_time,
             score = EXCLUDED.score,
             text = EXCLUDED.text,
             justification = EXCLUDED.justification,
             created_at = EXCLUDED.created_at
           RETURNING *`,
          [
            build.videoId,
            build.platform,
            build.outputPath,
            build.thumbnailPath,
            m.title,
            m.startSec,
            m.endSec,
            m.score,
            m.text,
            m.justification,
            build.createdAt,
          ]
        );
        await tx.query(
          `INSERT INTO shorts_analytics (video_id, platform, short_path, duration, file_size, status, created_at)
           VALUES ($1,$2,$3,$4,$5,'created',$6)
           ON CONFLICT (video_id, platform) DO UPDATE SET
             short_path = EXCLUDED.short_path,
             duration = EXCLUDED.duration,
             file_size = EXCLUDED.file_size,
             views = 0, likes = 0, shares = 0, comments = 0,
             status = 'created',
             created_at = EXCLUDED.created_at,
             last_updated = NULL`,
          [build.videoId, build.platform, build.outputPath, media.durationSec, media.fileSizeBytes, build.createdAt]
        );
        if (!res.rows.length) throw new Error('shorts upsert returned no row');
        return toShortRecord(res.rows[0]);
      })
    );
  }

  async listShorts(platform?: PlatformKey): Promise<ShortRecord[]> {
    return this.run(async (c) => {
      const res = platform
        ? await c.query('SELECT * FROM shorts WHERE platform = $1 ORDER BY created_at DESC, id DESC', [platform])
        : await c.query('SELECT * FROM shorts ORDER BY created_at DESC, id DESC');
      return res.rows.map(toShortRecord);
    });
  }

  async updatePerformance(videoId: string, platform: PlatformKey, update: PerformanceUpdate): Promise<boolean> {
    return this.run(async (c) => {
      const res = await c.query(
        `UPDATE shorts_analytics SET
           views = COALESCE($3, views),
           likes = COALESCE($4, likes),
           shares = COALESCE($5, shares),
           comments = COALESCE($6, comments),
           status = COALESCE($7, status),
           last_updated = now()
         WHERE video_id = $1 AND platform = $2`,
        [
          videoId,
          platform,
          update.views ?? null,
          update.likes ?? null,
          update.shares ?? null,
          update.comments ?? null,
          update.status ?? null,
        ]
      );
      return (res.rowCount ?? 0) > 0;
    });
  }

  async platformStats(days: number): Promise<PlatformStats[]> {
    return this.run(async (c) => {
      const res = await c.query(
        `SELECT platform,
                COUNT(*) AS shorts,
                COALESCE(AVG(duration),0) AS avg_duration,
                COALESCE(SUM(views),0) AS total_views,
                COALESCE(SUM(likes),0) AS total_likes,
                COALESCE(SUM(shares),0) AS total_shares,
                COALESCE(SUM(comments),0) AS total_comments,
                COALESCE(AVG(views),0) AS avg_views
         FROM shorts_analytics
         WHERE created_at >= now() - make_interval(days => $1::int)
         GROUP BY platform
         ORDER BY platform`,
        [days]
      );
      return res.rows.map((r) => ({
        platform: platformOf(r.platform),
        shorts: num(r.shorts),
        avgDurationSec: num(r.avg_duration),
        totalViews: num(r.total_views),
        totalLikes: num(r.total_likes),
        totalShares: num(r.total_shares),
        totalComments: num(r.total_comments),
        avgViews: num(r.avg_views),
      }));
    });
  }

  async topShorts(limit: number): Promise<RankedShort[]> {
    return this.run(async (c) => {
      const res = await c.query(
        `SELECT *, (${ENGAGEMENT_SQL}) AS engagement_score
         FROM shorts_analytics
         ORDER BY engagement_score DESC, created_at DESC
         LIMIT $1`,
        [limit]
      );
      return res.rows.map((r) => ({ ...toUsageEvent(r), engagementScore: num(r.engagement_score) }));
    });
  }
}
