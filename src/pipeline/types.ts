export type ISO8601 = string;

export interface Segment {
  startSec: number;
  endSec: number;
  text: string;
  speaker?: string;
}

/** transcript.json as written by the transcription stage, one per video */
export interface TranscriptJson {
  videoId: string;
  text?: string;
  durationSec?: number;
  segments: Segment[];
}

export interface Transcript {
  videoId: string;
  text: string;
  segments: Segment[];
  durationSec?: number;
}

export interface Candidate {
  index: number;
  startSec: number;
  endSec: number;
  text: string;
}

export interface ViralMoment {
  title: string;
  startSec: number;
  endSec: number;
  text: string;
  score: number;
  justification: string;
}

export type PlatformKey = 'tiktok' | 'youtube_shorts' | 'instagram_reels';
export type Effect = 'zoom' | 'text_animations' | 'transitions' | 'filters';

export interface PlatformProfile {
  key: PlatformKey;
  aspectRatio: '9:16';
  width: number;
  height: number;
  minDurationSec: number;
  maxDurationSec: number;
  captionStyle: PlatformKey;
  effects: ReadonlySet<Effect>;
  /** subdirectory of <shortsRoot>/platforms */
  outputDir: string;
}

export interface BackgroundClip {
  id: number;
  filename: string;
  theme: string;
  source: string;
  url: string | null;
  durationSec: number | null;
  fileSizeBytes: number | null;
  downloadedAt: ISO8601;
  usageCount: number;
  lastUsed: ISO8601 | null;
}

export type NewBackgroundClip = Pick<
  BackgroundClip,
  'filename' | 'theme' | 'source' | 'url' | 'durationSec' | 'fileSizeBytes'
>;

export type CueRole = 'hook' | 'content' | 'cta';

export interface CaptionCue {
  index: number;
  startSec: number;
  endSec: number;
  text: string;
  role: CueRole;
}

export interface ShortBuild {
  videoId: string;
  platform: PlatformKey;
  outputPath: string;
  thumbnailPath: string | null;
  moment: ViralMoment;
  createdAt: ISO8601;
}

export interface ShortRecord extends ShortBuild {
  id: number;
}

export interface EngagementMetrics {
  views: number;
  likes: number;
  shares: number;
  comments: number;
}

export interface UsageEvent extends EngagementMetrics {
  videoId: string;
  platform: PlatformKey;
  shortPath: string;
  durationSec: number;
  fileSizeBytes: number;
  status: 'created' | 'published';
  createdAt: ISO8601;
  lastUpdated: ISO8601 | null;
}

export interface VideoRow {
  id: string;
  url: string | null;
  title: string | null;
  theme: string | null;
  createdAt: ISO8601;
}
