import type { Candidate, Segment } from './types';
import { warn } from './log';

export const WORDS_PER_SECOND = 2.5;

export interface TextSegmentOptions {
    maxWindowSec?: number; // default 60s, ~150 words at 2.5 words/s
    wordsPerSecond?: number;
}

export interface TimedSegmentOptions {
    maxWindowSec?: number; // default 90s
}

export function estimateDurationSec(text: string, wordsPerSecond = WORDS_PER_SECOND): number {
    const words = countWords(text);
    return words / wordsPerSecond;
}

export function countWords(text: string): number {
    const trimmed = text.trim();
    return trimmed ? trimmed.split(/\s+/).length : 0;
}

/**
 * Split a flat transcript into consecutive word windows. Timestamps are
 * estimated from the speaking rate since flat text carries none.
 */
export function segmentText(text: string, opts: TextSegmentOptions = {}): Candidate[] {
    const maxWindowSec = opts.maxWindowSec ?? 60;
    const wps = opts.wordsPerSecond ?? WORDS_PER_SECOND;
    const words = text.trim() ? text.trim().split(/\s+/) : [];
    if (!words.length) return [];

    const wordsPerWindow = Math.max(1, Math.ceil(maxWindowSec * wps));
    const out: Candidate[] = [];
    let cursor = 0;
    let startSec = 0;
    while (cursor < words.length) {
        const chunk = words.slice(cursor, cursor + wordsPerWindow);
        const durationSec = chunk.length / wps;
        out.push({
            index: out.length,
            startSec,
            endSec: startSec + durationSec,
            text: chunk.join(' '),
        });
        startSec += durationSec;
        cursor += chunk.length;
    }
    return out;
}

/**
 * Group timestamped segments into windows spanning at most maxWindowSec.
 * A segment longer than the window forms a window on its own.
 */
export function segmentTimed(segments: Segment[], opts: TimedSegmentOptions = {}): Candidate[] {
    const maxWindowSec = opts.maxWindowSec ?? 90;
    const valid = validSegments(segments);
    const out: Candidate[] = [];
    let current: Segment[] = [];

    const flush = () => {
        if (!current.length) return;
        const text = current.map((s) => s.text.trim()).filter(Boolean).join(' ');
        if (text) {
            out.push({
                index: out.length,
                startSec: current[0].startSec,
                endSec: current[current.length - 1].endSec,
                text,
            });
        }
        current = [];
    };

    for (const seg of valid) {
        if (current.length && seg.endSec - current[0].startSec > maxWindowSec) {
            flush();
        }
        current.push(seg);
    }
    flush();
    return out;
}

function validSegments(segments: Segment[]): Segment[] {
    const out: Segment[] = [];
    let lastEnd = -Infinity;
    for (const s of segments) {
        const bad =
            !Number.isFinite(s.startSec) ||
            !Number.isFinite(s.endSec) ||
            s.startSec >= s.endSec ||
            s.startSec < lastEnd;
        if (bad) {
            warn('segment.drop', { startSec: s.startSec, endSec: s.endSec, lastEnd });
            continue;
        }
        out.push(s);
        lastEnd = s.endSec;
    }
    return out;
}
