import type { CaptionCue, CueRole, PlatformKey } from './types';
import type { CaptionStyle } from './platforms';
import { CTA_PROMPTS, HOOK_PROMPTS } from './platforms';
import { countWords, WORDS_PER_SECOND } from './segment';

export interface TimelineInput {
    narrationText: string;
    platform: PlatformKey;
    /** Measured narration length; estimated from the word count when absent */
    totalDurationSec?: number | null;
    maxDurationSec: number;
    hookDurationSec?: number; // default 5
    ctaShare?: number; // default 0.5 of the total
    ctaBudgetCapSec?: number; // default 35
    ctaStartFloorSec?: number; // default 35
    maxLineChars?: number; // default 100
    /** Rotates which hook and CTA prompts come first */
    promptOffset?: number;
}

export interface TimelineWindows {
    totalDurationSec: number;
    horizonSec: number;
    hookEndSec: number;
    ctaStartSec: number;
    ctaEndSec: number;
}

export function splitSentences(text: string): string[] {
    return text
        .replace(/\s+/g, ' ')
        .trim()
        .split(/(?<=[.!?])\s+/)
        .map((s) => s.trim())
        .filter(Boolean);
}

/** Split at the word boundary closest to the middle; short lines come back whole. */
export function splitLongLine(line: string, maxChars: number): string[] {
    if (line.length <= maxChars) return [line];
    const words = line.split(' ');
    if (words.length < 2) return [line];
    const mid = Math.ceil(words.length / 2);
    return [words.slice(0, mid).join(' '), words.slice(mid).join(' ')];
}

export function computeWindows(input: TimelineInput): TimelineWindows {
    const measured = input.totalDurationSec;
    const totalDurationSec =
        measured !== undefined && measured !== null && Number.isFinite(measured) && measured > 0
            ? measured
            : countWords(input.narrationText) / WORDS_PER_SECOND;
    const horizonSec = Math.min(totalDurationSec, input.maxDurationSec);
    const hookEndSec = Math.min(input.hookDurationSec ?? 5, horizonSec);

    const budget = Math.min(totalDurationSec * (input.ctaShare ?? 0.5), input.ctaBudgetCapSec ?? 35);
    // The floor and the end of the video both pull the CTA earlier; it never starts inside the hook.
    const ctaStartSec = Math.max(
        hookEndSec,
        Math.min(totalDurationSec - budget, input.ctaStartFloorSec ?? 35, horizonSec)
    );
    // End of video wins over the budget: the block shrinks instead of overflowing.
    const ctaEndSec = Math.min(ctaStartSec + budget, horizonSec);

    return { totalDurationSec, horizonSec, hookEndSec, ctaStartSec, ctaEndSec };
}

function rotate<T>(items: readonly T[], offset: number): T[] {
    if (!items.length) return [];
    const k = ((offset % items.length) + items.length) % items.length;
    return [...items.slice(k), ...items.slice(0, k)];
}

/**
 * Lay pieces back to back across [from, to]. Boundaries come from the running
 * weight total and the last end is pinned to `to`, so adjacent cues share
 * exact boundaries.
 */
function spread(pieces: { text: string; weight: number }[], from: number, to: number, role: CueRole): Omit<CaptionCue, 'index'>[] {
    const span = to - from;
    if (span <= 0 || !pieces.length) return [];
    const totalWeight = pieces.reduce((s, p) => s + p.weight, 0);
    const out: Omit<CaptionCue, 'index'>[] = [];
    let acc = 0;
    pieces.forEach((p, i) => {
        const startSec = from + (acc / totalWeight) * span;
        acc += p.weight;
        const endSec = i === pieces.length - 1 ? to : from + (acc / totalWeight) * span;
        if (endSec > startSec) out.push({ startSec, endSec, text: p.text, role });
    });
    return out;
}

/**
 * Three-act caption track: hook, narration sentences, then the rotating CTA
 * prompts. Cues are ordered, never overlap and stay inside the clip; the last
 * content cue ends exactly where the CTA block starts.
 */
export function composeTimeline(input: TimelineInput): CaptionCue[] {
    const w = computeWindows(input);
    if (w.horizonSec <= 0) return [];
    const offset = input.promptOffset ?? 0;
    const maxChars = input.maxLineChars ?? 100;

    const hookText = rotate(HOOK_PROMPTS[input.platform], offset)[0] ?? '';
    const hook = spread([{ text: hookText, weight: 1 }], 0, w.hookEndSec, 'hook');

    // Each sentence gets an equal slice; a split sentence shares its slice between both halves.
    const pieces = splitSentences(input.narrationText).flatMap((s) => {
        const parts = splitLongLine(s, maxChars);
        return parts.map((text) => ({ text, weight: 1 / parts.length }));
    });
    const content = spread(pieces, w.hookEndSec, w.ctaStartSec, 'content');

    const ctas = rotate(CTA_PROMPTS[input.platform], offset).map((text) => ({ text, weight: 1 }));
    const cta = spread(ctas, w.ctaStartSec, w.ctaEndSec, 'cta');

    return [...hook, ...content, ...cta].map((c, index) => ({ index, ...c }));
}

function pad(n: number, width = 2): string {
    return String(n).padStart(width, '0');
}

/** 3725.5 -> "01:02:05,500" */
export function formatSrtTime(seconds: number): string {
    const ms = Math.round(Math.max(0, seconds) * 1000);
    const h = Math.floor(ms / 3_600_000);
    const m = Math.floor((ms % 3_600_000) / 60_000);
    const s = Math.floor((ms % 60_000) / 1000);
    return `${pad(h)}:${pad(m)}:${pad(s)},${pad(ms % 1000, 3)}`;
}

/** 3725.5 -> "1:02:05.50" */
export function formatAssTime(seconds: number): string {
    const cs = Math.round(Math.max(0, seconds) * 100);
    const h = Math.floor(cs / 360_000);
    const m = Math.floor((cs % 360_000) / 6000);
    const s = Math.floor((cs % 6000) / 100);
    return `${h}:${pad(m)}:${pad(s)}.${pad(cs % 100)}`;
}

export function renderSrt(cues: CaptionCue[]): string {
    return cues
        .map((c, i) => `${i + 1}\n${formatSrtTime(c.startSec)} --> ${formatSrtTime(c.endSec)}\n${c.text}\n`)
        .join('\n');
}

function assText(text: string): string {
    return text.replace(/\\/g, '\\\\').replace(/[{}]/g, '').replace(/\r?\n/g, '\\N');
}

export interface AssOptions {
    animate?: boolean;
    width?: number;
    height?: number;
}

export function renderAss(cues: CaptionCue[], style: CaptionStyle, opts: AssOptions = {}): string {
    const styleLine = (name: string, colour: string) =>
        `Style: ${name},${style.fontName},${style.fontSize},${colour},&H000000FF,${style.outlineColour},&H80000000,` +
        `-1,0,0,0,100,100,0,0,${style.borderStyle},2,1,${style.alignment},20,20,${style.marginV},1`;
    const styleFor: Record<CueRole, string> = { hook: 'Hook', content: 'Default', cta: 'CTA' };
    const fade = opts.animate ? '{\\fad(200,200)}' : '';

    const lines = [
        '[Script Info]',
        'ScriptType: v4.00+',
        `PlayResX: ${opts.width ?? 1080}`,
        `PlayResY: ${opts.height ?? 1920}`,
        'WrapStyle: 0',
        '',
        '[V4+ Styles]',
        'Format: Name, Fontname, Fontsize, PrimaryColour, SecondaryColour, OutlineColour, BackColour, Bold, Italic, Underline, StrikeOut, ScaleX, ScaleY, Spacing, Angle, BorderStyle, Outline, Shadow, Alignment, MarginL, MarginR, MarginV, Encoding',
        styleLine('Default', style.primaryColour),
        styleLine('Hook', style.hookColour),
        styleLine('CTA', style.ctaColour),
        '',
        '[Events]',
        'Format: Layer, Start, End, Style, Name, MarginL, MarginR, MarginV, Effect, Text',
        ...cues.map(
            (c) =>
                `Dialogue: 0,${formatAssTime(c.startSec)},${formatAssTime(c.endSec)},${styleFor[c.role]},,0,0,0,,${fade}${assText(c.text)}`
        ),
    ];
    return lines.join('\n') + '\n';
}

/** force_style argument for burning an SRT file with the platform look */
export function forceStyle(style: CaptionStyle): string {
    return [
        `FontName=${style.fontName}`,
        `FontSize=${style.fontSize}`,
        `PrimaryColour=${style.primaryColour}`,
        `OutlineColour=${style.outlineColour}`,
        `BorderStyle=${style.borderStyle}`,
        `Alignment=${style.alignment}`,
        `MarginV=${style.marginV}`,
    ].join(',');
}
