import fs from 'fs-extra';
import path from 'path';
import { fileURLToPath } from 'url';
import type { Candidate, Transcript, ViralMoment } from './types';
import { countWords, segmentText, segmentTimed } from './segment';

export interface Lexicon {
    keywords: Record<string, number>;
    emotionWords: string[];
    interrogatives: string[];
    determiners: string[];
    listMarkers: string[];
}

export interface ScoreBreakdown {
    score: number;
    keyword: number;
    length: number;
    structure: number;
}

export interface RankOptions {
    topK?: number;
    minScore?: number;
}

const KEYWORD_WEIGHT = 0.4;
const LENGTH_WEIGHT = 0.25;
const STRUCTURE_WEIGHT = 0.35;
const EMOTION_CAP = 0.3;

const LEXICON_PATH = path.resolve(
    path.dirname(fileURLToPath(import.meta.url)),
    '../../data/viral-lexicon.json'
);

function stringList(v: unknown, field: string): string[] {
    if (!Array.isArray(v) || !v.every((x): x is string => typeof x === 'string')) {
        throw new Error(`viral lexicon: "${field}" must be a list of strings`);
    }
    return v;
}

export function parseLexicon(raw: unknown): Lexicon {
    if (typeof raw !== 'object' || raw === null) {
        throw new Error('viral lexicon: expected an object');
    }
    const obj: Record<string, unknown> = { ...raw };
    const kw = obj.keywords;
    if (typeof kw !== 'object' || kw === null) {
        throw new Error('viral lexicon: "keywords" must be an object');
    }
    const keywords: Record<string, number> = {};
    for (const [k, w] of Object.entries(kw)) {
        if (typeof w !== 'number' || w < 0 || w > 1) {
            throw new Error(`viral lexicon: weight for "${k}" must be a number in [0,1]`);
        }
        keywords[k.toLowerCase()] = w;
    }
    return {
        keywords,
        emotionWords: stringList(obj.emotionWords, 'emotionWords').map((w) => w.toLowerCase()),
        interrogatives: stringList(obj.interrogatives, 'interrogatives').map((w) => w.toLowerCase()),
        determiners: stringList(obj.determiners, 'determiners'),
        listMarkers: stringList(obj.listMarkers, 'listMarkers').map((w) => w.toLowerCase()),
    };
}

let defaultLexicon: Lexicon | null = null;

export function loadLexicon(file = LEXICON_PATH): Lexicon {
    if (file === LEXICON_PATH && defaultLexicon) return defaultLexicon;
    const lexicon = parseLexicon(fs.readJsonSync(file));
    if (file === LEXICON_PATH) defaultLexicon = lexicon;
    return lexicon;
}

export function lengthComponent(wordCount: number): number {
    if (wordCount >= 50 && wordCount <= 150) return 1.0;
    if (wordCount >= 30 && wordCount <= 200) return 0.8;
    if (wordCount >= 20 && wordCount <= 300) return 0.6;
    return 0.3;
}

function escapeRegExp(s: string): string {
    return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export class ViralScorer {
    private readonly lexicon: Lexicon;
    private readonly interrogativeRe: RegExp | null;

    constructor(lexicon: Lexicon = loadLexicon()) {
        this.lexicon = lexicon;
        this.interrogativeRe = lexicon.interrogatives.length
            ? new RegExp(`\\b(?:${lexicon.interrogatives.map(escapeRegExp).join('|')})\\b`, 'i')
            : null;
    }

    /**
     * Keyword weights are summed without normalisation, so keyword-dense text
     * saturates at the final clamp of 1.0.
     */
    scoreText(text: string): ScoreBreakdown {
        const lower = text.toLowerCase();

        let keyword = 0;
        for (const [k, w] of Object.entries(this.lexicon.keywords)) {
            if (lower.includes(k)) keyword += w;
        }

        const length = lengthComponent(countWords(text));

        let structure = 0;
        if (text.includes('?')) structure += 0.3;
        if (text.includes('!')) structure += 0.2;
        const firstWord = text.trimStart().split(/\s+/)[0] ?? '';
        if (this.lexicon.determiners.includes(firstWord)) structure += 0.1;
        if (this.interrogativeRe?.test(text)) structure += 0.2;
        const emotionHits = this.lexicon.emotionWords.filter((w) => lower.includes(w)).length;
        structure += Math.min(emotionHits * 0.1, EMOTION_CAP);
        if (/\d/.test(text)) structure += 0.1;
        if (this.lexicon.listMarkers.some((m) => lower.includes(m))) structure += 0.2;

        const raw = keyword * KEYWORD_WEIGHT + length * LENGTH_WEIGHT + structure * STRUCTURE_WEIGHT;
        return { score: Math.min(Math.max(raw, 0), 1), keyword, length, structure };
    }

    score(text: string): number {
        return this.scoreText(text).score;
    }

    rankMoments(candidates: Candidate[], opts: RankOptions = {}): ViralMoment[] {
        const topK = opts.topK ?? 3;
        const minScore = opts.minScore ?? 0;
        if (topK <= 0) return [];
        return candidates
            .map((c) => ({ c, score: this.score(c.text) }))
            .filter(({ c, score }) => c.text.trim() !== '' && score >= minScore)
            .sort((a, b) => b.score - a.score || a.c.startSec - b.c.startSec)
            .slice(0, topK)
            .map(({ c, score }) => ({
                title: titleFor(c.text),
                startSec: c.startSec,
                endSec: c.endSec,
                text: c.text,
                score,
                justification: justificationFor(score),
            }));
    }

    /**
     * Timed segments win over flat text when the transcript has them. No text
     * at all yields no moments, which callers report rather than treat as a fault.
     */
    findViralMoments(transcript: Transcript, opts: RankOptions & { maxWindowSec?: number } = {}): ViralMoment[] {
        const candidates = transcript.segments.length
            ? segmentTimed(transcript.segments, { maxWindowSec: opts.maxWindowSec })
            : segmentText(transcript.text, { maxWindowSec: opts.maxWindowSec });
        return this.rankMoments(candidates, opts);
    }
}

export function titleFor(text: string): string {
    const words = text.trim().split(/\s+/);
    const head = words.slice(0, 5).join(' ');
    return words.length > 5 ? `${head}...` : head;
}

export function justificationFor(score: number): string {
    if (score > 0.8) return 'Very high viral potential: strong keywords and optimal structure';
    if (score > 0.6) return 'Viral segment with good engagement potential';
    if (score > 0.4) return 'Moderate viral potential';
    return 'Limited viral potential';
}
