import { describe, it, expect } from 'vitest';
import { CAPTION_STYLES, CTA_PROMPTS, HOOK_PROMPTS, spokenPrompt } from '../src/pipeline/platforms';
import {
  composeTimeline,
  computeWindows,
  forceStyle,
  formatAssTime,
  formatSrtTime,
  renderAss,
  renderSrt,
  splitLongLine,
  splitSentences,
} from '../src/pipeline/timeline';
import type { CaptionCue } from '../src/pipeline/types';

function expectOrdered(cues: CaptionCue[], total: number) {
  for (let i = 0; i + 1 < cues.length; i++) {
    expect(cues[i].endSec).toBeLessThanOrEqual(cues[i + 1].startSec);
    expect(cues[i].startSec).toBeLessThan(cues[i].endSec);
  }
  if (cues.length) expect(cues[cues.length - 1].endSec).toBeLessThanOrEqual(total);
}

describe('computeWindows', () => {
  it('reserves half the clip for the CTA up to the cap and floor', () => {
    expect(computeWindows({ narrationText: 'x', platform: 'tiktok', totalDurationSec: 60, maxDurationSec: 90 })).toEqual({
      totalDurationSec: 60,
      horizonSec: 60,
      hookEndSec: 5,
      ctaStartSec: 30,
      ctaEndSec: 60,
    });
  });

  it('shrinks the CTA block when it would run past the platform maximum', () => {
    const w = computeWindows({
      narrationText: 'x',
      platform: 'tiktok',
      totalDurationSec: 90,
      maxDurationSec: 70,
      ctaBudgetCapSec: 40,
      ctaStartFloorSec: 60,
    });
    expect(w.ctaStartSec).toBe(50);
    expect(w.ctaEndSec).toBe(70);
  });

  it('estimates the length from the word count when no audio length is known', () => {
    const text = Array.from({ length: 150 }, () => 'word').join(' ');
    expect(computeWindows({ narrationText: text, platform: 'tiktok', maxDurationSec: 90 }).totalDurationSec).toBe(60);
  });
});

describe('composeTimeline', () => {
  const text = 'First sentence here. Second one! Third?';

  it('lays out hook, content and CTA cues back to back', () => {
    const cues = composeTimeline({ narrationText: text, platform: 'tiktok', totalDurationSec: 60, maxDurationSec: 90 });
    expect(cues.map((c) => c.role)).toEqual(['hook', 'content', 'content', 'content', 'cta', 'cta', 'cta', 'cta']);
    expect(cues.map((c) => c.index)).toEqual([0, 1, 2, 3, 4, 5, 6, 7]);
    expect(cues[0]).toEqual({ index: 0, startSec: 0, endSec: 5, text: HOOK_PROMPTS.tiktok[0], role: 'hook' });
    expect(cues.slice(1, 4).map((c) => c.text)).toEqual(['First sentence here.', 'Second one!', 'Third?']);
    expect(cues[1].startSec).toBe(5);
    expect(cues[2].startSec).toBeCloseTo(5 + 25 / 3, 10);
    expect(cues[3].endSec).toBe(30);
    expect(cues[4].startSec).toBe(30);
    expect(cues.slice(4).map((c) => c.text)).toEqual([...CTA_PROMPTS.tiktok]);
    expect(cues.slice(4).map((c) => c.endSec - c.startSec)).toEqual([7.5, 7.5, 7.5, 7.5]);
    expect(cues[7].endSec).toBe(60);
    expectOrdered(cues, 60);
  });

  it('keeps CTA prompts inside the platform maximum', () => {
    const cues = composeTimeline({
      narrationText: text,
      platform: 'tiktok',
      totalDurationSec: 90,
      maxDurationSec: 70,
      ctaBudgetCapSec: 40,
      ctaStartFloorSec: 60,
    });
    const cta = cues.filter((c) => c.role === 'cta');
    expect(cta).toHaveLength(4);
    expect(cta[0].startSec).toBe(50);
    expect(cta[3].endSec).toBe(70);
    for (const c of cta) expect(c.endSec - c.startSec).toBeCloseTo(5, 10);
    expectOrdered(cues, 70);
  });

  it('splits long sentences at the middle word and halves their slot', () => {
    const cues = composeTimeline({
      narrationText: 'alpha beta gamma delta epsilon zeta.',
      platform: 'youtube_shorts',
      totalDurationSec: 60,
      maxDurationSec: 90,
      maxLineChars: 20,
    });
    const content = cues.filter((c) => c.role === 'content');
    expect(content.map((c) => [c.text, c.startSec, c.endSec])).toEqual([
      ['alpha beta gamma', 5, 17.5],
      ['delta epsilon zeta.', 17.5, 30],
    ]);
  });

  it('rotates prompts by the offset', () => {
    const cues = composeTimeline({
      narrationText: text,
      platform: 'instagram_reels',
      totalDurationSec: 60,
      maxDurationSec: 90,
      promptOffset: 1,
    });
    expect(cues[0].text).toBe(HOOK_PROMPTS.instagram_reels[1]);
    expect(cues.filter((c) => c.role === 'cta')[0].text).toBe(CTA_PROMPTS.instagram_reels[1]);
  });

  it('produces nothing without text or length', () => {
    expect(composeTimeline({ narrationText: '', platform: 'tiktok', maxDurationSec: 90 })).toEqual([]);
  });

  it('stays ordered for short clips where blocks collapse', () => {
    for (const total of [1, 4, 5, 6, 12, 35, 70, 89, 90, 120]) {
      const cues = composeTimeline({ narrationText: text, platform: 'tiktok', totalDurationSec: total, maxDurationSec: 90 });
      expectOrdered(cues, Math.min(total, 90));
    }
  });
});

describe('sentence helpers', () => {
  it('splits on terminal punctuation', () => {
    expect(splitSentences('One.  Two?\nThree! four')).toEqual(['One.', 'Two?', 'Three!', 'four']);
  });

  it('leaves short lines and single words alone', () => {
    expect(splitLongLine('short', 10)).toEqual(['short']);
    expect(splitLongLine('averyveryverylongword', 5)).toEqual(['averyveryverylongword']);
  });
});

describe('time formats', () => {
  it('formats SRT timestamps', () => {
    expect(formatSrtTime(0)).toBe('00:00:00,000');
    expect(formatSrtTime(3725.5)).toBe('01:02:05,500');
    expect(formatSrtTime(59.9999)).toBe('00:01:00,000');
  });

  it('formats ASS timestamps', () => {
    expect(formatAssTime(3725.5)).toBe('1:02:05.50');
    expect(formatAssTime(7.25)).toBe('0:00:07.25');
    expect(formatAssTime(0.004)).toBe('0:00:00.00');
  });
});

describe('caption documents', () => {
  const cues: CaptionCue[] = [
    { index: 0, startSec: 0, endSec: 5, text: 'Hook', role: 'hook' },
    { index: 1, startSec: 5, endSec: 10.5, text: 'Body', role: 'content' },
  ];

  it('renders SRT', () => {
    expect(renderSrt(cues)).toBe(
      '1\n00:00:00,000 --> 00:00:05,000\nHook\n\n2\n00:00:05,000 --> 00:00:10,500\nBody\n'
    );
  });

  it('renders ASS with per-role styles and optional fades', () => {
    const doc = renderAss(cues, CAPTION_STYLES.tiktok, { animate: true });
    const lines = doc.split('\n');
    expect(lines).toContain(
      'Style: Default,Arial,32,&H00FFFFFF,&H000000FF,&H00000000,&H80000000,-1,0,0,0,100,100,0,0,3,2,1,2,20,20,50,1'
    );
    expect(lines).toContain('Dialogue: 0,0:00:00.00,0:00:05.00,Hook,,0,0,0,,{\\fad(200,200)}Hook');
    expect(lines).toContain('Dialogue: 0,0:00:05.00,0:00:10.50,Default,,0,0,0,,{\\fad(200,200)}Body');
    expect(lines).toContain('PlayResY: 1920');
  });

  it('strips override braces from ASS text', () => {
    const doc = renderAss([{ index: 0, startSec: 0, endSec: 1, text: '{x}cta', role: 'cta' }], CAPTION_STYLES.tiktok);
    expect(doc.split('\n')).toContain('Dialogue: 0,0:00:00.00,0:00:01.00,CTA,,0,0,0,,xcta');
  });

  it('builds the force_style string', () => {
    expect(forceStyle(CAPTION_STYLES.tiktok)).toBe(
      'FontName=Arial,FontSize=32,PrimaryColour=&H00FFFFFF,OutlineColour=&H00000000,BorderStyle=3,Alignment=2,MarginV=50'
    );
  });

  it('drops emoji from spoken prompts', () => {
    expect(spokenPrompt('Follow for more content like this! 🔥')).toBe('Follow for more content like this!');
  });
});
