import type { Cue, SegmentRecord } from './types';

/** Cues shorter than this are rolling-caption artefacts and are dropped. */
export const MIN_CUE_DURATION_MS = 500;

// track timestamps have millisecond resolution
function durationMs(cue: Cue): number {
    return Math.round((cue.end - cue.start) * 1000);
}

export function firstLine(text: string): string {
    const nl = text.indexOf('\n');
    return nl === -1 ? text : text.slice(0, nl);
}

export function normalizeCues(videoId: string, lang: string, cues: Cue[]): SegmentRecord[] {
    const segments: SegmentRecord[] = [];
    for (const cue of cues) {
        if (durationMs(cue) < MIN_CUE_DURATION_MS) continue;
        segments.push({
            videoId,
            lang,
            startSeconds: Math.floor(cue.start),
            endSeconds: Math.ceil(cue.end),
            startTime: cue.startTime,
            endTime: cue.endTime,
            text: firstLine(cue.text),
        });
    }
    return segments;
}
