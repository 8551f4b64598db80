import type { Cue } from './types';

const TIMESTAMP_PATTERN = /^(?:(\d{2,}):)?(\d{2}):(\d{2})\.(\d{3})$/;

export function parseVttTimestamp(value: string): number | null {
  const match = TIMESTAMP_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }

  const hours = Number.parseInt(match[1] ?? '0', 10);
  const minutes = Number.parseInt(match[2] ?? '0', 10);
  const seconds = Number.parseInt(match[3] ?? '0', 10);
  const millis = Number.parseInt(match[4] ?? '0', 10);
  return hours * 3600 + minutes * 60 + seconds + millis / 1000;
}

function isMetadataBlock(line: string): boolean {
  return /^(NOTE|STYLE|REGION)(\s|$)/.test(line);
}

/**
 * Parses a WebVTT document into cues. Header lines, NOTE/STYLE/REGION
 * blocks and cue identifiers are skipped; cue settings after the end
 * timestamp (`align:start position:0%`) are ignored.
 */
export function parseWebVtt(vtt: string): Cue[] {
  const lines = vtt.replace(/^\uFEFF/, '').replace(/\r\n?/g, '\n').split('\n');
  const cues: Cue[] = [];

  let i = 0;
  if ((lines[0] ?? '').startsWith('WEBVTT')) {
    // header block runs until the first blank line (Kind:, Language:, ...)
    while (i < lines.length && (lines[i] ?? '').trim() !== '') i += 1;
  }

  while (i < lines.length) {
    const line = (lines[i] ?? '').trim();
    if (!line) {
      i += 1;
      continue;
    }

    if (isMetadataBlock(line)) {
      while (i < lines.length && (lines[i] ?? '').trim() !== '') i += 1;
      continue;
    }

    if (!line.includes('-->')) {
      // cue identifier; the timing line follows
      i += 1;
      continue;
    }

    const [left = '', right = ''] = line.split('-->');
    const startTime = left.trim();
    const endTime = right.trim().split(/\s+/)[0] ?? '';
    const start = parseVttTimestamp(startTime);
    const end = parseVttTimestamp(endTime);

    i += 1;
    const textLines: string[] = [];
    while (i < lines.length && (lines[i] ?? '').trim() !== '') {
      textLines.push(lines[i] ?? '');
      i += 1;
    }

    if (start === null || end === null) {
      continue;
    }

    cues.push({ start, end, startTime, endTime, text: textLines.join('\n') });
  }

  return cues;
}
