import fs from 'fs-extra';
import path from 'path';
import { ENV } from './env';
import { toErrorMessage } from './errors';
import { info, startStep, warn } from './log';
import type { MediaSource, SearchRow } from './types';

export const ARCHIVE_FILE = 'archive.txt';

export type ClipRow = Pick<
    SearchRow,
    'video_id' | 'video_title' | 'start_seconds' | 'end_seconds' | 'start_time' | 'end_time' | 'link'
>;

export interface ClipWindow {
    start: number;
    end: number;
}

export function clipWindow(row: ClipRow, spacingSecs: number): ClipWindow {
    return {
        start: Math.max(0, row.start_seconds - spacingSecs),
        end: row.end_seconds + spacingSecs,
    };
}

export function clipKey(videoId: string, w: ClipWindow): string {
    return `${videoId} ${w.start}-${w.end}`;
}

function safeName(s: string): string {
    return s.replace(/[\\/:*?"<>|\x00-\x1f]/g, '-').trim();
}

/** `<title>.<video id>.<start time>-<end time>` with file-system-unsafe characters replaced. */
export function clipFileStem(row: ClipRow): string {
    return [safeName(row.video_title), row.video_id, `${safeName(row.start_time)}-${safeName(row.end_time)}`].join('.');
}

/** Default destination for the clips of one search. */
export function clipFolderFor(text: string): string {
    return `output-${text.replace(/ /g, '-').toLowerCase()}`;
}

/**
 * Per-folder record of clips already downloaded, one `<video id> <start>-<end>`
 * key per line. Survives across runs.
 */
export class ClipArchive {
    private readonly keys = new Set<string>();

    private constructor(readonly file: string) {}

    static async open(folder: string): Promise<ClipArchive> {
        const archive = new ClipArchive(path.join(folder, ARCHIVE_FILE));
        if (await fs.pathExists(archive.file)) {
            const content = await fs.readFile(archive.file, 'utf8');
            for (const line of content.split(/\r?\n/)) {
                if (line.trim()) archive.keys.add(line.trim());
            }
        }
        return archive;
    }

    has(key: string): boolean {
        return this.keys.has(key);
    }

    get size(): number {
        return this.keys.size;
    }

    async add(key: string): Promise<void> {
        if (this.keys.has(key)) return;
        await fs.ensureDir(path.dirname(this.file));
        await fs.appendFile(this.file, key + '\n');
        this.keys.add(key);
    }
}

export interface ExtractOptions {
    source: MediaSource;
    folder: string;
    spacingSecs?: number;
    signal?: AbortSignal;
    /** Reuse an open archive, e.g. across a batch */
    archive?: ClipArchive;
}

export type ExtractOutcome = 'downloaded' | 'skipped';

export async function extractClip(row: ClipRow, opts: ExtractOptions): Promise<ExtractOutcome> {
    const window = clipWindow(row, opts.spacingSecs ?? ENV.spacingSecs);
    const key = clipKey(row.video_id, window);
    const archive = opts.archive ?? (await ClipArchive.open(opts.folder));
    if (archive.has(key)) {
        info('clip.skip', { videoId: row.video_id, ...window });
        return 'skipped';
    }
    await opts.source.fetchClip(
        {
            url: row.link,
            videoId: row.video_id,
            start: window.start,
            end: window.end,
            folder: opts.folder,
            fileStem: clipFileStem(row),
        },
        { signal: opts.signal }
    );
    await archive.add(key);
    info('clip.downloaded', { videoId: row.video_id, ...window, folder: opts.folder });
    return 'downloaded';
}

export interface ExtractSummary {
    downloaded: number;
    skipped: number;
    failed: number;
    failures: Array<{ videoId: string; start: number; end: number; error: string }>;
}

/** Extracts clips one after another; a failed clip is recorded and the batch goes on. */
export async function extractClips(
    rows: Iterable<ClipRow>,
    opts: Omit<ExtractOptions, 'archive'>
): Promise<ExtractSummary> {
    const list = [...rows];
    const archive = await ClipArchive.open(opts.folder);
    const summary: ExtractSummary = { downloaded: 0, skipped: 0, failed: 0, failures: [] };
    const step = startStep('clips', { total: list.length, folder: opts.folder });
    let done = 0;
    for (const row of list) {
        if (opts.signal?.aborted) break;
        try {
            const outcome = await extractClip(row, { ...opts, archive });
            summary[outcome]++;
        } catch (e) {
            const w = clipWindow(row, opts.spacingSecs ?? ENV.spacingSecs);
            const error = toErrorMessage(e);
            summary.failed++;
            summary.failures.push({ videoId: row.video_id, ...w, error });
            warn('clip.fail', { videoId: row.video_id, ...w, error });
        }
        step.eta(++done, list.length);
    }
    step.end({ downloaded: summary.downloaded, skipped: summary.skipped, failed: summary.failed });
    return summary;
}
