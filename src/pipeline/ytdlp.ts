import { execa, ExecaError } from 'execa';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { z } from 'zod';
import { ENV } from './env';
import { MediaSourceError, MetadataError } from './errors';
import { toCollectionUrl, watchUrl } from './ids';
import { debug } from './log';
import type {
    CaptionFetchResult,
    ChannelRecord,
    ClipRequest,
    ListVideoIdsOptions,
    MediaSource,
    MediaSourceCallOptions,
    VideoRecord,
} from './types';
import { parseWebVtt } from './vtt';

const VideoInfoSchema = z.object({
    id: z.string().min(1),
    title: z.string(),
    webpage_url: z.string().min(1),
    uploader_id: z.string().min(1),
    uploader: z.string().nullish(),
    channel_url: z.string().min(1),
    upload_date: z
        .string()
        .regex(/^\d{8}$/)
        .nullish(),
});

interface PlaylistEntry {
    id?: string | null;
    entries?: PlaylistEntry[] | null;
}

const PlaylistEntrySchema: z.ZodType<PlaylistEntry> = z.lazy(() =>
    z.object({
        id: z.string().nullish(),
        entries: z.array(PlaylistEntrySchema).nullish(),
    })
);

/** Maps yt-dlp's info JSON onto the video and channel records. */
export function parseVideoInfo(raw: unknown): { video: VideoRecord; channel: ChannelRecord } {
    const parsed = VideoInfoSchema.safeParse(raw);
    if (!parsed.success) {
        throw new MetadataError('Unexpected video info JSON', {
            issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
        });
    }
    const info = parsed.data;
    const d = info.upload_date;
    return {
        video: {
            videoId: info.id,
            title: info.title,
            url: info.webpage_url,
            uploadDate: d ? `${d.slice(0, 4)}-${d.slice(4, 6)}-${d.slice(6, 8)}` : null,
            uploaderId: info.uploader_id,
        },
        channel: {
            uploaderId: info.uploader_id,
            name: info.uploader ?? null,
            url: info.channel_url,
        },
    };
}

/** Video ids of a flat listing; channel tabs nest playlists one level deeper. */
export function collectEntryIds(entry: PlaylistEntry): string[] {
    if (entry.entries) return entry.entries.flatMap(collectEntryIds);
    return entry.id ? [entry.id] : [];
}

function extraArgs(): string[] {
    const extra: string[] = [];
    if (ENV.ytdlpCookiesFile) {
        extra.push('--cookies', ENV.ytdlpCookiesFile);
    }
    if (ENV.ytdlpUserAgent) {
        extra.push('--user-agent', ENV.ytdlpUserAgent);
    }
    if (ENV.ytdlpExtraArgs) {
        extra.push(
            ...ENV.ytdlpExtraArgs
                .split(' ')
                .map((s) => s.trim())
                .filter(Boolean)
        );
    }
    return extra;
}

function describeFailure(e: unknown): string {
    if (e instanceof ExecaError) {
        return String(e.stderr || e.stdout || e.shortMessage || e.message);
    }
    return e instanceof Error ? e.message : String(e);
}

/**
 * Runs yt-dlp, falling back to other ways of launching it when a binary is
 * missing. Any other failure is final for this call.
 */
export async function runYtDlp(args: string[], opts: MediaSourceCallOptions = {}): Promise<string> {
    const fullArgs = [...extraArgs(), ...args];
    const candidates: Array<[string, string[]]> = [[ENV.ytdlpBin, fullArgs]];
    if (ENV.ytdlpBin !== 'yt-dlp') {
        candidates.push(['yt-dlp', fullArgs]);
    }
    if (ENV.ytdlpPythonBin) {
        candidates.push([ENV.ytdlpPythonBin, ['-m', 'yt_dlp', ...fullArgs]]);
    }
    candidates.push(['python3', ['-m', 'yt_dlp', ...fullArgs]]);

    const missing: string[] = [];
    for (const [cmd, a] of candidates) {
        try {
            debug('ytdlp.exec', { cmd, args: a });
            const res = await execa(cmd, a, { stdio: 'pipe', cancelSignal: opts.signal });
            return res.stdout;
        } catch (e) {
            if (e instanceof ExecaError && e.code === 'ENOENT') {
                missing.push(cmd);
                continue;
            }
            throw new MediaSourceError(`yt-dlp failed: ${describeFailure(e)}`, { cmd }, { cause: e });
        }
    }
    throw new MediaSourceError(`yt-dlp not found. Tried: ${missing.join(', ')}`, { tried: missing });
}

export class YtDlpMediaSource implements MediaSource {
    async listVideoIds(collectionRef: string, opts: ListVideoIdsOptions = {}): Promise<string[]> {
        const stdout = await runYtDlp([
            '--flat-playlist',
            '-J',
            '--no-warnings',
            toCollectionUrl(collectionRef),
        ]);
        let json: unknown;
        try {
            json = JSON.parse(stdout);
        } catch {
            throw new MetadataError('yt-dlp listing is not valid JSON', { collectionRef });
        }
        const parsed = PlaylistEntrySchema.safeParse(json);
        if (!parsed.success) {
            throw new MetadataError('Unexpected yt-dlp listing JSON', { collectionRef });
        }
        const ids = [...new Set(collectEntryIds(parsed.data))];
        return typeof opts.limit === 'number' ? ids.slice(0, opts.limit) : ids;
    }

    async fetchCaptions(
        videoId: string,
        lang: string,
        opts: MediaSourceCallOptions = {}
    ): Promise<CaptionFetchResult> {
        const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'supercut-'));
        try {
            await runYtDlp(
                [
                    '--skip-download',
                    '--write-auto-subs',
                    '--write-info-json',
                    '--sub-format',
                    'vtt',
                    '--convert-subs',
                    'vtt',
                    '--sub-langs',
                    `${lang},-live_chat`,
                    '--no-progress',
                    '--no-warnings',
                    '-o',
                    path.join(dir, '%(id)s.%(ext)s'),
                    watchUrl(videoId),
                ],
                opts
            );

            const subPath = path.join(dir, `${videoId}.${lang}.vtt`);
            if (!(await fs.pathExists(subPath))) {
                return { status: 'not_found' };
            }

            const infoPath = path.join(dir, `${videoId}.info.json`);
            let raw: unknown;
            try {
                raw = await fs.readJson(infoPath);
            } catch (e) {
                throw new MetadataError('Video info JSON missing or unreadable', {
                    videoId,
                    error: e instanceof Error ? e.message : String(e),
                });
            }
            const { video, channel } = parseVideoInfo(raw);
            const cues = parseWebVtt(await fs.readFile(subPath, 'utf8'));
            return { status: 'found', cues, video, channel };
        } finally {
            await fs.remove(dir);
        }
    }

    async fetchClip(req: ClipRequest, opts: MediaSourceCallOptions = {}): Promise<void> {
        await fs.ensureDir(req.folder);
        // yt-dlp treats % in -o as a template field
        const template = path.join(req.folder, `${req.fileStem.replace(/%/g, '%%')}.%(ext)s`);
        await runYtDlp(
            [
                '--force-keyframes-at-cuts',
                '--download-sections',
                `*${req.start}-${req.end}`,
                '--no-progress',
                '-o',
                template,
                req.url,
            ],
            opts
        );
    }
}
