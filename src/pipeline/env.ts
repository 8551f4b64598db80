import * as dotenv from 'dotenv';
import os from 'os';
dotenv.config();

function num(value: string | undefined, fallback: number): number {
    if (value === undefined || value.trim() === '') return fallback;
    const n = Number(value);
    return Number.isFinite(n) ? n : fallback;
}

function flag(value: string | undefined, fallback = false): boolean {
    if (value === undefined || value.trim() === '') return fallback;
    return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

// Same default as a thread pool sized for I/O-bound work.
export const DEFAULT_MAX_THREADS = Math.min(32, os.cpus().length + 4);

export const ENV = {
    dbPath: process.env.DB_PATH || 'youtube.db',
    defaultLang: process.env.DEFAULT_LANG || 'es',
    maxThreads: num(process.env.MAX_THREADS, DEFAULT_MAX_THREADS),
    // Seconds added on both sides of a segment when extracting a clip
    spacingSecs: num(process.env.SPACING_SECS, 5),
    fetchRetries: num(process.env.FETCH_RETRIES, 0),
    fetchRetryBaseMs: num(process.env.FETCH_RETRY_BASE_MS, 1000),
    // Skip a video entirely once any of its caption tracks was reported missing;
    // false limits the skip to the requested language
    skipAnyUnavailable: flag(process.env.SKIP_ANY_UNAVAILABLE, true),
    // Optional: override yt-dlp binary name/path
    ytdlpBin: process.env.YTDLP_BIN || 'yt-dlp',
    // Optional: explicit python interpreter with yt_dlp installed for fallback (e.g. .venv/bin/python)
    ytdlpPythonBin: process.env.YTDLP_PYTHON_BIN || '',
    ytdlpCookiesFile: process.env.YTDLP_COOKIES_FILE || '',
    ytdlpUserAgent: process.env.YTDLP_USER_AGENT || '',
    ytdlpExtraArgs: process.env.YTDLP_EXTRA_ARGS || '',
    logLevel: process.env.LOG_LEVEL || 'info',
    logFormat: process.env.LOG_FORMAT || 'json',
    progressIntervalMs: num(process.env.PROGRESS_INTERVAL_MS, 1500),
} as const;
