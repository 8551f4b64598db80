import type { CaptionStore } from '../db/store';
import { ENV } from './env';
import { toErrorMessage } from './errors';
import { debug, info, startStep, warn } from './log';
import { normalizeCues } from './normalize';
import { DEFAULT_RETRY_CONFIG, type RetryConfig, withRetry } from './retry';
import type { MediaSource } from './types';

export type ItemOutcome = 'indexed' | 'unavailable' | 'failed' | 'abandoned';

export interface IndexProgress {
    /** Completed items so far; strictly increasing across calls */
    done: number;
    total: number;
    videoId: string;
    outcome: ItemOutcome;
}

export interface IndexVideosOptions {
    store: CaptionStore;
    source: MediaSource;
    maxThreads?: number;
    signal?: AbortSignal;
    retry?: RetryConfig;
    onProgress?: (p: IndexProgress) => void;
}

export interface IndexFailure {
    videoId: string;
    error: string;
}

export interface IndexSummary {
    total: number;
    indexed: number;
    unavailable: number;
    failed: number;
    /** Never started or abandoned because of an abort */
    skipped: number;
    aborted: boolean;
    failures: IndexFailure[];
}

async function indexOne(
    videoId: string,
    lang: string,
    opts: IndexVideosOptions
): Promise<ItemOutcome> {
    const { store, source, signal } = opts;
    const result = await withRetry(
        () => source.fetchCaptions(videoId, lang, { signal }),
        opts.retry ?? DEFAULT_RETRY_CONFIG,
        signal
    );
    // Whatever arrives after an abort is dropped before it touches the store
    if (signal?.aborted) return 'abandoned';

    if (result.status === 'not_found') {
        await store.setLanguageAvailability(videoId, lang, false);
        debug('index.item.unavailable', { videoId, lang });
        return 'unavailable';
    }

    const segments = normalizeCues(videoId, lang, result.cues);
    await store.saveIndexedVideo({
        channel: result.channel,
        video: { ...result.video, videoId },
        lang,
        segments,
    });
    debug('index.item.indexed', { videoId, lang, cues: result.cues.length, segments: segments.length });
    return 'indexed';
}

/**
 * Fetches and stores captions for every id with a bounded pool of workers.
 * One item failing never stops the others; an abort stops new fetches and
 * drops results of fetches still in flight.
 */
export async function indexVideos(
    videoIds: string[],
    lang: string,
    opts: IndexVideosOptions
): Promise<IndexSummary> {
    const total = videoIds.length;
    const concurrency = Math.max(1, Math.floor(opts.maxThreads ?? ENV.maxThreads) || 1);
    const queue = [...videoIds];
    const summary: IndexSummary = {
        total,
        indexed: 0,
        unavailable: 0,
        failed: 0,
        skipped: 0,
        aborted: false,
        failures: [],
    };
    const step = startStep('index', { total, lang, concurrency });
    let done = 0;

    const report = (videoId: string, outcome: ItemOutcome) => {
        done++;
        step.eta(done, total);
        opts.onProgress?.({ done, total, videoId, outcome });
    };

    async function worker() {
        while (queue.length) {
            if (opts.signal?.aborted) break;
            const id = queue.shift();
            if (!id) break;
            let outcome: ItemOutcome;
            try {
                outcome = await indexOne(id, lang, opts);
            } catch (e) {
                if (opts.signal?.aborted) {
                    outcome = 'abandoned';
                } else {
                    outcome = 'failed';
                    const error = toErrorMessage(e);
                    summary.failures.push({ videoId: id, error });
                    warn('index.item.fail', { videoId: id, lang, error });
                }
            }
            if (outcome === 'indexed') summary.indexed++;
            else if (outcome === 'unavailable') summary.unavailable++;
            else if (outcome === 'failed') summary.failed++;
            else summary.skipped++;
            report(id, outcome);
        }
    }

    const workers: Promise<void>[] = [];
    for (let i = 0; i < Math.min(concurrency, Math.max(total, 1)); i++) {
        workers.push(worker());
    }
    await Promise.all(workers);

    summary.aborted = Boolean(opts.signal?.aborted);
    // ids never taken from the queue
    summary.skipped += queue.length;
    step.end({
        indexed: summary.indexed,
        unavailable: summary.unavailable,
        failed: summary.failed,
        skipped: summary.skipped,
    });
    if (summary.aborted) {
        info('index.aborted', { done, total, skipped: summary.skipped });
    }
    return summary;
}
