import type { CaptionStore } from "../db/store";
import { ENV } from "./env";
import { indexVideos, type IndexProgress, type IndexSummary } from "./index-videos";
import { info } from "./log";
import type { MediaSource } from "./types";

export interface RunIndexOptions {
  store: CaptionStore;
  source: MediaSource;
  maxThreads?: number;
  signal?: AbortSignal;
  /** Only consider the first N listed videos */
  limit?: number;
  /** Re-index every listed video, even those already attempted */
  force?: boolean;
  skipAnyUnavailable?: boolean;
  onProgress?: (p: IndexProgress) => void;
}

export interface RunIndexResult extends IndexSummary {
  listed: number;
  planned: number;
}

/**
 * Lists a collection, keeps the videos that still need `lang` captions and
 * indexes them.
 */
export async function runIndex(
  collectionRef: string,
  lang: string,
  opts: RunIndexOptions
): Promise<RunIndexResult> {
  const startTs = Date.now();
  info("run.list", { collectionRef });
  const listed = await opts.source.listVideoIds(collectionRef, { limit: opts.limit });
  const planned = opts.force
    ? [...new Set(listed)]
    : opts.store.filterNeedsIndexing(listed, lang, {
        skipAnyUnavailable: opts.skipAnyUnavailable ?? ENV.skipAnyUnavailable,
      });
  info("run.plan", { collectionRef, lang, listed: listed.length, planned: planned.length });

  const summary = await indexVideos(planned, lang, {
    store: opts.store,
    source: opts.source,
    maxThreads: opts.maxThreads,
    signal: opts.signal,
    onProgress: opts.onProgress,
  });
  info("run.complete", {
    collectionRef,
    lang,
    durationMs: Date.now() - startTs,
    indexed: summary.indexed,
    failed: summary.failed,
    aborted: summary.aborted,
  });
  return { ...summary, listed: listed.length, planned: planned.length };
}
