import Database from 'better-sqlite3';
import type { Database as DatabaseInstance } from 'better-sqlite3';
import { ENV } from '../pipeline/env';
import { SearchQueryError, StoreError } from '../pipeline/errors';
import { WriteLock, globalWriteLock } from '../pipeline/lock';
import { debug, warn } from '../pipeline/log';
import type {
  ChannelRecord,
  SearchFilters,
  SearchRow,
  SegmentRecord,
  StoreStats,
  VideoRecord,
} from '../pipeline/types';
import { migrate } from './migrate';

export interface CaptionStoreConfig {
  databasePath?: string;
  database?: DatabaseInstance;
  /** Defaults to the process-wide lock shared by every store */
  lock?: WriteLock;
  /** Skip applying migrations on open */
  skipMigrations?: boolean;
}

export interface FilterOptions {
  /**
   * Also drop candidates that have an unavailable track in any language,
   * not only the requested one. Defaults to true.
   */
  skipAnyUnavailable?: boolean;
}

/** Everything written for one successfully fetched video. */
export interface IndexedVideo {
  channel: ChannelRecord;
  video: VideoRecord;
  lang: string;
  segments: SegmentRecord[];
}

export interface ChannelSummary extends ChannelRecord {
  videoCount: number;
}

export interface DeleteChannelResult {
  channelDeleted: boolean;
  videosDeleted: number;
}

interface ChannelRow {
  uploader_id: string;
  channel_name: string | null;
  channel_url: string;
}

interface ChannelSummaryRow extends ChannelRow {
  video_count: number;
}

interface VideoRow {
  video_id: string;
  video_title: string;
  video_url: string;
  upload_date: string | null;
  uploader_id: string;
}

interface SegmentRow {
  video_id: string;
  lang: string;
  start_seconds: number;
  end_seconds: number;
  start_time: string;
  end_time: string;
  text: string;
}

function mapChannel(row: ChannelRow): ChannelRecord {
  return { uploaderId: row.uploader_id, name: row.channel_name, url: row.channel_url };
}

function mapVideo(row: VideoRow): VideoRecord {
  return {
    videoId: row.video_id,
    title: row.video_title,
    url: row.video_url,
    uploadDate: row.upload_date,
    uploaderId: row.uploader_id,
  };
}

function mapSegment(row: SegmentRow): SegmentRecord {
  return {
    videoId: row.video_id,
    lang: row.lang,
    startSeconds: row.start_seconds,
    endSeconds: row.end_seconds,
    startTime: row.start_time,
    endTime: row.end_time,
    text: row.text,
  };
}

function toStoreError(operation: string, e: unknown): StoreError {
  if (e instanceof StoreError) return e;
  const msg = e instanceof Error ? e.message : String(e);
  return new StoreError(operation, `${operation} failed: ${msg}`, { cause: e });
}

function isFtsQueryError(e: unknown): boolean {
  return (
    e instanceof Database.SqliteError &&
    /fts5|syntax error|unterminated string|no such column/i.test(e.message)
  );
}

/**
 * SQLite-backed archive of channels, videos, caption segments and
 * per-language availability, with an FTS5 index over segment text.
 *
 * Reads are synchronous. Every mutation is one SQLite transaction run
 * under the write lock, so no two write units interleave and readers never
 * see half of one. A `search` iterator keeps the connection busy until it
 * is exhausted or closed; do not write through the same store meanwhile.
 */
export class CaptionStore {
  private readonly db: DatabaseInstance;
  private readonly lock: WriteLock;

  constructor(config: CaptionStoreConfig = {}) {
    try {
      this.db = config.database ?? new Database(config.databasePath ?? ':memory:');
      this.db.pragma('foreign_keys = ON');
      this.db.pragma('busy_timeout = 5000');
      if (!this.db.memory) this.db.pragma('journal_mode = WAL');
      if (!config.skipMigrations) migrate(this.db);
    } catch (e) {
      throw toStoreError('open', e);
    }
    this.lock = config.lock ?? globalWriteLock;
  }

  close(): void {
    if (this.db.open) this.db.close();
  }

  private read<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (e) {
      throw toStoreError(operation, e);
    }
  }

  private write<T>(operation: string, fn: () => T): Promise<T> {
    return this.lock.run(() => {
      try {
        const result = this.db.transaction(fn)();
        debug('store.write', { operation });
        return result;
      } catch (e) {
        warn('store.write.fail', { operation, error: e instanceof Error ? e.message : String(e) });
        throw toStoreError(operation, e);
      }
    });
  }

  // -- single statements, always called inside a transaction -----------------

  private putChannel(channel: ChannelRecord) {
    this.db
      .prepare(
        `INSERT INTO channels (uploader_id, channel_name, channel_url)
         VALUES (@uploaderId, @name, @url)
         ON CONFLICT (uploader_id) DO UPDATE SET
           channel_name = excluded.channel_name,
           channel_url = excluded.channel_url`
      )
      .run(channel);
  }

  private putVideo(video: VideoRecord) {
    // ON CONFLICT rather than REPLACE: a REPLACE deletes the row first and
    // would cascade to the video's segments.
    this.db
      .prepare(
        `INSERT INTO videos (video_id, video_title, video_url, uploader_id, upload_date)
         VALUES (@videoId, @title, @url, @uploaderId, @uploadDate)
         ON CONFLICT (video_id) DO UPDATE SET
           video_title = excluded.video_title,
           video_url = excluded.video_url,
           uploader_id = excluded.uploader_id,
           upload_date = excluded.upload_date`
      )
      .run(video);
  }

  private putSegments(videoId: string, lang: string, segments: SegmentRecord[]) {
    this.db
      .prepare('DELETE FROM subtitles WHERE video_id = ? AND lang = ?')
      .run(videoId, lang);
    const insert = this.db.prepare(
      `INSERT INTO subtitles (video_id, lang, start_time, end_time, start_seconds, end_seconds, text)
       VALUES (@videoId, @lang, @startTime, @endTime, @startSeconds, @endSeconds, @text)`
    );
    for (const s of segments) {
      if (s.videoId !== videoId || s.lang !== lang) {
        throw new StoreError(
          'replaceSegments',
          `segment for ${s.videoId}/${s.lang} passed while replacing ${videoId}/${lang}`
        );
      }
      insert.run(s);
    }
  }

  private putAvailability(videoId: string, lang: string, available: boolean) {
    if (!available) {
      // an unavailable track has no segments
      this.db
        .prepare('DELETE FROM subtitles WHERE video_id = ? AND lang = ?')
        .run(videoId, lang);
    }
    this.db
      .prepare(
        `INSERT INTO video_languages (video_id, lang, available) VALUES (?, ?, ?)
         ON CONFLICT (video_id, lang) DO UPDATE SET available = excluded.available`
      )
      .run(videoId, lang, available ? 1 : 0);
  }

  // -- mutations ---------------------------------------------------------------

  upsertChannel(channel: ChannelRecord): Promise<void> {
    return this.write('upsertChannel', () => this.putChannel(channel));
  }

  upsertVideo(video: VideoRecord): Promise<void> {
    return this.write('upsertVideo', () => this.putVideo(video));
  }

  /** Deletes every segment of `(videoId, lang)` and inserts `segments` in their place. */
  replaceSegments(videoId: string, lang: string, segments: SegmentRecord[]): Promise<void> {
    return this.write('replaceSegments', () => this.putSegments(videoId, lang, segments));
  }

  setLanguageAvailability(videoId: string, lang: string, available: boolean): Promise<void> {
    return this.write('setLanguageAvailability', () =>
      this.putAvailability(videoId, lang, available)
    );
  }

  /**
   * The write unit of one ingested video: channel, video, segment set and
   * the availability flag, committed together or not at all.
   */
  saveIndexedVideo(unit: IndexedVideo): Promise<void> {
    return this.write('saveIndexedVideo', () => {
      this.putChannel(unit.channel);
      this.putVideo(unit.video);
      this.putSegments(unit.video.videoId, unit.lang, unit.segments);
      this.putAvailability(unit.video.videoId, unit.lang, true);
    });
  }

  /** Removes a video with its segments and availability rows. */
  deleteVideo(videoId: string): Promise<boolean> {
    return this.write('deleteVideo', () => {
      this.db.prepare('DELETE FROM subtitles WHERE video_id = ?').run(videoId);
      this.db.prepare('DELETE FROM video_languages WHERE video_id = ?').run(videoId);
      return this.db.prepare('DELETE FROM videos WHERE video_id = ?').run(videoId).changes > 0;
    });
  }

  /** Removes a channel and cascades through all of its videos. */
  deleteChannel(uploaderId: string): Promise<DeleteChannelResult> {
    return this.write('deleteChannel', () => {
      const owned = 'SELECT video_id FROM videos WHERE uploader_id = ?';
      this.db.prepare(`DELETE FROM subtitles WHERE video_id IN (${owned})`).run(uploaderId);
      this.db.prepare(`DELETE FROM video_languages WHERE video_id IN (${owned})`).run(uploaderId);
      const videos = this.db.prepare('DELETE FROM videos WHERE uploader_id = ?').run(uploaderId);
      const channel = this.db
        .prepare('DELETE FROM channels WHERE uploader_id = ?')
        .run(uploaderId);
      return { channelDeleted: channel.changes > 0, videosDeleted: videos.changes };
    });
  }

  // -- reads -------------------------------------------------------------------

  getChannel(uploaderId: string): ChannelRecord | null {
    return this.read('getChannel', () => {
      const row = this.db
        .prepare<[string], ChannelRow>('SELECT * FROM channels WHERE uploader_id = ?')
        .get(uploaderId);
      return row ? mapChannel(row) : null;
    });
  }

  listChannels(): ChannelSummary[] {
    return this.read('listChannels', () =>
      this.db
        .prepare<[], ChannelSummaryRow>(
          `SELECT c.*, (SELECT COUNT(*) FROM videos v WHERE v.uploader_id = c.uploader_id) AS video_count
           FROM channels c ORDER BY c.uploader_id`
        )
        .all()
        .map((row) => ({ ...mapChannel(row), videoCount: row.video_count }))
    );
  }

  getVideo(videoId: string): VideoRecord | null {
    return this.read('getVideo', () => {
      const row = this.db
        .prepare<[string], VideoRow>('SELECT * FROM videos WHERE video_id = ?')
        .get(videoId);
      return row ? mapVideo(row) : null;
    });
  }

  listVideos(uploaderId?: string): VideoRecord[] {
    return this.read('listVideos', () => {
      const rows = uploaderId
        ? this.db
            .prepare<[string], VideoRow>('SELECT * FROM videos WHERE uploader_id = ? ORDER BY video_id')
            .all(uploaderId)
        : this.db.prepare<[], VideoRow>('SELECT * FROM videos ORDER BY video_id').all();
      return rows.map(mapVideo);
    });
  }

  /** `true`/`false` when a fetch was attempted, `null` when never tried. */
  getLanguageAvailability(videoId: string, lang: string): boolean | null {
    return this.read('getLanguageAvailability', () => {
      const row = this.db
        .prepare<[string, string], { available: number }>(
          'SELECT available FROM video_languages WHERE video_id = ? AND lang = ?'
        )
        .get(videoId, lang);
      return row ? row.available === 1 : null;
    });
  }

  listSegments(videoId: string, lang: string): SegmentRecord[] {
    return this.read('listSegments', () =>
      this.db
        .prepare<[string, string], SegmentRow>(
          `SELECT video_id, lang, start_seconds, end_seconds, start_time, end_time, text
           FROM subtitles WHERE video_id = ? AND lang = ? ORDER BY start_seconds, subtitle_id`
        )
        .all(videoId, lang)
        .map(mapSegment)
    );
  }

  countSegments(videoId: string, lang?: string): number {
    return this.read('countSegments', () => {
      const row = lang
        ? this.db
            .prepare<[string, string], { n: number }>(
              'SELECT COUNT(*) AS n FROM subtitles WHERE video_id = ? AND lang = ?'
            )
            .get(videoId, lang)
        : this.db
            .prepare<[string], { n: number }>('SELECT COUNT(*) AS n FROM subtitles WHERE video_id = ?')
            .get(videoId);
      return row?.n ?? 0;
    });
  }

  stats(): StoreStats {
    return this.read('stats', () => {
      const row = this.db
        .prepare<[], { channels: number; videos: number; segments: number }>(
          `SELECT
             (SELECT COUNT(*) FROM channels) AS channels,
             (SELECT COUNT(*) FROM videos) AS videos,
             (SELECT COUNT(*) FROM subtitles) AS segments`
        )
        .get();
      return {
        channelCount: row?.channels ?? 0,
        videoCount: row?.videos ?? 0,
        segmentCount: row?.segments ?? 0,
      };
    });
  }

  /**
   * Returns the candidates that still need fetching for `lang`, in one
   * query: ids are passed as a JSON array and joined through `json_each`.
   */
  filterNeedsIndexing(
    candidateIds: Iterable<string>,
    lang: string,
    opts: FilterOptions = {}
  ): string[] {
    const ids = JSON.stringify([...candidateIds]);
    const attempted = opts.skipAnyUnavailable ?? true
      ? 'SELECT video_id FROM video_languages WHERE lang = @lang OR available = 0'
      : 'SELECT video_id FROM video_languages WHERE lang = @lang';
    return this.read('filterNeedsIndexing', () =>
      this.db
        .prepare<{ ids: string; lang: string }, { video_id: string }>(
          `SELECT DISTINCT c.value AS video_id
           FROM json_each(@ids) c
           WHERE c.value NOT IN (${attempted})`
        )
        .all({ ids, lang })
        .map((r) => r.video_id)
    );
  }

  /**
   * Full-text search over segment text, optionally limited to one channel
   * and/or language. Rows stream from SQLite ordered by video then start
   * second; calling again re-runs the query.
   */
  search(text: string, filters: SearchFilters = {}): IterableIterator<SearchRow> {
    const where = ['subtitle_id IN (SELECT rowid FROM subtitles_fts WHERE subtitles_fts MATCH @text)'];
    const params: Record<string, string> = { text };

    if (filters.lang) {
      where.push('lang = @lang');
      params.lang = filters.lang;
    }
    if (filters.uploaderId) {
      where.push('uploader_id = @uploaderId');
      params.uploaderId = filters.uploaderId;
    }

    const sql = `SELECT * FROM subtitles_with_videos
      WHERE ${where.join(' AND ')}
      ORDER BY video_id ASC, start_seconds ASC, subtitle_id ASC`;

    const stmt = this.read('search', () =>
      this.db.prepare<Record<string, string>, SearchRow>(sql)
    );

    function* rows(): Generator<SearchRow, void, undefined> {
      try {
        yield* stmt.iterate(params);
      } catch (e) {
        if (isFtsQueryError(e)) {
          throw new SearchQueryError(text, `invalid search query: ${text}`, { cause: e });
        }
        throw toStoreError('search', e);
      }
    }
    return rows();
  }
}

export function openStore(databasePath = ENV.dbPath, config: Omit<CaptionStoreConfig, 'databasePath' | 'database'> = {}): CaptionStore {
  return new CaptionStore({ ...config, databasePath });
}

/** Opens the store, runs `fn` and always closes it again. */
export async function withStore<T>(
  fn: (store: CaptionStore) => Promise<T> | T,
  databasePath = ENV.dbPath
): Promise<T> {
  const store = openStore(databasePath);
  try {
    return await fn(store);
  } finally {
    store.close();
  }
}
