import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CaptionStore } from '../src/db/store';
import { SearchQueryError, StoreError } from '../src/pipeline/errors';
import type { SegmentRecord } from '../src/pipeline/types';

function seg(videoId: string, start: number, end: number, text: string, lang = 'es'): SegmentRecord {
  return {
    videoId,
    lang,
    startSeconds: start,
    endSeconds: end,
    startTime: `t${start}`,
    endTime: `t${end}`,
    text,
  };
}

async function seedVideo(store: CaptionStore, videoId: string, uploaderId = '@chan', url?: string) {
  await store.upsertChannel({
    uploaderId,
    name: `Channel ${uploaderId}`,
    url: `https://www.youtube.com/${uploaderId}`,
  });
  await store.upsertVideo({
    videoId,
    title: `Video ${videoId}`,
    url: url ?? `https://www.youtube.com/watch?v=${videoId}`,
    uploadDate: '2023-01-15',
    uploaderId,
  });
}

describe('CaptionStore', () => {
  let store: CaptionStore;

  beforeEach(() => {
    store = new CaptionStore();
  });

  afterEach(() => {
    store.close();
  });

  describe('channels and videos', () => {
    it('upserts and reads back channels and videos', async () => {
      await seedVideo(store, 'a');
      expect(store.getChannel('@chan')).toEqual({
        uploaderId: '@chan',
        name: 'Channel @chan',
        url: 'https://www.youtube.com/@chan',
      });
      expect(store.getVideo('a')).toEqual({
        videoId: 'a',
        title: 'Video a',
        url: 'https://www.youtube.com/watch?v=a',
        uploadDate: '2023-01-15',
        uploaderId: '@chan',
      });
      expect(store.getVideo('missing')).toBeNull();
      expect(store.getChannel('@missing')).toBeNull();
    });

    it('overwrites video metadata without dropping its segments', async () => {
      await seedVideo(store, 'a');
      await store.replaceSegments('a', 'es', [seg('a', 1, 3, 'hola')]);
      await store.upsertVideo({
        videoId: 'a',
        title: 'Renamed',
        url: 'https://www.youtube.com/watch?v=a',
        uploadDate: null,
        uploaderId: '@chan',
      });
      expect(store.getVideo('a')?.title).toBe('Renamed');
      expect(store.getVideo('a')?.uploadDate).toBeNull();
      expect(store.countSegments('a', 'es')).toBe(1);
    });

    it('lists channels with their video counts', async () => {
      await seedVideo(store, 'a', '@one');
      await seedVideo(store, 'b', '@one');
      await seedVideo(store, 'c', '@two');
      expect(store.listChannels().map((c) => [c.uploaderId, c.videoCount])).toEqual([
        ['@one', 2],
        ['@two', 1],
      ]);
    });

    it('lists videos, optionally for one uploader', async () => {
      await seedVideo(store, 'b', '@one');
      await seedVideo(store, 'a', '@two');
      expect(store.listVideos().map((v) => v.videoId)).toEqual(['a', 'b']);
      expect(store.listVideos('@one').map((v) => v.videoId)).toEqual(['b']);
    });

    it('reports counts in stats', async () => {
      await seedVideo(store, 'a');
      await seedVideo(store, 'b');
      await store.replaceSegments('a', 'es', [seg('a', 0, 2, 'uno'), seg('a', 2, 4, 'dos')]);
      expect(store.stats()).toEqual({ channelCount: 1, videoCount: 2, segmentCount: 2 });
    });
  });

  describe('segments', () => {
    it('replaces the segment set of one (video, lang) pair only', async () => {
      await seedVideo(store, 'a');
      await store.replaceSegments('a', 'es', [seg('a', 0, 2, 'viejo')]);
      await store.replaceSegments('a', 'en', [seg('a', 0, 2, 'old', 'en')]);
      await store.replaceSegments('a', 'es', [seg('a', 5, 7, 'nuevo'), seg('a', 8, 9, 'otro')]);

      expect(store.listSegments('a', 'es').map((s) => s.text)).toEqual(['nuevo', 'otro']);
      expect(store.listSegments('a', 'en').map((s) => s.text)).toEqual(['old']);
    });

    it('re-indexing the same input yields the same segment tuples', async () => {
      const unit = {
        channel: { uploaderId: '@chan', name: 'Chan', url: 'https://www.youtube.com/@chan' },
        video: {
          videoId: 'a',
          title: 'A',
          url: 'https://www.youtube.com/watch?v=a',
          uploadDate: '2023-01-15',
          uploaderId: '@chan',
        },
        lang: 'es',
        segments: [seg('a', 0, 2, 'uno'), seg('a', 2, 4, 'dos'), seg('a', 2, 4, 'dos')],
      };
      await store.saveIndexedVideo(unit);
      const first = store.listSegments('a', 'es');
      await store.saveIndexedVideo(unit);
      const second = store.listSegments('a', 'es');

      expect(second).toEqual(first);
      expect(store.stats().segmentCount).toBe(3);
      expect(store.getLanguageAvailability('a', 'es')).toBe(true);
    });

    it('rejects segments that belong to another pair', async () => {
      await seedVideo(store, 'a');
      await expect(
        store.replaceSegments('a', 'es', [seg('a', 0, 2, 'ok'), seg('a', 0, 2, 'wrong', 'en')])
      ).rejects.toBeInstanceOf(StoreError);
      expect(store.countSegments('a')).toBe(0);
    });

    it('surfaces a constraint violation as a StoreError and keeps prior writes', async () => {
      await seedVideo(store, 'a');
      await store.replaceSegments('a', 'es', [seg('a', 0, 2, 'hola')]);

      const err = await store
        .replaceSegments('ghost', 'es', [seg('ghost', 0, 2, 'nope')])
        .catch((e: unknown) => e);
      expect(err).toBeInstanceOf(StoreError);
      expect(err).toMatchObject({ operation: 'replaceSegments' });
      expect(store.countSegments('a', 'es')).toBe(1);
      expect(store.countSegments('ghost')).toBe(0);
    });

    it('rolls back the whole write unit when one part fails', async () => {
      await expect(
        store.saveIndexedVideo({
          channel: { uploaderId: '@chan', name: 'Chan', url: 'https://www.youtube.com/@chan' },
          video: {
            videoId: 'a',
            title: 'A',
            url: 'https://www.youtube.com/watch?v=a',
            uploadDate: null,
            uploaderId: '@chan',
          },
          lang: 'es',
          segments: [seg('a', 0, 2, 'uno'), seg('b', 0, 2, 'foreign')],
        })
      ).rejects.toBeInstanceOf(StoreError);

      expect(store.getChannel('@chan')).toBeNull();
      expect(store.getVideo('a')).toBeNull();
      expect(store.getLanguageAvailability('a', 'es')).toBeNull();
    });
  });

  describe('language availability', () => {
    it('is tri-state: never attempted, present, absent', async () => {
      expect(store.getLanguageAvailability('v1', 'es')).toBeNull();
      await store.setLanguageAvailability('v1', 'es', true);
      expect(store.getLanguageAvailability('v1', 'es')).toBe(true);
      await store.setLanguageAvailability('v1', 'es', false);
      expect(store.getLanguageAvailability('v1', 'es')).toBe(false);
    });

    it('records a missing track for a video that was never stored', async () => {
      await store.setLanguageAvailability('unknown', 'es', false);
      expect(store.getLanguageAvailability('unknown', 'es')).toBe(false);
      expect(store.getVideo('unknown')).toBeNull();
    });

    it('drops the segments of a pair marked unavailable', async () => {
      await seedVideo(store, 'a');
      await store.replaceSegments('a', 'es', [seg('a', 0, 2, 'hola')]);
      await store.replaceSegments('a', 'en', [seg('a', 0, 2, 'hello', 'en')]);
      await store.setLanguageAvailability('a', 'es', false);
      expect(store.countSegments('a', 'es')).toBe(0);
      expect(store.countSegments('a', 'en')).toBe(1);
    });
  });

  describe('filterNeedsIndexing', () => {
    it('excludes ids already attempted for the language', async () => {
      await store.setLanguageAvailability('v1', 'es', true);
      expect(store.filterNeedsIndexing(['v1', 'v2'], 'es')).toEqual(['v2']);
    });

    it('excludes a negative cache entry for the same language', async () => {
      await store.setLanguageAvailability('v1', 'es', false);
      expect(store.filterNeedsIndexing(['v1'], 'es')).toEqual([]);
    });

    it('skips ids with an unavailable track in any language by default', async () => {
      await store.setLanguageAvailability('v1', 'en', true);
      await store.setLanguageAvailability('v2', 'en', false);
      expect(store.filterNeedsIndexing(['v1', 'v2', 'v3'], 'es').sort()).toEqual(['v1', 'v3']);
    });

    it('limits the skip to the requested language when asked', async () => {
      await store.setLanguageAvailability('v1', 'en', true);
      await store.setLanguageAvailability('v2', 'en', false);
      expect(
        store.filterNeedsIndexing(['v1', 'v2', 'v3'], 'es', { skipAnyUnavailable: false }).sort()
      ).toEqual(['v1', 'v2', 'v3']);
    });

    it('de-duplicates candidates and handles empty input', () => {
      expect(store.filterNeedsIndexing(['v3', 'v3'], 'es')).toEqual(['v3']);
      expect(store.filterNeedsIndexing([], 'es')).toEqual([]);
    });

    it('handles large candidate sets in one call', async () => {
      const ids = Array.from({ length: 5000 }, (_, i) => `vid${i}`);
      await store.setLanguageAvailability('vid42', 'es', true);
      const result = store.filterNeedsIndexing(new Set(ids), 'es');
      expect(result).toHaveLength(4999);
      expect(result).not.toContain('vid42');
    });
  });

  describe('search', () => {
    it('computes the padded clip link', async () => {
      await seedVideo(store, 'v', '@chan', 'https://x/v');
      await store.replaceSegments('v', 'es', [seg('v', 100, 110, 'hola mundo')]);
      const [row] = [...store.search('mundo')];
      expect(row.link).toBe('https://x/v&start=96&end=112');
      expect(row).toMatchObject({
        video_id: 'v',
        uploader_id: '@chan',
        video_title: 'Video v',
        channel_name: 'Channel @chan',
        start_seconds: 100,
        end_seconds: 110,
        start_time: 't100',
        end_time: 't110',
        lang: 'es',
        text: 'hola mundo',
      });
    });

    it('orders by video id then start second', async () => {
      await seedVideo(store, 'b');
      await seedVideo(store, 'a');
      await store.replaceSegments('b', 'es', [seg('b', 50, 52, 'the needle')]);
      await store.replaceSegments('a', 'es', [
        seg('a', 10, 12, 'needle again'),
        seg('a', 5, 7, 'a needle'),
        seg('a', 20, 22, 'haystack'),
      ]);
      const rows = [...store.search('needle')];
      expect(rows.map((r) => `${r.video_id}@${r.start_seconds}`)).toEqual(['a@5', 'a@10', 'b@50']);
    });

    it('filters by language and uploader', async () => {
      await seedVideo(store, 'a', '@one');
      await seedVideo(store, 'b', '@two');
      await store.replaceSegments('a', 'es', [seg('a', 0, 2, 'gato')]);
      await store.replaceSegments('a', 'en', [seg('a', 0, 2, 'gato', 'en')]);
      await store.replaceSegments('b', 'es', [seg('b', 0, 2, 'gato')]);

      expect([...store.search('gato', { lang: 'en' })].map((r) => `${r.video_id}/${r.lang}`)).toEqual(['a/en']);
      expect([...store.search('gato', { uploaderId: '@two' })].map((r) => r.video_id)).toEqual(['b']);
      expect(
        [...store.search('gato', { uploaderId: '@one', lang: 'es' })].map((r) => `${r.video_id}/${r.lang}`)
      ).toEqual(['a/es']);
    });

    it('returns an empty sequence when nothing matches', async () => {
      await seedVideo(store, 'a');
      await store.replaceSegments('a', 'es', [seg('a', 0, 2, 'hola')]);
      expect([...store.search('adios')]).toEqual([]);
    });

    it('can be re-run after the first pass is consumed', async () => {
      await seedVideo(store, 'a');
      await store.replaceSegments('a', 'es', [seg('a', 0, 2, 'hola'), seg('a', 4, 6, 'hola otra vez')]);
      const first = [...store.search('hola')];
      const second = [...store.search('hola')];
      expect(second).toEqual(first);
      expect(first).toHaveLength(2);
    });

    it('streams lazily', async () => {
      await seedVideo(store, 'a');
      await store.replaceSegments('a', 'es', [seg('a', 0, 2, 'hola'), seg('a', 4, 6, 'hola')]);
      const rows = store.search('hola');
      expect(rows.next().value?.start_seconds).toBe(0);
      rows.return?.();
      expect(store.stats().segmentCount).toBe(2);
    });

    it('no longer finds replaced text', async () => {
      await seedVideo(store, 'a');
      await store.replaceSegments('a', 'es', [seg('a', 0, 2, 'antiguo')]);
      await store.replaceSegments('a', 'es', [seg('a', 0, 2, 'reciente')]);
      expect([...store.search('antiguo')]).toEqual([]);
      expect([...store.search('reciente')]).toHaveLength(1);
    });

    it('reports an invalid query as SearchQueryError', () => {
      expect(() => [...store.search('hola AND')]).toThrow(SearchQueryError);
    });
  });

  describe('deletes', () => {
    it('cascades a channel delete through videos, segments and languages', async () => {
      await seedVideo(store, 'a', '@gone');
      await seedVideo(store, 'b', '@gone');
      await seedVideo(store, 'c', '@kept');
      for (const id of ['a', 'b', 'c']) {
        await store.replaceSegments(id, 'es', [seg(id, 0, 2, 'palabra')]);
        await store.setLanguageAvailability(id, 'es', true);
      }
      await store.setLanguageAvailability('a', 'en', false);

      const res = await store.deleteChannel('@gone');

      expect(res).toEqual({ channelDeleted: true, videosDeleted: 2 });
      expect(store.getChannel('@gone')).toBeNull();
      expect(store.getVideo('a')).toBeNull();
      expect(store.countSegments('b')).toBe(0);
      expect(store.getLanguageAvailability('a', 'es')).toBeNull();
      expect(store.getLanguageAvailability('a', 'en')).toBeNull();
      expect([...store.search('palabra')].map((r) => r.video_id)).toEqual(['c']);
      expect(store.getLanguageAvailability('c', 'es')).toBe(true);
    });

    it('reports an unknown channel', async () => {
      expect(await store.deleteChannel('@nobody')).toEqual({ channelDeleted: false, videosDeleted: 0 });
    });

    it('deletes one video with its segments and language rows', async () => {
      await seedVideo(store, 'a');
      await seedVideo(store, 'b');
      await store.replaceSegments('a', 'es', [seg('a', 0, 2, 'hola')]);
      await store.setLanguageAvailability('a', 'es', true);

      expect(await store.deleteVideo('a')).toBe(true);
      expect(await store.deleteVideo('a')).toBe(false);
      expect(store.getVideo('a')).toBeNull();
      expect(store.getVideo('b')).not.toBeNull();
      expect(store.countSegments('a')).toBe(0);
      expect(store.getLanguageAvailability('a', 'es')).toBeNull();
      expect([...store.search('hola')]).toEqual([]);
    });
  });
});
