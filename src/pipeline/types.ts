export type ISODate = string;

/** One caption entry as it comes out of a WebVTT track. */
export interface Cue {
  start: number;
  end: number;
  /** Timestamps exactly as written in the track, e.g. `00:01:02.500` */
  startTime: string;
  endTime: string;
  text: string;
}

export interface SegmentRecord {
  videoId: string;
  lang: string;
  startSeconds: number;
  endSeconds: number;
  startTime: string;
  endTime: string;
  text: string;
}

export interface ChannelRecord {
  uploaderId: string;
  name: string | null;
  url: string;
}

export interface VideoRecord {
  videoId: string;
  title: string;
  url: string;
  uploadDate: ISODate | null;
  uploaderId: string;
}

/** Row of the `subtitles_with_videos` view. */
export interface SearchRow {
  subtitle_id: number;
  video_id: string;
  uploader_id: string;
  video_title: string;
  upload_date: string | null;
  channel_name: string | null;
  start_seconds: number;
  end_seconds: number;
  start_time: string;
  end_time: string;
  lang: string;
  text: string;
  link: string;
}

export interface SearchFilters {
  uploaderId?: string;
  lang?: string;
}

export interface StoreStats {
  channelCount: number;
  videoCount: number;
  segmentCount: number;
}

export type CaptionFetchResult =
  | {
      status: 'found';
      cues: Cue[];
      video: VideoRecord;
      channel: ChannelRecord;
    }
  | { status: 'not_found' };

export interface ClipRequest {
  /** Canonical or padded link of the video to cut from */
  url: string;
  videoId: string;
  start: number;
  end: number;
  folder: string;
  /** Output file name without extension */
  fileStem: string;
}

export interface MediaSourceCallOptions {
  signal?: AbortSignal;
}

export interface ListVideoIdsOptions {
  limit?: number;
}

/**
 * Everything that talks to the video host. The archive only depends on this
 * interface; `YtDlpMediaSource` is the shipped implementation.
 */
export interface MediaSource {
  listVideoIds(collectionRef: string, opts?: ListVideoIdsOptions): Promise<string[]>;
  fetchCaptions(
    videoId: string,
    lang: string,
    opts?: MediaSourceCallOptions
  ): Promise<CaptionFetchResult>;
  fetchClip(req: ClipRequest, opts?: MediaSourceCallOptions): Promise<void>;
}
