export function toVideoId(videoOrUrl: string): string {
  // Extracts YouTube video ID from URL or returns the input if it looks like an ID
  const urlMatch = videoOrUrl.match(/[?&]v=([a-zA-Z0-9_-]{6,})/);
  if (urlMatch) return urlMatch[1];
  const short = videoOrUrl.match(/(?:youtu\.be|\/shorts)\/([a-zA-Z0-9_-]{6,})/);
  if (short) return short[1];
  return videoOrUrl;
}

export function watchUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${videoId}`;
}

/**
 * Turns what a user typed into something yt-dlp can list: URLs pass
 * through, `@handle` becomes the channel's videos tab, anything else is
 * taken as a video id.
 */
export function toCollectionUrl(ref: string): string {
  if (/^https?:\/\//.test(ref)) return ref;
  if (ref.startsWith('@')) return `https://www.youtube.com/${ref}/videos`;
  return watchUrl(toVideoId(ref));
}
