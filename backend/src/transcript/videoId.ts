const VIDEO_ID_PATTERN = /^[A-Za-z0-9_-]{11}$/;

const YOUTUBE_HOSTS = new Set(['www.youtube.com', 'youtube.com', 'm.youtube.com']);

/**
 * Extracts a video ID from a YouTube URL.
 *
 * Accepted forms:
 * - `https://youtu.be/<id>`
 * - `https://www.youtube.com/watch?v=<id>`
 * - `https://www.youtube.com/embed/<id>`
 * - `https://www.youtube.com/v/<id>`
 * - a bare 11-character video ID
 *
 * @returns The video ID, or null when the input is not recognized
 */
export function extractVideoId(input: string): string | null {
  const trimmed = input.trim();
  if (VIDEO_ID_PATTERN.test(trimmed)) {
    return trimmed;
  }

  let url: URL;
  try {
    url = new URL(trimmed);
  } catch {
    return null;
  }

  if (url.hostname === 'youtu.be') {
    return nonEmpty(url.pathname.slice(1));
  }

  if (YOUTUBE_HOSTS.has(url.hostname)) {
    if (url.pathname === '/watch') {
      return nonEmpty(url.searchParams.get('v'));
    }
    if (url.pathname.startsWith('/embed/') || url.pathname.startsWith('/v/')) {
      return nonEmpty(url.pathname.split('/')[2]);
    }
  }

  return null;
}

function nonEmpty(value: string | null | undefined): string | null {
  return value ? value : null;
}

/**
 * Builds the canonical watch URL for a video
 */
export function watchUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${encodeURIComponent(videoId)}`;
}
