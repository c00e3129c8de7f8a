const VIDEO_ID_PATTERN =
  /(?:youtube\.com\/watch\?(?:[^#\s]*&)?v=|youtu\.be\/|youtube\.com\/embed\/|youtube\.com\/shorts\/|music\.youtube\.com\/watch\?(?:[^#\s]*&)?v=)([a-zA-Z0-9_-]{11})/;

const BARE_VIDEO_ID = /^[a-zA-Z0-9_-]{11}$/;

export function isHttpUrl(input: string): boolean {
  try {
    const url = new URL(input);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

export function isYouTubeUrl(input: string): boolean {
  return extractVideoId(input) !== null;
}

export function extractVideoId(input: string): string | null {
  const match = VIDEO_ID_PATTERN.exec(input);
  return match?.[1] ?? null;
}

export function isVideoId(input: string): boolean {
  return BARE_VIDEO_ID.test(input);
}

export function canonicalWatchUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${videoId}`;
}

/**
 * Seconds from `PT#H#M#S` (YouTube Data API) or `h:mm:ss` / `m:ss` (page
 * scrapes). Anything else is unknown.
 */
export function parseDuration(value: string | undefined | null): number | undefined {
  if (!value) return undefined;

  const iso = /^P(?:(\d+)D)?T?(?:(\d+)H)?(?:(\d+)M)?(?:(\d+)S)?$/.exec(value.trim());
  if (iso && value.trim() !== 'P' && value.trim() !== 'PT') {
    const [, days, hours, minutes, seconds] = iso;
    return (
      Number(days ?? 0) * 86400 + Number(hours ?? 0) * 3600 + Number(minutes ?? 0) * 60 + Number(seconds ?? 0)
    );
  }

  const clock = /^(?:(\d+):)?(\d{1,2}):(\d{2})$/.exec(value.trim());
  if (clock) {
    const [, hours, minutes, seconds] = clock;
    return Number(hours ?? 0) * 3600 + Number(minutes) * 60 + Number(seconds);
  }

  return undefined;
}
