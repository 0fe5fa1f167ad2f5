/**
 * 再生可能なトラック
 */
export interface Track {
  /** 動画 ID（保存時にはこれだけを使う） */
  id: string;
  title: string;
  /** 秒 */
  durationSeconds: number;
  webpageUrl: string;
  /** ffmpeg に渡すメディア URL（一定時間で失効する） */
  streamUrl: string;
  /** streamUrl を取得した時刻（epoch ms） */
  resolvedAt: number;
}

/**
 * キューに入ったトラック
 */
export interface QueuedTrack extends Track {
  /** リクエストしたユーザーID */
  requesterId: string;
}

const SECONDS_PER_DAY = 24 * 3600;

const pad2 = (value: number): string => String(value).padStart(2, '0');

/**
 * `H:MM:SS` or `MM:SS`; anything beyond a day wraps around
 */
export function formatDuration(totalSeconds: number): string {
  const seconds = Math.max(0, Math.floor(totalSeconds)) % SECONDS_PER_DAY;
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor(seconds / 60) % 60;
  const rest = seconds % 60;
  if (hours > 0) {
    return `${hours}:${pad2(minutes)}:${pad2(rest)}`;
  }
  return `${pad2(minutes)}:${pad2(rest)}`;
}

export function trackLink(track: Pick<Track, 'title' | 'webpageUrl'>): string {
  return `[${track.title}](${track.webpageUrl})`;
}

/**
 * Title cut to maxChars (marked with …), brackets removed so the link markdown stays intact
 */
export function truncatedLink(track: Pick<Track, 'title' | 'webpageUrl'>, maxChars: number): string {
  const chars = Array.from(track.title);
  let title = chars.slice(0, maxChars).join('');
  if (chars.length > maxChars) {
    title += '…';
  }
  title = title.replace(/[[\]]/g, '');
  return `[${title}](${track.webpageUrl})`;
}

export function watchUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${videoId}`;
}

export function needsReload(track: Track, reloadIntervalMs: number, now: number = Date.now()): boolean {
  return now - track.resolvedAt > reloadIntervalMs;
}
