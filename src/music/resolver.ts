import { spawn } from 'node:child_process';
import { fetchJson, type FetchLike } from '../utils/http.js';
import { isFiniteNumber, isRecord, isString } from '../utils/guards.js';
import { createLogger } from '../utils/logger.js';
import { trackLink, watchUrl, type Track } from './track.js';

const log = createLogger('resolver');

export class TrackResolveError extends Error {
  readonly query: string;

  constructor(query: string, reason: string) {
    super(`could not resolve "${query}": ${reason}`);
    this.name = 'TrackResolveError';
    this.query = query;
  }
}

/**
 * 検索語や動画 ID からトラックを得る
 */
export interface TrackResolver {
  /** 検索語または URL の最上位の結果 */
  search(query: string): Promise<Track>;
  byId(id: string): Promise<Track>;
  /** 失効したメディア URL を取り直す */
  refresh(track: Track): Promise<Track>;
  /** 抽出せずに `[title](url)` を返す（失敗時 null） */
  preview(id: string): Promise<string | null>;
}

export type ProcessRunner = (command: string, args: string[], timeoutMs: number) => Promise<string>;

export const runProcess: ProcessRunner = (command, args, timeoutMs) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    const timer = setTimeout(() => {
      child.kill('SIGKILL');
      reject(new Error(`${command} timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));
    child.on('error', (error) => {
      clearTimeout(timer);
      reject(error);
    });
    child.on('close', (code) => {
      clearTimeout(timer);
      if (code === 0) {
        resolve(Buffer.concat(stdout).toString('utf-8'));
        return;
      }
      const tail = Buffer.concat(stderr).toString('utf-8').trim().split('\n').slice(-3).join(' | ');
      reject(new Error(`${command} exited with code ${code ?? 'null'}${tail ? `: ${tail}` : ''}`));
    });
  });

/**
 * Picks the single video out of yt-dlp's JSON (search results wrap it in `entries`)
 */
export function parseExtractorInfo(raw: string, now: number = Date.now()): Track | null {
  let info: unknown;
  try {
    info = JSON.parse(raw);
  } catch {
    return null;
  }
  if (isRecord(info)) {
    const entries = info['entries'];
    if (Array.isArray(entries)) {
      info = entries.find(isRecord);
    }
  }
  if (!isRecord(info)) return null;

  const id = info['id'];
  const title = info['title'];
  const streamUrl = info['url'];
  if (!isString(id) || !isString(title) || !isString(streamUrl)) return null;

  const duration = info['duration'];
  const webpageUrl = info['webpage_url'];
  return {
    id,
    title,
    durationSeconds: isFiniteNumber(duration) ? Math.round(duration) : 0,
    webpageUrl: isString(webpageUrl) ? webpageUrl : watchUrl(id),
    streamUrl,
    resolvedAt: now,
  };
}

export interface YtDlpResolverOptions {
  binaryPath: string;
  timeoutMs?: number;
  run?: ProcessRunner;
  fetch?: FetchLike;
}

export class YtDlpResolver implements TrackResolver {
  private binaryPath: string;
  private timeoutMs: number;
  private run: ProcessRunner;
  private fetch: FetchLike | undefined;

  constructor(options: YtDlpResolverOptions) {
    this.binaryPath = options.binaryPath;
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.run = options.run ?? runProcess;
    this.fetch = options.fetch;
  }

  private async extract(target: string, query: string): Promise<Track> {
    const args = [
      '--dump-single-json',
      '--no-playlist',
      '--no-warnings',
      '--format',
      'bestaudio/best',
      '--default-search',
      'ytsearch',
      '--',
      target,
    ];
    let output: string;
    try {
      output = await this.run(this.binaryPath, args, this.timeoutMs);
    } catch (error) {
      throw new TrackResolveError(query, error instanceof Error ? error.message : String(error));
    }
    const track = parseExtractorInfo(output);
    if (!track) {
      throw new TrackResolveError(query, 'no playable result');
    }
    return track;
  }

  async search(query: string): Promise<Track> {
    const target = /^https?:\/\//i.test(query) ? query : `ytsearch1:${query}`;
    const track = await this.extract(target, query);
    log.info(`Resolved "${query}" to ${track.id}`);
    return track;
  }

  async byId(id: string): Promise<Track> {
    return this.extract(watchUrl(id), id);
  }

  async refresh(track: Track): Promise<Track> {
    const fresh = await this.byId(track.id);
    return { ...track, streamUrl: fresh.streamUrl, resolvedAt: fresh.resolvedAt };
  }

  async preview(id: string): Promise<string | null> {
    const webpageUrl = watchUrl(id);
    const url = `https://www.youtube.com/oembed?${new URLSearchParams({ format: 'json', url: webpageUrl }).toString()}`;
    try {
      const data = await fetchJson(url, { fetch: this.fetch, retry: { maxRetries: 1 } });
      const title = isRecord(data) ? data['title'] : undefined;
      if (!isString(title)) return null;
      return trackLink({ title, webpageUrl });
    } catch (error) {
      log.debug(`No preview for ${id}`, { error: error instanceof Error ? error.message : String(error) });
      return null;
    }
  }
}
