import type { EmbedSpec } from '../discord/types.js';
import { createLogger } from '../utils/logger.js';
import { PlaybackCursor, type ToggleOption } from './cursor.js';
import { statusFooter, type PlayerStatus } from './queue-view.js';
import type { TrackResolver } from './resolver.js';
import { SongQueue, type RandomSource } from './song-queue.js';
import { needsReload, trackLink, type QueuedTrack, type Track } from './track.js';
import type { VoiceSession } from './voice.js';

const log = createLogger('player');

const IDLE_CHECK_INTERVAL_MS = 15_000;

/**
 * プレイヤーが自発的にメッセージを送る先
 */
export interface PlayerChannel {
  send(embed: EmbedSpec): Promise<SentMessage>;
}

export interface SentMessage {
  edit(embed: EmbedSpec): Promise<void>;
  delete(): Promise<void>;
}

export interface MusicPlayerOptions {
  guildName: string;
  session: VoiceSession;
  resolver: TrackResolver;
  idleTimeoutMs: number;
  reloadIntervalMs: number;
  now?: () => number;
  random?: RandomSource;
}

/** 位置指定またはタイトル検索 */
export type TrackRequest = number | string;

export type LookupResult =
  | { ok: true; pos: number }
  | { ok: false; reason: 'out-of-range' | 'not-found' };

export type RemoveResult =
  | { ok: true; pos: number; track: QueuedTrack }
  | { ok: false; reason: 'out-of-range' | 'not-found' };

export interface LoadOptions {
  requesterId: string;
  append: boolean;
  /** 置き換え時の新しいキュー名 */
  name: string;
  onProgress: (current: number, total: number) => Promise<void>;
  onCancel: (userId: string) => Promise<void>;
}

export interface LoadResult {
  loaded: number;
  failed: string[];
  canceled: boolean;
}

interface LoadJob {
  canceled: boolean;
  requesterId: string;
  onCancel: (userId: string) => Promise<void>;
}

/**
 * サーバーごとの音楽プレイヤー
 * 切断してもキューと位置は残り、再接続すると同じ位置から再生する
 */
export class MusicPlayer {
  readonly queue: SongQueue;
  readonly cursor: PlaybackCursor;
  private session: VoiceSession;
  private resolver: TrackResolver;
  private guildName: string;
  private idleTimeoutMs: number;
  private reloadIntervalMs: number;
  private now: () => number;

  private channel: PlayerChannel | null = null;
  private nowPlayingMessage: SentMessage | null = null;
  private current: QueuedTrack | null = null;
  /** 位置移動後も一時停止状態を保つ */
  private shouldBePaused = false;
  private playGeneration = 0;
  private starting = false;
  private loadJob: LoadJob | null = null;
  private idleSince: number | null = null;
  private idleTimer: NodeJS.Timeout | null = null;

  /** 確認待ちのユーザー（同じ操作の多重起動を防ぐ） */
  readonly pendingConfirmations = {
    clear: false,
    save: new Set<string>(),
    load: new Set<string>(),
    add: new Set<string>(),
  };

  constructor(options: MusicPlayerOptions) {
    this.guildName = options.guildName;
    this.session = options.session;
    this.resolver = options.resolver;
    this.idleTimeoutMs = options.idleTimeoutMs;
    this.reloadIntervalMs = options.reloadIntervalMs;
    this.now = options.now ?? Date.now;
    this.queue = new SongQueue(this.defaultQueueName(), options.random);
    this.cursor = new PlaybackCursor(this.queue);

    this.session.on('finish', () => {
      // 再読み込み中の曲がすでにカーソル位置にある
      if (this.starting) return;
      this.cursor.finish();
      this.transition();
    });
    this.session.on('disconnect', () => {
      this.stopIdleTimer();
      this.current = null;
    });
  }

  defaultQueueName(): string {
    return `${this.guildName} Queue`;
  }

  get connected(): boolean {
    return this.session.connected;
  }

  get voiceChannelId(): string | null {
    return this.session.channelId;
  }

  /** 再生中または一時停止中のトラックがある */
  get active(): boolean {
    return this.session.active || this.starting;
  }

  get loading(): boolean {
    return this.loadJob !== null;
  }

  /** 読み込み中のプレイリストを読み込んだユーザー */
  get loadingBy(): string | null {
    return this.loadJob?.requesterId ?? null;
  }

  get nowPlaying(): { track: QueuedTrack; pos: number } | null {
    if (!this.current) return null;
    return { track: this.current, pos: this.cursor.pos };
  }

  hasListeners(): boolean {
    return this.session.hasListeners();
  }

  /** 通知先のテキストチャンネルを更新 */
  bindChannel(channel: PlayerChannel): void {
    this.channel = channel;
  }

  status(): PlayerStatus {
    return {
      disconnected: !this.session.connected,
      muted: this.session.connected && this.session.muted,
      paused: this.session.paused || this.shouldBePaused,
      looped: this.cursor.looped,
      queueLooped: this.cursor.queueLooped,
      shuffleOnLoop: this.cursor.shuffleOnLoop,
    };
  }

  withFooter(embed: EmbedSpec): EmbedSpec {
    const footer = statusFooter(this.status());
    return footer === null ? embed : { ...embed, footer };
  }

  // CONNECTION

  /**
   * Connects (or moves) to the channel. With autoplay the track at the cursor starts unless something is playing.
   */
  async join(channelId: string, autoplay = true): Promise<void> {
    await this.session.connect(channelId);
    this.startIdleTimer();
    if (autoplay) {
      this.startPlayback();
    }
  }

  startPlayback(): void {
    if (!this.active) {
      this.transition();
    }
  }

  async leave(byTimeout = false): Promise<void> {
    this.playGeneration++;
    this.starting = false;
    this.session.disconnect();
    this.stopIdleTimer();
    this.current = null;
    log.info(`${this.guildName} player disconnected${byTimeout ? ' (inactive)' : ''}`);
    await this.deleteNowPlaying();
    if (byTimeout) {
      await this.announce({
        description: '❗ I left the voice channel because I was inactive for too long.',
        color: 'gold',
      });
    }
  }

  // QUEUE

  /**
   * Resolves `query` and appends it. Playback jumps to the new track when nothing is playing.
   * Returns the track and whether it was queued behind a playing track.
   */
  async enqueue(query: string, requesterId: string): Promise<{ track: QueuedTrack; pos: number; queued: boolean }> {
    const track = await this.resolver.search(query);
    return this.append(track, requesterId);
  }

  private append(track: Track, requesterId: string): { track: QueuedTrack; pos: number; queued: boolean } {
    const queuedTrack: QueuedTrack = { ...track, requesterId };
    const pos = this.queue.add(queuedTrack);
    const queued = this.active;
    if (!queued) {
      this.cursor.moveTo(pos);
      this.transition();
    }
    log.info(`Queued (${pos}) ${track.title}`);
    return { track: queuedTrack, pos, queued };
  }

  pause(): void {
    this.session.pause();
    this.shouldBePaused = true;
    log.info('Paused player');
  }

  resume(): void {
    this.session.resume();
    this.shouldBePaused = false;
    log.info('Resumed player');
  }

  /**
   * Returns false when nothing was playing
   */
  skip(): boolean {
    if (!this.active) {
      log.info(`Skipped nothing, outside of the queue (pos=${this.cursor.pos})`);
      return false;
    }
    this.cursor.skip();
    this.transition();
    return true;
  }

  back(): void {
    this.cursor.back();
    this.transition();
  }

  resolveRequest(request: TrackRequest): LookupResult {
    if (typeof request === 'number') {
      return this.queue.has(request) ? { ok: true, pos: request } : { ok: false, reason: 'out-of-range' };
    }
    const pos = this.queue.findPosition(request);
    return pos === null ? { ok: false, reason: 'not-found' } : { ok: true, pos };
  }

  jump(request: TrackRequest): LookupResult {
    const result = this.resolveRequest(request);
    if (!result.ok) return result;
    this.cursor.moveTo(result.pos);
    this.transition();
    return result;
  }

  async clear(byUserId: string): Promise<number> {
    await this.cancelLoading(byUserId);
    const count = this.queue.clear();
    this.cursor.reset();
    this.queue.loadedBy = null;
    this.queue.name = this.defaultQueueName();
    this.transition();
    log.info(`Cleared ${count} track(s) from queue`);
    return count;
  }

  remove(request: TrackRequest): RemoveResult {
    const result = this.resolveRequest(request);
    if (!result.ok) return result;
    const track = this.queue.pop(result.pos);
    if (this.cursor.afterRemove(result.pos)) {
      this.transition();
    }
    log.info(`Removed (${result.pos}) ${track.title}`);
    return { ok: true, pos: result.pos, track };
  }

  /**
   * Returns the first position and number of removed tracks
   */
  removeRange(start: number, end: number): { first: number; count: number } {
    const removed = this.queue.popRange(start, end);
    const first = Math.max(1, start);
    if (removed.length === 0) return { first, count: 0 };
    if (this.cursor.afterRemoveRange(first, removed.length)) {
      this.transition();
    }
    log.info(`Removed ${removed.length} track(s) (${first}~${first + removed.length - 1})`);
    return { first, count: removed.length };
  }

  /**
   * Shuffles the tracks after the current one and returns how many moved
   */
  shuffle(): number {
    this.queue.shuffle(this.cursor.pos);
    return Math.max(0, this.queue.length - this.cursor.pos);
  }

  setLoop(option: ToggleOption): boolean {
    return this.cursor.setLoop(option);
  }

  setLoopQueue(option: ToggleOption): boolean {
    return this.cursor.setLoopQueue(option);
  }

  setShuffleLoop(option: ToggleOption): boolean {
    return this.cursor.setShuffleLoop(option);
  }

  rename(name: string | undefined): string {
    this.queue.name = name?.trim() ? name.trim() : this.defaultQueueName();
    return this.queue.name;
  }

  // LOADING

  /**
   * Queues saved track ids one by one. A load already running is canceled first.
   */
  async loadTracks(ids: string[], options: LoadOptions): Promise<LoadResult> {
    await this.cancelLoading(options.requesterId);

    if (!options.append) {
      this.queue.clear();
      this.cursor.reset();
      this.queue.name = options.name;
      this.queue.loadedBy = options.requesterId;
      this.transition();
    }

    const job: LoadJob = { canceled: false, requesterId: options.requesterId, onCancel: options.onCancel };
    this.loadJob = job;
    const failed: string[] = [];
    let loaded = 0;

    try {
      for (const [index, id] of ids.entries()) {
        if (job.canceled) break;
        await options.onProgress(index + 1, ids.length);
        let track: Track;
        try {
          track = await this.resolver.byId(id);
        } catch (error) {
          log.warn(`Failed to load ${id}`, { error: error instanceof Error ? error.message : String(error) });
          failed.push(id);
          continue;
        }
        if (job.canceled) break;
        this.append(track, options.requesterId);
        loaded++;
      }
    } finally {
      if (this.loadJob === job) this.loadJob = null;
    }

    log.info(`Loaded ${loaded}/${ids.length} track(s)${job.canceled ? ' (canceled)' : ''}`);
    return { loaded, failed, canceled: job.canceled };
  }

  /**
   * Returns false when no load was running
   */
  async cancelLoading(byUserId: string): Promise<boolean> {
    const job = this.loadJob;
    if (!job || job.canceled) return false;
    job.canceled = true;
    this.loadJob = null;
    log.info(`${byUserId} canceled the running load`);
    await job.onCancel(byUserId);
    return true;
  }

  // IDLE HANDLING

  /**
   * Idle while outside the queue, paused, or alone in the channel
   */
  isIdle(): boolean {
    return !this.cursor.insideQueue || this.session.paused || this.shouldBePaused || !this.session.hasListeners();
  }

  async checkIdle(): Promise<boolean> {
    if (!this.session.connected) {
      this.idleSince = null;
      return false;
    }
    if (!this.isIdle()) {
      this.idleSince = null;
      return false;
    }
    const now = this.now();
    this.idleSince ??= now;
    if (now - this.idleSince < this.idleTimeoutMs) return false;
    log.info(`${this.guildName} player timed out`);
    await this.leave(true);
    return true;
  }

  private startIdleTimer(): void {
    this.idleSince = null;
    if (this.idleTimer) return;
    this.idleTimer = setInterval(() => {
      this.checkIdle().catch((error: unknown) => {
        log.error('Idle check failed', { error: error instanceof Error ? error.message : String(error) });
      });
    }, IDLE_CHECK_INTERVAL_MS);
    this.idleTimer.unref();
  }

  private stopIdleTimer(): void {
    if (this.idleTimer) {
      clearInterval(this.idleTimer);
      this.idleTimer = null;
    }
    this.idleSince = null;
  }

  // PLAYBACK

  private transition(): void {
    this.playCurrent().catch((error: unknown) => {
      log.error('Failed to start playback', { error: error instanceof Error ? error.message : String(error) });
    });
  }

  /**
   * Plays whatever sits at the cursor. A newer call supersedes one still awaiting a reload.
   */
  private async playCurrent(): Promise<void> {
    const generation = ++this.playGeneration;
    if (!this.session.connected) {
      this.starting = false;
      return;
    }

    const track = this.cursor.current;
    if (!track) {
      this.starting = false;
      this.session.stop();
      this.current = null;
      await this.deleteNowPlaying();
      return;
    }

    this.starting = true;
    try {
      if (needsReload(track, this.reloadIntervalMs, this.now())) {
        this.session.stop();
        await this.reload(track);
        if (generation !== this.playGeneration) return;
      }

      this.session.play(track.streamUrl);
      if (this.shouldBePaused) {
        this.session.pause();
      }
    } finally {
      if (generation === this.playGeneration) this.starting = false;
    }
    this.current = track;

    await this.deleteNowPlaying();
    if (generation !== this.playGeneration) return;
    log.info(`Now playing (${this.cursor.pos}) ${track.title}`);
    this.nowPlayingMessage = await this.announce(
      this.withFooter({
        title: 'Now playing',
        description: `**(${this.cursor.pos})** ${trackLink(track)} [<@${track.requesterId}>]`,
        color: 'gold',
      }),
    );
  }

  private async reload(track: QueuedTrack): Promise<void> {
    log.info(`Reloading ${track.title}`);
    const notice = await this.announce({ description: `⏳ Reloading ${trackLink(track)}...`, color: 'gold' });
    try {
      const fresh = await this.resolver.refresh(track);
      track.streamUrl = fresh.streamUrl;
      track.resolvedAt = fresh.resolvedAt;
    } catch (error) {
      log.error(`Failed to reload ${track.title}`, { error: error instanceof Error ? error.message : String(error) });
    } finally {
      await notice?.delete().catch((error: unknown) => {
        log.debug('Reload notice already gone', { error: String(error) });
      });
    }
  }

  private async announce(embed: EmbedSpec): Promise<SentMessage | null> {
    if (!this.channel) return null;
    return this.channel.send(embed);
  }

  private async deleteNowPlaying(): Promise<void> {
    const message = this.nowPlayingMessage;
    this.nowPlayingMessage = null;
    if (!message) return;
    try {
      await message.delete();
    } catch (error) {
      log.debug('Now playing message already gone', { error: error instanceof Error ? error.message : String(error) });
    }
  }
}
