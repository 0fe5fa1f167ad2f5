import type { SongQueue } from './song-queue.js';
import type { QueuedTrack } from './track.js';

/** null は反転 */
export type ToggleOption = boolean | null;

export function parseToggle(raw: string | undefined): ToggleOption {
  switch (raw?.trim().toLowerCase()) {
    case 'on':
      return true;
    case 'off':
      return false;
    default:
      return null;
  }
}

/**
 * 再生位置とループ設定
 * pos が 0 または末尾より後ろのときは「キューの外」にいる
 */
export class PlaybackCursor {
  private queue: SongQueue;
  private _pos = 1;
  looped = false;
  queueLooped = false;
  shuffleOnLoop = false;

  constructor(queue: SongQueue) {
    this.queue = queue;
  }

  get pos(): number {
    return this._pos;
  }

  get current(): QueuedTrack | null {
    return this.queue.has(this._pos) ? this.queue.at(this._pos) : null;
  }

  get insideQueue(): boolean {
    return this.queue.has(this._pos);
  }

  /**
   * The current track ended on its own
   */
  finish(): void {
    if (this.looped) return;
    this.advance();
  }

  skip(): void {
    this.advance();
  }

  back(): void {
    if (this._pos <= 0) return;
    this._pos -= 1;
    if (this._pos === 0 && this.queueLooped && this.queue.length > 0) {
      this._pos = this.queue.length;
    }
  }

  moveTo(pos: number): void {
    this._pos = Math.max(0, Math.floor(pos));
  }

  reset(): void {
    this._pos = 1;
  }

  /**
   * Returns whether the removed position was the current one
   */
  afterRemove(removedPos: number): boolean {
    if (removedPos === this._pos) return true;
    if (removedPos < this._pos) this._pos -= 1;
    return false;
  }

  /**
   * Adjusts for `count` tracks removed starting at `start`.
   * When the current track was among them the cursor lands on the first track after the range.
   */
  afterRemoveRange(start: number, count: number): boolean {
    if (count <= 0) return false;
    const first = Math.max(1, start);
    const last = first + count - 1;
    if (this._pos >= first && this._pos <= last) {
      this._pos = first;
      return true;
    }
    if (this._pos > last) this._pos -= count;
    return false;
  }

  setLoop(option: ToggleOption): boolean {
    this.looped = option ?? !this.looped;
    return this.looped;
  }

  setLoopQueue(option: ToggleOption): boolean {
    this.queueLooped = option ?? !this.queueLooped;
    if (!this.queueLooped) {
      this.shuffleOnLoop = false;
    }
    return this.queueLooped;
  }

  setShuffleLoop(option: ToggleOption): boolean {
    this.shuffleOnLoop = option ?? !this.shuffleOnLoop;
    if (this.shuffleOnLoop) {
      this.queueLooped = true;
    }
    return this.shuffleOnLoop;
  }

  private advance(): void {
    this._pos += 1;
    if (this.queueLooped && this._pos > this.queue.length && this.queue.length > 0) {
      if (this.shuffleOnLoop) {
        this.queue.shuffle(0);
      }
      this._pos = 1;
    }
  }
}
