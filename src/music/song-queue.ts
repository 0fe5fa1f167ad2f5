import type { QueuedTrack } from './track.js';

export class QueuePositionError extends RangeError {
  readonly position: number;

  constructor(position: number, length: number) {
    super(`queue position ${position} out of range [1, ${length}]`);
    this.name = 'QueuePositionError';
    this.position = position;
  }
}

export type RandomSource = () => number;

/**
 * 1 始まりの位置で扱うトラック列
 */
export class SongQueue {
  private tracks: QueuedTrack[] = [];
  private _name = '';
  /** キューを読み込んだユーザー（null はサーバーの既定キュー） */
  loadedBy: string | null = null;
  private random: RandomSource;

  constructor(name = '', random: RandomSource = Math.random) {
    this.name = name;
    this.random = random;
  }

  get name(): string {
    return this._name;
  }

  set name(value: string) {
    this._name = value.replace(/[{}]/g, '');
  }

  get length(): number {
    return this.tracks.length;
  }

  [Symbol.iterator](): Iterator<QueuedTrack> {
    return this.tracks[Symbol.iterator]();
  }

  at(pos: number): QueuedTrack {
    const track = Number.isInteger(pos) && pos >= 1 ? this.tracks[pos - 1] : undefined;
    if (!track) {
      throw new QueuePositionError(pos, this.tracks.length);
    }
    return track;
  }

  has(pos: number): boolean {
    return Number.isInteger(pos) && pos >= 1 && pos <= this.tracks.length;
  }

  /**
   * Tracks from start to end inclusive, stopping at the first position outside the queue
   */
  segment(start: number, end: number): QueuedTrack[] {
    const result: QueuedTrack[] = [];
    for (let pos = start; pos <= end; pos++) {
      if (!this.has(pos)) break;
      result.push(this.at(pos));
    }
    return result;
  }

  add(track: QueuedTrack): number {
    this.tracks.push(track);
    return this.tracks.length;
  }

  /**
   * 最初にタイトルが部分一致（大文字小文字無視）した位置
   */
  findPosition(search: string): number | null {
    const needle = search.toLowerCase();
    const index = this.tracks.findIndex((track) => track.title.toLowerCase().includes(needle));
    return index === -1 ? null : index + 1;
  }

  pop(pos: number): QueuedTrack {
    const track = this.at(pos);
    this.tracks.splice(pos - 1, 1);
    return track;
  }

  /**
   * Removes positions start..end inclusive with slice semantics: never throws,
   * out-of-range bounds are clamped
   */
  popRange(start: number, end: number): QueuedTrack[] {
    const from = Math.max(0, start - 1);
    const to = Math.min(this.tracks.length, end);
    if (to <= from) return [];
    return this.tracks.splice(from, to - from);
  }

  clear(): number {
    const count = this.tracks.length;
    this.tracks = [];
    return count;
  }

  swap(a: number, b: number): [QueuedTrack, QueuedTrack] {
    const first = this.at(a);
    const second = this.at(b);
    this.tracks[a - 1] = second;
    this.tracks[b - 1] = first;
    return [first, second];
  }

  /**
   * Fisher-Yates over the tracks after position `after`
   */
  shuffle(after = 0): void {
    const start = Math.max(0, Math.floor(after));
    for (let i = this.tracks.length - 1; i > start; i--) {
      const j = start + Math.floor(this.random() * (i - start + 1));
      const tmp = this.tracks[i];
      const other = this.tracks[j];
      if (tmp === undefined || other === undefined) continue;
      this.tracks[i] = other;
      this.tracks[j] = tmp;
    }
  }

  ids(): string[] {
    return this.tracks.map((track) => track.id);
  }
}
