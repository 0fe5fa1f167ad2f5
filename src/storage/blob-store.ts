import { createLogger } from '../utils/logger.js';

const log = createLogger('storage');

/**
 * キー単位で文字列を丸ごと読み書きするストア
 */
export interface BlobStore {
  /** 存在しない場合は null */
  read(key: string): Promise<string | null>;
  write(key: string, content: string): Promise<void>;
  exists(key: string): Promise<boolean>;
}

export const StorageKeys = {
  playlists: (userId: string) => `users/${userId}/playlists.json`,
  exchangeRates: 'exchange_rates.json',
  mudae: 'mudae_data.json',
} as const;

// 同じストアの同じキーへの update は順番に実行する
const updateChains = new WeakMap<BlobStore, Map<string, Promise<unknown>>>();

/**
 * JSON ファイル 1 つを読み込み・変更・書き戻しする
 * 読み込めない内容は fallback として扱う
 */
export class JsonDocument<T> {
  private store: BlobStore;
  private key: string;
  private parse: (value: unknown) => T | null;
  private fallback: () => T;

  constructor(store: BlobStore, key: string, parse: (value: unknown) => T | null, fallback: () => T) {
    this.store = store;
    this.key = key;
    this.parse = parse;
    this.fallback = fallback;
  }

  async load(): Promise<T> {
    const raw = await this.store.read(this.key);
    if (raw === null) return this.fallback();
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      log.warn(`Ignoring unparsable JSON at ${this.key}`, { error: error instanceof Error ? error.message : String(error) });
      return this.fallback();
    }
    const value = this.parse(parsed);
    if (value === null) {
      log.warn(`Ignoring malformed document at ${this.key}`);
      return this.fallback();
    }
    return value;
  }

  async save(value: T): Promise<void> {
    await this.store.write(this.key, `${JSON.stringify(value, null, 2)}\n`);
  }

  /**
   * Read-modify-write. Updates to the same key of one store run one after another, even across documents.
   */
  update(mutate: (value: T) => T): Promise<T> {
    let chains = updateChains.get(this.store);
    if (!chains) {
      chains = new Map<string, Promise<unknown>>();
      updateChains.set(this.store, chains);
    }
    const pending = chains;
    const previous = pending.get(this.key) ?? Promise.resolve();
    const next = previous
      .catch(() => undefined)
      .then(async () => {
        const value = mutate(await this.load());
        await this.save(value);
        return value;
      });
    const settled = next.catch(() => undefined);
    pending.set(this.key, settled);
    void settled.then(() => {
      if (pending.get(this.key) === settled) pending.delete(this.key);
    });
    return next;
  }
}
