import { JsonDocument, StorageKeys, type BlobStore } from '../storage/blob-store.js';
import { isRecord, isString } from '../utils/guards.js';

export interface SavedPlaylist {
  name: string;
  ids: string[];
}

interface PlaylistFile {
  playlists: SavedPlaylist[];
}

function parsePlaylistFile(value: unknown): PlaylistFile | null {
  if (!isRecord(value)) return null;
  const entries = value['playlists'];
  if (!Array.isArray(entries)) return null;
  const playlists: SavedPlaylist[] = [];
  for (const entry of entries) {
    if (!isRecord(entry)) continue;
    const name = entry['name'];
    const ids = entry['ids'];
    if (typeof name !== 'string' || !Array.isArray(ids)) continue;
    playlists.push({ name, ids: ids.filter(isString) });
  }
  return { playlists };
}

const sameName = (a: string, b: string): boolean => a.toLowerCase() === b.toLowerCase();

/**
 * ユーザーごとの保存済みプレイリスト
 * users/<id>/playlists.json に丸ごと保存する
 */
export class PlaylistStore {
  private store: BlobStore;

  constructor(store: BlobStore) {
    this.store = store;
  }

  private document(userId: string): JsonDocument<PlaylistFile> {
    return new JsonDocument(this.store, StorageKeys.playlists(userId), parsePlaylistFile, () => ({ playlists: [] }));
  }

  async hasAny(userId: string): Promise<boolean> {
    return this.store.exists(StorageKeys.playlists(userId));
  }

  async list(userId: string): Promise<SavedPlaylist[]> {
    return (await this.document(userId).load()).playlists;
  }

  /**
   * 名前は大文字小文字を区別しない
   */
  async find(userId: string, name: string): Promise<SavedPlaylist | null> {
    const playlists = await this.list(userId);
    return playlists.find((p) => sameName(p.name, name)) ?? null;
  }

  /**
   * A playlist with the same name (any case) is replaced in place
   */
  async save(userId: string, playlist: SavedPlaylist): Promise<void> {
    await this.document(userId).update((file) => {
      const index = file.playlists.findIndex((p) => sameName(p.name, playlist.name));
      const entry = { name: playlist.name, ids: [...playlist.ids] };
      if (index === -1) {
        file.playlists.push(entry);
      } else {
        file.playlists[index] = entry;
      }
      return file;
    });
  }

  async remove(userId: string, name: string): Promise<boolean> {
    let removed = false;
    await this.document(userId).update((file) => {
      const remaining = file.playlists.filter((p) => !sameName(p.name, name));
      removed = remaining.length !== file.playlists.length;
      return { playlists: remaining };
    });
    return removed;
  }
}
