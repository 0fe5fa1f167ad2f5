import type { Client } from 'discord.js';
import type { AnagramFinder } from '../features/anagrams.js';
import type { AnnoyTargets } from '../features/annoy.js';
import type { Sandbox } from '../features/evaluator.js';
import type { CurrencyExchanger } from '../features/exchanger.js';
import type { MudaeTracker } from '../features/mudae.js';
import type { PubChemClient } from '../features/pubchem.js';
import type { PlaylistStore } from '../music/playlist-store.js';
import type { TrackResolver } from '../music/resolver.js';
import type { PlayerRegistry } from './players.js';
import type { BotConfig } from './types.js';

/**
 * REPL 中のユーザーとチャンネルの組
 * 入力はセッションが受け取るので通常のコマンド処理はしない
 */
export class ReplSessions {
  private active = new Set<string>();

  private static key(userId: string, channelId: string): string {
    return `${userId}:${channelId}`;
  }

  has(userId: string, channelId: string): boolean {
    return this.active.has(ReplSessions.key(userId, channelId));
  }

  add(userId: string, channelId: string): void {
    this.active.add(ReplSessions.key(userId, channelId));
  }

  delete(userId: string, channelId: string): void {
    this.active.delete(ReplSessions.key(userId, channelId));
  }
}

/**
 * コマンドが使う共有オブジェクト
 */
export interface CommandServices {
  client: Client;
  config: BotConfig;
  players: PlayerRegistry;
  playlists: PlaylistStore;
  resolver: TrackResolver;
  /** CURRENCYSCOOP_KEY がなければ null */
  exchanger: CurrencyExchanger | null;
  pubchem: PubChemClient;
  anagrams: AnagramFinder;
  mudae: MudaeTracker;
  annoy: AnnoyTargets;
  sandbox: Sandbox;
  /** REPL が表示してはいけない値（トークン等） */
  sensitiveValues: string[];
  replSessions: ReplSessions;
  pageTimeoutMs: number;
}
