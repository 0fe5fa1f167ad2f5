import type { Guild } from 'discord.js';
import { MusicPlayer } from '../music/player.js';
import type { TrackResolver } from '../music/resolver.js';
import { DiscordVoiceSession } from '../music/voice.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('players');

export interface PlayerRegistryOptions {
  resolver: TrackResolver;
  ffmpegPath: string;
  idleTimeoutMs: number;
  reloadIntervalMs: number;
}

/**
 * サーバーごとのプレイヤー（プロセスが終わるまで保持）
 */
export class PlayerRegistry {
  private options: PlayerRegistryOptions;
  private players = new Map<string, MusicPlayer>();

  constructor(options: PlayerRegistryOptions) {
    this.options = options;
  }

  get(guild: Guild): MusicPlayer {
    const existing = this.players.get(guild.id);
    if (existing) return existing;

    const player = new MusicPlayer({
      guildName: guild.name,
      session: new DiscordVoiceSession(guild, this.options.ffmpegPath),
      resolver: this.options.resolver,
      idleTimeoutMs: this.options.idleTimeoutMs,
      reloadIntervalMs: this.options.reloadIntervalMs,
    });
    this.players.set(guild.id, player);
    log.info(`Created player for ${guild.name}`);
    return player;
  }

  async disconnectAll(): Promise<void> {
    await Promise.all([...this.players.values()].filter((p) => p.connected).map((p) => p.leave()));
  }
}
