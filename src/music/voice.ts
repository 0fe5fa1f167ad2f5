import { spawn, type ChildProcessByStdio } from 'node:child_process';
import type { Readable } from 'node:stream';
import {
  AudioPlayerStatus,
  NoSubscriberBehavior,
  StreamType,
  VoiceConnectionStatus,
  createAudioPlayer,
  createAudioResource,
  entersState,
  joinVoiceChannel,
  type AudioPlayer,
  type VoiceConnection,
} from '@discordjs/voice';
import type { Guild } from 'discord.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('voice');

export type VoiceEvent = 'finish' | 'disconnect';

/**
 * 1 サーバー分のボイス接続と音声出力
 */
export interface VoiceSession {
  readonly connected: boolean;
  readonly channelId: string | null;
  /** 再生中または一時停止中のリソースがある */
  readonly active: boolean;
  readonly paused: boolean;
  /** Bot がミュートされている */
  readonly muted: boolean;
  connect(channelId: string): Promise<void>;
  disconnect(): void;
  /** stop() で止めた場合は finish を発火しない */
  play(streamUrl: string): void;
  stop(): void;
  pause(): void;
  resume(): void;
  /** 接続中のチャンネルに Bot 以外がいるか */
  hasListeners(): boolean;
  on(event: VoiceEvent, listener: () => void): void;
}

const FFMPEG_INPUT_ARGS = ['-reconnect', '1', '-reconnect_streamed', '1', '-reconnect_delay_max', '5'];

export function ffmpegArgs(streamUrl: string): string[] {
  return [
    '-hide_banner',
    '-loglevel',
    'error',
    ...FFMPEG_INPUT_ARGS,
    '-i',
    streamUrl,
    '-vn',
    '-c:a',
    'libopus',
    '-b:a',
    '128k',
    '-ar',
    '48000',
    '-ac',
    '2',
    '-f',
    'ogg',
    'pipe:1',
  ];
}

type Transcoder = ChildProcessByStdio<null, Readable, Readable>;

export class DiscordVoiceSession implements VoiceSession {
  private guild: Guild;
  private ffmpegPath: string;
  private connection: VoiceConnection | null = null;
  private player: AudioPlayer;
  private transcoder: Transcoder | null = null;
  private manualStop = false;
  private listeners: Record<VoiceEvent, Array<() => void>> = { finish: [], disconnect: [] };

  constructor(guild: Guild, ffmpegPath: string) {
    this.guild = guild;
    this.ffmpegPath = ffmpegPath;
    this.player = createAudioPlayer({ behaviors: { noSubscriber: NoSubscriberBehavior.Pause } });

    this.player.on('stateChange', (oldState, newState) => {
      if (newState.status !== AudioPlayerStatus.Idle || oldState.status === AudioPlayerStatus.Idle) return;
      this.killTranscoder();
      if (this.manualStop) {
        this.manualStop = false;
        return;
      }
      this.emit('finish');
    });

    this.player.on('error', (error) => {
      log.error(`Audio player error in ${this.guild.name}`, { error: error.message });
    });
  }

  get connected(): boolean {
    return this.connection !== null && this.connection.state.status !== VoiceConnectionStatus.Destroyed;
  }

  get channelId(): string | null {
    return this.connected ? this.connection?.joinConfig.channelId ?? null : null;
  }

  get active(): boolean {
    return this.player.state.status !== AudioPlayerStatus.Idle;
  }

  get paused(): boolean {
    const status = this.player.state.status;
    return status === AudioPlayerStatus.Paused || status === AudioPlayerStatus.AutoPaused;
  }

  get muted(): boolean {
    return this.guild.members.me?.voice.mute ?? false;
  }

  on(event: VoiceEvent, listener: () => void): void {
    this.listeners[event].push(listener);
  }

  private emit(event: VoiceEvent): void {
    for (const listener of this.listeners[event]) {
      listener();
    }
  }

  async connect(channelId: string): Promise<void> {
    if (this.connected && this.channelId === channelId) return;

    const connection = joinVoiceChannel({
      channelId,
      guildId: this.guild.id,
      adapterCreator: this.guild.voiceAdapterCreator,
      selfDeaf: true,
      selfMute: false,
    });

    if (connection !== this.connection) {
      this.connection = connection;
      connection.on(VoiceConnectionStatus.Disconnected, () => {
        // Moved by someone or a network blip: give it a few seconds to recover
        Promise.race([
          entersState(connection, VoiceConnectionStatus.Signalling, 5_000),
          entersState(connection, VoiceConnectionStatus.Connecting, 5_000),
        ]).catch(() => {
          log.info(`Voice connection lost in ${this.guild.name}`);
          this.disconnect();
        });
      });
      connection.subscribe(this.player);
    }

    try {
      await entersState(connection, VoiceConnectionStatus.Ready, 20_000);
    } catch (error) {
      this.disconnect();
      throw error;
    }
    log.info(`Connected to voice channel ${channelId} in ${this.guild.name}`);
  }

  disconnect(): void {
    if (!this.connection) return;
    this.stop();
    const connection = this.connection;
    this.connection = null;
    if (connection.state.status !== VoiceConnectionStatus.Destroyed) {
      connection.destroy();
    }
    this.emit('disconnect');
  }

  play(streamUrl: string): void {
    if (this.active) {
      this.stop();
    }
    this.manualStop = false;
    const transcoder = spawn(this.ffmpegPath, ffmpegArgs(streamUrl), { stdio: ['ignore', 'pipe', 'pipe'] });
    transcoder.stderr.on('data', (chunk: Buffer) => {
      log.debug(`ffmpeg: ${chunk.toString('utf-8').trim()}`);
    });
    transcoder.on('error', (error) => {
      log.error(`Failed to start ffmpeg at ${this.ffmpegPath}`, { error: error.message });
    });
    this.transcoder = transcoder;
    this.player.play(createAudioResource(transcoder.stdout, { inputType: StreamType.OggOpus }));
  }

  stop(): void {
    if (this.active) {
      this.manualStop = true;
      this.player.stop(true);
    }
    this.killTranscoder();
  }

  pause(): void {
    this.player.pause();
  }

  resume(): void {
    this.player.unpause();
  }

  hasListeners(): boolean {
    const channelId = this.channelId;
    if (!channelId) return false;
    const channel = this.guild.channels.cache.get(channelId);
    if (!channel || !channel.isVoiceBased()) return false;
    return channel.members.some((member) => !member.user.bot);
  }

  private killTranscoder(): void {
    if (this.transcoder && this.transcoder.exitCode === null) {
      this.transcoder.kill('SIGKILL');
    }
    this.transcoder = null;
  }
}
