import type { Message } from 'discord.js';

/**
 * Discord Bot設定
 */
export interface BotConfig {
  /** Botトークン */
  token: string;
  /** テキストコマンドの接頭辞 */
  prefix: string;
  /** ダウンロード失敗時に案内する開発者 */
  devUserId: string | undefined;
  /** バージョン表示用 */
  version: string;
  /** $left の応答を拾う Mudae の ID */
  mudaeBotId: string;
}

/**
 * 埋め込みの色名
 */
export type EmbedColor = 'gold' | 'red' | 'orange' | 'teal' | 'green' | 'dark_blue';

/**
 * discord.js に依存しない埋め込みの内容
 */
export interface EmbedSpec {
  title?: string;
  description: string;
  /** 色名、または %analyze の結果のような 0xRRGGBB */
  color: EmbedColor | number;
  footer?: string;
  author?: string;
  image?: string;
}

export type CommandGroup =
  | 'Basic'
  | 'Music'
  | 'Utils'
  | 'Chemistry'
  | 'Mathematics'
  | 'Misc'
  | 'Mudae'
  | 'Moderation';

/**
 * コマンドの受け付けに必要なメッセージの部分
 */
export interface IncomingMessage {
  content: string;
  author: { username: string };
  inGuild(): boolean;
  reply(content: string): Promise<unknown>;
}

/**
 * コマンド実行時の文脈
 */
export interface CommandContext<M extends IncomingMessage = Message> {
  message: M;
  /** コマンド名以降の生の引数 */
  rawArgs: string;
  /** 空白区切りの引数 */
  args: string[];
  /** 呼び出しに使われた名前（エイリアス含む） */
  invokedAs: string;
  prefix: string;
}

/**
 * コマンド定義
 */
export interface CommandDefinition<M extends IncomingMessage = Message> {
  /** コマンド名（%play等） */
  name: string;
  aliases?: string[];
  /** 説明 */
  description: string;
  /** 使い方（接頭辞なし） */
  usage?: string;
  group: CommandGroup;
  /** サーバー内でのみ使える */
  guildOnly?: boolean;
  /** 実行関数 */
  execute: (ctx: CommandContext<M>) => Promise<void>;
}
