import {
  DiscordAPIError,
  EmbedBuilder,
  RESTJSONErrorCodes,
  type Message,
  type MessageReaction,
  type SendableChannels,
  type User,
} from 'discord.js';
import type { PlayerChannel, SentMessage } from '../music/player.js';
import { CANCEL_EMOJI, arrowUpdate, nextPageState, pageReactions, type PageState } from '../music/queue-view.js';
import { createLogger } from '../utils/logger.js';
import type { EmbedColor, EmbedSpec } from './types.js';

const log = createLogger('interactive');

export const EMBED_COLORS: Record<EmbedColor, number> = {
  gold: 0xf1c40f,
  red: 0xe74c3c,
  orange: 0xe67e22,
  teal: 0x1abc9c,
  green: 0x2ecc71,
  dark_blue: 0x206694,
};

export const DELETE_EMOJI = '🗑';
export const REACT_REMOVE_TIMEOUT_MS = 180_000;
export const CONFIRM_TIMEOUT_MS = 10_000;

export function makeEmbed(description: string, title?: string, color: EmbedColor = 'gold'): EmbedSpec {
  return title === undefined ? { description, color } : { title, description, color };
}

export function toEmbed(spec: EmbedSpec): EmbedBuilder {
  const embed = new EmbedBuilder().setColor(typeof spec.color === 'number' ? spec.color : EMBED_COLORS[spec.color]);
  if (spec.description) embed.setDescription(spec.description);
  if (spec.title) embed.setTitle(spec.title);
  if (spec.footer) embed.setFooter({ text: spec.footer });
  if (spec.author) embed.setAuthor({ name: spec.author });
  if (spec.image) embed.setImage(spec.image);
  return embed;
}

/**
 * ユーザーが先にメッセージを消した場合のエラー
 */
export function isUnknownMessage(error: unknown): boolean {
  return error instanceof DiscordAPIError && error.code === RESTJSONErrorCodes.UnknownMessage;
}

export async function safeDelete(message: Message): Promise<void> {
  try {
    await message.delete();
  } catch (error) {
    if (!isUnknownMessage(error)) throw error;
  }
}

async function safeEdit(message: Message, embed: EmbedSpec): Promise<void> {
  try {
    await message.edit({ embeds: [toEmbed(embed)] });
  } catch (error) {
    if (!isUnknownMessage(error)) throw error;
  }
}

/**
 * Channel of a command message, when the bot can post there
 */
export function sendableChannel(message: Message): SendableChannels {
  if (!message.channel.isSendable()) {
    throw new Error(`Cannot send messages in channel ${message.channelId}`);
  }
  return message.channel;
}

export async function sendEmbed(channel: SendableChannels, embed: EmbedSpec): Promise<Message> {
  return channel.send({ embeds: [toEmbed(embed)] });
}

/**
 * プレイヤーの通知先として使えるようにする
 */
export function playerChannel(channel: SendableChannels): PlayerChannel {
  return {
    async send(embed: EmbedSpec): Promise<SentMessage> {
      const sent = await sendEmbed(channel, embed);
      return {
        edit: (next) => safeEdit(sent, next),
        delete: () => safeDelete(sent),
      };
    },
  };
}

/**
 * 🗑 で削除できるようにする。member を指定するとその人だけが削除できる
 */
export async function reactRemove(
  message: Message,
  options: { memberId?: string; timeoutMs?: number } = {},
): Promise<boolean> {
  const timeoutMs = options.timeoutMs ?? REACT_REMOVE_TIMEOUT_MS;
  await message.react(DELETE_EMOJI);
  const collected = await message.awaitReactions({
    filter: (reaction: MessageReaction, user: User) =>
      !user.bot &&
      reaction.emoji.name === DELETE_EMOJI &&
      (options.memberId === undefined || user.id === options.memberId),
    max: 1,
    time: timeoutMs,
  });
  if (collected.size === 0) return false;
  await safeDelete(message);
  log.info(`Deleted message on reaction in ${message.channelId}`);
  return true;
}

/**
 * Same as reactRemove but never rejects; used after a reply has already been sent
 */
export function offerRemoval(message: Message, memberId?: string): void {
  reactRemove(message, memberId === undefined ? {} : { memberId }).catch((error: unknown) => {
    log.debug('Delete reaction unavailable', { error: error instanceof Error ? error.message : String(error) });
  });
}

/** y/yes → true, n/no → false, それ以外 null */
export function confirmationAnswer(content: string): boolean | null {
  const answer = content.trim().toLowerCase();
  if (answer === 'y' || answer === 'yes') return true;
  if (answer === 'n' || answer === 'no') return false;
  return null;
}

export function confirmationFooter(userName: string, answer: boolean | null): string {
  if (answer === true) return `${userName} responded with yes ✅`;
  if (answer === false) return `${userName} responded with no ❌`;
  return `${userName} did not respond in time ⌛`;
}

export interface ConfirmationOptions {
  prompt: string;
  timeoutMessage: string;
  declineMessage: string;
  timeoutMs?: number;
}

/**
 * Asks the command's author y/n. Resolves true (yes), false (no) or null (no answer in time).
 */
export async function askForConfirmation(message: Message, options: ConfirmationOptions): Promise<boolean | null> {
  const channel = sendableChannel(message);
  const prompt = makeEmbed(options.prompt, undefined, 'orange');
  const sent = await sendEmbed(channel, prompt);

  const replies = await channel.awaitMessages({
    filter: (reply: Message) => reply.author.id === message.author.id && confirmationAnswer(reply.content) !== null,
    max: 1,
    time: options.timeoutMs ?? CONFIRM_TIMEOUT_MS,
  });
  const reply = replies.first();
  const answer = reply === undefined ? null : confirmationAnswer(reply.content);

  if (answer === null) {
    await sendEmbed(channel, makeEmbed(options.timeoutMessage, undefined, 'orange'));
  } else if (!answer) {
    await sendEmbed(channel, makeEmbed(options.declineMessage, undefined, 'orange'));
  }
  await safeEdit(sent, { ...prompt, footer: confirmationFooter(message.author.username, answer) });
  return answer;
}

export interface PaginationOptions {
  /** 🔄 で再計算するためページは毎回取り直す */
  render: () => EmbedSpec[];
  /** 現在の曲があるページ。最初と 🔄 のたびに呼ばれる */
  initialIndex: () => number;
  timeoutMs: number;
}

/**
 * ページ数の変化に合わせて矢印を付け直す
 */
async function updateArrows(message: Message, pages: number): Promise<void> {
  const present = message.reactions.cache
    .filter((reaction) => reaction.me)
    .map((reaction) => reaction.emoji.name)
    .filter((name): name is string => name !== null);
  const update = arrowUpdate(present, pages);
  if (update.clear) {
    try {
      await message.reactions.removeAll();
    } catch (error) {
      log.debug('Cannot clear reactions, removing own ones', {
        error: error instanceof Error ? error.message : String(error),
      });
      for (const reaction of message.reactions.cache.filter((r) => r.me).values()) {
        await reaction.users.remove();
      }
    }
  }
  for (const emoji of update.add) {
    await message.react(emoji);
  }
}

/**
 * Sends the page holding the current track and flips pages on reactions (added or removed) until the timeout
 */
export async function paginate(channel: SendableChannels, options: PaginationOptions): Promise<Message> {
  let pages = options.render();
  let state: PageState = {
    index: Math.min(Math.max(0, options.initialIndex()), pages.length - 1),
    pages: pages.length,
  };
  const current = (): EmbedSpec => pages[state.index] ?? { description: '', color: 'gold' };
  const sent = await sendEmbed(channel, current());

  for (const emoji of pageReactions(pages.length)) {
    await sent.react(emoji);
  }

  const collector = sent.createReactionCollector({
    filter: (_reaction: MessageReaction, user: User) => !user.bot,
    time: options.timeoutMs,
    dispose: true,
  });
  const turn = (reaction: MessageReaction): void => {
    const next = nextPageState(reaction.emoji.name, state, () => {
      pages = options.render();
      return { index: options.initialIndex(), pages: pages.length };
    });
    if (!next) return;
    const refreshed = next.pages !== state.pages;
    state = next;
    const edit = safeEdit(sent, current());
    (refreshed ? edit.then(() => updateArrows(sent, next.pages)) : edit).catch((error: unknown) => {
      log.debug('Page update failed', { error: error instanceof Error ? error.message : String(error) });
    });
  };
  collector.on('collect', turn);
  collector.on('remove', turn);
  return sent;
}

/**
 * Reacts ❌ and calls onCancel with the first non-bot user to click it. Returns a function that stops watching.
 */
export async function watchCancel(message: Message, onCancel: (userId: string) => Promise<void>): Promise<() => void> {
  await message.react(CANCEL_EMOJI);
  const collector = message.createReactionCollector({
    filter: (reaction: MessageReaction, user: User) => !user.bot && reaction.emoji.name === CANCEL_EMOJI,
    max: 1,
  });
  collector.on('collect', (_reaction: MessageReaction, user: User) => {
    onCancel(user.id).catch((error: unknown) => {
      log.error('Cancel handler failed', { error: error instanceof Error ? error.message : String(error) });
    });
  });
  return () => {
    collector.stop();
  };
}
