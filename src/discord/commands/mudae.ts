import { SnowflakeUtil, type Message } from 'discord.js';
import {
  EXCHANGE_DONE_TEXT,
  formatKakera,
  parseBefore,
  parseClaimedCount,
  parseExchange,
  type Exchange,
  type KakeraInput,
} from '../../features/mudae.js';
import { createLogger } from '../../utils/logger.js';
import { formatUtc } from '../../utils/time.js';
import { sendEmbed, sendableChannel } from '../interactive.js';
import type { CommandServices } from '../services.js';
import type { CommandDefinition, EmbedSpec } from '../types.js';

const log = createLogger('mudae');

const FETCH_PAGE_SIZE = 100;
/** 取引はこの件数以内に終わっているはず */
const EXCHANGE_LOOKBACK = 50;

/**
 * `claimRank likeRank [claimed] [keys]`; claimed is null when omitted
 */
export function parseKakeraArgs(args: string[]): (Omit<KakeraInput, 'claimed'> & { claimed: number | null }) | null {
  const numbers = args.map((arg) => Number.parseInt(arg, 10));
  if (numbers.some((n) => Number.isNaN(n))) return null;
  const [claimRank, likeRank, claimed, keys] = numbers;
  if (claimRank === undefined || likeRank === undefined) return null;
  return { claimRank, likeRank, claimed: claimed ?? null, keys: keys ?? 0 };
}

export interface ExchangesArgs {
  count: number;
  before: Date | null;
  /** 日付として読めなかった入力 */
  unparsedBefore: string | null;
}

export function parseExchangesArgs(args: string[], now: Date = new Date()): ExchangesArgs {
  let rest = args;
  let count = 100;
  const first = args[0];
  if (first !== undefined && /^-?\d+$/.test(first)) {
    count = Math.max(1, Math.min(1000, Number(first)));
    rest = args.slice(1);
  }
  const raw = rest.join(' ');
  if (!raw) return { count, before: null, unparsedBefore: null };
  const before = parseBefore(raw, now);
  return { count, before, unparsedBefore: before ? null : raw };
}

export interface FoundExchange {
  exchange: Exchange;
  createdAt: Date;
  url: string;
}

export function exchangeEntry({ exchange, createdAt, url }: FoundExchange): string {
  return (
    `[${formatUtc(createdAt)}](${url})\n` +
    `<@${exchange.initiatorId}>: ${exchange.initiatorChars} ↔ ${exchange.otherChars} :<@${exchange.otherId}>`
  );
}

export function exchangesEmbed(options: {
  count: number;
  channelId: string;
  before: Date | null;
  found: FoundExchange[];
  elapsedMs: number;
}): EmbedSpec {
  let header = `Searched **${options.count}** messages in <#${options.channelId}>`;
  header +=
    options.before === null
      ? '\nSearched **most recent** messages in channel | Most recent first:'
      : `\nSearched before: **${formatUtc(options.before)}** | Most recent first:`;
  const body = options.found.map(exchangeEntry).join('\n') || 'No `$marryexchange`s found!';
  return {
    title: 'Mudae $marryexchange History',
    description: `${header}\n\n${body}`,
    color: 'dark_blue',
    footer: `Completed search in ${(options.elapsedMs / 1000).toFixed(3)}s`,
  };
}

/**
 * Records the claimed character count from Mudae's `$left` replies
 */
export function mudaeListener(services: CommandServices): (message: Message) => Promise<void> {
  return async (message) => {
    if (!message.inGuild() || message.author.id !== services.config.mudaeBotId) return;
    const claimed = parseClaimedCount(message.content);
    if (claimed === null) return;
    log.info(`$left message detected in ${message.channelId}`);
    await services.mudae.record(message.guildId, claimed);
  };
}

export function mudaeCommands(services: CommandServices): CommandDefinition[] {
  const mudaeId = services.config.mudaeBotId;

  /** 新しい順に最大 count 件 */
  const fetchHistory = async (message: Message, count: number, before: Date | null): Promise<Message[]> => {
    const channel = sendableChannel(message);
    const collected: Message[] = [];
    let cursor = before === null ? undefined : SnowflakeUtil.generate({ timestamp: before.getTime() }).toString();
    while (collected.length < count) {
      const page = await channel.messages.fetch({
        limit: Math.min(FETCH_PAGE_SIZE, count - collected.length),
        ...(cursor === undefined ? {} : { before: cursor }),
      });
      if (page.size === 0) break;
      collected.push(...page.values());
      cursor = page.last()?.id;
    }
    return collected;
  };

  const findExchange = async (done: Message): Promise<FoundExchange | null> => {
    const history = await sendableChannel(done).messages.fetch({ limit: EXCHANGE_LOOKBACK, before: done.id });
    const exchange = parseExchange(
      [...history.values()].map((m) => ({ authorId: m.author.id, content: m.content, hasEmbeds: m.embeds.length > 0 })),
      mudaeId,
    );
    if (!exchange) {
      log.warn(`Failed to parse exchange participants before ${done.id} in ${done.channelId}`);
      return null;
    }
    return { exchange, createdAt: done.createdAt, url: done.url };
  };

  return [
    {
      name: 'kakeravalue',
      aliases: ['kv'],
      description: 'Calculates the kakera value of a Mudae character',
      usage: 'kakeravalue <claim rank> <like rank> [claimed] [keys]',
      group: 'Mudae',
      async execute(ctx) {
        const channel = sendableChannel(ctx.message);
        const parsed = parseKakeraArgs(ctx.args);
        if (!parsed) {
          await channel.send(
            `**${ctx.message.author.username}**, usage: \`${ctx.prefix}kakeravalue <claim rank> <like rank> [claimed] [keys]\``,
          );
          return;
        }
        const guildId = ctx.message.guildId;
        const claimed = parsed.claimed ?? (guildId === null ? 0 : await services.mudae.claimed(guildId));
        await channel.send(formatKakera({ ...parsed, claimed }));
      },
    },
    {
      name: 'exchanges',
      aliases: ['trades'],
      description: "Lists the most recent $marryexchange's in this channel",
      usage: 'exchanges [messages=100] [before date]',
      group: 'Mudae',
      async execute(ctx) {
        const channel = sendableChannel(ctx.message);
        const args = parseExchangesArgs(ctx.args);
        if (args.unparsedBefore !== null) {
          log.warn(`Failed to read "${args.unparsedBefore}" as a date`);
        }

        await channel.sendTyping();
        const started = Date.now();
        const history = await fetchHistory(ctx.message, args.count, args.before);
        const found: FoundExchange[] = [];
        for (const message of history) {
          if (message.author.id !== mudaeId || message.embeds.length > 0) continue;
          if (!message.content.includes(EXCHANGE_DONE_TEXT)) continue;
          const exchange = await findExchange(message);
          if (exchange) found.push(exchange);
        }

        await sendEmbed(
          channel,
          exchangesEmbed({
            count: args.count,
            channelId: ctx.message.channelId,
            before: args.before,
            found,
            elapsedMs: Date.now() - started,
          }),
        );
      },
    },
  ];
}
