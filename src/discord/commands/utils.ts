import type { Message } from 'discord.js';
import { formatAnagrams } from '../../features/anagrams.js';
import { UnsupportedImageError, analyzeImage, toHexcode } from '../../features/color.js';
import {
  MESSAGE_LIMIT,
  ReplSession,
  Sandbox,
  evalOverflowMessage,
  formatEval,
  type ReplEnd,
} from '../../features/evaluator.js';
import { CurrencyLookupError, SUPPORTED_CURRENCIES_URL, type Conversion } from '../../features/exchanger.js';
import { fetchBuffer } from '../../utils/http.js';
import { createLogger } from '../../utils/logger.js';
import { formatUtc } from '../../utils/time.js';
import { isUnknownMessage, makeEmbed, offerRemoval, sendEmbed, sendableChannel } from '../interactive.js';
import type { CommandServices } from '../services.js';
import type { CommandDefinition, EmbedSpec } from '../types.js';

const log = createLogger('utils');

const REPL_IDLE_TIMEOUT_MS = 300_000;
const IMAGE_SEARCH_LIMIT = 100;
const CURRENCYSCOOP_LINK = '[CurrencyScoop](https://currencyscoop.com/)';

export interface CurrencyRequest {
  amount: number;
  from: string;
  to: string;
  latest: boolean;
}

const LATEST_FLAGS = new Set(['latest', 'true', 'yes', '1']);

/**
 * `amount from [to] [latest]`. Returns null when the amount or source currency is missing.
 */
export function parseCurrencyArgs(args: string[]): CurrencyRequest | null {
  const [rawAmount, from, ...rest] = args;
  const amount = Number(rawAmount);
  if (rawAmount === undefined || from === undefined || !Number.isFinite(amount)) return null;
  let to = 'USD';
  let latest = false;
  const [first, second] = rest;
  if (first !== undefined && LATEST_FLAGS.has(first.toLowerCase())) {
    latest = true;
  } else if (first !== undefined) {
    to = first;
    latest = second !== undefined && LATEST_FLAGS.has(second.toLowerCase());
  }
  return { amount, from, to, latest };
}

export function conversionEmbed(conversion: Conversion): EmbedSpec {
  return makeEmbed(
    `Using data from **${formatUtc(new Date(conversion.updatedAt))}**, from ${CURRENCYSCOOP_LINK}`,
    `${conversion.amount.toFixed(2)} ${conversion.from} = ${conversion.result.toFixed(4)} ${conversion.to}`,
    'teal',
  );
}

/**
 * 換算の失敗を表示用の埋め込みにする
 */
export function currencyErrorEmbed(userName: string, error: unknown): EmbedSpec {
  if (error instanceof CurrencyLookupError) {
    return makeEmbed(
      `⚠ **${userName}**, ${error.message}\nView list of supported currencies [here](${SUPPORTED_CURRENCIES_URL}).`,
      undefined,
      'red',
    );
  }
  return makeEmbed(`⚠ **${userName}**, I failed to extract the latest data from ${CURRENCYSCOOP_LINK}!`, undefined, 'red');
}

export const CURRENCY_DISABLED_MESSAGE = 'Currency conversion is not configured on this bot.';

/** 埋め込み画像を優先し、なければ添付ファイル */
function imageUrlOf(message: Message): string | null {
  return message.embeds[0]?.image?.url ?? message.attachments.first()?.url ?? null;
}

export function analyzeEmbed(hexcode: string, imageUrl: string): EmbedSpec {
  return {
    author: 'Image Analyzed (%analyze)',
    description: `The r.m.s. RGB of the most recent image:\n**${hexcode}**`,
    color: Number.parseInt(hexcode.slice(1), 16),
    image: imageUrl,
  };
}

export function replHeader(userName: string, channelId: string): string {
  return `**${userName}** has started a JavaScript REPL session in <#${channelId}>`;
}

export function utilsCommands(services: CommandServices): CommandDefinition[] {
  return [
    {
      name: 'eval',
      aliases: ['jseval'],
      description: 'Evaluates a JavaScript expression',
      usage: 'eval <expression>',
      group: 'Utils',
      async execute(ctx) {
        const channel = sendableChannel(ctx.message);
        const output = formatEval(ctx.rawArgs, services.sandbox.run(ctx.rawArgs));
        await channel.send(output.length > MESSAGE_LIMIT ? evalOverflowMessage(ctx.rawArgs) : output);
      },
    },
    {
      name: 'repl',
      aliases: ['js'],
      description: 'Starts a JavaScript REPL session in the current channel',
      group: 'Utils',
      async execute(ctx) {
        const channel = sendableChannel(ctx.message);
        const { author, channelId } = ctx.message;
        if (services.replSessions.has(author.id, channelId)) return;

        const session = new ReplSession(replHeader(author.username, channelId), new Sandbox(services.sensitiveValues));
        services.replSessions.add(author.id, channelId);
        log.info(`REPL session started (${author.username}, ${channelId})`);

        try {
          const out = await channel.send(session.render());
          let end: ReplEnd | null = null;
          while (end === null) {
            const replies = await channel.awaitMessages({
              filter: (reply: Message) => reply.author.id === author.id,
              max: 1,
              time: REPL_IDLE_TIMEOUT_MS,
            });
            const input = replies.first();
            if (input === undefined) {
              end = 'timeout';
              break;
            }
            await input.delete().catch((error: unknown) => {
              if (!isUnknownMessage(error)) log.debug('Could not delete REPL input', { error: String(error) });
            });
            if (session.submit(input.content)) {
              end = 'exited';
            } else if (!session.fits) {
              end = 'overflow';
            } else {
              await out.edit(session.render());
            }
          }
          log.info(`REPL session ended: ${end} (${author.username}, ${channelId})`);
          await out.edit(session.render(end));
          offerRemoval(out, author.id);
        } finally {
          services.replSessions.delete(author.id, channelId);
        }
      },
    },
    {
      name: 'analyze',
      aliases: ['rgb'],
      description: 'Calculates the root mean square RGB of the most recent image',
      group: 'Utils',
      async execute(ctx) {
        const channel = sendableChannel(ctx.message);
        const history = await channel.messages.fetch({ limit: IMAGE_SEARCH_LIMIT });
        const imageUrl = [...history.values()].map(imageUrlOf).find((url): url is string => url !== null);
        if (imageUrl === undefined) {
          log.info(`No images in the most recent ${IMAGE_SEARCH_LIMIT} messages of ${ctx.message.channelId}`);
          await ctx.message.react('❌');
          return;
        }

        log.info(`Calculating r.m.s. RGB of ${imageUrl}`);
        let hexcode: string;
        try {
          hexcode = toHexcode(await analyzeImage(await fetchBuffer(imageUrl)));
        } catch (error) {
          if (!(error instanceof UnsupportedImageError)) throw error;
          await channel.send(`**${ctx.message.author.username}**, \`%analyze\` does not support analyzing GIFs`);
          return;
        }
        offerRemoval(await sendEmbed(channel, analyzeEmbed(hexcode, imageUrl)));
      },
    },
    {
      name: 'anagrams',
      aliases: ['anagram'],
      description: 'Finds the anagrams of your word',
      usage: 'anagrams <letters>',
      group: 'Utils',
      async execute(ctx) {
        const channel = sendableChannel(ctx.message);
        if (!ctx.rawArgs) {
          await channel.send(`**${ctx.message.author.username}**, give me some letters! Example: \`%anagrams listen\``);
          return;
        }
        const groups = services.anagrams.find(ctx.rawArgs);
        offerRemoval(await channel.send(formatAnagrams(ctx.message.author.username, ctx.rawArgs, groups)));
      },
    },
    {
      name: 'currency',
      description: 'Converts an amount of one currency into another',
      usage: 'currency <amount> <from> [to=USD] [latest]',
      group: 'Utils',
      async execute(ctx) {
        const channel = sendableChannel(ctx.message);
        const name = ctx.message.author.username;
        if (!services.exchanger) {
          await sendEmbed(channel, makeEmbed(CURRENCY_DISABLED_MESSAGE, undefined, 'red'));
          return;
        }
        const request = parseCurrencyArgs(ctx.args);
        if (!request) {
          await sendEmbed(
            channel,
            makeEmbed(`⚠ **${name}**, usage: \`${ctx.prefix}currency <amount> <from> [to] [latest]\``, undefined, 'red'),
          );
          return;
        }
        try {
          const conversion = await services.exchanger.convert(request.amount, request.from, request.to, request.latest);
          await sendEmbed(channel, conversionEmbed(conversion));
        } catch (error) {
          if (!(error instanceof CurrencyLookupError)) {
            log.error('Currency conversion failed', { error: error instanceof Error ? error.message : String(error) });
          }
          await sendEmbed(channel, currencyErrorEmbed(name, error));
        }
      },
    },
  ];
}
