import { createLogger } from '../../utils/logger.js';
import { helpEmbed } from '../commands.js';
import { isUnknownMessage, offerRemoval, sendEmbed, sendableChannel } from '../interactive.js';
import type { CommandServices } from '../services.js';
import type { CommandDefinition } from '../types.js';

const log = createLogger('basic');

/** %cleandm と %clean の件数を範囲に収める */
export function clampCount(raw: string | undefined, fallback: number, min: number, max: number): number {
  const parsed = raw === undefined ? fallback : Number.parseInt(raw, 10);
  const count = Number.isNaN(parsed) ? fallback : parsed;
  return Math.max(min, Math.min(max, count));
}

export function pingMessage(version: string, latencyMs: number): string {
  return `**[${version}]** Yes, I'm here! Bot latency: **${Math.round(latencyMs)}** ms`;
}

/**
 * 基本コマンド。help は登録済みの全コマンドを参照する
 */
export function basicCommands(services: CommandServices, listCommands: () => CommandDefinition[]): CommandDefinition[] {
  return [
    {
      name: 'ping',
      description: 'Checks if bot is alive',
      group: 'Basic',
      async execute(ctx) {
        await sendableChannel(ctx.message).send(pingMessage(services.config.version, services.client.ws.ping));
      },
    },
    {
      name: 'version',
      aliases: ['v'],
      description: 'Displays version of running script',
      group: 'Basic',
      async execute(ctx) {
        await sendableChannel(ctx.message).send(`Script version: **${services.config.version}**`);
      },
    },
    {
      name: 'say',
      aliases: ['echo'],
      description: 'Echoes what you say',
      usage: 'say <text>',
      group: 'Basic',
      async execute(ctx) {
        const channel = sendableChannel(ctx.message);
        try {
          await ctx.message.delete();
        } catch (error) {
          log.warn(`Couldn't delete user message in ${ctx.message.channelId}`, {
            error: error instanceof Error ? error.message : String(error),
          });
        }
        if (ctx.rawArgs) {
          await channel.send(ctx.rawArgs);
        }
      },
    },
    {
      name: 'cleandm',
      aliases: ['purgedm'],
      description: 'Deletes bot messages from your DM',
      usage: 'cleandm [1-100]',
      group: 'Basic',
      async execute(ctx) {
        let remaining = clampCount(ctx.args[0], 1, 1, 100);
        const dm = await ctx.message.author.createDM();
        log.info(`Deleting up to ${remaining} message(s) from DM channel of ${ctx.message.author.username}`);

        let deleted = 0;
        const history = await dm.messages.fetch({ limit: 100 });
        for (const message of history.values()) {
          if (remaining === 0) break;
          if (message.author.id !== services.client.user?.id) continue;
          try {
            await message.delete();
            remaining -= 1;
            deleted += 1;
          } catch (error) {
            if (!isUnknownMessage(error)) throw error;
          }
        }

        log.info(`Deleted ${deleted} message(s) from DM channel of ${ctx.message.author.username}`);
        await ctx.message.react('✅');
      },
    },
    {
      name: 'help',
      description: 'Lists commands, or shows details of one command',
      usage: 'help [command]',
      group: 'Basic',
      async execute(ctx) {
        const sent = await sendEmbed(
          sendableChannel(ctx.message),
          helpEmbed(listCommands(), ctx.prefix, ctx.args[0]),
        );
        offerRemoval(sent);
      },
    },
  ];
}
