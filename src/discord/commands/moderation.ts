import { PermissionFlagsBits } from 'discord.js';
import { createLogger } from '../../utils/logger.js';
import { clampCount } from './basic.js';
import type { CommandDefinition } from '../types.js';

const log = createLogger('moderation');

export function moderationCommands(): CommandDefinition[] {
  return [
    {
      name: 'clean',
      aliases: ['purge'],
      description: '(ADMIN) Purges messages from the text channel',
      usage: 'clean [0-100]',
      group: 'Moderation',
      guildOnly: true,
      async execute(ctx) {
        const { message } = ctx;
        if (!message.inGuild() || !message.member?.permissions.has(PermissionFlagsBits.Administrator)) {
          await message.react('🚫');
          return;
        }
        const count = clampCount(ctx.args[0], 1, 0, 100);
        // コマンド自体も消す
        const deleted = await message.channel.bulkDelete(count + 1, true);
        log.info(`${message.author.username} cleaned ${Math.max(0, deleted.size - 1)} message(s) in ${message.channelId}`);
      },
    },
  ];
}
