import { DiscordAPIError, RESTJSONErrorCodes, type GuildMember, type Message } from 'discord.js';
import { TRAGEDY_TEXT, annoyLine, annoyReplies } from '../../features/annoy.js';
import { createLogger } from '../../utils/logger.js';
import { sendableChannel } from '../interactive.js';
import type { CommandServices } from '../services.js';
import type { CommandDefinition } from '../types.js';

const log = createLogger('misc');

/**
 * メンション、ID、名前の順で探す
 */
async function findMember(message: Message<true>, query: string): Promise<GuildMember | null> {
  const mentioned = message.mentions.members?.first();
  if (mentioned) return mentioned;
  const id = /^(?:<@!?)?(\d{15,})>?$/.exec(query)?.[1];
  if (id !== undefined) {
    try {
      return await message.guild.members.fetch(id);
    } catch (error) {
      if (error instanceof DiscordAPIError && error.code === RESTJSONErrorCodes.UnknownMember) return null;
      throw error;
    }
  }
  const found = await message.guild.members.fetch({ query, limit: 1 });
  return found.first() ?? null;
}

/**
 * Replies to every message of the current annoy target in that guild
 */
export function annoyListener(services: CommandServices): (message: Message) => Promise<void> {
  return async (message) => {
    if (!message.inGuild()) return;
    const target = services.annoy.get(message.guildId);
    if (!target || target.id !== message.author.id) return;
    await sendableChannel(message).send(annoyLine(target.name));
  };
}

export function miscCommands(services: CommandServices): CommandDefinition[] {
  return [
    {
      name: 'annoy',
      description: 'Sets a member to reply to constantly; without a member, stops',
      usage: 'annoy [member]',
      group: 'Misc',
      guildOnly: true,
      async execute(ctx) {
        const { message } = ctx;
        if (!message.inGuild()) return;
        const channel = sendableChannel(message);

        let member: GuildMember | null = null;
        if (ctx.rawArgs) {
          member = await findMember(message, ctx.rawArgs);
          if (!member) {
            await channel.send(`**${message.author.username}**, I couldn't find member \`${ctx.rawArgs}\``);
            return;
          }
        }

        const change = services.annoy.set(
          message.guildId,
          member && { id: member.id, name: member.displayName },
          services.client.user?.id ?? '',
        );
        log.info(`Annoy target in ${message.guild.name}: ${change.type}${member ? ` (${member.user.username})` : ''}`);
        for (const reply of annoyReplies(change)) {
          await channel.send(reply);
        }
      },
    },
    {
      name: 'tragedy',
      description: 'Tells you a sad story',
      group: 'Misc',
      async execute(ctx) {
        await sendableChannel(ctx.message).send(TRAGEDY_TEXT);
      },
    },
  ];
}
