import {
  MessageFlags,
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
  type Client,
} from 'discord.js';
import { CurrencyLookupError } from '../features/exchanger.js';
import { formatKakera } from '../features/mudae.js';
import { savedPlaylistsSummary } from '../music/queue-view.js';
import { createLogger } from '../utils/logger.js';
import { helpEmbed } from './commands.js';
import { pingMessage } from './commands/basic.js';
import { CURRENCY_DISABLED_MESSAGE, conversionEmbed, currencyErrorEmbed } from './commands/utils.js';
import { makeEmbed, toEmbed } from './interactive.js';
import type { CommandServices } from './services.js';
import type { CommandDefinition, EmbedSpec } from './types.js';

const log = createLogger('slash-commands');

export const pingCommandData = new SlashCommandBuilder().setName('ping').setDescription('Checks if bot is alive');

export const helpCommandData = new SlashCommandBuilder()
  .setName('help')
  .setDescription('Lists commands, or shows details of one command')
  .addStringOption((opt) => opt.setName('command').setDescription('Command name').setRequired(false));

export const showQueuesCommandData = new SlashCommandBuilder()
  .setName('showqueues')
  .setDescription('Previews your list of saved queues');

export const currencyCommandData = new SlashCommandBuilder()
  .setName('currency')
  .setDescription('Converts an amount of one currency into another')
  .addNumberOption((opt) => opt.setName('amount').setDescription('Amount to convert').setRequired(true))
  .addStringOption((opt) => opt.setName('from').setDescription('Currency code, e.g. EUR').setRequired(true))
  .addStringOption((opt) => opt.setName('to').setDescription('Currency code (default USD)').setRequired(false))
  .addBooleanOption((opt) => opt.setName('latest').setDescription('Fetch the latest rates first').setRequired(false));

export const kakeraValueCommandData = new SlashCommandBuilder()
  .setName('kakeravalue')
  .setDescription('Calculates the kakera value of a Mudae character')
  .addIntegerOption((opt) => opt.setName('claim_rank').setDescription('Claim rank').setRequired(true).setMinValue(1))
  .addIntegerOption((opt) => opt.setName('like_rank').setDescription('Like rank').setRequired(true).setMinValue(1))
  .addIntegerOption((opt) =>
    opt.setName('claimed').setDescription('Characters claimed in this server (default: last $left)').setMinValue(0),
  )
  .addIntegerOption((opt) => opt.setName('keys').setDescription('Keys unlocked').setMinValue(0));

export const ALL_COMMAND_DATA = [
  pingCommandData,
  helpCommandData,
  showQueuesCommandData,
  currencyCommandData,
  kakeraValueCommandData,
];

/**
 * サーバーごとにスラッシュコマンドを登録
 */
export async function registerCommands(client: Client): Promise<void> {
  const body = ALL_COMMAND_DATA.map((data) => data.toJSON());
  await Promise.all(
    client.guilds.cache.map(async (guild) => {
      try {
        await guild.commands.set(body);
        log.info(`Registered slash commands for guild: ${guild.name}`);
      } catch (error) {
        log.error(`Failed to register commands for guild ${guild.name}`, {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }),
  );
}

async function replyEmbed(interaction: ChatInputCommandInteraction, embed: EmbedSpec, ephemeral = false): Promise<void> {
  await interaction.reply({ embeds: [toEmbed(embed)], ...(ephemeral ? { flags: MessageFlags.Ephemeral } : {}) });
}

export async function handlePingInteraction(interaction: ChatInputCommandInteraction, services: CommandServices): Promise<void> {
  await interaction.reply(pingMessage(services.config.version, services.client.ws.ping));
}

export async function handleHelpInteraction(
  interaction: ChatInputCommandInteraction,
  services: CommandServices,
  definitions: CommandDefinition[],
): Promise<void> {
  const query = interaction.options.getString('command') ?? undefined;
  await replyEmbed(interaction, helpEmbed(definitions, services.config.prefix, query), true);
}

export async function handleShowQueuesInteraction(
  interaction: ChatInputCommandInteraction,
  services: CommandServices,
): Promise<void> {
  const userId = interaction.user.id;
  if (!(await services.playlists.hasAny(userId))) {
    await replyEmbed(interaction, makeEmbed(`**${interaction.user.username}**, you don't have any saved playlists!`, undefined, 'red'), true);
    return;
  }
  await replyEmbed(interaction, savedPlaylistsSummary(userId, await services.playlists.list(userId)));
}

export async function handleCurrencyInteraction(
  interaction: ChatInputCommandInteraction,
  services: CommandServices,
): Promise<void> {
  if (!services.exchanger) {
    await replyEmbed(interaction, makeEmbed(CURRENCY_DISABLED_MESSAGE, undefined, 'red'), true);
    return;
  }
  await interaction.deferReply();
  try {
    const conversion = await services.exchanger.convert(
      interaction.options.getNumber('amount', true),
      interaction.options.getString('from', true),
      interaction.options.getString('to') ?? 'USD',
      interaction.options.getBoolean('latest') ?? false,
    );
    await interaction.editReply({ embeds: [toEmbed(conversionEmbed(conversion))] });
  } catch (error) {
    if (!(error instanceof CurrencyLookupError)) {
      log.error('Currency conversion failed', { error: error instanceof Error ? error.message : String(error) });
    }
    await interaction.editReply({ embeds: [toEmbed(currencyErrorEmbed(interaction.user.username, error))] });
  }
}

export async function handleKakeraValueInteraction(
  interaction: ChatInputCommandInteraction,
  services: CommandServices,
): Promise<void> {
  const guildId = interaction.guildId;
  const claimed =
    interaction.options.getInteger('claimed') ?? (guildId === null ? 0 : await services.mudae.claimed(guildId));
  await interaction.reply(
    formatKakera({
      claimRank: interaction.options.getInteger('claim_rank', true),
      likeRank: interaction.options.getInteger('like_rank', true),
      claimed,
      keys: interaction.options.getInteger('keys') ?? 0,
    }),
  );
}

/**
 * Returns whether the interaction was one of ours
 */
export async function handleSlashCommand(
  interaction: ChatInputCommandInteraction,
  services: CommandServices,
  definitions: CommandDefinition[],
): Promise<boolean> {
  switch (interaction.commandName) {
    case 'ping':
      await handlePingInteraction(interaction, services);
      return true;
    case 'help':
      await handleHelpInteraction(interaction, services, definitions);
      return true;
    case 'showqueues':
      await handleShowQueuesInteraction(interaction, services);
      return true;
    case 'currency':
      await handleCurrencyInteraction(interaction, services);
      return true;
    case 'kakeravalue':
      await handleKakeraValueInteraction(interaction, services);
      return true;
    default:
      return false;
  }
}
