import { Client, Events, GatewayIntentBits, Partials, type Message } from 'discord.js';
import { createLogger } from '../utils/logger.js';
import { CommandHandler } from './commands.js';
import { basicCommands } from './commands/basic.js';
import { chemistryCommands } from './commands/chemistry.js';
import { mathematicsCommands } from './commands/mathematics.js';
import { annoyListener, miscCommands } from './commands/misc.js';
import { moderationCommands } from './commands/moderation.js';
import { mudaeCommands, mudaeListener } from './commands/mudae.js';
import { musicCommands } from './commands/music.js';
import { utilsCommands } from './commands/utils.js';
import type { CommandServices } from './services.js';
import { handleSlashCommand, registerCommands } from './slash-commands.js';
import { sendEmbed, sendableChannel } from './interactive.js';
import type { BotConfig } from './types.js';

const log = createLogger('bot');

type MessageListener = (message: Message) => Promise<void>;

/** Bot 自身が作るもの以外の依存 */
export type BotDependencies = Omit<CommandServices, 'client' | 'config'>;

/**
 * Quaver Discord Bot
 */
export class QuaverBot {
  private client: Client;
  private config: BotConfig;
  private services: CommandServices;
  private commandHandler: CommandHandler<Message>;
  private listeners: MessageListener[];

  constructor(config: BotConfig, dependencies: BotDependencies) {
    this.config = config;

    this.client = new Client({
      intents: [
        GatewayIntentBits.Guilds,
        GatewayIntentBits.GuildMessages,
        GatewayIntentBits.MessageContent,
        GatewayIntentBits.GuildMessageReactions,
        GatewayIntentBits.GuildVoiceStates,
        GatewayIntentBits.GuildMembers,
        GatewayIntentBits.DirectMessages,
      ],
      partials: [Partials.Message, Partials.Channel, Partials.Reaction],
    });

    this.services = { ...dependencies, client: this.client, config };
    this.commandHandler = new CommandHandler<Message>(config.prefix, (message, embed) =>
      sendEmbed(sendableChannel(message), embed),
    );
    this.commandHandler.register([
      ...basicCommands(this.services, () => this.commandHandler.list()),
      ...musicCommands(this.services),
      ...utilsCommands(this.services),
      ...chemistryCommands(this.services),
      ...mathematicsCommands(),
      ...miscCommands(this.services),
      ...mudaeCommands(this.services),
      ...moderationCommands(),
    ]);
    this.listeners = [annoyListener(this.services), mudaeListener(this.services)];

    this.setupEventHandlers();
  }

  /**
   * イベントハンドラを設定
   */
  private setupEventHandlers(): void {
    this.client.once(Events.ClientReady, async (client) => {
      log.info(`Logged in as ${client.user.tag} (version ${this.config.version})`);
      try {
        await registerCommands(client);
      } catch (error) {
        log.error('Failed to register slash commands', {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    });

    this.client.on(Events.MessageCreate, async (message) => {
      await this.handleMessage(message);
    });

    this.client.on(Events.InteractionCreate, async (interaction) => {
      if (!interaction.isChatInputCommand()) return;
      try {
        await handleSlashCommand(interaction, this.services, this.commandHandler.list());
      } catch (error) {
        log.error(`Slash command /${interaction.commandName} failed`, {
          error: error instanceof Error ? (error.stack ?? error.message) : String(error),
        });
      }
    });

    this.client.on(Events.Error, (error) => {
      log.error('Discord client error', { error: error.message });
    });

    this.client.on(Events.ShardDisconnect, () => {
      log.warn('Bot disconnected');
    });

    this.client.on(Events.ShardResume, () => {
      log.info('Bot reconnected');
    });
  }

  /**
   * メッセージを処理
   */
  private async handleMessage(message: Message): Promise<void> {
    if (message.author.id === this.client.user?.id) return;

    // Mudae の $left 応答は Bot の発言なので先に見る
    for (const listener of this.listeners) {
      try {
        await listener(message);
      } catch (error) {
        log.error('Message listener failed', { error: error instanceof Error ? error.message : String(error) });
      }
    }

    if (message.author.bot) return;
    if (this.services.replSessions.has(message.author.id, message.channelId)) return;

    await this.commandHandler.execute(message);
  }

  /**
   * Botを起動
   */
  async start(): Promise<void> {
    log.info('Starting Quaver...');
    await this.client.login(this.config.token);
  }

  /**
   * Botを停止
   */
  async stop(): Promise<void> {
    log.info('Stopping Quaver...');
    await this.services.players.disconnectAll();
    await this.client.destroy();
  }
}
