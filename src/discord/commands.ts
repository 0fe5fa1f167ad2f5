import type { Message } from 'discord.js';
import { createLogger } from '../utils/logger.js';
import { makeEmbed } from './interactive.js';
import type { CommandContext, CommandDefinition, CommandGroup, EmbedSpec, IncomingMessage } from './types.js';

const log = createLogger('commands');

export const GROUP_ORDER: CommandGroup[] = [
  'Basic',
  'Music',
  'Utils',
  'Chemistry',
  'Mathematics',
  'Misc',
  'Mudae',
  'Moderation',
];

export interface ParsedCommand {
  name: string;
  rawArgs: string;
  args: string[];
}

/**
 * `<prefix><name> <args>` を分解（接頭辞がなければ null）
 */
export function parseCommand(content: string, prefix: string): ParsedCommand | null {
  if (!content.startsWith(prefix)) return null;
  const body = content.slice(prefix.length);
  const match = /^(\S+)\s*([\s\S]*)$/.exec(body);
  const name = match?.[1];
  if (name === undefined) return null;
  const rawArgs = (match?.[2] ?? '').trim();
  return { name: name.toLowerCase(), rawArgs, args: rawArgs ? rawArgs.split(/\s+/) : [] };
}

export function commandFailedMessage(userName: string, prefix: string, invokedAs: string): string {
  return `⚠ **${userName}**, something went wrong running \`${prefix}${invokedAs}\`.`;
}

/**
 * コマンドの登録と実行
 */
export class CommandHandler<M extends IncomingMessage = Message> {
  private prefix: string;
  private report: (message: M, embed: EmbedSpec) => Promise<unknown>;
  private definitions: CommandDefinition<M>[] = [];
  private lookup = new Map<string, CommandDefinition<M>>();

  /**
   * @param report 失敗を知らせる埋め込みの送り先
   */
  constructor(prefix: string, report: (message: M, embed: EmbedSpec) => Promise<unknown>) {
    this.prefix = prefix;
    this.report = report;
  }

  register(definitions: CommandDefinition<M>[]): void {
    for (const definition of definitions) {
      for (const key of [definition.name, ...(definition.aliases ?? [])]) {
        const name = key.toLowerCase();
        if (this.lookup.has(name)) {
          throw new Error(`Command name "${name}" is registered twice`);
        }
        this.lookup.set(name, definition);
      }
      this.definitions.push(definition);
    }
  }

  find(name: string): CommandDefinition<M> | null {
    return this.lookup.get(name.toLowerCase()) ?? null;
  }

  list(): CommandDefinition<M>[] {
    return [...this.definitions];
  }

  /**
   * Runs the command in `message`, if any. Returns whether a command was found.
   */
  async execute(message: M): Promise<boolean> {
    const parsed = parseCommand(message.content, this.prefix);
    if (!parsed) return false;
    const definition = this.find(parsed.name);
    if (!definition) return false;

    const ctx: CommandContext<M> = {
      message,
      rawArgs: parsed.rawArgs,
      args: parsed.args,
      invokedAs: parsed.name,
      prefix: this.prefix,
    };

    try {
      if (definition.guildOnly && !message.inGuild()) {
        await message.reply('This command can only be used in a server.');
        return true;
      }
      log.debug(`${message.author.username} ran ${this.prefix}${parsed.name}`, { args: parsed.rawArgs });
      await definition.execute(ctx);
    } catch (error) {
      log.error(`Command ${definition.name} failed`, {
        error: error instanceof Error ? (error.stack ?? error.message) : String(error),
      });
      await this.reportFailure(message, parsed.name);
    }
    return true;
  }

  private async reportFailure(message: M, name: string): Promise<void> {
    const embed = makeEmbed(commandFailedMessage(message.author.username, this.prefix, name), undefined, 'red');
    try {
      await this.report(message, embed);
    } catch (error) {
      log.error('Failed to report command failure', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

function usageLine(definition: CommandDefinition, prefix: string): string {
  return `\`${prefix}${definition.usage ?? definition.name}\``;
}

/**
 * `%help` はカテゴリ別の一覧、`%help <command>` は 1 件の詳細
 */
export function helpEmbed(definitions: CommandDefinition[], prefix: string, query?: string): EmbedSpec {
  if (query) {
    const name = query.replace(prefix, '').toLowerCase();
    const definition = definitions.find((d) => d.name === name || (d.aliases ?? []).includes(name));
    if (!definition) {
      return makeEmbed(`No command called \`${prefix}${name}\` found.`, undefined, 'red');
    }
    const aliases = definition.aliases?.length ? `\nAliases: ${definition.aliases.map((a) => `\`${prefix}${a}\``).join(', ')}` : '';
    return makeEmbed(`${definition.description}\n\nUsage: ${usageLine(definition, prefix)}${aliases}`, `${prefix}${definition.name}`);
  }

  const sections = GROUP_ORDER.map((group) => {
    const names = definitions.filter((d) => d.group === group).map((d) => `\`${d.name}\``);
    return names.length === 0 ? null : `**${group}**\n${names.join(' ')}`;
  }).filter((section): section is string => section !== null);

  return {
    title: 'Commands',
    description: sections.join('\n\n'),
    color: 'gold',
    footer: `Use ${prefix}help <command> for details on a command`,
  };
}
