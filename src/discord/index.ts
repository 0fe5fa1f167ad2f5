// Types
export type { BotConfig, CommandContext, CommandDefinition, EmbedSpec } from './types.js';
export type { CommandServices } from './services.js';
export type { BotDependencies } from './bot.js';

// Classes
export { QuaverBot } from './bot.js';
export { CommandHandler } from './commands.js';
export { PlayerRegistry } from './players.js';
export { ReplSessions } from './services.js';
