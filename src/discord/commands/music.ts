import type { Guild, Message } from 'discord.js';
import { parseToggle } from '../../music/cursor.js';
import type { MusicPlayer, TrackRequest } from '../../music/player.js';
import {
  canceledProgress,
  initialPageIndex,
  playlistPreview,
  progressMessage,
  queuePages,
  savedPlaylistsSummary,
  PAGE_SIZE,
} from '../../music/queue-view.js';
import { TrackResolveError } from '../../music/resolver.js';
import { formatDuration, trackLink } from '../../music/track.js';
import { createLogger } from '../../utils/logger.js';
import {
  askForConfirmation,
  isUnknownMessage,
  makeEmbed,
  paginate,
  playerChannel,
  sendEmbed,
  toEmbed,
  sendableChannel,
  watchCancel,
} from '../interactive.js';
import type { CommandServices } from '../services.js';
import type { CommandContext, CommandDefinition, EmbedSpec } from '../types.js';

const log = createLogger('music');

const PLAYLIST_CONFIRM_TIMEOUT_MS = 20_000;

/**
 * 呼び出したユーザーと Bot のボイス接続状況
 */
export interface CallerVoice {
  callerChannelId: string | null;
  /** 未接続なら null */
  botChannelId: string | null;
  /** Bot のいるチャンネルに Bot 以外がいる */
  botHasListeners: boolean;
}

export type SummonPlan = { type: 'error'; message: string } | { type: 'stay' } | { type: 'connect'; channelId: string };

const someoneElseListening = (name: string, channelId: string): string =>
  `**${name}**, someone else is listening to music in <#${channelId}>`;

/**
 * Checks for commands that drive a connected player. Returns the reason to refuse, or null.
 */
export function callerCheckError(name: string, voice: CallerVoice): string | null {
  let reason: string | null = null;
  if (voice.callerChannelId === null) {
    reason = `**${name}**, you have to be connected to a voice channel before you can use this command!`;
  }
  if (voice.botChannelId === null) {
    reason = `**${name}**, I'm not connected to any voice channel! User \`%play\` or \`%join\` to summon me.`;
  } else if (voice.callerChannelId !== voice.botChannelId && voice.botHasListeners) {
    reason = someoneElseListening(name, voice.botChannelId);
  }
  return reason;
}

/**
 * `%play`, `%loadqueue` and `%addqueue` bring the bot to the caller unless it is serving someone else
 */
export function planSummon(name: string, voice: CallerVoice): SummonPlan {
  if (voice.callerChannelId === null) {
    return { type: 'error', message: `**${name}**, connect to a voice channel first, or use \`%join <channel ID>\`.` };
  }
  if (voice.botChannelId === voice.callerChannelId) return { type: 'stay' };
  if (voice.botChannelId !== null && voice.botHasListeners) {
    return { type: 'error', message: someoneElseListening(name, voice.botChannelId) };
  }
  return { type: 'connect', channelId: voice.callerChannelId };
}

export function planJoin(name: string, voice: CallerVoice, requestedChannelId: string | null): SummonPlan {
  const channelId = requestedChannelId ?? voice.callerChannelId;
  if (channelId === null) {
    return { type: 'error', message: `**${name}**, connect to a voice channel or pass the channel ID.` };
  }
  if (voice.botChannelId !== null && voice.botHasListeners && voice.botChannelId !== channelId) {
    return { type: 'error', message: someoneElseListening(name, voice.botChannelId) };
  }
  return { type: 'connect', channelId };
}

/** 数字だけなら位置、それ以外はタイトル検索 */
export function parseTrackRequest(raw: string): TrackRequest {
  const trimmed = raw.trim();
  return /^-?\d+$/.test(trimmed) ? Number(trimmed) : trimmed;
}

export function downloadFailedMessage(name: string, query: string, devUserId: string | undefined): string {
  const contact = devUserId ? `<@${devUserId}>` : 'the bot owner';
  return [
    `⚠ **${name}**, I could not download the result of query: \`${query}\``,
    'This could be due to one or more of the following reasons:',
    '> **1)** The video is a playlist or livestream, which I do not yet support.',
    '> **2)** Your query pulled no results when searched in YouTube.',
    `> **3)** HTTP Error 429: YouTube banned my IP! Notify ${contact}.`,
  ].join('\n');
}

export function loopMessage(enabled: boolean): string {
  return enabled
    ? '🔂 Now looping the **current track**.\n\nTo disable, use: `%loop off`\nTo loop whole queue: `%loopqueue on`'
    : 'No longer looping the **current track**.';
}

export function loopQueueMessage(enabled: boolean): string {
  return enabled
    ? '🔁 Now looping the **queue**.\n\nTo disable, use: `%loopqueue off`\nTo loop one track: `%loop on`'
    : 'No longer looping the **queue**.';
}

export function shuffleLoopMessage(enabled: boolean): string {
  return enabled
    ? '🔁🔀 Player will **shuffle the queue** upon looping to the start.\n\n' +
        'To disable, use: `%shuffleloop off` or `%loopqueue off`\n' +
        'To shuffle remaining songs right away: `%shuffle`'
    : 'No longer **shuffling the queue** upon looping to the start.';
}

function requestErrorMessage(name: string, request: TrackRequest, reason: 'out-of-range' | 'not-found'): string {
  return reason === 'out-of-range'
    ? `**${name}**, track position \`${request}\` is out of range`
    : `**${name}**, could not find a track for "${request}"`;
}

function guildOf(message: Message): Guild {
  if (!message.guild) throw new Error('Music commands require a guild');
  return message.guild;
}

/**
 * 音楽コマンド
 */
export function musicCommands(services: CommandServices): CommandDefinition[] {
  const nameOf = (ctx: CommandContext): string => ctx.message.author.username;

  const send = (ctx: CommandContext, embed: EmbedSpec): Promise<Message> =>
    sendEmbed(sendableChannel(ctx.message), embed);

  const sendError = async (ctx: CommandContext, description: string): Promise<void> => {
    await send(ctx, makeEmbed(description, undefined, 'red'));
  };

  /** プレイヤーを取得し、通知先をこのチャンネルにする */
  const playerFor = (ctx: CommandContext): MusicPlayer => {
    const player = services.players.get(guildOf(ctx.message));
    player.bindChannel(playerChannel(sendableChannel(ctx.message)));
    return player;
  };

  const voiceOf = (ctx: CommandContext, player: MusicPlayer): CallerVoice => ({
    callerChannelId: ctx.message.member?.voice.channelId ?? null,
    botChannelId: player.connected ? player.voiceChannelId : null,
    botHasListeners: player.connected && player.hasListeners(),
  });

  /** 失敗時はメッセージを送って false */
  const checkCaller = async (ctx: CommandContext, player: MusicPlayer): Promise<boolean> => {
    const reason = callerCheckError(nameOf(ctx), voiceOf(ctx, player));
    if (reason === null) return true;
    await sendError(ctx, reason);
    return false;
  };

  /**
   * Returns whether the bot ended up in the caller's channel; the player does not start on its own
   */
  const summon = async (ctx: CommandContext, player: MusicPlayer): Promise<'ok' | 'connected' | 'refused'> => {
    const plan = planSummon(nameOf(ctx), voiceOf(ctx, player));
    if (plan.type === 'error') {
      await sendError(ctx, plan.message);
      return 'refused';
    }
    if (plan.type === 'connect') {
      await player.join(plan.channelId, false);
      return 'connected';
    }
    return 'ok';
  };

  const withPending = async <T>(set: Set<string>, userId: string, run: () => Promise<T>): Promise<T> => {
    set.add(userId);
    try {
      return await run();
    } finally {
      set.delete(userId);
    }
  };

  const previewLinks = (ids: string[]): Promise<Array<string | null>> =>
    Promise.all(ids.slice(0, PAGE_SIZE).map((id) => services.resolver.preview(id)));

  const sendPlaylistPreview = async (ctx: CommandContext, name: string, ids: string[]): Promise<void> => {
    await send(ctx, playlistPreview(ctx.message.author.id, name, ids, await previewLinks(ids)));
  };

  // BASIC COMMANDS

  const join: CommandDefinition = {
    name: 'join',
    aliases: ['connect'],
    description: 'Connects to your voice channel',
    usage: 'join [channel ID]',
    group: 'Music',
    guildOnly: true,
    async execute(ctx) {
      const player = playerFor(ctx);
      let requested: string | null = null;
      if (ctx.rawArgs) {
        const id = /^(?:<#)?(\d+)>?$/.exec(ctx.rawArgs)?.[1];
        const channel = id === undefined ? undefined : guildOf(ctx.message).channels.cache.get(id);
        if (!channel || !channel.isVoiceBased()) {
          await sendError(ctx, `**${nameOf(ctx)}**, I could not find a voice channel for \`${ctx.rawArgs}\``);
          return;
        }
        requested = channel.id;
      }
      const plan = planJoin(nameOf(ctx), voiceOf(ctx, player), requested);
      if (plan.type === 'error') {
        await sendError(ctx, plan.message);
        return;
      }
      if (plan.type === 'connect') {
        await player.join(plan.channelId);
      }
      await ctx.message.react('👌');
    },
  };

  const play: CommandDefinition = {
    name: 'play',
    aliases: ['p'],
    description: 'Plays a selected song from YouTube',
    usage: 'play <query or URL>',
    group: 'Music',
    guildOnly: true,
    async execute(ctx) {
      const player = playerFor(ctx);
      if ((await summon(ctx, player)) === 'refused') return;

      if (!ctx.rawArgs) {
        await sendError(ctx, `**${nameOf(ctx)}**, tell me what to search for! Example: \`%play see you again\``);
        player.startPlayback();
        return;
      }

      let result: Awaited<ReturnType<MusicPlayer['enqueue']>>;
      try {
        result = await player.enqueue(ctx.rawArgs, ctx.message.author.id);
      } catch (error) {
        if (!(error instanceof TrackResolveError)) throw error;
        log.warn(`Failed to download song from query: ${ctx.rawArgs}`, { error: error.message });
        await sendError(ctx, downloadFailedMessage(nameOf(ctx), ctx.rawArgs, services.config.devUserId));
        player.startPlayback();
        return;
      }

      if (result.queued) {
        await send(
          ctx,
          player.withFooter(
            makeEmbed(`Queued **(${result.pos})** ${trackLink(result.track)} [<@${result.track.requesterId}>]`),
          ),
        );
      }
    },
  };

  const pause: CommandDefinition = {
    name: 'pause',
    description: 'Pauses the player',
    group: 'Music',
    guildOnly: true,
    async execute(ctx) {
      const player = playerFor(ctx);
      if (!(await checkCaller(ctx, player))) return;
      player.pause();
      await ctx.message.react('⏸');
    },
  };

  const resume: CommandDefinition = {
    name: 'resume',
    aliases: ['unpause'],
    description: 'Resumes the player',
    group: 'Music',
    guildOnly: true,
    async execute(ctx) {
      const player = playerFor(ctx);
      if (!(await checkCaller(ctx, player))) return;
      player.resume();
      await ctx.message.react('▶');
    },
  };

  const leave: CommandDefinition = {
    name: 'leave',
    aliases: ['disconnect', 'dc'],
    description: 'Disconnects bot from the voice channel',
    group: 'Music',
    guildOnly: true,
    async execute(ctx) {
      const player = playerFor(ctx);
      if (!(await checkCaller(ctx, player))) return;
      await player.leave();
      await ctx.message.react('👋');
    },
  };

  // QUEUE TRAVERSAL

  const nowPlaying: CommandDefinition = {
    name: 'nowplaying',
    aliases: ['np', 'song'],
    description: 'Displays info about the current song',
    group: 'Music',
    guildOnly: true,
    async execute(ctx) {
      const player = playerFor(ctx);
      const current = player.nowPlaying;
      if (!current) {
        await sendError(ctx, `**${nameOf(ctx)}**, nothing is playing right now!`);
        return;
      }
      const { track, pos } = current;
      const description =
        `**(${pos})** ${trackLink(track)} | **?** / **${formatDuration(track.durationSeconds)}** | ` +
        `Requested by <@${track.requesterId}>`;
      await send(ctx, player.withFooter(makeEmbed(description, 'Current song')));
    },
  };

  const queue: CommandDefinition = {
    name: 'queue',
    aliases: ['q'],
    description: 'Displays the current songs in queue',
    group: 'Music',
    guildOnly: true,
    async execute(ctx) {
      const player = playerFor(ctx);
      await paginate(sendableChannel(ctx.message), {
        render: () => queuePages(player.queue, player.cursor.pos).map((page) => player.withFooter(page)),
        initialIndex: () => initialPageIndex(player.cursor.pos, player.queue.length),
        timeoutMs: services.pageTimeoutMs,
      });
    },
  };

  const skip: CommandDefinition = {
    name: 'skip',
    aliases: ['next'],
    description: 'Skips the current song being played',
    group: 'Music',
    guildOnly: true,
    async execute(ctx) {
      const player = playerFor(ctx);
      if (!(await checkCaller(ctx, player))) return;
      player.skip();
      await ctx.message.react('👌');
    },
  };

  const back: CommandDefinition = {
    name: 'back',
    aliases: ['previous', 'prev'],
    description: 'Returns to the previous song in queue',
    group: 'Music',
    guildOnly: true,
    async execute(ctx) {
      const player = playerFor(ctx);
      if (!(await checkCaller(ctx, player))) return;
      player.back();
      await ctx.message.react('👌');
    },
  };

  const jump: CommandDefinition = {
    name: 'jump',
    aliases: ['j'],
    description: 'Jumps to a song by track position or title',
    usage: 'jump <position or title>',
    group: 'Music',
    guildOnly: true,
    async execute(ctx) {
      const player = playerFor(ctx);
      if (!(await checkCaller(ctx, player))) return;
      if (!ctx.rawArgs) {
        await sendError(ctx, `**${nameOf(ctx)}**, tell me which track to jump to! Example: \`%jump 3\``);
        return;
      }
      const request = parseTrackRequest(ctx.rawArgs);
      const result = player.jump(request);
      if (!result.ok) {
        await sendError(ctx, requestErrorMessage(nameOf(ctx), request, result.reason));
        return;
      }
      await ctx.message.react('👌');
    },
  };

  // QUEUE MANAGEMENT

  const clear: CommandDefinition = {
    name: 'clear',
    description: 'Clears the current queue',
    group: 'Music',
    guildOnly: true,
    async execute(ctx) {
      const player = playerFor(ctx);
      if (player.connected && !(await checkCaller(ctx, player))) return;
      if (player.pendingConfirmations.clear) {
        await ctx.message.react('🚫');
        return;
      }
      if (player.queue.length === 0) {
        await ctx.message.react('👌');
        return;
      }

      player.pendingConfirmations.clear = true;
      let answer: boolean | null;
      try {
        answer = await askForConfirmation(ctx.message, {
          prompt:
            `⚠ **${nameOf(ctx)}**, the \`%queue\` currently has **${player.queue.length}** song(s).\n` +
            'Do you confirm? (y/n/yes/no)',
          timeoutMessage: "⌛ Time's up. Queue preserved.",
          declineMessage: '🖐 Gotcha. Queue preserved.',
        });
      } finally {
        player.pendingConfirmations.clear = false;
      }
      if (answer !== true) return;

      const count = await player.clear(ctx.message.author.id);
      await send(ctx, makeEmbed(`💥 Cleared **${count}** song(s) from queue [<@${ctx.message.author.id}>]`));
    },
  };

  const remove: CommandDefinition = {
    name: 'remove',
    aliases: ['r'],
    description: 'Removes a song by track position or title',
    usage: 'remove <position or title>',
    group: 'Music',
    guildOnly: true,
    async execute(ctx) {
      const player = playerFor(ctx);
      if (!(await checkCaller(ctx, player))) return;
      if (!ctx.rawArgs) {
        await sendError(ctx, `**${nameOf(ctx)}**, tell me which track to remove! Example: \`%remove 3\``);
        return;
      }
      const request = parseTrackRequest(ctx.rawArgs);
      const result = player.remove(request);
      if (!result.ok) {
        await sendError(ctx, requestErrorMessage(nameOf(ctx), request, result.reason));
        return;
      }
      await send(ctx, makeEmbed(`Removed **(${result.pos})** ${trackLink(result.track)} [<@${ctx.message.author.id}>]`));
    },
  };

  const removeRange: CommandDefinition = {
    name: 'removerange',
    aliases: ['rr'],
    description: 'Removes all songs between two positions, inclusive',
    usage: 'removerange <from> <to>',
    group: 'Music',
    guildOnly: true,
    async execute(ctx) {
      const player = playerFor(ctx);
      if (!(await checkCaller(ctx, player))) return;
      const [start, end] = ctx.args.map(Number);
      if (start === undefined || end === undefined || !Number.isInteger(start) || !Number.isInteger(end)) {
        await sendError(ctx, `**${nameOf(ctx)}**, give me two track positions! Example: \`%removerange 2 5\``);
        return;
      }
      const { first, count } = player.removeRange(start, end);
      if (count === 0) {
        await ctx.message.react('❓');
        return;
      }
      await send(
        ctx,
        makeEmbed(
          `🔪 Removed **${count}** song(s) (**${first}**~**${first + count - 1}**) from queue [<@${ctx.message.author.id}>]`,
        ),
      );
    },
  };

  const shuffle: CommandDefinition = {
    name: 'shuffle',
    description: 'Shuffles the remaining songs in the queue',
    group: 'Music',
    guildOnly: true,
    async execute(ctx) {
      const player = playerFor(ctx);
      if (!(await checkCaller(ctx, player))) return;
      const moved = player.shuffle();
      log.info(`Shuffled ${moved} tracks (after pos ${player.cursor.pos})`);
      await ctx.message.react('🔀');
    },
  };

  const toggleCommand = (
    definition: Omit<CommandDefinition, 'execute' | 'group'>,
    apply: (player: MusicPlayer, option: boolean | null) => boolean,
    message: (enabled: boolean) => string,
  ): CommandDefinition => ({
    ...definition,
    group: 'Music',
    guildOnly: true,
    async execute(ctx) {
      const player = playerFor(ctx);
      if (!(await checkCaller(ctx, player))) return;
      const enabled = apply(player, parseToggle(ctx.args[0]));
      await send(ctx, player.withFooter(makeEmbed(message(enabled))));
    },
  });

  const loop = toggleCommand(
    {
      name: 'loop',
      aliases: ['looptrack', 'loopt'],
      description: '"on" or "off", or toggles looping of the current track',
      usage: 'loop [on|off]',
    },
    (player, option) => player.setLoop(option),
    loopMessage,
  );

  const loopQueue = toggleCommand(
    {
      name: 'loopqueue',
      aliases: ['loopq'],
      description: '"on" or "off", or toggles looping of the current queue',
      usage: 'loopqueue [on|off]',
    },
    (player, option) => player.setLoopQueue(option),
    loopQueueMessage,
  );

  const shuffleLoop = toggleCommand(
    {
      name: 'shuffleloop',
      aliases: ['loopshuffle'],
      description: 'Shuffles the queue when the player loops back to the start',
      usage: 'shuffleloop [on|off]',
    },
    (player, option) => player.setShuffleLoop(option),
    shuffleLoopMessage,
  );

  const nameQueue: CommandDefinition = {
    name: 'namequeue',
    aliases: ['nameq'],
    description: 'Names the current queue; without a name, resets it',
    usage: 'namequeue [name]',
    group: 'Music',
    guildOnly: true,
    async execute(ctx) {
      const player = playerFor(ctx);
      if (player.connected && !(await checkCaller(ctx, player))) return;
      const name = player.rename(ctx.rawArgs || undefined);
      const verb = ctx.rawArgs ? '✏ Set' : '✏ Reset';
      await send(ctx, makeEmbed(`${verb} current queue name to **${name}** [<@${ctx.message.author.id}>]`));
    },
  };

  // PLAYLISTS

  const saveQueue: CommandDefinition = {
    name: 'savequeue',
    aliases: ['saveq'],
    description: 'Saves the current queue to your personal list',
    usage: 'savequeue [name]',
    group: 'Music',
    guildOnly: true,
    async execute(ctx) {
      const player = playerFor(ctx);
      const userId = ctx.message.author.id;
      if (player.pendingConfirmations.save.has(userId)) {
        await ctx.message.react('🚫');
        return;
      }

      const queueName = ctx.rawArgs || player.queue.name;
      const existing = await services.playlists.find(userId, queueName);
      if (existing) {
        await sendPlaylistPreview(ctx, existing.name, existing.ids);
        const answer = await withPending(player.pendingConfirmations.save, userId, () =>
          askForConfirmation(ctx.message, {
            prompt:
              `⚠ **${nameOf(ctx)}**, you already saved a queue with name \`${existing.name}\`\n` +
              'Sent queue preview above. **Replace it?** (y/n/yes/no)',
            timeoutMessage: "⌛ Time's up. Keeping old playlist.",
            declineMessage: '🖐 Gotcha. Keeping old playlist.',
            timeoutMs: PLAYLIST_CONFIRM_TIMEOUT_MS,
          }),
        );
        if (answer !== true) return;
      }

      await services.playlists.save(userId, { name: queueName, ids: player.queue.ids() });
      log.info(`${ctx.message.author.username} saved current queue as ${queueName}`);
      await send(ctx, makeEmbed(`📝 Saved current queue as \`${queueName}\` to personal list [<@${userId}>]`));
    },
  };

  /**
   * Shared by %loadqueue and %addqueue
   */
  const loadPlaylist = async (ctx: CommandContext, player: MusicPlayer, append: boolean): Promise<void> => {
    const userId = ctx.message.author.id;
    if (!ctx.rawArgs) {
      await sendError(ctx, `**${nameOf(ctx)}**, tell me which playlist to load! See \`%showqueues\``);
      return;
    }
    if (!(await services.playlists.hasAny(userId))) {
      await sendError(ctx, `**${nameOf(ctx)}**, you don't have any saved playlists!`);
      return;
    }
    const playlist = await services.playlists.find(userId, ctx.rawArgs);
    if (!playlist) {
      await sendError(ctx, `**${nameOf(ctx)}**, you don't have a playlist named \`${ctx.rawArgs}\``);
      return;
    }
    await sendPlaylistPreview(ctx, playlist.name, playlist.ids);

    if (!append && player.queue.length > 0) {
      const answer = await withPending(player.pendingConfirmations.load, userId, () =>
        askForConfirmation(ctx.message, {
          prompt:
            `⚠ **${nameOf(ctx)}**, the \`%queue\` currently has **${player.queue.length}** song(s).\n` +
            '💥 Do you want to **replace** the current queue? (y/n/yes/no)',
          timeoutMessage: "⌛ Time's up. Queue preserved.",
          declineMessage: '🖐 Gotcha. Queue preserved.',
          timeoutMs: PLAYLIST_CONFIRM_TIMEOUT_MS,
        }),
      );
      if (answer !== true) return;
    }

    const header = append
      ? `✳ **Appending playlist:** \`${playlist.name}\` [<@${userId}>]\n\n`
      : `🔄 **Loading playlist:** \`${playlist.name}\` [<@${userId}>]\n\n`;
    let description = header + progressMessage(0, playlist.ids.length);
    const loadingMessage = await send(ctx, player.withFooter(makeEmbed(description)));

    const edit = async (embed: EmbedSpec): Promise<void> => {
      try {
        await loadingMessage.edit({ embeds: [toEmbed(embed)] });
      } catch (error) {
        if (!isUnknownMessage(error)) throw error;
      }
    };

    const stopWatching = await watchCancel(loadingMessage, async (cancelerId) => {
      await player.cancelLoading(cancelerId);
    });

    try {
      await player.loadTracks(playlist.ids, {
        requesterId: userId,
        append,
        name: playlist.name,
        onProgress: async (current, total) => {
          description = header + progressMessage(current, total);
          await edit(player.withFooter(makeEmbed(description)));
        },
        onCancel: async (cancelerId) => {
          await edit(player.withFooter(makeEmbed(canceledProgress(description, cancelerId), undefined, 'red')));
        },
      });
    } finally {
      stopWatching();
      await loadingMessage.reactions.cache
        .get('❌')
        ?.remove()
        .catch((error: unknown) => {
          log.debug('Could not clear cancel reaction', { error: error instanceof Error ? error.message : String(error) });
        });
    }
    player.startPlayback();
  };

  const loadQueue: CommandDefinition = {
    name: 'loadqueue',
    aliases: ['loadq'],
    description: 'Loads and starts a queue from your personal list',
    usage: 'loadqueue <name>',
    group: 'Music',
    guildOnly: true,
    async execute(ctx) {
      const player = playerFor(ctx);
      if (player.pendingConfirmations.load.has(ctx.message.author.id)) {
        await ctx.message.react('🚫');
        return;
      }
      if ((await summon(ctx, player)) === 'refused') return;
      await loadPlaylist(ctx, player, false);
    },
  };

  const showQueues: CommandDefinition = {
    name: 'showqueues',
    aliases: ['showqueue', 'showq', 'showqs'],
    description: 'Previews your list of saved queues',
    group: 'Music',
    async execute(ctx) {
      const userId = ctx.message.author.id;
      if (!(await services.playlists.hasAny(userId))) {
        await sendError(ctx, `**${nameOf(ctx)}**, you don't have any saved playlists!`);
        return;
      }
      await send(ctx, savedPlaylistsSummary(userId, await services.playlists.list(userId)));
    },
  };

  const addQueue: CommandDefinition = {
    name: 'addqueue',
    aliases: ['addq', 'appendqueue', 'appendq'],
    description: 'Appends a queue from your list to the current queue',
    usage: 'addqueue <name>',
    group: 'Music',
    guildOnly: true,
    async execute(ctx) {
      const player = playerFor(ctx);
      const userId = ctx.message.author.id;
      if (player.pendingConfirmations.add.has(userId)) {
        await ctx.message.react('🚫');
        return;
      }
      if ((await summon(ctx, player)) === 'refused') return;

      if (player.loading) {
        const by = player.loadingBy;
        const answer = await withPending(player.pendingConfirmations.add, userId, () =>
          askForConfirmation(ctx.message, {
            prompt:
              `⚠ **${nameOf(ctx)}**, I'm already loading another queue${by === null ? '!' : ` from <@${by}>`}\n` +
              '🛑 Do you want to **cancel** the current process? (y/n/yes/no)',
            timeoutMessage: "⌛ Time's up. Queuing preserved.",
            declineMessage: '🖐 Gotcha. Queuing preserved.',
          }),
        );
        if (answer !== true) return;
      }
      await loadPlaylist(ctx, player, true);
    },
  };

  return [
    join,
    play,
    pause,
    resume,
    leave,
    nowPlaying,
    queue,
    skip,
    back,
    jump,
    clear,
    remove,
    removeRange,
    shuffle,
    loop,
    loopQueue,
    shuffleLoop,
    nameQueue,
    saveQueue,
    loadQueue,
    showQueues,
    addQueue,
  ];
}
