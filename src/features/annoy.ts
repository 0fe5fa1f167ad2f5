const ANNOY_LINES = [
  'Hey {name}, did you remember to drink water today?',
  '{name}, I read that. Every word of it.',
  'Bold words, {name}. Bold words.',
  'Fascinating. Tell me more, {name}.',
  '{name}, have you considered not?',
  'Noted, {name}. Filed under "questionable".',
  'Sure thing, {name}. Whatever you say.',
  '{name}!! Hi!! Just checking in again!!',
];

/** 誰も呼び出していない時の名前 */
export const FALLBACK_NAME = 'Bro';

export function annoyLine(name: string, random: () => number = Math.random): string {
  const line = ANNOY_LINES[Math.floor(random() * ANNOY_LINES.length)] ?? ANNOY_LINES[0] ?? '{name}';
  return line.replaceAll('{name}', name || FALLBACK_NAME);
}

export const TRAGEDY_TEXT = [
  'Did you ever hear the tragedy of the Great Queue Collapse? I thought not.',
  'It is not a story the moderators would tell you.',
  'There once was a bot so powerful it could shuffle a thousand songs in the blink of an eye.',
  'It had such a knowledge of playlists that it could even keep the ones its users forgot about.',
  'But one day someone typed `%clear` and answered "yes" without reading.',
  'The queue was lost. Ironic. It could save others, but not itself.',
].join(' ');

export type AnnoyChange =
  | { type: 'stopped' }
  | { type: 'self' }
  | { type: 'started'; name: string }
  | { type: 'switched'; previous: string; name: string }
  | { type: 'released'; previous: string };

export interface AnnoyTarget {
  id: string;
  name: string;
}

/**
 * サーバーごとに 1 人だけ
 */
export class AnnoyTargets {
  private targets = new Map<string, AnnoyTarget>();

  get(guildId: string): AnnoyTarget | null {
    return this.targets.get(guildId) ?? null;
  }

  /**
   * Naming the current target again releases them
   */
  set(guildId: string, member: AnnoyTarget | null, botId: string): AnnoyChange {
    const current = this.targets.get(guildId);
    if (member === null) {
      this.targets.delete(guildId);
      return { type: 'stopped' };
    }
    if (member.id === botId) return { type: 'self' };
    if (!current) {
      this.targets.set(guildId, member);
      return { type: 'started', name: member.name };
    }
    if (current.id === member.id) {
      this.targets.delete(guildId);
      return { type: 'released', previous: current.name };
    }
    this.targets.set(guildId, member);
    return { type: 'switched', previous: current.name, name: member.name };
  }
}

export function annoyReplies(change: AnnoyChange): string[] {
  switch (change.type) {
    case 'stopped':
      return ["Fine, I'll stop."];
    case 'self':
      return ['Nice try! Nothing happened!'];
    case 'started':
      return [`Now annoying **${change.name}**!`];
    case 'switched':
      return [`No longer annoying **${change.previous}**.`, `Now annoying **${change.name}**!`];
    case 'released':
      return [`No longer annoying **${change.previous}**.`];
  }
}
