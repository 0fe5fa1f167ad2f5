import { getYear, isValid, setYear } from 'date-fns';
import { JsonDocument, StorageKeys, type BlobStore } from '../storage/blob-store.js';
import { isFiniteNumber, isRecord } from '../utils/guards.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('mudae');

export const DEFAULT_MUDAE_BOT_ID = '432610292342587392';

/**
 * 解放したキー数による倍率
 */
export function keyMultiplier(keys: number): number {
  if (keys < 1) return 1;
  if (keys < 3) return 1 + 0.1 * (keys - 1);
  if (keys < 6) return 1.1 + 0.1 * (keys - 3);
  if (keys < 10) return 1.3 + 0.1 * (keys - 6);
  return 1.6 + 0.05 * (keys - 10);
}

export function baseKakeraValue(claimRank: number, likeRank: number, claimed: number): number {
  const averageRank = (claimRank + likeRank) / 2;
  return Math.trunc((25000 * (averageRank + 70) ** -0.75 + 20) * (1 + claimed / 5500) + 0.5);
}

export function kakeraValue(claimRank: number, likeRank: number, claimed: number, keys: number): number {
  return Math.trunc(baseKakeraValue(claimRank, likeRank, claimed) * keyMultiplier(keys) + 0.5);
}

export interface KakeraInput {
  claimRank: number;
  likeRank: number;
  claimed: number;
  keys: number;
}

export function formatKakera(input: KakeraInput): string {
  const value = kakeraValue(input.claimRank, input.likeRank, input.claimed, input.keys);
  return [
    `The kakera value of this character would be: **${value}** ka`,
    `> Claim rank: **#${input.claimRank}**`,
    `> Like rank: **#${input.likeRank}**`,
    `> Total characters claimed: **${input.claimed}**`,
    `> Keys unlocked: **${input.keys}**`,
  ].join('\n');
}

const CLAIMED_PATTERN = /claimed:\*\* (\d+)\//;

/**
 * Claimed character count from a `$left` response, or null for any other message
 */
export function parseClaimedCount(content: string): number | null {
  const match = CLAIMED_PATTERN.exec(content);
  return match?.[1] === undefined ? null : Number(match[1]);
}

interface MudaeFile {
  CHARS_CLAIMED: Record<string, number>;
}

function parseMudaeFile(value: unknown): MudaeFile | null {
  if (!isRecord(value)) return null;
  const claimed = value['CHARS_CLAIMED'];
  if (!isRecord(claimed)) return null;
  const counts: Record<string, number> = {};
  for (const [guildId, count] of Object.entries(claimed)) {
    if (isFiniteNumber(count)) counts[guildId] = count;
  }
  return { CHARS_CLAIMED: counts };
}

/**
 * サーバーごとの取得済みキャラクター数（mudae_data.json）
 */
export class MudaeTracker {
  private document: JsonDocument<MudaeFile>;

  constructor(store: BlobStore) {
    this.document = new JsonDocument(store, StorageKeys.mudae, parseMudaeFile, () => ({ CHARS_CLAIMED: {} }));
  }

  async claimed(guildId: string): Promise<number> {
    const file = await this.document.load();
    return file.CHARS_CLAIMED[guildId] ?? 0;
  }

  async record(guildId: string, count: number): Promise<void> {
    await this.document.update((file) => ({ CHARS_CLAIMED: { ...file.CHARS_CLAIMED, [guildId]: count } }));
    log.info(`Recorded ${count} claimed characters for guild ${guildId}`);
  }
}

// $marryexchange の流れ
const EXCHANGE_RESPONSE = /^<@!?(\d+)>, type the name\(s\) of the character\(s\) you want to trade against .+$/s;
const EXCHANGE_CONFIRM = /^<@!?(\d+)>, (.+) vs (.+)\. Do you confirm the exchange\? \(y\/n\/yes\/no\)$/s;
export const EXCHANGE_DONE_TEXT = 'The exchange is over';

export interface MudaeMessage {
  authorId: string;
  content: string;
  hasEmbeds: boolean;
}

export interface Exchange {
  initiatorId: string;
  initiatorChars: string;
  otherId: string;
  otherChars: string;
}

/**
 * Finds the participants of a completed exchange in the Mudae messages before it (newest first)
 */
export function parseExchange(history: MudaeMessage[], mudaeId: string): Exchange | null {
  let confirm: RegExpExecArray | null = null;
  for (const message of history) {
    if (message.authorId !== mudaeId) continue;
    if (!confirm) {
      confirm = EXCHANGE_CONFIRM.exec(message.content);
      continue;
    }
    const response = EXCHANGE_RESPONSE.exec(message.content);
    const [, initiatorId, initiatorChars, otherChars] = confirm;
    const otherId = response?.[1];
    if (otherId === undefined) continue;
    if (initiatorId === undefined || initiatorChars === undefined || otherChars === undefined) return null;
    return { initiatorId, initiatorChars: initiatorChars.trim(), otherId, otherChars: otherChars.trim() };
  }
  return null;
}

/**
 * Accepts anything Date understands. Dates before 2015 (a missing year) move to the current year.
 */
export function parseBefore(raw: string, now: Date = new Date()): Date | null {
  const parsed = new Date(raw.trim());
  if (!isValid(parsed)) return null;
  return getYear(parsed) < 2015 ? setYear(parsed, getYear(now)) : parsed;
}
