import type { EmbedSpec } from '../discord/types.js';
import type { SongQueue } from './song-queue.js';
import { formatDuration, truncatedLink } from './track.js';

export const PAGE_SIZE = 10;
const TITLE_MAX_CHARS = 50;
const PROGRESS_BAR_WIDTH = 30;

export const PageEmoji = {
  refresh: '🔄',
  first: '⏫',
  previous: '⬆',
  next: '⬇',
  last: '⏬',
} as const;

export const CANCEL_EMOJI = '❌';

/**
 * フッターに出す再生状態
 */
export interface PlayerStatus {
  disconnected: boolean;
  muted: boolean;
  paused: boolean;
  looped: boolean;
  queueLooped: boolean;
  shuffleOnLoop: boolean;
}

export type PageAction = { type: 'refresh' } | { type: 'goto'; index: number };

export function pageCount(length: number): number {
  return Math.max(1, Math.ceil(length / PAGE_SIZE));
}

/**
 * One page of the queue starting at track position `start`
 */
export function formatQueuePage(queue: SongQueue, start: number, currentPos: number): string {
  let out = queue.loadedBy === null ? '**Default Guild Queue**\n\n' : `**Loaded by** <@${queue.loadedBy}>\n\n`;

  queue.segment(start, start + PAGE_SIZE - 1).forEach((track, offset) => {
    const pos = start + offset;
    let line = `${pos}) ${truncatedLink(track, TITLE_MAX_CHARS)} | ${formatDuration(track.durationSeconds)}`;
    if (pos === currentPos) {
      line = `**${line}** 👈`;
    }
    out += `${line}\n`;
  });

  const page = Math.floor((start - 1) / PAGE_SIZE) + 1;
  const pages = pageCount(queue.length);
  out += page === pages ? '\nThis is the end of the queue!' : '\nThe queue continues!';
  out += ` (**${page}** / **${pages}**)`;
  return out;
}

export function queuePages(queue: SongQueue, currentPos: number): EmbedSpec[] {
  const title = `📜 ${queue.name}`;
  if (queue.length === 0) {
    return [{ title, description: 'The queue is empty! 🤔', color: 'gold' }];
  }
  const pages: EmbedSpec[] = [];
  for (let start = 1; start <= queue.length; start += PAGE_SIZE) {
    pages.push({ title, description: formatQueuePage(queue, start, currentPos), color: 'gold' });
  }
  return pages;
}

/**
 * Page holding the current track; outside the queue this is the last page
 */
export function initialPageIndex(pos: number, length: number): number {
  const pages = pageCount(length);
  const index = Math.floor((Math.min(pos, length) - 1) / PAGE_SIZE);
  if (index < 0) return pages - 1;
  return Math.min(index, pages - 1);
}

export function pageReactions(pages: number): string[] {
  const emojis: string[] = [PageEmoji.refresh];
  if (pages > 2) emojis.push(PageEmoji.first);
  if (pages > 1) emojis.push(PageEmoji.previous, PageEmoji.next);
  if (pages > 2) emojis.push(PageEmoji.last);
  return emojis;
}

export function pageAction(emoji: string | null, index: number, pages: number): PageAction | null {
  switch (emoji) {
    case PageEmoji.refresh:
      return { type: 'refresh' };
    case PageEmoji.first:
      return { type: 'goto', index: 0 };
    case PageEmoji.previous:
      return { type: 'goto', index: Math.max(0, index - 1) };
    case PageEmoji.next:
      return { type: 'goto', index: Math.min(pages - 1, index + 1) };
    case PageEmoji.last:
      return { type: 'goto', index: pages - 1 };
    default:
      return null;
  }
}

export interface PageState {
  index: number;
  pages: number;
}

/**
 * Page shown after a reaction is added or removed. 🔄 re-renders and returns to the page holding the current track.
 */
export function nextPageState(emoji: string | null, state: PageState, rerender: () => PageState): PageState | null {
  const action = pageAction(emoji, state.index, state.pages);
  if (!action) return null;
  if (action.type === 'goto') return { index: action.index, pages: state.pages };
  const fresh = rerender();
  return { index: Math.min(Math.max(0, fresh.index), fresh.pages - 1), pages: fresh.pages };
}

/**
 * Arrow reactions to add once the page count changes.
 * The full set is re-added (after clearing) when the jump arrows are missing.
 */
export function arrowUpdate(present: readonly string[], pages: number): { clear: boolean; add: string[] } {
  if (pages > 2) {
    if (present.includes(PageEmoji.first) && present.includes(PageEmoji.last)) return { clear: false, add: [] };
    return { clear: true, add: pageReactions(pages) };
  }
  if (pages > 1) {
    return { clear: false, add: [PageEmoji.previous, PageEmoji.next].filter((emoji) => !present.includes(emoji)) };
  }
  return { clear: false, add: [] };
}

export function statusFooter(status: PlayerStatus): string | null {
  const states: Array<[string, string]> = [];
  if (status.disconnected) states.push(['disconnected', '👋']);
  if (status.muted) states.push(['muted', '🔇']);
  if (status.paused) states.push(['paused', '⏸']);
  if (status.looped) states.push(['looping track', '🔂']);
  if (status.queueLooped) {
    states.push(status.shuffleOnLoop ? ['shuffle-looping queue', '🔁🔀'] : ['looping queue', '🔁']);
  }
  if (states.length === 0) return null;
  return `${states.map(([, emoji]) => emoji).join('')} Player is ${states.map(([text]) => text).join(', ')}`;
}

export function progressMessage(current: number, total: number): string {
  const done = current >= total;
  const filled = total === 0 ? PROGRESS_BAR_WIDTH : Math.round((current / total) * PROGRESS_BAR_WIDTH);
  const bar = `\`${'█'.repeat(filled)}${' '.repeat(PROGRESS_BAR_WIDTH - filled)}\``;
  const head = `${done ? '✅' : '⌛'} Queuing: **${current}** / **${total}**\n`;
  return head + bar + (done ? '' : '\nCancel loading by reacting to the X');
}

/**
 * Marks a loading message as canceled by the given user
 */
export function canceledProgress(description: string, userId: string): string {
  const lines = description.split('\n');
  const statusIndex = lines.findIndex((line) => line.startsWith('⌛') || line.startsWith('✅'));
  if (statusIndex !== -1) {
    const line = lines[statusIndex] ?? '';
    lines[statusIndex] = `${CANCEL_EMOJI}${Array.from(line).slice(1).join('')}`;
  }
  lines[lines.length - 1] = `(Canceled by <@${userId}>)`;
  return lines.join('\n');
}

/**
 * Preview of a saved playlist; `previews[i]` is the link for `ids[i]` or null when it could not be fetched
 */
export function playlistPreview(ownerId: string, name: string, ids: string[], previews: Array<string | null>): EmbedSpec {
  let description = `**Playlist PREVIEW** [<@${ownerId}>]\n\n`;
  ids.slice(0, PAGE_SIZE).forEach((id, i) => {
    description += `${i + 1}) ${previews[i] ?? `(Failed to load preview for id: ${id})`}\n`;
  });
  if (ids.length === 0) {
    description += '(The queue is empty)';
  } else if (ids.length <= PAGE_SIZE) {
    description += '\n(This is the end of the queue)';
  } else {
    const more = pageCount(ids.length) - 1;
    description += `\n(The queue continues for **${more}** more page(s): **${ids.length}** total songs)`;
  }
  return { title: `❗ ${name}`, description, color: 'orange' };
}

export function savedPlaylistsSummary(ownerId: string, playlists: Array<{ name: string; ids: string[] }>): EmbedSpec {
  const body = playlists.map((p) => `**${p.name}**: ${p.ids.length} songs`).join('\n');
  return {
    title: '💾 Saved Queues',
    description: `**Playlists PREVIEW** [<@${ownerId}>]\n\n${body || 'Your list is empty!'}`,
    color: 'gold',
  };
}
