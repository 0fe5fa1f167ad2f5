import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { createLogger } from '../utils/logger.js';

const log = createLogger('anagrams');

// src/features と dist/src/features のどちらからでも見つかるように
const WORD_LIST_CANDIDATES = ['../../data/words.txt', '../../../data/words.txt'];

export function defaultWordListPath(): string {
  for (const candidate of WORD_LIST_CANDIDATES) {
    const path = fileURLToPath(new URL(candidate, import.meta.url));
    if (existsSync(path)) return path;
  }
  return fileURLToPath(new URL(WORD_LIST_CANDIDATES[0] ?? '', import.meta.url));
}

function letterCounts(text: string): Map<string, number> {
  const counts = new Map<string, number>();
  for (const char of text.toLowerCase()) {
    counts.set(char, (counts.get(char) ?? 0) + 1);
  }
  return counts;
}

/** word の各文字が letters に同じ回数以上含まれる */
function fitsWithin(word: Map<string, number>, letters: Map<string, number>): boolean {
  for (const [char, count] of word) {
    if ((letters.get(char) ?? 0) < count) return false;
  }
  return true;
}

export class AnagramFinder {
  private words: string[];

  constructor(words: string[]) {
    this.words = words.map((w) => w.trim()).filter((w) => w.length > 0);
  }

  static async fromFile(path: string = defaultWordListPath()): Promise<AnagramFinder> {
    const content = await readFile(path, 'utf-8');
    const finder = new AnagramFinder(content.split(/\r?\n/));
    log.info(`Loaded ${finder.size} words from ${path}`);
    return finder;
  }

  get size(): number {
    return this.words.length;
  }

  /**
   * Words spellable from `letters`, grouped by length (ascending) and sorted alphabetically
   */
  find(letters: string): Map<number, string[]> {
    const available = letterCounts(letters);
    const found = new Set<string>();
    for (const word of this.words) {
      if (fitsWithin(letterCounts(word), available)) found.add(word);
    }

    const byLength = new Map<number, string[]>();
    for (const word of [...found].sort()) {
      const length = Array.from(word).length;
      byLength.set(length, [...(byLength.get(length) ?? []), word]);
    }
    return new Map([...byLength.entries()].sort(([a], [b]) => a - b));
  }
}

export function formatAnagrams(userName: string, letters: string, groups: Map<number, string[]>): string {
  let out = `**${userName}**, here are the anagrams I found for "**${letters}**":\n\n`;
  for (const [length, words] of groups) {
    out += `**${length} LETTER${length === 1 ? '' : 'S'}:**\`\`\`${words.join(', ')}\`\`\``;
  }
  return out;
}
