import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import {
  MudaeTracker,
  formatKakera,
  kakeraValue,
  keyMultiplier,
  parseBefore,
  parseClaimedCount,
  parseExchange,
  type MudaeMessage,
} from '../src/features/mudae.js';
import { MemoryBlobStore } from './helpers/fakes.js';

const MUDAE = '900';

describe('kakera value', () => {
  it('scales with keys', () => {
    assert.equal(keyMultiplier(0), 1);
    assert.equal(keyMultiplier(1), 1);
    assert.equal(keyMultiplier(10), 1.6);
  });

  it('computes the value from ranks, claims and keys', () => {
    assert.equal(kakeraValue(11, 11, 0, 0), 946);
    assert.equal(kakeraValue(11, 11, 5500, 0), 1892);
    assert.equal(kakeraValue(11, 11, 0, 2), 1041);
    assert.equal(kakeraValue(11, 11, 0, 10), 1514);
  });

  it('formats the summary', () => {
    assert.equal(
      formatKakera({ claimRank: 11, likeRank: 11, claimed: 5500, keys: 10 }),
      [
        'The kakera value of this character would be: **3027** ka',
        '> Claim rank: **#11**',
        '> Like rank: **#11**',
        '> Total characters claimed: **5500**',
        '> Keys unlocked: **10**',
      ].join('\n'),
    );
  });
});

describe('claimed count tracking', () => {
  it('reads the claimed count from a $left reply', () => {
    assert.equal(parseClaimedCount('**Characters claimed:** 1234/5000 (24.68%)'), 1234);
    assert.equal(parseClaimedCount('Nothing to see here'), null);
  });

  it('stores one count per guild', async () => {
    const store = new MemoryBlobStore();
    const tracker = new MudaeTracker(store);
    assert.equal(await tracker.claimed('g1'), 0);
    await tracker.record('g1', 42);
    assert.equal(await tracker.claimed('g1'), 42);
    assert.equal(store.files.get('mudae_data.json'), '{\n  "CHARS_CLAIMED": {\n    "g1": 42\n  }\n}\n');
  });
});

describe('parseExchange', () => {
  const confirm: MudaeMessage = {
    authorId: MUDAE,
    content: '<@!111>, Aster vs Bramble. Do you confirm the exchange? (y/n/yes/no)',
    hasEmbeds: false,
  };
  const response: MudaeMessage = {
    authorId: MUDAE,
    content: '<@222>, type the name(s) of the character(s) you want to trade against Aster',
    hasEmbeds: false,
  };
  const chatter = (content: string): MudaeMessage => ({ authorId: '333', content, hasEmbeds: false });

  it('finds both participants', () => {
    assert.deepEqual(parseExchange([chatter('y'), confirm, chatter('Bramble'), response], MUDAE), {
      initiatorId: '111',
      initiatorChars: 'Aster',
      otherId: '222',
      otherChars: 'Bramble',
    });
  });

  it('returns null without the trade prompt', () => {
    assert.equal(parseExchange([confirm, chatter('hi')], MUDAE), null);
    assert.equal(parseExchange([response], MUDAE), null);
  });
});

describe('parseBefore', () => {
  const now = new Date(2026, 5, 1);

  it('keeps a full date', () => {
    assert.equal(parseBefore('2024-01-02', now)?.toISOString(), '2024-01-02T00:00:00.000Z');
  });

  it('moves a date without a year into the current year', () => {
    const parsed = parseBefore('Mar 5', now);
    assert.equal(parsed?.getFullYear(), 2026);
    assert.equal(parsed?.getMonth(), 2);
    assert.equal(parsed?.getDate(), 5);
  });

  it('rejects text that is not a date', () => {
    assert.equal(parseBefore('whenever', now), null);
  });
});
