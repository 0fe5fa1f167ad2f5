import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import {
  arrowUpdate,
  canceledProgress,
  formatQueuePage,
  initialPageIndex,
  nextPageState,
  pageAction,
  pageReactions,
  playlistPreview,
  progressMessage,
  queuePages,
  savedPlaylistsSummary,
  statusFooter,
} from '../src/music/queue-view.js';
import { SongQueue } from '../src/music/song-queue.js';
import { makeTrack } from './helpers/fakes.js';

function queueOf(count: number): SongQueue {
  const queue = new SongQueue('Evening');
  for (let i = 1; i <= count; i++) queue.add({ ...makeTrack(`t${i}`), requesterId: 'u1' });
  return queue;
}

const noStatus = {
  disconnected: false,
  muted: false,
  paused: false,
  looped: false,
  queueLooped: false,
  shuffleOnLoop: false,
};

describe('queue pages', () => {
  it('formats the last page and marks the current track', () => {
    const queue = queueOf(12);
    assert.equal(
      formatQueuePage(queue, 11, 12),
      '**Default Guild Queue**\n\n' +
        '11) [Song t11](https://www.youtube.com/watch?v=t11) | 03:20\n' +
        '**12) [Song t12](https://www.youtube.com/watch?v=t12) | 03:20** 👈\n' +
        '\nThis is the end of the queue! (**2** / **2**)',
    );
  });

  it('names who loaded the queue and says when it continues', () => {
    const queue = queueOf(12);
    queue.loadedBy = 'u7';
    const page = formatQueuePage(queue, 1, 0);
    assert.ok(page.startsWith('**Loaded by** <@u7>\n\n1) '));
    assert.ok(page.endsWith('\nThe queue continues! (**1** / **2**)'));
  });

  it('builds one embed per page', () => {
    const pages = queuePages(queueOf(21), 1);
    assert.equal(pages.length, 3);
    assert.equal(pages[0]?.title, '📜 Evening');
  });

  it('shows an empty queue', () => {
    assert.deepEqual(queuePages(new SongQueue('Empty'), 1), [
      { title: '📜 Empty', description: 'The queue is empty! 🤔', color: 'gold' },
    ]);
  });

  it('opens on the page holding the current track', () => {
    assert.equal(initialPageIndex(12, 25), 1);
    assert.equal(initialPageIndex(0, 25), 2);
    assert.equal(initialPageIndex(30, 25), 2);
    assert.equal(initialPageIndex(1, 0), 0);
  });

  it('offers reactions by page count', () => {
    assert.deepEqual(pageReactions(1), ['🔄']);
    assert.deepEqual(pageReactions(2), ['🔄', '⬆', '⬇']);
    assert.deepEqual(pageReactions(3), ['🔄', '⏫', '⬆', '⬇', '⏬']);
  });

  it('maps reactions to page moves', () => {
    assert.deepEqual(pageAction('⬆', 0, 3), { type: 'goto', index: 0 });
    assert.deepEqual(pageAction('⬇', 2, 3), { type: 'goto', index: 2 });
    assert.deepEqual(pageAction('⏬', 0, 3), { type: 'goto', index: 2 });
    assert.deepEqual(pageAction('🔄', 1, 3), { type: 'refresh' });
    assert.equal(pageAction('👍', 1, 3), null);
  });

  it('turns pages without re-rendering', () => {
    let renders = 0;
    const rerender = () => {
      renders++;
      return { index: 0, pages: 1 };
    };
    assert.deepEqual(nextPageState('⬇', { index: 1, pages: 3 }, rerender), { index: 2, pages: 3 });
    assert.deepEqual(nextPageState('⏫', { index: 2, pages: 3 }, rerender), { index: 0, pages: 3 });
    assert.equal(nextPageState('👍', { index: 2, pages: 3 }, rerender), null);
    assert.equal(renders, 0);
  });

  it('returns to the current track page on refresh', () => {
    const shrunk = nextPageState('🔄', { index: 2, pages: 3 }, () => ({ index: initialPageIndex(3, 12), pages: 2 }));
    assert.deepEqual(shrunk, { index: 0, pages: 2 });
  });

  it('clamps the refreshed index to the new page count', () => {
    assert.deepEqual(nextPageState('🔄', { index: 0, pages: 1 }, () => ({ index: 4, pages: 2 })), { index: 1, pages: 2 });
    assert.deepEqual(nextPageState('🔄', { index: 1, pages: 2 }, () => ({ index: -1, pages: 1 })), { index: 0, pages: 1 });
  });

  it('adds the arrows a grown queue needs', () => {
    assert.deepEqual(arrowUpdate(['🔄'], 2), { clear: false, add: ['⬆', '⬇'] });
    assert.deepEqual(arrowUpdate(['🔄', '⬆', '⬇'], 2), { clear: false, add: [] });
    assert.deepEqual(arrowUpdate(['🔄', '⬆', '⬇'], 3), { clear: true, add: ['🔄', '⏫', '⬆', '⬇', '⏬'] });
    assert.deepEqual(arrowUpdate(['🔄', '⏫', '⬆', '⬇', '⏬'], 4), { clear: false, add: [] });
    assert.deepEqual(arrowUpdate(['🔄', '⏫', '⬆', '⬇', '⏬'], 1), { clear: false, add: [] });
  });
});

describe('statusFooter', () => {
  it('is null with nothing to report', () => {
    assert.equal(statusFooter(noStatus), null);
  });

  it('lists states in order', () => {
    assert.equal(statusFooter({ ...noStatus, paused: true, looped: true }), '⏸🔂 Player is paused, looping track');
    assert.equal(
      statusFooter({ ...noStatus, queueLooped: true, shuffleOnLoop: true }),
      '🔁🔀 Player is shuffle-looping queue',
    );
  });
});

describe('loading progress', () => {
  it('draws a partial bar with a cancel hint', () => {
    assert.equal(
      progressMessage(3, 10),
      `⌛ Queuing: **3** / **10**\n\`${'█'.repeat(9)}${' '.repeat(21)}\`\nCancel loading by reacting to the X`,
    );
  });

  it('drops the hint when done', () => {
    assert.equal(progressMessage(2, 2), `✅ Queuing: **2** / **2**\n\`${'█'.repeat(30)}\``);
  });

  it('marks a canceled load', () => {
    assert.equal(
      canceledProgress(progressMessage(3, 10), 'u9'),
      `❌ Queuing: **3** / **10**\n\`${'█'.repeat(9)}${' '.repeat(21)}\`\n(Canceled by <@u9>)`,
    );
  });
});

describe('playlist summaries', () => {
  it('previews a short playlist', () => {
    assert.deepEqual(playlistPreview('u1', 'mix', ['a', 'b'], ['[A](https://x.example/a)', null]), {
      title: '❗ mix',
      description:
        '**Playlist PREVIEW** [<@u1>]\n\n' +
        '1) [A](https://x.example/a)\n' +
        '2) (Failed to load preview for id: b)\n' +
        '\n(This is the end of the queue)',
      color: 'orange',
    });
  });

  it('counts the remaining pages of a long playlist', () => {
    const ids = Array.from({ length: 23 }, (_, i) => `id${i}`);
    const preview = playlistPreview('u1', 'long', ids, []);
    assert.ok(preview.description.endsWith('\n(The queue continues for **2** more page(s): **23** total songs)'));
  });

  it('summarises saved playlists', () => {
    assert.equal(
      savedPlaylistsSummary('u1', [
        { name: 'mix', ids: ['a', 'b'] },
        { name: 'calm', ids: [] },
      ]).description,
      '**Playlists PREVIEW** [<@u1>]\n\n**mix**: 2 songs\n**calm**: 0 songs',
    );
    assert.equal(savedPlaylistsSummary('u1', []).description, '**Playlists PREVIEW** [<@u1>]\n\nYour list is empty!');
  });
});
