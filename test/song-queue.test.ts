import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { QueuePositionError, SongQueue } from '../src/music/song-queue.js';
import type { QueuedTrack } from '../src/music/track.js';
import { makeTrack } from './helpers/fakes.js';

const queued = (id: string, title?: string): QueuedTrack => ({ ...makeTrack(id, title), requesterId: 'u1' });

function queueOf(...ids: string[]): SongQueue {
  const queue = new SongQueue('', () => 0);
  for (const id of ids) queue.add(queued(id));
  return queue;
}

describe('SongQueue', () => {
  it('strips braces from the name', () => {
    const queue = new SongQueue('{road trip}');
    assert.equal(queue.name, 'road trip');
    queue.name = 'a{b}c';
    assert.equal(queue.name, 'abc');
  });

  it('adds tracks at 1-based positions', () => {
    const queue = new SongQueue();
    assert.equal(queue.add(queued('a')), 1);
    assert.equal(queue.add(queued('b')), 2);
    assert.equal(queue.at(2).id, 'b');
    assert.equal(queue.has(0), false);
    assert.equal(queue.has(3), false);
  });

  it('throws QueuePositionError outside the queue', () => {
    const queue = queueOf('a');
    assert.throws(() => queue.at(2), QueuePositionError);
    assert.throws(() => queue.pop(0), { message: 'queue position 0 out of range [1, 1]' });
  });

  it('finds a title case-insensitively', () => {
    const queue = new SongQueue();
    queue.add(queued('a', 'Blue Harbor'));
    queue.add(queued('b', 'Red Harbor'));
    assert.equal(queue.findPosition('RED'), 2);
    assert.equal(queue.findPosition('harbor'), 1);
    assert.equal(queue.findPosition('green'), null);
  });

  it('returns a segment that stops at the end', () => {
    const queue = queueOf('a', 'b', 'c');
    assert.deepEqual(
      queue.segment(2, 10).map((t) => t.id),
      ['b', 'c'],
    );
  });

  it('pops a range with clamped bounds', () => {
    const queue = queueOf('a', 'b', 'c', 'd');
    assert.deepEqual(
      queue.popRange(0, 2).map((t) => t.id),
      ['a', 'b'],
    );
    assert.deepEqual(queue.ids(), ['c', 'd']);
    assert.deepEqual(queue.popRange(3, 1), []);
    assert.deepEqual(
      queue.popRange(2, 99).map((t) => t.id),
      ['d'],
    );
  });

  it('swaps and clears', () => {
    const queue = queueOf('a', 'b', 'c');
    queue.swap(1, 3);
    assert.deepEqual(queue.ids(), ['c', 'b', 'a']);
    assert.equal(queue.clear(), 3);
    assert.equal(queue.length, 0);
  });

  it('shuffles everything with a fixed random source', () => {
    const queue = queueOf('a', 'b', 'c', 'd');
    queue.shuffle();
    assert.deepEqual(queue.ids(), ['b', 'c', 'd', 'a']);
  });

  it('keeps tracks up to the given position in place', () => {
    const queue = queueOf('a', 'b', 'c', 'd');
    queue.shuffle(1);
    assert.deepEqual(queue.ids(), ['a', 'c', 'd', 'b']);
  });
});
