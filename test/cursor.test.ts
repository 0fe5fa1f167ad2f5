import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { PlaybackCursor, parseToggle } from '../src/music/cursor.js';
import { SongQueue } from '../src/music/song-queue.js';
import { makeTrack } from './helpers/fakes.js';

function setup(count: number): { queue: SongQueue; cursor: PlaybackCursor } {
  const queue = new SongQueue('', () => 0);
  for (let i = 1; i <= count; i++) queue.add({ ...makeTrack(`t${i}`), requesterId: 'u1' });
  return { queue, cursor: new PlaybackCursor(queue) };
}

describe('parseToggle', () => {
  it('reads on and off, anything else toggles', () => {
    assert.equal(parseToggle(' ON '), true);
    assert.equal(parseToggle('off'), false);
    assert.equal(parseToggle('maybe'), null);
    assert.equal(parseToggle(undefined), null);
  });
});

describe('PlaybackCursor', () => {
  it('starts at the first track', () => {
    const { cursor } = setup(2);
    assert.equal(cursor.pos, 1);
    assert.equal(cursor.current?.id, 't1');
  });

  it('stays on a looped track when it finishes but moves on skip', () => {
    const { cursor } = setup(2);
    cursor.setLoop(true);
    cursor.finish();
    assert.equal(cursor.pos, 1);
    cursor.skip();
    assert.equal(cursor.pos, 2);
  });

  it('leaves the queue after the last track without loop-queue', () => {
    const { cursor } = setup(2);
    cursor.moveTo(2);
    cursor.finish();
    assert.equal(cursor.pos, 3);
    assert.equal(cursor.insideQueue, false);
    assert.equal(cursor.current, null);
  });

  it('wraps to the start with loop-queue on', () => {
    const { cursor } = setup(2);
    cursor.setLoopQueue(true);
    cursor.moveTo(2);
    cursor.finish();
    assert.equal(cursor.pos, 1);
  });

  it('shuffles when wrapping with shuffle-loop on', () => {
    const { queue, cursor } = setup(3);
    assert.equal(cursor.setShuffleLoop(true), true);
    assert.equal(cursor.queueLooped, true);
    cursor.moveTo(3);
    cursor.skip();
    assert.equal(cursor.pos, 1);
    assert.deepEqual(queue.ids(), ['t2', 't3', 't1']);
  });

  it('turning loop-queue off clears shuffle-loop', () => {
    const { cursor } = setup(1);
    cursor.setShuffleLoop(true);
    assert.equal(cursor.setLoopQueue(null), false);
    assert.equal(cursor.shuffleOnLoop, false);
  });

  it('goes back and stops at zero', () => {
    const { cursor } = setup(2);
    cursor.back();
    assert.equal(cursor.pos, 0);
    cursor.back();
    assert.equal(cursor.pos, 0);
  });

  it('goes back to the last track with loop-queue on', () => {
    const { cursor } = setup(3);
    cursor.setLoopQueue(true);
    cursor.back();
    assert.equal(cursor.pos, 3);
  });

  it('adjusts after a single removal', () => {
    const { cursor } = setup(4);
    cursor.moveTo(3);
    assert.equal(cursor.afterRemove(1), false);
    assert.equal(cursor.pos, 2);
    assert.equal(cursor.afterRemove(4), false);
    assert.equal(cursor.pos, 2);
    assert.equal(cursor.afterRemove(2), true);
    assert.equal(cursor.pos, 2);
  });

  it('lands after a removed range that held the current track', () => {
    const { cursor } = setup(6);
    cursor.moveTo(3);
    assert.equal(cursor.afterRemoveRange(2, 3), true);
    assert.equal(cursor.pos, 2);
  });

  it('shifts back past a removed range before it', () => {
    const { cursor } = setup(6);
    cursor.moveTo(5);
    assert.equal(cursor.afterRemoveRange(1, 2), false);
    assert.equal(cursor.pos, 3);
    assert.equal(cursor.afterRemoveRange(1, 0), false);
    assert.equal(cursor.pos, 3);
  });
});
