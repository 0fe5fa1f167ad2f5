import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { MusicPlayer } from '../src/music/player.js';
import { FakeChannel, FakeResolver, FakeVoiceSession, RESOLVED_AT, flush, makeTrack } from './helpers/fakes.js';

interface Setup {
  player: MusicPlayer;
  session: FakeVoiceSession;
  resolver: FakeResolver;
  channel: FakeChannel;
  clock: { now: number };
}

function setup(reloadIntervalMs = 3_600_000): Setup {
  const session = new FakeVoiceSession();
  const resolver = new FakeResolver(['a', 'b', 'c', 'd'].map((id) => makeTrack(id)));
  const channel = new FakeChannel();
  const clock = { now: RESOLVED_AT + 5000 };
  const player = new MusicPlayer({
    guildName: 'Guild',
    session,
    resolver,
    idleTimeoutMs: 60_000,
    reloadIntervalMs,
    now: () => clock.now,
    random: () => 0,
  });
  player.bindChannel(channel);
  return { player, session, resolver, channel, clock };
}

const stream = (id: string): string => `https://media.example/${id}`;

async function playing(ids: string[]): Promise<Setup> {
  const ctx = setup();
  await ctx.player.join('vc1', false);
  for (const id of ids) await ctx.player.enqueue(id, 'u1');
  await flush();
  return ctx;
}

describe('MusicPlayer queueing', () => {
  it('plays the first track right away and queues the rest', async () => {
    const { player, session } = setup();
    await player.join('vc1', false);
    const first = await player.enqueue('a', 'u1');
    const second = await player.enqueue('b', 'u2');
    assert.equal(first.pos, 1);
    assert.equal(first.queued, false);
    assert.equal(second.pos, 2);
    assert.equal(second.queued, true);
    assert.deepEqual(session.played, [stream('a')]);
    assert.equal(player.nowPlaying?.track.requesterId, 'u1');
  });

  it('announces the track that started', async () => {
    const { channel } = await playing(['a']);
    assert.deepEqual(channel.sent[0]?.embed, {
      title: 'Now playing',
      description: '**(1)** [Song a](https://www.youtube.com/watch?v=a) [<@u1>]',
      color: 'gold',
    });
  });

  it('moves on when a track finishes and stops past the end', async () => {
    const { player, session, channel } = await playing(['a', 'b']);
    session.finishTrack();
    await flush();
    assert.deepEqual(session.played, [stream('a'), stream('b')]);
    assert.equal(channel.sent[0]?.deleted, true);

    session.finishTrack();
    await flush();
    assert.equal(player.cursor.pos, 3);
    assert.equal(player.nowPlaying, null);
    assert.equal(player.active, false);
  });

  it('starts a track added after the queue ran out', async () => {
    const { player, session } = await playing(['a']);
    session.finishTrack();
    await flush();
    const added = await player.enqueue('b', 'u1');
    assert.equal(added.queued, false);
    assert.equal(player.cursor.pos, 2);
    assert.deepEqual(session.played, [stream('a'), stream('b')]);
  });

  it('replays a looped track', async () => {
    const { player, session } = await playing(['a', 'b']);
    player.setLoop(true);
    session.finishTrack();
    assert.deepEqual(session.played, [stream('a'), stream('a')]);
  });

  it('waits for a connection before playing', async () => {
    const { player, session } = setup();
    await player.enqueue('a', 'u1');
    assert.deepEqual(session.played, []);
    await player.join('vc1');
    assert.deepEqual(session.played, [stream('a')]);
  });
});

describe('MusicPlayer navigation', () => {
  it('skips only while something plays', async () => {
    const { player, session } = setup();
    await player.join('vc1', false);
    assert.equal(player.skip(), false);
    await player.enqueue('a', 'u1');
    await player.enqueue('b', 'u1');
    assert.equal(player.skip(), true);
    assert.deepEqual(session.played, [stream('a'), stream('b')]);
  });

  it('jumps by position or title', async () => {
    const { player, session } = await playing(['a', 'b', 'c']);
    assert.deepEqual(player.jump('song C'), { ok: true, pos: 3 });
    assert.deepEqual(player.jump(9), { ok: false, reason: 'out-of-range' });
    assert.deepEqual(player.jump('missing'), { ok: false, reason: 'not-found' });
    assert.deepEqual(session.played, [stream('a'), stream('c')]);
  });

  it('keeps the player paused across a jump', async () => {
    const { player, session } = await playing(['a', 'b']);
    player.pause();
    player.jump(2);
    assert.equal(session.paused, true);
    assert.equal(player.status().paused, true);
    player.resume();
    assert.equal(player.status().paused, false);
  });

  it('plays the next track when the current one is removed', async () => {
    const { player, session } = await playing(['a', 'b', 'c']);
    const removed = player.remove(1);
    assert.equal(removed.ok && removed.track.id, 'a');
    assert.deepEqual(session.played, [stream('a'), stream('b')]);
    assert.deepEqual(player.queue.ids(), ['b', 'c']);
  });

  it('lands after a removed range holding the current track', async () => {
    const { player, session } = await playing(['a', 'b', 'c', 'd']);
    player.jump(2);
    assert.deepEqual(player.removeRange(1, 2), { first: 1, count: 2 });
    assert.equal(player.cursor.pos, 1);
    assert.deepEqual(session.played, [stream('a'), stream('b'), stream('c')]);
  });

  it('shuffles only the tracks after the current one', async () => {
    const { player } = await playing(['a', 'b', 'c', 'd']);
    assert.equal(player.shuffle(), 3);
    assert.deepEqual(player.queue.ids(), ['a', 'c', 'd', 'b']);
  });

  it('clears the queue and restores the default name', async () => {
    const { player, session } = await playing(['a', 'b']);
    player.rename('Road trip');
    assert.equal(await player.clear('u1'), 2);
    assert.equal(player.queue.name, 'Guild Queue');
    assert.equal(session.active, false);
    assert.equal(player.cursor.pos, 1);
  });
});

describe('MusicPlayer reloads', () => {
  it('refreshes a stale stream before playing it', async () => {
    const { player, session, resolver, channel } = setup(1000);
    await player.join('vc1', false);
    await player.enqueue('a', 'u1');
    await flush();
    assert.deepEqual(resolver.refreshed, ['a']);
    assert.deepEqual(session.played, [`${stream('a')}?fresh`]);
    assert.equal(channel.sent[0]?.embed.description, '⏳ Reloading [Song a](https://www.youtube.com/watch?v=a)...');
    assert.equal(channel.sent[0]?.deleted, true);
    assert.equal(channel.sent[1]?.embed.title, 'Now playing');
  });

  it('keeps the reloading track when the previous one ends meanwhile', async () => {
    const { player, session, resolver, clock } = await playing(['a', 'b', 'c']);
    let release = (): void => {};
    resolver.refreshGate = new Promise<void>((resolve) => {
      release = () => resolve();
    });
    clock.now += 3_600_000;

    assert.equal(player.skip(), true);
    session.finishTrack();
    release();
    await flush();

    assert.deepEqual(resolver.refreshed, ['b']);
    assert.deepEqual(session.played, [stream('a'), `${stream('b')}?fresh`]);
    assert.equal(player.cursor.pos, 2);
  });
});

describe('MusicPlayer loading', () => {
  it('replaces the queue and reports failed ids', async () => {
    const { player, session } = setup();
    await player.join('vc1', false);
    const progress: Array<[number, number]> = [];
    const result = await player.loadTracks(['a', 'zz', 'b'], {
      requesterId: 'u1',
      append: false,
      name: 'mix',
      onProgress: async (current, total) => {
        progress.push([current, total]);
      },
      onCancel: async () => {},
    });
    assert.deepEqual(result, { loaded: 2, failed: ['zz'], canceled: false });
    assert.deepEqual(progress, [
      [1, 3],
      [2, 3],
      [3, 3],
    ]);
    assert.equal(player.queue.name, 'mix');
    assert.equal(player.queue.loadedBy, 'u1');
    assert.deepEqual(session.played, [stream('a')]);
    assert.equal(player.loading, false);
  });

  it('stops when another user cancels', async () => {
    const { player } = setup();
    await player.join('vc1', false);
    const cancels: string[] = [];
    const result = await player.loadTracks(['a', 'b', 'c'], {
      requesterId: 'u1',
      append: true,
      name: 'mix',
      onProgress: async (current) => {
        if (current === 2) await player.cancelLoading('u2');
      },
      onCancel: async (userId) => {
        cancels.push(userId);
      },
    });
    assert.deepEqual(result, { loaded: 1, failed: [], canceled: true });
    assert.deepEqual(cancels, ['u2']);
    assert.deepEqual(player.queue.ids(), ['a']);
    assert.equal(await player.cancelLoading('u2'), false);
  });
});

describe('MusicPlayer idling', () => {
  it('leaves after being idle for the timeout', async () => {
    const { player, session, channel, clock } = setup();
    await player.join('vc1', false);
    assert.equal(await player.checkIdle(), false);
    clock.now += 59_999;
    assert.equal(await player.checkIdle(), false);
    clock.now += 1;
    assert.equal(await player.checkIdle(), true);
    assert.equal(session.connected, false);
    assert.deepEqual(channel.descriptions(), ['❗ I left the voice channel because I was inactive for too long.']);
  });

  it('is not idle while playing to listeners', async () => {
    const { player, session } = await playing(['a']);
    assert.equal(player.isIdle(), false);
    session.listeners = false;
    assert.equal(player.isIdle(), true);
    await player.leave();
  });

  it('shows the disconnected state in footers', () => {
    const { player } = setup();
    assert.deepEqual(player.withFooter({ description: 'x', color: 'gold' }), {
      description: 'x',
      color: 'gold',
      footer: '👋 Player is disconnected',
    });
  });
});
