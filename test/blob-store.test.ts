import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { JsonDocument, StorageKeys } from '../src/storage/blob-store.js';
import { MemoryBlobStore } from './helpers/fakes.js';

interface Counter {
  count: number;
}

const parseCounter = (value: unknown): Counter | null =>
  typeof value === 'object' && value !== null && 'count' in value && typeof value.count === 'number'
    ? { count: value.count }
    : null;

function counterDocument(store: MemoryBlobStore): JsonDocument<Counter> {
  return new JsonDocument(store, 'counter.json', parseCounter, () => ({ count: 0 }));
}

describe('StorageKeys', () => {
  it('places playlists under the user', () => {
    assert.equal(StorageKeys.playlists('123'), 'users/123/playlists.json');
  });
});

describe('JsonDocument', () => {
  it('falls back when the key is missing', async () => {
    assert.deepEqual(await counterDocument(new MemoryBlobStore()).load(), { count: 0 });
  });

  it('saves pretty JSON with a trailing newline', async () => {
    const store = new MemoryBlobStore();
    await counterDocument(store).save({ count: 3 });
    assert.equal(store.files.get('counter.json'), '{\n  "count": 3\n}\n');
  });

  it('falls back on unparsable or malformed content', async () => {
    const store = new MemoryBlobStore();
    store.files.set('counter.json', '{not json');
    assert.deepEqual(await counterDocument(store).load(), { count: 0 });
    store.files.set('counter.json', '{"count":"many"}');
    assert.deepEqual(await counterDocument(store).load(), { count: 0 });
  });

  it('updates in one read-modify-write', async () => {
    const store = new MemoryBlobStore();
    const doc = counterDocument(store);
    await doc.save({ count: 1 });
    assert.deepEqual(await doc.update((c) => ({ count: c.count + 1 })), { count: 2 });
    assert.equal(store.writes, 2);
    assert.deepEqual(await doc.load(), { count: 2 });
  });

  it('runs concurrent updates of one key in turn', async () => {
    const store = new MemoryBlobStore();
    const results = await Promise.all([
      counterDocument(store).update((c) => ({ count: c.count + 1 })),
      counterDocument(store).update((c) => ({ count: c.count + 10 })),
    ]);
    assert.deepEqual(results, [{ count: 1 }, { count: 11 }]);
    assert.equal(store.files.get('counter.json'), '{\n  "count": 11\n}\n');
  });

  it('keeps updating after a failed mutation', async () => {
    const store = new MemoryBlobStore();
    const failed = counterDocument(store).update(() => {
      throw new Error('bad input');
    });
    const next = counterDocument(store).update((c) => ({ count: c.count + 1 }));
    await assert.rejects(failed, { message: 'bad input' });
    assert.deepEqual(await next, { count: 1 });
  });
});
