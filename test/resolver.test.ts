import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { TrackResolveError, YtDlpResolver, parseExtractorInfo, type ProcessRunner } from '../src/music/resolver.js';
import type { FetchLike } from '../src/utils/http.js';
import { makeTrack } from './helpers/fakes.js';

const info = { id: 'abc', title: 'Tide', url: 'https://media.example/abc-new', duration: 201.6 };

function recordingRunner(output: string): { run: ProcessRunner; calls: string[][] } {
  const calls: string[][] = [];
  return {
    calls,
    run: async (command, args) => {
      calls.push([command, ...args]);
      return output;
    },
  };
}

describe('parseExtractorInfo', () => {
  it('unwraps search results', () => {
    assert.deepEqual(parseExtractorInfo(JSON.stringify({ entries: [info] }), 5), {
      id: 'abc',
      title: 'Tide',
      durationSeconds: 202,
      webpageUrl: 'https://www.youtube.com/watch?v=abc',
      streamUrl: 'https://media.example/abc-new',
      resolvedAt: 5,
    });
  });

  it('keeps the reported page URL', () => {
    const track = parseExtractorInfo(JSON.stringify({ ...info, webpage_url: 'https://video.example/abc' }), 5);
    assert.equal(track?.webpageUrl, 'https://video.example/abc');
  });

  it('returns null for unusable output', () => {
    assert.equal(parseExtractorInfo('not json'), null);
    assert.equal(parseExtractorInfo(JSON.stringify({ id: 'abc', title: 'Tide' })), null);
    assert.equal(parseExtractorInfo(JSON.stringify({ entries: [] })), null);
  });
});

describe('YtDlpResolver', () => {
  it('searches plain text and passes URLs through', async () => {
    const { run, calls } = recordingRunner(JSON.stringify(info));
    const resolver = new YtDlpResolver({ binaryPath: 'yt-dlp', run });
    assert.equal((await resolver.search('tide')).id, 'abc');
    await resolver.search('https://video.example/abc');
    assert.deepEqual(calls[0], [
      'yt-dlp',
      '--dump-single-json',
      '--no-playlist',
      '--no-warnings',
      '--format',
      'bestaudio/best',
      '--default-search',
      'ytsearch',
      '--',
      'ytsearch1:tide',
    ]);
    assert.equal(calls[1]?.at(-1), 'https://video.example/abc');
  });

  it('wraps extractor failures', async () => {
    const resolver = new YtDlpResolver({
      binaryPath: 'yt-dlp',
      run: async () => {
        throw new Error('boom');
      },
    });
    await assert.rejects(resolver.search('tide'), (error: unknown) => {
      assert.ok(error instanceof TrackResolveError);
      assert.equal(error.message, 'could not resolve "tide": boom');
      return true;
    });
  });

  it('reports a result without a stream', async () => {
    const resolver = new YtDlpResolver({ binaryPath: 'yt-dlp', run: recordingRunner('{}').run });
    await assert.rejects(resolver.byId('abc'), { message: 'could not resolve "abc": no playable result' });
  });

  it('refreshes only the stream of a track', async () => {
    const { run, calls } = recordingRunner(JSON.stringify(info));
    const resolver = new YtDlpResolver({ binaryPath: 'yt-dlp', run });
    const fresh = await resolver.refresh(makeTrack('abc', 'Old title'));
    assert.equal(fresh.title, 'Old title');
    assert.equal(fresh.streamUrl, 'https://media.example/abc-new');
    assert.equal(calls[0]?.at(-1), 'https://www.youtube.com/watch?v=abc');
  });

  it('previews a title through oEmbed', async () => {
    const urls: string[] = [];
    const fetch: FetchLike = async (input) => {
      urls.push(input);
      return input.includes('missing') ? new Response('', { status: 404 }) : Response.json({ title: 'Tide' });
    };
    const resolver = new YtDlpResolver({ binaryPath: 'yt-dlp', fetch });
    assert.equal(await resolver.preview('abc'), '[Tide](https://www.youtube.com/watch?v=abc)');
    assert.equal(urls[0], 'https://www.youtube.com/oembed?format=json&url=https%3A%2F%2Fwww.youtube.com%2Fwatch%3Fv%3Dabc');
    assert.equal(await resolver.preview('missing'), null);
  });
});
