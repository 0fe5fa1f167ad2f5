import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { loadConfig, validateConfig } from '../src/config.js';
import './helpers/fakes.js';

const required = {
  DISCORD_TOKEN: 'aaa.bbb.ccc',
  GITHUB_TOKEN: 'ghp_test-secret',
  GITHUB_OWNER: 'someone',
  GITHUB_REPO: 'bot-data',
};

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig(required);
    assert.deepEqual(config.discord, {
      token: 'aaa.bbb.ccc',
      prefix: '%',
      devUserId: undefined,
      mudaeBotId: '432610292342587392',
    });
    assert.deepEqual(config.music, {
      ytdlpPath: 'yt-dlp',
      ffmpegPath: 'ffmpeg',
      idleTimeoutMs: 600_000,
      pageTimeoutMs: 180_000,
      reloadIntervalMs: 5 * 3600 * 1000,
    });
    assert.equal(config.github.branch, undefined);
    assert.equal(config.currencyScoopKey, undefined);
    assert.equal(config.logLevel, 'info');
  });

  it('reads overrides', () => {
    const config = loadConfig({
      ...required,
      COMMAND_PREFIX: ' ! ',
      DEV_USER_ID: '42',
      GITHUB_BRANCH: 'data',
      PLAYER_IDLE_TIMEOUT_SECONDS: '30',
      TRACK_RELOAD_HOURS: '2',
      CURRENCYSCOOP_KEY: 'test-secret',
    });
    assert.equal(config.discord.prefix, '!');
    assert.equal(config.discord.devUserId, '42');
    assert.equal(config.github.branch, 'data');
    assert.equal(config.music.idleTimeoutMs, 30_000);
    assert.equal(config.music.reloadIntervalMs, 2 * 3600 * 1000);
    assert.equal(config.currencyScoopKey, 'test-secret');
  });

  it('falls back on an unusable reload interval', () => {
    assert.equal(loadConfig({ ...required, TRACK_RELOAD_HOURS: 'soon' }).music.reloadIntervalMs, 5 * 3600 * 1000);
  });

  it('requires the tokens and repository', () => {
    assert.throws(() => loadConfig({ ...required, GITHUB_REPO: '' }), {
      message: 'Missing required environment variable: GITHUB_REPO',
    });
  });

  it('rejects a non-positive timeout', () => {
    assert.throws(() => loadConfig({ ...required, QUEUE_PAGE_TIMEOUT_SECONDS: '-1' }), {
      message: 'Environment variable QUEUE_PAGE_TIMEOUT_SECONDS must be a positive number of seconds, got "-1"',
    });
  });
});

describe('validateConfig', () => {
  it('warns about suspicious values', () => {
    const config = loadConfig({ ...required, DISCORD_TOKEN: 'token', GITHUB_TOKEN: 'test-secret', COMMAND_PREFIX: 'a b' });
    assert.deepEqual(validateConfig(config), [
      'DISCORD_TOKEN format may be invalid',
      'GITHUB_TOKEN format may be invalid',
      'COMMAND_PREFIX must not contain whitespace',
      'CURRENCYSCOOP_KEY is not set; the currency command is disabled',
    ]);
  });

  it('accepts a complete configuration', () => {
    assert.deepEqual(validateConfig(loadConfig({ ...required, CURRENCYSCOOP_KEY: 'test-secret' })), []);
  });
});
