import { existsSync, readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { loadConfig, validateConfig } from './config.js';
import { PlayerRegistry, QuaverBot, ReplSessions } from './discord/index.js';
import { AnagramFinder } from './features/anagrams.js';
import { AnnoyTargets } from './features/annoy.js';
import { Sandbox } from './features/evaluator.js';
import { CurrencyExchanger } from './features/exchanger.js';
import { MudaeTracker } from './features/mudae.js';
import { PubChemClient } from './features/pubchem.js';
import { GitHubBlobStore } from './github/index.js';
import { PlaylistStore } from './music/playlist-store.js';
import { YtDlpResolver } from './music/resolver.js';
import { isRecord } from './utils/guards.js';
import { createLogger, setLogLevel } from './utils/logger.js';

const log = createLogger('main');

/** src/ と dist/src/ のどちらから起動しても package.json を探す */
function readVersion(): string {
  for (const candidate of ['../package.json', '../../package.json']) {
    const path = fileURLToPath(new URL(candidate, import.meta.url));
    if (!existsSync(path)) continue;
    const parsed: unknown = JSON.parse(readFileSync(path, 'utf8'));
    if (isRecord(parsed) && typeof parsed['version'] === 'string') return `v${parsed['version']}`;
  }
  return 'v0.0.0';
}

async function main(): Promise<void> {
  log.info('Loading configuration...');

  // 設定読み込み
  const config = loadConfig();
  setLogLevel(config.logLevel);
  validateConfig(config);

  log.info('Initializing components...');

  const store = new GitHubBlobStore({
    token: config.github.token,
    owner: config.github.owner,
    repo: config.github.repo,
    branch: config.github.branch,
  });
  const resolver = new YtDlpResolver({ binaryPath: config.music.ytdlpPath });
  const sensitiveValues = [config.discord.token, config.github.token, config.currencyScoopKey ?? ''].filter(Boolean);

  const bot = new QuaverBot(
    {
      token: config.discord.token,
      prefix: config.discord.prefix,
      devUserId: config.discord.devUserId,
      version: readVersion(),
      mudaeBotId: config.discord.mudaeBotId,
    },
    {
      players: new PlayerRegistry({
        resolver,
        ffmpegPath: config.music.ffmpegPath,
        idleTimeoutMs: config.music.idleTimeoutMs,
        reloadIntervalMs: config.music.reloadIntervalMs,
      }),
      playlists: new PlaylistStore(store),
      resolver,
      exchanger: config.currencyScoopKey ? new CurrencyExchanger({ apiKey: config.currencyScoopKey, store }) : null,
      pubchem: new PubChemClient(),
      anagrams: await AnagramFinder.fromFile(),
      mudae: new MudaeTracker(store),
      annoy: new AnnoyTargets(),
      sandbox: new Sandbox(sensitiveValues),
      sensitiveValues,
      replSessions: new ReplSessions(),
      pageTimeoutMs: config.music.pageTimeoutMs,
    },
  );

  // シャットダウンハンドラ
  const shutdown = async (signal: string): Promise<void> => {
    log.info(`Received ${signal}. Shutting down...`);
    await bot.stop();
    process.exit(0);
  };

  const onSignal = (signal: string): void => {
    shutdown(signal).catch((error: unknown) => {
      log.error('Shutdown failed', { error: error instanceof Error ? error.message : String(error) });
      process.exit(1);
    });
  };
  process.on('SIGINT', () => onSignal('SIGINT'));
  process.on('SIGTERM', () => onSignal('SIGTERM'));

  // Bot起動
  await bot.start();
  log.info('Quaver is running! Press Ctrl+C to stop.');
}

main().catch((error: unknown) => {
  log.error('Fatal error', { error: error instanceof Error ? (error.stack ?? error.message) : String(error) });
  process.exit(1);
});
