import 'dotenv/config';
import { DEFAULT_MUDAE_BOT_ID } from './features/mudae.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('config');

/**
 * アプリケーション設定
 */
export interface AppConfig {
  discord: {
    token: string;
    prefix: string;
    devUserId: string | undefined;
    mudaeBotId: string;
  };
  github: {
    token: string;
    owner: string;
    repo: string;
    branch: string | undefined;
  };
  music: {
    ytdlpPath: string;
    ffmpegPath: string;
    idleTimeoutMs: number;
    pageTimeoutMs: number;
    reloadIntervalMs: number;
  };
  currencyScoopKey: string | undefined;
  logLevel: string;
}

type Env = Record<string, string | undefined>;

/**
 * 必須環境変数の取得（未設定時はエラー）
 */
function getRequiredEnv(env: Env, key: string): string {
  const value = env[key];
  if (!value) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

/**
 * オプション環境変数の取得（未設定時はデフォルト値）
 */
function getOptionalEnv(env: Env, key: string, defaultValue: string): string {
  return env[key]?.trim() || defaultValue;
}

function getSecondsEnv(env: Env, key: string, defaultSeconds: number): number {
  const raw = env[key]?.trim();
  if (!raw) return defaultSeconds * 1000;
  const seconds = Number(raw);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new Error(`Environment variable ${key} must be a positive number of seconds, got "${raw}"`);
  }
  return seconds * 1000;
}

/**
 * 設定を読み込み
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const reloadHours = Number(getOptionalEnv(env, 'TRACK_RELOAD_HOURS', '5'));
  return {
    discord: {
      token: getRequiredEnv(env, 'DISCORD_TOKEN'),
      prefix: getOptionalEnv(env, 'COMMAND_PREFIX', '%'),
      devUserId: env['DEV_USER_ID']?.trim() || undefined,
      mudaeBotId: getOptionalEnv(env, 'MUDAE_BOT_ID', DEFAULT_MUDAE_BOT_ID),
    },
    github: {
      token: getRequiredEnv(env, 'GITHUB_TOKEN'),
      owner: getRequiredEnv(env, 'GITHUB_OWNER'),
      repo: getRequiredEnv(env, 'GITHUB_REPO'),
      branch: env['GITHUB_BRANCH']?.trim() || undefined,
    },
    music: {
      ytdlpPath: getOptionalEnv(env, 'YTDLP_PATH', 'yt-dlp'),
      ffmpegPath: getOptionalEnv(env, 'FFMPEG_PATH', 'ffmpeg'),
      idleTimeoutMs: getSecondsEnv(env, 'PLAYER_IDLE_TIMEOUT_SECONDS', 600),
      pageTimeoutMs: getSecondsEnv(env, 'QUEUE_PAGE_TIMEOUT_SECONDS', 180),
      reloadIntervalMs: (Number.isFinite(reloadHours) && reloadHours > 0 ? reloadHours : 5) * 3600 * 1000,
    },
    currencyScoopKey: env['CURRENCYSCOOP_KEY']?.trim() || undefined,
    logLevel: getOptionalEnv(env, 'LOG_LEVEL', 'info'),
  };
}

/**
 * 設定のバリデーション（警告のみ）
 */
export function validateConfig(config: AppConfig): string[] {
  const warnings: string[] = [];

  // Discord token format check
  if (!config.discord.token.match(/^[\w-]+\.[\w-]+\.[\w-]+$/)) {
    warnings.push('DISCORD_TOKEN format may be invalid');
  }

  // GitHub token format check
  if (!config.github.token.startsWith('ghp_') && !config.github.token.startsWith('github_pat_')) {
    warnings.push('GITHUB_TOKEN format may be invalid');
  }

  if (config.discord.prefix.length === 0 || /\s/.test(config.discord.prefix)) {
    warnings.push('COMMAND_PREFIX must not contain whitespace');
  }

  if (!config.currencyScoopKey) {
    warnings.push('CURRENCYSCOOP_KEY is not set; the currency command is disabled');
  }

  for (const warning of warnings) {
    log.warn(warning);
  }
  return warnings;
}
