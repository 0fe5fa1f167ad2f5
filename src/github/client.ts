import { Octokit } from '@octokit/rest';
import type { BlobStore } from '../storage/blob-store.js';
import { hasStatus, withRetry } from '../utils/retry.js';
import { createLogger } from '../utils/logger.js';
import type { CommitResult, FileSnapshot, GitHubClientConfig } from './types.js';

const log = createLogger('github');

type ETagCacheEntry = {
  etag: string;
  data: FileSnapshot;
  cacheTime: number;
};

/**
 * GitHub Contents API をバックエンドにした BlobStore
 * 1 キー = 1 ファイル、書き込みのたびに 1 コミット
 */
export class GitHubBlobStore implements BlobStore {
  private octokit: Octokit;
  private owner: string;
  private repo: string;
  private branch: string | undefined;

  // ETag cache for reducing data transfer
  private etagCache = new Map<string, ETagCacheEntry>();
  private readonly ETAG_CACHE_TTL_MS = 5 * 60 * 1000; // 5 minutes

  // Writes to the same path are chained so each one sees the previous sha
  private writeChains = new Map<string, Promise<void>>();

  constructor(config: GitHubClientConfig) {
    this.octokit = new Octokit({ auth: config.token });
    this.owner = config.owner;
    this.repo = config.repo;
    this.branch = config.branch;
  }

  private invalidateETagCache(path: string): void {
    this.etagCache.delete(path);
  }

  /**
   * ファイル内容を取得
   */
  async getFile(path: string): Promise<FileSnapshot | null> {

    const cached = this.etagCache.get(path);
    const headers: Record<string, string> = {};
    if (cached && Date.now() - cached.cacheTime < this.ETAG_CACHE_TTL_MS) {
      headers['if-none-match'] = cached.etag;
    }

    try {
      const response = await withRetry(
        () =>
          this.octokit.repos.getContent({
            owner: this.owner,
            repo: this.repo,
            path,
            ref: this.branch,
            headers,
          }),
        { label: `GET ${path}` },
      );

      const data = response.data;
      if (Array.isArray(data) || data.type !== 'file') {
        return null;
      }

      const result: FileSnapshot = {
        content: Buffer.from(data.content, 'base64').toString('utf-8'),
        sha: data.sha,
      };

      const etag = response.headers.etag;
      if (etag) {
        this.etagCache.set(path, { etag, data: result, cacheTime: Date.now() });
      }

      return result;
    } catch (error) {
      // 304 Not Modified
      if (hasStatus(error) && error.status === 304 && cached) {
        return cached.data;
      }
      if (hasStatus(error) && error.status === 404) {
        return null;
      }
      throw error;
    }
  }

  /**
   * ファイルを作成または更新してコミット
   */
  async putFile(path: string, content: string, message: string, sha?: string): Promise<CommitResult> {
    const response = await withRetry(
      () =>
        this.octokit.repos.createOrUpdateFileContents({
          owner: this.owner,
          repo: this.repo,
          path,
          message,
          branch: this.branch,
          content: Buffer.from(content, 'utf-8').toString('base64'),
          sha,
        }),
      { label: `PUT ${path}` },
    );

    this.invalidateETagCache(path);

    return {
      path: response.data.content?.path ?? path,
      sha: response.data.commit.sha ?? '',
    };
  }

  async read(key: string): Promise<string | null> {
    const file = await this.getFile(key);
    return file?.content ?? null;
  }

  async exists(key: string): Promise<boolean> {
    return (await this.getFile(key)) !== null;
  }

  write(path: string, content: string): Promise<void> {
    return this.enqueueWrite(path, async () => {
      const existing = await this.getFile(path);
      if (existing?.content === content) return;
      try {
        await this.putFile(path, content, `Update ${path}`, existing?.sha);
      } catch (error) {
        // 409: sha went stale between read and write
        if (!hasStatus(error) || error.status !== 409) throw error;
        log.warn(`Conflict writing ${path}, retrying with a fresh sha`);
        this.invalidateETagCache(path);
        const fresh = await this.getFile(path);
        await this.putFile(path, content, `Update ${path}`, fresh?.sha);
      }
      log.debug(`Wrote ${path}`);
    });
  }

  private enqueueWrite(path: string, task: () => Promise<void>): Promise<void> {
    const previous = this.writeChains.get(path) ?? Promise.resolve();
    const next = previous.catch(() => undefined).then(task);
    const settled = next.catch(() => undefined);
    this.writeChains.set(path, settled);
    void settled.then(() => {
      if (this.writeChains.get(path) === settled) this.writeChains.delete(path);
    });
    return next;
  }
}
