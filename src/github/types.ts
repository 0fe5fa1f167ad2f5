/**
 * GitHubクライアント設定
 */
export interface GitHubClientConfig {
  /** Personal Access Token */
  token: string;
  /** リポジトリオーナー */
  owner: string;
  /** リポジトリ名 */
  repo: string;
  /** 対象ブランチ（未指定ならデフォルトブランチ） */
  branch?: string;
}

/**
 * 取得したファイル
 */
export interface FileSnapshot {
  /** UTF-8 の内容 */
  content: string;
  /** blob SHA（更新時に必要） */
  sha: string;
}

/**
 * ファイル書き込み結果
 */
export interface CommitResult {
  /** ファイルパス */
  path: string;
  /** コミットSHA */
  sha: string;
}
