// Types
export type { GitHubClientConfig, FileSnapshot, CommitResult } from './types.js';

// Classes
export { GitHubBlobStore } from './client.js';
