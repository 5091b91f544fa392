import { Octokit } from '@octokit/core';
import dayjs from 'dayjs';
import { messageOf, PersistenceError, TransientIOError } from './errors.js';
import type { HistoryFile } from './history.js';

export interface GitHubHistoryConfig {
  owner: string;
  repo: string;
  path: string;
  branch?: string;
}

function statusOf(error: unknown): number {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return 0;
}

/**
 * History file stored in a GitHub repository. Each write is a single commit
 * made against the blob sha seen by the last read, so a concurrent change
 * makes the write fail instead of being overwritten.
 */
export class GitHubHistoryFile implements HistoryFile {
  private octokit: Octokit;
  private config: GitHubHistoryConfig;
  private sha: string | undefined;

  constructor(octokit: Octokit, config: GitHubHistoryConfig) {
    this.octokit = octokit;
    this.config = config;
  }

  async read(): Promise<string | null> {
    const { owner, repo, path, branch } = this.config;
    try {
      const { data } = await this.octokit.request('GET /repos/{owner}/{repo}/contents/{path}', {
        owner,
        repo,
        path,
        ...(branch ? { ref: branch } : {}),
      });

      if (Array.isArray(data) || !('content' in data) || typeof data.content !== 'string') {
        throw new PersistenceError(`${this.describe()} is not a file`);
      }
      this.sha = data.sha;
      return Buffer.from(data.content, 'base64').toString('utf-8');
    } catch (error: unknown) {
      if (error instanceof PersistenceError) {
        throw error;
      }
      const status = statusOf(error);
      if (status === 404) {
        this.sha = undefined;
        return null;
      }
      throw new TransientIOError(`Unable to read ${this.describe()}: ${messageOf(error)}`, status || null, {
        cause: error,
      });
    }
  }

  async write(contents: string): Promise<void> {
    const { owner, repo, path, branch } = this.config;
    try {
      const { data } = await this.octokit.request('PUT /repos/{owner}/{repo}/contents/{path}', {
        owner,
        repo,
        path,
        message: `Update CWV history (${dayjs().format('YYYY-MM-DD')})`,
        content: Buffer.from(contents, 'utf-8').toString('base64'),
        ...(this.sha ? { sha: this.sha } : {}),
        ...(branch ? { branch } : {}),
      });
      this.sha = data.content?.sha ?? this.sha;
    } catch (error: unknown) {
      const status = statusOf(error);
      const reason = status === 409 || status === 422 ? 'history changed since it was read' : messageOf(error);
      throw new PersistenceError(`Unable to write ${this.describe()}: ${reason}`, { cause: error });
    }
  }

  describe(): string {
    const ref = this.config.branch ? `@${this.config.branch}` : '';
    return `github:${this.config.owner}/${this.config.repo}/${this.config.path}${ref}`;
  }
}
