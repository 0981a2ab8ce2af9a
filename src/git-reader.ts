import { simpleGit, type LogResult, type SimpleGit } from 'simple-git';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { GitAccessError, errorMessage } from './errors.js';
import { logger } from './logger.js';
import type { ChangeScope, CommitRecord } from './types.js';

const REMOTE_URL = /^(https:\/\/github\.com\/[^/\s]+\/[^/\s]+?|https:\/\/\S+\.git)\/?$/;

export function isRemoteRepository(location: string): boolean {
  return REMOTE_URL.test(location.trim());
}

export class GitReader {
  private constructor(
    private readonly git: SimpleGit,
    readonly repoPath: string
  ) {}

  static async open(repoPath: string): Promise<GitReader> {
    const resolved = path.resolve(repoPath);

    let isDirectory = false;
    try {
      isDirectory = (await fs.stat(resolved)).isDirectory();
    } catch {
      isDirectory = false;
    }
    if (!isDirectory) {
      throw new GitAccessError(`Path does not exist or is not a directory: ${resolved}`);
    }

    let git: SimpleGit;
    let isRepo: boolean;
    try {
      git = simpleGit(resolved);
      isRepo = await git.checkIsRepo();
    } catch (error) {
      throw new GitAccessError(`Cannot open repository at ${resolved}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    if (!isRepo) {
      throw new GitAccessError(`Not a git repository: ${resolved}`);
    }

    return new GitReader(git, resolved);
  }

  /**
   * Commits in `range` (e.g. `HEAD~5..HEAD`, `main..feature`), newest first.
   * Without a range only the latest commit is returned.
   */
  async listCommits(range?: string, maxCount?: number): Promise<CommitRecord[]> {
    // anything starting with a dash would reach git as an option
    if (range?.startsWith('-')) {
      throw new GitAccessError(`Invalid commit range "${range}": a range cannot start with "-"`);
    }

    const options: string[] = [];
    if (maxCount !== undefined) options.push(`--max-count=${maxCount}`);
    else if (!range) options.push('--max-count=1');
    if (range) options.push(range);

    let entries: LogResult['all'];
    try {
      entries = (await this.git.log(options)).all;
    } catch (error) {
      throw new GitAccessError(
        range
          ? `Invalid commit range "${range}": ${errorMessage(error)}`
          : `Cannot read history of ${this.repoPath}: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    const commits: CommitRecord[] = [];
    for (const entry of entries) {
      commits.push({
        hash: entry.hash,
        message: entry.message,
        author: entry.author_email ? `${entry.author_name} <${entry.author_email}>` : entry.author_name,
        date: entry.date,
        diff: await this.getCommitDiff(entry.hash),
      });
    }

    logger.debug('Read commits', { repo: this.repoPath, range: range ?? 'HEAD', count: commits.length });
    return commits;
  }

  async getCommitDiff(hash: string): Promise<string> {
    try {
      // root commits have no parent; `show` diffs them against the empty tree
      return await this.git.show(['--format=', '--no-color', '--no-ext-diff', hash]);
    } catch (error) {
      throw new GitAccessError(`Cannot read diff of commit ${hash}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  async getChanges(scope: ChangeScope): Promise<string> {
    try {
      return scope === 'staged'
        ? await this.git.diff(['--cached', '--no-color'])
        : await this.git.diff(['--no-color']);
    } catch (error) {
      throw new GitAccessError(`Cannot read ${scope} changes: ${errorMessage(error)}`, { cause: error });
    }
  }

  async listTrackedFiles(): Promise<string[]> {
    try {
      const output = await this.git.raw(['ls-files']);
      return output
        .split('\n')
        .map((line) => line.trim())
        .filter(Boolean);
    } catch (error) {
      throw new GitAccessError(`Cannot list files of ${this.repoPath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}

/**
 * Runs `fn` against a local repository, or against a temporary clone when
 * `location` is a remote URL. The clone is removed afterwards.
 */
export async function withRepository<T>(
  location: string,
  fn: (reader: GitReader) => Promise<T>
): Promise<T> {
  if (!isRemoteRepository(location)) {
    return fn(await GitReader.open(location));
  }

  const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'codereview-'));
  try {
    logger.info('Cloning repository', { url: location });
    try {
      await simpleGit().clone(location.trim(), tempDir);
    } catch (error) {
      throw new GitAccessError(`Failed to clone ${location}: ${errorMessage(error)}`, { cause: error });
    }
    return await fn(await GitReader.open(tempDir));
  } finally {
    await fs.rm(tempDir, { recursive: true, force: true });
  }
}
