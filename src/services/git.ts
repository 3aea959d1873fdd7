import { simpleGit, type SimpleGit } from 'simple-git';
import process from 'process';
import type { CommitReadiness } from '../types/common.js';
import { consoleLogger, type Logger } from '../utils/logger.js';

export interface StatusEntry {
  path: string;
  index: string;
  working_dir: string;
}

/**
 * What the commit flow needs from version control.
 */
export interface GitGateway {
  getCommitReadiness(): Promise<CommitReadiness>;
  commitWithMessageFile(messageFile: string): Promise<void>;
}

const isStaged = (entry: StatusEntry): boolean =>
  entry.index !== ' ' && entry.index !== '' && entry.index !== '?' && entry.index !== '!';

const isUntracked = (entry: StatusEntry): boolean =>
  entry.index === '?' || entry.working_dir === '?';

export const classifyStatus = (
  entries: readonly StatusEntry[],
  root: string
): CommitReadiness => {
  if (entries.some(isStaged)) {
    return { kind: 'ready', root };
  }
  return { kind: 'nothing-staged', root, hasUntracked: entries.some(isUntracked) };
};

export class GitService implements GitGateway {
  private readonly git: SimpleGit;
  private root: string | null = null;

  constructor(
    baseDir: string = process.cwd(),
    private readonly logger: Logger = consoleLogger
  ) {
    // simple-git only rejects a non-zero exit when stderr has output; a hook
    // that fails silently must still fail the commit.
    this.git = simpleGit({
      baseDir,
      errors: (error, result) => {
        if (error || result.exitCode === 0) {
          return error;
        }
        return result.stdErr.length > 0
          ? Buffer.concat(result.stdErr)
          : new Error(`git exited with code ${result.exitCode}`);
      },
    });
  }

  getRepositoryRoot = async (): Promise<string | null> => {
    if (this.root) {
      return this.root;
    }
    if (!(await this.git.checkIsRepo())) {
      return null;
    }
    this.root = (await this.git.revparse(['--show-toplevel'])).trim();
    this.logger.debug(`Root directory of Git repository: ${this.root}`);
    return this.root;
  };

  getCommitReadiness = async (): Promise<CommitReadiness> => {
    const root = await this.getRepositoryRoot();
    if (!root) {
      return { kind: 'not-a-repository' };
    }

    const status = await this.git.status();
    return classifyStatus(status.files, root);
  };

  /**
   * Runs `git commit -F` so hooks run as usual. git's own output goes
   * straight to the terminal; a non-zero exit rejects.
   */
  commitWithMessageFile = async (messageFile: string): Promise<void> => {
    await this.git
      .outputHandler((_command, stdout, stderr) => {
        stdout.pipe(process.stdout);
        stderr.pipe(process.stderr);
      })
      .raw(['commit', '-F', messageFile]);
  };
}
