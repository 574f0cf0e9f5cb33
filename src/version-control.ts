import { execa } from 'execa';
import { VersionControlError, errorMessage } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import { BranchNameSchema } from './schemas.js';
import type { VersionControl } from './types.js';

export interface GitHubVersionControlOptions {
  projectDir: string;
  defaultBranch: string;
  /** owner/repo */
  repoName: string;
  githubToken: string;
  /** Project-relative paths never staged by commitAll (devbot's own files, reports) */
  excludeFromCommit?: readonly string[];
  logger?: Logger;
}

/**
 * Always kept out of commits: holds .env credentials and the live task log
 */
export const DEVBOT_DIR = '.devbot';

/**
 * VersionControl backed by the git CLI for local work and the GitHub CLI for pull requests
 */
export class GitHubVersionControl implements VersionControl {
  private logger: Logger;

  constructor(private readonly options: GitHubVersionControlOptions) {
    this.logger = options.logger ?? silentLogger;
  }

  async createBranch(name: string): Promise<void> {
    this.assertBranchName(name);
    await this.git(['checkout', this.options.defaultBranch]);
    await this.git(['pull']);
    await this.git(['checkout', '-b', name]);
    this.logger.info(`🌿 Switched to new branch: ${name}`);
  }

  async checkoutBranch(name: string): Promise<void> {
    this.assertBranchName(name);
    await this.git(['fetch', 'origin', name]);
    await this.git(['checkout', name]);
    await this.git(['pull']);
    this.logger.info(`🌿 Checked out ${name}`);
  }

  /**
   * Stage everything in the working tree except the excluded paths, and commit it
   */
  async commitAll(message: string): Promise<void> {
    const excluded = [DEVBOT_DIR, ...(this.options.excludeFromCommit ?? [])];
    await this.git(['add', '--all', '--', '.', ...excluded.map((path) => `:(exclude)${path}`)]);
    await this.git(['commit', '--allow-empty', '-m', message]);
    this.logger.info(`Committed changes: ${message}`);
  }

  async push(name: string): Promise<void> {
    this.assertBranchName(name);
    await this.git(['push', '--set-upstream', 'origin', name]);
    this.logger.info(`Pushed ${name}`);
  }

  /**
   * Open a pull request against the default branch; returns its URL
   */
  async createPullRequest(branch: string, title: string, body: string): Promise<string> {
    this.assertBranchName(branch);
    const args = [
      'pr',
      'create',
      '--repo',
      this.options.repoName,
      '--base',
      this.options.defaultBranch,
      '--head',
      branch,
      '--title',
      title,
      '--body',
      body,
    ];
    const stdout = await this.run('gh', args, { GH_TOKEN: this.options.githubToken });

    // gh prints progress lines before the URL
    const url = stdout
      .trim()
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.startsWith('http'))
      .pop();
    if (!url) {
      throw new VersionControlError('gh pr create', `no pull request URL in output: ${stdout.trim()}`);
    }
    return url;
  }

  /**
   * Branch names reach the git argv; anything option-shaped is refused
   */
  private assertBranchName(name: string): void {
    if (!BranchNameSchema.safeParse(name).success) {
      throw new VersionControlError('git', `refusing unsafe branch name: ${name}`);
    }
  }

  private git(args: string[]): Promise<string> {
    return this.run('git', args);
  }

  private async run(file: string, args: string[], env?: Record<string, string>): Promise<string> {
    try {
      const { stdout } = await execa(file, args, { cwd: this.options.projectDir, env });
      return stdout;
    } catch (error) {
      // Never echo the PR body into logs
      const command = `${file} ${args.slice(0, 2).join(' ')}`;
      throw new VersionControlError(command, errorMessage(error), { cause: error });
    }
  }
}
