import matter from 'gray-matter';
import { posix } from 'path';
import type { FileSystem, MutationSnapshot, PullRequestResult, Task } from './types.js';

export interface ReportInput {
  task: Task;
  /** Plan path, or `review:{branch}` for feedback iterations */
  planFile: string;
  title: string;
  mutations: MutationSnapshot;
  pullRequest: PullRequestResult;
  generatedAt?: Date;
}

export interface ReportGeneratorOptions {
  reportsDir: string;
  /** owner/repo */
  project: string;
}

const pad = (n: number): string => String(n).padStart(2, '0');

export function formatYymmdd(date: Date): string {
  return `${pad(date.getFullYear() % 100)}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
}

export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}`
  );
}

/**
 * Renders and writes the implementation report of a finished task
 */
export class ReportGenerator {
  constructor(
    private readonly fs: Pick<FileSystem, 'write'>,
    private readonly options: ReportGeneratorOptions
  ) {}

  reportPath(taskSlug: string, date: Date): string {
    return posix.join(this.options.reportsDir, `${formatYymmdd(date)}__IMPLEMENTATION_REPORT__${taskSlug}.md`);
  }

  render(input: ReportInput): string {
    const date = input.generatedAt ?? new Date();
    const timestamp = formatTimestamp(date);
    const { created, modified } = input.mutations;

    const data: Record<string, unknown> = {
      filename: this.reportPath(input.task.taskSlug, date),
      title: `Report: ${input.task.taskSlug}`,
      createdAt: timestamp,
      updatedAt: timestamp,
      plan_file: input.planFile,
      project: this.options.project,
      branch: input.task.branchName,
      status: input.pullRequest.state === 'failed' ? 'pr_failed' : 'completed',
      files_created: created.length,
      files_modified: modified.length,
      files_deleted: 0,
      tags: ['report', 'automated'],
      documentType: 'IMPLEMENTATION_REPORT',
    };
    // YAML cannot dump undefined, so optional keys are only set when known
    if (input.pullRequest.state === 'created') {
      data.pull_request = input.pullRequest.url;
    }

    return matter.stringify(this.renderBody(input), data);
  }

  /**
   * Render and write the report, returning its path
   */
  async write(input: ReportInput): Promise<string> {
    const generatedAt = input.generatedAt ?? new Date();
    const path = this.reportPath(input.task.taskSlug, generatedAt);
    await this.fs.write(path, this.render({ ...input, generatedAt }));
    return path;
  }

  private renderBody(input: ReportInput): string {
    const list = (paths: readonly string[]): string =>
      paths.length > 0 ? paths.map((p) => `- ${p}`).join('\n') : 'None';

    return `# Summary
The agent executed the plan \`${input.planFile}\` on branch \`${input.task.branchName}\` in ${input.task.stepCount} tool step(s). ${this.describePullRequest(input.pullRequest)}

# Files Changed
## Created
${list(input.mutations.created)}

## Modified
${list(input.mutations.modified)}

# Key Changes
- ${input.title}
- Automated implementation of the steps described in the plan.

# Technical Decisions
- Files were edited directly through the tool protocol.
- The existing project structure was kept.

# Testing Notes
- Check the pull request for CI results.
- Manual review of the changed files is recommended.
`;
  }

  private describePullRequest(pullRequest: PullRequestResult): string {
    switch (pullRequest.state) {
      case 'created':
        return `Pull request: ${pullRequest.url}`;
      case 'updated':
        return 'The existing pull request was updated with the new commits.';
      case 'failed':
        return `Submitting the changes failed: ${pullRequest.error}`;
    }
  }
}
