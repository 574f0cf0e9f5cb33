import { describe, it, expect } from 'vitest';
import matter from 'gray-matter';
import { ReportGenerator, formatTimestamp, formatYymmdd, type ReportInput } from '../report-generator.js';
import type { Task } from '../types.js';
import { FIXED_DATE, MemoryFileSystem } from './fakes.js';

const task: Task = {
  id: 'task-1',
  planPath: 'ai-docs/add-login.md',
  taskSlug: 'add-login',
  branchName: 'devbot/add-login-1792418580',
  startTime: FIXED_DATE,
  stepCount: 4,
  status: 'report_pending',
};

const input = (overrides: Partial<ReportInput> = {}): ReportInput => ({
  task,
  planFile: 'ai-docs/add-login.md',
  title: 'Add login form',
  mutations: { created: ['src/login.ts', 'src/login.css'], modified: ['src/app.ts'] },
  pullRequest: { state: 'created', url: 'https://github.com/acme/widgets/pull/12' },
  generatedAt: FIXED_DATE,
  ...overrides,
});

describe('formatters', () => {
  it('should format the date prefix as yymmdd', () => {
    expect(formatYymmdd(FIXED_DATE)).toBe('261019');
    expect(formatYymmdd(new Date(2030, 0, 5))).toBe('300105');
  });

  it('should format timestamps to the minute', () => {
    expect(formatTimestamp(FIXED_DATE)).toBe('2026-10-19 14:03');
  });
});

describe('ReportGenerator', () => {
  const generator = new ReportGenerator(new MemoryFileSystem(), { reportsDir: 'ai-plans', project: 'acme/widgets' });

  it('should name reports by date and task slug', () => {
    expect(generator.reportPath('add-login', FIXED_DATE)).toBe('ai-plans/261019__IMPLEMENTATION_REPORT__add-login.md');
  });

  it('should write front matter describing the task', () => {
    const { data } = matter(generator.render(input()));

    expect(data).toEqual({
      filename: 'ai-plans/261019__IMPLEMENTATION_REPORT__add-login.md',
      title: 'Report: add-login',
      createdAt: '2026-10-19 14:03',
      updatedAt: '2026-10-19 14:03',
      plan_file: 'ai-docs/add-login.md',
      project: 'acme/widgets',
      branch: 'devbot/add-login-1792418580',
      status: 'completed',
      files_created: 2,
      files_modified: 1,
      files_deleted: 0,
      tags: ['report', 'automated'],
      documentType: 'IMPLEMENTATION_REPORT',
      pull_request: 'https://github.com/acme/widgets/pull/12',
    });
  });

  it('should list changed files in the body', () => {
    const { content } = matter(generator.render(input()));

    expect(content).toContain('## Created\n- src/login.ts\n- src/login.css\n\n## Modified\n- src/app.ts\n');
    expect(content).toContain('# Key Changes\n- Add login form\n');
    expect(content).toContain('in 4 tool step(s). Pull request: https://github.com/acme/widgets/pull/12');
  });

  it('should say None for an empty section', () => {
    const { content } = matter(generator.render(input({ mutations: { created: [], modified: ['src/app.ts'] } })));
    expect(content).toContain('## Created\nNone\n');
  });

  it('should mark failed submissions and omit the pull request link', () => {
    const { data, content } = matter(
      generator.render(input({ pullRequest: { state: 'failed', error: 'push rejected' } }))
    );

    expect(data.status).toBe('pr_failed');
    expect(data).not.toHaveProperty('pull_request');
    expect(content).toContain('Submitting the changes failed: push rejected');
  });

  it('should note an updated pull request for review iterations', () => {
    const { data, content } = matter(
      generator.render(input({ planFile: 'review:devbot/add-login-1792418580', pullRequest: { state: 'updated' } }))
    );

    expect(data.plan_file).toBe('review:devbot/add-login-1792418580');
    expect(data.status).toBe('completed');
    expect(content).toContain('The existing pull request was updated with the new commits.');
  });

  it('should write the rendered report and return its path', async () => {
    const fs = new MemoryFileSystem();
    const writer = new ReportGenerator(fs, { reportsDir: 'docs/reports', project: 'acme/widgets' });

    const path = await writer.write(input());

    expect(path).toBe('docs/reports/261019__IMPLEMENTATION_REPORT__add-login.md');
    expect(fs.files.get(path)).toBe(writer.render(input()));
  });
});
