import { readFile } from 'fs/promises';
import { basename, resolve } from 'path';
import type { Plan, PlanSource } from './types.js';

/**
 * Derive a branch-safe slug, e.g. "ai-docs/Add Login.md" -> "add-login"
 */
export function slugFromPlanPath(planPath: string): string {
  return slugify(basename(planPath).replace(/\.md$/i, ''));
}

/**
 * Slug of a feedback iteration: the last segment of the branch name
 */
export function slugFromBranch(branchName: string): string {
  return slugify(branchName.split('/').pop() ?? branchName);
}

export function slugify(value: string): string {
  const slug = value
    .toLowerCase()
    .replace(/[^a-z0-9._-]+/g, '-')
    .replace(/\.{2,}/g, '.')
    .replace(/^[-.]+|[-.]+$/g, '')
    .substring(0, 50);
  return slug || 'task';
}

/**
 * Loads plan markdown files, resolving relative paths against the project directory
 */
export class PlanLoader implements PlanSource {
  private projectDir: string;

  constructor(projectDir: string = '.') {
    this.projectDir = resolve(projectDir);
  }

  async load(planPath: string): Promise<Plan> {
    const content = await readFile(resolve(this.projectDir, planPath), 'utf-8');

    return {
      path: planPath,
      slug: slugFromPlanPath(planPath),
      content,
    };
  }
}
