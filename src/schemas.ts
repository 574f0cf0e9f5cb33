import { z } from 'zod';
import { DEFAULT_EXCLUDED_DIRS } from './file-system.js';
import { MAX_STEPS } from './conversation-session.js';

/**
 * Schema for .devbot/.devbotrc
 */
export const ConfigFileSchema = z
  .object({
    branchPrefix: z
      .string()
      .regex(/^(?!-)[\w.-]+(\/[\w.-]+)*$/, 'must be a valid branch prefix')
      .default('devbot'),
    defaultBranch: z.string().min(1).default('main'),
    plansDir: z.string().min(1).default('ai-docs'),
    reportsDir: z.string().min(1).default('ai-plans'),
    model: z.string().min(1).default('claude-sonnet-4-5-20250929'),
    excludedDirs: z.array(z.string().min(1)).default([...DEFAULT_EXCLUDED_DIRS]),
    watchDebounceMs: z.number().int().nonnegative().default(1000),
    maxSteps: z.number().int().min(1).max(MAX_STEPS).default(MAX_STEPS),
  })
  .strict();

/**
 * Schema for the environment (process env plus .devbot/.env)
 */
export const EnvSchema = z
  .object({
    GITHUB_TOKEN: z.string({ required_error: 'GITHUB_TOKEN is missing' }).min(1, 'GITHUB_TOKEN is missing'),
    REPO_NAME: z
      .string({ required_error: 'REPO_NAME is missing' })
      .regex(/^[\w.-]+\/[\w.-]+$/, 'REPO_NAME must look like owner/repo'),
    ANTHROPIC_API_KEY: z.string().optional(),
    CLAUDE_CODE_OAUTH_TOKEN: z.string().optional(),
  })
  .refine((env) => Boolean(env.ANTHROPIC_API_KEY || env.CLAUDE_CODE_OAUTH_TOKEN), {
    message: 'ANTHROPIC_API_KEY is missing',
    path: ['ANTHROPIC_API_KEY'],
  });

/**
 * A git branch name that cannot be read as a command-line option
 */
export const BranchNameSchema = z
  .string()
  .min(1)
  .regex(/^(?!-)[\w./-]+$/, 'invalid branch name')
  .refine(
    (name) => !name.includes('..') && !name.includes('//') && !name.endsWith('/') && !name.endsWith('.lock'),
    'invalid branch name'
  );

/**
 * Schema for the GitHub `pull_request_review` event that triggers a feedback iteration
 */
export const ReviewSubmittedEventSchema = z.object({
  action: z.literal('submitted'),
  review: z.object({
    state: z.literal('changes_requested'),
    body: z.string().nullish(),
  }),
  pull_request: z.object({
    head: z.object({
      ref: BranchNameSchema,
    }),
  }),
});
