import { join, resolve } from 'path';
import { readFileSync, existsSync } from 'fs';
import { parse as parseDotenv } from 'dotenv';
import type { z } from 'zod';
import { errorMessage } from './errors.js';
import { ConfigFileSchema, EnvSchema } from './schemas.js';

export type Config = z.infer<typeof ConfigFileSchema> & {
  projectDir: string;
  githubToken: string;
  repoName: string;
};

export type ConfigResult = { ok: true; config: Config } | { ok: false; error: string };

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const field = issue.path.join('.');
      return field && !issue.message.startsWith(field) ? `${field}: ${issue.message}` : issue.message;
    })
    .join('; ');
}

/**
 * Reads .devbot/.env and .devbot/.devbotrc for a project
 */
export class ConfigLoader {
  private devbotDir: string;
  private projectDir: string;

  constructor(projectDir: string) {
    this.projectDir = resolve(projectDir);
    this.devbotDir = join(this.projectDir, '.devbot');
  }

  /**
   * Load and validate configuration once at process start. Never throws.
   */
  load(env: NodeJS.ProcessEnv = process.env): ConfigResult {
    // Values already in the environment win over the .env file
    const envPath = join(this.devbotDir, '.env');
    if (existsSync(envPath)) {
      try {
        const parsed = parseDotenv(readFileSync(envPath, 'utf-8'));
        for (const [key, value] of Object.entries(parsed)) {
          if (env[key] === undefined) {
            env[key] = value;
          }
        }
      } catch (error) {
        return { ok: false, error: `Failed to read .devbot/.env: ${errorMessage(error)}` };
      }
    }

    const rcPath = join(this.devbotDir, '.devbotrc');
    let rcConfig: unknown = {};
    if (existsSync(rcPath)) {
      try {
        rcConfig = JSON.parse(readFileSync(rcPath, 'utf-8'));
      } catch (error) {
        return { ok: false, error: `Failed to parse .devbotrc: ${errorMessage(error)}` };
      }
    }

    const file = ConfigFileSchema.safeParse(rcConfig);
    if (!file.success) {
      return { ok: false, error: `Invalid .devbotrc: ${formatIssues(file.error)}` };
    }

    const vars = EnvSchema.safeParse(env);
    if (!vars.success) {
      return { ok: false, error: formatIssues(vars.error) };
    }

    return {
      ok: true,
      config: {
        ...file.data,
        projectDir: this.projectDir,
        githubToken: vars.data.GITHUB_TOKEN,
        repoName: vars.data.REPO_NAME,
      },
    };
  }
}

export function loadConfig(projectDir: string, env: NodeJS.ProcessEnv = process.env): ConfigResult {
  return new ConfigLoader(projectDir).load(env);
}
