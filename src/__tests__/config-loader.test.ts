import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigLoader, type ConfigResult } from '../config-loader.js';

const baseEnv = (): NodeJS.ProcessEnv => ({
  GITHUB_TOKEN: 'test-secret',
  REPO_NAME: 'acme/widgets',
  ANTHROPIC_API_KEY: 'test-secret',
});

const expectError = (result: ConfigResult): string => {
  if (result.ok) {
    throw new Error('expected a configuration error');
  }
  return result.error;
};

describe('ConfigLoader', () => {
  let projectDir: string;

  const writeDevbotFile = (name: string, content: string): void => {
    mkdirSync(join(projectDir, '.devbot'), { recursive: true });
    writeFileSync(join(projectDir, '.devbot', name), content);
  };

  beforeEach(() => {
    projectDir = mkdtempSync(join(tmpdir(), 'devbot-config-'));
  });

  afterEach(() => {
    rmSync(projectDir, { recursive: true, force: true });
  });

  it('should apply defaults when no files exist', () => {
    const result = new ConfigLoader(projectDir).load(baseEnv());

    expect(result).toEqual({
      ok: true,
      config: {
        branchPrefix: 'devbot',
        defaultBranch: 'main',
        plansDir: 'ai-docs',
        reportsDir: 'ai-plans',
        model: 'claude-sonnet-4-5-20250929',
        excludedDirs: ['.git', '__pycache__', '.venv', '.pytest_cache', 'node_modules', 'dist', '.devbot'],
        watchDebounceMs: 1000,
        maxSteps: 15,
        projectDir,
        githubToken: 'test-secret',
        repoName: 'acme/widgets',
      },
    });
  });

  it('should merge .devbotrc over the defaults', () => {
    writeDevbotFile('.devbotrc', JSON.stringify({ branchPrefix: 'bot', maxSteps: 8, excludedDirs: ['vendor'] }));

    const result = new ConfigLoader(projectDir).load(baseEnv());

    if (!result.ok) {
      throw new Error(result.error);
    }
    expect(result.config.branchPrefix).toBe('bot');
    expect(result.config.maxSteps).toBe(8);
    expect(result.config.excludedDirs).toEqual(['vendor']);
    expect(result.config.plansDir).toBe('ai-docs');
  });

  it('should fill missing variables from .devbot/.env without overriding the environment', () => {
    writeDevbotFile('.env', 'GITHUB_TOKEN=from-file\nREPO_NAME=acme/from-file\n');
    const env: NodeJS.ProcessEnv = { REPO_NAME: 'acme/widgets', CLAUDE_CODE_OAUTH_TOKEN: 'test-secret' };

    const result = new ConfigLoader(projectDir).load(env);

    if (!result.ok) {
      throw new Error(result.error);
    }
    expect(result.config.githubToken).toBe('from-file');
    expect(result.config.repoName).toBe('acme/widgets');
  });

  it('should report a missing GitHub token', () => {
    const env = baseEnv();
    delete env.GITHUB_TOKEN;

    expect(expectError(new ConfigLoader(projectDir).load(env))).toBe('GITHUB_TOKEN is missing');
  });

  it('should report a malformed repository name', () => {
    const env = { ...baseEnv(), REPO_NAME: 'widgets' };
    expect(expectError(new ConfigLoader(projectDir).load(env))).toBe('REPO_NAME must look like owner/repo');
  });

  it('should require model credentials', () => {
    const env = baseEnv();
    delete env.ANTHROPIC_API_KEY;

    expect(expectError(new ConfigLoader(projectDir).load(env))).toBe('ANTHROPIC_API_KEY is missing');
  });

  it('should reject a step limit above the hard bound', () => {
    writeDevbotFile('.devbotrc', JSON.stringify({ maxSteps: 20 }));

    expect(expectError(new ConfigLoader(projectDir).load(baseEnv()))).toBe(
      'Invalid .devbotrc: maxSteps: Number must be less than or equal to 15'
    );
  });

  it('should reject a branch prefix git could read as an option', () => {
    writeDevbotFile('.devbotrc', JSON.stringify({ branchPrefix: '--force' }));

    expect(expectError(new ConfigLoader(projectDir).load(baseEnv()))).toBe(
      'Invalid .devbotrc: branchPrefix: must be a valid branch prefix'
    );
  });

  it('should reject unknown keys', () => {
    writeDevbotFile('.devbotrc', JSON.stringify({ parallel: 3 }));

    expect(expectError(new ConfigLoader(projectDir).load(baseEnv()))).toMatch(/^Invalid \.devbotrc: Unrecognized key/);
  });

  it('should report unparseable JSON', () => {
    writeDevbotFile('.devbotrc', '{ not json');

    expect(expectError(new ConfigLoader(projectDir).load(baseEnv()))).toMatch(/^Failed to parse \.devbotrc: /);
  });
});
