#!/usr/bin/env node

import { Command } from 'commander';
import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { join, relative, resolve } from 'path';
import chalk from 'chalk';
import { ClaudeModel } from './claude-model.js';
import { loadConfig, type Config } from './config-loader.js';
import { NodeFileSystem } from './file-system.js';
import { ConsoleLogger, type Logger } from './logger.js';
import { PlanLoader } from './plan-loader.js';
import { PlanWatcher } from './plan-watcher.js';
import { PromptBuilder } from './prompt-builder.js';
import { ReportGenerator } from './report-generator.js';
import { TaskLogStore } from './task-log.js';
import { TaskQueue } from './task-queue.js';
import { TaskWorkflow, exitCodeFor } from './task-workflow.js';
import { GitHubVersionControl } from './version-control.js';
import { WebhookServer } from './webhook-server.js';
import { errorMessage } from './errors.js';

interface Runtime {
  config: Config;
  logger: Logger;
  queue: TaskQueue;
  workflow: TaskWorkflow;
}

const program = new Command();

program.name('devbot').description('Turns markdown plans into branches, pull requests and implementation reports').version('0.1.0');

function projectDirOption(): string {
  const { projectDir } = program.opts<{ projectDir: string }>();
  return resolve(process.cwd(), projectDir || '.');
}

/**
 * Load configuration once and wire the collaborators for one working tree
 */
async function bootstrap(projectDir: string): Promise<Runtime> {
  const result = loadConfig(projectDir);
  if (!result.ok) {
    console.error(chalk.red('Configuration error:'), result.error);
    process.exit(1);
  }

  const config = result.config;
  const logger = new ConsoleLogger(process.env.DEVBOT_VERBOSE === '1');
  const fs = new NodeFileSystem(projectDir);
  const systemPrompt = await new PromptBuilder(projectDir).buildSystemPrompt();

  const workflow = new TaskWorkflow({
    fs,
    plans: new PlanLoader(projectDir),
    vcs: new GitHubVersionControl({
      projectDir,
      defaultBranch: config.defaultBranch,
      repoName: config.repoName,
      githubToken: config.githubToken,
      excludeFromCommit: [config.reportsDir],
      logger,
    }),
    model: new ClaudeModel(systemPrompt, { model: config.model, projectDir, spinner: Boolean(process.stdout.isTTY) }),
    reports: new ReportGenerator(fs, { reportsDir: config.reportsDir, project: config.repoName }),
    branchPrefix: config.branchPrefix,
    excludeDirs: config.excludedDirs,
    maxSteps: config.maxSteps,
    logger,
    taskLogs: new TaskLogStore(projectDir),
  });

  return { config, logger, queue: new TaskQueue(logger), workflow };
}

function onShutdown(stop: () => Promise<void>): void {
  process.on('SIGINT', () => {
    stop()
      .then(() => {
        console.log(chalk.gray('\n👋 Stopped'));
        process.exit(0);
      })
      .catch((error) => {
        console.error(chalk.red('Error during shutdown:'), errorMessage(error));
        process.exit(1);
      });
  });
}

/**
 * Watch command - run each new plan dropped into the plans directory
 */
program
  .command('watch')
  .description('Watch the plans directory and run each new plan')
  .action(async () => {
    try {
      const projectDir = projectDirOption();
      const { config, logger, queue, workflow } = await bootstrap(projectDir);

      const watcher = new PlanWatcher({
        plansDir: join(projectDir, config.plansDir),
        debounceMs: config.watchDebounceMs,
        logger,
        onPlan: (planPath) => {
          queue
            .enqueue(`plan:${planPath}`, () => workflow.run(relative(projectDir, planPath)))
            .catch((error) => logger.error(`Plan ${planPath} failed: ${errorMessage(error)}`));
        },
      });

      await watcher.start();
      onShutdown(() => watcher.stop());
    } catch (error) {
      console.error(chalk.red('Error:'), errorMessage(error));
      process.exit(1);
    }
  });

/**
 * Run command - execute one plan immediately
 */
program
  .command('run <plan_path>')
  .description('Execute a specific plan immediately')
  .action(async (planPath: string) => {
    try {
      const projectDir = projectDirOption();
      const absolute = resolve(process.cwd(), planPath);
      if (!existsSync(absolute)) {
        console.error(chalk.red(`Plan file ${planPath} not found.`));
        process.exit(1);
      }

      const { queue, workflow } = await bootstrap(projectDir);
      const outcome = await queue.enqueue(`plan:${planPath}`, () => workflow.run(relative(projectDir, absolute)));
      process.exit(exitCodeFor(outcome));
    } catch (error) {
      console.error(chalk.red('Error:'), errorMessage(error));
      process.exit(1);
    }
  });

/**
 * Server command - start the review webhook listener
 */
program
  .command('server')
  .description('Start the webhook listener for review feedback')
  .option('-p, --port <number>', 'Port to listen on', '8000')
  .action(async (options: { port: string }) => {
    try {
      const port = parseInt(options.port, 10);
      if (!Number.isInteger(port) || port < 0 || port > 65535) {
        console.error(chalk.red('Error: --port must be a valid port number'));
        process.exit(1);
      }

      const { logger, queue, workflow } = await bootstrap(projectDirOption());
      const server = new WebhookServer({
        port,
        queue,
        logger,
        iterate: (feedback) => workflow.iterateOnFeedback(feedback),
      });

      await server.start();
      onShutdown(() => server.stop());
    } catch (error) {
      console.error(chalk.red('Error:'), errorMessage(error));
      process.exit(1);
    }
  });

/**
 * Log command - show task logs
 */
program
  .command('log')
  .description('Show the latest or a specific task log')
  .option('-t, --task <slug>', 'Task slug to view')
  .option('-n, --lines <num>', 'Show last N lines', '50')
  .action(async (options: { task?: string; lines: string }) => {
    try {
      const store = new TaskLogStore(projectDirOption());
      const logPath = options.task ? store.getLogPath(options.task) : await store.latestLogPath();

      if (!logPath || !existsSync(logPath)) {
        console.log(chalk.yellow('⚠️  No task logs found. Run a plan first.'));
        return;
      }

      const lines = (await readFile(logPath, 'utf-8')).split('\n');
      const numLines = parseInt(options.lines, 10) || 50;
      const startLine = Math.max(0, lines.length - numLines);
      console.log(chalk.blue(`📋 Latest logs from: ${logPath}\n`));

      if (startLine > 0) {
        console.log(chalk.gray(`... (showing last ${numLines} of ${lines.length} lines) ...\n`));
      }

      lines.slice(startLine).forEach((line) => {
        if (line.includes('[ERROR]')) {
          console.log(chalk.red(line));
        } else if (line.includes('[WARN]')) {
          console.log(chalk.yellow(line));
        } else if (line.includes('================')) {
          console.log(chalk.blue(line));
        } else if (line.includes('Started:') || line.includes('Ended:')) {
          console.log(chalk.cyan(line));
        } else {
          console.log(line);
        }
      });
    } catch (error) {
      console.error(chalk.red('Error:'), errorMessage(error));
      process.exit(1);
    }
  });

program.option('--project-dir <dir>', 'Target project directory', '.');

program.parseAsync().catch((error) => {
  console.error(chalk.red('Error:'), errorMessage(error));
  process.exit(1);
});
