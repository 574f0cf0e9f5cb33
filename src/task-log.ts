import { createWriteStream, type WriteStream } from 'fs';
import { mkdir, readdir, readFile, stat } from 'fs/promises';
import { join } from 'path';
import { isNotFound } from './errors.js';
import type { Logger, LogLevel } from './logger.js';
import type { Task } from './types.js';

const RULE = '='.repeat(80);

/**
 * Manages per-task log files in the .devbot directory
 */
export class TaskLogStore {
  private logsDir: string;

  constructor(projectDir: string = '.') {
    this.logsDir = join(projectDir, '.devbot', 'logs');
  }

  /**
   * Get the log file path for a task
   */
  getLogPath(taskSlug: string): string {
    return join(this.logsDir, `${taskSlug}.log`);
  }

  async ensureLogsDir(): Promise<void> {
    await mkdir(this.logsDir, { recursive: true });
  }

  /**
   * Open (append) the log file of a task and write its header
   */
  async open(task: Task): Promise<TaskLogFile> {
    await this.ensureLogsDir();
    const stream = createWriteStream(this.getLogPath(task.taskSlug), { flags: 'a' });
    const log = new TaskLogFile(stream);
    log.writeRaw(
      `\n${RULE}\ndevbot task: ${task.taskSlug} (${task.id})\nBranch: ${task.branchName}\nStarted: ${task.startTime.toISOString()}\n${RULE}\n\n`
    );
    return log;
  }

  /**
   * Load a task log, null if it does not exist
   */
  async loadLog(taskSlug: string): Promise<string | null> {
    try {
      return await readFile(this.getLogPath(taskSlug), 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }
  }

  /**
   * Path of the most recently written log, null when there are none
   */
  async latestLogPath(): Promise<string | null> {
    let files: string[];
    try {
      files = await readdir(this.logsDir);
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }

    let latest: { path: string; mtimeMs: number } | null = null;
    for (const file of files.filter((f) => f.endsWith('.log'))) {
      const path = join(this.logsDir, file);
      const { mtimeMs } = await stat(path);
      if (!latest || mtimeMs > latest.mtimeMs) {
        latest = { path, mtimeMs };
      }
    }
    return latest?.path ?? null;
  }
}

/**
 * Plain-text logger bound to one task's log file
 */
export class TaskLogFile implements Logger {
  constructor(private readonly stream: WriteStream) {}

  writeRaw(text: string): void {
    this.stream.write(text);
  }

  private line(level: LogLevel, message: string): void {
    this.stream.write(`[${new Date().toISOString()}] [${level.toUpperCase()}] ${message}\n`);
  }

  debug(message: string): void {
    this.line('debug', message);
  }

  info(message: string): void {
    this.line('info', message);
  }

  success(message: string): void {
    this.line('success', message);
  }

  warn(message: string): void {
    this.line('warn', message);
  }

  error(message: string): void {
    this.line('error', message);
  }

  /**
   * Write the footer and flush the stream
   */
  async close(status: string): Promise<void> {
    this.writeRaw(`\n${RULE}\nTask ${status}\nEnded: ${new Date().toISOString()}\n${RULE}\n`);
    await new Promise<void>((resolve) => this.stream.end(() => resolve()));
  }
}
