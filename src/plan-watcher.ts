import { watch, type FSWatcher } from 'chokidar';
import { mkdir } from 'fs/promises';
import { errorMessage } from './errors.js';
import { silentLogger, type Logger } from './logger.js';

export interface PlanWatcherOptions {
  plansDir: string;
  /** Delay after a file appears before it is handed over, so writers can finish */
  debounceMs: number;
  onPlan: (planPath: string) => void;
  logger?: Logger;
}

/**
 * Watches the plans directory and reports each new markdown plan once
 */
export class PlanWatcher {
  private watcher: FSWatcher | null = null;
  private timers = new Map<string, NodeJS.Timeout>();
  private logger: Logger;

  constructor(private readonly options: PlanWatcherOptions) {
    this.logger = options.logger ?? silentLogger;
  }

  async start(): Promise<void> {
    await mkdir(this.options.plansDir, { recursive: true });

    this.watcher = watch(this.options.plansDir, { ignoreInitial: true, depth: 0 });
    this.watcher.on('add', (path: string) => this.notifyCreated(path));
    this.watcher.on('error', (error: unknown) => {
      this.logger.error(`Watcher error: ${errorMessage(error)}`);
    });

    await new Promise<void>((resolve) => this.watcher?.once('ready', () => resolve()));
    this.logger.info(`👀 Watching ${this.options.plansDir} for plans...`);
  }

  /**
   * Schedule a created file; repeated events for the same path restart the delay
   */
  notifyCreated(path: string): void {
    if (!path.toLowerCase().endsWith('.md')) {
      return;
    }

    const existing = this.timers.get(path);
    if (existing) {
      clearTimeout(existing);
    } else {
      this.logger.info(`📄 New plan detected: ${path}`);
    }

    this.timers.set(
      path,
      setTimeout(() => {
        this.timers.delete(path);
        this.options.onPlan(path);
      }, this.options.debounceMs)
    );
  }

  async stop(): Promise<void> {
    this.timers.forEach((timer) => clearTimeout(timer));
    this.timers.clear();
    await this.watcher?.close();
    this.watcher = null;
  }
}
