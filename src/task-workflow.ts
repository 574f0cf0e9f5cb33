import { randomUUID } from 'crypto';
import { BranchNamer } from './branch-namer.js';
import { ConversationSession, MAX_STEPS } from './conversation-session.js';
import { errorMessage } from './errors.js';
import { MultiLogger, silentLogger, type Logger } from './logger.js';
import { MutationTracker } from './mutation-tracker.js';
import { slugFromBranch, slugFromPlanPath } from './plan-loader.js';
import { buildFeedbackMessage, buildPlanMessage } from './prompt-builder.js';
import { ReportGenerator } from './report-generator.js';
import { TaskLogStore } from './task-log.js';
import { ToolDispatcher } from './tool-dispatcher.js';
import type {
  AbortReason,
  DoneCommand,
  Feedback,
  FileSystem,
  Model,
  PlanSource,
  PullRequestResult,
  Task,
  TaskOutcome,
  TaskStatus,
  VersionControl,
} from './types.js';

const TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  init: ['branched', 'aborted'],
  branched: ['iterating', 'aborted'],
  iterating: ['finalizing', 'aborted'],
  finalizing: ['report_pending'],
  report_pending: ['done'],
  done: [],
  aborted: [],
};

export interface TaskWorkflowDeps {
  fs: FileSystem;
  plans: PlanSource;
  vcs: VersionControl;
  model: Model;
  reports: ReportGenerator;
  branchPrefix: string;
  excludeDirs?: readonly string[];
  maxSteps?: number;
  logger?: Logger;
  /** When set, each task also logs to .devbot/logs/{taskSlug}.log */
  taskLogs?: TaskLogStore;
  branchNamer?: BranchNamer;
  clock?: () => Date;
}

interface IterationContext {
  task: Task;
  seed: string;
  planFile: string;
  /** PR body when DONE carries no description */
  fallbackBody: string;
  /** False when resuming a branch whose PR already exists */
  createPullRequest: boolean;
  logger: Logger;
}

/**
 * Process exit code for a finished task: 0 done, 2 aborted, 3 done but not submitted
 */
export function exitCodeFor(outcome: TaskOutcome): number {
  if (outcome.status === 'aborted') {
    return 2;
  }
  return outcome.pullRequest.state === 'failed' ? 3 : 0;
}

/**
 * State machine from plan ingestion to report emission:
 * init -> branched -> iterating -> finalizing -> report_pending -> done,
 * with aborted reachable before finalize
 */
export class TaskWorkflow {
  private logger: Logger;
  private branchNamer: BranchNamer;
  private clock: () => Date;

  constructor(private readonly deps: TaskWorkflowDeps) {
    this.logger = deps.logger ?? silentLogger;
    this.clock = deps.clock ?? (() => new Date());
    this.branchNamer = deps.branchNamer ?? new BranchNamer(this.clock);
  }

  /**
   * Execute a plan on a fresh branch and submit the result as a pull request
   */
  async run(planPath: string): Promise<TaskOutcome> {
    const taskSlug = slugFromPlanPath(planPath);
    const task = this.createTask(planPath, taskSlug, this.branchNamer.next(this.deps.branchPrefix, taskSlug));

    return this.withTaskLog(task, async (logger) => {
      logger.info(`📋 Starting task: ${task.taskSlug}`);

      let plan: string;
      try {
        plan = (await this.deps.plans.load(planPath)).content;
      } catch (error) {
        return this.abort(task, 'PlanUnreadable', error, logger);
      }

      try {
        await this.deps.vcs.createBranch(task.branchName);
      } catch (error) {
        return this.abort(task, 'BranchCreationFailed', error, logger);
      }
      this.transition(task, 'branched', logger);

      return this.iterate({
        task,
        seed: buildPlanMessage(plan),
        planFile: planPath,
        fallbackBody: plan,
        createPullRequest: true,
        logger,
      });
    });
  }

  /**
   * Resume work on an existing branch after a review requested changes.
   * Runs the same loop as a plan; the existing PR picks up the pushed commits.
   */
  async iterateOnFeedback(feedback: Feedback): Promise<TaskOutcome> {
    const task = this.createTask(`review:${feedback.branchName}`, slugFromBranch(feedback.branchName), feedback.branchName);

    return this.withTaskLog(task, async (logger) => {
      logger.info(`🔄 Iterating on ${feedback.branchName} with feedback`);

      try {
        await this.deps.vcs.checkoutBranch(feedback.branchName);
      } catch (error) {
        return this.abort(task, 'CheckoutFailed', error, logger);
      }
      this.transition(task, 'branched', logger);

      return this.iterate({
        task,
        seed: buildFeedbackMessage(feedback.branchName, feedback.reviewBody),
        planFile: task.planPath,
        fallbackBody: feedback.reviewBody,
        createPullRequest: false,
        logger,
      });
    });
  }

  private async iterate(ctx: IterationContext): Promise<TaskOutcome> {
    const { task, logger } = ctx;
    const tracker = new MutationTracker(this.deps.fs);
    const dispatcher = new ToolDispatcher(this.deps.fs, tracker, { excludeDirs: this.deps.excludeDirs, logger });
    const session = new ConversationSession(ctx.seed, this.deps.model, dispatcher, {
      maxSteps: this.deps.maxSteps,
      logger,
    });
    this.transition(task, 'iterating', logger);

    let done: DoneCommand | undefined;
    while (!done) {
      if (session.exhausted) {
        return this.abort(
          task,
          'StepLimitExceeded',
          `No DONE after ${session.stepCount} steps (limit ${Math.min(this.deps.maxSteps ?? MAX_STEPS, MAX_STEPS)})`,
          logger
        );
      }

      try {
        const result = await session.advance();
        if (result.kind === 'done') {
          done = result.command;
        }
      } catch (error) {
        return this.abort(task, 'ModelRequestFailed', error, logger);
      } finally {
        task.stepCount = session.stepCount;
      }
    }

    this.transition(task, 'finalizing', logger);
    const title = done.title || task.taskSlug;
    const pullRequest = await this.finalize(ctx, title, done.body ?? ctx.fallbackBody);

    this.transition(task, 'report_pending', logger);
    const mutations = tracker.snapshot();
    let reportPath: string | undefined;
    try {
      reportPath = await this.deps.reports.write({
        task,
        planFile: ctx.planFile,
        title,
        mutations,
        pullRequest,
        generatedAt: this.clock(),
      });
      logger.success(`📝 Report generated: ${reportPath}`);
    } catch (error) {
      logger.error(`Failed to write report: ${errorMessage(error)}`);
    }

    this.transition(task, 'done', logger);
    return { status: 'done', task, title, pullRequest, mutations, reportPath };
  }

  /**
   * Commit, push and open the PR. Failures are logged and reported back,
   * never thrown: the report is still written afterwards.
   */
  private async finalize(ctx: IterationContext, title: string, body: string): Promise<PullRequestResult> {
    const { task, logger } = ctx;
    try {
      await this.deps.vcs.commitAll(`Implemented: ${title}`);
      await this.deps.vcs.push(task.branchName);

      if (!ctx.createPullRequest) {
        logger.success(`✅ Pushed review fixes to ${task.branchName}`);
        return { state: 'updated' };
      }

      const url = await this.deps.vcs.createPullRequest(task.branchName, title, body);
      logger.success(`✅ PR created: ${url}`);
      return { state: 'created', url };
    } catch (error) {
      const message = errorMessage(error);
      logger.error(`❌ Error finishing task: ${message}`);
      return { state: 'failed', error: message };
    }
  }

  private createTask(planPath: string, taskSlug: string, branchName: string): Task {
    return {
      id: randomUUID(),
      planPath,
      taskSlug,
      branchName,
      startTime: this.clock(),
      stepCount: 0,
      status: 'init',
    };
  }

  private transition(task: Task, next: TaskStatus, logger: Logger): void {
    if (!TRANSITIONS[task.status].includes(next)) {
      throw new Error(`Invalid task transition ${task.status} -> ${next}`);
    }
    logger.debug(`   ${task.status} -> ${next}`);
    task.status = next;
  }

  private abort(task: Task, reason: AbortReason, cause: unknown, logger: Logger): TaskOutcome {
    const detail = typeof cause === 'string' ? cause : errorMessage(cause);
    this.transition(task, 'aborted', logger);
    logger.error(`❌ Task aborted (${reason}): ${detail}`);
    return { status: 'aborted', task, reason, detail };
  }

  private async withTaskLog(task: Task, body: (logger: Logger) => Promise<TaskOutcome>): Promise<TaskOutcome> {
    if (!this.deps.taskLogs) {
      return body(this.logger);
    }

    const log = await this.deps.taskLogs.open(task);
    let outcome: TaskOutcome | undefined;
    try {
      outcome = await body(new MultiLogger([this.logger, log]));
      return outcome;
    } finally {
      await log.close(outcome?.status === 'aborted' ? `aborted (${outcome.reason})` : (outcome?.status ?? 'failed'));
    }
  }
}
