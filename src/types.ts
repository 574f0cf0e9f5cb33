/**
 * Task lifecycle states.
 * `aborted` is terminal and only reachable from init, branched and iterating.
 */
export type TaskStatus = 'init' | 'branched' | 'iterating' | 'finalizing' | 'report_pending' | 'done' | 'aborted';

/**
 * Why a task stopped before reaching finalize
 */
export type AbortReason =
  | 'PlanUnreadable'
  | 'BranchCreationFailed'
  | 'CheckoutFailed'
  | 'StepLimitExceeded'
  | 'ModelRequestFailed';

/**
 * One end-to-end execution of a plan (or of review feedback on an existing branch)
 */
export interface Task {
  id: string;
  planPath: string;
  taskSlug: string;
  branchName: string;
  startTime: Date;
  stepCount: number;
  status: TaskStatus;
}

export type MessageRole = 'user' | 'assistant';

export interface TranscriptMessage {
  readonly role: MessageRole;
  readonly content: string;
}

export type Transcript = readonly TranscriptMessage[];

/**
 * A single tool request decoded from a model reply
 */
export type ToolCommand =
  | { readonly type: 'ReadFile'; readonly path: string }
  | { readonly type: 'WriteFile'; readonly path: string; readonly content: string }
  | { readonly type: 'ListFiles'; readonly path: string }
  | { readonly type: 'Done'; readonly title: string; readonly body?: string }
  | { readonly type: 'Unrecognized'; readonly rawText: string };

export type DoneCommand = Extract<ToolCommand, { type: 'Done' }>;

export type DispatchableCommand = Exclude<ToolCommand, DoneCommand>;

/**
 * A reply that named a command but could not be decoded
 */
export type ParseError =
  | { readonly type: 'MalformedPayload'; readonly keyword: 'WRITE_FILE' | 'DONE' }
  | { readonly type: 'MissingArgument'; readonly keyword: 'READ_FILE' | 'WRITE_FILE' };

export type ParseResult = { ok: true; command: ToolCommand } | { ok: false; error: ParseError };

export type MutationKind = 'created' | 'modified';

export interface MutationSnapshot {
  readonly created: readonly string[];
  readonly modified: readonly string[];
}

/**
 * Review feedback that resumes work on an existing branch
 */
export interface Feedback {
  branchName: string;
  reviewBody: string;
}

export type PullRequestResult =
  | { state: 'created'; url: string }
  | { state: 'updated' }
  | { state: 'failed'; error: string };

export type TaskOutcome =
  | {
      status: 'done';
      task: Task;
      title: string;
      pullRequest: PullRequestResult;
      mutations: MutationSnapshot;
      reportPath?: string;
    }
  | {
      status: 'aborted';
      task: Task;
      reason: AbortReason;
      detail: string;
    };

/**
 * File-system capability the core reads, writes and lists through.
 * `read` rejects with FileNotFoundError when the path does not exist.
 */
export interface FileSystem {
  read(path: string): Promise<string>;
  write(path: string, content: string): Promise<void>;
  list(path: string, options?: { excludeDirs?: readonly string[] }): Promise<string[]>;
}

/**
 * Version-control capability: local branching plus remote pull requests
 */
export interface VersionControl {
  /** Check out and update the default branch, then create and check out `name` */
  createBranch(name: string): Promise<void>;
  checkoutBranch(name: string): Promise<void>;
  commitAll(message: string): Promise<void>;
  push(name: string): Promise<void>;
  /** Returns the URL of the created pull request */
  createPullRequest(branch: string, title: string, body: string): Promise<string>;
}

/**
 * Language model capability: one completion over the whole transcript
 */
export interface Model {
  complete(transcript: Transcript): Promise<string>;
}

export interface Plan {
  path: string;
  slug: string;
  content: string;
}

export interface PlanSource {
  load(planPath: string): Promise<Plan>;
}
