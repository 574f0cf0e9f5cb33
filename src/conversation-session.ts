import { silentLogger, type Logger } from './logger.js';
import { parseReply } from './protocol-parser.js';
import { ToolDispatcher } from './tool-dispatcher.js';
import type { DoneCommand, Model, Transcript, TranscriptMessage } from './types.js';

/**
 * Hard bound on model turns per task
 */
export const MAX_STEPS = 15;

export type AdvanceResult = { kind: 'done'; command: DoneCommand } | { kind: 'step'; observation: string };

/**
 * Owns the transcript and the step counter; drives one model turn at a time
 */
export class ConversationSession {
  private readonly messages: TranscriptMessage[] = [];
  private steps = 0;
  private readonly maxSteps: number;
  private readonly logger: Logger;

  constructor(
    seed: string,
    private readonly model: Model,
    private readonly dispatcher: ToolDispatcher,
    options: { maxSteps?: number; logger?: Logger } = {}
  ) {
    this.messages.push({ role: 'user', content: seed });
    this.maxSteps = Math.min(options.maxSteps ?? MAX_STEPS, MAX_STEPS);
    this.logger = options.logger ?? silentLogger;
  }

  get transcript(): Transcript {
    return [...this.messages];
  }

  get stepCount(): number {
    return this.steps;
  }

  get exhausted(): boolean {
    return this.steps >= this.maxSteps;
  }

  /**
   * Request one completion, record it, and either hand back a DONE command
   * or dispatch the tool and append its observation
   */
  async advance(): Promise<AdvanceResult> {
    if (this.exhausted) {
      throw new Error(`Step limit of ${this.maxSteps} reached`);
    }

    const reply = await this.model.complete(this.transcript);
    this.messages.push({ role: 'assistant', content: reply });
    this.logger.debug(`[AI]: ${reply.slice(0, 100)}...`);

    const parsed = parseReply(reply);
    let observation: string;
    if (!parsed.ok) {
      observation = this.dispatcher.describeParseError(parsed.error);
    } else {
      const command = parsed.command;
      if (command.type === 'Done') {
        return { kind: 'done', command };
      }
      observation = await this.dispatcher.dispatch(command);
    }

    this.messages.push({ role: 'user', content: `Tool Output:\n${observation}` });
    this.steps++;
    this.logger.info(`  Step ${this.steps}/${this.maxSteps}`);
    return { kind: 'step', observation };
  }
}
