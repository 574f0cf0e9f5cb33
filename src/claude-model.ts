import {
  query,
  type SDKMessage,
  type SDKAssistantMessage,
  type SDKResultMessage,
} from '@anthropic-ai/claude-agent-sdk';
import ora from 'ora';
import { renderTranscript } from './prompt-builder.js';
import type { Model, Transcript } from './types.js';

const isAssistantMessage = (msg: SDKMessage): msg is SDKAssistantMessage => msg.type === 'assistant';

const isResultMessage = (msg: SDKMessage): msg is SDKResultMessage => msg.type === 'result';

/**
 * Built-in agent tools. The protocol is text only, so all of them are off.
 */
const AGENT_TOOLS = [
  'Bash',
  'BashOutput',
  'Edit',
  'Glob',
  'Grep',
  'KillShell',
  'MultiEdit',
  'NotebookEdit',
  'Read',
  'Task',
  'TodoWrite',
  'WebFetch',
  'WebSearch',
  'Write',
];

export interface ClaudeModelOptions {
  model: string;
  projectDir: string;
  /** Per request, default 5 minutes */
  timeoutMs?: number;
  /** Show a spinner while waiting (interactive runs) */
  spinner?: boolean;
}

/**
 * Model collaborator backed by the Claude Agent SDK, used for single-turn,
 * tool-less completions over the rendered transcript
 */
export class ClaudeModel implements Model {
  private timeoutMs: number;

  constructor(
    private readonly systemPrompt: string,
    private readonly options: ClaudeModelOptions
  ) {
    this.timeoutMs = options.timeoutMs ?? 5 * 60 * 1000;
  }

  async complete(transcript: Transcript): Promise<string> {
    const spinner = ora({ text: 'Waiting for model...', isEnabled: this.options.spinner ?? true }).start();
    const abortController = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    try {
      const messages = query({
        prompt: renderTranscript(transcript),
        options: {
          model: this.options.model,
          cwd: this.options.projectDir,
          systemPrompt: this.systemPrompt,
          maxTurns: 1,
          allowedTools: [],
          disallowedTools: AGENT_TOOLS,
          settingSources: [],
          abortController,
        },
      });

      const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
          abortController.abort();
          reject(new Error(`Model request timed out after ${this.timeoutMs / 1000} seconds`));
        }, this.timeoutMs);
      });

      const reply = await Promise.race([this.collectReply(messages), timeout]);
      spinner.stop();
      return reply;
    } catch (error) {
      spinner.fail('Model request failed');
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Prefer the final result text; fall back to the assistant text blocks
   */
  private async collectReply(messages: AsyncIterable<SDKMessage>): Promise<string> {
    let text = '';

    for await (const message of messages) {
      if (isAssistantMessage(message) && Array.isArray(message.message?.content)) {
        for (const block of message.message.content) {
          if (block.type === 'text') {
            text += block.text;
          }
        }
      }

      if (isResultMessage(message)) {
        if (message.subtype === 'success') {
          return message.result || text;
        }
        if (text) {
          return text;
        }
        throw new Error(`Model request failed: ${message.subtype}`);
      }
    }

    if (!text) {
      throw new Error('Model returned no reply');
    }
    return text;
  }
}
