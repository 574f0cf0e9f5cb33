import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { join } from 'path';
import { PAYLOAD_CLOSE, PAYLOAD_OPEN } from './protocol-parser.js';
import type { Transcript } from './types.js';

/**
 * First message of a plan-driven task
 */
export function buildPlanMessage(plan: string): string {
  return `Here is the plan:\n${plan}\n\nList the files to understand the repo structure first.`;
}

/**
 * First message of a feedback iteration on an existing branch
 */
export function buildFeedbackMessage(branchName: string, feedback: string): string {
  return (
    `We submitted a PR from branch ${branchName} but received review feedback. Fix the code.\n` +
    `Feedback: ${feedback}\n\n` +
    'List the files to find what needs to change first.'
  );
}

/**
 * Flatten the transcript into one prompt, oldest message first
 */
export function renderTranscript(transcript: Transcript): string {
  const turns = transcript.map((message) => `[${message.role.toUpperCase()}]\n\n${message.content}`);
  return `${turns.join('\n\n---\n\n')}\n\n---\n\nReply as the assistant. Your first line must be a tool command.`;
}

/**
 * Builds the system prompt describing the tool protocol
 */
export class PromptBuilder {
  private systemPromptPath: string;

  constructor(projectDir: string = '.') {
    this.systemPromptPath = join(projectDir, '.devbot', 'templates', 'system-prompt.md');
  }

  /**
   * Core protocol instructions, followed by the project template at
   * .devbot/templates/system-prompt.md when one exists
   */
  async buildSystemPrompt(): Promise<string> {
    const corePrompt = this.getProtocolPrompt();

    if (existsSync(this.systemPromptPath)) {
      const projectTemplate = await readFile(this.systemPromptPath, 'utf-8');
      return corePrompt + '\n\n' + projectTemplate;
    }

    return corePrompt;
  }

  getProtocolPrompt(): string {
    return `You are an autonomous senior software engineer.
Your goal is to implement the user's plan by reading code and modifying files.

You have the following tools, used through plain-text commands:
1. READ_FILE <path>
2. WRITE_FILE <path>
${PAYLOAD_OPEN}
full file content
${PAYLOAD_CLOSE}
3. LIST_FILES [<path>]
4. DONE <pull request title>
${PAYLOAD_OPEN}
pull request description
${PAYLOAD_CLOSE}

Rules:
- The command must be the FIRST line of your reply. Use one command per reply.
- WRITE_FILE replaces the whole file, so always send the complete content.
- Paths are relative to the repository root.
- Reply with DONE only when the plan is fully implemented. The description block is optional.`;
  }
}
