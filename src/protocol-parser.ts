import type { ParseResult, ToolCommand } from './types.js';

export const PAYLOAD_OPEN = '<<<<';
export const PAYLOAD_CLOSE = '>>>>';

export const KEYWORDS = ['READ_FILE', 'WRITE_FILE', 'LIST_FILES', 'DONE'] as const;
export type Keyword = (typeof KEYWORDS)[number];

const COMMAND_LINE = /^(READ_FILE|WRITE_FILE|LIST_FILES|DONE)(?:\s+(.*))?$/;

interface CommandLine {
  keyword: Keyword;
  argument: string;
  /** Everything after the command line */
  rest: string;
}

type PayloadScan = { kind: 'absent' } | { kind: 'unterminated' } | { kind: 'found'; payload: string };

/**
 * Find the command keyword on the first non-blank line.
 * Keywords anywhere else in the reply are ignored.
 */
function tokenizeCommandLine(text: string): CommandLine | null {
  const lines = text.split('\n');
  const index = lines.findIndex((line) => line.trim() !== '');
  if (index === -1) {
    return null;
  }

  const match = COMMAND_LINE.exec(lines[index].trim());
  const keyword = KEYWORDS.find((k) => k === match?.[1]);
  if (!match || !keyword) {
    return null;
  }

  return {
    keyword,
    argument: (match[2] ?? '').trim(),
    rest: lines.slice(index + 1).join('\n'),
  };
}

/**
 * Text strictly between the first opening delimiter and the next closing one,
 * minus a single leading newline
 */
function scanPayload(rest: string): PayloadScan {
  const open = rest.indexOf(PAYLOAD_OPEN);
  if (open === -1) {
    return { kind: 'absent' };
  }

  const start = open + PAYLOAD_OPEN.length;
  const close = rest.indexOf(PAYLOAD_CLOSE, start);
  if (close === -1) {
    return { kind: 'unterminated' };
  }

  let payload = rest.slice(start, close);
  if (payload.startsWith('\r\n')) {
    payload = payload.slice(2);
  } else if (payload.startsWith('\n')) {
    payload = payload.slice(1);
  }
  return { kind: 'found', payload };
}

/**
 * Decode a model reply into exactly one tool command. Never throws.
 */
export function parseReply(text: string): ParseResult {
  const line = tokenizeCommandLine(text);
  if (!line) {
    return ok({ type: 'Unrecognized', rawText: text });
  }

  switch (line.keyword) {
    case 'READ_FILE':
      if (!line.argument) {
        return { ok: false, error: { type: 'MissingArgument', keyword: 'READ_FILE' } };
      }
      return ok({ type: 'ReadFile', path: line.argument });

    case 'LIST_FILES':
      return ok({ type: 'ListFiles', path: line.argument || '.' });

    case 'WRITE_FILE': {
      if (!line.argument) {
        return { ok: false, error: { type: 'MissingArgument', keyword: 'WRITE_FILE' } };
      }
      const scan = scanPayload(line.rest);
      if (scan.kind !== 'found') {
        return { ok: false, error: { type: 'MalformedPayload', keyword: 'WRITE_FILE' } };
      }
      return ok({ type: 'WriteFile', path: line.argument, content: scan.payload });
    }

    case 'DONE': {
      const scan = scanPayload(line.rest);
      if (scan.kind === 'unterminated') {
        return { ok: false, error: { type: 'MalformedPayload', keyword: 'DONE' } };
      }
      // An empty description counts as no description
      const body = scan.kind === 'found' ? scan.payload.trim() : '';
      return ok(body ? { type: 'Done', title: line.argument, body } : { type: 'Done', title: line.argument });
    }
  }
}

/**
 * Completion uses the same first-line rule as dispatch:
 * a reply that merely mentions DONE in prose does not finish the task.
 */
export function isCompletionReply(text: string): boolean {
  const result = parseReply(text);
  return result.ok && result.command.type === 'Done';
}

function ok(command: ToolCommand): ParseResult {
  return { ok: true, command };
}
