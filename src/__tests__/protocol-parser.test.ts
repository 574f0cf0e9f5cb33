import { describe, it, expect } from 'vitest';
import { isCompletionReply, parseReply } from '../protocol-parser.js';

describe('parseReply', () => {
  describe('READ_FILE', () => {
    it('should take the rest of the first line as the path', () => {
      expect(parseReply('READ_FILE   src/app.ts  \nI want to see this file')).toEqual({
        ok: true,
        command: { type: 'ReadFile', path: 'src/app.ts' },
      });
    });

    it('should skip leading blank lines', () => {
      expect(parseReply('\n   \nREAD_FILE README.md')).toEqual({
        ok: true,
        command: { type: 'ReadFile', path: 'README.md' },
      });
    });

    it('should report a missing path', () => {
      expect(parseReply('READ_FILE')).toEqual({
        ok: false,
        error: { type: 'MissingArgument', keyword: 'READ_FILE' },
      });
    });
  });

  describe('LIST_FILES', () => {
    it('should default to the current directory', () => {
      expect(parseReply('LIST_FILES')).toEqual({ ok: true, command: { type: 'ListFiles', path: '.' } });
    });

    it('should accept a directory argument', () => {
      expect(parseReply('LIST_FILES src')).toEqual({ ok: true, command: { type: 'ListFiles', path: 'src' } });
    });
  });

  describe('WRITE_FILE', () => {
    it('should extract the payload and strip one leading newline', () => {
      const reply = 'WRITE_FILE hello.txt\n<<<<\nworld\n>>>>\n';
      expect(parseReply(reply)).toEqual({
        ok: true,
        command: { type: 'WriteFile', path: 'hello.txt', content: 'world\n' },
      });
    });

    it('should only strip a single leading newline', () => {
      const reply = 'WRITE_FILE a.md\n<<<<\n\n# Title\n>>>>';
      expect(parseReply(reply)).toEqual({
        ok: true,
        command: { type: 'WriteFile', path: 'a.md', content: '\n# Title\n' },
      });
    });

    it('should stop at the first closing delimiter after the opening one', () => {
      const reply = 'WRITE_FILE a.txt\n<<<<\none\n>>>>\ntwo\n>>>>';
      expect(parseReply(reply)).toEqual({
        ok: true,
        command: { type: 'WriteFile', path: 'a.txt', content: 'one\n' },
      });
    });

    it('should signal a malformed payload when delimiters are missing', () => {
      expect(parseReply('WRITE_FILE foo.txt\nhello')).toEqual({
        ok: false,
        error: { type: 'MalformedPayload', keyword: 'WRITE_FILE' },
      });
    });

    it('should signal a malformed payload when the closing delimiter is missing', () => {
      expect(parseReply('WRITE_FILE foo.txt\n<<<<\nhello')).toEqual({
        ok: false,
        error: { type: 'MalformedPayload', keyword: 'WRITE_FILE' },
      });
    });

    it('should report a missing path', () => {
      expect(parseReply('WRITE_FILE\n<<<<\nx\n>>>>')).toEqual({
        ok: false,
        error: { type: 'MissingArgument', keyword: 'WRITE_FILE' },
      });
    });
  });

  describe('DONE', () => {
    it('should parse a title without a body', () => {
      expect(parseReply('DONE Add greeting file')).toEqual({
        ok: true,
        command: { type: 'Done', title: 'Add greeting file' },
      });
    });

    it('should parse a trimmed body', () => {
      const reply = 'DONE Add greeting\n<<<<\n\nAdds hello.txt.\n\n>>>>';
      expect(parseReply(reply)).toEqual({
        ok: true,
        command: { type: 'Done', title: 'Add greeting', body: 'Adds hello.txt.' },
      });
    });

    it('should treat an empty body as no body', () => {
      expect(parseReply('DONE Title\n<<<<\n   \n>>>>')).toEqual({
        ok: true,
        command: { type: 'Done', title: 'Title' },
      });
    });

    it('should signal a malformed payload when the body is not closed', () => {
      expect(parseReply('DONE Title\n<<<<\nbody')).toEqual({
        ok: false,
        error: { type: 'MalformedPayload', keyword: 'DONE' },
      });
    });
  });

  describe('unrecognized replies', () => {
    it('should ignore keywords that are not on the first non-blank line', () => {
      const reply = 'Let me look around first.\nREAD_FILE src/app.ts';
      expect(parseReply(reply)).toEqual({ ok: true, command: { type: 'Unrecognized', rawText: reply } });
    });

    it('should require a word boundary after the keyword', () => {
      expect(parseReply('DONE_SOON maybe')).toEqual({
        ok: true,
        command: { type: 'Unrecognized', rawText: 'DONE_SOON maybe' },
      });
    });

    it('should treat an empty reply as unrecognized', () => {
      expect(parseReply('')).toEqual({ ok: true, command: { type: 'Unrecognized', rawText: '' } });
    });
  });
});

describe('isCompletionReply', () => {
  it('should detect DONE on the first line', () => {
    expect(isCompletionReply('DONE Ship it')).toBe(true);
  });

  it('should not complete when DONE only appears in prose', () => {
    expect(isCompletionReply('I am not DONE yet.\nLIST_FILES')).toBe(false);
    expect(isCompletionReply('READ_FILE DONE.md')).toBe(false);
  });

  it('should not complete on a malformed DONE', () => {
    expect(isCompletionReply('DONE Title\n<<<<\nunterminated')).toBe(false);
  });
});
