/**
 * CLI Shared Utilities Tests
 * Tests for formatError, formatHint, determineExitCode and readVersion
 */

import { describe, expect, it } from 'vitest';
import {
  determineExitCode,
  formatError,
  formatHint,
  readVersion,
} from '../../src/cli-shared.js';
import { createError, LexerError, TOKEN_TYPES } from '../../src/index.js';

describe('cli-shared', () => {
  describe('formatError', () => {
    it('formats LexerError as "Lexer error at line N: message"', () => {
      const err = new LexerError('TINY-L001', 'Invalid character "#"', 4);
      expect(formatError(err)).toBe(
        'Lexer error at line 4: Invalid character "#"'
      );
    });

    it('formats configuration errors by message', () => {
      const err = createError('TINY-C001', { reason: 'unknown key x' });
      expect(formatError(err)).toBe('Invalid configuration: unknown key x');
    });

    it('formats CLI errors by message', () => {
      const err = createError('TINY-X002', { reason: 'Missing file argument' });
      expect(formatError(err)).toBe('Missing file argument');
    });

    it('formats ENOENT as "File not found: {path}"', () => {
      const err = Object.assign(new Error(), {
        code: 'ENOENT',
        path: './prog.tny',
      });
      expect(formatError(err)).toBe('File not found: ./prog.tny');
    });

    it('formats generic errors with message only', () => {
      expect(formatError(new Error('Something went wrong'))).toBe(
        'Something went wrong'
      );
    });
  });

  describe('formatHint', () => {
    it('renders the resolution of a lexer error', () => {
      const err = new LexerError('TINY-L003', 'Unterminated comment', 2);
      expect(formatHint(err)).toBe(
        '  hint: Close the comment with `}` before the end of the file.'
      );
    });

    it('returns null when the error has no resolution', () => {
      const err = createError('TINY-X001', { path: 'a.tny' });
      expect(formatHint(err)).toBeNull();
    });
  });

  describe('determineExitCode', () => {
    it('returns 0 without diagnostics', () => {
      expect(
        determineExitCode({ file: 'a.tny', tokens: [], diagnostics: [] })
      ).toEqual({ code: 0 });
    });

    it('returns 1 with diagnostics', () => {
      expect(
        determineExitCode({
          file: 'a.tny',
          tokens: [{ type: TOKEN_TYPES.ERROR, value: '?', line: 1 }],
          diagnostics: [new LexerError('TINY-L001', 'Invalid character "?"', 1)],
        })
      ).toEqual({ code: 1 });
    });
  });

  describe('readVersion', () => {
    it('reads the package version', () => {
      expect(readVersion()).toBe('0.1.0');
    });
  });
});
