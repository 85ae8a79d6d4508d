/**
 * scenelex Lexer Tests: Indentation
 * INDENT/DEDENT generation, blank lines, comment lines and mixed whitespace
 */

import { describe, expect, it } from 'vitest';

import { LexerError, tokenize } from '../../src/index.js';
import { catchError, compactSpan, lex, spanOf } from '../helpers/tokens.js';

describe('scenelex Lexer: Indentation', () => {
  describe('blocks', () => {
    it('opens and closes a nested block', () => {
      expect(lex('a\n  b\n')).toEqual([
        ['IDENTIFIER', 'a'],
        ['NEWLINE', '\n'],
        ['INDENT', '  '],
        ['IDENTIFIER', 'b'],
        ['NEWLINE', '\n'],
        ['DEDENT', ''],
        ['END_OF_STREAM', ''],
      ]);
    });

    it('spans INDENT over the run and DEDENT at the line start', () => {
      const tokens = tokenize('a\n  b\n');

      expect(tokens.map(spanOf)).toEqual([
        [1, 0, 1, 1],
        [1, 1, 2, 0],
        [2, 0, 2, 2],
        [2, 2, 2, 3],
        [2, 3, 3, 0],
        [3, 0, 3, 0],
        [3, 0, 3, 0],
      ]);
    });

    it('emits one DEDENT per closed block', () => {
      expect(lex('a\n  b\n    c\nd\n')).toEqual([
        ['IDENTIFIER', 'a'],
        ['NEWLINE', '\n'],
        ['INDENT', '  '],
        ['IDENTIFIER', 'b'],
        ['NEWLINE', '\n'],
        ['INDENT', '    '],
        ['IDENTIFIER', 'c'],
        ['NEWLINE', '\n'],
        ['DEDENT', '  '],
        ['DEDENT', ''],
        ['IDENTIFIER', 'd'],
        ['NEWLINE', '\n'],
        ['END_OF_STREAM', ''],
      ]);
    });

    it('returns to an intermediate level', () => {
      expect(lex('a\n  b\n    c\n  d\n')).toEqual([
        ['IDENTIFIER', 'a'],
        ['NEWLINE', '\n'],
        ['INDENT', '  '],
        ['IDENTIFIER', 'b'],
        ['NEWLINE', '\n'],
        ['INDENT', '    '],
        ['IDENTIFIER', 'c'],
        ['NEWLINE', '\n'],
        ['DEDENT', '  '],
        ['IDENTIFIER', 'd'],
        ['NEWLINE', '\n'],
        ['DEDENT', ''],
        ['END_OF_STREAM', ''],
      ]);
    });

    it('dedents then indents when the new level was never opened', () => {
      expect(lex('a\n    b\n  c\n')).toEqual([
        ['IDENTIFIER', 'a'],
        ['NEWLINE', '\n'],
        ['INDENT', '    '],
        ['IDENTIFIER', 'b'],
        ['NEWLINE', '\n'],
        ['DEDENT', ''],
        ['INDENT', '  '],
        ['IDENTIFIER', 'c'],
        ['NEWLINE', '\n'],
        ['DEDENT', ''],
        ['END_OF_STREAM', ''],
      ]);
    });

    it('indents with tabs', () => {
      expect(lex('a\n\tb\n\t\tc\n')).toEqual([
        ['IDENTIFIER', 'a'],
        ['NEWLINE', '\n'],
        ['INDENT', '\t'],
        ['IDENTIFIER', 'b'],
        ['NEWLINE', '\n'],
        ['INDENT', '\t\t'],
        ['IDENTIFIER', 'c'],
        ['NEWLINE', '\n'],
        ['DEDENT', '\t'],
        ['DEDENT', ''],
        ['END_OF_STREAM', ''],
      ]);
    });

    it('closes blocks at the end of input without a trailing newline', () => {
      const tokens = tokenize('a\n  b');
      const dedent = tokens[4];

      expect(tokens.map((t) => t.type)).toEqual([
        'IDENTIFIER',
        'NEWLINE',
        'INDENT',
        'IDENTIFIER',
        'DEDENT',
        'END_OF_STREAM',
      ]);
      expect(dedent && spanOf(dedent)).toEqual([2, 3, 2, 3]);
    });

    it('handles CRLF line endings', () => {
      expect(lex('a\r\n  b\r\n')).toEqual([
        ['IDENTIFIER', 'a'],
        ['NEWLINE', '\r\n'],
        ['INDENT', '  '],
        ['IDENTIFIER', 'b'],
        ['NEWLINE', '\r\n'],
        ['DEDENT', ''],
        ['END_OF_STREAM', ''],
      ]);
    });
  });

  describe('blank lines', () => {
    it('turns each whitespace-only line into one NEWLINE', () => {
      expect(lex('a\n\n  \nb\n')).toEqual([
        ['IDENTIFIER', 'a'],
        ['NEWLINE', '\n'],
        ['NEWLINE', '\n'],
        ['NEWLINE', '  \n'],
        ['IDENTIFIER', 'b'],
        ['NEWLINE', '\n'],
        ['END_OF_STREAM', ''],
      ]);
    });

    it('spans a blank line from its start to the next line', () => {
      const tokens = tokenize('a\n \t\nb');
      const blank = tokens[2];

      expect(blank?.value).toBe(' \t\n');
      expect(blank && spanOf(blank)).toEqual([2, 0, 3, 0]);
    });

    it('does not close a block at a blank line', () => {
      expect(lex('a\n  b\n\n  c\n')).toEqual([
        ['IDENTIFIER', 'a'],
        ['NEWLINE', '\n'],
        ['INDENT', '  '],
        ['IDENTIFIER', 'b'],
        ['NEWLINE', '\n'],
        ['NEWLINE', '\n'],
        ['IDENTIFIER', 'c'],
        ['NEWLINE', '\n'],
        ['DEDENT', ''],
        ['END_OF_STREAM', ''],
      ]);
    });

    it('reads a blank CRLF line as one NEWLINE', () => {
      expect(lex('a\r\n\r\nb')).toEqual([
        ['IDENTIFIER', 'a'],
        ['NEWLINE', '\r\n'],
        ['NEWLINE', '\r\n'],
        ['IDENTIFIER', 'b'],
        ['END_OF_STREAM', ''],
      ]);
    });

    it('ignores trailing whitespace at the end of input', () => {
      const tokens = tokenize('a\n  ');
      const end = tokens[2];

      expect(tokens.map((t) => t.type)).toEqual([
        'IDENTIFIER',
        'NEWLINE',
        'END_OF_STREAM',
      ]);
      expect(end && spanOf(end)).toEqual([2, 2, 2, 2]);
    });

    it('produces only END_OF_STREAM for empty or blank input', () => {
      expect(tokenize('').map(spanOf)).toEqual([[1, 0, 1, 0]]);
      expect(tokenize('   ').map(spanOf)).toEqual([[1, 3, 1, 3]]);
    });
  });

  describe('comment lines', () => {
    it('closes a block at a comment in column 0', () => {
      expect(lex('a\n  b\n# note\n  c\n')).toEqual([
        ['IDENTIFIER', 'a'],
        ['NEWLINE', '\n'],
        ['INDENT', '  '],
        ['IDENTIFIER', 'b'],
        ['NEWLINE', '\n'],
        ['DEDENT', ''],
        ['COMMENT', '# note'],
        ['NEWLINE', '\n'],
        ['INDENT', '  '],
        ['IDENTIFIER', 'c'],
        ['NEWLINE', '\n'],
        ['DEDENT', ''],
        ['END_OF_STREAM', ''],
      ]);
    });

    it('closes one block per call before a column-0 comment', () => {
      const tokens = tokenize('a\n  b\n    c\n# note\n', {
        includeComments: true,
      });
      const dedent = tokens[8];

      expect(tokens.slice(8).map((t) => [t.type, t.value])).toEqual([
        ['DEDENT', '  '],
        ['DEDENT', ''],
        ['COMMENT', '# note'],
        ['NEWLINE', '\n'],
        ['END_OF_STREAM', ''],
      ]);
      expect(dedent && spanOf(dedent)).toEqual([4, 0, 4, 0]);
    });

    it('does not close a block at an indented comment', () => {
      expect(lex('a\n    b\n  # note\n    c\n')).toEqual([
        ['IDENTIFIER', 'a'],
        ['NEWLINE', '\n'],
        ['INDENT', '    '],
        ['IDENTIFIER', 'b'],
        ['NEWLINE', '\n'],
        ['COMMENT', '# note'],
        ['NEWLINE', '\n'],
        ['IDENTIFIER', 'c'],
        ['NEWLINE', '\n'],
        ['DEDENT', ''],
        ['END_OF_STREAM', ''],
      ]);
    });

    it('does not open a block at a deeper comment', () => {
      const tokens = tokenize('a\n      # deep\nb\n', { includeComments: true });
      const comment = tokens[2];

      expect(tokens.map((t) => t.type)).toEqual([
        'IDENTIFIER',
        'NEWLINE',
        'COMMENT',
        'NEWLINE',
        'IDENTIFIER',
        'NEWLINE',
        'END_OF_STREAM',
      ]);
      expect(comment && spanOf(comment)).toEqual([2, 6, 2, 12]);
    });

    it('does not compare the indentation of comment lines', () => {
      expect(() => tokenize('a\n  b\n\t# x\n  c\n')).not.toThrow();
    });
  });

  describe('inconsistent indentation', () => {
    it('rejects a tab where the block uses spaces', () => {
      const err = catchError(() => tokenize('a\n  b\n\tc\n'));

      expect(err).toBeInstanceOf(LexerError);
      if (!(err instanceof LexerError)) return;
      expect(err.errorId).toBe('SCN-L002');
      expect(err.message).toBe(
        'Inconsistent use of tabs and spaces in indentation at 3:0'
      );
      expect(compactSpan(err.span)).toEqual([3, 0, 3, 1]);
      expect(err.context).toEqual({ expected: '  ', actual: '\t' });
    });

    it('points at the first differing column', () => {
      const err = catchError(() => tokenize('a\n  b\n \tc'));

      expect(err).toBeInstanceOf(LexerError);
      if (!(err instanceof LexerError)) return;
      expect(err.location).toEqual({ line: 3, column: 1, offset: 7 });
      expect(compactSpan(err.span)).toEqual([3, 0, 3, 2]);
    });

    it('compares a deeper line against the enclosing block', () => {
      expect(() => tokenize('a\n\tb\n  c\n')).toThrow(
        'Inconsistent use of tabs and spaces in indentation at 3:0'
      );
    });
  });
});
