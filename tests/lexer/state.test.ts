/**
 * scenelex Lexer Tests: Scanner State
 * Cursor movement and line/column bookkeeping
 */

import { describe, expect, it } from 'vitest';

import { createLexerState, LexerError } from '../../src/index.js';
import {
  advance,
  currentIndent,
  currentLocation,
  isAtEnd,
  peek,
} from '../../src/lexer/state.js';
import { catchError } from '../helpers/tokens.js';

describe('scenelex Lexer: Scanner State', () => {
  it('starts at line 1, column 0 with a top-level indentation stack', () => {
    const state = createLexerState('abc');

    expect(currentLocation(state)).toEqual({ line: 1, column: 0, offset: 0 });
    expect(state.indents).toEqual(['']);
    expect(currentIndent(state)).toBe('');
    expect(state.snapshots).toHaveLength(0);
  });

  it('advances column per character and resets it after a line feed', () => {
    const state = createLexerState('ab\nc');

    expect(advance(state)).toBe('a');
    expect(advance(state)).toBe('b');
    expect(currentLocation(state)).toEqual({ line: 1, column: 2, offset: 2 });

    expect(advance(state)).toBe('\n');
    expect(currentLocation(state)).toEqual({ line: 2, column: 0, offset: 3 });

    expect(advance(state)).toBe('c');
    expect(currentLocation(state)).toEqual({ line: 2, column: 1, offset: 4 });
  });

  it('counts a carriage return as a column', () => {
    const state = createLexerState('\r\n');

    advance(state);
    expect(currentLocation(state)).toEqual({ line: 1, column: 1, offset: 1 });
    advance(state);
    expect(currentLocation(state)).toEqual({ line: 2, column: 0, offset: 2 });
  });

  it('peeks without consuming', () => {
    const state = createLexerState('xy');

    expect(peek(state)).toBe('x');
    expect(peek(state, 1)).toBe('y');
    expect(peek(state, 2)).toBe('');
    expect(state.pos).toBe(0);
  });

  it('reports the end of input', () => {
    const state = createLexerState('z');

    expect(isAtEnd(state)).toBe(false);
    advance(state);
    expect(isAtEnd(state)).toBe(true);
    expect(peek(state)).toBe('');
  });

  it('fails to advance past the end of input', () => {
    const state = createLexerState('ab\nc');
    for (let i = 0; i < 4; i++) advance(state);

    const err = catchError(() => advance(state));

    expect(err).toBeInstanceOf(LexerError);
    if (!(err instanceof LexerError)) return;
    expect(err.errorId).toBe('SCN-L003');
    expect(err.message).toBe('Unexpected end of input at 2:1');
    expect(err.location).toEqual({ line: 2, column: 1, offset: 4 });
    expect(currentLocation(state)).toEqual({ line: 2, column: 1, offset: 4 });
  });
});
