/**
 * Lexer State
 * Tracks position in source text during tokenization
 */

import type { SourceLocation } from '../types.js';
import { LexerError } from '../types.js';

/**
 * Opaque value returned by captureState(). Only meaningful to the state that
 * produced it.
 */
export interface LexerSnapshot {
  readonly pos: number;
  readonly line: number;
  readonly column: number;
  readonly indents: readonly string[];
}

export interface LexerState {
  readonly source: string;
  pos: number;
  line: number;
  column: number;
  /** Indentation runs, outermost first. Starts as [''] and is never empty. */
  indents: string[];
  /** Open snapshots, innermost last */
  readonly snapshots: LexerSnapshot[];
}

export function createLexerState(source: string): LexerState {
  return {
    source,
    pos: 0,
    line: 1,
    column: 0,
    indents: [''],
    snapshots: [],
  };
}

export function currentLocation(state: LexerState): SourceLocation {
  return { line: state.line, column: state.column, offset: state.pos };
}

export function peek(state: LexerState, offset = 0): string {
  return state.source.charAt(state.pos + offset);
}

export function isAtEnd(state: LexerState): boolean {
  return state.pos >= state.source.length;
}

export function advance(state: LexerState): string {
  if (isAtEnd(state)) {
    const loc = currentLocation(state);
    throw new LexerError('SCN-L003', 'Unexpected end of input', {
      start: loc,
      end: loc,
    });
  }

  const ch = state.source.charAt(state.pos);
  state.pos++;
  if (ch === '\n') {
    state.line++;
    state.column = 0;
  } else {
    state.column++;
  }
  return ch;
}

/** Top of the indentation stack */
export function currentIndent(state: LexerState): string {
  return state.indents[state.indents.length - 1] ?? '';
}
