/**
 * Indentation Tracking
 * Line-start handling: blank lines, Indent and Dedent
 */

import type { SourceLocation, Token } from '../types.js';
import { LexerError, TOKEN_TYPES } from '../types.js';
import {
  COMMENT_MARKER,
  consumeWhile,
  isHorizontalWhitespace,
  isSpace,
  makeStructuralToken,
  makeToken,
} from './helpers.js';
import { withSnapshot } from './snapshot.js';
import {
  advance,
  currentIndent,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
} from './state.js';

/** Location `n` characters further along the current line */
function locationAhead(state: LexerState, n: number): SourceLocation {
  return { line: state.line, column: state.column + n, offset: state.pos + n };
}

/**
 * A line holding only whitespace becomes a single NEWLINE token carrying all
 * of it. Whitespace running into the end of input is consumed without a token.
 */
function readBlankLine(state: LexerState): Token | null {
  const start = currentLocation(state);

  return withSnapshot(state, (scope) => {
    while (!isAtEnd(state)) {
      const ch = advance(state);
      if (ch === '\n') {
        scope.commit();
        return makeToken(
          TOKEN_TYPES.NEWLINE,
          state.source.slice(start.offset, state.pos),
          start,
          currentLocation(state)
        );
      }
      if (!isSpace(ch)) {
        return null;
      }
    }

    scope.commit();
    return null;
  });
}

/**
 * Handle the first character of a line. Returns the structural token to emit,
 * or null when ordinary scanning should continue from the cursor.
 *
 * Emits at most one INDENT or DEDENT per call. A DEDENT leaves the cursor at
 * the line start so the next call measures the same line again; deeper
 * blocks are closed one call at a time.
 */
export function readLineStart(state: LexerState): Token | null {
  const blank = readBlankLine(state);
  if (blank !== null || isAtEnd(state)) {
    return blank;
  }

  // Anything in column 0 closes the innermost block, comments included
  if (!isHorizontalWhitespace(peek(state)) && state.indents.length > 1) {
    state.indents.pop();
    return makeStructuralToken(state, TOKEN_TYPES.DEDENT, currentIndent(state));
  }

  let width = 0;
  while (isHorizontalWhitespace(peek(state, width))) width++;

  // Indented comment-only lines are never compared against the stack
  if (peek(state, width) === COMMENT_MARKER) {
    return null;
  }

  const run = state.source.slice(state.pos, state.pos + width);
  const top = currentIndent(state);
  const shared = Math.min(run.length, top.length);

  for (let i = 0; i < shared; i++) {
    if (run.charAt(i) !== top.charAt(i)) {
      throw new LexerError(
        'SCN-L002',
        'Inconsistent use of tabs and spaces in indentation',
        { start: currentLocation(state), end: locationAhead(state, width) },
        locationAhead(state, i),
        { expected: top, actual: run }
      );
    }
  }

  if (run.length < top.length) {
    state.indents.pop();
    return makeStructuralToken(state, TOKEN_TYPES.DEDENT, currentIndent(state));
  }

  const start = currentLocation(state);
  consumeWhile(state, isHorizontalWhitespace);

  if (run.length > top.length) {
    state.indents.push(run);
    return makeToken(TOKEN_TYPES.INDENT, run, start, currentLocation(state));
  }

  return null;
}

/** End of input: close open blocks one per call, then END_OF_STREAM forever */
export function readEndOfInput(state: LexerState): Token {
  if (state.indents.length > 1) {
    state.indents.pop();
    return makeStructuralToken(state, TOKEN_TYPES.DEDENT, currentIndent(state));
  }
  return makeStructuralToken(state, TOKEN_TYPES.END_OF_STREAM, '');
}
