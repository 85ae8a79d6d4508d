/**
 * Token Readers
 * Functions to read specific token types from source
 */

import type { SourceLocation, Token } from '../types.js';
import { ContractError, LexerError, TOKEN_TYPES } from '../types.js';
import {
  consumeWhile,
  describeChar,
  isDigit,
  isIdentifierChar,
  isLineTerminator,
  isSpace,
  makeToken,
} from './helpers.js';
import {
  advance,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
} from './state.js';

/** Read a token whose text is a run of characters accepted by `predicate` */
function readRun(
  state: LexerState,
  type: Token['type'],
  predicate: (ch: string) => boolean
): Token {
  const start = currentLocation(state);
  const value = consumeWhile(state, predicate);
  return makeToken(type, value, start, currentLocation(state));
}

/** `#` up to, not including, the line terminator */
export function readComment(state: LexerState): Token {
  return readRun(state, TOKEN_TYPES.COMMENT, (ch) => !isLineTerminator(ch));
}

export function readInteger(state: LexerState): Token {
  return readRun(state, TOKEN_TYPES.INTEGER, isDigit);
}

export function readIdentifier(state: LexerState): Token {
  return readRun(state, TOKEN_TYPES.IDENTIFIER, isIdentifierChar);
}

function unexpectedEndInString(
  state: LexerState,
  start: SourceLocation
): LexerError {
  const end = currentLocation(state);
  return new LexerError(
    'SCN-L003',
    'Unexpected end of input while scanning string literal',
    { start, end },
    end
  );
}

/**
 * Quoted string. A backslash escapes whatever follows it, line terminators
 * included. The token keeps the quotes and the escapes verbatim.
 */
export function readString(state: LexerState): Token {
  const start = currentLocation(state);
  const begin = state.pos;
  const quote = advance(state);

  for (;;) {
    if (isAtEnd(state)) {
      throw unexpectedEndInString(state, start);
    }

    const ch = advance(state);
    if (ch === '\\') {
      if (isAtEnd(state)) {
        throw unexpectedEndInString(state, start);
      }
      advance(state);
      continue;
    }
    if (ch === quote) {
      break;
    }
    if (ch === '\n') {
      throw new LexerError('SCN-L001', 'Unterminated string literal', {
        start,
        end: currentLocation(state),
      });
    }
  }

  return makeToken(
    TOKEN_TYPES.STRING,
    state.source.slice(begin, state.pos),
    start,
    currentLocation(state)
  );
}

/** `\n` or `\r\n` */
export function readNewline(state: LexerState): Token {
  const start = currentLocation(state);
  const begin = state.pos;

  if (advance(state) === '\r') {
    if (peek(state) !== '\n') {
      throw new ContractError(
        'SCN-C001',
        'Carriage return not followed by line feed',
        start
      );
    }
    advance(state);
  }

  return makeToken(
    TOKEN_TYPES.NEWLINE,
    state.source.slice(begin, state.pos),
    start,
    currentLocation(state)
  );
}

/** Any other non-whitespace character, one code point per token */
export function readSymbol(state: LexerState): Token {
  const start = currentLocation(state);
  const ch = String.fromCodePoint(state.source.codePointAt(state.pos) ?? 0);

  if (isSpace(ch)) {
    const char = describeChar(ch);
    throw new ContractError(
      'SCN-C002',
      `Unsupported whitespace character ${char}`,
      start,
      { char }
    );
  }

  for (let i = 0; i < ch.length; i++) advance(state);
  return makeToken(TOKEN_TYPES.SYMBOL, ch, start, currentLocation(state));
}
