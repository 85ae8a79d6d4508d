/**
 * Tokenizer
 * Main tokenization logic
 */

import type { Token } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import {
  COMMENT_MARKER,
  consumeWhile,
  isDigit,
  isHorizontalWhitespace,
  isIdentifierStart,
  isLineTerminator,
  isQuote,
} from './helpers.js';
import { readEndOfInput, readLineStart } from './indentation.js';
import {
  readComment,
  readIdentifier,
  readInteger,
  readNewline,
  readString,
  readSymbol,
} from './readers.js';
import { createLexerState, isAtEnd, type LexerState, peek } from './state.js';

/**
 * Produce exactly one token, advancing the state past it.
 *
 * @throws LexerError on malformed source
 * @throws ContractError on input the lexer does not accept (bare `\r`,
 *   unsupported whitespace)
 */
export function nextToken(state: LexerState): Token {
  if (state.column === 0 && !isAtEnd(state)) {
    const lineToken = readLineStart(state);
    if (lineToken !== null) {
      return lineToken;
    }
  }

  consumeWhile(state, isHorizontalWhitespace);

  if (isAtEnd(state)) {
    return readEndOfInput(state);
  }

  const ch = peek(state);

  if (ch === COMMENT_MARKER) {
    return readComment(state);
  }

  if (isDigit(ch)) {
    return readInteger(state);
  }

  if (isIdentifierStart(ch)) {
    return readIdentifier(state);
  }

  if (isQuote(ch)) {
    return readString(state);
  }

  if (isLineTerminator(ch)) {
    return readNewline(state);
  }

  return readSymbol(state);
}

export interface TokenizeOptions {
  includeComments?: boolean;
}

/**
 * Tokenize a whole source text. The result ends with the first END_OF_STREAM
 * token.
 */
export function tokenize(source: string, options?: TokenizeOptions): Token[] {
  const state = createLexerState(source);
  const tokens: Token[] = [];
  let token: Token;

  do {
    token = nextToken(state);
    tokens.push(token);
  } while (token.type !== TOKEN_TYPES.END_OF_STREAM);

  // Filter out COMMENT tokens unless includeComments is true
  if (options?.includeComments !== true) {
    return tokens.filter((t) => t.type !== TOKEN_TYPES.COMMENT);
  }

  return tokens;
}
