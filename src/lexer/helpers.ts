/**
 * Lexer Helper Functions
 * Character classification and token construction
 */

import type { SourceLocation, Token, TokenType } from '../types.js';
import {
  advance,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
} from './state.js';

export const COMMENT_MARKER = '#';

export function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function isLetter(ch: string): boolean {
  return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z');
}

export function isIdentifierStart(ch: string): boolean {
  return isLetter(ch) || ch === '_' || ch === '$';
}

export function isIdentifierChar(ch: string): boolean {
  return isIdentifierStart(ch) || isDigit(ch);
}

/** Space or tab: the only characters allowed in indentation */
export function isHorizontalWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t';
}

export function isLineTerminator(ch: string): boolean {
  return ch === '\n' || ch === '\r';
}

/** Any whitespace, line terminators and Unicode spaces included */
export function isSpace(ch: string): boolean {
  return ch !== '' && /^\s$/u.test(ch);
}

export function isQuote(ch: string): boolean {
  return ch === '"' || ch === "'";
}

/** Code point notation used in error messages, e.g. U+000C */
export function describeChar(ch: string): string {
  const code = ch.codePointAt(0) ?? 0;
  return `U+${code.toString(16).toUpperCase().padStart(4, '0')}`;
}

export function makeToken(
  type: TokenType,
  value: string,
  start: SourceLocation,
  end: SourceLocation
): Token {
  return Object.freeze({ type, value, span: Object.freeze({ start, end }) });
}

/** Zero-width token at the current position */
export function makeStructuralToken(
  state: LexerState,
  type: TokenType,
  value: string
): Token {
  const loc = currentLocation(state);
  return makeToken(type, value, loc, loc);
}

/** Advance while `predicate` holds and return the consumed text */
export function consumeWhile(
  state: LexerState,
  predicate: (ch: string) => boolean
): string {
  const begin = state.pos;
  while (!isAtEnd(state) && predicate(peek(state))) {
    advance(state);
  }
  return state.source.slice(begin, state.pos);
}
