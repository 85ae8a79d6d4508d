import type { SourceSpan } from './source-location.js';

// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_TYPES = {
  // Structure
  END_OF_STREAM: 'END_OF_STREAM',
  NEWLINE: 'NEWLINE',
  INDENT: 'INDENT', // value: new indentation run
  DEDENT: 'DEDENT', // value: indentation run left on top of the stack

  // Trivia
  COMMENT: 'COMMENT', // # ... (marker included)

  // Literals
  IDENTIFIER: 'IDENTIFIER',
  INTEGER: 'INTEGER',
  STRING: 'STRING', // quotes included, escapes kept verbatim

  // Everything else, one character at a time
  SYMBOL: 'SYMBOL',
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

export interface Token {
  readonly type: TokenType;
  readonly value: string;
  readonly span: SourceSpan;
}

/**
 * Debug rendering of a token.
 *
 * @example
 * formatToken(token)
 * // Returns: '<Token: IDENTIFIER, "a" (1:0, 1:1)>'
 */
export function formatToken(token: Token): string {
  const { start, end } = token.span;
  return `<Token: ${token.type}, ${JSON.stringify(token.value)} (${start.line}:${start.column}, ${end.line}:${end.column})>`;
}
