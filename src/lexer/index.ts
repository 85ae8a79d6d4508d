/**
 * Lexer Module
 * Converts source text into tokens
 */

export {
  captureState,
  releaseState,
  restoreState,
  type SnapshotScope,
  withSnapshot,
} from './snapshot.js';
export {
  createLexerState,
  type LexerSnapshot,
  type LexerState,
} from './state.js';
export { type NextResult, TokenStream } from './stream.js';
export { nextToken, tokenize, type TokenizeOptions } from './tokenizer.js';
