/**
 * Token Stream
 * Sequential access to tokens with non-consuming lookahead
 */

import type { Token } from '../types.js';
import { LexerError, TOKEN_TYPES } from '../types.js';
import {
  captureState,
  releaseState,
  restoreState,
  type SnapshotScope,
  withSnapshot,
} from './snapshot.js';
import {
  createLexerState,
  type LexerSnapshot,
  type LexerState,
} from './state.js';
import { nextToken } from './tokenizer.js';

/** Outcome of TokenStream.tryNext(); contract violations still throw */
export type NextResult =
  | { readonly ok: true; readonly token: Token }
  | { readonly ok: false; readonly error: LexerError };

/**
 * Token stream over one source text.
 *
 * Iterating yields tokens up to and including the first END_OF_STREAM.
 * Calling next() after that keeps returning END_OF_STREAM.
 *
 * @example
 * ```typescript
 * const stream = new TokenStream('Scene\n  Rect\n');
 * stream.peek(1); // NEWLINE, stream not advanced
 * for (const token of stream) console.log(formatToken(token));
 * ```
 */
export class TokenStream implements Iterable<Token> {
  readonly state: LexerState;

  constructor(source: string) {
    this.state = createLexerState(source);
  }

  next(): Token {
    return nextToken(this.state);
  }

  /** Like next(), but lexical errors come back as a value */
  tryNext(): NextResult {
    try {
      return { ok: true, token: this.next() };
    } catch (err) {
      if (err instanceof LexerError) {
        return { ok: false, error: err };
      }
      throw err;
    }
  }

  /** The token `offset` positions ahead, without consuming anything */
  peek(offset = 0): Token {
    if (!Number.isInteger(offset) || offset < 0) {
      throw new RangeError(
        `Peek offset must be a non-negative integer, got ${offset}`
      );
    }

    return this.peeking(() => {
      let token = this.next();
      for (let i = 0; i < offset; i++) {
        token = this.next();
      }
      return token;
    });
  }

  /** Run `fn` and rewind afterwards unless it commits */
  peeking<T>(fn: (scope: SnapshotScope) => T): T {
    return withSnapshot(this.state, fn);
  }

  capture(): LexerSnapshot {
    return captureState(this.state);
  }

  restore(snapshot: LexerSnapshot): void {
    restoreState(this.state, snapshot);
  }

  release(snapshot: LexerSnapshot): void {
    releaseState(this.state, snapshot);
  }

  /** Number of open blocks, the top level included */
  get depth(): number {
    return this.state.indents.length;
  }

  *[Symbol.iterator](): Generator<Token, void, undefined> {
    for (;;) {
      const token = this.next();
      yield token;
      if (token.type === TOKEN_TYPES.END_OF_STREAM) return;
    }
  }
}
