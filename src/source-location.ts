// ============================================================
// SOURCE LOCATION
// ============================================================

/**
 * Position in source text.
 * `line` is 1-based; `column` is 0-based and resets after every `\n`.
 */
export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

/** Half-open region of source text consumed by one token */
export interface SourceSpan {
  readonly start: SourceLocation;
  readonly end: SourceLocation;
}
