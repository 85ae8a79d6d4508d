/**
 * Error Classes and Factory
 * Structured error types with registry-based error codes
 */

import type { SourceLocation, SourceSpan } from './source-location.js';
import {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
} from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface SceneErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly span?: SourceSpan | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

function lookupDefinition(
  errorId: string,
  category?: ErrorCategory
): ErrorDefinition {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (category !== undefined && definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
  return definition;
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all scenelex errors.
 * Provides structured data for host applications to format as needed.
 */
export class SceneError extends Error {
  readonly errorId: string;
  readonly location?: SourceLocation | undefined;
  readonly span?: SourceSpan | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: SceneErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }
    lookupDefinition(data.errorId);

    const locationStr = data.location
      ? ` at ${data.location.line}:${data.location.column}`
      : '';
    super(`${data.message}${locationStr}`);
    this.name = 'SceneError';
    this.errorId = data.errorId;
    this.location = data.location;
    this.span = data.span;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): SceneErrorData {
    return {
      errorId: this.errorId,
      message: this.message.replace(/ at \d+:\d+$/, ''), // Strip location suffix
      location: this.location,
      span: this.span,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: SceneErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/**
 * Malformed source text. Fatal to the current tokenization pass; recovery is
 * left to the consuming parser.
 */
export class LexerError extends SceneError {
  // Lexer errors always point into the source
  override readonly location: SourceLocation;
  override readonly span: SourceSpan;

  constructor(
    errorId: string,
    message: string,
    span: SourceSpan,
    location: SourceLocation = span.start,
    context?: Record<string, unknown>
  ) {
    lookupDefinition(errorId, 'lexer');
    super({ errorId, message, location, span, context });
    this.name = 'LexerError';
    this.location = location;
    this.span = span;
  }
}

/**
 * Input or caller precondition the lexer does not accept (bare `\r`, exotic
 * whitespace, snapshots closed out of order). Never part of `tryNext()`
 * results.
 */
export class ContractError extends SceneError {
  constructor(
    errorId: string,
    message: string,
    location?: SourceLocation,
    context?: Record<string, unknown>
  ) {
    lookupDefinition(errorId, 'contract');
    super({ errorId, message, location, context });
    this.name = 'ContractError';
  }
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Create an error from the registry, rendering its message template.
 *
 * Lexer IDs need a span; without one the result is a plain SceneError.
 *
 * @throws TypeError if errorId is not found in registry
 *
 * @example
 * createError('SCN-C002', { char: 'U+000C' }, location)
 * // Creates ContractError: "Unsupported whitespace character U+000C at 3:4"
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>,
  span?: SourceSpan | undefined
): SceneError {
  const definition = lookupDefinition(errorId);
  const message = renderMessage(definition.messageTemplate, context);

  if (definition.category === 'contract') {
    return new ContractError(errorId, message, span?.start, context);
  }
  if (span) {
    return new LexerError(errorId, message, span, span.start, context);
  }
  return new SceneError({ errorId, message, context });
}
