/**
 * CLI Error Enrichment
 * Functions for extracting source snippets around an error
 */

import type { SceneError, SourceLocation, SourceSpan } from './types.js';
import { ERROR_REGISTRY } from './types.js';

// ============================================================
// PUBLIC TYPES
// ============================================================

export interface SourceSnippet {
  readonly lines: SnippetLine[];
  readonly highlightSpan: SourceSpan;
}

export interface SnippetLine {
  readonly lineNumber: number;
  readonly content: string;
  readonly isErrorLine: boolean;
}

export interface EnrichedError {
  readonly errorId: string;
  readonly message: string;
  readonly span?: SourceSpan | undefined;
  /** Exact failure point; may lie inside `span` */
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
  readonly sourceSnippet?: SourceSnippet | undefined;
  readonly suggestions?: string[] | undefined;
}

// ============================================================
// SOURCE SNIPPET EXTRACTION
// ============================================================

/**
 * Extract source lines around error location.
 *
 * Constraints:
 * - Context lines: 2 before, 2 after (configurable)
 * - Line numbers: 1-based
 * - A trailing `\r` of a CRLF line is not part of its content
 *
 * @throws {RangeError} When span exceeds source bounds
 */
export function extractSnippet(
  source: string,
  span: SourceSpan,
  contextLines: number = 2
): SourceSnippet {
  if (source === '') {
    return { lines: [], highlightSpan: span };
  }

  const lines = source.split('\n');
  const totalLines = lines.length;

  if (span.start.line < 1 || span.start.line > totalLines) {
    throw new RangeError('Span exceeds source bounds');
  }
  if (span.end.line < 1 || span.end.line > totalLines) {
    throw new RangeError('Span exceeds source bounds');
  }

  const errorStartLine = span.start.line;
  const errorEndLine = span.end.line;
  const firstLine = Math.max(1, errorStartLine - contextLines);
  const lastLine = Math.min(totalLines, errorEndLine + contextLines);

  const snippetLines: SnippetLine[] = [];
  for (let lineNum = firstLine; lineNum <= lastLine; lineNum++) {
    const content = lines[lineNum - 1] ?? '';
    snippetLines.push({
      lineNumber: lineNum,
      content: content.endsWith('\r') ? content.slice(0, -1) : content,
      isErrorLine: lineNum >= errorStartLine && lineNum <= errorEndLine,
    });
  }

  return {
    lines: snippetLines,
    highlightSpan: span,
  };
}

// ============================================================
// ERROR ENRICHMENT
// ============================================================

/**
 * Enrich a SceneError with a source snippet and the registry's resolution
 * hint.
 *
 * Errors without a span get a zero-width span at their location; errors
 * without either get no snippet.
 */
export function enrichError(
  error: SceneError,
  source: string,
  contextLines: number = 2
): EnrichedError {
  let span = error.span;
  if (!span && error.location) {
    span = { start: error.location, end: error.location };
  }

  let sourceSnippet: SourceSnippet | undefined;
  if (span && source !== '') {
    try {
      sourceSnippet = extractSnippet(source, span, contextLines);
    } catch (err) {
      // A span from another source text: report without a snippet
      if (!(err instanceof RangeError)) throw err;
    }
  }

  const resolution = ERROR_REGISTRY.get(error.errorId)?.resolution;

  return {
    errorId: error.errorId,
    message: error.toData().message,
    span,
    location: error.location,
    context: error.context,
    sourceSnippet,
    suggestions: resolution !== undefined ? [resolution] : undefined,
  };
}
