/**
 * CLI Error Formatter
 * Format enriched errors for human-readable, JSON, or compact output
 */

import type { SourceSpan } from './types.js';
import type { EnrichedError } from './cli-error-enrichment.js';
import { toLspDiagnostic } from './cli-lsp-diagnostic.js';

// ============================================================
// PUBLIC TYPES
// ============================================================

export type OutputFormat = 'human' | 'json' | 'compact';

export const OUTPUT_FORMATS: readonly OutputFormat[] = [
  'human',
  'json',
  'compact',
];

export function isOutputFormat(value: unknown): value is OutputFormat {
  return (
    typeof value === 'string' &&
    OUTPUT_FORMATS.some((format) => format === value)
  );
}

// ============================================================
// ERROR FORMATTING
// ============================================================

/**
 * Format enriched error for output.
 *
 * - Human format: multi-line with snippet and caret underline
 * - JSON format: LSP Diagnostic compatible
 * - Compact format: single line for CI output
 */
export function formatError(
  error: EnrichedError,
  format: OutputFormat
): string {
  switch (format) {
    case 'json':
      return formatErrorJson(error);
    case 'compact':
      return formatErrorCompact(error);
    case 'human':
      return formatErrorHuman(error);
  }
}

function headline(error: EnrichedError): string | undefined {
  const location = error.location ?? error.span?.start;
  return location ? `${location.line}:${location.column}` : undefined;
}

/**
 * Format error in human-readable format.
 *
 * Output format:
 * ```
 * error[SCN-L001]: Unterminated string literal
 *   --> 2:7
 *    |
 *  1 | Scene
 *  2 |   text "hello
 *    |        ^^^^^^
 *  3 |   size 12
 *    |
 *    = help: Close the string on the same line, or escape the line break with a backslash.
 * ```
 */
function formatErrorHuman(error: EnrichedError): string {
  const lines: string[] = [];

  lines.push(`error[${error.errorId}]: ${error.message}`);

  const location = headline(error);
  if (location) {
    lines.push(`  --> ${location}`);
  }

  if (error.sourceSnippet && error.sourceSnippet.lines.length > 0) {
    const span = error.sourceSnippet.highlightSpan;
    const maxLineNumber = Math.max(
      ...error.sourceSnippet.lines.map((l) => l.lineNumber)
    );
    const lineNumberWidth = String(maxLineNumber).length;
    const gutter = ' '.repeat(lineNumberWidth);

    lines.push(` ${gutter} |`);
    for (const line of error.sourceSnippet.lines) {
      const lineNumStr = String(line.lineNumber).padStart(lineNumberWidth, ' ');
      lines.push(` ${lineNumStr} | ${line.content}`);

      // Underline on the first line of the span only
      if (line.lineNumber === span.start.line) {
        lines.push(` ${gutter} | ${renderCaretUnderline(span, line.content)}`);
      }
    }
    lines.push(` ${gutter} |`);
  }

  if (error.suggestions && error.suggestions.length > 0) {
    for (const suggestion of error.suggestions) {
      lines.push(`   = help: ${suggestion}`);
    }
  }

  return lines.join('\n');
}

/**
 * Format error in JSON format: the LSP diagnostic of the error plus the
 * registry's suggestions.
 */
function formatErrorJson(error: EnrichedError): string {
  const diagnostic = toLspDiagnostic(error);
  const suggestions =
    error.suggestions && error.suggestions.length > 0
      ? error.suggestions
      : undefined;

  return JSON.stringify({ ...diagnostic, suggestions }, null, 2);
}

/**
 * Format error in compact format (single line for CI).
 */
function formatErrorCompact(error: EnrichedError): string {
  const parts: string[] = [`[${error.errorId}]`, error.message];

  const location = headline(error);
  if (location) {
    parts.push(`at ${location}`);
  }

  return parts.join(' ');
}

// ============================================================
// CARET UNDERLINE
// ============================================================

/**
 * Render caret underline for error span.
 *
 * - Zero-width or single-char: single ^
 * - Multi-char same line: ^^^^^ (length = span width)
 * - Multi-line: from the start column to the end of the first line
 *
 * @throws {RangeError} Invalid span (start after end)
 */
export function renderCaretUnderline(
  span: SourceSpan,
  lineContent: string
): string {
  if (
    span.start.line > span.end.line ||
    (span.start.line === span.end.line && span.start.column > span.end.column)
  ) {
    throw new RangeError('Span start must precede end');
  }

  const startColumn = span.start.column;
  const endColumn =
    span.start.line === span.end.line ? span.end.column : lineContent.length;

  return ' '.repeat(startColumn) + '^'.repeat(Math.max(1, endColumn - startColumn));
}
