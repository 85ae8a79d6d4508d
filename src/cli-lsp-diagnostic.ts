/**
 * CLI LSP Diagnostic Conversion
 * Convert scenelex errors to LSP Diagnostic format
 */

import type { SourceLocation, SourceSpan } from './types.js';
import { SceneError } from './types.js';

// ============================================================
// PUBLIC TYPES
// ============================================================

/** LSP DiagnosticSeverity.Error; every scenelex error stops tokenization */
export const LSP_SEVERITY_ERROR = 1;

export interface LspDiagnostic {
  readonly range: LspRange | null;
  readonly severity: typeof LSP_SEVERITY_ERROR;
  readonly code: string;
  readonly source: 'scenelex';
  readonly message: string;
}

export interface LspRange {
  readonly start: LspPosition;
  readonly end: LspPosition;
}

export interface LspPosition {
  readonly line: number;
  readonly character: number;
}

/** Error fields a diagnostic is built from; EnrichedError satisfies it */
export interface DiagnosticInput {
  readonly errorId: string;
  readonly message: string;
  readonly span?: SourceSpan | undefined;
  readonly location?: SourceLocation | undefined;
}

// ============================================================
// LSP DIAGNOSTIC CONVERSION
// ============================================================

/**
 * Convert an error to LSP Diagnostic format.
 *
 * - LSP uses zero-based line/character positions
 * - The range covers the error span, or the location when there is no span
 * - Returns diagnostic with null range when error has neither
 * - A SceneError contributes its message without the location suffix
 */
export function toLspDiagnostic(
  error: SceneError | DiagnosticInput
): LspDiagnostic {
  const data = error instanceof SceneError ? error.toData() : error;

  let range: LspRange | null = null;
  if (data.span) {
    range = {
      start: toLspPosition(data.span.start),
      end: toLspPosition(data.span.end),
    };
  } else if (data.location) {
    range = {
      start: toLspPosition(data.location),
      end: toLspPosition(data.location),
    };
  }

  return {
    range,
    severity: LSP_SEVERITY_ERROR,
    code: data.errorId,
    source: 'scenelex',
    message: data.message,
  };
}

/** Lines are 1-based in scenelex, columns are already 0-based */
function toLspPosition(location: SourceLocation): LspPosition {
  return {
    line: location.line - 1,
    character: location.column,
  };
}
