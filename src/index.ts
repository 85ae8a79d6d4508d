/**
 * scenelex Module
 * Exports the lexer, token types, and error taxonomy
 */

export {
  captureState,
  createLexerState,
  type LexerSnapshot,
  type LexerState,
  type NextResult,
  nextToken,
  releaseState,
  restoreState,
  type SnapshotScope,
  tokenize,
  type TokenizeOptions,
  TokenStream,
  withSnapshot,
} from './lexer/index.js';

// ============================================================
// DIAGNOSTICS
// ============================================================
export {
  enrichError,
  extractSnippet,
  type EnrichedError,
  type SnippetLine,
  type SourceSnippet,
} from './cli-error-enrichment.js';
export {
  formatError as formatEnrichedError,
  type OutputFormat,
  renderCaretUnderline,
} from './cli-error-formatter.js';
export {
  describeUnknownErrorId,
  explainError,
  normalizeErrorId,
} from './cli-explain.js';
export {
  type LspDiagnostic,
  type LspPosition,
  type LspRange,
  toLspDiagnostic,
} from './cli-lsp-diagnostic.js';
export { formatError, formatTokens } from './cli-shared.js';

export * from './types.js';
