/**
 * scenelex Types
 * Shared re-exports for locations, tokens, and the error taxonomy
 */

export type { SourceLocation, SourceSpan } from './source-location.js';
export {
  TOKEN_TYPES,
  formatToken,
  type Token,
  type TokenType,
} from './token-types.js';
export {
  ERROR_ID_PATTERN,
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorExample,
  type ErrorRegistry,
} from './error-registry.js';
export {
  ContractError,
  createError,
  LexerError,
  SceneError,
  type SceneErrorData,
} from './error-classes.js';
