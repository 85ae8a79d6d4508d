/**
 * CLI Shared Utilities
 * Common formatting functions for the scenelex command
 */

import * as fs from 'fs';
import type { Token } from './types.js';
import { ContractError, formatToken, LexerError, SceneError } from './types.js';
import { enrichError } from './cli-error-enrichment.js';
import {
  formatError as formatEnrichedError,
  type OutputFormat,
} from './cli-error-formatter.js';

/** Process exit codes of the scenelex command */
export const EXIT_CODES = {
  OK: 0,
  LEXER_ERROR: 1,
  USAGE_ERROR: 2,
  CONTRACT_ERROR: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Render tokens for stdout.
 *
 * - human: one `<Token: ...>` line per token
 * - json: array of `{ type, value, span }`
 * - compact: `line:column TYPE "value"` per token
 */
export function formatTokens(tokens: Token[], format: OutputFormat): string {
  switch (format) {
    case 'json':
      return JSON.stringify(tokens, null, 2);
    case 'compact':
      return tokens
        .map(
          (t) =>
            `${t.span.start.line}:${t.span.start.column} ${t.type} ${JSON.stringify(t.value)}`
        )
        .join('\n');
    case 'human':
      return tokens.map(formatToken).join('\n');
  }
}

/**
 * Format error for stderr output
 *
 * When source is available, scenelex errors are rendered with a source
 * snippet. Other errors fall back to their message.
 */
export function formatError(
  err: Error,
  source?: string,
  format: OutputFormat = 'human',
  contextLines: number = 2
): string {
  if (source !== undefined && err instanceof SceneError) {
    return formatEnrichedError(enrichError(err, source, contextLines), format);
  }

  if (err instanceof LexerError) {
    return `Lexer error at line ${err.location.line}: ${err.toData().message}`;
  }

  if (err instanceof ContractError) {
    return `Unsupported input: ${err.toData().message}`;
  }

  // Handle file not found errors (ENOENT)
  if ('code' in err && err.code === 'ENOENT' && 'path' in err) {
    return `File not found: ${String(err.path)}`;
  }

  return err.message;
}

/** Exit code matching an error raised while tokenizing */
export function exitCodeFor(err: unknown): ExitCode {
  if (err instanceof LexerError) return EXIT_CODES.LEXER_ERROR;
  if (err instanceof ContractError) return EXIT_CODES.CONTRACT_ERROR;
  return EXIT_CODES.USAGE_ERROR;
}

/** Version from the package.json next to src/ and dist/ */
export function readVersion(): string {
  const packageJsonPath = new URL('../package.json', import.meta.url);
  const packageJson = JSON.parse(fs.readFileSync(packageJsonPath, 'utf-8')) as {
    version: string;
  };
  return packageJson.version;
}
