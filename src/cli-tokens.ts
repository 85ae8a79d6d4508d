#!/usr/bin/env node
/**
 * scenelex CLI - Print the token stream of a scene file
 *
 * Usage:
 *   scenelex scene.txt
 *   cat scene.txt | scenelex -
 *   scenelex --format json scene.txt
 *   scenelex --explain SCN-L002
 */

import * as fs from 'fs';
import type { Token } from './types.js';
import { TOKEN_TYPES } from './types.js';
import { TokenStream } from './lexer/index.js';
import { describeUnknownErrorId, explainError } from './cli-explain.js';
import { isOutputFormat, type OutputFormat } from './cli-error-formatter.js';
import {
  EXIT_CODES,
  exitCodeFor,
  formatError,
  formatTokens,
  readVersion,
  type ExitCode,
} from './cli-shared.js';
import { createDefaultConfig, loadConfig, type LexConfig } from './config.js';

export type CliCommand =
  | {
      mode: 'tokens';
      file: string;
      format?: OutputFormat | undefined;
      includeComments?: boolean | undefined;
    }
  | { mode: 'explain'; errorId: string }
  | { mode: 'help' }
  | { mode: 'version' };

/**
 * Parse command-line arguments into structured command
 *
 * @throws Error on unknown options or missing values
 */
export function parseArgs(argv: string[]): CliCommand {
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version')) {
    return { mode: 'version' };
  }

  let file: string | undefined;
  let format: OutputFormat | undefined;
  let includeComments: boolean | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';

    if (arg === '--explain') {
      const errorId = argv[i + 1];
      if (errorId === undefined) {
        throw new Error('Missing error ID after --explain');
      }
      return { mode: 'explain', errorId };
    }

    if (arg === '--format' || arg.startsWith('--format=')) {
      const value = arg === '--format' ? argv[++i] : arg.slice('--format='.length);
      if (!isOutputFormat(value)) {
        throw new Error(
          `Invalid format: ${value ?? '(missing)'} (expected human, json, or compact)`
        );
      }
      format = value;
      continue;
    }

    if (arg === '--comments' || arg === '--no-comments') {
      includeComments = arg === '--comments';
      continue;
    }

    if (arg.startsWith('-') && arg !== '-') {
      throw new Error(`Unknown option: ${arg}`);
    }

    if (file !== undefined) {
      throw new Error(`Unexpected argument: ${arg}`);
    }
    file = arg;
  }

  if (file === undefined) {
    return { mode: 'help' };
  }

  return { mode: 'tokens', file, format, includeComments };
}

export interface LexOutcome {
  readonly stdout: string;
  readonly stderr: string;
  readonly code: ExitCode;
}

/**
 * Tokenize `source` and render the result. Tokens scanned before a failure
 * are still printed.
 */
export function lexSource(source: string, config: LexConfig): LexOutcome {
  const stream = new TokenStream(source);
  const tokens: Token[] = [];

  try {
    for (const token of stream) {
      if (token.type === TOKEN_TYPES.COMMENT && !config.includeComments) {
        continue;
      }
      tokens.push(token);
    }
  } catch (err) {
    if (!(err instanceof Error)) throw err;
    return {
      stdout: formatTokens(tokens, config.format),
      stderr: formatError(err, source, config.format, config.contextLines),
      code: exitCodeFor(err),
    };
  }

  return {
    stdout: formatTokens(tokens, config.format),
    stderr: '',
    code: EXIT_CODES.OK,
  };
}

function showHelp(): void {
  console.log(`scenelex - print the token stream of a scene description

Usage:
  scenelex <file>               Tokenize a file
  scenelex -                    Tokenize stdin
  scenelex --explain <id>       Show documentation for an error ID
  scenelex --help               Show this help message
  scenelex --version            Show version information

Options:
  --format <human|json|compact> Output format (default: human)
  --comments, --no-comments     Include or drop COMMENT tokens

Defaults are read from .scenelex.yaml in the working directory.

Exit codes:
  0  tokenized successfully
  1  lexical error
  2  usage or file error
  3  unsupported input (bare carriage return, exotic whitespace)`);
}

function readSource(file: string): string {
  return file === '-'
    ? fs.readFileSync(0, 'utf-8')
    : fs.readFileSync(file, 'utf-8');
}

/**
 * Entry point for the scenelex binary
 */
function main(): void {
  let command: CliCommand;
  try {
    command = parseArgs(process.argv.slice(2));
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    process.exit(EXIT_CODES.USAGE_ERROR);
  }

  if (command.mode === 'help') {
    showHelp();
    return;
  }

  if (command.mode === 'version') {
    console.log(`scenelex ${readVersion()}`);
    return;
  }

  if (command.mode === 'explain') {
    const doc = explainError(command.errorId);
    if (doc === null) {
      console.error(describeUnknownErrorId(command.errorId));
      process.exit(EXIT_CODES.USAGE_ERROR);
    }
    console.log(doc);
    return;
  }

  let config: LexConfig;
  let source: string;
  try {
    const base = loadConfig(process.cwd()) ?? createDefaultConfig();
    config = {
      format: command.format ?? base.format,
      includeComments: command.includeComments ?? base.includeComments,
      contextLines: base.contextLines,
    };
    source = readSource(command.file);
  } catch (err) {
    console.error(err instanceof Error ? formatError(err) : String(err));
    process.exit(EXIT_CODES.USAGE_ERROR);
  }

  const outcome = lexSource(source, config);
  if (outcome.stdout !== '') {
    console.log(outcome.stdout);
  }
  if (outcome.stderr !== '') {
    console.error(outcome.stderr);
  }
  process.exit(outcome.code);
}

// Only run main if this is the entry point (not imported)
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  main();
}
