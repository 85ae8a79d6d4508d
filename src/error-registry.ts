/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/**
 * Error category determining error ID prefix.
 * - lexer (L): malformed source text, reported to the consuming parser
 * - contract (C): input or caller preconditions the lexer does not accept
 */
export type ErrorCategory = 'lexer' | 'contract';

/**
 * Example demonstrating an error condition.
 * Used by `scenelex --explain` to show common scenarios.
 */
export interface ErrorExample {
  readonly description: string;
  readonly code: string;
}

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: SCN-{category}{3-digit} (e.g., SCN-L001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Human-readable description */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  readonly cause?: string | undefined;
  readonly resolution?: string | undefined;
  readonly examples?: ErrorExample[] | undefined;
}

/** Matches every well-formed error ID */
export const ERROR_ID_PATTERN = /^SCN-[LC]\d{3}$/;

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Central registry for all error definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();

    for (const def of definitions) {
      idMap.set(def.errorId, def);
    }

    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Lexer Errors (SCN-L0xx)
  {
    errorId: 'SCN-L001',
    category: 'lexer',
    description: 'Unterminated string literal',
    messageTemplate: 'Unterminated string literal',
    cause:
      'A line break appeared inside a quoted string before its closing quote.',
    resolution:
      'Close the string on the same line, or escape the line break with a backslash.',
    examples: [
      {
        description: 'Missing closing quote',
        code: 'text = "hello\nsize = 12',
      },
    ],
  },
  {
    errorId: 'SCN-L002',
    category: 'lexer',
    description: 'Inconsistent indentation',
    messageTemplate: 'Inconsistent use of tabs and spaces in indentation',
    cause:
      'The leading whitespace of a line differs from the enclosing block at a column both of them cover.',
    resolution:
      'Indent every line of a block with the same characters. Do not mix tabs and spaces.',
    examples: [
      {
        description: 'Spaces on one line, a tab on the next',
        code: 'Scene\n  Rect\n\tCircle',
      },
    ],
  },
  {
    errorId: 'SCN-L003',
    category: 'lexer',
    description: 'Unexpected end of input',
    messageTemplate: 'Unexpected end of input',
    cause:
      'The source ended in the middle of a token, e.g. inside a string or right after a backslash.',
    resolution: 'Complete the token before the end of the file.',
    examples: [
      {
        description: 'String never closed',
        code: 'label = "unfinished',
      },
    ],
  },

  // Contract Errors (SCN-C0xx)
  {
    errorId: 'SCN-C001',
    category: 'contract',
    description: 'Bare carriage return',
    messageTemplate: 'Carriage return not followed by line feed',
    cause: 'Only \\n and \\r\\n are accepted as line terminators.',
    resolution: 'Convert the input to \\n or \\r\\n line endings before tokenizing.',
  },
  {
    errorId: 'SCN-C002',
    category: 'contract',
    description: 'Unsupported whitespace',
    messageTemplate: 'Unsupported whitespace character {char}',
    cause:
      'Whitespace other than space, tab and line terminators appeared outside a string or comment.',
    resolution: 'Replace the character with a space.',
  },
  {
    errorId: 'SCN-C003',
    category: 'contract',
    description: 'Snapshot closed out of order',
    messageTemplate: 'Snapshot closed out of order: {reason}',
    cause:
      'A lexer snapshot was restored or released while a snapshot taken after it was still open, or it was already closed.',
    resolution:
      'Close snapshots in reverse order of capture, or use withSnapshot() to scope them.',
  },
];

/**
 * Global error registry instance.
 * Read-only singleton initialized at module load.
 */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Renders a message template by replacing placeholders with context values.
 *
 * Placeholder format: {varName}
 * Missing context values render as empty string.
 * Non-string values are coerced via String().
 * Invalid templates (unclosed braces) return template unchanged.
 *
 * @example
 * renderMessage("Unsupported whitespace character {char}", { char: "U+000C" })
 * // Returns: "Unsupported whitespace character U+000C"
 *
 * @example
 * renderMessage("Hello {name}", {})
 * // Returns: "Hello "
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === '{' && template.charAt(i + 1) !== '{') {
      const close = template.indexOf('}', i + 1);

      // Unclosed brace - return template unchanged
      if (close === -1) {
        return template;
      }

      const value = context[template.slice(i + 1, close)];
      if (value !== undefined) {
        result += String(value);
      }

      i = close + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
