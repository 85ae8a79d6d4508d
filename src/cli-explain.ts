/**
 * CLI Error Explanation
 * `scenelex --explain`: registry documentation for one error ID
 */

import type { ErrorCategory, ErrorDefinition } from './types.js';
import { ERROR_ID_PATTERN, ERROR_REGISTRY } from './types.js';

const CATEGORY_LETTERS: Record<string, ErrorCategory> = {
  L: 'lexer',
  C: 'contract',
};

/**
 * Normalize user input to a registry ID. Case is ignored and the `SCN-`
 * prefix may be left out: `l002`, `scn-l002` and `SCN-L002` are the same.
 *
 * @returns The ID in canonical form, or null when it is not well-formed
 */
export function normalizeErrorId(input: string): string | null {
  const upper = input.trim().toUpperCase();
  const id = upper.startsWith('SCN-') ? upper : `SCN-${upper}`;
  return ERROR_ID_PATTERN.test(id) ? id : null;
}

/**
 * Render full error documentation.
 *
 * @returns Formatted documentation, or null if the ID is malformed or unknown
 *
 * @example
 * explainError('l003')
 * // SCN-L003 (lexer): Unexpected end of input
 * // Message: Unexpected end of input
 * // ...
 */
export function explainError(input: string): string | null {
  const id = normalizeErrorId(input);
  const definition = id === null ? undefined : ERROR_REGISTRY.get(id);
  if (!definition) {
    return null;
  }

  const lines = [
    `${definition.errorId} (${definition.category}): ${definition.description}`,
    `Message: ${definition.messageTemplate}`,
    ...section('Cause', definition.cause),
    ...section('Resolution', definition.resolution),
    ...exampleLines(definition),
  ];
  return lines.join('\n');
}

/**
 * Message for an ID the registry does not know. Lists the IDs of the same
 * category when the input names one, otherwise every registered ID.
 */
export function describeUnknownErrorId(input: string): string {
  const id = normalizeErrorId(input);
  const category = id === null ? undefined : CATEGORY_LETTERS[id.charAt(4)];

  const known: string[] = [];
  for (const [errorId, definition] of ERROR_REGISTRY.entries()) {
    if (category === undefined || definition.category === category) {
      known.push(errorId);
    }
  }

  const label = category === undefined ? 'Known errors' : `Known ${category} errors`;
  return `Unknown error ID: ${input}\n${label}: ${known.join(', ')}`;
}

function section(title: string, body: string | undefined): string[] {
  return body ? ['', `${title}:`, `  ${body}`] : [];
}

function exampleLines(definition: ErrorDefinition): string[] {
  const examples = definition.examples ?? [];
  if (examples.length === 0) return [];

  const lines = ['', 'Examples:'];
  for (const [i, example] of examples.entries()) {
    if (i > 0) lines.push('');
    lines.push(`  ${example.description}`, '');
    lines.push(...example.code.split('\n').map((line) => `    ${line}`));
  }
  return lines;
}
