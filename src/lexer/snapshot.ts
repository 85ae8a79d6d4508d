/**
 * Lexer Snapshots
 * Capture and restore scanner position for non-consuming lookahead
 */

import { ContractError } from '../types.js';
import { currentLocation, type LexerSnapshot, type LexerState } from './state.js';

export function captureState(state: LexerState): LexerSnapshot {
  const snapshot: LexerSnapshot = Object.freeze({
    pos: state.pos,
    line: state.line,
    column: state.column,
    indents: Object.freeze([...state.indents]),
  });
  state.snapshots.push(snapshot);
  return snapshot;
}

/** Snapshots close in strict LIFO order */
function closeSnapshot(state: LexerState, snapshot: LexerSnapshot): void {
  const innermost = state.snapshots[state.snapshots.length - 1];
  if (innermost !== snapshot) {
    const reason = state.snapshots.includes(snapshot)
      ? 'a later snapshot is still open'
      : 'snapshot is not open on this lexer';
    throw new ContractError(
      'SCN-C003',
      `Snapshot closed out of order: ${reason}`,
      currentLocation(state),
      { reason }
    );
  }
  state.snapshots.pop();
}

/** Rewind to the captured position and close the snapshot */
export function restoreState(state: LexerState, snapshot: LexerSnapshot): void {
  closeSnapshot(state, snapshot);
  state.pos = snapshot.pos;
  state.line = snapshot.line;
  state.column = snapshot.column;
  state.indents = [...snapshot.indents];
}

/** Close the snapshot, keeping everything consumed since it was captured */
export function releaseState(state: LexerState, snapshot: LexerSnapshot): void {
  closeSnapshot(state, snapshot);
}

export interface SnapshotScope {
  /** Keep the input consumed inside the scope instead of rewinding */
  commit(): void;
}

/**
 * Run `fn` under a snapshot. On every exit path the state is rewound unless
 * the scope was committed. A scope that returns with a snapshot of its own
 * still open fails with SCN-C003; one that throws keeps its error.
 *
 * @example
 * const blank = withSnapshot(state, (scope) => {
 *   skipSpaces(state);
 *   if (peek(state) !== '\n') return false;
 *   scope.commit();
 *   return true;
 * });
 */
export function withSnapshot<T>(
  state: LexerState,
  fn: (scope: SnapshotScope) => T
): T {
  const snapshot = captureState(state);
  let committed = false;

  try {
    const result = fn({
      commit: () => {
        committed = true;
      },
    });
    if (committed) {
      releaseState(state, snapshot);
    } else {
      restoreState(state, snapshot);
    }
    return result;
  } catch (err) {
    // Snapshots the failed scope left open are abandoned with it
    const index = state.snapshots.indexOf(snapshot);
    if (index !== -1) {
      state.snapshots.splice(index + 1);
      restoreState(state, snapshot);
    }
    throw err;
  }
}
