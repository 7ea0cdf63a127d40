/**
 * Mode Stack
 * LIFO record of open regions. Pushes and pops happen only here.
 */

import type { SourceSpan } from '../source-location.js';
import {
  TEXT_MODE,
  TOKEN_TYPES,
  type CommandInvocation,
  type LiteralToken,
  type Mode,
  type ModeFrame,
  type RegionBeginToken,
  type RegionEndToken,
} from '../token-types.js';
import { mismatchedDelimiter } from './errors.js';
import type { LexerState } from './state.js';

export function pushMode(
  state: LexerState,
  mode: Mode,
  span: SourceSpan,
  lexeme: string,
  invocation?: CommandInvocation
): RegionBeginToken {
  const frame: ModeFrame = { mode, span };
  state.modeStack.push(frame);
  state.observability.onRegionEnter?.({
    frame,
    depth: state.modeStack.length,
    span,
  });

  return {
    type: TOKEN_TYPES.REGION_BEGIN,
    mode,
    invocation: mode.kind === 'command' ? invocation : undefined,
    value: lexeme,
    span,
  };
}

/**
 * Close the innermost region.
 * @throws LexerError (MismatchedDelimiter) when no region is open
 */
export function popMode(
  state: LexerState,
  span: SourceSpan,
  lexeme: string
): RegionEndToken {
  const frame = state.modeStack.pop();
  if (frame === undefined) {
    throw mismatchedDelimiter(state, span, lexeme);
  }

  state.observability.onRegionExit?.({
    frame,
    depth: state.modeStack.length,
    span,
  });

  return { type: TOKEN_TYPES.REGION_END, mode: frame.mode, value: lexeme, span };
}

/** Mode of the innermost region; text when nothing is open */
export function currentMode(state: LexerState): Mode {
  return topFrame(state)?.mode ?? TEXT_MODE;
}

export function topFrame(state: LexerState): ModeFrame | undefined {
  return state.modeStack[state.modeStack.length - 1];
}

/**
 * Close the innermost region only if it is a command. Otherwise nothing
 * changes and an empty literal carrying `lexeme`'s span is returned.
 */
export function closeIfCommand(
  state: LexerState,
  span: SourceSpan,
  lexeme: string
): RegionEndToken | LiteralToken {
  if (topFrame(state)?.mode.kind === 'command') {
    return popMode(state, span, lexeme);
  }
  return { type: TOKEN_TYPES.LITERAL, value: '', span };
}
