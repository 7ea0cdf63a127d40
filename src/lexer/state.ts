/**
 * Lexer State
 * Tracks position, open regions and comment nesting during tokenization
 */

import type { SourceLocation } from '../source-location.js';
import type { ModeFrame } from '../token-types.js';
import type {
  CommandFallthrough,
  LexerCallbacks,
  LexerOptions,
  ObservabilityCallbacks,
} from './types.js';

/** Nesting depth and text of the comment currently being scanned */
export interface CommentState {
  depth: number;
  readonly buffer: string[];
  /** Where the outermost open comment started */
  openedAt: SourceLocation | undefined;
}

/**
 * One lexing pass over one source. Never share a state between passes;
 * call resetLexerState before reusing it.
 */
export interface LexerState {
  source: string;
  pos: number;
  line: number;
  column: number;
  readonly baseLocation: SourceLocation | undefined;
  readonly modeStack: ModeFrame[];
  readonly comment: CommentState;
  readonly commandFallthrough: CommandFallthrough;
  readonly callbacks: LexerCallbacks;
  readonly observability: ObservabilityCallbacks;
}

const defaultCallbacks: LexerCallbacks = {
  onWarning: (event) => {
    console.warn(
      `quire: ${event.message} at ${event.location.line}:${event.location.column}`
    );
  },
};

export function createLexerState(
  source: string,
  options: LexerOptions = {}
): LexerState {
  return {
    source,
    pos: 0,
    line: options.baseLocation?.line ?? 1,
    column: options.baseLocation?.column ?? 1,
    baseLocation: options.baseLocation,
    modeStack: [],
    comment: { depth: 0, buffer: [], openedAt: undefined },
    commandFallthrough: options.commandFallthrough ?? 'comment',
    callbacks: { ...defaultCallbacks, ...options.callbacks },
    observability: options.observability ?? {},
  };
}

/** Rewind to the start and drop all open regions and comments */
export function resetLexerState(state: LexerState, source?: string): void {
  if (source !== undefined) {
    state.source = source;
  }
  state.pos = 0;
  state.line = state.baseLocation?.line ?? 1;
  state.column = state.baseLocation?.column ?? 1;
  state.modeStack.length = 0;
  state.comment.depth = 0;
  state.comment.buffer.length = 0;
  state.comment.openedAt = undefined;
}

export function currentLocation(state: LexerState): SourceLocation {
  return {
    line: state.line,
    column: state.column,
    offset: state.pos + (state.baseLocation?.offset ?? 0),
  };
}

export function peek(state: LexerState, offset = 0): string {
  return state.source.charAt(state.pos + offset);
}

export function peekString(state: LexerState, length: number, offset = 0): string {
  const start = state.pos + offset;
  return state.source.slice(start, start + length);
}

export function advance(state: LexerState): string {
  const ch = state.source.charAt(state.pos);
  state.pos++;
  if (ch === '\n') {
    state.line++;
    state.column = 1;
  } else {
    state.column++;
  }
  return ch;
}

/** Advance n characters and return them */
export function advanceBy(state: LexerState, n: number): string {
  let consumed = '';
  for (let i = 0; i < n; i++) consumed += advance(state);
  return consumed;
}

export function isAtEnd(state: LexerState): boolean {
  return state.pos >= state.source.length;
}
