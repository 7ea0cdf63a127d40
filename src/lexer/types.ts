/**
 * Lexer Types
 *
 * Options and callbacks accepted by the lexer.
 * These types are the primary interface for host applications.
 */

import type { SourceLocation, SourceSpan } from '../source-location.js';
import type { ModeFrame, Token } from '../token-types.js';
import type { LexerError } from './errors.js';

/**
 * What an unrecognized character in a command body does.
 * - 'comment': starts comment accumulation, ended by the next `*\/`
 * - 'text': scanned with the text region rules
 */
export type CommandFallthrough = 'comment' | 'text';

/** Warning raised while scanning; scanning continues */
export interface WarningEvent {
  readonly message: string;
  readonly location: SourceLocation;
}

/** I/O callbacks for lexer diagnostics */
export interface LexerCallbacks {
  /** Called when input is accepted but probably not what the author meant */
  onWarning: (event: WarningEvent) => void;
}

/** Observability callbacks for monitoring a lexing pass */
export interface ObservabilityCallbacks {
  /** Called for every token returned by the dispatcher */
  onToken?: (token: Token) => void;
  /** Called when a frame is pushed onto the mode stack */
  onRegionEnter?: (event: RegionEvent) => void;
  /** Called when a frame is popped from the mode stack */
  onRegionExit?: (event: RegionEvent) => void;
  /** Called when scanning fails, before the error propagates */
  onError?: (event: ErrorEvent) => void;
}

export interface RegionEvent {
  readonly frame: ModeFrame;
  /** Stack depth after the change */
  readonly depth: number;
  /** Span of the marker that caused the change */
  readonly span: SourceSpan;
}

export interface ErrorEvent {
  readonly error: LexerError;
}

/** Options fixed for the lifetime of a lexer state */
export interface LexerOptions {
  /** Position of the first character, for sources embedded in a larger file */
  baseLocation?: SourceLocation | undefined;
  commandFallthrough?: CommandFallthrough | undefined;
  callbacks?: Partial<LexerCallbacks> | undefined;
  observability?: ObservabilityCallbacks | undefined;
}
