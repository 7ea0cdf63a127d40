/**
 * Lexer Errors
 */

import { QuireError } from '../error-classes.js';
import { ERROR_REGISTRY, renderMessage } from '../error-registry.js';
import type { SourceLocation, SourceSpan } from '../source-location.js';
import type { ModeFrame, ModeKind } from '../token-types.js';
import { currentLocation, type LexerState } from './state.js';

export type LexErrorKind =
  | 'MismatchedDelimiter'
  | 'InvalidEscape'
  | 'UnexpectedEndOfInput';

/** Where a failure happened: one of the region kinds, or inside a comment */
export type ErrorRegion = ModeKind | 'comment';

export const LEXER_ERROR_IDS = {
  MismatchedDelimiter: 'QUIRE-L001',
  InvalidEscape: 'QUIRE-L002',
  UnexpectedEndOfInput: 'QUIRE-L003',
} as const satisfies Record<LexErrorKind, string>;

function isLexErrorKind(value: string): value is LexErrorKind {
  return Object.hasOwn(LEXER_ERROR_IDS, value);
}

export class LexerError extends QuireError {
  // Lexer errors always have a location (the span start)
  override readonly location: SourceLocation;
  readonly kind: LexErrorKind;
  readonly span: SourceSpan;
  /** Regions open at the moment of failure, outermost first */
  readonly stackSnapshot: readonly ModeFrame[];
  readonly region: ErrorRegion | undefined;

  constructor(
    errorId: string,
    message: string,
    span: SourceSpan,
    stackSnapshot: readonly ModeFrame[],
    context?: Record<string, unknown>
  ) {
    const definition = ERROR_REGISTRY.get(errorId);

    if (!definition) {
      throw new TypeError(`Unknown error ID: ${errorId}`);
    }

    const kind = definition.description;
    if (definition.category !== 'lexer' || !isLexErrorKind(kind)) {
      throw new TypeError(`Expected lexer error ID, got: ${errorId}`);
    }

    super({ errorId, message, location: span.start, context });

    this.name = 'LexerError';
    this.location = span.start;
    this.kind = kind;
    this.span = span;
    this.stackSnapshot = Object.freeze([...stackSnapshot]);
    this.region = readRegion(context);
  }
}

function readRegion(
  context: Record<string, unknown> | undefined
): ErrorRegion | undefined {
  const region = context?.['region'];
  switch (region) {
    case 'text':
    case 'math':
    case 'command':
    case 'comment':
      return region;
    default:
      return undefined;
  }
}

// ============================================================
// FACTORIES
// ============================================================

function buildError(
  state: LexerState,
  kind: LexErrorKind,
  span: SourceSpan,
  context: Record<string, unknown>
): LexerError {
  const errorId = LEXER_ERROR_IDS[kind];
  const template = ERROR_REGISTRY.get(errorId)?.messageTemplate ?? kind;
  return new LexerError(
    errorId,
    renderMessage(template, context),
    span,
    state.modeStack,
    context
  );
}

/** Close marker with an empty mode stack */
export function mismatchedDelimiter(
  state: LexerState,
  span: SourceSpan,
  marker: string
): LexerError {
  return buildError(state, 'MismatchedDelimiter', span, { marker });
}

export function invalidEscape(
  state: LexerState,
  region: 'text' | 'math',
  sequence: string,
  span: SourceSpan
): LexerError {
  return buildError(state, 'InvalidEscape', span, { region, sequence });
}

/** Zero-width error at the current (end) position */
export function unexpectedEndOfInput(
  state: LexerState,
  region: ErrorRegion
): LexerError {
  const here = currentLocation(state);
  const context: Record<string, unknown> = { region };
  if (region === 'comment' && state.comment.openedAt) {
    context['openedAt'] = state.comment.openedAt;
  }
  return buildError(state, 'UnexpectedEndOfInput', { start: here, end: here }, context);
}
