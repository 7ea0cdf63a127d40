/**
 * Lexer Helper Functions
 * Character classification and token construction
 */

import type { SourceLocation } from '../source-location.js';
import {
  TOKEN_TYPES,
  type CommentToken,
  type LiteralToken,
} from '../token-types.js';
import { advanceBy, currentLocation, type LexerState } from './state.js';

function isLetter(ch: string): boolean {
  return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z');
}

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

/** Characters that may start or continue a command name, except space */
export function isNameLetter(ch: string): boolean {
  return isLetter(ch) || isDigit(ch) || ch === '.' || ch === '_';
}

/** `[A-Za-z0-9._ ]` */
export function isNameChar(ch: string): boolean {
  return isNameLetter(ch) || ch === ' ';
}

export function isHorizontalSpace(ch: string): boolean {
  return ch === ' ' || ch === '\t';
}

export function makeLiteral(
  value: string,
  start: SourceLocation,
  end: SourceLocation
): LiteralToken {
  return { type: TOKEN_TYPES.LITERAL, value, span: { start, end } };
}

export function makeComment(
  value: string,
  start: SourceLocation,
  end: SourceLocation
): CommentToken {
  return { type: TOKEN_TYPES.COMMENT, value, span: { start, end } };
}

/** Advance n times and return a literal with the given text */
export function advanceAndMakeLiteral(
  state: LexerState,
  n: number,
  value: string,
  start: SourceLocation
): LiteralToken {
  advanceBy(state, n);
  return makeLiteral(value, start, currentLocation(state));
}
