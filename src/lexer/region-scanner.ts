/**
 * Region Scanner
 * Token rules common to text and math regions; the two differ only in
 * their escape tables, reserved characters and paragraph handling.
 */

import type { Token } from '../token-types.js';
import {
  isBlockCommentStart,
  isLineCommentStart,
  scanBlockComment,
  scanLineComment,
} from './comments.js';
import {
  passthroughFor,
  scanEscape,
  scanVerbatimRun,
  type EscapeRules,
} from './escapes.js';
import { advanceAndMakeLiteral } from './helpers.js';
import { scanLineEnd, type LineEndRules } from './newlines.js';
import { endOfInput, scanRegionMarker } from './regions.js';
import { currentLocation, isAtEnd, peek, type LexerState } from './state.js';

export function scanRegionToken(
  state: LexerState,
  rules: EscapeRules,
  lineEnd: LineEndRules
): Token {
  if (isAtEnd(state)) {
    return endOfInput(state);
  }

  const start = currentLocation(state);
  const ch = peek(state);

  if (ch === '|') {
    return scanRegionMarker(state, rules.modeMarkers);
  }

  if (ch === '\n') {
    return scanLineEnd(state, lineEnd);
  }

  if (ch === '\\') {
    return scanEscape(state, rules);
  }

  if (isBlockCommentStart(state)) {
    return scanBlockComment(state);
  }

  if (isLineCommentStart(state)) {
    return scanLineComment(state);
  }

  const replacement = passthroughFor(rules, ch);
  if (replacement !== undefined) {
    return advanceAndMakeLiteral(state, 1, replacement, start);
  }

  // `(`, a `/` that opens no comment, and reserved characters without a rule
  if (rules.reserved.has(ch)) {
    return advanceAndMakeLiteral(state, 1, ch, start);
  }

  return scanVerbatimRun(state, rules, start);
}
