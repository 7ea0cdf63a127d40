/**
 * Command Scanner
 * Command bodies. Markers, comments and newlines are recognized; any other
 * character either starts comment accumulation (the default) or is scanned
 * as text, per the state's commandFallthrough setting.
 */

import type { Token } from '../token-types.js';
import {
  divertIntoComment,
  isBlockCommentStart,
  isLineCommentStart,
  scanBlockComment,
  scanLineComment,
} from './comments.js';
import { scanPlainNewline } from './newlines.js';
import { ALL_MODE_MARKERS, endOfInput, scanRegionMarker } from './regions.js';
import { isAtEnd, peek, type LexerState } from './state.js';
import { scanText } from './text.js';

export function scanCommand(state: LexerState): Token {
  if (isAtEnd(state)) {
    return endOfInput(state);
  }

  if (isBlockCommentStart(state)) {
    return scanBlockComment(state);
  }

  if (isLineCommentStart(state)) {
    return scanLineComment(state);
  }

  const ch = peek(state);

  if (ch === '|') {
    return scanRegionMarker(state, ALL_MODE_MARKERS);
  }

  if (ch === '\n') {
    return scanPlainNewline(state);
  }

  if (state.commandFallthrough === 'text') {
    return scanText(state);
  }

  return divertIntoComment(state);
}
