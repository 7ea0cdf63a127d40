/**
 * Comment Scanner
 * Nested block comments and the one-character line comment shorthand
 */

import type { SourceLocation } from '../source-location.js';
import type { CommentToken } from '../token-types.js';
import { unexpectedEndOfInput } from './errors.js';
import { makeComment } from './helpers.js';
import {
  advance,
  advanceBy,
  currentLocation,
  isAtEnd,
  peek,
  peekString,
  type LexerState,
} from './state.js';

/** `/*` at the current position */
export function isBlockCommentStart(state: LexerState): boolean {
  return peekString(state, 2) === '/*';
}

/** `//`, exactly one character, then a newline */
export function isLineCommentStart(state: LexerState): boolean {
  const body = peek(state, 2);
  return (
    peekString(state, 2) === '//' &&
    body !== '' &&
    body !== '\n' &&
    peek(state, 3) === '\n'
  );
}

/** Scan `/* ... *\/` including any nested comments */
export function scanBlockComment(state: LexerState): CommentToken {
  const start = currentLocation(state);
  openComment(state, start, advanceBy(state, 2));
  return continueComment(state, start);
}

/** Scan `//x\n` as a comment that opens and closes at once */
export function scanLineComment(state: LexerState): CommentToken {
  const start = currentLocation(state);
  const text = advanceBy(state, 4);
  return makeComment(text, start, currentLocation(state));
}

/**
 * Start comment accumulation on an ordinary character of a command body.
 * The comment then ends at the next `*\/`.
 */
export function divertIntoComment(state: LexerState): CommentToken {
  const start = currentLocation(state);
  state.callbacks.onWarning({
    message: `character ${JSON.stringify(peek(state))} in command body starts a comment that only */ ends`,
    location: start,
  });
  openComment(state, start, advance(state));
  return continueComment(state, start);
}

// Transition from depth 0 to depth 1: the only place the buffer is cleared
function openComment(
  state: LexerState,
  start: SourceLocation,
  opening: string
): void {
  const { comment } = state;
  comment.depth = 1;
  comment.buffer.length = 0;
  comment.buffer.push(opening);
  comment.openedAt = start;
}

function continueComment(
  state: LexerState,
  start: SourceLocation
): CommentToken {
  const { comment } = state;

  while (comment.depth > 0) {
    if (isAtEnd(state)) {
      throw unexpectedEndOfInput(state, 'comment');
    }

    const pair = peekString(state, 2);
    if (pair === '*/') {
      comment.buffer.push(advanceBy(state, 2));
      comment.depth--;
    } else if (pair === '/*') {
      comment.buffer.push(advanceBy(state, 2));
      comment.depth++;
    } else if (pair === '\\"') {
      advanceBy(state, 2);
      comment.buffer.push('"');
    } else {
      comment.buffer.push(advance(state));
    }
  }

  const text = comment.buffer.join('');
  comment.buffer.length = 0;
  comment.openedAt = undefined;
  return makeComment(text, start, currentLocation(state));
}
