/**
 * Line Ends
 * Newline rules shared by the scanners. Longest match wins between the tab
 * trigger `\n\t+`, a plain `\n` and a paragraph break `(\n[ \t]*)+\n`.
 */

import { TOKEN_TYPES, type Token } from '../token-types.js';
import { isHorizontalSpace } from './helpers.js';
import { closeIfCommand } from './mode-stack.js';
import {
  advanceBy,
  currentLocation,
  peek,
  type LexerState,
} from './state.js';

export interface LineEndRules {
  /** Whether blank-line runs become paragraph breaks */
  readonly paragraphs: boolean;
  /** Scanner run once after a newline followed by tabs */
  readonly onTabTrigger: (state: LexerState) => Token;
}

/** Length of `\n\t+` at the current position, 0 if absent */
function tabTriggerLength(state: LexerState): number {
  let length = 1;
  while (peek(state, length) === '\t') length++;
  return length > 1 ? length : 0;
}

interface ParagraphMatch {
  readonly length: number;
  readonly newlines: number;
}

/** Longest `(\n[ \t]*)+\n` at the current position */
function matchParagraphBreak(state: LexerState): ParagraphMatch | undefined {
  let newlines = 0;
  let best: ParagraphMatch | undefined;

  for (let i = 0; ; i++) {
    const ch = peek(state, i);
    if (ch === '\n') {
      newlines++;
      if (newlines >= 2) best = { length: i + 1, newlines };
    } else if (!isHorizontalSpace(ch)) {
      return best;
    }
  }
}

/** Scan a token starting with `\n` */
export function scanLineEnd(state: LexerState, rules: LineEndRules): Token {
  const start = currentLocation(state);
  const trigger = tabTriggerLength(state);
  const paragraph = rules.paragraphs ? matchParagraphBreak(state) : undefined;

  if (paragraph !== undefined && paragraph.length > Math.max(trigger, 1)) {
    const lexeme = advanceBy(state, paragraph.length);
    return {
      type: TOKEN_TYPES.PARAGRAPH_BREAK,
      blankLines: paragraph.newlines,
      value: lexeme,
      span: { start, end: currentLocation(state) },
    };
  }

  if (trigger > 0) {
    advanceBy(state, trigger);
    return rules.onTabTrigger(state);
  }

  return scanPlainNewline(state);
}

/**
 * A single `\n`: closes an open command frame, otherwise yields the newline
 * as a literal.
 */
export function scanPlainNewline(state: LexerState): Token {
  const start = currentLocation(state);
  const lexeme = advanceBy(state, 1);
  const span = { start, end: currentLocation(state) };
  const token = closeIfCommand(state, span, lexeme);
  return token.type === TOKEN_TYPES.LITERAL ? { ...token, value: lexeme } : token;
}
