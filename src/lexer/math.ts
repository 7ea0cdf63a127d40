/**
 * Math Scanner
 * Mathematical text: no paragraphs, `_` and `^` are ordinary characters and
 * `\_` is an escape
 */

import type { Token } from '../token-types.js';
import { scanCommand } from './command.js';
import { MATH_RULES } from './escapes.js';
import type { LineEndRules } from './newlines.js';
import { scanRegionToken } from './region-scanner.js';
import type { LexerState } from './state.js';

const MATH_LINE_ENDS: LineEndRules = {
  paragraphs: false,
  onTabTrigger: (state) => scanCommand(state),
};

export function scanMath(state: LexerState): Token {
  return scanRegionToken(state, MATH_RULES, MATH_LINE_ENDS);
}
