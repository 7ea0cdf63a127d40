/**
 * Text Scanner
 * Descriptive text: paragraph breaks and `#`, `_`, `%` passthrough escaping
 */

import type { Token } from '../token-types.js';
import { scanCommand } from './command.js';
import { TEXT_RULES } from './escapes.js';
import type { LineEndRules } from './newlines.js';
import { scanRegionToken } from './region-scanner.js';
import type { LexerState } from './state.js';

const TEXT_LINE_ENDS: LineEndRules = {
  paragraphs: true,
  onTabTrigger: (state) => scanCommand(state),
};

export function scanText(state: LexerState): Token {
  return scanRegionToken(state, TEXT_RULES, TEXT_LINE_ENDS);
}
