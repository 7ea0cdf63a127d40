/**
 * Lexer Module
 * Converts source text into region, literal and comment tokens
 */

export {
  LexerError,
  LEXER_ERROR_IDS,
  type ErrorRegion,
  type LexErrorKind,
} from './errors.js';
export { closeIfCommand, currentMode, popMode, pushMode } from './mode-stack.js';
export {
  createLexerState,
  resetLexerState,
  type CommentState,
  type LexerState,
} from './state.js';
export {
  nextToken,
  tokenize,
  tokenizeWithResult,
  type TokenizeOptions,
  type TokenizeResult,
} from './tokenizer.js';
export type {
  CommandFallthrough,
  ErrorEvent,
  LexerCallbacks,
  LexerOptions,
  ObservabilityCallbacks,
  RegionEvent,
  WarningEvent,
} from './types.js';
