/**
 * Quire Module
 * Exports the lexer, token and error types, configuration and diagnostics
 */

export {
  closeIfCommand,
  createLexerState,
  currentMode,
  LEXER_ERROR_IDS,
  LexerError,
  nextToken,
  popMode,
  pushMode,
  resetLexerState,
  tokenize,
  tokenizeWithResult,
  type CommandFallthrough,
  type CommentState,
  type ErrorEvent,
  type ErrorRegion,
  type LexErrorKind,
  type LexerCallbacks,
  type LexerOptions,
  type LexerState,
  type ObservabilityCallbacks,
  type RegionEvent,
  type TokenizeOptions,
  type TokenizeResult,
  type WarningEvent,
} from './lexer/index.js';

// ============================================================
// CONFIGURATION
// ============================================================
export {
  CONFIG_FILE_NAME,
  createDefaultConfig,
  loadConfig,
  parseConfig,
  toTokenizeOptions,
  type LexerConfig,
} from './config.js';

// ============================================================
// DIAGNOSTICS
// ============================================================
export {
  describeRegionStack,
  extractSnippet,
  formatLexerError,
  renderCaretUnderline,
  type FormatOptions,
  type SnippetLine,
  type SourceSnippet,
} from './diagnostics.js';

export * from './types.js';
