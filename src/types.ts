/**
 * Quire Types
 * Source locations, tokens and the error hierarchy
 */

export {
  formatLocation,
  type SourceLocation,
  type SourceSpan,
} from './source-location.js';

export {
  MATH_MODE,
  TEXT_MODE,
  TOKEN_TYPES,
  commandMode,
  describeMode,
  type CommandInvocation,
  type CommandMode,
  type CommentToken,
  type EofToken,
  type LiteralToken,
  type MathMode,
  type Mode,
  type ModeFrame,
  type ModeKind,
  type ParagraphBreakToken,
  type RegionBeginToken,
  type RegionEndToken,
  type TextMode,
  type Token,
  type TokenType,
} from './token-types.js';

export {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorRegistry,
} from './error-registry.js';

export {
  QuireError,
  createError,
  type QuireErrorData,
} from './error-classes.js';
