import type { SourceSpan } from './source-location.js';

// ============================================================
// REGION MODES
// ============================================================

export interface TextMode {
  readonly kind: 'text';
}

export interface MathMode {
  readonly kind: 'math';
}

export interface CommandMode {
  readonly kind: 'command';
  readonly name: string;
}

/** Kind of lexical region; each has its own escaping rules */
export type Mode = TextMode | MathMode | CommandMode;

export type ModeKind = Mode['kind'];

export const TEXT_MODE: TextMode = Object.freeze({ kind: 'text' });
export const MATH_MODE: MathMode = Object.freeze({ kind: 'math' });

export function commandMode(name: string): CommandMode {
  return Object.freeze({ kind: 'command', name });
}

/**
 * An open region paired with the span of the marker that opened it.
 * Used for diagnostics only.
 */
export interface ModeFrame {
  readonly mode: Mode;
  readonly span: SourceSpan;
}

/** `|NAME->` is explicit, `|NAME` is implicit */
export type CommandInvocation = 'explicit' | 'implicit';

// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_TYPES = {
  REGION_BEGIN: 'REGION_BEGIN', // |m |t |NAME-> |NAME
  REGION_END: 'REGION_END', // | |END newline
  LITERAL: 'LITERAL',
  PARAGRAPH_BREAK: 'PARAGRAPH_BREAK',
  COMMENT: 'COMMENT', // /* */ and //x
  EOF: 'EOF',
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

interface TokenBase {
  /** Payload text for literals and comments, source lexeme otherwise */
  readonly value: string;
  readonly span: SourceSpan;
}

export interface RegionBeginToken extends TokenBase {
  readonly type: typeof TOKEN_TYPES.REGION_BEGIN;
  readonly mode: Mode;
  /** Only set when `mode` is a command */
  readonly invocation?: CommandInvocation | undefined;
}

export interface RegionEndToken extends TokenBase {
  readonly type: typeof TOKEN_TYPES.REGION_END;
  readonly mode: Mode;
}

export interface LiteralToken extends TokenBase {
  readonly type: typeof TOKEN_TYPES.LITERAL;
}

export interface ParagraphBreakToken extends TokenBase {
  readonly type: typeof TOKEN_TYPES.PARAGRAPH_BREAK;
  /** Number of newline characters in the break */
  readonly blankLines: number;
}

export interface CommentToken extends TokenBase {
  readonly type: typeof TOKEN_TYPES.COMMENT;
}

export interface EofToken extends TokenBase {
  readonly type: typeof TOKEN_TYPES.EOF;
}

export type Token =
  | RegionBeginToken
  | RegionEndToken
  | LiteralToken
  | ParagraphBreakToken
  | CommentToken
  | EofToken;

/** Human-readable region name, e.g. "math region" or "command `bold`" */
export function describeMode(mode: Mode): string {
  switch (mode.kind) {
    case 'text':
      return 'text region';
    case 'math':
      return 'math region';
    case 'command':
      return `command \`${mode.name}\``;
  }
}
