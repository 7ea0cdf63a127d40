/**
 * Test utilities for token assertions
 */

import {
  createLexerState,
  nextToken,
  TOKEN_TYPES,
  tokenizeWithResult,
  type LexerError,
  type LexerOptions,
  type Mode,
  type Token,
  type TokenizeOptions,
} from '../../src/index.js';

function describeModeShort(mode: Mode): string {
  return mode.kind === 'command' ? `command(${mode.name})` : mode.kind;
}

/** Compact one-line form of a token, e.g. `begin:math` or `lit:x ` */
export function summarize(token: Token): string {
  switch (token.type) {
    case TOKEN_TYPES.REGION_BEGIN:
      return `begin:${describeModeShort(token.mode)}`;
    case TOKEN_TYPES.REGION_END:
      return `end:${describeModeShort(token.mode)}`;
    case TOKEN_TYPES.LITERAL:
      return `lit:${token.value}`;
    case TOKEN_TYPES.PARAGRAPH_BREAK:
      return `para:${token.blankLines}`;
    case TOKEN_TYPES.COMMENT:
      return `comment:${token.value}`;
    case TOKEN_TYPES.EOF:
      return 'eof';
  }
}

/** Tokenize a source that must succeed and summarize every token */
export function lex(source: string, options?: TokenizeOptions): string[] {
  const result = tokenizeWithResult(source, options);
  if (!result.success) {
    throw result.error;
  }
  return result.tokens.map(summarize);
}

/** Tokenize a source that must fail; returns tokens before the failure */
export function lexFailure(
  source: string,
  options?: TokenizeOptions
): { tokens: string[]; error: LexerError } {
  const result = tokenizeWithResult(source, options);
  if (result.success) {
    throw new Error(`Expected failure, got ${result.tokens.map(summarize).join(', ')}`);
  }
  return { tokens: result.tokens.map(summarize), error: result.error };
}

/** Pull exactly `count` tokens from a fresh state */
export function take(
  source: string,
  count: number,
  options?: LexerOptions
): Token[] {
  const state = createLexerState(source, options);
  const tokens: Token[] = [];
  for (let i = 0; i < count; i++) {
    tokens.push(nextToken(state));
  }
  return tokens;
}
