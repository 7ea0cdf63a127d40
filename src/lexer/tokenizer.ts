/**
 * Tokenizer
 * Dispatcher and whole-input drivers
 */

import { TOKEN_TYPES, type Mode, type Token } from '../token-types.js';
import { scanCommand } from './command.js';
import { LexerError } from './errors.js';
import { scanMath } from './math.js';
import { currentMode } from './mode-stack.js';
import { createLexerState, type LexerState } from './state.js';
import { scanText } from './text.js';
import type { LexerOptions } from './types.js';

function scanInMode(state: LexerState, mode: Mode): Token {
  switch (mode.kind) {
    case 'text':
      return scanText(state);
    case 'math':
      return scanMath(state);
    case 'command':
      return scanCommand(state);
  }
}

/**
 * Produce the next token using the scanner for the innermost open region.
 * @throws LexerError when the input cannot be tokenized
 */
export function nextToken(state: LexerState): Token {
  let token: Token;
  try {
    token = scanInMode(state, currentMode(state));
  } catch (error) {
    if (error instanceof LexerError) {
      state.observability.onError?.({ error });
    }
    throw error;
  }

  state.observability.onToken?.(token);
  return token;
}

export interface TokenizeOptions extends LexerOptions {
  /** Keep COMMENT tokens (default: true) */
  includeComments?: boolean | undefined;
  /** Keep the `"\n"` literals produced by plain newlines (default: true) */
  includeLineBreaks?: boolean | undefined;
}

export type TokenizeResult =
  | { readonly success: true; readonly tokens: Token[] }
  | {
      readonly success: false;
      /** Tokens produced before the failure */
      readonly tokens: Token[];
      readonly error: LexerError;
    };

function keepToken(token: Token, options: TokenizeOptions | undefined): boolean {
  if (token.type === TOKEN_TYPES.COMMENT) {
    return options?.includeComments !== false;
  }
  if (token.type === TOKEN_TYPES.LITERAL && token.value === '\n') {
    return options?.includeLineBreaks !== false;
  }
  return true;
}

function collect(
  state: LexerState,
  tokens: Token[],
  options: TokenizeOptions | undefined
): void {
  let token: Token;
  do {
    token = nextToken(state);
    if (keepToken(token, options)) {
      tokens.push(token);
    }
  } while (token.type !== TOKEN_TYPES.EOF);
}

/**
 * Tokenize a whole source. The last token is EOF.
 * @throws LexerError when the input cannot be tokenized
 */
export function tokenize(source: string, options?: TokenizeOptions): Token[] {
  const state = createLexerState(source, options);
  const tokens: Token[] = [];
  collect(state, tokens, options);
  return tokens;
}

/** Tokenize a whole source, reporting failure as a value instead of throwing */
export function tokenizeWithResult(
  source: string,
  options?: TokenizeOptions
): TokenizeResult {
  const state = createLexerState(source, options);
  const tokens: Token[] = [];

  try {
    collect(state, tokens, options);
  } catch (error) {
    if (error instanceof LexerError) {
      return { success: false, tokens, error };
    }
    throw error;
  }

  return { success: true, tokens };
}
