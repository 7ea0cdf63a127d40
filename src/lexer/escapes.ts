/**
 * Escape Tables
 * Per-region backslash substitutions, bare-character passthroughs and the
 * characters that end a verbatim literal run.
 */

import type { SourceLocation } from '../source-location.js';
import type { LiteralToken } from '../token-types.js';
import { invalidEscape } from './errors.js';
import {
  ALL_MODE_MARKERS,
  TEXT_MODE_MARKERS,
  type ModeMarker,
} from './regions.js';
import { advanceAndMakeLiteral, makeLiteral } from './helpers.js';
import { advance, currentLocation, peek, type LexerState } from './state.js';

export interface EscapeRules {
  readonly region: 'text' | 'math';
  /** Character after a backslash -> replacement text */
  readonly escapes: Readonly<Record<string, string>>;
  /** Bare character -> replacement text */
  readonly passthrough: Readonly<Record<string, string>>;
  /** Characters that end a verbatim run */
  readonly reserved: ReadonlySet<string>;
  /** `|` + letter markers that switch region here */
  readonly modeMarkers: ReadonlySet<ModeMarker>;
}

const BACKSLASH_ESCAPES: Readonly<Record<string, string>> = {
  '\\': '\\\\',
  '{': '\\{',
  '}': '\\}',
  $: '\\$',
  '"': '"',
  '&': '\\&',
  ' ': '\\ ',
  "'": "\\'",
  '`': '\\`',
};

// `|` opens and closes regions and `/` opens comments in every region
const MARKER_CHARS = ['|', '/'];

export const TEXT_RULES: EscapeRules = {
  region: 'text',
  escapes: BACKSLASH_ESCAPES,
  passthrough: { '#': '\\#', _: '\\_', '%': '\\%' },
  reserved: new Set([...'"${<\n\\#_^}%(', ...MARKER_CHARS]),
  modeMarkers: TEXT_MODE_MARKERS,
};

export const MATH_RULES: EscapeRules = {
  region: 'math',
  escapes: { ...BACKSLASH_ESCAPES, _: '\\_' },
  passthrough: { '%': '\\%' },
  reserved: new Set([...'"${\n\\}%(', ...MARKER_CHARS]),
  modeMarkers: ALL_MODE_MARKERS,
};

function lookup(
  table: Readonly<Record<string, string>>,
  ch: string
): string | undefined {
  return Object.hasOwn(table, ch) ? table[ch] : undefined;
}

/**
 * Scan a backslash sequence at the current position.
 * @throws LexerError (InvalidEscape) for an unsupported or truncated sequence
 */
export function scanEscape(state: LexerState, rules: EscapeRules): LiteralToken {
  const start = currentLocation(state);
  const next = peek(state, 1);
  const replacement = next === '' ? undefined : lookup(rules.escapes, next);

  if (replacement === undefined) {
    advance(state);
    if (next !== '') advance(state);
    throw invalidEscape(state, rules.region, `\\${next}`, {
      start,
      end: currentLocation(state),
    });
  }

  return advanceAndMakeLiteral(state, 2, replacement, start);
}

/** Replacement for a bare passthrough character, if the region has one */
export function passthroughFor(rules: EscapeRules, ch: string): string | undefined {
  return lookup(rules.passthrough, ch);
}

/** Longest run of characters outside the region's reserved set */
export function scanVerbatimRun(
  state: LexerState,
  rules: EscapeRules,
  start: SourceLocation
): LiteralToken {
  const from = state.pos;
  while (state.pos < state.source.length && !rules.reserved.has(peek(state))) {
    advance(state);
  }
  return makeLiteral(state.source.slice(from, state.pos), start, currentLocation(state));
}
