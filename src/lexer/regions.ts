/**
 * Region Markers
 * `|m`, `|t`, `|END`, `|NAME->`, `|NAME` and lone `|`, plus end-of-input
 * handling. `|t` switches region in math and command bodies only.
 */

import {
  MATH_MODE,
  TEXT_MODE,
  TOKEN_TYPES,
  commandMode,
  type EofToken,
  type Token,
} from '../token-types.js';
import { unexpectedEndOfInput } from './errors.js';
import { isNameChar, isNameLetter } from './helpers.js';
import { closeIfCommand, popMode, pushMode, topFrame } from './mode-stack.js';
import {
  advanceBy,
  currentLocation,
  peek,
  peekString,
  type LexerState,
} from './state.js';

const ARROW = '->';

/** Letter after `|` that switches region: `m` opens math, `t` opens text */
export type ModeMarker = 'm' | 't';

/** Markers recognized inside text regions; `|t` there names a command */
export const TEXT_MODE_MARKERS: ReadonlySet<ModeMarker> = new Set<ModeMarker>(['m']);
/** Markers recognized inside math regions and command bodies */
export const ALL_MODE_MARKERS: ReadonlySet<ModeMarker> = new Set<ModeMarker>(['m', 't']);

function modeMarkerAt(
  state: LexerState,
  markers: ReadonlySet<ModeMarker>
): ModeMarker | undefined {
  const letter = peek(state, 1);
  for (const marker of markers) {
    if (marker === letter && endsMarker(state, 2)) return marker;
  }
  return undefined;
}

/** A one-letter marker ends here unless a longer name or `->` follows */
function endsMarker(state: LexerState, offset: number): boolean {
  return !isNameLetter(peek(state, offset)) && peekString(state, 2, offset) !== ARROW;
}

/**
 * Scan a token starting with `|`. Only the given mode markers switch region;
 * any other letter starts a command name.
 */
export function scanRegionMarker(
  state: LexerState,
  markers: ReadonlySet<ModeMarker>
): Token {
  const start = currentLocation(state);
  const span = () => ({ start, end: currentLocation(state) });

  const marker = modeMarkerAt(state, markers);
  if (marker !== undefined) {
    // The marker absorbs one following space
    const lexeme = advanceBy(state, peek(state, 2) === ' ' ? 3 : 2);
    return pushMode(state, marker === 'm' ? MATH_MODE : TEXT_MODE, span(), lexeme);
  }

  const letter = peek(state, 1);
  if (peekString(state, 4) === '|END' && endsMarker(state, 4)) {
    const lexeme = advanceBy(state, 4);
    return closeIfCommand(state, span(), lexeme);
  }

  // A name starts with a letter; `| ` is a close marker followed by a space
  if (isNameLetter(letter)) {
    let length = 2;
    while (isNameChar(peek(state, length))) length++;

    const name = peekString(state, length - 1, 1);
    const explicit = peekString(state, 2, length) === ARROW;
    const lexeme = advanceBy(state, explicit ? length + ARROW.length : length);
    return pushMode(
      state,
      commandMode(name),
      span(),
      lexeme,
      explicit ? 'explicit' : 'implicit'
    );
  }

  const lexeme = advanceBy(state, 1);
  return popMode(state, span(), lexeme);
}

/**
 * End of input: EOF at top level, otherwise the innermost open region was
 * never closed.
 * @throws LexerError (UnexpectedEndOfInput)
 */
export function endOfInput(state: LexerState): EofToken {
  const frame = topFrame(state);
  if (frame !== undefined) {
    throw unexpectedEndOfInput(state, frame.mode.kind);
  }

  const here = currentLocation(state);
  return { type: TOKEN_TYPES.EOF, value: '', span: { start: here, end: here } };
}
