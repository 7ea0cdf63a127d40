/**
 * Lexer Tests: Math Regions
 */

import { describe, expect, it } from 'vitest';
import { MATH_MODE, TEXT_MODE, tokenize } from '../../src/index.js';
import { lex, lexFailure, take } from '../helpers/tokens.js';

describe('Lexer: Math Regions', () => {
  it('switches math and text regions', () => {
    const tokens = take('|m x |t y|', 5);
    expect(tokens.map((t) => [t.type, t.value])).toEqual([
      ['REGION_BEGIN', '|m '],
      ['LITERAL', 'x '],
      ['REGION_BEGIN', '|t '],
      ['LITERAL', 'y'],
      ['REGION_END', '|'],
    ]);
    expect(tokens[0]).toMatchObject({ mode: MATH_MODE });
    expect(tokens[2]).toMatchObject({ mode: TEXT_MODE });
    expect(tokens[4]).toMatchObject({ mode: TEXT_MODE });
  });

  it('closes a math region with a lone bar', () => {
    expect(lex('a |m b| c')).toEqual(['lit:a ', 'begin:math', 'lit:b', 'end:math', 'lit: c', 'eof']);
  });

  it('keeps _ ^ and # inside literal runs', () => {
    expect(lex('|m a_b^c#d|')).toEqual(['begin:math', 'lit:a_b^c#d', 'end:math', 'eof']);
  });

  it('escapes a bare percent sign', () => {
    expect(lex('|m 50%|')).toEqual(['begin:math', 'lit:50', 'lit:\\%', 'end:math', 'eof']);
  });

  it('accepts \\_ as an escape', () => {
    expect(lex('|m a\\_b|')).toEqual(['begin:math', 'lit:a', 'lit:\\_', 'lit:b', 'end:math', 'eof']);
  });

  it('does not form paragraph breaks', () => {
    expect(lex('|m x\n\ny|')).toEqual([
      'begin:math',
      'lit:x',
      'lit:\n',
      'lit:\n',
      'lit:y',
      'end:math',
      'eof',
    ]);
  });

  it('treats < as ordinary text', () => {
    expect(lex('|m a<b|')).toEqual(['begin:math', 'lit:a<b', 'end:math', 'eof']);
  });

  it('opens a command whose name starts with m', () => {
    const [token] = tokenize('|mbox->|END');
    expect(token).toMatchObject({
      type: 'REGION_BEGIN',
      mode: { kind: 'command', name: 'mbox' },
      invocation: 'explicit',
    });
  });

  it('rejects an unknown escape with the math region', () => {
    const { tokens, error } = lexFailure('|m \\q|');
    expect(tokens).toEqual(['begin:math']);
    expect(error.kind).toBe('InvalidEscape');
    expect(error.region).toBe('math');
    expect(error.message).toBe('Invalid escape sequence \\q in math region at 1:4');
  });

  it('fails at end of input inside math', () => {
    const { tokens, error } = lexFailure('|m x');
    expect(tokens).toEqual(['begin:math', 'lit:x']);
    expect(error.kind).toBe('UnexpectedEndOfInput');
    expect(error.region).toBe('math');
    expect(error.message).toBe('Unexpected end of input: math still open at 1:5');
  });

  it('fails at end of input inside text nested in math', () => {
    const { tokens, error } = lexFailure('|m |t abc');
    expect(tokens).toEqual(['begin:math', 'begin:text', 'lit:abc']);
    expect(error.region).toBe('text');
    expect(error.stackSnapshot.map((f) => f.mode.kind)).toEqual(['math', 'text']);
  });
});
