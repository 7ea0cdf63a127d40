/**
 * Lexer Tests: Command Regions
 * Explicit and implicit invocation, |END, line framing and body fallthrough
 */

import { describe, expect, it, vi } from 'vitest';
import { commandMode, tokenize } from '../../src/index.js';
import { lex, lexFailure, take } from '../helpers/tokens.js';

describe('Lexer: Command Regions', () => {
  describe('Opening', () => {
    it('opens an explicit command', () => {
      const [token] = take('|bold->|END', 1);
      expect(token).toEqual({
        type: 'REGION_BEGIN',
        mode: commandMode('bold'),
        invocation: 'explicit',
        value: '|bold->',
        span: {
          start: { line: 1, column: 1, offset: 0 },
          end: { line: 1, column: 8, offset: 7 },
        },
      });
    });

    it('opens an implicit command ending at the newline', () => {
      const tokens = tokenize('x |bold\ny');
      expect(tokens.map((t) => t.type)).toEqual([
        'LITERAL',
        'REGION_BEGIN',
        'REGION_END',
        'LITERAL',
        'EOF',
      ]);
      expect(tokens[1]).toMatchObject({ mode: commandMode('bold'), invocation: 'implicit' });
      expect(tokens[2]).toMatchObject({ mode: commandMode('bold'), value: '\n' });
    });

    it('keeps spaces, dots and digits in the name', () => {
      const [token] = tokenize('|fig 2.a->|END');
      expect(token).toMatchObject({ mode: commandMode('fig 2.a') });
    });

    it('treats |ENDING as a command name', () => {
      const [token] = tokenize('|ENDING|END');
      expect(token).toMatchObject({ mode: commandMode('ENDING'), invocation: 'implicit' });
    });
  });

  describe('Closing', () => {
    it('closes a command with |END', () => {
      expect(lex('|b->|END')).toEqual(['begin:command(b)', 'end:command(b)', 'eof']);
    });

    it('returns an empty literal for |END without an open command', () => {
      const tokens = tokenize('|END');
      expect(tokens[0]).toMatchObject({ type: 'LITERAL', value: '' });
      expect(tokens[1]?.type).toBe('EOF');
    });

    it('leaves a math region open on |END', () => {
      expect(lex('|m |END|')).toEqual(['begin:math', 'lit:', 'end:math', 'eof']);
    });

    it('closes the command frame on a newline', () => {
      expect(lex('|sec->\nbody')).toEqual(['begin:command(sec)', 'end:command(sec)', 'lit:body', 'eof']);
    });

    it('closes the command with a lone bar', () => {
      expect(lex('|b->|')).toEqual(['begin:command(b)', 'end:command(b)', 'eof']);
    });
  });

  describe('Nested regions', () => {
    it('opens math inside a command', () => {
      const { tokens, error } = lexFailure('|b->|m x|');
      expect(tokens).toEqual(['begin:command(b)', 'begin:math', 'lit:x', 'end:math']);
      expect(error.kind).toBe('UnexpectedEndOfInput');
      expect(error.region).toBe('command');
      expect(error.message).toBe('Unexpected end of input: command still open at 1:10');
    });

    it('scans comments inside a command body', () => {
      expect(lex('|b->/* c */|END')).toEqual(['begin:command(b)', 'comment:/* c */', 'end:command(b)', 'eof']);
    });
  });

  describe('Tab trigger', () => {
    it('runs the command scanner after a newline and tabs', () => {
      expect(lex('a\n\t|sec->\nb')).toEqual([
        'lit:a',
        'begin:command(sec)',
        'end:command(sec)',
        'lit:b',
        'eof',
      ]);
    });

    it('diverts tab-indented prose into an unterminated comment by default', () => {
      const onWarning = vi.fn();
      const { tokens, error } = lexFailure('a\n\tb', { callbacks: { onWarning } });

      expect(tokens).toEqual(['lit:a']);
      expect(error.kind).toBe('UnexpectedEndOfInput');
      expect(error.region).toBe('comment');
      expect(error.context?.['openedAt']).toEqual({ line: 2, column: 2, offset: 3 });
      expect(onWarning).toHaveBeenCalledTimes(1);
      expect(onWarning).toHaveBeenCalledWith({
        message: 'character "b" in command body starts a comment that only */ ends',
        location: { line: 2, column: 2, offset: 3 },
      });
    });

    it('scans tab-indented prose as text with text fallthrough', () => {
      expect(lex('a\n\tb', { commandFallthrough: 'text' })).toEqual(['lit:a', 'lit:b', 'eof']);
    });
  });

  describe('Body fallthrough', () => {
    it('diverts body text into a comment ended by */', () => {
      const onWarning = vi.fn();
      const tokens = tokenize('|b-> hi */|END', { callbacks: { onWarning } });
      expect(tokens.map((t) => t.value)).toEqual(['|b->', ' hi */', '|END', '']);
      expect(tokens[1]?.type).toBe('COMMENT');
      expect(onWarning).toHaveBeenCalledTimes(1);
      expect(onWarning).toHaveBeenCalledWith({
        message: 'character " " in command body starts a comment that only */ ends',
        location: { line: 1, column: 5, offset: 4 },
      });
    });

    it('fails as an unterminated comment when no */ follows', () => {
      const { tokens, error } = lexFailure('|b-> prose', { callbacks: { onWarning: vi.fn() } });
      expect(tokens).toEqual(['begin:command(b)']);
      expect(error.kind).toBe('UnexpectedEndOfInput');
      expect(error.region).toBe('comment');
      expect(error.context?.['openedAt']).toEqual({ line: 1, column: 5, offset: 4 });
    });

    it('scans body text with the text rules when configured', () => {
      const onWarning = vi.fn();
      expect(lex('|b-> hi #1\nafter', { commandFallthrough: 'text', callbacks: { onWarning } })).toEqual([
        'begin:command(b)',
        'lit: hi ',
        'lit:\\#',
        'lit:1',
        'end:command(b)',
        'lit:after',
        'eof',
      ]);
      expect(onWarning).not.toHaveBeenCalled();
    });
  });
});
