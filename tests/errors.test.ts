/**
 * Error Taxonomy Tests
 * Registry lookup, message rendering and LexerError construction
 */

import { describe, expect, it } from 'vitest';
import {
  createError,
  ERROR_REGISTRY,
  LEXER_ERROR_IDS,
  LexerError,
  MATH_MODE,
  QuireError,
  renderMessage,
  type ModeFrame,
  type SourceSpan,
} from '../src/index.js';
import { lexFailure } from './helpers/tokens.js';

const span: SourceSpan = {
  start: { line: 2, column: 3, offset: 10 },
  end: { line: 2, column: 5, offset: 12 },
};

describe('ERROR_REGISTRY', () => {
  it('registers one lexer error per kind', () => {
    for (const [kind, errorId] of Object.entries(LEXER_ERROR_IDS)) {
      const definition = ERROR_REGISTRY.get(errorId);
      expect(definition?.category).toBe('lexer');
      expect(definition?.description).toBe(kind);
      expect(definition?.resolution).toMatch(/\S/);
    }
    expect(ERROR_REGISTRY.size).toBe(3);
  });

  it('returns undefined for unknown IDs', () => {
    expect(ERROR_REGISTRY.get('QUIRE-X999')).toBeUndefined();
    expect(ERROR_REGISTRY.has('QUIRE-X999')).toBe(false);
  });
});

describe('renderMessage', () => {
  it('replaces placeholders', () => {
    expect(renderMessage('Expected {a}, got {b}', { a: 'x', b: 2 })).toBe('Expected x, got 2');
  });

  it('renders missing values as empty', () => {
    expect(renderMessage('Hello {name}!', {})).toBe('Hello !');
  });

  it('renders {{ as a literal brace', () => {
    expect(renderMessage('a {{b', {})).toBe('a {b');
  });

  it('returns a template with an unclosed brace unchanged', () => {
    expect(renderMessage('broken {name', { name: 'x' })).toBe('broken {name');
  });
});

describe('createError', () => {
  it('renders the registry template', () => {
    const error = createError('QUIRE-L002', { sequence: '\\q', region: 'text' }, span.start);
    expect(error).toBeInstanceOf(QuireError);
    expect(error.message).toBe('Invalid escape sequence \\q in text region at 2:3');
  });

  it('throws TypeError for unknown IDs', () => {
    expect(() => createError('QUIRE-X999', {})).toThrow('Unknown error ID: QUIRE-X999');
  });
});

describe('LexerError', () => {
  it('carries kind, span and a frozen stack snapshot', () => {
    const frames: ModeFrame[] = [{ mode: MATH_MODE, span }];
    const error = new LexerError('QUIRE-L003', 'Unexpected end', span, frames, { region: 'math' });

    frames.push({ mode: MATH_MODE, span });

    expect(error).toBeInstanceOf(QuireError);
    expect(error.name).toBe('LexerError');
    expect(error.kind).toBe('UnexpectedEndOfInput');
    expect(error.region).toBe('math');
    expect(error.location).toEqual(span.start);
    expect(error.stackSnapshot).toHaveLength(1);
    expect(Object.isFrozen(error.stackSnapshot)).toBe(true);
    expect(error.message).toBe('Unexpected end at 2:3');
  });

  it('strips the location suffix in toData', () => {
    const error = new LexerError('QUIRE-L001', 'No region', span, []);
    expect(error.toData()).toEqual({
      errorId: 'QUIRE-L001',
      message: 'No region',
      location: span.start,
      context: undefined,
    });
    expect(error.format((data) => `${data.errorId}: ${data.message}`)).toBe('QUIRE-L001: No region');
  });

  it('throws TypeError for unknown IDs', () => {
    expect(() => new LexerError('QUIRE-X999', 'x', span, [])).toThrow(TypeError);
  });

  it('leaves region undefined for unrecognized context values', () => {
    const error = new LexerError('QUIRE-L003', 'x', span, [], { region: 'elsewhere' });
    expect(error.region).toBeUndefined();
  });

  it('snapshots the stack at the point of failure', () => {
    const { error } = lexFailure('|m |t \\q');
    expect(error.stackSnapshot.map((f) => [f.mode.kind, f.span.start.column])).toEqual([
      ['math', 1],
      ['text', 4],
    ]);
  });
});
