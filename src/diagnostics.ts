/**
 * Diagnostics
 * Source snippets and human, JSON or compact rendering of lexer errors
 */

import { ERROR_REGISTRY } from './error-registry.js';
import type { LexerError } from './lexer/errors.js';
import {
  formatLocation,
  type SourceLocation,
  type SourceSpan,
} from './source-location.js';
import { describeMode, type ModeFrame } from './token-types.js';

// ============================================================
// PUBLIC TYPES
// ============================================================

export interface SourceSnippet {
  readonly lines: SnippetLine[];
  readonly highlightSpan: SourceSpan;
}

export interface SnippetLine {
  readonly lineNumber: number;
  readonly content: string;
  readonly isErrorLine: boolean;
}

export interface FormatOptions {
  readonly format: 'human' | 'json' | 'compact';
  /** Source text; enables the snippet in human output */
  readonly source?: string | undefined;
  /** Location of the first character of `source`, as given to the lexer */
  readonly baseLocation?: SourceLocation | undefined;
  readonly contextLines?: number | undefined;
}

// ============================================================
// SOURCE SNIPPET EXTRACTION
// ============================================================

/**
 * Extract source lines around an error span (1-based line numbers).
 *
 * @throws {RangeError} When the span lies outside the source
 */
export function extractSnippet(
  source: string,
  span: SourceSpan,
  contextLines: number = 2
): SourceSnippet {
  if (source === '') {
    return { lines: [], highlightSpan: span };
  }

  const lines = source.split('\n');
  const totalLines = lines.length;

  for (const line of [span.start.line, span.end.line]) {
    if (line < 1 || line > totalLines) {
      throw new RangeError('Span exceeds source bounds');
    }
  }

  const firstLine = Math.max(1, span.start.line - contextLines);
  const lastLine = Math.min(totalLines, span.end.line + contextLines);

  const snippetLines: SnippetLine[] = [];
  for (let lineNum = firstLine; lineNum <= lastLine; lineNum++) {
    snippetLines.push({
      lineNumber: lineNum,
      content: lines[lineNum - 1] ?? '',
      isErrorLine: lineNum >= span.start.line && lineNum <= span.end.line,
    });
  }

  return { lines: snippetLines, highlightSpan: span };
}

// ============================================================
// CARET UNDERLINE
// ============================================================

/**
 * Render a caret underline for a span on its first line. Zero-width and
 * single-character spans get one caret; multi-line spans run to the end of
 * the first line.
 *
 * @throws {RangeError} When the span starts after it ends
 */
export function renderCaretUnderline(
  span: SourceSpan,
  lineContent: string
): string {
  if (
    span.start.line > span.end.line ||
    (span.start.line === span.end.line && span.start.column > span.end.column)
  ) {
    throw new RangeError('Span start must precede end');
  }

  const endColumn =
    span.start.line === span.end.line
      ? span.end.column
      : lineContent.length + 1;
  const padding = ' '.repeat(span.start.column - 1);
  return padding + '^'.repeat(Math.max(1, endColumn - span.start.column));
}

// ============================================================
// REGION STACK
// ============================================================

/**
 * Describe open regions, outermost first.
 *
 * @example
 * describeRegionStack(error.stackSnapshot)
 * // "math region opened at 1:1 > command `bold` opened at 1:4"
 */
export function describeRegionStack(frames: readonly ModeFrame[]): string {
  if (frames.length === 0) {
    return 'top level';
  }
  return frames
    .map((frame) => `${describeMode(frame.mode)} opened at ${formatLocation(frame.span.start)}`)
    .join(' > ');
}

// ============================================================
// ERROR FORMATTING
// ============================================================

/**
 * Format a lexer error.
 *
 * Human output:
 * ```
 * error[QUIRE-L003]: Unexpected end of input: math still open
 *   --> 1:9
 *    |
 *  1 | |m x + y
 *    |         ^
 *    |
 *    = note: inside math region opened at 1:1
 *    = help: Close every open region with | (or |END for commands) and every /* with *\/.
 * ```
 *
 * Spans from a lexer created with a `baseLocation` are mapped back onto
 * `source` when the same `baseLocation` is passed. A span that still falls
 * outside `source` is reported without a snippet.
 *
 * @throws {TypeError} Unknown format
 */
export function formatLexerError(
  error: LexerError,
  options: FormatOptions
): string {
  switch (options.format) {
    case 'human':
      return formatHuman(error, options);
    case 'json':
      return formatJson(error);
    case 'compact':
      return formatCompact(error);
    default:
      throw new TypeError(`Unknown format: ${String(options.format)}`);
  }
}

function baseMessage(error: LexerError): string {
  return error.toData().message;
}

/** Map a span from lexer coordinates onto lines of the source text */
function toSourceSpan(span: SourceSpan, base: SourceLocation | undefined): SourceSpan {
  if (base === undefined) {
    return span;
  }
  const relocate = (loc: SourceLocation): SourceLocation => ({
    line: loc.line - base.line + 1,
    column: loc.line === base.line ? loc.column - base.column + 1 : loc.column,
    offset: loc.offset - base.offset,
  });
  return { start: relocate(span.start), end: relocate(span.end) };
}

function isWithinSource(source: string, span: SourceSpan): boolean {
  const totalLines = source.split('\n').length;
  return [span.start.line, span.end.line].every(
    (line) => line >= 1 && line <= totalLines
  );
}

function snippetLines(error: LexerError, options: FormatOptions): string[] {
  const { source } = options;
  if (source === undefined) {
    return [];
  }

  const span = toSourceSpan(error.span, options.baseLocation);
  // Source that does not contain the span gets no snippet
  if (!isWithinSource(source, span)) {
    return [];
  }

  const snippet = extractSnippet(source, span, options.contextLines);
  if (snippet.lines.length === 0) {
    return [];
  }

  const lineShift = error.span.start.line - span.start.line;
  const width = String(
    Math.max(...snippet.lines.map((l) => l.lineNumber + lineShift))
  ).length;
  const gutter = ' '.repeat(width);

  const lines = [` ${gutter} |`];
  for (const line of snippet.lines) {
    const shown = String(line.lineNumber + lineShift).padStart(width, ' ');
    lines.push(` ${shown} | ${line.content}`);
    if (line.lineNumber === span.start.line) {
      lines.push(` ${gutter} | ${renderCaretUnderline(span, line.content)}`);
    }
  }
  lines.push(` ${gutter} |`);
  return lines;
}

function formatHuman(error: LexerError, options: FormatOptions): string {
  const lines: string[] = [];
  lines.push(`error[${error.errorId}]: ${baseMessage(error)}`);
  lines.push(`  --> ${formatLocation(error.span.start)}`);
  lines.push(...snippetLines(error, options));

  for (const frame of error.stackSnapshot) {
    lines.push(
      `   = note: inside ${describeMode(frame.mode)} opened at ${formatLocation(frame.span.start)}`
    );
  }

  const resolution = ERROR_REGISTRY.get(error.errorId)?.resolution;
  if (resolution !== undefined) {
    lines.push(`   = help: ${resolution}`);
  }

  return lines.join('\n');
}

/** LSP Diagnostic compatible output; lines are 0-based, characters 0-based */
function formatJson(error: LexerError): string {
  const toPosition = (loc: { line: number; column: number }) => ({
    line: loc.line - 1,
    character: loc.column - 1,
  });

  const diagnostic = {
    errorId: error.errorId,
    severity: 1,
    message: baseMessage(error),
    source: 'quire',
    code: error.errorId,
    kind: error.kind,
    range: {
      start: toPosition(error.span.start),
      end: toPosition(error.span.end),
    },
    regions: error.stackSnapshot.map((frame) => ({
      mode: frame.mode,
      openedAt: toPosition(frame.span.start),
    })),
  };

  return JSON.stringify(diagnostic, null, 2);
}

function formatCompact(error: LexerError): string {
  return [
    `[${error.errorId}]`,
    baseMessage(error),
    `at ${formatLocation(error.span.start)}`,
    `(in ${describeRegionStack(error.stackSnapshot)})`,
  ].join(' ');
}
