/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'lexer';

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: QUIRE-{category letter}{3-digit} (e.g., QUIRE-L001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Short name of the failure, also used as the error kind */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  /** How to fix the input; shown as the help line of human diagnostics */
  readonly resolution?: string | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Registry of all error definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: readonly ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();

    for (const def of definitions) {
      idMap.set(def.errorId, def);
    }

    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }
}

const ERROR_DEFINITIONS: readonly ErrorDefinition[] = [
  // Lexer Errors (QUIRE-L0xx)
  {
    errorId: 'QUIRE-L001',
    category: 'lexer',
    description: 'MismatchedDelimiter',
    messageTemplate: 'Region close marker {marker} has no open region',
    resolution:
      'Remove the extra | or open the region it is meant to close with |m or |NAME->.',
  },
  {
    errorId: 'QUIRE-L002',
    category: 'lexer',
    description: 'InvalidEscape',
    messageTemplate: 'Invalid escape sequence {sequence} in {region} region',
    resolution:
      'Use one of the supported escapes (\\\\, \\{, \\}, \\$, \\", \\&, \\ , \\\', \\`; \\_ in math) or remove the backslash.',
  },
  {
    errorId: 'QUIRE-L003',
    category: 'lexer',
    description: 'UnexpectedEndOfInput',
    messageTemplate: 'Unexpected end of input: {region} still open',
    resolution:
      'Close every open region with | (or |END for commands) and every /* with */.',
  },
];

/**
 * Global error registry instance.
 * Read-only singleton initialized at module load.
 */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Renders a message template by replacing placeholders with context values.
 *
 * Missing context values render as empty string. Non-string values are
 * coerced via String(). `{{` renders a literal brace. A template with an
 * unclosed placeholder is returned unchanged.
 *
 * @example
 * renderMessage('Invalid escape sequence {sequence}', { sequence: '\\q' })
 * // Returns: "Invalid escape sequence \q"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === '{' && template.charAt(i + 1) === '{') {
      result += '{';
      i += 2;
      continue;
    }

    if (char === '{') {
      const close = template.indexOf('}', i + 1);
      if (close === -1) {
        return template;
      }

      const value = context[template.slice(i + 1, close)];
      if (value !== undefined) {
        result += String(value);
      }
      i = close + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
