/**
 * Error Registry
 * Central error definitions with message template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'lexer' | 'config' | 'cli';

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: TINY-{category letter}{3-digit} (e.g., TINY-L001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Human-readable description */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  /** How to resolve this error */
  readonly resolution?: string | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Central registry for all error definitions.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();

    for (const def of definitions) {
      if (idMap.has(def.errorId)) {
        throw new Error(`Duplicate error ID: ${def.errorId}`);
      }
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

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Lexer Errors (TINY-L0xx)
  {
    errorId: 'TINY-L001',
    category: 'lexer',
    description: 'Invalid character',
    messageTemplate: 'Invalid character {char}',
    resolution:
      'Remove the character. TINY accepts letters, digits, whitespace, comments in braces and the operators := = < + - * / ( ) ;',
  },
  {
    errorId: 'TINY-L002',
    category: 'lexer',
    description: 'Malformed assignment',
    messageTemplate: 'Expected = after :',
    resolution: 'Write assignments as `x := expr`; a bare colon is not valid.',
  },
  {
    errorId: 'TINY-L003',
    category: 'lexer',
    description: 'Unterminated comment',
    messageTemplate: 'Unterminated comment',
    resolution: 'Close the comment with `}` before the end of the file.',
  },

  // Configuration Errors (TINY-C0xx)
  {
    errorId: 'TINY-C001',
    category: 'config',
    description: 'Invalid configuration',
    messageTemplate: 'Invalid configuration: {reason}',
  },

  // CLI Errors (TINY-X0xx)
  {
    errorId: 'TINY-X001',
    category: 'cli',
    description: 'File not found',
    messageTemplate: 'File not found: {path}',
  },
  {
    errorId: 'TINY-X002',
    category: 'cli',
    description: 'Usage error',
    messageTemplate: '{reason}',
  },
];

export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// MESSAGE RENDERING
// ============================================================

/**
 * Render a message template by replacing {name} placeholders with
 * values from context. Missing values render as the empty string; an
 * unclosed brace returns the template unchanged.
 *
 * @example
 * renderMessage('Invalid character {char}', { char: '@' })
 * // Returns: "Invalid character @"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === '{') {
      let j = i + 1;
      while (j < template.length && template.charAt(j) !== '}') {
        j++;
      }

      if (j >= template.length) {
        return template;
      }

      const value = context[template.slice(i + 1, j)];
      if (value !== undefined) {
        result += String(value);
      }

      i = j + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
