/**
 * Lexer Errors
 * Diagnostics built from ERROR tokens. The scanner never throws these;
 * drivers decide whether to report, count or raise them.
 */

import { TinyError } from '../error-classes.js';
import { ERROR_REGISTRY, renderMessage } from '../error-registry.js';
import type { Token } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';

export class LexerError extends TinyError {
  // Lexer errors always carry a line
  override readonly line: number;

  constructor(
    errorId: string,
    message: string,
    line: number,
    context?: Record<string, unknown>
  ) {
    const definition = ERROR_REGISTRY.get(errorId);
    if (!definition) {
      throw new TypeError(`Unknown error ID: ${errorId}`);
    }
    if (definition.category !== 'lexer') {
      throw new TypeError(`Expected lexer error ID, got: ${errorId}`);
    }

    super({ errorId, message, line, context });
    this.name = 'LexerError';
    this.line = line;
  }
}

function errorIdFor(lexeme: string): string {
  switch (lexeme) {
    case ':':
      return 'TINY-L002';
    case '{':
      return 'TINY-L003';
    default:
      return 'TINY-L001';
  }
}

/**
 * Convert an ERROR token into a diagnostic.
 * Returns null for every other token type.
 */
export function diagnoseToken(token: Token): LexerError | null {
  if (token.type !== TOKEN_TYPES.ERROR) {
    return null;
  }

  const errorId = errorIdFor(token.value);
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }

  const context = { char: JSON.stringify(token.value) };
  return new LexerError(
    errorId,
    renderMessage(definition.messageTemplate, context),
    token.line,
    context
  );
}
