/**
 * Error Classes and Factory
 * Structured error types with registry-based error codes
 */

import { ERROR_REGISTRY, renderMessage } from './error-registry.js';
import type { ErrorCategory } from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface TinyErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly line?: number | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Create a configuration or CLI error from the registry, rendering its
 * message template with the given context. Lexer diagnostics are built
 * from error tokens instead (see diagnoseToken).
 *
 * @throws TypeError if errorId is unknown or belongs to the lexer category
 *
 * @example
 * createError('TINY-X001', { path: 'sample.tny' })
 * // CliError: "File not found: sample.tny"
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>
): ConfigError | CliError {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }

  const message = renderMessage(definition.messageTemplate, context);

  switch (definition.category) {
    case 'config':
      return new ConfigError(errorId, message, context);
    case 'cli':
      return new CliError(errorId, message, context);
    case 'lexer':
      throw new TypeError(`Lexer error IDs are not created directly: ${errorId}`);
  }
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all scanner errors.
 * Provides structured data for host applications to format as needed.
 */
export class TinyError extends Error {
  readonly errorId: string;
  readonly line: number | undefined;
  readonly context: Record<string, unknown> | undefined;

  constructor(data: TinyErrorData) {
    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    const lineSuffix = data.line !== undefined ? ` at line ${data.line}` : '';
    super(`${data.message}${lineSuffix}`);
    this.name = 'TinyError';
    this.errorId = data.errorId;
    this.line = data.line;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): TinyErrorData {
    return {
      errorId: this.errorId,
      message: this.message.replace(/ at line \d+$/, ''),
      line: this.line,
      context: this.context,
    };
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

function assertCategory(errorId: string, category: ErrorCategory): void {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
}

/** Invalid or unreadable configuration file */
export class ConfigError extends TinyError {
  constructor(
    errorId: string,
    message: string,
    context?: Record<string, unknown>
  ) {
    assertCategory(errorId, 'config');
    super({ errorId, message, context });
    this.name = 'ConfigError';
  }
}

/** Command-line usage and file access errors */
export class CliError extends TinyError {
  constructor(
    errorId: string,
    message: string,
    context?: Record<string, unknown>
  ) {
    assertCategory(errorId, 'cli');
    super({ errorId, message, context });
    this.name = 'CliError';
  }
}
