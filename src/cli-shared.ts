/**
 * CLI Shared Utilities
 * Common formatting functions for CLI tools
 */

import { readFileSync } from 'node:fs';
import { CliError, ConfigError, type TinyError } from './error-classes.js';
import { ERROR_REGISTRY } from './error-registry.js';
import { LexerError } from './lexer/errors.js';
import type { Token } from './token-types.js';

/** Result of scanning one source file to its end */
export interface ScanSummary {
  readonly file: string;
  readonly tokens: readonly Token[];
  readonly diagnostics: readonly LexerError[];
}

/**
 * Format error for stderr output
 *
 * @param err - The error to format
 * @returns Formatted error message
 */
export function formatError(err: Error): string {
  if (err instanceof LexerError) {
    return `Lexer error at line ${err.line}: ${err.toData().message}`;
  }

  if (err instanceof ConfigError || err instanceof CliError) {
    return err.message;
  }

  // Handle file not found errors (ENOENT)
  if ('code' in err && err.code === 'ENOENT' && 'path' in err) {
    return `File not found: ${String(err.path)}`;
  }

  return err.message;
}

/**
 * Hint line printed under a diagnostic, from the resolution recorded for its
 * error ID. Null when the definition has none.
 */
export function formatHint(err: TinyError): string | null {
  const resolution = ERROR_REGISTRY.get(err.errorId)?.resolution;
  return resolution === undefined ? null : `  hint: ${resolution}`;
}

/**
 * Determine exit code from a scan summary: 0 when the file scanned
 * cleanly, 1 when any ERROR token was produced.
 */
export function determineExitCode(summary: ScanSummary): { code: number } {
  return { code: summary.diagnostics.length === 0 ? 0 : 1 };
}

/** Read the package version from package.json next to the sources */
export function readVersion(): string {
  const packageJsonPath = new URL('../package.json', import.meta.url);
  const packageJson: unknown = JSON.parse(
    readFileSync(packageJsonPath, 'utf-8')
  );
  if (
    typeof packageJson === 'object' &&
    packageJson !== null &&
    'version' in packageJson &&
    typeof packageJson.version === 'string'
  ) {
    return packageJson.version;
  }
  return '0.0.0';
}
