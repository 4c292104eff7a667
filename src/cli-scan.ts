#!/usr/bin/env node
/**
 * CLI Scan Entry Point
 *
 * Implements main(), parseArgs() and scanFile() for the tiny-scan binary.
 * Opens the source file, drives the scanner until end of file and writes
 * the listing (source echo and token trace) to stdout.
 */

import { closeSync, openSync } from 'node:fs';
import * as path from 'node:path';
import { resolveConfig, type ScanConfig } from './config.js';
import { createError } from './error-classes.js';
import {
  determineExitCode,
  formatError,
  formatHint,
  readVersion,
  type ScanSummary,
} from './cli-shared.js';
import {
  createFileSource,
  createLexerState,
  diagnoseToken,
  getToken,
  type LexerError,
} from './lexer/index.js';
import type { Token } from './token-types.js';
import { TOKEN_TYPES } from './token-types.js';

/**
 * Parsed command-line arguments. `echoSource` and `traceScan` are only set
 * when a flag overrides the configuration.
 */
export type ParsedArgs =
  | {
      mode: 'scan';
      file: string;
      echoSource: boolean | undefined;
      traceScan: boolean | undefined;
    }
  | { mode: 'help' }
  | { mode: 'version' };

const FLAG_OVERRIDES: Record<
  string,
  { key: 'echoSource' | 'traceScan'; value: boolean }
> = {
  '--echo': { key: 'echoSource', value: true },
  '--no-echo': { key: 'echoSource', value: false },
  '--trace': { key: 'traceScan', value: true },
  '--no-trace': { key: 'traceScan', value: false },
};

function usageError(reason: string): never {
  throw createError('TINY-X002', { reason });
}

/**
 * Parse command-line arguments into structured command
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 */
export function parseArgs(argv: string[]): ParsedArgs {
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }

  let echoSource: boolean | undefined;
  let traceScan: boolean | undefined;
  const files: string[] = [];

  for (const arg of argv) {
    if (!arg.startsWith('-')) {
      files.push(arg);
      continue;
    }

    const override = FLAG_OVERRIDES[arg];
    if (!override) {
      usageError(`Unknown option: ${arg}`);
    }
    if (override.key === 'echoSource') {
      echoSource = override.value;
    } else {
      traceScan = override.value;
    }
  }

  const file = files[0];
  if (file === undefined) {
    usageError('Missing file argument');
  }
  if (files.length > 1) {
    usageError(`Unexpected argument: ${files[1]}`);
  }

  return { mode: 'scan', file, echoSource, traceScan };
}

/**
 * Append the default extension when the base name contains no dot,
 * e.g. "sample" -> "sample.tny". Dot-files such as ".prog" are kept.
 */
export function normalizeFileName(file: string, extension: string): string {
  return path.basename(file).includes('.') ? file : `${file}${extension}`;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Scan a source file from its first line to end of file.
 *
 * The descriptor is opened here and closed before returning, whether or not
 * scanning succeeded. Echo and trace output go to `write` as the listing.
 *
 * @throws CliError if the file does not exist
 */
export function scanFile(
  file: string,
  config: ScanConfig,
  write: (text: string) => void
): ScanSummary {
  const fileName = normalizeFileName(file, config.defaultExtension);

  let fd: number;
  try {
    fd = openSync(fileName, 'r');
  } catch (err) {
    if (isMissingFile(err)) {
      throw createError('TINY-X001', { path: fileName });
    }
    throw err;
  }

  try {
    write(`\nCOMPILATION: ${fileName}\n`);

    const state = createLexerState(createFileSource(fd), {
      echoSource: config.echoSource,
      traceScan: config.traceScan,
      maxTokenLength: config.maxTokenLength,
      maxLineLength: config.maxLineLength,
      callbacks: {
        // A line cut at maxLineLength lists as several numbered lines
        onEcho: (text) => write(text.endsWith('\n') ? text : `${text}\n`),
        onTrace: (text) => write(`${text}\n`),
      },
    });

    const tokens: Token[] = [];
    const diagnostics: LexerError[] = [];
    let token: Token;
    do {
      token = getToken(state);
      tokens.push(token);
      const diagnostic = diagnoseToken(token);
      if (diagnostic !== null) {
        diagnostics.push(diagnostic);
      }
    } while (token.type !== TOKEN_TYPES.ENDFILE);

    return { file: fileName, tokens, diagnostics };
  } finally {
    closeSync(fd);
  }
}

function showHelp(): void {
  console.log(`Usage:
  tiny-scan <file>[.tny]   Scan a TINY source file and print the listing
  tiny-scan --help         Show this help message
  tiny-scan --version      Show version information

Options:
  --echo / --no-echo       Echo source lines (default from .tiny-scan.yaml)
  --trace / --no-trace     Print each token (default from .tiny-scan.yaml)

Examples:
  tiny-scan sample
  tiny-scan programs/factorial.tny --no-echo`);
}

/** Run one scan command and return its exit code */
function runScan(parsed: Extract<ParsedArgs, { mode: 'scan' }>): number {
  const base = resolveConfig(process.cwd());
  const config: ScanConfig = {
    ...base,
    echoSource: parsed.echoSource ?? base.echoSource,
    traceScan: parsed.traceScan ?? base.traceScan,
  };

  const summary = scanFile(parsed.file, config, (text) => {
    process.stdout.write(text);
  });
  for (const diagnostic of summary.diagnostics) {
    console.error(formatError(diagnostic));
    const hint = formatHint(diagnostic);
    if (hint !== null) {
      console.error(hint);
    }
  }
  return determineExitCode(summary).code;
}

/**
 * Entry point for the tiny-scan binary
 *
 * Writes the listing to stdout and lexer diagnostics to stderr, each
 * followed by its hint line. Exits 1 when the file had lexical errors or
 * anything failed.
 *
 * @param argv - Command-line arguments (defaults to process.argv.slice(2))
 */
export function main(argv: string[] = process.argv.slice(2)): void {
  let code: number;
  try {
    const parsed = parseArgs(argv);
    if (parsed.mode === 'help') {
      showHelp();
      return;
    }
    if (parsed.mode === 'version') {
      console.log(readVersion());
      return;
    }
    code = runScan(parsed);
  } catch (err) {
    if (err instanceof Error) {
      console.error(formatError(err));
    } else {
      console.error(formatError(new Error(String(err))));
    }
    code = 1;
  }
  process.exit(code);
}

// Only run main if not in test environment
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  main();
}
