/**
 * Lexer State
 * Line buffer over a LineSource: one chunk of source text at a time,
 * with one-character put-back and transparent refill.
 */

import type { LineSource } from './source.js';

/** Returned by nextChar once the source is exhausted */
export const EOF_CHAR = '';

/** Longest lexeme stored for a single token */
export const DEFAULT_MAX_TOKEN_LENGTH = 40;

/** Longest chunk held in the line buffer */
export const DEFAULT_MAX_LINE_LENGTH = 255;

/** Listing sinks for source echo and token trace */
export interface ScanCallbacks {
  /** Receives each source line as read, numbered, with its own newline kept */
  readonly onEcho?: ((text: string) => void) | undefined;
  /** Receives one description per emitted token */
  readonly onTrace?: ((text: string) => void) | undefined;
}

export interface ScanOptions {
  readonly echoSource?: boolean | undefined;
  readonly traceScan?: boolean | undefined;
  readonly maxTokenLength?: number | undefined;
  readonly maxLineLength?: number | undefined;
  readonly callbacks?: ScanCallbacks | undefined;
}

export interface LexerState {
  readonly source: LineSource;
  readonly echoSource: boolean;
  readonly traceScan: boolean;
  readonly maxTokenLength: number;
  readonly maxLineLength: number;
  readonly callbacks: ScanCallbacks;
  /** Current chunk of source text */
  lineBuf: string;
  /** Cursor into lineBuf, always within [0, lineBuf.length] */
  pos: number;
  /** Physical lines read so far */
  line: number;
  /** Latched once the source reports end of input */
  eof: boolean;
}

export function createLexerState(
  source: LineSource,
  options: ScanOptions = {}
): LexerState {
  return {
    source,
    echoSource: options.echoSource ?? false,
    traceScan: options.traceScan ?? false,
    maxTokenLength: options.maxTokenLength ?? DEFAULT_MAX_TOKEN_LENGTH,
    maxLineLength: options.maxLineLength ?? DEFAULT_MAX_LINE_LENGTH,
    callbacks: options.callbacks ?? {},
    lineBuf: '',
    pos: 0,
    line: 0,
    eof: false,
  };
}

/** Format a source line for the listing, e.g. "   3: x := 1\n" */
export function formatEchoLine(line: number, text: string): string {
  return `${String(line).padStart(4)}: ${text}`;
}

function refill(state: LexerState): boolean {
  const chunk = state.source.readLine(state.maxLineLength);
  if (chunk === null) {
    state.eof = true;
    return false;
  }

  if (chunk.startsLine) {
    state.line++;
  }
  if (state.echoSource) {
    state.callbacks.onEcho?.(formatEchoLine(state.line, chunk.text));
  }
  state.lineBuf = chunk.text;
  state.pos = 0;
  return true;
}

/** Return the next character, reading a new line when the buffer is exhausted */
export function nextChar(state: LexerState): string {
  while (state.pos >= state.lineBuf.length) {
    if (state.eof || !refill(state)) return EOF_CHAR;
  }
  const ch = state.lineBuf.charAt(state.pos);
  state.pos++;
  return ch;
}

/** Back up one character; a no-op once end of input has been reached */
export function putBack(state: LexerState): void {
  if (!state.eof && state.pos > 0) {
    state.pos--;
  }
}
