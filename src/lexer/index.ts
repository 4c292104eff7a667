/**
 * Lexer Module
 * Converts a line-oriented character stream into tokens
 */

export { diagnoseToken, LexerError } from './errors.js';
export { lookupReserved, RESERVED_WORDS } from './operators.js';
export {
  createFileSource,
  createStringSource,
  type LineChunk,
  type LineSource,
} from './source.js';
export {
  createLexerState,
  DEFAULT_MAX_LINE_LENGTH,
  DEFAULT_MAX_TOKEN_LENGTH,
  EOF_CHAR,
  type LexerState,
  nextChar,
  putBack,
  type ScanCallbacks,
  type ScanOptions,
} from './state.js';
export { formatToken, getToken, tokenize } from './tokenizer.js';
