/**
 * tiny-scan Module
 * Exports the scanner, token types, configuration and error taxonomy
 */

export {
  createFileSource,
  createLexerState,
  createStringSource,
  DEFAULT_MAX_LINE_LENGTH,
  DEFAULT_MAX_TOKEN_LENGTH,
  diagnoseToken,
  EOF_CHAR,
  formatToken,
  getToken,
  LexerError,
  type LexerState,
  type LineChunk,
  type LineSource,
  lookupReserved,
  nextChar,
  putBack,
  RESERVED_WORDS,
  type ScanCallbacks,
  type ScanOptions,
  tokenize,
} from './lexer/index.js';
export { TOKEN_TYPES, type Token, type TokenType } from './token-types.js';

// ============================================================
// CONFIGURATION
// ============================================================
export {
  CONFIG_FILE_NAME,
  createDefaultConfig,
  loadConfig,
  resolveConfig,
  type ScanConfig,
} from './config.js';

// ============================================================
// ERROR TAXONOMY
// ============================================================
export {
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorRegistry,
  ERROR_REGISTRY,
  renderMessage,
} from './error-registry.js';
export {
  CliError,
  ConfigError,
  createError,
  TinyError,
  type TinyErrorData,
} from './error-classes.js';
