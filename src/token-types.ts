// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_TYPES = {
  // Keywords
  IF: 'IF',
  THEN: 'THEN',
  ELSE: 'ELSE',
  END: 'END',
  REPEAT: 'REPEAT',
  UNTIL: 'UNTIL',
  READ: 'READ',
  WRITE: 'WRITE',

  // Multi-character tokens
  ID: 'ID',
  NUM: 'NUM',

  // Assignment
  ASSIGN: 'ASSIGN', // :=

  // Comparison operators
  EQ: 'EQ', // =
  LT: 'LT', // <

  // Arithmetic operators
  PLUS: 'PLUS', // +
  MINUS: 'MINUS', // -
  TIMES: 'TIMES', // *
  OVER: 'OVER', // /

  // Delimiters
  LPAREN: 'LPAREN', // (
  RPAREN: 'RPAREN', // )
  SEMI: 'SEMI', // ;

  // Special
  ENDFILE: 'ENDFILE',
  ERROR: 'ERROR',
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

export interface Token {
  readonly type: TokenType;
  /** Exact lexeme text, bounded by the scanner's maximum token length */
  readonly value: string;
  /** Line counter when the token was emitted (0 before any line is read) */
  readonly line: number;
}
