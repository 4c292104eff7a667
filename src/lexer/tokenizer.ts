/**
 * Tokenizer
 * Deterministic scanner: one token per call, one character of put-back
 */

import type { Token, TokenType } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';
import {
  isDigit,
  isLetter,
  isWhitespace,
  makeToken,
} from './helpers.js';
import { lookupReserved, lookupSingleChar } from './operators.js';
import { createStringSource } from './source.js';
import {
  createLexerState,
  EOF_CHAR,
  type LexerState,
  nextChar,
  putBack,
  type ScanOptions,
} from './state.js';

type ScanState =
  | 'START'
  | 'IN_ASSIGN'
  | 'IN_COMMENT'
  | 'IN_NUMBER'
  | 'IN_IDENTIFIER'
  | 'DONE';

/**
 * Scan the next token.
 *
 * Leaves the line buffer on the first character not belonging to the
 * returned token. Never throws: malformed input comes back as an ERROR
 * token and the next call carries on after it. A comment still open at end
 * of input yields ERROR with lexeme "{", then ENDFILE.
 */
export function getToken(state: LexerState): Token {
  let lexeme = '';
  let current: TokenType = TOKEN_TYPES.ERROR;
  let scan: ScanState = 'START';

  while (scan !== 'DONE') {
    const ch = nextChar(state);
    let save = true;

    switch (scan) {
      case 'START':
        if (isDigit(ch)) {
          scan = 'IN_NUMBER';
        } else if (isLetter(ch)) {
          scan = 'IN_IDENTIFIER';
        } else if (ch === '{') {
          save = false;
          scan = 'IN_COMMENT';
        } else if (isWhitespace(ch)) {
          save = false;
        } else if (ch === ':') {
          scan = 'IN_ASSIGN';
        } else if (ch === EOF_CHAR) {
          save = false;
          scan = 'DONE';
          current = TOKEN_TYPES.ENDFILE;
        } else {
          scan = 'DONE';
          current = lookupSingleChar(ch) ?? TOKEN_TYPES.ERROR;
        }
        break;

      case 'IN_COMMENT':
        save = false;
        if (ch === '}') {
          scan = 'START';
        } else if (ch === EOF_CHAR) {
          scan = 'DONE';
          current = TOKEN_TYPES.ERROR;
          lexeme = '{';
        }
        break;

      case 'IN_ASSIGN':
        scan = 'DONE';
        if (ch === '=') {
          current = TOKEN_TYPES.ASSIGN;
        } else {
          putBack(state);
          save = false;
          current = TOKEN_TYPES.ERROR;
        }
        break;

      case 'IN_NUMBER':
        if (!isDigit(ch)) {
          putBack(state);
          save = false;
          scan = 'DONE';
          current = TOKEN_TYPES.NUM;
        }
        break;

      case 'IN_IDENTIFIER':
        if (!isLetter(ch)) {
          putBack(state);
          save = false;
          scan = 'DONE';
          current = TOKEN_TYPES.ID;
        }
        break;
    }

    // Past the bound characters are still consumed, just not stored
    if (save && lexeme.length < state.maxTokenLength) {
      lexeme += ch;
    }
  }

  if (current === TOKEN_TYPES.ID) {
    current = lookupReserved(lexeme);
  }

  const token = makeToken(current, lexeme, state.line);
  if (state.traceScan) {
    state.callbacks.onTrace?.(`\t${token.line}: ${formatToken(token)}`);
  }
  return token;
}

/** Describe a token the way the listing trace prints it */
export function formatToken(token: Token): string {
  switch (token.type) {
    case TOKEN_TYPES.IF:
    case TOKEN_TYPES.THEN:
    case TOKEN_TYPES.ELSE:
    case TOKEN_TYPES.END:
    case TOKEN_TYPES.REPEAT:
    case TOKEN_TYPES.UNTIL:
    case TOKEN_TYPES.READ:
    case TOKEN_TYPES.WRITE:
      return `reserved word: ${token.value}`;
    case TOKEN_TYPES.ASSIGN:
      return ':=';
    case TOKEN_TYPES.LT:
      return '<';
    case TOKEN_TYPES.EQ:
      return '=';
    case TOKEN_TYPES.LPAREN:
      return '(';
    case TOKEN_TYPES.RPAREN:
      return ')';
    case TOKEN_TYPES.SEMI:
      return ';';
    case TOKEN_TYPES.PLUS:
      return '+';
    case TOKEN_TYPES.MINUS:
      return '-';
    case TOKEN_TYPES.TIMES:
      return '*';
    case TOKEN_TYPES.OVER:
      return '/';
    case TOKEN_TYPES.ENDFILE:
      return 'EOF';
    case TOKEN_TYPES.NUM:
      return `NUM, val= ${token.value}`;
    case TOKEN_TYPES.ID:
      return `ID, name= ${token.value}`;
    case TOKEN_TYPES.ERROR:
      return `ERROR: ${token.value}`;
  }
}

/** Scan a whole string, returning every token up to and including ENDFILE */
export function tokenize(source: string, options: ScanOptions = {}): Token[] {
  const state = createLexerState(createStringSource(source), options);
  const tokens: Token[] = [];
  let token: Token;

  do {
    token = getToken(state);
    tokens.push(token);
  } while (token.type !== TOKEN_TYPES.ENDFILE);

  return tokens;
}
