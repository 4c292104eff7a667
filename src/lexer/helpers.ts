/**
 * Lexer Helper Functions
 * Character classification and token construction
 */

import type { Token, TokenType } from '../token-types.js';

export function isDigit(ch: string): boolean {
  return ch.length === 1 && ch >= '0' && ch <= '9';
}

export function isLetter(ch: string): boolean {
  return (
    ch.length === 1 && ((ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z'))
  );
}

export function isWhitespace(ch: string): boolean {
  return (
    ch === ' ' ||
    ch === '\t' ||
    ch === '\n' ||
    ch === '\r' ||
    ch === '\f' ||
    ch === '\v'
  );
}

export function makeToken(type: TokenType, value: string, line: number): Token {
  return { type, value, line };
}
