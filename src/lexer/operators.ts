/**
 * Lookup Tables
 *
 * Both tables are scanned in order and match exactly; the first entry that
 * matches wins. Keep that behaviour if an alias is ever added.
 */

import type { TokenType } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';

interface TableEntry {
  readonly text: string;
  readonly type: TokenType;
}

/** Reserved words, checked after an identifier has been fully read */
export const RESERVED_WORDS: readonly TableEntry[] = [
  { text: 'if', type: TOKEN_TYPES.IF },
  { text: 'then', type: TOKEN_TYPES.THEN },
  { text: 'else', type: TOKEN_TYPES.ELSE },
  { text: 'end', type: TOKEN_TYPES.END },
  { text: 'repeat', type: TOKEN_TYPES.REPEAT },
  { text: 'until', type: TOKEN_TYPES.UNTIL },
  { text: 'read', type: TOKEN_TYPES.READ },
  { text: 'write', type: TOKEN_TYPES.WRITE },
];

/** Operators and punctuation recognized from START in a single step */
export const SINGLE_CHAR_OPERATORS: readonly TableEntry[] = [
  { text: '+', type: TOKEN_TYPES.PLUS },
  { text: '-', type: TOKEN_TYPES.MINUS },
  { text: '*', type: TOKEN_TYPES.TIMES },
  { text: '/', type: TOKEN_TYPES.OVER },
  { text: ';', type: TOKEN_TYPES.SEMI },
  { text: '(', type: TOKEN_TYPES.LPAREN },
  { text: ')', type: TOKEN_TYPES.RPAREN },
  { text: '<', type: TOKEN_TYPES.LT },
  { text: '=', type: TOKEN_TYPES.EQ },
];

function lookup(
  table: readonly TableEntry[],
  text: string
): TokenType | undefined {
  for (const entry of table) {
    if (entry.text === text) return entry.type;
  }
  return undefined;
}

/** Keyword type for an identifier lexeme, or ID when it is not reserved */
export function lookupReserved(lexeme: string): TokenType {
  return lookup(RESERVED_WORDS, lexeme) ?? TOKEN_TYPES.ID;
}

export function lookupSingleChar(ch: string): TokenType | undefined {
  return lookup(SINGLE_CHAR_OPERATORS, ch);
}
