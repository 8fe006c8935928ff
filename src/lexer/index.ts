import * as moo from 'moo';
import { LexError } from '../arith/errors.js';
import type { Location } from '../utils/types.js';

export type ArithTokenType = 'number' | 'op' | 'lparen' | 'rparen';

export interface ArithToken {
  type: ArithTokenType;
  text: string;
  offset: number;
  line: number;
  col: number;
}

const rules: moo.Rules = {
  ws: { match: /\s+/, lineBreaks: true },
  number: /(?:[0-9]+(?:\.[0-9]*)?|\.[0-9]+)(?:[eE][+-]?[0-9]+)?/,
  op: ['+', '-', '*', '/'],
  lparen: '(',
  rparen: ')',
  error: moo.error,
};

const TOKEN_TYPES: readonly string[] = ['number', 'op', 'lparen', 'rparen'] satisfies ArithTokenType[];

function isArithTokenType(type: string | undefined): type is ArithTokenType {
  return type !== undefined && TOKEN_TYPES.includes(type);
}

// moo lexers keep their cursor internally, so each stream compiles its own.
export function createArithLexer(): moo.Lexer {
  return moo.compile(rules);
}

/**
 * Lazily yields the tokens of `input`, skipping whitespace.
 * Throws LexError at the first character outside the grammar.
 */
export function* tokenize(input: string): Generator<ArithToken, void, undefined> {
  const lexer = createArithLexer();
  lexer.reset(input);

  let token: moo.Token | undefined;
  while ((token = lexer.next()) !== undefined) {
    if (token.type === 'ws') continue;

    if (!isArithTokenType(token.type)) {
      throw new LexError(token.text.charAt(0), {
        location: {
          start: { line: token.line, column: token.col, offset: token.offset },
          end: { line: token.line, column: token.col + 1, offset: token.offset + 1 },
        },
      });
    }

    yield {
      type: token.type,
      text: token.text,
      offset: token.offset,
      line: token.line,
      col: token.col,
    };
  }
}

export function tokenLocation(token: ArithToken): Location {
  return spanLocation(token, token);
}

/** Span from the start of `first` to the end of `last` (same line assumed for `last`). */
export function spanLocation(first: ArithToken, last: ArithToken): Location {
  return {
    start: { line: first.line, column: first.col, offset: first.offset },
    end: {
      line: last.line,
      column: last.col + last.text.length,
      offset: last.offset + last.text.length,
    },
  };
}
