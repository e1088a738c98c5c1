import * as moo from 'moo';

import {quote} from './base';
import {Node, Parser} from './combinators';
import {Failure} from './failure';
import type {Result} from './failure';

// Both notations share one moo lexer. Comments and whitespace are dropped,
// quoted literals and character classes keep their delimiters.

type Type = 'class' | 'close' | 'eof' | 'error' | 'id' | 'num' | 'open' | 'str' | 'sym';

interface Token {
  offset: number;
  text: string;
  type: Type;
}

const lexer = moo.compile({
  whitespace: {match: /\s+/, lineBreaks: true},
  comment: [
    {match: /\/\*[^]*?\*\//, lineBreaks: true},
    {match: /\/\/.*/},
  ],
  bad_comment: {match: /\/\*[^]*/, lineBreaks: true},
  str: [
    {match: /'(?:[^'\\\n]|\\.)*'/},
    {match: /"(?:[^"\\\n]|\\.)*"/},
  ],
  bad_str: [
    {match: /'(?:[^'\\\n]|\\.)*/},
    {match: /"(?:[^"\\\n]|\\.)*/},
  ],
  class: /\[(?:[^\]\\\n]|\\.)+\]/,
  id: /[a-zA-Z_][a-zA-Z0-9_]*/,
  num: /[0-9]+/,
  open: /[({[]/,
  close: /[)}\]]/,
  sym: [{match: '::='}, {match: /[!#$%&*+,\-.\/:;<=>?@\\^`|~]/}],
  error: moo.error,
});

const classify = (type: string | undefined): Type | null => {
  switch (type) {
    case 'bad_comment': case 'bad_str': case 'error': return 'error';
    case 'class': case 'close': case 'id': case 'num': case 'open': case 'str':
    case 'sym': return type;
    default: return null;
  }
};

// Returns the tokens of the input, always ending in either an eof token or
// an error token. `base` is added to every offset, for callers that lex a
// slice of a larger document.
const lex = (input: string, base = 0): Token[] => {
  const result: Token[] = [];
  lexer.reset(input);
  for (let token = lexer.next(); token; token = lexer.next()) {
    const type = classify(token.type);
    if (type === null) continue;
    result.push({offset: base + token.offset, text: token.text, type});
    if (type === 'error') return result;
  }
  result.push({offset: base + input.length, text: '', type: 'eof'});
  return result;
};

// Helpers for building combinators over tokens.

const kTypeNames: {[type in Type]: string} = {
  class: 'character class',
  close: 'closing brace',
  eof: 'end of input',
  error: 'invalid token',
  id: 'identifier',
  num: 'number',
  open: 'opening brace',
  str: 'literal',
  sym: 'symbol',
};

const keyword = (text: string): Node<Token, Token> =>
  Parser.test((x: Token) => x.type === 'id' && x.text === text, text);

const symbol = (text: string): Node<Token, Token> =>
  Parser.test(
    (x: Token) => x.text === text && x.type !== 'str' && x.type !== 'class',
    quote(JSON.stringify(text)),
  );

const type = (type: Type): Node<Token, Token> =>
  Parser.test((x: Token) => x.type === type, kTypeNames[type]);

// Lexes the input and runs a token parser over it. Lexical faults are
// reported before any parsing happens.
const parse = <T>(parser: Node<Token, T>, input: string, base = 0):
    Result<T> => {
  const tokens = lex(input, base);
  const last = tokens[tokens.length - 1];
  if (last.type === 'error') {
    return Failure.reject({type: 'lexical', offset: last.offset, text: last.text});
  }
  const outcome = parser.parse(tokens);
  if (outcome.success) return Failure.ok(outcome.result);
  const {offset} = tokens[Math.min(outcome.i, tokens.length - 1)];
  return Failure.reject({type: 'syntax', expected: outcome.expected, offset});
};

const Lexer = {keyword, lex, parse, symbol, type};

export type {Token, Type};
export {Lexer};
