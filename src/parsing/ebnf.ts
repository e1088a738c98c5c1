import {Node, Parser} from '../lib/combinators';
import {Failure} from '../lib/failure';
import type {Result} from '../lib/failure';
import {Lexer} from '../lib/lexer';
import type {Token} from '../lib/lexer';
import {Ebnf} from '../grammar/ebnf';
import type {Definition, Quantifier} from '../grammar/ebnf';

// Parsers for the supplementary notation: a flat list of `name ::= body ;`
// definitions, where quoted literals and character classes are opaque.

// prettier-ignore
const parser = (() => {
  const sym = Lexer.symbol;
  const quantifier = Parser.any<Token, Quantifier>(
    sym('?').map((): Quantifier => '?'),
    sym('*').map((): Quantifier => '*'),
    sym('+').map((): Quantifier => '+'),
  );

  const alternation: Node<Token, Ebnf> = Parser.lazy(
    () => sequence.repeat(1, sym('|')).map(Ebnf.alternation));
  const atom = Parser.any<Token, Ebnf>(
    Lexer.type('id').map(x => Ebnf.nonterminal(x.text)),
    Lexer.type('str').map(x => Ebnf.terminal(x.text)),
    Lexer.type('class').map(x => Ebnf.terminal(x.text)),
    sym('(').then(alternation).skip(sym(')')),
  );
  const term = atom.and(quantifier.repeat()).map(
    ([base, quantifiers]) => quantifiers.reduce(Ebnf.quantified, base));
  const sequence = term.repeat().map(Ebnf.sequence);

  const definition = Lexer.type('id').skip(sym('::=')).and(alternation).skip(sym(';'))
    .map(([name, body]): Definition => ({name: name.text, body}));
  return definition.repeat().skip(Lexer.type('eof')).skip(Parser.end<Token>());
})();

// Every definition is normalized as soon as it is parsed.
const parse = (input: string): Result<Definition[]> => {
  const parsed = Lexer.parse(parser, input);
  if (!parsed.success) return parsed;
  const names = new Set<string>();
  const result: Definition[] = [];
  for (const {name, body} of parsed.result) {
    if (names.has(name)) {
      return Failure.reject(Failure.invariant(`Duplicate definition: ${name}`));
    }
    names.add(name);
    const normalized = Ebnf.normalize(body);
    if (!normalized.success) return normalized;
    result.push({name, body: normalized.result});
  }
  return Failure.ok(result);
};

const Supplementary = {parse};

export {Supplementary};
