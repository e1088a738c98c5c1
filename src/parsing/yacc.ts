import {Node, Parser, fail, succeed} from '../lib/combinators';
import type {Output} from '../lib/combinators';
import {Failure} from '../lib/failure';
import type {Result} from '../lib/failure';
import {Lexer} from '../lib/lexer';
import type {Token} from '../lib/lexer';
import {Grammar} from '../grammar/yacc';
import type {Element, Production, Rule} from '../grammar/yacc';

// Only the rules section of a YACC file is read: the text strictly between
// the first two lines consisting of the section marker.

const kMarker = '%%';

interface Section {
  start: number;
  text: string;
}

const section = (input: string): Result<Section> => {
  const markers: {start: number; end: number}[] = [];
  let offset = 0;
  for (const line of input.split('\n')) {
    const end = offset + line.length + 1;
    if (line.trimEnd() === kMarker) markers.push({start: offset, end});
    if (markers.length === 2) break;
    offset = end;
  }
  if (markers.length < 2) {
    const expected = [`${kMarker} line`];
    return Failure.reject({type: 'syntax', expected, offset: input.length});
  }
  const [first, second] = markers;
  return Failure.ok({start: first.end, text: input.slice(first.end, second.start)});
};

// Action blocks are skipped by counting braces. Braces inside literals and
// comments never reach this scanner as open or close tokens.
const action = Parser.base((input: Token[], i: number): Output<null> => {
  const first = i < input.length ? input[i] : null;
  if (!first || first.type !== 'open' || first.text !== '{') {
    return fail({expected: ['action'], i});
  }
  let depth = 0;
  for (let j = i; j < input.length; j++) {
    const {text, type} = input[j];
    if (type === 'open' && text === '{') depth += 1;
    if (type === 'close' && text === '}') depth -= 1;
    if (depth === 0) return succeed(j + 1, null);
  }
  return fail({expected: ["'}' closing the action"], i: input.length - 1}, true);
});

const is_element = (x: Element | null): x is Element => x !== null;

// prettier-ignore
const parser = (() => {
  const id = Lexer.type('id');
  const str = Lexer.type('str');
  const sym = Lexer.symbol;

  const separator = Parser.any(sym('::='), sym(':'), sym('=')).label('separator');
  const directive = sym('%').then(Parser.any<Token, null>(
    Lexer.keyword('empty').map(() => null),
    Lexer.keyword('prec').then(Parser.any(id, str)).map(() => null),
  ));

  // Actions and directives may appear anywhere in a rule; only the elements
  // are kept.
  const element = Parser.any<Token, Element | null>(
    str.map((x): Element => ({type: 'terminal', text: x.text})),
    id.map((x): Element => ({type: 'nonterminal', name: x.text})),
    action,
    directive,
  ).label('element');
  const rule: Node<Token, Rule> = element.repeat().map(xs => xs.filter(is_element));

  const production = id.skip(separator).and(rule.repeat(1, sym('|'))).skip(sym(';'))
    .map(([name, rules]): Production => ({name: name.text, rules}));
  return production.repeat().skip(Lexer.type('eof')).skip(Parser.end<Token>());
})();

// Parses the rules section and folds its productions into a Grammar,
// reporting the first duplicate or over-empty production.
const parse = (input: string): Result<Grammar> => {
  const found = section(input);
  if (!found.success) return found;
  const {start, text} = found.result;
  const productions = Lexer.parse(parser, text, start);
  if (!productions.success) return productions;
  return Grammar.build(productions.result);
};

const Yacc = {parse, section};

export {Yacc};
