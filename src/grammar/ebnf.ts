import {flatten} from '../lib/base';
import {Failure} from '../lib/failure';
import type {Result} from '../lib/failure';

// The EBNF syntax tree. The empty sequence is the canonical "nothing".

type Quantifier = '?' | '*' | '+';

type Ebnf =
  | {type: 'alternation'; options: Ebnf[]}
  | {type: 'nonterminal'; name: string}
  | {type: 'quantified'; base: Ebnf; quantifier: Quantifier}
  | {type: 'sequence'; terms: Ebnf[]}
  | {type: 'terminal'; text: string};

interface Definition {
  name: string;
  body: Ebnf;
}

const alternation = (options: Ebnf[]): Ebnf => ({type: 'alternation', options});

const nonterminal = (name: string): Ebnf => ({type: 'nonterminal', name});

const quantified = (base: Ebnf, quantifier: Quantifier): Ebnf =>
  ({type: 'quantified', base, quantifier});

const sequence = (terms: Ebnf[]): Ebnf => ({type: 'sequence', terms});

const terminal = (text: string): Ebnf => ({type: 'terminal', text});

const kEmpty = sequence([]);

const is_atomic = (x: Ebnf): boolean =>
  x.type === 'nonterminal' || x.type === 'terminal';

const is_empty = (x: Ebnf): boolean =>
  x.type === 'sequence' && x.terms.length === 0;

// Structural equality and traversal.

const equal = (a: Ebnf, b: Ebnf): boolean => {
  switch (a.type) {
    case 'alternation':
      return b.type === 'alternation' && equal_lists(a.options, b.options);
    case 'nonterminal':
      return b.type === 'nonterminal' && a.name === b.name;
    case 'quantified':
      return b.type === 'quantified' && a.quantifier === b.quantifier &&
             equal(a.base, b.base);
    case 'sequence':
      return b.type === 'sequence' && equal_lists(a.terms, b.terms);
    case 'terminal':
      return b.type === 'terminal' && a.text === b.text;
  }
};

const equal_lists = (xs: Ebnf[], ys: Ebnf[]): boolean =>
  xs.length === ys.length && xs.every((x, i) => equal(x, ys[i]));

const children = (x: Ebnf): Ebnf[] => {
  switch (x.type) {
    case 'alternation': return x.options;
    case 'quantified': return [x.base];
    case 'sequence': return x.terms;
    case 'nonterminal': case 'terminal': return [];
  }
};

// Returns the names this expression refers to, in order of first use.
const references = (x: Ebnf): string[] => {
  const result = new Set<string>();
  const visit = (y: Ebnf): void => {
    if (y.type === 'nonterminal') result.add(y.name);
    children(y).forEach(visit);
  };
  visit(x);
  return Array.from(result);
};

// Normalization. Children are normalized before their parents, so a single
// bottom-up pass reaches a fixpoint. A quantified empty sequence is empty.

// An empty option absorbed into a quantified remainder keeps the language:
// (x?)? = x?, (x*)? = x*, (x+)? = x*.
const kOptional: {[q in Quantifier]: Quantifier} = {'?': '?', '*': '*', '+': '*'};

const join = (options: Ebnf[]): Ebnf => {
  if (options.length === 0) return kEmpty;
  return options.length === 1 ? options[0] : alternation(options);
};

const optional = (x: Ebnf): Ebnf => {
  if (is_empty(x)) return x;
  if (x.type === 'quantified') return quantified(x.base, kOptional[x.quantifier]);
  return quantified(x, '?');
};

const normalize_node = (node: Ebnf): Ebnf => {
  switch (node.type) {
    case 'alternation': {
      const options = flatten(node.options.map(normalize_node).map(
          x => (x.type === 'alternation' ? x.options : [x])));
      const rest = options.filter(x => !is_empty(x));
      return rest.length < options.length ? optional(join(rest)) : join(rest);
    }
    case 'quantified': {
      const base = normalize_node(node.base);
      if (is_empty(base)) return base;
      if (base.type !== 'quantified') return quantified(base, node.quantifier);
      const partial = quantified(base, node.quantifier);
      return Failure.abort(Failure.invariant(
          `Illegal double quantification: ${show(node)} ` +
          `(normalized: ${show(partial)})`));
    }
    case 'sequence': {
      const terms = flatten(node.terms.map(normalize_node).map(
          x => (x.type === 'sequence' ? x.terms : [x])));
      return terms.length === 1 ? terms[0] : sequence(terms);
    }
    case 'nonterminal': case 'terminal':
      return node;
  }
};

const normalize = (node: Ebnf): Result<Ebnf> =>
  Failure.attempt(() => normalize_node(node));

// Serialization. A child is parenthesized iff its precedence is lower than
// the one its context requires.

const precedence = (x: Ebnf): number => {
  switch (x.type) {
    case 'alternation': return 0;
    case 'sequence': return 1;
    case 'quantified': return 2;
    case 'nonterminal': case 'terminal': return 3;
  }
};

const show_bare = (x: Ebnf): string => {
  switch (x.type) {
    case 'alternation': return x.options.map(y => show(y, 1)).join('|');
    case 'nonterminal': return x.name;
    case 'quantified': return `${show(x.base, 3)}${x.quantifier}`;
    case 'sequence': return x.terms.map(y => show(y, 2)).join(' ');
    case 'terminal': return x.text;
  }
};

const show = (x: Ebnf, context = 0): string => {
  if (is_empty(x)) return '()';
  const text = show_bare(x);
  return precedence(x) < context ? `(${text})` : text;
};

const show_definition = (definition: Definition): string =>
  `${definition.name} ::= ${show(definition.body)}`;

const Ebnf = {
  alternation,
  empty: kEmpty,
  equal,
  is_atomic,
  is_empty,
  nonterminal,
  normalize,
  precedence,
  quantified,
  references,
  sequence,
  show,
  show_definition,
  terminal,
};

export type {Definition, Quantifier};
export {Ebnf};
