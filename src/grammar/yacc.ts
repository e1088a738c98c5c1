import {Failure} from '../lib/failure';
import type {Result} from '../lib/failure';
import {Ebnf} from './ebnf';

// The YACC grammar model: a production binds a name to alternative rules,
// each a possibly-empty list of elements.

type Element =
  | {type: 'nonterminal'; name: string}
  | {type: 'terminal'; text: string};

type Rule = Element[];

interface Production {
  name: string;
  rules: Rule[];
}

type Grammar = Map<string, Rule[]>;

// Both grammar invariants are checked before a production is inserted.
const add = (grammar: Grammar, production: Production): Result<Grammar> => {
  const {name, rules} = production;
  if (grammar.has(name)) {
    return Failure.reject(Failure.invariant(`Duplicate production: ${name}`));
  }
  const empty = rules.filter(x => x.length === 0).length;
  if (empty > 1) {
    const message = `Production ${name} has ${empty} empty alternatives`;
    return Failure.reject(Failure.invariant(message));
  }
  return Failure.ok(new Map(grammar).set(name, rules));
};

const build = (productions: Production[]): Result<Grammar> => {
  let result: Result<Grammar> = Failure.ok(new Map());
  for (const production of productions) {
    if (!result.success) return result;
    result = add(result.result, production);
  }
  return result;
};

const references = (rules: Rule[]): string[] => {
  const result = new Set<string>();
  rules.forEach(x => x.forEach(y => y.type === 'nonterminal' && result.add(y.name)));
  return Array.from(result);
};

// The un-normalized EBNF form of a production: an alternation of sequences.
const to_ebnf = (rules: Rule[]): Ebnf =>
  Ebnf.alternation(rules.map(x => Ebnf.sequence(x.map(y =>
      y.type === 'terminal' ? Ebnf.terminal(y.text) : Ebnf.nonterminal(y.name)))));

const Grammar = {add, build, references, to_ebnf};

export type {Element, Production, Rule};
export {Grammar};
