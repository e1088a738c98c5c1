import {clone} from '../lib/base';
import {Failure} from '../lib/failure';
import type {Result} from '../lib/failure';
import {Graph} from '../lib/graph';
import type {Component} from '../lib/graph';
import {Dependencies} from './dependencies';
import {Ebnf} from './ebnf';
import type {Definition} from './ebnf';
import {Grammar} from './yacc';

// The triviality thresholds are readability heuristics for the rendered
// diagrams, so every run may override them.

interface Options {
  inline: boolean;
  max_alternatives: number;
  max_sequence: number;
}

const kDefaultOptions: Options = {inline: true, max_alternatives: 4, max_sequence: 3};

interface Conversion {
  components: Component[];
  definitions: Definition[];
  inlined: string[];
}

interface State {
  definitions: Map<string, Definition>;
  graph: Graph;
  inlined: Set<string>;
  options: Options;
}

// Triviality. Recursive definitions are never trivial, whatever their size.

const is_trivial_body = (body: Ebnf, options: Options): boolean => {
  switch (body.type) {
    case 'alternation':
      return body.options.length <= options.max_alternatives &&
             body.options.every(Ebnf.is_atomic);
    case 'quantified':
      return Ebnf.is_atomic(body.base);
    case 'sequence':
      if (body.terms.every(Ebnf.is_atomic)) {
        return body.terms.length <= options.max_sequence;
      }
      return body.terms.every(x => Ebnf.is_atomic(x) || is_trivial_body(x, options));
    case 'nonterminal': case 'terminal':
      return true;
  }
};

const is_trivial = (definition: Definition, state: State): boolean =>
  !Graph.reaches(state.graph, definition.name, definition.name) &&
  is_trivial_body(definition.body, state.options);

// Inlining. Under a quantifier, either directly or as an option of a
// quantified alternation, an empty or quantified body would turn into a
// double quantification once normalized, so such references are kept.

const substitute = (node: Ebnf, state: State, quantified = false): Ebnf => {
  switch (node.type) {
    case 'alternation':
      return Ebnf.alternation(node.options.map(x => substitute(x, state, quantified)));
    case 'nonterminal': {
      const definition = state.definitions.get(node.name);
      if (!definition || !is_trivial(definition, state)) return node;
      const {body} = definition;
      if (quantified && (body.type === 'quantified' || Ebnf.is_empty(body))) return node;
      state.inlined.add(node.name);
      return clone(body);
    }
    case 'quantified':
      return Ebnf.quantified(substitute(node.base, state, true), node.quantifier);
    case 'sequence':
      return Ebnf.sequence(node.terms.map(x => substitute(x, state)));
    case 'terminal':
      return node;
  }
};

// Substitutes and re-normalizes until nothing changes, which also catches
// references exposed by an earlier substitution.
const inline = (body: Ebnf, state: State): Ebnf => {
  let current = body;
  while (true) {
    const next = Failure.unwrap(Ebnf.normalize(substitute(current, state)));
    if (Ebnf.equal(next, current)) return next;
    current = next;
  }
};

// Converts every production in dependency order, so that a definition is
// only inlined once its own inlining is done. YACC-derived definitions come
// first in the result, then the supplementary ones no production shadows.
const convert = (
  grammar: Grammar,
  supplementary: Definition[],
  options: Partial<Options> = {},
): Result<Conversion> =>
  Failure.attempt(() => {
    const graph = Dependencies.graph(grammar, supplementary);
    const visible = supplementary.filter(x => !grammar.has(x.name));
    const state: State = {
      definitions: new Map(visible.map((x): [string, Definition] => [x.name, x])),
      graph,
      inlined: new Set(),
      options: {...kDefaultOptions, ...options},
    };
    const components = Graph.components(graph);
    const converted: Definition[] = [];
    for (const component of components) {
      for (const name of component.names) {
        const rules = grammar.get(name);
        if (!rules) continue;
        const normalized = Failure.unwrap(Ebnf.normalize(Grammar.to_ebnf(rules)));
        const body = state.options.inline ? inline(normalized, state) : normalized;
        const definition = {name, body};
        state.definitions.set(name, definition);
        converted.push(definition);
      }
    }
    const definitions = converted.concat(visible);
    return {components, definitions, inlined: Array.from(state.inlined)};
  });

const Converter = {convert, is_trivial_body, kDefaultOptions};

export type {Conversion, Options};
export {Converter};
