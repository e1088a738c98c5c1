import {Graph} from '../lib/graph';
import type {Component} from '../lib/graph';
import {Ebnf} from './ebnf';
import type {Definition} from './ebnf';
import {Grammar} from './yacc';

// Nodes are the defined names, productions before supplementary definitions.
// Edges run to every defined name referenced directly; references to names
// nobody defines (the grammar's tokens) are not part of the graph. A
// supplementary definition shadowed by a production contributes no edges.
const graph = (grammar: Grammar, definitions: Definition[]): Graph => {
  const names = new Set(Array.from(grammar.keys()));
  const visible = definitions.filter(x => !names.has(x.name));
  visible.forEach(x => names.add(x.name));

  const result: Graph = new Map();
  const add = (name: string, references: string[]) =>
    result.set(name, new Set(references.filter(x => names.has(x))));
  grammar.forEach((rules, name) => add(name, Grammar.references(rules)));
  visible.forEach(x => add(x.name, Ebnf.references(x.body)));
  return result;
};

const analyze = (grammar: Grammar, definitions: Definition[]): Component[] =>
  Graph.components(graph(grammar, definitions));

const Dependencies = {analyze, graph};

export {Dependencies};
