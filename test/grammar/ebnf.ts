import {Ebnf} from '../../src/grammar/ebnf';
import {Test} from '../test';

const [n, t] = [Ebnf.nonterminal, Ebnf.terminal];
const {alternation, quantified, sequence} = Ebnf;

const normal = (x: Ebnf): Ebnf => Test.assert_success(Ebnf.normalize(x));

const ebnf: Test = {
  normalize_flattens_alternations: () => {
    const input = alternation([alternation([t("'a'"), t("'b'")]), t("'c'")]);
    Test.assert_eq(normal(input), alternation([t("'a'"), t("'b'"), t("'c'")]));
  },
  normalize_flattens_sequences: () => {
    const input = sequence([sequence([n('a'), n('b')]), sequence([n('c')])]);
    Test.assert_eq(normal(input), sequence([n('a'), n('b'), n('c')]));
  },
  normalize_collapses_singletons: () => {
    Test.assert_eq(normal(alternation([sequence([n('x')])])), n('x'));
    Test.assert_eq(normal(sequence([alternation([n('x'), n('y')])])),
                   alternation([n('x'), n('y')]));
  },
  normalize_turns_empty_options_into_optionality: () => {
    const input = alternation([sequence([t("'a'"), n('s')]), sequence([])]);
    const result = normal(input);
    Test.assert_eq(result, quantified(sequence([t("'a'"), n('s')]), '?'));
    Test.assert_eq(Ebnf.show(result), "('a' s)?");
  },
  normalize_keeps_remaining_options_together: () => {
    const input = alternation([n('x'), sequence([]), n('y')]);
    Test.assert_eq(normal(input), quantified(alternation([n('x'), n('y')]), '?'));
  },
  normalize_merges_optionality_into_quantifiers: () => {
    const wrap = (x: Ebnf) => normal(alternation([x, sequence([])]));
    Test.assert_eq(wrap(quantified(n('x'), '?')), quantified(n('x'), '?'));
    Test.assert_eq(wrap(quantified(n('x'), '*')), quantified(n('x'), '*'));
    Test.assert_eq(wrap(quantified(n('x'), '+')), quantified(n('x'), '*'));
  },
  normalize_keeps_all_empty_alternations_empty: () => {
    const result = normal(alternation([sequence([]), sequence([])]));
    Test.assert_eq(Ebnf.is_empty(result), true);
    Test.assert_eq(Ebnf.show(result), '()');
  },
  normalize_drops_quantifiers_over_nothing: () => {
    Test.assert_eq(Ebnf.is_empty(normal(quantified(sequence([]), '*'))), true);
    const input = sequence([quantified(alternation([sequence([])]), '+'), n('x')]);
    Test.assert_eq(normal(input), n('x'));
  },
  normalize_is_idempotent: () => {
    const inputs = [
      alternation([sequence([n('a'), sequence([n('b')])]), sequence([])]),
      sequence([alternation([alternation([n('x')]), t("'y'")]), n('z')]),
      quantified(alternation([sequence([n('a'), n('b')]), n('c')]), '+'),
    ];
    for (const input of inputs) {
      const once = normal(input);
      Test.assert_eq(Ebnf.equal(normal(once), once), true);
    }
  },
  normalize_rejects_double_quantification: () => {
    const input = quantified(quantified(n('x'), '*'), '+');
    Test.assert_failure(Ebnf.normalize(input),
                        'Illegal double quantification: (x*)+ (normalized: (x*)+)');
  },
  normalize_rejects_quantifiers_exposed_by_normalizing: () => {
    const input = quantified(alternation([n('x'), sequence([])]), '*');
    Test.assert_failure(Ebnf.normalize(input),
                        'Illegal double quantification: (x|())* (normalized: (x?)*)');
  },
  show_parenthesizes_by_precedence: () => {
    Test.assert_eq(Ebnf.show(sequence([t("'a'"), alternation([n('b'), n('c')])])),
                   "'a' (b|c)");
    Test.assert_eq(Ebnf.show(alternation([n('a'), sequence([n('b'), n('c')])])),
                   'a|b c');
    Test.assert_eq(Ebnf.show(quantified(sequence([n('a'), n('b')]), '*')), '(a b)*');
    Test.assert_eq(Ebnf.show(sequence([quantified(n('a'), '+'), n('b')])), 'a+ b');
    Test.assert_eq(Ebnf.show(quantified(t('[a-z]'), '?')), '[a-z]?');
  },
  show_definition_uses_the_definition_operator: () => {
    const body = alternation([t("'+'"), t("'-'")]);
    Test.assert_eq(Ebnf.show_definition({name: 'sign', body}), "sign ::= '+'|'-'");
    Test.assert_eq(Ebnf.show_definition({name: 'none', body: Ebnf.empty}), 'none ::= ()');
  },
  references_are_in_order_of_first_use: () => {
    const input = sequence([
      n('b'), alternation([n('a'), n('b')]), quantified(n('c'), '*'), t("'d'"),
    ]);
    Test.assert_eq(Ebnf.references(input), ['b', 'a', 'c']);
  },
  equal_compares_structure: () => {
    Test.assert_eq(Ebnf.equal(sequence([n('a')]), sequence([n('a')])), true);
    Test.assert_eq(Ebnf.equal(sequence([n('a')]), alternation([n('a')])), false);
    Test.assert_eq(Ebnf.equal(n('a'), t('a')), false);
    Test.assert_eq(Ebnf.equal(quantified(n('a'), '?'), quantified(n('a'), '*')), false);
  },
};

export {ebnf};
