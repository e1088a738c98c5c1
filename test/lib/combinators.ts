import {Node, Parser} from '../../src/lib/combinators';
import {Test} from '../test';

// These tests run the combinators over plain characters.

const ch = (x: string): Node<string, string> => Parser.literal(x, `'${x}'`);

const parse = <T>(parser: Node<string, T>, input: string) =>
  parser.parse(Array.from(input));

const combinators: Test = {
  and_keeps_both_results: () => {
    Test.assert_eq(parse(ch('a').and(ch('b')), 'ab'),
                   {success: true, result: ['a', 'b']});
  },
  skip_and_then_discard_one_side: () => {
    Test.assert_eq(parse(ch('a').skip(ch('b')), 'ab'), {success: true, result: 'a'});
    Test.assert_eq(parse(ch('a').then(ch('b')), 'ab'), {success: true, result: 'b'});
  },
  all_keeps_every_result: () => {
    const parser = Parser.all(ch('a'), ch('b'), ch('c'));
    Test.assert_eq(parse(parser, 'abc'), {success: true, result: ['a', 'b', 'c']});
    Test.assert_eq(parse(parser, 'abd'), {success: false, expected: ["'c'"], i: 2});
  },
  fail_adds_its_expectations: () => {
    const parser = Parser.any(ch('a'), Parser.fail<string, string>(['something else']));
    Test.assert_eq(parse(parser, 'b'),
                   {success: false, expected: ["'a'", 'something else'], i: 0});
  },
  any_tries_options_in_order: () => {
    const parser = Parser.any(ch('x'), ch('y'));
    Test.assert_eq(parse(parser, 'y'), {success: true, result: 'y'});
    Test.assert_eq(parse(parser, 'z'),
                   {success: false, expected: ["'x'", "'y'"], i: 0});
  },
  any_does_not_backtrack_over_consumed_input: () => {
    const parser = ch('a').then(ch('b')).or(ch('a').then(ch('c')));
    Test.assert_eq(parse(parser, 'ac'),
                   {success: false, expected: ["'b'"], i: 1});
  },
  attempt_allows_backtracking: () => {
    const parser = ch('a').then(ch('b')).attempt().or(ch('a').then(ch('c')));
    Test.assert_eq(parse(parser, 'ac'), {success: true, result: 'c'});
  },
  repeat_matches_zero_or_more: () => {
    Test.assert_eq(parse(ch('a').repeat(), 'aaa'),
                   {success: true, result: ['a', 'a', 'a']});
    Test.assert_eq(parse(ch('a').repeat(), ''), {success: true, result: []});
  },
  repeat_with_minimum_fails_on_empty_input: () => {
    Test.assert_eq(parse(ch('a').repeat(1), ''),
                   {success: false, expected: ["'a'"], i: 0});
  },
  repeat_with_separator_matches_lists: () => {
    const list = ch('a').repeat(0, ch(','));
    Test.assert_eq(parse(list, 'a,a,a'), {success: true, result: ['a', 'a', 'a']});
    Test.assert_eq(parse(list, ''), {success: true, result: []});
  },
  repeat_with_separator_rejects_trailing_separator: () => {
    const list = ch('a').repeat(0, ch(','));
    Test.assert_eq(parse(list, 'a,'), {success: false, expected: ["'a'"], i: 2});
  },
  maybe_matches_optionally: () => {
    const parser = ch('a').maybe().and(ch('b'));
    Test.assert_eq(parse(parser, 'b'), {success: true, result: [null, 'b']});
    Test.assert_eq(parse(parser, 'ab'), {success: true, result: ['a', 'b']});
  },
  label_replaces_expectations: () => {
    const parser = Parser.any(ch('x'), ch('y')).label('letter');
    Test.assert_eq(parse(parser, 'z'), {success: false, expected: ['letter'], i: 0});
  },
  parse_requires_end_of_input: () => {
    Test.assert_eq(parse(ch('a'), 'ab'),
                   {success: false, expected: ['end of input'], i: 1});
    Test.assert_eq(parse(ch('a').skip(Parser.end<string>()), 'a'),
                   {success: true, result: 'a'});
  },
  lazy_supports_recursion: () => {
    const parens: Node<string, number> = Parser.lazy(() =>
      ch('(').then(parens).skip(ch(')')).map(x => x + 1)
        .or(Parser.succeed<string, number>(0)));
    Test.assert_eq(parse(parens, '(())'), {success: true, result: 2});
    Test.assert_eq(parse(parens, '(()'), {success: false, expected: ["')'"], i: 3});
  },
  test_consumes_matching_symbols: () => {
    const digit = Parser.test((x: string) => /[0-9]/.test(x), 'digit');
    const number = digit.repeat(1).map(xs => parseInt(xs.join(''), 10));
    Test.assert_eq(parse(number, '042'), {success: true, result: 42});
    Test.assert_eq(parse(number, 'x'), {success: false, expected: ['digit'], i: 0});
  },
};

export {combinators};
