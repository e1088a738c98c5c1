// Backtracking parser combinators over an arbitrary sequence of symbols.
// The notation parsers run them over lexer tokens; the tests run them over
// plain characters.

type Output<T> =
  | {stop: Stop; i: number; success: true; result: T}
  | {stop: Stop; i: number; success: false; cut: boolean};

type Outcome<T> =
  | {success: true; result: T}
  | {success: false; expected: string[]; i: number};

type Parser<S, T> = (input: S[], index: number) => Output<T>;

type Stop = {expected: string[]; i: number};

// Parsing primitives. A failure is "cut" once input has been consumed: an
// ordered choice will not try its remaining options after a cut failure.

const fail = <T>(stop: Stop, cut = false): Output<T> =>
  ({stop, i: stop.i, success: false, cut});

const succeed = <T>(i: number, result: T, stop?: Stop): Output<T> => ({
  stop: stop || {expected: [], i},
  i,
  success: true,
  result,
});

const test = <S>(fn: (s: S) => boolean, expected: string): Parser<S, S> => {
  const list = [expected];
  return (input, i) =>
    i < input.length && fn(input[i])
      ? succeed(i + 1, input[i])
      : fail({expected: list, i});
};

const end = <S>(input: S[], i: number): Output<null> =>
  i >= input.length
    ? succeed(i, null)
    : fail({expected: ['end of input'], i});

// Keeps the expectations at the furthest position reached.
const update = (source: Stop, target: Stop | null): Stop => {
  if (!target || source.i > target.i) return source;
  if (source.i < target.i) return target;
  return {expected: target.expected.concat(source.expected), i: target.i};
};

// Parser combinators, for combining primitives.

const two = <S, A, B>(a: Parser<S, A>, b: Parser<S, B>): Parser<S, [A, B]> =>
  (x, i) => {
    const first = a(x, i);
    if (!first.success) return first;
    const second = b(x, first.i);
    const stop = update(second.stop, first.stop);
    if (!second.success) return fail(stop, second.cut || first.i > i);
    return succeed(second.i, [first.result, second.result], stop);
  };

const all = <S, T>(...parsers: Parser<S, T>[]): Parser<S, T[]> => (x, i) => {
  let stop: Stop | null = null;
  const start = i;
  const result: T[] = [];
  for (const parser of parsers) {
    const output = parser(x, i);
    stop = update(output.stop, stop);
    if (!output.success) return fail(stop, output.cut || i > start);
    result.push(output.result);
    i = output.i;
  }
  return succeed(i, result, stop || undefined);
};

const any = <S, T>(...parsers: Parser<S, T>[]): Parser<S, T> => (x, i) => {
  let stop: Stop = {expected: [], i};
  for (const parser of parsers) {
    const output = parser(x, i);
    stop = update(output.stop, stop);
    if (output.success) return succeed(output.i, output.result, stop);
    if (output.cut) return fail(stop, true);
  }
  return fail(stop);
};

const attempt = <S, T>(parser: Parser<S, T>): Parser<S, T> => (x, i) => {
  const output = parser(x, i);
  return output.success || !output.cut ? output : fail(output.stop);
};

const label = <S, T>(parser: Parser<S, T>, expected: string[]): Parser<S, T> =>
  (x, i) => {
    const output = parser(x, i);
    if (output.success || output.cut || output.stop.i > i) return output;
    return fail({expected, i});
  };

const map = <S, T, U>(parser: Parser<S, T>, fn: (t: T) => U): Parser<S, U> =>
  (x, i) => {
    const output = parser(x, i);
    if (!output.success) return output;
    return succeed(output.i, fn(output.result), output.stop);
  };

const maybe = <S, T>(parser: Parser<S, T>): Parser<S, T | null> => (x, i) => {
  const output = parser(x, i);
  if (output.success || output.cut) return output;
  return succeed(i, null, output.stop);
};

const repeat = <S, T>(parser: Parser<S, T>, min = 0): Parser<S, T[]> =>
  (x, i) => {
    let stop: Stop | null = null;
    const start = i;
    const result: T[] = [];
    while (true) {
      const output = parser(x, i);
      stop = update(output.stop, stop);
      if (!output.success) {
        if (output.cut) return fail(stop, true);
        if (result.length < min) return fail(stop, i > start);
        return succeed(i, result, stop);
      }
      result.push(output.result);
      // An item that matched nothing would match nothing forever.
      if (output.i === i) return succeed(i, result, stop);
      i = output.i;
    }
  };

const sep = <S, T, U>(term: Parser<S, T>, sep: Parser<S, U>, min = 0):
    Parser<S, T[]> => {
  const base = two(term, repeat(two(sep, term), Math.max(min - 1, 0)));
  const list = map(base, x => [x[0]].concat(x[1].map(y => y[1])));
  const none: Parser<S, T[]> = (x, i) => succeed(i, []);
  return min > 0 ? list : any(list, none);
};

// Our public API. We create a Node class for ease of auto-completion.

class Node<S, T> {
  constructor(public _: Parser<S, T>) {}
  and<U>(next: Node<S, U>): Node<S, [T, U]> {
    return new Node(two(this._, next._));
  }
  attempt(): Node<S, T> {
    return new Node(attempt(this._));
  }
  label(...expected: string[]): Node<S, T> {
    return new Node(label(this._, expected));
  }
  map<U>(fn: (t: T) => U): Node<S, U> {
    return new Node(map(this._, fn));
  }
  maybe(): Node<S, T | null> {
    return new Node(maybe(this._));
  }
  or(alternate: Node<S, T>): Node<S, T> {
    return new Node(any(this._, alternate._));
  }
  parse(input: S[]): Outcome<T> {
    const output = this._(input, 0);
    if (output.success && output.i === input.length) {
      return {success: true, result: output.result};
    }
    const stop = output.success
      ? update({expected: ['end of input'], i: output.i}, output.stop)
      : output.stop;
    return {success: false, expected: stop.expected, i: stop.i};
  }
  repeat<U>(min = 0, separator?: Node<S, U>): Node<S, T[]> {
    if (separator) return new Node(sep(this._, separator._, min));
    return new Node(repeat(this._, min));
  }
  skip<U>(next: Node<S, U>): Node<S, T> {
    return new Node(map(two(this._, next._), x => x[0]));
  }
  then<U>(next: Node<S, U>): Node<S, U> {
    return new Node(map(two(this._, next._), x => x[1]));
  }
}

const Parser = {
  all: <S, T>(...parsers: Node<S, T>[]) =>
    new Node(all(...parsers.map(x => x._))),
  any: <S, T>(...parsers: Node<S, T>[]) =>
    new Node(any(...parsers.map(x => x._))),
  base: <S, T>(fn: Parser<S, T>) => new Node(fn),
  end: <S>() => new Node<S, null>(end),
  fail: <S, T>(expected: string[]) =>
    new Node<S, T>((x, i) => fail({expected, i})),
  lazy: <S, T>(fn: () => Node<S, T>) =>
    new Node<S, T>((x, i) => fn()._(x, i)),
  literal: <S>(value: S, expected: string) =>
    new Node(test<S>(x => x === value, expected)),
  succeed: <S, T>(result: T) => new Node<S, T>((x, i) => succeed(i, result)),
  test: <S>(fn: (s: S) => boolean, expected: string) =>
    new Node(test(fn, expected)),
};

export type {Outcome, Output};
export {Node, Parser, fail, succeed};
