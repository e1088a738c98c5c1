import {inspect} from 'util';

const assert = (condition: boolean, message?: () => string): void => {
  if (!condition) throw Error(message ? message() : undefined);
};

const clone = <T>(value: T): T => JSON.parse(JSON.stringify(value));

const debug = <T>(value: T): string =>
  inspect(value, {breakLength: Infinity, colors: true, depth: null});

const flatten = <T>(xss: T[][]): T[] => {
  const result: T[] = [];
  xss.forEach(xs => xs.forEach(x => result.push(x)));
  return result;
};

const quote = (x: string): string =>
  x.replace(/[\'\"]/g, y => (y === '"' ? "'" : '"'));

export {assert, clone, debug, flatten, quote};
