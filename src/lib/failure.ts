// Every public operation returns a Result. Failures are plain tagged values,
// so callers decide how to report them.

type Failure =
  | {type: 'invariant'; message: string}
  | {type: 'lexical'; offset: number; text: string}
  | {type: 'resource'; mode: 'read' | 'write'; name: string; message: string}
  | {type: 'syntax'; expected: string[]; offset: number};

type Result<T> =
  | {success: true; result: T}
  | {success: false; failure: Failure};

// Deep recursions (normalizing, inlining) abort with an exception that is
// turned back into a Result by `attempt` before leaving the module.

class Abort extends Error {
  constructor(public failure: Failure) {
    super(`Aborted: ${failure.type}`);
  }
}

const abort = (failure: Failure): never => {
  throw new Abort(failure);
};

const attempt = <T>(fn: () => T): Result<T> => {
  try {
    return {success: true, result: fn()};
  } catch (error) {
    if (error instanceof Abort) return {success: false, failure: error.failure};
    throw error;
  }
};

const invariant = (message: string): Failure => ({type: 'invariant', message});

const ok = <T>(result: T): Result<T> => ({success: true, result});

const reject = <T>(failure: Failure): Result<T> => ({success: false, failure});

const unwrap = <T>(result: Result<T>): T =>
  result.success ? result.result : abort(result.failure);

// Formatting. Positional failures point at the offending line of the input.

const highlight = (input: string, offset: number, message: string): string => {
  offset = Math.max(Math.min(offset, input.length), 0);
  const start = input.lastIndexOf('\n', offset - 1) + 1;
  const maybe_end = input.indexOf('\n', start);
  const end = maybe_end < 0 ? input.length : maybe_end;
  const line = input.slice(0, offset).split('\n').length;
  const column = offset - start + 1;
  const text = input.substring(start, end);
  return `
At line ${line}, column ${column}: ${message}

  ${text}
  ${Array(column).join(' ')}^
  `.trim();
};

const lexical_message = (text: string): string => {
  const head = text.split('\n')[0];
  if (head.startsWith('/*')) return 'Unterminated comment';
  if (/^['"]/.test(head)) return `Invalid string literal: ${head}`;
  return `Unexpected character: ${head.slice(0, 1)}`;
};

const describe = (failure: Failure, input?: string): string => {
  switch (failure.type) {
    case 'invariant':
      return failure.message;
    case 'lexical': {
      const message = lexical_message(failure.text);
      if (input === undefined) return `${message} at offset ${failure.offset}`;
      return highlight(input, failure.offset, message);
    }
    case 'resource':
      return `Unable to ${failure.mode} ${failure.name}: ${failure.message}`;
    case 'syntax': {
      const terms = Array.from(new Set(failure.expected)).sort();
      const message = `Expected: ${terms.join(' | ')}`;
      if (input === undefined) return `${message} at offset ${failure.offset}`;
      return highlight(input, failure.offset, message);
    }
  }
};

const Failure = {abort, attempt, describe, invariant, ok, reject, unwrap};

export type {Result};
export {Abort, Failure};
