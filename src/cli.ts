/* tslint:disable:no-console */
import * as fs from 'fs';
import {Command, CommanderError, InvalidArgumentError} from 'commander';

import {debug} from './lib/base';
import {Failure} from './lib/failure';
import type {Result} from './lib/failure';
import {Converter} from './grammar/converter';
import {Pipeline} from './pipeline';
import type {Source} from './pipeline';

type Log = (message: string) => void;

interface Flags {
  inline: boolean;
  maxAlternatives: number;
  maxSequence: number;
  output?: string;
  verbose?: boolean;
}

const integer = (value: string): number => {
  const result = parseInt(value, 10);
  if (!/^[0-9]+$/.test(value) || isNaN(result)) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return result;
};

const message_of = (error: unknown): string =>
  error instanceof Error ? error.message : `${error}`;

const readEntireStream = (stream: fs.ReadStream): Promise<string> => {
  const data: string[] = [];
  stream.on('data', x => data.push(x.toString()));
  return new Promise((resolve, reject) => {
    stream.on('end', () => resolve(data.join('')));
    stream.on('error', reject);
  });
};

const read = async (name: string): Promise<Result<Source>> => {
  try {
    const stream = fs.createReadStream(name, {encoding: 'utf8'});
    return Failure.ok({name, text: await readEntireStream(stream)});
  } catch (error) {
    const message = message_of(error);
    return Failure.reject({type: 'resource', mode: 'read', name, message});
  }
};

// A failed open reaches the end callback before any 'error' listener.
const writeEntireStream = (stream: NodeJS.WritableStream, data: string): Promise<void> =>
  new Promise((resolve, reject) => {
    stream.on('error', reject);
    stream.end(data, (error?: Error | null) => (error ? reject(error) : resolve()));
  });

// The output is opened once per run and closed before we return.
const write = async (lines: string[], filename?: string): Promise<Result<null>> => {
  const data = lines.map(x => `${x}\n`).join('');
  try {
    if (filename) {
      await writeEntireStream(fs.createWriteStream(filename, {encoding: 'utf8'}), data);
    } else {
      await new Promise<void>((resolve, reject) => process.stdout.write(
          data, (error?: Error | null) => (error ? reject(error) : resolve())));
    }
    return Failure.ok(null);
  } catch (error) {
    const [name, message] = [filename || 'stdout', message_of(error)];
    return Failure.reject({type: 'resource', mode: 'write', name, message});
  }
};

const main = async (names: string[], flags: Flags, log: Log): Promise<number> => {
  const verbose = (message: string) => flags.verbose && log(message);
  const sources: Source[] = [];
  for (const name of names) {
    const source = await read(name);
    if (!source.success) {
      log(Failure.describe(source.failure));
      return 1;
    }
    verbose(`Read ${name}: ${source.result.text.length} characters`);
    sources.push(source.result);
  }

  const [grammar, supplementary] = sources;
  const report = Pipeline.run(grammar, supplementary, {
    inline: flags.inline,
    max_alternatives: flags.maxAlternatives,
    max_sequence: flags.maxSequence,
  });
  if (!report.success) {
    log(`${report.name}: ${report.message}`);
    return 1;
  }
  const {components, inlined} = report.conversion;
  verbose(`Ordered ${components.length} components; inlined: ${debug(inlined)}`);
  const written = await write(report.lines, flags.output);
  if (!written.success) {
    log(Failure.describe(written.failure));
    return 1;
  }
  return 0;
};

// Runs the command over its arguments (without the node and script paths)
// and returns the exit status. Usage errors go to `log` like any other.
const run = async (args: string[], log: Log = x => console.error(x)): Promise<number> => {
  const defaults = Converter.kDefaultOptions;
  let status = 0;
  const program = new Command()
    .name('grammar-ebnf')
    .description('Derive simplified EBNF from the rules section of a YACC grammar')
    .version('0.1.0')
    .argument('<grammar>', 'YACC grammar file')
    .argument('<supplementary>', 'file of supplementary EBNF definitions')
    .option('-o, --output <filename>', 'write EBNF to <filename> instead of stdout')
    .option('--no-inline', 'keep references to trivial productions')
    .option('--max-alternatives <n>', 'largest inlined alternation', integer,
            defaults.max_alternatives)
    .option('--max-sequence <n>', 'largest inlined sequence', integer,
            defaults.max_sequence)
    .option('-v, --verbose', 'log progress to stderr')
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput({writeErr: x => log(x.trimEnd())})
    .action(async (grammar: string, supplementary: string, flags: Flags) => {
      status = await main([grammar, supplementary], flags, log);
    });

  try {
    await program.parseAsync(args, {from: 'user'});
  } catch (error) {
    if (error instanceof CommanderError) return error.exitCode;
    throw error;
  }
  return status;
};

const Cli = {run};

export {Cli};
