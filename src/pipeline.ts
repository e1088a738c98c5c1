import {Failure} from './lib/failure';
import {Converter} from './grammar/converter';
import type {Conversion, Options} from './grammar/converter';
import {Ebnf} from './grammar/ebnf';
import type {Definition} from './grammar/ebnf';
import {Supplementary} from './parsing/ebnf';
import {Yacc} from './parsing/yacc';

// A run reads the supplementary definitions, then the grammar, and renders
// one line per definition followed by a blank line. The first failure stops
// the run and is reported with the name of the resource it came from.

interface Source {
  name: string;
  text: string;
}

type Report =
  | {success: true; conversion: Conversion; lines: string[]}
  | {success: false; name: string; failure: Failure; message: string};

const failed = (source: Source, failure: Failure): Report => {
  const message = Failure.describe(failure, source.text);
  return {success: false, name: source.name, failure, message};
};

const render = (definitions: Definition[]): string[] =>
  definitions.map(Ebnf.show_definition).concat(['']);

const run = (
  grammar: Source,
  supplementary: Source | null,
  options: Partial<Options> = {},
): Report => {
  let definitions: Definition[] = [];
  if (supplementary) {
    const parsed = Supplementary.parse(supplementary.text);
    if (!parsed.success) return failed(supplementary, parsed.failure);
    definitions = parsed.result;
  }

  const parsed = Yacc.parse(grammar.text);
  if (!parsed.success) return failed(grammar, parsed.failure);
  const converted = Converter.convert(parsed.result, definitions, options);
  if (!converted.success) return failed(grammar, converted.failure);

  const conversion = converted.result;
  return {success: true, conversion, lines: render(conversion.definitions)};
};

const Pipeline = {render, run};

export type {Report, Source};
export {Pipeline};
