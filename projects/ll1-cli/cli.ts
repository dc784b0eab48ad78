import fs from 'fs';
import yargs from 'yargs/yargs';
import {
  AmbiguousGrammarError,
  analyze,
  buildGrammar,
  type Classifier,
  declaredHeads,
  formatConflicts,
  formatFirstSets,
  formatFollowSets,
  formatLeftRecursion,
  formatTable,
  formatTrace,
  LL1Parser,
  parseGrammarText,
  splitTokens,
  uppercaseNonTerminals,
  type Analysis,
} from '../grammar';
import * as debug from '../utils/debug';

const { colors } = debug;

export const classifiers: Record<'heads' | 'uppercase', Classifier> = {
  heads: declaredHeads,
  uppercase: uppercaseNonTerminals,
};

export enum ExitCode {
  OK = 0,
  REJECTED = 1,
  BAD_GRAMMAR = 2,
}

export function argsParser(argv: string[]) {
  return yargs(argv)
    .scriptName('ll1')
    .usage('$0 <grammar> [inputs..]')
    .parserConfiguration({
      'parse-numbers': false,
      'parse-positional-numbers': false,
    })
    .option('classify', {
      choices: ['heads', 'uppercase'] as const,
      default: 'heads' as const,
      description:
        'how to tell non-terminals apart: rule heads, or upper case names',
    })
    .option('epsilon', {
      type: 'string',
      default: 'ε',
      description: 'the symbol that stands for the empty string',
    })
    .option('details', {
      type: 'boolean',
      default: false,
      description: 'print FIRST and FOLLOW sets and the parse table',
    })
    .option('trace', {
      alias: 't',
      type: 'boolean',
      default: false,
      description: 'print every step the parser takes',
    })
    .option('colors', {
      type: 'boolean',
      default: false,
      description: 'color the output',
    })
    .demandCommand(1, 'a grammar file is required')
    .strictOptions();
}

export type CheckOptions = {
  classify: keyof typeof classifiers;
  epsilon: string;
  details: boolean;
  trace: boolean;
};

function printDetails(analysis: Analysis, print: (line: string) => void) {
  const { grammar, first, follow, table } = analysis;
  print(colors.bold('FIRST sets'));
  formatFirstSets(grammar, first).forEach(print);
  print(colors.bold('FOLLOW sets'));
  formatFollowSets(grammar, follow).forEach(print);
  print(colors.bold('Parse table'));
  formatTable(grammar, table).forEach(print);
}

/**
 * Checks that the grammar is LL(1) and runs each input through its parser.
 * Every input is one sentence of whitespace separated tokens.
 */
export function checkGrammar(
  grammarText: string,
  inputs: readonly string[],
  options: CheckOptions,
  print: (line: string) => void
): ExitCode {
  const grammar = parseGrammarText(grammarText).andThen((groups) =>
    buildGrammar(groups, {
      classify: classifiers[options.classify],
      epsilon: options.epsilon,
    })
  );
  if (grammar.isErr()) {
    print(colors.red(grammar.error.message));
    return ExitCode.BAD_GRAMMAR;
  }

  const analysis = analyze(grammar.value);
  if (analysis.isErr()) {
    print(colors.red(analysis.error.message));
    formatLeftRecursion(analysis.error).forEach((line) => print(`  ${line}`));
    return ExitCode.BAD_GRAMMAR;
  }
  if (options.details) {
    printDetails(analysis.value, print);
  }

  const parser = LL1Parser.fromGrammar(grammar.value);
  if (parser.isErr()) {
    print(colors.red(parser.error.message));
    if (parser.error instanceof AmbiguousGrammarError) {
      formatConflicts(parser.error.analysis.conflicts).forEach((line) =>
        print(`  ${line}`)
      );
    }
    return ExitCode.BAD_GRAMMAR;
  }

  let code = ExitCode.OK;
  for (const input of inputs) {
    const { result, trace } = parser.value.parseTraced(splitTokens(input));
    if (options.trace) {
      formatTrace(trace).forEach(print);
    }
    if (result.isOk()) {
      print(`${input}: ${colors.green('Valid')}`);
    } else {
      print(`${input}: ${colors.red('Invalid')}`);
      print(`  ${result.error.message}`);
      code = ExitCode.REJECTED;
    }
  }
  return code;
}

export function runCli(
  argv: string[],
  print: (line: string) => void = console.log
): ExitCode {
  const args = argsParser(argv).parseSync();
  debug.useColors(args.colors);
  const [grammarPath, ...inputs] = args._.map(String);
  if (grammarPath === undefined) {
    throw new Error('a grammar file is required');
  }
  debug.log('reading grammar from', grammarPath);
  const grammarText = fs.readFileSync(grammarPath, { encoding: 'utf-8' });
  return checkGrammar(grammarText, inputs, args, print);
}
