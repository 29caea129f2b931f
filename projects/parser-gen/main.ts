#!/usr/bin/env node
import fs from 'fs';
import yargs from 'yargs/yargs';
import { hideBin } from 'yargs/helpers';
import { useColors } from '../utils/debug.js';
import { compileFile, describeGrammar, runFile } from './cli.js';

const args = yargs(hideBin(process.argv))
  .option('grammar', {
    type: 'string',
    description: 'path to the grammar file that should be compiled',
    demandOption: true,
  })
  .option('start', {
    type: 'string',
    description: 'production rule to start parsing from',
  })
  .option('input', {
    type: 'string',
    description: 'text to parse',
  })
  .option('input-file', {
    type: 'string',
    description: 'path to a file with the text to parse',
  })
  .option('tokenize', {
    type: 'boolean',
    default: false,
    description: 'run the tokenizer first and parse the tokens',
  })
  .option('whitespace-rule', {
    type: 'string',
    description: 'name of the whitespace rule',
  })
  .option('colors', {
    type: 'boolean',
    default: process.stdout.isTTY,
  })
  .parseSync();

useColors(args.colors);

const input =
  args.inputFile !== undefined
    ? fs.readFileSync(args.inputFile, { encoding: 'utf-8' })
    : args.input;

const options = { whitespaceRule: args.whitespaceRule };

if (input === undefined) {
  const grammar = compileFile(args.grammar, options);
  if (grammar.isErr()) {
    console.error(grammar.error.message);
    process.exitCode = 1;
  } else {
    console.log(describeGrammar(grammar.value));
  }
} else {
  const result = runFile(args.grammar, input, {
    ...options,
    start: args.start,
    tokenize: args.tokenize,
  });
  if (result.isErr()) {
    console.error(result.error.message);
    process.exitCode = 1;
  } else {
    console.log(result.value);
  }
}
