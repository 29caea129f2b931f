import fs from 'fs';
import path from 'path';
import { err, type Result } from 'neverthrow';
import type { GrammarError, LexError, ParseError } from '../errors.js';
import type { AstNode } from '../grammar/AstNode.js';
import * as debug from '../utils/debug.js';
import { type CompiledGrammar, compileGrammar, type CompileOptions } from './compile-grammar.js';

const { colors } = debug;

export type RunOptions = CompileOptions & {
  /** production rule to start parsing from; the first production if unset */
  start?: string;
  /** tokenize the input first instead of parsing the characters directly */
  tokenize?: boolean;
  allowTrailingInput?: boolean;
};

export function compileFile(
  grammarFilePath: string,
  options: CompileOptions = {}
): Result<CompiledGrammar, GrammarError> {
  const source = fs.readFileSync(grammarFilePath, { encoding: 'utf-8' });
  debug.log('Compiling', path.basename(grammarFilePath));
  return compileGrammar(source, options);
}

/**
 * One line per rule: its kind, name and, for productions, its variants.
 */
export function describeGrammar(grammar: CompiledGrammar): string {
  return [...grammar.rules]
    .map((rule) => {
      const kind = grammar.tokens.fragments.includes(rule) ? 'Fragment' : rule.kind;
      const variants = grammar.nodeTypes.get(rule.name)?.variants;
      const suffix = variants ? ` -> ${variants.map((v) => v.tag).join(' | ')}` : '';
      return `${kind.padEnd(10)} ${rule.name}${suffix}`;
    })
    .join('\n');
}

export function runGrammar(
  grammar: CompiledGrammar,
  input: string,
  { start, tokenize = false, allowTrailingInput }: RunOptions = {}
): Result<AstNode, LexError | ParseError | Error> {
  const startRule = start ?? grammar.rules.productions().first()?.name;
  if (startRule === undefined) {
    return err(new Error('The grammar has no production rules to start from'));
  }
  if (tokenize) {
    return grammar.parseText(startRule, input, { allowTrailingInput });
  }
  return grammar.parser.parse(startRule, input, { allowTrailingInput });
}

export function runFile(
  grammarFilePath: string,
  input: string,
  options: RunOptions = {}
): Result<string, GrammarError | LexError | ParseError | Error> {
  const grammar = compileFile(grammarFilePath, options);
  if (grammar.isErr()) {
    return err(grammar.error);
  }
  return runGrammar(grammar.value, input, options).map((root) => {
    debug.log(colors.bold(colors.green('✓')), 'Parsed', root.ruleName);
    return root.pretty();
  });
}
