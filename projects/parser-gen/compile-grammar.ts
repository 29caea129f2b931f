import { err, ok, type Result } from 'neverthrow';
import type { GrammarError, LexError, ParseError } from '../errors.js';
import type { AstNode } from '../grammar/AstNode.js';
import { resolveFragments, type TokenTable } from '../grammar/fragments.js';
import { Parser, type ParseOptions } from '../grammar/ordered-choice-parser.js';
import { DEFAULT_WHITESPACE_RULE, RuleRegistry } from '../grammar/registry.js';
import type { RuleSet } from '../grammar/rule.js';
import { tagVariants, type VariantTable } from '../grammar/variants.js';
import { compileTokenizer, PatternCache, type Tokenizer } from '../lexer-gen/tokenizer.js';
import * as debug from '../utils/debug.js';

export type CompileOptions = {
  /** name of the whitespace rule, `_` by default */
  whitespaceRule?: string;
};

export class CompiledGrammar {
  readonly tokenizer: Tokenizer;
  readonly parser: Parser;
  readonly rules: RuleSet;
  readonly tokens: TokenTable;
  readonly nodeTypes: VariantTable;

  constructor(
    tokenizer: Tokenizer,
    parser: Parser,
    rules: RuleSet,
    tokens: TokenTable,
    nodeTypes: VariantTable
  ) {
    this.tokenizer = tokenizer;
    this.parser = parser;
    this.rules = rules;
    this.tokens = tokens;
    this.nodeTypes = nodeTypes;
  }

  /**
   * Tokenize `text` and parse the tokens starting from `start`.
   */
  parseText(
    start: string,
    text: string,
    options?: ParseOptions
  ): Result<AstNode, LexError | ParseError> {
    return this.tokenizer
      .tokenizeAll(text)
      .andThen((tokens): Result<AstNode, LexError | ParseError> =>
        this.parser.parse(start, tokens, options)
      );
  }
}

export function compileGrammar(
  source: string,
  { whitespaceRule = DEFAULT_WHITESPACE_RULE }: CompileOptions = {}
): Result<CompiledGrammar, GrammarError> {
  const registry = new RuleRegistry({ whitespaceRule });
  const compiled = registry
    .register(source)
    .andThen(() => registry.finalize())
    .andThen((rules) =>
      resolveFragments(rules).andThen((tokens) =>
        tagVariants(rules).map((variants) => {
          const patterns = new PatternCache(rules);
          return new CompiledGrammar(
            compileTokenizer(rules, tokens, patterns),
            new Parser(rules, patterns, variants),
            rules,
            tokens,
            variants
          );
        })
      )
    );
  if (compiled.isErr()) {
    return err(compiled.error.attachSource(source));
  }
  const grammar = compiled.value;
  debug.log(
    `compiled ${grammar.rules.size} rules:`,
    `${grammar.tokens.realTokens.length} tokens,`,
    `${grammar.tokens.fragments.length} fragments,`,
    `${grammar.rules.productions().toArray().length} productions`
  );
  return ok(grammar);
}
