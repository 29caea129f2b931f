export {
  GrammarError,
  GrammarErrorKind,
  LexError,
  LexErrorKind,
  ParseError,
  ParseErrorKind,
  locate,
} from './errors.js';
export { AstNode, type AstChild, type AstJSON } from './grammar/AstNode.js';
export { resolveFragments, TokenTable } from './grammar/fragments.js';
export {
  Parser,
  type ParseInput,
  type ParseOptions,
} from './grammar/ordered-choice-parser.js';
export { DEFAULT_WHITESPACE_RULE, RuleRegistry } from './grammar/registry.js';
export { type Rule, RuleKind, RuleSet } from './grammar/rule.js';
export {
  generatedVariantName,
  type NodeType,
  tagVariants,
  type Variant,
  VariantTable,
} from './grammar/variants.js';
export { LexToken, type Span } from './lexer-gen/LexToken.js';
export { compileTokenizer, Tokenizer, type Step } from './lexer-gen/tokenizer.js';
export {
  CompiledGrammar,
  compileGrammar,
  type CompileOptions,
} from './parser-gen/compile-grammar.js';
export { logger, useColors } from './utils/debug.js';
