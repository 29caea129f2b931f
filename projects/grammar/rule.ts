import type { Span } from '../lexer-gen/LexToken.js';
import type { CodepointMatcher } from '../pattern-compiler/codepoint-matcher.js';
import type { Quantifier } from '../parser-gen/grammar-ast.js';
import { OrderedMap } from '../utils/data-structures/OrderedMap.js';
import { iter, type Iter } from '../utils/iter.js';

export enum RuleKind {
  Token = 'Token',
  Whitespace = 'Whitespace',
  Production = 'Production',
}

export type Singular =
  | { kind: 'nested'; alternation: Alternation }
  | { kind: 'symbol'; name: string; span: Span }
  | { kind: 'literal'; source: string; matchers: CodepointMatcher[]; span: Span }
  | { kind: 'charset'; source: string; matcher: CodepointMatcher; span: Span };

export type Repetition = { inner: Singular; quantifier: Quantifier };

export type Concatenation = readonly Repetition[];

export type Alternative = {
  doc?: string;
  name?: string;
  body: Concatenation;
  span: Span;
};

export type Alternation = readonly Alternative[];

export interface Rule {
  readonly name: string;
  readonly kind: RuleKind;
  /** alternatives of every definition of this rule, in source order */
  readonly definitions: Alternation;
  /** definition order of the earliest definition; breaks longest-match ties */
  readonly firstDefinitionIndex: number;
  readonly doc?: string;
  /** true for token rules lifted out of literals in production rules */
  readonly synthetic: boolean;
  readonly span: Span;
}

export function isTokenLike(rule: Rule) {
  return rule.kind === RuleKind.Token || rule.kind === RuleKind.Whitespace;
}

/**
 * Every symbol referenced from an alternation, including those inside
 * nested groups, in source order.
 */
export function* referencedSymbols(
  alternation: Alternation
): Generator<{ name: string; span: Span }> {
  for (const alternative of alternation) {
    for (const { inner } of alternative.body) {
      if (inner.kind === 'symbol') {
        yield { name: inner.name, span: inner.span };
      } else if (inner.kind === 'nested') {
        yield* referencedSymbols(inner.alternation);
      }
    }
  }
}

/**
 * The finalized, read-only set of rules of one grammar.
 */
export class RuleSet implements Iterable<Rule> {
  private rules: OrderedMap<string, Rule>;
  readonly whitespaceRuleName: string;

  constructor(rules: Iterable<Rule>, whitespaceRuleName: string) {
    this.rules = new OrderedMap();
    for (const rule of [...rules].sort(
      (a, b) => a.firstDefinitionIndex - b.firstDefinitionIndex
    )) {
      this.rules.push(rule.name, rule);
    }
    this.whitespaceRuleName = whitespaceRuleName;
  }

  get size() {
    return this.rules.length;
  }

  get(name: string): Rule | undefined {
    return this.rules.get(name);
  }

  has(name: string) {
    return this.rules.has(name);
  }

  /** The whitespace rule, if the grammar defines one. */
  get whitespace(): Rule | undefined {
    const rule = this.rules.get(this.whitespaceRuleName);
    return rule?.kind === RuleKind.Whitespace ? rule : undefined;
  }

  /** All rules ordered by their first definition. */
  [Symbol.iterator](): Iter<Rule> {
    return this.rules.values();
  }

  ofKind(kind: RuleKind): Iter<Rule> {
    return iter(this).filter((rule) => rule.kind === kind);
  }

  productions(): Iter<Rule> {
    return this.ofKind(RuleKind.Production);
  }
}
