import { err, ok, type Result } from 'neverthrow';
import { GrammarError, GrammarErrorKind } from '../errors.js';
import type { Span } from '../lexer-gen/LexToken.js';
import {
  DefinitionKind,
  Quantifier,
  type RuleDefinition,
  type SourceAlternative,
  type SourceSingular,
} from '../parser-gen/grammar-ast.js';
import { MetaParser } from '../parser-gen/meta-parser.js';
import {
  compileCharacter,
  compileCharacterSet,
  compileLiteral,
} from '../pattern-compiler/pattern-compiler.js';
import { OrderedMap } from '../utils/data-structures/OrderedMap.js';
import {
  type Alternative,
  isTokenLike,
  referencedSymbols,
  type Repetition,
  type Rule,
  RuleKind,
  RuleSet,
  type Singular,
} from './rule.js';
import { duplicateVariant, generatedVariantName } from './variants.js';

export const DEFAULT_WHITESPACE_RULE = '_';

export type RegistryOptions = {
  /** name of the token rule whose matches are skipped between tokens */
  whitespaceRule?: string;
};

type RuleBuilder = {
  name: string;
  kind: RuleKind;
  alternatives: Alternative[];
  firstDefinitionIndex: number;
  docs: string[];
  synthetic: boolean;
  span: Span;
  /** variant tags given out so far, for production rules */
  tags: Set<string>;
};

/**
 * Collects rule definitions and merges the ones sharing a name. The
 * registry owns every rule until {@link RuleRegistry.finalize} hands out an
 * immutable {@link RuleSet}.
 */
export class RuleRegistry {
  private builders: OrderedMap<string, RuleBuilder> = new OrderedMap();
  private nextDefinitionIndex = 0;
  private finalized = false;
  /** first failed definition; it may have left a rule half merged */
  private failure?: GrammarError;
  readonly whitespaceRule: string;

  constructor({ whitespaceRule = DEFAULT_WHITESPACE_RULE }: RegistryOptions = {}) {
    this.whitespaceRule = whitespaceRule;
  }

  /**
   * Parse `ruleText` (one or more rules) and add its definitions. Spans in
   * errors are relative to `ruleText`.
   */
  register(ruleText: string): Result<void, GrammarError> {
    this.assertOpen();
    const definitions = MetaParser.parse(ruleText);
    if (definitions.isErr()) {
      return err(definitions.error);
    }
    for (const definition of definitions.value) {
      const result = this.define(definition);
      if (result.isErr()) {
        return result;
      }
    }
    return ok(undefined);
  }

  /**
   * Add one parsed definition. After a failure the registry cannot be
   * finalized: {@link RuleRegistry.finalize} returns the first error.
   */
  define(definition: RuleDefinition): Result<void, GrammarError> {
    this.assertOpen();
    const result = this.merge(definition);
    if (result.isErr() && !this.failure) {
      this.failure = result.error;
    }
    return result;
  }

  private merge(definition: RuleDefinition): Result<void, GrammarError> {
    const { name, span } = definition;
    let kind: RuleKind;
    if (definition.kind === DefinitionKind.Production) {
      if (name === this.whitespaceRule) {
        return err(
          GrammarError.syntax(
            `the whitespace rule ${name} must be defined with ":=="`,
            { ruleName: name, span }
          )
        );
      }
      kind = RuleKind.Production;
    } else {
      kind = name === this.whitespaceRule ? RuleKind.Whitespace : RuleKind.Token;
    }

    let builder = this.builders.get(name);
    if (builder && builder.kind !== kind) {
      return err(
        new GrammarError(
          GrammarErrorKind.ConflictingKind,
          `${name} was defined as a ${builder.kind} rule and is redefined as a ${kind} rule`,
          { ruleName: name, span }
        )
      );
    }
    if (!builder) {
      builder = {
        name,
        kind,
        alternatives: [],
        firstDefinitionIndex: this.nextDefinitionIndex++,
        docs: [],
        synthetic: false,
        span,
        tags: new Set(),
      };
      this.builders.push(name, builder);
    } else {
      // later definitions still consume a definition index
      this.nextDefinitionIndex++;
    }
    if (definition.doc) {
      builder.docs.push(definition.doc);
    }

    for (const alternative of definition.alternatives) {
      const compiled = this.compileAlternative(alternative, builder);
      if (compiled.isErr()) {
        return err(compiled.error);
      }
      if (kind === RuleKind.Production) {
        const tag =
          compiled.value.name ??
          generatedVariantName(name, builder.alternatives.length);
        if (builder.tags.has(tag)) {
          return err(duplicateVariant(name, tag, compiled.value.span));
        }
        builder.tags.add(tag);
      }
      builder.alternatives.push(compiled.value);
    }
    return ok(undefined);
  }

  /**
   * Resolve every reference and freeze the rules.
   */
  finalize(): Result<RuleSet, GrammarError> {
    this.assertOpen();
    if (this.failure) {
      return err(this.failure);
    }
    this.finalized = true;
    const rules: Rule[] = this.builders
      .values()
      .map(
        (builder): Rule => ({
          name: builder.name,
          kind: builder.kind,
          definitions: builder.alternatives,
          firstDefinitionIndex: builder.firstDefinitionIndex,
          doc: builder.docs.length > 0 ? builder.docs.join('\n\n') : undefined,
          synthetic: builder.synthetic,
          span: builder.span,
        })
      )
      .toArray();

    for (const rule of rules) {
      for (const reference of referencedSymbols(rule.definitions)) {
        const target = this.builders.get(reference.name);
        if (!target) {
          return err(
            new GrammarError(
              GrammarErrorKind.UndefinedSymbol,
              `${reference.name} is not defined`,
              { ruleName: rule.name, span: reference.span }
            )
          );
        }
        if (isTokenLike(rule) && target.kind === RuleKind.Production) {
          return err(
            new GrammarError(
              GrammarErrorKind.InvalidReference,
              `${rule.kind} rule ${rule.name} cannot reference production rule ${target.name}`,
              { ruleName: rule.name, span: reference.span }
            )
          );
        }
      }
    }
    return ok(new RuleSet(rules, this.whitespaceRule));
  }

  private assertOpen() {
    if (this.finalized) {
      throw new Error('RuleRegistry has already been finalized');
    }
  }

  private compileAlternative(
    alternative: SourceAlternative,
    owner: RuleBuilder
  ): Result<Alternative, GrammarError> {
    const body: Repetition[] = [];
    for (const repetition of alternative.body) {
      const inner = this.compileSingular(repetition.inner, owner);
      if (inner.isErr()) {
        return err(inner.error);
      }
      body.push({ inner: inner.value, quantifier: repetition.quantifier });
    }
    return ok({
      doc: alternative.doc,
      name: alternative.name,
      body,
      span: alternative.span,
    });
  }

  private compileSingular(
    singular: SourceSingular,
    owner: RuleBuilder
  ): Result<Singular, GrammarError> {
    if (singular.kind === 'symbol') {
      return ok({ kind: 'symbol', name: singular.name, span: singular.span });
    }
    if (singular.kind === 'nested') {
      const alternation: Alternative[] = [];
      for (const alternative of singular.alternatives) {
        const compiled = this.compileAlternative(alternative, owner);
        if (compiled.isErr()) {
          return err(compiled.error);
        }
        alternation.push(compiled.value);
      }
      return ok({ kind: 'nested', alternation });
    }

    const pattern = this.compilePattern(singular, owner.name);
    if (pattern.isErr() || owner.kind !== RuleKind.Production) {
      return pattern;
    }
    return ok(this.liftPattern(pattern.value));
  }

  private compilePattern(
    singular: Extract<SourceSingular, { text: string }>,
    ruleName: string
  ): Result<Singular, GrammarError> {
    const source = { text: singular.text, span: singular.span, ruleName };
    switch (singular.kind) {
      case 'literal':
        return compileLiteral(source).map(
          (matchers): Singular => ({
            kind: 'literal',
            source: singular.text,
            matchers,
            span: singular.span,
          })
        );
      case 'char':
        return compileCharacter(source).map(
          (matcher): Singular => ({
            kind: 'literal',
            source: singular.text,
            matchers: [matcher],
            span: singular.span,
          })
        );
      case 'charset':
        return compileCharacterSet(source).map(
          (matcher): Singular => ({
            kind: 'charset',
            source: singular.text,
            matcher,
            span: singular.span,
          })
        );
    }
  }

  /**
   * Move a literal or character set found in a production rule into a
   * synthetic token rule named after its source text, and reference it.
   */
  private liftPattern(pattern: Singular): Singular {
    if (pattern.kind !== 'literal' && pattern.kind !== 'charset') {
      return pattern;
    }
    const name = pattern.source;
    if (!this.builders.has(name)) {
      this.builders.push(name, {
        name,
        kind: RuleKind.Token,
        alternatives: [
          {
            body: [{ inner: pattern, quantifier: Quantifier.One }],
            span: pattern.span,
          },
        ],
        firstDefinitionIndex: this.nextDefinitionIndex++,
        docs: [],
        synthetic: true,
        span: pattern.span,
        tags: new Set(),
      });
    }
    return { kind: 'symbol', name, span: pattern.span };
  }
}
