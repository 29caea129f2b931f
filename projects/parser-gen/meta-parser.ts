import { err, ok, type Result } from 'neverthrow';
import { GrammarError } from '../errors.js';
import type { Span } from '../lexer-gen/LexToken.js';
import {
  DefinitionKind,
  Quantifier,
  type RuleDefinition,
  type SourceAlternative,
  type SourceRepetition,
  type SourceSingular,
} from './grammar-ast.js';
import { lexGrammar, type MetaLexeme, MetaToken } from './meta-lexer.js';

const QUANTIFIERS: { [token: string]: Quantifier } = {
  [MetaToken.MAYBE]: Quantifier.Maybe,
  [MetaToken.ANY]: Quantifier.Any,
  [MetaToken.MANY]: Quantifier.Many,
};

const SINGULAR_START = new Set([
  MetaToken.OPEN_PAREN,
  MetaToken.SYMBOL,
  MetaToken.STRING,
  MetaToken.CHARSET,
  MetaToken.CHAR,
]);

/**
 * Bootstrap parser for the meta-grammar:
 *
 *   grammar      ::= rule* DOC? ;
 *   rule         ::= DOC? SYMBOL ('::=' | ':==') alternation ';' ;
 *   alternation  ::= alternative ('|' alternative)* ;
 *   alternative  ::= DOC? repetition+ ('->' SYMBOL)? ;
 *   repetition   ::= singular ('?' | '*' | '+')? ;
 *   singular     ::= '(' alternation ')' | SYMBOL | STRING | CHARSET | CHAR ;
 *
 * Hand written so that compiling a grammar never depends on the engine it
 * is compiling.
 */
export class MetaParser {
  private tokens: MetaLexeme[];
  private index = 0;
  private sourceLength: number;
  private ruleName?: string;

  private constructor(tokens: MetaLexeme[], sourceLength: number) {
    this.tokens = tokens;
    this.sourceLength = sourceLength;
  }

  static parse(source: string): Result<RuleDefinition[], GrammarError> {
    return lexGrammar(source).andThen((tokens) =>
      new MetaParser(tokens, source.length).parseGrammar()
    );
  }

  private peek(offset = 0): MetaLexeme | undefined {
    return this.tokens[this.index + offset];
  }

  private accept(token: MetaToken): MetaLexeme | undefined {
    const next = this.peek();
    if (next?.token === token) {
      this.index++;
      return next;
    }
    return undefined;
  }

  private expected(what: string) {
    const next = this.peek();
    const span: Span = next
      ? next.span
      : { from: this.sourceLength, to: this.sourceLength };
    const found = next ? JSON.stringify(next.substr) : 'end of input';
    return err(
      GrammarError.syntax(`expected ${what} but found ${found}`, {
        ruleName: this.ruleName,
        span,
      })
    );
  }

  private parseGrammar(): Result<RuleDefinition[], GrammarError> {
    const rules: RuleDefinition[] = [];
    while (this.peek()) {
      // a docstring that documents no rule
      if (this.peek()?.token === MetaToken.DOC && !this.peek(1)) {
        break;
      }
      const rule = this.parseRule();
      if (rule.isErr()) {
        return err(rule.error);
      }
      rules.push(rule.value);
    }
    return ok(rules);
  }

  private parseRule(): Result<RuleDefinition, GrammarError> {
    this.ruleName = undefined;
    const doc = this.accept(MetaToken.DOC);
    const name = this.accept(MetaToken.SYMBOL);
    if (!name) {
      return this.expected('a rule name');
    }
    this.ruleName = name.substr;

    let kind: DefinitionKind;
    if (this.accept(MetaToken.PRODUCTION)) {
      kind = DefinitionKind.Production;
    } else if (this.accept(MetaToken.TOKEN_RULE)) {
      kind = DefinitionKind.Token;
    } else {
      return this.expected('"::=" or ":=="');
    }

    const alternatives = this.parseAlternation(kind === DefinitionKind.Production);
    if (alternatives.isErr()) {
      return err(alternatives.error);
    }
    const semi = this.accept(MetaToken.SEMI);
    if (!semi) {
      return this.expected('";" to end the rule');
    }
    return ok({
      doc: doc?.substr,
      name: name.substr,
      kind,
      alternatives: alternatives.value,
      span: { from: (doc ?? name).span.from, to: semi.span.to },
    });
  }

  private parseAlternation(
    allowNames: boolean
  ): Result<SourceAlternative[], GrammarError> {
    const alternatives: SourceAlternative[] = [];
    do {
      const alternative = this.parseAlternative(allowNames);
      if (alternative.isErr()) {
        return err(alternative.error);
      }
      alternatives.push(alternative.value);
    } while (this.accept(MetaToken.OR));
    return ok(alternatives);
  }

  private parseAlternative(
    allowNames: boolean
  ): Result<SourceAlternative, GrammarError> {
    const doc = this.accept(MetaToken.DOC);
    const body: SourceRepetition[] = [];
    let next = this.peek();
    while (next && SINGULAR_START.has(next.token)) {
      const repetition = this.parseRepetition();
      if (repetition.isErr()) {
        return err(repetition.error);
      }
      body.push(repetition.value);
      next = this.peek();
    }
    if (body.length === 0) {
      return this.expected('a pattern');
    }

    let name: string | undefined;
    const arrow = this.accept(MetaToken.ARROW);
    if (arrow) {
      if (!allowNames) {
        return err(
          GrammarError.syntax(
            'alternative names are only allowed on top-level alternatives of production rules',
            { ruleName: this.ruleName, span: arrow.span }
          )
        );
      }
      const symbol = this.accept(MetaToken.SYMBOL);
      if (!symbol) {
        return this.expected('an alternative name after "->"');
      }
      name = symbol.substr;
    }

    const last = this.tokens[this.index - 1];
    return ok({
      doc: doc?.substr,
      name,
      body,
      span: { from: (doc ?? body[0]).span.from, to: last.span.to },
    });
  }

  private parseRepetition(): Result<SourceRepetition, GrammarError> {
    return this.parseSingular().map((inner) => {
      const next = this.peek();
      const quantifier = next ? QUANTIFIERS[next.token] : undefined;
      if (next && quantifier !== undefined) {
        this.index++;
        return {
          inner,
          quantifier,
          span: { from: inner.span.from, to: next.span.to },
        };
      }
      return { inner, quantifier: Quantifier.One, span: inner.span };
    });
  }

  private parseSingular(): Result<SourceSingular, GrammarError> {
    const open = this.accept(MetaToken.OPEN_PAREN);
    if (open) {
      const alternatives = this.parseAlternation(false);
      if (alternatives.isErr()) {
        return err(alternatives.error);
      }
      const close = this.accept(MetaToken.CLOSE_PAREN);
      if (!close) {
        return this.expected('")" to close the group');
      }
      return ok({
        kind: 'nested',
        alternatives: alternatives.value,
        span: { from: open.span.from, to: close.span.to },
      });
    }

    const next = this.peek();
    if (!next) {
      return this.expected('a pattern');
    }
    this.index++;
    const { substr: text, span } = next;
    switch (next.token) {
      case MetaToken.SYMBOL:
        return ok({ kind: 'symbol', name: text, span });
      case MetaToken.STRING:
        return ok({ kind: 'literal', text, span });
      case MetaToken.CHARSET:
        return ok({ kind: 'charset', text, span });
      case MetaToken.CHAR:
        return ok({ kind: 'char', text, span });
      default:
        this.index--;
        return this.expected('a pattern');
    }
  }
}
