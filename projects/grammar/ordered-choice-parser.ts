import { err, ok, type Result } from 'neverthrow';
import { ParseError, ParseErrorKind } from '../errors.js';
import { LexToken, type Span } from '../lexer-gen/LexToken.js';
import type { PatternCache } from '../lexer-gen/tokenizer.js';
import { Quantifier } from '../parser-gen/grammar-ast.js';
import * as debug from '../utils/debug.js';
import { type AstChild, AstNode } from './AstNode.js';
import {
  type Alternation,
  type Concatenation,
  type Repetition,
  RuleKind,
  type RuleSet,
  type Singular,
} from './rule.js';
import type { VariantTable } from './variants.js';

export type ParseInput = string | Iterable<LexToken<string>>;

export type ParseOptions = {
  /** succeed even if the start rule stops before the end of the input */
  allowTrailingInput?: boolean;
};

type Match = { end: number; children: AstChild[] };

/**
 * ok(null) is an ordinary failure that the enclosing choice may recover
 * from; err(...) ends the whole parse.
 */
type Attempt = Result<Match | null, ParseError>;

const spanOf = (children: readonly AstChild[], at: number): Span =>
  children.length === 0
    ? { from: at, to: at }
    : { from: children[0].span.from, to: children[children.length - 1].span.to };

/**
 * Ordered-choice recursive descent evaluator over the production rules of a
 * grammar.
 *
 * Given a string, it runs scannerless: token rules are matched against the
 * characters directly and the whitespace rule is skipped before the input
 * and after every singular. Given tokens, whitespace is assumed to be gone
 * already and token references match one token by rule name.
 */
export class Parser {
  readonly rules: RuleSet;
  readonly variants: VariantTable;
  private patterns: PatternCache;

  constructor(
    rules: RuleSet,
    patterns: PatternCache,
    variants: VariantTable
  ) {
    this.rules = rules;
    this.patterns = patterns;
    this.variants = variants;
  }

  parse(
    startSymbol: string,
    input: ParseInput,
    options: ParseOptions = {}
  ): Result<AstNode, ParseError> {
    const start = this.rules.get(startSymbol);
    if (start?.kind !== RuleKind.Production) {
      return err(
        new ParseError(ParseErrorKind.UnknownRule, {
          position: 0,
          ruleName: startSymbol,
        })
      );
    }
    const run = new ParseRun(this, this.patterns, input);
    try {
      return run.run(startSymbol, options);
    } catch (e) {
      // the evaluator recurses once per nested rule, so deep input can
      // exhaust the stack
      if (e instanceof RangeError) {
        return err(run.tooDeep());
      }
      throw e;
    }
  }

  parseOrThrow(startSymbol: string, input: ParseInput, options?: ParseOptions) {
    const result = this.parse(startSymbol, input, options);
    if (result.isErr()) {
      throw result.error;
    }
    return result.value;
  }
}

class ParseRun {
  private parser: Parser;
  private patterns: PatternCache;
  private text: string | null;
  private tokens: LexToken<string>[];
  private length: number;
  private active: Set<string> = new Set();
  private farthest = { cursor: -1, expected: new Set<string>() };
  private depth = 0;
  private current = { name: '', cursor: 0 };

  constructor(parser: Parser, patterns: PatternCache, input: ParseInput) {
    this.parser = parser;
    this.patterns = patterns;
    if (typeof input === 'string') {
      this.text = input;
      this.tokens = [];
      this.length = input.length;
    } else {
      this.text = null;
      this.tokens = [...input];
      this.length = this.tokens.length;
    }
  }

  run(start: string, options: ParseOptions): Result<AstNode, ParseError> {
    const attempt = this.rule(start, this.skipWhitespace(0));
    if (attempt.isErr()) {
      return err(attempt.error);
    }
    const match = attempt.value;
    if (!match) {
      return err(this.noAlternativeMatched());
    }
    if (match.end < this.length && !options.allowTrailingInput) {
      if (this.farthest.cursor >= match.end) {
        return err(this.noAlternativeMatched());
      }
      return err(
        new ParseError(ParseErrorKind.TrailingInput, {
          position: this.position(match.end),
          ruleName: start,
        })
      );
    }
    const [root] = match.children;
    if (!(root instanceof AstNode)) {
      throw new Error(`rule ${start} did not produce a node`);
    }
    return ok(root);
  }

  tooDeep() {
    return new ParseError(ParseErrorKind.TooDeep, {
      position: this.position(this.current.cursor),
      ruleName: this.current.name,
    });
  }

  /** Input offset of a cursor, for error reporting and empty spans. */
  private position(cursor: number): number {
    if (this.text !== null) {
      return cursor;
    }
    const token = this.tokens[cursor];
    if (token) {
      return token.span.from;
    }
    return this.tokens[this.tokens.length - 1]?.span.to ?? 0;
  }

  private log(...args: unknown[]) {
    debug.log('  |'.repeat(this.depth + 1), ...args);
  }

  private noAlternativeMatched() {
    return new ParseError(ParseErrorKind.NoAlternativeMatched, {
      position: this.position(Math.max(this.farthest.cursor, 0)),
      triedRules: [...this.farthest.expected],
    });
  }

  private fail(cursor: number, ruleName: string): Attempt {
    if (cursor > this.farthest.cursor) {
      this.farthest = { cursor, expected: new Set([ruleName]) };
    } else if (cursor === this.farthest.cursor) {
      this.farthest.expected.add(ruleName);
    }
    return ok(null);
  }

  private skipWhitespace(cursor: number): number {
    const whitespace = this.parser.rules.whitespace;
    if (this.text === null || !whitespace) {
      return cursor;
    }
    const nfa = this.patterns.get(whitespace.name);
    let end = nfa.longestMatch(this.text, cursor);
    while (end !== undefined && end > cursor) {
      cursor = end;
      end = nfa.longestMatch(this.text, cursor);
    }
    return cursor;
  }

  private rule(name: string, cursor: number): Attempt {
    const rule = this.parser.rules.get(name);
    if (!rule) {
      throw new Error(`No rule named ${name}`);
    }
    const key = `${name}@${cursor}`;
    if (this.active.has(key)) {
      return err(
        new ParseError(ParseErrorKind.NoProgress, {
          position: this.position(cursor),
          ruleName: name,
        })
      );
    }
    this.log(`${name} @ ${this.position(cursor)}`);
    this.current = { name, cursor };
    this.active.add(key);
    this.depth++;
    const result = this.alternatives(name, rule.definitions, cursor);
    this.depth--;
    this.active.delete(key);
    return result;
  }

  private alternatives(
    name: string,
    definitions: Alternation,
    cursor: number
  ): Attempt {
    for (const [index, alternative] of definitions.entries()) {
      const attempt = this.concatenation(alternative.body, cursor);
      if (attempt.isErr()) {
        return attempt;
      }
      const match = attempt.value;
      if (match) {
        const tag = this.parser.variants.tagOf(name, index);
        this.log(debug.colors.green('✓'), `${name}:${tag}`);
        const node = new AstNode(
          name,
          tag,
          match.children,
          spanOf(match.children, this.position(cursor))
        );
        return ok({ end: match.end, children: [node] });
      }
    }
    this.log('failed', name);
    return this.fail(cursor, name);
  }

  private alternation(alternation: Alternation, cursor: number): Attempt {
    for (const alternative of alternation) {
      const attempt = this.concatenation(alternative.body, cursor);
      if (attempt.isErr() || attempt.value) {
        return attempt;
      }
    }
    return ok(null);
  }

  private concatenation(body: Concatenation, cursor: number): Attempt {
    const children: AstChild[] = [];
    let end = cursor;
    for (const repetition of body) {
      const attempt = this.repetition(repetition, end);
      if (attempt.isErr() || !attempt.value) {
        return attempt;
      }
      end = attempt.value.end;
      children.push(...attempt.value.children);
    }
    return ok({ end, children });
  }

  private repetition({ inner, quantifier }: Repetition, cursor: number): Attempt {
    switch (quantifier) {
      case Quantifier.One:
        return this.singular(inner, cursor);
      case Quantifier.Maybe: {
        const attempt = this.singular(inner, cursor);
        if (attempt.isErr() || attempt.value) {
          return attempt;
        }
        return ok({ end: cursor, children: [] });
      }
      case Quantifier.Any:
      case Quantifier.Many: {
        // greedy: never gives back an iteration to let what follows match
        const children: AstChild[] = [];
        let end = cursor;
        let count = 0;
        for (;;) {
          const attempt = this.singular(inner, end);
          if (attempt.isErr()) {
            return attempt;
          }
          const match = attempt.value;
          if (!match) {
            break;
          }
          children.push(...match.children);
          count++;
          if (match.end === end) {
            break;
          }
          end = match.end;
        }
        if (quantifier === Quantifier.Many && count === 0) {
          return ok(null);
        }
        return ok({ end, children });
      }
    }
  }

  private singular(singular: Singular, cursor: number): Attempt {
    let attempt: Attempt;
    switch (singular.kind) {
      case 'nested':
        attempt = this.alternation(singular.alternation, cursor);
        break;
      case 'symbol':
        attempt =
          this.parser.rules.get(singular.name)?.kind === RuleKind.Production
            ? this.rule(singular.name, cursor)
            : this.token(singular.name, cursor);
        break;
      default:
        attempt = this.token(singular.source, cursor);
    }
    if (attempt.isErr() || !attempt.value) {
      return attempt;
    }
    attempt.value.end = this.skipWhitespace(attempt.value.end);
    return attempt;
  }

  private token(name: string, cursor: number): Attempt {
    if (this.text === null) {
      const token = this.tokens[cursor];
      if (token?.token === name) {
        return ok({ end: cursor + 1, children: [token] });
      }
      return this.fail(cursor, name);
    }
    const end = this.patterns.get(name).longestMatch(this.text, cursor);
    if (end === undefined) {
      return this.fail(cursor, name);
    }
    const token = new LexToken(name, { from: cursor, to: end }, this.text.slice(cursor, end));
    return ok({ end, children: [token] });
  }
}
