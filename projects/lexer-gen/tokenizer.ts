import { err, ok, type Result } from 'neverthrow';
import { LexError } from '../errors.js';
import type { TokenTable } from '../grammar/fragments.js';
import type { Rule, RuleSet } from '../grammar/rule.js';
import { PatternNFA } from '../nfa/pattern-nfa.js';
import { OrderedMap } from '../utils/data-structures/OrderedMap.js';
import * as debug from '../utils/debug.js';
import { Iter } from '../utils/iter.js';
import { LexToken } from './LexToken.js';

/**
 * NFAs for every token-like rule of one grammar, built on first use.
 */
export class PatternCache {
  private rules: RuleSet;
  private nfas: Map<string, PatternNFA> = new Map();

  constructor(rules: RuleSet) {
    this.rules = rules;
  }

  get(name: string): PatternNFA {
    let nfa = this.nfas.get(name);
    if (!nfa) {
      nfa = PatternNFA.fromRule(this.rules, name);
      this.nfas.set(name, nfa);
    }
    return nfa;
  }
}

type Candidate = { nfa: PatternNFA; ignore: boolean };

/**
 * Runs every candidate pattern at a position and picks the longest match;
 * ties go to the candidate that comes first, so candidates must be given in
 * tie-break order.
 */
export class MultiPatternMatcher {
  private candidates: OrderedMap<string, Candidate>;
  constructor(candidates: OrderedMap<string, Candidate>) {
    this.candidates = candidates;
  }

  get names(): string[] {
    return this.candidates.keys().toArray();
  }

  match(
    input: string,
    from: number
  ): { token: string; end: number; ignore: boolean } | undefined {
    let best: { token: string; end: number; ignore: boolean } | undefined;
    for (const [, token, { nfa, ignore }] of this.candidates.entries()) {
      const end = nfa.longestMatch(input, from);
      if (end !== undefined && end > from && (!best || end > best.end)) {
        best = { token, end, ignore };
      }
    }
    return best;
  }
}

/**
 * One step of the tokenizer: the emitted token, or null when whitespace was
 * dropped, and the position to continue from.
 */
export type Step = { token: LexToken<string> | null; position: number };

export class TokenIterator extends Iter<Result<LexToken<string>, LexError>> {
  private tokenizer: Tokenizer;
  private input: string;
  private position = 0;
  private failed = false;

  constructor(tokenizer: Tokenizer, input: string) {
    super();
    this.tokenizer = tokenizer;
    this.input = input;
  }

  next(): IteratorResult<Result<LexToken<string>, LexError>> {
    while (!this.failed) {
      const step = this.tokenizer.next(this.input, this.position);
      if (step.isErr()) {
        this.failed = true;
        return { done: false, value: err(step.error) };
      }
      if (step.value === null) {
        break;
      }
      this.position = step.value.position;
      if (step.value.token) {
        return { done: false, value: ok(step.value.token) };
      }
    }
    return { done: true, value: undefined };
  }
}

export class Tokenizer {
  private matcher: MultiPatternMatcher;
  /** names of the tokens this tokenizer emits, in tie-break order */
  readonly alphabet: readonly string[];

  constructor(tokens: readonly Rule[], whitespace: Rule | undefined, patterns: PatternCache) {
    const ordered = [...tokens, ...(whitespace ? [whitespace] : [])].sort(
      (a, b) => a.firstDefinitionIndex - b.firstDefinitionIndex
    );
    this.matcher = new MultiPatternMatcher(
      new OrderedMap(
        ordered.map((rule): [string, Candidate] => [
          rule.name,
          { nfa: patterns.get(rule.name), ignore: rule === whitespace },
        ])
      )
    );
    this.alphabet = tokens.map((rule) => rule.name);
  }

  /**
   * Match one token at `position`. Returns null at the end of the input.
   */
  next(input: string, position: number): Result<Step | null, LexError> {
    if (position >= input.length) {
      return ok(null);
    }
    const match = this.matcher.match(input, position);
    if (!match) {
      return err(new LexError(input, position, this.matcher.names));
    }
    if (match.ignore) {
      return ok({ token: null, position: match.end });
    }
    const token = new LexToken(
      match.token,
      { from: position, to: match.end },
      input.slice(position, match.end)
    );
    debug.log('token', token.toString());
    return ok({ token, position: match.end });
  }

  /**
   * Lazily tokenize `input` from the start. The sequence ends after the
   * first error.
   */
  tokenize(input: string): TokenIterator {
    return new TokenIterator(this, input);
  }

  tokenizeAll(input: string): Result<LexToken<string>[], LexError> {
    const tokens: LexToken<string>[] = [];
    for (const result of this.tokenize(input)) {
      if (result.isErr()) {
        return err(result.error);
      }
      tokens.push(result.value);
    }
    return ok(tokens);
  }
}

export function compileTokenizer(
  rules: RuleSet,
  tokenTable: TokenTable,
  patterns: PatternCache = new PatternCache(rules)
): Tokenizer {
  return new Tokenizer(tokenTable.realTokens, rules.whitespace, patterns);
}
