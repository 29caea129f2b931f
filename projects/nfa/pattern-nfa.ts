/**
 * Thompson construction of an NFA from a token rule, with code point
 * predicates on the edges instead of a finite alphabet. References to other
 * token rules are inlined, so every NFA is self contained.
 *
 * Simulating the NFA over the input gives the longest prefix the rule
 * matches, which is what the tokenizer and the scannerless parser need.
 */

import type { CodepointMatcher } from '../pattern-compiler/codepoint-matcher.js';
import { Quantifier } from '../parser-gen/grammar-ast.js';
import type { Alternation, Concatenation, Repetition, RuleSet, Singular } from '../grammar/rule.js';
import type { IHaveDebugStr } from '../utils/debug.js';
import { codePointAt } from '../utils/iter.js';

type Edge = { matcher: CodepointMatcher | null; to: number };

export class PatternNFA implements IHaveDebugStr {
  private edges: Edge[][] = [];
  readonly start: number;
  readonly accept: number;
  readonly description: string;

  private constructor(description: string) {
    this.description = description;
    this.start = this.addState();
    this.accept = this.addState();
  }

  get numStates() {
    return this.edges.length;
  }

  /**
   * Build the NFA for the token or whitespace rule `name`. The rule set must
   * already be known to be free of token recursion.
   */
  static fromRule(rules: RuleSet, name: string): PatternNFA {
    const nfa = new PatternNFA(name);
    new Builder(nfa, rules).rule(name, nfa.start, nfa.accept);
    return nfa;
  }

  addState(): number {
    this.edges.push([]);
    return this.edges.length - 1;
  }

  addEdge(from: number, to: number, matcher: CodepointMatcher | null) {
    this.edges[from].push({ matcher, to });
  }

  private closure(states: Iterable<number>): Set<number> {
    const closed = new Set<number>(states);
    const stack = [...closed];
    let state = stack.pop();
    while (state !== undefined) {
      for (const edge of this.edges[state]) {
        if (edge.matcher === null && !closed.has(edge.to)) {
          closed.add(edge.to);
          stack.push(edge.to);
        }
      }
      state = stack.pop();
    }
    return closed;
  }

  /**
   * Returns the offset just past the longest match starting at `from`, or
   * undefined if the rule does not match there at all. A match may be empty.
   */
  longestMatch(input: string, from: number): number | undefined {
    let current = this.closure([this.start]);
    let longest = current.has(this.accept) ? from : undefined;
    let offset = from;
    while (current.size > 0) {
      const next = codePointAt(input, offset);
      if (!next) {
        break;
      }
      const reached: number[] = [];
      for (const state of current) {
        for (const edge of this.edges[state]) {
          if (edge.matcher?.matches(next.codePoint)) {
            reached.push(edge.to);
          }
        }
      }
      offset += next.width;
      current = this.closure(reached);
      if (current.has(this.accept)) {
        longest = offset;
      }
    }
    return longest;
  }

  toDebugStr(): string {
    const lines = [`${this.description}: start=${this.start} accept=${this.accept}`];
    this.edges.forEach((edges, state) => {
      for (const edge of edges) {
        lines.push(`  ${state} -${edge.matcher?.toString() ?? 'ϵ'}-> ${edge.to}`);
      }
    });
    return lines.join('\n');
  }
}

class Builder {
  private nfa: PatternNFA;
  private rules: RuleSet;
  private inlining: string[] = [];

  constructor(nfa: PatternNFA, rules: RuleSet) {
    this.nfa = nfa;
    this.rules = rules;
  }

  rule(name: string, from: number, to: number) {
    const rule = this.rules.get(name);
    if (!rule) {
      throw new Error(`No rule named ${name}`);
    }
    if (this.inlining.includes(name)) {
      throw new Error(`Cannot inline recursive token rule ${name}`);
    }
    this.inlining.push(name);
    this.alternation(rule.definitions, from, to);
    this.inlining.pop();
  }

  alternation(alternation: Alternation, from: number, to: number) {
    for (const alternative of alternation) {
      this.concatenation(alternative.body, from, to);
    }
  }

  concatenation(body: Concatenation, from: number, to: number) {
    let current = from;
    for (const repetition of body) {
      const next = this.nfa.addState();
      this.repetition(repetition, current, next);
      current = next;
    }
    this.nfa.addEdge(current, to, null);
  }

  repetition({ inner, quantifier }: Repetition, from: number, to: number) {
    switch (quantifier) {
      case Quantifier.One:
        this.singular(inner, from, to);
        break;
      case Quantifier.Maybe:
        this.singular(inner, from, to);
        this.nfa.addEdge(from, to, null);
        break;
      case Quantifier.Any:
      case Quantifier.Many: {
        const loopStart = this.nfa.addState();
        const loopEnd = this.nfa.addState();
        this.nfa.addEdge(from, loopStart, null);
        this.singular(inner, loopStart, loopEnd);
        this.nfa.addEdge(loopEnd, loopStart, null);
        this.nfa.addEdge(loopEnd, to, null);
        if (quantifier === Quantifier.Any) {
          this.nfa.addEdge(loopStart, to, null);
        }
        break;
      }
    }
  }

  singular(singular: Singular, from: number, to: number) {
    switch (singular.kind) {
      case 'nested':
        this.alternation(singular.alternation, from, to);
        break;
      case 'symbol':
        this.rule(singular.name, from, to);
        break;
      case 'charset':
        this.nfa.addEdge(from, to, singular.matcher);
        break;
      case 'literal': {
        let current = from;
        singular.matchers.forEach((matcher, i) => {
          const next = i === singular.matchers.length - 1 ? to : this.nfa.addState();
          this.nfa.addEdge(current, next, matcher);
          current = next;
        });
        break;
      }
    }
  }
}
