import { err, ok, type Result } from 'neverthrow';
import { GrammarError, GrammarErrorKind } from '../errors.js';
import { isTokenLike, referencedSymbols, type Rule, RuleKind, type RuleSet } from './rule.js';

/**
 * The split of token rules into real tokens, which the tokenizer emits, and
 * fragments, which only exist to be inlined into other token rules.
 */
export class TokenTable {
  /** real tokens ordered by first definition */
  readonly realTokens: readonly Rule[];
  readonly fragments: readonly Rule[];
  private realNames: Set<string>;

  constructor(realTokens: readonly Rule[], fragments: readonly Rule[]) {
    this.realTokens = realTokens;
    this.fragments = fragments;
    this.realNames = new Set(realTokens.map((rule) => rule.name));
  }

  isRealToken(name: string) {
    return this.realNames.has(name);
  }
}

/**
 * Token rules must not reference themselves, directly or through other
 * token rules. Returns the first cycle found, as a path of rule names.
 */
function findTokenCycle(rules: RuleSet): string[] | undefined {
  const done = new Set<string>();
  const path: string[] = [];

  const visit = (rule: Rule): string[] | undefined => {
    const onPath = path.indexOf(rule.name);
    if (onPath >= 0) {
      return [...path.slice(onPath), rule.name];
    }
    if (done.has(rule.name)) {
      return undefined;
    }
    path.push(rule.name);
    for (const { name } of referencedSymbols(rule.definitions)) {
      const target = rules.get(name);
      if (target && isTokenLike(target)) {
        const cycle = visit(target);
        if (cycle) {
          return cycle;
        }
      }
    }
    path.pop();
    done.add(rule.name);
    return undefined;
  };

  for (const rule of rules) {
    if (isTokenLike(rule)) {
      const cycle = visit(rule);
      if (cycle) {
        return cycle;
      }
    }
  }
  return undefined;
}

/**
 * Decide which token rules are real tokens: those referenced from a
 * production rule, and every token rule those reference in turn. Everything
 * else of kind Token is a fragment.
 */
export function resolveFragments(rules: RuleSet): Result<TokenTable, GrammarError> {
  const cycle = findTokenCycle(rules);
  if (cycle) {
    const rule = rules.get(cycle[0]);
    return err(
      new GrammarError(
        GrammarErrorKind.RecursiveToken,
        `token rules cannot be recursive: ${cycle.join(' -> ')}`,
        { ruleName: cycle[0], span: rule?.span }
      )
    );
  }

  const reached = new Set<string>();
  const pending: Rule[] = [];
  const reach = (name: string) => {
    const rule = rules.get(name);
    if (rule?.kind === RuleKind.Token && !reached.has(name)) {
      reached.add(name);
      pending.push(rule);
    }
  };

  for (const production of rules.productions()) {
    for (const { name } of referencedSymbols(production.definitions)) {
      reach(name);
    }
  }
  let next = pending.pop();
  while (next) {
    for (const { name } of referencedSymbols(next.definitions)) {
      reach(name);
    }
    next = pending.pop();
  }

  const realTokens: Rule[] = [];
  const fragments: Rule[] = [];
  for (const rule of rules.ofKind(RuleKind.Token)) {
    if (rule.synthetic || reached.has(rule.name)) {
      realTokens.push(rule);
    } else {
      fragments.push(rule);
    }
  }
  return ok(new TokenTable(realTokens, fragments));
}
