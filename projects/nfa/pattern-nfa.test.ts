import { RuleRegistry } from '../grammar/registry.js';
import { PatternNFA } from './pattern-nfa.js';

const buildRules = (source: string) => {
  const registry = new RuleRegistry();
  registry.register(source)._unsafeUnwrap();
  return registry.finalize()._unsafeUnwrap();
};

describe('PatternNFA', () => {
  const rules = buildRules(`
    ident :== [a-z] [a-z0-9]* ;
    kw :== "if" | "iffy" ;
    opt :== "a"? ;
    num :== digit+ ("." digit+)? ;
    digit :== [0-9] ;
    face :== "😀"+ ;
  `);
  const nfa = (name: string) => PatternNFA.fromRule(rules, name);

  test('finds the longest match', () => {
    expect(nfa('ident').longestMatch('abc1 x', 0)).toBe(4);
    expect(nfa('ident').longestMatch('abc1 x', 5)).toBe(6);
    expect(nfa('ident').longestMatch('abc1 x', 4)).toBeUndefined();
  });

  test('alternatives compete on length, not order', () => {
    expect(nfa('kw').longestMatch('iffy!', 0)).toBe(4);
    expect(nfa('kw').longestMatch('ifx', 0)).toBe(2);
    expect(nfa('kw').longestMatch('x', 0)).toBeUndefined();
  });

  test('a match may be empty', () => {
    expect(nfa('opt').longestMatch('b', 0)).toBe(0);
    expect(nfa('opt').longestMatch('', 0)).toBe(0);
  });

  test('inlines referenced token rules', () => {
    expect(nfa('num').longestMatch('3.14x', 0)).toBe(4);
    expect(nfa('num').longestMatch('3.x', 0)).toBe(1);
  });

  test('steps over astral code points', () => {
    expect(nfa('face').longestMatch('😀😀x', 0)).toBe(4);
  });

  test('toDebugStr lists the edges', () => {
    const debugStr = nfa('opt').toDebugStr();
    expect(debugStr.split('\n')[0]).toBe('opt: start=0 accept=1');
    expect(debugStr).toContain("-'a'->");
  });
});
