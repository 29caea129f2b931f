import { resolveFragments } from '../grammar/fragments.js';
import { RuleRegistry } from '../grammar/registry.js';
import { compileTokenizer } from './tokenizer.js';

const buildTokenizer = (source: string) => {
  const registry = new RuleRegistry();
  registry.register(source)._unsafeUnwrap();
  const rules = registry.finalize()._unsafeUnwrap();
  return compileTokenizer(rules, resolveFragments(rules)._unsafeUnwrap());
};

const summarize = (tokens: { token: string; substr: string }[]) =>
  tokens.map((t) => `${t.token}:${t.substr}`);

describe('Tokenizer', () => {
  const tokenizer = buildTokenizer(`
    stmt ::= (kw | ident)* ;
    kw :== "let" ;
    ident :== [a-z]+ ;
    _ :== [ ]+ ;
  `);

  test('picks the longest match and drops whitespace', () => {
    const tokens = tokenizer.tokenizeAll('let letter x')._unsafeUnwrap();
    expect(summarize(tokens)).toEqual(['kw:let', 'ident:letter', 'ident:x']);
    expect(tokens.map((t) => t.span)).toEqual([
      { from: 0, to: 3 },
      { from: 4, to: 10 },
      { from: 11, to: 12 },
    ]);
  });

  test('ties go to the earliest defined rule, every time', () => {
    for (let i = 0; i < 3; i++) {
      expect(summarize(tokenizer.tokenizeAll('let')._unsafeUnwrap())).toEqual([
        'kw:let',
      ]);
    }
    const reversed = buildTokenizer(`
      stmt ::= (kw | ident)* ;
      ident :== [a-z]+ ;
      kw :== "let" ;
    `);
    expect(summarize(reversed.tokenizeAll('let')._unsafeUnwrap())).toEqual([
      'ident:let',
    ]);
  });

  test('the alphabet lists real tokens only, in definition order', () => {
    expect(tokenizer.alphabet).toEqual(['kw', 'ident']);
  });

  test('next reports dropped whitespace and the end of input', () => {
    expect(tokenizer.next('  a', 0)._unsafeUnwrap()).toEqual({
      token: null,
      position: 2,
    });
    expect(tokenizer.next('a', 1)._unsafeUnwrap()).toBeNull();
  });

  test('fails on unrecognized characters', () => {
    const error = tokenizer.tokenizeAll('let 9')._unsafeUnwrapErr();
    expect(error.position).toBe(4);
    expect(error.triedRules).toEqual(['kw', 'ident', '_']);
    expect(error.message).toBe(
      'LexError at 1:5: could not match a token starting with "9"'
    );
  });

  test('the lazy token stream ends after the first error', () => {
    const results = [...tokenizer.tokenize('a 9 b')];
    expect(results).toHaveLength(2);
    expect(results[0].isOk()).toBe(true);
    expect(results[1].isErr()).toBe(true);
  });
});
