import { GrammarErrorKind } from '../errors.js';
import { RuleRegistry } from './registry.js';
import { RuleKind } from './rule.js';

const finalize = (source: string, registry = new RuleRegistry()) => {
  registry.register(source)._unsafeUnwrap();
  return registry.finalize();
};

describe('RuleRegistry', () => {
  test('merges definitions in source order and keeps the first index', () => {
    const rules = finalize(`
      ident :== [a-z]+ ;
      expr ::= ident ;
      ident :== [0-9] | "_" ;
    `)._unsafeUnwrap();
    const ident = rules.get('ident');
    expect(ident?.firstDefinitionIndex).toBe(0);
    expect(
      ident?.definitions.map((alternative) =>
        alternative.body.map(({ inner }) =>
          inner.kind === 'charset' || inner.kind === 'literal' ? inner.source : inner.kind
        )
      )
    ).toEqual([['[a-z]'], ['[0-9]'], ['"_"']]);
    expect(rules.get('expr')?.firstDefinitionIndex).toBe(1);
    expect([...rules].map((rule) => rule.name)).toEqual(['ident', 'expr']);
  });

  test('definitions may be registered in several chunks', () => {
    const registry = new RuleRegistry();
    registry.register('a :== "x" ;')._unsafeUnwrap();
    registry.register('b ::= a ; a :== "y" ;')._unsafeUnwrap();
    const rules = registry.finalize()._unsafeUnwrap();
    expect(rules.get('a')?.definitions).toHaveLength(2);
    expect(rules.get('b')?.firstDefinitionIndex).toBe(1);
  });

  test('merges docstrings of every definition', () => {
    const rules = finalize(
      '/** one */ a :== "x" ; /** two */ a :== "y" ;'
    )._unsafeUnwrap();
    expect(rules.get('a')?.doc).toBe('one\n\ntwo');
  });

  test('classifies rule kinds', () => {
    const rules = finalize(`
      s ::= word* ;
      word :== [a-z]+ ;
      _ :== [ ]+ ;
    `)._unsafeUnwrap();
    expect(rules.get('s')?.kind).toBe(RuleKind.Production);
    expect(rules.get('word')?.kind).toBe(RuleKind.Token);
    expect(rules.get('_')?.kind).toBe(RuleKind.Whitespace);
    expect(rules.whitespace?.name).toBe('_');
  });

  test('the whitespace rule name is configurable', () => {
    const rules = finalize(
      's ::= "x" ; ws :== [ ]+ ; _ :== "_" ;',
      new RuleRegistry({ whitespaceRule: 'ws' })
    )._unsafeUnwrap();
    expect(rules.whitespace?.name).toBe('ws');
    expect(rules.get('_')?.kind).toBe(RuleKind.Token);
  });

  test('lifts literals and sets in productions into synthetic tokens', () => {
    const rules = finalize(`
      a ::= "x" b "x" ;
      b ::= [0-9] ;
    `)._unsafeUnwrap();
    expect(
      [...rules].map((rule) => [rule.name, rule.kind, rule.firstDefinitionIndex, rule.synthetic])
    ).toEqual([
      ['a', RuleKind.Production, 0, false],
      ['"x"', RuleKind.Token, 1, true],
      ['b', RuleKind.Production, 2, false],
      ['[0-9]', RuleKind.Token, 3, true],
    ]);
    const body = rules.get('a')?.definitions[0].body ?? [];
    expect(
      body.map(({ inner }) => (inner.kind === 'symbol' ? inner.name : inner.kind))
    ).toEqual(['"x"', 'b', '"x"']);
  });

  test('token rules keep their patterns inline', () => {
    const rules = finalize('num :== "0" | [1-9] [0-9]* ;')._unsafeUnwrap();
    expect(rules.size).toBe(1);
    expect(rules.get('num')?.definitions[0].body[0].inner.kind).toBe('literal');
    expect(rules.get('num')?.definitions[1].body[1].inner.kind).toBe('charset');
  });

  test('a symbol defined with two kinds is an error', () => {
    const error = new RuleRegistry()
      .register('a ::= "x" ; a :== "y" ;')
      ._unsafeUnwrapErr();
    expect(error.kind).toBe(GrammarErrorKind.ConflictingKind);
    expect(error.ruleName).toBe('a');
  });

  test('the whitespace rule cannot be a production', () => {
    const error = new RuleRegistry().register('_ ::= "x" ;')._unsafeUnwrapErr();
    expect(error.kind).toBe(GrammarErrorKind.Syntax);
  });

  test('empty literals are an error', () => {
    const error = new RuleRegistry().register('a ::= "" ;')._unsafeUnwrapErr();
    expect(error.kind).toBe(GrammarErrorKind.EmptyLiteral);
  });

  test('a registry with a failed definition does not finalize', () => {
    const registry = new RuleRegistry();
    const error = registry.register('a ::= "x" | "" ;')._unsafeUnwrapErr();
    registry.register('b :== "y" ;')._unsafeUnwrap();
    expect(registry.finalize()._unsafeUnwrapErr()).toBe(error);
  });

  test('duplicate variant names are caught while merging', () => {
    const registry = new RuleRegistry();
    registry.register('e ::= "a" ;')._unsafeUnwrap();
    const error = registry.register('e ::= "b" -> e_0 ;')._unsafeUnwrapErr();
    expect(error.kind).toBe(GrammarErrorKind.DuplicateVariantName);
  });

  test('undefined symbols are reported on finalize', () => {
    const error = finalize('a ::= b ;')._unsafeUnwrapErr();
    expect(error.kind).toBe(GrammarErrorKind.UndefinedSymbol);
    expect(error.ruleName).toBe('a');
    expect(error.span).toEqual({ from: 6, to: 7 });
  });

  test('token rules cannot reference productions', () => {
    const error = finalize('a :== b ; b ::= "x" ;')._unsafeUnwrapErr();
    expect(error.kind).toBe(GrammarErrorKind.InvalidReference);
    expect(error.ruleName).toBe('a');
  });

  test('a finalized registry cannot be changed', () => {
    const registry = new RuleRegistry();
    registry.register('a :== "x" ;')._unsafeUnwrap();
    registry.finalize()._unsafeUnwrap();
    expect(() => registry.register('b :== "y" ;')).toThrow(
      'RuleRegistry has already been finalized'
    );
  });
});
