import { GrammarErrorKind } from '../errors.js';
import { DefinitionKind, Quantifier } from './grammar-ast.js';
import { MetaParser } from './meta-parser.js';

describe('MetaParser', () => {
  test('parses rules with docs, quantifiers, groups and names', () => {
    const [rule] = MetaParser.parse(
      '/** Doc */ a ::= b c? | (d | e)* -> named ;'
    )._unsafeUnwrap();
    expect(rule.doc).toBe('Doc');
    expect(rule.name).toBe('a');
    expect(rule.kind).toBe(DefinitionKind.Production);
    expect(rule.span).toEqual({ from: 0, to: 43 });

    const [first, second] = rule.alternatives;
    expect(first.name).toBeUndefined();
    expect(first.body.map((r) => r.quantifier)).toEqual([
      Quantifier.One,
      Quantifier.Maybe,
    ]);
    expect(second.name).toBe('named');
    expect(second.body).toHaveLength(1);
    const [group] = second.body;
    expect(group.quantifier).toBe(Quantifier.Any);
    expect(group.inner.kind).toBe('nested');
    if (group.inner.kind === 'nested') {
      expect(group.inner.alternatives).toHaveLength(2);
    }
  });

  test('parses several rules of both kinds', () => {
    const rules = MetaParser.parse(`
      greeting ::= "hi" name ;
      name :== [a-z]+ ;
      _ :== [ ]+ ;
    `)._unsafeUnwrap();
    expect(rules.map((r) => [r.name, r.kind])).toEqual([
      ['greeting', DefinitionKind.Production],
      ['name', DefinitionKind.Token],
      ['_', DefinitionKind.Token],
    ]);
    expect(rules[0].alternatives[0].body.map((r) => r.inner.kind)).toEqual([
      'literal',
      'symbol',
    ]);
  });

  test('alternative docstrings attach to the alternative', () => {
    const [rule] = MetaParser.parse(
      'a ::= /** first */ "x" | /** second */ "y";'
    )._unsafeUnwrap();
    expect(rule.doc).toBeUndefined();
    expect(rule.alternatives.map((a) => a.doc)).toEqual(['first', 'second']);
  });

  test('a docstring after the last rule is ignored', () => {
    const rules = MetaParser.parse(
      's ::= "a" ;\n/** trailing note */\n'
    )._unsafeUnwrap();
    expect(rules.map((r) => r.name)).toEqual(['s']);
    expect(rules[0].doc).toBeUndefined();
  });

  test('a docstring still needs a rule unless it ends the grammar', () => {
    const error = MetaParser.parse('/** note */ ; s ::= "a" ;')._unsafeUnwrapErr();
    expect(error.message).toBe(
      'SyntaxError at offset 12: expected a rule name but found ";"'
    );
  });

  test('reports a missing terminator', () => {
    const error = MetaParser.parse('a ::= b')._unsafeUnwrapErr();
    expect(error.kind).toBe(GrammarErrorKind.Syntax);
    expect(error.message).toBe(
      'SyntaxError at offset 7 in a: expected ";" to end the rule but found end of input'
    );
  });

  test('reports an unmatched parenthesis', () => {
    const error = MetaParser.parse('a ::= (b ;')._unsafeUnwrapErr();
    expect(error.message).toBe(
      'SyntaxError at offset 9 in a: expected ")" to close the group but found ";"'
    );
  });

  test('names are only allowed on top-level production alternatives', () => {
    for (const source of ['a :== "x" -> y ;', 'a ::= ("x" -> y) ;']) {
      const error = MetaParser.parse(source)._unsafeUnwrapErr();
      expect(error.kind).toBe(GrammarErrorKind.Syntax);
      expect(error.message).toContain(
        'alternative names are only allowed on top-level alternatives of production rules'
      );
    }
  });

  test('an empty alternative is an error', () => {
    const error = MetaParser.parse('a ::= b | ;')._unsafeUnwrapErr();
    expect(error.message).toContain('expected a pattern but found ";"');
  });
});
