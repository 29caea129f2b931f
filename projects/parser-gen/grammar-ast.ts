import type { Span } from '../lexer-gen/LexToken.js';

export enum Quantifier {
  One = 'One',
  Maybe = 'Maybe',
  Any = 'Any',
  Many = 'Many',
}

export enum DefinitionKind {
  Production = 'Production',
  Token = 'Token',
}

/**
 * Rule definitions exactly as written in the grammar source, before any
 * pattern is compiled or any definitions are merged.
 */
export type SourceSingular =
  | { kind: 'nested'; alternatives: SourceAlternative[]; span: Span }
  | { kind: 'symbol'; name: string; span: Span }
  | { kind: 'literal'; text: string; span: Span }
  | { kind: 'charset'; text: string; span: Span }
  | { kind: 'char'; text: string; span: Span };

export type SourceRepetition = {
  inner: SourceSingular;
  quantifier: Quantifier;
  span: Span;
};

export type SourceAlternative = {
  doc?: string;
  name?: string;
  body: SourceRepetition[];
  span: Span;
};

export type RuleDefinition = {
  doc?: string;
  name: string;
  kind: DefinitionKind;
  alternatives: SourceAlternative[];
  span: Span;
};
