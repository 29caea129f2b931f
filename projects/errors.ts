import type { Span } from './lexer-gen/LexToken.js';

export type Location = { line: number; column: number };

/**
 * Converts a UTF-16 offset into a 1-based line and column.
 */
export function locate(source: string, offset: number): Location {
  let line = 1;
  let lineStart = 0;
  for (let i = 0; i < offset && i < source.length; i++) {
    if (source[i] === '\n') {
      line++;
      lineStart = i + 1;
    }
  }
  return { line, column: offset - lineStart + 1 };
}

export const atString = (source: string | undefined, offset: number) => {
  if (source === undefined) {
    return `offset ${offset}`;
  }
  const { line, column } = locate(source, offset);
  return `${line}:${column}`;
};

const atSource = (source: string, offset: number): string[] => {
  const { line, column } = locate(source, offset);
  const lines = source.split('\n');
  const prefix = `${line}: `;
  return [
    `${prefix}${lines[line - 1]}`,
    '^'.padStart(prefix.length + column, '-'),
  ];
};

export enum GrammarErrorKind {
  Syntax = 'Syntax',
  ConflictingKind = 'ConflictingKind',
  EmptyLiteral = 'EmptyLiteral',
  InvalidEscape = 'InvalidEscape',
  RecursiveToken = 'RecursiveToken',
  DuplicateVariantName = 'DuplicateVariantName',
  UndefinedSymbol = 'UndefinedSymbol',
  InvalidReference = 'InvalidReference',
}

type GrammarErrorContext = { ruleName?: string; span?: Span };

/**
 * A problem with the grammar source. Always fatal to the compilation that
 * produced it.
 */
export class GrammarError extends Error {
  readonly kind: GrammarErrorKind;
  readonly ruleName?: string;
  readonly span?: Span;
  private _message: string;
  private source?: string;

  constructor(
    kind: GrammarErrorKind,
    message: string,
    { ruleName, span }: GrammarErrorContext = {}
  ) {
    super(message);
    this.name = 'GrammarError';
    this.kind = kind;
    this.ruleName = ruleName;
    this.span = span;
    this._message = message;
    this.message = this.getMessage();
  }

  static syntax(message: string, context?: GrammarErrorContext) {
    return new GrammarError(GrammarErrorKind.Syntax, message, context);
  }

  getMessage() {
    let at = '';
    if (this.span) {
      at = ` at ${atString(this.source, this.span.from)}`;
    }
    const inRule = this.ruleName !== undefined ? ` in ${this.ruleName}` : '';
    const lines = [`${this.kind}Error${at}${inRule}: ${this._message}`];
    if (this.source !== undefined && this.span) {
      lines.push(
        ...atSource(this.source, this.span.from).map((line) => `  ` + line)
      );
    }
    return lines.join('\n');
  }

  attachSource(source: string) {
    this.source = source;
    this.message = this.getMessage();
    return this;
  }

  /**
   * Shift the span by `offset`, for errors found in a slice of a larger
   * source.
   */
  relativeTo(offset: number): GrammarError {
    if (!this.span || offset === 0) {
      return this;
    }
    return new GrammarError(this.kind, this._message, {
      ruleName: this.ruleName,
      span: { from: this.span.from + offset, to: this.span.to + offset },
    });
  }
}

export enum LexErrorKind {
  UnrecognizedCharacter = 'UnrecognizedCharacter',
}

/**
 * No token rule matched at `position`. Recovery is left to the caller.
 */
export class LexError extends Error {
  readonly kind = LexErrorKind.UnrecognizedCharacter;
  readonly position: number;
  readonly triedRules: readonly string[];

  constructor(input: string, position: number, triedRules: readonly string[]) {
    const next = input.slice(position, position + 10);
    super(
      `LexError at ${atString(input, position)}: could not match a token ` +
        `starting with ${JSON.stringify(next)}`
    );
    this.name = 'LexError';
    this.position = position;
    this.triedRules = triedRules;
  }
}

export enum ParseErrorKind {
  NoAlternativeMatched = 'NoAlternativeMatched',
  NoProgress = 'NoProgress',
  UnknownRule = 'UnknownRule',
  TrailingInput = 'TrailingInput',
  TooDeep = 'TooDeep',
}

type ParseErrorContext = {
  position: number;
  ruleName?: string;
  triedRules?: readonly string[];
};

export class ParseError extends Error {
  readonly kind: ParseErrorKind;
  readonly position: number;
  readonly ruleName?: string;
  readonly triedRules: readonly string[];

  constructor(
    kind: ParseErrorKind,
    { position, ruleName, triedRules = [] }: ParseErrorContext
  ) {
    super();
    this.name = 'ParseError';
    this.kind = kind;
    this.position = position;
    this.ruleName = ruleName;
    this.triedRules = triedRules;
    this.message = this.describe();
  }

  private describe() {
    switch (this.kind) {
      case ParseErrorKind.NoAlternativeMatched:
        return `ParseError at ${this.position}: expected one of ${this.triedRules.join(', ')}`;
      case ParseErrorKind.NoProgress:
        return `ParseError at ${this.position}: ${this.ruleName} invoked itself without consuming input`;
      case ParseErrorKind.UnknownRule:
        return `ParseError: ${this.ruleName} is not a production rule`;
      case ParseErrorKind.TrailingInput:
        return `ParseError at ${this.position}: input remains after ${this.ruleName}`;
      case ParseErrorKind.TooDeep:
        return `ParseError at ${this.position}: ${this.ruleName} is nested too deeply`;
    }
  }
}
