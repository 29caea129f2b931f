import { err, ok, type Result } from 'neverthrow';
import { GrammarError, GrammarErrorKind } from '../errors.js';
import { MAX_CODE_POINT } from './codepoint-matcher.js';

export const ESCAPE_CHAR = '#';

const SIMPLE_ESCAPES: { [char: string]: number } = {
  t: 0x09,
  n: 0x0a,
  r: 0x0d,
  '#': 0x23,
  "'": 0x27,
  '"': 0x22,
  '-': 0x2d,
  '^': 0x5e,
  ']': 0x5d,
};

const HEX_ESCAPES: { [char: string]: number } = {
  x: 2,
  u: 4,
  U: 8,
};

const HEX_DIGITS = /^[0-9a-fA-F]+$/;

export type Escape = { codePoint: number; length: number };

/**
 * Number of characters an escape starting at `offset` spans, without
 * validating it. Used by the meta lexer to find the end of a literal.
 */
export function escapeLength(text: string, offset: number): number {
  const hexLength = HEX_ESCAPES[text.charAt(offset + 1)];
  if (hexLength !== undefined) {
    let length = 2;
    while (
      length < 2 + hexLength &&
      HEX_DIGITS.test(text.charAt(offset + length))
    ) {
      length++;
    }
    return length;
  }
  return Math.min(2, text.length - offset);
}

/**
 * Resolves the escape sequence at `offset`, which must point at `#`.
 * `base` is added to error spans so they point into the grammar source.
 */
export function readEscape(
  text: string,
  offset: number,
  base: number = 0,
  ruleName?: string
): Result<Escape, GrammarError> {
  const kind = text.charAt(offset + 1);
  const fail = (length: number) =>
    err(
      new GrammarError(
        GrammarErrorKind.InvalidEscape,
        `invalid escape sequence ${JSON.stringify(text.slice(offset, offset + length))}`,
        {
          ruleName,
          span: { from: base + offset, to: base + offset + length },
        }
      )
    );

  if (kind === '') {
    return fail(1);
  }
  const simple = SIMPLE_ESCAPES[kind];
  if (simple !== undefined) {
    return ok({ codePoint: simple, length: 2 });
  }
  const hexLength = HEX_ESCAPES[kind];
  if (hexLength === undefined) {
    return fail(2);
  }
  const digits = text.slice(offset + 2, offset + 2 + hexLength);
  if (digits.length !== hexLength || !HEX_DIGITS.test(digits)) {
    return fail(2 + digits.length);
  }
  const codePoint = parseInt(digits, 16);
  if (codePoint > MAX_CODE_POINT) {
    return fail(2 + hexLength);
  }
  return ok({ codePoint, length: 2 + hexLength });
}
