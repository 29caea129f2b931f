import { err, ok, type Result } from 'neverthrow';
import { GrammarError, GrammarErrorKind } from '../errors.js';
import type { Span } from '../lexer-gen/LexToken.js';
import { codePointAt } from '../utils/iter.js';
import { CodepointMatcher, type CodepointRange } from './codepoint-matcher.js';
import { ESCAPE_CHAR, readEscape } from './escapes.js';

/**
 * The source text of a literal, character set or character escape, with the
 * span it occupies in the grammar.
 */
export type PatternSource = { text: string; span: Span; ruleName?: string };

type Unit = { codePoint: number; escaped: boolean; offset: number };

function readUnits(
  source: PatternSource,
  from: number,
  to: number
): Result<Unit[], GrammarError> {
  const { text, span, ruleName } = source;
  const units: Unit[] = [];
  let offset = from;
  while (offset < to) {
    if (text[offset] === ESCAPE_CHAR) {
      const escape = readEscape(text, offset, span.from, ruleName);
      if (escape.isErr()) {
        return err(escape.error);
      }
      units.push({ codePoint: escape.value.codePoint, escaped: true, offset });
      offset += escape.value.length;
    } else {
      const next = codePointAt(text, offset);
      if (!next) {
        break;
      }
      units.push({ codePoint: next.codePoint, escaped: false, offset });
      offset += next.width;
    }
  }
  return ok(units);
}

/**
 * Compiles a quoted string literal (`'...'` or `"..."`) into the sequence of
 * single code point matchers it stands for.
 */
export function compileLiteral(
  source: PatternSource
): Result<CodepointMatcher[], GrammarError> {
  const { text, span, ruleName } = source;
  return readUnits(source, 1, text.length - 1).andThen((units) => {
    if (units.length === 0) {
      return err(
        new GrammarError(
          GrammarErrorKind.EmptyLiteral,
          `string literal ${text} must match at least one character`,
          { ruleName, span }
        )
      );
    }
    return ok(units.map((unit) => CodepointMatcher.single(unit.codePoint)));
  });
}

/**
 * Compiles a bare escape sequence such as `#n` or `#x41`.
 */
export function compileCharacter(
  source: PatternSource
): Result<CodepointMatcher, GrammarError> {
  return readUnits(source, 0, source.text.length).andThen((units) => {
    if (units.length !== 1 || !units[0].escaped) {
      return err(
        GrammarError.syntax(`${source.text} is not a single character escape`, {
          ruleName: source.ruleName,
          span: source.span,
        })
      );
    }
    return ok(CodepointMatcher.single(units[0].codePoint));
  });
}

/**
 * Compiles a bracketed character set (`[a-z_]`, `[^#n]`) into one matcher.
 */
export function compileCharacterSet(
  source: PatternSource
): Result<CodepointMatcher, GrammarError> {
  const { text, span, ruleName } = source;
  return readUnits(source, 1, text.length - 1).andThen((units) => {
    const syntaxError = (message: string, unit?: Unit) =>
      err(
        GrammarError.syntax(message, {
          ruleName,
          span: unit
            ? { from: span.from + unit.offset, to: span.from + unit.offset + 1 }
            : span,
        })
      );
    const isBare = (unit: Unit | undefined, char: string) =>
      unit !== undefined && !unit.escaped && unit.codePoint === char.codePointAt(0);

    let i = 0;
    let negated = false;
    if (isBare(units[0], '^')) {
      negated = true;
      i++;
    }
    if (i === units.length && !negated) {
      return syntaxError(`empty character set ${text}`);
    }

    const ranges: CodepointRange[] = [];
    while (i < units.length) {
      const unit = units[i];
      if (isBare(unit, '^') || isBare(unit, '-')) {
        return syntaxError(
          `"${String.fromCodePoint(unit.codePoint)}" must be escaped inside a character set`,
          unit
        );
      }
      if (isBare(units[i + 1], '-') && i + 2 < units.length) {
        const end = units[i + 2];
        if (isBare(end, '^') || isBare(end, '-')) {
          return syntaxError(
            `"${String.fromCodePoint(end.codePoint)}" must be escaped inside a character set`,
            end
          );
        }
        if (end.codePoint < unit.codePoint) {
          return syntaxError(`reversed range in character set ${text}`, unit);
        }
        ranges.push([unit.codePoint, end.codePoint]);
        i += 3;
      } else {
        ranges.push([unit.codePoint, unit.codePoint]);
        i++;
      }
    }
    return ok(new CodepointMatcher(ranges, negated));
  });
}
