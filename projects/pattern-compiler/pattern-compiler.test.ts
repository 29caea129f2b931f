import { GrammarErrorKind } from '../errors.js';
import { CodepointMatcher } from './codepoint-matcher.js';
import { escapeLength, readEscape } from './escapes.js';
import {
  compileCharacter,
  compileCharacterSet,
  compileLiteral,
} from './pattern-compiler.js';

const source = (text: string) => ({
  text,
  span: { from: 0, to: text.length },
  ruleName: 'r',
});

const cp = (char: string) => char.codePointAt(0) ?? -1;

const ESCAPES: [string, number][] = [
  ['#t', 0x09],
  ['#n', 0x0a],
  ['#r', 0x0d],
  ['##', 0x23],
  ["#'", 0x27],
  ['#"', 0x22],
  ['#-', 0x2d],
  ['#^', 0x5e],
  ['#]', 0x5d],
  ['#x41', 0x41],
  ['#u00e9', 0xe9],
  ['#U0001F600', 0x1f600],
];

describe('readEscape', () => {
  test.each(ESCAPES)('%s resolves to %d', (text, codePoint) => {
    expect(readEscape(text, 0)._unsafeUnwrap()).toEqual({
      codePoint,
      length: text.length,
    });
  });

  test.each(['#q', '#x4', '#xZZ', '#U00110000', '#'])(
    '%s is an invalid escape',
    (text) => {
      const error = readEscape(text, 0)._unsafeUnwrapErr();
      expect(error.kind).toBe(GrammarErrorKind.InvalidEscape);
    }
  );

  test('error spans are shifted by the base offset', () => {
    const error = readEscape('"#q"', 1, 10, 'r')._unsafeUnwrapErr();
    expect(error.span).toEqual({ from: 11, to: 13 });
    expect(error.ruleName).toBe('r');
  });

  test('escapeLength does not validate', () => {
    expect(escapeLength('#x4"', 0)).toBe(3);
    expect(escapeLength('#n', 0)).toBe(2);
    expect(escapeLength('#', 0)).toBe(1);
  });
});

describe('compileLiteral', () => {
  test('#x41 matches exactly A', () => {
    const matchers = compileLiteral(source('"#x41"'))._unsafeUnwrap();
    expect(matchers).toHaveLength(1);
    expect(matchers[0].matches(cp('A'))).toBe(true);
    expect(matchers[0].matches(cp('B'))).toBe(false);
  });

  test('## matches exactly #', () => {
    const [matcher] = compileLiteral(source("'##'"))._unsafeUnwrap();
    expect(matcher.matches(cp('#'))).toBe(true);
    expect(matcher.matches(cp('x'))).toBe(false);
  });

  test('#n matches exactly a line feed', () => {
    const [matcher] = compileLiteral(source('"#n"'))._unsafeUnwrap();
    expect(matcher.matches(0x0a)).toBe(true);
    expect(matcher.matches(0x0d)).toBe(false);
  });

  test('compiles to one matcher per code point', () => {
    const matchers = compileLiteral(source('"if😀"'))._unsafeUnwrap();
    expect(matchers.map((m) => m.toString())).toEqual(["'i'", "'f'", "'😀'"]);
  });

  test('an empty literal is an error', () => {
    const error = compileLiteral(source('""'))._unsafeUnwrapErr();
    expect(error.kind).toBe(GrammarErrorKind.EmptyLiteral);
    expect(error.ruleName).toBe('r');
  });

  test('invalid escapes inside literals are reported', () => {
    const error = compileLiteral(source('"a#zb"'))._unsafeUnwrapErr();
    expect(error.kind).toBe(GrammarErrorKind.InvalidEscape);
    expect(error.span).toEqual({ from: 2, to: 4 });
  });
});

describe('compileCharacter', () => {
  test('compiles a bare escape', () => {
    const matcher = compileCharacter(source('#t'))._unsafeUnwrap();
    expect(matcher.matches(0x09)).toBe(true);
  });
});

describe('compileCharacterSet', () => {
  test('ranges and single characters', () => {
    const matcher = compileCharacterSet(source('[a-z_]'))._unsafeUnwrap();
    expect(matcher.matches(cp('q'))).toBe(true);
    expect(matcher.matches(cp('_'))).toBe(true);
    expect(matcher.matches(cp('A'))).toBe(false);
  });

  test('negation', () => {
    const matcher = compileCharacterSet(source('[^#n]'))._unsafeUnwrap();
    expect(matcher.matches(cp('a'))).toBe(true);
    expect(matcher.matches(0x0a)).toBe(false);
  });

  test('escaped special characters stand for themselves', () => {
    const matcher = compileCharacterSet(source('[#-#^#]##]'))._unsafeUnwrap();
    expect(['-', '^', ']', '#'].map((c) => matcher.matches(cp(c)))).toEqual([
      true,
      true,
      true,
      true,
    ]);
    expect(matcher.matches(cp('a'))).toBe(false);
  });

  test('[^] matches any code point', () => {
    const matcher = compileCharacterSet(source('[^]'))._unsafeUnwrap();
    expect(matcher.matches(0)).toBe(true);
    expect(matcher.matches(0x1f600)).toBe(true);
  });

  test.each(['[]', '[z-a]', '[a-]', '[a^]', '[-a]'])('%s is a syntax error', (text) => {
    expect(compileCharacterSet(source(text))._unsafeUnwrapErr().kind).toBe(
      GrammarErrorKind.Syntax
    );
  });
});

describe('CodepointMatcher', () => {
  test('merges overlapping and adjacent ranges', () => {
    const matcher = new CodepointMatcher([
      [5, 10],
      [1, 4],
      [8, 12],
    ]);
    expect(matcher.ranges).toEqual([[1, 12]]);
  });

  test('toString', () => {
    expect(CodepointMatcher.single(cp('a')).toString()).toBe("'a'");
    expect(new CodepointMatcher([[cp('a'), cp('z')]], true).toString()).toBe(
      '[^a-z]'
    );
    expect(CodepointMatcher.single(0x0a).toString()).toBe("'#x0a'");
  });
});
