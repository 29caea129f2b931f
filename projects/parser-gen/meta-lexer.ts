import { err, ok, type Result } from 'neverthrow';
import { GrammarError } from '../errors.js';
import { LexToken } from '../lexer-gen/LexToken.js';
import { cleanDocComment, matchComment } from '../pattern-compiler/comment-body.js';
import { ESCAPE_CHAR, escapeLength } from '../pattern-compiler/escapes.js';

export enum MetaToken {
  SYMBOL = 'SYMBOL',
  PRODUCTION = '::=',
  TOKEN_RULE = ':==',
  SEMI = ';',
  OR = '|',
  ARROW = '->',
  OPEN_PAREN = '(',
  CLOSE_PAREN = ')',
  MAYBE = '?',
  ANY = '*',
  MANY = '+',
  STRING = 'STRING',
  CHARSET = 'CHARSET',
  CHAR = 'CHAR',
  DOC = 'DOC',
}

/**
 * A token of the meta-grammar. For DOC tokens `substr` holds the cleaned
 * docstring text while `span` covers the whole comment.
 */
export type MetaLexeme = LexToken<MetaToken>;

// longest operators first
const PUNCTUATION: [string, MetaToken][] = [
  ['::=', MetaToken.PRODUCTION],
  [':==', MetaToken.TOKEN_RULE],
  ['->', MetaToken.ARROW],
  [';', MetaToken.SEMI],
  ['|', MetaToken.OR],
  ['(', MetaToken.OPEN_PAREN],
  [')', MetaToken.CLOSE_PAREN],
  ['?', MetaToken.MAYBE],
  ['*', MetaToken.ANY],
  ['+', MetaToken.MANY],
];

const SYMBOL_START = /[A-Za-z_]/;
const SYMBOL_PART = /[A-Za-z0-9_]/;
const WHITESPACE = /[ \t\r\n]/;

function symbolEnd(text: string, offset: number): number {
  let i = offset + 1;
  while (i < text.length) {
    if (SYMBOL_PART.test(text[i])) {
      i++;
    } else if (text[i] === '-' && SYMBOL_PART.test(text.charAt(i + 1))) {
      i += 2;
    } else {
      break;
    }
  }
  return i;
}

/**
 * Finds the offset just past the closing delimiter of a quoted literal or
 * character set, honoring escapes. Undefined when unterminated.
 */
function delimitedEnd(
  text: string,
  offset: number,
  close: string
): number | undefined {
  let i = offset + 1;
  while (i < text.length) {
    const char = text[i];
    if (char === ESCAPE_CHAR) {
      i += escapeLength(text, i);
    } else if (char === close) {
      return i + 1;
    } else if (char === '\n' && close !== ']') {
      return undefined;
    } else {
      i++;
    }
  }
  return undefined;
}

/**
 * Splits grammar source into meta tokens, skipping whitespace and plain
 * comments.
 */
export function lexGrammar(text: string): Result<MetaLexeme[], GrammarError> {
  const tokens: MetaLexeme[] = [];
  const push = (token: MetaToken, from: number, to: number, substr?: string) =>
    tokens.push(
      new LexToken(token, { from, to }, substr ?? text.slice(from, to))
    );

  let offset = 0;
  outer: while (offset < text.length) {
    const char = text[offset];
    if (WHITESPACE.test(char)) {
      offset++;
      continue;
    }

    const comment = matchComment(text, offset);
    if (comment === undefined) {
      return err(
        GrammarError.syntax('unterminated comment', {
          span: { from: offset, to: text.length },
        })
      );
    }
    if (comment !== null) {
      if (comment.doc) {
        push(MetaToken.DOC, offset, comment.end, cleanDocComment(comment.body));
      }
      offset = comment.end;
      continue;
    }

    if (SYMBOL_START.test(char)) {
      const end = symbolEnd(text, offset);
      push(MetaToken.SYMBOL, offset, end);
      offset = end;
      continue;
    }

    if (char === '"' || char === "'" || char === '[') {
      const end = delimitedEnd(text, offset, char === '[' ? ']' : char);
      if (end === undefined) {
        return err(
          GrammarError.syntax(
            char === '[' ? 'unterminated character set' : 'unterminated string',
            { span: { from: offset, to: offset + 1 } }
          )
        );
      }
      push(char === '[' ? MetaToken.CHARSET : MetaToken.STRING, offset, end);
      offset = end;
      continue;
    }

    if (char === ESCAPE_CHAR) {
      const end = offset + escapeLength(text, offset);
      push(MetaToken.CHAR, offset, end);
      offset = end;
      continue;
    }

    for (const [punctuation, token] of PUNCTUATION) {
      if (text.startsWith(punctuation, offset)) {
        push(token, offset, offset + punctuation.length);
        offset += punctuation.length;
        continue outer;
      }
    }

    return err(
      GrammarError.syntax(`unexpected character ${JSON.stringify(char)}`, {
        span: { from: offset, to: offset + 1 },
      })
    );
  }
  return ok(tokens);
}
