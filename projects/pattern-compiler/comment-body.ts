export const COMMENT_OPEN = '/*';
export const DOC_OPEN = '/**';

export type CommentBody = {
  /** offset just past the last body character */
  bodyEnd: number;
  /** offset just past the closing `*\/` */
  end: number;
};

/**
 * Matches a block comment body starting at `from` (just past the opener).
 *
 * Consumes single non-`*` characters, or runs of `*` that are not followed by
 * `/`. A run of `*` that is followed by `/` closes the comment; those stars
 * belong to the terminator, not the body. Returns undefined when the input
 * ends before the comment is closed.
 */
export function matchCommentBody(
  text: string,
  from: number
): CommentBody | undefined {
  let i = from;
  while (i < text.length) {
    if (text[i] !== '*') {
      i++;
      continue;
    }
    let run = i;
    while (text[run] === '*') {
      run++;
    }
    if (text[run] === '/') {
      return { bodyEnd: i, end: run + 1 };
    }
    i = run;
  }
  return undefined;
}

export type Comment = {
  doc: boolean;
  body: string;
  end: number;
};

/**
 * Matches a whole `/* ... *\/` or `/** ... *\/` comment at `offset`.
 *
 * Returns null when there is no comment opener at `offset`, and undefined
 * when the comment is never closed.
 */
export function matchComment(
  text: string,
  offset: number
): Comment | null | undefined {
  if (!text.startsWith(COMMENT_OPEN, offset)) {
    return null;
  }
  // `/**/` is an empty plain comment, not the start of a docstring
  const doc =
    text.startsWith(DOC_OPEN, offset) && text[offset + DOC_OPEN.length] !== '/';
  const from = offset + (doc ? DOC_OPEN.length : COMMENT_OPEN.length);
  const match = matchCommentBody(text, from);
  if (!match) {
    return undefined;
  }
  return { doc, body: text.slice(from, match.bodyEnd), end: match.end };
}

/**
 * Strips the `*` gutter and surrounding blank lines from a docstring body.
 * The first line follows the opening `/**` and never has a gutter; the
 * others only do when every one that is not blank starts with `*`.
 */
export function cleanDocComment(body: string): string {
  const [first, ...rest] = body.split('\n');
  const gutter =
    rest.length > 0 &&
    rest.every((line) => line.trim() === '' || /^\s*\*/.test(line));
  const margin = gutter ? /^\s*(\* ?)?/ : /^\s*/;
  const lines = [
    first.replace(/^\s*/, '').trimEnd(),
    ...rest.map((line) => line.replace(margin, '').trimEnd()),
  ];
  while (lines.length > 0 && lines[0] === '') {
    lines.shift();
  }
  while (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines.join('\n');
}
