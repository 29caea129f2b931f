import { colors } from '../utils/debug.js';

/** Half-open range of UTF-16 offsets into the text that was read. */
export type Span = { from: number; to: number };

/**
 * One match of a token rule. `token` is the name of the rule that matched:
 * a rule from the grammar, a synthetic rule named after its literal (for
 * example `"if"`), or one of the meta-grammar's own tokens.
 */
export class LexToken<Name = string> {
  readonly token: Name;
  readonly span: Span;
  /** the matched text */
  readonly substr: string;

  constructor(token: Name, span: Span, substr: string) {
    this.token = token;
    this.span = span;
    this.substr = substr;
  }

  toString() {
    const name = String(this.token);
    return colors.green(`<${name}>`) + this.substr + colors.green(`</${name}>`);
  }
}
