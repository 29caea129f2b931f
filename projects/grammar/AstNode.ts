import type { LexToken, Span } from '../lexer-gen/LexToken.js';
import { colors } from '../utils/debug.js';
import { iter, type Iter } from '../utils/iter.js';

export type AstChild = AstNode | LexToken<string>;

export type AstJSON = {
  ruleName: string;
  variantTag: string;
  span: Span;
  children: (AstJSON | { token: string; substr: string; span: Span })[];
};

export class AstNode {
  readonly ruleName: string;
  /** the top-level alternative of the rule that produced this node */
  readonly variantTag: string;
  readonly children: readonly AstChild[];
  readonly span: Span;

  constructor(
    ruleName: string,
    variantTag: string,
    children: readonly AstChild[],
    span: Span
  ) {
    this.ruleName = ruleName;
    this.variantTag = variantTag;
    this.children = children;
    this.span = span;
  }

  /**
   * Iterator over every node in the tree, depth first, starting with this one
   */
  iterTree(): Iter<AstNode> {
    return iter<AstNode>([this]).chain(
      ...this.children
        .filter((c): c is AstNode => c instanceof AstNode)
        .map((c) => c.iterTree())
    );
  }

  /**
   * Every token under this node, in input order
   */
  tokens(): LexToken<string>[] {
    return this.children.flatMap((c) => (c instanceof AstNode ? c.tokens() : [c]));
  }

  text(input: string): string {
    return input.slice(this.span.from, this.span.to);
  }

  toJSON(): AstJSON {
    return {
      ruleName: this.ruleName,
      variantTag: this.variantTag,
      span: this.span,
      children: this.children.map((c) =>
        c instanceof AstNode
          ? c.toJSON()
          : { token: c.token, substr: c.substr, span: c.span }
      ),
    };
  }

  pretty(indent: string = ''): string {
    let out = '';
    if (indent == '') {
      out += '\n';
    }
    const tag = colors.blue(`${this.ruleName}:${this.variantTag}`);
    out += `${indent}<${tag}>\n`;
    const childIndent = indent + '|  ';
    this.children.forEach((child) => {
      out +=
        child instanceof AstNode
          ? child.pretty(childIndent)
          : `${childIndent}${child.toString()}\n`;
    });
    out += `${indent}</${tag}>\n`;
    return out;
  }

  toString(): string {
    return `${this.ruleName}[${this.children.map((c) => c.toString()).join(', ')}]`;
  }
}
