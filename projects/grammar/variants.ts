import { err, ok, type Result } from 'neverthrow';
import { GrammarError, GrammarErrorKind } from '../errors.js';
import type { Span } from '../lexer-gen/LexToken.js';
import { OrderedMap } from '../utils/data-structures/OrderedMap.js';
import type { Iter } from '../utils/iter.js';
import type { RuleSet } from './rule.js';

export type Variant = {
  tag: string;
  /** index of the alternative among all merged alternatives of the rule */
  index: number;
  explicit: boolean;
  doc?: string;
};

/**
 * Describes the tree nodes one production rule produces: one variant per
 * top-level alternative.
 */
export type NodeType = {
  ruleName: string;
  doc?: string;
  variants: readonly Variant[];
};

export const generatedVariantName = (ruleName: string, index: number) =>
  `${ruleName}_${index}`;

export const duplicateVariant = (ruleName: string, tag: string, span: Span) =>
  new GrammarError(
    GrammarErrorKind.DuplicateVariantName,
    `variant name ${tag} is used more than once`,
    { ruleName, span }
  );

export class VariantTable {
  private nodeTypes: OrderedMap<string, NodeType>;

  constructor(nodeTypes: OrderedMap<string, NodeType>) {
    this.nodeTypes = nodeTypes;
  }

  get(ruleName: string): NodeType | undefined {
    return this.nodeTypes.get(ruleName);
  }

  tagOf(ruleName: string, index: number): string {
    return (
      this.nodeTypes.get(ruleName)?.variants[index]?.tag ??
      generatedVariantName(ruleName, index)
    );
  }

  [Symbol.iterator](): Iter<NodeType> {
    return this.nodeTypes.values();
  }
}

/**
 * Assign a variant tag to every top-level alternative of every production
 * rule. Names written with `->` are kept; the rest are generated from the
 * rule name and position.
 */
export function tagVariants(rules: RuleSet): Result<VariantTable, GrammarError> {
  const nodeTypes: OrderedMap<string, NodeType> = new OrderedMap();
  for (const rule of rules.productions()) {
    const seen = new Set<string>();
    const variants: Variant[] = [];
    for (const [index, alternative] of rule.definitions.entries()) {
      const tag = alternative.name ?? generatedVariantName(rule.name, index);
      if (seen.has(tag)) {
        return err(duplicateVariant(rule.name, tag, alternative.span));
      }
      seen.add(tag);
      variants.push({
        tag,
        index,
        explicit: alternative.name !== undefined,
        doc: alternative.doc,
      });
    }
    nodeTypes.push(rule.name, { ruleName: rule.name, doc: rule.doc, variants });
  }
  return ok(new VariantTable(nodeTypes));
}
