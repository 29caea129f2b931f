export type CodepointRange = readonly [from: number, to: number];

export const MAX_CODE_POINT = 0x10ffff;

function normalize(ranges: Iterable<CodepointRange>): CodepointRange[] {
  const sorted = [...ranges].sort((a, b) => a[0] - b[0] || a[1] - b[1]);
  const merged: [number, number][] = [];
  for (const [from, to] of sorted) {
    const last = merged[merged.length - 1];
    if (last && from <= last[1] + 1) {
      last[1] = Math.max(last[1], to);
    } else {
      merged.push([from, to]);
    }
  }
  return merged;
}

function describeCodePoint(codePoint: number): string {
  if (codePoint < 0x20 || codePoint === 0x7f) {
    return `#x${codePoint.toString(16).padStart(2, '0')}`;
  }
  const char = String.fromCodePoint(codePoint);
  return '#^-]'.includes(char) ? `#${char}` : char;
}

/**
 * A predicate over a single code point: a union of inclusive ranges,
 * optionally negated.
 */
export class CodepointMatcher {
  readonly ranges: readonly CodepointRange[];
  readonly negated: boolean;

  constructor(ranges: Iterable<CodepointRange>, negated = false) {
    this.ranges = normalize(ranges);
    this.negated = negated;
  }

  static single(codePoint: number) {
    return new CodepointMatcher([[codePoint, codePoint]]);
  }

  static any() {
    return new CodepointMatcher([], true);
  }

  matches(codePoint: number): boolean {
    let lo = 0;
    let hi = this.ranges.length - 1;
    while (lo <= hi) {
      const mid = (lo + hi) >> 1;
      const [from, to] = this.ranges[mid];
      if (codePoint < from) {
        hi = mid - 1;
      } else if (codePoint > to) {
        lo = mid + 1;
      } else {
        return !this.negated;
      }
    }
    return this.negated;
  }

  toString(): string {
    if (!this.negated && this.ranges.length === 1) {
      const [from, to] = this.ranges[0];
      if (from === to) {
        return `'${describeCodePoint(from)}'`;
      }
    }
    const entries = this.ranges
      .map(([from, to]) =>
        from === to
          ? describeCodePoint(from)
          : `${describeCodePoint(from)}-${describeCodePoint(to)}`
      )
      .join('');
    return `[${this.negated ? '^' : ''}${entries}]`;
  }
}
