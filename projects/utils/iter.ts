export abstract class Iter<T> implements IterableIterator<T> {
  [Symbol.iterator]() {
    return this;
  }

  abstract next(): IteratorResult<T>;

  map<O>(mapper: (i: T) => O): Iter<O> {
    return new MapIter(this, mapper);
  }

  filter(predicate: (i: T) => boolean): Iter<T> {
    return new FilterIter(this, predicate);
  }

  chain(...iters: Iter<T>[]): Iter<T> {
    return new ChainIter(this, ...iters);
  }

  first(): T | undefined {
    const next = this.next();
    return next.done ? undefined : next.value;
  }

  toArray(): T[] {
    return [...this];
  }

  join(sep: string): string {
    return this.toArray().join(sep);
  }
}

class PlainIter<T> extends Iter<T> {
  private iterator: Iterator<T>;
  constructor(iterable: Iterable<T>) {
    super();
    this.iterator = iterable[Symbol.iterator]();
  }
  next() {
    return this.iterator.next();
  }
}

export function iter<T>(iterable: Iterable<T> = []) {
  return new PlainIter(iterable);
}

class ChainIter<T> extends Iter<T> {
  private iters: Iterator<T>[];
  constructor(...iters: Iterator<T>[]) {
    super();
    this.iters = iters;
  }
  next(): IteratorResult<T, undefined> {
    while (this.iters.length > 0) {
      const next = this.iters[0].next();
      if (next.done) {
        this.iters.shift();
      } else {
        return next;
      }
    }
    return { done: true, value: undefined };
  }
}

class MapIter<I, O> extends Iter<O> {
  private iterator: Iterator<I>;
  private mapper: (i: I) => O;
  constructor(iterable: Iterable<I>, mapper: (i: I) => O) {
    super();
    this.iterator = iterable[Symbol.iterator]();
    this.mapper = mapper;
  }
  next(): IteratorResult<O> {
    const result = this.iterator.next();
    if (result.done) {
      return { done: true, value: undefined };
    }
    return { value: this.mapper(result.value), done: false };
  }
}

class FilterIter<T> extends Iter<T> {
  private iterator: Iterator<T>;
  private predicate: (i: T) => boolean;
  constructor(iterable: Iterable<T>, predicate: (i: T) => boolean) {
    super();
    this.iterator = iterable[Symbol.iterator]();
    this.predicate = predicate;
  }
  next(): IteratorResult<T> {
    let result = this.iterator.next();
    while (!result.done && !this.predicate(result.value)) {
      result = this.iterator.next();
    }
    return result;
  }
}

/**
 * Reads the code point starting at `offset`, combining surrogate pairs.
 * `width` is the number of UTF-16 units the code point occupies.
 */
export function codePointAt(
  input: string,
  offset: number
): { codePoint: number; width: number } | undefined {
  const codePoint = input.codePointAt(offset);
  if (codePoint === undefined) {
    return undefined;
  }
  return { codePoint, width: codePoint > 0xffff ? 2 : 1 };
}
