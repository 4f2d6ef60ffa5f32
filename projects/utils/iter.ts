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

  toArray(): T[] {
    return [...this];
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

export function iter<T>(iterable: Iterable<T> = []): Iter<T> {
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
  next(): IteratorResult<O, undefined> {
    const next = this.iterator.next();
    if (next.done) {
      return { done: true, value: undefined };
    }
    return { value: this.mapper(next.value), done: false };
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
  next(): IteratorResult<T, undefined> {
    let next = this.iterator.next();
    while (!next.done) {
      if (this.predicate(next.value)) {
        return next;
      }
      next = this.iterator.next();
    }
    return { done: true, value: undefined };
  }
}
