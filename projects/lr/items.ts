import { err, ok, type Result } from 'neverthrow';
import type { Grammar, GSymbol, Production } from '../grammar/grammar.js';
import { HashSet, setsAreEqual, type ConstSet } from '../utils/sets.js';
import { FixpointError } from './errors.js';

export const DOT = '•';

/**
 * An LR(0) item: a production with a marker for how much of its right
 * hand side has been recognized.
 */
export class LRItem {
  readonly production: Production;
  readonly dot: number;

  constructor(production: Production, dot: number) {
    if (dot < 0 || dot > production.symbols.length) {
      throw new RangeError(
        `dot position ${dot} out of range for ${production.toString()}`
      );
    }
    this.production = production;
    this.dot = dot;
  }

  /**
   * The symbol right after the dot, undefined for a complete item
   */
  next(): GSymbol | undefined {
    return this.production.symbols[this.dot];
  }

  isComplete(): boolean {
    return this.dot === this.production.symbols.length;
  }

  advance(): LRItem {
    return new LRItem(this.production, this.dot + 1);
  }

  hash(): string {
    return `${this.production.index}.${this.dot}`;
  }

  equals(other: LRItem): boolean {
    return (
      this.production.index === other.production.index &&
      this.dot === other.dot
    );
  }

  /**
   * Orders items by production index, then dot position.
   */
  static compare(a: LRItem, b: LRItem): number {
    return a.production.index - b.production.index || a.dot - b.dot;
  }

  toString(): string {
    const body = [...this.production.symbols];
    body.splice(this.dot, 0, DOT);
    return `${this.production.rule} → ${body.join(' ')}`;
  }

  /**
   * Read an item back from the form {@link LRItem.toString} writes.
   */
  static parse(text: string, grammar: Grammar): Result<LRItem, Error> {
    const arrow = text.indexOf('→');
    if (arrow < 0) {
      return err(new Error(`missing '→' in item '${text}'`));
    }
    const rule = text.slice(0, arrow).trim();
    const body = text
      .slice(arrow + 1)
      .split(/\s+/)
      .filter((s) => s.length > 0);
    const dot = body.indexOf(DOT);
    if (dot < 0 || body.lastIndexOf(DOT) !== dot) {
      return err(new Error(`item '${text}' must contain exactly one '${DOT}'`));
    }
    body.splice(dot, 1);
    const production = grammar
      .productionsFrom(rule)
      .find(
        (p) =>
          p.symbols.length === body.length &&
          p.symbols.every((s, i) => s === body[i])
      );
    if (!production) {
      return err(new Error(`no production matches item '${text}'`));
    }
    return ok(new LRItem(production, dot));
  }
}

/**
 * A set of LR(0) items. Two item sets are equal when they hold the same
 * items, whatever order they were added in.
 */
/**
 * The view of an item set a finished automaton state hands out.
 */
export type ReadonlyItemSet = ConstSet<LRItem> &
  Pick<ItemSet, 'sorted' | 'key' | 'equals' | 'isFrozen' | 'toString'>;

export class ItemSet implements ConstSet<LRItem> {
  private items: HashSet<LRItem>;
  private frozen = false;

  constructor(items: Iterable<LRItem> = []) {
    this.items = new HashSet((item) => item.hash(), items);
  }

  get size(): number {
    return this.items.size;
  }

  has(item: LRItem): boolean {
    return this.items.has(item);
  }

  /**
   * @returns whether the item was not already in the set
   */
  add(item: LRItem): boolean {
    if (this.frozen) {
      throw new Error(`cannot add ${item} to a frozen item set`);
    }
    const before = this.items.size;
    this.items.add(item);
    return this.items.size !== before;
  }

  [Symbol.iterator]() {
    return this.items.values();
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  /**
   * Stop accepting new items.
   */
  freeze(): ReadonlyItemSet {
    this.frozen = true;
    return this;
  }

  /**
   * The items ordered by production index, then dot position.
   */
  sorted(): LRItem[] {
    return [...this.items].sort(LRItem.compare);
  }

  /**
   * A string that is the same for every set holding the same items.
   */
  key(): string {
    return this.sorted()
      .map((item) => item.hash())
      .join(',');
  }

  equals(other: ConstSet<LRItem>): boolean {
    return setsAreEqual(this, other);
  }

  toString(): string {
    return this.sorted()
      .map((item) => item.toString())
      .join('\n');
  }
}

/**
 * For every item whose dot precedes a non-terminal B, add [B → •γ] for
 * each production of B, repeating full passes until one adds nothing.
 */
export function closure(grammar: Grammar, items: Iterable<LRItem>): ItemSet {
  const result = new ItemSet(items);
  // each pass that changes something adds an item, and there are only
  // grammar.itemCount of them
  const bound = grammar.itemCount + 1;
  let passes = 0;
  let changed = true;
  while (changed) {
    if (++passes > bound) {
      throw new FixpointError('closure', bound);
    }
    changed = false;
    for (const item of [...result]) {
      const B = item.next();
      if (B === undefined || !grammar.isNonTerminal(B)) {
        continue;
      }
      for (const production of grammar.productionsFrom(B)) {
        if (result.add(new LRItem(production, 0))) {
          changed = true;
        }
      }
    }
  }
  return result;
}

/**
 * Advance the dot over `symbol` in every item that allows it and close
 * the result. Empty when no item advances.
 */
export function goto(
  grammar: Grammar,
  items: Iterable<LRItem>,
  symbol: GSymbol
): ItemSet {
  const kernel: LRItem[] = [];
  for (const item of items) {
    if (item.next() === symbol) {
      kernel.push(item.advance());
    }
  }
  if (kernel.length === 0) {
    return new ItemSet();
  }
  return closure(grammar, kernel);
}
