import { MissingContextKeyError } from "./errors.js";

/**
 * Outcome of a {@link RuleContext.get} lookup. The discriminant keeps a stored
 * `undefined`, `0` or `false` distinguishable from an absent key.
 */
export type RuleContextLookup<V> = { found: true; value: V } | { found: false };

/** Accepted seed formats when creating a context. */
export type RuleContextSeed<V> = Iterable<readonly [string, V]> | Readonly<Record<string, V>>;

function isIterableSeed<V>(seed: RuleContextSeed<V>): seed is Iterable<readonly [string, V]> {
  return Symbol.iterator in seed;
}

/**
 * Typed key/value store shared by the rules of a run and by the caller.
 *
 * Each operation is a single synchronous map access, so no lock is ever held
 * across a hook invocation and hooks may call back into the store freely.
 * Code running on other event-loop turns (timers, other requests) observes the
 * store between two accesses, never in the middle of one.
 */
export class RuleContext<V> {
  /** Values are boxed so a stored `undefined` still counts as present. */
  private readonly store = new Map<string, { value: V }>();

  constructor(seed?: RuleContextSeed<V>) {
    if (!seed) {
      return;
    }
    const pairs = isIterableSeed(seed) ? seed : Object.entries(seed);
    for (const [key, value] of pairs) {
      this.store.set(key, { value });
    }
  }

  /** Build a context seeded with the provided pairs or record. */
  static from<V>(seed: RuleContextSeed<V>): RuleContext<V> {
    return new RuleContext<V>(seed);
  }

  /** Look up a key, reporting whether it was present. */
  get(key: string): RuleContextLookup<V> {
    const slot = this.store.get(key);
    if (!slot) {
      return { found: false };
    }
    return { found: true, value: slot.value };
  }

  /** Return the stored value, or `undefined` when absent. */
  peek(key: string): V | undefined {
    return this.store.get(key)?.value;
  }

  /**
   * Return the stored value or throw {@link MissingContextKeyError}. Reserved
   * for keys the caller asserts must exist; a miss is a programming error.
   */
  mustGet(key: string): V {
    const lookup = this.get(key);
    if (!lookup.found) {
      throw new MissingContextKeyError(key);
    }
    return lookup.value;
  }

  /** Insert or replace the value stored under `key`. Last writer wins. */
  set(key: string, value: V): this {
    this.store.set(key, { value });
    return this;
  }

  /** Remove `key`. Returns whether an entry was removed. */
  delete(key: string): boolean {
    return this.store.delete(key);
  }

  exists(key: string): boolean {
    return this.store.has(key);
  }

  /** Snapshot of the keys. Order carries no meaning. */
  keys(): string[] {
    return [...this.store.keys()];
  }

  /** Snapshot of the key/value pairs. */
  entries(): Array<[string, V]> {
    return [...this.store].map(([key, slot]): [string, V] => [key, slot.value]);
  }

  get size(): number {
    return this.store.size;
  }

  /** Plain record mirroring the store, used when logging run results. */
  toJSON(): Record<string, V> {
    return Object.fromEntries(this.entries());
  }
}
