import type { Pair } from './pair.ts';

function isPrimitive(value: unknown): boolean {
  return value === null || (typeof value !== 'object' && typeof value !== 'function');
}

/**
 * An insertion-ordered map keyed by tree nodes.
 *
 * Primitive keys are looked up directly; object keys are compared with
 * `equals`, so two separately built nodes holding the same data find the same
 * entry. Setting an existing key replaces its value in place.
 */
export class NodeMap<K, V> implements Iterable<Pair<K, V>> {
  private readonly equals: (a: K, b: K) => boolean;
  private readonly keys: K[] = [];
  private readonly values: V[] = [];
  private readonly primitives = new Map<K, number>();

  constructor(equals: (a: K, b: K) => boolean) {
    this.equals = equals;
  }

  get size(): number {
    return this.keys.length;
  }

  private indexOf(key: K): number {
    if (isPrimitive(key)) {
      return this.primitives.get(key) ?? -1;
    }
    return this.keys.findIndex((candidate) => !isPrimitive(candidate) && this.equals(candidate, key));
  }

  has(key: K): boolean {
    return this.indexOf(key) >= 0;
  }

  get(key: K): V | undefined {
    const index = this.indexOf(key);
    return index < 0 ? undefined : this.values[index];
  }

  set(key: K, value: V): this {
    const index = this.indexOf(key);
    if (index >= 0) {
      this.values[index] = value;
      return this;
    }
    if (isPrimitive(key)) {
      this.primitives.set(key, this.keys.length);
    }
    this.keys.push(key);
    this.values.push(value);
    return this;
  }

  *[Symbol.iterator](): Iterator<Pair<K, V>> {
    for (let i = 0; i < this.keys.length; i++) {
      yield [this.keys[i], this.values[i]];
    }
  }
}
