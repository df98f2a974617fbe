import type { DynamicOps } from './dynamic-ops.ts';
import { NodeMap } from './lib/node-map.ts';

/**
 * Returned by {@link KeyCompressor.compress} for a key it does not know.
 */
export const UNKNOWN_KEY = -1;

/**
 * A two-way table between record keys and list positions, used by formats
 * that write records as lists.
 *
 * Keys are matched with `ops.equals`. The first occurrence of a repeated key
 * wins.
 */
export class KeyCompressor<T> {
  private readonly ops: DynamicOps<T>;
  private readonly compressed: NodeMap<T, number>;
  private readonly compressedString = new Map<string, number>();
  private readonly decompressed: T[] = [];

  constructor(ops: DynamicOps<T>, keys: Iterable<T>) {
    this.ops = ops;
    this.compressed = new NodeMap<T, number>((a, b) => ops.equals(a, b));
    for (const key of keys) {
      if (this.compressed.has(key)) {
        continue;
      }
      const index = this.decompressed.length;
      this.decompressed.push(key);
      this.compressed.set(key, index);
      const name = ops.getStringValue(key);
      if (name.kind === 'success' && !this.compressedString.has(name.value)) {
        this.compressedString.set(name.value, index);
      }
    }
  }

  decompress(index: number): T | undefined {
    return this.decompressed[index];
  }

  compress(key: T): number {
    return this.compressed.get(key) ?? UNKNOWN_KEY;
  }

  compressString(key: string): number {
    return this.compressedString.get(key) ?? this.compress(this.ops.createString(key));
  }

  size(): number {
    return this.decompressed.length;
  }
}
