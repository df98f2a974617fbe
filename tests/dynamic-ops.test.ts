import { describe, it, expect } from 'vitest';
import {
  BaseDynamicOps,
  DataResult,
  Dynamic,
  JsonOps,
  KeyCompressor,
  encodeStart,
  fieldOf,
  int,
  long,
  object,
  optionalFieldOf,
  parse,
  passthrough,
  toCodec,
  type DynamicOps,
  type Pair,
} from 'polycodec';

// A format whose every node, the empty one included, is a fresh object.
type Node =
  | { t: 'empty' }
  | { t: 'num'; v: number }
  | { t: 'str'; v: string }
  | { t: 'list'; v: Node[] }
  | { t: 'map'; v: [Node, Node][] };

class BoxedOps extends BaseDynamicOps<Node> {
  static readonly INSTANCE = new BoxedOps(false);
  static readonly COMPRESSED = new BoxedOps(true);

  private readonly compressed: boolean;

  private constructor(compressed: boolean) {
    super();
    this.compressed = compressed;
  }

  empty(): Node {
    return { t: 'empty' };
  }

  convertTo<U>(outOps: DynamicOps<U>, input: Node): U {
    switch (input.t) {
      case 'empty':
        return outOps.empty();
      case 'num':
        return outOps.createNumeric(input.v);
      case 'str':
        return outOps.createString(input.v);
      case 'list':
        return this.convertList(outOps, input);
      case 'map':
        return this.convertMap(outOps, input);
    }
  }

  getNumberValue(input: Node): DataResult<number> {
    return input.t === 'num' ? DataResult.success(input.v) : DataResult.error(() => `Not a number: ${this.describe(input)}`);
  }

  createNumeric(value: number): Node {
    return { t: 'num', v: value };
  }

  getStringValue(input: Node): DataResult<string> {
    return input.t === 'str' ? DataResult.success(input.v) : DataResult.error(() => `Not a string: ${this.describe(input)}`);
  }

  createString(value: string): Node {
    return { t: 'str', v: value };
  }

  mergeToList(list: Node, value: Node): DataResult<Node> {
    if (list.t === 'empty') {
      return DataResult.success<Node>({ t: 'list', v: [value] });
    }
    if (list.t === 'list') {
      return DataResult.success<Node>({ t: 'list', v: [...list.v, value] });
    }
    return DataResult.errorWithPartial(() => `Not a list: ${this.describe(list)}`, list);
  }

  mergeToMap(map: Node, key: Node, value: Node): DataResult<Node> {
    if (map.t === 'empty') {
      return DataResult.success<Node>({ t: 'map', v: [[key, value]] });
    }
    if (map.t === 'map') {
      const kept = map.v.filter(([k]) => !this.equals(k, key));
      return DataResult.success<Node>({ t: 'map', v: [...kept, [key, value]] });
    }
    return DataResult.errorWithPartial(() => `Not a map: ${this.describe(map)}`, map);
  }

  getMapValues(input: Node): DataResult<Pair<Node, Node>[]> {
    return input.t === 'map'
      ? DataResult.success<Pair<Node, Node>[]>(input.v)
      : DataResult.error(() => `Not a map: ${this.describe(input)}`);
  }

  createMap(entries: Iterable<Pair<Node, Node>>): Node {
    return { t: 'map', v: Array.from(entries, ([key, value]): [Node, Node] => [key, value]) };
  }

  getStream(input: Node): DataResult<Node[]> {
    return input.t === 'list' ? DataResult.success(input.v) : DataResult.error(() => `Not a list: ${this.describe(input)}`);
  }

  createList(values: Iterable<Node>): Node {
    return { t: 'list', v: Array.from(values) };
  }

  remove(input: Node, key: string): Node {
    if (input.t !== 'map') {
      return input;
    }
    const removed = this.createString(key);
    return { t: 'map', v: input.v.filter(([k]) => !this.equals(k, removed)) };
  }

  override compressMaps(): boolean {
    return this.compressed;
  }

  toString(): string {
    return 'Boxed';
  }
}

const ops = BoxedOps.INSTANCE;
const str = (v: string): Node => ({ t: 'str', v });
const num = (v: number): Node => ({ t: 'num', v });

const Point = toCodec(object({ x: fieldOf(int, 'x'), y: optionalFieldOf(int, 'y') }));

describe('DynamicOps with object nodes', () => {
  describe('records', () => {
    it('should find fields by a key built separately from the input', () => {
      const input: Node = { t: 'map', v: [[str('x'), num(5)]] };
      expect(DataResult.getOrThrow(parse(Point, ops, input))).toEqual({ x: 5, y: undefined });
    });

    it('should write records into a fresh empty node', () => {
      const encoded = DataResult.getOrThrow(encodeStart(Point, ops, { x: 1, y: 2 }));
      expect(encoded).toEqual({
        t: 'map',
        v: [
          [str('x'), num(1)],
          [str('y'), num(2)],
        ],
      });
      expect(DataResult.getOrThrow(parse(Point, ops, encoded))).toEqual({ x: 1, y: 2 });
    });

    it('should reject a map that repeats a key', () => {
      const input: Node = {
        t: 'map',
        v: [
          [str('a'), num(1)],
          [str('a'), num(2)],
        ],
      };
      expect(DataResult.message(ops.getMap(input))).toBe('Error while building map: Duplicate key {"t":"str","v":"a"}');
    });

    it('should keep the last value of a key added twice to a builder', () => {
      const built = ops.mapBuilder().add(str('a'), num(1)).add(str('a'), num(2)).build(ops.empty());
      expect(DataResult.getOrThrow(built)).toEqual({ t: 'map', v: [[str('a'), num(2)]] });
    });
  });

  describe('compressed records', () => {
    const compressed = BoxedOps.COMPRESSED;

    it('should write fields into their slots', () => {
      expect(DataResult.getOrThrow(encodeStart(Point, compressed, { x: 1, y: 2 }))).toEqual({
        t: 'list',
        v: [num(1), num(2)],
      });
    });

    it('should read an empty slot as an absent field', () => {
      const encoded = DataResult.getOrThrow(encodeStart(Point, compressed, { x: 1, y: undefined }));
      expect(encoded).toEqual({ t: 'list', v: [num(1), { t: 'empty' }] });
      const decoded = DataResult.getOrThrow(parse(Point, compressed, encoded));
      expect(decoded.x).toBe(1);
      expect(decoded.y).toBeUndefined();
    });

    it('should match key nodes by value in the key compressor', () => {
      const compressor = new KeyCompressor(compressed, [str('a'), str('b'), str('a')]);
      expect(compressor.size()).toBe(2);
      expect(compressor.compress(str('b'))).toBe(1);
      expect(compressor.compressString('a')).toBe(0);
      expect(compressor.compress(str('c'))).toBe(-1);
    });
  });

  describe('primitives', () => {
    it('should merge a primitive only into an empty node', () => {
      expect(DataResult.getOrThrow(ops.mergeToPrimitive(ops.empty(), num(3)))).toEqual(num(3));
      expect(DataResult.message(ops.mergeToPrimitive(ops.emptyList(), num(3)))).toBe(
        'Do not know how to append a primitive value {"t":"num","v":3} to {"t":"list","v":[]}'
      );
    });

    it('should write longs outside the safe integer range as text', () => {
      const big = 2n ** 60n + 1n;
      const encoded = DataResult.getOrThrow(encodeStart(long, ops, big));
      expect(encoded).toEqual(str('1152921504606846977'));
      expect(DataResult.getOrThrow(parse(long, ops, encoded))).toBe(big);
      expect(DataResult.getOrThrow(encodeStart(long, ops, 5n))).toEqual(num(5));
    });
  });

  describe('passthrough', () => {
    const prefix: Node = { t: 'map', v: [[str('a'), num(1)]] };

    it('should leave the prefix alone for an empty node', () => {
      expect(DataResult.getOrThrow(passthrough.encode(new Dynamic(ops), ops, prefix))).toBe(prefix);
    });

    it('should write the node as it is into an empty prefix', () => {
      const value: Node = { t: 'map', v: [[str('b'), num(2)]] };
      expect(DataResult.getOrThrow(passthrough.encode(new Dynamic(ops, value), ops, ops.empty()))).toEqual(value);
    });

    it('should merge a map into the prefix', () => {
      const value: Node = { t: 'map', v: [[str('b'), num(2)]] };
      expect(DataResult.getOrThrow(passthrough.encode(new Dynamic(ops, value), ops, prefix))).toEqual({
        t: 'map',
        v: [
          [str('a'), num(1)],
          [str('b'), num(2)],
        ],
      });
    });
  });

  describe('conversion', () => {
    it('should convert to and from JSON', () => {
      const boxed = JsonOps.INSTANCE.convertTo(ops, { a: 1, b: ['x'] });
      expect(boxed).toEqual({
        t: 'map',
        v: [
          [str('a'), num(1)],
          [str('b'), { t: 'list', v: [str('x')] }],
        ],
      });
      expect(ops.convertTo(JsonOps.INSTANCE, boxed)).toEqual({ a: 1, b: ['x'] });
    });
  });
});
