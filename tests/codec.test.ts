import { describe, it, expect, vi } from 'vitest';
import {
  c,
  DataResult,
  Either,
  JsonOps,
  Lifecycle,
  bool,
  boundedString,
  byte,
  byteBuffer,
  double,
  encodeStart,
  flatXmap,
  int,
  intRange,
  intStream,
  listOf,
  long,
  orElse,
  parse,
  promotePartial,
  string,
  stringResolver,
  unit,
  withAlternative,
  xmap,
  type Codec,
} from 'polycodec';
import assert from 'node:assert';

const ops = JsonOps.INSTANCE;

function roundTrip<A>(codec: Codec<A>, value: A): A {
  const encoded = DataResult.getOrThrow(encodeStart(codec, ops, value));
  return DataResult.getOrThrow(parse(codec, ops, encoded));
}

describe('Codecs', () => {
  describe('primitives', () => {
    it('should round-trip every primitive', () => {
      expect(roundTrip(bool, true)).toBe(true);
      expect(roundTrip(int, 42)).toBe(42);
      expect(roundTrip(double, 1.5)).toBe(1.5);
      expect(roundTrip(string, 'hello')).toBe('hello');
      expect(roundTrip(long, 12n)).toBe(12n);
      expect(roundTrip(intStream, [1, 2, 3])).toEqual([1, 2, 3]);
    });

    it('should keep longs outside the safe integer range exact', () => {
      const big = 2n ** 60n + 1n;
      const encoded = DataResult.getOrThrow(encodeStart(long, ops, big));
      expect(encoded).toBe('1152921504606846977');
      expect(DataResult.getOrThrow(parse(long, ops, encoded))).toBe(big);
      expect(roundTrip(long, -big)).toBe(-big);
      expect(DataResult.getOrThrow(encodeStart(long, ops, 2n ** 53n - 1n))).toBe(9007199254740991);

      const compressed = JsonOps.COMPRESSED;
      const written = DataResult.getOrThrow(encodeStart(long, compressed, big));
      expect(DataResult.getOrThrow(parse(long, compressed, written))).toBe(big);
    });

    it('should wrap longs to 64 bits and reject numbers it cannot read exactly', () => {
      expect(roundTrip(long, 2n ** 63n)).toBe(-(2n ** 63n));
      expect(DataResult.message(parse(long, ops, 1e300))).toBe('Not a safe integer: 1e+300');
      expect(DataResult.getOrThrow(parse(long, ops, 7.9))).toBe(7n);
    });

    it('should keep every element of a long list exact', () => {
      const encoded = ops.createLongList([1n, 2n ** 60n + 1n]);
      expect(encoded).toEqual([1, '1152921504606846977']);
      expect(DataResult.getOrThrow(ops.getLongStream(encoded))).toEqual([1n, 2n ** 60n + 1n]);
      expect(DataResult.message(ops.getLongStream([1, 'x']))).toBe('Some elements are not longs: [1,"x"]');
    });

    it('should write bytes as signed numbers and read them back unsigned', () => {
      const encoded = DataResult.getOrThrow(encodeStart(byteBuffer, ops, new Uint8Array([1, 255])));
      expect(encoded).toEqual([1, -1]);
      expect(DataResult.getOrThrow(parse(byteBuffer, ops, encoded))).toEqual(new Uint8Array([1, 255]));
    });

    it('should narrow numbers to the width of the codec', () => {
      expect(DataResult.getOrThrow(parse(byte, ops, 200))).toBe(-56);
      expect(DataResult.getOrThrow(parse(int, ops, 2.9))).toBe(2);
    });

    it('should consume the whole input', () => {
      expect(DataResult.getOrThrow(int.decode(ops, 7))).toEqual([7, null]);
    });

    it('should report a value of the wrong kind', () => {
      expect(DataResult.message(parse(string, ops, 3))).toBe('Not a string: 3');
      expect(DataResult.message(parse(int, ops, 'x'))).toBe('Not a number: "x"');
    });

    it('should refuse to write a primitive into a non-empty prefix', () => {
      const result = int.encode(1, ops, [0]);
      expect(DataResult.message(result)).toBe('Do not know how to append a primitive value 1 to [0]');
    });

    it('should satisfy the functor identity law', () => {
      const decoded = int.decode(ops, 42);
      expect(DataResult.map(decoded, (pair) => pair)).toEqual(decoded);
    });
  });

  describe('xmap', () => {
    type Celsius = { celsius: number };
    const Temperature = xmap(
      double,
      (celsius): Celsius => ({ celsius }),
      (temperature) => temperature.celsius
    );

    it('should encode through the reverse function', () => {
      expect(DataResult.getOrThrow(encodeStart(Temperature, ops, { celsius: 21.5 }))).toBe(21.5);
    });

    it('should round-trip through both functions', () => {
      expect(roundTrip(Temperature, { celsius: -3 })).toEqual({ celsius: -3 });
    });
  });

  describe('flatXmap', () => {
    const Positive = flatXmap(
      int,
      (n) => (n > 0 ? DataResult.success(n) : DataResult.error(() => `Not positive: ${n}`)),
      (n) => (n > 0 ? DataResult.success(n) : DataResult.error(() => `Not positive: ${n}`))
    );

    it('should reject invalid values in both directions', () => {
      expect(DataResult.message(parse(Positive, ops, -1))).toBe('Not positive: -1');
      expect(DataResult.message(encodeStart(Positive, ops, 0))).toBe('Not positive: 0');
      expect(roundTrip(Positive, 5)).toBe(5);
    });
  });

  describe('listOf', () => {
    const Ints = listOf(int, 1, 3);

    it('should round-trip a list', () => {
      expect(DataResult.getOrThrow(encodeStart(Ints, ops, [1, 2]))).toEqual([1, 2]);
      expect(roundTrip(Ints, [1, 2, 3])).toEqual([1, 2, 3]);
    });

    it('should keep the readable elements of a list with a bad element', () => {
      const result = parse(Ints, ops, [1, 'x', 3]);
      assert(result.kind === 'error');
      expect(result.message()).toBe('Not a number: "x"');
      expect(result.partial).toEqual({ some: true, value: [1, 3] });
    });

    it('should return the unread elements as the remainder', () => {
      const result = Ints.decode(ops, [1, 'x', 3]);
      assert(result.kind === 'error');
      expect(result.partial).toEqual({ some: true, value: [[1, 3], ['x']] });
    });

    it('should fail lists that are too short or too long without a partial value', () => {
      const tooShort = parse(Ints, ops, []);
      expect(DataResult.message(tooShort)).toBe('List is too short: 0, expected range [1-3]');
      expect(DataResult.hasResultOrPartial(tooShort)).toBe(false);

      const tooLong = parse(Ints, ops, [1, 2, 3, 4]);
      expect(DataResult.message(tooLong)).toBe('List is too long: 4, expected range [1-3]');
      expect(DataResult.hasResultOrPartial(tooLong)).toBe(false);
    });

    it('should check the size when encoding', () => {
      expect(DataResult.message(encodeStart(Ints, ops, []))).toBe('List is too short: 0, expected range [1-3]');
    });

    it('should read a stable lifecycle from stable elements', () => {
      const result = parse(listOf(c.stable(int)), ops, [1, 2]);
      expect(result.lifecycle).toEqual({ kind: 'stable' });
    });
  });

  describe('validation', () => {
    it('should reject numbers outside the range with the value as partial', () => {
      const Volume = intRange(0, 10);
      const result = parse(Volume, ops, 11);
      assert(result.kind === 'error');
      expect(result.message()).toBe('Value 11 outside of range [0:10]');
      expect(result.partial).toEqual({ some: true, value: 11 });
      expect(DataResult.message(encodeStart(Volume, ops, 11))).toBe('Value 11 outside of range [0:10]');
      expect(roundTrip(Volume, 10)).toBe(10);
    });

    it('should bound string lengths', () => {
      const Code = boundedString(2, 4);
      expect(DataResult.message(parse(Code, ops, 'a'))).toBe('String "a" is too short: 1, expected range [2-4]');
      expect(DataResult.message(parse(Code, ops, 'abcde'))).toBe('String "abcde" is too long: 5, expected range [2-4]');
      expect(roundTrip(Code, 'abc')).toBe('abc');
    });
  });

  describe('stringResolver', () => {
    type Color = { name: string; hex: string };
    const COLORS = new Map<string, Color>([
      ['red', { name: 'red', hex: '#f00' }],
      ['blue', { name: 'blue', hex: '#00f' }],
    ]);
    const ColorCodec = stringResolver<Color>(
      (color) => (COLORS.has(color.name) ? color.name : undefined),
      (name) => COLORS.get(name)
    );

    it('should read and write values by name', () => {
      expect(DataResult.getOrThrow(parse(ColorCodec, ops, 'blue'))).toEqual({ name: 'blue', hex: '#00f' });
      expect(DataResult.getOrThrow(encodeStart(ColorCodec, ops, { name: 'red', hex: '#f00' }))).toBe('red');
    });

    it('should report unknown names', () => {
      expect(DataResult.message(parse(ColorCodec, ops, 'green'))).toBe('Unknown element name:green');
    });
  });

  describe('recovery', () => {
    it('should fall back to a default value and report the message', () => {
      const onError = vi.fn();
      const Count = orElse(int, 7, onError);
      expect(DataResult.getOrThrow(parse(Count, ops, 'x'))).toBe(7);
      expect(onError).toHaveBeenCalledWith('Not a number: "x"');
      expect(DataResult.getOrThrow(parse(Count, ops, 3))).toBe(3);
    });

    it('should promote the partial value of a list', () => {
      const onError = vi.fn();
      const Lenient = promotePartial(listOf(int), onError);
      expect(DataResult.getOrThrow(parse(Lenient, ops, [1, 'x']))).toEqual([1]);
      expect(onError).toHaveBeenCalledTimes(1);
      expect(onError).toHaveBeenCalledWith('Not a number: "x"');
    });
  });

  describe('alternatives', () => {
    it('should read either side of an either codec', () => {
      const NumberOrText = c.either(int, string);
      expect(DataResult.getOrThrow(parse(NumberOrText, ops, 'x'))).toEqual(Either.right('x'));
      expect(DataResult.getOrThrow(parse(NumberOrText, ops, 4))).toEqual(Either.left(4));
      expect(DataResult.getOrThrow(encodeStart(NumberOrText, ops, Either.right('y')))).toBe('y');
    });

    it('should report both messages when neither side reads', () => {
      const result = parse(c.either(int, string), ops, null);
      expect(DataResult.message(result)).toBe('Failed to parse either. First: Not a number: null; Second: Not a string: null');
    });

    it('should refuse an ambiguous xor', () => {
      const NumberXorText = c.xor(int, string);
      expect(DataResult.getOrThrow(parse(NumberXorText, ops, 3))).toEqual(Either.left(3));

      const result = parse(NumberXorText, JsonOps.COMPRESSED, 3);
      expect(DataResult.message(result)).toBe(
        'Both alternatives read successfully, can not pick the correct one; first: 3 second: 3'
      );
    });

    it('should read an alternative representation and write the primary one', () => {
      const Length = withAlternative(int, string, (text) => text.length);
      expect(DataResult.getOrThrow(parse(Length, ops, 'abc'))).toBe(3);
      expect(DataResult.getOrThrow(parse(Length, ops, 7))).toBe(7);
      expect(DataResult.getOrThrow(encodeStart(Length, ops, 3))).toBe(3);
    });
  });

  describe('lifecycles', () => {
    it('should mark every result of a deprecated codec', () => {
      const Old = c.deprecated(int, 3);
      expect(parse(Old, ops, 1).lifecycle).toEqual(Lifecycle.deprecated(3));
      expect(encodeStart(Old, ops, 1).lifecycle).toEqual(Lifecycle.deprecated(3));
    });

    it('should mark every result of a stable codec', () => {
      expect(parse(c.stable(string), ops, 'x').lifecycle).toEqual({ kind: 'stable' });
    });
  });

  describe('unit', () => {
    it('should read a constant and write nothing', () => {
      const Answer = unit(42);
      expect(DataResult.getOrThrow(parse(Answer, ops, {}))).toBe(42);
      expect(DataResult.getOrThrow(encodeStart(Answer, ops, 42))).toEqual({});
    });
  });
});
