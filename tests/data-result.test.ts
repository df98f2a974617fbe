import { describe, it, expect, vi } from 'vitest';
import { DataResult, DataResultError, Lifecycle, traverse, traverseShortCircuit } from 'polycodec';
import assert from 'node:assert';

const parseDigit = (text: string): DataResult<number> =>
  /^\d$/.test(text) ? DataResult.success(Number(text)) : DataResult.error(() => `Not a digit: ${text}`);

describe('DataResult', () => {
  describe('map', () => {
    it('should map a success and keep its lifecycle', () => {
      const result = DataResult.map(DataResult.success(2, Lifecycle.stable()), (n) => n * 10);
      expect(result).toEqual({ kind: 'success', value: 20, lifecycle: { kind: 'stable' } });
    });

    it('should map the partial value of an error', () => {
      const result = DataResult.map(DataResult.errorWithPartial('broken', 2), (n) => n * 10);
      assert(result.kind === 'error');
      expect(result.message()).toBe('broken');
      expect(result.partial).toEqual({ some: true, value: 20 });
    });

    it('should satisfy the identity law', () => {
      const result = DataResult.success('x');
      expect(DataResult.map(result, (value) => value)).toEqual(result);
    });
  });

  describe('flatMap', () => {
    it('should stop at an error without a partial value', () => {
      const fn = vi.fn((n: number) => DataResult.success(n + 1));
      const result = DataResult.flatMap(DataResult.error<number>('first'), fn);
      expect(fn).not.toHaveBeenCalled();
      expect(DataResult.message(result)).toBe('first');
      expect(DataResult.hasResultOrPartial(result)).toBe(false);
    });

    it('should keep the original message when the partial value goes through', () => {
      const result = DataResult.flatMap(DataResult.errorWithPartial('first', 1), (n) => DataResult.success(n + 1));
      assert(result.kind === 'error');
      expect(result.message()).toBe('first');
      expect(result.partial).toEqual({ some: true, value: 2 });
    });

    it('should join both messages when the partial value fails too', () => {
      const result = DataResult.flatMap(DataResult.errorWithPartial('first', 1), () => DataResult.error('second'));
      expect(DataResult.message(result)).toBe('first; second');
      expect(DataResult.hasResultOrPartial(result)).toBe(false);
    });

    it('should join the lifecycles of both steps', () => {
      const result = DataResult.flatMap(DataResult.success(1, Lifecycle.stable()), (n) =>
        DataResult.success(n, Lifecycle.deprecated(2))
      );
      expect(result.lifecycle).toEqual({ kind: 'deprecated', since: 2 });
    });
  });

  describe('applicative combination', () => {
    it('should combine two successes and join their lifecycles', () => {
      const result = DataResult.apply2Stable(
        (a: number, b: number) => a + b,
        DataResult.success(1, Lifecycle.stable()),
        DataResult.success(2, Lifecycle.deprecated(4))
      );
      expect(result).toEqual({ kind: 'success', value: 3, lifecycle: { kind: 'deprecated', since: 4 } });
    });

    it('should make the result experimental unless the function is stable', () => {
      const result = DataResult.apply2(
        (a: number, b: number) => a + b,
        DataResult.success(1, Lifecycle.stable()),
        DataResult.success(2, Lifecycle.stable())
      );
      expect(result.lifecycle).toEqual({ kind: 'experimental' });
    });

    it('should keep the message of the only failing side', () => {
      const result = DataResult.apply2((a: number, b: number) => a + b, DataResult.success(1), DataResult.error('bad b'));
      expect(DataResult.message(result)).toBe('bad b');
    });
  });

  describe('traverse', () => {
    it('should collect every value when all calls succeed', () => {
      const result = traverse(['1', '2', '3'], parseDigit);
      expect(DataResult.getOrThrow(result)).toEqual([1, 2, 3]);
      expect(result.lifecycle).toEqual({ kind: 'experimental' });
    });

    it('should list every message in input order', () => {
      const result = traverse(['a', '1', 'b'], parseDigit);
      expect(DataResult.message(result)).toBe('Not a digit: a; Not a digit: b');
    });

    it('should keep a partial list when every failure has a partial value', () => {
      const result = traverse(['x', 'bad', 'y'], (text) =>
        text === 'bad' ? DataResult.errorWithPartial('bad input', '?') : DataResult.success(text.toUpperCase())
      );
      assert(result.kind === 'error');
      expect(result.message()).toBe('bad input');
      expect(result.partial).toEqual({ some: true, value: ['X', '?', 'Y'] });
    });

    it('should stop at the first error when short-circuiting', () => {
      const fn = vi.fn(parseDigit);
      const result = traverseShortCircuit(['1', 'x', '2'], fn);
      expect(DataResult.message(result)).toBe('Not a digit: x');
      expect(fn).toHaveBeenCalledTimes(2);
      expect(DataResult.hasResultOrPartial(result)).toBe(false);
    });
  });

  describe('recovery', () => {
    it('should promote a partial value and report the message', () => {
      const onError = vi.fn();
      const result = DataResult.promotePartial(DataResult.errorWithPartial('lossy', [1, 2]), onError);
      expect(result).toEqual({ kind: 'success', value: [1, 2], lifecycle: { kind: 'experimental' } });
      expect(onError).toHaveBeenCalledWith('lossy');
    });

    it('should leave an error without a partial value as it is', () => {
      const onError = vi.fn();
      const result = DataResult.promotePartial(DataResult.error('hopeless'), onError);
      expect(DataResult.message(result)).toBe('hopeless');
      expect(onError).toHaveBeenCalledWith('hopeless');
    });

    it('should rewrite messages lazily', () => {
      const message = vi.fn(() => 'inner');
      const result = DataResult.mapError(DataResult.error(message), (text) => `outer: ${text}`);
      expect(message).not.toHaveBeenCalled();
      expect(DataResult.message(result)).toBe('outer: inner');
    });

    it('should report the message through resultOrPartial', () => {
      const onError = vi.fn();
      const value = DataResult.resultOrPartial(DataResult.errorWithPartial('lossy', 7), onError);
      expect(value).toEqual({ some: true, value: 7 });
      expect(onError).toHaveBeenCalledWith('lossy');
    });
  });

  describe('getOrThrow', () => {
    it('should return the value of a success', () => {
      expect(DataResult.getOrThrow(DataResult.success('ok'))).toBe('ok');
    });

    it('should throw a DataResultError carrying the message', () => {
      expect(() => DataResult.getOrThrow(DataResult.error('boom'))).toThrow(DataResultError);
      expect(() => DataResult.getOrThrow(DataResult.error('boom'))).toThrow('boom');
    });

    it('should return the partial value of an error', () => {
      expect(DataResult.getPartialOrThrow(DataResult.errorWithPartial('lossy', 3))).toBe(3);
      expect(() => DataResult.getPartialOrThrow(DataResult.error('hopeless'))).toThrow(DataResultError);
    });
  });

  it('should render results for debugging', () => {
    expect(DataResult.toString(DataResult.success(1))).toBe('DataResult.Success[1]');
    expect(DataResult.toString(DataResult.error('boom'))).toBe("DataResult.Error['boom']");
    expect(DataResult.toString(DataResult.errorWithPartial('boom', 2))).toBe("DataResult.Error['boom': 2]");
    expect(DataResult.toString(DataResult.success({ a: [1, 'x'] }))).toBe('DataResult.Success[{"a":[1,"x"]}]');
    expect(DataResult.toString(DataResult.errorWithPartial('boom', { id: 7n }))).toBe(
      `DataResult.Error['boom': {"id":"7"}]`
    );
    expect(DataResult.toString(DataResult.success(7n))).toBe('DataResult.Success[7]');
  });
});
