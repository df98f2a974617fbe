import { describe, it, expect, vi } from 'vitest';
import {
  DataResult,
  IllegalStateError,
  JsonOps,
  encodeStart,
  fieldOf,
  int,
  lazyInitialized,
  listOf,
  mapRecursive,
  object,
  optionalFieldOf,
  parse,
  recursive,
  toCodec,
  type Codec,
} from 'polycodec';

type Tree = { value: number; children: Tree[] };
type Link = { id: number; next?: Link };

const buildTree = (self: Codec<Tree>): Codec<Tree> =>
  toCodec(
    object({
      value: fieldOf(int, 'value'),
      children: fieldOf(listOf(self), 'children'),
    })
  );

const tree: Tree = { value: 1, children: [{ value: 2, children: [] }, { value: 3, children: [] }] };

describe('Recursive codecs', () => {
  describe('recursive', () => {
    it('should round-trip a nested value', () => {
      const TreeCodec = recursive('Tree', buildTree);
      const json = DataResult.getOrThrow(encodeStart(TreeCodec, JsonOps.INSTANCE, tree));
      expect(json).toEqual({
        value: 1,
        children: [
          { value: 2, children: [] },
          { value: 3, children: [] },
        ],
      });
      expect(DataResult.getOrThrow(parse(TreeCodec, JsonOps.INSTANCE, json))).toEqual(tree);
    });

    it('should nest compressed records', () => {
      const TreeCodec = recursive('Tree', buildTree);
      const json = DataResult.getOrThrow(encodeStart(TreeCodec, JsonOps.COMPRESSED, tree));
      expect(json).toEqual([1, [[2, []], [3, []]]]);
      expect(DataResult.getOrThrow(parse(TreeCodec, JsonOps.COMPRESSED, json))).toEqual(tree);
    });

    it('should build the wrapped codec once, on first use', () => {
      const factory = vi.fn(buildTree);
      const TreeCodec = recursive('Tree', factory);
      expect(factory).not.toHaveBeenCalled();

      parse(TreeCodec, JsonOps.INSTANCE, { value: 1, children: [] });
      parse(TreeCodec, JsonOps.INSTANCE, { value: 2, children: [] });
      expect(factory).toHaveBeenCalledTimes(1);
    });

    it('should throw when the codec is used while it is being built', () => {
      const Broken = recursive<number>('Broken', (self) => {
        parse(self, JsonOps.INSTANCE, 1);
        return int;
      });
      expect(() => parse(Broken, JsonOps.INSTANCE, 1)).toThrow(IllegalStateError);
      expect(() => parse(Broken, JsonOps.INSTANCE, 1)).toThrow('Lazy value accessed during its own initialization');
    });

    it('should name itself', () => {
      expect(recursive('Tree', buildTree).toString()).toBe('RecursiveCodec[Tree]');
    });
  });

  describe('mapRecursive', () => {
    const LinkCodec = toCodec(
      mapRecursive<Link>('Link', (self) =>
        object({
          id: fieldOf(int, 'id'),
          next: optionalFieldOf(self, 'next'),
        })
      )
    );

    it('should round-trip a chain', () => {
      const chain: Link = { id: 1, next: { id: 2 } };
      const json = DataResult.getOrThrow(encodeStart(LinkCodec, JsonOps.INSTANCE, chain));
      expect(json).toEqual({ id: 1, next: { id: 2 } });
      expect(DataResult.getOrThrow(parse(LinkCodec, JsonOps.INSTANCE, json))).toEqual(chain);
    });

    it('should report errors from any depth', () => {
      const result = parse(LinkCodec, JsonOps.INSTANCE, { id: 1, next: { id: 'two' } });
      expect(DataResult.message(result)).toBe('Not a number: "two"');
    });
  });

  describe('lazyInitialized', () => {
    it('should defer building the codec until first use', () => {
      const supplier = vi.fn(() => int);
      const Deferred = lazyInitialized(supplier);
      expect(Deferred.toString()).toBe('LazyCodec[uninitialized]');
      expect(supplier).not.toHaveBeenCalled();

      expect(DataResult.getOrThrow(parse(Deferred, JsonOps.INSTANCE, 5))).toBe(5);
      expect(Deferred.toString()).toBe('LazyCodec[Int]');
      expect(supplier).toHaveBeenCalledTimes(1);
    });
  });
});
