import { DataResult } from '../data-result.ts';
import { encodeStart } from '../encoder.ts';
import { Lifecycle } from '../lifecycle.ts';
import type { Codec } from '../types.ts';

export const MAX_LIST_SIZE = Number.MAX_SAFE_INTEGER;

/**
 * A codec for lists of `element`, holding between `minSize` and `maxSize`
 * elements.
 *
 * Decoding keeps going past elements that fail: the result is then an error
 * whose partial value holds every element that could be read, and whose
 * remainder is a list of the elements that could not. Too few readable
 * elements, or too many elements in total, fail with no partial value.
 */
export function listCodec<E>(element: Codec<E>, minSize = 0, maxSize = MAX_LIST_SIZE): Codec<E[]> {
  const tooShort = (size: number) =>
    DataResult.error(() => `List is too short: ${size}, expected range [${minSize}-${maxSize}]`);
  const tooLong = (size: number) =>
    DataResult.error(() => `List is too long: ${size}, expected range [${minSize}-${maxSize}]`);

  return {
    encode: (input, ops, prefix) => {
      if (input.length < minSize) {
        return tooShort(input.length);
      }
      if (input.length > maxSize) {
        return tooLong(input.length);
      }
      const builder = ops.listBuilder();
      for (const value of input) {
        builder.addResult(encodeStart(element, ops, value));
      }
      return builder.build(prefix);
    },

    decode: (ops, input) =>
      DataResult.flatMap(DataResult.setLifecycle(ops.getList(input), Lifecycle.stable()), (visit) => {
        const elements: E[] = [];
        const failed: (typeof input)[] = [];
        let result: DataResult<null> = DataResult.success(null, Lifecycle.stable());
        let totalCount = 0;

        visit((value) => {
          totalCount++;
          if (elements.length >= maxSize) {
            failed.push(value);
            return;
          }
          const elementResult = element.decode(ops, value);
          if (elementResult.kind === 'error') {
            failed.push(value);
          }
          const read = DataResult.resultOrPartial(elementResult);
          if (read.some) {
            elements.push(read.value[0]);
          }
          result = DataResult.apply2Stable((_element, r) => r, elementResult, result);
        });

        if (elements.length < minSize) {
          return tooShort(elements.length);
        }
        if (totalCount > maxSize) {
          return tooLong(totalCount);
        }
        const pair = [elements, ops.createList(failed)] as const;
        return DataResult.setPartial(
          DataResult.map(result, () => pair),
          pair
        );
      }),

    toString: () => `ListCodec[${element}]`,
  };
}
