import { z } from 'zod';
import type { Decoder } from '../types/index.js';
import { forwardIssues } from './decode.js';

const lengthDecoder = z.number().int().nonnegative();

/**
 * Decodes a browser array-like collection (`TouchList`, `FileList`, ...) into an array.
 *
 * Such collections are not arrays: they expose a `length` field and one field per
 * index, `"0"` to `"length - 1"`. Every index must be present and decode with `item`;
 * the result keeps index order. Real arrays are accepted as well.
 *
 * @example
 * ```ts
 * const touchList = arrayLike(Touch.touchDecoder);
 * touchList.parse({ length: 1, 0: nativeTouch }); // [{ identifier: ..., clientPos: ... }]
 * ```
 */
export const arrayLike = <T>(item: Decoder<T>): Decoder<readonly T[]> =>
  z.unknown().transform((raw, ctx) => {
    if (typeof raw !== 'object' || raw === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected an array-like object' });
      return z.NEVER;
    }

    const length = lengthDecoder.safeParse(Reflect.get(raw, 'length'));
    if (!length.success) {
      forwardIssues(ctx, length.error.issues, ['length']);
      return z.NEVER;
    }

    const items: T[] = [];
    for (let index = 0; index < length.data; index++) {
      const key = String(index);
      if (!(key in raw)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Missing item at index ${index}`, path: [index] });
        return z.NEVER;
      }

      const entry = item.safeParse(Reflect.get(raw, key));
      if (!entry.success) {
        forwardIssues(ctx, entry.error.issues, [index]);
        return z.NEVER;
      }
      items.push(entry.data);
    }
    return items;
  });
