import { type ZodIssue, z } from 'zod';
import { DecodeError } from '../types/error.js';
import type { Decoder, DecodeResult } from '../types/index.js';

/**
 * Runs `decoder` on a raw value and returns a tagged result instead of throwing.
 *
 * @example
 * ```ts
 * const result = decode(Touch.eventDecoder, nativeEvent);
 * if (!result.ok) {
 *   console.warn(result.error.issues);
 * }
 * ```
 */
export const decode = <T>(decoder: Decoder<T>, raw: unknown): DecodeResult<T> => {
  const result = decoder.safeParse(raw);
  if (result.success) {
    return { ok: true, value: result.data };
  }
  return { ok: false, error: new DecodeError(result.error.issues) };
};

/**
 * Re-reports the issues of a nested decode on the current context, under `prefix`.
 */
export const forwardIssues = (
  ctx: z.RefinementCtx,
  issues: readonly ZodIssue[],
  prefix: readonly (string | number)[] = [],
): void => {
  for (const issue of issues) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: issue.message,
      path: [...prefix, ...issue.path],
    });
  }
};
