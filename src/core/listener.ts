import { decode } from '../decoder/decode.js';
import type { Decoder, Dispatch, EventHandler, EventOptions } from '../types/index.js';

/**
 * Flags used when a listener is created without options: the event neither bubbles
 * further nor triggers the browser default action.
 */
export const DEFAULT_EVENT_OPTIONS: EventOptions = { stopPropagation: true, preventDefault: true };

/**
 * Fills the flags missing from `overrides` with `defaults`.
 */
export const withDefaults = (defaults: EventOptions, overrides: Partial<EventOptions> = {}): EventOptions => ({
  stopPropagation: overrides.stopPropagation ?? defaults.stopPropagation,
  preventDefault: overrides.preventDefault ?? defaults.preventDefault,
});

/**
 * Creates a handler for the native event `event`.
 *
 * Each occurrence is decoded with `decoder` and, on success, turned into a message by
 * `tag`. The message is reported together with `options`. When the decode fails the
 * occurrence produces nothing: the failure is only visible through `handler.decode`.
 *
 * @example
 * ```ts
 * const handler = onWithOptions('mousedown', Mouse.eventDecoder, { stopPropagation: false, preventDefault: true },
 *   (event) => ({ type: 'down', at: event.clientPos }),
 * );
 * ```
 */
export const onWithOptions = <T, Msg>(
  event: string,
  decoder: Decoder<T>,
  options: EventOptions,
  tag: (value: T) => Msg,
): EventHandler<Msg> => ({
  event,
  options,
  decode: (raw) => {
    const result = decode(decoder, raw);
    if (!result.ok) {
      return result;
    }
    return { ok: true, value: { message: tag(result.value), ...options } };
  },
});

/**
 * Same as {@link onWithOptions} with {@link DEFAULT_EVENT_OPTIONS}.
 */
export const on = <T, Msg>(event: string, decoder: Decoder<T>, tag: (value: T) => Msg): EventHandler<Msg> =>
  onWithOptions(event, decoder, DEFAULT_EVENT_OPTIONS, tag);

/**
 * Creates a handler that hands the native event to `tag` without decoding it.
 * Used where the event itself must travel to imperative code (see the drag ports).
 */
export const onValue = <Msg>(event: string, options: EventOptions, tag: (raw: unknown) => Msg): EventHandler<Msg> => ({
  event,
  options,
  decode: (raw) => ({ ok: true, value: { message: tag(raw), ...options } }),
});

/**
 * Runs `handler` on one native event.
 *
 * @returns The message and flags to apply, or `undefined` when the event did not decode.
 */
export const handle = <Msg>(handler: EventHandler<Msg>, raw: unknown): Dispatch<Msg> | undefined => {
  const result = handler.decode(raw);
  return result.ok ? result.value : undefined;
};
