import type { z } from 'zod';
import type { DecodeError } from './error.js';
import type { EventOptions } from './options.js';

/**
 * A decoder turns an untyped native event (or a part of it) into a typed value.
 *
 * Decoders are zod schemas that accept any input, so they can be composed with the
 * usual zod combinators and run with `safeParse`.
 */
export type Decoder<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * Outcome of {@link decode}. A failure carries the reason, a success the typed value.
 *
 * @example
 * ```ts
 * const result = decode(Mouse.eventDecoder, nativeEvent);
 * if (result.ok) {
 *   console.log(result.value.clientPos);
 * } else {
 *   console.warn(result.error.message);
 * }
 * ```
 */
export type DecodeResult<T> = { ok: true; value: T } | { ok: false; error: DecodeError };

/**
 * What a listener reports for one native event: the message for the application and
 * the two flags the host runtime applies to the native event.
 */
export type Dispatch<Msg> = Readonly<
  {
    message: Msg;
  } & EventOptions
>;

/**
 * A bindable handler for one native event name.
 *
 * The host runtime registers a native listener for `event` and calls `decode` with each
 * native event. A failed decode means the event produces no message at all.
 */
export type EventHandler<Msg> = Readonly<{
  event: string;
  options: EventOptions;
  decode: (raw: unknown) => DecodeResult<Dispatch<Msg>>;
}>;

/**
 * Listener for the messages produced by an `EventBinding`.
 */
export type MessageListener<Msg> = (message: Msg) => void;

/**
 * Error event listener type (for the 'error' event).
 */
export type ErrorEventListener = (error: Error) => void;

/**
 * Maps binding event names to their payload types.
 *
 * @example
 * ```ts
 * type Payload = BindingEventMap<AppMsg>['message'];
 * // Payload is AppMsg
 * ```
 */
export type BindingEventMap<Msg> = {
  message: Msg;
  error: Error;
};

/**
 * Extracts the listener type for a given binding event name.
 *
 * @example
 * ```ts
 * type OnMessage = ListenerFor<'message', AppMsg>;
 * // OnMessage is (message: AppMsg) => void
 *
 * type OnError = ListenerFor<'error', AppMsg>;
 * // OnError is (error: Error) => void
 * ```
 */
export type ListenerFor<T extends keyof BindingEventMap<unknown>, Msg> = T extends 'message'
  ? MessageListener<Msg>
  : ErrorEventListener;
