import type { DecodeError } from './error.js';

/**
 * Flags applied to the native event when a listener produces a message.
 */
export type EventOptions = Readonly<{
  /**
   * Call `stopPropagation()` so the event does not bubble to parent elements.
   */
  stopPropagation: boolean;
  /**
   * Call `preventDefault()` so the browser skips its default action.
   */
  preventDefault: boolean;
}>;

/**
 * Configuration options for `EventBinding.messages()`.
 * All properties are optional and provide sensible defaults.
 */
export type MessageStreamOptions = {
  /**
   * If true, only the newest undelivered message is kept. Defaults to false.
   */
  latestOnly?: boolean;
  /**
   * Maximum number of undelivered messages kept; the oldest is dropped first.
   * Defaults to 100 and is capped at 1000.
   */
  maxQueue?: number;
  /**
   * Cancels the stream. The generator throws a `BindingError` once aborted.
   */
  signal?: AbortSignal;
  /**
   * Called with each event that fails to decode. Such events never end the stream.
   */
  onError?: (error: DecodeError) => void;
};
