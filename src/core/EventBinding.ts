import { EventEmitter } from 'events';
import {
  BindingError,
  type BindingEventMap,
  DecodeError,
  type EventHandler,
  type ListenerFor,
  type MessageStreamOptions,
} from '../types/index.js';

/**
 * The part of a native event the binding acts on. The rest is read by the decoders.
 */
export interface NativeEvent {
  preventDefault(): void;
  stopPropagation(): void;
}

/**
 * Anything native listeners can be registered on: a DOM element, `window`, `document`,
 * or Node's own `EventTarget`.
 */
export interface EventTargetLike {
  addEventListener(type: string, listener: (event: NativeEvent) => void): void;
  removeEventListener(type: string, listener: (event: NativeEvent) => void): void;
}

type Registration = {
  event: string;
  listener: (event: NativeEvent) => void;
};

/**
 * Attaches a set of event handlers to a target and delivers the messages they produce.
 *
 * The binding is the host side of {@link EventHandler}: for every native event it runs the
 * handler decoder, applies `stopPropagation` / `preventDefault` as reported, and emits
 * the message. Events that fail to decode produce no message. They are reported on the
 * `'error'` event only when someone listens to it, and dropped silently otherwise.
 */
class EventBinding<Msg> {
  private enabled = false;
  private registrations: Registration[] = [];

  /**
   * Constructs a new EventBinding instance.
   * @param target The target to register native listeners on.
   * @param handlers The handlers to register, typically built with the `Mouse`, `Touch`, ... helpers.
   * @param emitter The event emitter used to deliver messages and errors (defaults to a new EventEmitter).
   */
  constructor(
    private target: EventTargetLike,
    private handlers: readonly EventHandler<Msg>[],
    private emitter: EventEmitter = new EventEmitter(),
  ) {}

  private handleEvent = (handler: EventHandler<Msg>, event: NativeEvent): void => {
    const result = handler.decode(event);
    if (!result.ok) {
      if (this.emitter.listenerCount('error') > 0) {
        this.emitter.emit('error', result.error);
      }
      return;
    }

    const { message, stopPropagation, preventDefault } = result.value;
    if (stopPropagation) {
      event.stopPropagation();
    }
    if (preventDefault) {
      event.preventDefault();
    }

    try {
      this.emitter.emit('message', message);
    } catch (err) {
      if (this.emitter.listenerCount('error') === 0) {
        throw err;
      }
      this.emitter.emit(
        'error',
        new BindingError(
          `Message listener failed for ${handler.event}: ${err instanceof Error ? err.message : String(err)}`,
          err instanceof Error ? err : undefined,
        ),
      );
    }
  };

  /**
   * Registers one native listener on the target per handler.
   *
   * Calling it again while enabled has no effect. If the target refuses a listener, the
   * listeners registered so far are removed again.
   *
   * @throws {BindingError} If a listener cannot be registered.
   * @see {@link disable} to remove the listeners
   *
   * @example
   * ```ts
   * const binding = new EventBinding(canvas, [
   *   Pointer.onDown((event) => ({ type: 'down', at: event.pointer.offsetPos })),
   *   Pointer.onMove((event) => ({ type: 'move', at: event.pointer.offsetPos })),
   * ]);
   * binding.on('message', update);
   * binding.enable();
   * ```
   */
  public enable = (): void => {
    if (this.enabled) {
      return;
    }

    const registrations: Registration[] = [];
    try {
      for (const handler of this.handlers) {
        const listener = (event: NativeEvent): void => this.handleEvent(handler, event);
        this.target.addEventListener(handler.event, listener);
        registrations.push({ event: handler.event, listener });
      }
    } catch (err) {
      for (const { event, listener } of registrations) {
        this.target.removeEventListener(event, listener);
      }
      throw new BindingError(
        `Failed to enable binding: ${err instanceof Error ? err.message : String(err)}`,
        err instanceof Error ? err : undefined,
      );
    }

    this.registrations = registrations;
    this.enabled = true;
  };

  /**
   * Removes every native listener registered by {@link enable}.
   *
   * @throws {BindingError} If a listener cannot be removed. The binding is disabled regardless.
   */
  public disable = (): void => {
    if (!this.enabled) {
      return;
    }

    try {
      for (const { event, listener } of this.registrations) {
        this.target.removeEventListener(event, listener);
      }
    } catch (err) {
      throw new BindingError(
        `Failed to disable binding: ${err instanceof Error ? err.message : String(err)}`,
        err instanceof Error ? err : undefined,
      );
    } finally {
      this.enabled = false;
      this.registrations = [];
    }
  };

  /**
   * Registers a listener for messages or errors.
   * @param event `'message'` for decoded messages, `'error'` for decode and listener failures.
   * @param listener The callback function to execute when the event is triggered.
   * @returns The event emitter instance.
   * @see {@link off} to remove the listener
   */
  public on = <T extends keyof BindingEventMap<Msg>>(event: T, listener: ListenerFor<T, Msg>): EventEmitter => {
    return this.emitter.on(event, listener);
  };

  /**
   * Removes a listener for messages or errors.
   * @param event The name of the event to stop listening for.
   * @param listener The callback function to remove.
   * @returns The event emitter instance.
   */
  public off = <T extends keyof BindingEventMap<Msg>>(event: T, listener: ListenerFor<T, Msg>): EventEmitter => {
    return this.emitter.off(event, listener);
  };

  /**
   * Returns an async generator that yields the messages produced by the binding.
   *
   * **Queue Management:**
   * - By default, messages are queued up to `maxQueue` (default: 100, max: 1000); the oldest is dropped first
   * - When `latestOnly` is true, only the most recent message is buffered
   *
   * **Errors:** events that fail to decode produce no message and go to `onError`, if
   * given. A failing `'message'` listener is thrown from the generator as a `BindingError`.
   *
   * **Cleanup:** listeners are removed when the loop exits, an error is thrown, or the
   * signal is aborted.
   *
   * @param options Configuration for the message stream.
   * @yields The messages, in the order the native events fired.
   * @throws {BindingError} When the abort signal is triggered or a message listener fails.
   *
   * @example
   * ```ts
   * const controller = new AbortController();
   * for await (const message of binding.messages({ latestOnly: true, signal: controller.signal })) {
   *   render(message);
   * }
   * ```
   */
  public async *messages({
    latestOnly = false,
    maxQueue = 100,
    signal,
    onError,
  }: MessageStreamOptions = {}): AsyncGenerator<Msg> {
    if (signal?.aborted) {
      throw new BindingError('The operation was aborted.');
    }

    const queue: { message: Msg }[] = [];
    const errorQueue: Error[] = [];
    const finalMaxQueue = Math.min(maxQueue, 1000);
    let resolveNext: ((value: Msg) => void) | null = null;
    let rejectNext: ((err: Error) => void) | null = null;

    const handler = (message: Msg): void => {
      if (resolveNext) {
        resolveNext(message);
        resolveNext = null;
        rejectNext = null;
        return;
      }

      if (latestOnly) {
        queue.length = 0;
      } else if (queue.length >= finalMaxQueue) {
        queue.shift();
      }
      queue.push({ message });
    };

    const fail = (err: Error): void => {
      if (rejectNext) {
        rejectNext(err);
        resolveNext = null;
        rejectNext = null;
      } else {
        errorQueue.push(err);
      }
    };

    const errorHandler = (err: Error): void => {
      if (err instanceof DecodeError) {
        onError?.(err);
        return;
      }
      fail(new BindingError(`Error in message stream: ${err.message}`, err));
    };

    const abortHandler = (): void => {
      fail(new BindingError('The operation was aborted.'));
    };

    this.emitter.on('message', handler);
    this.emitter.on('error', errorHandler);
    signal?.addEventListener('abort', abortHandler);

    try {
      while (true) {
        if (signal?.aborted) {
          throw new BindingError('The operation was aborted.');
        }

        const error = errorQueue.shift();
        if (error) {
          throw error;
        }

        const queued = queue.shift();
        if (queued) {
          yield queued.message;
        } else {
          // biome-ignore lint/performance/noAwaitInLoops: This is an async generator, await in loop is necessary
          yield await new Promise<Msg>((resolve, reject) => {
            resolveNext = resolve;
            rejectNext = reject;
          });
        }
      }
    } finally {
      this.emitter.off('message', handler);
      this.emitter.off('error', errorHandler);
      signal?.removeEventListener('abort', abortHandler);
    }
  }

  /**
   * Checks if the native listeners are currently registered.
   * @returns {boolean} True if enabled, false otherwise.
   */
  public isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Disables the binding and removes all message and error listeners.
   */
  public destroy(): void {
    this.disable();
    this.emitter.removeAllListeners();
  }
}

export { EventBinding };
