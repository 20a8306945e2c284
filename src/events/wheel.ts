import * as listener from '../core/listener.js';
import { deltaModeDecoder, floatDecoder } from '../decoder/primitives.js';
import type { Decoder, EventHandler, EventOptions, WheelEvent } from '../types/index.js';
import { mouseShape, toMouseEvent } from './mouse.js';

export const eventDecoder: Decoder<WheelEvent> = mouseShape
  .extend({
    deltaY: floatDecoder,
    deltaMode: deltaModeDecoder,
  })
  .transform((fields) => ({
    mouseEvent: toMouseEvent(fields),
    deltaY: fields.deltaY,
    deltaMode: fields.deltaMode,
  }));

export const defaultOptions: EventOptions = listener.DEFAULT_EVENT_OPTIONS;

export const onWithOptions = <Msg>(
  options: Partial<EventOptions>,
  tag: (event: WheelEvent) => Msg,
): EventHandler<Msg> =>
  listener.onWithOptions('wheel', eventDecoder, listener.withDefaults(defaultOptions, options), tag);

/**
 * Listens to `wheel`. The page does not scroll while the handler is active.
 *
 * @example
 * ```ts
 * Wheel.onWheel((event) => ({ type: 'zoom', by: event.deltaY, unit: event.deltaMode }));
 * ```
 */
export const onWheel = <Msg>(tag: (event: WheelEvent) => Msg): EventHandler<Msg> =>
  onWithOptions(defaultOptions, tag);
