import { z } from 'zod';
import * as listener from '../core/listener.js';
import { arrayLike } from '../decoder/arrayLike.js';
import { clientPosShape, keysShape, pagePosShape, screenPosShape, toKeys } from '../decoder/primitives.js';
import type { Decoder, EventHandler, EventOptions, TouchEvent, TouchPoint } from '../types/index.js';

export const touchDecoder: Decoder<TouchPoint> = z
  .object({
    identifier: z.number().int(),
    ...clientPosShape.shape,
    ...pagePosShape.shape,
    ...screenPosShape.shape,
  })
  .transform((fields) => ({
    identifier: fields.identifier,
    clientPos: [fields.clientX, fields.clientY] as const,
    pagePos: [fields.pageX, fields.pageY] as const,
    screenPos: [fields.screenX, fields.screenY] as const,
  }));

/**
 * Decodes a native `TouchList`.
 */
export const touchListDecoder: Decoder<readonly TouchPoint[]> = arrayLike(touchDecoder);

export const eventDecoder: Decoder<TouchEvent> = keysShape
  .extend({
    changedTouches: touchListDecoder,
    targetTouches: touchListDecoder,
    touches: touchListDecoder,
  })
  .transform((fields) => ({
    keys: toKeys(fields),
    changedTouches: fields.changedTouches,
    targetTouches: fields.targetTouches,
    touches: fields.touches,
  }));

export const defaultOptions: EventOptions = listener.DEFAULT_EVENT_OPTIONS;

export const onWithOptions = <Msg>(
  event: string,
  options: Partial<EventOptions>,
  tag: (event: TouchEvent) => Msg,
): EventHandler<Msg> =>
  listener.onWithOptions(event, eventDecoder, listener.withDefaults(defaultOptions, options), tag);

/**
 * Listens to `touchstart`.
 *
 * @example
 * ```ts
 * Touch.onStart((event) => ({ type: 'fingers-down', ids: event.changedTouches.map((t) => t.identifier) }));
 * ```
 */
export const onStart = <Msg>(tag: (event: TouchEvent) => Msg): EventHandler<Msg> =>
  onWithOptions('touchstart', defaultOptions, tag);

export const onMove = <Msg>(tag: (event: TouchEvent) => Msg): EventHandler<Msg> =>
  onWithOptions('touchmove', defaultOptions, tag);

export const onEnd = <Msg>(tag: (event: TouchEvent) => Msg): EventHandler<Msg> =>
  onWithOptions('touchend', defaultOptions, tag);

export const onCancel = <Msg>(tag: (event: TouchEvent) => Msg): EventHandler<Msg> =>
  onWithOptions('touchcancel', defaultOptions, tag);
