import { z } from 'zod';
import * as listener from '../core/listener.js';
import { deviceTypeDecoder, floatDecoder } from '../decoder/primitives.js';
import type { ContactDetails, Decoder, EventHandler, EventOptions, PointerEvent } from '../types/index.js';
import { mouseShape, toMouseEvent } from './mouse.js';

const contactDetailsShape = z.object({
  width: floatDecoder,
  height: floatDecoder,
  pressure: floatDecoder,
  tiltX: floatDecoder,
  tiltY: floatDecoder,
});

export const contactDetailsDecoder: Decoder<ContactDetails> = contactDetailsShape;

/**
 * Decodes a pointer event. The mouse-compatible fields are decoded into `pointer`.
 *
 * Pointer events are missing from some browsers; with a polyfill that emulates them
 * from mouse and touch events, fields the polyfill omits make the decode fail.
 */
export const eventDecoder: Decoder<PointerEvent> = mouseShape
  .extend({
    pointerType: deviceTypeDecoder,
    pointerId: z.number().int(),
    isPrimary: z.boolean(),
    ...contactDetailsShape.shape,
  })
  .transform((fields) => ({
    pointerType: fields.pointerType,
    pointer: toMouseEvent(fields),
    pointerId: fields.pointerId,
    isPrimary: fields.isPrimary,
    contactDetails: {
      width: fields.width,
      height: fields.height,
      pressure: fields.pressure,
      tiltX: fields.tiltX,
      tiltY: fields.tiltY,
    },
  }));

export const defaultOptions: EventOptions = listener.DEFAULT_EVENT_OPTIONS;

export const onWithOptions = <Msg>(
  event: string,
  options: Partial<EventOptions>,
  tag: (event: PointerEvent) => Msg,
): EventHandler<Msg> =>
  listener.onWithOptions(event, eventDecoder, listener.withDefaults(defaultOptions, options), tag);

export const onDown = <Msg>(tag: (event: PointerEvent) => Msg): EventHandler<Msg> =>
  onWithOptions('pointerdown', defaultOptions, tag);

export const onMove = <Msg>(tag: (event: PointerEvent) => Msg): EventHandler<Msg> =>
  onWithOptions('pointermove', defaultOptions, tag);

export const onUp = <Msg>(tag: (event: PointerEvent) => Msg): EventHandler<Msg> =>
  onWithOptions('pointerup', defaultOptions, tag);

export const onCancel = <Msg>(tag: (event: PointerEvent) => Msg): EventHandler<Msg> =>
  onWithOptions('pointercancel', defaultOptions, tag);

export const onOver = <Msg>(tag: (event: PointerEvent) => Msg): EventHandler<Msg> =>
  onWithOptions('pointerover', defaultOptions, tag);

export const onEnter = <Msg>(tag: (event: PointerEvent) => Msg): EventHandler<Msg> =>
  onWithOptions('pointerenter', defaultOptions, tag);

export const onLeave = <Msg>(tag: (event: PointerEvent) => Msg): EventHandler<Msg> =>
  onWithOptions('pointerleave', defaultOptions, tag);

export const onOut = <Msg>(tag: (event: PointerEvent) => Msg): EventHandler<Msg> =>
  onWithOptions('pointerout', defaultOptions, tag);
