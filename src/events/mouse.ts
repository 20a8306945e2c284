import type { z } from 'zod';
import * as listener from '../core/listener.js';
import {
  buttonDecoder,
  clientPosShape,
  keysShape,
  offsetPosShape,
  pagePosShape,
  screenPosShape,
  toKeys,
} from '../decoder/primitives.js';
import type { Decoder, EventHandler, EventOptions, MouseEvent } from '../types/index.js';

/**
 * Native fields read for every mouse-compatible event.
 * Pointer, wheel and drag events extend this shape.
 */
export const mouseShape = keysShape.extend({
  button: buttonDecoder,
  ...clientPosShape.shape,
  ...offsetPosShape.shape,
  ...pagePosShape.shape,
  ...screenPosShape.shape,
});

export const toMouseEvent = (fields: z.output<typeof mouseShape>): MouseEvent => ({
  keys: toKeys(fields),
  button: fields.button,
  clientPos: [fields.clientX, fields.clientY],
  offsetPos: [fields.offsetX, fields.offsetY],
  pagePos: [fields.pageX, fields.pageY],
  screenPos: [fields.screenX, fields.screenY],
});

export const eventDecoder: Decoder<MouseEvent> = mouseShape.transform(toMouseEvent);

export const defaultOptions: EventOptions = listener.DEFAULT_EVENT_OPTIONS;

/**
 * Listens to any mouse event name, with some flags overridden.
 *
 * @example
 * ```ts
 * // Let the context menu open while still tracking the right click.
 * Mouse.onWithOptions('contextmenu', { preventDefault: false }, (event) => ({ type: 'menu', at: event.pagePos }));
 * ```
 */
export const onWithOptions = <Msg>(
  event: string,
  options: Partial<EventOptions>,
  tag: (event: MouseEvent) => Msg,
): EventHandler<Msg> =>
  listener.onWithOptions(event, eventDecoder, listener.withDefaults(defaultOptions, options), tag);

export const onDown = <Msg>(tag: (event: MouseEvent) => Msg): EventHandler<Msg> =>
  onWithOptions('mousedown', defaultOptions, tag);

export const onMove = <Msg>(tag: (event: MouseEvent) => Msg): EventHandler<Msg> =>
  onWithOptions('mousemove', defaultOptions, tag);

export const onUp = <Msg>(tag: (event: MouseEvent) => Msg): EventHandler<Msg> =>
  onWithOptions('mouseup', defaultOptions, tag);

export const onClick = <Msg>(tag: (event: MouseEvent) => Msg): EventHandler<Msg> =>
  onWithOptions('click', defaultOptions, tag);

export const onDoubleClick = <Msg>(tag: (event: MouseEvent) => Msg): EventHandler<Msg> =>
  onWithOptions('dblclick', defaultOptions, tag);

export const onEnter = <Msg>(tag: (event: MouseEvent) => Msg): EventHandler<Msg> =>
  onWithOptions('mouseenter', defaultOptions, tag);

export const onOver = <Msg>(tag: (event: MouseEvent) => Msg): EventHandler<Msg> =>
  onWithOptions('mouseover', defaultOptions, tag);

export const onLeave = <Msg>(tag: (event: MouseEvent) => Msg): EventHandler<Msg> =>
  onWithOptions('mouseleave', defaultOptions, tag);

export const onOut = <Msg>(tag: (event: MouseEvent) => Msg): EventHandler<Msg> =>
  onWithOptions('mouseout', defaultOptions, tag);

export const onContextMenu = <Msg>(tag: (event: MouseEvent) => Msg): EventHandler<Msg> =>
  onWithOptions('contextmenu', defaultOptions, tag);
