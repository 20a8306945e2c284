import type { Button, DeltaMode, DeviceType } from './button.js';

/**
 * A position as an `[x, y]` pair.
 *
 * Each coordinate space (client, offset, page, screen) is decoded from its own
 * pair of native fields. No conversion between spaces is ever performed.
 */
export type Coordinates = readonly [x: number, y: number];

/**
 * State of the modifier keys when the event fired.
 */
export type Keys = Readonly<{
  alt: boolean;
  ctrl: boolean;
  shift: boolean;
  meta: boolean;
}>;

/**
 * A decoded mouse event.
 *
 * @property keys - Modifier keys held during the event
 * @property button - The button that changed state
 * @property clientPos - Position relative to the viewport (`clientX`, `clientY`)
 * @property offsetPos - Position relative to the target element padding edge (`offsetX`, `offsetY`)
 * @property pagePos - Position relative to the whole document (`pageX`, `pageY`)
 * @property screenPos - Position relative to the screen (`screenX`, `screenY`)
 *
 * @example
 * ```ts
 * const handler = Mouse.onDown((event) => {
 *   const [x, y] = event.offsetPos;
 *   return { type: 'start-stroke', x, y };
 * });
 * ```
 */
export type MouseEvent = Readonly<{
  keys: Keys;
  button: Button;
  clientPos: Coordinates;
  offsetPos: Coordinates;
  pagePos: Coordinates;
  screenPos: Coordinates;
}>;

/**
 * A single contact point on a touch surface.
 *
 * `identifier` is unique to one finger for the whole duration of its contact with
 * the surface. It is only unique within the `touches` list at a given instant.
 */
export type TouchPoint = Readonly<{
  identifier: number;
  clientPos: Coordinates;
  pagePos: Coordinates;
  screenPos: Coordinates;
}>;

/**
 * A decoded touch event. The three lists keep the native order.
 *
 * @property changedTouches - Contact points whose state changed with this event
 * @property targetTouches - Contact points that started on the event target and are still on the surface
 * @property touches - Every contact point currently on the surface
 */
export type TouchEvent = Readonly<{
  keys: Keys;
  changedTouches: readonly TouchPoint[];
  targetTouches: readonly TouchPoint[];
  touches: readonly TouchPoint[];
}>;

/**
 * Geometry of the pointer contact.
 */
export type ContactDetails = Readonly<{
  width: number;
  height: number;
  pressure: number;
  tiltX: number;
  tiltY: number;
}>;

/**
 * A decoded pointer event. `pointer` holds the full mouse-compatible part of the event.
 */
export type PointerEvent = Readonly<{
  pointerType: DeviceType;
  pointer: MouseEvent;
  pointerId: number;
  isPrimary: boolean;
  contactDetails: ContactDetails;
}>;

/**
 * A decoded wheel event.
 *
 * Only the vertical delta is decoded. Its unit is given by `deltaMode`.
 */
export type WheelEvent = Readonly<{
  mouseEvent: MouseEvent;
  deltaY: number;
  deltaMode: DeltaMode;
}>;

/**
 * A file carried by a drag event.
 *
 * `data` is the native `File` object. It is never inspected here, only handed on so
 * the caller can read its content with the platform APIs.
 */
export type File = Readonly<{
  name: string;
  mimeType: string;
  size: number;
  data: unknown;
}>;

/**
 * The decoded `dataTransfer` of a drag event.
 *
 * @property files - Files dragged from the operating system, in native order
 * @property types - Formats offered by the drag source
 * @property dropEffect - The drop effect currently proposed
 */
export type DataTransfer = Readonly<{
  files: readonly File[];
  types: readonly string[];
  dropEffect: string;
}>;

/**
 * A decoded drag event.
 */
export type DragEvent = Readonly<{
  dataTransfer: DataTransfer;
  mouseEvent: MouseEvent;
}>;
