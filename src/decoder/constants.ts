import type { Button, DeltaMode, DeviceType } from '../types/index.js';

/**
 * Values of the native `MouseEvent.button` field.
 * Codes that are not listed decode to `'error'`.
 */
const BUTTON_CODES: Readonly<Record<number, Button>> = {
  0: 'main',
  1: 'middle',
  2: 'secondary',
  3: 'back',
  4: 'forward',
};

/**
 * Values of the native `WheelEvent.deltaMode` field.
 * `DOM_DELTA_PIXEL` (0) is also the fallback for codes that are not listed.
 */
const DELTA_MODES: Readonly<Record<number, DeltaMode>> = {
  0: 'pixel',
  1: 'line',
  2: 'page',
};

/**
 * Values of the native `PointerEvent.pointerType` field.
 * The vocabulary is open, so anything else is read as `'mouse'`.
 */
const POINTER_TYPES: Readonly<Record<string, DeviceType>> = {
  pen: 'pen',
  touch: 'touch',
};

/**
 * Format registered on `dragstart`: Firefox does not start a drag unless some data is set.
 */
const DRAG_DATA_FORMAT = 'text/plain';

export { BUTTON_CODES, DELTA_MODES, DRAG_DATA_FORMAT, POINTER_TYPES };
