/**
 * Represents the mouse button that changed state when the event fired.
 *
 * The value is read from the integer `button` field of the native event.
 *
 * | Button | Code | Description |
 * |--------|------|-------------|
 * | `'main'` | 0 | Main button, usually the left button or the un-initialized state |
 * | `'middle'` | 1 | Auxiliary button, usually the wheel or middle button |
 * | `'secondary'` | 2 | Secondary button, usually the right button |
 * | `'back'` | 3 | Fourth button, typically the browser back button |
 * | `'forward'` | 4 | Fifth button, typically the browser forward button |
 * | `'error'` | other | Any code outside 0..4 |
 *
 * The `button` attribute is not reliable for `mouseenter`, `mouseleave`, `mouseover`,
 * `mouseout` or `mousemove` events, so an unknown code is reported as `'error'`
 * instead of failing the decode.
 */
export type Button = 'error' | 'main' | 'middle' | 'secondary' | 'back' | 'forward';

/**
 * The device that produced a pointer event.
 *
 * Browsers may add new pointer types, so anything other than `"pen"` or `"touch"`
 * is treated as `'mouse'`.
 */
export type DeviceType = 'mouse' | 'touch' | 'pen';

/**
 * The unit of the delta values of a wheel event.
 *
 * | Mode | Code |
 * |------|------|
 * | `'pixel'` | 0 (and any unknown code) |
 * | `'line'` | 1 |
 * | `'page'` | 2 |
 */
export type DeltaMode = 'pixel' | 'line' | 'page';
