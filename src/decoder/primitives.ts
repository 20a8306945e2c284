import { z } from 'zod';
import type { Button, Coordinates, Decoder, DeltaMode, DeviceType, Keys } from '../types/index.js';
import { BUTTON_CODES, DELTA_MODES, POINTER_TYPES } from './constants.js';

export const keysShape = z.object({
  altKey: z.boolean(),
  ctrlKey: z.boolean(),
  shiftKey: z.boolean(),
  metaKey: z.boolean(),
});

/**
 * Decodes a native float. Any number passes, `NaN` included: browsers report `NaN` for
 * some fields of synthesized events, and the event is still usable.
 */
export const floatDecoder: Decoder<number> = z.unknown().transform((raw, ctx) => {
  if (typeof raw === 'number') {
    return raw;
  }
  ctx.addIssue({
    code: z.ZodIssueCode.invalid_type,
    expected: z.ZodParsedType.number,
    received: z.getParsedType(raw),
  });
  return z.NEVER;
});

export const clientPosShape = z.object({ clientX: floatDecoder, clientY: floatDecoder });
export const offsetPosShape = z.object({ offsetX: floatDecoder, offsetY: floatDecoder });
export const pagePosShape = z.object({ pageX: floatDecoder, pageY: floatDecoder });
export const screenPosShape = z.object({ screenX: floatDecoder, screenY: floatDecoder });

export const toKeys = ({ altKey, ctrlKey, shiftKey, metaKey }: z.output<typeof keysShape>): Keys => ({
  alt: altKey,
  ctrl: ctrlKey,
  shift: shiftKey,
  meta: metaKey,
});

/**
 * Decodes the modifier keys. Every flag must be present and boolean.
 */
export const keysDecoder: Decoder<Keys> = keysShape.transform(toKeys);

export const clientPosDecoder: Decoder<Coordinates> = clientPosShape.transform(
  ({ clientX, clientY }) => [clientX, clientY] as const,
);

export const offsetPosDecoder: Decoder<Coordinates> = offsetPosShape.transform(
  ({ offsetX, offsetY }) => [offsetX, offsetY] as const,
);

export const pagePosDecoder: Decoder<Coordinates> = pagePosShape.transform(
  ({ pageX, pageY }) => [pageX, pageY] as const,
);

export const screenPosDecoder: Decoder<Coordinates> = screenPosShape.transform(
  ({ screenX, screenY }) => [screenX, screenY] as const,
);

/**
 * Maps a native button code to a {@link Button}. Total: unknown codes give `'error'`.
 */
export const buttonFromCode = (code: number): Button => BUTTON_CODES[code] ?? 'error';

/**
 * Maps a native wheel delta mode to a {@link DeltaMode}. Total: unknown codes give `'pixel'`.
 */
export const deltaModeFromCode = (code: number): DeltaMode => DELTA_MODES[code] ?? 'pixel';

/**
 * Maps a native pointer type to a {@link DeviceType}. Total: unknown types give `'mouse'`.
 */
export const deviceTypeFromString = (pointerType: string): DeviceType =>
  Object.hasOwn(POINTER_TYPES, pointerType) ? (POINTER_TYPES[pointerType] ?? 'mouse') : 'mouse';

// The raw value must still be an integer (or a string); only its meaning falls back.
export const buttonDecoder: Decoder<Button> = z.number().int().transform(buttonFromCode);
export const deltaModeDecoder: Decoder<DeltaMode> = z.number().int().transform(deltaModeFromCode);
export const deviceTypeDecoder: Decoder<DeviceType> = z.string().transform(deviceTypeFromString);
