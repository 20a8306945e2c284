import * as fc from 'fast-check';
import { describe, expect, test } from 'vitest';
import { mouseFields, without } from '../test-utils.js';
import { decode } from './decode.js';
import {
  buttonDecoder,
  buttonFromCode,
  clientPosDecoder,
  deltaModeDecoder,
  deltaModeFromCode,
  deviceTypeFromString,
  floatDecoder,
  keysDecoder,
  offsetPosDecoder,
  pagePosDecoder,
  screenPosDecoder,
} from './primitives.js';

const propertyConfig: fc.Parameters<unknown> = { numRuns: 200, seed: 4242 };

describe('keysDecoder', () => {
  test('should decode every modifier flag', () => {
    // Arrange
    const raw = mouseFields({ altKey: true, metaKey: true });

    // Act
    const result = decode(keysDecoder, raw);

    // Assert
    expect(result).toEqual({ ok: true, value: { alt: true, ctrl: false, shift: false, meta: true } });
  });

  test('should fail when a modifier is missing', () => {
    const result = decode(keysDecoder, without(mouseFields(), 'shiftKey'));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.issues[0]?.path).toEqual(['shiftKey']);
      expect(result.error.message).toBe('Failed to decode event: shiftKey: Required');
    }
  });

  test('should fail instead of defaulting when a modifier is not a boolean', () => {
    const result = decode(keysDecoder, mouseFields({ ctrlKey: 0 }));

    expect(result.ok).toBe(false);
  });
});

describe('coordinate decoders', () => {
  test('should keep the exact values of each space', () => {
    const raw = mouseFields({ clientX: 12.5, clientY: 7.0 });

    expect(clientPosDecoder.parse(raw)).toEqual([12.5, 7]);
    expect(offsetPosDecoder.parse(raw)).toEqual([3, 4]);
    expect(pagePosDecoder.parse(raw)).toEqual([5, 6]);
    expect(screenPosDecoder.parse(raw)).toEqual([7, 8]);
  });

  test('should round-trip any pair of numbers', () => {
    fc.assert(
      fc.property(fc.double({ noNaN: true }), fc.double({ noNaN: true }), (x, y) => {
        expect(clientPosDecoder.parse({ clientX: x, clientY: y })).toEqual([x, y]);
      }),
      propertyConfig,
    );
  });

  test('should fail when only one coordinate of the pair is present', () => {
    expect(decode(pagePosDecoder, { pageX: 1 }).ok).toBe(false);
  });

  test('should fail on a string coordinate', () => {
    expect(decode(screenPosDecoder, { screenX: '1', screenY: 2 }).ok).toBe(false);
  });

  test('should keep NaN coordinates', () => {
    expect(offsetPosDecoder.parse(mouseFields({ offsetX: Number.NaN }))).toEqual([Number.NaN, 4]);
  });
});

describe('floatDecoder', () => {
  test('should accept every number', () => {
    expect([0, -1.5, Number.NaN, Number.POSITIVE_INFINITY].map((value) => floatDecoder.parse(value))).toEqual([
      0,
      -1.5,
      Number.NaN,
      Number.POSITIVE_INFINITY,
    ]);
  });

  test('should report the received type', () => {
    // Act
    const wrongType = decode(clientPosDecoder, { clientX: '1', clientY: 2 });
    const missing = decode(clientPosDecoder, { clientY: 2 });

    // Assert
    expect(!wrongType.ok && wrongType.error.message).toBe(
      'Failed to decode event: clientX: Expected number, received string',
    );
    expect(!missing.ok && missing.error.message).toBe('Failed to decode event: clientX: Required');
  });
});

describe('buttonFromCode', () => {
  test('should map the five native codes', () => {
    expect([0, 1, 2, 3, 4].map(buttonFromCode)).toEqual(['main', 'middle', 'secondary', 'back', 'forward']);
  });

  test('should map any other code to error', () => {
    expect(buttonFromCode(99)).toBe('error');
    expect(buttonFromCode(-1)).toBe('error');
  });

  test('should never fail to decode an integer code', () => {
    fc.assert(
      fc.property(fc.integer({ min: 5 }), (code) => {
        expect(decode(buttonDecoder, code)).toEqual({ ok: true, value: 'error' });
      }),
      propertyConfig,
    );
  });

  test('should still fail to decode a code that is not an integer', () => {
    expect(decode(buttonDecoder, 'main').ok).toBe(false);
    expect(decode(buttonDecoder, 1.5).ok).toBe(false);
  });
});

describe('deltaModeFromCode', () => {
  test('should map line and page codes', () => {
    expect(deltaModeFromCode(1)).toBe('line');
    expect(deltaModeFromCode(2)).toBe('page');
  });

  test('should fall back to pixel', () => {
    expect([0, 3, -1].map(deltaModeFromCode)).toEqual(['pixel', 'pixel', 'pixel']);
    expect(deltaModeDecoder.parse(42)).toBe('pixel');
  });
});

describe('deviceTypeFromString', () => {
  test('should recognise pen and touch', () => {
    expect(deviceTypeFromString('pen')).toBe('pen');
    expect(deviceTypeFromString('touch')).toBe('touch');
  });

  test('should map every other string to mouse', () => {
    expect(deviceTypeFromString('mouse')).toBe('mouse');
    expect(deviceTypeFromString('')).toBe('mouse');
    expect(deviceTypeFromString('constructor')).toBe('mouse');

    fc.assert(
      fc.property(
        fc.string().filter((value) => value !== 'pen' && value !== 'touch'),
        (value) => {
          expect(deviceTypeFromString(value)).toBe('mouse');
        },
      ),
      propertyConfig,
    );
  });
});
