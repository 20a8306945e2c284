import { describe, expect, test } from 'vitest';
import { handle } from '../core/listener.js';
import { decode } from '../decoder/decode.js';
import { mouseFields, without } from '../test-utils.js';
import * as Wheel from './wheel.js';

describe('Wheel.eventDecoder', () => {
  test('should decode the vertical delta and embed the mouse event', () => {
    // Arrange
    const raw = mouseFields({ ctrlKey: true, deltaY: -120.5, deltaMode: 1 });

    // Act
    const event = Wheel.eventDecoder.parse(raw);

    // Assert
    expect(event.deltaY).toBe(-120.5);
    expect(event.deltaMode).toBe('line');
    expect(event.mouseEvent.keys.ctrl).toBe(true);
    expect(event.mouseEvent.pagePos).toEqual([5, 6]);
  });

  test.each([
    [0, 'pixel'],
    [1, 'line'],
    [2, 'page'],
    [3, 'pixel'],
    [-1, 'pixel'],
  ])('should read deltaMode %i as %s', (deltaMode, expected) => {
    expect(Wheel.eventDecoder.parse(mouseFields({ deltaY: 0, deltaMode })).deltaMode).toBe(expected);
  });

  test('should fail without deltaY', () => {
    expect(decode(Wheel.eventDecoder, without(mouseFields({ deltaY: 1, deltaMode: 0 }), 'deltaY')).ok).toBe(false);
  });
});

describe('Wheel listeners', () => {
  test('onWheel should listen to wheel with the default options', () => {
    const handler = Wheel.onWheel((event) => event.deltaY);

    expect(handler.event).toBe('wheel');
    expect(handle(handler, mouseFields({ deltaY: 3, deltaMode: 0 }))).toEqual({
      message: 3,
      stopPropagation: true,
      preventDefault: true,
    });
  });

  test('onWithOptions should let the page scroll', () => {
    const handler = Wheel.onWithOptions({ preventDefault: false }, (event) => event.deltaMode);

    expect(handle(handler, mouseFields({ deltaY: 3, deltaMode: 2 }))).toEqual({
      message: 'page',
      stopPropagation: true,
      preventDefault: false,
    });
  });
});
