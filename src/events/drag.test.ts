import * as fc from 'fast-check';
import { describe, expect, expectTypeOf, test } from 'vitest';
import { handle } from '../core/listener.js';
import { decode } from '../decoder/decode.js';
import { arrayLikeOf, mouseFields } from '../test-utils.js';
import type { DropEffect, EffectAllowedValue, EventHandler } from '../types/index.js';
import * as Drag from './drag.js';

const fileHandle = { name: 'notes.txt', type: 'text/plain', size: 42 };

const dragFields = (dataTransfer: Record<string, unknown> = {}): Record<string, unknown> =>
  mouseFields({
    dataTransfer: {
      files: arrayLikeOf([fileHandle]),
      types: ['Files'],
      dropEffect: 'none',
      ...dataTransfer,
    },
  });

const flagsOf = <Msg>(handlers: readonly EventHandler<Msg>[]): Record<string, unknown> =>
  Object.fromEntries(handlers.map((handler) => [handler.event, handler.options]));

describe('Drag.eventDecoder', () => {
  test('should decode the data transfer and embed the mouse event', () => {
    // Act
    const event = Drag.eventDecoder.parse(dragFields());

    // Assert
    expect(event.dataTransfer.types).toEqual(['Files']);
    expect(event.dataTransfer.dropEffect).toBe('none');
    expect(event.dataTransfer.files).toHaveLength(1);
    expect(event.mouseEvent.clientPos).toEqual([1, 2]);
  });

  test('should pass the native file through untouched', () => {
    const [file] = Drag.eventDecoder.parse(dragFields()).dataTransfer.files;

    expect(file?.name).toBe('notes.txt');
    expect(file?.mimeType).toBe('text/plain');
    expect(file?.size).toBe(42);
    expect(file?.data).toBe(fileHandle);
  });

  test('should fail when a file has no size', () => {
    const result = decode(Drag.fileDecoder, { name: 'notes.txt', type: 'text/plain' });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.issues[0]?.path).toEqual(['size']);
    }
  });

  test('should fail when the file list is incomplete', () => {
    expect(decode(Drag.eventDecoder, dragFields({ files: { length: 2, 0: fileHandle } })).ok).toBe(false);
  });

  test('should fail without a dataTransfer', () => {
    expect(decode(Drag.eventDecoder, mouseFields()).ok).toBe(false);
  });
});

describe('effectAllowedToString', () => {
  test.each([
    [false, false, false, 'none'],
    [true, false, false, 'move'],
    [false, true, false, 'copy'],
    [false, false, true, 'link'],
    [true, true, false, 'copyMove'],
    [true, false, true, 'linkMove'],
    [false, true, true, 'copyLink'],
    [true, true, true, 'all'],
  ])('move=%s copy=%s link=%s should give %s', (move, copy, link, expected) => {
    expect(Drag.effectAllowedToString({ move, copy, link })).toBe(expected);
  });

  test('should give a distinct value for each combination', () => {
    const values = new Set<string>();
    fc.assert(
      fc.property(fc.boolean(), fc.boolean(), fc.boolean(), (move, copy, link) => {
        const value = Drag.effectAllowedToString({ move, copy, link });
        expect(Drag.effectAllowedToString({ move, copy, link })).toBe(value);
        values.add(value);
      }),
      { numRuns: 200, seed: 7 },
    );
    expect(values.size).toBe(8);
  });
});

describe('drop effects', () => {
  const effects: DropEffect[] = ['none', 'move', 'copy', 'link'];

  test('should map each effect to its native string and back', () => {
    for (const effect of effects) {
      expect(Drag.dropEffectFromString(Drag.dropEffectToString(effect))).toBe(effect);
    }
    expect(effects.map(Drag.dropEffectToString)).toEqual(['none', 'move', 'copy', 'link']);
  });

  test('should reject strings outside the native vocabulary', () => {
    expect(Drag.dropEffectFromString('copyMove')).toBeUndefined();
    expect(decode(Drag.dropEffectDecoder, 'all').ok).toBe(false);
  });
});

describe('port data', () => {
  test('startPortData should carry the effect and the untouched event', () => {
    const native = { dataTransfer: {} };

    const data = Drag.startPortData({ move: true, copy: false, link: true }, native);

    expect(data).toEqual({ effectAllowed: 'linkMove', event: native });
    expect(data.event).toBe(native);
    expectTypeOf(data.effectAllowed).toEqualTypeOf<EffectAllowedValue>();
  });

  test('overPortData should carry the drop effect and the untouched event', () => {
    const native = { dataTransfer: {} };

    const data = Drag.overPortData('copy', native);

    expect(data.dropEffect).toBe('copy');
    expect(data.event).toBe(native);
    expectTypeOf(data.dropEffect).toEqualTypeOf<DropEffect>();
  });
});

describe('Drag.onSourceDrag', () => {
  test('should hand the raw dragstart event to onStart without cancelling it', () => {
    // Arrange
    const effectAllowed = { move: true, copy: false, link: false };
    const [start] = Drag.onSourceDrag({
      effectAllowed,
      onStart: (effect, event) => Drag.startPortData(effect, event),
      onEnd: () => null,
    });
    const native = { notADecodableEvent: true };

    // Act
    const dispatch = start ? handle(start, native) : undefined;

    // Assert
    expect(start?.event).toBe('dragstart');
    expect(dispatch).toEqual({
      message: { effectAllowed: 'move', event: native },
      stopPropagation: true,
      preventDefault: false,
    });
  });

  test('should only add drag when onDrag is given', () => {
    const base = { effectAllowed: { move: true, copy: true, link: true }, onStart: () => 0, onEnd: () => 1 };

    expect(Drag.onSourceDrag(base).map((handler) => handler.event)).toEqual(['dragstart', 'dragend']);
    expect(Drag.onSourceDrag({ ...base, onDrag: () => 2 }).map((handler) => handler.event)).toEqual([
      'dragstart',
      'dragend',
      'drag',
    ]);
  });

  test('should apply options to dragend and drag only', () => {
    const handlers = Drag.onSourceDrag({
      effectAllowed: { move: true, copy: false, link: false },
      onStart: () => 'start',
      onEnd: () => 'end',
      onDrag: () => 'drag',
      options: { stopPropagation: false, preventDefault: true },
    });

    expect(flagsOf(handlers)).toEqual({
      dragstart: { stopPropagation: true, preventDefault: false },
      dragend: { stopPropagation: false, preventDefault: true },
      drag: { stopPropagation: false, preventDefault: true },
    });
  });
});

describe('Drag.onFileFromOS', () => {
  test('should cancel every listener so the browser does not open the file', () => {
    const handlers = Drag.onFileFromOS({
      onOver: () => 'over',
      onDrop: () => 'drop',
      onEnter: () => 'enter',
      onLeave: () => 'leave',
    });

    const cancelled = { stopPropagation: true, preventDefault: true };
    expect(flagsOf(handlers)).toEqual({
      dragover: cancelled,
      drop: cancelled,
      dragenter: cancelled,
      dragleave: cancelled,
    });
  });

  test('should report the dropped files', () => {
    const [, drop] = Drag.onFileFromOS({
      onOver: () => [],
      onDrop: (event) => event.dataTransfer.files.map((file) => file.name),
    });

    expect(drop ? handle(drop, dragFields())?.message : undefined).toEqual(['notes.txt']);
  });
});

describe('Drag.onDropTarget', () => {
  test('should hand the raw dragover event and the drop effect to onOver', () => {
    const [over] = Drag.onDropTarget({
      dropEffect: 'move',
      onOver: (effect, event) => Drag.overPortData(effect, event),
      onDrop: () => null,
    });
    const native = {};

    expect(over ? handle(over, native) : undefined).toEqual({
      message: { dropEffect: 'move', event: native },
      stopPropagation: true,
      preventDefault: true,
    });
  });

  test('should keep dragover and drop cancelled whatever the options', () => {
    const handlers = Drag.onDropTarget({
      dropEffect: 'copy',
      onOver: () => 'over',
      onDrop: () => 'drop',
      onEnter: () => 'enter',
      onLeave: () => 'leave',
      options: { stopPropagation: false, preventDefault: false },
    });

    const cancelled = { stopPropagation: true, preventDefault: true };
    const passive = { stopPropagation: false, preventDefault: false };
    expect(flagsOf(handlers)).toEqual({ dragover: cancelled, drop: cancelled, dragenter: passive, dragleave: passive });
  });
});
