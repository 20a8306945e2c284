import { z } from 'zod';
import * as listener from '../core/listener.js';
import { arrayLike } from '../decoder/arrayLike.js';
import { forwardIssues } from '../decoder/decode.js';
import type {
  DataTransfer,
  Decoder,
  DragEvent,
  DragOverPortData,
  DragStartPortData,
  DropEffect,
  EffectAllowed,
  EffectAllowedValue,
  EventHandler,
  EventOptions,
  File,
} from '../types/index.js';
import { mouseShape, toMouseEvent } from './mouse.js';

const fileShape = z.object({
  name: z.string(),
  type: z.string(),
  size: z.number().int().nonnegative(),
});

/**
 * Decodes a native `File`. The file object itself is kept in `data`.
 */
export const fileDecoder: Decoder<File> = z.unknown().transform((raw, ctx) => {
  const fields = fileShape.safeParse(raw);
  if (!fields.success) {
    forwardIssues(ctx, fields.error.issues);
    return z.NEVER;
  }
  return { name: fields.data.name, mimeType: fields.data.type, size: fields.data.size, data: raw };
});

/**
 * Decodes a native `FileList`.
 */
export const fileListDecoder: Decoder<readonly File[]> = arrayLike(fileDecoder);

export const dataTransferDecoder: Decoder<DataTransfer> = z.object({
  files: fileListDecoder,
  types: arrayLike(z.string()),
  dropEffect: z.string(),
});

export const eventDecoder: Decoder<DragEvent> = mouseShape
  .extend({ dataTransfer: dataTransferDecoder })
  .transform((fields) => ({
    dataTransfer: fields.dataTransfer,
    mouseEvent: toMouseEvent(fields),
  }));

const DROP_EFFECTS = {
  none: 'none',
  move: 'move',
  copy: 'copy',
  link: 'link',
} as const satisfies Record<DropEffect, DropEffect>;

/**
 * Decodes a `dropEffect` string. The native vocabulary is closed: other strings fail.
 */
export const dropEffectDecoder: Decoder<DropEffect> = z.enum(['none', 'move', 'copy', 'link']);

export const dropEffectToString = (dropEffect: DropEffect): DropEffect => DROP_EFFECTS[dropEffect];

export const dropEffectFromString = (value: string): DropEffect | undefined => {
  const result = dropEffectDecoder.safeParse(value);
  return result.success ? result.data : undefined;
};

/**
 * Collapses the allowed operations to the `effectAllowed` value the browser expects.
 */
export const effectAllowedToString = ({ move, copy, link }: EffectAllowed): EffectAllowedValue => {
  if (move && copy && link) {
    return 'all';
  }
  if (move && copy) {
    return 'copyMove';
  }
  if (move && link) {
    return 'linkMove';
  }
  if (copy && link) {
    return 'copyLink';
  }
  if (move) {
    return 'move';
  }
  if (copy) {
    return 'copy';
  }
  if (link) {
    return 'link';
  }
  return 'none';
};

/**
 * Packs the data the drag-start sink needs to set `effectAllowed`.
 *
 * The browser only honours `effectAllowed` while `dragstart` is being dispatched, so
 * the sink must run synchronously from the `onStart` message.
 *
 * @example
 * ```ts
 * const source = Drag.onSourceDrag({
 *   effectAllowed: { move: true, copy: false, link: false },
 *   onStart: (effect, event) => ({ type: 'drag-start', port: Drag.startPortData(effect, event) }),
 *   onEnd: () => ({ type: 'drag-end' }),
 * });
 * ```
 */
export const startPortData = (effectAllowed: EffectAllowed, event: unknown): DragStartPortData => ({
  effectAllowed: effectAllowedToString(effectAllowed),
  event,
});

/**
 * Packs the data the drag-over sink needs to set `dropEffect`.
 * It has to be sent on every `dragover` occurrence.
 */
export const overPortData = (dropEffect: DropEffect, event: unknown): DragOverPortData => ({
  dropEffect: dropEffectToString(dropEffect),
  event,
});

// Cancelling dragover and drop is what makes an element a drop zone; without it the
// browser refuses the drop or navigates to the dropped file.
const DROP_ZONE_OPTIONS: EventOptions = { stopPropagation: true, preventDefault: true };

// Cancelling dragstart would abort the drag.
const DRAG_START_OPTIONS: EventOptions = { stopPropagation: true, preventDefault: false };

export const defaultOptions: EventOptions = { stopPropagation: true, preventDefault: false };

/**
 * Listeners for an element that is dragged.
 *
 * @property effectAllowed - Operations the source allows, handed back to `onStart`
 * @property onStart - Receives the undecoded `dragstart` event, for {@link startPortData}
 * @property onEnd - `dragend`
 * @property onDrag - `drag`, fired continuously during the drag
 * @property options - Flags for `dragend` and `drag`, over {@link defaultOptions}
 */
export type DraggedSourceConfig<Msg> = {
  effectAllowed: EffectAllowed;
  onStart: (effectAllowed: EffectAllowed, event: unknown) => Msg;
  onEnd: (event: DragEvent) => Msg;
  onDrag?: (event: DragEvent) => Msg;
  options?: Partial<EventOptions>;
};

/**
 * Listeners for a zone receiving files dragged from the operating system.
 * All of them cancel the event, so the browser never opens the file itself.
 */
export type FileDropConfig<Msg> = {
  onOver: (event: DragEvent) => Msg;
  onDrop: (event: DragEvent) => Msg;
  onEnter?: (event: DragEvent) => Msg;
  onLeave?: (event: DragEvent) => Msg;
};

/**
 * Listeners for a zone receiving a dragged element.
 *
 * @property dropEffect - Effect proposed while hovering, handed back to `onOver`
 * @property onOver - Receives the undecoded `dragover` event, for {@link overPortData}
 * @property options - Flags for `dragenter` and `dragleave`, over {@link defaultOptions}
 */
export type DropTargetConfig<Msg> = {
  dropEffect: DropEffect;
  onOver: (dropEffect: DropEffect, event: unknown) => Msg;
  onDrop: (event: DragEvent) => Msg;
  onEnter?: (event: DragEvent) => Msg;
  onLeave?: (event: DragEvent) => Msg;
  options?: Partial<EventOptions>;
};

const optionalHandler = <Msg>(
  event: string,
  options: EventOptions,
  tag: ((event: DragEvent) => Msg) | undefined,
): EventHandler<Msg>[] => (tag ? [listener.onWithOptions(event, eventDecoder, options, tag)] : []);

/**
 * Handlers for a drag source, in the order `dragstart`, `dragend`, `drag`.
 *
 * The browser only starts a drag from an element marked `draggable="true"`. Handlers
 * cannot set attributes, so the caller sets it on the element the handlers are bound to.
 *
 * @example
 * ```ts
 * card.draggable = true;
 * new EventBinding(card, Drag.onSourceDrag(config)).enable();
 * ```
 */
export const onSourceDrag = <Msg>(config: DraggedSourceConfig<Msg>): readonly EventHandler<Msg>[] => {
  const options = listener.withDefaults(defaultOptions, config.options);
  return [
    listener.onValue('dragstart', DRAG_START_OPTIONS, (event) => config.onStart(config.effectAllowed, event)),
    listener.onWithOptions('dragend', eventDecoder, options, config.onEnd),
    ...optionalHandler('drag', options, config.onDrag),
  ];
};

/**
 * @example
 * ```ts
 * const dropZone = Drag.onFileFromOS({
 *   onOver: () => ({ type: 'hovering' }),
 *   onDrop: (event) => ({ type: 'files', files: event.dataTransfer.files }),
 * });
 * ```
 */
export const onFileFromOS = <Msg>(config: FileDropConfig<Msg>): readonly EventHandler<Msg>[] => [
  listener.onWithOptions('dragover', eventDecoder, DROP_ZONE_OPTIONS, config.onOver),
  listener.onWithOptions('drop', eventDecoder, DROP_ZONE_OPTIONS, config.onDrop),
  ...optionalHandler('dragenter', DROP_ZONE_OPTIONS, config.onEnter),
  ...optionalHandler('dragleave', DROP_ZONE_OPTIONS, config.onLeave),
];

export const onDropTarget = <Msg>(config: DropTargetConfig<Msg>): readonly EventHandler<Msg>[] => {
  const options = listener.withDefaults(defaultOptions, config.options);
  return [
    listener.onValue('dragover', DROP_ZONE_OPTIONS, (event) => config.onOver(config.dropEffect, event)),
    listener.onWithOptions('drop', eventDecoder, DROP_ZONE_OPTIONS, config.onDrop),
    ...optionalHandler('dragenter', options, config.onEnter),
    ...optionalHandler('dragleave', options, config.onLeave),
  ];
};
