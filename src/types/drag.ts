/**
 * The drop effect a drop target proposes, mirroring `dataTransfer.dropEffect`.
 */
export type DropEffect = 'none' | 'move' | 'copy' | 'link';

/**
 * The operations a drag source allows. Each combination maps to exactly one
 * `dataTransfer.effectAllowed` value.
 *
 * | move | copy | link | value |
 * |------|------|------|-------|
 * | false | false | false | `'none'` |
 * | true | false | false | `'move'` |
 * | false | true | false | `'copy'` |
 * | false | false | true | `'link'` |
 * | true | true | false | `'copyMove'` |
 * | true | false | true | `'linkMove'` |
 * | false | true | true | `'copyLink'` |
 * | true | true | true | `'all'` |
 */
export type EffectAllowed = Readonly<{
  move: boolean;
  copy: boolean;
  link: boolean;
}>;

export type EffectAllowedValue = 'none' | 'move' | 'copy' | 'link' | 'copyMove' | 'linkMove' | 'copyLink' | 'all';

/**
 * Instruction for the drag-start sink. `event` is the untouched native event.
 */
export type DragStartPortData = Readonly<{
  effectAllowed: EffectAllowedValue;
  event: unknown;
}>;

/**
 * Instruction for the drag-over sink. `event` is the untouched native event.
 */
export type DragOverPortData = Readonly<{
  dropEffect: DropEffect;
  event: unknown;
}>;

/**
 * A subscribable channel, such as an outgoing port of a UI runtime.
 */
export type Port<T> = {
  subscribe: (callback: (data: T) => void) => void;
};

/**
 * The two outgoing channels used to reach the drag sink.
 */
export type DragPorts = {
  dragstart: Port<DragStartPortData>;
  dragover: Port<DragOverPortData>;
};
