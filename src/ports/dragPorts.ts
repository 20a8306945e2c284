import { DRAG_DATA_FORMAT } from '../decoder/constants.js';
import { DragPortError } from '../types/error.js';
import type { DragOverPortData, DragPorts, DragStartPortData } from '../types/index.js';

/**
 * The writable part of a native `DataTransfer` used by the sink.
 */
export interface WritableDataTransfer {
  effectAllowed: string;
  dropEffect: string;
  setData(format: string, data: string): void;
}

const isWritableDataTransfer = (value: unknown): value is WritableDataTransfer =>
  typeof value === 'object' && value !== null && typeof Reflect.get(value, 'setData') === 'function';

const dataTransferOf = (event: unknown): WritableDataTransfer => {
  const dataTransfer: unknown =
    typeof event === 'object' && event !== null ? Reflect.get(event, 'dataTransfer') : undefined;
  if (!isWritableDataTransfer(dataTransfer)) {
    throw new DragPortError('Expected a native drag event with a dataTransfer');
  }
  return dataTransfer;
};

/**
 * Applies a drag-start instruction to the native event.
 *
 * Must run synchronously while `dragstart` is dispatched: the browser ignores
 * `effectAllowed` at any other time. Some data is always set, since Firefox does not
 * start a drag without it.
 *
 * @throws {DragPortError} If `event` is not a native drag event.
 */
export const processDragStart = ({ effectAllowed, event }: DragStartPortData): void => {
  const dataTransfer = dataTransferOf(event);
  dataTransfer.setData(DRAG_DATA_FORMAT, '');
  dataTransfer.effectAllowed = effectAllowed;
};

/**
 * Applies a drag-over instruction to the native event.
 * Must run synchronously on every `dragover` the drop target receives.
 *
 * @throws {DragPortError} If `event` is not a native drag event.
 */
export const processDragOver = ({ dropEffect, event }: DragOverPortData): void => {
  const dataTransfer = dataTransferOf(event);
  dataTransfer.dropEffect = dropEffect;
};

/**
 * Connects both sinks to the outgoing channels of a UI runtime.
 *
 * @example
 * ```ts
 * setupDragPorts(app.ports);
 * ```
 */
export const setupDragPorts = (ports: DragPorts): void => {
  ports.dragstart.subscribe(processDragStart);
  ports.dragover.subscribe(processDragOver);
};
