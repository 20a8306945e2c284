export { EventBinding, type EventTargetLike, type NativeEvent } from './core/EventBinding.js';
export { DEFAULT_EVENT_OPTIONS, handle, on, onValue, onWithOptions, withDefaults } from './core/listener.js';
export { arrayLike } from './decoder/arrayLike.js';
export { decode } from './decoder/decode.js';
export {
  buttonDecoder,
  buttonFromCode,
  clientPosDecoder,
  deltaModeDecoder,
  deltaModeFromCode,
  deviceTypeDecoder,
  deviceTypeFromString,
  floatDecoder,
  keysDecoder,
  offsetPosDecoder,
  pagePosDecoder,
  screenPosDecoder,
} from './decoder/primitives.js';
export * as Drag from './events/drag.js';
export * as Mouse from './events/mouse.js';
export * as Pointer from './events/pointer.js';
export * as Touch from './events/touch.js';
export * as Wheel from './events/wheel.js';
export { processDragOver, processDragStart, setupDragPorts, type WritableDataTransfer } from './ports/dragPorts.js';
export * from './types/index.js';
