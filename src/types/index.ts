export type { Button, DeltaMode, DeviceType } from './button.js';
export type {
  DragOverPortData,
  DragPorts,
  DragStartPortData,
  DropEffect,
  EffectAllowed,
  EffectAllowedValue,
  Port,
} from './drag.js';
export { BindingError, DecodeError, DragPortError } from './error.js';
export type {
  ContactDetails,
  Coordinates,
  DataTransfer,
  DragEvent,
  File,
  Keys,
  MouseEvent,
  PointerEvent,
  TouchEvent,
  TouchPoint,
  WheelEvent,
} from './event.js';
export type {
  BindingEventMap,
  Decoder,
  DecodeResult,
  Dispatch,
  ErrorEventListener,
  EventHandler,
  ListenerFor,
  MessageListener,
} from './eventHandler.js';
export type { EventOptions, MessageStreamOptions } from './options.js';
