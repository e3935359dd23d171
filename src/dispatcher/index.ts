export { renderTable } from './action-table.js';
export {
  canDispatch,
  type Command,
  type CommandOptions,
  DISPATCH_ENTRY,
  Dispatcher,
  type DispatcherOptions,
  type ResolvedCommand,
} from './dispatcher.js';
export { ActionRegistrationError, DispatchError, DispatchTypeNotFoundError } from './errors.js';
export { decodeSegment, splitPath } from './path-utils.js';
export { type AbortKind, ControlSignal, DetachSignal, isAbortSignal, JumpSignal } from './signals.js';
