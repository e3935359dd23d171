/**
 * Dispatcher events: names and the typed emitter.
 */

export {
  type ActionRegisteredPayload,
  type DelegationFailedPayload,
  type DelegationVerb,
  DispatcherEventEmitter,
  type DispatcherEventMap,
  type DispatchTypeLoadedPayload,
  type RequestResolvedPayload,
  type RequestUnresolvedPayload,
  type SetupCompletedPayload,
} from './event-emitter.js';
export {
  type DispatcherEventName,
  DispatcherEventNames,
  RequestEventNames,
  SetupEventNames,
} from './event-names.js';
