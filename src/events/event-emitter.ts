/**
 * Type-safe event emitter for dispatcher diagnostics.
 *
 * Listeners observe setup and request resolution; nothing they do changes
 * how a request is dispatched.
 */

import { EventEmitter } from 'eventemitter3';
import { RequestEventNames, SetupEventNames } from './event-names.js';

export type DelegationVerb = 'forward' | 'detach' | 'visit' | 'jump';

/**
 * Event payload types
 */
export interface DispatchTypeLoadedPayload {
  name: string;
  lazy: boolean;
  timestamp: Date;
}

export interface ActionRegisteredPayload {
  namespace: string;
  name: string;
  reverse: string;
  attributes: string[];
  timestamp: Date;
}

export interface SetupCompletedPayload {
  dispatchTypes: string[];
  actionCount: number;
  timestamp: Date;
}

export interface RequestResolvedPayload {
  path: string;
  action: string;
  arguments: string[];
  captures: string[];
  timestamp: Date;
}

export interface RequestUnresolvedPayload {
  path: string;
  timestamp: Date;
}

export interface DelegationFailedPayload {
  verb: DelegationVerb;
  command: string;
  message: string;
  timestamp: Date;
}

/**
 * Event map for type-safe event handling
 */
export interface DispatcherEventMap {
  'dispatch_type.loaded': (payload: DispatchTypeLoadedPayload) => void;
  'action.registered': (payload: ActionRegisteredPayload) => void;
  'setup.completed': (payload: SetupCompletedPayload) => void;
  'request.resolved': (payload: RequestResolvedPayload) => void;
  'request.unresolved': (payload: RequestUnresolvedPayload) => void;
  'delegation.failed': (payload: DelegationFailedPayload) => void;
}

export class DispatcherEventEmitter extends EventEmitter<DispatcherEventMap> {
  emitDispatchTypeLoaded(name: string, lazy: boolean): void {
    this.emit(SetupEventNames.DISPATCH_TYPE_LOADED, { name, lazy, timestamp: new Date() });
  }

  emitActionRegistered(namespace: string, name: string, reverse: string, attributes: string[]): void {
    this.emit(SetupEventNames.ACTION_REGISTERED, {
      namespace,
      name,
      reverse,
      attributes,
      timestamp: new Date(),
    });
  }

  emitSetupCompleted(dispatchTypes: string[], actionCount: number): void {
    this.emit(SetupEventNames.SETUP_COMPLETED, {
      dispatchTypes,
      actionCount,
      timestamp: new Date(),
    });
  }

  emitRequestResolved(path: string, action: string, args: string[], captures: string[]): void {
    this.emit(RequestEventNames.REQUEST_RESOLVED, {
      path,
      action,
      arguments: args,
      captures,
      timestamp: new Date(),
    });
  }

  emitRequestUnresolved(path: string): void {
    this.emit(RequestEventNames.REQUEST_UNRESOLVED, { path, timestamp: new Date() });
  }

  emitDelegationFailed(verb: DelegationVerb, command: string, message: string): void {
    this.emit(RequestEventNames.DELEGATION_FAILED, {
      verb,
      command,
      message,
      timestamp: new Date(),
    });
  }
}
