/**
 * Contracts between the dispatcher and the application that hosts it.
 *
 * The dispatcher never constructs requests or components itself; it only
 * reads and rebinds the state described here. `Application` and
 * `RequestContext` are the reference implementations.
 */

import type { Action } from '../action/action.js';
import type { DispatcherConfig } from '../config/index.js';
import type { DispatchRequest } from '../context/request.js';
import type { Dispatcher } from '../dispatcher/dispatcher.js';
import type { Logger } from '../logging/index.js';

/**
 * Anything the application holds by name: controllers, models, views.
 */
export type Component = object;

/**
 * A component that registers actions during setup.
 */
export interface RegistersActions {
  registerActions(app: SetupContext): void;
}

/**
 * Check whether a component exposes the registration hook.
 */
export function hasRegisterActions(component: Component): component is RegistersActions {
  return typeof Reflect.get(component, 'registerActions') === 'function';
}

/**
 * Application-level view used during setup and registration.
 */
export interface SetupContext {
  readonly config: DispatcherConfig;
  readonly debug: boolean;
  readonly log: Logger;
  readonly dispatcher: Dispatcher;

  /** Every component, in the order they were added. */
  components(): Iterable<Component>;

  /** Look up a component by its class name. */
  component(name: string): Component | undefined;
}

/**
 * Per-request state.
 *
 * Mutable fields are rebound by forward/visit for the duration of a
 * delegated call and restored afterwards. Never share one context between
 * concurrent requests.
 */
export interface DispatchContext extends SetupContext {
  readonly request: DispatchRequest;

  /** The action resolved for this request (or rebound by visit). */
  action: Action | null;

  /** Namespace of the resolved action. */
  namespace: string;

  /** Actions currently executing, innermost last. */
  readonly stack: Action[];

  /** Value returned by the most recently executed action. */
  state: unknown;

  /** Request-level errors, in the order they were recorded. */
  readonly errors: readonly string[];

  /** Record a request-level error. */
  error(message: string): void;

  /** Run an already-resolved action inside a new stack frame. */
  execute(action: Action): Promise<unknown>;
}
