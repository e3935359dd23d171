/**
 * Standard event names emitted by the dispatcher.
 */

/**
 * Event names for setup and registration
 */
export const SetupEventNames = {
  /** Emitted when a dispatch type instance joins the dispatcher */
  DISPATCH_TYPE_LOADED: 'dispatch_type.loaded',

  /** Emitted after an action is stored in the namespace tree */
  ACTION_REGISTERED: 'action.registered',

  /** Emitted once setupActions has loaded the postload dispatch types */
  SETUP_COMPLETED: 'setup.completed',
} as const;

/**
 * Event names for request resolution and delegation
 */
export const RequestEventNames = {
  /** Emitted when prepareAction binds an action */
  REQUEST_RESOLVED: 'request.resolved',

  /** Emitted when no dispatch type claims any prefix of the path */
  REQUEST_UNRESOLVED: 'request.unresolved',

  /** Emitted when forward/detach/visit/jump cannot resolve or run its command */
  DELEGATION_FAILED: 'delegation.failed',
} as const;

/**
 * All event names combined
 */
export const DispatcherEventNames = {
  ...SetupEventNames,
  ...RequestEventNames,
} as const;

/**
 * Type representing all possible event names
 */
export type DispatcherEventName = (typeof DispatcherEventNames)[keyof typeof DispatcherEventNames];
