/**
 * Error types for dispatcher setup and registration.
 *
 * Resolution failures at request time are not errors: they are recorded on
 * the request context and reported as falsy results.
 */

/**
 * Base error class for dispatcher errors.
 */
export class DispatchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DispatchError';
  }
}

/**
 * Error thrown when a dispatch type name cannot be resolved.
 */
export class DispatchTypeNotFoundError extends DispatchError {
  readonly typeName: string;

  constructor(typeName: string) {
    super(`Couldn't load dispatch type "${typeName}"`);
    this.name = 'DispatchTypeNotFoundError';
    this.typeName = typeName;
  }
}

/**
 * Error thrown when an action's attributes cannot be registered.
 */
export class ActionRegistrationError extends DispatchError {
  readonly action: string;

  constructor(message: string, action: string) {
    super(`${message} registering /${action}`);
    this.name = 'ActionRegistrationError';
    this.action = action;
  }
}
