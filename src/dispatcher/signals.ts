/**
 * Control-flow signals for delegation.
 *
 * `detach` and `jump` never return to their caller: they throw one of these
 * signals, which unwinds the pending action frames until the context's
 * execute boundary absorbs it. The signals are not Error subclasses, so code
 * that records `instanceof Error` failures lets them pass untouched.
 */

export type AbortKind = 'detach' | 'jump';

/**
 * Base class for the two abort signals.
 */
export abstract class ControlSignal {
  abstract readonly kind: AbortKind;

  toString(): string {
    return `ControlSignal(${this.kind})`;
  }
}

/**
 * Abort the current handler chain.
 *
 * Re-thrown by every execute frame while more than one frame remains on the
 * action stack, so it stops just below the outermost dispatched action.
 */
export class DetachSignal extends ControlSignal {
  readonly kind = 'detach';
}

/**
 * Abort the entire request.
 *
 * Re-thrown while any frame remains on the action stack, so it passes every
 * pending visit and forward.
 */
export class JumpSignal extends ControlSignal {
  readonly kind = 'jump';
}

/**
 * Check whether a thrown value is one of the abort signals.
 */
export function isAbortSignal(value: unknown): value is ControlSignal {
  return value instanceof ControlSignal;
}
