/**
 * Base class for dispatch types.
 *
 * Supplies the "not mine" answer for every optional capability so that a
 * subclass only implements what it supports.
 */

import type { Action } from '../action/action.js';
import type { DispatchContext, SetupContext } from '../types/context.js';
import type { DispatchType, DispatchTypeListing } from './dispatch-type.js';

/**
 * What a successful match writes onto the request.
 */
export interface MatchBinding {
  /** Private path reported as the request action */
  requestAction: string;

  /** Portion of the path that matched */
  match: string;

  /** Captured values, when the type captures */
  captures?: string[];
}

export abstract class BaseDispatchType implements DispatchType {
  abstract readonly name: string;

  abstract match(ctx: DispatchContext, path: string): boolean;

  register(_app: SetupContext, _action: Action): boolean {
    return false;
  }

  uriForAction(_action: Action, _captures: readonly string[]): string | null {
    return null;
  }

  expandAction(_action: Action): Action | null {
    return null;
  }

  list(_app: SetupContext): DispatchTypeListing | null {
    return null;
  }

  /**
   * Bind a matched action onto the context.
   */
  protected bind(ctx: DispatchContext, action: Action, binding: MatchBinding): void {
    ctx.action = action;
    ctx.namespace = action.namespace ?? '';
    ctx.request.action = binding.requestAction;
    ctx.request.match = binding.match;
    if (binding.captures) {
      ctx.request.captures = binding.captures;
    }
  }

  toString(): string {
    return this.name;
  }
}
