/**
 * Index dispatch type.
 *
 * Claims a namespace path when that namespace has an `index` action and no
 * trailing segments were peeled off into arguments.
 */

import type { Action } from '../../action/action.js';
import type { DispatchContext, SetupContext } from '../../types/context.js';
import { BaseDispatchType } from '../base-dispatch-type.js';

export class IndexDispatchType extends BaseDispatchType {
  readonly name = 'Index';

  private readonly actions: Map<string, Action> = new Map();

  match(ctx: DispatchContext, path: string): boolean {
    if (ctx.request.arguments.length > 0) {
      return false;
    }

    const action = ctx.dispatcher.getAction('index', path);
    if (!action || !this.actions.has(action.reverse) || !action.match(ctx)) {
      return false;
    }

    this.bind(ctx, action, { requestAction: 'index', match: path });
    return true;
  }

  register(_app: SetupContext, action: Action): boolean {
    if (action.name !== 'index') {
      return false;
    }
    this.actions.set(action.reverse, action);
    return true;
  }

  uriForAction(action: Action, captures: readonly string[]): string | null {
    if (captures.length > 0 || !this.actions.has(action.reverse)) {
      return null;
    }
    return `/${action.namespace ?? ''}`;
  }
}
