/**
 * Default dispatch type.
 *
 * Catch-all: once the resolver has peeled the path down to a single
 * segment (or the root), binds the nearest `default` action along the
 * request path's namespace ancestry.
 */

import type { DispatchContext } from '../../types/context.js';
import { BaseDispatchType } from '../base-dispatch-type.js';

export class DefaultDispatchType extends BaseDispatchType {
  readonly name = 'Default';

  match(ctx: DispatchContext, path: string): boolean {
    if (path.includes('/')) {
      return false;
    }

    const candidates = ctx.dispatcher.getActions(ctx, 'default', ctx.request.path);
    const action = candidates[candidates.length - 1];
    if (!action || !action.match(ctx)) {
      return false;
    }

    this.bind(ctx, action, { requestAction: 'default', match: '' });
    return true;
  }
}
