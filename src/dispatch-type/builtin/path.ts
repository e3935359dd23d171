/**
 * Path dispatch type.
 *
 * Indexes the literal paths declared in `Path` attributes. The most
 * recently registered action for a path is tried first; an action whose
 * `Args` count does not fit the request is skipped.
 */

import type { Action } from '../../action/action.js';
import type { DispatchContext, SetupContext } from '../../types/context.js';
import { BaseDispatchType } from '../base-dispatch-type.js';
import type { DispatchTypeListing } from '../dispatch-type.js';

/**
 * Normalize a declared path into an index key: no leading slash, '/' for the root.
 */
export function pathKey(path: string): string {
  const stripped = path.replace(/^\//, '');
  return stripped.length > 0 ? stripped : '/';
}

export class PathDispatchType extends BaseDispatchType {
  readonly name = 'Path';

  private readonly paths: Map<string, Action[]> = new Map();

  match(ctx: DispatchContext, path: string): boolean {
    const key = path || '/';

    for (const action of this.paths.get(key) ?? []) {
      if (!action.match(ctx)) {
        continue;
      }
      this.bind(ctx, action, { requestAction: key, match: key });
      return true;
    }

    return false;
  }

  register(_app: SetupContext, action: Action): boolean {
    const declared = action.attributes.Path;
    if (!declared || declared.length === 0) {
      return false;
    }

    for (const path of declared) {
      this.registerPath(path, action);
    }
    return true;
  }

  registerPath(path: string, action: Action): void {
    const key = pathKey(path);
    const actions = this.paths.get(key) ?? [];
    actions.unshift(action);
    this.paths.set(key, actions);
  }

  uriForAction(action: Action, captures: readonly string[]): string | null {
    if (captures.length > 0) {
      return null;
    }

    const path = action.attribute('Path');
    if (path === undefined) {
      return null;
    }
    if (path.length === 0) {
      return '/';
    }
    return path.startsWith('/') ? path : `/${path}`;
  }

  list(_app: SetupContext): DispatchTypeListing | null {
    if (this.paths.size === 0) {
      return null;
    }

    const rows: string[][] = [];
    for (const key of Array.from(this.paths.keys()).sort()) {
      const display = key === '/' ? key : `/${key}`;
      for (const action of this.paths.get(key) ?? []) {
        rows.push([display, `/${action.reverse}`]);
      }
    }

    return { title: 'Loaded Path actions', columns: ['Path', 'Private'], rows };
  }
}
