/**
 * Chained dispatch type.
 *
 * Builds URLs out of a chain of actions. Each action names its parent with
 * `Chained` ('/' for the root of a chain), the path segment it consumes with
 * `PathPart` (defaults to the action name) and, for links in the middle of a
 * chain, how many segments it captures with `CaptureArgs`. Actions without
 * `CaptureArgs` are endpoints and take the remaining segments as arguments.
 *
 * @example
 * ```typescript
 * // Chained('/') PathPart('blog') CaptureArgs(1)    => blog/base
 * // Chained('/blog/base') PathPart('view') Args(0)  => blog/view
 * //
 * // "blog/42/view" dispatches blog/base with ['42'] and then blog/view.
 * ```
 */

import { ActionChain, captureCount } from '../../action/action-chain.js';
import type { Action } from '../../action/action.js';
import { ActionRegistrationError } from '../../dispatcher/errors.js';
import { decodeSegment, splitPath } from '../../dispatcher/path-utils.js';
import type { DispatchContext, SetupContext } from '../../types/context.js';
import { BaseDispatchType } from '../base-dispatch-type.js';
import type { DispatchTypeListing } from '../dispatch-type.js';

interface ChainMatch {
  actions: Action[];
  captures: string[];
  parts: string[];
}

/**
 * Path spec placeholders for an `Args` or `CaptureArgs` value: one '*' per
 * segment, or '...' when the count is missing or not a whole number.
 */
function wildcards(count: string | undefined): string[] {
  const n = count === undefined ? Number.NaN : Number(count);
  return Number.isInteger(n) && n >= 0 ? Array<string>(n).fill('*') : ['...'];
}

export class ChainedDispatchType extends BaseDispatchType {
  readonly name = 'Chained';

  /** parent private path => path part => actions, newest first */
  private readonly childrenOf: Map<string, Map<string, Action[]>> = new Map();

  /** '/' + reverse => action */
  private readonly actions: Map<string, Action> = new Map();

  private readonly pathParts: Map<Action, string> = new Map();
  private readonly endpoints: Action[] = [];

  match(ctx: DispatchContext, path: string): boolean {
    if (ctx.request.arguments.length > 0) {
      return false;
    }

    const result = this.recurseMatch(ctx, '/', splitPath(path));
    if (!result) {
      return false;
    }

    ctx.request.arguments.push(...result.parts.map(decodeSegment));
    const chain = ActionChain.fromChain(result.actions);
    this.bind(ctx, chain, {
      requestAction: `/${chain.reverse}`,
      match: `/${chain.reverse}`,
      captures: result.captures,
    });
    return true;
  }

  /**
   * Find the best chain under `parent` for the remaining path parts.
   *
   * Longer path parts are tried first; among complete chains the one
   * leaving the fewest unconsumed parts wins, then the one with the fewest
   * captures.
   */
  private recurseMatch(ctx: DispatchContext, parent: string, pathParts: string[]): ChainMatch | null {
    const children = this.childrenOf.get(parent);
    if (!children) {
      return null;
    }

    let best: ChainMatch | null = null;
    const tryParts = Array.from(children.keys()).sort((a, b) => b.length - a.length);

    for (const tryPart of tryParts) {
      const parts = [...pathParts];
      if (tryPart.length > 0) {
        const head = parts.splice(0, splitPath(tryPart).length);
        if (head.join('/') !== tryPart) {
          continue;
        }
      }

      for (const action of children.get(tryPart) ?? []) {
        if (action.attributes.CaptureArgs) {
          const count = captureCount(action);
          if (parts.length < count) {
            continue;
          }

          const remaining = [...parts];
          const captures = remaining.splice(0, count);
          const sub = this.recurseMatch(ctx, `/${action.reverse}`, remaining);
          if (!sub) {
            continue;
          }
          const chainCaptures = [...captures, ...sub.captures];
          if (
            !best ||
            sub.parts.length < best.parts.length ||
            (sub.parts.length === best.parts.length && chainCaptures.length < best.captures.length)
          ) {
            best = {
              actions: [action, ...sub.actions],
              captures: chainCaptures,
              parts: sub.parts,
            };
          }
          continue;
        }

        const saved = ctx.request.arguments;
        ctx.request.arguments = [...saved, ...parts];
        let accepted: boolean;
        try {
          accepted = action.match(ctx);
        } finally {
          ctx.request.arguments = saved;
        }
        if (!accepted) {
          continue;
        }

        // With equal leftovers the last Args(0) endpoint seen wins
        if (
          !best ||
          parts.length < best.parts.length ||
          (parts.length === 0 && action.attribute('Args') === '0')
        ) {
          best = { actions: [action], captures: [], parts };
        }
      }
    }

    return best;
  }

  register(_app: SetupContext, action: Action): boolean {
    const chained = action.attributes.Chained;
    if (!chained || chained.length === 0) {
      return false;
    }
    if (chained.length > 1) {
      throw new ActionRegistrationError('Multiple Chained attributes not supported', action.reverse);
    }

    const parent = chained[0] ?? '/';
    if (parent === `/${action.reverse}`) {
      throw new ActionRegistrationError('Actions cannot chain to themselves', action.reverse);
    }

    const declaredParts = action.attributes.PathPart ?? [];
    if (declaredParts.length > 1) {
      throw new ActionRegistrationError('Multiple PathPart attributes not supported', action.reverse);
    }
    const part = declaredParts[0] ?? action.name;
    if (part.startsWith('/')) {
      throw new ActionRegistrationError(
        `Absolute parameters to PathPart not allowed ("${part}")`,
        action.reverse
      );
    }

    let children = this.childrenOf.get(parent);
    if (!children) {
      children = new Map();
      this.childrenOf.set(parent, children);
    }
    children.set(part, [action, ...(children.get(part) ?? [])]);

    this.pathParts.set(action, part);
    this.actions.set(`/${action.reverse}`, action);
    if (!action.attributes.CaptureArgs) {
      this.endpoints.unshift(action);
    }
    return true;
  }

  uriForAction(action: Action, captures: readonly string[]): string | null {
    if (!action.attributes.Chained || action.attributes.CaptureArgs) {
      return null;
    }

    const parts: string[] = [];
    const pending = [...captures];
    let parent = '';
    let current: Action | undefined = action;
    const seen = new Set<Action>();

    while (current && !seen.has(current)) {
      seen.add(current);

      if (current.attributes.CaptureArgs) {
        const count = captureCount(current);
        if (pending.length < count) {
          return null;
        }
        if (count > 0) {
          parts.unshift(...pending.splice(pending.length - count));
        }
      }

      const part = this.pathPartOf(current);
      if (part.length > 0) {
        parts.unshift(part);
      }

      parent = current.attribute('Chained') ?? '';
      current = this.actions.get(parent);
    }

    if (parent !== '/' || pending.length > 0) {
      return null;
    }
    return ['', ...parts].join('/');
  }

  expandAction(action: Action): Action | null {
    if (!action.attributes.Chained) {
      return null;
    }
    if (action instanceof ActionChain) {
      return action;
    }

    const chain: Action[] = [];
    let current: Action | undefined = action;
    while (current && !chain.includes(current)) {
      chain.unshift(current);
      current = this.actions.get(current.attribute('Chained') ?? '');
    }
    return ActionChain.fromChain(chain);
  }

  list(_app: SetupContext): DispatchTypeListing | null {
    if (this.endpoints.length === 0) {
      return null;
    }

    const rows: string[][] = [];
    const endpoints = [...this.endpoints].sort((a, b) => a.reverse.localeCompare(b.reverse));

    for (const endpoint of endpoints) {
      const args = endpoint.attribute('Args');
      const parts = wildcards(args);
      const parents: Action[] = [];
      let parent = '';
      let current: Action | undefined = endpoint;
      const seen = new Set<Action>();

      while (current && !seen.has(current)) {
        seen.add(current);
        if (current.attributes.CaptureArgs) {
          parts.unshift(...wildcards(current.attribute('CaptureArgs')));
        }
        const part = this.pathPartOf(current);
        if (part.length > 0) {
          parts.unshift(part);
        }
        parent = current.attribute('Chained') ?? '';
        current = this.actions.get(parent);
        if (current) {
          parents.unshift(current);
        }
      }

      if (parent !== '/') {
        continue;
      }

      const chainRows: string[][] = parents.map((link, index) => {
        let label = `/${link.reverse}`;
        if (link.attributes.CaptureArgs) {
          label += ` (${captureCount(link)})`;
        }
        return ['', index === 0 ? label : `-> ${label}`];
      });
      chainRows.push(['', `${chainRows.length > 0 ? '=> ' : ''}/${endpoint.reverse}`]);

      const first = chainRows[0];
      if (first) {
        first[0] = ['', ...parts].join('/');
      }
      rows.push(...chainRows);
    }

    return rows.length > 0
      ? { title: 'Loaded Chained actions', columns: ['Path Spec', 'Private'], rows }
      : null;
  }

  private pathPartOf(action: Action): string {
    return this.pathParts.get(action) ?? action.attribute('PathPart') ?? action.name;
  }
}
