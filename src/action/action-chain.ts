/**
 * A chained action expanded into its full dispatchable form.
 *
 * The chain carries every link from the root of the chain down to the
 * endpoint. It takes its identity (name, namespace, reverse) from the
 * endpoint; dispatching it runs each link with its share of the captures
 * as arguments, then the endpoint with the request arguments.
 */

import type { DispatchContext } from '../types/context.js';
import { Action } from './action.js';

/**
 * Number of captures a chain link consumes.
 */
export function captureCount(action: Action): number {
  const value = action.attribute('CaptureArgs');
  return value === undefined ? 0 : Number(value);
}

export class ActionChain extends Action {
  readonly chain: readonly Action[];

  constructor(chain: readonly Action[]) {
    const endpoint = chain[chain.length - 1];
    if (!endpoint) {
      throw new Error('An action chain needs at least one action');
    }

    super({
      name: endpoint.name,
      namespace: endpoint.namespace,
      owner: endpoint.owner,
      className: endpoint.className,
      code: endpoint.code,
      attributes: endpoint.attributes,
      reverse: endpoint.reverse,
    });
    this.chain = Object.freeze([...chain]);
  }

  static fromChain(chain: readonly Action[]): ActionChain {
    return new ActionChain(chain);
  }

  /**
   * Dispatch every link in order.
   */
  async dispatch(ctx: DispatchContext): Promise<unknown> {
    const captures = [...ctx.request.captures];
    const links = this.chain.slice(0, -1);
    const endpoint = this.chain[this.chain.length - 1];

    for (const link of links) {
      const args = captures.splice(0, captureCount(link));
      const saved = ctx.request.arguments;
      ctx.request.arguments = args;
      try {
        await link.dispatch(ctx);
      } finally {
        ctx.request.arguments = saved;
      }
    }

    return endpoint ? endpoint.dispatch(ctx) : undefined;
  }
}
