/**
 * Action descriptors.
 *
 * An action is one registered handler: where it lives (namespace + name),
 * what runs (code bound to its owning component) and how it was declared
 * (attributes). Actions are frozen once constructed.
 */

import type { Component, DispatchContext } from '../types/context.js';

/**
 * Declaration attributes, e.g. `{ Path: ['blog'], Args: ['1'] }`.
 */
export type ActionAttributes = Readonly<Record<string, readonly string[]>>;

/**
 * Handler body. Receives the request context followed by the request arguments.
 */
export type ActionCode = (ctx: DispatchContext, ...args: string[]) => unknown;

export interface ActionOptions {
  /** Name within the namespace */
  name: string;

  /** Slash-joined namespace without leading slash; null for plain component methods */
  namespace: string | null;

  /** Component the code belongs to */
  owner: Component;

  /** Handler body */
  code: ActionCode;

  /** Declaration attributes */
  attributes?: Record<string, readonly string[]>;

  /** Human readable identity; defaults to the private path */
  reverse?: string;

  /** Owner class name; defaults to the owner's constructor name */
  className?: string;
}

function freezeAttributes(attributes: Record<string, readonly string[]> = {}): ActionAttributes {
  const frozen: Record<string, readonly string[]> = {};
  for (const [key, values] of Object.entries(attributes)) {
    frozen[key] = Object.freeze([...values]);
  }
  return Object.freeze(frozen);
}

/**
 * Build the private path of an action: `namespace/name`, or `name` at the root.
 */
export function privatePath(namespace: string | null, name: string): string {
  return namespace ? `${namespace}/${name}` : name;
}

/**
 * A registered handler.
 *
 * @example
 * ```typescript
 * const action = new Action({
 *   name: 'view',
 *   namespace: 'blog',
 *   owner: blogController,
 *   code: (ctx, id) => blogController.view(ctx, id),
 *   attributes: { Path: ['blog/view'], Args: ['1'] },
 * });
 *
 * action.reverse; // 'blog/view'
 * ```
 */
export class Action {
  readonly name: string;
  readonly namespace: string | null;
  readonly owner: Component;
  readonly className: string;
  readonly code: ActionCode;
  readonly attributes: ActionAttributes;
  readonly reverse: string;

  constructor(options: ActionOptions) {
    this.name = options.name;
    this.namespace = options.namespace;
    this.owner = options.owner;
    this.className = options.className ?? options.owner.constructor.name;
    this.code = options.code;
    this.attributes = freezeAttributes(options.attributes);
    this.reverse = options.reverse ?? privatePath(options.namespace, options.name);
  }

  /**
   * Registration slot key: `namespace/name`.
   */
  get slot(): string {
    return `${this.namespace ?? ''}/${this.name}`;
  }

  /**
   * First value of an attribute, if declared.
   */
  attribute(key: string): string | undefined {
    return this.attributes[key]?.[0];
  }

  /**
   * Check whether this action accepts the current request arguments.
   *
   * An `Args` attribute pins the number of arguments; without one any
   * number is accepted.
   */
  match(ctx: DispatchContext): boolean {
    const args = this.attribute('Args');
    if (args === undefined || args.length === 0) {
      return true;
    }
    return ctx.request.arguments.length === Number(args);
  }

  /**
   * Dispatch this action through the context's execute entry point.
   */
  dispatch(ctx: DispatchContext): Promise<unknown> {
    return ctx.execute(this);
  }

  /**
   * Run the handler body with the current request arguments.
   */
  async execute(ctx: DispatchContext): Promise<unknown> {
    return this.code(ctx, ...ctx.request.arguments);
  }

  toString(): string {
    return this.reverse;
  }
}
