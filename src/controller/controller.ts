import { Action, type ActionCode } from '../action/action.js';
import { namespaceParts } from '../action/namespace-tree.js';
import { DispatchError } from '../dispatcher/errors.js';
import type { Component, DispatchContext, SetupContext } from '../types/context.js';

/**
 * How an action method is exposed.
 *
 * Each key maps onto one or more dispatch attributes when the controller
 * registers; any key besides `Private` names the dispatch type that handles
 * the action.
 */
export interface ActionDeclaration {
  /** Literal path(s); relative values live under the controller namespace, '' is the namespace itself */
  Path?: string | readonly string[];

  /** Path `namespace/method` */
  Local?: boolean;

  /** Path `/method` */
  Global?: boolean;

  /** Pattern(s) matched against the whole request path */
  Regex?: string | readonly string[];

  /** Pattern(s) anchored under the controller namespace */
  LocalRegex?: string | readonly string[];

  /** Exact number of trailing arguments */
  Args?: number;

  /** Parent chain link: absolute, relative to the namespace, '.' for the namespace, '' for the root */
  Chained?: string;

  /** Path segment(s) this chain link consumes (default: the method name) */
  PathPart?: string;

  /** Number of segments this chain link captures */
  CaptureArgs?: number;

  /** Reachable only by private path */
  Private?: boolean;

  /** Further attributes for custom dispatch types, e.g. `{ '+Health': ['/ping'] }` */
  attributes?: Readonly<Record<string, readonly string[]>>;
}

export type ActionDeclarations = Readonly<Record<string, ActionDeclaration>>;

/**
 * Entry points every controller registers privately in its namespace.
 */
export const INTERNAL_ACTIONS = ['_DISPATCH', '_BEGIN', '_AUTO', '_ACTION', '_END'] as const;

export type InternalAction = (typeof INTERNAL_ACTIONS)[number];

/** Steps `_DISPATCH` forwards to, stopping at the first falsy state */
const DISPATCH_STEPS: readonly InternalAction[] = ['_BEGIN', '_AUTO', '_ACTION'];

const CONTROLLER_SUFFIX = /Controller$/;
const ROOT_CONTROLLER = 'Root';

function toList(value: string | readonly string[]): readonly string[] {
  return typeof value === 'string' ? [value] : value;
}

function absolutePath(namespace: string, value: string): string {
  if (value.startsWith('/')) {
    return value;
  }
  const parts = [...namespaceParts(namespace), ...namespaceParts(value)];
  return `/${parts.join('/')}`;
}

function chainedParent(namespace: string, value: string): string {
  if (value === '') {
    return '/';
  }
  if (value === '.') {
    return absolutePath(namespace, '');
  }
  return absolutePath(namespace, value);
}

function localRegex(namespace: string, value: string): string {
  const anchored = value.startsWith('^');
  const body = anchored ? value.slice(1) : `(?:.*?)${value}`;
  const prefix = namespace ? `${namespace}/` : '';
  return `^${prefix}${body}`;
}

/**
 * Translate a declaration into dispatch attributes.
 *
 * @example
 * ```typescript
 * parseDeclaration('blog', 'view', { Local: true, Args: 1 });
 * // { Path: ['/blog/view'], Args: ['1'] }
 * ```
 */
export function parseDeclaration(
  namespace: string,
  name: string,
  declaration: ActionDeclaration
): Record<string, string[]> {
  const attributes: Record<string, string[]> = {};
  const add = (key: string, value: string): void => {
    const values = attributes[key] ?? [];
    values.push(value);
    attributes[key] = values;
  };

  if (declaration.Path !== undefined) {
    for (const path of toList(declaration.Path)) {
      add('Path', absolutePath(namespace, path));
    }
  }
  if (declaration.Local) {
    add('Path', absolutePath(namespace, name));
  }
  if (declaration.Global) {
    add('Path', `/${name}`);
  }
  if (declaration.Regex !== undefined) {
    for (const pattern of toList(declaration.Regex)) {
      add('Regex', pattern);
    }
  }
  if (declaration.LocalRegex !== undefined) {
    for (const pattern of toList(declaration.LocalRegex)) {
      add('Regex', localRegex(namespace, pattern));
    }
  }
  if (declaration.Args !== undefined) {
    add('Args', String(declaration.Args));
  }
  if (declaration.Chained !== undefined) {
    add('Chained', chainedParent(namespace, declaration.Chained));
  }
  if (declaration.PathPart !== undefined) {
    add('PathPart', declaration.PathPart);
  }
  if (declaration.CaptureArgs !== undefined) {
    add('CaptureArgs', String(declaration.CaptureArgs));
  }
  if (declaration.Private) {
    attributes.Private = attributes.Private ?? [];
  }
  for (const [key, values] of Object.entries(declaration.attributes ?? {})) {
    attributes[key] = [...(attributes[key] ?? []), ...values];
  }

  return attributes;
}

/**
 * Base class for controllers.
 *
 * A controller owns one namespace. Its `actions` static declares which
 * methods are actions and how they are reached; registration also adds the
 * private entry points (`_DISPATCH` and friends) that run the
 * begin/auto/action/end sequence for every request landing in the
 * namespace.
 *
 * @example
 * ```typescript
 * class BlogController extends Controller {
 *   static actions = {
 *     index: {},
 *     view: { Local: true, Args: 1 },
 *     auto: { Private: true },
 *   };
 *
 *   view(ctx: DispatchContext, id: string) {
 *     return `post ${id}`;
 *   }
 * }
 * ```
 */
export abstract class Controller {
  /**
   * Namespace override. When unset the namespace is the class name without
   * its "Controller" suffix, lower-cased unless the application is case
   * sensitive; "Root" is the root namespace.
   */
  static namespace?: string;

  static actions: ActionDeclarations = {};

  /**
   * Namespace this controller's actions live in.
   */
  actionNamespace(caseSensitive = false): string {
    const ctor = this.constructor as typeof Controller;
    if (ctor.namespace !== undefined) {
      return namespaceParts(ctor.namespace).join('/');
    }

    const base = ctor.name.replace(CONTROLLER_SUFFIX, '');
    if (base === ROOT_CONTROLLER || base === '') {
      return '';
    }
    return caseSensitive ? base : base.toLowerCase();
  }

  /**
   * Register the internal entry points and every declared action.
   *
   * @throws DispatchError if a declared action has no method
   */
  registerActions(app: SetupContext): void {
    const ctor = this.constructor as typeof Controller;
    const namespace = this.actionNamespace(app.config.caseSensitive);

    for (const name of INTERNAL_ACTIONS) {
      app.dispatcher.register(
        app,
        this.createAction(name, namespace, { Private: [] })
      );
    }

    for (const [name, declaration] of Object.entries(ctor.actions)) {
      app.dispatcher.register(
        app,
        this.createAction(name, namespace, parseDeclaration(namespace, name, declaration))
      );
    }
  }

  /**
   * Run begin, auto and the action, then always end.
   */
  async _DISPATCH(ctx: DispatchContext): Promise<unknown> {
    for (const step of DISPATCH_STEPS) {
      if (!(await ctx.dispatcher.forward(ctx, step))) {
        break;
      }
    }
    return ctx.dispatcher.forward(ctx, '_END');
  }

  /**
   * Run the nearest `begin` action.
   */
  async _BEGIN(ctx: DispatchContext): Promise<boolean> {
    const begin = ctx.dispatcher.getActions(ctx, 'begin', ctx.namespace).pop();
    if (!begin) {
      return true;
    }
    await begin.dispatch(ctx);
    return ctx.errors.length === 0;
  }

  /**
   * Run every `auto` action, root first, stopping at the first falsy one.
   */
  async _AUTO(ctx: DispatchContext): Promise<boolean> {
    for (const auto of ctx.dispatcher.getActions(ctx, 'auto', ctx.namespace)) {
      await auto.dispatch(ctx);
      if (!ctx.state) {
        return false;
      }
    }
    return true;
  }

  /**
   * Run the request's action.
   */
  async _ACTION(ctx: DispatchContext): Promise<boolean> {
    if (ctx.action) {
      await ctx.action.dispatch(ctx);
    }
    return ctx.errors.length === 0;
  }

  /**
   * Run the nearest `end` action.
   */
  async _END(ctx: DispatchContext): Promise<boolean> {
    const end = ctx.dispatcher.getActions(ctx, 'end', ctx.namespace).pop();
    if (!end) {
      return true;
    }
    await end.dispatch(ctx);
    return ctx.errors.length === 0;
  }

  private createAction(
    name: string,
    namespace: string,
    attributes: Record<string, readonly string[]>
  ): Action {
    const method: unknown = Reflect.get(this, name);
    if (typeof method !== 'function') {
      throw new DispatchError(
        `${this.constructor.name} declares action "${name}" but has no such method`
      );
    }

    const code: ActionCode = (ctx, ...args) => Reflect.apply(method, this, [ctx, ...args]);
    return new Action({ name, namespace, owner: this, code, attributes });
  }
}

/**
 * Namespace of a component's actions.
 *
 * @returns The controller namespace, or null for components that are not controllers
 */
export function classToPrefix(component: Component, caseSensitive = false): string | null {
  return component instanceof Controller ? component.actionNamespace(caseSensitive) : null;
}
