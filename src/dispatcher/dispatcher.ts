/**
 * The dispatcher.
 *
 * Maps request paths to registered actions and runs delegation between
 * actions within a request.
 *
 * Lifecycle:
 * 1. `setupActions()` loads the preload dispatch types, lets every
 *    component register its actions (which may load further dispatch types
 *    named by action attributes), then loads the postload dispatch types.
 * 2. Per request, `prepareAction()` resolves the path to an action and
 *    `dispatch()` runs it.
 * 3. Actions delegate with `forward()`, `detach()`, `visit()` and `jump()`.
 *
 * Nothing here is mutated after setup, so one dispatcher serves any number
 * of concurrent requests; all per-request state lives on the context.
 *
 * @example
 * ```typescript
 * const dispatcher = new Dispatcher();
 * dispatcher.setupActions(app);
 *
 * const ctx = app.createContext('blog/2024/hello');
 * dispatcher.prepareAction(ctx);
 * await dispatcher.dispatch(ctx);
 * ```
 */

import { Action, privatePath } from '../action/action.js';
import type { ActionContainer } from '../action/action-container.js';
import { NamespaceTree, namespaceParts, normalizeNamespace } from '../action/namespace-tree.js';
import {
  type DispatcherConfig,
  type DispatcherConfigInput,
  resolveConfig,
} from '../config/index.js';
import { classToPrefix } from '../controller/controller.js';
import type { DispatchType } from '../dispatch-type/dispatch-type.js';
import { DispatchTypeRegistry } from '../dispatch-type/registry.js';
import { type DelegationVerb, DispatcherEventEmitter } from '../events/event-emitter.js';
import { createLogger } from '../logging/index.js';
import {
  type Component,
  type DispatchContext,
  hasRegisterActions,
  type SetupContext,
} from '../types/context.js';
import { renderTable } from './action-table.js';
import { decodeSegment, splitPath } from './path-utils.js';
import { DetachSignal, JumpSignal } from './signals.js';

const log = createLogger({ component: 'dispatcher' });

/** Private action every dispatchable component registers in its namespace */
export const DISPATCH_ENTRY = '_DISPATCH';

/** Attribute that marks an action as needing no dispatch type */
const PRIVATE_ATTRIBUTE = 'Private';

/** Default method for component commands */
const DEFAULT_COMPONENT_METHOD = 'process';

/** `namespace/name` split of a command path; both parts optional */
const COMMAND_PATH = /^(?:(.*)\/)?([^/]+)?$/;

/**
 * What forward/detach/visit/jump accept as a command:
 * - an Action
 * - a private path, absolute ('/blog/view') or relative to the running action ('view')
 * - a component, or a component's class name
 */
export type Command = Action | Component | string;

export interface CommandOptions {
  /** Captures to bind for visit/jump */
  captures?: readonly string[];

  /** Method to call when the command is a component (default: "process") */
  method?: string;
}

export interface ResolvedCommand {
  action: Action;
  args: string[];
  captures: string[];
}

export interface DispatcherOptions {
  config?: DispatcherConfig | DispatcherConfigInput;
  registry?: DispatchTypeRegistry;
  events?: DispatcherEventEmitter;
}

/**
 * Check whether a component exposes the dispatch entry point.
 */
export function canDispatch(owner: Component): boolean {
  return typeof Reflect.get(owner, DISPATCH_ENTRY) === 'function';
}

function describeCommand(command: Command): string {
  if (typeof command === 'string') {
    return command;
  }
  if (command instanceof Action) {
    return command.reverse;
  }
  return command.constructor.name;
}

export class Dispatcher {
  readonly events: DispatcherEventEmitter;
  readonly registry: DispatchTypeRegistry;

  /** Dispatch types loaded before registration, in order */
  preloadDispatchTypes: string[];

  /** Dispatch types appended after registration, in order */
  postloadDispatchTypes: string[];

  private readonly _tree: NamespaceTree = new NamespaceTree();
  private readonly _dispatchTypes: DispatchType[] = [];
  private readonly registeredDispatchTypes: Set<string> = new Set();
  private readonly actionHash: Map<string, Action> = new Map();

  constructor(options: DispatcherOptions = {}) {
    const config = resolveConfig(options.config ?? {});
    this.preloadDispatchTypes = [...config.preloadDispatchTypes];
    this.postloadDispatchTypes = [...config.postloadDispatchTypes];
    this.registry = options.registry ?? DispatchTypeRegistry.withBuiltins();
    this.events = options.events ?? new DispatcherEventEmitter();
  }

  /**
   * Loaded dispatch types, in the order they are consulted.
   */
  get dispatchTypes(): readonly DispatchType[] {
    return this._dispatchTypes;
  }

  /**
   * Root of the namespace tree.
   */
  get tree(): NamespaceTree {
    return this._tree;
  }

  /**
   * Number of registered actions.
   */
  get actionCount(): number {
    return this.actionHash.size;
  }

  // ===========================================================================
  // Setup and registration
  // ===========================================================================

  /**
   * Load dispatch types by name and append them to the live list.
   *
   * @throws DispatchTypeNotFoundError if a name does not resolve
   */
  loadDispatchTypes(names: readonly string[]): DispatchType[] {
    const loaded: DispatchType[] = [];

    for (const name of names) {
      const type = this.registry.instantiate(name);
      this._dispatchTypes.push(type);
      this.registeredDispatchTypes.add(this.registry.identity(name));
      loaded.push(type);

      log.debug('Loaded dispatch type', { operation: 'load_dispatch_types', dispatch_type: name });
      this.events.emitDispatchTypeLoaded(name, false);
    }

    return loaded;
  }

  /**
   * Register an action.
   *
   * Every attribute (except Private) names a dispatch type, which is loaded
   * the first time it is seen; attributes without a dispatch type are
   * skipped. The action is then offered to every loaded dispatch type and
   * stored in the namespace tree.
   */
  register(app: SetupContext, action: Action): void {
    for (const key of Object.keys(action.attributes)) {
      if (key === PRIVATE_ATTRIBUTE) {
        continue;
      }
      this.loadDispatchTypeFor(app, key);
    }

    for (const type of this._dispatchTypes) {
      type.register(app, action);
    }

    const namespace = normalizeNamespace(action.namespace);
    const node = this._tree.findOrCreate(namespace);
    node.container.addAction(action);
    this.actionHash.set(`${namespace}/${action.name}`, action);

    this.events.emitActionRegistered(
      namespace,
      action.name,
      action.reverse,
      Object.keys(action.attributes)
    );
  }

  private loadDispatchTypeFor(app: SetupContext, name: string): void {
    const identity = this.registry.identity(name);
    if (this.registeredDispatchTypes.has(identity)) {
      return;
    }
    this.registeredDispatchTypes.add(identity);

    if (!this.registry.has(name)) {
      if (app.debug) {
        log.debug('No dispatch type for attribute, skipping', {
          operation: 'register',
          attribute: name,
        });
      }
      return;
    }

    this._dispatchTypes.push(this.registry.instantiate(name));
    log.debug('Loaded dispatch type', { operation: 'register', dispatch_type: name });
    this.events.emitDispatchTypeLoaded(name, true);
  }

  /**
   * Build the dispatch structures: preload types, component registration,
   * postload types, then (in debug mode) the action tables.
   *
   * @throws DispatchTypeNotFoundError if a preload or postload type does not resolve
   */
  setupActions(app: SetupContext): void {
    this.loadDispatchTypes(this.preloadDispatchTypes);

    for (const component of app.components()) {
      if (hasRegisterActions(component)) {
        component.registerActions(app);
      }
    }

    this.loadDispatchTypes(this.postloadDispatchTypes);

    this.events.emitSetupCompleted(
      this._dispatchTypes.map((type) => type.name),
      this.actionHash.size
    );

    if (app.debug) {
      for (const table of this.actionTables(app)) {
        app.log.debug(table);
      }
    }
  }

  /**
   * Render the private action table and every dispatch type's listing.
   */
  actionTables(app: SetupContext): string[] {
    const tables: string[] = [];

    const rows: string[][] = [];
    this._tree.walk((node) => {
      const prefix = node.namespace ? `/${node.namespace}/` : '/';
      const names = Array.from(node.container.actions.keys()).sort();
      for (const name of names) {
        const action = node.container.getAction(name);
        if (!action || (name.startsWith('_') && !app.config.showInternalActions)) {
          continue;
        }
        rows.push([`${prefix}${name}`, action.className, name]);
      }
    });
    if (rows.length > 0) {
      tables.push(`Loaded Private actions:\n${renderTable(['Private', 'Class', 'Method'], rows)}`);
    }

    for (const type of this._dispatchTypes) {
      const listing = type.list(app);
      if (listing) {
        tables.push(`${listing.title}:\n${renderTable(listing.columns, listing.rows)}`);
      }
    }

    return tables;
  }

  /**
   * Live instance of a loaded dispatch type.
   *
   * @param name - Built-in name ("Path") or custom name ("+Health")
   * @returns The instance, or null if the type was never loaded
   */
  dispatchType(name: string): DispatchType | null {
    if (!this.registry.has(name)) {
      return null;
    }
    const ctor = this.registry.resolve(name);
    return this._dispatchTypes.find((type) => type.constructor === ctor) ?? null;
  }

  // ===========================================================================
  // Request resolution
  // ===========================================================================

  /**
   * Ask the dispatch types, in order, to claim a candidate path.
   */
  matchPath(ctx: DispatchContext, path: string): boolean {
    for (const type of this._dispatchTypes) {
      if (type.match(ctx, path)) {
        return true;
      }
    }
    return false;
  }

  /**
   * Resolve the request path to an action.
   *
   * Tries the full path first, then peels trailing segments off one at a
   * time (they become the action's arguments, percent-decoded) until a
   * dispatch type claims what is left, or the root fails too.
   *
   * @returns True if an action was bound
   */
  prepareAction(ctx: DispatchContext): boolean {
    const request = ctx.request;
    const args: string[] = [];
    request.arguments = args;

    const segments = ['', ...splitPath(request.path)];
    let matched = false;

    while (segments.length > 0) {
      const candidate = segments.join('/').replace(/^\//, '');
      if (this.matchPath(ctx, candidate)) {
        matched = true;
        break;
      }

      const segment = segments.pop();
      if (segments.length > 0 && segment !== undefined) {
        args.unshift(decodeSegment(segment));
      }
    }

    request.captures = request.captures.map(decodeSegment);

    if (ctx.debug && request.match) {
      ctx.log.debug(`Path is "${request.match}"`);
    }
    if (ctx.debug && request.arguments.length > 0) {
      ctx.log.debug(`Arguments are "${request.arguments.join('/')}"`);
    }

    if (matched && ctx.action) {
      this.events.emitRequestResolved(
        request.path,
        ctx.action.reverse,
        [...request.arguments],
        [...request.captures]
      );
    } else {
      this.events.emitRequestUnresolved(request.path);
    }

    return matched;
  }

  /**
   * Run the action bound to the context through its namespace's dispatch
   * entry point, or record why there is none.
   */
  async dispatch(ctx: DispatchContext): Promise<unknown> {
    const action = ctx.action;
    if (action) {
      return this.forward(ctx, `/${privatePath(action.namespace, DISPATCH_ENTRY)}`);
    }

    const path = ctx.request.path;
    const error = path ? `Unknown resource "${path}"` : 'No default action defined';
    if (ctx.debug) {
      ctx.log.error(error);
    }
    ctx.error(error);
    return false;
  }

  // ===========================================================================
  // Command lookup
  // ===========================================================================

  /**
   * Resolve a delegation command to an action.
   *
   * @param args - Arguments for the action; defaults to a copy of the current request arguments
   * @returns The action with its arguments and captures, or null if nothing matches
   */
  resolveCommand(
    ctx: DispatchContext,
    command: Command | null | undefined,
    args?: readonly string[],
    options: CommandOptions = {}
  ): ResolvedCommand | null {
    if (!command) {
      if (ctx.debug) {
        ctx.log.debug('Nothing to go to');
      }
      return null;
    }

    const resolvedArgs = args ? [...args] : [...ctx.request.arguments];
    const captures = options.captures ? [...options.captures] : [];

    let action: Action | null = null;
    if (command instanceof Action) {
      action = command;
    } else if (typeof command === 'string') {
      action = this.invokeAsPath(ctx, command, resolvedArgs);
    }

    if (!action) {
      action = this.invokeAsComponent(ctx, command, options.method ?? DEFAULT_COMPONENT_METHOD);
    }

    return action ? { action, args: resolvedArgs, captures } : null;
  }

  /**
   * Make a command path absolute against the running action's namespace;
   * the result has no leading slash.
   */
  private relativeToAbsolute(ctx: DispatchContext, path: string): string {
    let absolute = path;
    if (!absolute.startsWith('/')) {
      const running = ctx.stack[ctx.stack.length - 1];
      const namespace = running ? running.namespace : ctx.namespace;
      absolute = `${namespace ?? ''}/${absolute}`;
    }
    return absolute.replace(/^\//, '');
  }

  /**
   * Look a private path up in the registry, peeling unmatched trailing
   * segments onto the end of `args`.
   */
  private invokeAsPath(ctx: DispatchContext, relative: string, args: string[]): Action | null {
    let path = this.relativeToAbsolute(ctx, relative);
    const extra: string[] = [];

    for (;;) {
      const parts = COMMAND_PATH.exec(path);
      if (!parts) {
        return null;
      }

      const namespace = parts[1] ?? '';
      const name = parts[2];
      const action = name ? this.getAction(name, namespace) : null;
      if (action) {
        args.push(...extra);
        return action;
      }

      // a failed lookup in the root namespace ends the search
      if (!namespace) {
        return null;
      }
      if (name) {
        extra.unshift(name);
      }
      path = namespace;
    }
  }

  /**
   * Wrap a component method in an ad-hoc action.
   */
  private invokeAsComponent(ctx: DispatchContext, command: Command, method: string): Action | null {
    const component = typeof command === 'string' ? ctx.component(command) : command;
    if (!component) {
      return null;
    }

    const className = component.constructor.name;
    const code: unknown = Reflect.get(component, method);
    if (typeof code !== 'function') {
      const error = `Couldn't forward to "${className}". Does not implement "${method}"`;
      ctx.error(error);
      if (ctx.debug) {
        ctx.log.debug(error);
      }
      return null;
    }

    return new Action({
      name: method,
      namespace: classToPrefix(component, ctx.config.caseSensitive),
      owner: component,
      className,
      code: (context, ...args) => Reflect.apply(code, component, [context, ...args]),
      reverse: `${className}->${method}`,
    });
  }

  // ===========================================================================
  // Delegation
  // ===========================================================================

  /**
   * Run another action in place and return the resulting state.
   *
   * On failure the error is recorded on the context and false is returned.
   */
  forward(
    ctx: DispatchContext,
    command: Command,
    args?: readonly string[],
    options?: CommandOptions
  ): Promise<unknown> {
    return this.doForward('forward', ctx, command, args, options);
  }

  /**
   * Run another action (when given), then abort the current handler chain.
   *
   * Never returns: always rejects with a DetachSignal.
   */
  async detach(
    ctx: DispatchContext,
    command?: Command,
    args?: readonly string[],
    options?: CommandOptions
  ): Promise<never> {
    if (command) {
      await this.doForward('detach', ctx, command, args, options);
    }
    throw new DetachSignal();
  }

  /**
   * Dispatch another action as if it had been the request's action, with
   * the context's action, namespace, arguments and captures rebound for the
   * duration, then return.
   *
   * @returns The dispatch state, or false if the command cannot be visited
   */
  visit(
    ctx: DispatchContext,
    command: Command,
    args?: readonly string[],
    options?: CommandOptions
  ): Promise<unknown> {
    return this.doVisit('visit', ctx, command, args, options);
  }

  /**
   * Visit another action, then abort the entire request.
   *
   * Never returns: always rejects with a JumpSignal, whether or not the
   * visit succeeded.
   */
  async jump(
    ctx: DispatchContext,
    command: Command,
    args?: readonly string[],
    options?: CommandOptions
  ): Promise<never> {
    await this.doVisit('jump', ctx, command, args, options);
    throw new JumpSignal();
  }

  private async doForward(
    verb: DelegationVerb,
    ctx: DispatchContext,
    command: Command,
    args?: readonly string[],
    options?: CommandOptions
  ): Promise<unknown> {
    const resolved = this.resolveCommand(ctx, command, args, options);
    if (!resolved) {
      const described = describeCommand(command);
      this.delegationFailed(
        ctx,
        verb,
        described,
        `Couldn't ${verb} to command "${described}": Invalid action or component.`
      );
      return false;
    }

    const saved = ctx.request.arguments;
    ctx.request.arguments = resolved.args;
    try {
      await resolved.action.dispatch(ctx);
    } finally {
      ctx.request.arguments = saved;
    }

    return ctx.state;
  }

  private async doVisit(
    verb: DelegationVerb,
    ctx: DispatchContext,
    command: Command,
    args?: readonly string[],
    options?: CommandOptions
  ): Promise<unknown> {
    const resolved = this.resolveCommand(ctx, command, args, options);
    const described = describeCommand(command);
    let reason = '';

    if (!resolved) {
      reason = `Couldn't ${verb} to command "${described}": Invalid action or component.`;
    } else if (resolved.action.namespace === null) {
      reason =
        `Action has no namespace: cannot ${verb}() to a plain method or component, ` +
        'must be an action of some sort.';
    } else if (!canDispatch(resolved.action.owner)) {
      reason = `Action cannot ${DISPATCH_ENTRY}. Did you try to ${verb}() a non-controller action?`;
    }

    if (!resolved || reason) {
      this.delegationFailed(ctx, verb, described, `Couldn't ${verb}("${described}"): ${reason}`);
      return false;
    }

    const action = this.expandAction(resolved.action);
    const saved = {
      args: ctx.request.arguments,
      captures: ctx.request.captures,
      namespace: ctx.namespace,
      action: ctx.action,
    };

    ctx.request.arguments = resolved.args;
    ctx.request.captures = resolved.captures;
    ctx.namespace = action.namespace ?? '';
    ctx.action = action;
    try {
      return await this.dispatch(ctx);
    } finally {
      ctx.request.arguments = saved.args;
      ctx.request.captures = saved.captures;
      ctx.namespace = saved.namespace;
      ctx.action = saved.action;
    }
  }

  private delegationFailed(
    ctx: DispatchContext,
    verb: DelegationVerb,
    command: string,
    message: string
  ): void {
    ctx.error(message);
    if (ctx.debug) {
      ctx.log.debug(message);
    }
    this.events.emitDelegationFailed(verb, command, message);
  }

  // ===========================================================================
  // Lookups
  // ===========================================================================

  /**
   * A named action in exactly one namespace.
   */
  getAction(name: string, namespace?: string | null): Action | null {
    if (!name) {
      return null;
    }
    return this.actionHash.get(`${normalizeNamespace(namespace)}/${name}`) ?? null;
  }

  /**
   * An action by its full private path ("blog/view", "/index").
   */
  getActionByPath(path: string): Action | null {
    let key = path.replace(/^\//, '');
    if (!key.includes('/')) {
      key = `/${key}`;
    }
    return this.actionHash.get(key) ?? null;
  }

  /**
   * Every action with this name along the namespace's ancestry, root first.
   */
  getActions(_ctx: DispatchContext, name: string, namespace?: string | null): Action[] {
    if (!name) {
      return [];
    }

    const actions: Action[] = [];
    for (const container of this.getContainers(namespace)) {
      const action = container.getAction(name);
      if (action) {
        actions.push(action);
      }
    }
    return actions;
  }

  /**
   * The containers of a namespace and all its ancestors, root first.
   */
  getContainers(namespace?: string | null): ActionContainer[] {
    const parts = namespaceParts(namespace);
    const containers: ActionContainer[] = [];

    for (let depth = 0; depth <= parts.length; depth++) {
      const container = this._tree.container(parts.slice(0, depth).join('/'));
      if (container) {
        containers.push(container);
      }
    }
    return containers;
  }

  // ===========================================================================
  // URI generation
  // ===========================================================================

  /**
   * The path that would dispatch to an action with these captures.
   *
   * @returns The path ('/' for the root), or null if no dispatch type can build one
   */
  uriForAction(action: Action, captures: readonly string[] = []): string | null {
    for (const type of this._dispatchTypes) {
      const uri = type.uriForAction(action, captures);
      if (uri !== null) {
        return uri === '' ? '/' : uri;
      }
    }
    return null;
  }

  /**
   * Expand a composite action into its dispatchable form.
   */
  expandAction(action: Action): Action {
    for (const type of this._dispatchTypes) {
      const expanded = type.expandAction(action);
      if (expanded) {
        return expanded;
      }
    }
    return action;
  }
}
