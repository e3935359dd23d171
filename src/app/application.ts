/**
 * Application host.
 *
 * Holds the components, the configuration and the dispatcher, and turns a
 * request path into a finished request context.
 *
 * @example
 * ```typescript
 * const app = new Application({ config: { debug: true } });
 * app.addComponent(new RootController());
 * app.addComponent(new BlogController());
 * app.setup();
 *
 * const ctx = await app.handle('/blog/view/42');
 * ctx.state;  // what the request's action chain returned
 * ctx.errors; // anything recorded on the way
 * ```
 */

import {
  configFromEnv,
  type DispatcherConfig,
  type DispatcherConfigInput,
  resolveConfig,
} from '../config/index.js';
import { RequestContext } from '../context/context.js';
import { DispatchRequest, type DispatchRequestOptions } from '../context/request.js';
import { Dispatcher } from '../dispatcher/dispatcher.js';
import { DispatchError } from '../dispatcher/errors.js';
import { isAbortSignal } from '../dispatcher/signals.js';
import type { DispatchTypeRegistry } from '../dispatch-type/registry.js';
import type { DispatcherEventEmitter } from '../events/event-emitter.js';
import { createLogger, type Logger } from '../logging/index.js';
import type { Component, SetupContext } from '../types/context.js';

export interface ApplicationOptions {
  /** Configuration; read from JUNCTION_* environment variables when omitted */
  config?: DispatcherConfigInput;

  /** Components to add, in order */
  components?: Component[];

  /** Dispatch type registry; defaults to the built-in types */
  registry?: DispatchTypeRegistry;

  /** Event emitter the dispatcher reports to */
  events?: DispatcherEventEmitter;

  /** Logger for request-level messages */
  logger?: Logger;
}

export class Application implements SetupContext {
  readonly config: DispatcherConfig;
  readonly dispatcher: Dispatcher;
  readonly log: Logger;

  private readonly _components: Map<string, Component> = new Map();
  private _isSetup = false;

  constructor(options: ApplicationOptions = {}) {
    this.config = options.config ? resolveConfig(options.config) : configFromEnv();
    this.log =
      options.logger ??
      createLogger(
        { component: 'application' },
        { level: this.config.debug ? 'debug' : this.config.logLevel }
      );
    this.dispatcher = new Dispatcher({
      config: this.config,
      registry: options.registry,
      events: options.events,
    });

    for (const component of options.components ?? []) {
      this.addComponent(component);
    }
  }

  get debug(): boolean {
    return this.config.debug;
  }

  get isSetup(): boolean {
    return this._isSetup;
  }

  /**
   * Add a component under its class name (or the name given).
   *
   * @throws DispatchError once the application is set up
   */
  addComponent(component: Component, name: string = component.constructor.name): this {
    if (this._isSetup) {
      throw new DispatchError(`Cannot add component "${name}" after setup`);
    }
    this._components.set(name, component);
    return this;
  }

  components(): IterableIterator<Component> {
    return this._components.values();
  }

  component(name: string): Component | undefined {
    return this._components.get(name);
  }

  /**
   * Register every component's actions. Runs once.
   */
  setup(): this {
    if (this._isSetup) {
      return this;
    }
    this.dispatcher.setupActions(this);
    this._isSetup = true;
    return this;
  }

  /**
   * Create a fresh context for a request path.
   */
  createContext(path: string, options?: DispatchRequestOptions): RequestContext {
    return new RequestContext(this, new DispatchRequest(path, options));
  }

  /**
   * Resolve and dispatch one request.
   *
   * Sets the application up on first use. Detach and jump signals end the
   * request here; anything else thrown outside an action is recorded as a
   * request error.
   */
  async handle(path: string, options?: DispatchRequestOptions): Promise<RequestContext> {
    this.setup();

    const ctx = this.createContext(path, options);
    try {
      this.dispatcher.prepareAction(ctx);
      await this.dispatcher.dispatch(ctx);
    } catch (error) {
      if (!isAbortSignal(error)) {
        const message = error instanceof Error ? error.message : String(error);
        this.log.error('Request failed', { path: ctx.request.path, error_message: message });
        ctx.error(message);
      }
    }
    return ctx;
  }
}
