/**
 * Per-request context.
 *
 * Carries the request, the resolved action and the execution stack, and is
 * the boundary where a handler's exceptions turn into recorded errors.
 */

import type { Action } from '../action/action.js';
import type { DispatcherConfig } from '../config/index.js';
import type { Command, CommandOptions, Dispatcher } from '../dispatcher/dispatcher.js';
import { DetachSignal, JumpSignal } from '../dispatcher/signals.js';
import type { Logger } from '../logging/index.js';
import type { Component, DispatchContext, SetupContext } from '../types/context.js';
import type { DispatchRequest } from './request.js';

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class RequestContext implements DispatchContext {
  readonly request: DispatchRequest;
  readonly stack: Action[] = [];
  action: Action | null = null;
  namespace = '';
  state: unknown = 0;

  private readonly app: SetupContext;
  private readonly _errors: string[] = [];

  constructor(app: SetupContext, request: DispatchRequest) {
    this.app = app;
    this.request = request;
  }

  get config(): DispatcherConfig {
    return this.app.config;
  }

  get debug(): boolean {
    return this.app.debug;
  }

  get log(): Logger {
    return this.app.log;
  }

  get dispatcher(): Dispatcher {
    return this.app.dispatcher;
  }

  components(): Iterable<Component> {
    return this.app.components();
  }

  component(name: string): Component | undefined {
    return this.app.component(name);
  }

  get errors(): readonly string[] {
    return this._errors;
  }

  /**
   * Number of actions currently executing.
   */
  get depth(): number {
    return this.stack.length;
  }

  error(message: string): void {
    this._errors.push(message);
  }

  /**
   * Run an action in a new stack frame and record its result as the state.
   *
   * A thrown error is recorded and the state set to 0. A detach propagates
   * until it has left the handler that asked for it; a jump propagates to
   * the outermost frame.
   */
  async execute(action: Action): Promise<unknown> {
    let failure: { error: unknown } | null = null;

    this.stack.push(action);
    try {
      const result = await action.execute(this);
      this.state = result || 0;
    } catch (error) {
      failure = { error };
    } finally {
      this.stack.pop();
    }

    if (failure) {
      const { error } = failure;
      if (error instanceof DetachSignal) {
        if (this.depth > 1) {
          throw error;
        }
      } else if (error instanceof JumpSignal) {
        if (this.depth > 0) {
          throw error;
        }
      } else {
        const message = errorMessage(error);
        this.log.error('Caught exception in action', {
          action: action.reverse,
          error_message: message,
        });
        this.error(`Caught exception in ${action.className}->${action.name} "${message}"`);
        this.state = 0;
      }
    }

    return this.state;
  }

  forward(command: Command, args?: readonly string[], options?: CommandOptions): Promise<unknown> {
    return this.dispatcher.forward(this, command, args, options);
  }

  detach(command?: Command, args?: readonly string[], options?: CommandOptions): Promise<never> {
    return this.dispatcher.detach(this, command, args, options);
  }

  visit(command: Command, args?: readonly string[], options?: CommandOptions): Promise<unknown> {
    return this.dispatcher.visit(this, command, args, options);
  }

  jump(command: Command, args?: readonly string[], options?: CommandOptions): Promise<never> {
    return this.dispatcher.jump(this, command, args, options);
  }

  getAction(name: string, namespace?: string | null): Action | null {
    return this.dispatcher.getAction(name, namespace);
  }

  getActions(name: string, namespace?: string | null): Action[] {
    return this.dispatcher.getActions(this, name, namespace);
  }

  /**
   * Path for an action, or null when no dispatch type can build one.
   */
  uriForAction(action: Action, captures: readonly string[] = []): string | null {
    return this.dispatcher.uriForAction(action, captures);
  }
}
