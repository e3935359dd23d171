import type { Action } from './action.js';

/**
 * The actions declared directly in one namespace.
 */
export class ActionContainer {
  /** Path segment this container sits at ('/' for the root) */
  readonly part: string;

  private readonly _actions: Map<string, Action> = new Map();

  constructor(part: string) {
    this.part = part;
  }

  get actions(): ReadonlyMap<string, Action> {
    return this._actions;
  }

  getAction(name: string): Action | undefined {
    return this._actions.get(name);
  }

  /**
   * Add an action, replacing any earlier one with the same name.
   */
  addAction(action: Action): void {
    this._actions.set(action.name, action);
  }

  toString(): string {
    return this.part;
  }
}
