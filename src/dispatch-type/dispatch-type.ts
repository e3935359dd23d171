/**
 * Dispatch type contract.
 *
 * A dispatch type is one matching strategy. The dispatcher keeps its loaded
 * dispatch types in a fixed order and asks each in turn: the first one to
 * claim a path wins, so specific strategies (literal paths) must come
 * before catch-all ones (default).
 *
 * @example
 * ```typescript
 * class HealthDispatchType extends BaseDispatchType {
 *   readonly name = 'Health';
 *   private action: Action | null = null;
 *
 *   register(_app: SetupContext, action: Action): boolean {
 *     if (!action.attributes.Health) return false;
 *     this.action = action;
 *     return true;
 *   }
 *
 *   match(ctx: DispatchContext, path: string): boolean {
 *     if (path !== 'healthz' || !this.action) return false;
 *     this.bind(ctx, this.action, { requestAction: 'healthz', match: path });
 *     return true;
 *   }
 * }
 * ```
 */

import type { Action } from '../action/action.js';
import type { DispatchContext, SetupContext } from '../types/context.js';

/**
 * Diagnostic listing of what a dispatch type has indexed.
 */
export interface DispatchTypeListing {
  title: string;
  columns: readonly string[];
  rows: ReadonlyArray<readonly string[]>;
}

export interface DispatchType {
  /** Short name, used in listings and logs */
  readonly name: string;

  /**
   * Try to claim a candidate path.
   *
   * On success the dispatch type binds the action (and any captures) onto
   * the context and returns true.
   */
  match(ctx: DispatchContext, path: string): boolean;

  /**
   * Offer an action for indexing. Returns true if this type indexed it.
   */
  register(app: SetupContext, action: Action): boolean;

  /**
   * Build the path that would dispatch to the action with these captures,
   * or null if this type cannot.
   */
  uriForAction(action: Action, captures: readonly string[]): string | null;

  /**
   * Expand a composite action into its dispatchable form, or null if this
   * type does not own it.
   */
  expandAction(action: Action): Action | null;

  /**
   * Describe the indexed actions, or null when there is nothing to show.
   */
  list(app: SetupContext): DispatchTypeListing | null;
}

/**
 * Constructor for a dispatch type. Dispatch types take no arguments.
 */
export type DispatchTypeClass = new () => DispatchType;
