/**
 * The slice of an incoming request the dispatcher works with.
 */

export interface DispatchRequestOptions {
  /** Pre-bound capture values */
  captures?: string[];
}

export class DispatchRequest {
  /** Request path without its leading slash */
  readonly path: string;

  /** Positional arguments for the resolved action */
  arguments: string[] = [];

  /** Values captured by a pattern-capable dispatch type */
  captures: string[];

  /** Portion of the path the winning dispatch type matched */
  match: string | null = null;

  /** Private path the winning dispatch type reported */
  action: string | null = null;

  constructor(path: string, options: DispatchRequestOptions = {}) {
    this.path = path.replace(/^\/+/, '');
    this.captures = options.captures ? [...options.captures] : [];
  }
}
