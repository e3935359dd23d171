/**
 * Dispatch type registry.
 *
 * Maps dispatch type names to constructors. Bare names ("Path") resolve to
 * the built-in dispatch types; names prefixed with "+" ("+Health") resolve
 * to types defined by the application.
 *
 * @example
 * ```typescript
 * const registry = DispatchTypeRegistry.withBuiltins();
 * registry.define('Health', HealthDispatchType);
 *
 * registry.resolve('Path');    // PathDispatchType
 * registry.resolve('+Health'); // HealthDispatchType
 * registry.resolve('Nope');    // throws DispatchTypeNotFoundError
 * ```
 */

import { DispatchTypeNotFoundError } from '../dispatcher/errors.js';
import { ChainedDispatchType } from './builtin/chained.js';
import { DefaultDispatchType } from './builtin/default.js';
import { IndexDispatchType } from './builtin/index-type.js';
import { PathDispatchType } from './builtin/path.js';
import { RegexDispatchType } from './builtin/regex.js';
import type { DispatchType, DispatchTypeClass } from './dispatch-type.js';

const CUSTOM_PREFIX = '+';

export const BUILTIN_DISPATCH_TYPES: Readonly<Record<string, DispatchTypeClass>> = Object.freeze({
  Index: IndexDispatchType,
  Path: PathDispatchType,
  Regex: RegexDispatchType,
  Default: DefaultDispatchType,
  Chained: ChainedDispatchType,
});

export class DispatchTypeRegistry {
  private readonly builtins: Map<string, DispatchTypeClass> = new Map();
  private readonly custom: Map<string, DispatchTypeClass> = new Map();

  /**
   * Create a registry holding the built-in dispatch types.
   */
  static withBuiltins(): DispatchTypeRegistry {
    const registry = new DispatchTypeRegistry();
    for (const [name, ctor] of Object.entries(BUILTIN_DISPATCH_TYPES)) {
      registry.builtins.set(name, ctor);
    }
    return registry;
  }

  /**
   * Define an application dispatch type, reachable as "+name".
   *
   * @param name - Name with or without the leading "+"
   * @param ctor - Dispatch type constructor
   */
  define(name: string, ctor: DispatchTypeClass): void {
    this.custom.set(name.startsWith(CUSTOM_PREFIX) ? name.slice(1) : name, ctor);
  }

  /**
   * Identity of a name, used to remember which types were already loaded.
   */
  identity(name: string): string {
    return name.startsWith(CUSTOM_PREFIX) ? name : `builtin:${name}`;
  }

  /**
   * Check whether a name resolves.
   */
  has(name: string): boolean {
    return this.lookup(name) !== undefined;
  }

  /**
   * Resolve a name to its constructor.
   *
   * @throws DispatchTypeNotFoundError if nothing is registered under the name
   */
  resolve(name: string): DispatchTypeClass {
    const ctor = this.lookup(name);
    if (!ctor) {
      throw new DispatchTypeNotFoundError(name);
    }
    return ctor;
  }

  /**
   * Resolve and instantiate a dispatch type.
   */
  instantiate(name: string): DispatchType {
    const ctor = this.resolve(name);
    return new ctor();
  }

  /**
   * Every resolvable name; custom types carry their "+".
   */
  names(): string[] {
    return [
      ...this.builtins.keys(),
      ...Array.from(this.custom.keys(), (name) => `${CUSTOM_PREFIX}${name}`),
    ];
  }

  private lookup(name: string): DispatchTypeClass | undefined {
    if (name.startsWith(CUSTOM_PREFIX)) {
      return this.custom.get(name.slice(1));
    }
    return this.builtins.get(name);
  }
}
