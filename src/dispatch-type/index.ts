/**
 * Dispatch types: the matching strategies the dispatcher consults, in
 * order, for every request path.
 *
 * - `IndexDispatchType`: `index` actions of a namespace
 * - `PathDispatchType`: literal `Path` attributes
 * - `RegexDispatchType`: `Regex` attributes, with captures
 * - `ChainedDispatchType`: `Chained` action chains, with captures
 * - `DefaultDispatchType`: nearest `default` action, catch-all
 */

export { BaseDispatchType, type MatchBinding } from './base-dispatch-type.js';
export { ChainedDispatchType } from './builtin/chained.js';
export { DefaultDispatchType } from './builtin/default.js';
export { IndexDispatchType } from './builtin/index-type.js';
export { PathDispatchType, pathKey } from './builtin/path.js';
export { fillPattern, RegexDispatchType } from './builtin/regex.js';
export type { DispatchType, DispatchTypeClass, DispatchTypeListing } from './dispatch-type.js';
export { BUILTIN_DISPATCH_TYPES, DispatchTypeRegistry } from './registry.js';
