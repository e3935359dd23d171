export { Action, type ActionAttributes, type ActionCode, type ActionOptions, privatePath } from './action.js';
export { ActionChain, captureCount } from './action-chain.js';
export { ActionContainer } from './action-container.js';
export {
  NamespaceNode,
  NamespaceTree,
  namespaceParts,
  normalizeNamespace,
} from './namespace-tree.js';
