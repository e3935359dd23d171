/**
 * Namespace tree.
 *
 * One node per namespace, each owning an ActionContainer. Nodes are created
 * on demand (building "a/b/c" creates "a" and "a/b" as well) and indexed by
 * namespace so that lookups never walk the tree; the tree itself is kept for
 * enumeration.
 */

import { ActionContainer } from './action-container.js';

export class NamespaceNode {
  readonly namespace: string;
  readonly container: ActionContainer;
  private readonly _children: Map<string, NamespaceNode> = new Map();

  constructor(namespace: string, container: ActionContainer) {
    this.namespace = namespace;
    this.container = container;
  }

  get children(): NamespaceNode[] {
    return Array.from(this._children.values());
  }

  child(part: string): NamespaceNode | undefined {
    return this._children.get(part);
  }

  addChild(node: NamespaceNode): void {
    this._children.set(node.container.part, node);
  }
}

/**
 * Split a namespace into its non-empty segments.
 */
export function namespaceParts(namespace: string | null | undefined): string[] {
  return (namespace ?? '').split('/').filter((part) => part.length > 0);
}

/**
 * Normalize a namespace: no leading, trailing or doubled slashes.
 */
export function normalizeNamespace(namespace: string | null | undefined): string {
  return namespaceParts(namespace).join('/');
}

export class NamespaceTree {
  readonly root: NamespaceNode;
  private readonly index: Map<string, NamespaceNode> = new Map();

  constructor() {
    this.root = new NamespaceNode('', new ActionContainer('/'));
    this.index.set('', this.root);
  }

  /**
   * Get the node for a namespace, creating it and any missing ancestors.
   */
  findOrCreate(namespace: string): NamespaceNode {
    let node = this.root;
    const walked: string[] = [];

    for (const part of namespaceParts(namespace)) {
      walked.push(part);
      let child = node.child(part);
      if (!child) {
        child = new NamespaceNode(walked.join('/'), new ActionContainer(part));
        node.addChild(child);
        this.index.set(child.namespace, child);
      }
      node = child;
    }

    return node;
  }

  /**
   * Container for an exact namespace, if that namespace exists.
   */
  container(namespace: string): ActionContainer | undefined {
    return this.index.get(normalizeNamespace(namespace))?.container;
  }

  /**
   * Visit every node depth-first, parents before children.
   */
  walk(visitor: (node: NamespaceNode, depth: number) => void): void {
    const visit = (node: NamespaceNode, depth: number): void => {
      visitor(node, depth);
      for (const child of node.children) {
        visit(child, depth + 1);
      }
    };
    visit(this.root, 0);
  }

  /**
   * Every namespace in the index.
   */
  namespaces(): string[] {
    return Array.from(this.index.keys());
  }
}
