import { describe, expect, it } from 'vitest';
import {
  NamespaceTree,
  namespaceParts,
  normalizeNamespace,
} from '../../../src/action/namespace-tree.js';

describe('normalizeNamespace', () => {
  it('drops leading, trailing and doubled slashes', () => {
    expect(normalizeNamespace('/a//b/')).toBe('a/b');
    expect(normalizeNamespace(null)).toBe('');
    expect(namespaceParts('a/b')).toEqual(['a', 'b']);
  });
});

describe('NamespaceTree', () => {
  it('creates missing ancestors', () => {
    const tree = new NamespaceTree();
    const node = tree.findOrCreate('a/b/c');

    expect(node.namespace).toBe('a/b/c');
    expect(node.container.part).toBe('c');
    expect(tree.namespaces()).toEqual(['', 'a', 'a/b', 'a/b/c']);
    expect(tree.container('a/b')?.part).toBe('b');
  });

  it('returns the existing node', () => {
    const tree = new NamespaceTree();

    expect(tree.findOrCreate('a')).toBe(tree.findOrCreate('/a/'));
    expect(tree.findOrCreate('')).toBe(tree.root);
  });

  it('walks parents before children', () => {
    const tree = new NamespaceTree();
    tree.findOrCreate('a/b');
    tree.findOrCreate('c');

    const visited: string[] = [];
    tree.walk((node, depth) => visited.push(`${depth}:${node.container.part}`));

    expect(visited).toEqual(['0:/', '1:a', '2:b', '1:c']);
  });

  it('has no container for unknown namespaces', () => {
    expect(new NamespaceTree().container('nope')).toBeUndefined();
  });
});
