/**
 * Tree extractor: finds story-shaped nodes inside an untyped JSON tree.
 *
 * A mapping is a collection, a leaf or neither, decided by the adapter's
 * discriminant rules. Collections expand into their items only. Leaves are
 * emitted and their values are still scanned, since leaves may nest leaves.
 * Anything else is scanned value by value. Output is pre-order, document
 * order, without dedup.
 */

import { DiscriminantConfig, DiscriminantRules, RawMap, RawNode } from '../types/adapter';
import { isRawMap } from './tools/document';

export function createDiscriminantRules(config: DiscriminantConfig): DiscriminantRules {
  const { discriminantKey, collectionMarker, itemsKey, leafMarker, wrapperKey } = config;

  return {
    isCollection: (node) => node[discriminantKey] === collectionMarker && itemsKey in node,
    isLeaf: (node) => node[discriminantKey] === leafMarker,
    items: (node) => node[itemsKey],
    unwrap: (node) => {
      if (!wrapperKey) return node;
      const wrapped = node[wrapperKey];
      return isRawMap(wrapped) ? wrapped : node;
    }
  };
}

export function extractLeaves(root: RawNode, rules: DiscriminantRules): RawMap[] {
  const leaves: RawMap[] = [];
  // Explicit stack instead of recursion: nesting depth is unbounded
  const stack: RawNode[] = [root];

  const pushChildren = (children: RawNode[]) => {
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push(children[i]);
    }
  };

  while (stack.length > 0) {
    const node = stack.pop();
    if (node === undefined) break;

    if (Array.isArray(node)) {
      pushChildren(node);
      continue;
    }
    if (!isRawMap(node)) {
      continue;
    }

    if (rules.isCollection(node)) {
      const items = rules.items(node);
      pushChildren(Array.isArray(items) ? items : [items]);
      continue;
    }

    if (rules.isLeaf(node)) {
      leaves.push(rules.unwrap(node));
    }
    pushChildren(Object.values(node));
  }

  return leaves;
}
