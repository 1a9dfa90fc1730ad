/**
 * Descriptive comments tracing a factory back to its source content
 */

import type { CanonicalNodeView } from "../graph/canonicalizer.js";

const isPresent = (text: string | undefined): text is string =>
  text !== undefined && text.trim().length > 0;

const distinctReferencers = (
  node: CanonicalNodeView,
): CanonicalNodeView[] => [...new Set(node.inboundReferences())];

/**
 * Short descriptions of the chain of sole referencers, most distant first.
 * The walk stops at a node with more than one referencer, at one without a
 * short description, or on revisiting a node.
 */
export const ancestorShortDescriptions = (
  node: CanonicalNodeView,
): string[] => {
  const chain: string[] = [];
  const visited = new Set<CanonicalNodeView>([node]);
  let current = node;
  for (;;) {
    const parents = distinctReferencers(current);
    const parent = parents[0];
    if (parents.length !== 1 || parent === undefined || visited.has(parent)) {
      break;
    }
    const description = parent.object.shortDescription;
    if (!isPresent(description)) {
      break;
    }
    chain.unshift(description);
    visited.add(parent);
    current = parent;
  }
  return chain;
};

/**
 * Ancestor descriptions, each indented two spaces deeper than the previous,
 * followed by the node's own long description.
 */
export const longComment = (node: CanonicalNodeView): string => {
  const lines = ancestorShortDescriptions(node).map(
    (description, i) => `${" ".repeat(i * 2)}${description}`,
  );
  const own = node.object.longDescription;
  if (isPresent(own)) {
    lines.push(own);
  }
  return lines.join("\n");
};
