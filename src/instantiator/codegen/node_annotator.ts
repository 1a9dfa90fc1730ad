/**
 * Reduces the canonical graph to the nodes that get code, and decides their
 * names, storage and inlining
 */

import type {
  CanonicalGraphView,
  CanonicalNodeView,
} from "../graph/canonicalizer.js";
import {
  type Animator,
  CompositionObjectType,
  animatorsOf,
  isCompositionObject,
} from "../model/types.js";
import { CompilationContext } from "./compilation_context.js";
import { CompiledNode } from "./compiled_node.js";
import { ROOT_NAME, assignNames } from "./naming.js";
import type { Stringifier } from "./stringifier.js";

/**
 * Number of animators binding each canonical animation. Animated objects are
 * never merged, so walking the representatives sees every binding. The
 * animators of an expression animation are never emitted, so they are not
 * bindings.
 */
const countBindings = (
  view: CanonicalGraphView,
): Map<CanonicalNodeView, number> => {
  const counts = new Map<CanonicalNodeView, number>();
  const visit = (animators: readonly Animator[]) => {
    for (const animator of animators) {
      const animation = view.nodeFor(animator.animation);
      counts.set(animation, (counts.get(animation) ?? 0) + 1);
      if (animator.controller) {
        visit(animatorsOf(animator.controller));
      }
    }
  };
  for (const node of view.canonicalNodes()) {
    const obj = node.object;
    if (
      isCompositionObject(obj) &&
      obj.type !== CompositionObjectType.ExpressionAnimation
    ) {
      visit(animatorsOf(obj));
    }
  }
  return counts;
};

/**
 * An expression animation bound exactly once is rebuilt on the shared
 * singleton at its use instead of getting a factory.
 */
const isUniqueExpressionAnimation = (
  node: CanonicalNodeView,
  bindings: ReadonlyMap<CanonicalNodeView, number>,
): boolean =>
  node.object.type === CompositionObjectType.ExpressionAnimation &&
  node.groupSize === 1 &&
  bindings.get(node) === 1;

// A unique expression animation that animates the target (or the target's
// property set) is part of the target's initialization, not a shared use.
const isInitializationOf = (
  referencer: CompiledNode,
  target: CompiledNode,
): boolean => {
  if (referencer.retained) {
    return false;
  }
  const obj = target.object;
  return (
    isCompositionObject(obj) &&
    animatorsOf(obj).some(
      (animator) => animator.animation === referencer.object,
    )
  );
};

export const annotate = (
  view: CanonicalGraphView,
  stringifier: Stringifier,
): CompilationContext => {
  // Property sets and animation controllers are folded into their owners by
  // the graph, so they never show up here.
  const bindings = countBindings(view);
  const nodes = [...view.canonicalNodes()].map(
    (canonical) =>
      new CompiledNode(
        canonical,
        !isUniqueExpressionAnimation(canonical, bindings),
      ),
  );
  const context = new CompilationContext(view, nodes);

  for (const node of nodes) {
    for (const inbound of node.view.inboundReferences()) {
      const referencer = context.nodeAt(inbound.constructionOrderIndex);
      if (!isInitializationOf(referencer, node)) {
        node.inboundReferences.push(referencer);
      }
    }
  }

  const retained = nodes.filter((node) => node.retained);
  assignNames(retained);

  const root = context.root;
  root.name = ROOT_NAME;

  for (const node of retained) {
    node.requiresStorage = node.inboundReferences.length > 1;
  }
  // The entry point's call to the root is not an inbound reference.
  if (root.inboundReferences.length > 0) {
    root.requiresStorage = true;
  }

  for (const node of retained) {
    const obj = node.object;
    if (obj.type !== "CompositionPath" || node.inboundReferences.length > 1) {
      continue;
    }
    const source = context.resolve(node, obj.source);
    node.inlineExpression = `${stringifier.newOperator} CompositionPath(${stringifier.factoryCall(source.text)})`;
    node.requiresStorage = false;
  }

  return context;
};
