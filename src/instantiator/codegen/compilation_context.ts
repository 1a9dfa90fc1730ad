/**
 * Mutable state of one compilation
 */

import { CodegenError } from "../errors/codegen_errors.js";
import type { CanonicalGraphView } from "../graph/canonicalizer.js";
import type { GraphObject } from "../model/types.js";
import type { CompiledNode } from "./compiled_node.js";
import { compareNames } from "./naming.js";
import { type ReferenceExpr, ReferenceResolver } from "./reference_resolver.js";

/**
 * Compiled nodes and the resolver memo of a single run. Nothing here is
 * shared between runs over the same graph.
 */
export class CompilationContext {
  readonly resolver = new ReferenceResolver();
  private readonly byIndex = new Map<number, CompiledNode>();

  constructor(
    readonly view: CanonicalGraphView,
    /** Every canonical node, in construction order. */
    readonly nodes: readonly CompiledNode[],
  ) {
    for (const node of nodes) {
      this.byIndex.set(node.constructionOrderIndex, node);
    }
  }

  get root(): CompiledNode {
    return this.nodeAt(this.view.root.constructionOrderIndex);
  }

  nodeAt(constructionOrderIndex: number): CompiledNode {
    const node = this.byIndex.get(constructionOrderIndex);
    if (!node) {
      throw new CodegenError(
        "InvalidReference",
        `No canonical node at index ${constructionOrderIndex}`,
      );
    }
    return node;
  }

  nodeFor(obj: GraphObject): CompiledNode {
    return this.nodeAt(this.view.nodeFor(obj).constructionOrderIndex);
  }

  /**
   * Nodes that get a factory method, in name order.
   */
  methodNodes(): CompiledNode[] {
    return this.nodes
      .filter((node) => node.retained && !node.isInlined)
      .sort(compareNames);
  }

  /**
   * Nodes that get a cache field, in name order.
   */
  storedNodes(): CompiledNode[] {
    return this.methodNodes().filter((node) => node.requiresStorage);
  }

  resolve(caller: CompiledNode, obj: GraphObject): ReferenceExpr {
    return this.resolver.resolve(caller, this.nodeFor(obj));
  }
}
