/**
 * Object graph arena
 */

import { CodegenError } from "../errors/codegen_errors.js";
import {
  COMPOSITION_PATH,
  CANVAS_GEOMETRY,
  type GraphObject,
  type Visual,
} from "../model/types.js";
import { outReferences } from "./references.js";

export type GraphNodeKind =
  | "CompositionObject"
  | typeof COMPOSITION_PATH
  | typeof CANVAS_GEOMETRY;

export interface GraphNode {
  /** Depth-first first-visit position from the root. */
  readonly index: number;
  readonly kind: GraphNodeKind;
  readonly object: GraphObject;
  /** Referenced nodes in emission order, with multiplicity. */
  readonly outReferences: readonly number[];
  /** Referencing nodes, one entry per reference. */
  readonly inReferences: readonly number[];
}

export const kindOf = (obj: GraphObject): GraphNodeKind =>
  obj.type === COMPOSITION_PATH || obj.type === CANVAS_GEOMETRY
    ? obj.type
    : "CompositionObject";

/**
 * Every object reachable from a root visual, stored in an arena addressed by
 * construction-order index. Edges may point either way in that order.
 */
export class ObjectGraph {
  private readonly indexByObject = new Map<GraphObject, number>();

  private constructor(readonly nodes: readonly GraphNode[]) {
    for (const node of nodes) {
      this.indexByObject.set(node.object, node.index);
    }
  }

  static fromRoot(root: Visual): ObjectGraph {
    const order: GraphObject[] = [];
    const indexOf = new Map<GraphObject, number>();
    const edges: GraphObject[][] = [];

    // Iterative preorder; a node is numbered when popped, which yields the
    // same order as the recursive walk.
    const stack: GraphObject[] = [root];
    while (stack.length > 0) {
      const obj = stack.pop();
      if (obj === undefined || indexOf.has(obj)) {
        continue;
      }
      indexOf.set(obj, order.length);
      order.push(obj);
      const refs = outReferences(obj);
      edges.push(refs);
      for (let i = refs.length - 1; i >= 0; i--) {
        const ref = refs[i];
        if (ref !== undefined && !indexOf.has(ref)) {
          stack.push(ref);
        }
      }
    }

    const resolveIndex = (obj: GraphObject): number => {
      const index = indexOf.get(obj);
      if (index === undefined) {
        throw new CodegenError(
          "InvalidReference",
          `Object of type ${obj.type} was not reached from the root`,
        );
      }
      return index;
    };

    const inReferences: number[][] = order.map(() => []);
    const outIndices = edges.map((refs, from) =>
      refs.map((ref) => {
        const to = resolveIndex(ref);
        inReferences[to]?.push(from);
        return to;
      }),
    );

    return new ObjectGraph(
      order.map((object, index) => ({
        index,
        kind: kindOf(object),
        object,
        outReferences: outIndices[index] ?? [],
        inReferences: inReferences[index] ?? [],
      })),
    );
  }

  get root(): GraphNode {
    return this.node(0);
  }

  get size(): number {
    return this.nodes.length;
  }

  node(index: number): GraphNode {
    const node = this.nodes[index];
    if (!node) {
      throw new CodegenError(
        "InvalidReference",
        `No graph node at index ${index}`,
      );
    }
    return node;
  }

  has(obj: GraphObject): boolean {
    return this.indexByObject.has(obj);
  }

  nodeFor(obj: GraphObject): GraphNode {
    const index = this.indexByObject.get(obj);
    if (index === undefined) {
      throw new CodegenError(
        "InvalidReference",
        `Object of type ${obj.type} is not part of the graph`,
      );
    }
    return this.node(index);
  }
}
