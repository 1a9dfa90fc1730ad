/**
 * Per-run annotation of a canonical node
 */

import type { CanonicalNodeView } from "../graph/canonicalizer.js";
import type { GraphNodeKind } from "../graph/object_graph.js";
import type { GraphObject } from "../model/types.js";

export class CompiledNode {
  name = "";
  requiresStorage = false;
  /** Construction text substituted at each use site instead of a factory. */
  inlineExpression: string | undefined = undefined;
  /** Referencing nodes after exclusion rules, one entry per reference. */
  readonly inboundReferences: CompiledNode[] = [];

  constructor(
    readonly view: CanonicalNodeView,
    /** False for nodes that never get a factory method of their own. */
    readonly retained: boolean,
  ) {}

  get object(): GraphObject {
    return this.view.object;
  }

  get kind(): GraphNodeKind {
    return this.view.kind;
  }

  get constructionOrderIndex(): number {
    return this.view.constructionOrderIndex;
  }

  get isInlined(): boolean {
    return this.inlineExpression !== undefined;
  }

  get requiresGeometryLibrary(): boolean {
    return this.kind === "CanvasGeometry";
  }

  /**
   * Return type of the factory method.
   */
  get typeName(): string {
    return this.object.type;
  }

  get fieldName(): string {
    return `_${this.name.charAt(0).toLowerCase()}${this.name.slice(1)}`;
  }

  factoryCall(): string {
    return this.inlineExpression ?? `${this.name}()`;
  }

  toString(): string {
    return this.name.length > 0
      ? this.name
      : `${this.typeName}#${this.constructionOrderIndex}`;
  }
}
