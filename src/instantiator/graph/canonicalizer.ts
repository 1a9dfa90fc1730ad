/**
 * Structural canonicalization of the object graph
 */

import { CodegenError } from "../errors/codegen_errors.js";
import {
  CanvasGeometryType,
  CompositionObjectType,
  type ExplicitCompositionObject,
  type GraphObject,
  type KeyFrame,
  animatorsOf,
  hasProperties,
} from "../model/types.js";
import { colorToHex } from "../model/values.js";
import type { GraphNode, GraphNodeKind, ObjectGraph } from "./object_graph.js";

export interface CanonicalizeOptions {
  /** When false, objects with different comments are kept apart. */
  ignoreCommentProperties: boolean;
}

/**
 * A canonical representative, standing for its group of interchangeable
 * objects.
 */
export interface CanonicalNodeView {
  readonly object: GraphObject;
  readonly kind: GraphNodeKind;
  readonly constructionOrderIndex: number;
  readonly groupSize: number;
  /** One entry per reference made by a canonical representative. */
  inboundReferences(): readonly CanonicalNodeView[];
}

export interface CanonicalGraphView {
  readonly root: CanonicalNodeView;
  /** Representatives in construction order. */
  canonicalNodes(): IterableIterator<CanonicalNodeView>;
  /** The representative standing for any object of the graph. */
  nodeFor(obj: GraphObject): CanonicalNodeView;
}

class CanonicalNode implements CanonicalNodeView {
  readonly inbound: CanonicalNode[] = [];
  groupSize = 0;

  constructor(private readonly graphNode: GraphNode) {}

  get object(): GraphObject {
    return this.graphNode.object;
  }

  get kind(): GraphNodeKind {
    return this.graphNode.kind;
  }

  get constructionOrderIndex(): number {
    return this.graphNode.index;
  }

  get outReferences(): readonly number[] {
    return this.graphNode.outReferences;
  }

  inboundReferences(): readonly CanonicalNodeView[] {
    return this.inbound;
  }
}

/**
 * Computes a key per node such that two nodes share a key iff they are
 * interchangeable. Keys of referenced nodes are interned to short ids so
 * that nested keys stay small.
 */
class StructuralKeys {
  private readonly ids: Array<string | undefined> = [];
  private readonly inProgress = new Set<number>();
  private readonly interned = new Map<string, string>();

  constructor(
    private readonly graph: ObjectGraph,
    private readonly options: CanonicalizeOptions,
  ) {}

  idOf(index: number): string {
    const known = this.ids[index];
    if (known !== undefined) {
      return known;
    }
    if (this.inProgress.has(index)) {
      // Cyclic structure is never merged.
      return `#${index}`;
    }
    this.inProgress.add(index);
    const key = this.keyOf(this.graph.node(index)) ?? `#${index}`;
    this.inProgress.delete(index);

    let id = this.interned.get(key);
    if (id === undefined) {
      id = `k${this.interned.size}`;
      this.interned.set(key, id);
    }
    this.ids[index] = id;
    return id;
  }

  private ref(obj: GraphObject): string {
    return this.idOf(this.graph.nodeFor(obj).index);
  }

  private keyOf(node: GraphNode): string | undefined {
    const obj = node.object;
    switch (obj.type) {
      case "CompositionPath":
        return JSON.stringify([obj.type, this.ref(obj.source)]);
      case "CanvasGeometry":
        switch (obj.geometryType) {
          case CanvasGeometryType.Combination:
            return JSON.stringify([
              obj.geometryType,
              this.ref(obj.a),
              this.ref(obj.b),
              obj.matrix,
              obj.combineMode,
            ]);
          case CanvasGeometryType.Ellipse:
            return JSON.stringify([
              obj.geometryType,
              obj.x,
              obj.y,
              obj.radiusX,
              obj.radiusY,
            ]);
          case CanvasGeometryType.Path:
            return JSON.stringify([
              obj.geometryType,
              obj.filledRegionDetermination,
              obj.commands,
            ]);
          case CanvasGeometryType.RoundedRectangle:
            return JSON.stringify([
              obj.geometryType,
              obj.x,
              obj.y,
              obj.w,
              obj.h,
              obj.radiusX,
              obj.radiusY,
            ]);
          default:
            return undefined;
        }
      default:
        return this.compositionObjectKey(obj);
    }
  }

  private compositionObjectKey(
    obj: ExplicitCompositionObject,
  ): string | undefined {
    if (animatorsOf(obj).length > 0 || hasProperties(obj)) {
      return undefined;
    }
    const fields = this.compositionObjectFields(obj);
    if (fields === undefined) {
      return undefined;
    }
    const comment = this.options.ignoreCommentProperties
      ? []
      : [obj.comment ?? ""];
    return JSON.stringify([obj.type, ...fields, ...comment]);
  }

  private compositionObjectFields(
    obj: ExplicitCompositionObject,
  ): unknown[] | undefined {
    switch (obj.type) {
      case CompositionObjectType.LinearEasingFunction:
        return [];
      case CompositionObjectType.CubicBezierEasingFunction:
        return [obj.controlPoint1, obj.controlPoint2];
      case CompositionObjectType.StepEasingFunction:
        return [
          obj.finalStep,
          obj.initialStep,
          obj.isFinalStepSingleFrame,
          obj.isInitialStepSingleFrame,
          obj.stepCount,
        ];
      case CompositionObjectType.CompositionColorBrush:
        return [colorToHex(obj.color)];
      case CompositionObjectType.CompositionEllipseGeometry:
        return [...this.trim(obj), obj.center, obj.radius];
      case CompositionObjectType.CompositionRectangleGeometry:
        return [...this.trim(obj), obj.size];
      case CompositionObjectType.CompositionRoundedRectangleGeometry:
        return [...this.trim(obj), obj.size, obj.cornerRadius];
      case CompositionObjectType.CompositionPathGeometry:
        return [...this.trim(obj), this.ref(obj.path)];
      case CompositionObjectType.ExpressionAnimation:
        return [obj.expression, ...this.animationFields(obj)];
      case CompositionObjectType.ColorKeyFrameAnimation:
        return [
          obj.duration,
          ...this.animationFields(obj),
          this.keyFrames(obj.keyFrames, colorToHex),
        ];
      case CompositionObjectType.ScalarKeyFrameAnimation:
      case CompositionObjectType.Vector2KeyFrameAnimation:
      case CompositionObjectType.Vector3KeyFrameAnimation:
        return [
          obj.duration,
          ...this.animationFields(obj),
          this.keyFrames<unknown>(obj.keyFrames, (value) => value),
        ];
      case CompositionObjectType.PathKeyFrameAnimation:
        return [
          obj.duration,
          ...this.animationFields(obj),
          this.keyFrames(obj.keyFrames, (path) => this.ref(path)),
        ];
      default:
        return undefined;
    }
  }

  private trim(obj: {
    trimStart: number;
    trimEnd: number;
    trimOffset: number;
  }): number[] {
    return [obj.trimStart, obj.trimEnd, obj.trimOffset];
  }

  private animationFields(obj: {
    target?: string;
    referenceParameters: Map<string, GraphObject>;
  }): unknown[] {
    const parameters = [...obj.referenceParameters].map(([name, target]) => [
      name,
      this.ref(target),
    ]);
    return [obj.target ?? "", parameters];
  }

  private keyFrames<T>(
    keyFrames: KeyFrame<T>[],
    valueKey: (value: T) => unknown,
  ): unknown[] {
    return keyFrames.map((keyFrame) => [
      keyFrame.progress,
      keyFrame.kind === "value"
        ? ["value", valueKey(keyFrame.value)]
        : ["expression", keyFrame.expression],
      this.ref(keyFrame.easing),
    ]);
  }
}

/**
 * Canonical view over an object graph. Representatives are the members of
 * each group with the lowest construction-order index.
 */
export class CanonicalGraph implements CanonicalGraphView {
  private readonly representatives: CanonicalNode[];
  private readonly canonicalByIndex: CanonicalNode[];

  private constructor(
    private readonly graph: ObjectGraph,
    representatives: CanonicalNode[],
    canonicalByIndex: CanonicalNode[],
  ) {
    this.representatives = representatives;
    this.canonicalByIndex = canonicalByIndex;
  }

  static build(graph: ObjectGraph, options: CanonicalizeOptions): CanonicalGraph {
    const keys = new StructuralKeys(graph, options);
    const byId = new Map<string, CanonicalNode>();
    const representatives: CanonicalNode[] = [];
    const canonicalByIndex: CanonicalNode[] = [];

    for (const node of graph.nodes) {
      const id = keys.idOf(node.index);
      let canonical = byId.get(id);
      if (!canonical) {
        canonical = new CanonicalNode(node);
        byId.set(id, canonical);
        representatives.push(canonical);
      }
      canonical.groupSize++;
      canonicalByIndex.push(canonical);
    }

    for (const representative of representatives) {
      for (const target of representative.outReferences) {
        const canonicalTarget = canonicalByIndex[target];
        if (!canonicalTarget) {
          throw new CodegenError(
            "InvalidReference",
            `Dangling reference to graph node ${target}`,
          );
        }
        canonicalTarget.inbound.push(representative);
      }
    }

    return new CanonicalGraph(graph, representatives, canonicalByIndex);
  }

  get root(): CanonicalNodeView {
    return this.canonicalAt(0);
  }

  *canonicalNodes(): IterableIterator<CanonicalNodeView> {
    yield* this.representatives;
  }

  nodeFor(obj: GraphObject): CanonicalNodeView {
    return this.canonicalAt(this.graph.nodeFor(obj).index);
  }

  private canonicalAt(index: number): CanonicalNode {
    const canonical = this.canonicalByIndex[index];
    if (!canonical) {
      throw new CodegenError(
        "InvalidReference",
        `No graph node at index ${index}`,
      );
    }
    return canonical;
  }
}

export const canonicalize = (
  graph: ObjectGraph,
  options: CanonicalizeOptions = { ignoreCommentProperties: true },
): CanonicalGraph => CanonicalGraph.build(graph, options);
