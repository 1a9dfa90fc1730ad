/**
 * Compiles a composition object graph into a class that rebuilds it
 */

import { canonicalize } from "../graph/canonicalizer.js";
import { ObjectGraph } from "../graph/object_graph.js";
import type {
  CanvasGeometryCombination,
  CanvasGeometryEllipse,
  CanvasGeometryPath,
  CanvasGeometryRoundedRectangle,
  Visual,
} from "../model/types.js";
import type { CodeBuilder } from "./code_builder.js";
import type { CompilationContext } from "./compilation_context.js";
import type { CompiledNode } from "./compiled_node.js";
import { annotate } from "./node_annotator.js";
import type { Stringifier } from "./stringifier.js";
import type { InstantiatorTarget, UnitDescription } from "./target.js";
import { UnitAssembler } from "./unit_assembler.js";

export interface GeneratorOptions {
  className: string;
  width: number;
  height: number;
  /** Milliseconds. */
  durationMs: number;
  /**
   * Emit `Comment` assignments, and keep objects with different comments
   * apart when canonicalizing.
   */
  setCommentProperties?: boolean;
}

export interface CompilationResult {
  code: string;
  context: CompilationContext;
}

/**
 * Base of every target language. Each call to {@link compile} runs the
 * whole pipeline (graph, canonicalization, annotation and emission) with
 * fresh per-run state.
 */
export abstract class InstantiatorGenerator implements InstantiatorTarget {
  constructor(readonly stringifier: Stringifier) {}

  compile(root: Visual, options: GeneratorOptions): CompilationResult {
    const setCommentProperties = options.setCommentProperties ?? false;
    const graph = ObjectGraph.fromRoot(root);
    const view = canonicalize(graph, {
      ignoreCommentProperties: !setCommentProperties,
    });
    const context = annotate(view, this.stringifier);
    const code = new UnitAssembler(context, this, {
      className: options.className,
      width: options.width,
      height: options.height,
      durationMs: options.durationMs,
      setCommentProperties,
    }).assemble();
    return { code, context };
  }

  generate(root: Visual, options: GeneratorOptions): string {
    return this.compile(root, options).code;
  }

  abstract writePreamble(
    builder: CodeBuilder,
    requiresGeometryLibrary: boolean,
  ): void;

  abstract writeClassStart(builder: CodeBuilder, unit: UnitDescription): void;

  abstract writeClassEnd(
    builder: CodeBuilder,
    unit: UnitDescription,
    root: CompiledNode,
    singletonFieldName: string,
  ): void;

  abstract writeCanvasGeometryCombinationFactory(
    builder: CodeBuilder,
    obj: CanvasGeometryCombination,
    typeName: string,
    fieldName: string | undefined,
    operands: { a: string; b: string },
  ): void;

  abstract writeCanvasGeometryEllipseFactory(
    builder: CodeBuilder,
    obj: CanvasGeometryEllipse,
    typeName: string,
    fieldName: string | undefined,
  ): void;

  abstract writeCanvasGeometryPathFactory(
    builder: CodeBuilder,
    obj: CanvasGeometryPath,
    typeName: string,
    fieldName: string | undefined,
  ): void;

  abstract writeCanvasGeometryRoundedRectangleFactory(
    builder: CodeBuilder,
    obj: CanvasGeometryRoundedRectangle,
    typeName: string,
    fieldName: string | undefined,
  ): void;
}
