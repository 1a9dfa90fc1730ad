/**
 * Instantiator pipeline: JSON scene -> composition object graph -> C# source
 */

export {
  classNameFromPath,
  DEFAULT_CLASS_NAME,
  type SceneGenerationOptions,
  type SceneGenerationResult,
  SceneInstantiator,
} from "./scene_instantiator.js";
export { CodeBuilder } from "./codegen/code_builder.js";
export { CompilationContext } from "./codegen/compilation_context.js";
export { CompiledNode } from "./codegen/compiled_node.js";
export {
  CSharpInstantiatorGenerator,
  DEFAULT_NAMESPACE,
} from "./codegen/csharp/csharp_instantiator_generator.js";
export { CSharpStringifier } from "./codegen/csharp/csharp_stringifier.js";
export {
  type CompilationResult,
  type GeneratorOptions,
  InstantiatorGenerator,
} from "./codegen/instantiator_generator.js";
export { annotate } from "./codegen/node_annotator.js";
export {
  type ReferenceExpr,
  ReferenceResolver,
} from "./codegen/reference_resolver.js";
export { type Stringifier, StringifierBase } from "./codegen/stringifier.js";
export type {
  ClassShellProvider,
  GeometryBodyProvider,
  InstantiatorTarget,
  UnitDescription,
} from "./codegen/target.js";
export { UnitAssembler, type UnitOptions } from "./codegen/unit_assembler.js";
export {
  BatchGenerator,
  type BatchGeneratorOptions,
  type BatchResult,
} from "./batch/batch_generator.js";
export * from "./errors/codegen_errors.js";
export { ErrorCollector } from "./errors/error_collector.js";
export {
  type CanonicalGraphView,
  type CanonicalNodeView,
  canonicalize,
} from "./graph/canonicalizer.js";
export { ObjectGraph } from "./graph/object_graph.js";
export { Compositor } from "./model/compositor.js";
export { type LoadedScene, SceneLoader } from "./model/scene_loader.js";
export * from "./model/types.js";
export * from "./model/values.js";
