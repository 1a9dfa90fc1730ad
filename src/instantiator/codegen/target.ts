/**
 * Hooks supplied by a target language
 */

import type {
  CanvasGeometryCombination,
  CanvasGeometryEllipse,
  CanvasGeometryPath,
  CanvasGeometryRoundedRectangle,
  CompositionPropertySet,
} from "../model/types.js";
import type { Vector2 } from "../model/values.js";
import type { CodeBuilder } from "./code_builder.js";
import type { CompiledNode } from "./compiled_node.js";
import type { Stringifier } from "./stringifier.js";

export interface UnitDescription {
  className: string;
  size: Vector2;
  /** Property set of the root visual; its scalars become name constants. */
  propertySet: CompositionPropertySet;
  durationTicks: number;
  durationTicksFieldName: string;
}

/**
 * Writes what surrounds the generated fields and factories.
 */
export interface ClassShellProvider {
  writePreamble(builder: CodeBuilder, requiresGeometryLibrary: boolean): void;
  writeClassStart(builder: CodeBuilder, unit: UnitDescription): void;
  writeClassEnd(
    builder: CodeBuilder,
    unit: UnitDescription,
    root: CompiledNode,
    singletonFieldName: string,
  ): void;
}

/**
 * Writes the body of a canvas geometry factory. `fieldName` is set when the
 * result is also stored in a field.
 */
export interface GeometryBodyProvider {
  writeCanvasGeometryCombinationFactory(
    builder: CodeBuilder,
    obj: CanvasGeometryCombination,
    typeName: string,
    fieldName: string | undefined,
    operands: { a: string; b: string },
  ): void;
  writeCanvasGeometryEllipseFactory(
    builder: CodeBuilder,
    obj: CanvasGeometryEllipse,
    typeName: string,
    fieldName: string | undefined,
  ): void;
  writeCanvasGeometryPathFactory(
    builder: CodeBuilder,
    obj: CanvasGeometryPath,
    typeName: string,
    fieldName: string | undefined,
  ): void;
  writeCanvasGeometryRoundedRectangleFactory(
    builder: CodeBuilder,
    obj: CanvasGeometryRoundedRectangle,
    typeName: string,
    fieldName: string | undefined,
  ): void;
}

export interface InstantiatorTarget
  extends ClassShellProvider,
    GeometryBodyProvider {
  readonly stringifier: Stringifier;
}
