/**
 * C# target: an IAnimatedVisualSource over Windows.UI.Composition, with
 * Win2D for path geometry
 */

import { assertNever } from "../../errors/codegen_errors.js";
import type {
  CanvasGeometryCombination,
  CanvasGeometryEllipse,
  CanvasGeometryPath,
  CanvasGeometryRoundedRectangle,
  PathCommand,
  Visual,
} from "../../model/types.js";
import { CanvasFilledRegionDetermination } from "../../model/types.js";
import type { CodeBuilder } from "../code_builder.js";
import type { CompiledNode } from "../compiled_node.js";
import {
  type GeneratorOptions,
  InstantiatorGenerator,
} from "../instantiator_generator.js";
import type { UnitDescription } from "../target.js";
import { CSharpStringifier } from "./csharp_stringifier.js";

export const DEFAULT_NAMESPACE = "AnimatedVisuals";

const ROOT_VISUAL_FIELD_NAME = "_rootVisual";

/**
 * One constant per distinct property name. Names that differ only in
 * non-word characters get a numeric suffix in first-seen order.
 */
export const propertyNameConstants = (
  propertyNames: Iterable<string>,
): Map<string, string> => {
  const constants = new Map<string, string>();
  const used = new Set<string>();
  for (const name of propertyNames) {
    if (constants.has(name)) continue;
    const base = name.replace(/\W/g, "_");
    let identifier = `${base}PropertyName`;
    for (let n = 1; used.has(identifier); n++) {
      identifier = `${base}_${n}PropertyName`;
    }
    used.add(identifier);
    constants.set(name, identifier);
  }
  return constants;
};

export class CSharpInstantiatorGenerator extends InstantiatorGenerator {
  constructor(private readonly namespace = DEFAULT_NAMESPACE) {
    super(new CSharpStringifier());
  }

  /**
   * Returns C# source for a class that instantiates the graph under `root`.
   */
  static createFactoryCode(
    root: Visual,
    options: GeneratorOptions & { namespace?: string },
  ): string {
    return new CSharpInstantiatorGenerator(options.namespace).generate(
      root,
      options,
    );
  }

  writePreamble(builder: CodeBuilder, requiresGeometryLibrary: boolean): void {
    if (requiresGeometryLibrary) {
      builder.writeLine("using Microsoft.Graphics.Canvas.Geometry;");
    }
    builder.writeLine("using Microsoft.UI.Xaml.Controls;");
    builder.writeLine("using System;");
    builder.writeLine("using System.Numerics;");
    builder.writeLine("using Windows.UI;");
    builder.writeLine("using Windows.UI.Composition;");
    builder.writeLine();
    builder.writeLine(`namespace ${this.namespace}`);
    builder.openScope();
  }

  writeClassStart(builder: CodeBuilder, unit: UnitDescription): void {
    const s = this.stringifier;
    builder.writeLine(`sealed class ${unit.className} : IAnimatedVisualSource`);
    builder.openScope();

    const constants = propertyNameConstants([
      ...unit.propertySet.scalarProperties.keys(),
      ...unit.propertySet.vector2Properties.keys(),
    ]);
    for (const [name, identifier] of constants) {
      builder.writeLine(
        `internal const string ${identifier} = ${s.string(name)};`,
      );
    }
    if (constants.size > 0) {
      builder.writeLine();
    }

    builder.writeLine(
      "public IAnimatedVisual TryCreateAnimatedVisual(Compositor compositor, out object diagnostics)",
    );
    builder.openScope();
    builder.writeLine(`diagnostics = ${s.nullLiteral};`);
    builder.writeLine(`return ${s.newOperator} AnimatedVisual(compositor);`);
    builder.closeScope();
    builder.writeLine();

    builder.writeLine("sealed class AnimatedVisual : IAnimatedVisual");
    builder.openScope();
  }

  writeClassEnd(
    builder: CodeBuilder,
    unit: UnitDescription,
    root: CompiledNode,
    singletonFieldName: string,
  ): void {
    const s = this.stringifier;
    const rootField = root.requiresStorage
      ? root.fieldName
      : ROOT_VISUAL_FIELD_NAME;

    if (!root.requiresStorage) {
      builder.writeLine(`${s.readonlyModifier} Visual ${ROOT_VISUAL_FIELD_NAME};`);
      builder.writeLine();
    }

    builder.writeLine("internal AnimatedVisual(Compositor compositor)");
    builder.openScope();
    builder.writeLine("_c = compositor;");
    builder.writeLine(
      `${singletonFieldName} = compositor.CreateExpressionAnimation();`,
    );
    builder.writeLine(
      root.requiresStorage
        ? `${root.name}();`
        : `${ROOT_VISUAL_FIELD_NAME} = ${root.name}();`,
    );
    builder.closeScope();
    builder.writeLine();

    builder.writeLine(`Visual IAnimatedVisual.RootVisual => ${rootField};`);
    builder.writeLine(
      `TimeSpan IAnimatedVisual.Duration => ${s.timeSpanFromConstant(unit.durationTicksFieldName)};`,
    );
    builder.writeLine(`Vector2 IAnimatedVisual.Size => ${s.vector2(unit.size)};`);
    builder.writeLine(`void IDisposable.Dispose() => ${rootField}?.Dispose();`);

    // AnimatedVisual, the source class, then the namespace.
    builder.closeScope();
    builder.closeScope();
    builder.closeScope();
  }

  writeCanvasGeometryCombinationFactory(
    builder: CodeBuilder,
    obj: CanvasGeometryCombination,
    _typeName: string,
    fieldName: string | undefined,
    operands: { a: string; b: string },
  ): void {
    const s = this.stringifier;
    builder.writeLine(
      `${s.varKeyword} result = ${assignTo(fieldName)}${operands.a}.CombineWith(${operands.b}, ${s.matrix3x2(obj.matrix)}, ${s.canvasGeometryCombine(obj.combineMode)});`,
    );
  }

  writeCanvasGeometryEllipseFactory(
    builder: CodeBuilder,
    obj: CanvasGeometryEllipse,
    _typeName: string,
    fieldName: string | undefined,
  ): void {
    const s = this.stringifier;
    const args = [obj.x, obj.y, obj.radiusX, obj.radiusY].map((value) =>
      s.float(value),
    );
    builder.writeLine(
      `${s.varKeyword} result = ${assignTo(fieldName)}CanvasGeometry.CreateEllipse(${s.nullLiteral}, ${args.join(", ")});`,
    );
  }

  writeCanvasGeometryPathFactory(
    builder: CodeBuilder,
    obj: CanvasGeometryPath,
    typeName: string,
    fieldName: string | undefined,
  ): void {
    const s = this.stringifier;
    builder.writeLine(`${typeName} result;`);
    builder.writeLine(
      `using (${s.varKeyword} builder = ${s.newOperator} CanvasPathBuilder(${s.nullLiteral}))`,
    );
    builder.openScope();
    if (
      obj.filledRegionDetermination !== CanvasFilledRegionDetermination.Alternate
    ) {
      builder.writeLine(
        `builder.SetFilledRegionDetermination(${s.filledRegionDetermination(obj.filledRegionDetermination)});`,
      );
    }
    for (const command of obj.commands) {
      builder.writeLine(`builder.${this.pathCommand(command)};`);
    }
    builder.writeLine(
      `result = ${assignTo(fieldName)}CanvasGeometry.CreatePath(builder);`,
    );
    builder.closeScope();
  }

  writeCanvasGeometryRoundedRectangleFactory(
    builder: CodeBuilder,
    obj: CanvasGeometryRoundedRectangle,
    _typeName: string,
    fieldName: string | undefined,
  ): void {
    const s = this.stringifier;
    const args = [obj.x, obj.y, obj.w, obj.h, obj.radiusX, obj.radiusY].map(
      (value) => s.float(value),
    );
    builder.writeLine(
      `${s.varKeyword} result = ${assignTo(fieldName)}CanvasGeometry.CreateRoundedRectangle(${s.nullLiteral}, ${args.join(", ")});`,
    );
  }

  private pathCommand(command: PathCommand): string {
    const s = this.stringifier;
    switch (command.kind) {
      case "beginFigure":
        return `BeginFigure(${s.vector2(command.startPoint)})`;
      case "addLine":
        return `AddLine(${s.vector2(command.endPoint)})`;
      case "addCubicBezier":
        return `AddCubicBezier(${s.vector2(command.controlPoint1)}, ${s.vector2(command.controlPoint2)}, ${s.vector2(command.endPoint)})`;
      case "endFigure":
        return `EndFigure(${s.canvasFigureLoop(command.figureLoop)})`;
      default:
        return assertNever(command, "path command");
    }
  }
}

const assignTo = (fieldName: string | undefined): string =>
  fieldName === undefined ? "" : `${fieldName} = `;
