import {
  type CompositionContainerShape,
  type CompositionShape,
  type CompositionSpriteShape,
  CompositionStrokeCap,
  CompositionStrokeLineJoin,
} from "../../model/types.js";
import type { CompiledNode } from "../compiled_node.js";
import type { UnitAssembler } from "../unit_assembler.js";

export function strokeCap(
  this: UnitAssembler,
  value: CompositionStrokeCap,
): string {
  return `CompositionStrokeCap${this.stringifier.scopeResolve}${value}`;
}

export function strokeLineJoin(
  this: UnitAssembler,
  value: CompositionStrokeLineJoin,
): string {
  return `CompositionStrokeLineJoin${this.stringifier.scopeResolve}${value}`;
}

export function initializeCompositionShape(
  this: UnitAssembler,
  obj: CompositionShape,
): void {
  const s = this.stringifier;
  this.initializeCompositionObject(obj);
  if (obj.centerPoint) {
    this.writeAssignment("CenterPoint", s.vector2(obj.centerPoint));
  }
  if (obj.offset) {
    this.writeAssignment("Offset", s.vector2(obj.offset));
  }
  if (obj.rotationAngleInDegrees !== undefined) {
    this.writeAssignment(
      "RotationAngleInDegrees",
      s.float(obj.rotationAngleInDegrees),
    );
  }
  if (obj.scale) {
    this.writeAssignment("Scale", s.vector2(obj.scale));
  }
}

export function generateContainerShapeFactory(
  this: UnitAssembler,
  obj: CompositionContainerShape,
  node: CompiledNode,
): void {
  const { builder, deref } = this;
  this.writeObjectFactoryStart(node);
  this.writeCreateAssignment(node, this.compositorCall("CreateContainerShape"));
  this.initializeCompositionShape(obj);
  if (obj.shapes.length > 0) {
    builder.writeLine(
      `${this.stringifier.varKeyword} shapes = result${deref}Shapes;`,
    );
    for (const shape of obj.shapes) {
      builder.writeLine(
        `shapes${deref}${this.stringifier.iListAdd}(${this.callFactoryFromFor(node, shape)});`,
      );
    }
  }
  this.startAnimations(obj, node);
  this.writeObjectFactoryEnd();
}

export function generateSpriteShapeFactory(
  this: UnitAssembler,
  obj: CompositionSpriteShape,
  node: CompiledNode,
): void {
  const { builder, deref } = this;
  const s = this.stringifier;
  this.writeObjectFactoryStart(node);
  this.writeCreateAssignment(node, this.compositorCall("CreateSpriteShape"));
  this.initializeCompositionShape(obj);

  if (obj.fillBrush) {
    this.writeAssignment(
      "FillBrush",
      this.callFactoryFromFor(node, obj.fillBrush),
    );
  }
  if (obj.geometry) {
    this.writeAssignment("Geometry", this.callFactoryFromFor(node, obj.geometry));
  }
  if (obj.isStrokeNonScaling) {
    this.writeAssignment("IsStrokeNonScaling", s.bool(true));
  }
  if (obj.strokeBrush) {
    this.writeAssignment(
      "StrokeBrush",
      this.callFactoryFromFor(node, obj.strokeBrush),
    );
  }
  if (obj.strokeDashCap !== CompositionStrokeCap.Flat) {
    this.writeAssignment("StrokeDashCap", this.strokeCap(obj.strokeDashCap));
  }
  if (obj.strokeDashOffset !== 0) {
    this.writeAssignment("StrokeDashOffset", s.float(obj.strokeDashOffset));
  }
  if (obj.strokeDashArray.length > 0) {
    builder.writeLine(
      `${s.varKeyword} strokeDashArray = result${deref}StrokeDashArray;`,
    );
    for (const dash of obj.strokeDashArray) {
      builder.writeLine(`strokeDashArray${deref}${s.iListAdd}(${s.float(dash)});`);
    }
  }
  if (obj.strokeEndCap !== CompositionStrokeCap.Flat) {
    this.writeAssignment("StrokeEndCap", this.strokeCap(obj.strokeEndCap));
  }
  if (obj.strokeLineJoin !== CompositionStrokeLineJoin.Miter) {
    this.writeAssignment(
      "StrokeLineJoin",
      this.strokeLineJoin(obj.strokeLineJoin),
    );
  }
  if (obj.strokeStartCap !== CompositionStrokeCap.Flat) {
    this.writeAssignment("StrokeStartCap", this.strokeCap(obj.strokeStartCap));
  }
  if (obj.strokeMiterLimit !== 1) {
    this.writeAssignment("StrokeMiterLimit", s.float(obj.strokeMiterLimit));
  }
  if (obj.strokeThickness !== 1) {
    this.writeAssignment("StrokeThickness", s.float(obj.strokeThickness));
  }
  this.startAnimations(obj, node);
  this.writeObjectFactoryEnd();
}
