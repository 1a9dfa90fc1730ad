import { assertNever } from "../../errors/codegen_errors.js";
import {
  type CanvasGeometry,
  CanvasGeometryType,
  type CompositionPath,
  CompositionObjectType,
  type ExplicitCompositionObject,
} from "../../model/types.js";
import type { CompiledNode } from "../compiled_node.js";
import type { UnitAssembler } from "../unit_assembler.js";

/**
 * Writes the factory method of a node. Inlined and non-retained nodes have
 * none.
 */
export function writeCodeForNode(
  this: UnitAssembler,
  node: CompiledNode,
): void {
  if (!node.retained || node.isInlined) {
    return;
  }
  const obj = node.object;
  switch (obj.type) {
    case "CompositionPath":
      this.generateCompositionPathFactory(obj, node);
      return;
    case "CanvasGeometry":
      this.generateCanvasGeometryFactory(obj, node);
      return;
    default:
      this.generateObjectFactory(obj, node);
  }
}

export function generateObjectFactory(
  this: UnitAssembler,
  obj: ExplicitCompositionObject,
  node: CompiledNode,
): void {
  switch (obj.type) {
    case CompositionObjectType.ColorKeyFrameAnimation:
      return this.generateColorKeyFrameAnimationFactory(obj, node);
    case CompositionObjectType.CompositionColorBrush:
      return this.generateColorBrushFactory(obj, node);
    case CompositionObjectType.CompositionContainerShape:
      return this.generateContainerShapeFactory(obj, node);
    case CompositionObjectType.CompositionEllipseGeometry:
      return this.generateEllipseGeometryFactory(obj, node);
    case CompositionObjectType.CompositionPathGeometry:
      return this.generatePathGeometryFactory(obj, node);
    case CompositionObjectType.CompositionRectangleGeometry:
      return this.generateRectangleGeometryFactory(obj, node);
    case CompositionObjectType.CompositionRoundedRectangleGeometry:
      return this.generateRoundedRectangleGeometryFactory(obj, node);
    case CompositionObjectType.CompositionSpriteShape:
      return this.generateSpriteShapeFactory(obj, node);
    case CompositionObjectType.CompositionViewBox:
      return this.generateViewBoxFactory(obj, node);
    case CompositionObjectType.ContainerVisual:
      return this.generateContainerVisualFactory(obj, node);
    case CompositionObjectType.CubicBezierEasingFunction:
      return this.generateCubicBezierEasingFunctionFactory(obj, node);
    case CompositionObjectType.ExpressionAnimation:
      return this.generateExpressionAnimationFactory(obj, node);
    case CompositionObjectType.InsetClip:
      return this.generateInsetClipFactory(obj, node);
    case CompositionObjectType.LinearEasingFunction:
      return this.generateLinearEasingFunctionFactory(obj, node);
    case CompositionObjectType.PathKeyFrameAnimation:
      return this.generatePathKeyFrameAnimationFactory(obj, node);
    case CompositionObjectType.ScalarKeyFrameAnimation:
      return this.generateScalarKeyFrameAnimationFactory(obj, node);
    case CompositionObjectType.ShapeVisual:
      return this.generateShapeVisualFactory(obj, node);
    case CompositionObjectType.StepEasingFunction:
      return this.generateStepEasingFunctionFactory(obj, node);
    case CompositionObjectType.Vector2KeyFrameAnimation:
      return this.generateVector2KeyFrameAnimationFactory(obj, node);
    case CompositionObjectType.Vector3KeyFrameAnimation:
      return this.generateVector3KeyFrameAnimationFactory(obj, node);
    default:
      return assertNever(obj, "composition object");
  }
}

/**
 * A path shared by several geometries gets a factory of its own.
 */
export function generateCompositionPathFactory(
  this: UnitAssembler,
  obj: CompositionPath,
  node: CompiledNode,
): void {
  const s = this.stringifier;
  const source = this.callFactoryFromFor(node, obj.source);
  this.writeObjectFactoryStart(node);
  this.writeCreateAssignment(
    node,
    `${s.newOperator} CompositionPath(${s.factoryCall(source)})`,
  );
  this.writeObjectFactoryEnd();
}

export function generateCanvasGeometryFactory(
  this: UnitAssembler,
  obj: CanvasGeometry,
  node: CompiledNode,
): void {
  const { builder, target } = this;
  const typeName = this.stringifier.referenceTypeName(node.typeName);
  const fieldName = node.requiresStorage ? node.fieldName : undefined;

  this.writeObjectFactoryStart(node);
  switch (obj.geometryType) {
    case CanvasGeometryType.Combination: {
      const operands = {
        a: this.callFactoryFromFor(node, obj.a),
        b: this.callFactoryFromFor(node, obj.b),
      };
      target.writeCanvasGeometryCombinationFactory(
        builder,
        obj,
        typeName,
        fieldName,
        operands,
      );
      break;
    }
    case CanvasGeometryType.Ellipse:
      target.writeCanvasGeometryEllipseFactory(builder, obj, typeName, fieldName);
      break;
    case CanvasGeometryType.Path:
      target.writeCanvasGeometryPathFactory(builder, obj, typeName, fieldName);
      break;
    case CanvasGeometryType.RoundedRectangle:
      target.writeCanvasGeometryRoundedRectangleFactory(
        builder,
        obj,
        typeName,
        fieldName,
      );
      break;
    default:
      assertNever(obj, "canvas geometry");
  }
  this.writeObjectFactoryEnd();
}
