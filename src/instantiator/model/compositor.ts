/**
 * Factory for composition objects with runtime defaults
 */

import {
  type AnimationController,
  type Animator,
  CANVAS_GEOMETRY,
  type CanvasFilledRegionDetermination,
  type CanvasGeometry,
  type CanvasGeometryCombination,
  type CanvasGeometryCombine,
  type CanvasGeometryEllipse,
  type CanvasGeometryPath,
  CanvasGeometryType,
  type CanvasGeometryRoundedRectangle,
  COMPOSITION_PATH,
  type ColorKeyFrameAnimation,
  type CompositionAnimation,
  type CompositionColorBrush,
  type CompositionContainerShape,
  type CompositionEllipseGeometry,
  CompositionObjectType,
  type CompositionPath,
  type CompositionPathGeometry,
  type CompositionPropertySet,
  type CompositionRectangleGeometry,
  type CompositionRoundedRectangleGeometry,
  type CompositionSpriteShape,
  CompositionStrokeCap,
  CompositionStrokeLineJoin,
  type CompositionViewBox,
  type ContainerVisual,
  type CubicBezierEasingFunction,
  type ExpressionAnimation,
  type InsetClip,
  type LinearEasingFunction,
  type PathCommand,
  type PathKeyFrameAnimation,
  type ScalarKeyFrameAnimation,
  type ShapeVisual,
  type StepEasingFunction,
  type Vector2KeyFrameAnimation,
  type Vector3KeyFrameAnimation,
} from "./types.js";
import {
  type Color,
  IDENTITY_MATRIX,
  type Matrix3x2,
  type Vector2,
} from "./values.js";

type Init<T> = Partial<Omit<T, "type">>;

const ZERO: Vector2 = { x: 0, y: 0 };
const ONE: Vector2 = { x: 1, y: 1 };

export const createPropertySet = (
  init: Init<CompositionPropertySet> = {},
): CompositionPropertySet => ({
  animators: [],
  scalarProperties: new Map(),
  vector2Properties: new Map(),
  ...init,
  type: CompositionObjectType.CompositionPropertySet,
});

const owned = (): { animators: Animator[]; properties: CompositionPropertySet } => ({
  animators: [],
  properties: createPropertySet(),
});

/**
 * Creates composition objects the way the runtime compositor does, with every
 * property at its default.
 */
export class Compositor {
  createContainerVisual(init: Init<ContainerVisual> = {}): ContainerVisual {
    return {
      ...owned(),
      children: [],
      ...init,
      type: CompositionObjectType.ContainerVisual,
    };
  }

  createShapeVisual(init: Init<ShapeVisual> = {}): ShapeVisual {
    return {
      ...owned(),
      children: [],
      shapes: [],
      ...init,
      type: CompositionObjectType.ShapeVisual,
    };
  }

  createInsetClip(init: Init<InsetClip> = {}): InsetClip {
    return {
      ...owned(),
      centerPoint: ZERO,
      scale: ONE,
      leftInset: 0,
      rightInset: 0,
      topInset: 0,
      bottomInset: 0,
      ...init,
      type: CompositionObjectType.InsetClip,
    };
  }

  createViewBox(size: Vector2, init: Init<CompositionViewBox> = {}): CompositionViewBox {
    return {
      ...owned(),
      size,
      ...init,
      type: CompositionObjectType.CompositionViewBox,
    };
  }

  createContainerShape(
    init: Init<CompositionContainerShape> = {},
  ): CompositionContainerShape {
    return {
      ...owned(),
      shapes: [],
      ...init,
      type: CompositionObjectType.CompositionContainerShape,
    };
  }

  createSpriteShape(
    init: Init<CompositionSpriteShape> = {},
  ): CompositionSpriteShape {
    return {
      ...owned(),
      isStrokeNonScaling: false,
      strokeDashCap: CompositionStrokeCap.Flat,
      strokeDashOffset: 0,
      strokeDashArray: [],
      strokeEndCap: CompositionStrokeCap.Flat,
      strokeLineJoin: CompositionStrokeLineJoin.Miter,
      strokeStartCap: CompositionStrokeCap.Flat,
      strokeMiterLimit: 1,
      strokeThickness: 1,
      ...init,
      type: CompositionObjectType.CompositionSpriteShape,
    };
  }

  createEllipseGeometry(
    radius: Vector2,
    init: Init<CompositionEllipseGeometry> = {},
  ): CompositionEllipseGeometry {
    return {
      ...owned(),
      trimStart: 0,
      trimEnd: 1,
      trimOffset: 0,
      center: ZERO,
      radius,
      ...init,
      type: CompositionObjectType.CompositionEllipseGeometry,
    };
  }

  createRectangleGeometry(
    size: Vector2,
    init: Init<CompositionRectangleGeometry> = {},
  ): CompositionRectangleGeometry {
    return {
      ...owned(),
      trimStart: 0,
      trimEnd: 1,
      trimOffset: 0,
      size,
      ...init,
      type: CompositionObjectType.CompositionRectangleGeometry,
    };
  }

  createRoundedRectangleGeometry(
    size: Vector2,
    cornerRadius: Vector2,
    init: Init<CompositionRoundedRectangleGeometry> = {},
  ): CompositionRoundedRectangleGeometry {
    return {
      ...owned(),
      trimStart: 0,
      trimEnd: 1,
      trimOffset: 0,
      size,
      cornerRadius,
      ...init,
      type: CompositionObjectType.CompositionRoundedRectangleGeometry,
    };
  }

  createPathGeometry(
    path: CompositionPath,
    init: Init<CompositionPathGeometry> = {},
  ): CompositionPathGeometry {
    return {
      ...owned(),
      trimStart: 0,
      trimEnd: 1,
      trimOffset: 0,
      path,
      ...init,
      type: CompositionObjectType.CompositionPathGeometry,
    };
  }

  createColorBrush(
    color: Color,
    init: Init<CompositionColorBrush> = {},
  ): CompositionColorBrush {
    return {
      ...owned(),
      color,
      ...init,
      type: CompositionObjectType.CompositionColorBrush,
    };
  }

  createLinearEasingFunction(): LinearEasingFunction {
    return { ...owned(), type: CompositionObjectType.LinearEasingFunction };
  }

  createCubicBezierEasingFunction(
    controlPoint1: Vector2,
    controlPoint2: Vector2,
  ): CubicBezierEasingFunction {
    return {
      ...owned(),
      controlPoint1,
      controlPoint2,
      type: CompositionObjectType.CubicBezierEasingFunction,
    };
  }

  createStepEasingFunction(
    init: Init<StepEasingFunction> = {},
  ): StepEasingFunction {
    return {
      ...owned(),
      finalStep: 1,
      initialStep: 0,
      isFinalStepSingleFrame: false,
      isInitialStepSingleFrame: false,
      stepCount: 1,
      ...init,
      type: CompositionObjectType.StepEasingFunction,
    };
  }

  createExpressionAnimation(
    expression: string,
    init: Init<ExpressionAnimation> = {},
  ): ExpressionAnimation {
    return {
      ...owned(),
      referenceParameters: new Map(),
      expression,
      ...init,
      type: CompositionObjectType.ExpressionAnimation,
    };
  }

  createColorKeyFrameAnimation(
    duration: number,
    init: Init<ColorKeyFrameAnimation> = {},
  ): ColorKeyFrameAnimation {
    return {
      ...owned(),
      referenceParameters: new Map(),
      keyFrames: [],
      duration,
      ...init,
      type: CompositionObjectType.ColorKeyFrameAnimation,
    };
  }

  createScalarKeyFrameAnimation(
    duration: number,
    init: Init<ScalarKeyFrameAnimation> = {},
  ): ScalarKeyFrameAnimation {
    return {
      ...owned(),
      referenceParameters: new Map(),
      keyFrames: [],
      duration,
      ...init,
      type: CompositionObjectType.ScalarKeyFrameAnimation,
    };
  }

  createVector2KeyFrameAnimation(
    duration: number,
    init: Init<Vector2KeyFrameAnimation> = {},
  ): Vector2KeyFrameAnimation {
    return {
      ...owned(),
      referenceParameters: new Map(),
      keyFrames: [],
      duration,
      ...init,
      type: CompositionObjectType.Vector2KeyFrameAnimation,
    };
  }

  createVector3KeyFrameAnimation(
    duration: number,
    init: Init<Vector3KeyFrameAnimation> = {},
  ): Vector3KeyFrameAnimation {
    return {
      ...owned(),
      referenceParameters: new Map(),
      keyFrames: [],
      duration,
      ...init,
      type: CompositionObjectType.Vector3KeyFrameAnimation,
    };
  }

  createPathKeyFrameAnimation(
    duration: number,
    init: Init<PathKeyFrameAnimation> = {},
  ): PathKeyFrameAnimation {
    return {
      ...owned(),
      referenceParameters: new Map(),
      keyFrames: [],
      duration,
      ...init,
      type: CompositionObjectType.PathKeyFrameAnimation,
    };
  }

  createAnimationController(): AnimationController {
    return { ...owned(), type: CompositionObjectType.AnimationController };
  }

  /**
   * Binds an animation to a property of the object (or of its property set,
   * when the property name is one of the set's own properties).
   */
  startAnimation(
    target: { animators: Animator[] },
    animatedProperty: string,
    animation: CompositionAnimation,
    controller?: AnimationController,
  ): void {
    target.animators.push({ animatedProperty, animation, controller });
  }

  createPath(source: CanvasGeometry): CompositionPath {
    return { type: COMPOSITION_PATH, source };
  }

  createCanvasEllipse(
    x: number,
    y: number,
    radiusX: number,
    radiusY: number,
  ): CanvasGeometryEllipse {
    return {
      type: CANVAS_GEOMETRY,
      geometryType: CanvasGeometryType.Ellipse,
      x,
      y,
      radiusX,
      radiusY,
    };
  }

  createCanvasRoundedRectangle(
    x: number,
    y: number,
    w: number,
    h: number,
    radiusX: number,
    radiusY: number,
  ): CanvasGeometryRoundedRectangle {
    return {
      type: CANVAS_GEOMETRY,
      geometryType: CanvasGeometryType.RoundedRectangle,
      x,
      y,
      w,
      h,
      radiusX,
      radiusY,
    };
  }

  createCanvasPath(
    filledRegionDetermination: CanvasFilledRegionDetermination,
    commands: PathCommand[],
  ): CanvasGeometryPath {
    return {
      type: CANVAS_GEOMETRY,
      geometryType: CanvasGeometryType.Path,
      filledRegionDetermination,
      commands,
    };
  }

  createCanvasCombination(
    a: CanvasGeometry,
    b: CanvasGeometry,
    combineMode: CanvasGeometryCombine,
    matrix: Matrix3x2 = IDENTITY_MATRIX,
  ): CanvasGeometryCombination {
    return {
      type: CANVAS_GEOMETRY,
      geometryType: CanvasGeometryType.Combination,
      a,
      b,
      matrix,
      combineMode,
    };
  }
}
