/**
 * Outgoing references of each object, in the order the emitters resolve them
 */

import { assertNever } from "../errors/codegen_errors.js";
import {
  type Animator,
  CanvasGeometryType,
  CompositionObjectType,
  type ExplicitCompositionObject,
  type GraphObject,
  type KeyFrame,
  animatorsOf,
  isCompositionObject,
} from "../model/types.js";

// Animations bound on an object, followed by those bound on each controller.
const animationReferences = (animators: Animator[]): GraphObject[] => {
  const refs: GraphObject[] = [];
  for (const animator of animators) {
    refs.push(animator.animation);
    if (animator.controller) {
      refs.push(...animationReferences(animatorsOf(animator.controller)));
    }
  }
  return refs;
};

const keyFrameReferences = <T>(
  keyFrames: KeyFrame<T>[],
  valueReference: (value: T) => GraphObject | undefined,
): GraphObject[] => {
  const refs: GraphObject[] = [];
  for (const keyFrame of keyFrames) {
    if (keyFrame.kind === "value") {
      const value = valueReference(keyFrame.value);
      if (value) {
        refs.push(value);
      }
    }
    refs.push(keyFrame.easing);
  }
  return refs;
};

const optional = (...values: Array<GraphObject | undefined>): GraphObject[] =>
  values.filter((value): value is GraphObject => value !== undefined);

const compositionObjectReferences = (
  obj: ExplicitCompositionObject,
): GraphObject[] => {
  const animations = () => animationReferences(animatorsOf(obj));
  switch (obj.type) {
    case CompositionObjectType.ContainerVisual:
      return [...optional(obj.clip), ...obj.children, ...animations()];
    case CompositionObjectType.ShapeVisual:
      return [
        ...optional(obj.clip),
        ...obj.children,
        ...obj.shapes,
        ...optional(obj.viewBox),
        ...animations(),
      ];
    case CompositionObjectType.CompositionContainerShape:
      return [...obj.shapes, ...animations()];
    case CompositionObjectType.CompositionSpriteShape:
      return [
        ...optional(obj.fillBrush, obj.geometry, obj.strokeBrush),
        ...animations(),
      ];
    case CompositionObjectType.CompositionPathGeometry:
      return [obj.path, ...animations()];
    case CompositionObjectType.InsetClip:
    case CompositionObjectType.CompositionViewBox:
    case CompositionObjectType.CompositionColorBrush:
    case CompositionObjectType.CompositionEllipseGeometry:
    case CompositionObjectType.CompositionRectangleGeometry:
    case CompositionObjectType.CompositionRoundedRectangleGeometry:
      return animations();
    // Easing functions never start animations.
    case CompositionObjectType.LinearEasingFunction:
    case CompositionObjectType.CubicBezierEasingFunction:
    case CompositionObjectType.StepEasingFunction:
      return [];
    // Nor do expression animations: a unique one is rebuilt on the shared
    // singleton, which carries no animators.
    case CompositionObjectType.ExpressionAnimation:
      return [...obj.referenceParameters.values()];
    case CompositionObjectType.ColorKeyFrameAnimation:
    case CompositionObjectType.ScalarKeyFrameAnimation:
    case CompositionObjectType.Vector2KeyFrameAnimation:
    case CompositionObjectType.Vector3KeyFrameAnimation:
      return [
        ...obj.referenceParameters.values(),
        ...keyFrameReferences<unknown>(obj.keyFrames, () => undefined),
        ...animations(),
      ];
    case CompositionObjectType.PathKeyFrameAnimation:
      return [
        ...obj.referenceParameters.values(),
        ...keyFrameReferences(obj.keyFrames, (path) => path),
        ...animations(),
      ];
    default:
      return assertNever(obj, "composition object");
  }
};

/**
 * Objects referenced by `obj`, with multiplicity, in emission order.
 */
export const outReferences = (obj: GraphObject): GraphObject[] => {
  if (isCompositionObject(obj)) {
    return compositionObjectReferences(obj);
  }
  if (obj.type === "CompositionPath") {
    return [obj.source];
  }
  switch (obj.geometryType) {
    case CanvasGeometryType.Combination:
      return [obj.a, obj.b];
    case CanvasGeometryType.Ellipse:
    case CanvasGeometryType.Path:
    case CanvasGeometryType.RoundedRectangle:
      return [];
    default:
      return assertNever(obj, "canvas geometry");
  }
};
